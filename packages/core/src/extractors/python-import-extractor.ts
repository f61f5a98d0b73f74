/**
 * Python Import Extractor
 *
 * Lexical extraction of `import` and `from ... import` statements.
 *
 * The source is first blanked: comments and the contents of string literals
 * become spaces while line structure is kept, so nothing inside a docstring
 * or a comment is mistaken for an import. Logical statements are then
 * assembled across bracketed continuations, `\` line joins and `;`
 * separators, and each statement is matched against the import grammar.
 */

import { Errors } from '../errors/index.js';
import type { ModuleId, RawImport } from '../module-graph/types.js';
import type { ImportExtractor } from './types.js';

const IDENTIFIER = '[\\p{L}_][\\p{L}\\p{N}_]*';
const DOTTED_NAME = `${IDENTIFIER}(?:\\s*\\.\\s*${IDENTIFIER})*`;

const IMPORT_PATTERN = /^import\s+(.+)$/u;
const FROM_PATTERN = /^from\s+([\p{L}\p{N}_.\s]*?)\s*\bimport\b(.*)$/u;
const IMPORT_NAME_PATTERN = new RegExp(`^(${DOTTED_NAME})(?:\\s+as\\s+${IDENTIFIER})?$`, 'u');
const MEMBER_PATTERN = new RegExp(`^(${IDENTIFIER})(?:\\s+as\\s+${IDENTIFIER})?$`, 'u');
const MODULE_PATTERN = new RegExp(`^${IDENTIFIER}(?:\\.${IDENTIFIER})*$`, 'u');

/**
 * Compound statement header on the same line as an import
 * (`try: import x`, `if TYPE_CHECKING: from a import b`, `def f(): import y`)
 */
const COMPOUND_HEADER = new RegExp(
  [
    '^(?:',
    '(?:try|else|finally)\\s*:',
    '|(?:if|elif|while|for|with|except|async\\s+(?:for|with))\\b[^:]*:',
    `|(?:async\\s+)?def\\s+${IDENTIFIER}\\s*\\(.*?\\)\\s*(?:->[^:]*)?:`,
    `|class\\s+${IDENTIFIER}\\s*(?:\\(.*?\\))?\\s*:`,
    ')\\s*(?=(?:import|from)\\s)',
  ].join(''),
  'u'
);

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);

interface Statement {
  text: string;
  /** 1-based line the statement starts on */
  line: number;
}

type ImportStatement =
  | { type: 'import'; line: number; modules: string[] }
  | { type: 'from'; line: number; depth: number; target: string; members: string[] | '*' };

export class PythonImportExtractor implements ImportExtractor {
  readonly language = 'python';
  readonly extensions: readonly string[] = ['.py', '.pyi'];

  canHandle(filePath: string): boolean {
    const lastDot = filePath.lastIndexOf('.');
    return lastDot >= 0 && this.extensions.includes(filePath.slice(lastDot));
  }

  extract(source: string, origin: ModuleId): Iterable<RawImport> {
    const clean = this.blankLiterals(source.replace(/\r\n?/g, '\n'), origin);
    const statements: ImportStatement[] = [];

    for (const statement of this.splitStatements(clean, origin)) {
      const parsed = this.parseStatement(statement, origin);
      if (parsed) statements.push(parsed);
    }

    return this.records(statements, origin);
  }

  private *records(statements: ImportStatement[], origin: ModuleId): Generator<RawImport> {
    for (const statement of statements) {
      if (statement.type === 'import') {
        for (const target of statement.modules) {
          yield { target, kind: { type: 'absolute' }, origin, line: statement.line };
        }
        continue;
      }

      const { depth, target, line } = statement;
      if (statement.members === '*') {
        yield { target, kind: { type: 'star', depth }, origin, line };
        continue;
      }
      for (const member of statement.members) {
        yield {
          target,
          member,
          kind: depth > 0 ? { type: 'relative', depth } : { type: 'absolute' },
          origin,
          line,
        };
      }
    }
  }

  // ==========================================================================
  // Lexing
  // ==========================================================================

  /**
   * Replace comments and string contents with spaces, keeping quotes and
   * newlines so offsets and line numbers survive.
   */
  private blankLiterals(source: string, origin: ModuleId): string {
    const out: string[] = [];
    let line = 1;
    let i = 0;

    while (i < source.length) {
      const char = source[i] ?? '';

      if (char === '#') {
        while (i < source.length && source[i] !== '\n') {
          out.push(' ');
          i++;
        }
        continue;
      }

      if (char === '"' || char === "'") {
        const quote = source.startsWith(char.repeat(3), i) ? char.repeat(3) : char;
        const triple = quote.length === 3;
        const startLine = line;
        let closed = false;

        out.push(quote);
        i += quote.length;

        while (i < source.length) {
          const current = source[i] ?? '';

          if (current === '\\') {
            out.push(' ');
            i++;
            const escaped = source[i];
            if (escaped !== undefined) {
              out.push(escaped === '\n' ? '\n' : ' ');
              if (escaped === '\n') line++;
              i++;
            }
            continue;
          }
          if (source.startsWith(quote, i)) {
            out.push(quote);
            i += quote.length;
            closed = true;
            break;
          }
          if (current === '\n') {
            if (!triple) break;
            line++;
          }
          out.push(current === '\n' ? '\n' : ' ');
          i++;
        }

        if (!closed) {
          throw Errors.parseFailure(
            origin,
            startLine,
            triple ? 'unterminated triple-quoted string literal' : 'unterminated string literal'
          );
        }
        continue;
      }

      if (char === '\n') line++;
      out.push(char);
      i++;
    }

    return out.join('');
  }

  /**
   * Assemble logical statements and check bracket balance
   */
  private splitStatements(clean: string, origin: ModuleId): Statement[] {
    const statements: Statement[] = [];
    const open: Array<{ char: string; line: number }> = [];
    let current = '';
    let startLine = 1;
    let line = 1;

    const flush = (): void => {
      const text = current.trim();
      if (text) statements.push({ text, line: startLine });
      current = '';
    };

    for (let i = 0; i < clean.length; i++) {
      const char = clean[i] ?? '';

      if (char === '\\' && clean[i + 1] === '\n') {
        current += ' ';
        i++;
        line++;
        continue;
      }

      if (char === '\n') {
        line++;
        if (open.length === 0) {
          flush();
        } else {
          current += ' ';
        }
        continue;
      }

      if (char === ';' && open.length === 0) {
        flush();
        continue;
      }

      if (char in OPENERS) {
        open.push({ char, line });
      } else if (CLOSERS.has(char)) {
        const opener = open.pop();
        if (!opener) {
          throw Errors.parseFailure(origin, line, `unmatched '${char}'`);
        }
        if (OPENERS[opener.char] !== char) {
          throw Errors.parseFailure(
            origin,
            line,
            `closing parenthesis '${char}' does not match opening parenthesis '${opener.char}'`
          );
        }
      }

      if (current.trim() === '' && char.trim() !== '') {
        startLine = line;
      }
      current += char;
    }

    const unclosed = open[open.length - 1];
    if (unclosed) {
      throw Errors.parseFailure(origin, unclosed.line, `'${unclosed.char}' was never closed`);
    }
    flush();

    return statements;
  }

  // ==========================================================================
  // Statement Parsing
  // ==========================================================================

  private parseStatement(statement: Statement, origin: ModuleId): ImportStatement | null {
    const text = statement.text.replace(COMPOUND_HEADER, '');
    const { line } = statement;

    if (/^import\s*$/u.test(text)) {
      throw Errors.parseFailure(origin, line, 'invalid syntax');
    }

    const importMatch = IMPORT_PATTERN.exec(text);
    if (importMatch) {
      const modules = this.splitNames(importMatch[1] ?? '', false, origin, line).map(part => {
        const nameMatch = IMPORT_NAME_PATTERN.exec(part);
        if (!nameMatch) {
          throw Errors.parseFailure(origin, line, 'invalid syntax');
        }
        return (nameMatch[1] ?? part).replace(/\s+/g, '');
      });
      return { type: 'import', line, modules };
    }

    if (!/^from\s/u.test(text)) {
      return null;
    }

    const fromMatch = FROM_PATTERN.exec(text);
    if (!fromMatch) {
      throw Errors.parseFailure(origin, line, 'invalid syntax');
    }

    const moduleSpec = (fromMatch[1] ?? '').replace(/\s+/g, '');
    const target = moduleSpec.replace(/^\.+/u, '');
    const depth = moduleSpec.length - target.length;
    if ((depth === 0 && !target) || (target && !MODULE_PATTERN.test(target))) {
      throw Errors.parseFailure(origin, line, 'invalid syntax');
    }

    const names = (fromMatch[2] ?? '').trim();
    if (names === '*') {
      return { type: 'from', line, depth, target, members: '*' };
    }

    const parenthesized = names.startsWith('(');
    if (parenthesized && !names.endsWith(')')) {
      throw Errors.parseFailure(origin, line, 'invalid syntax');
    }
    const list = parenthesized ? names.slice(1, -1) : names;

    const members = this.splitNames(list, parenthesized, origin, line).map(part => {
      const memberMatch = MEMBER_PATTERN.exec(part);
      if (!memberMatch) {
        throw Errors.parseFailure(origin, line, 'invalid syntax');
      }
      return memberMatch[1] ?? part;
    });

    return { type: 'from', line, depth, target, members };
  }

  /**
   * Comma-separated names; a trailing comma is allowed only inside parentheses
   */
  private splitNames(list: string, parenthesized: boolean, origin: ModuleId, line: number): string[] {
    let body = list.trim();
    if (!body) {
      throw Errors.parseFailure(origin, line, "expected one or more names after 'import'");
    }
    if (body.endsWith(',')) {
      if (!parenthesized) {
        throw Errors.parseFailure(origin, line, 'trailing comma not allowed without surrounding parentheses');
      }
      body = body.slice(0, -1);
    }

    const parts = body.split(',').map(part => part.trim());
    if (parts.some(part => part === '')) {
      throw Errors.parseFailure(origin, line, 'invalid syntax');
    }
    return parts;
  }
}
