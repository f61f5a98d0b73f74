/**
 * Python Import Extractor Tests
 */

import { describe, it, expect } from 'vitest';
import { PythonImportExtractor } from '../python-import-extractor.js';
import { getExtractorForFile, getSupportedExtensions } from '../index.js';
import { ModgraphErrorCode, isModgraphError } from '../../errors/index.js';

const extractor = new PythonImportExtractor();

function extractAll(source: string) {
  return [...extractor.extract(source, 'm')];
}

function parseFailureOf(source: string): string {
  try {
    extractor.extract(source, 'm');
  } catch (error) {
    if (isModgraphError(error, ModgraphErrorCode.PARSE_FAILURE)) {
      return error.message;
    }
    throw error;
  }
  throw new Error('expected a parse failure');
}

describe('PythonImportExtractor', () => {
  describe('import statements', () => {
    it('should emit one record per dotted name', () => {
      const source = ['import os', 'import a.b as c, d'].join('\n');

      expect(extractAll(source)).toEqual([
        { target: 'os', kind: { type: 'absolute' }, origin: 'm', line: 1 },
        { target: 'a.b', kind: { type: 'absolute' }, origin: 'm', line: 2 },
        { target: 'd', kind: { type: 'absolute' }, origin: 'm', line: 2 },
      ]);
    });

    it('should keep duplicates in source order', () => {
      const records = extractAll('import os\nimport os\n');

      expect(records.map(r => r.line)).toEqual([1, 2]);
    });

    it('should not match identifiers that start with import or from', () => {
      const source = ['important = 1', 'from_here = 2', 'importlib.import_module("x")'].join('\n');

      expect(extractAll(source)).toEqual([]);
    });
  });

  describe('from statements', () => {
    it('should emit one record per imported name', () => {
      const records = extractAll('from x.y import p, q as r\n');

      expect(records).toEqual([
        { target: 'x.y', member: 'p', kind: { type: 'absolute' }, origin: 'm', line: 1 },
        { target: 'x.y', member: 'q', kind: { type: 'absolute' }, origin: 'm', line: 1 },
      ]);
    });

    it('should record relative depth and star imports', () => {
      const source = ['from . import a', 'from ..pkg.mod import b', 'from .x import *', 'from os import *'].join('\n');

      expect(extractAll(source)).toEqual([
        { target: '', member: 'a', kind: { type: 'relative', depth: 1 }, origin: 'm', line: 1 },
        { target: 'pkg.mod', member: 'b', kind: { type: 'relative', depth: 2 }, origin: 'm', line: 2 },
        { target: 'x', kind: { type: 'star', depth: 1 }, origin: 'm', line: 3 },
        { target: 'os', kind: { type: 'star', depth: 0 }, origin: 'm', line: 4 },
      ]);
    });

    it('should read parenthesised multi-line name lists', () => {
      const source = ['from pkg import (', '    alpha,', '    beta as b,', ')', 'import late'].join('\n');
      const records = extractAll(source);

      expect(records.map(r => [r.target, r.member, r.line])).toEqual([
        ['pkg', 'alpha', 1],
        ['pkg', 'beta', 1],
        ['late', undefined, 5],
      ]);
    });

    it('should join backslash continuations', () => {
      const records = extractAll('from pkg.mod import \\\n    name\n');

      expect(records).toEqual([
        { target: 'pkg.mod', member: 'name', kind: { type: 'absolute' }, origin: 'm', line: 1 },
      ]);
    });
  });

  describe('source preprocessing', () => {
    it('should ignore imports inside strings and comments', () => {
      const source = [
        '"""Module docstring.',
        'import fake',
        '"""',
        '# import commented',
        'x = "import notreal"',
        'import real  # trailing',
      ].join('\n');

      expect(extractAll(source)).toEqual([
        { target: 'real', kind: { type: 'absolute' }, origin: 'm', line: 6 },
      ]);
    });

    it('should find imports nested in blocks and after semicolons', () => {
      const source = [
        'try:',
        '    import fast',
        'except ImportError:',
        '    import slow',
        'if TYPE_CHECKING: from typing_mod import T',
        'def f():',
        '    import inner; import other',
      ].join('\n');

      expect(extractAll(source).map(r => [r.target, r.line])).toEqual([
        ['fast', 2],
        ['slow', 4],
        ['typing_mod', 5],
        ['inner', 7],
        ['other', 7],
      ]);
    });
  });

  describe('line endings', () => {
    it('should read parenthesised lists with Windows line endings', () => {
      const records = extractAll('from b import (\r\n    x,\r\n    y,\r\n)\r\nimport c\r\n');

      expect(records.map(r => [r.target, r.member, r.line])).toEqual([
        ['b', 'x', 1],
        ['b', 'y', 1],
        ['c', undefined, 5],
      ]);
    });

    it('should join backslash continuations ending in a carriage return', () => {
      expect(extractAll('import a, \\\r\n    b\r\n').map(r => r.target)).toEqual(['a', 'b']);
      expect(extractAll('import old\rimport mac\r').map(r => [r.target, r.line])).toEqual([
        ['old', 1],
        ['mac', 2],
      ]);
    });
  });

  describe('one-line definitions', () => {
    it('should find imports after a def or class header', () => {
      const source = [
        'def lazy(): import heavy',
        'def typed(x: int = 1) -> None: from pkg import tool',
        'async def fetch(): import client',
        'class Plugin: import registry',
        'class Child(Base, metaclass=Meta): from . import sibling',
      ].join('\n');

      expect(extractAll(source).map(r => [r.target, r.member, r.line])).toEqual([
        ['heavy', undefined, 1],
        ['pkg', 'tool', 2],
        ['client', undefined, 3],
        ['registry', undefined, 4],
        ['', 'sibling', 5],
      ]);
    });
  });

  describe('parse failures', () => {
    it('should report an unclosed bracket with its line', () => {
      expect(parseFailureOf('import ok\ndef broken(\n')).toBe("Syntax error: line 2: '(' was never closed");
    });

    it('should report an unterminated triple-quoted string', () => {
      expect(parseFailureOf('x = 1\ns = """never closed\n')).toBe(
        'Syntax error: line 2: unterminated triple-quoted string literal'
      );
    });

    it('should report mismatched and unmatched brackets', () => {
      expect(parseFailureOf('x = (1, 2]\n')).toBe(
        "Syntax error: line 1: closing parenthesis ']' does not match opening parenthesis '('"
      );
      expect(parseFailureOf('x = 1)\n')).toBe("Syntax error: line 1: unmatched ')'");
    });

    it('should report a from statement without names', () => {
      expect(parseFailureOf('from pkg import\n')).toBe(
        "Syntax error: line 1: expected one or more names after 'import'"
      );
    });

    it('should report a trailing comma outside parentheses', () => {
      expect(parseFailureOf('from a import b,\n')).toBe(
        'Syntax error: line 1: trailing comma not allowed without surrounding parentheses'
      );
    });

    it('should report an unclosed import list', () => {
      expect(parseFailureOf('from pkg import (a,\n    b\n')).toBe("Syntax error: line 1: '(' was never closed");
    });

    it('should fail before any record is produced', () => {
      expect(() => extractor.extract('import ok\nx = [\n', 'm')).toThrow("'[' was never closed");
    });
  });

  it('should yield records lazily', () => {
    const iterator = extractor.extract('import a\nimport b\n', 'm')[Symbol.iterator]();

    expect(iterator.next().value).toEqual({ target: 'a', kind: { type: 'absolute' }, origin: 'm', line: 1 });
    expect(iterator.next().value).toEqual({ target: 'b', kind: { type: 'absolute' }, origin: 'm', line: 2 });
    expect(iterator.next().done).toBe(true);
  });

  it('should handle python source files only', () => {
    expect(extractor.canHandle('pkg/mod.py')).toBe(true);
    expect(extractor.canHandle('pkg/mod.pyi')).toBe(true);
    expect(extractor.canHandle('README.md')).toBe(false);
    expect(extractor.canHandle('Makefile')).toBe(false);
  });
});

describe('getExtractorForFile', () => {
  it('should return the python extractor for .py files', () => {
    expect(getExtractorForFile('main.py')).toBeInstanceOf(PythonImportExtractor);
  });

  it('should return null for unsupported files', () => {
    expect(getExtractorForFile('notes.txt')).toBeNull();
  });

  it('should list supported extensions', () => {
    expect(getSupportedExtensions()).toEqual(['.py', '.pyi']);
  });
});
