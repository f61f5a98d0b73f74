/**
 * CLI Command Tests
 *
 * Runs the real program against small projects in a temporary directory and
 * captures console output.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { CommanderError } from 'commander';

import { createProgram } from '../../program.js';

const SAMPLE_PROJECT: Record<string, string> = {
  'app/__init__.py': 'from .core import run\n',
  'app/core.py': 'import os\nfrom app import utils\n',
  'app/utils.py': 'from . import core\nimport requests\n',
  'main.py': 'from app.core import run\nimport json\n',
  'broken.py': 'def broken(\n',
  '__pycache__/cached.py': 'import os\n',
};

const SAMPLE_TREE = [
  'app',
  '`-- app.core',
  '    `-- app.utils',
  '        `-- app.core [circular]',
  '',
  'broken',
  '',
  'main',
  '`-- app.core',
  '    `-- app.utils',
  '        `-- app.core [circular]',
].join('\n');

interface RunResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

async function writeProject(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}

async function run(...args: string[]): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const capture = (into: string[]) => (...parts: unknown[]) => {
    into.push(parts.map(String).join(' '));
  };

  const log = vi.spyOn(console, 'log').mockImplementation(capture(stdout));
  const error = vi.spyOn(console, 'error').mockImplementation(capture(stderr));

  const program = createProgram();
  program.exitOverride();
  for (const command of program.commands) {
    command.exitOverride().configureOutput({
      writeOut: text => stdout.push(text),
      writeErr: text => stderr.push(text),
    });
  }

  let exitCode = 0;
  process.exitCode = undefined;
  try {
    await program.parseAsync(['node', 'modgraph', ...args]);
    exitCode = typeof process.exitCode === 'number' ? process.exitCode : 0;
  } catch (caught) {
    if (!(caught instanceof CommanderError)) throw caught;
    exitCode = caught.exitCode;
  } finally {
    process.exitCode = undefined;
    log.mockRestore();
    error.mockRestore();
  }

  return { stdout, stderr, exitCode };
}

describe('modgraph CLI', () => {
  let tempDir: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modgraph-cli-'));
    await writeProject(tempDir, SAMPLE_PROJECT);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('scan', () => {
    it('should print the scan summary', async () => {
      const { stdout, exitCode } = await run('scan', tempDir);

      expect(exitCode).toBe(0);
      expect(stdout).toHaveLength(3);
      expect(stdout[0]).toBe(`[OK] Scan complete: ${path.resolve(tempDir)}`);
      expect(stdout[1]).toMatch(/^ {5}Files: 5 \| Modules: 5 \| Dependencies: 4 \| Time: \d+\.\d{3}s$/);
      expect(stdout[2]).toBe('     [!] 1 file(s) had parse errors');
    });

    it('should append the JSON report', async () => {
      const { stdout } = await run('scan', tempDir, '--json');
      const report: unknown = JSON.parse(stdout[3] ?? '');

      expect(report).toMatchObject({
        summary: { totalFiles: 5, totalModules: 5, totalDependencies: 4, circularImportCount: 1, orphanCount: 3 },
      });
    });

    it('should replace the default exclusions with --exclude', async () => {
      const { stdout } = await run('scan', tempDir, '--exclude', 'app,__pycache__');

      expect(stdout[1]).toMatch(/^ {5}Files: 2 \| Modules: 2 \| Dependencies: 0 \| /);
    });

    it('should fail for a missing path', async () => {
      const missing = path.join(tempDir, 'missing');
      const { stderr, exitCode } = await run('scan', missing);

      expect(exitCode).toBe(1);
      expect(stderr).toEqual([
        `[X] Error: Path not found: ${missing}`,
        '    Check that the project root exists and is readable',
      ]);
    });

    it('should fail for an invalid configuration file', async () => {
      const configFile = path.join(tempDir, '.modgraph.json');
      await fs.writeFile(configFile, JSON.stringify({ colour: true }));

      const { stderr, exitCode } = await run('scan', tempDir);

      expect(exitCode).toBe(1);
      expect(stderr[0]).toBe(
        `[X] Error: Invalid configuration in ${configFile}: (root): Unrecognized key(s) in object: 'colour'`
      );
    });
  });

  describe('tree', () => {
    it('should print the tree from every root', async () => {
      const { stdout, exitCode } = await run('tree', tempDir);

      expect(exitCode).toBe(0);
      expect(stdout.slice(3)).toEqual(['', 'DEPENDENCY TREE', '-'.repeat(50), SAMPLE_TREE]);
    });

    it('should start from a module and respect the depth', async () => {
      const { stdout } = await run('tree', tempDir, '-m', 'app.utils', '-d', '1');

      expect(stdout[stdout.length - 1]).toBe('app.utils\n`-- app.core');
    });

    it('should report an unknown module', async () => {
      const { stdout, exitCode } = await run('tree', tempDir, '--module', 'nope');

      expect(exitCode).toBe(1);
      expect(stdout[stdout.length - 1]).toBe('[!] Module not found: nope');
    });

    it('should reject a negative depth', async () => {
      const { stderr, exitCode } = await run('tree', tempDir, '--depth', '-1');

      expect(exitCode).toBe(1);
      expect(stderr.join('')).toContain('Expected an integer >= 0.');
    });
  });

  describe('circular', () => {
    it('should list cycles and exit with 2', async () => {
      const { stdout, exitCode } = await run('circular', tempDir);

      expect(exitCode).toBe(2);
      expect(stdout.slice(3)).toEqual([
        '',
        '[!] Found 1 circular import chain(s):',
        '',
        '  Cycle 1: app.core -> app.utils -> app.core',
      ]);
    });

    it('should take the cycle bound from the configuration file', async () => {
      await fs.writeFile(path.join(tempDir, '.modgraph.json'), JSON.stringify({ maxCycleLength: 1 }));

      const bounded = await run('circular', tempDir);
      const overridden = await run('circular', tempDir, '--max-length', '5');

      expect(bounded.exitCode).toBe(0);
      expect(bounded.stdout[bounded.stdout.length - 1]).toBe('[OK] No circular imports detected!');
      expect(overridden.exitCode).toBe(2);
    });

    it('should report a self-import as a cycle', async () => {
      const selfDir = path.join(tempDir, 'selfie');
      await writeProject(selfDir, { 'loop.py': 'import loop\n' });

      const { stdout, exitCode } = await run('circular', selfDir);

      expect(exitCode).toBe(2);
      expect(stdout[stdout.length - 1]).toBe('  Cycle 1: loop -> loop');
    });
  });

  describe('metrics', () => {
    it('should print an aligned table with markers', async () => {
      const { stdout, exitCode } = await run('metrics', tempDir, '--sort', 'fan-in');

      expect(exitCode).toBe(0);
      expect(stdout.slice(3)).toEqual([
        '',
        'COUPLING METRICS',
        '-'.repeat(70),
        `${'Module'.padEnd(40)}  Fan-In  Fan-Out  Instab.`,
        '-'.repeat(70),
        `${'app.core'.padEnd(40)}       3        1    0.250`,
        `${'app.utils'.padEnd(40)}       1        1    0.500`,
        `${'app'.padEnd(40)}       0        1    1.000 [!]`,
        `${'broken'.padEnd(40)}       0        0    0.000`,
        `${'main'.padEnd(40)}       0        1    1.000 [!]`,
      ]);
    });

    it('should print JSON sorted by instability', async () => {
      const { stdout } = await run('metrics', tempDir, '--json');
      const metrics: unknown = JSON.parse(stdout[4] ?? '');

      expect(metrics).toEqual([
        { module: 'app', fanIn: 0, fanOut: 1, instability: 1 },
        { module: 'main', fanIn: 0, fanOut: 1, instability: 1 },
        { module: 'app.utils', fanIn: 1, fanOut: 1, instability: 0.5 },
        { module: 'app.core', fanIn: 3, fanOut: 1, instability: 0.25 },
        { module: 'broken', fanIn: 0, fanOut: 0, instability: 0 },
      ]);
    });

    it('should reject an unknown sort key', async () => {
      const { stderr, exitCode } = await run('metrics', tempDir, '--sort', 'size');

      expect(exitCode).toBe(1);
      expect(stderr.join('')).toContain('Use one of: name, fan_in, fan_out, instability');
    });
  });

  describe('orphans', () => {
    it('should label each orphan', async () => {
      const { stdout } = await run('orphans', tempDir);

      expect(stdout.slice(3)).toEqual([
        '',
        'ORPHAN MODULES (3 found)',
        '-'.repeat(50),
        '  app (entry point / orchestrator)',
        '  broken (standalone / potential dead code)',
        '  main (entry point / orchestrator)',
      ]);
    });

    it('should say when every module is imported', async () => {
      const cycleDir = path.join(tempDir, 'ring');
      await writeProject(cycleDir, { 'a.py': 'import b\n', 'b.py': 'import a\n' });

      const { stdout } = await run('orphans', cycleDir);

      expect(stdout[stdout.length - 1]).toBe('[OK] All modules are imported by at least one other module.');
    });
  });

  describe('report', () => {
    it('should save the text report to a file', async () => {
      const output = path.join(tempDir, 'report.txt');

      const { stdout, exitCode } = await run('report', tempDir, '-o', output);
      const saved = await fs.readFile(output, 'utf-8');

      expect(exitCode).toBe(0);
      expect(stdout).toEqual([`[OK] Report saved to: ${output}`]);
      expect(saved.split('\n').slice(0, 3)).toEqual(['='.repeat(70), 'MODGRAPH - DEPENDENCY ANALYSIS REPORT', '='.repeat(70)]);
    });

    it('should print Markdown', async () => {
      const { stdout } = await run('report', tempDir, '--markdown');

      expect(stdout).toHaveLength(1);
      expect(stdout[0]?.split('\n')[0]).toBe('# modgraph - Dependency Analysis Report');
    });

    it('should fail when the report cannot be written', async () => {
      const output = path.join(tempDir, 'no-such-dir', 'report.txt');

      const { stderr, exitCode } = await run('report', tempDir, '--output', output);

      expect(exitCode).toBe(1);
      expect(stderr[0]).toMatch(/^\[X\] Error saving report: ENOENT/);
    });
  });

  describe('graph', () => {
    it('should save the DOT graph and explain how to render it', async () => {
      const output = path.join(tempDir, 'deps.dot');

      const { stdout } = await run('graph', tempDir, '-o', output);
      const dot = await fs.readFile(output, 'utf-8');

      expect(stdout).toEqual([
        `[OK] DOT graph saved to: ${output}`,
        `     Render with: dot -Tpng ${output} -o deps.png`,
      ]);
      expect(dot.split('\n')).toContain('    app_core -> app_utils [color="red", penwidth=2.0];');
    });

    it('should leave cycle edges plain with --no-highlight', async () => {
      const { stdout } = await run('graph', tempDir, '--no-highlight');
      const lines = stdout[0]?.split('\n') ?? [];

      expect(lines).toContain('    app_core -> app_utils;');
      expect(lines).toContain('    app_utils -> app_core;');
    });
  });

  it('should accept global options', async () => {
    const { stdout, exitCode } = await run('--no-color', 'orphans', tempDir);

    expect(exitCode).toBe(0);
    expect(stdout[3]).toBe('');
  });
});
