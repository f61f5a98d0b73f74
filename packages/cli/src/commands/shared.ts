/**
 * Shared command plumbing: common options, project loading, output colouring
 * and error reporting.
 */

import * as fs from 'node:fs/promises';
import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_FILE,
  createLogger,
  isModgraphError,
  loadProjectConfig,
  mergeConfig,
  scan,
  type Logger,
  type LogLevel,
  type ProjectConfig,
  type ProjectConfigOverrides,
  type ScanResult,
} from 'modgraph-core';
import { formatScanSummary } from '../reporters/index.js';

// ============================================================================
// Option Types
// ============================================================================

/**
 * Options declared on the program itself
 */
export interface GlobalOptions {
  verbose?: boolean | undefined;
  /** false under --no-color */
  color?: boolean | undefined;
}

/**
 * Options every project command accepts
 */
export interface ProjectOptions extends GlobalOptions {
  exclude?: string[] | undefined;
  config?: string | undefined;
}

// ============================================================================
// Option Parsing
// ============================================================================

/**
 * Comma-separated list; empty entries are dropped
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/**
 * Argument parser for integer options with a lower bound
 */
export function integerAtLeast(min: number): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

/**
 * Add the `<path>` argument and the options shared by all project commands
 */
export function withProjectOptions(cmd: Command): Command {
  return cmd
    .argument('<path>', 'Python project directory or single .py file')
    .option('--exclude <names>', 'Comma-separated names or globs to skip (replaces the defaults)', parseList)
    .option('--config <file>', `Configuration file (default: ${CONFIG_FILE} in the project)`);
}

// ============================================================================
// Logging
// ============================================================================

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  error: text => chalk.red(text),
  warn: text => chalk.yellow(text),
  info: text => chalk.cyan(text),
  debug: text => chalk.gray(text),
};

/**
 * Logger writing coloured records to stderr; debug records only with --verbose
 */
export function createCliLogger(verbose: boolean): Logger {
  return createLogger({
    minLevel: verbose ? 'debug' : 'warn',
    timestamps: verbose,
    sink: (level, line) => {
      process.stderr.write(`${LEVEL_COLORS[level](line)}\n`);
    },
  });
}

// ============================================================================
// Project Loading
// ============================================================================

export interface LoadedProject {
  result: ScanResult;
  config: ProjectConfig;
  logger: Logger;
}

/**
 * Resolve configuration (flags, then file, then defaults) and scan the project
 */
export async function loadProject(
  target: string,
  options: ProjectOptions,
  overrides: ProjectConfigOverrides = {}
): Promise<LoadedProject> {
  const logger = createCliLogger(options.verbose === true);
  const loaded = await loadProjectConfig(target, options.config);
  if (loaded.source !== null) {
    logger.debug(`Using configuration from ${loaded.source}`);
  }

  const config = mergeConfig(loaded.config, { ...overrides, exclude: options.exclude });
  const result = await scan(target, {
    exclude: config.exclude,
    concurrency: config.concurrency,
    standardLibrary: config.standardLibrary,
    logger,
  });

  return { result, config, logger };
}

// ============================================================================
// Output
// ============================================================================

/**
 * Colour a status line by its `[OK]` / `[!]` / `[X]` marker
 */
export function statusColor(line: string): string {
  const marker = line.trimStart();
  if (marker.startsWith('[OK]')) return chalk.green(line);
  if (marker.startsWith('[!]')) return chalk.yellow(line);
  if (marker.startsWith('[X]')) return chalk.red(line);
  return line;
}

export function printScanSummary(result: ScanResult): void {
  for (const line of formatScanSummary(result)) {
    console.log(statusColor(line));
  }
}

export function printHeading(title: string, width: number): void {
  console.log(chalk.bold(title));
  console.log(chalk.gray('-'.repeat(width)));
}

/**
 * Write command output to a file; on failure print the reason and fail the run
 */
export async function saveOutput(file: string, content: string, what: string): Promise<boolean> {
  try {
    await fs.writeFile(file, content, 'utf-8');
    return true;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`[X] Error saving ${what}: ${reason}`));
    process.exitCode = 1;
    return false;
  }
}

/**
 * Print an error with its recovery hint and mark the run failed
 */
export function reportCommandError(error: unknown): void {
  if (isModgraphError(error)) {
    console.error(chalk.red(`[X] Error: ${error.message}`));
    if (error.recovery) {
      const command = error.recovery.command ? ` (${error.recovery.command})` : '';
      console.error(chalk.gray(`    ${error.recovery.suggestion}${command}`));
    }
  } else if (error instanceof Error) {
    console.error(chalk.red(`[X] Error: ${error.message}`));
    if (process.env['DEBUG']) {
      console.error(error.stack);
    }
  } else {
    console.error(chalk.red('[X] An unexpected error occurred'));
  }
  process.exitCode = 1;
}

/**
 * Wrap a command action so failures are reported instead of thrown
 */
export function runAction<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      reportCommandError(error);
    }
  };
}
