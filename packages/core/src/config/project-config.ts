/**
 * Project Config - Optional per-project settings
 *
 * Read from `.modgraph.json` in the scan root, or from an explicit file.
 * Precedence: command-line overrides, then the file, then DEFAULT_CONFIG.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { Errors } from '../errors/index.js';
import { DEFAULT_MAX_CYCLE_LENGTH } from '../module-graph/cycle-detector.js';
import { DEFAULT_TREE_DEPTH } from '../module-graph/dependency-tree.js';
import { DEFAULT_IGNORE_DIRECTORIES } from '../scanner/default-ignores.js';
import { DEFAULT_SCAN_CONCURRENCY } from '../scanner/scanner.js';

// ============================================================================
// Schema
// ============================================================================

const nameList = z.array(z.string().min(1));

export const ProjectConfigFileSchema = z
  .object({
    /** Names or globs to skip; replaces the default exclusions */
    exclude: nameList.optional(),
    maxCycleLength: z.number().int().positive().optional(),
    maxDepth: z.number().int().nonnegative().optional(),
    concurrency: z.number().int().positive().optional(),
    standardLibrary: z
      .object({
        replace: nameList.optional(),
        extend: nameList.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ProjectConfigFile = z.infer<typeof ProjectConfigFileSchema>;

// ============================================================================
// Types
// ============================================================================

export interface StandardLibraryConfig {
  replace?: string[] | undefined;
  extend: string[];
}

/**
 * Fully resolved configuration
 */
export interface ProjectConfig {
  exclude: string[];
  maxCycleLength: number;
  maxDepth: number;
  concurrency: number;
  standardLibrary: StandardLibraryConfig;
}

export interface LoadedConfig {
  config: ProjectConfig;
  /** File the settings came from, or null when defaults apply */
  source: string | null;
}

/**
 * Values a caller may override; undefined leaves the current value
 */
export type ProjectConfigOverrides = {
  [K in keyof Omit<ProjectConfig, 'standardLibrary'>]?: ProjectConfig[K] | undefined;
};

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE = '.modgraph.json';

export const DEFAULT_CONFIG: Readonly<ProjectConfig> = Object.freeze({
  exclude: [...DEFAULT_IGNORE_DIRECTORIES],
  maxCycleLength: DEFAULT_MAX_CYCLE_LENGTH,
  maxDepth: DEFAULT_TREE_DEPTH,
  concurrency: DEFAULT_SCAN_CONCURRENCY,
  standardLibrary: { extend: [] },
});

export function createDefaultConfig(): ProjectConfig {
  return {
    ...DEFAULT_CONFIG,
    exclude: [...DEFAULT_CONFIG.exclude],
    standardLibrary: { extend: [] },
  };
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load configuration for a scan root.
 *
 * With `configFile`, that file must exist. Otherwise `.modgraph.json` is looked
 * up in the root (or, for a single-file scan, the file's directory) and
 * defaults apply when it is absent.
 */
export async function loadProjectConfig(scanRoot: string, configFile?: string): Promise<LoadedConfig> {
  const explicit = configFile !== undefined;
  const candidate = explicit ? path.resolve(configFile) : await defaultConfigPath(scanRoot);

  let content: string;
  try {
    content = await fs.readFile(candidate, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      if (explicit) {
        throw Errors.pathNotFound(configFile);
      }
      return { config: createDefaultConfig(), source: null };
    }
    throw error;
  }

  return { config: parseProjectConfig(content, candidate), source: candidate };
}

/**
 * Validate config file content and apply it over the defaults
 */
export function parseProjectConfig(content: string, source: string): ProjectConfig {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw Errors.configInvalid(source, [error instanceof Error ? error.message : String(error)]);
  }

  const parsed = ProjectConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw Errors.configInvalid(
      source,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const file = parsed.data;
  const defaults = createDefaultConfig();
  return {
    ...mergeConfig(defaults, file),
    standardLibrary: {
      replace: file.standardLibrary?.replace,
      extend: file.standardLibrary?.extend ?? [],
    },
  };
}

/**
 * Apply overrides; undefined values keep the base value
 */
export function mergeConfig(base: ProjectConfig, overrides: ProjectConfigOverrides): ProjectConfig {
  return {
    exclude: overrides.exclude ?? base.exclude,
    maxCycleLength: overrides.maxCycleLength ?? base.maxCycleLength,
    maxDepth: overrides.maxDepth ?? base.maxDepth,
    concurrency: overrides.concurrency ?? base.concurrency,
    standardLibrary: base.standardLibrary,
  };
}

async function defaultConfigPath(scanRoot: string): Promise<string> {
  const resolved = path.resolve(scanRoot);
  try {
    const stats = await fs.stat(resolved);
    return path.join(stats.isFile() ? path.dirname(resolved) : resolved, CONFIG_FILE);
  } catch (error) {
    if (isNotFound(error)) {
      throw Errors.pathNotFound(scanRoot);
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
