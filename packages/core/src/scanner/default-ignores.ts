/**
 * Default Ignore Patterns
 *
 * Directory names skipped by every scan unless the caller supplies its own
 * exclusion list: caches, virtual environments, VCS metadata and build
 * output that never hold first-party modules.
 *
 * Used by:
 * - the file walker
 * - the project config defaults
 *
 * @module scanner/default-ignores
 */

import { minimatch } from 'minimatch';

/**
 * Directory names to always skip (simple name matching)
 */
export const DEFAULT_IGNORE_DIRECTORIES: readonly string[] = [
  // === Python caches ===
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',

  // === Virtual environments ===
  '.venv',
  'venv',
  'env',
  '.tox',
  '.eggs',

  // === VCS / dependencies ===
  '.git',
  'node_modules',

  // === Build outputs ===
  'build',
  'dist',
] as const;

/**
 * Does an exclusion entry match a path relative to the scan root?
 *
 * Entries without a slash match any path segment by name (`tests`,
 * `test_*.py`); entries with a slash are globs against the whole
 * relative path (`pkg/legacy/**`).
 */
export function matchesIgnorePattern(relativePath: string, pattern: string): boolean {
  if (!pattern.includes('/')) {
    const name = relativePath.slice(relativePath.lastIndexOf('/') + 1);
    return name === pattern || minimatch(name, pattern, { dot: true });
  }
  return minimatch(relativePath, pattern, { dot: true });
}

export function isIgnored(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesIgnorePattern(relativePath, pattern));
}
