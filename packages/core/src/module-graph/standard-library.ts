/**
 * Standard Library Table
 *
 * Top-level standard-library module names used to classify absolute imports.
 * The table is data (`data/python-stdlib.json`) and can be replaced or
 * extended through configuration.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const StandardLibraryFileSchema = z.object({
  language: z.string(),
  modules: z.array(z.string().min(1)),
});

const DATA_FILE = new URL('../../data/python-stdlib.json', import.meta.url);

let defaultNames: readonly string[] | null = null;

/**
 * Names shipped with the package, loaded once
 */
export function getDefaultStandardLibrary(): readonly string[] {
  if (!defaultNames) {
    const parsed = StandardLibraryFileSchema.parse(JSON.parse(readFileSync(DATA_FILE, 'utf-8')));
    defaultNames = Object.freeze(parsed.modules);
  }
  return defaultNames;
}

export interface StandardLibraryOverrides {
  /** Use exactly these names instead of the shipped table */
  replace?: readonly string[] | undefined;
  /** Add these names to the table */
  extend?: readonly string[] | undefined;
}

/**
 * Build the lookup table handed to the resolver
 */
export function createStandardLibraryTable(overrides: StandardLibraryOverrides = {}): ReadonlySet<string> {
  const base = overrides.replace ?? getDefaultStandardLibrary();
  return new Set([...base, ...(overrides.extend ?? [])]);
}
