/**
 * Extractor Types
 */

import type { ModuleId, RawImport } from '../module-graph/types.js';

/**
 * Language front end turning module source into raw import declarations
 */
export interface ImportExtractor {
  /** Language this extractor handles */
  readonly language: string;

  /** File extensions this extractor handles */
  readonly extensions: readonly string[];

  canHandle(filePath: string): boolean;

  /**
   * Extract the import declarations of one module.
   *
   * The source is validated eagerly: a `PARSE_FAILURE` error is thrown by
   * this call, never while iterating. Records come out lazily in source
   * order, duplicates included.
   */
  extract(source: string, origin: ModuleId): Iterable<RawImport>;
}
