/**
 * Extractors Index
 */

export type { ImportExtractor } from './types.js';
export { PythonImportExtractor } from './python-import-extractor.js';

import { PythonImportExtractor } from './python-import-extractor.js';
import type { ImportExtractor } from './types.js';

const EXTRACTORS: readonly ImportExtractor[] = [new PythonImportExtractor()];

/**
 * Get the extractor that handles a file, or null when none does
 */
export function getExtractorForFile(filePath: string): ImportExtractor | null {
  return EXTRACTORS.find(extractor => extractor.canHandle(filePath)) ?? null;
}

/**
 * File extensions some extractor handles
 */
export function getSupportedExtensions(): string[] {
  return EXTRACTORS.flatMap(extractor => [...extractor.extensions]);
}
