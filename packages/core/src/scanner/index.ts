/**
 * Scanner Index
 */

export { scan, countLines, DEFAULT_SCAN_CONCURRENCY, type ScanOptions } from './scanner.js';
export { walkSourceFiles, type SourceFile, type WalkOptions } from './file-walker.js';
export { pathToModuleId, singleFileModuleId, type ModulePath } from './module-path.js';
export { DEFAULT_IGNORE_DIRECTORIES, matchesIgnorePattern, isIgnored } from './default-ignores.js';
