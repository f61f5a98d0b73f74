/**
 * Scanner
 *
 * Walks a project (or reads a single file), extracts and resolves imports
 * and assembles one immutable ScanResult. Holds no state between scans.
 *
 * Files are read and extracted concurrently in bounded batches; results are
 * merged sorted by module id so output never depends on scheduling.
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';

import { Errors, ModgraphErrorCode, isModgraphError } from '../errors/index.js';
import type { ModgraphError } from '../errors/index.js';
import { getExtractorForFile, getSupportedExtensions } from '../extractors/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { buildGraph } from '../module-graph/graph-builder.js';
import { resolveImport, type ResolveContext } from '../module-graph/import-resolver.js';
import { ModuleRegistry, compareIds } from '../module-graph/module-registry.js';
import { createStandardLibraryTable, type StandardLibraryOverrides } from '../module-graph/standard-library.js';
import type { Module, ModuleId, RawImport, ResolvedEdge, ResolvedImport, ScanResult } from '../module-graph/types.js';
import { walkSourceFiles, type SourceFile } from './file-walker.js';
import { pathToModuleId, singleFileModuleId } from './module-path.js';

export const DEFAULT_SCAN_CONCURRENCY = 8;

export interface ScanOptions {
  /** Names or globs to skip; replaces the default exclusions when given */
  exclude?: readonly string[] | undefined;
  /** Files read and extracted at once */
  concurrency?: number | undefined;
  standardLibrary?: StandardLibraryOverrides | undefined;
  logger?: Logger | undefined;
}

interface ParsedFile {
  module: Module;
  imports: RawImport[];
}

/**
 * Scan a project directory or a single source file
 */
export async function scan(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const logger = options.logger ?? silentLogger;
  const concurrency = options.concurrency ?? DEFAULT_SCAN_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw Errors.invalidArgument('concurrency', `expected a positive integer, got ${concurrency}`);
  }

  const startTime = performance.now();
  const target = path.resolve(root);
  const stats = await statOrThrow(target, root);

  let targets: Array<SourceFile & { id: ModuleId; isPackage: boolean }>;

  if (stats.isFile()) {
    if (!getExtractorForFile(target)) {
      throw Errors.unsupportedFile(root);
    }
    targets = [{ relativePath: path.basename(target), absolutePath: target, ...singleFileModuleId(target) }];
  } else if (stats.isDirectory()) {
    const rootName = path.basename(target);
    const files = await walkSourceFiles(target, {
      exclude: options.exclude,
      extensions: getSupportedExtensions(),
    });
    targets = files.map(file => ({ ...file, ...pathToModuleId(file.relativePath, rootName) }));
  } else {
    throw Errors.unsupportedFile(root);
  }

  logger.debug(`Discovered ${targets.length} source file(s) under ${target}`);

  // Phase 1: read and extract in bounded batches
  const parsed: ParsedFile[] = [];
  for (let i = 0; i < targets.length; i += concurrency) {
    const batch = targets.slice(i, i + concurrency);
    parsed.push(...(await Promise.all(batch.map(file => parseFile(file, file.id, file.isPackage)))));
  }

  parsed.sort(
    (a, b) =>
      compareIds(a.module.id, b.module.id) ||
      Number(b.module.isPackage) - Number(a.module.isPackage) ||
      compareIds(a.module.relativePath, b.module.relativePath)
  );

  // Phase 2: register; the first file for an id wins, and a package beats a
  // same-named plain module
  const registry = new ModuleRegistry(parsed.map(entry => entry.module));
  const registered = parsed.filter(entry => registry.get(entry.module.id)?.filePath === entry.module.filePath);

  for (const entry of registered) {
    if (entry.module.parseError !== null) {
      logger.warn(`${entry.module.relativePath}: ${entry.module.parseError}`);
    }
  }

  // Phase 3: resolve and build the graph
  const rootMarker = registered.find(entry => entry.module.isPackage && entry.module.relativePath === '__init__.py');
  const ctx: ResolveContext = {
    registry,
    standardLibrary: createStandardLibraryTable(options.standardLibrary),
    rootPackage: stats.isDirectory() ? rootMarker?.module.id : undefined,
  };

  const imports = new Map<ModuleId, readonly ResolvedImport[]>();
  const edges: ResolvedEdge[] = [];

  for (const { module, imports: rawImports } of registered) {
    const resolved = rawImports.map(raw => {
      const resolution = resolveImport(raw, module, ctx);
      if (resolution.kind === 'local') {
        edges.push({ from: module.id, to: resolution.moduleId });
      }
      return Object.freeze({ raw: Object.freeze(raw), resolution: Object.freeze(resolution) });
    });
    imports.set(module.id, Object.freeze(resolved));
  }

  const graph = buildGraph(registry.ids(), edges);
  const parseErrors = registered.filter(entry => entry.module.parseError !== null).length;
  const elapsedMs = performance.now() - startTime;

  logger.debug(
    `Scanned ${registry.size} module(s), ${graph.edges.length} dependencies in ${elapsedMs.toFixed(1)}ms`
  );

  return Object.freeze({
    root: target,
    graph,
    modules: registry.toMap(),
    imports,
    stats: Object.freeze({ filesSeen: targets.length, parseErrors, elapsedMs }),
  });
}

async function statOrThrow(target: string, displayPath: string): Promise<Stats> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isMissingPathError(error)) {
      throw Errors.pathNotFound(displayPath);
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function parseFile(file: SourceFile, id: ModuleId, isPackage: boolean): Promise<ParsedFile> {
  const base = {
    id,
    filePath: file.absolutePath,
    relativePath: file.relativePath,
    isPackage,
  };

  const failed = (error: ModgraphError, lineCount: number): ParsedFile => ({
    module: { ...base, parseError: error.message, lineCount, importCount: 0 },
    imports: [],
  });

  let source: string;
  try {
    source = await fs.readFile(file.absolutePath, 'utf-8');
  } catch (error) {
    return failed(Errors.readFailure(file.relativePath, error), 0);
  }

  const lineCount = countLines(source);
  const extractor = getExtractorForFile(file.absolutePath);
  if (!extractor) {
    return failed(Errors.unsupportedFile(file.relativePath), lineCount);
  }

  try {
    const imports = [...extractor.extract(source, id)];
    return {
      module: { ...base, parseError: null, lineCount, importCount: imports.length },
      imports,
    };
  } catch (error) {
    if (isModgraphError(error, ModgraphErrorCode.PARSE_FAILURE)) {
      return failed(error, lineCount);
    }
    throw error;
  }
}

/**
 * Newline count plus one, so an empty file has one line
 */
export function countLines(source: string): number {
  let count = 1;
  for (let i = source.indexOf('\n'); i !== -1; i = source.indexOf('\n', i + 1)) {
    count++;
  }
  return count;
}
