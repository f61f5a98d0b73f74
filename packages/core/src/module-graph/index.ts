/**
 * Module Graph
 *
 * Dependency graph construction and the analyses that read it.
 */

export type {
  ModuleId,
  ImportKind,
  RawImport,
  Module,
  ImportClassification,
  ImportResolution,
  ResolvedImport,
  ResolvedEdge,
  DependencyGraph,
  Cycle,
  CouplingMetric,
  MetricSortKey,
  OrphanRole,
  OrphanModule,
  TreeNode,
  DependencyTree,
  ScanStats,
  ScanResult,
  CycleDetectionOptions,
  CycleSearch,
  TreeOptions,
} from './types.js';

export { ModuleRegistry, compareIds } from './module-registry.js';
export {
  createStandardLibraryTable,
  getDefaultStandardLibrary,
  type StandardLibraryOverrides,
} from './standard-library.js';
export { resolveImport, importReference, packagePartsOf, type ResolveContext } from './import-resolver.js';
export { classifyImports, type ClassifiedImports } from './import-classifier.js';
export { buildGraph, importsOf, importersOf } from './graph-builder.js';
export {
  findCycles,
  detectCycles,
  normalizeCycle,
  compareCycles,
  cycleEdges,
  DEFAULT_MAX_CYCLE_LENGTH,
  DEFAULT_MAX_CYCLES,
} from './cycle-detector.js';
export {
  computeMetrics,
  calculateInstability,
  parseSortKey,
  METRIC_SORT_KEYS,
  UNSTABLE_THRESHOLD,
  STABLE_THRESHOLD,
} from './coupling-analyzer.js';
export { findOrphans } from './orphans.js';
export { renderTree, formatTree, treeRoots, DEFAULT_TREE_DEPTH } from './dependency-tree.js';
