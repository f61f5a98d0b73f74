/**
 * Module Graph Types
 *
 * Types for module discovery, import resolution, the dependency graph,
 * cycle detection and coupling metrics.
 * Coupling follows Robert C. Martin's afferent/efferent instability index.
 */

// ============================================================================
// Discovery Types
// ============================================================================

/**
 * Canonical dotted module id relative to the scan root (e.g. `pkg.sub.utils`)
 */
export type ModuleId = string;

/**
 * How an import statement names its target
 *
 * `relative` and `star` carry the number of leading dots; a star import
 * written without dots has depth 0 and resolves like an absolute import.
 */
export type ImportKind =
  | { type: 'absolute' }
  | { type: 'relative'; depth: number }
  | { type: 'star'; depth: number };

/**
 * One import declaration as written in a module's source
 */
export interface RawImport {
  /** Module part as written, without leading dots (may be empty: `from . import x`) */
  target: string;
  /** Imported name for `from X import name`; absent for `import X` and star imports */
  member?: string | undefined;
  kind: ImportKind;
  /** Module the declaration appears in */
  origin: ModuleId;
  /** 1-based source line */
  line: number;
}

/**
 * A discovered local module
 */
export interface Module {
  id: ModuleId;
  /** Absolute file path */
  filePath: string;
  /** Path relative to the scan root, `/`-separated */
  relativePath: string;
  /** Is this a package marker (`__init__.py`)? */
  isPackage: boolean;
  /** Set when the source could not be read or parsed */
  parseError: string | null;
  lineCount: number;
  /** Raw import declarations extracted (0 on parse failure) */
  importCount: number;
}

// ============================================================================
// Resolution Types
// ============================================================================

export type ImportClassification = 'local' | 'standard-library' | 'third-party' | 'unresolvable';

/**
 * Result of resolving one raw import
 */
export type ImportResolution =
  | { kind: 'local'; moduleId: ModuleId }
  | { kind: 'standard-library'; name: string }
  | { kind: 'third-party'; name: string }
  | { kind: 'unresolvable'; reason: string };

/**
 * A raw import together with its resolution
 */
export interface ResolvedImport {
  raw: RawImport;
  resolution: ImportResolution;
}

/**
 * Directed edge between two local modules
 */
export interface ResolvedEdge {
  from: ModuleId;
  to: ModuleId;
}

// ============================================================================
// Graph Types
// ============================================================================

/**
 * Immutable dependency graph produced by exactly one scan
 */
export interface DependencyGraph {
  /** All module ids, ascending */
  readonly nodes: readonly ModuleId[];
  /** Distinct edges, ordered by source then target */
  readonly edges: readonly ResolvedEdge[];
  /** Targets of each module, ascending */
  readonly successors: ReadonlyMap<ModuleId, readonly ModuleId[]>;
  /** Sources importing each module, ascending */
  readonly predecessors: ReadonlyMap<ModuleId, readonly ModuleId[]>;
}

/**
 * Elementary cycle, rotated to start at its smallest id.
 * The closing edge back to the first element is implied.
 */
export type Cycle = readonly ModuleId[];

/**
 * Coupling metrics for a module
 */
export interface CouplingMetric {
  module: ModuleId;
  /** Afferent coupling: modules importing this one */
  fanIn: number;
  /** Efferent coupling: modules this one imports */
  fanOut: number;
  /** fanOut / (fanIn + fanOut). 0 = stable, 1 = unstable */
  instability: number;
}

export type MetricSortKey = 'name' | 'fan_in' | 'fan_out' | 'instability';

export type OrphanRole = 'entry-point' | 'standalone';

/**
 * A module nothing imports
 */
export interface OrphanModule {
  moduleId: ModuleId;
  /** `entry-point` when it imports something, `standalone` otherwise */
  role: OrphanRole;
  fanOut: number;
}

/**
 * A node of a rendered dependency tree
 */
export interface TreeNode {
  moduleId: ModuleId;
  depth: number;
  children: TreeNode[];
  /** Already on the current path; this branch closes a cycle and is not expanded */
  cycle: boolean;
  /** Has successors that were not expanded because of the depth bound */
  truncated: boolean;
}

export interface DependencyTree {
  roots: TreeNode[];
  maxDepth: number;
}

// ============================================================================
// Scan Types
// ============================================================================

export interface ScanStats {
  filesSeen: number;
  parseErrors: number;
  elapsedMs: number;
}

/**
 * Complete, immutable result of one scan
 */
export interface ScanResult {
  /** Absolute scan root (directory or single file) */
  root: string;
  graph: DependencyGraph;
  modules: ReadonlyMap<ModuleId, Module>;
  /** Every extracted import with its resolution, grouped by importing module */
  imports: ReadonlyMap<ModuleId, readonly ResolvedImport[]>;
  stats: ScanStats;
}

// ============================================================================
// Options Types
// ============================================================================

export interface CycleDetectionOptions {
  /** Longest cycle reported; longer candidate paths are abandoned */
  maxCycleLength?: number;
  /** Stop after this many cycles */
  maxCycles?: number;
}

export interface CycleSearch {
  cycles: Cycle[];
  /** True when the search stopped at `maxCycles` */
  truncated: boolean;
}

export interface TreeOptions {
  /** Start from this module instead of all roots */
  startModule?: ModuleId | undefined;
  /** Maximum depth to expand */
  maxDepth?: number;
}
