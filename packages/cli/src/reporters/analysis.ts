/**
 * Project Analysis
 *
 * Runs every analysis the reports need over one scan result, so text, JSON
 * and Markdown output all describe the same cycles, metrics and orphans.
 */

import {
  computeMetrics,
  detectCycles,
  findOrphans,
  formatTree,
  renderTree,
  type CouplingMetric,
  type Cycle,
  type ModuleId,
  type OrphanModule,
  type ProjectConfig,
  type ScanResult,
} from 'modgraph-core';

export type AnalysisSettings = Pick<ProjectConfig, 'maxCycleLength' | 'maxDepth'>;

export interface ProjectAnalysis {
  result: ScanResult;
  cycles: Cycle[];
  /** True when the cycle search stopped at its cap */
  cyclesTruncated: boolean;
  /** Sorted by instability, most unstable first */
  metrics: CouplingMetric[];
  orphans: OrphanModule[];
  /** Rendered dependency tree from every root */
  tree: string[];
}

export function analyzeProject(result: ScanResult, settings: AnalysisSettings): ProjectAnalysis {
  const { graph } = result;
  const search = detectCycles(graph, { maxCycleLength: settings.maxCycleLength });
  return {
    result,
    cycles: search.cycles,
    cyclesTruncated: search.truncated,
    metrics: computeMetrics(graph, 'instability'),
    orphans: findOrphans(graph),
    tree: formatTree(renderTree(graph, { maxDepth: settings.maxDepth })),
  };
}

export const TRUNCATED_NOTE = '[!] Cycle search stopped at its cap; more chains may exist';

/**
 * A cycle with its closing module repeated, as users read it
 */
export function closeCycle(cycle: Cycle): ModuleId[] {
  return [...cycle, ...cycle.slice(0, 1)];
}

export function formatCycle(cycle: Cycle): string {
  return closeCycle(cycle).join(' -> ');
}

export function formatSeconds(elapsedMs: number): string {
  return `${(elapsedMs / 1000).toFixed(3)}s`;
}

export function scanTimeSeconds(elapsedMs: number): number {
  return Math.round(elapsedMs) / 1000;
}
