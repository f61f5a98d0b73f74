/**
 * Coupling Analyzer
 *
 * Per-module fan-in, fan-out and instability over a dependency graph.
 */

import { Errors } from '../errors/index.js';
import { compareIds } from './module-registry.js';
import type { CouplingMetric, DependencyGraph, MetricSortKey } from './types.js';

export const METRIC_SORT_KEYS: readonly MetricSortKey[] = ['name', 'fan_in', 'fan_out', 'instability'];

/**
 * Thresholds used by reporters to flag modules
 */
export const UNSTABLE_THRESHOLD = 0.8;
export const STABLE_THRESHOLD = 0.2;

/**
 * Normalize a user-supplied sort key (`fan-in` and `fan_in` are equivalent)
 */
export function parseSortKey(value: string): MetricSortKey {
  const normalized = value.trim().toLowerCase().replace(/-/g, '_');
  const key = METRIC_SORT_KEYS.find(candidate => candidate === normalized);
  if (!key) {
    throw Errors.invalidArgument(
      'sort key',
      `'${value}'`,
      `Use one of: ${METRIC_SORT_KEYS.join(', ')}`
    );
  }
  return key;
}

/**
 * Compute coupling metrics for every module.
 *
 * A self-import counts once as fan-in and once as fan-out.
 * Returns a fresh array; the graph is not modified.
 */
export function computeMetrics(graph: DependencyGraph, sortKey: MetricSortKey = 'instability'): CouplingMetric[] {
  if (!METRIC_SORT_KEYS.includes(sortKey)) {
    throw Errors.invalidArgument('sort key', `'${String(sortKey)}'`, `Use one of: ${METRIC_SORT_KEYS.join(', ')}`);
  }

  const metrics = graph.nodes.map(module => {
    const fanIn = graph.predecessors.get(module)?.length ?? 0;
    const fanOut = graph.successors.get(module)?.length ?? 0;
    return { module, fanIn, fanOut, instability: calculateInstability(fanIn, fanOut) };
  });

  return metrics.sort(comparatorFor(sortKey));
}

/**
 * fanOut / (fanIn + fanOut), 0 for isolated modules, rounded to 3 decimals
 */
export function calculateInstability(fanIn: number, fanOut: number): number {
  const total = fanIn + fanOut;
  if (total === 0) return 0;
  return Math.round((fanOut / total) * 1000) / 1000;
}

function comparatorFor(sortKey: MetricSortKey): (a: CouplingMetric, b: CouplingMetric) => number {
  switch (sortKey) {
    case 'name':
      return (a, b) => compareIds(a.module, b.module);
    case 'fan_in':
      return (a, b) => b.fanIn - a.fanIn || compareIds(a.module, b.module);
    case 'fan_out':
      return (a, b) => b.fanOut - a.fanOut || compareIds(a.module, b.module);
    case 'instability':
      return (a, b) => b.instability - a.instability || compareIds(a.module, b.module);
  }
}
