/**
 * Fixed-width coupling table shared by the metrics command and the text report
 */

import { STABLE_THRESHOLD, UNSTABLE_THRESHOLD, type CouplingMetric } from 'modgraph-core';

export const METRICS_RULE = '-'.repeat(70);

export function formatMetricsHeader(): string {
  return `${'Module'.padEnd(40)} ${'Fan-In'.padStart(7)} ${'Fan-Out'.padStart(8)} ${'Instab.'.padStart(8)}`;
}

export function formatMetricRow(metric: CouplingMetric): string {
  return (
    `${metric.module.padEnd(40)} ${String(metric.fanIn).padStart(7)} ` +
    `${String(metric.fanOut).padStart(8)} ${metric.instability.toFixed(3).padStart(8)}`
  );
}

/**
 * ` [!]` for unstable modules, ` [stable]` for depended-upon stable ones
 */
export function metricMarker(metric: CouplingMetric): string {
  if (metric.instability >= UNSTABLE_THRESHOLD) return ' [!]';
  if (metric.instability <= STABLE_THRESHOLD && metric.fanIn > 0) return ' [stable]';
  return '';
}
