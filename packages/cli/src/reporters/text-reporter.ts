/**
 * Plain-text analysis report
 */

import type { OrphanModule } from 'modgraph-core';
import { TRUNCATED_NOTE, formatCycle, formatSeconds, type ProjectAnalysis } from './analysis.js';
import { METRICS_RULE, formatMetricRow, formatMetricsHeader } from './metrics-table.js';

const SEPARATOR = '='.repeat(70);
const RULE = '-'.repeat(70);

export function orphanLabel(orphan: OrphanModule): string {
  return orphan.role === 'entry-point' ? 'entry point / orchestrator' : 'standalone / potential dead code';
}

export function formatTextReport(analysis: ProjectAnalysis, version: string): string {
  const { result, cycles, cyclesTruncated, metrics, orphans, tree } = analysis;
  const lines: string[] = [];

  const section = (title: string): void => {
    lines.push(SEPARATOR);
    lines.push(title);
    lines.push(RULE);
  };

  lines.push(SEPARATOR);
  lines.push('MODGRAPH - DEPENDENCY ANALYSIS REPORT');
  lines.push(SEPARATOR);
  lines.push(`Project: ${result.root}`);
  lines.push(`Scanned: ${result.stats.filesSeen} Python files`);
  lines.push(`Parse errors: ${result.stats.parseErrors}`);
  lines.push(`Scan time: ${formatSeconds(result.stats.elapsedMs)}`);
  lines.push(`Modules: ${result.modules.size}`);
  lines.push(`Dependencies: ${result.graph.edges.length}`);
  lines.push('');

  section('DEPENDENCY TREE');
  lines.push(...(tree.length > 0 ? tree : ['(no local dependencies found)']));
  lines.push('');

  section('CIRCULAR IMPORTS');
  if (cycles.length > 0) {
    lines.push(`[!] Found ${cycles.length} circular import chain(s):`);
    lines.push('');
    cycles.forEach((cycle, i) => lines.push(`  Cycle ${i + 1}: ${formatCycle(cycle)}`));
    if (cyclesTruncated) {
      lines.push('');
      lines.push(TRUNCATED_NOTE);
    }
  } else {
    lines.push('[OK] No circular imports detected!');
  }
  lines.push('');

  section('COUPLING METRICS');
  if (metrics.length > 0) {
    lines.push(formatMetricsHeader());
    lines.push(METRICS_RULE);
    lines.push(...metrics.map(formatMetricRow));
  } else {
    lines.push('(no modules to analyze)');
  }
  lines.push('');

  section('ORPHAN MODULES (no inbound imports)');
  if (orphans.length > 0) {
    lines.push(...orphans.map(orphan => `  ${orphan.moduleId} (${orphanLabel(orphan)})`));
  } else {
    lines.push('(all modules are imported by at least one other)');
  }
  lines.push('');

  if (result.stats.parseErrors > 0) {
    section('PARSE ERRORS');
    for (const module of result.modules.values()) {
      if (module.parseError !== null) {
        lines.push(`  ${module.id}: ${module.parseError}`);
      }
    }
    lines.push('');
  }

  lines.push(SEPARATOR);
  lines.push(`Report generated by modgraph v${version}`);
  lines.push(SEPARATOR);

  return lines.join('\n');
}
