/**
 * Markdown analysis report
 */

import type { OrphanModule } from 'modgraph-core';
import { TRUNCATED_NOTE, formatCycle, formatSeconds, type ProjectAnalysis } from './analysis.js';

function orphanLabel(orphan: OrphanModule): string {
  return orphan.role === 'entry-point' ? 'entry point' : 'standalone / dead code';
}

export function formatMarkdownReport(analysis: ProjectAnalysis, version: string): string {
  const { result, cycles, cyclesTruncated, metrics, orphans, tree } = analysis;
  const { stats } = result;
  const dependencies = result.graph.edges.length;
  const lines: string[] = [];

  lines.push('# modgraph - Dependency Analysis Report');
  lines.push('');
  lines.push(`**Project:** \`${result.root}\`  `);
  lines.push(`**Files Scanned:** ${stats.filesSeen}  `);
  lines.push(`**Modules Found:** ${result.modules.size}  `);
  lines.push(`**Dependencies:** ${dependencies}  `);
  lines.push(`**Parse Errors:** ${stats.parseErrors}  `);
  lines.push(`**Scan Time:** ${formatSeconds(stats.elapsedMs)}  `);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Python Files | ${stats.filesSeen} |`);
  lines.push(`| Local Modules | ${result.modules.size} |`);
  lines.push(`| Dependencies | ${dependencies} |`);
  lines.push(`| Circular Imports | ${cycles.length} ${cycles.length > 0 ? '[!] FOUND' : '[OK]'} |`);
  lines.push(`| Orphan Modules | ${orphans.length} |`);
  lines.push(`| Parse Errors | ${stats.parseErrors} |`);
  lines.push('');

  lines.push('## Dependency Tree');
  lines.push('');
  lines.push('```');
  lines.push(...(tree.length > 0 ? tree : ['(no local dependencies)']));
  lines.push('```');
  lines.push('');

  lines.push('## Circular Imports');
  lines.push('');
  if (cycles.length > 0) {
    lines.push(`**[!] ${cycles.length} circular import chain(s) detected:**`);
    lines.push('');
    cycles.forEach((cycle, i) => lines.push(`${i + 1}. \`${formatCycle(cycle)}\``));
    if (cyclesTruncated) {
      lines.push('');
      lines.push(`*${TRUNCATED_NOTE}*`);
    }
  } else {
    lines.push('**[OK] No circular imports detected!**');
  }
  lines.push('');

  lines.push('## Coupling Metrics');
  lines.push('');
  if (metrics.length > 0) {
    lines.push('| Module | Fan-In | Fan-Out | Instability |');
    lines.push('|--------|--------|---------|-------------|');
    for (const m of metrics) {
      lines.push(`| ${m.module} | ${m.fanIn} | ${m.fanOut} | ${m.instability.toFixed(3)} |`);
    }
  } else {
    lines.push('(no modules to analyze)');
  }
  lines.push('');

  lines.push('## Orphan Modules');
  lines.push('');
  if (orphans.length > 0) {
    lines.push('These modules are not imported by any other local module:');
    lines.push('');
    lines.push(...orphans.map(orphan => `- \`${orphan.moduleId}\` (${orphanLabel(orphan)})`));
  } else {
    lines.push('All modules are imported by at least one other.');
  }
  lines.push('');

  if (stats.parseErrors > 0) {
    lines.push('## Parse Errors');
    lines.push('');
    for (const module of result.modules.values()) {
      if (module.parseError !== null) {
        lines.push(`- \`${module.id}\`: ${module.parseError}`);
      }
    }
    lines.push('');
  }

  lines.push('---');
  lines.push(`*Generated by modgraph v${version}*`);

  return lines.join('\n');
}
