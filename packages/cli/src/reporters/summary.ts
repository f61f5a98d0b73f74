/**
 * Scan summary printed ahead of every command's own output
 */

import type { ScanResult } from 'modgraph-core';
import { formatSeconds } from './analysis.js';

export function formatScanSummary(result: ScanResult): string[] {
  const { stats } = result;
  const lines = [
    `[OK] Scan complete: ${result.root}`,
    `     Files: ${stats.filesSeen} | Modules: ${result.modules.size} | ` +
      `Dependencies: ${result.graph.edges.length} | Time: ${formatSeconds(stats.elapsedMs)}`,
  ];

  if (stats.parseErrors > 0) {
    lines.push(`     [!] ${stats.parseErrors} file(s) had parse errors`);
  }

  return lines;
}
