/**
 * Orphans Command - modgraph orphans <path>
 */

import { Command } from 'commander';
import { findOrphans } from 'modgraph-core';
import { orphanLabel } from '../reporters/index.js';
import {
  loadProject,
  printHeading,
  printScanSummary,
  runAction,
  statusColor,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

async function orphansAction(target: string, options: ProjectOptions): Promise<void> {
  const { result } = await loadProject(target, options);

  printScanSummary(result);
  console.log();

  const orphans = findOrphans(result.graph);
  if (orphans.length === 0) {
    console.log(statusColor('[OK] All modules are imported by at least one other module.'));
    return;
  }

  printHeading(`ORPHAN MODULES (${orphans.length} found)`, 50);
  for (const orphan of orphans) {
    console.log(`  ${orphan.moduleId} (${orphanLabel(orphan)})`);
  }
}

export function createOrphansCommand(): Command {
  return withProjectOptions(new Command('orphans'))
    .description('Find modules that no other module imports')
    .action(
      runAction(async (target: string, _options: ProjectOptions, command: Command) =>
        orphansAction(target, command.optsWithGlobals<ProjectOptions>())
      )
    );
}
