/**
 * Orphan Modules
 *
 * Modules that no other module imports. An orphan that imports something is
 * likely an entry point; one that imports nothing is standalone and a
 * candidate for dead code.
 */

import type { DependencyGraph, OrphanModule } from './types.js';

export function findOrphans(graph: DependencyGraph): OrphanModule[] {
  const orphans: OrphanModule[] = [];

  for (const moduleId of graph.nodes) {
    if ((graph.predecessors.get(moduleId)?.length ?? 0) > 0) continue;

    const fanOut = graph.successors.get(moduleId)?.length ?? 0;
    orphans.push({
      moduleId,
      role: fanOut > 0 ? 'entry-point' : 'standalone',
      fanOut,
    });
  }

  return orphans;
}
