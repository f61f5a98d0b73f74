/**
 * Graph Builder
 *
 * Assembles resolved local edges into one immutable dependency graph.
 * Single pass, rebuilt from scratch on every scan.
 */

import { compareIds } from './module-registry.js';
import type { DependencyGraph, ModuleId, ResolvedEdge } from './types.js';

const EDGE_SEPARATOR = '\u0000';

/**
 * Build a dependency graph over `nodes`.
 *
 * Duplicate edges collapse into one. Edges whose endpoints are not nodes
 * are dropped, so the graph never holds dangling references.
 */
export function buildGraph(nodes: Iterable<ModuleId>, edges: Iterable<ResolvedEdge>): DependencyGraph {
  const nodeList = [...new Set(nodes)].sort(compareIds);
  const nodeSet = new Set(nodeList);

  const successorSets = new Map<ModuleId, Set<ModuleId>>();
  const predecessorSets = new Map<ModuleId, Set<ModuleId>>();
  for (const id of nodeList) {
    successorSets.set(id, new Set());
    predecessorSets.set(id, new Set());
  }

  const edgeKeys = new Set<string>();
  const edgeList: ResolvedEdge[] = [];

  for (const edge of edges) {
    if (!nodeSet.has(edge.from) || !nodeSet.has(edge.to)) continue;

    const key = `${edge.from}${EDGE_SEPARATOR}${edge.to}`;
    if (edgeKeys.has(key)) continue;
    edgeKeys.add(key);

    edgeList.push(Object.freeze({ from: edge.from, to: edge.to }));
    successorSets.get(edge.from)?.add(edge.to);
    predecessorSets.get(edge.to)?.add(edge.from);
  }

  edgeList.sort((a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to));

  return Object.freeze({
    nodes: Object.freeze(nodeList),
    edges: Object.freeze(edgeList),
    successors: freezeAdjacency(successorSets),
    predecessors: freezeAdjacency(predecessorSets),
  });
}

function freezeAdjacency(sets: Map<ModuleId, Set<ModuleId>>): ReadonlyMap<ModuleId, readonly ModuleId[]> {
  const adjacency = new Map<ModuleId, readonly ModuleId[]>();
  for (const [id, targets] of sets) {
    adjacency.set(id, Object.freeze([...targets].sort(compareIds)));
  }
  return adjacency;
}

/**
 * Targets of a module, ascending; empty for unknown ids
 */
export function importsOf(graph: DependencyGraph, moduleId: ModuleId): readonly ModuleId[] {
  return graph.successors.get(moduleId) ?? [];
}

/**
 * Modules importing a module, ascending; empty for unknown ids
 */
export function importersOf(graph: DependencyGraph, moduleId: ModuleId): readonly ModuleId[] {
  return graph.predecessors.get(moduleId) ?? [];
}
