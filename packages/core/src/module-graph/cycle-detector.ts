/**
 * Cycle Detector
 *
 * Enumerates the distinct elementary cycles of a dependency graph.
 *
 * Depth-first search from every node in ascending id order with an explicit
 * path stack. Each cycle is reported from its smallest member: nodes that
 * have served as a start are not entered again, and a path only closes when
 * it returns to the start. Before each start, a backwards breadth-first pass
 * records how far every remaining node is from the start; a node that cannot
 * get back within the length bound is never entered. The search stops after
 * `maxCycles` results.
 */

import { Errors } from '../errors/index.js';
import { compareIds } from './module-registry.js';
import type { Cycle, CycleDetectionOptions, CycleSearch, DependencyGraph, ModuleId } from './types.js';

export const DEFAULT_MAX_CYCLE_LENGTH = 20;
export const DEFAULT_MAX_CYCLES = 1000;

interface Frame {
  node: ModuleId;
  /** Index of the next successor to visit */
  next: number;
}

/**
 * Find all elementary cycles up to `maxCycleLength` modules long.
 * Self-imports are reported as cycles of length 1.
 */
export function findCycles(graph: DependencyGraph, options: CycleDetectionOptions = {}): Cycle[] {
  return detectCycles(graph, options).cycles;
}

/**
 * Like `findCycles`, also reporting whether the `maxCycles` cap cut the search short
 */
export function detectCycles(graph: DependencyGraph, options: CycleDetectionOptions = {}): CycleSearch {
  const maxLength = options.maxCycleLength ?? DEFAULT_MAX_CYCLE_LENGTH;
  const maxCycles = options.maxCycles ?? DEFAULT_MAX_CYCLES;
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw Errors.invalidArgument('maxCycleLength', `expected a positive integer, got ${maxLength}`);
  }
  if (!Number.isInteger(maxCycles) || maxCycles < 1) {
    throw Errors.invalidArgument('maxCycles', `expected a positive integer, got ${maxCycles}`);
  }

  const cycles: Cycle[] = [];
  const retired = new Set<ModuleId>();

  for (const start of graph.nodes) {
    const distance = distancesTo(graph, start, retired, maxLength);
    const path: ModuleId[] = [start];
    const onPath = new Set<ModuleId>([start]);
    const stack: Frame[] = [{ node: start, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;

      const successors = graph.successors.get(frame.node) ?? [];
      const target = successors[frame.next];

      if (target === undefined) {
        stack.pop();
        path.pop();
        onPath.delete(frame.node);
        continue;
      }
      frame.next++;

      if (target === start) {
        cycles.push(Object.freeze([...path]));
        if (cycles.length >= maxCycles) {
          return { cycles: cycles.sort(compareCycles), truncated: true };
        }
        continue;
      }

      if (onPath.has(target) || retired.has(target)) continue;

      // Entering `target` and walking its shortest way back must fit the bound
      const remaining = distance.get(target);
      if (remaining === undefined || path.length + remaining > maxLength) continue;

      path.push(target);
      onPath.add(target);
      stack.push({ node: target, next: 0 });
    }

    retired.add(start);
  }

  return { cycles: cycles.sort(compareCycles), truncated: false };
}

/**
 * Edge count of the shortest path from each node back to `start`, skipping
 * retired nodes and stopping at `limit`. Nodes with no such path are absent.
 */
function distancesTo(
  graph: DependencyGraph,
  start: ModuleId,
  retired: ReadonlySet<ModuleId>,
  limit: number
): Map<ModuleId, number> {
  const distance = new Map<ModuleId, number>([[start, 0]]);
  let frontier: ModuleId[] = [start];

  for (let steps = 1; steps <= limit && frontier.length > 0; steps++) {
    const next: ModuleId[] = [];
    for (const node of frontier) {
      for (const source of graph.predecessors.get(node) ?? []) {
        if (!distance.has(source) && !retired.has(source)) {
          distance.set(source, steps);
          next.push(source);
        }
      }
    }
    frontier = next;
  }
  return distance;
}

/**
 * Rotate a cycle so it starts at its smallest id
 */
export function normalizeCycle(cycle: readonly ModuleId[]): Cycle {
  if (cycle.length === 0) return Object.freeze([]);

  let minIndex = 0;
  for (let i = 1; i < cycle.length; i++) {
    const current = cycle[i];
    const smallest = cycle[minIndex];
    if (current !== undefined && smallest !== undefined && compareIds(current, smallest) < 0) {
      minIndex = i;
    }
  }
  return Object.freeze([...cycle.slice(minIndex), ...cycle.slice(0, minIndex)]);
}

/**
 * Ascending start id, then length, then element-wise
 */
export function compareCycles(a: Cycle, b: Cycle): number {
  const byStart = compareIds(a[0] ?? '', b[0] ?? '');
  if (byStart !== 0) return byStart;
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    const order = compareIds(a[i] ?? '', b[i] ?? '');
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Edges that lie on at least one cycle, as `from -> to` pairs
 */
export function cycleEdges(cycles: readonly Cycle[]): Array<{ from: ModuleId; to: ModuleId }> {
  const seen = new Set<string>();
  const edges: Array<{ from: ModuleId; to: ModuleId }> = [];
  for (const cycle of cycles) {
    cycle.forEach((from, i) => {
      const to = cycle[(i + 1) % cycle.length] ?? from;
      const key = `${from}\u0000${to}`;
      if (!seen.has(key)) {
        seen.add(key);
        edges.push({ from, to });
      }
    });
  }
  return edges;
}
