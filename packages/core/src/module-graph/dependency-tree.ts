/**
 * Dependency Tree
 *
 * Derives printable dependency trees from the graph. Traversal uses an
 * explicit stack; a successor already on the current path becomes a leaf
 * marked as circular instead of being expanded again.
 */

import { Errors } from '../errors/index.js';
import type { DependencyGraph, DependencyTree, ModuleId, TreeNode, TreeOptions } from './types.js';

export const DEFAULT_TREE_DEPTH = 10;

const CONNECTOR_MIDDLE = '|-- ';
const CONNECTOR_LAST = '`-- ';
const EXTENSION_MIDDLE = '|   ';
const EXTENSION_LAST = '    ';
const CIRCULAR_SUFFIX = ' [circular]';

/**
 * Modules that nothing imports, ascending. When every module is imported
 * (everything sits on a cycle), all modules are roots.
 */
export function treeRoots(graph: DependencyGraph): ModuleId[] {
  const roots = graph.nodes.filter(id => (graph.predecessors.get(id)?.length ?? 0) === 0);
  return roots.length > 0 ? roots : [...graph.nodes];
}

/**
 * Build the dependency tree from `startModule`, or from every root
 */
export function renderTree(graph: DependencyGraph, options: TreeOptions = {}): DependencyTree {
  const maxDepth = options.maxDepth ?? DEFAULT_TREE_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw Errors.invalidArgument('depth', `expected a non-negative integer, got ${maxDepth}`);
  }

  let rootIds: ModuleId[];
  if (options.startModule !== undefined) {
    if (!graph.successors.has(options.startModule)) {
      throw Errors.moduleNotFound(options.startModule);
    }
    rootIds = [options.startModule];
  } else {
    rootIds = treeRoots(graph);
  }

  return {
    roots: rootIds.map(id => expand(graph, id, maxDepth)),
    maxDepth,
  };
}

interface ExpandFrame {
  node: TreeNode;
  successors: readonly ModuleId[];
  next: number;
}

function expand(graph: DependencyGraph, rootId: ModuleId, maxDepth: number): TreeNode {
  const root = createNode(rootId, 0, false);
  const onPath = new Set<ModuleId>([rootId]);
  const stack: ExpandFrame[] = [{ node: root, successors: graph.successors.get(rootId) ?? [], next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    if (frame.node.depth >= maxDepth) {
      frame.node.truncated = frame.successors.length > 0;
      stack.pop();
      onPath.delete(frame.node.moduleId);
      continue;
    }

    const target = frame.successors[frame.next];
    if (target === undefined) {
      stack.pop();
      onPath.delete(frame.node.moduleId);
      continue;
    }
    frame.next++;

    if (onPath.has(target)) {
      frame.node.children.push(createNode(target, frame.node.depth + 1, true));
      continue;
    }

    const child = createNode(target, frame.node.depth + 1, false);
    frame.node.children.push(child);
    onPath.add(target);
    stack.push({ node: child, successors: graph.successors.get(target) ?? [], next: 0 });
  }

  return root;
}

function createNode(moduleId: ModuleId, depth: number, cycle: boolean): TreeNode {
  return { moduleId, depth, children: [], cycle, truncated: false };
}

/**
 * Text lines of a tree: `|-- ` / `` `-- `` connectors, a ` [circular]`
 * suffix on cycle-closing leaves and a blank line between roots.
 */
export function formatTree(tree: DependencyTree): string[] {
  const lines: string[] = [];

  tree.roots.forEach((root, index) => {
    if (index > 0) lines.push('');
    lines.push(root.moduleId);

    const stack: Array<{ node: TreeNode; prefix: string; isLast: boolean }> = [];
    pushChildren(stack, root, '');

    let entry = stack.pop();
    while (entry) {
      const { node, prefix, isLast } = entry;
      const connector = isLast ? CONNECTOR_LAST : CONNECTOR_MIDDLE;
      lines.push(`${prefix}${connector}${node.moduleId}${node.cycle ? CIRCULAR_SUFFIX : ''}`);
      pushChildren(stack, node, prefix + (isLast ? EXTENSION_LAST : EXTENSION_MIDDLE));
      entry = stack.pop();
    }
  });

  return lines;
}

function pushChildren(
  stack: Array<{ node: TreeNode; prefix: string; isLast: boolean }>,
  parent: TreeNode,
  prefix: string
): void {
  // Reverse so the first child is popped first
  for (let i = parent.children.length - 1; i >= 0; i--) {
    const node = parent.children[i];
    if (node) {
      stack.push({ node, prefix, isLast: i === parent.children.length - 1 });
    }
  }
}
