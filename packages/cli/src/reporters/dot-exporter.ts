/**
 * Graphviz DOT export
 *
 * Render with `dot -Tpng deps.dot -o deps.png`. Package markers get a green
 * fill; edges that lie on a circular import are drawn red unless
 * highlighting is off.
 */

import { cycleEdges, type Cycle, type ModuleId, type ScanResult } from 'modgraph-core';

export interface DotOptions {
  /** Cycles whose edges are highlighted; empty disables highlighting */
  cycles: readonly Cycle[];
}

const NODE_STYLE = 'node [shape=box, style=filled, fillcolor="#e8f4fd", fontname="Arial"];';
const EDGE_STYLE = 'edge [fontname="Arial", fontsize=10];';
const PACKAGE_FILL = '#d4edda';
const CYCLE_EDGE_STYLE = '[color="red", penwidth=2.0]';

/**
 * DOT identifier for a module: dots become underscores
 */
export function dotNodeId(moduleId: ModuleId): string {
  return moduleId.replace(/\./g, '_');
}

/**
 * One line per id segment
 */
export function dotLabel(moduleId: ModuleId): string {
  return moduleId.replace(/\./g, '\\n');
}

export function generateDot(result: ScanResult, options: DotOptions): string {
  const highlighted = new Set(cycleEdges(options.cycles).map(edge => `${edge.from}\u0000${edge.to}`));
  const lines: string[] = [];

  lines.push('digraph dependencies {');
  lines.push('    rankdir=LR;');
  lines.push(`    ${NODE_STYLE}`);
  lines.push(`    ${EDGE_STYLE}`);
  lines.push('');

  for (const module of result.modules.values()) {
    const attributes = [`label="${dotLabel(module.id)}"`];
    if (module.isPackage) {
      attributes.push(`fillcolor="${PACKAGE_FILL}"`);
    }
    lines.push(`    ${dotNodeId(module.id)} [${attributes.join(', ')}];`);
  }

  lines.push('');

  for (const edge of result.graph.edges) {
    const style = highlighted.has(`${edge.from}\u0000${edge.to}`) ? ` ${CYCLE_EDGE_STYLE}` : '';
    lines.push(`    ${dotNodeId(edge.from)} -> ${dotNodeId(edge.to)}${style};`);
  }

  lines.push('}');
  return lines.join('\n');
}
