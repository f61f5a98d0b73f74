/**
 * Graph Builder, Coupling, Orphan and Tree Tests
 */

import { describe, it, expect } from 'vitest';
import { buildGraph, importersOf, importsOf } from '../graph-builder.js';
import { calculateInstability, computeMetrics, parseSortKey } from '../coupling-analyzer.js';
import { findOrphans } from '../orphans.js';
import { formatTree, renderTree, treeRoots } from '../dependency-tree.js';
import { ModgraphError, ModgraphErrorCode, isModgraphError } from '../../errors/index.js';

function graphOf(nodes: string[], edges: Array<[string, string]>) {
  return buildGraph(nodes, edges.map(([from, to]) => ({ from, to })));
}

describe('buildGraph', () => {
  it('should collapse duplicate edges and keep isolated modules', () => {
    const graph = graphOf(['b', 'a', 'c'], [['a', 'b'], ['a', 'b'], ['b', 'a']]);

    expect(graph.nodes).toEqual(['a', 'b', 'c']);
    expect(graph.edges).toEqual([
      { from: 'a', to: 'b' },
      { from: 'b', to: 'a' },
    ]);
    expect(importsOf(graph, 'c')).toEqual([]);
  });

  it('should drop edges whose endpoints are not modules', () => {
    const graph = graphOf(['a'], [['a', 'ghost'], ['ghost', 'a']]);

    expect(graph.edges).toEqual([]);
    expect(graph.successors.has('ghost')).toBe(false);
  });

  it('should keep self edges', () => {
    const graph = graphOf(['a'], [['a', 'a']]);

    expect(importsOf(graph, 'a')).toEqual(['a']);
    expect(importersOf(graph, 'a')).toEqual(['a']);
  });

  it('should be frozen', () => {
    const graph = graphOf(['a', 'b'], [['a', 'b']]);

    expect(Object.isFrozen(graph)).toBe(true);
    expect(Object.isFrozen(graph.nodes)).toBe(true);
    expect(Object.isFrozen(graph.edges)).toBe(true);
    expect(Object.isFrozen(importsOf(graph, 'a'))).toBe(true);
  });

  it('should answer queries in ascending order and tolerate unknown ids', () => {
    const graph = graphOf(['a', 'b', 'c', 'd'], [['c', 'd'], ['a', 'd'], ['d', 'b'], ['d', 'a']]);

    expect(importsOf(graph, 'd')).toEqual(['a', 'b']);
    expect(importersOf(graph, 'd')).toEqual(['a', 'c']);
    expect(importsOf(graph, 'missing')).toEqual([]);
    expect(importersOf(graph, 'missing')).toEqual([]);
  });
});

describe('computeMetrics', () => {
  const chain = graphOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c']]);

  it('should compute fan-in, fan-out and instability along a chain', () => {
    expect(computeMetrics(chain, 'name')).toEqual([
      { module: 'a', fanIn: 0, fanOut: 1, instability: 1 },
      { module: 'b', fanIn: 1, fanOut: 1, instability: 0.5 },
      { module: 'c', fanIn: 1, fanOut: 0, instability: 0 },
    ]);
  });

  it('should sort by instability descending by default', () => {
    expect(computeMetrics(chain).map(m => m.module)).toEqual(['a', 'b', 'c']);
  });

  it('should treat a shared dependency as stable', () => {
    const graph = graphOf(['a', 'b', 'c', 'd'], [['a', 'd'], ['b', 'd'], ['c', 'd']]);
    const d = computeMetrics(graph).find(m => m.module === 'd');

    expect(d).toEqual({ module: 'd', fanIn: 3, fanOut: 0, instability: 0 });
    expect(findOrphans(graph).map(o => o.moduleId)).toEqual(['a', 'b', 'c']);
  });

  it('should give isolated modules an instability of 0', () => {
    const graph = graphOf(['e'], []);

    expect(computeMetrics(graph)).toEqual([{ module: 'e', fanIn: 0, fanOut: 0, instability: 0 }]);
  });

  it('should count a self-import on both sides', () => {
    const graph = graphOf(['a'], [['a', 'a']]);

    expect(computeMetrics(graph)).toEqual([{ module: 'a', fanIn: 1, fanOut: 1, instability: 0.5 }]);
  });

  it('should keep degree sums equal to the edge count', () => {
    const graph = graphOf(
      ['a', 'b', 'c', 'd', 'e'],
      [['a', 'b'], ['a', 'c'], ['b', 'c'], ['c', 'a'], ['d', 'd'], ['e', 'a']]
    );
    const metrics = computeMetrics(graph);

    const fanInSum = metrics.reduce((sum, m) => sum + m.fanIn, 0);
    const fanOutSum = metrics.reduce((sum, m) => sum + m.fanOut, 0);
    expect(fanInSum).toBe(graph.edges.length);
    expect(fanOutSum).toBe(graph.edges.length);
    for (const metric of metrics) {
      expect(metric.instability).toBeGreaterThanOrEqual(0);
      expect(metric.instability).toBeLessThanOrEqual(1);
    }
  });

  it('should break ties by module id', () => {
    const graph = graphOf(['z', 'y', 'x'], [['z', 'x'], ['y', 'x']]);

    expect(computeMetrics(graph, 'fan_out').map(m => m.module)).toEqual(['y', 'z', 'x']);
    expect(computeMetrics(graph, 'fan_in').map(m => m.module)).toEqual(['x', 'y', 'z']);
  });

  it('should return a fresh array each call', () => {
    const first = computeMetrics(chain);
    first.pop();

    expect(computeMetrics(chain)).toHaveLength(3);
  });
});

describe('calculateInstability', () => {
  it('should round to three decimals', () => {
    expect(calculateInstability(2, 1)).toBe(0.333);
    expect(calculateInstability(1, 2)).toBe(0.667);
    expect(calculateInstability(0, 0)).toBe(0);
  });
});

describe('parseSortKey', () => {
  it('should accept hyphenated and underscored keys', () => {
    expect(parseSortKey('fan-in')).toBe('fan_in');
    expect(parseSortKey('fan_out')).toBe('fan_out');
    expect(parseSortKey('Instability')).toBe('instability');
    expect(parseSortKey('name')).toBe('name');
  });

  it('should reject unknown keys', () => {
    expect(() => parseSortKey('size')).toThrow(ModgraphError);
    expect(() => parseSortKey('size')).toThrow("Invalid sort key: 'size'");
  });
});

describe('findOrphans', () => {
  it('should label entry points and standalone modules', () => {
    const graph = graphOf(['main', 'lib', 'unused'], [['main', 'lib']]);

    expect(findOrphans(graph)).toEqual([
      { moduleId: 'main', role: 'entry-point', fanOut: 1 },
      { moduleId: 'unused', role: 'standalone', fanOut: 0 },
    ]);
  });

  it('should not report modules on a cycle', () => {
    const graph = graphOf(['a', 'b'], [['a', 'b'], ['b', 'a']]);

    expect(findOrphans(graph)).toEqual([]);
  });
});

describe('renderTree', () => {
  it('should terminate on a cycle with a closing leaf', () => {
    const graph = graphOf(['a', 'b'], [['a', 'b'], ['b', 'a']]);
    const tree = renderTree(graph);

    expect(tree.roots.map(r => r.moduleId)).toEqual(['a', 'b']);
    expect(formatTree(tree)).toEqual([
      'a',
      '`-- b',
      '    `-- a [circular]',
      '',
      'b',
      '`-- a',
      '    `-- b [circular]',
    ]);
  });

  it('should draw branches with connectors', () => {
    const graph = graphOf(['a', 'b', 'c', 'd'], [['a', 'b'], ['a', 'c'], ['b', 'd']]);

    expect(formatTree(renderTree(graph))).toEqual(['a', '|-- b', '|   `-- d', '`-- c']);
  });

  it('should repeat shared dependencies under each parent', () => {
    const graph = graphOf(['a', 'b', 'c', 'd'], [['a', 'b'], ['a', 'c'], ['b', 'd'], ['c', 'd']]);

    expect(formatTree(renderTree(graph))).toEqual(['a', '|-- b', '|   `-- d', '`-- c', '    `-- d']);
  });

  it('should stop expanding at the depth bound', () => {
    const graph = graphOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c']]);
    const tree = renderTree(graph, { maxDepth: 1 });
    const child = tree.roots[0]?.children[0];

    expect(formatTree(tree)).toEqual(['a', '`-- b']);
    expect(child?.truncated).toBe(true);
  });

  it('should show only the root at depth 0', () => {
    const graph = graphOf(['a', 'b'], [['a', 'b']]);
    const tree = renderTree(graph, { maxDepth: 0 });

    expect(formatTree(tree)).toEqual(['a']);
    expect(tree.roots[0]?.truncated).toBe(true);
  });

  it('should start from a given module', () => {
    const graph = graphOf(['a', 'b', 'c'], [['a', 'b'], ['b', 'c']]);

    expect(formatTree(renderTree(graph, { startModule: 'b' }))).toEqual(['b', '`-- c']);
  });

  it('should reject an unknown start module', () => {
    const graph = graphOf(['a'], []);
    let caught: unknown;
    try {
      renderTree(graph, { startModule: 'nope' });
    } catch (error) {
      caught = error;
    }

    expect(isModgraphError(caught, ModgraphErrorCode.MODULE_NOT_FOUND)).toBe(true);
    expect(isModgraphError(caught) && caught.message).toBe('Module not found: nope');
  });
});

describe('treeRoots', () => {
  it('should list modules without importers', () => {
    const graph = graphOf(['a', 'b', 'c'], [['a', 'b']]);

    expect(treeRoots(graph)).toEqual(['a', 'c']);
  });

  it('should fall back to every module when all are imported', () => {
    const graph = graphOf(['a', 'b'], [['a', 'b'], ['b', 'a']]);

    expect(treeRoots(graph)).toEqual(['a', 'b']);
  });
});
