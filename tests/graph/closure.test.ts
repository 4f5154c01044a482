/**
 * Tests for the requirement hierarchy closure.
 *
 * Linked requirements: REQ-CORE-003
 */

import { describe, it, expect } from 'vitest';
import {
  ancestorsOf,
  buildRequirementGraph,
  descendantsOf,
  isLeaf,
  leafDescendantsOf,
} from '../../src/graph/closure.js';
import { CyclicHierarchyError, ErrorCode, ReqTraceError } from '../../src/core/errors.js';

const edge = (childId: string, parentId: string) => ({ childId, parentId });

describe('buildRequirementGraph', () => {
  it('should index requirements in sorted order', () => {
    const graph = buildRequirementGraph(['c', 'a', 'b', 'a'], []);

    expect(graph.ids).toEqual(['a', 'b', 'c']);
    expect(graph.indexOf.get('b')).toBe(1);
    expect(graph.leaves.size).toBe(3);
  });

  it('should place every node after its descendants', () => {
    const graph = buildRequirementGraph(
      ['root', 'a', 'b', 'a.1'],
      [edge('a', 'root'), edge('b', 'root'), edge('a.1', 'a')]
    );
    const position = new Map(graph.order.map((node, i) => [graph.ids[node], i]));

    expect(graph.order).toHaveLength(4);
    expect(position.get('a.1')).toBeLessThan(position.get('a') ?? -1);
    expect(position.get('a')).toBeLessThan(position.get('root') ?? -1);
    expect(position.get('b')).toBeLessThan(position.get('root') ?? -1);
  });

  it('should compute transitive descendants', () => {
    const graph = buildRequirementGraph(
      ['root', 'a', 'b', 'a.1'],
      [edge('a', 'root'), edge('b', 'root'), edge('a.1', 'a')]
    );

    expect(descendantsOf(graph, 'root')).toEqual(['a', 'a.1', 'b']);
    expect(descendantsOf(graph, 'a')).toEqual(['a.1']);
    expect(descendantsOf(graph, 'b')).toEqual([]);
    expect(leafDescendantsOf(graph, 'root')).toEqual(['a.1', 'b']);
    expect(isLeaf(graph, 'a')).toBe(false);
    expect(isLeaf(graph, 'a.1')).toBe(true);
  });

  it('should share a descendant reachable through two parents', () => {
    const graph = buildRequirementGraph(
      ['top', 'left', 'right', 'shared'],
      [edge('left', 'top'), edge('right', 'top'), edge('shared', 'left'), edge('shared', 'right')]
    );

    expect(descendantsOf(graph, 'top')).toEqual(['left', 'right', 'shared']);
    expect(ancestorsOf(graph, 'shared')).toEqual(['left', 'right', 'top']);
  });

  it('should return edges with unknown endpoints as dangling', () => {
    const graph = buildRequirementGraph(['a'], [edge('a', 'ghost'), edge('ghost', 'a')]);

    expect(graph.danglingEdges).toEqual([edge('a', 'ghost'), edge('ghost', 'a')]);
    expect(isLeaf(graph, 'a')).toBe(true);
  });

  it('should reject a cycle naming the closing edge', () => {
    let caught: unknown;
    try {
      buildRequirementGraph(['a', 'b', 'c'], [edge('b', 'a'), edge('c', 'b'), edge('a', 'c')]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CyclicHierarchyError);
    if (!(caught instanceof CyclicHierarchyError)) return;
    expect(caught.code).toBe(ErrorCode.CYCLIC_HIERARCHY);
    // DFS starts at 'a' and walks a -> b -> c, then meets 'a' again
    expect(caught.edge).toEqual({ childId: 'a', parentId: 'c' });
    expect(caught.cycle).toEqual(['a', 'b', 'c', 'a']);
  });

  it('should reject a self loop', () => {
    expect(() => buildRequirementGraph(['a'], [edge('a', 'a')])).toThrow(CyclicHierarchyError);
  });

  it('should enforce the depth bound', () => {
    const ids = ['n0', 'n1', 'n2', 'n3'];
    const edges = [edge('n1', 'n0'), edge('n2', 'n1'), edge('n3', 'n2')];

    expect(() => buildRequirementGraph(ids, edges, { maxDepth: 3 })).not.toThrow();
    try {
      buildRequirementGraph(ids, edges, { maxDepth: 2 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ReqTraceError);
      if (err instanceof ReqTraceError) expect(err.code).toBe(ErrorCode.DEPTH_EXCEEDED);
    }
  });

  it('should stop when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => buildRequirementGraph(['a'], [], { signal: controller.signal })).toThrow();
  });

  it('should handle a deep chain without recursion limits', () => {
    const size = 5_000;
    const ids = Array.from({ length: size }, (_, i) => `r${String(i).padStart(5, '0')}`);
    const edges = ids.slice(1).map((id, i) => edge(id, ids[i]));

    const graph = buildRequirementGraph(ids, edges, { maxDepth: size });

    expect(graph.order).toHaveLength(size);
    expect(graph.leaves.size).toBe(1);
    expect(graph.descendants[0].size).toBe(size - 1);
  });

  it('should return no relatives for unknown ids', () => {
    const graph = buildRequirementGraph(['a'], []);

    expect(descendantsOf(graph, 'zzz')).toEqual([]);
    expect(ancestorsOf(graph, 'zzz')).toEqual([]);
    expect(isLeaf(graph, 'zzz')).toBe(false);
  });
});
