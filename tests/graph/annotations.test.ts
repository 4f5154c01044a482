/**
 * Tests for annotation propagation.
 *
 * Linked requirements: REQ-CORE-004
 */

import { describe, it, expect } from 'vitest';
import { buildRequirementGraph } from '../../src/graph/closure.js';
import { propagateAnnotations } from '../../src/graph/annotations.js';
import type { Annotation } from '../../src/core/types.js';

const graph = buildRequirementGraph(
  ['root', 'a', 'a.1', 'a.2', 'b'],
  [
    { childId: 'a', parentId: 'root' },
    { childId: 'b', parentId: 'root' },
    { childId: 'a.1', parentId: 'a' },
    { childId: 'a.2', parentId: 'a' },
  ]
);

describe('propagateAnnotations', () => {
  it('should mark a seed and all of its descendants', () => {
    const annotations = new Map<string, Annotation | null>([
      ['a', 'deprecated'],
      ['b', null],
    ]);

    const effective = propagateAnnotations(graph, annotations);

    expect([...effective.deprecated].sort()).toEqual(['a', 'a.1', 'a.2']);
    expect(effective.manual.size).toBe(0);
  });

  it('should not propagate upwards', () => {
    const effective = propagateAnnotations(graph, new Map<string, Annotation | null>([['a.1', 'manual']]));

    expect([...effective.manual]).toEqual(['a.1']);
  });

  it('should keep both annotations when seeds overlap', () => {
    const effective = propagateAnnotations(
      graph,
      new Map<string, Annotation | null>([
        ['root', 'manual'],
        ['a.2', 'deprecated'],
      ])
    );

    expect(effective.manual.size).toBe(5);
    expect([...effective.deprecated]).toEqual(['a.2']);
  });

  it('should ignore annotations on unknown requirements', () => {
    const effective = propagateAnnotations(graph, new Map<string, Annotation | null>([['ghost', 'deprecated']]));

    expect(effective.deprecated.size).toBe(0);
  });
});
