/**
 * Requirement hierarchy closure.
 *
 * Requirements live in an arena addressed by stable integer index; child and
 * parent adjacency are index lists. One iterative depth-first pass yields a
 * leaves-first topological order and detects cycles, and the transitive
 * descendant sets are then built bottom-up along that order.
 *
 * Linked requirements: REQ-CORE-003
 */

import type { HierarchyEdge } from '../core/types.js';
import { CyclicHierarchyError, ErrorCode, ReqTraceError } from '../core/errors.js';

export interface ClosureOptions {
  /** Longest allowed parent-to-leaf path, counted in edges. */
  maxDepth?: number;
  /** Checked between top-level requirement evaluations. */
  signal?: AbortSignal;
}

export interface RequirementGraph {
  /** Requirement id per arena index, sorted. */
  readonly ids: readonly string[];
  readonly indexOf: ReadonlyMap<string, number>;
  readonly children: readonly (readonly number[])[];
  readonly parents: readonly (readonly number[])[];
  /** Transitive descendants per node, excluding the node itself. */
  readonly descendants: readonly ReadonlySet<number>[];
  /** Nodes without children. */
  readonly leaves: ReadonlySet<number>;
  /** Every node appears after all of its descendants. */
  readonly order: readonly number[];
  /** Edges naming an id that is not in the requirement set. */
  readonly danglingEdges: readonly HierarchyEdge[];
}

export const DEFAULT_MAX_DEPTH = 10_000;

const WHITE = 0;
const GREY = 1;
const BLACK = 2;

/**
 * Build the closure over the given requirements and hierarchy edges.
 *
 * @throws CyclicHierarchyError if a requirement is its own ancestor
 */
export function buildRequirementGraph(
  requirementIds: Iterable<string>,
  edges: Iterable<HierarchyEdge>,
  options: ClosureOptions = {}
): RequirementGraph {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const ids = Array.from(new Set(requirementIds)).sort();
  const indexOf = new Map<string, number>();
  ids.forEach((id, index) => indexOf.set(id, index));

  const childSets = ids.map(() => new Set<number>());
  const parentSets = ids.map(() => new Set<number>());
  const danglingEdges: HierarchyEdge[] = [];

  for (const edge of edges) {
    const child = indexOf.get(edge.childId);
    const parent = indexOf.get(edge.parentId);
    if (child === undefined || parent === undefined) {
      danglingEdges.push(edge);
      continue;
    }
    childSets[parent].add(child);
    parentSets[child].add(parent);
  }

  const children = childSets.map((set) => Array.from(set).sort((a, b) => a - b));
  const parents = parentSets.map((set) => Array.from(set).sort((a, b) => a - b));

  const order = topologicalOrder(ids, children, maxDepth, options.signal);

  const descendants: Set<number>[] = ids.map(() => new Set<number>());
  for (const node of order) {
    const set = descendants[node];
    for (const child of children[node]) {
      set.add(child);
      for (const d of descendants[child]) set.add(d);
    }
  }

  const leaves = new Set<number>();
  children.forEach((list, index) => {
    if (list.length === 0) leaves.add(index);
  });

  return { ids, indexOf, children, parents, descendants, leaves, order, danglingEdges };
}

/**
 * Iterative post-order DFS over child edges. A grey node reached again
 * closes a cycle.
 */
function topologicalOrder(
  ids: readonly string[],
  children: readonly (readonly number[])[],
  maxDepth: number,
  signal: AbortSignal | undefined
): number[] {
  const color = new Uint8Array(ids.length);
  const order: number[] = [];

  for (let root = 0; root < ids.length; root++) {
    if (color[root] !== WHITE) continue;
    signal?.throwIfAborted();

    // stack of [node, next child position]
    const stack: [number, number][] = [[root, 0]];
    color[root] = GREY;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const [node, position] = frame;
      const nodeChildren = children[node];

      if (position < nodeChildren.length) {
        frame[1] = position + 1;
        const child = nodeChildren[position];

        if (color[child] === GREY) {
          const path = stack.map(([n]) => ids[n]);
          const start = path.indexOf(ids[child]);
          const cycle = [...path.slice(start), ids[child]];
          throw new CyclicHierarchyError({ childId: ids[child], parentId: ids[node] }, cycle);
        }
        if (color[child] === WHITE) {
          if (stack.length > maxDepth) {
            throw new ReqTraceError(
              `Requirement hierarchy below '${ids[root]}' is deeper than ${maxDepth} levels`,
              ErrorCode.DEPTH_EXCEEDED,
              { root: ids[root], maxDepth }
            );
          }
          color[child] = GREY;
          stack.push([child, 0]);
        }
      } else {
        color[node] = BLACK;
        order.push(node);
        stack.pop();
      }
    }
  }

  return order;
}

export function isLeaf(graph: RequirementGraph, id: string): boolean {
  const index = graph.indexOf.get(id);
  return index !== undefined && graph.leaves.has(index);
}

/**
 * Transitive descendants of `id`, sorted. Unknown ids have none.
 */
export function descendantsOf(graph: RequirementGraph, id: string): string[] {
  const index = graph.indexOf.get(id);
  if (index === undefined) return [];
  return toSortedIds(graph, graph.descendants[index]);
}

/**
 * Leaf requirements below `id`, sorted.
 */
export function leafDescendantsOf(graph: RequirementGraph, id: string): string[] {
  const index = graph.indexOf.get(id);
  if (index === undefined) return [];
  const leaves = new Set<number>();
  for (const d of graph.descendants[index]) {
    if (graph.leaves.has(d)) leaves.add(d);
  }
  return toSortedIds(graph, leaves);
}

/**
 * Transitive ancestors of `id`, sorted. Walks parent lists breadth-first.
 */
export function ancestorsOf(graph: RequirementGraph, id: string): string[] {
  const index = graph.indexOf.get(id);
  if (index === undefined) return [];
  const seen = new Set<number>();
  const queue = [...graph.parents[index]];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...graph.parents[next]);
  }
  return toSortedIds(graph, seen);
}

function toSortedIds(graph: RequirementGraph, set: Iterable<number>): string[] {
  return Array.from(set, (i) => graph.ids[i]).sort();
}
