/**
 * Trace and coverage status per requirement.
 *
 * Two pipelines of the same shape (trace, coverage) plus a failure overlay,
 * all resolved in one pass over the closure's leaves-first order so every
 * child is final before its parent is visited.
 *
 * Linked requirements: REQ-CORE-005, REQ-CORE-007
 */

import {
  isPassed,
  testRecordKeyOf,
  type CoverageLinkRow,
  type TestOutcome,
  type TestRecordRow,
  type TraceKey,
} from '../core/types.js';
import type { RequirementGraph } from '../graph/closure.js';
import type { EffectiveAnnotations } from '../graph/annotations.js';

export interface StatusEvidence {
  traces: readonly TraceKey[];
  coverage: readonly CoverageLinkRow[];
  tests: readonly TestRecordRow[];
}

export interface RequirementStatus {
  id: string;
  leaf: boolean;
  directlyTraced: boolean;
  /** Non-leaf whose every child is traced. */
  indirectlyTraced: boolean;
  traced: boolean;
  /** Every leaf below (or the leaf itself) is directly traced. */
  fullyTraced: boolean;
  directlyCovered: boolean;
  indirectlyCovered: boolean;
  covered: boolean;
  fullyCovered: boolean;
  /** A covering test did not pass here or anywhere below. */
  failedCovered: boolean;
  passedCovered: boolean;
  deprecated: boolean;
  manual: boolean;
  /** Deprecated but still traced. */
  invalid: boolean;
}

export type StatusMap = ReadonlyMap<string, RequirementStatus>;

export interface StatusOptions {
  signal?: AbortSignal;
}

interface PipelineState {
  direct: boolean[];
  indirect: boolean[];
  satisfied: boolean[];
  full: boolean[];
}

/**
 * Resolve direct / indirect / full satisfaction for one evidence kind.
 * `direct[i]` must be filled in before the call.
 */
function resolvePipeline(
  graph: RequirementGraph,
  direct: boolean[],
  signal: AbortSignal | undefined
): PipelineState {
  const size = graph.ids.length;
  const indirect = new Array<boolean>(size).fill(false);
  const satisfied = new Array<boolean>(size).fill(false);
  const full = new Array<boolean>(size).fill(false);

  for (const node of graph.order) {
    signal?.throwIfAborted();
    const children = graph.children[node];

    if (children.length === 0) {
      satisfied[node] = direct[node];
      full[node] = direct[node];
      continue;
    }

    indirect[node] = children.every((c) => satisfied[c]);
    satisfied[node] = direct[node] || indirect[node];
    // leaf children count by direct evidence, inner children by their full flag
    full[node] = children.every((c) => (graph.leaves.has(c) ? direct[c] : full[c]));
  }

  return { direct, indirect, satisfied, full };
}

/**
 * Compute the status of every requirement in the graph.
 *
 * Pending and skipped tests count as covering but not as passing.
 */
export function computeStatus(
  graph: RequirementGraph,
  effective: EffectiveAnnotations,
  evidence: StatusEvidence,
  options: StatusOptions = {}
): StatusMap {
  const size = graph.ids.length;
  const directTrace = new Array<boolean>(size).fill(false);
  const directCover = new Array<boolean>(size).fill(false);
  const directFailure = new Array<boolean>(size).fill(false);

  for (const trace of evidence.traces) {
    const index = graph.indexOf.get(trace.reqId);
    if (index !== undefined) directTrace[index] = true;
  }

  const outcomes = new Map<string, TestOutcome>();
  for (const test of evidence.tests) {
    outcomes.set(testRecordKeyOf(test), test.outcome);
  }

  for (const link of evidence.coverage) {
    const index = graph.indexOf.get(link.reqId);
    if (index === undefined) continue;
    directCover[index] = true;
    const outcome = outcomes.get(testRecordKeyOf(link));
    if (!outcome || !isPassed(outcome)) directFailure[index] = true;
  }

  const trace = resolvePipeline(graph, directTrace, options.signal);
  const cover = resolvePipeline(graph, directCover, options.signal);

  const failed = new Array<boolean>(size).fill(false);
  for (const node of graph.order) {
    failed[node] = directFailure[node] || graph.children[node].some((c) => failed[c]);
  }

  const result = new Map<string, RequirementStatus>();
  graph.ids.forEach((id, i) => {
    const deprecated = effective.deprecated.has(id);
    result.set(id, {
      id,
      leaf: graph.leaves.has(i),
      directlyTraced: trace.direct[i],
      indirectlyTraced: trace.indirect[i],
      traced: trace.satisfied[i],
      fullyTraced: trace.full[i],
      directlyCovered: cover.direct[i],
      indirectlyCovered: cover.indirect[i],
      covered: cover.satisfied[i],
      fullyCovered: cover.full[i],
      failedCovered: failed[i],
      passedCovered: cover.satisfied[i] && !failed[i],
      deprecated,
      manual: effective.manual.has(id),
      invalid: deprecated && trace.satisfied[i],
    });
  });

  return result;
}

/**
 * Ids of requirements that are deprecated yet still traced, sorted.
 */
export function invalidRequirements(statuses: StatusMap): string[] {
  return Array.from(statuses.values())
    .filter((s) => s.invalid)
    .map((s) => s.id)
    .sort();
}
