/**
 * Derived view over one fact snapshot.
 *
 * Linked requirements: REQ-CORE-005, REQ-CORE-008
 */

import type { Annotation, Diagnostic, FactSnapshot, TestRunRow } from '../core/types.js';
import { buildRequirementGraph, type ClosureOptions, type RequirementGraph } from '../graph/closure.js';
import { propagateAnnotations, type EffectiveAnnotations } from '../graph/annotations.js';
import { computeStatus, invalidRequirements, type StatusMap } from './engine.js';
import {
  leafChildOverview,
  overallTestOverview,
  requirementsOverview,
  testRunDiagnostics,
  testRunOverview,
  type LeafChildOverview,
  type RequirementsOverview,
  type TestRunOverview,
} from './statistics.js';

export interface TestRunAnalysis {
  run: TestRunRow;
  overview: TestRunOverview;
}

export interface SnapshotAnalysis {
  graph: RequirementGraph;
  effective: EffectiveAnnotations;
  statuses: StatusMap;
  overview: RequirementsOverview;
  subtrees: ReadonlyMap<string, LeafChildOverview>;
  testRuns: TestRunAnalysis[];
  testOverview: TestRunOverview;
  invalid: string[];
  diagnostics: Diagnostic[];
}

export function analyzeSnapshot(snapshot: FactSnapshot, options: ClosureOptions = {}): SnapshotAnalysis {
  const graph = buildRequirementGraph(
    snapshot.requirements.map((r) => r.id),
    snapshot.hierarchy,
    options
  );

  const annotations = new Map<string, Annotation | null>();
  for (const req of snapshot.requirements) annotations.set(req.id, req.annotation);
  const effective = propagateAnnotations(graph, annotations);

  const statuses = computeStatus(
    graph,
    effective,
    { traces: snapshot.traces, coverage: snapshot.coverage, tests: snapshot.tests },
    { signal: options.signal }
  );

  const diagnostics: Diagnostic[] = graph.danglingEdges.map((edge): Diagnostic => ({
    kind: 'dangling-reference',
    fact: 'hierarchy',
    missing: graph.indexOf.has(edge.parentId) ? edge.childId : edge.parentId,
    message: `Hierarchy edge '${edge.childId}' -> '${edge.parentId}' references an unknown requirement`,
  }));
  diagnostics.push(...testRunDiagnostics(snapshot.testRuns, snapshot.tests));

  return {
    graph,
    effective,
    statuses,
    overview: requirementsOverview(statuses, snapshot.verifications),
    subtrees: leafChildOverview(graph, statuses),
    testRuns: snapshot.testRuns.map((run) => ({ run, overview: testRunOverview(run, snapshot.tests) })),
    testOverview: overallTestOverview(snapshot.testRuns, snapshot.tests),
    invalid: invalidRequirements(statuses),
    diagnostics,
  };
}
