/**
 * Report export - assembles the derived view of a snapshot into one JSON
 * document for downstream renderers.
 *
 * Linked requirements: REQ-EXPORT-001
 */

import {
  isPassed,
  testRecordKeyOf,
  type Annotation,
  type CoverageLinkRow,
  type Diagnostic,
  type FactSnapshot,
  type ReviewRow,
  type TestOutcome,
  type TraceRow,
  type UnrelatedFacts,
} from '../core/types.js';
import type { SnapshotAnalysis } from '../status/analysis.js';
import type { LeafChildOverview, RequirementsOverview, TestRunOverview } from '../status/statistics.js';

export const TRACE_CRITERIA = `Requirements are traced if one of the following criteria is met:

- A trace directly referring to the requirement exists (directly traced)
- All child requirements of the requirement are traced (indirectly traced)`;

export const TEST_COVERAGE_CRITERIA = `A requirement is covered through a test if one of the following criteria is met:

- At least one direct trace to the requirement was reached during test execution
- All child requirements of the requirement are covered`;

export const TEST_PASSED_COVERAGE_CRITERIA = `A requirement coverage passed if all of the following criteria are met:

- The requirement is covered
- All tests covering the requirement passed
- All tests covering any requirement below it passed`;

export const VALIDATION_CRITERIA = 'The collected data is valid if no deprecated requirement is traced.';

export interface TraceInfo {
  filepath: string;
  line: number;
  itemName: string | null;
}

export interface IndirectTraceInfo extends TraceInfo {
  /** Descendant the trace refers to. */
  tracedId: string;
}

export interface CoverageInfo {
  testRunName: string;
  testRunDate: string;
  testName: string;
  filepath: string;
  line: number;
}

export interface IndirectCoverageInfo extends CoverageInfo {
  coveredId: string;
}

export interface FailedCoverageInfo extends CoverageInfo {
  coveredId: string;
  outcome: TestOutcome['kind'] | 'missing';
}

export interface VerificationInfo {
  reviewName: string;
  reviewDate: string;
  comment: string | null;
}

export interface RequirementInfo {
  id: string;
  title: string;
  origin: string;
  annotation: Annotation | null;
  info: unknown;
  parents: string[];
  children: string[];
  leaf: boolean;
  deprecated: boolean;
  manual: boolean;
  traceInfo: {
    traced: boolean;
    fullyTraced: boolean;
    directTraces: TraceInfo[];
    indirectTraces: IndirectTraceInfo[];
  };
  coverageInfo: {
    covered: boolean;
    fullyCovered: boolean;
    passed: boolean;
    directCoverage: CoverageInfo[];
    indirectCoverage: IndirectCoverageInfo[];
    failedCoverage: FailedCoverageInfo[];
  };
  /** Leaf rollup; null for leaves. */
  subtree: LeafChildOverview | null;
  verifiedInfo: VerificationInfo[];
  valid: boolean;
}

export interface TestInfo {
  name: string;
  filepath: string;
  line: number;
  outcome: TestOutcome;
  /** Requirement ids this test covers, sorted. */
  covers: string[];
}

export interface TestRunInfo {
  name: string;
  date: string;
  logs: string | null;
  meta: unknown;
  overview: TestRunOverview;
  tests: TestInfo[];
}

export interface TestStatistics {
  overview: TestRunOverview;
  testRuns: TestRunInfo[];
}

export interface ReviewInfo extends ReviewRow {
  verified: { reqId: string; comment: string | null }[];
}

export interface ReportContext {
  generation: number;
  creationDate: string;
  overview: RequirementsOverview;
  requirements: RequirementInfo[];
  tests: TestStatistics;
  reviews: ReviewInfo[];
  unrelated: UnrelatedFacts;
  validation: {
    isValid: boolean;
    validationCriteria: string;
    invalidRequirements: string[];
  };
  diagnostics: Diagnostic[];
  traceCriteria: string;
  testCoverageCriteria: string;
  testPassedCoverageCriteria: string;
}

export interface ReportOptions {
  /** Defaults to now. */
  creationDate?: Date;
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const list = groups.get(k);
    if (list) list.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}

function toTraceInfo(trace: TraceRow): TraceInfo {
  return { filepath: trace.filepath, line: trace.line, itemName: trace.itemName };
}

function toCoverageInfo(link: CoverageLinkRow): CoverageInfo {
  return {
    testRunName: link.testRunName,
    testRunDate: link.testRunDate,
    testName: link.name,
    filepath: link.traceFilepath,
    line: link.traceLine,
  };
}

function byLocation(a: { filepath: string; line: number }, b: { filepath: string; line: number }): number {
  return a.filepath.localeCompare(b.filepath) || a.line - b.line;
}

/**
 * Build the report context. Every list is sorted so equal snapshots give
 * equal reports apart from `creationDate`.
 */
export function buildReport(
  snapshot: FactSnapshot,
  analysis: SnapshotAnalysis,
  options: ReportOptions = {}
): ReportContext {
  const { graph, statuses } = analysis;
  const tracesByReq = groupBy(snapshot.traces, (t) => t.reqId);
  const coverageByReq = groupBy(snapshot.coverage, (c) => c.reqId);
  const verificationsByReq = groupBy(snapshot.verifications, (v) => v.reqId);
  const outcomes = new Map<string, TestOutcome>();
  for (const test of snapshot.tests) outcomes.set(testRecordKeyOf(test), test.outcome);

  const requirements: RequirementInfo[] = snapshot.requirements.map((req) => {
    const index = graph.indexOf.get(req.id);
    const status = statuses.get(req.id);
    const below = index === undefined ? [] : Array.from(graph.descendants[index], (d) => graph.ids[d]).sort();

    // indirect evidence is listed only where it satisfies the requirement
    const indirectTraces: IndirectTraceInfo[] = [];
    const indirectCoverage: IndirectCoverageInfo[] = [];
    for (const d of below) {
      if (status?.indirectlyTraced) {
        for (const t of tracesByReq.get(d) ?? []) indirectTraces.push({ tracedId: d, ...toTraceInfo(t) });
      }
      if (status?.indirectlyCovered) {
        for (const c of coverageByReq.get(d) ?? []) indirectCoverage.push({ coveredId: d, ...toCoverageInfo(c) });
      }
    }

    const failedCoverage: FailedCoverageInfo[] = [];
    for (const coveredId of [req.id, ...below]) {
      for (const link of coverageByReq.get(coveredId) ?? []) {
        const outcome = outcomes.get(testRecordKeyOf(link));
        if (outcome && isPassed(outcome)) continue;
        failedCoverage.push({ coveredId, ...toCoverageInfo(link), outcome: outcome?.kind ?? 'missing' });
      }
    }

    return {
      id: req.id,
      title: req.title,
      origin: req.origin,
      annotation: req.annotation,
      info: req.info,
      parents: index === undefined ? [] : graph.parents[index].map((p) => graph.ids[p]),
      children: index === undefined ? [] : graph.children[index].map((c) => graph.ids[c]),
      leaf: status?.leaf ?? true,
      deprecated: status?.deprecated ?? false,
      manual: status?.manual ?? false,
      traceInfo: {
        traced: status?.traced ?? false,
        fullyTraced: status?.fullyTraced ?? false,
        directTraces: (tracesByReq.get(req.id) ?? []).map(toTraceInfo).sort(byLocation),
        indirectTraces: indirectTraces.sort((a, b) => byLocation(a, b) || a.tracedId.localeCompare(b.tracedId)),
      },
      coverageInfo: {
        covered: status?.covered ?? false,
        fullyCovered: status?.fullyCovered ?? false,
        passed: status?.passedCovered ?? false,
        directCoverage: (coverageByReq.get(req.id) ?? []).map(toCoverageInfo),
        indirectCoverage,
        failedCoverage,
      },
      subtree: analysis.subtrees.get(req.id) ?? null,
      verifiedInfo: (verificationsByReq.get(req.id) ?? []).map((v) => ({
        reviewName: v.reviewName,
        reviewDate: v.reviewDate,
        comment: v.comment,
      })),
      valid: !(status?.invalid ?? false),
    };
  });

  const coversByTest = new Map<string, Set<string>>();
  for (const link of snapshot.coverage) {
    const key = testRecordKeyOf(link);
    const set = coversByTest.get(key) ?? new Set<string>();
    set.add(link.reqId);
    coversByTest.set(key, set);
  }

  const testRuns: TestRunInfo[] = analysis.testRuns.map(({ run, overview }) => ({
    name: run.name,
    date: run.date,
    logs: run.logs,
    meta: run.meta,
    overview,
    tests: snapshot.tests
      .filter((t) => t.testRunName === run.name && t.testRunDate === run.date)
      .map((t) => ({
        name: t.name,
        filepath: t.filepath,
        line: t.line,
        outcome: t.outcome,
        covers: Array.from(coversByTest.get(testRecordKeyOf(t)) ?? []).sort(),
      })),
  }));

  const reviews: ReviewInfo[] = snapshot.reviews.map((review) => ({
    ...review,
    verified: snapshot.verifications
      .filter((v) => v.reviewName === review.name && v.reviewDate === review.date)
      .map((v) => ({ reqId: v.reqId, comment: v.comment })),
  }));

  return {
    generation: snapshot.generation,
    creationDate: (options.creationDate ?? new Date()).toISOString(),
    overview: analysis.overview,
    requirements,
    tests: { overview: analysis.testOverview, testRuns },
    reviews,
    unrelated: snapshot.unrelated,
    validation: {
      isValid: analysis.invalid.length === 0,
      validationCriteria: VALIDATION_CRITERIA,
      invalidRequirements: analysis.invalid,
    },
    diagnostics: analysis.diagnostics,
    traceCriteria: TRACE_CRITERIA,
    testCoverageCriteria: TEST_COVERAGE_CRITERIA,
    testPassedCoverageCriteria: TEST_PASSED_COVERAGE_CRITERIA,
  };
}

export function renderJsonReport(context: ReportContext): string {
  return JSON.stringify(context, null, 2) + '\n';
}

