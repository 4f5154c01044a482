/**
 * Core type definitions for requirements, traces and test evidence.
 *
 * Linked requirements: REQ-CORE-001, REQ-CORE-002
 */

/**
 * Self-declared requirement markers. Not inherited on the row itself;
 * see graph/annotations.ts for the effective sets.
 */
export type Annotation = 'manual' | 'deprecated';

/**
 * Outcome of a single test within a test run.
 *
 * `pending` means the run reported the test but never finalized it.
 */
export type TestOutcome =
  | { kind: 'passed' }
  | { kind: 'failed' }
  | { kind: 'skipped'; reason: string | null }
  | { kind: 'pending' };

export type TestOutcomeKind = TestOutcome['kind'];

/**
 * Contiguous lines in a source file affected by a trace
 * (e.g. the body of a function whose doc comment holds the trace).
 */
export interface LineSpan {
  start: number;
  end: number;
}

export interface RequirementRow {
  id: string;
  title: string;
  /** Provenance URI of the requirement definition. */
  origin: string;
  annotation: Annotation | null;
  /** Free-form JSON kept alongside the requirement. */
  info: unknown;
  /** Last batch that confirmed the requirement. */
  generation: number;
  /** Batch that first created the requirement. */
  firstGeneration: number;
}

export interface HierarchyEdge {
  childId: string;
  parentId: string;
}

export interface TraceKey {
  reqId: string;
  filepath: string;
  line: number;
}

export interface TraceRow extends TraceKey {
  generation: number;
  firstGeneration: number;
  lineSpan: LineSpan | null;
  itemName: string | null;
}

export interface TestRunKey {
  name: string;
  /** ISO-8601, normalized to UTC. */
  date: string;
}

export interface TestRunRow extends TestRunKey {
  expectedTestCount: number;
  meta: unknown;
  logs: string | null;
}

export interface TestRecordKey {
  testRunName: string;
  testRunDate: string;
  name: string;
}

export interface TestRecordRow extends TestRecordKey {
  filepath: string;
  line: number;
  outcome: TestOutcome;
}

export interface CoverageLinkRow extends TestRecordKey {
  reqId: string;
  traceFilepath: string;
  traceLine: number;
}

export interface ReviewKey {
  name: string;
  /** ISO-8601, normalized to UTC. */
  date: string;
}

export interface ReviewRow extends ReviewKey {
  reviewer: string;
  comment: string | null;
}

export interface ManualVerificationRow {
  reqId: string;
  reviewName: string;
  reviewDate: string;
  comment: string | null;
}

/**
 * Trace whose requirement was unknown at ingestion time.
 */
export interface UnrelatedTraceRow extends TraceKey {
  generation: number;
  lineSpan: LineSpan | null;
  itemName: string | null;
}

/**
 * Hierarchy edge whose parent was unknown when the child was ingested.
 */
export type UnrelatedHierarchyRow = HierarchyEdge;

/**
 * Facts held back until their referent is ingested.
 */
export interface UnrelatedFacts {
  traces: UnrelatedTraceRow[];
  hierarchy: UnrelatedHierarchyRow[];
  coverage: CoverageLinkRow[];
  verifications: ManualVerificationRow[];
}

/**
 * Every fact table, read under one transaction.
 */
export interface FactSnapshot {
  generation: number;
  requirements: RequirementRow[];
  hierarchy: HierarchyEdge[];
  traces: TraceRow[];
  testRuns: TestRunRow[];
  tests: TestRecordRow[];
  coverage: CoverageLinkRow[];
  reviews: ReviewRow[];
  verifications: ManualVerificationRow[];
  unrelated: UnrelatedFacts;
}

/**
 * Per-record anomaly that was recovered locally instead of aborting.
 */
export type Diagnostic =
  | {
      kind: 'dangling-reference';
      fact: 'trace' | 'hierarchy' | 'coverage' | 'verification';
      /** Identifier of the missing referent. */
      missing: string;
      message: string;
    }
  | {
      kind: 'incomplete-test-run';
      testRunName: string;
      testRunDate: string;
      expected: number;
      reported: number;
      message: string;
    }
  | {
      kind: 'pending-test';
      testRunName: string;
      testRunDate: string;
      testName: string;
      message: string;
    };

export function traceKeyOf(row: TraceKey): string {
  return `${row.reqId}\u0000${row.filepath}\u0000${row.line}`;
}

export function testRecordKeyOf(row: TestRecordKey): string {
  return `${row.testRunName}\u0000${row.testRunDate}\u0000${row.name}`;
}

export function formatTraceKey(row: TraceKey): string {
  return `${row.reqId} @ ${row.filepath}:${row.line}`;
}

export function isPassed(outcome: TestOutcome): boolean {
  switch (outcome.kind) {
    case 'passed':
      return true;
    case 'failed':
    case 'skipped':
    case 'pending':
      return false;
  }
}
