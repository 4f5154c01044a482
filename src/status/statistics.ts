/**
 * Overview numbers for requirements and test runs.
 *
 * A zero denominator yields a ratio of 0.0. The verified count is null
 * when there are no manual requirements to verify.
 *
 * Linked requirements: REQ-CORE-008
 */

import type {
  Diagnostic,
  ManualVerificationRow,
  TestOutcomeKind,
  TestRecordRow,
  TestRunRow,
} from '../core/types.js';
import type { RequirementGraph } from '../graph/closure.js';
import type { StatusMap } from './engine.js';

export interface RequirementsOverview {
  requirementCount: number;
  tracedCount: number;
  tracedRatio: number;
  coveredCount: number;
  coveredRatio: number;
  passedCount: number;
  passedRatio: number;
  verifiedCount: number | null;
  verifiedRatio: number;
}

export interface LeafChildOverview {
  leafCount: number;
  tracedLeafCount: number;
  tracedLeafRatio: number;
  coveredLeafCount: number;
  coveredLeafRatio: number;
  passedCoveredLeafCount: number;
  passedCoveredLeafRatio: number;
}

export interface TestRunOverview {
  expectedCount: number;
  ranCount: number;
  ranRatio: number;
  passedCount: number;
  passedRatio: number;
  failedCount: number;
  failedRatio: number;
  skippedCount: number;
  skippedRatio: number;
}

export function ratio(count: number, total: number): number {
  return total === 0 ? 0.0 : count / total;
}

/**
 * Global counts and ratios. Verification is measured against effectively
 * manual requirements only; several reviews of one requirement count once.
 */
export function requirementsOverview(
  statuses: StatusMap,
  verifications: readonly ManualVerificationRow[]
): RequirementsOverview {
  let tracedCount = 0;
  let coveredCount = 0;
  let passedCount = 0;
  let manualCount = 0;

  for (const status of statuses.values()) {
    if (status.traced) tracedCount++;
    if (status.covered) coveredCount++;
    if (status.passedCovered) passedCount++;
    if (status.manual) manualCount++;
  }

  const verified = new Set<string>();
  for (const v of verifications) {
    if (statuses.get(v.reqId)?.manual) verified.add(v.reqId);
  }

  const requirementCount = statuses.size;
  return {
    requirementCount,
    tracedCount,
    tracedRatio: ratio(tracedCount, requirementCount),
    coveredCount,
    coveredRatio: ratio(coveredCount, requirementCount),
    passedCount,
    passedRatio: ratio(passedCount, requirementCount),
    verifiedCount: manualCount === 0 ? null : verified.size,
    verifiedRatio: ratio(verified.size, manualCount),
  };
}

/**
 * Rollup over the leaf descendants of every non-leaf requirement.
 * Leaves have no subtree and get no entry.
 */
export function leafChildOverview(
  graph: RequirementGraph,
  statuses: StatusMap
): Map<string, LeafChildOverview> {
  const result = new Map<string, LeafChildOverview>();

  graph.ids.forEach((id, index) => {
    if (graph.leaves.has(index)) return;

    let leafCount = 0;
    let traced = 0;
    let covered = 0;
    let passed = 0;
    for (const d of graph.descendants[index]) {
      if (!graph.leaves.has(d)) continue;
      const status = statuses.get(graph.ids[d]);
      leafCount++;
      if (status?.directlyTraced) traced++;
      if (status?.directlyCovered) covered++;
      if (status?.passedCovered) passed++;
    }

    result.set(id, {
      leafCount,
      tracedLeafCount: traced,
      tracedLeafRatio: ratio(traced, leafCount),
      coveredLeafCount: covered,
      coveredLeafRatio: ratio(covered, leafCount),
      passedCoveredLeafCount: passed,
      passedCoveredLeafRatio: ratio(passed, leafCount),
    });
  });

  return result;
}

function emptyCounts(): Record<TestOutcomeKind, number> {
  return { passed: 0, failed: 0, skipped: 0, pending: 0 };
}

function toRunOverview(expectedCount: number, counts: Record<TestOutcomeKind, number>): TestRunOverview {
  // pending tests were started, so they ran; not having passed, they failed
  const ranCount = counts.passed + counts.failed + counts.pending;
  const failedCount = counts.failed + counts.pending;
  return {
    expectedCount,
    ranCount,
    ranRatio: ratio(ranCount, expectedCount),
    passedCount: counts.passed,
    passedRatio: ratio(counts.passed, expectedCount),
    failedCount,
    failedRatio: ratio(failedCount, expectedCount),
    skippedCount: counts.skipped,
    skippedRatio: ratio(counts.skipped, expectedCount),
  };
}

/**
 * Counts for one test run. `tests` may hold records of other runs; only
 * those belonging to `run` are counted.
 */
export function testRunOverview(run: TestRunRow, tests: readonly TestRecordRow[]): TestRunOverview {
  const counts = emptyCounts();
  for (const test of tests) {
    if (test.testRunName !== run.name || test.testRunDate !== run.date) continue;
    counts[test.outcome.kind]++;
  }
  return toRunOverview(run.expectedTestCount, counts);
}

/**
 * Sum of all test runs.
 */
export function overallTestOverview(
  runs: readonly TestRunRow[],
  tests: readonly TestRecordRow[]
): TestRunOverview {
  const counts = emptyCounts();
  const known = new Set(runs.map((r) => `${r.name}\u0000${r.date}`));
  for (const test of tests) {
    if (known.has(`${test.testRunName}\u0000${test.testRunDate}`)) counts[test.outcome.kind]++;
  }
  const expected = runs.reduce((sum, r) => sum + r.expectedTestCount, 0);
  return toRunOverview(expected, counts);
}

/**
 * Warnings for runs that reported fewer tests than expected, and for tests
 * that never left the pending state.
 */
export function testRunDiagnostics(
  runs: readonly TestRunRow[],
  tests: readonly TestRecordRow[]
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const run of runs) {
    const own = tests.filter((t) => t.testRunName === run.name && t.testRunDate === run.date);
    if (own.length < run.expectedTestCount) {
      diagnostics.push({
        kind: 'incomplete-test-run',
        testRunName: run.name,
        testRunDate: run.date,
        expected: run.expectedTestCount,
        reported: own.length,
        message: `Test run '${run.name}' (${run.date}) reported ${own.length} of ${run.expectedTestCount} expected tests`,
      });
    }
    for (const test of own) {
      if (test.outcome.kind !== 'pending') continue;
      diagnostics.push({
        kind: 'pending-test',
        testRunName: run.name,
        testRunDate: run.date,
        testName: test.name,
        message: `Test '${test.name}' in run '${run.name}' (${run.date}) never finished`,
      });
    }
  }
  return diagnostics;
}
