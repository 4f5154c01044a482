/**
 * Fact store backed by SQLite (better-sqlite3).
 *
 * Thin adapter: typed reads and writes over the tables in schema.ts. All
 * derivation happens outside, on snapshots.
 *
 * Linked requirements: REQ-STORE-001, REQ-STORE-002
 */

import Database from 'better-sqlite3';
import type {
  Annotation,
  CoverageLinkRow,
  FactSnapshot,
  HierarchyEdge,
  LineSpan,
  ManualVerificationRow,
  RequirementRow,
  ReviewRow,
  TestOutcome,
  TestRecordRow,
  TestRunRow,
  TraceKey,
  TraceRow,
  UnrelatedFacts,
  UnrelatedTraceRow,
} from '../core/types.js';
import { NotFoundError, StaleGenerationConflictError } from '../core/errors.js';
import { ALL_TABLES, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

interface RequirementDbRow {
  id: string;
  title: string;
  origin: string;
  annotation: string | null;
  info: string | null;
  generation: number;
  first_generation: number;
}

interface HierarchyDbRow {
  child_id: string;
  parent_id: string;
}

interface TraceDbRow {
  req_id: string;
  filepath: string;
  line: number;
  generation: number;
  first_generation: number;
  span_start: number | null;
  span_end: number | null;
  item_name: string | null;
}

type UnrelatedTraceDbRow = Omit<TraceDbRow, 'first_generation'>;

interface TestRunDbRow {
  name: string;
  date: string;
  expected_test_count: number;
  meta: string | null;
  logs: string | null;
}

interface TestDbRow {
  test_run_name: string;
  test_run_date: string;
  name: string;
  filepath: string;
  line: number;
  outcome: string;
  skip_reason: string | null;
}

interface CoverageDbRow {
  req_id: string;
  test_run_name: string;
  test_run_date: string;
  test_name: string;
  trace_filepath: string;
  trace_line: number;
}

interface ReviewDbRow {
  name: string;
  date: string;
  reviewer: string;
  comment: string | null;
}

interface VerificationDbRow {
  req_id: string;
  review_name: string;
  review_date: string;
  comment: string | null;
}

export interface RequirementInput {
  id: string;
  title: string;
  origin: string;
  annotation: Annotation | null;
  info: unknown;
}

export interface TraceInput extends TraceKey {
  lineSpan: LineSpan | null;
  itemName: string | null;
}

export type UpsertResult = 'added' | 'confirmed';

export interface PruneResult {
  testRuns: number;
  reviews: number;
}

function toAnnotation(value: string | null): Annotation | null {
  switch (value) {
    case 'manual':
    case 'deprecated':
      return value;
    case null:
      return null;
    default:
      throw new Error(`Corrupt annotation in fact store: '${value}'`);
  }
}

function toOutcome(kind: string, reason: string | null): TestOutcome {
  switch (kind) {
    case 'passed':
    case 'failed':
    case 'pending':
      return { kind };
    case 'skipped':
      return { kind, reason };
    default:
      throw new Error(`Corrupt test outcome in fact store: '${kind}'`);
  }
}

function parseJson(text: string | null): unknown {
  return text === null ? null : JSON.parse(text);
}

function toJson(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

function toSpan(start: number | null, end: number | null): LineSpan | null {
  return start === null || end === null ? null : { start, end };
}

function toRequirement(row: RequirementDbRow): RequirementRow {
  return {
    id: row.id,
    title: row.title,
    origin: row.origin,
    annotation: toAnnotation(row.annotation),
    info: parseJson(row.info),
    generation: row.generation,
    firstGeneration: row.first_generation,
  };
}

function toTrace(row: TraceDbRow): TraceRow {
  return {
    reqId: row.req_id,
    filepath: row.filepath,
    line: row.line,
    generation: row.generation,
    firstGeneration: row.first_generation,
    lineSpan: toSpan(row.span_start, row.span_end),
    itemName: row.item_name,
  };
}

function toUnrelatedTrace(row: UnrelatedTraceDbRow): UnrelatedTraceRow {
  return {
    reqId: row.req_id,
    filepath: row.filepath,
    line: row.line,
    generation: row.generation,
    lineSpan: toSpan(row.span_start, row.span_end),
    itemName: row.item_name,
  };
}

function toEdge(row: HierarchyDbRow): HierarchyEdge {
  return { childId: row.child_id, parentId: row.parent_id };
}

function toTestRun(row: TestRunDbRow): TestRunRow {
  return {
    name: row.name,
    date: row.date,
    expectedTestCount: row.expected_test_count,
    meta: parseJson(row.meta),
    logs: row.logs,
  };
}

function toTest(row: TestDbRow): TestRecordRow {
  return {
    testRunName: row.test_run_name,
    testRunDate: row.test_run_date,
    name: row.name,
    filepath: row.filepath,
    line: row.line,
    outcome: toOutcome(row.outcome, row.skip_reason),
  };
}

function toCoverage(row: CoverageDbRow): CoverageLinkRow {
  return {
    reqId: row.req_id,
    testRunName: row.test_run_name,
    testRunDate: row.test_run_date,
    name: row.test_name,
    traceFilepath: row.trace_filepath,
    traceLine: row.trace_line,
  };
}

function toReview(row: ReviewDbRow): ReviewRow {
  return { name: row.name, date: row.date, reviewer: row.reviewer, comment: row.comment };
}

function toVerification(row: VerificationDbRow): ManualVerificationRow {
  return {
    reqId: row.req_id,
    reviewName: row.review_name,
    reviewDate: row.review_date,
    comment: row.comment,
  };
}

export class FactStore {
  private constructor(private readonly db: Database.Database) {}

  /**
   * Open (or create) the store at `path`. `:memory:` gives a private
   * in-process database.
   */
  static open(path: string): FactStore {
    const db = new Database(path);
    db.pragma('foreign_keys = ON');
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA_SQL);
    db.prepare('INSERT OR IGNORE INTO Meta (key, value) VALUES (?, ?)').run(
      'schema_version',
      SCHEMA_VERSION
    );
    return new FactStore(db);
  }

  close(): void {
    this.db.close();
  }

  /**
   * Run `fn` in one write transaction; any throw rolls everything back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private all<Row>(sql: string, ...params: unknown[]): Row[] {
    return this.db.prepare<unknown[], Row>(sql).all(...params);
  }

  private get<Row>(sql: string, ...params: unknown[]): Row | undefined {
    return this.db.prepare<unknown[], Row>(sql).get(...params);
  }

  private run(sql: string, ...params: unknown[]): number {
    return this.db.prepare<unknown[]>(sql).run(...params).changes;
  }

  // Batches

  currentGeneration(): number {
    const row = this.get<{ generation: number | null }>(
      'SELECT max(generation) AS generation FROM Batches'
    );
    return row?.generation ?? 0;
  }

  /**
   * Record a new batch. Without `generation` the next one is allocated.
   *
   * @throws StaleGenerationConflictError if `generation` is not newer
   */
  beginBatch(generation?: number): number {
    const current = this.currentGeneration();
    const next = generation ?? current + 1;
    if (next <= current) {
      throw new StaleGenerationConflictError('batch', String(next), current, next);
    }
    this.run('INSERT INTO Batches (generation, started_at) VALUES (?, ?)', next, new Date().toISOString());
    return next;
  }

  hasBatch(generation: number): boolean {
    return this.get<{ one: number }>('SELECT 1 AS one FROM Batches WHERE generation = ?', generation) !== undefined;
  }

  /**
   * @throws NotFoundError if no batch was ever recorded for `generation`
   */
  requireBatch(generation: number): void {
    if (!this.hasBatch(generation)) throw new NotFoundError('Batch', String(generation));
  }

  // Requirements and hierarchy

  getRequirement(id: string): RequirementRow | null {
    const row = this.get<RequirementDbRow>('SELECT * FROM Requirements WHERE id = ?', id);
    return row ? toRequirement(row) : null;
  }

  requirementExists(id: string): boolean {
    return this.get<{ id: string }>('SELECT id FROM Requirements WHERE id = ?', id) !== undefined;
  }

  /**
   * Insert or re-confirm a requirement, stamping `generation`.
   *
   * @throws StaleGenerationConflictError if the stored generation is newer
   */
  upsertRequirement(input: RequirementInput, generation: number): UpsertResult {
    const existing = this.get<{ generation: number }>(
      'SELECT generation FROM Requirements WHERE id = ?',
      input.id
    );
    if (existing && existing.generation > generation) {
      throw new StaleGenerationConflictError('requirement', input.id, existing.generation, generation);
    }
    this.run(
      `INSERT INTO Requirements (id, title, origin, annotation, info, generation, first_generation)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         title = excluded.title,
         origin = excluded.origin,
         annotation = excluded.annotation,
         info = excluded.info,
         generation = excluded.generation`,
      input.id,
      input.title,
      input.origin,
      input.annotation,
      toJson(input.info),
      generation,
      generation
    );
    return existing ? 'confirmed' : 'added';
  }

  /**
   * Drop the stored parent edges of `childId`, quarantined ones included.
   */
  clearParents(childId: string): void {
    this.run('DELETE FROM RequirementHierarchies WHERE child_id = ?', childId);
    this.run('DELETE FROM UnrelatedHierarchies WHERE child_id = ?', childId);
  }

  insertHierarchyEdge(edge: HierarchyEdge): void {
    this.run(
      'INSERT OR IGNORE INTO RequirementHierarchies (child_id, parent_id) VALUES (?, ?)',
      edge.childId,
      edge.parentId
    );
  }

  insertUnrelatedHierarchyEdge(edge: HierarchyEdge): void {
    this.run(
      'INSERT OR IGNORE INTO UnrelatedHierarchies (child_id, parent_id) VALUES (?, ?)',
      edge.childId,
      edge.parentId
    );
  }

  deleteUnrelatedHierarchyEdge(edge: HierarchyEdge): void {
    this.run(
      'DELETE FROM UnrelatedHierarchies WHERE child_id = ? AND parent_id = ?',
      edge.childId,
      edge.parentId
    );
  }

  /**
   * Requirements last confirmed before `generation`, sorted by id.
   */
  staleRequirements(generation: number): RequirementRow[] {
    return this.all<RequirementDbRow>(
      'SELECT * FROM Requirements WHERE generation < ? ORDER BY id',
      generation
    ).map(toRequirement);
  }

  requirementsOfGeneration(generation: number): RequirementRow[] {
    return this.all<RequirementDbRow>(
      'SELECT * FROM Requirements WHERE generation = ? ORDER BY id',
      generation
    ).map(toRequirement);
  }

  /**
   * Delete requirements; hierarchy, traces, coverage and verifications
   * referencing them cascade.
   */
  deleteRequirement(id: string): number {
    return this.run('DELETE FROM Requirements WHERE id = ?', id);
  }

  // Traces

  traceExists(key: TraceKey): boolean {
    return (
      this.get<{ line: number }>(
        'SELECT line FROM Traces WHERE req_id = ? AND filepath = ? AND line = ?',
        key.reqId,
        key.filepath,
        key.line
      ) !== undefined
    );
  }

  /**
   * @throws StaleGenerationConflictError if the stored generation is newer
   */
  upsertTrace(input: TraceInput, generation: number): UpsertResult {
    const existing = this.get<{ generation: number }>(
      'SELECT generation FROM Traces WHERE req_id = ? AND filepath = ? AND line = ?',
      input.reqId,
      input.filepath,
      input.line
    );
    if (existing && existing.generation > generation) {
      throw new StaleGenerationConflictError(
        'trace',
        `${input.reqId}@${input.filepath}:${input.line}`,
        existing.generation,
        generation
      );
    }
    this.run(
      `INSERT INTO Traces (req_id, filepath, line, generation, first_generation, span_start, span_end, item_name)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(req_id, filepath, line) DO UPDATE SET
         generation = excluded.generation,
         span_start = excluded.span_start,
         span_end = excluded.span_end,
         item_name = excluded.item_name`,
      input.reqId,
      input.filepath,
      input.line,
      generation,
      generation,
      input.lineSpan?.start ?? null,
      input.lineSpan?.end ?? null,
      input.itemName
    );
    return existing ? 'confirmed' : 'added';
  }

  insertUnrelatedTrace(input: TraceInput, generation: number): void {
    this.run(
      `INSERT INTO UnrelatedTraces (req_id, filepath, line, generation, span_start, span_end, item_name)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(req_id, filepath, line) DO UPDATE SET generation = excluded.generation`,
      input.reqId,
      input.filepath,
      input.line,
      generation,
      input.lineSpan?.start ?? null,
      input.lineSpan?.end ?? null,
      input.itemName
    );
  }

  deleteUnrelatedTrace(key: TraceKey): void {
    this.run(
      'DELETE FROM UnrelatedTraces WHERE req_id = ? AND filepath = ? AND line = ?',
      key.reqId,
      key.filepath,
      key.line
    );
  }

  staleTraces(generation: number): TraceRow[] {
    return this.all<TraceDbRow>(
      'SELECT * FROM Traces WHERE generation < ? ORDER BY req_id, filepath, line',
      generation
    ).map(toTrace);
  }

  tracesOfGeneration(generation: number): TraceRow[] {
    return this.all<TraceDbRow>(
      'SELECT * FROM Traces WHERE generation = ? ORDER BY req_id, filepath, line',
      generation
    ).map(toTrace);
  }

  deleteTrace(key: TraceKey): number {
    return this.run(
      'DELETE FROM Traces WHERE req_id = ? AND filepath = ? AND line = ?',
      key.reqId,
      key.filepath,
      key.line
    );
  }

  // Test runs, tests and coverage

  upsertTestRun(run: TestRunRow): void {
    this.run(
      `INSERT INTO TestRuns (name, date, expected_test_count, meta, logs) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(name, date) DO UPDATE SET
         expected_test_count = excluded.expected_test_count,
         meta = excluded.meta,
         logs = excluded.logs`,
      run.name,
      run.date,
      run.expectedTestCount,
      toJson(run.meta),
      run.logs
    );
  }

  upsertTest(test: TestRecordRow): void {
    this.run(
      `INSERT INTO Tests (test_run_name, test_run_date, name, filepath, line, outcome, skip_reason)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(test_run_name, test_run_date, name) DO UPDATE SET
         filepath = excluded.filepath,
         line = excluded.line,
         outcome = excluded.outcome,
         skip_reason = excluded.skip_reason`,
      test.testRunName,
      test.testRunDate,
      test.name,
      test.filepath,
      test.line,
      test.outcome.kind,
      test.outcome.kind === 'skipped' ? test.outcome.reason : null
    );
  }

  insertCoverage(link: CoverageLinkRow): void {
    this.run(
      `INSERT OR IGNORE INTO TestCoverage
       (req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line)
       VALUES (?, ?, ?, ?, ?, ?)`,
      link.reqId,
      link.testRunName,
      link.testRunDate,
      link.name,
      link.traceFilepath,
      link.traceLine
    );
  }

  insertUnrelatedCoverage(link: CoverageLinkRow): void {
    this.run(
      `INSERT OR IGNORE INTO UnrelatedTestCoverage
       (req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line)
       VALUES (?, ?, ?, ?, ?, ?)`,
      link.reqId,
      link.testRunName,
      link.testRunDate,
      link.name,
      link.traceFilepath,
      link.traceLine
    );
  }

  deleteUnrelatedCoverage(link: CoverageLinkRow): void {
    this.run(
      `DELETE FROM UnrelatedTestCoverage
       WHERE req_id = ? AND test_run_name = ? AND test_run_date = ? AND test_name = ?
         AND trace_filepath = ? AND trace_line = ?`,
      link.reqId,
      link.testRunName,
      link.testRunDate,
      link.name,
      link.traceFilepath,
      link.traceLine
    );
  }

  // Reviews

  upsertReview(review: ReviewRow): void {
    this.run(
      `INSERT INTO Reviews (name, date, reviewer, comment) VALUES (?, ?, ?, ?)
       ON CONFLICT(name, date) DO UPDATE SET reviewer = excluded.reviewer, comment = excluded.comment`,
      review.name,
      review.date,
      review.reviewer,
      review.comment
    );
  }

  insertVerification(row: ManualVerificationRow): void {
    this.run(
      `INSERT INTO ManuallyVerified (req_id, review_name, review_date, comment) VALUES (?, ?, ?, ?)
       ON CONFLICT(req_id, review_name, review_date) DO UPDATE SET comment = excluded.comment`,
      row.reqId,
      row.reviewName,
      row.reviewDate,
      row.comment
    );
  }

  insertUnrelatedVerification(row: ManualVerificationRow): void {
    this.run(
      `INSERT INTO UnrelatedManuallyVerified (req_id, review_name, review_date, comment) VALUES (?, ?, ?, ?)
       ON CONFLICT(req_id, review_name, review_date) DO UPDATE SET comment = excluded.comment`,
      row.reqId,
      row.reviewName,
      row.reviewDate,
      row.comment
    );
  }

  deleteUnrelatedVerification(row: ManualVerificationRow): void {
    this.run(
      'DELETE FROM UnrelatedManuallyVerified WHERE req_id = ? AND review_name = ? AND review_date = ?',
      row.reqId,
      row.reviewName,
      row.reviewDate
    );
  }

  // Reads

  unrelated(): UnrelatedFacts {
    return {
      traces: this.all<UnrelatedTraceDbRow>(
        'SELECT * FROM UnrelatedTraces ORDER BY req_id, filepath, line'
      ).map(toUnrelatedTrace),
      hierarchy: this.all<HierarchyDbRow>(
        'SELECT * FROM UnrelatedHierarchies ORDER BY child_id, parent_id'
      ).map(toEdge),
      coverage: this.all<CoverageDbRow>(
        `SELECT * FROM UnrelatedTestCoverage
         ORDER BY req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line`
      ).map(toCoverage),
      verifications: this.all<VerificationDbRow>(
        'SELECT * FROM UnrelatedManuallyVerified ORDER BY req_id, review_name, review_date'
      ).map(toVerification),
    };
  }

  /**
   * Read every table inside one transaction so that no write can land
   * between the reads.
   */
  snapshot(): FactSnapshot {
    return this.transaction(() => ({
      generation: this.currentGeneration(),
      requirements: this.all<RequirementDbRow>('SELECT * FROM Requirements ORDER BY id').map(
        toRequirement
      ),
      hierarchy: this.all<HierarchyDbRow>(
        'SELECT * FROM RequirementHierarchies ORDER BY child_id, parent_id'
      ).map(toEdge),
      traces: this.all<TraceDbRow>('SELECT * FROM Traces ORDER BY req_id, filepath, line').map(
        toTrace
      ),
      testRuns: this.all<TestRunDbRow>('SELECT * FROM TestRuns ORDER BY name, date').map(toTestRun),
      tests: this.all<TestDbRow>(
        'SELECT * FROM Tests ORDER BY test_run_name, test_run_date, name'
      ).map(toTest),
      coverage: this.all<CoverageDbRow>(
        `SELECT * FROM TestCoverage
         ORDER BY req_id, test_run_name, test_run_date, test_name, trace_filepath, trace_line`
      ).map(toCoverage),
      reviews: this.all<ReviewDbRow>('SELECT * FROM Reviews ORDER BY name, date').map(toReview),
      verifications: this.all<VerificationDbRow>(
        'SELECT * FROM ManuallyVerified ORDER BY req_id, review_name, review_date'
      ).map(toVerification),
      unrelated: this.unrelated(),
    }));
  }

  // Maintenance

  /**
   * Delete test runs without any coverage left and reviews without any
   * verification left. Never run as part of reconciliation.
   */
  prune(): PruneResult {
    return this.transaction(() => {
      const testRuns = this.run(
        `DELETE FROM TestRuns WHERE NOT EXISTS (
           SELECT 1 FROM TestCoverage c WHERE c.test_run_name = TestRuns.name AND c.test_run_date = TestRuns.date
         ) AND NOT EXISTS (
           SELECT 1 FROM UnrelatedTestCoverage u WHERE u.test_run_name = TestRuns.name AND u.test_run_date = TestRuns.date
         )`
      );
      const reviews = this.run(
        `DELETE FROM Reviews WHERE NOT EXISTS (
           SELECT 1 FROM ManuallyVerified m WHERE m.review_name = Reviews.name AND m.review_date = Reviews.date
         ) AND NOT EXISTS (
           SELECT 1 FROM UnrelatedManuallyVerified u WHERE u.review_name = Reviews.name AND u.review_date = Reviews.date
         )`
      );
      return { testRuns, reviews };
    });
  }

  /**
   * Remove every collected fact.
   */
  clear(): void {
    this.transaction(() => {
      for (const table of ALL_TABLES) {
        this.run(`DELETE FROM ${table}`);
      }
    });
  }
}
