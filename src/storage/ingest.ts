/**
 * Ingestion of producer records into the fact store.
 *
 * Requirements and traces are stamped with the batch generation. Facts that
 * reference something not yet known are quarantined, never rejected.
 * Every call runs in one transaction.
 *
 * Linked requirements: REQ-STORE-002, REQ-STORE-004
 */

import { createLogger } from '../core/log.js';
import type { Diagnostic, TestOutcome } from '../core/types.js';
import type { FactStore } from './store.js';
import {
  loadCoverageFile,
  loadRequirementFile,
  loadReviewFile,
  loadTraceFile,
} from './files.js';
import type {
  CoverageFile,
  FileTraces,
  RecordKind,
  RequirementRecord,
  ReviewFile,
  TestState,
} from './records.js';

const log = createLogger('ingest');

export interface IngestResult {
  /** Rows inserted for the first time. */
  added: number;
  /** Existing rows re-confirmed or updated. */
  confirmed: number;
  /** Facts diverted to quarantine. */
  quarantined: Diagnostic[];
}

function emptyResult(): IngestResult {
  return { added: 0, confirmed: 0, quarantined: [] };
}

function report(kind: string, result: IngestResult): IngestResult {
  log.info(`${kind}: ${result.added} added, ${result.confirmed} confirmed`);
  if (result.quarantined.length > 0) {
    log.warn(`${kind}: ${result.quarantined.length} fact(s) quarantined until their referent exists`);
    for (const d of result.quarantined) log.debug(d.message);
  }
  return result;
}

/**
 * Start a new ingestion batch and return its generation.
 */
export function beginBatch(store: FactStore, generation?: number): number {
  const next = store.beginBatch(generation);
  log.debug(`batch ${next} started`);
  return next;
}

/**
 * Upsert requirements, then replace each requirement's parent edges.
 * A parent that does not exist yet is held as an unrelated hierarchy edge.
 */
export function ingestRequirements(
  store: FactStore,
  generation: number,
  records: readonly RequirementRecord[]
): IngestResult {
  const result = emptyResult();

  store.transaction(() => {
    for (const record of records) {
      const outcome = store.upsertRequirement(
        {
          id: record.id,
          title: record.title,
          origin: record.origin,
          annotation: record.annotation ?? null,
          info: record.info ?? null,
        },
        generation
      );
      if (outcome === 'added') result.added++;
      else result.confirmed++;
    }

    // all requirements of the batch exist before any edge is linked
    for (const record of records) {
      store.clearParents(record.id);
      for (const parentId of record.parent_ids ?? []) {
        const edge = { childId: record.id, parentId };
        if (store.requirementExists(parentId)) {
          store.insertHierarchyEdge(edge);
        } else {
          store.insertUnrelatedHierarchyEdge(edge);
          result.quarantined.push({
            kind: 'dangling-reference',
            fact: 'hierarchy',
            missing: parentId,
            message: `Parent '${parentId}' of requirement '${record.id}' is unknown`,
          });
        }
      }
    }
  });

  return report('requirements', result);
}

/**
 * Store one trace per requirement id of every entry.
 */
export function ingestTraces(
  store: FactStore,
  generation: number,
  files: readonly FileTraces[]
): IngestResult {
  const result = emptyResult();

  store.transaction(() => {
    for (const file of files) {
      for (const entry of file.traces) {
        for (const reqId of entry.ids) {
          const input = {
            reqId,
            filepath: file.filepath,
            line: entry.line,
            lineSpan: entry.line_span ?? null,
            itemName: entry.item_name ?? null,
          };
          if (store.requirementExists(reqId)) {
            if (store.upsertTrace(input, generation) === 'added') result.added++;
            else result.confirmed++;
          } else {
            store.insertUnrelatedTrace(input, generation);
            result.quarantined.push({
              kind: 'dangling-reference',
              fact: 'trace',
              missing: reqId,
              message: `Trace at ${file.filepath}:${entry.line} references unknown requirement '${reqId}'`,
            });
          }
        }
      }
    }
  });

  return report('traces', result);
}

export function toTestOutcome(state: TestState): TestOutcome {
  if (typeof state === 'string') {
    return { kind: state };
  }
  return { kind: 'skipped', reason: state.skipped.reason ?? null };
}

/**
 * Store test runs, their tests, and coverage links to known traces.
 * Test history is not generation-stamped.
 */
export function ingestCoverage(store: FactStore, coverage: CoverageFile): IngestResult {
  const result = emptyResult();

  store.transaction(() => {
    for (const run of coverage.test_runs) {
      store.upsertTestRun({
        name: run.name,
        date: run.date,
        expectedTestCount: run.expected_test_count,
        meta: run.meta ?? null,
        logs: run.logs ?? null,
      });
      if (run.tests.length < run.expected_test_count) {
        log.warn(
          `Test run '${run.name}' (${run.date}) reported ${run.tests.length} of ${run.expected_test_count} expected tests`
        );
      }

      for (const test of run.tests) {
        store.upsertTest({
          testRunName: run.name,
          testRunDate: run.date,
          name: test.name,
          filepath: test.filepath,
          line: test.line,
          outcome: toTestOutcome(test.state),
        });

        for (const covered of test.covered_traces) {
          const link = {
            reqId: covered.req_id,
            testRunName: run.name,
            testRunDate: run.date,
            name: test.name,
            traceFilepath: covered.filepath,
            traceLine: covered.line,
          };
          if (store.traceExists({ reqId: covered.req_id, filepath: covered.filepath, line: covered.line })) {
            store.insertCoverage(link);
            result.added++;
          } else {
            store.insertUnrelatedCoverage(link);
            result.quarantined.push({
              kind: 'dangling-reference',
              fact: 'coverage',
              missing: `${covered.req_id}@${covered.filepath}:${covered.line}`,
              message: `Test '${test.name}' covers unknown trace of '${covered.req_id}' at ${covered.filepath}:${covered.line}`,
            });
          }
        }
      }
    }
  });

  return report('coverage', result);
}

/**
 * Store a review and the requirements it verified.
 */
export function ingestReview(store: FactStore, review: ReviewFile): IngestResult {
  const result = emptyResult();

  store.transaction(() => {
    store.upsertReview({
      name: review.name,
      date: review.date,
      reviewer: review.reviewer,
      comment: review.comment ?? null,
    });

    for (const req of review.requirements) {
      const row = {
        reqId: req.id,
        reviewName: review.name,
        reviewDate: review.date,
        comment: req.comment ?? null,
      };
      if (store.requirementExists(req.id)) {
        store.insertVerification(row);
        result.added++;
      } else {
        store.insertUnrelatedVerification(row);
        result.quarantined.push({
          kind: 'dangling-reference',
          fact: 'verification',
          missing: req.id,
          message: `Review '${review.name}' verifies unknown requirement '${req.id}'`,
        });
      }
    }
  });

  return report('reviews', result);
}

function merge(into: IngestResult, from: IngestResult): IngestResult {
  into.added += from.added;
  into.confirmed += from.confirmed;
  into.quarantined.push(...from.quarantined);
  return into;
}

/**
 * Load and ingest record files of one kind. All files are validated before
 * anything is written. Requirement files are ingested together so parents
 * may live in another file.
 *
 * `generation` stamps requirements and traces; coverage and reviews ignore it.
 * It must be a recorded batch.
 */
export function ingestRecordFiles(
  store: FactStore,
  kind: RecordKind,
  paths: readonly string[],
  generation: number
): IngestResult {
  store.requireBatch(generation);
  switch (kind) {
    case 'requirements': {
      const records = paths.flatMap((p) => loadRequirementFile(p).requirements);
      return ingestRequirements(store, generation, records);
    }
    case 'traces': {
      const files = paths.flatMap((p) => loadTraceFile(p).traces);
      return ingestTraces(store, generation, files);
    }
    case 'coverage': {
      const loaded = paths.map(loadCoverageFile);
      return loaded.reduce((acc, file) => merge(acc, ingestCoverage(store, file)), emptyResult());
    }
    case 'reviews': {
      const loaded = paths.map(loadReviewFile);
      return loaded.reduce((acc, review) => merge(acc, ingestReview(store, review)), emptyResult());
    }
  }
}
