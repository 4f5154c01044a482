/**
 * Generation-based reconciliation.
 *
 * Requirements and traces not re-confirmed by the current batch are stale.
 * Staleness is reported as a diff first; rows are deleted only on explicit
 * confirmation. Quarantined facts are re-checked on every run.
 *
 * Linked requirements: REQ-SYNC-001, REQ-SYNC-002
 */

import { createLogger } from '../core/log.js';
import { formatTraceKey, type Diagnostic, type RequirementRow, type TraceRow, type UnrelatedFacts } from '../core/types.js';
import type { FactStore } from '../storage/store.js';

const log = createLogger('reconcile');

export interface StaleFacts {
  requirements: RequirementRow[];
  traces: TraceRow[];
}

export interface ChangeSet<T> {
  added: T[];
  removed: T[];
  unchanged: T[];
}

export interface GenerationDiff {
  generation: number;
  requirements: ChangeSet<string>;
  traces: ChangeSet<string>;
}

export interface PromotionResult {
  traces: number;
  hierarchy: number;
  coverage: number;
  verifications: number;
}

export interface ReconcileOptions {
  /** Defaults to the store's current generation. */
  generation?: number;
  /** Delete stale rows. Without it nothing is deleted. */
  confirm?: boolean;
}

export interface ReconcileResult {
  diff: GenerationDiff;
  /** False for a dry run. */
  deleted: boolean;
  promoted: PromotionResult;
  /** Facts still quarantined after promotion. */
  unrelated: UnrelatedFacts;
  diagnostics: Diagnostic[];
}

/**
 * Requirements and traces last confirmed before `generation`.
 */
export function findStale(store: FactStore, generation: number): StaleFacts {
  return {
    requirements: store.staleRequirements(generation),
    traces: store.staleTraces(generation),
  };
}

/**
 * Compare the facts of `generation` with everything older.
 */
export function diffGeneration(store: FactStore, generation: number): GenerationDiff {
  const stale = findStale(store, generation);
  const currentReqs = store.requirementsOfGeneration(generation);
  const currentTraces = store.tracesOfGeneration(generation);

  return {
    generation,
    requirements: {
      added: currentReqs.filter((r) => r.firstGeneration === generation).map((r) => r.id),
      removed: stale.requirements.map((r) => r.id),
      unchanged: currentReqs.filter((r) => r.firstGeneration < generation).map((r) => r.id),
    },
    traces: {
      added: currentTraces.filter((t) => t.firstGeneration === generation).map(formatTraceKey),
      removed: stale.traces.map(formatTraceKey),
      unchanged: currentTraces.filter((t) => t.firstGeneration < generation).map(formatTraceKey),
    },
  };
}

/**
 * Move quarantined facts whose referent now exists into the primary
 * tables. Traces go first so coverage can link to promoted traces.
 * Promoted traces are stamped with `generation`, not the batch that
 * quarantined them.
 */
export function promoteQuarantined(store: FactStore, generation: number): PromotionResult {
  return store.transaction(() => {
    const promoted: PromotionResult = { traces: 0, hierarchy: 0, coverage: 0, verifications: 0 };
    const pending = store.unrelated();

    for (const trace of pending.traces) {
      if (!store.requirementExists(trace.reqId)) continue;
      if (!store.traceExists(trace)) store.upsertTrace(trace, generation);
      store.deleteUnrelatedTrace(trace);
      promoted.traces++;
    }

    for (const edge of pending.hierarchy) {
      if (!store.requirementExists(edge.parentId)) continue;
      store.insertHierarchyEdge(edge);
      store.deleteUnrelatedHierarchyEdge(edge);
      promoted.hierarchy++;
    }

    for (const link of pending.coverage) {
      if (!store.traceExists({ reqId: link.reqId, filepath: link.traceFilepath, line: link.traceLine })) {
        continue;
      }
      store.insertCoverage(link);
      store.deleteUnrelatedCoverage(link);
      promoted.coverage++;
    }

    for (const verification of pending.verifications) {
      if (!store.requirementExists(verification.reqId)) continue;
      store.insertVerification(verification);
      store.deleteUnrelatedVerification(verification);
      promoted.verifications++;
    }

    return promoted;
  });
}

/**
 * Diagnostics for every fact still in quarantine.
 */
export function quarantineDiagnostics(unrelated: UnrelatedFacts): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const t of unrelated.traces) {
    diagnostics.push({
      kind: 'dangling-reference',
      fact: 'trace',
      missing: t.reqId,
      message: `Trace at ${t.filepath}:${t.line} references unknown requirement '${t.reqId}'`,
    });
  }
  for (const e of unrelated.hierarchy) {
    diagnostics.push({
      kind: 'dangling-reference',
      fact: 'hierarchy',
      missing: e.parentId,
      message: `Parent '${e.parentId}' of requirement '${e.childId}' is unknown`,
    });
  }
  for (const c of unrelated.coverage) {
    diagnostics.push({
      kind: 'dangling-reference',
      fact: 'coverage',
      missing: `${c.reqId}@${c.traceFilepath}:${c.traceLine}`,
      message: `Test '${c.name}' covers unknown trace of '${c.reqId}' at ${c.traceFilepath}:${c.traceLine}`,
    });
  }
  for (const v of unrelated.verifications) {
    diagnostics.push({
      kind: 'dangling-reference',
      fact: 'verification',
      missing: v.reqId,
      message: `Review '${v.reviewName}' verifies unknown requirement '${v.reqId}'`,
    });
  }
  return diagnostics;
}

/**
 * Promote quarantined facts, then report stale facts against `generation`
 * and, with `confirm`, delete them (cascading to hierarchy, coverage and
 * verification rows). Test runs and reviews are never deleted here.
 *
 * @throws NotFoundError if `generation` is not a recorded batch
 */
export function reconcile(store: FactStore, options: ReconcileOptions = {}): ReconcileResult {
  const generation = options.generation ?? store.currentGeneration();
  if (options.generation !== undefined) store.requireBatch(generation);

  const promoted = promoteQuarantined(store, generation);
  const diff = diffGeneration(store, generation);
  const deleted = options.confirm === true;

  if (deleted) {
    store.transaction(() => {
      // traces first: a trace whose requirement is also stale is gone via cascade
      for (const trace of findStale(store, generation).traces) store.deleteTrace(trace);
      for (const id of diff.requirements.removed) store.deleteRequirement(id);
    });
    log.info(
      `deleted ${diff.requirements.removed.length} requirement(s) and ${diff.traces.removed.length} trace(s) older than generation ${generation}`
    );
  } else if (diff.requirements.removed.length > 0 || diff.traces.removed.length > 0) {
    log.info('dry run: nothing deleted, confirm to remove stale facts');
  }

  const unrelated = store.unrelated();
  const diagnostics = quarantineDiagnostics(unrelated);
  if (diagnostics.length > 0) {
    log.warn(`${diagnostics.length} fact(s) remain quarantined`);
  }

  return { diff, deleted, promoted, unrelated, diagnostics };
}
