/**
 * One collection batch over every source listed in the project config.
 *
 * Linked requirements: REQ-SYNC-003
 */

import type { ProjectConfig } from '../core/config.js';
import { resolveProjectPath } from '../core/config.js';
import type { FactStore } from '../storage/store.js';
import { expandRecordPaths } from '../storage/files.js';
import { ingestRecordFiles, type IngestResult } from '../storage/ingest.js';
import type { RecordKind } from '../storage/records.js';
import { reconcile, type ReconcileResult } from './manager.js';

export interface CollectOptions {
  /** Delete facts the batch did not re-confirm. */
  confirm?: boolean;
}

export interface CollectResult {
  generation: number;
  ingested: Record<RecordKind, IngestResult>;
  reconciled: ReconcileResult;
}

/**
 * Ingest all configured record files under a fresh generation, then
 * reconcile against it. Ingestion is atomic: an invalid file leaves the
 * store untouched, including the batch counter.
 */
export function collect(
  store: FactStore,
  root: string,
  config: ProjectConfig,
  options: CollectOptions = {}
): CollectResult {
  const { generation, ingested } = store.transaction(() => {
    const generation = store.beginBatch();
    const ingest = (kind: RecordKind): IngestResult =>
      ingestRecordFiles(
        store,
        kind,
        expandRecordPaths(config[kind].map((p) => resolveProjectPath(root, p))),
        generation
      );
    // requirements before traces before coverage, so references resolve in one pass
    const ingested: Record<RecordKind, IngestResult> = {
      requirements: ingest('requirements'),
      traces: ingest('traces'),
      coverage: ingest('coverage'),
      reviews: ingest('reviews'),
    };
    return { generation, ingested };
  });

  const reconciled = reconcile(store, { generation, confirm: options.confirm });
  return { generation, ingested, reconciled };
}
