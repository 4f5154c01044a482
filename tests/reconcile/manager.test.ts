/**
 * Tests for generation reconciliation and quarantine promotion.
 *
 * Linked requirements: REQ-SYNC-001, REQ-SYNC-002
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NotFoundError } from '../../src/core/errors.js';
import { FactStore } from '../../src/storage/store.js';
import { ingestCoverage, ingestRequirements, ingestReview, ingestTraces } from '../../src/storage/ingest.js';
import { diffGeneration, findStale, promoteQuarantined, reconcile } from '../../src/reconcile/manager.js';

const DATE = '2024-05-01T10:00:00.000Z';

describe('reconciliation', () => {
  let store: FactStore;

  beforeEach(() => {
    store = FactStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  function batchWith(ids: string[]): number {
    const generation = store.beginBatch();
    ingestRequirements(
      store,
      generation,
      ids.map((id) => ({ id, title: id, origin: 'reqs.yaml' }))
    );
    ingestTraces(store, generation, [
      { filepath: 'src/main.ts', traces: ids.map((id, i) => ({ ids: [id], line: i + 1 })) },
    ]);
    return generation;
  }

  it('should find requirements the latest batch did not confirm', () => {
    batchWith(['A', 'B']);
    const g2 = batchWith(['A']);

    const stale = findStale(store, g2);

    expect(stale.requirements.map((r) => r.id)).toEqual(['B']);
    expect(stale.traces.map((t) => t.reqId)).toEqual(['B']);
  });

  it('should report a diff without deleting on a dry run', () => {
    batchWith(['A', 'B']);
    const g2 = batchWith(['A', 'C']);

    const result = reconcile(store);

    expect(result.deleted).toBe(false);
    expect(result.diff).toEqual({
      generation: g2,
      requirements: { added: ['C'], removed: ['B'], unchanged: ['A'] },
      traces: {
        added: ['C @ src/main.ts:2'],
        removed: ['B @ src/main.ts:2'],
        unchanged: ['A @ src/main.ts:1'],
      },
    });
    expect(store.requirementExists('B')).toBe(true);
  });

  it('should delete stale facts on confirm and leave history alone', () => {
    batchWith(['A', 'B']);
    store.upsertRequirement({ id: 'P', title: 'P', origin: 'reqs.yaml', annotation: null, info: null }, 1);
    store.insertHierarchyEdge({ childId: 'B', parentId: 'P' });
    ingestCoverage(store, {
      test_runs: [
        {
          name: 'unit',
          date: DATE,
          expected_test_count: 1,
          tests: [
            {
              name: 'covers B',
              filepath: 'tests/b.test.ts',
              line: 1,
              state: 'passed',
              covered_traces: [{ filepath: 'src/main.ts', line: 2, req_id: 'B' }],
            },
          ],
        },
      ],
    });
    ingestReview(store, { name: 'audit', date: DATE, reviewer: 'qa', requirements: [{ id: 'B' }] });
    const g2 = batchWith(['A', 'P']);

    const result = reconcile(store, { generation: g2, confirm: true });

    expect(result.deleted).toBe(true);
    const snapshot = store.snapshot();
    expect(snapshot.requirements.map((r) => r.id)).toEqual(['A', 'P']);
    expect(snapshot.hierarchy).toEqual([]);
    expect(snapshot.traces.map((t) => t.reqId)).toEqual(['A', 'P']);
    expect(snapshot.coverage).toEqual([]);
    expect(snapshot.verifications).toEqual([]);
    expect(snapshot.testRuns).toHaveLength(1);
    expect(snapshot.tests).toHaveLength(1);
    expect(snapshot.reviews).toHaveLength(1);
  });

  it('should delete a stale trace of a confirmed requirement', () => {
    const g1 = store.beginBatch();
    ingestRequirements(store, g1, [{ id: 'A', title: 'A', origin: 'reqs.yaml' }]);
    ingestTraces(store, g1, [{ filepath: 'src/old.ts', traces: [{ ids: ['A'], line: 7 }] }]);
    const g2 = batchWith(['A']);

    reconcile(store, { generation: g2, confirm: true });

    expect(store.snapshot().traces.map((t) => t.filepath)).toEqual(['src/main.ts']);
  });

  it('should list added facts as unchanged in a later generation', () => {
    const g1 = batchWith(['A']);
    batchWith(['A']);

    const diff = diffGeneration(store, g1);

    expect(diff.requirements).toEqual({ added: [], removed: [], unchanged: [] });
  });

  it('should promote quarantined coverage once its requirement and trace arrive', () => {
    batchWith(['A']);
    ingestCoverage(store, {
      test_runs: [
        {
          name: 'unit',
          date: DATE,
          expected_test_count: 1,
          tests: [
            {
              name: 'covers X',
              filepath: 'tests/x.test.ts',
              line: 3,
              state: 'passed',
              covered_traces: [{ filepath: 'src/x.ts', line: 9, req_id: 'X' }],
            },
          ],
        },
      ],
    });
    const g = store.beginBatch();
    ingestTraces(store, g, [{ filepath: 'src/x.ts', traces: [{ ids: ['X'], line: 9 }] }]);

    const before = reconcile(store);
    expect(before.unrelated.coverage).toHaveLength(1);
    expect(before.unrelated.traces).toHaveLength(1);
    expect(before.diagnostics).toHaveLength(2);

    ingestRequirements(store, g, [{ id: 'X', title: 'X', origin: 'reqs.yaml' }]);
    const after = reconcile(store);

    expect(after.promoted).toEqual({ traces: 1, hierarchy: 0, coverage: 1, verifications: 0 });
    expect(after.unrelated.coverage).toEqual([]);
    expect(after.diagnostics).toEqual([]);
    expect(store.snapshot().coverage.map((c) => c.reqId)).toEqual(['X']);
  });

  it('should promote hierarchy edges and verifications', () => {
    const g = store.beginBatch();
    ingestRequirements(store, g, [{ id: 'child', title: 'c', origin: 'reqs.yaml', parent_ids: ['parent'] }]);
    ingestReview(store, { name: 'audit', date: DATE, reviewer: 'qa', requirements: [{ id: 'parent' }] });
    ingestRequirements(store, g, [{ id: 'parent', title: 'p', origin: 'reqs.yaml' }]);

    const promoted = promoteQuarantined(store, g);

    expect(promoted).toEqual({ traces: 0, hierarchy: 1, coverage: 0, verifications: 1 });
    expect(store.snapshot().hierarchy).toEqual([{ childId: 'child', parentId: 'parent' }]);
    expect(store.snapshot().verifications.map((v) => v.reqId)).toEqual(['parent']);
  });

  it('should keep a promoted trace when a later confirm runs', () => {
    const g1 = store.beginBatch();
    ingestTraces(store, g1, [{ filepath: 'src/x.ts', traces: [{ ids: ['X'], line: 9 }] }]);
    const g2 = store.beginBatch();
    ingestRequirements(store, g2, [{ id: 'X', title: 'X', origin: 'reqs.yaml' }]);

    const dryRun = reconcile(store);
    expect(dryRun.promoted.traces).toBe(1);
    expect(dryRun.diff.traces).toEqual({ added: ['X @ src/x.ts:9'], removed: [], unchanged: [] });

    const confirmed = reconcile(store, { confirm: true });
    expect(confirmed.diff.traces.removed).toEqual([]);
    expect(store.snapshot().traces).toMatchObject([{ reqId: 'X', generation: g2, firstGeneration: g2 }]);
  });

  it('should reject a generation no batch recorded', () => {
    batchWith(['A']);

    expect(() => reconcile(store, { generation: 99, confirm: true })).toThrow(NotFoundError);
    expect(store.requirementExists('A')).toBe(true);
  });
});
