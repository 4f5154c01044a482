/**
 * Tests for record ingestion and quarantine.
 *
 * Linked requirements: REQ-STORE-002, REQ-STORE-004
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FactStore } from '../../src/storage/store.js';
import {
  ingestCoverage,
  ingestRequirements,
  ingestReview,
  ingestRecordFiles,
  ingestTraces,
  toTestOutcome,
} from '../../src/storage/ingest.js';
import { NotFoundError } from '../../src/core/errors.js';
import { CoverageFileSchema, type RequirementRecord } from '../../src/storage/records.js';

const DATE = '2024-05-01T10:00:00.000Z';

function req(id: string, parentIds?: string[]): RequirementRecord {
  return { id, title: id, origin: 'reqs.yaml', parent_ids: parentIds };
}

describe('ingestion', () => {
  let store: FactStore;

  beforeEach(() => {
    store = FactStore.open(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('ingestRequirements', () => {
    it('should link parents ingested in the same batch regardless of order', () => {
      const result = ingestRequirements(store, 1, [req('child', ['parent']), req('parent')]);

      expect(result).toEqual({ added: 2, confirmed: 0, quarantined: [] });
      expect(store.snapshot().hierarchy).toEqual([{ childId: 'child', parentId: 'parent' }]);
    });

    it('should quarantine edges to unknown parents', () => {
      const result = ingestRequirements(store, 1, [req('child', ['later'])]);

      expect(result.quarantined).toEqual([
        {
          kind: 'dangling-reference',
          fact: 'hierarchy',
          missing: 'later',
          message: "Parent 'later' of requirement 'child' is unknown",
        },
      ]);
      expect(store.unrelated().hierarchy).toEqual([{ childId: 'child', parentId: 'later' }]);
    });

    it('should replace parent edges on re-ingestion', () => {
      ingestRequirements(store, 1, [req('p1'), req('p2'), req('c', ['p1'])]);
      const result = ingestRequirements(store, 2, [req('c', ['p2'])]);

      expect(result.confirmed).toBe(1);
      expect(store.snapshot().hierarchy).toEqual([{ childId: 'c', parentId: 'p2' }]);
    });
  });

  describe('ingestTraces', () => {
    it('should store one trace per id and quarantine unknown ids', () => {
      ingestRequirements(store, 1, [req('A'), req('B')]);

      const result = ingestTraces(store, 1, [
        {
          filepath: 'src/x.ts',
          traces: [
            { ids: ['A', 'B'], line: 3, item_name: 'handler', line_span: { start: 4, end: 9 } },
            { ids: ['Z'], line: 20 },
          ],
        },
      ]);

      expect(result.added).toBe(2);
      expect(result.quarantined.map((d) => d.missing)).toEqual(['Z']);
      const traces = store.snapshot().traces;
      expect(traces.map((t) => t.reqId)).toEqual(['A', 'B']);
      expect(traces[0]).toMatchObject({ itemName: 'handler', lineSpan: { start: 4, end: 9 } });
      expect(store.unrelated().traces.map((t) => t.reqId)).toEqual(['Z']);
    });
  });

  describe('ingestCoverage', () => {
    it('should link tests to known traces and quarantine the rest', () => {
      ingestRequirements(store, 1, [req('A')]);
      ingestTraces(store, 1, [{ filepath: 'src/a.ts', traces: [{ ids: ['A'], line: 5 }] }]);

      const coverage = CoverageFileSchema.parse({
        test_runs: [
          {
            name: 'unit',
            date: '2024-05-01T12:00:00+02:00',
            expected_test_count: 2,
            tests: [
              {
                name: 'covers A',
                filepath: 'tests/a.test.ts',
                line: 1,
                state: 'passed',
                covered_traces: [
                  { filepath: 'src/a.ts', line: 5, req_id: 'A' },
                  { filepath: 'src/x.ts', line: 1, req_id: 'X' },
                ],
              },
            ],
          },
        ],
      });

      const result = ingestCoverage(store, coverage);

      expect(result.added).toBe(1);
      expect(result.quarantined.map((d) => d.missing)).toEqual(['X@src/x.ts:1']);
      const snapshot = store.snapshot();
      // dates are normalized to UTC
      expect(snapshot.testRuns[0].date).toBe(DATE);
      expect(snapshot.coverage).toEqual([
        {
          reqId: 'A',
          testRunName: 'unit',
          testRunDate: DATE,
          name: 'covers A',
          traceFilepath: 'src/a.ts',
          traceLine: 5,
        },
      ]);
    });
  });

  describe('ingestReview', () => {
    it('should record verifications and quarantine unknown requirements', () => {
      ingestRequirements(store, 1, [req('M')]);

      const result = ingestReview(store, {
        name: 'sign-off',
        date: DATE,
        reviewer: 'qa',
        requirements: [{ id: 'M', comment: 'checked by hand' }, { id: 'N' }],
      });

      expect(result.added).toBe(1);
      expect(result.quarantined.map((d) => d.fact)).toEqual(['verification']);
      expect(store.snapshot().verifications).toEqual([
        { reqId: 'M', reviewName: 'sign-off', reviewDate: DATE, comment: 'checked by hand' },
      ]);
    });
  });

  describe('toTestOutcome', () => {
    it('should map record states to outcomes', () => {
      expect(toTestOutcome('failed')).toEqual({ kind: 'failed' });
      expect(toTestOutcome({ skipped: {} })).toEqual({ kind: 'skipped', reason: null });
      expect(toTestOutcome({ skipped: { reason: 'slow' } })).toEqual({ kind: 'skipped', reason: 'slow' });
    });
  });

  describe('ingestRecordFiles', () => {
    it('should refuse a generation no batch recorded', () => {
      store.beginBatch();

      expect(() => ingestRecordFiles(store, 'traces', [], 9)).toThrow(NotFoundError);
      expect(store.currentGeneration()).toBe(1);
    });
  });
});
