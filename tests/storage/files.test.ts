/**
 * Tests for loading producer record files.
 *
 * Linked requirements: REQ-STORE-003
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  expandRecordPaths,
  loadCoverageFile,
  loadRequirementFile,
  loadReviewFile,
  loadTraceFile,
} from '../../src/storage/files.js';
import { InputError } from '../../src/core/errors.js';

describe('record files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reqtrace-files-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('should load requirements from YAML', () => {
    const filePath = write(
      'reqs.yaml',
      `requirements:
  - id: REQ-1
    origin: docs/reqs.md
    title: Login
    annotation: manual
  - id: REQ-1.1
    origin: docs/reqs.md
    title: Password login
    parent_ids: [REQ-1]
`
    );

    const file = loadRequirementFile(filePath);

    expect(file.requirements).toHaveLength(2);
    expect(file.requirements[0].annotation).toBe('manual');
    expect(file.requirements[1].parent_ids).toEqual(['REQ-1']);
  });

  it('should load traces from JSON', () => {
    const filePath = write(
      'traces.json',
      JSON.stringify({
        version: '1',
        traces: [{ filepath: 'src/a.ts', traces: [{ ids: ['REQ-1'], line: 4, line_span: { start: 5, end: 8 } }] }],
      })
    );

    const file = loadTraceFile(filePath);

    expect(file.traces[0].traces[0].line_span).toEqual({ start: 5, end: 8 });
  });

  it('should accept skipped and pending test states', () => {
    const filePath = write(
      'coverage.yaml',
      `test_runs:
  - name: unit
    date: 2024-05-01T10:00:00Z
    expected_test_count: 2
    tests:
      - name: slow
        filepath: tests/slow.test.ts
        line: 1
        state:
          skipped:
            reason: takes too long
      - name: hanging
        filepath: tests/hang.test.ts
        line: 1
        state: pending
`
    );

    const file = loadCoverageFile(filePath);

    expect(file.test_runs[0].date).toBe('2024-05-01T10:00:00.000Z');
    expect(file.test_runs[0].tests[0].state).toEqual({ skipped: { reason: 'takes too long' } });
    expect(file.test_runs[0].tests[1].covered_traces).toEqual([]);
  });

  it('should reject review dates without a time zone', () => {
    const filePath = write(
      'review.yaml',
      `name: audit
date: "2024-05-01T10:00:00"
reviewer: qa
requirements:
  - id: REQ-1
`
    );

    expect(() => loadReviewFile(filePath)).toThrow(InputError);
  });

  it('should name the failing field in validation errors', () => {
    const filePath = write('reqs.yaml', 'requirements:\n  - id: REQ-1\n    title: Missing origin\n');

    try {
      loadRequirementFile(filePath);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      if (err instanceof InputError) {
        expect(err.file).toBe(filePath);
        expect(err.issues).toEqual(['requirements.0.origin: Required']);
      }
    }
  });

  it('should reject a reversed line span', () => {
    const filePath = write(
      'traces.yaml',
      'traces:\n  - filepath: a.ts\n    traces:\n      - ids: [R]\n        line: 1\n        line_span: { start: 9, end: 2 }\n'
    );

    expect(() => loadTraceFile(filePath)).toThrow(/line_span.start must not exceed end/);
  });

  it('should report a missing file', () => {
    expect(() => loadTraceFile(join(dir, 'nope.yaml'))).toThrow(InputError);
  });

  it('should expand directories into sorted record files', () => {
    mkdirSync(join(dir, 'nested'));
    write('b.yaml', 'x: 1');
    write('a.json', '{}');
    write('notes.txt', 'ignored');
    write(join('nested', 'c.yml'), 'x: 1');
    const direct = join(dir, 'explicit.txt');

    expect(expandRecordPaths([dir, direct])).toEqual([
      join(dir, 'a.json'),
      join(dir, 'b.yaml'),
      join(dir, 'nested', 'c.yml'),
      direct,
    ]);
  });
});
