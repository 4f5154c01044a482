/**
 * Producer record formats and their validation.
 *
 * Linked requirements: REQ-STORE-003
 */

import { z } from 'zod';

const IsoDate = z
  .string()
  .datetime({ offset: true, message: 'expected an ISO-8601 date with time zone' })
  .transform((value) => new Date(value).toISOString());

const LineNumber = z.number().int().nonnegative();

export const RequirementRecordSchema = z.object({
  id: z.string().min(1),
  origin: z.string().min(1),
  title: z.string(),
  annotation: z.enum(['manual', 'deprecated']).optional(),
  parent_ids: z.array(z.string().min(1)).optional(),
  info: z.unknown().optional(),
});

export const RequirementFileSchema = z.object({
  requirements: z.array(RequirementRecordSchema),
});

export const TraceEntrySchema = z.object({
  ids: z.array(z.string().min(1)).min(1),
  line: LineNumber,
  item_name: z.string().optional(),
  line_span: z
    .object({ start: LineNumber, end: LineNumber })
    .refine((span) => span.start <= span.end, { message: 'line_span.start must not exceed end' })
    .optional(),
});

export const FileTracesSchema = z.object({
  filepath: z.string().min(1),
  traces: z.array(TraceEntrySchema),
});

export const TraceFileSchema = z.object({
  version: z.string().optional(),
  traces: z.array(FileTracesSchema),
});

const TestStateSchema = z.union([
  z.enum(['passed', 'failed', 'pending']),
  z.object({
    skipped: z.object({ reason: z.string().optional() }).strict(),
  }),
]);

export const CoveredTraceSchema = z.object({
  filepath: z.string().min(1),
  line: LineNumber,
  req_id: z.string().min(1),
});

export const TestRecordSchema = z.object({
  name: z.string().min(1),
  filepath: z.string().min(1),
  line: LineNumber,
  state: TestStateSchema,
  covered_traces: z.array(CoveredTraceSchema).default([]),
});

export const TestRunRecordSchema = z.object({
  name: z.string().min(1),
  date: IsoDate,
  expected_test_count: z.number().int().nonnegative(),
  meta: z.unknown().optional(),
  logs: z.string().optional(),
  tests: z.array(TestRecordSchema),
});

export const CoverageFileSchema = z.object({
  test_runs: z.array(TestRunRecordSchema),
});

export const ReviewFileSchema = z.object({
  name: z.string().min(1),
  date: IsoDate,
  reviewer: z.string().min(1),
  comment: z.string().optional(),
  requirements: z.array(
    z.object({
      id: z.string().min(1),
      comment: z.string().optional(),
    })
  ),
});

export type RequirementRecord = z.infer<typeof RequirementRecordSchema>;
export type RequirementFile = z.infer<typeof RequirementFileSchema>;
export type TraceEntry = z.infer<typeof TraceEntrySchema>;
export type FileTraces = z.infer<typeof FileTracesSchema>;
export type TraceFile = z.infer<typeof TraceFileSchema>;
export type TestState = z.infer<typeof TestStateSchema>;
export type TestRecord = z.infer<typeof TestRecordSchema>;
export type TestRunRecord = z.infer<typeof TestRunRecordSchema>;
export type CoverageFile = z.infer<typeof CoverageFileSchema>;
export type ReviewFile = z.infer<typeof ReviewFileSchema>;

/**
 * Record kinds a producer can hand in.
 */
export type RecordKind = 'requirements' | 'traces' | 'coverage' | 'reviews';

export const RECORD_KINDS: readonly RecordKind[] = ['requirements', 'traces', 'coverage', 'reviews'];

export function isRecordKind(value: string): value is RecordKind {
  return RECORD_KINDS.some((kind) => kind === value);
}
