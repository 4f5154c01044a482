/**
 * Error types surfaced to callers.
 *
 * Structural errors (cycles, generation regressions) abort a batch.
 * Per-record anomalies are never thrown; they become Diagnostics.
 *
 * Linked requirements: REQ-CORE-006
 */

import type { HierarchyEdge } from './types.js';

export const ErrorCode = {
  CYCLIC_HIERARCHY: 'CYCLIC_HIERARCHY',
  STALE_GENERATION_CONFLICT: 'STALE_GENERATION_CONFLICT',
  DEPTH_EXCEEDED: 'DEPTH_EXCEEDED',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_CONFIG: 'INVALID_CONFIG',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ReqTraceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ReqTraceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CyclicHierarchyError extends ReqTraceError {
  constructor(
    public readonly edge: HierarchyEdge,
    public readonly cycle: string[]
  ) {
    super(
      `Requirement hierarchy contains a cycle at edge child='${edge.childId}' parent='${edge.parentId}' (${cycle.join(' -> ')})`,
      ErrorCode.CYCLIC_HIERARCHY,
      { childId: edge.childId, parentId: edge.parentId, cycle }
    );
    this.name = 'CyclicHierarchyError';
  }
}

export type GenerationFact = 'requirement' | 'trace' | 'batch';

export class StaleGenerationConflictError extends ReqTraceError {
  constructor(
    public readonly fact: GenerationFact,
    public readonly key: string,
    public readonly stored: number,
    public readonly attempted: number
  ) {
    super(
      `Generation regressed for ${fact} '${key}': stored ${stored}, attempted ${attempted}`,
      ErrorCode.STALE_GENERATION_CONFLICT,
      { fact, key, stored, attempted }
    );
    this.name = 'StaleGenerationConflictError';
  }
}

export class InputError extends ReqTraceError {
  constructor(
    public readonly file: string,
    public readonly issues: string[]
  ) {
    super(
      `Invalid input in '${file}':\n  ${issues.join('\n  ')}`,
      ErrorCode.INVALID_INPUT,
      { file, issues }
    );
    this.name = 'InputError';
  }
}

export class ConfigError extends ReqTraceError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_CONFIG, details);
    this.name = 'ConfigError';
  }
}

export class NotFoundError extends ReqTraceError {
  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`, ErrorCode.NOT_FOUND, { what, id });
    this.name = 'NotFoundError';
  }
}
