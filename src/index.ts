/**
 * reqtrace - requirement traceability over a generation-stamped fact store
 *
 * @packageDocumentation
 */

export type * from './core/types.js';
export {
  ReqTraceError,
  CyclicHierarchyError,
  StaleGenerationConflictError,
  InputError,
  ConfigError,
  NotFoundError,
  ErrorCode,
} from './core/errors.js';
export { loadConfig, parseConfig, findProjectRoot, type ProjectConfig } from './core/config.js';
export { createLogger, setLogLevel, type LogLevel, type Logger } from './core/log.js';
export {
  buildRequirementGraph,
  descendantsOf,
  ancestorsOf,
  leafDescendantsOf,
  type RequirementGraph,
  type ClosureOptions,
} from './graph/closure.js';
export { propagateAnnotations, type EffectiveAnnotations } from './graph/annotations.js';
export { computeStatus, invalidRequirements, type RequirementStatus, type StatusMap } from './status/engine.js';
export {
  requirementsOverview,
  leafChildOverview,
  testRunOverview,
  overallTestOverview,
  type RequirementsOverview,
  type LeafChildOverview,
  type TestRunOverview,
} from './status/statistics.js';
export { analyzeSnapshot, type SnapshotAnalysis } from './status/analysis.js';
export { FactStore } from './storage/store.js';
export {
  beginBatch,
  ingestRequirements,
  ingestTraces,
  ingestCoverage,
  ingestReview,
  ingestRecordFiles,
  type IngestResult,
} from './storage/ingest.js';
export { findStale, diffGeneration, reconcile, promoteQuarantined, type GenerationDiff } from './reconcile/manager.js';
export { collect } from './reconcile/collect.js';
export { buildReport, renderJsonReport, type ReportContext } from './export/report.js';
