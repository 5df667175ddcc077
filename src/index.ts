export * from './types/delegation.js';
export * from './types/delegation-errors.js';
export * from './types/host.js';

export * from './config/delegation-config-schema.js';
export * from './config/delegation-config.js';

export { CompletionGate, type GateOutcome } from './core/completion-gate.js';
export {
  DEFAULT_ERROR_PARAMETERS,
  DEFAULT_REPORTED_ERROR_MESSAGE,
  ErrorReportTool,
  MAX_VALIDATION_FAILURES,
  ReturnResultTool,
} from './core/callback-tools.js';
export {
  BUILT_IN_EXCLUDED_PARAMETERS,
  EXTERNAL_LIST_ITEM_NAME,
  extractParallelSources,
} from './core/parallel-source-extractor.js';
export { toJsonSchema } from './core/parameter-schema.js';
export {
  hasValidationErrors,
  isAssignableTo,
  validateParameters,
  type ArgumentRecord,
  type ParameterValidationResult,
} from './core/parameter-validator.js';
export { buildTemplateBindings, renderPrompts, type RenderedPrompts } from './core/prompt-renderer.js';
export {
  assertRecursionAllowed,
  checkRecursion,
  currentRecursionLevel,
  MAX_ANCESTRY_DEPTH,
} from './core/recursion-guard.js';
export { formatFailure, formatParallelResult, STATUS_FAILED, STATUS_SUCCEEDED } from './core/result-formatter.js';

export {
  ChildSessionCoordinator,
  MAX_URGE_REMINDERS,
  runChildSession,
  type ChildSessionRequest,
} from './services/child-session-coordinator.js';
export { closeDb, getDb, openDatabase } from './services/db.js';
export { DelegationHandler, type DelegationHandlerOptions } from './services/delegation-handler.js';
export {
  DelegationJournal,
  type DelegationEventRecord,
  type DelegationRunRecord,
} from './services/delegation-journal.js';
export {
  DelegationToolInstance,
  DelegationToolRegistry,
  type DelegationToolDependencies,
} from './services/delegation-registry.js';
export {
  ALL_SESSIONS_FAILED_MESSAGE,
  ParallelOrchestrator,
  effectiveConcurrency,
  type WorkItemDispatcher,
} from './services/parallel-orchestrator.js';
export { LiquidTemplateEngine } from './services/template-engine.js';
