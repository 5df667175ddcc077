export type ParameterType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'datetime'
  | 'object'
  | 'array';

/** One entry of a delegate or callback function schema. */
export interface ParamSpec {
  name: string;
  description: string;
  type: ParameterType;
  required: boolean;
  /** Element schema when `type` is `array`. */
  items?: ParamSpec;
  /** Property schemas when `type` is `object`. */
  properties?: ParamSpec[];
}

export type DanglingBehavior = 'urge' | 'report-error' | 'pause';

export type ErrorReportingBehavior = 'pause' | 'report-error';

export type ParallelExecutionType = 'none' | 'parameter-based' | 'list-based' | 'external-list';

export type ParallelResultStrategy = 'stream-individual' | 'wait-for-all' | 'first-result-wins';

export interface ErrorReportingConfig {
  toolName: string;
  toolDescription: string;
  parameters: ParamSpec[];
  behavior: ErrorReportingBehavior;
  /**
   * Message sent to the parent session when behavior is `report-error`.
   * Supports `{FunctionName}`, `{SessionId}`, `{Timestamp}`, `{ErrorMessage}` and `{ErrorToolName}`.
   */
  customParentMessageTemplate?: string;
}

export interface ParallelConfig {
  executionType: ParallelExecutionType;
  /** Values <= 0 mean "one slot per CPU". */
  maxConcurrency: number;
  resultStrategy: ParallelResultStrategy;
  listParameterName?: string;
  externalList?: string[];
  excludedParameterNames: string[];
  sessionTimeoutMs: number;
}

export interface DelegationConfig {
  functionName: string;
  functionDescription: string;
  maxRecursionLevel: number;
  executiveAssistant?: string;
  inputParameters: ParamSpec[];
  returnToolName: string;
  returnToolDescription: string;
  returnParameters: ParamSpec[];
  promptMessage: string;
  urgingMessage: string;
  danglingBehavior: DanglingBehavior;
  errorMessage?: string;
  errorReporting?: ErrorReportingConfig;
  parallel?: ParallelConfig;
}

export interface ChildResult {
  success: boolean;
  errorMessage?: string;
  result?: string;
}

/** Unit of parallel work derived from the request. */
export interface WorkItem {
  name: string;
  value: unknown;
}

export interface WorkItemOutcome extends WorkItem {
  childResult?: ChildResult;
  startTime: Date;
  endTime: Date;
  exception?: Error;
}

export interface AggregateOutcome {
  success: boolean;
  errorMessage?: string;
  outcomes: WorkItemOutcome[];
  strategy: ParallelResultStrategy;
  totalCount: number;
  completedCount: number;
  failedCount: number;
  startTime: Date;
  endTime: Date;
}

export type ChildSessionState =
  | 'dispatched'
  | 'awaiting-tool'
  | 'paused'
  | 'succeeded'
  | 'failed-dangling'
  | 'failed-reported'
  | 'cancelled';

export type DelegationItemState = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export function isOutcomeSuccess(outcome: WorkItemOutcome): boolean {
  return outcome.childResult?.success === true;
}

export function outcomeDurationMs(outcome: Pick<WorkItemOutcome, 'startTime' | 'endTime'>): number {
  return outcome.endTime.getTime() - outcome.startTime.getTime();
}

export function serializeItemValue(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function describeWorkItem(item: WorkItem): string {
  return `${item.name}=${serializeItemValue(item.value) ?? 'null'}`;
}
