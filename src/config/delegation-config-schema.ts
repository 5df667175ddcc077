import type {
  DanglingBehavior,
  DelegationConfig,
  ErrorReportingBehavior,
  ErrorReportingConfig,
  ParallelConfig,
  ParallelExecutionType,
  ParallelResultStrategy,
  ParamSpec,
  ParameterType,
} from '../types/delegation.js';
import { ConfigurationError } from '../types/delegation-errors.js';

type JsonRecord = Record<string, unknown>;

export const DEFAULT_FUNCTION_NAME = 'create_subtask';
export const DEFAULT_FUNCTION_DESCRIPTION =
  'Delegate a self-contained subtask to a child session and wait for its result';
export const DEFAULT_MAX_RECURSION_LEVEL = 1;
export const DEFAULT_RETURN_TOOL_NAME = 'set_result';
export const DEFAULT_RETURN_TOOL_DESCRIPTION = 'Report back with the result after completion';
export const DEFAULT_ERROR_TOOL_NAME = 'report_error';
export const DEFAULT_ERROR_TOOL_DESCRIPTION = 'Report an error or issue encountered during task execution';
export const DEFAULT_PROMPT_MESSAGE =
  'Complete the delegated subtask using the parameters you were given, then report back with the result.';
export const DEFAULT_SESSION_TIMEOUT_MS = 30 * 60_000;

const PARAMETER_TYPES: readonly ParameterType[] = [
  'string',
  'number',
  'integer',
  'boolean',
  'datetime',
  'object',
  'array',
];
const DANGLING_BEHAVIORS: readonly DanglingBehavior[] = ['urge', 'report-error', 'pause'];
const ERROR_BEHAVIORS: readonly ErrorReportingBehavior[] = ['pause', 'report-error'];
const EXECUTION_TYPES: readonly ParallelExecutionType[] = [
  'none',
  'parameter-based',
  'list-based',
  'external-list',
];
const RESULT_STRATEGIES: readonly ParallelResultStrategy[] = [
  'stream-individual',
  'wait-for-all',
  'first-result-wins',
];

export function defaultUrgingMessage(returnToolName: string): string {
  return `You have not reported a result yet. Call the ${returnToolName} tool now with your result.`;
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalString(
  parent: JsonRecord,
  key: string,
  path: string,
  fallback: string,
  errors: string[],
): string {
  const value = parent[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    errors.push(`${path} must be a string.`);
    return fallback;
  }
  return value;
}

function readOptionalInteger(
  parent: JsonRecord,
  key: string,
  path: string,
  fallback: number,
  errors: string[],
): number {
  const value = parent[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    errors.push(`${path} must be an integer.`);
    return fallback;
  }
  return value;
}

function readOptionalBoolean(
  parent: JsonRecord,
  key: string,
  path: string,
  fallback: boolean,
  errors: string[],
): boolean {
  const value = parent[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    errors.push(`${path} must be a boolean.`);
    return fallback;
  }
  return value;
}

function readEnum<T extends string>(
  parent: JsonRecord,
  key: string,
  path: string,
  allowed: readonly T[],
  fallback: T,
  errors: string[],
): T {
  const value = parent[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    errors.push(`${path} must be one of: ${allowed.join(', ')}.`);
    return fallback;
  }
  return match;
}

function readStringList(parent: JsonRecord, key: string, path: string, errors: string[]): string[] {
  const value = parent[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push(`${path} must be an array of strings.`);
    return [];
  }
  const strings: string[] = [];
  value.forEach((entry, index) => {
    if (typeof entry === 'string') {
      strings.push(entry);
    } else {
      errors.push(`${path}[${index}] must be a string.`);
    }
  });
  return strings;
}

function parseParamSpec(raw: unknown, path: string, errors: string[]): ParamSpec | null {
  if (!isRecord(raw)) {
    errors.push(`${path} must be an object.`);
    return null;
  }

  const name = readOptionalString(raw, 'name', `${path}.name`, '', errors);
  if (!name.trim()) {
    errors.push(`${path}.name must be a non-empty string.`);
  }

  const spec: ParamSpec = {
    name,
    description: readOptionalString(raw, 'description', `${path}.description`, '', errors),
    type: readEnum(raw, 'type', `${path}.type`, PARAMETER_TYPES, 'string', errors),
    required: readOptionalBoolean(raw, 'required', `${path}.required`, true, errors),
  };

  if (raw.items !== undefined && raw.items !== null) {
    const items = parseParamSpec(raw.items, `${path}.items`, errors);
    if (items) {
      spec.items = items;
    }
  }
  if (raw.properties !== undefined && raw.properties !== null) {
    spec.properties = parseParamList(raw.properties, `${path}.properties`, errors);
  }

  return spec;
}

function parseParamList(raw: unknown, path: string, errors: string[]): ParamSpec[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    errors.push(`${path} must be an array.`);
    return [];
  }
  return raw
    .map((entry, index) => parseParamSpec(entry, `${path}[${index}]`, errors))
    .filter((spec): spec is ParamSpec => spec !== null);
}

function parseErrorReporting(raw: unknown, errors: string[]): ErrorReportingConfig | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    errors.push('errorReporting must be an object.');
    return undefined;
  }

  const config: ErrorReportingConfig = {
    toolName: readOptionalString(raw, 'toolName', 'errorReporting.toolName', DEFAULT_ERROR_TOOL_NAME, errors),
    toolDescription: readOptionalString(
      raw,
      'toolDescription',
      'errorReporting.toolDescription',
      DEFAULT_ERROR_TOOL_DESCRIPTION,
      errors,
    ),
    parameters: parseParamList(raw.parameters, 'errorReporting.parameters', errors),
    behavior: readEnum(raw, 'behavior', 'errorReporting.behavior', ERROR_BEHAVIORS, 'pause', errors),
  };

  const template = readOptionalString(
    raw,
    'customParentMessageTemplate',
    'errorReporting.customParentMessageTemplate',
    '',
    errors,
  );
  if (template) {
    config.customParentMessageTemplate = template;
  }
  return config;
}

function parseParallel(raw: unknown, errors: string[]): ParallelConfig | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    errors.push('parallel must be an object.');
    return undefined;
  }

  const config: ParallelConfig = {
    executionType: readEnum(raw, 'executionType', 'parallel.executionType', EXECUTION_TYPES, 'none', errors),
    maxConcurrency: readOptionalInteger(raw, 'maxConcurrency', 'parallel.maxConcurrency', 0, errors),
    resultStrategy: readEnum(
      raw,
      'resultStrategy',
      'parallel.resultStrategy',
      RESULT_STRATEGIES,
      'wait-for-all',
      errors,
    ),
    excludedParameterNames: readStringList(
      raw,
      'excludedParameterNames',
      'parallel.excludedParameterNames',
      errors,
    ),
    sessionTimeoutMs: readOptionalInteger(
      raw,
      'sessionTimeoutMs',
      'parallel.sessionTimeoutMs',
      DEFAULT_SESSION_TIMEOUT_MS,
      errors,
    ),
  };

  if (config.sessionTimeoutMs <= 0) {
    errors.push('parallel.sessionTimeoutMs must be greater than 0.');
  }

  const listParameterName = readOptionalString(
    raw,
    'listParameterName',
    'parallel.listParameterName',
    '',
    errors,
  );
  if (listParameterName) {
    config.listParameterName = listParameterName;
  }
  if (raw.externalList !== undefined && raw.externalList !== null) {
    config.externalList = readStringList(raw, 'externalList', 'parallel.externalList', errors);
  }
  return config;
}

/**
 * Builds a `DelegationConfig` from untrusted JSON, filling defaults for absent
 * fields. Throws `ConfigurationError` listing every structural problem found.
 */
export function parseDelegationConfig(raw: unknown): DelegationConfig {
  const errors: string[] = [];
  const root: JsonRecord = isRecord(raw) ? raw : {};
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    errors.push('Delegation config must be a JSON object.');
  }

  const returnToolName = readOptionalString(
    root,
    'returnToolName',
    'returnToolName',
    DEFAULT_RETURN_TOOL_NAME,
    errors,
  );

  const config: DelegationConfig = {
    functionName: readOptionalString(root, 'functionName', 'functionName', DEFAULT_FUNCTION_NAME, errors),
    functionDescription: readOptionalString(
      root,
      'functionDescription',
      'functionDescription',
      DEFAULT_FUNCTION_DESCRIPTION,
      errors,
    ),
    maxRecursionLevel: readOptionalInteger(
      root,
      'maxRecursionLevel',
      'maxRecursionLevel',
      DEFAULT_MAX_RECURSION_LEVEL,
      errors,
    ),
    inputParameters: parseParamList(root.inputParameters, 'inputParameters', errors),
    returnToolName,
    returnToolDescription: readOptionalString(
      root,
      'returnToolDescription',
      'returnToolDescription',
      DEFAULT_RETURN_TOOL_DESCRIPTION,
      errors,
    ),
    returnParameters: parseParamList(root.returnParameters, 'returnParameters', errors),
    promptMessage: readOptionalString(root, 'promptMessage', 'promptMessage', DEFAULT_PROMPT_MESSAGE, errors),
    urgingMessage: readOptionalString(
      root,
      'urgingMessage',
      'urgingMessage',
      defaultUrgingMessage(returnToolName),
      errors,
    ),
    danglingBehavior: readEnum(root, 'danglingBehavior', 'danglingBehavior', DANGLING_BEHAVIORS, 'urge', errors),
  };

  const executiveAssistant = readOptionalString(root, 'executiveAssistant', 'executiveAssistant', '', errors);
  if (executiveAssistant.trim()) {
    config.executiveAssistant = executiveAssistant.trim();
  }
  const errorMessage = readOptionalString(root, 'errorMessage', 'errorMessage', '', errors);
  if (errorMessage) {
    config.errorMessage = errorMessage;
  }
  const errorReporting = parseErrorReporting(root.errorReporting, errors);
  if (errorReporting) {
    config.errorReporting = errorReporting;
  }
  const parallel = parseParallel(root.parallel, errors);
  if (parallel) {
    config.parallel = parallel;
  }

  if (errors.length > 0) {
    throw new ConfigurationError('Delegation config is invalid.', errors);
  }
  return config;
}

/** Defaults merged with `overrides`; handy for programmatic configs and tests. */
export function createDelegationConfig(overrides: Partial<DelegationConfig> = {}): DelegationConfig {
  const returnToolName = overrides.returnToolName ?? DEFAULT_RETURN_TOOL_NAME;
  return {
    ...parseDelegationConfig({}),
    urgingMessage: defaultUrgingMessage(returnToolName),
    ...overrides,
  };
}

/**
 * Problems that make a structurally valid config unusable for a delegate call.
 * Empty when the config can run.
 */
export function findRunnableConfigProblems(config: DelegationConfig): string[] {
  const problems: string[] = [];

  if (!Number.isInteger(config.maxRecursionLevel) || config.maxRecursionLevel < 0) {
    problems.push(`maxRecursionLevel must be a non-negative integer (got ${config.maxRecursionLevel}).`);
  }
  if (!config.returnToolName.trim()) {
    problems.push('returnToolName must be a non-empty string.');
  }
  if (config.danglingBehavior === 'urge' && !config.urgingMessage.trim()) {
    problems.push('UrgingMessage cannot be empty.');
  }

  const errorReporting = config.errorReporting;
  if (errorReporting) {
    const toolName = errorReporting.toolName.trim();
    if (!toolName) {
      problems.push('errorReporting.toolName is required when error reporting is enabled.');
    } else if (toolName.toLowerCase() === config.returnToolName.trim().toLowerCase()) {
      problems.push('errorReporting.toolName must differ from returnToolName.');
    }
    if (errorReporting.parameters.some((param) => !param.name.trim())) {
      problems.push('errorReporting.parameters must all have a name.');
    }
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const param of errorReporting.parameters) {
      const key = param.name.toLowerCase();
      if (seen.has(key)) {
        duplicates.add(param.name);
      }
      seen.add(key);
    }
    if (duplicates.size > 0) {
      problems.push(`errorReporting.parameters has duplicate names: ${[...duplicates].join(', ')}.`);
    }
  }

  const parallel = config.parallel;
  if (parallel) {
    if (!EXECUTION_TYPES.includes(parallel.executionType)) {
      problems.push(`Unsupported parallel execution type '${String(parallel.executionType)}'.`);
    }
    if (parallel.executionType !== 'none' && !RESULT_STRATEGIES.includes(parallel.resultStrategy)) {
      problems.push(`Unsupported result strategy '${String(parallel.resultStrategy)}'.`);
    }
    if (parallel.executionType === 'list-based' && !parallel.listParameterName?.trim()) {
      problems.push('ListParameterName must be specified for ListBased execution');
    }
    if (parallel.executionType === 'external-list' && (parallel.externalList ?? []).length === 0) {
      problems.push('ExternalStringList must not be null or empty');
    }
  }

  return problems;
}

export function assertRunnableConfig(config: DelegationConfig): void {
  const problems = findRunnableConfigProblems(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`[Delegation] Invalid configuration: ${problems.join(' ')}`, problems);
  }
}
