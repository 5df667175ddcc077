import type { ChildResult, ParamSpec } from '../types/delegation.js';
import { ToolValidationError } from '../types/delegation-errors.js';
import type { ToolArguments, ToolFunction } from '../types/host.js';
import { logToolCall } from '../utils/logger.js';
import type { CompletionGate } from './completion-gate.js';
import { toJsonSchema } from './parameter-schema.js';
import { validateParameters, type ParameterValidationResult } from './parameter-validator.js';

export const MAX_VALIDATION_FAILURES = 5;
export const DEFAULT_REPORTED_ERROR_MESSAGE = 'An error was reported.';

export const DEFAULT_ERROR_PARAMETERS: readonly ParamSpec[] = [
  {
    name: 'error_message',
    description: 'Human readable description of the issue',
    type: 'string',
    required: true,
  },
  {
    name: 'error_type',
    description: 'Optional classification or category for the error',
    type: 'string',
    required: false,
  },
];

export interface CallbackToolOptions {
  sessionId: string;
  toolName: string;
  description: string;
  parameters: readonly ParamSpec[];
  gate: CompletionGate<ChildResult>;
}

/**
 * Base for the tools a child session calls to report back.
 *
 * Counts missing-required and type failures separately; either counter reaching
 * `MAX_VALIDATION_FAILURES` faults the gate.
 */
abstract class CallbackTool {
  protected readonly sessionId: string;
  protected readonly parameters: readonly ParamSpec[];
  protected readonly gate: CompletionGate<ChildResult>;
  readonly #toolName: string;
  readonly #description: string;
  #missingRequiredCount = 0;
  #typeErrorCount = 0;

  constructor(options: CallbackToolOptions) {
    const seen = new Set<string>();
    for (const param of options.parameters) {
      if (seen.has(param.name)) {
        throw new Error(`[CallbackTool] Duplicate parameter name '${param.name}' for tool '${options.toolName}'.`);
      }
      seen.add(param.name);
    }

    this.sessionId = options.sessionId;
    this.parameters = options.parameters;
    this.gate = options.gate;
    this.#toolName = options.toolName;
    this.#description = options.description;
  }

  get toolName(): string {
    return this.#toolName;
  }

  get missingRequiredCount(): number {
    return this.#missingRequiredCount;
  }

  get typeErrorCount(): number {
    return this.#typeErrorCount;
  }

  toToolFunction(): ToolFunction {
    return {
      definition: {
        name: this.#toolName,
        description: this.#description,
        parameters: toJsonSchema(this.parameters),
        params: [...this.parameters],
      },
      invoke: (args) => this.invoke(args),
    };
  }

  async invoke(args: ToolArguments): Promise<string> {
    const response = this.#handle(args ?? {});
    await logToolCall(`${this.#toolName}@${this.sessionId}`, args, response);
    return response;
  }

  protected abstract accept(filtered: ToolArguments): string;

  protected filterDeclared(args: ToolArguments): ToolArguments {
    const filtered: ToolArguments = {};
    for (const param of this.parameters) {
      if (Object.prototype.hasOwnProperty.call(args, param.name)) {
        filtered[param.name] = args[param.name];
      }
    }
    return filtered;
  }

  protected duplicateCallResponse(): string {
    return `Result for session ${this.sessionId} was already reported; this call was ignored.`;
  }

  #handle(args: ToolArguments): string {
    if (this.gate.isSettled) {
      return this.duplicateCallResponse();
    }

    const validation = validateParameters(this.parameters, args);
    if (validation.missingRequired.length > 0 || validation.typeErrors.length > 0) {
      return this.#rejectInvalid(validation);
    }

    return this.accept(this.filterDeclared(args));
  }

  #rejectInvalid(validation: ParameterValidationResult): string {
    const problems: string[] = [];
    const hasMissing = validation.missingRequired.length > 0;
    const hasTypeErrors = validation.typeErrors.length > 0;

    if (hasMissing) {
      this.#missingRequiredCount += 1;
      problems.push(`Missing required parameters: ${validation.missingRequired.join(', ')}`);
    }
    if (hasTypeErrors) {
      this.#typeErrorCount += 1;
      problems.push(`Type validation errors: ${validation.typeErrors.join('; ')}`);
    }

    const detail = problems.join(' AND ');
    const exhausted =
      (hasMissing && this.#missingRequiredCount >= MAX_VALIDATION_FAILURES) ||
      (hasTypeErrors && this.#typeErrorCount >= MAX_VALIDATION_FAILURES);

    if (exhausted) {
      this.gate.trySetFault(new ToolValidationError(this.#toolName, MAX_VALIDATION_FAILURES, detail));
      return `Validation failed: ${detail}. Session ${this.sessionId} will now close due to exceeded retry attempts.`;
    }

    return `Validation failed: ${detail}.`;
  }
}

/** Sets the child's result: the declared arguments as indented JSON. */
export class ReturnResultTool extends CallbackTool {
  protected accept(filtered: ToolArguments): string {
    const accepted = this.gate.trySet({
      success: true,
      result: JSON.stringify(filtered, null, 2),
    });
    if (!accepted) {
      return this.duplicateCallResponse();
    }
    return `Custom result set and returned to parent session. Session ${this.sessionId} will now close.`;
  }
}

/** Lets the child report that it cannot finish. What happens next depends on the configured behavior. */
export class ErrorReportTool extends CallbackTool {
  protected accept(filtered: ToolArguments): string {
    const raw = filtered.error_message;
    const message =
      raw === undefined || raw === null || String(raw).trim() === ''
        ? DEFAULT_REPORTED_ERROR_MESSAGE
        : String(raw);

    const accepted = this.gate.trySet({ success: false, errorMessage: message });
    if (!accepted) {
      return this.duplicateCallResponse();
    }
    return `Error reported to parent session. Session ${this.sessionId} will continue based on the configured behavior.`;
  }
}
