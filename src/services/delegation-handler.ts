import { assertRunnableConfig } from '../config/delegation-config-schema.js';
import { extractParallelSources } from '../core/parallel-source-extractor.js';
import {
  hasValidationErrors,
  validateParameters,
  type ArgumentRecord,
} from '../core/parameter-validator.js';
import { checkRecursion } from '../core/recursion-guard.js';
import { formatFailure, formatParallelResult, STATUS_SUCCEEDED } from '../core/result-formatter.js';
import type { DelegationConfig, ParallelConfig, WorkItem } from '../types/delegation.js';
import {
  ConfigurationError,
  DanglingExhaustedError,
  DelegationCancelledError,
  RecursionLimitExceededError,
  ToolValidationError,
  ValidationError,
  errorMessage,
} from '../types/delegation-errors.js';
import { isSessionHandle, type Host, type SessionHandle, type TemplateEngine } from '../types/host.js';
import { linkAbort } from '../utils/abort.js';
import { logThought } from '../utils/logger.js';
import { DEFAULT_PARENT_ERROR_MESSAGE, runChildSession } from './child-session-coordinator.js';
import type { DelegationJournal } from './delegation-journal.js';
import { ParallelOrchestrator } from './parallel-orchestrator.js';
import { LiquidTemplateEngine } from './template-engine.js';

export const SESSION_ARGUMENT = '_session';
export const NO_ASSISTANTS_MESSAGE = 'No assistants are available to handle the subtask.';
export const NO_PARALLEL_SOURCES_MESSAGE = 'No valid parameters for parallel execution.';

export interface DelegationHandlerOptions {
  host: Host;
  /** Read once per delegate call, so later updates apply to the next call only. */
  config: DelegationConfig | (() => DelegationConfig);
  contextSession?: SessionHandle;
  engine?: TemplateEngine;
  orchestrator?: ParallelOrchestrator;
  journal?: DelegationJournal;
}

/** Errors that escape `delegate` instead of being turned into a status string. */
function isPropagated(error: unknown): boolean {
  return (
    error instanceof ConfigurationError ||
    error instanceof DanglingExhaustedError ||
    error instanceof ToolValidationError ||
    error instanceof DelegationCancelledError
  );
}

function describeMissing(config: DelegationConfig, names: readonly string[]): string {
  return names
    .map((name) => {
      const description = config.inputParameters.find((param) => param.name === name)?.description;
      return description && description.trim() ? `'${name}' (${description})` : `'${name}'`;
    })
    .join(', ');
}

/**
 * Entry point behind the delegate tool function: checks the request, picks the
 * assistant and runs one child session or a parallel fan-out.
 */
export class DelegationHandler {
  readonly #host: Host;
  readonly #config: () => DelegationConfig;
  readonly #contextSession: SessionHandle | undefined;
  readonly #engine: TemplateEngine;
  readonly #orchestrator: ParallelOrchestrator;
  readonly #journal: DelegationJournal | undefined;

  constructor(options: DelegationHandlerOptions) {
    const config = options.config;
    this.#host = options.host;
    this.#config = typeof config === 'function' ? config : () => config;
    this.#contextSession = options.contextSession;
    this.#engine = options.engine ?? new LiquidTemplateEngine();
    this.#journal = options.journal;
    this.#orchestrator = options.orchestrator ?? new ParallelOrchestrator({ journal: options.journal });
  }

  async delegate(requestArgs: ArgumentRecord = {}, signal?: AbortSignal): Promise<string> {
    const config = this.#config();
    const sessionArgument = requestArgs[SESSION_ARGUMENT];
    const contextSession = isSessionHandle(sessionArgument) ? sessionArgument : this.#contextSession;
    if (!contextSession) {
      throw new ConfigurationError('[Delegation] A context session is required to delegate a subtask.');
    }

    assertRunnableConfig(config);

    try {
      await checkRecursion(contextSession, this.#host, config.maxRecursionLevel);
    } catch (error) {
      if (error instanceof RecursionLimitExceededError) {
        await logThought(`[Delegation] ${error.message}`);
        return formatFailure(error.message);
      }
      throw error;
    }

    const validation = this.#validateRequest(config, requestArgs);
    if (validation) {
      return formatFailure(validation.message);
    }

    const assistantName = await this.#selectAssistant(config, contextSession);
    if (!assistantName) {
      return formatFailure(NO_ASSISTANTS_MESSAGE);
    }

    const runSignal = linkAbort([signal, contextSession.cancellationControl()?.signal]);
    try {
      const parallel = config.parallel;
      if (parallel && parallel.executionType !== 'none') {
        return await this.#runParallel(config, parallel, requestArgs, contextSession, assistantName, runSignal.signal);
      }
      return await this.#runSingle(config, requestArgs, contextSession, assistantName, runSignal.signal);
    } catch (error) {
      if (isPropagated(error)) {
        throw error;
      }
      await logThought(`[Delegation] '${config.functionName}' failed: ${errorMessage(error)}`);
      return errorMessage(error);
    } finally {
      runSignal.dispose();
    }
  }

  #validateRequest(config: DelegationConfig, args: ArgumentRecord): ValidationError | undefined {
    const result = validateParameters(config.inputParameters, args);
    if (!hasValidationErrors(result)) {
      return undefined;
    }

    const problems: string[] = [];
    if (result.missingRequired.length > 0) {
      problems.push(`Missing required parameters: ${describeMissing(config, result.missingRequired)}`);
    }
    if (result.typeErrors.length > 0) {
      problems.push(`Type validation errors: ${result.typeErrors.join('; ')}`);
    }
    return new ValidationError(problems.join(' AND '), result.missingRequired, result.typeErrors);
  }

  /**
   * Configured executive assistant (must exist), else the context session's
   * first assistant, else the host's first assistant.
   */
  async #selectAssistant(config: DelegationConfig, contextSession: SessionHandle): Promise<string | undefined> {
    if (config.executiveAssistant) {
      const wanted = config.executiveAssistant.toLowerCase();
      const available = await this.#host.listAssistants();
      const match = available.find((assistant) => assistant.name.toLowerCase() === wanted);
      if (!match) {
        throw new ConfigurationError(
          `[Delegation] Configured assistant '${config.executiveAssistant}' is not available.`,
        );
      }
      return match.name;
    }

    const fromSession = contextSession.listAssistants()[0]?.name;
    if (fromSession) {
      return fromSession;
    }

    try {
      const available = await this.#host.listAssistants();
      return available[0]?.name;
    } catch (error) {
      await logThought(`[Delegation] Could not list assistants: ${errorMessage(error)}`);
      return undefined;
    }
  }

  async #runSingle(
    config: DelegationConfig,
    args: ArgumentRecord,
    contextSession: SessionHandle,
    assistantName: string,
    signal: AbortSignal,
  ): Promise<string> {
    const runId = this.#journal?.startRun({
      sessionId: contextSession.id,
      functionName: config.functionName,
      executionType: 'none',
      totalCount: 1,
    });
    const item: WorkItem = { name: config.functionName, value: null };

    if (runId) {
      this.#journal?.recordItem(runId, 0, item, 'running');
    }

    try {
      const result = await runChildSession({
        host: this.#host,
        parent: contextSession,
        assistantName,
        config,
        args,
        engine: this.#engine,
        signal,
      });

      const status = result.success
        ? STATUS_SUCCEEDED
        : formatFailure(result.errorMessage?.trim() ? result.errorMessage : DEFAULT_PARENT_ERROR_MESSAGE);
      if (runId && this.#journal) {
        const state = result.success ? 'completed' : 'failed';
        this.#journal.recordItem(runId, 0, item, state, result.result ?? result.errorMessage);
        this.#journal.closeRun(runId, state, status);
      }
      return status;
    } catch (error) {
      if (runId && this.#journal) {
        const state = error instanceof DelegationCancelledError ? 'cancelled' : 'failed';
        this.#journal.recordItem(runId, 0, item, state, errorMessage(error));
        this.#journal.closeRun(runId, state, errorMessage(error));
      }
      throw error;
    }
  }

  async #runParallel(
    config: DelegationConfig,
    parallel: ParallelConfig,
    args: ArgumentRecord,
    contextSession: SessionHandle,
    assistantName: string,
    signal: AbortSignal,
  ): Promise<string> {
    let sources: WorkItem[];
    try {
      sources = extractParallelSources(args, parallel);
    } catch (error) {
      return formatFailure(`Parallel execution failed: ${errorMessage(error)}`);
    }
    if (sources.length === 0) {
      return formatFailure(NO_PARALLEL_SOURCES_MESSAGE);
    }

    const runId = this.#journal?.startRun({
      sessionId: contextSession.id,
      functionName: config.functionName,
      executionType: parallel.executionType,
      strategy: parallel.resultStrategy,
      totalCount: sources.length,
    });

    try {
      const aggregate = await this.#orchestrator.run(
        sources,
        parallel,
        (item, itemSignal) =>
          runChildSession({
            host: this.#host,
            parent: contextSession,
            assistantName,
            config,
            args,
            engine: this.#engine,
            workItem: item,
            signal: itemSignal,
          }),
        { signal, parentSession: contextSession, runId },
      );

      const summary = formatParallelResult(aggregate);
      if (runId) {
        this.#journal?.finishRun(runId, aggregate, summary);
      }
      return summary;
    } catch (error) {
      if (runId) {
        this.#journal?.closeRun(
          runId,
          error instanceof DelegationCancelledError ? 'cancelled' : 'failed',
          errorMessage(error),
        );
      }
      throw error;
    }
  }
}
