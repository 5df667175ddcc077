import { ErrorReportTool, ReturnResultTool, DEFAULT_ERROR_PARAMETERS } from '../core/callback-tools.js';
import { CompletionGate, type GateOutcome } from '../core/completion-gate.js';
import { renderPrompts } from '../core/prompt-renderer.js';
import type { ArgumentRecord } from '../core/parameter-validator.js';
import type {
  ChildResult,
  ChildSessionState,
  DelegationConfig,
  ErrorReportingConfig,
  WorkItem,
} from '../types/delegation.js';
import {
  ConfigurationError,
  DanglingExhaustedError,
  DelegationCancelledError,
} from '../types/delegation-errors.js';
import type { Host, SessionHandle, TemplateEngine, ToolFunction } from '../types/host.js';
import { logThought } from '../utils/logger.js';

export const MAX_URGE_REMINDERS = 3;
export const CALLBACK_TOOL_GROUP = 'subtask-callbacks';
export const DEFAULT_PARENT_ERROR_MESSAGE = 'The child session reported an error.';
export const DEFAULT_DANGLING_ERROR_MESSAGE = 'The child session ended without reporting a result.';

const ALLOWED_TRANSITIONS: Record<ChildSessionState, ChildSessionState[]> = {
  dispatched: ['awaiting-tool', 'cancelled'],
  'awaiting-tool': ['succeeded', 'failed-dangling', 'failed-reported', 'paused', 'cancelled'],
  paused: ['paused', 'succeeded', 'failed-dangling', 'failed-reported', 'cancelled'],
  succeeded: [],
  'failed-dangling': [],
  'failed-reported': [],
  cancelled: [],
};

type WatchEvent =
  | { kind: 'return'; outcome: GateOutcome<ChildResult> }
  | { kind: 'error'; outcome: GateOutcome<ChildResult> }
  | { kind: 'send'; error?: unknown }
  | { kind: 'cancel' };

type WatchKind = WatchEvent['kind'];

export interface ChildSessionCoordinatorOptions {
  session: SessionHandle;
  config: DelegationConfig;
  prompt: string;
  urgingMessage: string;
  signal?: AbortSignal;
  onStateChange?: (state: ChildSessionState, detail: string) => void;
}

/** Fills `{FunctionName}`, `{SessionId}`, `{Timestamp}`, `{ErrorMessage}` and `{ErrorToolName}`. */
export function applyParentErrorTemplate(
  template: string,
  values: {
    functionName: string;
    sessionId: string;
    errorMessage: string;
    errorToolName: string;
    timestamp?: Date;
  },
): string {
  return template
    .replaceAll('{FunctionName}', values.functionName)
    .replaceAll('{SessionId}', values.sessionId)
    .replaceAll('{Timestamp}', (values.timestamp ?? new Date()).toISOString())
    .replaceAll('{ErrorMessage}', values.errorMessage)
    .replaceAll('{ErrorToolName}', values.errorToolName);
}

/**
 * Drives one child session from its first message to a terminal state.
 *
 * Each wait races the return gate, the error gate, the in-flight message round
 * trip and cancellation. Watches that did not fire stay armed for the next wait.
 */
export class ChildSessionCoordinator {
  readonly #session: SessionHandle;
  readonly #config: DelegationConfig;
  readonly #prompt: string;
  readonly #urgingMessage: string;
  readonly #signal: AbortSignal | undefined;
  readonly #onStateChange: ChildSessionCoordinatorOptions['onStateChange'];
  readonly #returnGate = new CompletionGate<ChildResult>();
  readonly #errorGate: CompletionGate<ChildResult> | undefined;
  readonly #returnTool: ReturnResultTool;
  readonly #errorTool: ErrorReportTool | undefined;
  #state: ChildSessionState = 'dispatched';
  #remindersSent = 0;
  #started = false;

  constructor(options: ChildSessionCoordinatorOptions) {
    this.#session = options.session;
    this.#config = options.config;
    this.#prompt = options.prompt;
    this.#urgingMessage = options.urgingMessage;
    this.#signal = options.signal;
    this.#onStateChange = options.onStateChange;

    this.#returnTool = new ReturnResultTool({
      sessionId: this.#session.id,
      toolName: this.#config.returnToolName,
      description: this.#config.returnToolDescription,
      parameters: this.#config.returnParameters,
      gate: this.#returnGate,
    });

    const errorReporting = this.#config.errorReporting;
    if (errorReporting) {
      this.#errorGate = new CompletionGate<ChildResult>();
      this.#errorTool = new ErrorReportTool({
        sessionId: this.#session.id,
        toolName: errorReporting.toolName,
        description: errorReporting.toolDescription,
        parameters:
          errorReporting.parameters.length > 0 ? errorReporting.parameters : DEFAULT_ERROR_PARAMETERS,
        gate: this.#errorGate,
      });
    }
  }

  get state(): ChildSessionState {
    return this.#state;
  }

  get remindersSent(): number {
    return this.#remindersSent;
  }

  get tools(): ToolFunction[] {
    const tools = [this.#returnTool.toToolFunction()];
    if (this.#errorTool) {
      tools.push(this.#errorTool.toToolFunction());
    }
    return tools;
  }

  async run(): Promise<ChildResult> {
    if (this.#started) {
      throw new Error(`[ChildSession] Session ${this.#session.id} has already been started.`);
    }
    this.#started = true;

    if (this.#signal?.aborted) {
      this.#transition('cancelled', 'Cancelled before dispatch.');
      throw new DelegationCancelledError(this.#signal.reason);
    }

    this.#session.registerTools(new Map([[CALLBACK_TOOL_GROUP, this.tools]]));
    this.#session.toolExecutionMode = 'require-any';

    const cancellation = this.#watchCancellation();
    const watches = new Map<WatchKind, Promise<WatchEvent>>();
    watches.set(
      'return',
      this.#returnGate.promise.then((outcome): WatchEvent => ({ kind: 'return', outcome })),
    );
    if (this.#errorGate) {
      watches.set(
        'error',
        this.#errorGate.promise.then((outcome): WatchEvent => ({ kind: 'error', outcome })),
      );
    }
    if (cancellation.promise) {
      watches.set('cancel', cancellation.promise);
    }
    watches.set('send', this.#send(this.#prompt));
    this.#transition('awaiting-tool', 'Initial prompt sent.');

    try {
      return await this.#awaitTerminal(watches);
    } finally {
      cancellation.dispose();
      this.#stopChildActivity();
    }
  }

  async #awaitTerminal(watches: Map<WatchKind, Promise<WatchEvent>>): Promise<ChildResult> {
    let paused = false;

    for (;;) {
      const event = await Promise.race(watches.values());
      watches.delete(event.kind);

      switch (event.kind) {
        case 'cancel':
          this.#transition('cancelled', 'Cancellation requested.');
          throw new DelegationCancelledError(this.#signal?.reason);

        case 'return':
          if (!event.outcome.ok) {
            this.#transition('failed-dangling', event.outcome.error.message);
            throw event.outcome.error;
          }
          this.#transition('succeeded', 'Return tool called.');
          return event.outcome.value;

        case 'error': {
          if (!event.outcome.ok) {
            this.#transition('failed-dangling', event.outcome.error.message);
            throw event.outcome.error;
          }
          const errorReporting = this.#config.errorReporting;
          if (errorReporting && errorReporting.behavior === 'report-error') {
            const message = this.#buildParentErrorMessage(errorReporting, event.outcome.value);
            this.#transition('failed-reported', message);
            return { success: false, errorMessage: message };
          }
          paused = true;
          this.#transition('paused', `Error reported: ${event.outcome.value.errorMessage ?? ''}`);
          continue;
        }

        case 'send': {
          if (this.#signal?.aborted) {
            this.#transition('cancelled', 'Cancellation requested.');
            throw new DelegationCancelledError(this.#signal.reason);
          }
          if (event.error !== undefined) {
            throw event.error;
          }
          if (this.#returnGate.isSettled || this.#errorGate?.isSettled === true || paused) {
            continue;
          }
          const dangling = this.#handleDangling(watches);
          if (dangling === 'paused') {
            paused = true;
          } else if (dangling) {
            return dangling;
          }
          continue;
        }
      }
    }
  }

  /** Reacts to a round trip that ended without any callback tool call. */
  #handleDangling(
    watches: Map<WatchKind, Promise<WatchEvent>>,
  ): ChildResult | 'paused' | undefined {
    const behavior = this.#config.danglingBehavior;
    switch (behavior) {
      case 'report-error': {
        const message = this.#config.errorMessage?.trim() || DEFAULT_DANGLING_ERROR_MESSAGE;
        this.#transition('failed-dangling', message);
        return { success: false, errorMessage: message };
      }
      case 'pause':
        this.#transition('paused', 'Child finished its turn without a result; waiting.');
        return 'paused';
      case 'urge':
        this.#urge(watches);
        return undefined;
      default:
        void logThought(
          `[ChildSession] Unknown dangling behavior '${String(behavior)}' for session ${this.#session.id}; urging instead.`,
        );
        this.#urge(watches);
        return undefined;
    }
  }

  #urge(watches: Map<WatchKind, Promise<WatchEvent>>): void {
    if (this.#remindersSent >= MAX_URGE_REMINDERS) {
      throw new DanglingExhaustedError(this.#session.id, MAX_URGE_REMINDERS);
    }
    if (!this.#urgingMessage.trim()) {
      throw new ConfigurationError('UrgingMessage cannot be empty.');
    }

    this.#remindersSent += 1;
    void logThought(
      `[ChildSession] Session ${this.#session.id} has no result yet; reminder ${this.#remindersSent}/${MAX_URGE_REMINDERS}.`,
    );
    this.#session.toolExecutionMode = 'require-any';
    watches.set('send', this.#send(this.#urgingMessage));
  }

  #buildParentErrorMessage(errorReporting: ErrorReportingConfig, reported: ChildResult): string {
    const reportedMessage = reported.errorMessage ?? '';
    const template = errorReporting.customParentMessageTemplate;
    const candidate =
      template && template.trim()
        ? applyParentErrorTemplate(template, {
            functionName: this.#config.functionName,
            sessionId: this.#session.id,
            errorMessage: reportedMessage,
            errorToolName: errorReporting.toolName,
          })
        : reportedMessage;
    return candidate.trim() ? candidate : DEFAULT_PARENT_ERROR_MESSAGE;
  }

  #send(text: string): Promise<WatchEvent> {
    return this.#session.sendMessage('message', text).then(
      (): WatchEvent => ({ kind: 'send' }),
      (error: unknown): WatchEvent => ({
        kind: 'send',
        error: error ?? new Error('sendMessage rejected'),
      }),
    );
  }

  #watchCancellation(): { promise?: Promise<WatchEvent>; dispose: () => void } {
    const signal = this.#signal;
    if (!signal) {
      return { dispose: () => undefined };
    }

    let onAbort: () => void = () => undefined;
    const promise = new Promise<WatchEvent>((resolve) => {
      onAbort = () => {
        this.#stopChildActivity();
        resolve({ kind: 'cancel' });
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });

    return {
      promise,
      dispose: () => signal.removeEventListener('abort', onAbort),
    };
  }

  #stopChildActivity(): void {
    const control = this.#session.cancellationControl();
    if (control && !control.signal.aborted) {
      control.abort();
    }
  }

  #transition(next: ChildSessionState, detail: string): void {
    if (!ALLOWED_TRANSITIONS[this.#state].includes(next)) {
      void logThought(
        `[ChildSession] Ignored transition ${this.#state} -> ${next} for session ${this.#session.id}.`,
      );
      return;
    }
    this.#state = next;
    this.#onStateChange?.(next, detail);
  }
}

export interface ChildSessionRequest {
  host: Host;
  parent: SessionHandle;
  assistantName: string;
  config: DelegationConfig;
  args: ArgumentRecord;
  engine: TemplateEngine;
  workItem?: WorkItem;
  signal?: AbortSignal;
  onSessionCreated?: (session: SessionHandle) => void;
  onStateChange?: (state: ChildSessionState, detail: string) => void;
}

/** Creates the child session, renders its prompts and waits for its result. */
export async function runChildSession(request: ChildSessionRequest): Promise<ChildResult> {
  if (request.signal?.aborted) {
    throw new DelegationCancelledError(request.signal.reason);
  }

  const session = await request.host.createChildSession(request.parent, request.assistantName);
  request.onSessionCreated?.(session);

  try {
    const { prompt, urging } = renderPrompts(
      request.engine,
      request.config,
      request.args,
      request.workItem,
    );
    const coordinator = new ChildSessionCoordinator({
      session,
      config: request.config,
      prompt,
      urgingMessage: urging,
      signal: request.signal,
      onStateChange: request.onStateChange,
    });
    return await coordinator.run();
  } finally {
    await session.dispose().catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      void logThought(`[ChildSession] Failed to dispose session ${session.id}: ${message}`);
    });
  }
}
