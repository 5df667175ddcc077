import os from 'node:os';
import {
  describeWorkItem,
  isOutcomeSuccess,
  outcomeDurationMs,
  type AggregateOutcome,
  type ChildResult,
  type DelegationItemState,
  type ParallelConfig,
  type ParallelResultStrategy,
  type WorkItem,
  type WorkItemOutcome,
} from '../types/delegation.js';
import {
  ConfigurationError,
  DanglingExhaustedError,
  DelegationCancelledError,
  errorMessage,
} from '../types/delegation-errors.js';
import type { SessionHandle } from '../types/host.js';
import { DEFAULT_SESSION_TIMEOUT_MS } from '../config/delegation-config-schema.js';
import { linkAbort, TimeoutError } from '../utils/abort.js';
import { logThought } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import type { DelegationJournal } from './delegation-journal.js';

export const ALL_SESSIONS_FAILED_MESSAGE = 'All parallel sessions failed';

const SUPPORTED_STRATEGIES: readonly ParallelResultStrategy[] = [
  'stream-individual',
  'wait-for-all',
  'first-result-wins',
];

/** Runs one work item to completion. Must honor `signal`. */
export type WorkItemDispatcher = (item: WorkItem, signal: AbortSignal) => Promise<ChildResult>;

export interface ParallelOrchestratorOptions {
  /** Defaults to the host's CPU count. */
  cpuCount?: number;
  journal?: DelegationJournal;
}

export interface ParallelRunOptions {
  signal?: AbortSignal;
  /** Receives per-item messages under `stream-individual`. */
  parentSession?: SessionHandle;
  /** Journal run id; item events are written only when both this and a journal are set. */
  runId?: string;
}

export function effectiveConcurrency(configured: number, itemCount: number, cpuCount: number): number {
  const baseline = configured <= 0 ? cpuCount : configured;
  return Math.max(1, Math.min(baseline, itemCount));
}

export function streamedOutcomeMessage(outcome: WorkItemOutcome): string {
  const label = `Parallel session ${describeWorkItem(outcome)}`;
  if (isOutcomeSuccess(outcome)) {
    return `${label} completed successfully: ${outcome.childResult?.result ?? ''}`;
  }
  if (!outcome.exception && outcome.childResult) {
    return `${label} reported an error: ${outcome.childResult.errorMessage ?? 'The child session reported an error.'}`;
  }
  return `${label} failed: ${outcome.childResult?.errorMessage ?? outcome.exception?.message ?? 'unknown error'}`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Fans work items out to child sessions under a concurrency cap and folds the
 * outcomes according to the configured result strategy.
 */
export class ParallelOrchestrator {
  readonly #cpuCount: number;
  readonly #journal: DelegationJournal | undefined;

  constructor(options: ParallelOrchestratorOptions = {}) {
    this.#cpuCount = Math.max(1, Number(options.cpuCount ?? os.cpus().length));
    this.#journal = options.journal;
  }

  async run(
    sources: readonly WorkItem[],
    config: ParallelConfig,
    dispatch: WorkItemDispatcher,
    options: ParallelRunOptions = {},
  ): Promise<AggregateOutcome> {
    const strategy = config.resultStrategy;
    if (!SUPPORTED_STRATEGIES.includes(strategy)) {
      throw new ConfigurationError(`[Parallel] Unsupported result strategy '${String(strategy)}'.`);
    }
    if (sources.length === 0) {
      throw new ConfigurationError('[Parallel] No work items to run.');
    }
    if (options.signal?.aborted) {
      throw new DelegationCancelledError(options.signal.reason);
    }

    const startTime = new Date();
    const concurrency = effectiveConcurrency(config.maxConcurrency, sources.length, this.#cpuCount);
    const timeoutMs = Math.max(1, Number(config.sessionTimeoutMs || DEFAULT_SESSION_TIMEOUT_MS));
    const semaphore = new Semaphore(concurrency);
    const runAbort = linkAbort([options.signal]);
    const outcomes: Array<WorkItemOutcome | undefined> = new Array(sources.length);
    const finishOrder: WorkItemOutcome[] = [];
    const notifications = new Set<Promise<void>>();
    let winner: WorkItemOutcome | undefined;
    let fatal: Error | undefined;
    let announceWinner: () => void = () => undefined;
    const winnerFound = new Promise<void>((resolve) => {
      announceWinner = resolve;
    });

    void logThought(
      `[Parallel] Starting ${sources.length} session(s), strategy=${strategy}, concurrency=${concurrency}.`,
    );

    const runItem = async (item: WorkItem, index: number): Promise<void> => {
      this.#record(options.runId, index, item, 'queued');

      let release: () => void;
      try {
        release = await semaphore.acquire(runAbort.signal);
      } catch (error) {
        this.#record(options.runId, index, item, 'cancelled', errorMessage(error));
        return;
      }

      const itemStart = new Date();
      const itemAbort = linkAbort([runAbort.signal], timeoutMs, `Parallel session ${describeWorkItem(item)}`);
      let outcome: WorkItemOutcome;
      this.#record(options.runId, index, item, 'running');

      try {
        const childResult = await dispatch(item, itemAbort.signal);
        outcome = { ...item, childResult, startTime: itemStart, endTime: new Date() };
      } catch (error) {
        const reason: unknown = itemAbort.signal.reason;
        const exception =
          error instanceof DelegationCancelledError && reason instanceof TimeoutError
            ? reason
            : toError(error);

        if (exception instanceof DanglingExhaustedError && !fatal) {
          fatal = exception;
          runAbort.controller.abort(exception);
        }

        outcome = {
          ...item,
          childResult: { success: false, errorMessage: exception.message },
          startTime: itemStart,
          endTime: new Date(),
          exception,
        };
      } finally {
        itemAbort.dispose();
        release();
      }

      outcomes[index] = outcome;
      finishOrder.push(outcome);
      this.#recordOutcome(options.runId, index, outcome);
      void logThought(
        `[Parallel] ${describeWorkItem(item)} finished in ${outcomeDurationMs(outcome)}ms (${isOutcomeSuccess(outcome) ? 'success' : 'failure'}).`,
      );

      if (strategy === 'first-result-wins' && !winner && isOutcomeSuccess(outcome)) {
        winner = outcome;
        void logThought(
          `[Parallel] First result from ${describeWorkItem(item)}; cancelling remaining sessions.`,
        );
        runAbort.controller.abort(new Error('Another parallel session already produced a result.'));
        announceWinner();
      }

      if (strategy === 'stream-individual' && options.parentSession) {
        this.#track(notifications, this.#stream(options.parentSession, outcome));
      }
    };

    const settled = Promise.all(sources.map((item, index) => runItem(item, index)));
    try {
      if (strategy === 'first-result-wins') {
        // Cancelled siblings unwind in the background once a winner is in.
        await Promise.race([settled, winnerFound]);
        if (winner) {
          void this.#drain(settled, sources.length);
        }
      } else {
        await settled;
      }
      await Promise.all(notifications);
    } finally {
      runAbort.dispose();
    }

    if (fatal) {
      throw fatal;
    }
    if (options.signal?.aborted) {
      throw new DelegationCancelledError(options.signal.reason);
    }

    const endTime = new Date();
    const aggregate =
      strategy === 'first-result-wins'
        ? this.#firstResultAggregate(finishOrder, outcomes, winner, startTime, endTime)
        : this.#collectAggregate(strategy, outcomes, startTime, endTime);

    void logThought(
      `[Parallel] Finished: ${aggregate.completedCount}/${aggregate.totalCount} successful, ${aggregate.failedCount} failed, ${endTime.getTime() - startTime.getTime()}ms.`,
    );
    return aggregate;
  }

  #collectAggregate(
    strategy: ParallelResultStrategy,
    outcomes: Array<WorkItemOutcome | undefined>,
    startTime: Date,
    endTime: Date,
  ): AggregateOutcome {
    const finished = outcomes.filter((outcome): outcome is WorkItemOutcome => !!outcome);
    const completedCount = finished.filter(isOutcomeSuccess).length;
    const failedCount = outcomes.length - completedCount;
    const success = completedCount > 0;

    return {
      success,
      errorMessage: success
        ? undefined
        : `Completed ${completedCount}/${outcomes.length} sessions, ${failedCount} failed`,
      outcomes: finished,
      strategy,
      totalCount: outcomes.length,
      completedCount,
      failedCount,
      startTime,
      endTime,
    };
  }

  #firstResultAggregate(
    finishOrder: WorkItemOutcome[],
    outcomes: Array<WorkItemOutcome | undefined>,
    winner: WorkItemOutcome | undefined,
    startTime: Date,
    endTime: Date,
  ): AggregateOutcome {
    if (!winner) {
      const finished = outcomes.filter((outcome): outcome is WorkItemOutcome => !!outcome);
      return {
        success: false,
        errorMessage: ALL_SESSIONS_FAILED_MESSAGE,
        outcomes: finished,
        strategy: 'first-result-wins',
        totalCount: outcomes.length,
        completedCount: 0,
        failedCount: outcomes.length,
        startTime,
        endTime,
      };
    }

    const failuresBeforeWinner = finishOrder.slice(0, finishOrder.indexOf(winner));
    return {
      success: true,
      outcomes: [...failuresBeforeWinner, winner],
      strategy: 'first-result-wins',
      totalCount: outcomes.length,
      completedCount: 1,
      failedCount: failuresBeforeWinner.length,
      startTime,
      endTime,
    };
  }

  async #stream(parentSession: SessionHandle, outcome: WorkItemOutcome): Promise<void> {
    try {
      await parentSession.sendMessage('message', streamedOutcomeMessage(outcome));
    } catch (error) {
      await logThought(
        `[Parallel] Failed to stream result for ${describeWorkItem(outcome)}: ${errorMessage(error)}`,
      );
    }
  }

  async #drain(settled: Promise<unknown>, itemCount: number): Promise<void> {
    try {
      await settled;
      await logThought(`[Parallel] All ${itemCount} session(s) of the finished run have unwound.`);
    } catch (error) {
      await logThought(`[Parallel] A cancelled session failed while unwinding: ${errorMessage(error)}`);
    }
  }

  #track(pending: Set<Promise<void>>, notification: Promise<void>): void {
    pending.add(notification);
    void notification.finally(() => pending.delete(notification));
  }

  #recordOutcome(runId: string | undefined, index: number, outcome: WorkItemOutcome): void {
    if (isOutcomeSuccess(outcome)) {
      this.#record(runId, index, outcome, 'completed', outcome.childResult?.result);
      return;
    }
    const state: DelegationItemState =
      outcome.exception instanceof DelegationCancelledError ? 'cancelled' : 'failed';
    this.#record(
      runId,
      index,
      outcome,
      state,
      outcome.childResult?.errorMessage ?? outcome.exception?.message,
    );
  }

  #record(
    runId: string | undefined,
    index: number,
    item: WorkItem,
    state: DelegationItemState,
    detail?: string,
  ): void {
    if (!runId || !this.#journal) {
      return;
    }
    try {
      this.#journal.recordItem(runId, index, { name: item.name, value: item.value }, state, detail);
    } catch (error) {
      void logThought(`[Parallel] Failed to journal ${state} for ${describeWorkItem(item)}: ${errorMessage(error)}`);
    }
  }
}
