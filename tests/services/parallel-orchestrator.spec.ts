import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logToolCall: vi.fn(async () => undefined),
}));

import { openDatabase } from '../../src/services/db.js';
import { DelegationJournal } from '../../src/services/delegation-journal.js';
import {
  ALL_SESSIONS_FAILED_MESSAGE,
  effectiveConcurrency,
  ParallelOrchestrator,
  streamedOutcomeMessage,
  type WorkItemDispatcher,
} from '../../src/services/parallel-orchestrator.js';
import {
  outcomeDurationMs,
  type ChildResult,
  type ParallelConfig,
  type WorkItem,
} from '../../src/types/delegation.js';
import {
  ConfigurationError,
  DanglingExhaustedError,
  DelegationCancelledError,
} from '../../src/types/delegation-errors.js';
import { TimeoutError } from '../../src/utils/abort.js';
import { delay, FakeSession, untilAborted } from '../harness/fake-host.js';

function parallel(overrides: Partial<ParallelConfig> = {}): ParallelConfig {
  return {
    executionType: 'list-based',
    listParameterName: 'n',
    maxConcurrency: 2,
    resultStrategy: 'wait-for-all',
    excludedParameterNames: [],
    sessionTimeoutMs: 5_000,
    ...overrides,
  };
}

function items(...values: unknown[]): WorkItem[] {
  return values.map((value) => ({ name: 'n', value }));
}

function succeed(result: string): ChildResult {
  return { success: true, result };
}

/** Waits for cancellation and then fails the way a child session does. */
async function hangUntilCancelled(signal: AbortSignal): Promise<ChildResult> {
  await untilAborted(signal);
  throw new DelegationCancelledError(signal.reason);
}

describe('effectiveConcurrency', () => {
  it('caps the configured value by the number of items', () => {
    expect(effectiveConcurrency(8, 3, 4)).toBe(3);
    expect(effectiveConcurrency(2, 10, 4)).toBe(2);
  });

  it('uses the CPU count when no positive value is configured', () => {
    expect(effectiveConcurrency(0, 10, 4)).toBe(4);
    expect(effectiveConcurrency(-3, 10, 6)).toBe(6);
  });

  it('never drops below one slot', () => {
    expect(effectiveConcurrency(0, 0, 4)).toBe(1);
  });
});

describe('ParallelOrchestrator', () => {
  it('never runs more sessions at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const dispatch: WorkItemDispatcher = async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(10);
      active -= 1;
      return succeed(`r-${String(item.value)}`);
    };

    const aggregate = await new ParallelOrchestrator({ cpuCount: 8 }).run(
      items(1, 2, 3, 4, 5),
      parallel({ maxConcurrency: 2 }),
      dispatch,
    );

    expect(peak).toBe(2);
    expect(aggregate.success).toBe(true);
    expect(aggregate.completedCount).toBe(5);
    expect(aggregate.failedCount).toBe(0);
    expect(aggregate.outcomes.map((outcome) => outcome.childResult?.result)).toEqual([
      'r-1',
      'r-2',
      'r-3',
      'r-4',
      'r-5',
    ]);
  });

  it('collects failures alongside successes under wait-for-all', async () => {
    const dispatch: WorkItemDispatcher = async (item) => {
      if (item.value === 'b') throw new Error('boom');
      if (item.value === 'c') return { success: false, errorMessage: 'bad input' };
      return succeed('fine');
    };

    const aggregate = await new ParallelOrchestrator().run(items('a', 'b', 'c'), parallel(), dispatch);

    expect(aggregate.success).toBe(true);
    expect(aggregate.totalCount).toBe(3);
    expect(aggregate.completedCount).toBe(1);
    expect(aggregate.failedCount).toBe(2);
    expect(aggregate.outcomes[1]?.exception?.message).toBe('boom');
    expect(aggregate.outcomes[1]?.childResult).toEqual({ success: false, errorMessage: 'boom' });
    expect(aggregate.outcomes[2]?.exception).toBeUndefined();
  });

  it('reports an aggregate failure when nothing succeeded', async () => {
    const aggregate = await new ParallelOrchestrator().run(items('a', 'b'), parallel(), async () => ({
      success: false,
      errorMessage: 'nope',
    }));

    expect(aggregate.success).toBe(false);
    expect(aggregate.errorMessage).toBe('Completed 0/2 sessions, 2 failed');
  });

  it('cancels the other sessions once the first result arrives', async () => {
    const cancelled: unknown[] = [];
    const dispatch: WorkItemDispatcher = async (item, signal) => {
      if (item.value === 'fast') {
        await delay(5);
        return succeed('winner');
      }
      try {
        return await hangUntilCancelled(signal);
      } finally {
        cancelled.push(item.value);
      }
    };

    const aggregate = await new ParallelOrchestrator().run(
      items('slow-1', 'fast', 'slow-2'),
      parallel({ resultStrategy: 'first-result-wins', maxConcurrency: 3 }),
      dispatch,
    );

    expect(aggregate.success).toBe(true);
    expect(aggregate.completedCount).toBe(1);
    expect(aggregate.failedCount).toBe(0);
    expect(aggregate.outcomes.map((outcome) => outcome.value)).toEqual(['fast']);
    await vi.waitFor(() => expect(cancelled.sort()).toEqual(['slow-1', 'slow-2']));
  });

  it('returns the winner without waiting for slow siblings to unwind', async () => {
    let releaseLoser: () => void = () => undefined;
    const loserDone = new Promise<void>((resolve) => {
      releaseLoser = resolve;
    });
    const dispatch: WorkItemDispatcher = async (item) => {
      if (item.value === 'fast') {
        await delay(5);
        return succeed('winner');
      }
      // Ignores its signal, like a host call that cannot be cancelled.
      await loserDone;
      return succeed('too late');
    };

    const aggregate = await new ParallelOrchestrator().run(
      items('fast', 'stubborn'),
      parallel({ resultStrategy: 'first-result-wins', maxConcurrency: 2 }),
      dispatch,
    );

    expect(aggregate.success).toBe(true);
    expect(aggregate.completedCount).toBe(1);
    expect(aggregate.outcomes.map((outcome) => outcome.childResult?.result)).toEqual(['winner']);
    releaseLoser();
  });

  it('keeps failures that finished before the winner', async () => {
    const dispatch: WorkItemDispatcher = async (item, signal) => {
      if (item.value === 'broken') {
        throw new Error('crashed');
      }
      if (item.value === 'good') {
        await delay(10);
        return succeed('answer');
      }
      return hangUntilCancelled(signal);
    };

    const aggregate = await new ParallelOrchestrator().run(
      items('broken', 'good', 'slow'),
      parallel({ resultStrategy: 'first-result-wins', maxConcurrency: 3 }),
      dispatch,
    );

    expect(aggregate.outcomes.map((outcome) => outcome.value)).toEqual(['broken', 'good']);
    expect(aggregate.completedCount).toBe(1);
    expect(aggregate.failedCount).toBe(1);
  });

  it('fails first-result-wins when every session fails', async () => {
    const aggregate = await new ParallelOrchestrator().run(
      items('a', 'b'),
      parallel({ resultStrategy: 'first-result-wins' }),
      async () => ({ success: false, errorMessage: 'no luck' }),
    );

    expect(aggregate.success).toBe(false);
    expect(aggregate.errorMessage).toBe(ALL_SESSIONS_FAILED_MESSAGE);
    expect(aggregate.completedCount).toBe(0);
    expect(aggregate.failedCount).toBe(2);
  });

  it('streams each outcome to the parent session as it completes', async () => {
    const parent = new FakeSession({ id: 'root' });
    const dispatch: WorkItemDispatcher = async (item) => {
      if (item.value === 1) {
        await delay(5);
        return succeed('one');
      }
      await delay(20);
      return { success: false, errorMessage: 'nope' };
    };

    const aggregate = await new ParallelOrchestrator().run(
      items(1, 2),
      parallel({ resultStrategy: 'stream-individual' }),
      dispatch,
      { parentSession: parent },
    );

    expect(aggregate.completedCount).toBe(1);
    expect(parent.messages).toEqual([
      { kind: 'message', text: 'Parallel session n=1 completed successfully: one' },
      { kind: 'message', text: 'Parallel session n=2 reported an error: nope' },
    ]);
  });

  it('survives a parent that cannot receive streamed messages', async () => {
    const parent = new FakeSession({ id: 'root' });
    vi.spyOn(parent, 'sendMessage').mockRejectedValue(new Error('parent gone'));

    const aggregate = await new ParallelOrchestrator().run(
      items(1),
      parallel({ resultStrategy: 'stream-individual' }),
      async () => succeed('ok'),
      { parentSession: parent },
    );

    expect(aggregate.success).toBe(true);
  });

  it('keeps a session alive under a timeout longer than a single timer can hold', async () => {
    const aggregate = await new ParallelOrchestrator().run(
      items(1),
      parallel({ sessionTimeoutMs: 30 * 24 * 3600 * 1000 }),
      async () => {
        await delay(30);
        return succeed('slow but fine');
      },
    );

    expect(aggregate.success).toBe(true);
    expect(aggregate.outcomes[0]?.exception).toBeUndefined();
  });

  it('measures how long each session ran', async () => {
    const aggregate = await new ParallelOrchestrator().run(items(1), parallel(), async () => {
      await delay(25);
      return succeed('timed');
    });

    const [outcome] = aggregate.outcomes;
    expect(outcome).toBeDefined();
    if (outcome) {
      expect(outcomeDurationMs(outcome)).toBe(outcome.endTime.getTime() - outcome.startTime.getTime());
      expect(outcomeDurationMs(outcome)).toBeGreaterThanOrEqual(20);
    }
  });

  it('records a timeout for a session that runs too long', async () => {
    const aggregate = await new ParallelOrchestrator().run(
      items(1),
      parallel({ sessionTimeoutMs: 20 }),
      (_item, signal) => hangUntilCancelled(signal),
    );

    const [outcome] = aggregate.outcomes;
    expect(outcome?.exception).toBeInstanceOf(TimeoutError);
    expect(outcome?.exception?.message).toBe('Parallel session n=1 timed out after 20ms.');
    expect(aggregate.success).toBe(false);
    expect(aggregate.errorMessage).toBe('Completed 0/1 sessions, 1 failed');
  });

  it('escalates an exhausted reminder cycle and cancels the siblings', async () => {
    let siblingCancelled = false;
    const dispatch: WorkItemDispatcher = async (item, signal) => {
      if (item.value === 'stuck') {
        await delay(5);
        throw new DanglingExhaustedError('child-stuck', 3);
      }
      try {
        return await hangUntilCancelled(signal);
      } finally {
        siblingCancelled = signal.aborted;
      }
    };

    await expect(
      new ParallelOrchestrator().run(items('stuck', 'other'), parallel(), dispatch),
    ).rejects.toBeInstanceOf(DanglingExhaustedError);
    expect(siblingCancelled).toBe(true);
  });

  it('rethrows external cancellation', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort('stop'), 5);

    await expect(
      new ParallelOrchestrator().run(
        items(1, 2),
        parallel(),
        (_item, signal) => hangUntilCancelled(signal),
        { signal: controller.signal },
      ),
    ).rejects.toThrow(new DelegationCancelledError('stop'));
  });

  it('refuses an empty work list', async () => {
    await expect(
      new ParallelOrchestrator().run([], parallel(), async () => succeed('x')),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('journals each item through its lifecycle', async () => {
    const journal = new DelegationJournal(openDatabase(':memory:'));
    const runId = journal.startRun({
      sessionId: 'root',
      functionName: 'create_subtask',
      executionType: 'list-based',
      strategy: 'wait-for-all',
      totalCount: 2,
    });

    await new ParallelOrchestrator({ journal }).run(
      items('a', 'b'),
      parallel({ maxConcurrency: 1 }),
      async (item) =>
        item.value === 'a' ? succeed('done') : { success: false, errorMessage: 'rejected' },
      { runId },
    );

    expect(journal.listEvents(runId).map((event) => [event.itemIndex, event.state, event.detail])).toEqual([
      [0, 'queued', null],
      [1, 'queued', null],
      [0, 'running', null],
      [0, 'completed', 'done'],
      [1, 'running', null],
      [1, 'failed', 'rejected'],
    ]);
  });
});

describe('streamedOutcomeMessage', () => {
  it('describes a crashed session by its exception', () => {
    const now = new Date();
    const error = new Error('socket closed');
    expect(
      streamedOutcomeMessage({
        name: 'city',
        value: 'Oslo',
        startTime: now,
        endTime: now,
        exception: error,
      }),
    ).toBe('Parallel session city=Oslo failed: socket closed');
  });
});
