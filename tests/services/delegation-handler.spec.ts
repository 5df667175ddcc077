import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn(async () => undefined),
  logToolCall: vi.fn(async () => undefined),
}));

import { createDelegationConfig } from '../../src/config/delegation-config-schema.js';
import { openDatabase } from '../../src/services/db.js';
import { DelegationHandler } from '../../src/services/delegation-handler.js';
import { DelegationJournal } from '../../src/services/delegation-journal.js';
import type { DelegationConfig, ParallelConfig } from '../../src/types/delegation.js';
import {
  ConfigurationError,
  DanglingExhaustedError,
  DelegationCancelledError,
} from '../../src/types/delegation-errors.js';
import { FakeHost, untilAborted, type ChildBehavior } from '../harness/fake-host.js';

const summaryReturn = [{ name: 'summary', description: '', type: 'string' as const, required: true }];

/** Child that answers its first message by echoing the prompt back as the result. */
const echoChild: ChildBehavior = async ({ turn, text, call }) => {
  if (turn === 1) {
    await call('set_result', { summary: text });
  }
};

function researchConfig(overrides: Partial<DelegationConfig> = {}): DelegationConfig {
  return createDelegationConfig({
    functionName: 'research',
    inputParameters: [
      { name: 'topic', description: 'Subject', type: 'string', required: true },
      { name: 'count', description: '', type: 'integer', required: false },
    ],
    returnParameters: summaryReturn,
    promptMessage: 'Research {{ topic }}.',
    ...overrides,
  });
}

function listParallel(overrides: Partial<ParallelConfig> = {}): ParallelConfig {
  return {
    executionType: 'list-based',
    listParameterName: 'items',
    maxConcurrency: 3,
    resultStrategy: 'wait-for-all',
    excludedParameterNames: [],
    sessionTimeoutMs: 5_000,
    ...overrides,
  };
}

function setup(config: DelegationConfig, childBehavior: ChildBehavior | undefined = echoChild) {
  const host = new FakeHost({ childBehavior });
  const root = host.addSession({ id: 'root' });
  const handler = new DelegationHandler({ host, config, contextSession: root });
  return { host, root, handler };
}

describe('DelegationHandler single session', () => {
  it('runs one child and reports success', async () => {
    const { host, handler } = setup(researchConfig());

    await expect(handler.delegate({ topic: 'tides' })).resolves.toBe('Succeeded');
    expect(host.children).toHaveLength(1);
    expect(host.children[0]?.messages[0]?.text).toBe('Research tides.');
    expect(host.children[0]?.disposed).toBe(true);
  });

  it('passes a reported error back as a failure', async () => {
    const config = researchConfig({
      errorReporting: {
        toolName: 'report_error',
        toolDescription: '',
        parameters: [],
        behavior: 'report-error',
        customParentMessageTemplate: 'Parent note: {ErrorMessage}',
      },
    });
    const { handler } = setup(config, async ({ call }) => {
      await call('report_error', { error_message: 'disk full' });
    });

    await expect(handler.delegate({ topic: 'tides' })).resolves.toBe('Failed: Parent note: disk full');
  });

  it('reports missing and mistyped inputs without creating a child', async () => {
    const { host, handler } = setup(researchConfig());

    await expect(handler.delegate({ count: 'several' })).resolves.toBe(
      "Failed: Missing required parameters: 'topic' (Subject) AND Type validation errors: Parameter 'count' expected type integer but got string",
    );
    expect(host.children).toHaveLength(0);
  });

  it('stops at the recursion limit', async () => {
    const host = new FakeHost({ childBehavior: echoChild });
    const nested = host.addChain(1);
    const handler = new DelegationHandler({ host, config: researchConfig(), contextSession: nested });

    await expect(handler.delegate({ topic: 'tides' })).resolves.toBe(
      'Failed: Maximum recursion level (1) reached (current level: 1).',
    );
    expect(host.children).toHaveLength(0);
  });

  it('reports when no assistant can take the subtask', async () => {
    const { host, handler } = setup(researchConfig());
    host.assistants = [];

    await expect(handler.delegate({ topic: 'tides' })).resolves.toBe(
      'Failed: No assistants are available to handle the subtask.',
    );
  });

  it('prefers the session assistant, then the host assistant', async () => {
    const { host, root, handler } = setup(researchConfig());
    root.assistants = [{ name: 'Scribe' }];

    await handler.delegate({ topic: 'tides' });
    root.assistants = [];
    await handler.delegate({ topic: 'tides' });

    expect(host.childAssistants).toEqual(['Scribe', 'Worker']);
  });

  it('matches the configured assistant case-insensitively', async () => {
    const { host, handler } = setup(researchConfig({ executiveAssistant: 'analyst' }));
    host.assistants = [{ name: 'Worker' }, { name: 'Analyst' }];

    await handler.delegate({ topic: 'tides' });

    expect(host.childAssistants).toEqual(['Analyst']);
  });

  it('throws when the configured assistant does not exist', async () => {
    const { handler } = setup(researchConfig({ executiveAssistant: 'Ghost' }));

    await expect(handler.delegate({ topic: 'tides' })).rejects.toThrow(
      "[Delegation] Configured assistant 'Ghost' is not available.",
    );
  });

  it('throws on configuration that cannot run', async () => {
    const { host, handler } = setup(researchConfig({ danglingBehavior: 'urge', urgingMessage: '' }));

    await expect(handler.delegate({ topic: 'tides' })).rejects.toBeInstanceOf(ConfigurationError);
    expect(host.children).toHaveLength(0);
  });

  it('uses the session passed with the request', async () => {
    const host = new FakeHost({ childBehavior: echoChild });
    const other = host.addSession({ id: 'other-root' });
    const handler = new DelegationHandler({ host, config: researchConfig() });

    await expect(handler.delegate({ topic: 'tides', _session: other })).resolves.toBe('Succeeded');
    expect(host.children[0]?.parentSessionId).toBe('other-root');
  });

  it('requires some context session', async () => {
    const handler = new DelegationHandler({ host: new FakeHost(), config: researchConfig() });

    await expect(handler.delegate({ topic: 'tides' })).rejects.toThrow(
      '[Delegation] A context session is required to delegate a subtask.',
    );
  });

  it('propagates an exhausted reminder cycle', async () => {
    const { handler } = setup(researchConfig(), undefined);

    await expect(handler.delegate({ topic: 'tides' })).rejects.toBeInstanceOf(DanglingExhaustedError);
  });

  it('propagates cancellation from the context session', async () => {
    const { root, handler } = setup(researchConfig(), ({ signal }) => untilAborted(signal));
    setTimeout(() => root.controller.abort('parent closed'), 5);

    await expect(handler.delegate({ topic: 'tides' })).rejects.toThrow(
      new DelegationCancelledError('parent closed'),
    );
  });

  it('returns the message of an unexpected host failure', async () => {
    const { host, handler } = setup(researchConfig());
    vi.spyOn(host, 'createChildSession').mockRejectedValueOnce(new Error('host offline'));

    await expect(handler.delegate({ topic: 'tides' })).resolves.toBe('host offline');
  });

  it('reads a config provider on every call', async () => {
    const host = new FakeHost({ childBehavior: echoChild });
    const root = host.addSession({ id: 'root' });
    let current = researchConfig({ promptMessage: 'First {{ topic }}' });
    const handler = new DelegationHandler({ host, config: () => current, contextSession: root });

    await handler.delegate({ topic: 'a' });
    current = researchConfig({ promptMessage: 'Second {{ topic }}' });
    await handler.delegate({ topic: 'b' });

    expect(host.children.map((child) => child.messages[0]?.text)).toEqual(['First a', 'Second b']);
  });

  it('journals single-session runs', async () => {
    const journal = new DelegationJournal(openDatabase(':memory:'));
    const host = new FakeHost({ childBehavior: echoChild });
    const root = host.addSession({ id: 'root' });
    const handler = new DelegationHandler({ host, config: researchConfig(), contextSession: root, journal });

    await handler.delegate({ topic: 'tides' });

    const [run] = journal.listRuns('root');
    expect(run).toMatchObject({ state: 'completed', executionType: 'none', summary: 'Succeeded' });
    expect(journal.listEvents(run?.id ?? '').map((event) => event.state)).toEqual(['running', 'completed']);
  });
});

describe('DelegationHandler parallel sessions', () => {
  const itemConfig = (parallel: ParallelConfig): DelegationConfig =>
    createDelegationConfig({
      returnParameters: summaryReturn,
      promptMessage: 'Handle {{ _Parameter.Value }}',
      parallel,
    });

  const resultFor = (value: string): string =>
    JSON.stringify({ summary: `Handle ${value}` }, null, 2);

  it('runs one child per list item and lists every result', async () => {
    const { host, handler } = setup(itemConfig(listParallel()));

    const text = await handler.delegate({ items: ['a', 'b', 'c'] });

    expect(host.children).toHaveLength(3);
    expect(text).toBe(
      `Completed 3/3 parallel sessions:\n1. ${resultFor('a')}\n2. ${resultFor('b')}\n3. ${resultFor('c')} Succeeded`,
    );
  });

  it('fans out over the external list', async () => {
    const { host, handler } = setup(
      itemConfig(listParallel({ executionType: 'external-list', externalList: ['x', 'y'] })),
    );

    await handler.delegate({});

    expect(host.children.map((child) => child.messages[0]?.text).sort()).toEqual(['Handle x', 'Handle y']);
  });

  it('streams each result to the requesting session', async () => {
    const { root, handler } = setup(
      itemConfig(listParallel({ resultStrategy: 'stream-individual', maxConcurrency: 1 })),
    );

    const text = await handler.delegate({ items: ['a', 'b'] });

    expect(text).toBe('Streamed 2/2 parallel sessions.');
    expect(root.messages.map((message) => message.text)).toEqual([
      `Parallel session items=a completed successfully: ${resultFor('a')}`,
      `Parallel session items=b completed successfully: ${resultFor('b')}`,
    ]);
  });

  it('reports an unusable list as a parallel failure', async () => {
    const { handler } = setup(itemConfig(listParallel()));

    await expect(handler.delegate({ items: 'a,b' })).resolves.toBe(
      "Failed: Parallel execution failed: Parameter 'items' is not enumerable",
    );
  });

  it('reports when no request parameter can be fanned out', async () => {
    const { root, handler } = setup(itemConfig(listParallel({ executionType: 'parameter-based' })));

    await expect(handler.delegate({ _session: root })).resolves.toBe(
      'Failed: No valid parameters for parallel execution.',
    );
  });

  it('journals the aggregate of a parallel run', async () => {
    const journal = new DelegationJournal(openDatabase(':memory:'));
    const host = new FakeHost({ childBehavior: echoChild });
    const root = host.addSession({ id: 'root' });
    const handler = new DelegationHandler({
      host,
      config: itemConfig(listParallel()),
      contextSession: root,
      journal,
    });

    await handler.delegate({ items: ['a', 'b'] });

    const [run] = journal.listRuns('root');
    expect(run).toMatchObject({
      state: 'completed',
      executionType: 'list-based',
      strategy: 'wait-for-all',
      totalCount: 2,
      completedCount: 2,
      failedCount: 0,
    });
    expect(journal.listEvents(run?.id ?? '')).toHaveLength(6);
  });
});
