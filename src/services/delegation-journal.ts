import { randomUUID } from 'node:crypto';
import {
  serializeItemValue,
  type AggregateOutcome,
  type DelegationItemState,
  type ParallelExecutionType,
  type ParallelResultStrategy,
  type WorkItem,
} from '../types/delegation.js';
import { getDb, type SqliteDatabase } from './db.js';

export type DelegationRunState = 'running' | 'completed' | 'failed' | 'cancelled';

export interface DelegationRunInput {
  sessionId: string;
  functionName: string;
  executionType: ParallelExecutionType;
  strategy?: ParallelResultStrategy;
  totalCount: number;
}

export interface DelegationRunRecord {
  id: string;
  sessionId: string;
  functionName: string;
  executionType: string;
  strategy: string | null;
  state: DelegationRunState;
  totalCount: number;
  completedCount: number;
  failedCount: number;
  summary: string | null;
}

export interface DelegationEventRecord {
  runId: string;
  itemIndex: number;
  itemName: string;
  itemValue: string | null;
  state: DelegationItemState;
  detail: string | null;
}

interface RunRow {
  id: string;
  session_id: string;
  function_name: string;
  execution_type: string;
  strategy: string | null;
  state: DelegationRunState;
  total_count: number;
  completed_count: number;
  failed_count: number;
  summary: string | null;
}

interface EventRow {
  run_id: string;
  item_index: number;
  item_name: string;
  item_value: string | null;
  state: DelegationItemState;
  detail: string | null;
}

function mapRunRow(row: RunRow): DelegationRunRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    functionName: row.function_name,
    executionType: row.execution_type,
    strategy: row.strategy,
    state: row.state,
    totalCount: row.total_count,
    completedCount: row.completed_count,
    failedCount: row.failed_count,
    summary: row.summary,
  };
}

/** SQLite record of delegation runs and of each work item's lifecycle. */
export class DelegationJournal {
  readonly #db: SqliteDatabase;

  constructor(db: SqliteDatabase = getDb()) {
    this.#db = db;
  }

  startRun(input: DelegationRunInput): string {
    const id = randomUUID();
    this.#db
      .prepare(`
        INSERT INTO delegation_runs (id, session_id, function_name, execution_type, strategy, state, total_count)
        VALUES (?, ?, ?, ?, ?, 'running', ?)
      `)
      .run(
        id,
        input.sessionId,
        input.functionName,
        input.executionType,
        input.strategy ?? null,
        input.totalCount,
      );
    return id;
  }

  recordItem(
    runId: string,
    itemIndex: number,
    item: WorkItem,
    state: DelegationItemState,
    detail?: string,
  ): void {
    this.#db
      .prepare(`
        INSERT INTO delegation_events (run_id, item_index, item_name, item_value, state, detail)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(runId, itemIndex, item.name, serializeItemValue(item.value), state, detail ?? null);
  }

  finishRun(runId: string, aggregate: AggregateOutcome, summary: string): void {
    this.#updateRun(
      runId,
      aggregate.success ? 'completed' : 'failed',
      aggregate.completedCount,
      aggregate.failedCount,
      summary,
    );
  }

  /** Closes a run that ended without an aggregate (single session, cancellation or a run-wide failure). */
  closeRun(runId: string, state: Exclude<DelegationRunState, 'running'>, summary: string): void {
    this.#updateRun(runId, state, null, null, summary);
  }

  getRun(runId: string): DelegationRunRecord | undefined {
    const row = this.#db
      .prepare<[string], RunRow>(`
        SELECT id, session_id, function_name, execution_type, strategy, state,
               total_count, completed_count, failed_count, summary
        FROM delegation_runs
        WHERE id = ?
      `)
      .get(runId);

    return row ? mapRunRow(row) : undefined;
  }

  /** Runs started from one session, oldest first. */
  listRuns(sessionId: string): DelegationRunRecord[] {
    return this.#db
      .prepare<[string], RunRow>(`
        SELECT id, session_id, function_name, execution_type, strategy, state,
               total_count, completed_count, failed_count, summary
        FROM delegation_runs
        WHERE session_id = ?
        ORDER BY rowid ASC
      `)
      .all(sessionId)
      .map(mapRunRow);
  }

  listEvents(runId: string): DelegationEventRecord[] {
    const rows = this.#db
      .prepare<[string], EventRow>(`
        SELECT run_id, item_index, item_name, item_value, state, detail
        FROM delegation_events
        WHERE run_id = ?
        ORDER BY id ASC
      `)
      .all(runId);

    return rows.map((row) => ({
      runId: row.run_id,
      itemIndex: row.item_index,
      itemName: row.item_name,
      itemValue: row.item_value,
      state: row.state,
      detail: row.detail,
    }));
  }

  #updateRun(
    runId: string,
    state: DelegationRunState,
    completedCount: number | null,
    failedCount: number | null,
    summary: string,
  ): void {
    this.#db
      .prepare(`
        UPDATE delegation_runs
        SET state = ?,
            completed_count = COALESCE(?, completed_count),
            failed_count = COALESCE(?, failed_count),
            summary = ?,
            completed_at = CURRENT_TIMESTAMP
        WHERE id = ?
      `)
      .run(state, completedCount, failedCount, summary, runId);
  }
}
