import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';

export type SqliteDatabase = Database.Database;

const DEFAULT_DB_PATH = 'memory/subtask-orchestrator.db';

let sharedDb: SqliteDatabase | null = null;

function resolveDbPath(): string {
  return process.env.SUBTASK_DB_PATH ?? DEFAULT_DB_PATH;
}

export function migrate(db: SqliteDatabase): void {
  db.pragma('foreign_keys = ON');
  db.exec(`
    CREATE TABLE IF NOT EXISTS delegation_runs (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      function_name TEXT NOT NULL,
      execution_type TEXT NOT NULL,
      strategy TEXT,
      state TEXT NOT NULL,
      total_count INTEGER NOT NULL DEFAULT 0,
      completed_count INTEGER NOT NULL DEFAULT 0,
      failed_count INTEGER NOT NULL DEFAULT 0,
      summary TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      completed_at DATETIME
    );

    CREATE TABLE IF NOT EXISTS delegation_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      item_index INTEGER NOT NULL,
      item_name TEXT NOT NULL,
      item_value TEXT,
      state TEXT NOT NULL,
      detail TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY(run_id) REFERENCES delegation_runs(id)
    );

    CREATE INDEX IF NOT EXISTS idx_delegation_events_run ON delegation_events(run_id, id);
  `);
}

/** Opens (and migrates) a database. Pass `':memory:'` for a throwaway store. */
export function openDatabase(filePath: string = resolveDbPath()): SqliteDatabase {
  if (filePath !== ':memory:') {
    const dir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  migrate(db);
  return db;
}

/** Process-wide database, opened on first use at `SUBTASK_DB_PATH` (or under `memory/`). */
export function getDb(): SqliteDatabase {
  if (!sharedDb) {
    sharedDb = openDatabase();
  }
  return sharedDb;
}

export function closeDb(): void {
  if (sharedDb) {
    sharedDb.close();
    sharedDb = null;
  }
}
