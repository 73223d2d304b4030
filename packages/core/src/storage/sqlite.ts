/**
 * Local state store using better-sqlite3.
 * Holds the request history log; in memory unless a file path is configured.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: history_entries; seq is the entry identity and the insertion order
  `CREATE TABLE IF NOT EXISTS history_entries (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    connection_id TEXT,
    request_text TEXT NOT NULL,
    statement_kind TEXT,
    sql_text TEXT,
    params_json TEXT NOT NULL DEFAULT '[]',
    outcome TEXT NOT NULL CHECK (outcome IN ('accepted', 'rejected', 'failed')),
    error_kind TEXT,
    error_message TEXT,
    row_count INTEGER,
    affected_rows INTEGER,
    truncated INTEGER,
    from_cache INTEGER,
    execution_ms REAL,
    created_at TEXT NOT NULL
  )`,

  // 2: session lookups
  `CREATE INDEX IF NOT EXISTS idx_history_session ON history_entries (session_id, seq)`,

  // 3: tables touched, for follow-up suggestions
  `ALTER TABLE history_entries ADD COLUMN tables_json TEXT NOT NULL DEFAULT '[]'`,
];

export const MEMORY_PATH = ':memory:';

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.askdb', 'history.db');
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore {
  private db: Database.Database;

  constructor(dbPath: string = MEMORY_PATH) {
    if (dbPath !== MEMORY_PATH) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== MEMORY_PATH) {
      this.db.pragma('journal_mode = WAL');
    }
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]); // ensure migrations table exists

    const applied = this.db.prepare('SELECT version FROM migrations ORDER BY version').all() as { version: number }[];
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.transaction(() => {
          this.db.exec(MIGRATIONS[i]);
          insert.run(i);
        })();
      }
    }
  }

  /** Highest applied migration version */
  schemaVersion(): number {
    const row = this.db.prepare('SELECT MAX(version) AS version FROM migrations').get() as
      | { version: number | null }
      | undefined;
    return row?.version ?? 0;
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
