/**
 * Request history repository.
 * Append-only: every request a session handles lands here, including
 * rejections and failures. NEVER stores result row data.
 */

import type Database from 'better-sqlite3';
import type { ErrorKind } from '../errors.js';
import type { SqlParam } from '../db/types.js';
import type { StatementKind } from '../policy/types.js';

// ── Types ────────────────────────────────────────────────────────────

export type HistoryOutcome = 'accepted' | 'rejected' | 'failed';

export interface ResultSummary {
  rowCount: number;
  affectedRows: number;
  truncated: boolean;
  fromCache: boolean;
  executionMs: number;
}

export interface NewHistoryEntry {
  sessionId: string;
  connectionId: string | null;
  requestText: string;
  kind: StatementKind | null;
  sql: string | null;
  params: readonly SqlParam[];
  /** Tables the statement touched */
  tables: readonly string[];
  outcome: HistoryOutcome;
  errorKind: ErrorKind | null;
  errorMessage: string | null;
  summary: ResultSummary | null;
}

export interface HistoryEntry extends NewHistoryEntry {
  seq: number;
  createdAt: string;
}

export interface HistoryStats {
  total: number;
  successful: number;
  rejected: number;
  failed: number;
  /** Percentage of successful entries, one decimal */
  successRate: number;
  /** Mean execution time of successful entries, null when there are none */
  averageExecutionMs: number | null;
}

export interface Suggestions {
  suggestions: string[];
  similar: HistoryEntry[];
}

interface HistoryRow {
  seq: number;
  session_id: string;
  connection_id: string | null;
  request_text: string;
  statement_kind: string | null;
  sql_text: string | null;
  params_json: string;
  tables_json: string;
  outcome: HistoryOutcome;
  error_kind: string | null;
  error_message: string | null;
  row_count: number | null;
  affected_rows: number | null;
  truncated: number | null;
  from_cache: number | null;
  execution_ms: number | null;
  created_at: string;
}

const DEFAULT_SUGGESTIONS = [
  'Show me all tables in the database',
  'Show me the latest 10 entries',
  'Give me a summary of the data',
];

const SIMILARITY_THRESHOLD = 0.3;
const MAX_SUGGESTIONS = 10;

function toEntry(row: HistoryRow): HistoryEntry {
  const summary: ResultSummary | null =
    row.outcome === 'accepted'
      ? {
          rowCount: row.row_count ?? 0,
          affectedRows: row.affected_rows ?? 0,
          truncated: row.truncated === 1,
          fromCache: row.from_cache === 1,
          executionMs: row.execution_ms ?? 0,
        }
      : null;

  return {
    seq: row.seq,
    sessionId: row.session_id,
    connectionId: row.connection_id,
    requestText: row.request_text,
    kind: row.statement_kind as StatementKind | null,
    sql: row.sql_text,
    params: JSON.parse(row.params_json) as SqlParam[],
    tables: JSON.parse(row.tables_json) as string[],
    outcome: row.outcome,
    errorKind: row.error_kind as ErrorKind | null,
    errorMessage: row.error_message,
    summary,
    createdAt: row.created_at,
  };
}

/** Jaccard similarity over lower-cased words */
export function similarity(a: string, b: string): number {
  const words1 = new Set(a.toLowerCase().split(/\s+/).filter(Boolean));
  const words2 = new Set(b.toLowerCase().split(/\s+/).filter(Boolean));
  if (words1.size === 0 || words2.size === 0) return 0;

  let intersection = 0;
  for (const word of words1) {
    if (words2.has(word)) intersection++;
  }
  const union = words1.size + words2.size - intersection;
  return union > 0 ? intersection / union : 0;
}

export interface HistoryStoreOptions {
  now?: () => Date;
}

export class HistoryStore {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: HistoryStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  append(entry: NewHistoryEntry): HistoryEntry {
    const result = this.db
      .prepare(
        `INSERT INTO history_entries (
           session_id, connection_id, request_text, statement_kind, sql_text, params_json, tables_json,
           outcome, error_kind, error_message, row_count, affected_rows, truncated, from_cache, execution_ms, created_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.sessionId,
        entry.connectionId,
        entry.requestText,
        entry.kind,
        entry.sql,
        JSON.stringify(entry.params),
        JSON.stringify(entry.tables),
        entry.outcome,
        entry.errorKind,
        entry.errorMessage,
        entry.summary?.rowCount ?? null,
        entry.summary?.affectedRows ?? null,
        entry.summary ? (entry.summary.truncated ? 1 : 0) : null,
        entry.summary ? (entry.summary.fromCache ? 1 : 0) : null,
        entry.summary?.executionMs ?? null,
        this.now().toISOString(),
      );

    const stored = this.get(Number(result.lastInsertRowid));
    if (!stored) {
      throw new Error('History entry vanished after insert.');
    }
    return stored;
  }

  get(seq: number): HistoryEntry | undefined {
    const row = this.db.prepare('SELECT * FROM history_entries WHERE seq = ?').get(seq) as HistoryRow | undefined;
    return row ? toEntry(row) : undefined;
  }

  /** The last `n` entries of a session, oldest first */
  tail(sessionId: string, n: number): HistoryEntry[] {
    if (n <= 0) return [];
    const rows = this.db
      .prepare(
        `SELECT * FROM (
           SELECT * FROM history_entries WHERE session_id = ? ORDER BY seq DESC LIMIT ?
         ) ORDER BY seq ASC`,
      )
      .all(sessionId, n) as HistoryRow[];
    return rows.map(toEntry);
  }

  /** Newest first; every session when `sessionId` is omitted */
  list(opts: { sessionId?: string; limit?: number; outcome?: HistoryOutcome } = {}): HistoryEntry[] {
    const where: string[] = [];
    const values: Array<string | number> = [];
    if (opts.sessionId !== undefined) {
      where.push('session_id = ?');
      values.push(opts.sessionId);
    }
    if (opts.outcome !== undefined) {
      where.push('outcome = ?');
      values.push(opts.outcome);
    }
    values.push(opts.limit ?? 50);

    const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM history_entries ${clause} ORDER BY seq DESC LIMIT ?`)
      .all(...values) as HistoryRow[];
    return rows.map(toEntry);
  }

  stats(sessionId: string): HistoryStats {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN outcome = 'accepted' THEN 1 ELSE 0 END) AS successful,
                SUM(CASE WHEN outcome = 'rejected' THEN 1 ELSE 0 END) AS rejected,
                SUM(CASE WHEN outcome = 'failed' THEN 1 ELSE 0 END) AS failed,
                AVG(CASE WHEN outcome = 'accepted' THEN execution_ms END) AS avg_ms
         FROM history_entries WHERE session_id = ?`,
      )
      .get(sessionId) as
      | { total: number; successful: number | null; rejected: number | null; failed: number | null; avg_ms: number | null }
      | undefined;

    const total = row?.total ?? 0;
    const successful = row?.successful ?? 0;
    return {
      total,
      successful,
      rejected: row?.rejected ?? 0,
      failed: row?.failed ?? 0,
      successRate: total > 0 ? Math.round((successful / total) * 1000) / 10 : 0,
      averageExecutionMs: row?.avg_ms ?? null,
    };
  }

  /** Successful entries whose request resembles `text`, best match first */
  similar(sessionId: string, text: string, limit = 3): HistoryEntry[] {
    const rows = this.db
      .prepare(`SELECT * FROM history_entries WHERE session_id = ? AND outcome = 'accepted' ORDER BY seq DESC`)
      .all(sessionId) as HistoryRow[];

    return rows
      .map((row) => ({ entry: toEntry(row), score: similarity(text, row.request_text) }))
      .filter((scored) => scored.score > SIMILARITY_THRESHOLD)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((scored) => scored.entry);
  }

  /**
   * Follow-up suggestions from the tables recent successful requests touched,
   * plus starters for the first few schema tables.
   */
  suggest(sessionId: string, current: string | undefined, schemaTables: readonly string[]): Suggestions {
    const recent = this.list({ sessionId, outcome: 'accepted', limit: 3 });
    const suggestions: string[] = [];

    const recentTable = recent.flatMap((entry) => entry.tables)[0];
    if (recentTable) {
      suggestions.push(
        `Show me the total count of records in ${recentTable}`,
        `What are the different categories in ${recentTable}?`,
        `Show me the most recent entries in ${recentTable}`,
      );
    }

    for (const table of schemaTables.slice(0, 3)) {
      suggestions.push(
        `Show me the structure of the ${table} table`,
        `How many records are in ${table}?`,
        `What are the most recent entries in ${table}?`,
      );
    }

    if (suggestions.length === 0) {
      suggestions.push(...DEFAULT_SUGGESTIONS);
    }

    const similar = current && current.trim() ? this.similar(sessionId, current) : [];
    return { suggestions: [...new Set(suggestions)].slice(0, MAX_SUGGESTIONS), similar };
  }
}
