/**
 * Query executor: runs an accepted candidate on the live connection.
 *
 * SELECTs without a LIMIT get one appended at ceiling + 1, so an over-long
 * result is detected and flagged instead of loaded in full.
 */

import { engineRejected, errorMessage, isPipelineError } from './errors.js';
import type { ConnectionHandle, ConnectionManager } from './db/connection-manager.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import type { DriverResult, SqlParam } from './db/types.js';
import { ensureLimit } from './policy/rewrite.js';
import type { CandidateStatement, StatementKind } from './policy/types.js';
import type { Logger } from './utils/logger.js';

export interface QueryResult {
  /** SQL as compiled */
  readonly sql: string;
  /** SQL as sent to the engine, after LIMIT injection */
  readonly executedSql: string;
  readonly params: readonly SqlParam[];
  readonly kind: StatementKind;
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, unknown>>[];
  readonly rowCount: number;
  readonly affectedRows: number;
  readonly truncated: boolean;
  readonly fromCache: boolean;
  readonly executionMs: number;
  /** Lint findings from validation */
  readonly warnings: readonly string[];
  /** Tables the statement touched */
  readonly tables: readonly string[];
}

export interface QueryExecutorOptions {
  maxRows?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  warnings?: readonly string[];
}

export class QueryExecutor {
  private readonly maxRows: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(
    private readonly connections: ConnectionManager,
    options: QueryExecutorOptions = {},
  ) {
    this.maxRows = options.maxRows ?? SAFE_DEFAULTS.maxRows;
    this.timeoutMs = options.timeoutMs ?? SAFE_DEFAULTS.executionTimeoutMs;
    this.logger = options.logger;
  }

  async run(candidate: CandidateStatement, handle: ConnectionHandle, options: RunOptions = {}): Promise<QueryResult> {
    const executedSql =
      candidate.kind === 'select' ? ensureLimit(candidate.sql, candidate.features.hasLimit, this.maxRows + 1).sql : candidate.sql;

    const started = performance.now();
    let raw: DriverResult;
    try {
      raw = await this.connections.execute(handle, executedSql, candidate.params, {
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      });
    } catch (err: unknown) {
      if (isPipelineError(err)) throw err;
      // the engine's own words, untouched
      throw engineRejected(errorMessage(err), { sql: executedSql });
    }
    const executionMs = Math.round((performance.now() - started) * 100) / 100;

    const truncated = candidate.kind === 'select' && raw.rows.length > this.maxRows;
    const rows = truncated ? raw.rows.slice(0, this.maxRows) : raw.rows;

    this.logger?.info(
      { kind: candidate.kind, rowCount: rows.length, affectedRows: raw.affectedRows, truncated, executionMs },
      'statement executed',
    );

    return Object.freeze({
      sql: candidate.sql,
      executedSql,
      params: candidate.params,
      kind: candidate.kind,
      columns: Object.freeze([...raw.columns]),
      rows: Object.freeze(rows.map((row) => Object.freeze({ ...row }))),
      rowCount: rows.length,
      affectedRows: raw.affectedRows,
      truncated,
      fromCache: false,
      executionMs,
      warnings: Object.freeze([...(options.warnings ?? [])]),
      tables: candidate.referencedTables,
    });
  }
}
