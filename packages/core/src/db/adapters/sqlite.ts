/**
 * SQLite driver for file-based databases.
 * Uses better-sqlite3, which executes synchronously on the calling thread:
 * a statement that has started cannot be interrupted, so the timeout and
 * abort signal are honored up to the moment the statement begins.
 */

import Database from 'better-sqlite3';
import { toPositional } from '../placeholders.js';
import type {
  ConnectionDescriptor,
  DbDriver,
  DriverResult,
  KeyRole,
  RunOptions,
  SchemaSnapshot,
  SqlParam,
  TableInfo,
} from '../types.js';

type SqliteValue = string | number | null;

function toSqliteValue(value: SqlParam): SqliteValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class SqliteDriver implements DbDriver {
  readonly engine = 'sqlite' as const;
  private db: Database.Database | null = null;

  constructor(private readonly descriptor: ConnectionDescriptor) {}

  async open(): Promise<void> {
    const path = this.descriptor.path?.trim();
    if (!path) {
      throw new Error('SQLite database path is required.');
    }
    const db = new Database(path, { fileMustExist: true });
    db.pragma('foreign_keys = ON');
    this.db = db;
  }

  async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    db?.close();
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new Error('SQLite database is not open.');
    }
    return this.db;
  }

  async serverVersion(): Promise<string> {
    const row = this.requireDb().prepare('SELECT sqlite_version() AS version').get() as { version?: string } | undefined;
    return row?.version ?? 'sqlite';
  }

  async run(sql: string, params: readonly SqlParam[], options: RunOptions): Promise<DriverResult> {
    const db = this.requireDb();
    if (options.signal.aborted) {
      throw new Error('Statement aborted before execution.');
    }
    const positional = toPositional(sql, params);
    const values = positional.values.map(toSqliteValue);
    const stmt = db.prepare(positional.sql);

    if (!stmt.reader) {
      const run = stmt.run(...values);
      return { columns: [], rows: [], reader: false, affectedRows: Number(run.changes ?? 0) };
    }

    const rows = stmt.all(...values) as Record<string, unknown>[];
    return {
      columns: stmt.columns().map((column) => column.name),
      rows,
      reader: true,
      affectedRows: 0,
    };
  }

  async introspect(): Promise<SchemaSnapshot> {
    const db = this.requireDb();
    const tables = db
      .prepare(`
        SELECT name
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all() as Array<{ name: string }>;

    const tableInfos: TableInfo[] = [];
    for (const { name: tableName } of tables) {
      const columns = db.prepare(`PRAGMA table_info(${quoteIdent(tableName)})`).all() as Array<{
        name: string;
        type: string;
        notnull: 0 | 1;
        pk: number;
      }>;
      const foreign = db.prepare(`PRAGMA foreign_key_list(${quoteIdent(tableName)})`).all() as Array<{ from: string }>;
      const foreignCols = new Set(foreign.map((fk) => fk.from));
      const uniqueCols = this.uniqueColumns(db, tableName);

      const countRow = db.prepare(`SELECT COUNT(*) AS c FROM ${quoteIdent(tableName)}`).get() as { c: number } | undefined;

      tableInfos.push({
        name: tableName,
        schema: 'main',
        rowCountEstimate: Number(countRow?.c ?? 0),
        columns: columns.map((column) => {
          let keyRole: KeyRole = 'none';
          if (column.pk > 0) keyRole = 'primary';
          else if (foreignCols.has(column.name)) keyRole = 'foreign';
          else if (uniqueCols.has(column.name)) keyRole = 'unique';
          return {
            name: column.name,
            dataType: column.type || 'TEXT',
            // PRAGMA reports notnull = 0 for INTEGER PRIMARY KEY, yet it can never hold NULL
            nullable: column.notnull === 0 && column.pk === 0,
            keyRole,
          };
        }),
      });
    }

    return { tables: tableInfos, capturedAt: new Date() };
  }

  /** Columns covered on their own by a UNIQUE index */
  private uniqueColumns(db: Database.Database, tableName: string): Set<string> {
    const indexes = db.prepare(`PRAGMA index_list(${quoteIdent(tableName)})`).all() as Array<{
      name: string;
      unique: 0 | 1;
    }>;
    const result = new Set<string>();
    for (const index of indexes) {
      if (index.unique !== 1) continue;
      const cols = db.prepare(`PRAGMA index_info(${quoteIdent(index.name)})`).all() as Array<{ name: string }>;
      if (cols.length === 1) {
        result.add(cols[0].name);
      }
    }
    return result;
  }
}
