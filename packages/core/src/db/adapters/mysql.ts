/**
 * MySQL driver for askdb, built on mysql2/promise.
 */

import mysql from 'mysql2/promise';
import type { Connection, ConnectionOptions, FieldPacket, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { toPositional } from '../placeholders.js';
import { SAFE_DEFAULTS, DEFAULT_PORTS } from '../defaults.js';
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

function connectionOptions(descriptor: ConnectionDescriptor): ConnectionOptions {
  return {
    host: descriptor.host ?? 'localhost',
    port: descriptor.port ?? DEFAULT_PORTS.mysql,
    database: descriptor.database,
    user: descriptor.user,
    password: descriptor.password,
    ssl: descriptor.ssl ? { rejectUnauthorized: false } : undefined,
    connectTimeout: descriptor.connectTimeoutMs ?? SAFE_DEFAULTS.connectTimeoutMs,
  };
}

function keyRoleFor(columnKey: string, isForeign: boolean): KeyRole {
  if (columnKey === 'PRI') return 'primary';
  if (isForeign) return 'foreign';
  if (columnKey === 'UNI') return 'unique';
  return 'none';
}

export class MySqlDriver implements DbDriver {
  readonly engine = 'mysql' as const;
  private conn: Connection | null = null;
  private threadId: number | null = null;

  constructor(private readonly descriptor: ConnectionDescriptor) {}

  async open(): Promise<void> {
    const conn = await mysql.createConnection(connectionOptions(this.descriptor));
    const [rows] = await conn.query<RowDataPacket[]>('SELECT CONNECTION_ID() AS id');
    this.threadId = rows.length > 0 ? Number(rows[0].id) : null;
    this.conn = conn;
  }

  async close(): Promise<void> {
    const conn = this.conn;
    this.conn = null;
    this.threadId = null;
    if (conn) {
      await conn.end();
    }
  }

  private requireConnection(): Connection {
    if (!this.conn) {
      throw new Error('MySQL connection is not open.');
    }
    return this.conn;
  }

  async serverVersion(): Promise<string> {
    const [rows] = await this.requireConnection().query<RowDataPacket[]>('SELECT VERSION() AS version');
    return rows.length > 0 ? String(rows[0].version) : 'mysql';
  }

  async run(sql: string, params: readonly SqlParam[], options: RunOptions): Promise<DriverResult> {
    const conn = this.requireConnection();
    const positional = toPositional(sql, params);
    const onAbort = (): void => {
      void this.killQuery();
    };
    options.signal.addEventListener('abort', onAbort, { once: true });

    try {
      const [result, fields] = await conn.query<RowDataPacket[] | ResultSetHeader>(
        { sql: positional.sql, timeout: options.timeoutMs },
        positional.values,
      );
      if (Array.isArray(result)) {
        return {
          columns: (fields ?? []).map((f: FieldPacket) => f.name),
          rows: result.map((row) => ({ ...row })),
          reader: true,
          affectedRows: 0,
        };
      }
      return { columns: [], rows: [], reader: false, affectedRows: result.affectedRows };
    } finally {
      options.signal.removeEventListener('abort', onAbort);
    }
  }

  private async killQuery(): Promise<void> {
    if (this.threadId === null) return;
    let side: Connection | null = null;
    try {
      side = await mysql.createConnection(connectionOptions(this.descriptor));
      await side.query('KILL QUERY ?', [this.threadId]);
    } catch {
      // best effort; the per-query timeout still applies
    } finally {
      await side?.end().catch(() => undefined);
    }
  }

  async introspect(): Promise<SchemaSnapshot> {
    const conn = this.requireConnection();

    const [tables] = await conn.query<RowDataPacket[]>(`
      SELECT TABLE_NAME AS table_name, TABLE_ROWS AS row_estimate
      FROM information_schema.TABLES
      WHERE TABLE_SCHEMA = DATABASE() AND TABLE_TYPE = 'BASE TABLE'
      ORDER BY TABLE_NAME
    `);

    const [columns] = await conn.query<RowDataPacket[]>(`
      SELECT TABLE_NAME AS table_name, COLUMN_NAME AS column_name, COLUMN_TYPE AS data_type,
             IS_NULLABLE AS is_nullable, COLUMN_KEY AS column_key
      FROM information_schema.COLUMNS
      WHERE TABLE_SCHEMA = DATABASE()
      ORDER BY TABLE_NAME, ORDINAL_POSITION
    `);

    const [foreign] = await conn.query<RowDataPacket[]>(`
      SELECT TABLE_NAME AS table_name, COLUMN_NAME AS column_name
      FROM information_schema.KEY_COLUMN_USAGE
      WHERE TABLE_SCHEMA = DATABASE() AND REFERENCED_TABLE_NAME IS NOT NULL
    `);

    const foreignKeys = new Set(foreign.map((row) => `${row.table_name}.${row.column_name}`));
    const tableMap = new Map<string, TableInfo>();
    for (const row of tables) {
      const name = String(row.table_name);
      tableMap.set(name, {
        name,
        schema: this.descriptor.database,
        columns: [],
        rowCountEstimate: Math.max(0, Number(row.row_estimate) || 0),
      });
    }

    for (const row of columns) {
      const table = tableMap.get(String(row.table_name));
      if (table) {
        const name = String(row.column_name);
        table.columns.push({
          name,
          dataType: String(row.data_type),
          nullable: row.is_nullable === 'YES',
          keyRole: keyRoleFor(String(row.column_key ?? ''), foreignKeys.has(`${table.name}.${name}`)),
        });
      }
    }

    return { tables: Array.from(tableMap.values()), capturedAt: new Date() };
  }
}
