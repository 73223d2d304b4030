/**
 * Postgres driver for askdb.
 * Uses the `pg` driver; one Client per live connection.
 */

import pg from 'pg';
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

const { Client } = pg;

function clientConfig(descriptor: ConnectionDescriptor): pg.ClientConfig {
  return {
    host: descriptor.host ?? 'localhost',
    port: descriptor.port ?? DEFAULT_PORTS.postgres,
    database: descriptor.database,
    user: descriptor.user,
    password: descriptor.password,
    ssl: descriptor.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: descriptor.connectTimeoutMs ?? SAFE_DEFAULTS.connectTimeoutMs,
  };
}

const KEY_ROLE_RANK: Record<KeyRole, number> = { primary: 3, foreign: 2, unique: 1, none: 0 };

export class PostgresDriver implements DbDriver {
  readonly engine = 'postgres' as const;
  private client: pg.Client | null = null;
  private backendPid: number | null = null;

  constructor(private readonly descriptor: ConnectionDescriptor) {}

  async open(): Promise<void> {
    const client = new Client(clientConfig(this.descriptor));
    await client.connect();
    const res = await client.query<{ pid: number }>('SELECT pg_backend_pid() AS pid');
    this.backendPid = res.rows[0]?.pid ?? null;
    this.client = client;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.backendPid = null;
    if (client) {
      await client.end();
    }
  }

  private requireClient(): pg.Client {
    if (!this.client) {
      throw new Error('Postgres connection is not open.');
    }
    return this.client;
  }

  async serverVersion(): Promise<string> {
    const res = await this.requireClient().query<{ version: string }>('SELECT version() AS version');
    return res.rows[0]?.version ?? 'postgres';
  }

  /**
   * statement_timeout bounds the server side; the abort signal cancels the
   * backend through a side connection so nothing keeps running after we give up.
   */
  async run(sql: string, params: readonly SqlParam[], options: RunOptions): Promise<DriverResult> {
    const client = this.requireClient();
    const onAbort = (): void => {
      void this.cancelBackend();
    };
    options.signal.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query(`SET statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`);
      const result = await client.query<Record<string, unknown>>({ text: sql, values: [...params] });
      const columns = result.fields?.map((f) => f.name) ?? [];
      const reader = result.command === 'SELECT' || columns.length > 0;
      return {
        columns,
        rows: reader ? result.rows : [],
        reader,
        affectedRows: reader ? 0 : result.rowCount ?? 0,
      };
    } finally {
      options.signal.removeEventListener('abort', onAbort);
    }
  }

  private async cancelBackend(): Promise<void> {
    if (this.backendPid === null) return;
    const side = new Client(clientConfig(this.descriptor));
    try {
      await side.connect();
      await side.query('SELECT pg_cancel_backend($1)', [this.backendPid]);
    } catch {
      // best effort; statement_timeout still bounds the statement
    } finally {
      await side.end().catch(() => undefined);
    }
  }

  /**
   * Introspect tables, columns and key roles (primary, foreign, unique).
   */
  async introspect(): Promise<SchemaSnapshot> {
    const client = this.requireClient();

    const tablesRes = await client.query<{ table_schema: string; table_name: string; row_estimate: string | null }>(`
      SELECT t.table_schema, t.table_name,
             c.reltuples::bigint AS row_estimate
      FROM information_schema.tables t
      LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
      LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
      WHERE t.table_schema NOT IN ('pg_catalog', 'information_schema')
        AND t.table_type = 'BASE TABLE'
      ORDER BY t.table_schema, t.table_name
    `);

    const colsRes = await client.query<{
      table_schema: string;
      table_name: string;
      column_name: string;
      data_type: string;
      is_nullable: string;
    }>(`
      SELECT c.table_schema, c.table_name, c.column_name, c.data_type, c.is_nullable
      FROM information_schema.columns c
      WHERE c.table_schema NOT IN ('pg_catalog', 'information_schema')
      ORDER BY c.table_schema, c.table_name, c.ordinal_position
    `);

    const keysRes = await client.query<{
      table_schema: string;
      table_name: string;
      column_name: string;
      constraint_type: string;
    }>(`
      SELECT ku.table_schema, ku.table_name, ku.column_name, tc.constraint_type
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage ku
        ON tc.constraint_name = ku.constraint_name
       AND tc.table_schema = ku.table_schema
      WHERE tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY', 'UNIQUE')
        AND tc.table_schema NOT IN ('pg_catalog', 'information_schema')
    `);

    const keyRoles = new Map<string, KeyRole>();
    for (const row of keysRes.rows) {
      const key = `${row.table_schema}.${row.table_name}.${row.column_name}`;
      const role: KeyRole =
        row.constraint_type === 'PRIMARY KEY' ? 'primary' : row.constraint_type === 'FOREIGN KEY' ? 'foreign' : 'unique';
      const existing = keyRoles.get(key) ?? 'none';
      if (KEY_ROLE_RANK[role] > KEY_ROLE_RANK[existing]) {
        keyRoles.set(key, role);
      }
    }

    const tableMap = new Map<string, TableInfo>();
    for (const row of tablesRes.rows) {
      tableMap.set(`${row.table_schema}.${row.table_name}`, {
        name: row.table_name,
        schema: row.table_schema,
        columns: [],
        rowCountEstimate: Math.max(0, Number(row.row_estimate) || 0),
      });
    }

    for (const row of colsRes.rows) {
      const table = tableMap.get(`${row.table_schema}.${row.table_name}`);
      if (table) {
        table.columns.push({
          name: row.column_name,
          dataType: row.data_type,
          nullable: row.is_nullable === 'YES',
          keyRole: keyRoles.get(`${row.table_schema}.${row.table_name}.${row.column_name}`) ?? 'none',
        });
      }
    }

    return { tables: Array.from(tableMap.values()), capturedAt: new Date() };
  }
}
