/**
 * Postgres adapter.
 * Uses the `pg` driver with a session-wide statement timeout.
 */

import pg from 'pg';
import type { Client as PgClient } from 'pg';
import { SAFE_DEFAULTS, capRows } from '../defaults.js';
import {
  buildTableSchema,
  groupForeignKeys,
  groupIndexes,
  type ConnectionParams,
  type DbConnection,
  type ExecuteLimits,
  type ExecutionOutcome,
  type Row,
  type TableSchema,
} from '../types.js';

const { Client } = pg;

interface ColumnRow {
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
  is_pk: boolean;
}

interface ForeignKeyRow {
  constraint_name: string;
  column_name: string;
  referred_table: string;
  referred_column: string;
}

interface IndexRow {
  index_name: string;
  column_name: string;
  is_unique: boolean;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function sslOption(sslmode?: string): false | { rejectUnauthorized: boolean } {
  const mode = sslmode?.trim().toLowerCase();
  if (!mode || mode === 'disable' || mode === 'allow' || mode === 'prefer') return false;
  return { rejectUnauthorized: mode === 'verify-ca' || mode === 'verify-full' };
}

export class PostgresConnection implements DbConnection {
  readonly dialect = 'postgresql' as const;
  readonly database: string;
  private connected = false;
  private ended = false;

  private constructor(
    private readonly client: PgClient,
    database: string,
    private readonly maxRows: number,
  ) {
    this.database = database;
  }

  static async open(params: ConnectionParams, limits: ExecuteLimits = {}): Promise<PostgresConnection> {
    const client = new Client({
      host: params.host,
      port: params.port,
      database: params.database,
      user: params.username,
      password: params.password,
      ssl: sslOption(params.sslmode),
      connectionTimeoutMillis: SAFE_DEFAULTS.connectTimeoutMs,
      statement_timeout: limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
    });
    await client.connect();

    const conn = new PostgresConnection(client, params.database, limits.maxRows ?? SAFE_DEFAULTS.maxRows);
    conn.connected = true;
    // an idle client that loses its socket emits 'error'
    client.on('error', () => {
      conn.connected = false;
    });
    client.on('end', () => {
      conn.connected = false;
    });
    return conn;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async listTables(): Promise<string[]> {
    const res = await this.client.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = current_schema()
        AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `);
    return res.rows.map((row) => row.table_name);
  }

  async describeTable(table: string): Promise<TableSchema> {
    const colsRes = await this.client.query<ColumnRow>(
      `
      SELECT c.column_name, c.data_type, c.is_nullable, c.column_default,
             CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
      FROM information_schema.columns c
      LEFT JOIN (
        SELECT ku.table_schema, ku.table_name, ku.column_name
        FROM information_schema.table_constraints tc
        JOIN information_schema.key_column_usage ku
          ON tc.constraint_name = ku.constraint_name
          AND tc.table_schema = ku.table_schema
        WHERE tc.constraint_type = 'PRIMARY KEY'
      ) pk ON pk.table_schema = c.table_schema
          AND pk.table_name = c.table_name
          AND pk.column_name = c.column_name
      WHERE c.table_schema = current_schema() AND c.table_name = $1
      ORDER BY c.ordinal_position
    `,
      [table],
    );
    if (colsRes.rows.length === 0) {
      throw new Error(`Table "${table}" does not exist.`);
    }

    const fkRes = await this.client.query<ForeignKeyRow>(
      `
      SELECT tc.constraint_name, kcu.column_name,
             ccu.table_name AS referred_table, ccu.column_name AS referred_column
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
      JOIN information_schema.constraint_column_usage ccu
        ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
      WHERE tc.constraint_type = 'FOREIGN KEY'
        AND tc.table_schema = current_schema()
        AND tc.table_name = $1
      ORDER BY tc.constraint_name, kcu.ordinal_position
    `,
      [table],
    );

    const idxRes = await this.client.query<IndexRow>(
      `
      SELECT i.relname AS index_name, a.attname::text AS column_name, ix.indisunique AS is_unique
      FROM pg_class t
      JOIN pg_namespace n ON n.oid = t.relnamespace
      JOIN pg_index ix ON ix.indrelid = t.oid
      JOIN pg_class i ON i.oid = ix.indexrelid
      JOIN pg_attribute a ON a.attrelid = t.oid AND a.attnum = ANY(ix.indkey)
      WHERE n.nspname = current_schema() AND t.relname = $1 AND NOT ix.indisprimary
      ORDER BY i.relname, a.attnum
    `,
      [table],
    );

    return buildTableSchema(
      table,
      colsRes.rows.map((row) => ({
        name: row.column_name,
        dataType: row.data_type,
        nullable: row.is_nullable === 'YES',
        isPrimaryKey: row.is_pk === true,
        defaultValue: row.column_default ?? undefined,
      })),
      groupForeignKeys(
        fkRes.rows.map((row) => ({
          constraint: row.constraint_name,
          column: row.column_name,
          referredTable: row.referred_table,
          referredColumn: row.referred_column,
        })),
      ),
      groupIndexes(idxRes.rows.map((row) => ({ name: row.index_name, column: row.column_name, unique: row.is_unique }))),
    );
  }

  async sampleRows(table: string, limit: number): Promise<Row[]> {
    const res = await this.client.query<Row>(`SELECT * FROM ${quoteIdent(table)} LIMIT $1`, [limit]);
    return res.rows;
  }

  async execute(sql: string): Promise<ExecutionOutcome> {
    const start = performance.now();
    const result = await this.client.query<Row>(sql);
    const execMs = Math.round(performance.now() - start);

    // Statements without a result set (INSERT, UPDATE, DDL) report no fields.
    if (result.fields.length === 0) {
      return { kind: 'affected', affectedRowCount: result.rowCount ?? 0, execMs };
    }
    const { rows, truncated } = capRows(result.rows, this.maxRows);
    return {
      kind: 'rows',
      columns: result.fields.map((f) => f.name),
      rows,
      rowCount: result.rows.length,
      truncated,
      execMs,
    };
  }

  async close(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.connected = false;
    await this.client.end();
  }
}
