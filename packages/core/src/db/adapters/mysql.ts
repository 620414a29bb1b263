/**
 * MySQL / MariaDB adapter backed by mysql2's promise API.
 */

import mysql, { type Connection, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
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

interface TableRow extends RowDataPacket {
  name: string;
}

interface ColumnRow extends RowDataPacket {
  name: string;
  dataType: string;
  nullable: string;
  defaultValue: string | null;
  columnKey: string;
}

interface ForeignKeyRow extends RowDataPacket {
  constraintName: string;
  columnName: string;
  referredTable: string;
  referredColumn: string;
}

interface IndexRow extends RowDataPacket {
  indexName: string;
  columnName: string;
  nonUnique: number;
}

function quoteIdent(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/** mysql2 flags errors that kill the socket with `fatal: true`. */
function isFatal(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'fatal' in err && err.fatal === true;
}

export class MySqlConnection implements DbConnection {
  readonly dialect = 'mysql' as const;
  readonly database: string;
  private connected = true;

  private constructor(
    private readonly conn: Connection,
    database: string,
    private readonly limits: Required<ExecuteLimits>,
  ) {
    this.database = database;
  }

  static async open(params: ConnectionParams, limits: ExecuteLimits = {}): Promise<MySqlConnection> {
    const sslmode = params.sslmode?.trim().toLowerCase();
    const conn = await mysql.createConnection({
      host: params.host,
      port: params.port,
      database: params.database,
      user: params.username,
      password: params.password,
      connectTimeout: SAFE_DEFAULTS.connectTimeoutMs,
      ssl: sslmode && sslmode !== 'disable' ? { rejectUnauthorized: sslmode === 'verify-full' } : undefined,
    });
    const connection = new MySqlConnection(conn, params.database, {
      maxRows: limits.maxRows ?? SAFE_DEFAULTS.maxRows,
      statementTimeoutMs: limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
    });
    // the promise wrapper only forwards 'error' once it has a listener;
    // without one a dropped idle socket throws from the event loop
    conn.on('error', () => {
      connection.connected = false;
    });
    conn.on('end', () => {
      connection.connected = false;
    });
    return connection;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private async query<T extends RowDataPacket[] | ResultSetHeader>(sql: string, values: unknown[] = []): Promise<T> {
    try {
      const [result] = await this.conn.query<T>({ sql, values, timeout: this.limits.statementTimeoutMs });
      return result;
    } catch (err: unknown) {
      if (isFatal(err)) this.connected = false;
      throw err;
    }
  }

  async listTables(): Promise<string[]> {
    const rows = await this.query<TableRow[]>(`
      SELECT table_name AS name
      FROM information_schema.tables
      WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `);
    return rows.map((row) => row.name);
  }

  async describeTable(table: string): Promise<TableSchema> {
    const columns = await this.query<ColumnRow[]>(
      `
      SELECT column_name AS name, column_type AS dataType, is_nullable AS nullable,
             column_default AS defaultValue, column_key AS columnKey
      FROM information_schema.columns
      WHERE table_schema = DATABASE() AND table_name = ?
      ORDER BY ordinal_position
    `,
      [table],
    );
    if (columns.length === 0) {
      throw new Error(`Table "${table}" does not exist.`);
    }

    const fks = await this.query<ForeignKeyRow[]>(
      `
      SELECT constraint_name AS constraintName, column_name AS columnName,
             referenced_table_name AS referredTable, referenced_column_name AS referredColumn
      FROM information_schema.key_column_usage
      WHERE table_schema = DATABASE() AND table_name = ? AND referenced_table_name IS NOT NULL
      ORDER BY constraint_name, ordinal_position
    `,
      [table],
    );

    const indexes = await this.query<IndexRow[]>(
      `
      SELECT index_name AS indexName, column_name AS columnName, non_unique AS nonUnique
      FROM information_schema.statistics
      WHERE table_schema = DATABASE() AND table_name = ? AND index_name <> 'PRIMARY'
      ORDER BY index_name, seq_in_index
    `,
      [table],
    );

    return buildTableSchema(
      table,
      columns.map((col) => ({
        name: col.name,
        dataType: col.dataType,
        nullable: col.nullable === 'YES',
        isPrimaryKey: col.columnKey === 'PRI',
        defaultValue: col.defaultValue ?? undefined,
      })),
      groupForeignKeys(
        fks.map((fk) => ({
          constraint: fk.constraintName,
          column: fk.columnName,
          referredTable: fk.referredTable,
          referredColumn: fk.referredColumn,
        })),
      ),
      groupIndexes(indexes.map((idx) => ({ name: idx.indexName, column: idx.columnName, unique: Number(idx.nonUnique) === 0 }))),
    );
  }

  async sampleRows(table: string, limit: number): Promise<Row[]> {
    return this.query<RowDataPacket[]>(`SELECT * FROM ${quoteIdent(table)} LIMIT ?`, [limit]);
  }

  async execute(sql: string): Promise<ExecutionOutcome> {
    const start = performance.now();
    const result = await this.query<RowDataPacket[] | ResultSetHeader>(sql);
    const execMs = Math.round(performance.now() - start);

    if (!Array.isArray(result)) {
      return { kind: 'affected', affectedRowCount: result.affectedRows, execMs };
    }
    const { rows, truncated } = capRows<Row>(result, this.limits.maxRows);
    return {
      kind: 'rows',
      columns: result.length > 0 ? Object.keys(result[0]) : [],
      rows,
      rowCount: result.length,
      truncated,
      execMs,
    };
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.conn.end();
  }
}
