/**
 * SQL Server adapter backed by the `mssql` (tedious) driver.
 */

import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
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

interface ColumnRow {
  name: string;
  dataType: string;
  nullable: string;
  defaultValue: string | null;
  isPrimaryKey: number;
}

interface ForeignKeyRow {
  constraintName: string;
  columnName: string;
  referredTable: string;
  referredColumn: string;
}

interface IndexRow {
  indexName: string;
  columnName: string;
  isUnique: boolean;
}

function quoteIdent(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

export class MssqlConnection implements DbConnection {
  readonly dialect = 'mssql' as const;
  readonly database: string;

  private constructor(
    private readonly pool: ConnectionPool,
    database: string,
    private readonly maxRows: number,
  ) {
    this.database = database;
  }

  static async open(params: ConnectionParams, limits: ExecuteLimits = {}): Promise<MssqlConnection> {
    const sslmode = params.sslmode?.trim().toLowerCase();
    const pool = new sql.ConnectionPool({
      server: params.host || 'localhost',
      port: params.port || 1433,
      database: params.database,
      user: params.username,
      password: params.password,
      options: {
        encrypt: Boolean(sslmode && sslmode !== 'disable'),
        trustServerCertificate: sslmode !== 'verify-full',
      },
      pool: { max: 1, min: 0, idleTimeoutMillis: 30_000 },
      connectionTimeout: SAFE_DEFAULTS.connectTimeoutMs,
      requestTimeout: limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
    });
    await pool.connect();
    return new MssqlConnection(pool, params.database, limits.maxRows ?? SAFE_DEFAULTS.maxRows);
  }

  isConnected(): boolean {
    return this.pool.connected;
  }

  async listTables(): Promise<string[]> {
    const result = await this.pool.request().query<{ name: string }>(`
      SELECT TABLE_NAME AS name
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_TYPE = 'BASE TABLE' AND TABLE_SCHEMA = SCHEMA_NAME()
      ORDER BY TABLE_NAME
    `);
    return result.recordset.map((row) => row.name);
  }

  async describeTable(table: string): Promise<TableSchema> {
    const columns = await this.pool
      .request()
      .input('tableName', sql.NVarChar, table)
      .query<ColumnRow>(`
        SELECT c.COLUMN_NAME AS name, c.DATA_TYPE AS dataType, c.IS_NULLABLE AS nullable,
               c.COLUMN_DEFAULT AS defaultValue,
               CASE WHEN pk.COLUMN_NAME IS NULL THEN 0 ELSE 1 END AS isPrimaryKey
        FROM INFORMATION_SCHEMA.COLUMNS c
        LEFT JOIN (
          SELECT kcu.TABLE_SCHEMA, kcu.TABLE_NAME, kcu.COLUMN_NAME
          FROM INFORMATION_SCHEMA.TABLE_CONSTRAINTS tc
          JOIN INFORMATION_SCHEMA.KEY_COLUMN_USAGE kcu
            ON tc.CONSTRAINT_NAME = kcu.CONSTRAINT_NAME AND tc.TABLE_SCHEMA = kcu.TABLE_SCHEMA
          WHERE tc.CONSTRAINT_TYPE = 'PRIMARY KEY'
        ) pk ON pk.TABLE_SCHEMA = c.TABLE_SCHEMA AND pk.TABLE_NAME = c.TABLE_NAME AND pk.COLUMN_NAME = c.COLUMN_NAME
        WHERE c.TABLE_SCHEMA = SCHEMA_NAME() AND c.TABLE_NAME = @tableName
        ORDER BY c.ORDINAL_POSITION
      `);
    if (columns.recordset.length === 0) {
      throw new Error(`Table "${table}" does not exist.`);
    }

    const fks = await this.pool
      .request()
      .input('tableName', sql.NVarChar, table)
      .query<ForeignKeyRow>(`
        SELECT fk.name AS constraintName, pc.name AS columnName,
               rt.name AS referredTable, rc.name AS referredColumn
        FROM sys.foreign_keys fk
        JOIN sys.foreign_key_columns fkc ON fkc.constraint_object_id = fk.object_id
        JOIN sys.columns pc ON pc.object_id = fkc.parent_object_id AND pc.column_id = fkc.parent_column_id
        JOIN sys.tables rt ON rt.object_id = fkc.referenced_object_id
        JOIN sys.columns rc ON rc.object_id = fkc.referenced_object_id AND rc.column_id = fkc.referenced_column_id
        WHERE fk.parent_object_id = OBJECT_ID(QUOTENAME(SCHEMA_NAME()) + '.' + QUOTENAME(@tableName))
        ORDER BY fk.name, fkc.constraint_column_id
      `);

    const indexes = await this.pool
      .request()
      .input('tableName', sql.NVarChar, table)
      .query<IndexRow>(`
        SELECT i.name AS indexName, c.name AS columnName, i.is_unique AS isUnique
        FROM sys.indexes i
        JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
        JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
        WHERE i.object_id = OBJECT_ID(QUOTENAME(SCHEMA_NAME()) + '.' + QUOTENAME(@tableName))
          AND i.is_primary_key = 0 AND i.name IS NOT NULL
        ORDER BY i.name, ic.key_ordinal
      `);

    return buildTableSchema(
      table,
      columns.recordset.map((col) => ({
        name: col.name,
        dataType: col.dataType,
        nullable: col.nullable === 'YES',
        isPrimaryKey: col.isPrimaryKey === 1,
        defaultValue: col.defaultValue ?? undefined,
      })),
      groupForeignKeys(
        fks.recordset.map((fk) => ({
          constraint: fk.constraintName,
          column: fk.columnName,
          referredTable: fk.referredTable,
          referredColumn: fk.referredColumn,
        })),
      ),
      groupIndexes(indexes.recordset.map((idx) => ({ name: idx.indexName, column: idx.columnName, unique: idx.isUnique }))),
    );
  }

  async sampleRows(table: string, limit: number): Promise<Row[]> {
    const result = await this.pool
      .request()
      .input('limit', sql.Int, limit)
      .query<Row>(`SELECT TOP (@limit) * FROM ${quoteIdent(table)}`);
    return result.recordset;
  }

  async execute(statement: string): Promise<ExecutionOutcome> {
    const start = performance.now();
    const result = await this.pool.request().query<Row>(statement);
    const execMs = Math.round(performance.now() - start);

    // recordset is undefined at runtime for statements that return no result set
    const recordset: Row[] | undefined = result.recordset;
    if (recordset === undefined) {
      const affected = result.rowsAffected.reduce((sum, n) => sum + n, 0);
      return { kind: 'affected', affectedRowCount: affected, execMs };
    }
    const { rows, truncated } = capRows(recordset, this.maxRows);
    return {
      kind: 'rows',
      columns: Object.keys(result.recordset.columns),
      rows,
      rowCount: recordset.length,
      truncated,
      execMs,
    };
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
