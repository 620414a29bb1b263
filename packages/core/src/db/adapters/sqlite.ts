/**
 * SQLite adapter. Uses better-sqlite3; the connection's `database` is the
 * file path, which must already exist.
 */

import Database from 'better-sqlite3';
import { SAFE_DEFAULTS, capRows } from '../defaults.js';
import {
  buildTableSchema,
  groupForeignKeys,
  groupIndexes,
  type DbConnection,
  type ExecuteLimits,
  type ExecutionOutcome,
  type Row,
  type TableSchema,
} from '../types.js';

interface TableInfoRow {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
  dflt_value: string | null;
}

interface ForeignKeyRow {
  id: number;
  table: string;
  from: string;
  to: string | null;
}

interface IndexListRow {
  name: string;
  unique: 0 | 1;
  origin: string;
}

interface IndexInfoRow {
  name: string;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class SqliteConnection implements DbConnection {
  readonly dialect = 'sqlite' as const;
  readonly database: string;
  private readonly db: Database.Database;
  private readonly maxRows: number;

  constructor(filepath: string, limits: ExecuteLimits = {}) {
    if (!filepath.trim()) {
      throw new Error('SQLite database path is required.');
    }
    this.database = filepath;
    this.maxRows = limits.maxRows ?? SAFE_DEFAULTS.maxRows;
    this.db = new Database(filepath, {
      fileMustExist: true,
      timeout: limits.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
    });
  }

  isConnected(): boolean {
    return this.db.open;
  }

  async listTables(): Promise<string[]> {
    return this.db
      .prepare<[], { name: string }>(`
        SELECT name
        FROM sqlite_master
        WHERE type = 'table'
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all()
      .map((row) => row.name);
  }

  async describeTable(table: string): Promise<TableSchema> {
    const ident = quoteIdent(table);
    const columns = this.db.prepare<[], TableInfoRow>(`PRAGMA table_info(${ident})`).all();
    if (columns.length === 0) {
      throw new Error(`Table "${table}" does not exist.`);
    }

    const fkRows = this.db.prepare<[], ForeignKeyRow>(`PRAGMA foreign_key_list(${ident})`).all();
    const foreignKeys = groupForeignKeys(
      fkRows.map((row) => ({
        constraint: String(row.id),
        column: row.from,
        referredTable: row.table,
        // a NULL target means the referenced table's primary key
        referredColumn: row.to ?? row.from,
      })),
    );

    const indexRows: Array<{ name: string; column: string; unique: boolean }> = [];
    for (const index of this.db.prepare<[], IndexListRow>(`PRAGMA index_list(${ident})`).all()) {
      if (index.origin === 'pk') continue;
      for (const col of this.db.prepare<[], IndexInfoRow>(`PRAGMA index_info(${quoteIdent(index.name)})`).all()) {
        indexRows.push({ name: index.name, column: col.name, unique: index.unique === 1 });
      }
    }

    return buildTableSchema(
      table,
      columns.map((column) => ({
        name: column.name,
        dataType: column.type || 'TEXT',
        nullable: column.notnull === 0 && column.pk === 0,
        isPrimaryKey: column.pk > 0,
        defaultValue: column.dflt_value ?? undefined,
      })),
      foreignKeys,
      groupIndexes(indexRows),
    );
  }

  async sampleRows(table: string, limit: number): Promise<Row[]> {
    return this.db.prepare<[number], Row>(`SELECT * FROM ${quoteIdent(table)} LIMIT ?`).all(limit);
  }

  async execute(sql: string): Promise<ExecutionOutcome> {
    const start = performance.now();
    const stmt = this.db.prepare<[], Row>(sql);
    if (!stmt.reader) {
      const run = stmt.run();
      return {
        kind: 'affected',
        affectedRowCount: Number(run.changes),
        execMs: Math.round(performance.now() - start),
      };
    }

    const allRows = stmt.all();
    const execMs = Math.round(performance.now() - start);
    const { rows, truncated } = capRows(allRows, this.maxRows);
    return {
      kind: 'rows',
      columns: stmt.columns().map((column) => column.name),
      rows,
      rowCount: allRows.length,
      truncated,
      execMs,
    };
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
