/**
 * Database abstraction types.
 * One DbConnection per session; adapters for each engine implement it.
 */

export type DbType = 'postgresql' | 'mysql' | 'sqlite' | 'mssql';

/** Connection parameters as supplied by a caller. */
export interface ConnectionParams {
  dbType: string;
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  /** libpq-style: disable | require | verify-full */
  sslmode?: string;
}

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  defaultValue?: string;
}

export interface ForeignKeyInfo {
  constrainedColumns: string[];
  referredTable: string;
  referredColumns: string[];
}

export interface IndexInfo {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface TableSchema {
  name: string;
  columns: ColumnInfo[];
  primaryKeys: string[];
  foreignKeys: ForeignKeyInfo[];
  indexes: IndexInfo[];
}

export type Row = Record<string, unknown>;

export type ExecutionOutcome =
  | {
      kind: 'rows';
      columns: string[];
      rows: Row[];
      /** Total rows before the maxRows cap */
      rowCount: number;
      truncated: boolean;
      execMs: number;
    }
  | {
      kind: 'affected';
      affectedRowCount: number;
      execMs: number;
    };

export interface ExecuteLimits {
  maxRows?: number;
  statementTimeoutMs?: number;
}

/**
 * A live connection bound to one session. Not safe for concurrent use:
 * callers serialize runs per session.
 */
export interface DbConnection {
  readonly dialect: DbType;
  readonly database: string;

  isConnected(): boolean;
  listTables(): Promise<string[]>;
  describeTable(table: string): Promise<TableSchema>;
  sampleRows(table: string, limit: number): Promise<Row[]>;
  execute(sql: string): Promise<ExecutionOutcome>;
  close(): Promise<void>;
}

export function buildTableSchema(
  name: string,
  columns: ColumnInfo[],
  foreignKeys: ForeignKeyInfo[] = [],
  indexes: IndexInfo[] = [],
): TableSchema {
  return {
    name,
    columns,
    primaryKeys: columns.filter((c) => c.isPrimaryKey).map((c) => c.name),
    foreignKeys,
    indexes,
  };
}

/** Fold per-column FK rows into one entry per constraint, keeping row order. */
export function groupForeignKeys(
  rows: Array<{ constraint: string; column: string; referredTable: string; referredColumn: string }>,
): ForeignKeyInfo[] {
  const byName = new Map<string, ForeignKeyInfo>();
  for (const row of rows) {
    const existing = byName.get(row.constraint);
    if (existing) {
      existing.constrainedColumns.push(row.column);
      existing.referredColumns.push(row.referredColumn);
    } else {
      byName.set(row.constraint, {
        constrainedColumns: [row.column],
        referredTable: row.referredTable,
        referredColumns: [row.referredColumn],
      });
    }
  }
  return Array.from(byName.values());
}

/** Fold per-column index rows into one entry per index, keeping row order. */
export function groupIndexes(rows: Array<{ name: string; column: string; unique: boolean }>): IndexInfo[] {
  const byName = new Map<string, IndexInfo>();
  for (const row of rows) {
    const existing = byName.get(row.name);
    if (existing) existing.columns.push(row.column);
    else byName.set(row.name, { name: row.name, columns: [row.column], unique: row.unique });
  }
  return Array.from(byName.values());
}
