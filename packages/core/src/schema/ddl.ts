/**
 * Schema text rendering for the generation prompt.
 *
 * The rendered block is the model's only view of the database, so its shape
 * is stable: a `-- Table:` header, a CREATE TABLE statement, any secondary
 * indexes, then up to N sample rows.
 */

import type { Row, TableSchema } from '../db/types.js';

export function renderCreateTable(table: TableSchema): string {
  const lines = table.columns.map((col) => {
    const parts = [`  ${col.name} ${col.dataType}`];
    if (!col.nullable) parts.push('NOT NULL');
    if (col.defaultValue !== undefined) parts.push(`DEFAULT ${col.defaultValue}`);
    return parts.join(' ');
  });
  if (table.primaryKeys.length > 0) {
    lines.push(`  PRIMARY KEY (${table.primaryKeys.join(', ')})`);
  }
  for (const fk of table.foreignKeys) {
    lines.push(
      `  FOREIGN KEY (${fk.constrainedColumns.join(', ')}) REFERENCES ${fk.referredTable} (${fk.referredColumns.join(', ')})`,
    );
  }

  const statements = [`CREATE TABLE ${table.name} (\n${lines.join(',\n')}\n);`];
  for (const index of table.indexes) {
    const unique = index.unique ? 'UNIQUE ' : '';
    statements.push(`CREATE ${unique}INDEX ${index.name} ON ${table.name} (${index.columns.join(', ')});`);
  }
  return statements.join('\n');
}

function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
  return value;
}

export function renderSampleRows(table: string, rows: Row[]): string {
  const lines = [`-- Sample rows from ${table} table:`];
  if (rows.length === 0) {
    lines.push('-- (no rows)');
  }
  rows.forEach((row, i) => {
    lines.push(`-- Row ${i + 1}: ${JSON.stringify(row, jsonValue)}`);
  });
  return lines.join('\n');
}

export function renderTableBlock(table: TableSchema, samples: Row[]): string {
  return [`-- Table: ${table.name}`, renderCreateTable(table), '', renderSampleRows(table.name, samples)].join('\n');
}
