/**
 * Plain-text table for result rows: header, separator, one line per row.
 */

export const MAX_CELL_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[], maxWidth = MAX_CELL_WIDTH): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, maxWidth));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i], formatValue(row[col]).length), maxWidth);
    });
  }

  const cell = (text: string, width: number): string =>
    text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);

  const lines = [
    columns.map((col, i) => cell(col, widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(columns.map((col, i) => cell(formatValue(row[col]), widths[i])).join(' | '));
  }
  return lines.join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (Buffer.isBuffer(val)) return `<${val.length} bytes>`;
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
