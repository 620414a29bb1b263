/**
 * Conservative limits applied by every adapter.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Connection attempt timeout in milliseconds */
  connectTimeoutMs: 10_000,
  /** Sample rows rendered per table in the schema context */
  sampleRows: 3,
} as const;

export function capRows<T>(rows: T[], maxRows: number): { rows: T[]; truncated: boolean } {
  const truncated = rows.length > maxRows;
  return { rows: truncated ? rows.slice(0, maxRows) : rows, truncated };
}
