/**
 * Connection dispatcher.
 * Selects the adapter for a db_type and opens one live connection.
 */

import { normalizeDialect } from '../dialect/catalog.js';
import { connectionError, errorMessage, withTimeout } from '../errors.js';
import { MssqlConnection } from './adapters/mssql.js';
import { MySqlConnection } from './adapters/mysql.js';
import { PostgresConnection } from './adapters/postgres.js';
import { SqliteConnection } from './adapters/sqlite.js';
import { SAFE_DEFAULTS } from './defaults.js';
import type { ConnectionParams, DbConnection, DbType, ExecuteLimits } from './types.js';

export const SUPPORTED_DB_TYPES: readonly DbType[] = ['postgresql', 'mysql', 'sqlite', 'mssql'];

export type ConnectFn = (params: ConnectionParams) => Promise<DbConnection>;

export interface ConnectOptions extends ExecuteLimits {
  connectTimeoutMs?: number;
}

export function isSupported(dbType: string): dbType is DbType {
  return SUPPORTED_DB_TYPES.some((supported) => supported === dbType);
}

async function openAdapter(dbType: DbType, params: ConnectionParams, limits: ExecuteLimits): Promise<DbConnection> {
  switch (dbType) {
    case 'postgresql':
      return PostgresConnection.open(params, limits);
    case 'mysql':
      return MySqlConnection.open(params, limits);
    case 'mssql':
      return MssqlConnection.open(params, limits);
    case 'sqlite':
      return new SqliteConnection(params.database, limits);
  }
}

/**
 * Open a connection, failing with CONNECTION_ERROR when the engine is
 * unsupported or unreachable.
 */
export async function openConnection(params: ConnectionParams, options: ConnectOptions = {}): Promise<DbConnection> {
  const dbType = normalizeDialect(params.dbType);
  if (!isSupported(dbType)) {
    throw connectionError(`Unsupported database type: ${params.dbType}. Supported: ${SUPPORTED_DB_TYPES.join(', ')}.`);
  }
  const timeoutMs = options.connectTimeoutMs ?? SAFE_DEFAULTS.connectTimeoutMs * 2;
  try {
    return await withTimeout(openAdapter(dbType, params, options), timeoutMs, `Connecting to ${dbType}`);
  } catch (err: unknown) {
    throw connectionError(`Could not connect to ${dbType} database ${params.database}: ${errorMessage(err)}`, {
      dbType,
      host: params.host,
      port: params.port,
      database: params.database,
    });
  }
}

export function connector(options: ConnectOptions = {}): ConnectFn {
  return (params) => openConnection(params, options);
}
