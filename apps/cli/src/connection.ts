import { isSupported, normalizeDialect, SUPPORTED_DB_TYPES, type ConnectionParams, type DbType } from '@tabletalk/core';
import type { Command } from 'commander';
import { usageError } from './errors.js';

export const DEFAULT_PORTS: Record<DbType, number> = {
  postgresql: 5432,
  mysql: 3306,
  mssql: 1433,
  sqlite: 0,
};

export interface ConnectionFlags {
  type: string;
  host?: string;
  port?: string;
  database: string;
  user?: string;
  sslmode?: string;
  passwordStdin?: boolean;
}

export function withConnectionOptions<T extends Command>(command: T): T {
  return command
    .requiredOption('--type <type>', `Database type (${SUPPORTED_DB_TYPES.join(', ')})`)
    .option('--host <host>', 'Database host', 'localhost')
    .option('--port <port>', 'Database port (defaults per type)')
    .requiredOption('--database <database>', 'Database name, or file path for sqlite')
    .option('--user <user>', 'Database user', '')
    .option('--sslmode <mode>', 'disable | require | verify-full')
    .option('--password-stdin', 'Read the password from stdin', false);
}

export function resolveDbType(raw: string): DbType {
  const dbType = normalizeDialect(raw);
  if (!isSupported(dbType)) {
    throw usageError(`Unsupported --type "${raw}". Expected one of: ${SUPPORTED_DB_TYPES.join(', ')}.`);
  }
  return dbType;
}

export function parsePort(raw: string | undefined, dbType: DbType): number {
  if (raw === undefined) return DEFAULT_PORTS[dbType];
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw usageError('Invalid --port. Expected 1-65535.');
  }
  return port;
}

/** Validate connection flags into the params the pipeline connects with. */
export function connectionParamsFromFlags(flags: ConnectionFlags, password: string): ConnectionParams {
  const dbType = resolveDbType(flags.type);
  const database = flags.database.trim();
  if (!database) {
    throw usageError('--database is required.');
  }
  return {
    dbType,
    host: dbType === 'sqlite' ? '' : (flags.host ?? 'localhost'),
    port: parsePort(flags.port, dbType),
    database,
    username: flags.user ?? '',
    password,
    sslmode: flags.sslmode,
  };
}
