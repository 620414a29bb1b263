/**
 * Process configuration read from the environment.
 * Every knob has a default so a bare `tabletalk serve` starts.
 */

import { configError } from './errors.js';

export type TableSearchKind = 'keyword' | 'embedding';

export interface AppConfig {
  openaiApiKey?: string;
  model: string;
  embeddingModel: string;
  temperature: number;
  sessionTtlMs: number;
  maxRetries: number;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  dbTimeoutMs: number;
  topKTables: number;
  tableSearch: TableSearchKind;
  host: string;
  port: number;
  corsOrigin: string;
  logLevel: string;
  sweepIntervalMs: number;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw configError(`${key} must be an integer >= ${min}, got "${raw}".`);
  }
  return value;
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw configError(`${key} must be a number, got "${raw}".`);
  }
  return value;
}

function readSearchKind(env: Env): TableSearchKind {
  const raw = env.TABLE_SEARCH?.trim().toLowerCase();
  if (!raw) return 'keyword';
  if (raw === 'keyword' || raw === 'embedding') return raw;
  throw configError(`TABLE_SEARCH must be "keyword" or "embedding", got "${raw}".`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openaiApiKey: env.OPENAI_API_KEY?.trim() || undefined,
    model: env.TABLETALK_MODEL?.trim() || DEFAULT_MODEL,
    embeddingModel: env.TABLETALK_EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL,
    temperature: readNumber(env, 'TABLETALK_TEMPERATURE', 0.1),
    sessionTtlMs: readInt(env, 'SESSION_TTL_SECONDS', 3600) * 1000,
    maxRetries: readInt(env, 'MAX_RETRIES', 3),
    llmTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 60_000),
    llmMaxRetries: readInt(env, 'LLM_MAX_RETRIES', 2),
    dbTimeoutMs: readInt(env, 'DB_TIMEOUT_MS', 15_000),
    topKTables: readInt(env, 'TOP_K_TABLES', 5, 1),
    tableSearch: readSearchKind(env),
    host: env.API_HOST?.trim() || '0.0.0.0',
    port: readInt(env, 'API_PORT', 8000),
    corsOrigin: env.CORS_ORIGIN?.trim() || '*',
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    sweepIntervalMs: readInt(env, 'SESSION_SWEEP_INTERVAL_MS', 60_000),
  };
}
