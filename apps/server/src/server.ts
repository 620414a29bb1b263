/**
 * HTTP surface: connect a session, ask it questions, disconnect it.
 *
 *   POST /api/v1/connection   open a database connection under a session id
 *   POST /api/v1/query        answer a question against a live session
 *   POST /api/v1/disconnect   close a session
 *   GET  /api/v1/health       liveness and session count
 */

import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import {
  createPipeline,
  describeOutcome,
  registryConflict,
  sessionNotFound,
  type AppConfig,
  type ConnectionParams,
  type ExecutionOutcome,
  type Pipeline,
  type PipelineOverrides,
  type Row,
} from '@tabletalk/core';
import { AppError, badRequest, runFailed, toAppError } from './errors.js';
import { KeyedQueue } from './queue.js';

declare module 'fastify' {
  interface FastifyInstance {
    pipeline: Pipeline;
  }
}

export interface ServerOptions {
  config: AppConfig;
  /** Stand-ins for the model, table search and database drivers */
  overrides?: Omit<PipelineOverrides, 'logger'>;
}

// ── Request bodies ───────────────────────────────────────────────────

interface ConnectionBody {
  session_id?: string;
  connection_params: {
    db_type: string;
    host?: string;
    port?: number;
    database: string;
    username?: string;
    password?: string;
    sslmode?: string;
  };
}

interface QueryBody {
  session_id: string;
  question: string;
}

interface DisconnectBody {
  session_id: string;
}

const sessionIdSchema = { type: 'string', minLength: 1, maxLength: 200 } as const;

const connectionBodySchema = {
  type: 'object',
  required: ['connection_params'],
  properties: {
    session_id: sessionIdSchema,
    connection_params: {
      type: 'object',
      required: ['db_type', 'database'],
      properties: {
        db_type: { type: 'string', minLength: 1 },
        host: { type: 'string' },
        port: { type: 'integer', minimum: 0, maximum: 65535 },
        database: { type: 'string', minLength: 1 },
        username: { type: 'string' },
        password: { type: 'string' },
        sslmode: { type: 'string' },
      },
    },
  },
} as const;

const queryBodySchema = {
  type: 'object',
  required: ['session_id', 'question'],
  properties: {
    session_id: sessionIdSchema,
    question: { type: 'string', minLength: 1, maxLength: 4000 },
  },
} as const;

const disconnectBodySchema = {
  type: 'object',
  required: ['session_id'],
  properties: { session_id: sessionIdSchema },
} as const;

// ── Response helpers ─────────────────────────────────────────────────

function jsonSafe(rows: Row[]): Row[] {
  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([key, value]) => [key, typeof value === 'bigint' ? value.toString() : value])),
  );
}

function outcomeFields(outcome: ExecutionOutcome): Record<string, unknown> {
  if (outcome.kind === 'affected') {
    return { data: [], columns: [], row_count: outcome.affectedRowCount, truncated: false };
  }
  return { data: jsonSafe(outcome.rows), columns: outcome.columns, row_count: outcome.rowCount, truncated: outcome.truncated };
}

function toConnectionParams(body: ConnectionBody['connection_params']): ConnectionParams {
  return {
    dbType: body.db_type,
    host: body.host ?? '',
    port: body.port ?? 0,
    database: body.database,
    username: body.username ?? '',
    password: body.password ?? '',
    sslmode: body.sslmode,
  };
}

function corsOrigin(value: string): boolean | string[] {
  if (value.trim() === '*') return true;
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

// ── Server ───────────────────────────────────────────────────────────

export async function buildServer(options: ServerOptions) {
  const { config } = options;
  const server = Fastify({
    logger: {
      level: config.logLevel,
      redact: {
        paths: ['req.headers.authorization', 'password', '*.password', 'connection_params.password'],
        censor: '[REDACTED]',
      },
    },
  });

  await server.register(cors, { origin: corsOrigin(config.corsOrigin) });

  const pipeline = createPipeline(config, { ...options.overrides, logger: server.log });
  const { registry, resolver, orchestrator, connect } = pipeline;
  const queue = new KeyedQueue();
  server.decorate('pipeline', pipeline);

  const forget = async (sessionId: string): Promise<void> => {
    await resolver.dropSession(sessionId);
  };

  const sweepTimer =
    config.sweepIntervalMs > 0
      ? setInterval(() => {
          const before = registry.ids();
          // a session with a question in flight keeps its connection until the run ends
          const evicted = registry.sweep((id) => queue.busy(id));
          if (evicted === 0) return;
          const live = new Set(registry.ids());
          const gone = before.filter((id) => !live.has(id));
          server.log.info({ evicted }, 'expired sessions evicted');
          Promise.all(gone.map(forget)).catch((err: unknown) => {
            server.log.warn({ err }, 'failed to drop table corpus of expired session');
          });
        }, config.sweepIntervalMs)
      : undefined;
  sweepTimer?.unref();

  server.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);
    if (appError) {
      if (appError.statusCode >= 500) request.log.error({ err: error }, appError.message);
      return reply.status(appError.statusCode).send(appError.payload);
    }
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      const rejected = badRequest(error.message, error.statusCode);
      return reply.status(rejected.statusCode).send(rejected.payload);
    }
    request.log.error({ err: error }, 'unhandled application error');
    const internal = new AppError(500, 'INTERNAL_ERROR', 'Internal server error');
    return reply.status(500).send(internal.payload);
  });

  server.setNotFoundHandler((request, reply) => {
    const notFound = new AppError(404, 'NOT_FOUND', `Route ${request.method} ${request.url} not found`);
    return reply.status(404).send(notFound.payload);
  });

  server.addHook('onClose', async () => {
    if (sweepTimer) clearInterval(sweepTimer);
    await registry.closeAll();
  });

  server.get('/api/v1/health', async () => ({ status: 'ok', sessions: registry.size() }));

  server.post<{ Body: ConnectionBody }>(
    '/api/v1/connection',
    { schema: { body: connectionBodySchema } },
    async (request) => {
      const params = request.body.connection_params;
      const sessionId = request.body.session_id ?? randomUUID();
      if (registry.has(sessionId)) {
        throw registryConflict(sessionId);
      }

      const conn = await connect(toConnectionParams(params));
      // another request may have claimed the id while we were connecting
      if (registry.has(sessionId)) {
        await conn.close().catch((err: unknown) => {
          request.log.warn({ sessionId, err }, 'failed to close losing connection');
        });
        throw registryConflict(sessionId);
      }
      registry.store(sessionId, conn, config.sessionTtlMs);

      try {
        await resolver.indexSession(conn, sessionId);
      } catch (err: unknown) {
        request.log.warn({ sessionId, err }, 'table corpus indexing failed, questions will use every table');
      }

      return {
        status: 'SUCCESS',
        status_code: 200,
        session_id: sessionId,
        message: `Successfully connected with ${params.db_type} database ${params.database}`,
      };
    },
  );

  server.post<{ Body: QueryBody }>('/api/v1/query', { schema: { body: queryBodySchema } }, async (request) => {
    const { session_id: sessionId, question } = request.body;
    return queue.run(sessionId, async () => {
      const conn = registry.get(sessionId);
      if (!conn) {
        await forget(sessionId);
        throw sessionNotFound(sessionId);
      }

      const state = await orchestrator.run(question, conn, { corpusId: sessionId });
      const execution = state.executionResult;
      const answer = state.finalAnswer;
      if (state.stage !== 'answered' || !answer || !execution || !execution.success) {
        throw runFailed(state);
      }

      return {
        status: 'SUCCESS',
        status_code: 200,
        message: describeOutcome(execution.outcome),
        session_id: sessionId,
        sql: execution.sql,
        ...outcomeFields(execution.outcome),
        answer: answer.answer,
        chart_data: answer.chartData,
        only_chart: answer.onlyChart,
        retries: state.retryCount,
      };
    });
  });

  server.post<{ Body: DisconnectBody }>(
    '/api/v1/disconnect',
    { schema: { body: disconnectBodySchema } },
    async (request) => {
      const { session_id: sessionId } = request.body;
      return queue.run(sessionId, async () => {
        const live = registry.has(sessionId);
        await registry.remove(sessionId);
        await forget(sessionId);
        if (!live) throw sessionNotFound(sessionId);
        return {
          status: 'SUCCESS',
          status_code: 200,
          session_id: sessionId,
          message: `Disconnected session ${sessionId}`,
        };
      });
    },
  );

  return server;
}

/** Build and listen on the configured host and port. */
export async function startServer(options: ServerOptions) {
  const server = await buildServer(options);
  await server.listen({ host: options.config.host, port: options.config.port });
  return server;
}
