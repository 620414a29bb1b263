/**
 * tabletalk command tree.
 *
 *   doctor   environment and configuration check
 *   serve    start the HTTP API
 *   ask      answer one question against a database
 *   schema   print the schema context a question would see
 *   adapt    rewrite SQL toward a dialect
 */

import { Command } from 'commander';
import { destination } from 'pino';
import {
  DEFAULT_MAX_RETRIES,
  KeywordTableSearch,
  SAFE_DEFAULTS,
  SUPPORTED_DB_TYPES,
  SchemaResolver,
  adaptWithTrace,
  connector,
  createLogger,
  createPipeline,
  describeOutcome,
  errorMessage,
  isKnownDialect,
  loadConfig,
  normalizeDialect,
  type AppConfig,
  type ConnectionParams,
  type DbConnection,
  type Logger,
} from '@tabletalk/core';
import { startServer } from '@tabletalk/server';
import { connectionParamsFromFlags, resolveDbType, withConnectionOptions, type ConnectionFlags } from './connection.js';
import { toExitCode, usageError, runFailedError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { getPassword } from './util/password.js';

export const VERSION = '0.1.0';

/** Corpus id for the single connection a CLI command opens */
const CLI_CORPUS = 'cli';

export interface ProgramDeps {
  env?: NodeJS.ProcessEnv;
  setExitCode?: (code: number) => void;
}

interface AskFlags extends ConnectionFlags {
  maxRetries?: string;
  showSql?: boolean;
  trace?: boolean;
}

interface SchemaFlags extends ConnectionFlags {
  question?: string;
}

interface ServeFlags {
  host?: string;
  port?: string;
}

interface AdaptFlags {
  dialect: string;
}

// ── Helpers ──────────────────────────────────────────────────────────

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function cliLogger(output: OutputOptions): Logger {
  // stdout carries command output, so logs go to stderr
  return createLogger('tabletalk', { level: output.debug ? 'debug' : output.verbose ? 'info' : 'warn' }, destination(2));
}

async function connectionParams(flags: ConnectionFlags, env: NodeJS.ProcessEnv): Promise<ConnectionParams> {
  const dbType = resolveDbType(flags.type);
  const password = dbType === 'sqlite' ? '' : await getPassword({ stdin: flags.passwordStdin, env });
  return connectionParamsFromFlags(flags, password);
}

async function withConnection<T>(
  connect: (params: ConnectionParams) => Promise<DbConnection>,
  params: ConnectionParams,
  fn: (conn: DbConnection) => Promise<T>,
): Promise<T> {
  const conn = await connect(params);
  try {
    return await fn(conn);
  } finally {
    await conn.close();
  }
}

function parseRetries(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 10) {
    throw usageError('Invalid --max-retries. Expected 0-10.');
  }
  return value;
}

// ── Program ──────────────────────────────────────────────────────────

export function buildProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void>): Promise<void> {
    const output = outputOptionsFromCommand(command);
    try {
      await fn(output);
    } catch (error: unknown) {
      printError(error, output);
      setExitCode(toExitCode(error));
    }
  }

  const program = new Command();

  program
    .name('tabletalk')
    .description('Ask questions of a SQL database in plain language')
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false)
    .showHelpAfterError('(run with --help for usage)')
    .helpOption('-h, --help', 'display help')
    .version(VERSION, '-v, --version', 'Show version number');

  program.exitOverride();

  // ── doctor ─────────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('doctor')
        .description('Check environment and configuration')
        .action(async (_opts: unknown, command: Command) => {
          await runCommand(command, async (output) => {
            const nodeVersion = process.version;
            const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;

            let config: AppConfig | undefined;
            let configProblem: string | undefined;
            try {
              config = loadConfig(env);
            } catch (err: unknown) {
              configProblem = errorMessage(err);
            }

            const payload = {
              node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
              config: { ok: configProblem === undefined, error: configProblem ?? null },
              openAiKeySet: Boolean(config?.openaiApiKey),
              model: config?.model ?? null,
              tableSearch: config?.tableSearch ?? null,
              maxRetries: config?.maxRetries ?? DEFAULT_MAX_RETRIES,
              sessionTtlSeconds: config ? config.sessionTtlMs / 1000 : null,
              supportedDatabases: [...SUPPORTED_DB_TYPES],
              safeDefaults: {
                maxRows: SAFE_DEFAULTS.maxRows,
                statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
              },
            };

            if (output.json) {
              printCommandSuccess(payload, output);
              return;
            }

            printHuman('tabletalk doctor', output);
            printHuman('================', output);
            printHuman('', output);
            printHuman(`Node.js:      ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
            printHuman(`Config:       ${configProblem ? `✗ ${configProblem}` : 'ok ✓'}`, output);
            printHuman(`OpenAI key:   ${payload.openAiKeySet ? 'set ✓' : 'not set'}`, output);
            if (config) {
              printHuman(`LLM model:    ${config.model}`, output);
              printHuman(`Table search: ${config.tableSearch}`, output);
              printHuman(`Max retries:  ${config.maxRetries}`, output);
              printHuman(`Session TTL:  ${config.sessionTtlMs / 1000}s`, output);
            }
            printHuman(`Databases:    ${SUPPORTED_DB_TYPES.join(', ')}`, output);
          });
        }),
    ),
    ['tabletalk doctor', 'tabletalk doctor --json'],
  );

  // ── serve ──────────────────────────────────────────────────────────

  withExamples(
    program
      .command('serve')
      .description('Start the HTTP API')
      .option('--host <host>', 'Listen address (default API_HOST)')
      .option('--port <port>', 'Listen port (default API_PORT)')
      .action(async (opts: ServeFlags, command: Command) => {
        await runCommand(command, async () => {
          const config = loadConfig(env);
          const port = opts.port === undefined ? config.port : Number(opts.port);
          if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw usageError('Invalid --port. Expected 0-65535.');
          }
          const server = await startServer({ config: { ...config, host: opts.host ?? config.host, port } });
          const shutdown = (): void => {
            server.close().catch((err: unknown) => {
              server.log.error({ err }, 'shutdown failed');
              setExitCode(2);
            });
          };
          process.once('SIGINT', shutdown);
          process.once('SIGTERM', shutdown);
        });
      }),
    ['tabletalk serve', 'tabletalk serve --port 8080'],
  );

  // ── ask ────────────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      withConnectionOptions(
        program
          .command('ask')
          .description('Answer a question against a database')
          .argument('<question>', 'Question in plain language')
          .option('--max-retries <n>', 'Regeneration attempts after a failed execution')
          .option('--show-sql', 'Print the executed SQL', false)
          .option('--trace', 'Print every pipeline step', false),
      ).action(async (question: string, opts: AskFlags, command: Command) => {
        await runCommand(command, async (output) => {
          const params = await connectionParams(opts, env);
          const base = loadConfig(env);
          const config = { ...base, maxRetries: parseRetries(opts.maxRetries, base.maxRetries) };
          const pipeline = createPipeline(config, { logger: cliLogger(output) });

          const state = await withConnection(pipeline.connect, params, async (conn) => {
            try {
              await pipeline.resolver.indexSession(conn, CLI_CORPUS);
            } catch (err: unknown) {
              printWarning(`Table search unavailable, using every table: ${errorMessage(err)}`, output);
            }
            return pipeline.orchestrator.run(question, conn, { corpusId: CLI_CORPUS });
          });

          if (opts.trace && !output.json) {
            for (const message of state.messages) {
              printHuman(`[${message.stage}] ${message.content}`, output);
            }
            printHuman('', output);
          }

          const execution = state.executionResult;
          const answer = state.finalAnswer;
          if (state.stage !== 'answered' || !answer || !execution || !execution.success) {
            throw runFailedError(state.error?.message ?? 'The question could not be answered.', state.error);
          }
          const outcome = execution.outcome;

          if (output.json) {
            printCommandSuccess(
              {
                sql: execution.sql,
                answer: answer.answer,
                chartData: answer.chartData,
                onlyChart: answer.onlyChart,
                outcome,
                attempts: state.attempts,
                retries: state.retryCount,
              },
              output,
            );
            return;
          }

          if (answer.answer) printHuman(answer.answer, output);
          if (opts.showSql || output.verbose) {
            printHuman('', output);
            printHuman(`SQL: ${execution.sql}`, output);
          }
          if (outcome.kind === 'rows' && !answer.onlyChart) {
            printHuman('', output);
            printHumanTable(outcome.columns, outcome.rows, output);
          }
          printHuman(describeOutcome(outcome), output);
        });
      }),
    ),
    [
      'tabletalk ask "How many orders were placed last month?" --type postgresql --database shop --user analyst',
      'tabletalk ask "Top 5 customers by spend" --type sqlite --database ./shop.db --show-sql',
    ],
  );

  // ── schema ─────────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      withConnectionOptions(
        program
          .command('schema')
          .description('Print the schema context the model would see')
          .option('--question <question>', 'Narrow to the tables relevant to a question'),
      ).action(async (opts: SchemaFlags, command: Command) => {
        await runCommand(command, async (output) => {
          const params = await connectionParams(opts, env);
          const config = loadConfig(env);
          const resolver = new SchemaResolver({
            search: new KeywordTableSearch(),
            topK: config.topKTables,
            timeoutMs: config.dbTimeoutMs,
            logger: cliLogger(output),
          });
          const connect = connector({ statementTimeoutMs: config.dbTimeoutMs });

          const result = await withConnection(connect, params, async (conn) => {
            if (opts.question) {
              await resolver.indexSession(conn, CLI_CORPUS);
              const snapshot = await resolver.resolve(conn, opts.question, CLI_CORPUS);
              return { tables: snapshot.relevantTables, allTables: snapshot.allTables, schema: snapshot.formattedSchema };
            }
            const allTables = await resolver.allTables(conn);
            return { tables: allTables, allTables, schema: await resolver.format(conn, allTables) };
          });

          if (output.json) {
            printCommandSuccess(result, output);
            return;
          }
          printHuman(`-- ${result.tables.length} of ${result.allTables.length} tables`, output);
          printHuman(result.schema, output);
        });
      }),
    ),
    [
      'tabletalk schema --type sqlite --database ./shop.db',
      'tabletalk schema --type postgresql --database shop --user analyst --question "revenue by region"',
    ],
  );

  // ── adapt ──────────────────────────────────────────────────────────

  withExamples(
    withOutputFlags(
      program
        .command('adapt')
        .description('Rewrite SQL toward a dialect')
        .argument('<sql>', 'SQL text')
        .requiredOption('--dialect <dialect>', 'Target dialect (postgresql, mysql, sqlite, mssql, oracle)'),
    ).action(async (sql: string, opts: AdaptFlags, command: Command) => {
      await runCommand(command, async (output) => {
        const dialect = normalizeDialect(opts.dialect);
        if (!isKnownDialect(dialect)) {
          printWarning(`No rewrite rules for dialect "${opts.dialect}"; SQL is unchanged.`, output);
        }
        const result = adaptWithTrace(sql, dialect);
        if (output.json) {
          printCommandSuccess(result, output);
          return;
        }
        printHuman(result.sql, output);
        if (output.verbose) {
          printHuman(`-- rules: ${result.applied.length > 0 ? result.applied.join(', ') : 'none'}`, output);
        }
      });
    }),
    ['tabletalk adapt "SELECT * FROM t LIMIT 5" --dialect mssql', 'tabletalk adapt "SELECT a || b FROM t" --dialect mysql --verbose'],
  );

  return program;
}
