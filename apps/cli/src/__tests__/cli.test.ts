import { after, before, describe, it, type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { configError, connectionError, executionError } from '@tabletalk/core';
import { normalizeArgv } from '../argv.js';
import { connectionParamsFromFlags } from '../connection.js';
import { CliError, runFailedError, runtimeError, toExitCode, usageError } from '../errors.js';
import { errorPayload } from '../output.js';
import { buildProgram } from '../program.js';
import { formatTable } from '../util/table.js';

/** Run the program with console.log captured; returns the parsed JSON lines. */
async function runJson(t: TestContext, args: string[], env: NodeJS.ProcessEnv = {}) {
  const printed: string[] = [];
  t.mock.method(console, 'log', (...data: unknown[]) => {
    printed.push(data.map(String).join(' '));
  });
  let exitCode: number | undefined;
  const program = buildProgram({ env, setExitCode: (code) => (exitCode = code) });
  await program.parseAsync(args, { from: 'user' });
  const parsed: unknown[] = printed.map((line) => JSON.parse(line));
  return { parsed, exitCode };
}

describe('exit codes', () => {
  it('maps CLI error kinds', () => {
    assert.equal(toExitCode(usageError('bad flag')), 1);
    assert.equal(toExitCode(runtimeError('db down')), 2);
    assert.equal(toExitCode(runFailedError('no answer')), 3);
    assert.equal(toExitCode(new Error('boom')), 2);
  });

  it('maps pipeline error codes', () => {
    assert.equal(toExitCode(configError('MAX_RETRIES must be an integer')), 1);
    assert.equal(toExitCode(connectionError('refused')), 2);
    assert.equal(toExitCode(executionError('Query failed after 4 attempt(s): syntax error')), 3);
  });

  it('reports the lifted code in JSON errors', () => {
    assert.deepEqual(errorPayload(executionError('boom'), false), { ok: false, code: 'RUN_FAILED', message: 'boom' });
    assert.deepEqual(errorPayload('plain', false), { ok: false, code: 'INTERNAL_ERROR', message: 'plain' });
  });
});

describe('connectionParamsFromFlags', () => {
  it('normalizes the type and fills the default port', () => {
    assert.deepEqual(connectionParamsFromFlags({ type: 'postgres', host: 'db.local', database: 'shop', user: 'analyst' }, 'test-secret'), {
      dbType: 'postgresql',
      host: 'db.local',
      port: 5432,
      database: 'shop',
      username: 'analyst',
      password: 'test-secret',
      sslmode: undefined,
    });
  });

  it('ignores host and port defaults for sqlite', () => {
    const params = connectionParamsFromFlags({ type: 'sqlite3', host: 'localhost', database: ' ./shop.db ' }, '');
    assert.equal(params.dbType, 'sqlite');
    assert.equal(params.host, '');
    assert.equal(params.port, 0);
    assert.equal(params.database, './shop.db');
  });

  it('rejects an unsupported type or a bad port', () => {
    assert.throws(() => connectionParamsFromFlags({ type: 'oracle', database: 'x' }, ''), (err: unknown) => {
      assert.ok(err instanceof CliError);
      assert.equal(err.kind, 'usage');
      return true;
    });
    assert.throws(() => connectionParamsFromFlags({ type: 'mysql', database: 'x', port: '70000' }, ''), {
      message: 'Invalid --port. Expected 1-65535.',
    });
  });
});

describe('formatTable', () => {
  it('pads columns and prints NULL', () => {
    const text = formatTable(['id', 'name'], [
      { id: 1, name: 'Ada' },
      { id: 2, name: null },
    ]);
    assert.equal(text, 'id | name\n---+-----\n1  | Ada \n2  | NULL');
  });

  it('truncates wide cells', () => {
    assert.equal(formatTable(['c'], [{ c: 'abcdefgh' }], 5), 'c    \n-----\nabcd…');
  });

  it('handles empty results', () => {
    assert.equal(formatTable(['id'], []), '(0 rows)');
    assert.equal(formatTable([], []), '(no columns)');
  });
});

describe('normalizeArgv', () => {
  it('drops the separator npm forwards', () => {
    assert.deepEqual(normalizeArgv(['node', 'main.ts', '--', 'doctor']), ['node', 'main.ts', 'doctor']);
    assert.deepEqual(normalizeArgv(['node', 'main.ts', 'doctor']), ['node', 'main.ts', 'doctor']);
  });
});

describe('tabletalk adapt', () => {
  it('prints the rewritten SQL and the rules applied', async (t) => {
    const { parsed, exitCode } = await runJson(t, ['adapt', 'SELECT a FROM t LIMIT 5', '--dialect', 'mssql', '--json']);
    assert.equal(exitCode, undefined);
    assert.deepEqual(parsed, [
      { ok: true, data: { sql: 'SELECT TOP 5 a FROM t', dialect: 'mssql', applied: ['limit-to-top'] } },
    ]);
  });
});

describe('tabletalk doctor', () => {
  it('reports configuration from the environment', async (t) => {
    const { parsed } = await runJson(t, ['doctor', '--json'], { OPENAI_API_KEY: 'test-secret', MAX_RETRIES: '2' });
    assert.equal(parsed.length, 1);
    const [report] = parsed;
    assert.ok(typeof report === 'object' && report !== null && 'data' in report);
    const data = report.data;
    assert.ok(typeof data === 'object' && data !== null);
    assert.deepEqual(
      {
        config: 'config' in data ? data.config : undefined,
        openAiKeySet: 'openAiKeySet' in data ? data.openAiKeySet : undefined,
        maxRetries: 'maxRetries' in data ? data.maxRetries : undefined,
      },
      { config: { ok: true, error: null }, openAiKeySet: true, maxRetries: 2 },
    );
  });

  it('reports a broken configuration instead of failing', async (t) => {
    const { parsed, exitCode } = await runJson(t, ['doctor', '--json'], { MAX_RETRIES: 'many' });
    assert.equal(exitCode, undefined);
    const [report] = parsed;
    assert.ok(typeof report === 'object' && report !== null && 'data' in report);
    const data = report.data;
    assert.ok(typeof data === 'object' && data !== null && 'config' in data);
    assert.deepEqual(data.config, { ok: false, error: 'MAX_RETRIES must be an integer >= 0, got "many".' });
  });
});

describe('tabletalk ask', () => {
  it('fails with a usage exit code before connecting to an unsupported type', async (t) => {
    const { parsed, exitCode } = await runJson(t, ['ask', 'how many?', '--type', 'oracle', '--database', 'x', '--json']);
    assert.equal(exitCode, 1);
    assert.deepEqual(parsed, [
      {
        ok: false,
        code: 'INVALID_ARGS',
        message: 'Unsupported --type "oracle". Expected one of: postgresql, mysql, sqlite, mssql.',
      },
    ]);
  });
});

describe('tabletalk schema', () => {
  let dir: string;
  let file: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'tabletalk-cli-'));
    file = join(dir, 'shop.db');
    const db = new Database(file);
    db.exec(`
      CREATE TABLE customers (id INTEGER PRIMARY KEY, name TEXT);
      CREATE TABLE orders (id INTEGER PRIMARY KEY, customer_id INTEGER REFERENCES customers(id), total REAL);
    `);
    db.close();
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists every table without a question', async (t) => {
    const { parsed, exitCode } = await runJson(t, ['schema', '--type', 'sqlite', '--database', file, '--json']);
    assert.equal(exitCode, undefined);
    const [report] = parsed;
    assert.ok(typeof report === 'object' && report !== null && 'data' in report);
    const data = report.data;
    assert.ok(typeof data === 'object' && data !== null && 'tables' in data && 'allTables' in data);
    assert.deepEqual(data.tables, ['customers', 'orders']);
    assert.deepEqual(data.allTables, ['customers', 'orders']);
  });

  it('narrows to the tables a question mentions', async (t) => {
    const { parsed } = await runJson(t, ['schema', '--type', 'sqlite', '--database', file, '--question', 'total of orders', '--json']);
    const [report] = parsed;
    assert.ok(typeof report === 'object' && report !== null && 'data' in report);
    const data = report.data;
    assert.ok(typeof data === 'object' && data !== null && 'tables' in data);
    assert.deepEqual(data.tables, ['orders']);
  });

  it('exits with a runtime code when the file is missing', async (t) => {
    const { parsed, exitCode } = await runJson(t, ['schema', '--type', 'sqlite', '--database', join(dir, 'nope.db'), '--json']);
    assert.equal(exitCode, 2);
    const [report] = parsed;
    assert.ok(typeof report === 'object' && report !== null && 'code' in report);
    assert.equal(report.code, 'DB_CONN_FAILED');
  });
});
