import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { SqliteConnection } from '../adapters/sqlite.js';
import { isSupported, openConnection } from '../connect.js';
import { PipelineError } from '../../errors.js';
import type { ConnectionParams } from '../types.js';

let dir: string;
let file: string;

before(() => {
  dir = mkdtempSync(join(tmpdir(), 'tabletalk-sqlite-'));
  file = join(dir, 'shop.db');
  const db = new Database(file);
  db.exec(`
    CREATE TABLE users (
      id INTEGER PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      full_name TEXT,
      plan TEXT DEFAULT 'free'
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      user_id INTEGER NOT NULL REFERENCES users(id),
      total REAL
    );
    INSERT INTO users (id, email, full_name) VALUES
      (1, 'alice@example.com', 'Alice Nguyen'),
      (2, 'bob@example.com', 'Bob Stone'),
      (3, 'cara@example.com', 'Cara Diaz');
    INSERT INTO orders VALUES (1, 1, 10.0), (2, 1, 5.5);
  `);
  db.close();
});

after(() => {
  rmSync(dir, { recursive: true, force: true });
});

function sqliteParams(database: string): ConnectionParams {
  return { dbType: 'sqlite3', host: '', port: 0, database, username: '', password: '' };
}

describe('SqliteConnection', () => {
  it('lists user tables by name', async () => {
    const conn = new SqliteConnection(file);
    assert.deepEqual(await conn.listTables(), ['orders', 'users']);
    await conn.close();
  });

  it('describes columns, keys and defaults', async () => {
    const conn = new SqliteConnection(file);
    const users = await conn.describeTable('users');
    assert.deepEqual(
      users.columns.map((c) => [c.name, c.dataType, c.nullable, c.isPrimaryKey]),
      [
        ['id', 'INTEGER', false, true],
        ['email', 'TEXT', false, false],
        ['full_name', 'TEXT', true, false],
        ['plan', 'TEXT', true, false],
      ],
    );
    assert.deepEqual(users.primaryKeys, ['id']);
    assert.equal(users.columns[3].defaultValue, "'free'");
    assert.deepEqual(
      users.indexes.map((i) => [i.columns, i.unique]),
      [[['email'], true]],
    );

    const orders = await conn.describeTable('orders');
    assert.deepEqual(orders.foreignKeys, [{ constrainedColumns: ['user_id'], referredTable: 'users', referredColumns: ['id'] }]);
    await conn.close();
  });

  it('rejects an unknown table', async () => {
    const conn = new SqliteConnection(file);
    await assert.rejects(conn.describeTable('ghosts'), /Table "ghosts" does not exist/);
    await conn.close();
  });

  it('caps returned rows and reports the full count', async () => {
    const conn = new SqliteConnection(file, { maxRows: 2 });
    const outcome = await conn.execute('SELECT id, email FROM users ORDER BY id');
    assert.equal(outcome.kind, 'rows');
    if (outcome.kind !== 'rows') return;
    assert.deepEqual(outcome.columns, ['id', 'email']);
    assert.deepEqual(outcome.rows, [
      { id: 1, email: 'alice@example.com' },
      { id: 2, email: 'bob@example.com' },
    ]);
    assert.equal(outcome.rowCount, 3);
    assert.equal(outcome.truncated, true);
    await conn.close();
  });

  it('reports affected rows for writes', async () => {
    const conn = new SqliteConnection(file);
    const outcome = await conn.execute("UPDATE users SET plan = 'pro' WHERE id = 3");
    assert.deepEqual({ ...outcome, execMs: 0 }, { kind: 'affected', affectedRowCount: 1, execMs: 0 });
    await conn.close();
  });

  it('samples rows up to the limit', async () => {
    const conn = new SqliteConnection(file);
    assert.equal((await conn.sampleRows('orders', 1)).length, 1);
    await conn.close();
  });

  it('is not connected after close and tolerates a second close', async () => {
    const conn = new SqliteConnection(file);
    assert.equal(conn.isConnected(), true);
    await conn.close();
    await conn.close();
    assert.equal(conn.isConnected(), false);
  });
});

describe('openConnection', () => {
  it('opens sqlite through an alias', async () => {
    const conn = await openConnection(sqliteParams(file));
    assert.equal(conn.dialect, 'sqlite');
    assert.equal(conn.database, file);
    await conn.close();
  });

  it('fails with CONNECTION_ERROR for a missing file', async () => {
    await assert.rejects(openConnection(sqliteParams(join(dir, 'missing.db'))), (err: unknown) => {
      assert.ok(err instanceof PipelineError);
      assert.equal(err.code, 'CONNECTION_ERROR');
      assert.match(err.message, /^Could not connect to sqlite database /);
      return true;
    });
  });

  it('rejects an unsupported engine', async () => {
    await assert.rejects(
      openConnection({ ...sqliteParams(file), dbType: 'Oracle' }),
      {
        code: 'CONNECTION_ERROR',
        message: 'Unsupported database type: Oracle. Supported: postgresql, mysql, sqlite, mssql.',
      },
    );
  });

  it('knows the supported engines', () => {
    assert.equal(isSupported('mssql'), true);
    assert.equal(isSupported('oracle'), false);
  });
});
