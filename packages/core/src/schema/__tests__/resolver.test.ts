import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { SqliteConnection } from '../../db/adapters/sqlite.js';
import { isPipelineError } from '../../errors.js';
import { SchemaResolver } from '../resolver.js';
import { KeywordTableSearch, type CorpusDocument, type TableSearch } from '../search.js';
import { FakeConnection, silentLogger, table } from '../../__tests__/fakes.js';

class StubSearch implements TableSearch {
  constructor(private readonly result: () => Promise<string[]>) {}
  async index(_corpusId: string, _docs: CorpusDocument[]): Promise<void> {}
  async topK(_query: string, _k: number, _corpusId: string): Promise<string[]> {
    return this.result();
  }
  async drop(_corpusId: string): Promise<void> {}
}

function resolverWith(search: TableSearch): SchemaResolver {
  return new SchemaResolver({ search, topK: 5, sampleRows: 3, logger: silentLogger });
}

let dir: string;
let conn: SqliteConnection;

before(() => {
  dir = mkdtempSync(join(tmpdir(), 'tabletalk-resolver-'));
  const file = join(dir, 'shop.db');
  const db = new Database(file);
  db.exec(`
    CREATE TABLE customers (id INTEGER PRIMARY KEY, name TEXT NOT NULL, city TEXT);
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL REFERENCES customers(id),
      total REAL
    );
    CREATE INDEX idx_orders_customer ON orders(customer_id);
    CREATE TABLE audit_log (id INTEGER PRIMARY KEY, event TEXT);
    INSERT INTO customers VALUES (1, 'Ada', 'Paris'), (2, 'Lin', 'Oslo'), (3, 'Sam', 'Lima'), (4, 'Kim', 'Rome');
    INSERT INTO orders VALUES (10, 1, 25.5);
  `);
  db.close();
  conn = new SqliteConnection(file);
});

after(async () => {
  await conn.close();
  rmSync(dir, { recursive: true, force: true });
});

describe('SchemaResolver.allTables', () => {
  it('enumerates every table', async () => {
    const resolver = resolverWith(new KeywordTableSearch());
    assert.deepEqual(await resolver.allTables(conn), ['audit_log', 'customers', 'orders']);
  });

  it('fails with CONNECTION_ERROR when the connection is not live', async () => {
    const closed = new FakeConnection();
    closed.connected = false;
    await assert.rejects(resolverWith(new KeywordTableSearch()).allTables(closed), (err: unknown) => {
      assert.ok(isPipelineError(err));
      assert.equal(err.code, 'CONNECTION_ERROR');
      return true;
    });
  });
});

describe('SchemaResolver.relevantTables', () => {
  const all = ['audit_log', 'customers', 'orders'];

  it('keeps only known names, in schema order, without duplicates', async () => {
    const resolver = resolverWith(new StubSearch(async () => ['orders', 'ghost', 'Customers', 'orders']));
    assert.deepEqual(await resolver.relevantTables('q', all, 5, 'c1'), ['customers', 'orders']);
  });

  it('returns every table when the search fails', async () => {
    const resolver = resolverWith(
      new StubSearch(async () => {
        throw new Error('vector store unavailable');
      }),
    );
    assert.deepEqual(await resolver.relevantTables('q', all, 5, 'c1'), all);
  });

  it('returns every table when nothing intersects', async () => {
    const resolver = resolverWith(new StubSearch(async () => ['ghost']));
    assert.deepEqual(await resolver.relevantTables('q', all, 5, 'c1'), all);
  });

  it('is always a subset of the input', async () => {
    const answers = [[], ['orders'], ['x', 'y'], ['audit_log', 'audit_log']];
    for (const answer of answers) {
      const resolver = resolverWith(new StubSearch(async () => answer));
      const picked = await resolver.relevantTables('q', all, 5, 'c1');
      assert.ok(picked.every((name) => all.includes(name)));
    }
  });
});

describe('SchemaResolver.format', () => {
  it('renders DDL and up to three sample rows per table', async () => {
    const text = await resolverWith(new KeywordTableSearch()).format(conn, ['customers']);
    assert.equal(
      text,
      [
        '-- Table: customers',
        'CREATE TABLE customers (',
        '  id INTEGER NOT NULL,',
        '  name TEXT NOT NULL,',
        '  city TEXT,',
        '  PRIMARY KEY (id)',
        ');',
        '',
        '-- Sample rows from customers table:',
        '-- Row 1: {"id":1,"name":"Ada","city":"Paris"}',
        '-- Row 2: {"id":2,"name":"Lin","city":"Oslo"}',
        '-- Row 3: {"id":3,"name":"Sam","city":"Lima"}',
      ].join('\n'),
    );
  });

  it('includes foreign keys and secondary indexes', async () => {
    const text = await resolverWith(new KeywordTableSearch()).format(conn, ['orders']);
    const lines = text.split('\n');
    assert.ok(lines.includes('  FOREIGN KEY (customer_id) REFERENCES customers (id)'));
    assert.ok(lines.includes('CREATE INDEX idx_orders_customer ON orders (customer_id);'));
    assert.ok(lines.includes('-- Row 1: {"id":10,"customer_id":1,"total":25.5}'));
  });

  it('keeps input order across blocks', async () => {
    const text = await resolverWith(new KeywordTableSearch()).format(conn, ['orders', 'audit_log']);
    const headers = text.split('\n').filter((line) => line.startsWith('-- Table:'));
    assert.deepEqual(headers, ['-- Table: orders', '-- Table: audit_log']);
    assert.ok(text.endsWith('-- Sample rows from audit_log table:\n-- (no rows)'));
  });

  it('renders a table with no rows when sampling fails', async () => {
    class BrokenSamples extends FakeConnection {
      override async sampleRows(): Promise<never> {
        throw new Error('permission denied');
      }
    }
    const fake = new BrokenSamples({ tables: [table('secrets', ['id', 'value'])] });
    const text = await resolverWith(new KeywordTableSearch()).format(fake, ['secrets']);
    assert.ok(text.endsWith('-- Sample rows from secrets table:\n-- (no rows)'));
  });
});

describe('SchemaResolver.resolve', () => {
  it('narrows the schema with keyword search over the session corpus', async () => {
    const resolver = resolverWith(new KeywordTableSearch());
    assert.equal(await resolver.indexSession(conn, 'session-1'), 3);

    const snapshot = await resolver.resolve(conn, 'total of orders per customer', 'session-1');
    assert.equal(snapshot.dialect, 'sqlite');
    assert.deepEqual(snapshot.allTables, ['audit_log', 'customers', 'orders']);
    assert.deepEqual(snapshot.relevantTables, ['customers', 'orders']);
    assert.equal(snapshot.usedFallback, false);
    assert.deepEqual(Object.keys(snapshot.perTableInfo), ['customers', 'orders']);
    assert.ok(snapshot.formattedSchema.startsWith('-- Table: customers\n'));
  });

  it('falls back to every table for a corpus that was never indexed', async () => {
    const resolver = resolverWith(new KeywordTableSearch());
    const snapshot = await resolver.resolve(conn, 'anything', 'unknown-session');
    assert.deepEqual(snapshot.relevantTables, snapshot.allTables);
    assert.equal(snapshot.usedFallback, true);
  });
});
