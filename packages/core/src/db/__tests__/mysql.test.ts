import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createServer as createNetServer } from 'node:net';
import mysql from 'mysql2';
import { MySqlConnection } from '../adapters/mysql.js';

async function freePort(): Promise<number> {
  const scout = createNetServer();
  await new Promise<void>((resolve) => scout.listen(0, '127.0.0.1', resolve));
  const address = scout.address();
  await new Promise<void>((resolve) => scout.close(() => resolve()));
  assert.ok(address !== null && typeof address === 'object');
  return address.port;
}

async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) return false;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  return true;
}

describe('MySqlConnection socket loss', () => {
  const accepted: Array<{ destroy(): void }> = [];
  // in-process server speaking the handshake only; enough to open and drop a session
  const server = mysql.createServer((conn) => {
    accepted.push(conn);
    conn.serverHandshake({
      protocolVersion: 10,
      serverVersion: '8.0.0',
      connectionId: 1,
      statusFlags: 2,
      characterSet: 8,
      capabilityFlags: 0xffffff,
      authCallback: (_params: unknown, cb: (err: null) => void) => cb(null),
    });
  });
  let port = 0;

  before(async () => {
    port = await freePort();
    server.listen(port);
    await new Promise((resolve) => setImmediate(resolve));
  });

  after(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('marks the connection dead instead of crashing when the server drops it', async () => {
    const uncaught: unknown[] = [];
    const onUncaught = (err: unknown): void => {
      uncaught.push(err);
    };
    process.on('uncaughtException', onUncaught);
    try {
      const conn = await MySqlConnection.open({
        dbType: 'mysql',
        host: '127.0.0.1',
        port,
        database: 'shop',
        username: 'analyst',
        password: 'test-secret',
      });
      assert.equal(conn.isConnected(), true);

      for (const socket of accepted) socket.destroy();

      assert.equal(await waitFor(() => !conn.isConnected()), true);
      assert.deepEqual(uncaught, []);
      await conn.close();
    } finally {
      process.off('uncaughtException', onUncaught);
    }
  });
});
