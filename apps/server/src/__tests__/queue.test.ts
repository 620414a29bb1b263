import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { KeyedQueue } from '../queue.js';

describe('KeyedQueue', () => {
  it('runs tasks for one key in order and reports it busy meanwhile', async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run('s1', async () => {
      await gate;
      order.push('first');
    });
    const second = queue.run('s1', async () => {
      order.push('second');
    });
    assert.equal(queue.busy('s1'), true);
    assert.equal(queue.busy('s2'), false);

    release();
    await Promise.all([first, second]);
    assert.deepEqual(order, ['first', 'second']);
    await new Promise((resolve) => setImmediate(resolve));
    assert.equal(queue.busy('s1'), false);
  });

  it('keeps going after a task fails', async () => {
    const queue = new KeyedQueue();
    const failed = queue.run('s1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('s1', async () => 'ok');
    await assert.rejects(failed, { message: 'boom' });
    assert.equal(await next, 'ok');
  });
});
