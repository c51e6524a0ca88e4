import { describe, it, expect } from 'vitest';
import { SessionTurnQueue } from './turn-queue';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SessionTurnQueue', () => {
  it('runs tasks for one key in arrival order', async () => {
    const queue = new SessionTurnQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run('s1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = queue.run('s1', async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('does not hold one key behind another', async () => {
    const queue = new SessionTurnQueue();
    const order: string[] = [];
    const gate = deferred();

    const blocked = queue.run('s1', async () => {
      await gate.promise;
      order.push('s1');
    });
    await queue.run('s2', async () => {
      order.push('s2');
    });

    gate.resolve();
    await blocked;

    expect(order).toEqual(['s2', 's1']);
  });

  it('keeps going after a failed task', async () => {
    const queue = new SessionTurnQueue();

    const failed = queue.run('s1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('s1', async () => 'recovered');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('recovered');
  });

  it('forgets a key once its tasks have settled', async () => {
    const queue = new SessionTurnQueue();

    await queue.run('s1', async () => 1);
    // Let the settle callback run
    await Promise.resolve();

    expect(queue.pending).toBe(0);
  });
});
