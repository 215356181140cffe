import { describe, it, expect } from 'vitest';
import { KeyedQueue } from '../game/command-queue.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedQueue', () => {
  it('runs work under one key strictly in order', async () => {
    const queue = new KeyedQueue();
    const log: string[] = [];
    const gate = deferred();

    const first = queue.run('game:1', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
      return 1;
    });
    const second = queue.run('game:1', () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('lets different keys proceed independently', async () => {
    const queue = new KeyedQueue();
    const gate = deferred();
    const log: string[] = [];

    const blocked = queue.run('game:1', async () => {
      await gate.promise;
      log.push('game 1');
    });
    await queue.run('game:2', () => {
      log.push('game 2');
    });

    expect(log).toEqual(['game 2']);
    gate.resolve();
    await blocked;
    expect(log).toEqual(['game 2', 'game 1']);
  });

  it('passes failures to the caller and keeps the chain going', async () => {
    const queue = new KeyedQueue();

    const failing = queue.run('lobby', () => {
      throw new Error('boom');
    });
    const after = queue.run('lobby', () => 'still running');

    await expect(failing).rejects.toThrow('boom');
    await expect(after).resolves.toBe('still running');
  });

  it('accepts new work on a key whose queue has drained', async () => {
    const queue = new KeyedQueue();
    await expect(queue.run('game:1', () => 1)).resolves.toBe(1);
    await new Promise((r) => setTimeout(r, 0));
    await expect(queue.run('game:1', () => 2)).resolves.toBe(2);
  });
});
