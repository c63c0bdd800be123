import { describe, expect, it } from 'vitest';

import { CallQueue } from '../../src/infrastructure/rpc/CallQueue.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('CallQueue', () => {
  it('starts tasks in submission order, each after the previous settled', async () => {
    const queue = new CallQueue();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await delay(ms);
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a', 10)), queue.run(task('b', 1)), queue.run(task('c', 5))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('keeps going after a task rejects', async () => {
    const queue = new CallQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });

  it('counts pending tasks', async () => {
    const queue = new CallQueue();

    const first = queue.run(() => delay(5));
    const second = queue.run(() => delay(5));
    expect(queue.size).toBe(2);

    await Promise.all([first, second]);
    await delay(0);
    expect(queue.size).toBe(0);
  });
});
