import { describe, expect, it } from 'vitest';

import { Mutex, mutexFor } from '../src/mutex';
import { sleep } from '../src/retry';

describe('Mutex', () => {
  it('runs critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (id: string, ms: number) =>
      mutex.runExclusive(async () => {
        events.push(`start:${id}`);
        await sleep(ms);
        events.push(`end:${id}`);
        return id;
      });

    const results = await Promise.all([task('a', 15), task('b', 1), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('releases the lock when the critical section throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('mutexFor returns the same instance per key', () => {
    expect(mutexFor('/tmp/a.json')).toBe(mutexFor('/tmp/a.json'));
    expect(mutexFor('/tmp/a.json')).not.toBe(mutexFor('/tmp/b.json'));
  });
});
