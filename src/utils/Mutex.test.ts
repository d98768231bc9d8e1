/**
 * @fileoverview Tests for Mutex
 */

import { describe, it, expect } from '@jest/globals';
import { Mutex } from './Mutex';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('Mutex', () => {
  it('should run critical sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string, ms: number) => mutex.runExclusive(async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
    });

    await Promise.all([task('a', 20), task('b', 5), task('c', 1)]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should release after a rejected section', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('should ignore a second release call', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const second = mutex.acquire();
    const third = mutex.acquire();
    let thirdAcquired = false;
    void third.then(() => {
      thirdAcquired = true;
    });

    release();
    release();
    await second;
    await new Promise(resolve => setImmediate(resolve));

    expect(thirdAcquired).toBe(false);
  });
});
