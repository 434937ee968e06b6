import { describe, expect, it } from 'vitest';
import { Mutex } from '../mutex.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('runs holders of the same key one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await Promise.all(['a', 'b', 'c'].map((name, index) =>
      mutex.withLock('session', async () => {
        order.push(`start ${name}`);
        await delay(30 - index * 10);
        order.push(`end ${name}`);
      })
    ));

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('does not serialize different keys', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    await Promise.all([
      mutex.withLock('slow', async () => {
        await delay(40);
        order.push('slow');
      }),
      mutex.withLock('fast', async () => {
        order.push('fast');
      })
    ]);

    expect(order).toEqual(['fast', 'slow']);
  });

  it('releases the lock when the holder throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.withLock('key', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await mutex.withLock('key', () => 'next')).toBe('next');
    expect(mutex.isLocked('key')).toBe(false);
  });

  it('times out a waiter without letting it jump the queue', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire('key');

    await expect(mutex.acquire('key', 20)).rejects.toThrow('Mutex timeout after 20ms waiting for lock: key');

    let acquired = false;
    const next = mutex.acquire('key').then(releaseNext => {
      acquired = true;
      releaseNext();
    });
    await delay(20);
    expect(acquired).toBe(false);

    release();
    await next;
    expect(acquired).toBe(true);
    expect(mutex.getActiveLockCount()).toBe(0);
  });

  it('tracks which resources are locked', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire('a');

    expect(mutex.isLocked('a')).toBe(true);
    expect(mutex.getLockedResources()).toEqual(['a']);

    release();
    release();
    expect(mutex.isLocked('a')).toBe(false);
  });
});
