import { describe, expect, test } from 'vitest';
import { AsyncChannel, sleep } from '../src/core/utils/async-channel.js';
import { KeyedMutex } from '../src/core/utils/keyed-mutex.js';
import { Semaphore } from '../src/core/utils/semaphore.js';

describe('KeyedMutex', () => {
  test('serializes callers on the same key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const task = (name: string, ms: number) =>
      mutex.runExclusive('chat', async () => {
        log.push(`start ${name}`);
        await sleep(ms);
        log.push(`end ${name}`);
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 0)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(log).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
    expect(mutex.isLocked('chat')).toBe(false);
  });

  test('different keys run concurrently', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    await Promise.all([
      mutex.runExclusive('a', async () => {
        await sleep(20);
        log.push('a');
      }),
      mutex.runExclusive('b', async () => {
        log.push('b');
      }),
    ]);
    expect(log).toEqual(['b', 'a']);
  });

  test('a failing holder releases the lock', async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(await mutex.runExclusive('k', async () => 'next')).toBe('next');
  });
});

describe('Semaphore', () => {
  test('hands out permits up to capacity, then queues FIFO', async () => {
    const semaphore = new Semaphore(2);
    const releaseA = await semaphore.acquire();
    const releaseB = await semaphore.acquire();
    const order: string[] = [];
    const c = semaphore.acquire().then((release) => {
      order.push('c');
      return release;
    });
    const d = semaphore.acquire().then((release) => {
      order.push('d');
      return release;
    });

    expect(semaphore.inUse).toBe(2);
    expect(semaphore.pending).toBe(2);

    releaseA();
    releaseA();
    const releaseC = await c;
    expect(order).toEqual(['c']);
    expect(semaphore.pending).toBe(1);

    releaseB();
    await d;
    expect(order).toEqual(['c', 'd']);
    releaseC();
    expect(semaphore.inUse).toBe(1);
  });

  test('an aborted waiter leaves the queue', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const controller = new AbortController();
    const waiting = semaphore.acquire(controller.signal);

    controller.abort(new Error('gave up'));
    await expect(waiting).rejects.toThrow('gave up');
    expect(semaphore.pending).toBe(0);
    release();
    expect(semaphore.inUse).toBe(0);
  });

  test('resize wakes waiters when capacity grows', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const waiting = semaphore.acquire();

    semaphore.resize(2);
    await waiting;
    expect(semaphore.inUse).toBe(2);
  });

  test('rejects a non-positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore capacity must be a positive integer, got 0');
  });
});

describe('AsyncChannel', () => {
  test('delivers buffered and later items, then ends on close', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    const received: number[] = [];
    const consumer = (async () => {
      for await (const item of channel) {
        received.push(item);
      }
    })();

    channel.push(2);
    await sleep(0);
    channel.push(3);
    channel.close();
    channel.push(4);
    await consumer;

    expect(received).toEqual([1, 2, 3]);
    expect(channel.isClosed).toBe(true);
  });

  test('sleep resolves early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
