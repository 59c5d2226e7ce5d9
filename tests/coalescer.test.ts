import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { InboundCoalescer } from '../src/core/presenter/coalescer.js';
import { noopLogger } from './helpers.js';

describe('InboundCoalescer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function recorder() {
    const flushed: Array<{ key: string; items: string[] }> = [];
    const coalescer = new InboundCoalescer<string>(async (key, items) => {
      flushed.push({ key, items });
    });
    return { flushed, coalescer };
  }

  test('a burst inside the window flushes once, in order', () => {
    const { flushed, coalescer } = recorder();

    coalescer.push('42:claude', 'a', 1_000);
    vi.advanceTimersByTime(300);
    coalescer.push('42:claude', 'b', 1_000);
    vi.advanceTimersByTime(300);
    coalescer.push('42:claude', 'c', 1_000);
    vi.advanceTimersByTime(999);
    expect(flushed).toEqual([]);
    expect(coalescer.pending('42:claude')).toBe(3);

    vi.advanceTimersByTime(1);
    expect(flushed).toEqual([{ key: '42:claude', items: ['a', 'b', 'c'] }]);
    expect(coalescer.pending('42:claude')).toBe(0);
  });

  test('messages further apart than the window flush separately', () => {
    const { flushed, coalescer } = recorder();

    for (const item of ['a', 'b', 'c']) {
      coalescer.push('42:claude', item, 1_000);
      vi.advanceTimersByTime(2_000);
    }

    expect(flushed.map((entry) => entry.items)).toEqual([['a'], ['b'], ['c']]);
  });

  test('keys have independent windows', () => {
    const { flushed, coalescer } = recorder();

    coalescer.push('42:claude', 'a', 1_000);
    coalescer.push('42:codex', 'b', 1_000);
    vi.advanceTimersByTime(1_000);

    expect(flushed).toEqual([
      { key: '42:claude', items: ['a'] },
      { key: '42:codex', items: ['b'] },
    ]);
  });

  test('a zero window flushes immediately', () => {
    const { flushed, coalescer } = recorder();
    coalescer.push('k', 'a', 0);
    expect(flushed).toEqual([{ key: 'k', items: ['a'] }]);
  });

  test('discard drops the buffer and flushAll fires early', () => {
    const { flushed, coalescer } = recorder();

    coalescer.push('x', 'a', 1_000);
    expect(coalescer.discard('x')).toBe(1);
    coalescer.push('y', 'b', 1_000);
    coalescer.flushAll();
    vi.advanceTimersByTime(5_000);

    expect(flushed).toEqual([{ key: 'y', items: ['b'] }]);
  });

  test('a failed flush is logged', async () => {
    const logger = noopLogger();
    const error = vi.spyOn(logger, 'error');
    const coalescer = new InboundCoalescer<string>(async () => {
      throw new Error('dispatch failed');
    }, logger);

    coalescer.push('k', 'a', 0);
    await vi.waitFor(() => {
      expect(error).toHaveBeenCalledWith('Coalesced dispatch failed', { key: 'k', error: 'dispatch failed' });
    });
  });
});
