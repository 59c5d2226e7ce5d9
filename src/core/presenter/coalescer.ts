import type { StructuredLogger } from '../kernel/contracts.js';
import { describeError } from '../kernel/logger.js';

interface Bucket<T> {
  items: T[];
  timer: NodeJS.Timeout;
}

export type CoalescerFlush<T> = (key: string, items: T[]) => Promise<void>;

/**
 * Per-key debounce. Every arrival restarts the key's quiet
 * window; when it elapses, everything buffered for the key is flushed at
 * once, in arrival order. A window of 0 flushes each item immediately.
 */
export class InboundCoalescer<T> {
  private readonly buckets = new Map<string, Bucket<T>>();

  constructor(
    private readonly onFlush: CoalescerFlush<T>,
    private readonly logger?: StructuredLogger
  ) {}

  push(key: string, item: T, windowMs: number): void {
    const bucket = this.buckets.get(key);
    if (windowMs <= 0 && !bucket) {
      this.emit(key, [item]);
      return;
    }
    if (bucket) {
      clearTimeout(bucket.timer);
      bucket.items.push(item);
      bucket.timer = this.schedule(key, windowMs);
      return;
    }
    this.buckets.set(key, { items: [item], timer: this.schedule(key, windowMs) });
  }

  pending(key: string): number {
    return this.buckets.get(key)?.items.length ?? 0;
  }

  /** Drops whatever is buffered for `key` without flushing it. */
  discard(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket) return 0;
    clearTimeout(bucket.timer);
    this.buckets.delete(key);
    return bucket.items.length;
  }

  /** Flushes every open window now. */
  flushAll(): void {
    for (const key of [...this.buckets.keys()]) {
      this.fire(key);
    }
  }

  dispose(): void {
    for (const bucket of this.buckets.values()) {
      clearTimeout(bucket.timer);
    }
    this.buckets.clear();
  }

  private schedule(key: string, windowMs: number): NodeJS.Timeout {
    return setTimeout(() => this.fire(key), Math.max(0, windowMs));
  }

  private fire(key: string): void {
    const bucket = this.buckets.get(key);
    if (!bucket) return;
    clearTimeout(bucket.timer);
    this.buckets.delete(key);
    this.emit(key, bucket.items);
  }

  private emit(key: string, items: T[]): void {
    this.onFlush(key, items).catch((error: unknown) => {
      this.logger?.error('Coalesced dispatch failed', { key, error: describeError(error) });
    });
  }
}
