import { EventEmitter } from 'node:events';
import type { Clock } from './contracts.js';
import { systemClock } from './contracts.js';

/**
 * Lifecycle events and their payloads. Plugins add their own through
 * declaration merging:
 *
 * ```ts
 * declare module '../../core/kernel/event-bus.js' {
 *   interface EventMap { 'inject:dispatched': { file: string } }
 * }
 * ```
 */
export interface EventMap {
  'run:dispatched': { runId: string; chatId: string; engine: string; resumed: boolean };
  'run:started': { runId: string; chatId: string; engine: string };
  'run:finished': { runId: string; chatId: string; engine: string; outcome: string; durationMs: number };
  /** `reason` is `busy` or the error code that stopped the prompt. */
  'run:rejected': { chatId: string; engine: string; reason: string };
  'orchestrator:halted': { reason: string };
  'config:reloaded': { engines: string[] };
  'connector:telegram:status': { status: string };
}

export type EventType = keyof EventMap;

/** Envelope of one event type; without an argument, the union over all of them. */
export type EventEnvelope<K extends EventType = EventType> = {
  [P in K]: { type: P; payload: EventMap[P]; at: string };
}[K];

const ALL_EVENTS = '__all__';

/** Synchronous in-process fan-out. Listeners run in subscription order inside `publish`. */
export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor(private readonly clock: Clock = systemClock) {}

  publish<K extends EventType>(type: K, payload: EventMap[K]): void {
    const envelope = { type, payload, at: new Date(this.clock()).toISOString() };
    this.emitter.emit(type, envelope);
    this.emitter.emit(ALL_EVENTS, envelope);
  }

  subscribe<K extends EventType>(type: K, listener: (event: EventEnvelope<K>) => void): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  subscribeAll(listener: (event: EventEnvelope) => void): () => void {
    this.emitter.on(ALL_EVENTS, listener);
    return () => this.emitter.off(ALL_EVENTS, listener);
  }
}
