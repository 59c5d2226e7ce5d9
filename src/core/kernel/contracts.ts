/**
 * @module contracts
 *
 * Shared primitives every tether subsystem depends on: the JSON value type
 * carried by logs and bus events, and the structured logger interface.
 *
 * @see {@link StructuredLogger} - Logger shape threaded through every component
 */

/** Recursive JSON-compatible value type used for log fields and bus payloads. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Log severities, lowest first. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Minimal structured logger: a message plus optional JSON fields. */
export interface StructuredLogger {
  debug(message: string, fields?: Record<string, JsonValue>): void;
  info(message: string, fields?: Record<string, JsonValue>): void;
  warn(message: string, fields?: Record<string, JsonValue>): void;
  error(message: string, fields?: Record<string, JsonValue>): void;
}

/** Injectable wall clock, in epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();
