import { LOG_LEVELS } from './contracts.js';
import type { JsonValue, LogLevel, StructuredLogger } from './contracts.js';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  fields?: Record<string, JsonValue>;
}

export interface KernelLogger extends StructuredLogger {
  subscribe: (listener: (entry: LogEntry) => void) => () => void;
  setTerminalOutputEnabled: (enabled: boolean) => void;
  setLevel: (level: LogLevel) => void;
}

const TELEGRAM_TOKEN_RE = /bot\d+:[A-Za-z0-9_-]+/g;
const TELEGRAM_BARE_TOKEN_RE = /\b\d+:[A-Za-z0-9_-]{10,}\b/g;

/** Masks Telegram bot tokens, both inside API URLs and bare. */
export function redactSecrets(text: string): string {
  return text
    .replace(TELEGRAM_TOKEN_RE, 'bot[REDACTED]')
    .replace(TELEGRAM_BARE_TOKEN_RE, '[REDACTED_TOKEN]');
}

function redactValue(value: JsonValue): JsonValue {
  if (typeof value === 'string') {
    return redactSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value && typeof value === 'object') {
    return redactFields(value);
  }
  return value;
}

function redactFields(fields: Record<string, JsonValue>): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = redactValue(value);
  }
  return out;
}

function shouldLog(current: LogLevel, incoming: LogLevel): boolean {
  return LOG_LEVELS.indexOf(incoming) >= LOG_LEVELS.indexOf(current);
}

export function createLogger(initialLevel: LogLevel = 'info'): KernelLogger {
  const listeners = new Set<(entry: LogEntry) => void>();
  let level = initialLevel;
  let terminalOutputEnabled = true;

  const write = (incoming: LogLevel, message: string, fields?: Record<string, JsonValue>): void => {
    if (!shouldLog(level, incoming)) {
      return;
    }

    const payload: LogEntry = {
      ts: new Date().toISOString(),
      level: incoming,
      message: redactSecrets(message),
      ...(fields ? { fields: redactFields(fields) } : {})
    };

    for (const listener of listeners) {
      try {
        listener(payload);
      } catch (error) {
        // A failing subscriber must not break the caller.
        process.stderr.write(`log subscriber failed: ${describeError(error)}\n`);
      }
    }

    if (!terminalOutputEnabled) {
      return;
    }

    // stdout stays free for the CLI; logs go to stderr as JSON lines.
    process.stderr.write(`${JSON.stringify(payload)}\n`);
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    setTerminalOutputEnabled: (enabled) => {
      terminalOutputEnabled = enabled;
    },
    setLevel: (next) => {
      level = next;
    }
  };
}

/** Renders an unknown thrown value as a log-safe string. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
