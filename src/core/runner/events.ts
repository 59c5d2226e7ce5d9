import type { ErrorCode } from '../errors.js';

/** Opaque engine-issued handle for continuing a conversation. Never mutated; a newer token supersedes it. */
export interface ResumeToken {
  readonly engine: string;
  readonly value: string;
}

export type ActionKind = 'command' | 'tool' | 'file_change' | 'web_search' | 'note' | 'warning' | 'text';

export interface StartedEvent {
  readonly type: 'started';
  readonly runId: string;
  readonly engine: string;
  readonly resumeToken?: ResumeToken;
}

export interface ActionEvent {
  readonly type: 'action';
  readonly runId: string;
  readonly kind: ActionKind;
  readonly detail: string;
  readonly ts: number;
  readonly ok?: boolean;
}

export interface CompletedEvent {
  readonly type: 'completed';
  readonly runId: string;
  readonly resumeToken: ResumeToken;
  readonly result: string;
}

export interface ErroredEvent {
  readonly type: 'errored';
  readonly runId: string;
  readonly code: ErrorCode;
  readonly reason: string;
}

export interface CancelledEvent {
  readonly type: 'cancelled';
  readonly runId: string;
}

export type RunEvent = StartedEvent | ActionEvent | CompletedEvent | ErroredEvent | CancelledEvent;
export type TerminalEvent = CompletedEvent | ErroredEvent | CancelledEvent;

export function isTerminal(event: RunEvent): event is TerminalEvent {
  return event.type === 'completed' || event.type === 'errored' || event.type === 'cancelled';
}

export function sameToken(a: ResumeToken | undefined, b: ResumeToken | undefined): boolean {
  if (!a || !b) return a === b;
  return a.engine === b.engine && a.value === b.value;
}

export function erroredEvent(runId: string, code: ErrorCode, reason: string): ErroredEvent {
  return { type: 'errored', runId, code, reason };
}
