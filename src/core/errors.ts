/**
 * tether error classes
 */

export type ErrorCode =
  | 'UNKNOWN_ENGINE'
  | 'ENGINE_UNAVAILABLE'
  | 'SPAWN_FAILURE'
  | 'STREAM_PARSE_FAILURE'
  | 'SUBPROCESS_CRASH'
  | 'AGENT_FAILURE'
  | 'CANCELLED'
  | 'TRANSPORT_FAILURE'
  | 'SESSION_NOT_FOUND'
  | 'AMBIGUOUS_ID'
  | 'SESSION_STORAGE'
  | 'WORKSPACE_UNAVAILABLE'
  | 'CONFIG_INVALID'
  | 'ORCHESTRATOR_HALTED';

export class TetherError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'TetherError';
  }
}

export class UnknownEngineError extends TetherError {
  constructor(public readonly engine: string) {
    super(`unknown engine: ${engine}`, 'UNKNOWN_ENGINE');
    this.name = 'UnknownEngineError';
  }
}

export class EngineUnavailableError extends TetherError {
  constructor(
    public readonly engine: string,
    public readonly command: string,
  ) {
    super(`engine ${engine} is unavailable (\`${command}\` not found on PATH)`, 'ENGINE_UNAVAILABLE');
    this.name = 'EngineUnavailableError';
  }
}

export class SpawnFailureError extends TetherError {
  constructor(message: string) {
    super(message, 'SPAWN_FAILURE');
    this.name = 'SpawnFailureError';
  }
}

export class SessionNotFoundError extends TetherError {
  constructor(public readonly idPrefix: string) {
    super(`no session found matching \`${idPrefix}\``, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class NoActiveSessionError extends TetherError {
  constructor(public readonly engine: string) {
    super(`no active ${engine} session`, 'SESSION_NOT_FOUND');
    this.name = 'NoActiveSessionError';
  }
}

export class AmbiguousIdError extends TetherError {
  constructor(
    public readonly idPrefix: string,
    public readonly matches: string[],
  ) {
    super(`multiple sessions match \`${idPrefix}\`; be more specific`, 'AMBIGUOUS_ID');
    this.name = 'AmbiguousIdError';
  }
}

/** Persistent storage is unusable; the process must stop taking messages. */
export class SessionStorageError extends TetherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SESSION_STORAGE', false);
    this.name = 'SessionStorageError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class WorkspaceError extends TetherError {
  constructor(message: string) {
    super(message, 'WORKSPACE_UNAVAILABLE');
    this.name = 'WorkspaceError';
  }
}

export class ConfigError extends TetherError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID', false);
    this.name = 'ConfigError';
  }
}

export class OrchestratorHaltedError extends TetherError {
  constructor(reason: string) {
    super(`not accepting messages: ${reason}`, 'ORCHESTRATOR_HALTED', false);
    this.name = 'OrchestratorHaltedError';
  }
}

export type TransportFailureKind = 'not_modified' | 'too_many_requests' | 'message_gone' | 'failed';

export class TransportError extends TetherError {
  constructor(
    message: string,
    public readonly kind: TransportFailureKind,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 'TRANSPORT_FAILURE', kind !== 'failed');
    this.name = 'TransportError';
  }
}
