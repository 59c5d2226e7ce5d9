import { spawn as spawnChild } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { Clock, StructuredLogger } from '../kernel/contracts.js';
import { systemClock } from '../kernel/contracts.js';
import { describeError } from '../kernel/logger.js';
import { AsyncChannel } from '../utils/async-channel.js';
import type { ActionKind, ErroredEvent, ResumeToken, RunEvent, TerminalEvent } from './events.js';
import { erroredEvent } from './events.js';
import { LineSplitter, parseJsonObject } from './lines.js';

/** The slice of a child process the runner drives. `ChildProcess` satisfies it. */
export interface AgentProcess {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface SpawnOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => AgentProcess;

export const defaultSpawn: SpawnFn = (command, args, options) =>
  spawnChild(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ['pipe', 'pipe', 'pipe']
  });

export interface EngineConfig {
  command: string;
  args: string[];
  model?: string;
  env: Record<string, string>;
}

export interface RunInvocation {
  runId: string;
  prompt: string;
  resumeToken?: ResumeToken;
  workingDirectory: string;
  engineConfig: EngineConfig;
}

/** Lazy, single-use stream of one run's events. Always ends with exactly one terminal event. */
export interface RunEventSequence extends AsyncIterable<RunEvent> {
  readonly runId: string;
  cancel(): void;
}

export interface Runner {
  readonly engine: string;
  /** Binary probed for availability. */
  readonly command: string;
  start(invocation: RunInvocation): RunEventSequence;
  formatResume(token: ResumeToken): string;
  /** Finds this engine's resume line in free text; the last one wins. */
  extractResume(text: string): ResumeToken | undefined;
}

/** What an engine's line parser extracts from one JSON line. */
export type EngineSignal =
  | { type: 'session'; value: string }
  | { type: 'action'; kind: ActionKind; detail: string; ok?: boolean }
  | { type: 'result'; ok: boolean; text: string; error?: string };

export interface BuiltInvocation {
  command: string;
  args: string[];
  stdin?: string;
}

export interface SubprocessRunnerOptions {
  logger: StructuredLogger;
  cancelGraceMs: number;
  maxConsecutiveMalformedLines: number;
  /** Unread stdout lines at which the pipe is paused; it resumes at half. Defaults to 256. */
  stdoutHighWaterLines?: number;
  spawn?: SpawnFn;
  clock?: Clock;
}

type RunSignal =
  | { kind: 'line'; line: string }
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error }
  | { kind: 'cancel' }
  | { kind: 'kill-deadline' }
  | { kind: 'result-deadline' };

class RunControl {
  cancelled = false;
  onCancel: (() => void) | undefined;

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.onCancel?.();
  }
}

const LOGGED_LINE_MAX = 200;
const DEFAULT_STDOUT_HIGH_WATER = 256;

/**
 * Shared subprocess lifecycle for JSON-lines agents. Subclasses describe the
 * command line and map parsed lines to {@link EngineSignal}s; this class owns
 * Started emission, session-id consistency, termination and cancellation.
 *
 * @typeParam S - per-run parser state, created fresh for every run
 */
export abstract class SubprocessRunner<S = undefined> implements Runner {
  abstract readonly engine: string;

  constructor(
    protected readonly config: EngineConfig,
    protected readonly options: SubprocessRunnerOptions
  ) {}

  get command(): string {
    return this.config.command;
  }

  protected abstract createState(): S;
  protected abstract buildInvocation(invocation: RunInvocation): BuiltInvocation;
  /** `undefined` marks the line malformed; an empty array means "nothing to report". */
  protected abstract parseLine(data: Record<string, unknown>, state: S): EngineSignal[] | undefined;
  abstract formatResume(token: ResumeToken): string;
  /** Global pattern matching a resume line, capturing the id as `token`. */
  protected abstract readonly resumePattern: RegExp;

  extractResume(text: string): ResumeToken | undefined {
    let found: ResumeToken | undefined;
    for (const match of text.matchAll(this.resumePattern)) {
      const value = match.groups?.token;
      if (value) found = { engine: this.engine, value };
    }
    return found;
  }

  protected spawn(command: string, args: string[], options: SpawnOptions): AgentProcess {
    return (this.options.spawn ?? defaultSpawn)(command, args, options);
  }

  start(invocation: RunInvocation): RunEventSequence {
    const control = new RunControl();
    let consumed = false;
    return {
      runId: invocation.runId,
      cancel: () => control.cancel(),
      [Symbol.asyncIterator]: () => {
        if (consumed) {
          throw new Error(`run ${invocation.runId} has already been consumed`);
        }
        consumed = true;
        return this.events(invocation, control);
      }
    };
  }

  protected assertOwnToken(token: ResumeToken): void {
    if (token.engine !== this.engine) {
      throw new Error(`resume token is for engine ${token.engine}, not ${this.engine}`);
    }
  }

  private async *events(invocation: RunInvocation, control: RunControl): AsyncGenerator<RunEvent, void, undefined> {
    const { runId } = invocation;
    const { logger } = this.options;
    const clock = this.options.clock ?? systemClock;

    if (control.cancelled) {
      yield { type: 'cancelled', runId };
      return;
    }
    if (invocation.resumeToken && invocation.resumeToken.engine !== this.engine) {
      yield erroredEvent(runId, 'SPAWN_FAILURE', `resume token is for engine ${invocation.resumeToken.engine}`);
      return;
    }

    const built = this.buildInvocation(invocation);
    let child: AgentProcess;
    try {
      child = this.spawn(built.command, built.args, {
        cwd: invocation.workingDirectory,
        env: { ...process.env, ...invocation.engineConfig.env }
      });
    } catch (error) {
      yield erroredEvent(runId, 'SPAWN_FAILURE', `failed to start ${built.command}: ${describeError(error)}`);
      return;
    }
    logger.debug(`${this.engine}: spawned`, { runId, pid: child.pid ?? null, args: built.args });

    const channel = new AsyncChannel<RunSignal>();
    const splitter = new LineSplitter();
    const highWater = Math.max(1, this.options.stdoutHighWaterLines ?? DEFAULT_STDOUT_HIGH_WATER);
    const lowWater = Math.floor(highWater / 2);
    let stdoutPaused = false;
    let exited = false;

    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      for (const line of splitter.push(chunk)) {
        channel.push({ kind: 'line', line });
      }
      if (!stdoutPaused && channel.size >= highWater) {
        stdoutPaused = true;
        child.stdout?.pause();
      }
    });
    child.stdout?.on('end', () => {
      const rest = splitter.flush();
      if (rest !== undefined) {
        channel.push({ kind: 'line', line: rest });
      }
    });
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      logger.debug(`${this.engine}: stderr`, { runId, text: chunk.trimEnd() });
    });
    child.on('error', (error) => channel.push({ kind: 'error', error }));
    child.on('close', (code, signal) => {
      exited = true;
      channel.push({ kind: 'exit', code, signal });
    });
    if (child.stdin) {
      child.stdin.on('error', (error: Error) => {
        logger.debug(`${this.engine}: stdin closed early`, { runId, error: error.message });
      });
      child.stdin.end(built.stdin ?? '');
    }

    let graceTimer: NodeJS.Timeout | undefined;
    const armGrace = (kind: 'kill-deadline' | 'result-deadline'): void => {
      graceTimer = setTimeout(() => channel.push({ kind }), this.options.cancelGraceMs);
    };
    control.onCancel = () => channel.push({ kind: 'cancel' });

    const state = this.createState();
    let found: ResumeToken | undefined;
    let started = false;
    let sawOutput = false;
    let cancelling = false;
    let malformed = 0;
    let pending: TerminalEvent | undefined;

    try {
      for await (const signal of channel) {
        if (stdoutPaused && channel.size <= lowWater) {
          stdoutPaused = false;
          child.stdout?.resume();
        }
        switch (signal.kind) {
          case 'cancel':
            if (cancelling || pending) break;
            cancelling = true;
            logger.debug(`${this.engine}: cancelling`, { runId });
            child.kill('SIGTERM');
            armGrace('kill-deadline');
            break;

          case 'kill-deadline':
            logger.warn(`${this.engine}: process ignored SIGTERM, killing`, { runId });
            child.kill('SIGKILL');
            yield { type: 'cancelled', runId };
            return;

          case 'result-deadline':
            logger.warn(`${this.engine}: process lingered after its result, killing`, { runId });
            child.kill('SIGKILL');
            if (pending) yield pending;
            return;

          case 'error':
            if (pending) {
              yield pending;
            } else if (cancelling) {
              yield { type: 'cancelled', runId };
            } else if (sawOutput) {
              yield erroredEvent(runId, 'SUBPROCESS_CRASH', `${this.engine} process error: ${signal.error.message}`);
            } else {
              yield erroredEvent(runId, 'SPAWN_FAILURE', `failed to start ${built.command}: ${signal.error.message}`);
            }
            return;

          case 'exit':
            logger.debug(`${this.engine}: exited`, { runId, code: signal.code, signal: signal.signal });
            if (pending) {
              yield pending;
            } else if (cancelling) {
              yield { type: 'cancelled', runId };
            } else {
              yield this.exitEvent(runId, signal.code, signal.signal);
            }
            return;

          case 'line': {
            sawOutput = true;
            if (cancelling || pending) break;
            const text = signal.line.trim();
            if (!text) break;

            const data = parseJsonObject(text);
            const signals = data ? this.parseLine(data, state) : undefined;
            if (!signals) {
              malformed += 1;
              logger.warn(`${this.engine}: skipping malformed output line`, {
                runId,
                consecutive: malformed,
                line: text.slice(0, LOGGED_LINE_MAX)
              });
              if (malformed >= this.options.maxConsecutiveMalformedLines) {
                yield erroredEvent(runId, 'STREAM_PARSE_FAILURE', 'unparseable agent output');
                return;
              }
              break;
            }
            malformed = 0;

            for (const engineSignal of signals) {
              if (engineSignal.type === 'session') {
                const expected = found ?? invocation.resumeToken;
                if (expected && expected.value !== engineSignal.value) {
                  yield erroredEvent(
                    runId,
                    'SUBPROCESS_CRASH',
                    `${this.engine} emitted session id ${engineSignal.value} but expected ${expected.value}`
                  );
                  return;
                }
                found = { engine: this.engine, value: engineSignal.value };
                if (!started) {
                  started = true;
                  yield { type: 'started', runId, engine: this.engine, resumeToken: found };
                }
                continue;
              }

              if (!started) {
                started = true;
                yield { type: 'started', runId, engine: this.engine, resumeToken: invocation.resumeToken };
              }

              if (engineSignal.type === 'action') {
                yield {
                  type: 'action',
                  runId,
                  kind: engineSignal.kind,
                  detail: engineSignal.detail,
                  ts: clock(),
                  ok: engineSignal.ok
                };
                continue;
              }

              pending = this.resultEvent(runId, engineSignal, found ?? invocation.resumeToken);
              if (!exited) {
                armGrace('result-deadline');
              }
              break;
            }
            break;
          }
        }
      }
    } finally {
      clearTimeout(graceTimer);
      control.onCancel = undefined;
      channel.close();
      if (!exited) {
        child.kill('SIGKILL');
      }
    }
  }

  private resultEvent(
    runId: string,
    signal: Extract<EngineSignal, { type: 'result' }>,
    token: ResumeToken | undefined
  ): TerminalEvent {
    if (!signal.ok) {
      return erroredEvent(runId, 'AGENT_FAILURE', signal.error ?? (signal.text || `${this.engine} run failed`));
    }
    if (!token) {
      return erroredEvent(runId, 'SUBPROCESS_CRASH', `${this.engine} finished without a session id`);
    }
    return { type: 'completed', runId, resumeToken: token, result: signal.text };
  }

  private exitEvent(runId: string, code: number | null, signal: NodeJS.Signals | null): ErroredEvent {
    if (code === 0) {
      return erroredEvent(runId, 'SUBPROCESS_CRASH', `${this.engine} finished without a result event`);
    }
    const status = code !== null ? `rc=${code}` : `signal=${signal ?? 'unknown'}`;
    return erroredEvent(runId, 'SUBPROCESS_CRASH', `${this.engine} failed (${status})`);
  }
}
