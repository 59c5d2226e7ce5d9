import { EventEmitter, once } from 'node:events';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { defaultConfig, parseRuntimeConfig } from '../src/core/config/runtime-config.js';
import type { TetherConfig } from '../src/core/config/runtime-config.js';
import type { StructuredLogger } from '../src/core/kernel/contracts.js';
import type { ResumeToken, RunEvent } from '../src/core/runner/events.js';
import type { AgentProcess, RunEventSequence, RunInvocation, Runner } from '../src/core/runner/runner.js';
import type { MessageId, SendOptions, Transport } from '../src/core/transport.js';
import { AsyncChannel } from '../src/core/utils/async-channel.js';

export function noopLogger(): StructuredLogger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), `tether-${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Validated config built from the defaults, then adjusted by `mutate`. */
export function testConfig(mutate?: (config: TetherConfig) => void): TetherConfig {
  const config = parseRuntimeConfig(defaultConfig('/tmp/tether-test-home'));
  config.transport.telegram.botToken = 'test-secret';
  config.presentation.coalesceWindowMs = 0;
  config.presentation.minEditIntervalMs = 0;
  mutate?.(config);
  return config;
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

// ── FakeAgentProcess ────────────────────────────────────────────────

export interface FakeAgentScript {
  /** Lines written to stdout once the prompt has been read. */
  lines?: string[];
  /** Exit code after the script; omit to keep the process running. */
  exitCode?: number;
  ignoreSigterm?: boolean;
}

/**
 * In-process stand-in for a spawned agent: PassThrough stdio plus the
 * `close`/`error` events a ChildProcess emits.
 */
export class FakeAgentProcess extends EventEmitter implements AgentProcess {
  readonly pid = 4242;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  prompt = '';
  private closed = false;

  constructor(private readonly script: FakeAgentScript = {}) {
    super();
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => {
      this.prompt += chunk;
    });
    this.stdin.on('end', () => {
      this.play().catch((error: unknown) => this.emit('error', error));
    });
  }

  get exited(): boolean {
    return this.closed;
  }

  writeLine(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  writeJson(value: unknown): void {
    this.writeLine(JSON.stringify(value));
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (signal === 'SIGKILL' || !this.script.ignoreSigterm) {
      this.finish(null, signal).catch((error: unknown) => this.emit('error', error));
    }
    return true;
  }

  /** Ends stdout, waits for it to drain, then emits `close`. */
  async finish(code: number | null, signal: NodeJS.Signals | null = null): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const ended = this.stdout.readableEnded ? Promise.resolve() : once(this.stdout, 'end');
    this.stdout.end();
    this.stderr.end();
    await ended;
    this.emit('close', code, signal);
  }

  private async play(): Promise<void> {
    for (const line of this.script.lines ?? []) {
      this.writeLine(line);
    }
    if (this.script.exitCode !== undefined) {
      await this.finish(this.script.exitCode);
    }
  }
}

// ── FakeTransport ───────────────────────────────────────────────────

export interface TransportCall {
  op: 'send' | 'edit' | 'delete';
  chatId: string;
  messageId: MessageId;
  text?: string;
  opts?: SendOptions;
}

/** Records every call and keeps the latest text of each message. */
export class FakeTransport implements Transport {
  readonly calls: TransportCall[] = [];
  readonly texts = new Map<MessageId, string>();
  private nextId = 100;
  private readonly failures: Array<{ op: 'send' | 'edit'; error: Error }> = [];

  failNext(op: 'send' | 'edit', error: Error): void {
    this.failures.push({ op, error });
  }

  sent(chatId?: string): TransportCall[] {
    return this.calls.filter((call) => call.op === 'send' && (chatId === undefined || call.chatId === chatId));
  }

  edits(): TransportCall[] {
    return this.calls.filter((call) => call.op === 'edit');
  }

  /** Current text of every message in a chat, oldest first. */
  transcript(chatId: string): string[] {
    return this.sent(chatId).map((call) => this.texts.get(call.messageId) ?? '');
  }

  async sendMessage(chatId: string, text: string, opts?: SendOptions): Promise<MessageId> {
    this.takeFailure('send');
    const messageId = this.nextId++;
    this.calls.push({ op: 'send', chatId, messageId, text, opts });
    this.texts.set(messageId, text);
    return messageId;
  }

  async editMessage(chatId: string, messageId: MessageId, text: string, opts?: SendOptions): Promise<void> {
    this.takeFailure('edit');
    this.calls.push({ op: 'edit', chatId, messageId, text, opts });
    this.texts.set(messageId, text);
  }

  async deleteMessage(chatId: string, messageId: MessageId): Promise<void> {
    this.calls.push({ op: 'delete', chatId, messageId });
    this.texts.delete(messageId);
  }

  private takeFailure(op: 'send' | 'edit'): void {
    const index = this.failures.findIndex((failure) => failure.op === op);
    if (index < 0) return;
    const [failure] = this.failures.splice(index, 1);
    throw failure.error;
  }
}

// ── FakeRunner ──────────────────────────────────────────────────────

/** A run whose events the test pushes by hand. Cancelling ends it with Cancelled. */
export class FakeRun implements RunEventSequence {
  readonly runId: string;
  cancelRequested = false;
  private readonly channel = new AsyncChannel<RunEvent>();
  private done = false;

  constructor(readonly invocation: RunInvocation, private readonly engine: string) {
    this.runId = invocation.runId;
  }

  get finished(): boolean {
    return this.done;
  }

  emit(event: RunEvent): void {
    if (this.done) return;
    this.channel.push(event);
    if (event.type === 'completed' || event.type === 'errored' || event.type === 'cancelled') {
      this.done = true;
      this.channel.close();
    }
  }

  start(value: string | undefined = this.invocation.resumeToken?.value): void {
    this.emit({
      type: 'started',
      runId: this.runId,
      engine: this.engine,
      resumeToken: value ? { engine: this.engine, value } : undefined,
    });
  }

  action(detail: string): void {
    this.emit({ type: 'action', runId: this.runId, kind: 'command', detail, ts: 0 });
  }

  complete(value: string, result = 'done'): void {
    this.emit({ type: 'completed', runId: this.runId, resumeToken: { engine: this.engine, value }, result });
  }

  fail(reason: string): void {
    this.emit({ type: 'errored', runId: this.runId, code: 'SUBPROCESS_CRASH', reason });
  }

  cancel(): void {
    this.cancelRequested = true;
    this.emit({ type: 'cancelled', runId: this.runId });
  }

  [Symbol.asyncIterator](): AsyncIterator<RunEvent> {
    return this.channel[Symbol.asyncIterator]();
  }
}

export class FakeRunner implements Runner {
  readonly runs: FakeRun[] = [];

  constructor(
    readonly engine: string,
    readonly command: string = engine,
  ) {}

  start(invocation: RunInvocation): RunEventSequence {
    const run = new FakeRun(invocation, this.engine);
    this.runs.push(run);
    return run;
  }

  formatResume(token: ResumeToken): string {
    return `\`${this.engine} --resume ${token.value}\``;
  }

  extractResume(text: string): ResumeToken | undefined {
    let found: ResumeToken | undefined;
    for (const match of text.matchAll(new RegExp(`${this.engine} --resume ([^\`\\s]+)`, 'g'))) {
      if (match[1]) found = { engine: this.engine, value: match[1] };
    }
    return found;
  }

  run(index: number): FakeRun {
    const run = this.runs[index];
    if (!run) throw new Error(`no run #${index} for ${this.engine}`);
    return run;
  }
}
