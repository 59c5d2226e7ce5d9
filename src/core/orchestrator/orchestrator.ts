import { randomUUID } from 'node:crypto';
import type { Clock, StructuredLogger } from '../kernel/contracts.js';
import { systemClock } from '../kernel/contracts.js';
import type { EventBus } from '../kernel/event-bus.js';
import { describeError } from '../kernel/logger.js';
import { isEngineId } from '../config/runtime-config.js';
import type { TetherConfig } from '../config/runtime-config.js';
import { OrchestratorHaltedError, SessionStorageError, TetherError } from '../errors.js';
import { RunPresenter } from '../presenter/presenter.js';
import { InboundCoalescer } from '../presenter/coalescer.js';
import type { Router } from '../runner/router.js';
import type { RunEventSequence, Runner } from '../runner/runner.js';
import type { ResumeToken, RunEvent, TerminalEvent } from '../runner/events.js';
import { erroredEvent, isTerminal } from '../runner/events.js';
import type { Session } from '../sessions/model.js';
import type { SessionStore } from '../sessions/session-store.js';
import type { MessageId, Transport } from '../transport.js';
import { Semaphore } from '../utils/semaphore.js';
import type { WorkspaceLease, WorkspaceProvider } from '../workspace/workspace.js';
import { RunSlots } from './run-slots.js';
import type { SlotOutcome } from './run-slots.js';

export interface Attachment {
  /** Local file path the agent can read. */
  path: string;
  name?: string;
}

export interface InboundMessage {
  chatId: string;
  engineHint?: string;
  text: string;
  attachments?: Attachment[];
  project?: string;
  branch?: string;
  replyTo?: MessageId;
  /** Text of the message this one replies to; a resume line in it picks the session. */
  replyText?: string;
}

/** One logical prompt after coalescing. */
export interface DispatchRequest {
  chatId: string;
  engine: string;
  prompt: string;
  attachments: Attachment[];
  project?: string;
  branch?: string;
  replyTo?: MessageId;
  /** Overrides the active session for this run. */
  resumeToken?: ResumeToken;
}

export type RunState = 'dispatching' | 'streaming' | 'completed' | 'errored' | 'cancelled';

export interface RunRecord {
  runId: string;
  chatId: string;
  engine: string;
  sessionId?: string;
  state: RunState;
  startedAt: number;
  sequence?: RunEventSequence;
  cancel(): void;
}

export type RunSnapshot = Omit<RunRecord, 'cancel' | 'sequence'>;

export interface ConfigSource {
  current(): TetherConfig;
}

export interface OrchestratorDeps {
  config: ConfigSource;
  router: Router;
  sessions: SessionStore;
  transport: Transport;
  workspace: WorkspaceProvider;
  events: EventBus;
  logger: StructuredLogger;
  clock?: Clock;
  newRunId?: () => string;
  /** Used for transport backoff. */
  sleep?: (ms: number) => Promise<void>;
}

interface PreparedRun {
  session: Session | undefined;
  lease: WorkspaceLease;
  release: () => void;
}

interface PendingMessage {
  message: InboundMessage;
  engine: string;
  resumeToken?: ResumeToken;
}

export function slotKey(chatId: string, engine: string): string {
  return `${chatId}:${engine}`;
}

export function mergePending(chatId: string, engine: string, items: readonly InboundMessage[]): DispatchRequest {
  const request: DispatchRequest = {
    chatId,
    engine,
    prompt: items.map((item) => item.text).join('\n\n'),
    attachments: items.flatMap((item) => item.attachments ?? [])
  };
  for (const item of items) {
    if (item.project !== undefined) request.project = item.project;
    if (item.branch !== undefined) request.branch = item.branch;
    if (item.replyTo !== undefined) request.replyTo = item.replyTo;
  }
  return request;
}

function buildPrompt(request: DispatchRequest): string {
  if (request.attachments.length === 0) {
    return request.prompt;
  }
  const files = request.attachments.map((attachment) =>
    attachment.name ? `- ${attachment.path} (${attachment.name})` : `- ${attachment.path}`
  );
  const listing = `Attached files:\n${files.join('\n')}`;
  return request.prompt ? `${request.prompt}\n\n${listing}` : listing;
}

/**
 * Owns the per-run state machine.
 *
 * Inbound messages are coalesced per (chat, engine), then dispatched into a
 * run slot according to the configured conflict policy. Each run holds a
 * global concurrency permit and a workspace lease from just before spawn until
 * its terminal event. Runs for different chats, or different engines in one
 * chat, never wait on each other except for the global permit.
 */
export class Orchestrator {
  private readonly slots = new RunSlots();
  private readonly runs = new Map<string, RunRecord>();
  private readonly semaphore: Semaphore;
  private readonly coalescer: InboundCoalescer<PendingMessage>;
  private readonly clock: Clock;
  private readonly newRunId: () => string;
  private haltReason: string | undefined;
  private stopping = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.newRunId = deps.newRunId ?? randomUUID;
    this.semaphore = new Semaphore(deps.config.current().orchestrator.maxConcurrentRuns);
    this.coalescer = new InboundCoalescer<PendingMessage>(async (_key, items) => {
      const [first] = items;
      if (!first) return;
      const request = mergePending(first.message.chatId, first.engine, items.map((item) => item.message));
      for (const item of items) {
        if (item.resumeToken) request.resumeToken = item.resumeToken;
      }
      await this.dispatch(request);
    }, deps.logger);
  }

  get halted(): boolean {
    return this.haltReason !== undefined;
  }

  /** Applies settings that live outside per-run snapshots. */
  applyConfig(config: TetherConfig): void {
    this.semaphore.resize(config.orchestrator.maxConcurrentRuns);
  }

  /**
   * Accepts one chat message. Results surface through the transport; the
   * returned promise settles once the message is buffered.
   *
   * @throws {OrchestratorHaltedError} once session storage has failed
   */
  async handleInboundMessage(message: InboundMessage): Promise<void> {
    this.assertAccepting();
    const config = this.deps.config.current();
    const resumeToken = message.replyText ? this.resumeFromReply(message.replyText, message.engineHint) : undefined;
    const engine = message.engineHint ?? resumeToken?.engine ?? config.defaultEngine;
    this.coalescer.push(
      slotKey(message.chatId, engine),
      { message, engine, resumeToken },
      config.presentation.coalesceWindowMs
    );
  }

  /**
   * Runs one coalesced prompt to completion (or until it is rejected or
   * superseded). Exposed for callers that bypass coalescing, such as the
   * inject watcher.
   */
  async dispatch(request: DispatchRequest): Promise<SlotOutcome> {
    if (this.halted || this.stopping) {
      this.deps.logger.warn('Dropping dispatch while not accepting messages', { chatId: request.chatId });
      return 'rejected';
    }
    const { chatId, engine } = request;
    const config = this.deps.config.current();

    // The slot is claimed before the first await so arrival order decides which prompt wins.
    let unresolved = false;
    const outcome = await this.slots.run(slotKey(chatId, engine), config.orchestrator.conflictPolicy, async (signal) => {
      const runner = await this.resolveRunner(request);
      if (!runner) {
        unresolved = true;
        return;
      }
      await this.execute(request, runner, config, signal);
    });
    if (unresolved) {
      return 'rejected';
    }
    if (outcome === 'rejected') {
      this.deps.events.publish('run:rejected', { chatId, engine, reason: 'busy' });
      await this.notify(chatId, `⏳ ${engine} is still working on the previous message; this one was dropped.`, request.replyTo);
    } else if (outcome === 'superseded') {
      this.deps.logger.debug('Queued prompt superseded', { chatId, engine });
    }
    return outcome;
  }

  /** Cancels the live run for (chat, engine) and anything waiting behind it. */
  async cancelActiveRun(chatId: string, engine: string): Promise<boolean> {
    const key = slotKey(chatId, engine);
    const discarded = this.coalescer.discard(key);
    const cancelled = this.slots.cancel(key);
    if (cancelled) {
      this.deps.logger.info('Run cancel requested', { chatId, engine });
      await this.slots.whenIdle(key);
    }
    return cancelled || discarded > 0;
  }

  activeRuns(): RunSnapshot[] {
    return [...this.runs.values()].map(({ runId, chatId, engine, sessionId, state, startedAt }) => ({
      runId,
      chatId,
      engine,
      sessionId,
      state,
      startedAt
    }));
  }

  /** Stops intake, cancels every run, and waits for all of them to end. */
  async shutdown(): Promise<void> {
    this.stopping = true;
    this.coalescer.dispose();
    this.slots.cancelAll();
    await this.slots.drain();
  }

  listSessions(chatId: string, engine?: string): Promise<Session[]> {
    return this.guardStorage(() => this.deps.sessions.list(chatId, engine));
  }

  switchSession(chatId: string, idPrefix: string): Promise<Session> {
    return this.guardStorage(() => this.deps.sessions.switchActive(chatId, idPrefix));
  }

  renameSession(chatId: string, engine: string, title: string): Promise<Session> {
    return this.guardStorage(() => this.deps.sessions.rename(chatId, engine, title));
  }

  deleteSession(chatId: string, idPrefix: string): Promise<Session> {
    return this.guardStorage(() => this.deps.sessions.delete(chatId, idPrefix));
  }

  activeSession(chatId: string, engine: string): Promise<Session | undefined> {
    return this.guardStorage(() => this.deps.sessions.getActive(chatId, engine));
  }

  /** The next message (for `engine`, or any engine) starts a fresh conversation; history is kept. */
  newSession(chatId: string, engine?: string): Promise<void> {
    return this.guardStorage(() => this.deps.sessions.clearActive(chatId, engine));
  }

  private async resolveRunner(request: DispatchRequest): Promise<Runner | undefined> {
    const { chatId, engine } = request;
    try {
      return await this.deps.router.resolve(engine);
    } catch (error) {
      if (!(error instanceof TetherError)) throw error;
      this.deps.events.publish('run:rejected', { chatId, engine, reason: error.code });
      await this.notify(chatId, `⚠️ error: ${error.message}`, request.replyTo);
      return undefined;
    }
  }

  /** The last resume line in `text` for the hinted engine, or for whichever engine recognizes one. */
  private resumeFromReply(text: string, engineHint: string | undefined): ResumeToken | undefined {
    const candidates = engineHint ? [engineHint] : this.deps.router.engines();
    for (const engine of candidates) {
      const token = this.deps.router.get(engine)?.extractResume(text);
      if (token) return token;
    }
    return undefined;
  }

  private async execute(request: DispatchRequest, runner: Runner, config: TetherConfig, signal: AbortSignal): Promise<void> {
    const { chatId, engine } = request;
    const key = slotKey(chatId, engine);
    const runId = this.newRunId();
    const startedAt = this.clock();
    const record: RunRecord = {
      runId,
      chatId,
      engine,
      state: 'dispatching',
      startedAt,
      cancel: () => this.slots.cancel(key)
    };
    this.runs.set(key, record);

    const presenter = new RunPresenter({
      transport: this.deps.transport,
      chatId,
      settings: { ...config.presentation },
      maxRetries: config.transport.maxRetries,
      formatResume: (token) => runner.formatResume(token),
      replyTo: request.replyTo,
      clock: this.clock,
      sleep: this.deps.sleep,
      logger: this.deps.logger
    });

    let release: (() => void) | undefined;
    let outcome: TerminalEvent['type'] | undefined;

    try {
      let prepared: PreparedRun;
      try {
        prepared = await this.prepare(request, signal);
      } catch (error) {
        const terminal = this.preflightFailure(runId, error, signal);
        outcome = terminal.type;
        await this.present(presenter, terminal);
        return;
      }
      release = prepared.release;
      const { session, lease } = prepared;

      record.sessionId = session?.id;
      const engineConfig = isEngineId(engine) ? config.engines[engine] : undefined;
      if (!engineConfig) {
        const terminal = erroredEvent(runId, 'UNKNOWN_ENGINE', `no configuration for engine ${engine}`);
        outcome = terminal.type;
        await this.present(presenter, terminal);
        return;
      }

      const resumeToken = request.resumeToken ?? session?.resumeToken;
      const sequence = runner.start({
        runId,
        prompt: buildPrompt(request),
        resumeToken,
        workingDirectory: lease.path,
        engineConfig
      });
      record.sequence = sequence;
      const onAbort = (): void => sequence.cancel();
      signal.addEventListener('abort', onAbort, { once: true });
      if (signal.aborted) {
        sequence.cancel();
      }

      this.deps.events.publish('run:dispatched', { runId, chatId, engine, resumed: resumeToken !== undefined });
      this.deps.logger.info('Run dispatched', { runId, chatId, engine, sessionId: session?.id ?? null, cwd: lease.path });

      try {
        for await (const event of sequence) {
          const forwarded = await this.observe(record, request, session, event);
          await this.present(presenter, forwarded);
          if (isTerminal(forwarded)) {
            outcome = forwarded.type;
          }
        }
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    } finally {
      release?.();
      if (this.runs.get(key) === record) {
        this.runs.delete(key);
      }
      const finalOutcome = outcome ?? 'errored';
      record.state = finalOutcome;
      this.deps.events.publish('run:finished', {
        runId,
        chatId,
        engine,
        outcome: finalOutcome,
        durationMs: this.clock() - startedAt
      });
      this.deps.logger.info('Run finished', { runId, chatId, engine, outcome: finalOutcome });
    }
  }

  /**
   * Takes the global permit, reads the session and leases the working
   * directory, in that order. A request carrying its own resume token runs
   * against the stored session holding that token, if any, instead of the
   * active one.
   */
  private async prepare(request: DispatchRequest, signal: AbortSignal): Promise<PreparedRun> {
    const releasePermit = await this.semaphore.acquire(signal);
    try {
      const session = await this.sessionFor(request);
      const lease = await this.deps.workspace.acquireWorkingDirectory(request.project, request.branch, signal);
      return {
        session,
        lease,
        release: () => {
          lease.release();
          releasePermit();
        }
      };
    } catch (error) {
      releasePermit();
      throw error;
    }
  }

  private async sessionFor(request: DispatchRequest): Promise<Session | undefined> {
    const { chatId, engine, resumeToken } = request;
    if (!resumeToken) {
      return this.deps.sessions.getActive(chatId, engine);
    }
    const history = await this.deps.sessions.list(chatId, engine);
    return history.find((session) => session.resumeToken.value === resumeToken.value);
  }

  /** State bookkeeping for one event; may replace a Completed whose session could not be stored. */
  private async observe(record: RunRecord, request: DispatchRequest, session: Session | undefined, event: RunEvent): Promise<RunEvent> {
    switch (event.type) {
      case 'started':
        record.state = 'streaming';
        this.deps.events.publish('run:started', { runId: record.runId, chatId: record.chatId, engine: record.engine });
        return event;
      case 'completed':
        try {
          const stored = await this.deps.sessions.recordCompletion(record.chatId, {
            engine: record.engine,
            sessionId: session?.id,
            resumeToken: event.resumeToken,
            prompt: request.prompt
          });
          record.sessionId = stored.id;
        } catch (error) {
          if (!(error instanceof SessionStorageError)) throw error;
          this.halt(error);
          return erroredEvent(event.runId, 'SESSION_STORAGE', error.message);
        }
        return event;
      default:
        return event;
    }
  }

  private preflightFailure(runId: string, error: unknown, signal: AbortSignal): TerminalEvent {
    if (signal.aborted) {
      return { type: 'cancelled', runId };
    }
    if (error instanceof SessionStorageError) {
      this.halt(error);
    }
    if (error instanceof TetherError) {
      return erroredEvent(runId, error.code, error.message);
    }
    throw error;
  }

  private async present(presenter: RunPresenter, event: RunEvent): Promise<void> {
    try {
      await presenter.handle(event);
    } catch (error) {
      this.deps.logger.error('Failed to present run event', {
        runId: event.runId,
        event: event.type,
        error: describeError(error)
      });
    }
  }

  private async notify(chatId: string, text: string, replyTo?: MessageId): Promise<void> {
    try {
      await this.deps.transport.sendMessage(chatId, text, { format: 'plain', replyTo });
    } catch (error) {
      this.deps.logger.error('Failed to notify chat', { chatId, error: describeError(error) });
    }
  }

  private async guardStorage<T>(fn: () => Promise<T>): Promise<T> {
    this.assertAccepting();
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SessionStorageError) {
        this.halt(error);
      }
      throw error;
    }
  }

  private assertAccepting(): void {
    if (this.haltReason !== undefined) {
      throw new OrchestratorHaltedError(this.haltReason);
    }
  }

  private halt(error: SessionStorageError): void {
    if (this.haltReason !== undefined) return;
    this.haltReason = error.message;
    this.deps.logger.error('Session storage failed; no longer accepting messages', { error: error.message });
    this.deps.events.publish('orchestrator:halted', { reason: error.message });
    this.coalescer.dispose();
  }
}
