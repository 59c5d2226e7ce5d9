import type { Clock, StructuredLogger } from '../kernel/contracts.js';
import { systemClock } from '../kernel/contracts.js';
import type { PresentationConfig } from '../config/runtime-config.js';
import { TransportError } from '../errors.js';
import type { ResumeToken, RunEvent } from '../runner/events.js';
import type { MessageId, Transport } from '../transport.js';
import { packSegments, splitText, trimWithClosing } from './overflow.js';
import { renderAction, renderTerminal } from './render.js';
import { withTransportRetry } from './transport-retry.js';
import type { TransportRetryOptions } from './transport-retry.js';

export interface RunPresenterOptions {
  transport: Transport;
  chatId: string;
  /** Snapshot taken at dispatch; never re-read mid-run. */
  settings: PresentationConfig;
  maxRetries: number;
  formatResume?: (token: ResumeToken) => string;
  replyTo?: MessageId;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
}

/**
 * Turns one run's events into rate-limited send/edit operations.
 *
 * The presenter is the single writer of its run's messages: callers must
 * await each `handle` before passing the next event. Progress edits are
 * dropped while inside `minEditIntervalMs`; the terminal event always flushes.
 */
export class RunPresenter {
  private readonly segments: string[] = [];
  /** Index of the first terminal segment once closed. */
  private closingStart: number | undefined;
  private lastEditedChunks: string[] = [];
  private readonly messageIds: MessageId[] = [];
  private lastEditTs: number | undefined;
  private closed = false;
  private readonly clock: Clock;

  constructor(private readonly options: RunPresenterOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /** Everything rendered so far, before overflow handling. */
  get text(): string {
    return this.segments.join('');
  }

  get messages(): readonly MessageId[] {
    return this.messageIds;
  }

  get finished(): boolean {
    return this.closed;
  }

  async handle(event: RunEvent): Promise<void> {
    if (this.closed) {
      return;
    }

    switch (event.type) {
      case 'started':
        return;

      case 'action': {
        this.append(renderAction(event));
        const { minEditIntervalMs } = this.options.settings;
        const due = this.lastEditTs === undefined || this.clock() - this.lastEditTs >= minEditIntervalMs;
        if (this.messageIds.length === 0 || due) {
          await this.flush();
        }
        return;
      }

      default: {
        const resumeLine =
          event.type === 'completed' && this.options.settings.showResumeLine && this.options.formatResume
            ? this.options.formatResume(event.resumeToken)
            : undefined;
        const closing = renderTerminal(event, this.text, resumeLine);
        this.closingStart = this.segments.length;
        this.append(closing);
        this.closed = true;
        await this.flush();
      }
    }
  }

  /** Splits oversized fragments up front so every segment fits in one message. */
  private append(fragment: string): void {
    this.segments.push(...splitText(fragment, this.options.settings.maxMessageLength));
  }

  private chunks(): string[] {
    const { overflow, maxMessageLength } = this.options.settings;
    if (overflow === 'trim') {
      const split = this.closingStart ?? this.segments.length;
      const text = trimWithClosing(
        this.segments.slice(0, split).join(''),
        this.segments.slice(split).join(''),
        maxMessageLength
      );
      return text.length > 0 ? [text] : [];
    }
    return packSegments(this.segments, maxMessageLength);
  }

  private async flush(): Promise<void> {
    const chunks = this.chunks();
    for (const [index, chunk] of chunks.entries()) {
      const messageId = this.messageIds[index];
      if (messageId === undefined) {
        this.messageIds.push(await this.send(chunk));
      } else if (chunk !== this.lastEditedChunks[index]) {
        await this.edit(index, messageId, chunk);
      }
    }
    this.lastEditedChunks = chunks;
    this.lastEditTs = this.clock();
  }

  private send(text: string): Promise<MessageId> {
    const { transport, chatId, replyTo } = this.options;
    return withTransportRetry(
      () => transport.sendMessage(chatId, text, { format: this.format(), replyTo, silent: this.messageIds.length > 0 }),
      this.retryOptions()
    );
  }

  private async edit(index: number, messageId: MessageId, text: string): Promise<void> {
    const { transport, chatId } = this.options;
    try {
      await withTransportRetry(() => transport.editMessage(chatId, messageId, text, { format: this.format() }), this.retryOptions());
    } catch (error) {
      if (error instanceof TransportError && error.kind === 'not_modified') {
        return;
      }
      if (error instanceof TransportError && error.kind === 'message_gone') {
        this.options.logger?.info('Progress message gone; sending a new one', { chatId, messageId });
        this.messageIds[index] = await this.send(text);
        return;
      }
      throw error;
    }
  }

  /** Progress goes out verbatim; the final render may carry the agent's Markdown. */
  private format(): 'plain' | 'markdown' {
    return this.closed ? 'markdown' : 'plain';
  }

  private retryOptions(): TransportRetryOptions {
    return { maxRetries: this.options.maxRetries, sleep: this.options.sleep, logger: this.options.logger };
  }
}
