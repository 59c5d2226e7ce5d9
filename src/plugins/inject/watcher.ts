import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import { describeError } from '../../core/kernel/logger.js';
import type { DispatchRequest } from '../../core/orchestrator/orchestrator.js';
import type { SlotOutcome } from '../../core/orchestrator/run-slots.js';

declare module '../../core/kernel/event-bus.js' {
  interface EventMap {
    'inject:dispatched': { file: string; chatId: string; engine: string; outcome: string };
  }
}

export const SYSTEM_PREFIX = '[SYSTEM] ';

const InjectPayloadSchema = z
  .object({
    text: z.string().trim().min(1),
    newSession: z.boolean().optional(),
    new_session: z.boolean().optional(),
    engine: z.string().min(1).optional()
  })
  .transform(({ text, newSession, new_session, engine }) => ({
    text,
    newSession: newSession ?? new_session ?? false,
    engine
  }));

export type InjectPayload = z.output<typeof InjectPayloadSchema>;

export interface InjectTarget {
  dispatch(request: DispatchRequest): Promise<SlotOutcome>;
  newSession(chatId: string, engine?: string): Promise<void>;
}

export interface InjectSettings {
  dir: string;
  chatId: string;
  pollIntervalMs: number;
  defaultEngine: string;
}

export interface InjectWatcherOptions extends InjectSettings {
  target: InjectTarget;
  logger: StructuredLogger;
  events?: EventBus;
}

export function badFilePath(path: string): string {
  return path.replace(/\.json$/i, '') + '.bad';
}

/**
 * Polls a directory for `*.json` drop files and runs each one
 * as a system message in the configured chat. Files are handled in name order
 * and one at a time; a dispatched file is deleted before its run starts.
 */
export class InjectWatcher {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private settings: InjectSettings;

  constructor(private readonly options: InjectWatcherOptions) {
    const { dir, chatId, pollIntervalMs, defaultEngine } = options;
    this.settings = { dir, chatId, pollIntervalMs, defaultEngine };
  }

  get isRunning(): boolean {
    return this.running;
  }

  configure(settings: InjectSettings): void {
    this.settings = { ...settings };
  }

  async start(): Promise<void> {
    if (this.running) return;
    await fs.mkdir(this.settings.dir, { recursive: true });
    this.running = true;
    this.options.logger.info('Inject watcher started', { dir: this.settings.dir });
    this.scheduleNext();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  /** Handles every file currently in the directory. Returns how many were dispatched. */
  async pollOnce(): Promise<number> {
    const { dir } = this.settings;
    const names = (await fs.readdir(dir)).filter((name) => name.toLowerCase().endsWith('.json')).sort();
    let dispatched = 0;
    for (const name of names) {
      if (await this.handleFile(join(dir, name), name)) {
        dispatched++;
      }
    }
    return dispatched;
  }

  private async handleFile(path: string, name: string): Promise<boolean> {
    const { logger } = this.options;
    let payload: InjectPayload;
    try {
      const parsed = InjectPayloadSchema.safeParse(JSON.parse(await fs.readFile(path, 'utf8')));
      if (!parsed.success) {
        throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '));
      }
      payload = parsed.data;
    } catch (error) {
      logger.warn('Inject file invalid', { file: name, error: describeError(error) });
      await fs.rename(path, badFilePath(path)).catch((renameError: unknown) => {
        logger.error('Failed to quarantine inject file', { file: name, error: describeError(renameError) });
      });
      return false;
    }

    try {
      await fs.unlink(path);
    } catch (error) {
      // Leaving it in place would run it again on every poll.
      logger.error('Failed to remove inject file; skipping it', { file: name, error: describeError(error) });
      return false;
    }

    const { chatId, defaultEngine } = this.settings;
    const engine = payload.engine ?? defaultEngine;
    logger.info('Inject dispatch', { file: name, chatId, engine, newSession: payload.newSession });
    if (payload.newSession) {
      await this.options.target.newSession(chatId, engine);
    }
    const outcome = await this.options.target.dispatch({
      chatId,
      engine,
      prompt: `${SYSTEM_PREFIX}${payload.text}`,
      attachments: []
    });
    this.options.events?.publish('inject:dispatched', { file: name, chatId, engine, outcome });
    return true;
  }

  private scheduleNext(): void {
    if (this.timer) clearTimeout(this.timer);
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.settings.pollIntervalMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.pollOnce();
    } catch (error) {
      this.options.logger.error('Inject poll failed', { dir: this.settings.dir, error: describeError(error) });
    }
    this.scheduleNext();
  }
}
