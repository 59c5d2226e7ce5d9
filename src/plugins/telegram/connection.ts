import type { Telegraf } from 'telegraf';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import { describeError } from '../../core/kernel/logger.js';
import type { ConnectorStatus, TelegramState } from './types.js';

export function setStatus(state: TelegramState, nextStatus: ConnectorStatus, events?: EventBus): void {
  state.status = nextStatus;
  events?.publish('connector:telegram:status', { status: nextStatus });
}

export function stopBotSafely(state: TelegramState, reason: string, logger: StructuredLogger): void {
  if (!state.bot) return;
  try {
    state.bot.stop(reason);
  } catch (err) {
    // Telegraf throws if startup failed before launch completed.
    logger.debug('Telegram bot was not running', { reason, error: describeError(err) });
  } finally {
    state.bot = null;
  }
}

export interface ConnectOptions {
  events: EventBus;
  logger: StructuredLogger;
  /** Called when long-polling stops on its own. */
  onPollingStopped?: (error: unknown) => void;
}

/**
 * Validates the token, caches botInfo and starts long-polling. Resolves once
 * polling is under way; throws if the bot could not be launched.
 */
export async function connectBot(state: TelegramState, bot: Telegraf, options: ConnectOptions): Promise<void> {
  const { events, logger } = options;
  state.bot = bot;
  setStatus(state, 'connecting', events);

  try {
    await bot.telegram.deleteWebhook({ drop_pending_updates: true }).catch((err: unknown) => {
      logger.warn('Telegram deleteWebhook failed', { error: describeError(err) });
    });
    bot.botInfo = await bot.telegram.getMe();
  } catch (err) {
    setStatus(state, 'disconnected', events);
    logger.error('Telegram bot launch failed', { error: describeError(err) });
    state.bot = null;
    throw err;
  }

  // launch() never resolves while polling is active; botInfo is cached so it
  // goes straight to polling.
  bot.launch({ dropPendingUpdates: true }).catch((err: unknown) => {
    logger.error('Telegram bot polling stopped', { error: describeError(err) });
    state.bot = null;
    setStatus(state, 'disconnected', events);
    options.onPollingStopped?.(err);
  });

  setStatus(state, 'connected', events);
  logger.info('Telegram bot connected', { username: bot.botInfo.username });
}
