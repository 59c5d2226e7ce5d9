import { Telegraf } from 'telegraf';
import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { EventBus } from '../../core/kernel/event-bus.js';
import type { Transport } from '../../core/transport.js';
import { connectBot, setStatus, stopBotSafely } from './connection.js';
import { setupHandlers } from './handlers.js';
import type { TelegramHandlerDeps } from './handlers.js';
import { TelegramTransport } from './transport.js';
import type { ConnectorStatus, TelegramState } from './types.js';

export { TelegramTransport } from './transport.js';
export type { TelegramBridge, TelegramHandlerDeps } from './handlers.js';

export interface TelegramConnectorOptions {
  botToken: string;
  events: EventBus;
  logger: StructuredLogger;
  onPollingStopped?: (error: unknown) => void;
}

/**
 * Telegram connector. The transport is usable as soon as the connector exists,
 * so the orchestrator can be built before handlers are attached and polling
 * starts.
 */
export class TelegramConnector {
  readonly transport: Transport;
  private readonly bot: Telegraf;
  private readonly state: TelegramState = { bot: null, status: 'disconnected' };

  constructor(private readonly options: TelegramConnectorOptions) {
    this.bot = new Telegraf(options.botToken);
    this.transport = new TelegramTransport(this.bot.telegram, options.logger);
  }

  get status(): ConnectorStatus {
    return this.state.status;
  }

  async start(deps: Omit<TelegramHandlerDeps, 'transport'>): Promise<void> {
    setupHandlers(this.bot, { ...deps, transport: this.transport });
    await connectBot(this.state, this.bot, {
      events: this.options.events,
      logger: this.options.logger,
      onPollingStopped: this.options.onPollingStopped
    });
  }

  stop(reason: string): void {
    stopBotSafely(this.state, reason, this.options.logger);
    setStatus(this.state, 'disconnected', this.options.events);
  }
}
