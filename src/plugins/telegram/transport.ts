import type { StructuredLogger } from '../../core/kernel/contracts.js';
import type { MessageId, SendOptions, Transport } from '../../core/transport.js';
import { isEntityParseError, markdownToTelegramHtml, toTransportError } from './utils.js';

interface TelegramSendExtra {
  parse_mode?: 'HTML';
  disable_notification?: boolean;
  reply_parameters?: { message_id: number; allow_sending_without_reply?: boolean };
  link_preview_options?: { is_disabled: boolean };
  reply_markup?: { inline_keyboard: Array<Array<{ text: string; callback_data: string }>> };
}

interface TelegramEditExtra {
  parse_mode?: 'HTML';
  link_preview_options?: { is_disabled: boolean };
}

/** The slice of telegraf's `Telegram` client the transport talks to. */
export interface TelegramApiClient {
  sendMessage(chatId: string, text: string, extra: TelegramSendExtra): Promise<{ message_id: number }>;
  editMessageText(
    chatId: string,
    messageId: number,
    inlineMessageId: undefined,
    text: string,
    extra: TelegramEditExtra
  ): Promise<unknown>;
  deleteMessage(chatId: string, messageId: number): Promise<unknown>;
}

/**
 * Transport over the Bot API. Markdown is rendered to Telegram HTML and resent
 * as plain text if Telegram rejects the entities. Every failure leaves as a
 * classified `TransportError`.
 */
export class TelegramTransport implements Transport {
  constructor(
    private readonly client: TelegramApiClient,
    private readonly logger?: StructuredLogger
  ) {}

  async sendMessage(chatId: string, text: string, opts: SendOptions = {}): Promise<MessageId> {
    const base: TelegramSendExtra = {
      link_preview_options: { is_disabled: true },
      ...(opts.silent ? { disable_notification: true } : {}),
      ...(opts.replyTo !== undefined
        ? { reply_parameters: { message_id: opts.replyTo, allow_sending_without_reply: true } }
        : {}),
      ...(opts.buttons && opts.buttons.length > 0
        ? {
            reply_markup: {
              inline_keyboard: opts.buttons.map((row) =>
                row.map((button) => ({ text: button.text, callback_data: button.data }))
              )
            }
          }
        : {})
    };
    try {
      if (opts.format === 'markdown') {
        try {
          const sent = await this.client.sendMessage(chatId, markdownToTelegramHtml(text), { ...base, parse_mode: 'HTML' });
          return sent.message_id;
        } catch (error) {
          if (!isEntityParseError(error)) throw error;
          this.logger?.debug('Telegram rejected HTML; resending as plain text', { chatId });
        }
      }
      const sent = await this.client.sendMessage(chatId, text, base);
      return sent.message_id;
    } catch (error) {
      throw toTransportError(error);
    }
  }

  async editMessage(chatId: string, messageId: MessageId, text: string, opts: SendOptions = {}): Promise<void> {
    const base: TelegramEditExtra = { link_preview_options: { is_disabled: true } };
    try {
      if (opts.format === 'markdown') {
        try {
          await this.client.editMessageText(chatId, messageId, undefined, markdownToTelegramHtml(text), {
            ...base,
            parse_mode: 'HTML'
          });
          return;
        } catch (error) {
          if (!isEntityParseError(error)) throw error;
          this.logger?.debug('Telegram rejected HTML edit; retrying as plain text', { chatId, messageId });
        }
      }
      await this.client.editMessageText(chatId, messageId, undefined, text, base);
    } catch (error) {
      throw toTransportError(error);
    }
  }

  async deleteMessage(chatId: string, messageId: MessageId): Promise<void> {
    try {
      await this.client.deleteMessage(chatId, messageId);
    } catch (error) {
      throw toTransportError(error);
    }
  }
}
