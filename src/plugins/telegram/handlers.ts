import { promises as fs } from 'node:fs';
import { basename, join } from 'node:path';
import type { Context, Telegraf } from 'telegraf';
import type { Clock, StructuredLogger } from '../../core/kernel/contracts.js';
import { systemClock } from '../../core/kernel/contracts.js';
import { describeError } from '../../core/kernel/logger.js';
import { SessionNotFoundError, TetherError } from '../../core/errors.js';
import type { Attachment, ConfigSource, InboundMessage } from '../../core/orchestrator/orchestrator.js';
import type { Session } from '../../core/sessions/model.js';
import type { MessageId, ReplyButton, Transport } from '../../core/transport.js';
import { displayTitle, parseCommand, runCommand, SWITCH_CALLBACK_PREFIX } from './commands.js';
import type { CommandTarget } from './commands.js';
import { isChatAllowed, parseDirectives, resolveChatContext } from './utils.js';

/** Orchestrator surface the Telegram front end drives. */
export interface TelegramBridge extends CommandTarget {
  handleInboundMessage(message: InboundMessage): Promise<void>;
}

export interface TelegramHandlerDeps {
  bridge: TelegramBridge;
  transport: Transport;
  config: ConfigSource;
  /** Engines currently registered with the router. */
  engines: () => readonly string[];
  formatResume: (session: Session) => string | undefined;
  logger: StructuredLogger;
  clock?: Clock;
}

export interface IncomingMessage {
  chatId: string;
  chatType: string;
  messageId: MessageId;
  text: string;
  attachments?: Attachment[];
  /** Text or caption of the message this one replies to. */
  replyText?: string;
}

async function reply(
  deps: TelegramHandlerDeps,
  message: IncomingMessage,
  text: string,
  buttons?: ReplyButton[][]
): Promise<void> {
  try {
    await deps.transport.sendMessage(message.chatId, text, {
      format: 'markdown',
      replyTo: message.messageId,
      ...(buttons ? { buttons } : {})
    });
  } catch (error) {
    deps.logger.error('Telegram reply failed', { chatId: message.chatId, error: describeError(error) });
  }
}

/**
 * Routes one chat message: commands are answered in place, everything else
 * goes to the orchestrator with its leading directives applied. Chats outside
 * the allow-list only get an answer to `/chatid`.
 */
export async function handleIncomingMessage(deps: TelegramHandlerDeps, message: IncomingMessage): Promise<void> {
  const config = deps.config.current();
  const authorized = isChatAllowed(config.transport.telegram.allowedChatIds, message.chatId);
  const command = parseCommand(message.text);

  if (!authorized && command?.name !== 'chatid') {
    deps.logger.debug('Ignoring message from unauthorized chat', { chatId: message.chatId });
    return;
  }

  try {
    if (command) {
      const answer = await runCommand(command, deps.bridge, {
        chatId: message.chatId,
        chatType: message.chatType,
        authorized,
        defaultEngine: config.defaultEngine,
        engines: deps.engines(),
        now: (deps.clock ?? systemClock)(),
        formatResume: deps.formatResume
      });
      await reply(deps, message, answer.text, answer.buttons);
      return;
    }

    const directives = parseDirectives(message.text, {
      engines: deps.engines(),
      projects: Object.keys(config.workspace.projects)
    });
    const attachments = message.attachments ?? [];
    if (!directives.text && attachments.length === 0) {
      await reply(deps, message, 'nothing to send. add a message after the directives.');
      return;
    }

    await deps.bridge.handleInboundMessage({
      chatId: message.chatId,
      text: directives.text,
      replyTo: message.messageId,
      ...(directives.engine !== undefined ? { engineHint: directives.engine } : {}),
      ...(directives.project !== undefined ? { project: directives.project } : {}),
      ...(directives.branch !== undefined ? { branch: directives.branch } : {}),
      ...(attachments.length > 0 ? { attachments } : {}),
      ...(message.replyText ? { replyText: message.replyText } : {})
    });
  } catch (error) {
    if (!(error instanceof TetherError)) throw error;
    await reply(deps, message, `⚠️ ${error.message}`);
  }
}

/** Answers a `/sessions` switch button with the notice shown to the user. */
export async function handleSwitchCallback(deps: TelegramHandlerDeps, chatId: string, idPrefix: string): Promise<string> {
  const config = deps.config.current();
  if (!isChatAllowed(config.transport.telegram.allowedChatIds, chatId)) {
    deps.logger.debug('Ignoring callback from unauthorized chat', { chatId });
    return 'not authorized.';
  }
  try {
    const session = await deps.bridge.switchSession(chatId, idPrefix);
    return `switched to: ${displayTitle(session)}`;
  } catch (error) {
    if (error instanceof SessionNotFoundError) return 'session not found';
    if (!(error instanceof TetherError)) throw error;
    return `⚠️ ${error.message}`;
  }
}

function repliedText(replied: object | undefined): string | undefined {
  if (!replied) return undefined;
  if ('text' in replied && typeof replied.text === 'string') return replied.text;
  if ('caption' in replied && typeof replied.caption === 'string') return replied.caption;
  return undefined;
}

export function safeFileName(name: string, fallback: string): string {
  const cleaned = basename(name).replace(/[^\w.-]+/g, '_').replace(/^\.+/, '');
  return cleaned || fallback;
}

/** Downloads a Telegram file into `<uploadsDir>/<chatId>/`. */
async function downloadAttachment(
  ctx: Context,
  uploadsDir: string,
  chatId: string,
  fileId: string,
  name: string
): Promise<Attachment> {
  const link = await ctx.telegram.getFileLink(fileId);
  const response = await fetch(link.href);
  if (!response.ok) {
    throw new Error(`Telegram file download failed: HTTP ${response.status}`);
  }
  const dir = join(uploadsDir, safeFileName(chatId, 'chat'));
  await fs.mkdir(dir, { recursive: true });
  const path = join(dir, `${Date.now()}-${safeFileName(name, fileId)}`);
  await fs.writeFile(path, Buffer.from(await response.arrayBuffer()));
  return { path, name };
}

// ── Setup Telegraf handlers ─────────────────────────────────────────

export function setupHandlers(bot: Telegraf, deps: TelegramHandlerDeps): void {
  const dispatch = async (message: IncomingMessage): Promise<void> => {
    try {
      await handleIncomingMessage(deps, message);
    } catch (err) {
      deps.logger.error('Telegram handler error', { chatId: message.chatId, error: describeError(err) });
      await reply(deps, message, 'An error occurred processing your message.');
    }
  };

  bot.on('text', async (ctx) => {
    const { chatId } = resolveChatContext(ctx.chat);
    const text = ctx.message.text.trim();
    if (!text) return;
    await dispatch({
      chatId,
      chatType: ctx.chat.type,
      messageId: ctx.message.message_id,
      text,
      replyText: repliedText(ctx.message.reply_to_message)
    });
  });

  bot.on('document', async (ctx) => {
    const { chatId } = resolveChatContext(ctx.chat);
    const config = deps.config.current();
    if (!isChatAllowed(config.transport.telegram.allowedChatIds, chatId)) return;
    const { document } = ctx.message;
    try {
      const attachment = await downloadAttachment(
        ctx,
        config.transport.telegram.uploadsDir,
        chatId,
        document.file_id,
        document.file_name ?? document.file_id
      );
      await dispatch({
        chatId,
        chatType: ctx.chat.type,
        messageId: ctx.message.message_id,
        text: ctx.message.caption?.trim() ?? '',
        attachments: [attachment],
        replyText: repliedText(ctx.message.reply_to_message)
      });
    } catch (err) {
      deps.logger.error('Telegram document handler error', { chatId, error: describeError(err) });
      await ctx.reply('Error processing document.').catch((replyError: unknown) => {
        deps.logger.warn('Telegram reply failed', { chatId, error: describeError(replyError) });
      });
    }
  });

  bot.on('photo', async (ctx) => {
    const { chatId } = resolveChatContext(ctx.chat);
    const config = deps.config.current();
    if (!isChatAllowed(config.transport.telegram.allowedChatIds, chatId)) return;
    const largest = ctx.message.photo.at(-1);
    if (!largest) return;
    try {
      const attachment = await downloadAttachment(
        ctx,
        config.transport.telegram.uploadsDir,
        chatId,
        largest.file_id,
        `${largest.file_unique_id}.jpg`
      );
      await dispatch({
        chatId,
        chatType: ctx.chat.type,
        messageId: ctx.message.message_id,
        text: ctx.message.caption?.trim() ?? '',
        attachments: [attachment],
        replyText: repliedText(ctx.message.reply_to_message)
      });
    } catch (err) {
      deps.logger.error('Telegram photo handler error', { chatId, error: describeError(err) });
      await ctx.reply('Error processing photo.').catch((replyError: unknown) => {
        deps.logger.warn('Telegram reply failed', { chatId, error: describeError(replyError) });
      });
    }
  });

  bot.action(new RegExp(`^${SWITCH_CALLBACK_PREFIX}(.+)$`), async (ctx) => {
    const idPrefix = ctx.match[1];
    if (!ctx.chat || !idPrefix) {
      await ctx.answerCbQuery();
      return;
    }
    const { chatId } = resolveChatContext(ctx.chat);
    try {
      await ctx.answerCbQuery(await handleSwitchCallback(deps, chatId, idPrefix));
    } catch (err) {
      deps.logger.error('Telegram callback error', { chatId, error: describeError(err) });
      await ctx.answerCbQuery('An error occurred.').catch((answerError: unknown) => {
        deps.logger.warn('Telegram callback answer failed', { chatId, error: describeError(answerError) });
      });
    }
  });

  bot.catch((err) => {
    deps.logger.error('Telegram update failed', { error: describeError(err) });
  });
}
