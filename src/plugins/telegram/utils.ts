import { TelegramError } from 'telegraf';
import { TransportError } from '../../core/errors.js';
import type { TransportFailureKind } from '../../core/errors.js';
import type { TelegramChatRef } from './types.js';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function extractCommandPayload(text: string, commands: string[]): string | null {
  const trimmed = text.trim();
  for (const raw of commands) {
    const command = raw.startsWith('/') ? raw : `/${raw}`;
    const pattern = new RegExp(`^${escapeRegExp(command)}(?:@[\\w_]+)?(?:\\s+([\\s\\S]+))?$`, 'i');
    const match = trimmed.match(pattern);
    if (match) return (match[1] ?? '').trim();
  }
  return null;
}

export function extractRetryAfterMs(err: unknown): number | null {
  const msg = err instanceof Error ? err.message : String(err);
  const match = /retry after (\d+)/i.exec(msg);
  if (match) return (Number(match[1]) + 1) * 1000;
  return null;
}

export function resolveChatContext(chat: TelegramChatRef): { chatId: string; isPrivate: boolean } {
  return {
    chatId: String(chat.id),
    isPrivate: chat.type === 'private'
  };
}

/** An empty allow-list serves every chat. */
export function isChatAllowed(allowedChatIds: readonly string[], chatId: string): boolean {
  return allowedChatIds.length === 0 || allowedChatIds.includes(chatId);
}

// ── Directives ──────────────────────────────────────────────────────

export interface MessageDirectives {
  engine?: string;
  project?: string;
  branch?: string;
  text: string;
}

export interface DirectiveVocabulary {
  engines: readonly string[];
  projects: readonly string[];
}

const SLASH_TOKEN_RE = /^\/([a-z0-9_-]+)(?:@[\w_]+)?$/i;
const BRANCH_TOKEN_RE = /^@([\w./-]+)$/;

/**
 * Strips leading `/<engine>`, `/<project>` and `@<branch>` tokens, in any
 * order, each at most once. Parsing stops at the first token that is not a
 * known directive.
 */
export function parseDirectives(text: string, vocabulary: DirectiveVocabulary): MessageDirectives {
  const result: MessageDirectives = { text: text.trim() };
  let rest = result.text;

  for (;;) {
    const match = /^(\S+)(?:\s+|$)/.exec(rest);
    if (!match) break;
    const token = match[1];

    const slash = SLASH_TOKEN_RE.exec(token);
    const branch = BRANCH_TOKEN_RE.exec(token);
    if (slash) {
      const name = slash[1].toLowerCase();
      if (result.engine === undefined && vocabulary.engines.includes(name)) {
        result.engine = name;
      } else if (result.project === undefined && vocabulary.projects.includes(slash[1])) {
        result.project = slash[1];
      } else {
        break;
      }
    } else if (branch && result.branch === undefined) {
      result.branch = branch[1];
    } else {
      break;
    }
    rest = rest.slice(match[0].length);
  }

  result.text = rest.trim();
  return result;
}

// ── Bot API errors ──────────────────────────────────────────────────

/** Maps a Bot API failure onto the transport's recovery vocabulary. */
export function classifyTelegramError(code: number, description: string): TransportFailureKind {
  const lower = description.toLowerCase();
  if (code === 429) return 'too_many_requests';
  if (lower.includes('message is not modified')) return 'not_modified';
  if (lower.includes('message to edit not found') || lower.includes("message can't be edited")) {
    return 'message_gone';
  }
  return 'failed';
}

export function isEntityParseError(error: unknown): boolean {
  return error instanceof TelegramError && error.code === 400 && /can't parse entities/i.test(error.description);
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  if (error instanceof TelegramError) {
    const retryAfter = error.parameters?.retry_after;
    return new TransportError(
      error.description,
      classifyTelegramError(error.code, error.description),
      retryAfter !== undefined ? retryAfter * 1000 : undefined
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  const retryAfterMs = extractRetryAfterMs(error);
  return retryAfterMs === null
    ? new TransportError(message, 'failed')
    : new TransportError(message, 'too_many_requests', retryAfterMs);
}

/**
 * Convert standard markdown to Telegram-compatible HTML.
 * Handles code blocks, inline code, bold, italic, and links.
 */
export function markdownToTelegramHtml(md: string): string {
  const escHtml = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

  // Extract code blocks first to protect their content
  const codeBlocks: string[] = [];
  let text = md.replace(/```(?:\w*)\n?([\s\S]*?)```/g, (_m, code: string) => {
    codeBlocks.push(code.replace(/\n$/, ''));
    return `\x00CB${codeBlocks.length - 1}\x00`;
  });

  const inlineCodes: string[] = [];
  text = text.replace(/`([^`]+)`/g, (_m, code: string) => {
    inlineCodes.push(code);
    return `\x00IC${inlineCodes.length - 1}\x00`;
  });

  text = escHtml(text);

  // Bold **text** or __text__
  text = text.replace(/\*\*(.+?)\*\*/g, '<b>$1</b>');
  text = text.replace(/__(.+?)__/g, '<b>$1</b>');

  // Italic *text* or _text_
  text = text.replace(/(?<!\w)\*(.+?)\*(?!\w)/g, '<i>$1</i>');
  text = text.replace(/(?<!\w)_(.+?)_(?!\w)/g, '<i>$1</i>');

  // Links [text](url)
  text = text.replace(/\[([^\]]+)\]\(([^)]+)\)/g, '<a href="$2">$1</a>');

  text = text.replace(/\x00IC(\d+)\x00/g, (_m, i: string) => `<code>${escHtml(inlineCodes[Number(i)] ?? '')}</code>`);
  text = text.replace(/\x00CB(\d+)\x00/g, (_m, i: string) => `<pre>${escHtml(codeBlocks[Number(i)] ?? '')}</pre>`);

  return text;
}
