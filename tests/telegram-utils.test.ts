import { TelegramError } from 'telegraf';
import { describe, expect, test } from 'vitest';
import { TransportError } from '../src/core/errors.js';
import {
  classifyTelegramError,
  extractCommandPayload,
  extractRetryAfterMs,
  isChatAllowed,
  isEntityParseError,
  markdownToTelegramHtml,
  parseDirectives,
  resolveChatContext,
  toTransportError,
} from '../src/plugins/telegram/utils.js';

const vocabulary = { engines: ['claude', 'codex'], projects: ['web'] };

describe('parseDirectives', () => {
  test('strips leading engine, branch and project tokens in any order', () => {
    expect(parseDirectives('/codex @feat/login fix it', vocabulary)).toEqual({
      engine: 'codex',
      branch: 'feat/login',
      text: 'fix it',
    });
    expect(parseDirectives('/web /claude hi', vocabulary)).toEqual({ project: 'web', engine: 'claude', text: 'hi' });
  });

  test('accepts a bot mention and any case on the engine', () => {
    expect(parseDirectives('/Claude@tether_bot hello', vocabulary)).toEqual({ engine: 'claude', text: 'hello' });
  });

  test('each directive applies at most once', () => {
    expect(parseDirectives('/claude /codex hi', vocabulary)).toEqual({ engine: 'claude', text: '/codex hi' });
    expect(parseDirectives('@a @b x', vocabulary)).toEqual({ branch: 'a', text: '@b x' });
  });

  test('stops at the first ordinary word', () => {
    expect(parseDirectives('hello /claude', vocabulary)).toEqual({ text: 'hello /claude' });
    expect(parseDirectives('  /claude  ', vocabulary)).toEqual({ engine: 'claude', text: '' });
  });
});

describe('command payloads', () => {
  test('extractCommandPayload matches the command with an optional bot mention', () => {
    expect(extractCommandPayload('/switch@tether_bot abc', ['switch'])).toBe('abc');
    expect(extractCommandPayload('/switch', ['/switch'])).toBe('');
    expect(extractCommandPayload('/switcheroo', ['switch'])).toBeNull();
  });

  test('extractRetryAfterMs pads the hint by a second', () => {
    expect(extractRetryAfterMs(new Error('429: retry after 3'))).toBe(4_000);
    expect(extractRetryAfterMs('no hint')).toBeNull();
  });
});

describe('chat access', () => {
  test('an empty allow-list serves every chat', () => {
    expect(isChatAllowed([], '7')).toBe(true);
    expect(isChatAllowed(['42'], '42')).toBe(true);
    expect(isChatAllowed(['42'], '7')).toBe(false);
  });

  test('resolveChatContext stringifies the id', () => {
    expect(resolveChatContext({ id: -100123, type: 'supergroup' })).toEqual({ chatId: '-100123', isPrivate: false });
    expect(resolveChatContext({ id: 5, type: 'private' })).toEqual({ chatId: '5', isPrivate: true });
  });
});

describe('Bot API errors', () => {
  test('classifyTelegramError', () => {
    expect(classifyTelegramError(429, 'Too Many Requests: retry after 5')).toBe('too_many_requests');
    expect(classifyTelegramError(400, 'Bad Request: message is not modified: specified new message content')).toBe(
      'not_modified',
    );
    expect(classifyTelegramError(400, 'Bad Request: message to edit not found')).toBe('message_gone');
    expect(classifyTelegramError(400, "Bad Request: message can't be edited")).toBe('message_gone');
    expect(classifyTelegramError(403, 'Forbidden: bot was blocked by the user')).toBe('failed');
  });

  test('toTransportError keeps the server retry hint', () => {
    const error = toTransportError(
      new TelegramError({ error_code: 429, description: 'Too Many Requests: retry after 5', parameters: { retry_after: 5 } }),
    );
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'too_many_requests', retryAfterMs: 5_000, message: 'Too Many Requests: retry after 5' });
  });

  test('toTransportError falls back to the message text', () => {
    expect(toTransportError(new Error('ETELEGRAM: retry after 3'))).toMatchObject({
      kind: 'too_many_requests',
      retryAfterMs: 4_000,
    });
    expect(toTransportError(new Error('socket hang up'))).toMatchObject({ kind: 'failed', message: 'socket hang up' });
    const existing = new TransportError('gone', 'message_gone');
    expect(toTransportError(existing)).toBe(existing);
  });

  test('isEntityParseError', () => {
    expect(isEntityParseError(new TelegramError({ error_code: 400, description: "Bad Request: can't parse entities" }))).toBe(
      true,
    );
    expect(isEntityParseError(new Error("can't parse entities"))).toBe(false);
  });
});

describe('markdownToTelegramHtml', () => {
  test('renders bold, inline code and links with HTML escaped', () => {
    expect(markdownToTelegramHtml('**bold** and `a<b>` [x](https://example.test)')).toBe(
      '<b>bold</b> and <code>a&lt;b&gt;</code> <a href="https://example.test">x</a>',
    );
  });

  test('renders fenced code blocks verbatim', () => {
    expect(markdownToTelegramHtml('```ts\nconst a = 1 < 2;\n```')).toBe('<pre>const a = 1 &lt; 2;</pre>');
  });
});
