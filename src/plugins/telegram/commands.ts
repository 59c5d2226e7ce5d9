import type { Session } from '../../core/sessions/model.js';
import type { ReplyButton } from '../../core/transport.js';
import { extractCommandPayload, parseDirectives } from './utils.js';

const MAX_LISTED_PER_ENGINE = 10;
const MAX_LISTED_TITLE = 30;
const SHORT_ID_LENGTH = 8;
const MAX_SWITCH_BUTTONS = 6;
const MAX_BUTTON_TITLE = 20;

/** Callback data prefix of the `/sessions` switch buttons; the session id follows. */
export const SWITCH_CALLBACK_PREFIX = 'tether:switch:';

export const COMMAND_NAMES = ['sessions', 'switch', 'name', 'delete', 'new', 'cancel', 'chatid'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

/** What the chat commands need from the orchestrator. */
export interface CommandTarget {
  listSessions(chatId: string, engine?: string): Promise<Session[]>;
  activeSession(chatId: string, engine: string): Promise<Session | undefined>;
  switchSession(chatId: string, idPrefix: string): Promise<Session>;
  renameSession(chatId: string, engine: string, title: string): Promise<Session>;
  deleteSession(chatId: string, idPrefix: string): Promise<Session>;
  newSession(chatId: string, engine?: string): Promise<void>;
  cancelActiveRun(chatId: string, engine: string): Promise<boolean>;
}

export interface CommandContext {
  chatId: string;
  chatType: string;
  authorized: boolean;
  defaultEngine: string;
  engines: readonly string[];
  now: number;
  /** Resume hint for a session, when its engine is registered. */
  formatResume?: (session: Session) => string | undefined;
}

export interface CommandReply {
  /** Markdown. */
  text: string;
  buttons?: ReplyButton[][];
}

export interface ParsedCommand {
  name: CommandName;
  args: string;
}

export function parseCommand(text: string): ParsedCommand | undefined {
  for (const name of COMMAND_NAMES) {
    const args = extractCommandPayload(text, [name]);
    if (args !== null) return { name, args };
  }
  return undefined;
}

export function formatTimeAgo(timestamp: number, now: number): string {
  if (timestamp <= 0) return 'unknown';
  const diffSec = Math.max(0, (now - timestamp) / 1000);
  if (diffSec < 60) return 'just now';
  if (diffSec < 3600) return `${Math.floor(diffSec / 60)}m ago`;
  if (diffSec < 86400) return `${Math.floor(diffSec / 3600)}h ago`;
  return `${Math.floor(diffSec / 86400)}d ago`;
}

export function shortId(session: Session): string {
  return session.id.slice(0, SHORT_ID_LENGTH);
}

export function displayTitle(session: Session): string {
  return session.title ?? session.firstMessage ?? shortId(session);
}

export function formatSessionLine(session: Session, index: number, active: boolean, now: number): string {
  let title = session.title ?? session.firstMessage ?? 'untitled';
  if (title.length > MAX_LISTED_TITLE) {
    title = `${title.slice(0, MAX_LISTED_TITLE - 3)}...`;
  }
  const marker = active ? '▸ ' : '  ';
  return `${index}. ${marker}\`${shortId(session)}\` ${title} (${formatTimeAgo(session.updatedAt, now)})`;
}

function switchButton(session: Session): ReplyButton {
  let title = displayTitle(session);
  if (title.length > MAX_BUTTON_TITLE) {
    title = `${title.slice(0, MAX_BUTTON_TITLE - 3)}...`;
  }
  return { text: `↩️ ${title}`, data: `${SWITCH_CALLBACK_PREFIX}${session.id}` };
}

async function listSessions(target: CommandTarget, ctx: CommandContext, args: string): Promise<CommandReply> {
  const filter = args.trim().toLowerCase() || undefined;
  if (filter !== undefined && !ctx.engines.includes(filter)) {
    return { text: `unknown engine: \`${filter}\`` };
  }
  const sessions = await target.listSessions(ctx.chatId, filter);
  if (sessions.length === 0) {
    return { text: 'no sessions found. start chatting to create one!' };
  }

  const byEngine = new Map<string, Session[]>();
  for (const session of sessions) {
    const group = byEngine.get(session.engine) ?? [];
    group.push(session);
    byEngine.set(session.engine, group);
  }

  const activeIds = new Set<string>();
  const lines = ['**your sessions:**', ''];
  for (const [engine, group] of byEngine) {
    const active = await target.activeSession(ctx.chatId, engine);
    if (active) activeIds.add(active.id);
    lines.push(`**${engine}:**`);
    group.slice(0, MAX_LISTED_PER_ENGINE).forEach((session, i) => {
      lines.push(formatSessionLine(session, i + 1, session.id === active?.id, ctx.now));
    });
    if (group.length > MAX_LISTED_PER_ENGINE) {
      lines.push(`  ... and ${group.length - MAX_LISTED_PER_ENGINE} more`);
    }
    lines.push('');
  }
  lines.push(
    'commands:',
    '`/switch <id>` - switch to session',
    '`/name <title>` - name current session',
    '`/new` - start fresh (keeps history)'
  );
  const buttons = sessions
    .slice(0, MAX_SWITCH_BUTTONS)
    .filter((session) => !activeIds.has(session.id))
    .map((session) => [switchButton(session)]);
  return buttons.length > 0 ? { text: lines.join('\n'), buttons } : { text: lines.join('\n') };
}

async function switchSession(target: CommandTarget, ctx: CommandContext, args: string): Promise<string> {
  const prefix = args.trim();
  if (!prefix) {
    return 'usage: `/switch <session_id>`\nuse `/sessions` to see available sessions.';
  }
  const session = await target.switchSession(ctx.chatId, prefix);
  const resume = ctx.formatResume?.(session);
  const heading = `switched to: \`${displayTitle(session)}\``;
  return resume ? `${heading}\n\nresume: ${resume}` : heading;
}

async function nameSession(target: CommandTarget, ctx: CommandContext, args: string): Promise<string> {
  const directives = parseDirectives(args, { engines: ctx.engines, projects: [] });
  if (!directives.text) {
    return 'usage: `/name <title>`\nexample: `/name API refactoring`';
  }
  const session = await target.renameSession(ctx.chatId, directives.engine ?? ctx.defaultEngine, directives.text);
  return `session named: \`${session.title ?? directives.text}\``;
}

async function deleteSession(target: CommandTarget, ctx: CommandContext, args: string): Promise<string> {
  const prefix = args.trim();
  if (!prefix) {
    return 'usage: `/delete <session_id>`\nuse `/sessions` to see available sessions.';
  }
  const session = await target.deleteSession(ctx.chatId, prefix);
  return `deleted session: \`${displayTitle(session)}\``;
}

function engineArgument(ctx: CommandContext, args: string): string | undefined | Error {
  const name = args.trim().replace(/^\//, '').toLowerCase();
  if (!name) return undefined;
  return ctx.engines.includes(name) ? name : new Error(`unknown engine: \`${name}\``);
}

async function newSession(target: CommandTarget, ctx: CommandContext, args: string): Promise<string> {
  const engine = engineArgument(ctx, args);
  if (engine instanceof Error) return engine.message;
  await target.newSession(ctx.chatId, engine);
  return engine
    ? `next ${engine} message starts a new session.`
    : 'next message starts a new session.';
}

async function cancelRuns(target: CommandTarget, ctx: CommandContext, args: string): Promise<string> {
  const engine = engineArgument(ctx, args);
  if (engine instanceof Error) return engine.message;
  const engines = engine ? [engine] : ctx.engines;
  const results = await Promise.all(engines.map((name) => target.cancelActiveRun(ctx.chatId, name)));
  const cancelled = engines.filter((_name, i) => results[i]);
  return cancelled.length > 0 ? `cancelled: ${cancelled.join(', ')}` : 'nothing to cancel.';
}

function chatInfo(ctx: CommandContext): string {
  return [
    `Chat ID: \`${ctx.chatId}\``,
    `Type: ${ctx.chatType}`,
    `Authorized: ${ctx.authorized ? 'yes' : 'no'}`
  ].join('\n');
}

/**
 * Runs one chat command and returns the reply. Session lookups that miss or
 * match more than one id throw their `TetherError` to the caller.
 */
export async function runCommand(command: ParsedCommand, target: CommandTarget, ctx: CommandContext): Promise<CommandReply> {
  switch (command.name) {
    case 'sessions':
      return listSessions(target, ctx, command.args);
    case 'switch':
      return { text: await switchSession(target, ctx, command.args) };
    case 'name':
      return { text: await nameSession(target, ctx, command.args) };
    case 'delete':
      return { text: await deleteSession(target, ctx, command.args) };
    case 'new':
      return { text: await newSession(target, ctx, command.args) };
    case 'cancel':
      return { text: await cancelRuns(target, ctx, command.args) };
    case 'chatid':
      return { text: chatInfo(ctx) };
  }
}
