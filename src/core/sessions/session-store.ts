import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import type { Clock, StructuredLogger } from '../kernel/contracts.js';
import { systemClock } from '../kernel/contracts.js';
import { describeError } from '../kernel/logger.js';
import {
  AmbiguousIdError,
  NoActiveSessionError,
  SessionNotFoundError,
  SessionStorageError
} from '../errors.js';
import type { ResumeToken } from '../runner/events.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { readJsonFile, writeJsonAtomic } from '../utils/json-file.js';
import { upgradeSessionFile } from './migrations.js';
import {
  MAX_FIRST_MESSAGE_LENGTH,
  MAX_TITLE_LENGTH,
  SESSION_FILE_VERSION,
  emptyChatState
} from './model.js';
import type { ChatState, Session, SessionFileV3 } from './model.js';

export interface CompletionRecord {
  engine: string;
  /** Session the run resumed, if any. */
  sessionId?: string;
  resumeToken: ResumeToken;
  /** Prompt of the run; becomes `firstMessage` when a session is created. */
  prompt?: string;
}

/**
 * Durable per-chat, per-engine session history and active
 * resume pointers.
 */
export interface SessionStore {
  getActive(chatId: string, engine: string): Promise<Session | undefined>;
  create(chatId: string, engine: string, resumeToken: ResumeToken, firstMessage?: string): Promise<Session>;
  recordCompletion(chatId: string, record: CompletionRecord): Promise<Session>;
  list(chatId: string, engine?: string): Promise<Session[]>;
  switchActive(chatId: string, idPrefix: string): Promise<Session>;
  rename(chatId: string, engine: string, title: string): Promise<Session>;
  delete(chatId: string, idPrefix: string): Promise<Session>;
  clearActive(chatId: string, engine?: string): Promise<void>;
}

export interface FileSessionStoreOptions {
  dir: string;
  maxPerEngine: number;
  logger?: StructuredLogger;
  clock?: Clock;
  newId?: () => string;
}

export function sessionFileName(chatId: string): string {
  return `${encodeURIComponent(chatId)}.json`;
}

function sortHistory(sessions: Session[]): void {
  sessions.sort((a, b) => b.updatedAt - a.updatedAt);
}

/**
 * One versioned JSON file per chat under `dir`.
 *
 * Every operation on a chat runs under that chat's lock; different chats never
 * wait for each other. Mutations are applied to a copy, persisted atomically,
 * and only then become visible. Any read or write failure surfaces as a
 * {@link SessionStorageError}.
 */
export class FileSessionStore implements SessionStore {
  private readonly chats = new Map<string, ChatState>();
  private readonly locks = new KeyedMutex();
  private readonly clock: Clock;
  private readonly newId: () => string;
  private maxPerEngine: number;

  constructor(private readonly options: FileSessionStoreOptions) {
    this.clock = options.clock ?? systemClock;
    this.newId = options.newId ?? randomUUID;
    this.maxPerEngine = options.maxPerEngine;
  }

  /** Applies a new per-engine cap; enforced on the next write of each chat. */
  setMaxPerEngine(maxPerEngine: number): void {
    this.maxPerEngine = maxPerEngine;
  }

  async getActive(chatId: string, engine: string): Promise<Session | undefined> {
    return this.read(chatId, (chat) => {
      const id = chat.activeSessionIdByEngine[engine];
      return id ? chat.historyByEngine[engine]?.find((session) => session.id === id) : undefined;
    });
  }

  async create(chatId: string, engine: string, resumeToken: ResumeToken, firstMessage?: string): Promise<Session> {
    return this.mutate(chatId, (chat) => this.insert(chat, engine, resumeToken, firstMessage));
  }

  /**
   * Folds a Completed run into the history: updates the session the run
   * resumed, or creates one when there was none (or it has since been
   * deleted). The touched session becomes active.
   */
  async recordCompletion(chatId: string, record: CompletionRecord): Promise<Session> {
    return this.mutate(chatId, (chat) => {
      const history = chat.historyByEngine[record.engine] ?? [];
      const existing = record.sessionId ? history.find((session) => session.id === record.sessionId) : undefined;
      if (!existing) {
        return this.insert(chat, record.engine, record.resumeToken, record.prompt);
      }
      existing.resumeToken = { ...record.resumeToken };
      existing.updatedAt = this.clock();
      if (!existing.firstMessage && record.prompt) {
        existing.firstMessage = record.prompt.slice(0, MAX_FIRST_MESSAGE_LENGTH);
      }
      chat.activeSessionIdByEngine[record.engine] = existing.id;
      sortHistory(history);
      this.prune(chat, record.engine);
      return existing;
    });
  }

  async list(chatId: string, engine?: string): Promise<Session[]> {
    return this.read(chatId, (chat) => {
      const sessions = engine
        ? [...(chat.historyByEngine[engine] ?? [])]
        : Object.values(chat.historyByEngine).flat();
      sortHistory(sessions);
      return sessions;
    });
  }

  async switchActive(chatId: string, idPrefix: string): Promise<Session> {
    return this.mutate(chatId, (chat) => {
      const session = this.findByPrefix(chat, idPrefix);
      chat.activeSessionIdByEngine[session.engine] = session.id;
      session.updatedAt = this.clock();
      const history = chat.historyByEngine[session.engine];
      if (history) sortHistory(history);
      return session;
    });
  }

  /** Titles the active session of `engine`. */
  async rename(chatId: string, engine: string, title: string): Promise<Session> {
    return this.mutate(chatId, (chat) => {
      const id = chat.activeSessionIdByEngine[engine];
      const session = id ? chat.historyByEngine[engine]?.find((candidate) => candidate.id === id) : undefined;
      if (!session) {
        throw new NoActiveSessionError(engine);
      }
      session.title = title.trim().slice(0, MAX_TITLE_LENGTH);
      return session;
    });
  }

  async delete(chatId: string, idPrefix: string): Promise<Session> {
    return this.mutate(chatId, (chat) => {
      const session = this.findByPrefix(chat, idPrefix);
      const history = chat.historyByEngine[session.engine] ?? [];
      chat.historyByEngine[session.engine] = history.filter((candidate) => candidate.id !== session.id);
      if (chat.historyByEngine[session.engine]?.length === 0) {
        delete chat.historyByEngine[session.engine];
      }
      if (chat.activeSessionIdByEngine[session.engine] === session.id) {
        delete chat.activeSessionIdByEngine[session.engine];
      }
      return session;
    });
  }

  /** Drops the active pointer for one engine (or all); history is kept. */
  async clearActive(chatId: string, engine?: string): Promise<void> {
    await this.mutate(chatId, (chat) => {
      if (engine) {
        delete chat.activeSessionIdByEngine[engine];
      } else {
        chat.activeSessionIdByEngine = {};
      }
    });
  }

  private insert(chat: ChatState, engine: string, resumeToken: ResumeToken, firstMessage?: string): Session {
    const now = this.clock();
    const session: Session = {
      id: this.newId(),
      engine,
      resumeToken: { ...resumeToken },
      firstMessage: firstMessage ? firstMessage.slice(0, MAX_FIRST_MESSAGE_LENGTH) : undefined,
      createdAt: now,
      updatedAt: now
    };
    const history = chat.historyByEngine[engine] ?? [];
    history.unshift(session);
    sortHistory(history);
    chat.historyByEngine[engine] = history;
    chat.activeSessionIdByEngine[engine] = session.id;
    this.prune(chat, engine);
    return session;
  }

  /** Drops the oldest-updated sessions beyond the cap, never the active one. */
  private prune(chat: ChatState, engine: string): void {
    const history = chat.historyByEngine[engine];
    if (!history || history.length <= this.maxPerEngine) return;

    const activeId = chat.activeSessionIdByEngine[engine];
    const oldestFirst = [...history].sort((a, b) => a.updatedAt - b.updatedAt);
    const removed = new Set<string>();
    for (const session of oldestFirst) {
      if (history.length - removed.size <= this.maxPerEngine) break;
      if (session.id === activeId) continue;
      removed.add(session.id);
    }
    chat.historyByEngine[engine] = history.filter((session) => !removed.has(session.id));
    if (removed.size > 0) {
      this.options.logger?.debug('Pruned sessions', { chatId: chat.chatId, engine, removed: removed.size });
    }
  }

  private findByPrefix(chat: ChatState, idPrefix: string): Session {
    const prefix = idPrefix.trim();
    if (!prefix) {
      throw new SessionNotFoundError(idPrefix);
    }
    const matches = Object.values(chat.historyByEngine)
      .flat()
      .filter((session) => session.id.startsWith(prefix));
    if (matches.length === 0) {
      throw new SessionNotFoundError(prefix);
    }
    const [match, ...rest] = matches;
    if (!match || rest.length > 0) {
      throw new AmbiguousIdError(prefix, matches.map((session) => session.id));
    }
    return match;
  }

  private async read<T>(chatId: string, fn: (chat: ChatState) => T): Promise<T> {
    return this.locks.runExclusive(chatId, async () => fn(structuredClone(await this.load(chatId))));
  }

  private async mutate<T>(chatId: string, fn: (chat: ChatState) => T): Promise<T> {
    return this.locks.runExclusive(chatId, async () => {
      const draft = structuredClone(await this.load(chatId));
      const result = fn(draft);
      await this.persist(draft);
      this.chats.set(chatId, draft);
      return structuredClone(result);
    });
  }

  private filePath(chatId: string): string {
    return join(this.options.dir, sessionFileName(chatId));
  }

  /** Must be called with the chat's lock held. */
  private async load(chatId: string): Promise<ChatState> {
    const cached = this.chats.get(chatId);
    if (cached) return cached;

    const path = this.filePath(chatId);
    let raw: unknown;
    try {
      raw = await readJsonFile(path);
    } catch (error) {
      throw new SessionStorageError(`cannot read session file ${path}: ${describeError(error)}`, { cause: error });
    }

    if (raw === undefined) {
      const fresh = emptyChatState(chatId);
      this.chats.set(chatId, fresh);
      return fresh;
    }

    let upgraded: ReturnType<typeof upgradeSessionFile>;
    try {
      upgraded = upgradeSessionFile(raw, { chatId, now: this.clock(), newId: this.newId });
    } catch (error) {
      throw new SessionStorageError(`corrupt session file ${path}: ${describeError(error)}`, { cause: error });
    }

    const chat = upgraded.file.chat;
    if (upgraded.fromVersion !== SESSION_FILE_VERSION) {
      await this.persist(chat);
      this.options.logger?.info('Session file upgraded', {
        chatId,
        from: upgraded.fromVersion,
        to: SESSION_FILE_VERSION
      });
    }
    this.chats.set(chatId, chat);
    return chat;
  }

  private async persist(chat: ChatState): Promise<void> {
    const file: SessionFileV3 = { version: 3, chat };
    const path = this.filePath(chat.chatId);
    try {
      await writeJsonAtomic(path, file);
    } catch (error) {
      throw new SessionStorageError(`cannot write session file ${path}: ${describeError(error)}`, { cause: error });
    }
  }
}
