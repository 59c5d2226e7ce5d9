import { isRecord } from '../utils/json-file.js';
import {
  MAX_FIRST_MESSAGE_LENGTH,
  MAX_TITLE_LENGTH,
  SESSION_FILE_VERSION,
  SessionFileV1Schema,
  SessionFileV2Schema,
  SessionFileV3Schema
} from './model.js';
import type { Session, SessionFileV1, SessionFileV2, SessionFileV3 } from './model.js';

export interface UpgradeContext {
  chatId: string;
  /** Epoch milliseconds. */
  now: number;
  newId: () => string;
}

export interface UpgradeResult {
  file: SessionFileV3;
  fromVersion: number;
}

export function upgradeV1ToV2(file: SessionFileV1, now: number): SessionFileV2 {
  const seconds = now / 1000;
  const history: SessionFileV2['history'] = {};
  const active: Record<string, string> = {};
  for (const [engine, entry] of Object.entries(file.sessions)) {
    const resume = entry.resume;
    if (!resume || resume in history) continue;
    history[resume] = { resume, engine, created_at: seconds, updated_at: seconds };
    active[engine] = resume;
  }
  return { version: 2, history, active };
}

export function upgradeV2ToV3(file: SessionFileV2, context: UpgradeContext): SessionFileV3 {
  const historyByEngine: Record<string, Session[]> = {};
  const idByResume = new Map<string, string>();

  for (const entry of Object.values(file.history)) {
    const id = context.newId();
    idByResume.set(entry.resume, id);
    const session: Session = {
      id,
      engine: entry.engine,
      resumeToken: { engine: entry.engine, value: entry.resume },
      title: entry.title ? entry.title.slice(0, MAX_TITLE_LENGTH) : undefined,
      firstMessage: entry.first_message ? entry.first_message.slice(0, MAX_FIRST_MESSAGE_LENGTH) : undefined,
      createdAt: Math.round(entry.created_at * 1000),
      updatedAt: Math.round(entry.updated_at * 1000)
    };
    (historyByEngine[entry.engine] ??= []).push(session);
  }
  for (const sessions of Object.values(historyByEngine)) {
    sessions.sort((a, b) => b.updatedAt - a.updatedAt);
  }

  const activeSessionIdByEngine: Record<string, string> = {};
  for (const [engine, resume] of Object.entries(file.active)) {
    const id = idByResume.get(resume);
    if (id) {
      activeSessionIdByEngine[engine] = id;
    }
  }

  return {
    version: 3,
    chat: { chatId: context.chatId, historyByEngine, activeSessionIdByEngine }
  };
}

function detectVersion(raw: Record<string, unknown>): number {
  if (typeof raw.version === 'number') return raw.version;
  return 'sessions' in raw ? 1 : 0;
}

/**
 * Brings any known session file layout up to the current version. Pure: the
 * caller decides whether to persist the result.
 *
 * @throws Error when the content is not a recognizable session file
 */
export function upgradeSessionFile(raw: unknown, context: UpgradeContext): UpgradeResult {
  if (!isRecord(raw)) {
    throw new Error('session file root must be an object');
  }
  const fromVersion = detectVersion(raw);

  switch (fromVersion) {
    case SESSION_FILE_VERSION:
      return { file: SessionFileV3Schema.parse(raw), fromVersion };
    case 2:
      return { file: upgradeV2ToV3(SessionFileV2Schema.parse(raw), context), fromVersion };
    case 1: {
      const v2 = upgradeV1ToV2(SessionFileV1Schema.parse(raw), context.now);
      return { file: upgradeV2ToV3(v2, context), fromVersion };
    }
    default:
      throw new Error(`unsupported session file version ${fromVersion}`);
  }
}
