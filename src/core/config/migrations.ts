import { ConfigError } from '../errors.js';
import { isRecord } from '../utils/json-file.js';

type RawConfig = Record<string, unknown>;

interface ConfigMigration {
  name: string;
  /** Returns the upgraded copy, or `undefined` when the config does not need it. */
  apply(config: RawConfig, source: string): RawConfig | undefined;
}

function ensureTable(config: RawConfig, key: string, label: string, source: string): RawConfig {
  const value = config[key];
  if (value === undefined) {
    const table: RawConfig = {};
    config[key] = table;
    return table;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid \`${label}\` in ${source}; expected an object.`);
  }
  return value;
}

const LEGACY_TELEGRAM_KEYS = ['bot_token', 'botToken', 'chat_id', 'chatId'];

/** Top-level `bot_token` / `chat_id` move under `transport.telegram`. */
const legacyTelegram: ConfigMigration = {
  name: 'legacy-telegram',
  apply(input, source) {
    if (!LEGACY_TELEGRAM_KEYS.some((key) => key in input)) {
      return undefined;
    }
    const config = structuredClone(input);
    const transport = ensureTable(config, 'transport', 'transport', source);
    const telegram = ensureTable(transport, 'telegram', 'transport.telegram', source);

    const token = config.bot_token ?? config.botToken;
    if (token !== undefined && telegram.botToken === undefined) {
      telegram.botToken = token;
    }
    const chatId = config.chat_id ?? config.chatId;
    if (chatId !== undefined && telegram.allowedChatIds === undefined) {
      telegram.allowedChatIds = [chatId];
    }
    for (const key of LEGACY_TELEGRAM_KEYS) {
      delete config[key];
    }
    return config;
  }
};

/** Top-level `engine` was renamed to `defaultEngine`. */
const defaultEngineRename: ConfigMigration = {
  name: 'default-engine',
  apply(input) {
    if (!('engine' in input)) {
      return undefined;
    }
    const config = structuredClone(input);
    if (config.defaultEngine === undefined) {
      config.defaultEngine = config.engine;
    }
    delete config.engine;
    return config;
  }
};

const MIGRATIONS: readonly ConfigMigration[] = [legacyTelegram, defaultEngineRename];

export interface MigrationResult {
  config: RawConfig;
  applied: string[];
}

/** Applies every pending migration in order. The input is never mutated. */
export function migrateConfig(input: RawConfig, source: string): MigrationResult {
  let config = input;
  const applied: string[] = [];
  for (const migration of MIGRATIONS) {
    const next = migration.apply(config, source);
    if (next) {
      config = next;
      applied.push(migration.name);
    }
  }
  return { config, applied };
}
