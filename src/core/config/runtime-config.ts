/**
 * @module runtime-config
 *
 * Loads, migrates, validates and merges the tether configuration from up to
 * three JSON layers (user-global, cwd-local, explicit `--config` path) using a
 * layered deep-merge strategy. Each layer is upgraded by the pure migrations in
 * `./migrations.ts` first, and an upgraded file is written back once.
 *
 * Key exports:
 * - {@link loadRuntimeConfig} - Main entry point to load and merge config
 * - {@link saveRuntimeConfig} - Persist a raw config object to disk
 * - {@link resolveConfigSources} - Resolve the config file paths
 * - {@link TetherConfig} - The validated configuration shape
 */
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from '../kernel/contracts.js';
import type { StructuredLogger } from '../kernel/contracts.js';
import { describeError } from '../kernel/logger.js';
import { ConfigError } from '../errors.js';
import { isRecord, readJsonFile, writeJsonAtomic } from '../utils/json-file.js';
import { migrateConfig } from './migrations.js';

const ChatIdSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));

const EngineSchema = z.object({
  enabled: z.boolean(),
  command: z.string().min(1),
  args: z.array(z.string()),
  model: z.string().optional(),
  env: z.record(z.string(), z.string())
}).strict();

const ProjectSchema = z.object({
  path: z.string().min(1),
  worktreesDir: z.string().optional()
}).strict();

export const ENGINE_IDS = ['claude', 'codex'] as const;
export type EngineId = (typeof ENGINE_IDS)[number];

export function isEngineId(value: string): value is EngineId {
  return ENGINE_IDS.some((id) => id === value);
}

const TetherConfigSchema = z.object({
  transport: z.object({
    maxRetries: z.number().int().nonnegative(),
    telegram: z.object({
      botToken: z.string(),
      allowedChatIds: z.array(ChatIdSchema),
      uploadsDir: z.string().min(1)
    }).strict()
  }).strict(),
  defaultEngine: z.enum(ENGINE_IDS),
  engines: z.object({
    claude: EngineSchema,
    codex: EngineSchema
  }).strict(),
  orchestrator: z.object({
    conflictPolicy: z.enum(['cancel', 'queue', 'reject']),
    maxConcurrentRuns: z.number().int().positive(),
    cancelGraceMs: z.number().int().nonnegative()
  }).strict(),
  runner: z.object({
    maxConsecutiveMalformedLines: z.number().int().positive()
  }).strict(),
  presentation: z.object({
    overflow: z.enum(['trim', 'split']),
    maxMessageLength: z.number().int().min(64),
    minEditIntervalMs: z.number().int().nonnegative(),
    coalesceWindowMs: z.number().int().nonnegative(),
    showResumeLine: z.boolean()
  }).strict(),
  sessions: z.object({
    maxPerEngine: z.number().int().positive(),
    dir: z.string().min(1)
  }).strict(),
  router: z.object({
    availabilityTtlMs: z.number().int().nonnegative()
  }).strict(),
  workspace: z.object({
    defaultProject: z.string().optional(),
    projects: z.record(z.string(), ProjectSchema)
  }).strict(),
  inject: z.object({
    enabled: z.boolean(),
    dir: z.string().min(1),
    pollIntervalMs: z.number().int().positive(),
    chatId: ChatIdSchema.optional()
  }).strict(),
  logging: z.object({
    level: z.enum(LOG_LEVELS)
  }).strict()
}).strict().superRefine((config, ctx) => {
  if (!config.engines[config.defaultEngine].enabled) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['defaultEngine'],
      message: `default engine ${config.defaultEngine} is disabled`
    });
  }
  const { defaultProject, projects } = config.workspace;
  if (defaultProject !== undefined && !(defaultProject in projects)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['workspace', 'defaultProject'],
      message: `unknown project ${defaultProject}`
    });
  }
  if (config.inject.enabled && config.inject.chatId === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['inject', 'chatId'],
      message: 'required when inject is enabled'
    });
  }
});

export type TetherConfig = z.output<typeof TetherConfigSchema>;
export type PresentationConfig = TetherConfig['presentation'];

export interface RuntimeFlags {
  configPath?: string;
  debug?: boolean;
}

/** Resolved file paths for the configuration layers, lowest precedence first. */
export interface ConfigSources {
  /** ~/.tether/config.json */
  userConfigPath: string;
  /** ./.tether/config.json relative to cwd */
  cwdConfigPath: string;
  /** `--config` path, when given */
  explicitConfigPath?: string;
}

export interface ConfigEnvironment {
  cwd?: string;
  homeDir?: string;
  logger?: StructuredLogger;
}

export function defaultConfig(homeDir: string = homedir()): Record<string, unknown> {
  const stateDir = join(homeDir, '.tether');
  return {
    transport: {
      maxRetries: 3,
      telegram: { botToken: '', allowedChatIds: [], uploadsDir: join(stateDir, 'uploads') }
    },
    defaultEngine: 'claude',
    engines: {
      claude: { enabled: true, command: 'claude', args: [], env: {} },
      codex: { enabled: true, command: 'codex', args: [], env: {} }
    },
    orchestrator: { conflictPolicy: 'cancel', maxConcurrentRuns: 4, cancelGraceMs: 5_000 },
    runner: { maxConsecutiveMalformedLines: 5 },
    presentation: {
      overflow: 'split',
      maxMessageLength: 4096,
      minEditIntervalMs: 2_000,
      coalesceWindowMs: 1_000,
      showResumeLine: true
    },
    sessions: { maxPerEngine: 20, dir: join(stateDir, 'sessions') },
    router: { availabilityTtlMs: 30_000 },
    workspace: { projects: {} },
    inject: { enabled: false, dir: join(stateDir, 'inject'), pollIntervalMs: 1_000 },
    logging: { level: 'info' }
  };
}

function deepMerge(base: Record<string, unknown>, override?: Record<string, unknown>): Record<string, unknown> {
  if (!override) {
    return structuredClone(base);
  }

  const output: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const baseValue = output[key];
    // Arrays and scalars replace; only plain objects merge.
    output[key] = isRecord(value) && isRecord(baseValue) ? deepMerge(baseValue, value) : value;
  }
  return output;
}

/**
 * Resolves the configuration layer paths.
 *
 * @param flags - Runtime flags; `configPath` adds the highest-precedence layer.
 */
export function resolveConfigSources(flags: RuntimeFlags, env: ConfigEnvironment = {}): ConfigSources {
  const cwd = env.cwd ?? process.cwd();
  return {
    userConfigPath: join(env.homeDir ?? homedir(), '.tether', 'config.json'),
    cwdConfigPath: resolve(cwd, '.tether', 'config.json'),
    ...(flags.configPath ? { explicitConfigPath: resolve(cwd, flags.configPath) } : {})
  };
}

/**
 * Persists a raw config object as formatted JSON. Uses atomic write (tmp +
 * rename) to prevent partial writes.
 */
export async function saveRuntimeConfig(config: Record<string, unknown>, configPath: string): Promise<void> {
  await writeJsonAtomic(configPath, config);
}

async function readLayer(
  path: string,
  required: boolean,
  logger: StructuredLogger | undefined
): Promise<Record<string, unknown> | undefined> {
  let parsed: unknown;
  try {
    parsed = await readJsonFile(path);
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${path}: ${describeError(error)}`);
  }
  if (parsed === undefined) {
    if (required) {
      throw new ConfigError(`Missing config file ${path}`);
    }
    return undefined;
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config root must be an object in ${path}`);
  }

  const { config, applied } = migrateConfig(parsed, path);
  if (applied.length > 0) {
    try {
      await saveRuntimeConfig(config, path);
    } catch (error) {
      throw new ConfigError(`Failed to write migrated config ${path}: ${describeError(error)}`);
    }
    for (const migration of applied) {
      logger?.info('Config migrated', { migration, path });
    }
  }
  return config;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validates a merged raw object, throwing {@link ConfigError} with every issue listed. */
export function parseRuntimeConfig(raw: Record<string, unknown>): TetherConfig {
  const result = TetherConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Loads and merges the runtime configuration from all layers.
 *
 * Merge order (later wins): defaults -> ~/.tether/ -> ./.tether/ (cwd) -> `--config`.
 *
 * @throws {ConfigError} If any file is unreadable, not a JSON object, or fails validation.
 */
export async function loadRuntimeConfig(flags: RuntimeFlags = {}, env: ConfigEnvironment = {}): Promise<TetherConfig> {
  const sources = resolveConfigSources(flags, env);
  const seen = new Set<string>();
  let merged = defaultConfig(env.homeDir);

  const layers: Array<[string | undefined, boolean]> = [
    [sources.userConfigPath, false],
    [sources.cwdConfigPath, false],
    [sources.explicitConfigPath, true]
  ];
  for (const [path, required] of layers) {
    if (!path || seen.has(path)) continue;
    seen.add(path);
    merged = deepMerge(merged, await readLayer(path, required, env.logger));
  }

  if (flags.debug) {
    merged = deepMerge(merged, { logging: { level: 'debug' } });
  }
  return parseRuntimeConfig(merged);
}
