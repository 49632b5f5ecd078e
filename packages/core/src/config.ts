/**
 * Configuration resolution.
 *
 * Priority: CLI flags > environment > config file > defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ErrorCode, TaskrankError, errorMessage } from './errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_BOOST_TAGS, DEFAULT_WEIGHTS, type ScoringWeights } from './scoring/weights.js';

const APP_DIR = 'taskrank';
const STORE_FILE = 'tasks.json';
const CONFIG_FILE = 'config.json';

export const ENV = {
  store: 'TASKRANK_STORE',
  config: 'TASKRANK_CONFIG',
  logLevel: 'TASKRANK_LOG_LEVEL',
} as const;

export const ConfigFileSchema = z.object({
  storePath: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  boostTags: z.array(z.string().min(1)).optional(),
  // Signs are fixed: a higher priority or a closer due date never lowers the score,
  // and Done always sinks a task.
  weights: z.object({
    priorityMultiplier: z.number().positive(),
    dueMaxBonus: z.number().nonnegative(),
    dueHorizonHours: z.number().positive(),
    statusDone: z.number().nonpositive(),
    statusInProgress: z.number().nonnegative(),
    statusReview: z.number().nonnegative(),
    tagBoost: z.number().nonnegative(),
    stalenessPerDay: z.number().nonnegative(),
    stalenessCapDays: z.number().nonnegative(),
  }).partial().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface TaskrankConfig {
  readonly storePath: string;
  readonly logLevel: LogLevel;
  readonly boostTags: readonly string[];
  readonly weights: ScoringWeights;
}

/** Values given on the command line; they win over everything else */
export interface ConfigOverrides {
  readonly storePath?: string;
  readonly logLevel?: LogLevel;
}

/** Returns the platform-appropriate data directory */
export function getDataDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

/** Returns the platform-appropriate default store path */
export function getDefaultStorePath(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  return join(getDataDir(env, platform), STORE_FILE);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV.config] ?? join(getDataDir(env), CONFIG_FILE);
}

/** Read and validate a config file. A missing file yields an empty config. */
export function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    throw new TaskrankError(ErrorCode.ConfigError, `Config file is not valid JSON: ${path}`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new TaskrankError(
      ErrorCode.ConfigError,
      `Invalid config file ${path}${where}: ${issue?.message ?? 'unknown error'}`,
    );
  }
  return parsed.data;
}

/** Resolve the effective configuration */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): TaskrankConfig {
  const configPath = getConfigPath(env);
  let file: ConfigFile;
  try {
    file = readConfigFile(configPath);
  } catch (err: unknown) {
    if (err instanceof TaskrankError) throw err;
    throw new TaskrankError(ErrorCode.ConfigError, `Failed to read config: ${errorMessage(err)}`, { cause: err });
  }

  const envLevel = env[ENV.logLevel];
  const logLevel = overrides.logLevel
    ?? (isLogLevel(envLevel) ? envLevel : undefined)
    ?? file.logLevel
    ?? 'warn';

  // Relative store paths in the config file are relative to the file itself
  const fileStore = file.storePath !== undefined ? resolve(dirname(configPath), file.storePath) : undefined;
  const storePath = overrides.storePath
    ?? env[ENV.store]
    ?? fileStore
    ?? getDefaultStorePath(env);

  return {
    storePath,
    logLevel,
    boostTags: file.boostTags ?? DEFAULT_BOOST_TAGS,
    weights: { ...DEFAULT_WEIGHTS, ...file.weights },
  };
}
