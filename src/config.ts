/**
 * User configuration: identity, storage location and transfer tuning.
 *
 * Read from a JSON file (`$CROSSFS_CONFIG`, else `~/.crossfs/config.json`)
 * and overlaid with `CROSSFS_*` environment variables.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_CHUNK_SIZE,
  MAX_CONCURRENT_COPIES,
  errorMessage,
  isErrno,
} from './types.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { defaultPoolSize } from './permits.js';
import type { XetSession } from './xet/store.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const configFileSchema = z
  .object({
    user: z.string().min(1).optional(),
    email: z.string().email().optional(),
    host: z.string().min(1).optional(),
    storageRoot: z.string().min(1).optional(),
    maxConcurrentCopies: z.number().int().positive().optional(),
    poolSize: z.number().int().positive().optional(),
    chunkSize: z.number().int().positive().optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CrossFsConfig {
  user: string;
  email: string;
  host: string;
  storageRoot: string;
  maxConcurrentCopies: number;
  poolSize: number;
  chunkSize: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

export function configPath(env: Env = process.env): string {
  return env.CROSSFS_CONFIG ?? join(os.homedir(), '.crossfs', 'config.json');
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate a config file. A missing file reads as empty.
 *
 * @throws {ConfigError} If the file is not valid JSON or fails validation.
 */
export async function readConfigFile(path: string): Promise<ConfigFile> {
  let text: string;
  try {
    text = await fs.promises.readFile(path, 'utf8');
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return {};
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${path}: ${errorMessage(err)}`);
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function envOverrides(env: Env): ConfigFile {
  const overrides: ConfigFile = {};
  if (env.CROSSFS_USER) overrides.user = env.CROSSFS_USER;
  if (env.CROSSFS_EMAIL) overrides.email = env.CROSSFS_EMAIL;
  if (env.CROSSFS_HOST) overrides.host = env.CROSSFS_HOST;
  if (env.CROSSFS_STORAGE_ROOT) overrides.storageRoot = env.CROSSFS_STORAGE_ROOT;
  if (env.CROSSFS_LOG_LEVEL) {
    const level = logLevelSchema.safeParse(env.CROSSFS_LOG_LEVEL);
    if (!level.success) {
      throw new ConfigError(
        `Invalid CROSSFS_LOG_LEVEL '${env.CROSSFS_LOG_LEVEL}' (expected ${LOG_LEVELS.join(', ')})`,
      );
    }
    overrides.logLevel = level.data;
  }
  return overrides;
}

function defaultUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'user';
  }
}

/**
 * Resolve the effective configuration: defaults, then the file, then
 * the environment.
 */
export async function loadConfig(opts: { path?: string; env?: Env } = {}): Promise<CrossFsConfig> {
  const env = opts.env ?? process.env;
  const file = await readConfigFile(opts.path ?? configPath(env));
  const merged = { ...file, ...envOverrides(env) };
  const user = merged.user ?? defaultUser();
  return {
    user,
    email: merged.email ?? `${user}@localhost`,
    host: merged.host ?? 'localhost',
    storageRoot: merged.storageRoot ?? join(os.homedir(), '.crossfs', 'repos'),
    maxConcurrentCopies: merged.maxConcurrentCopies ?? MAX_CONCURRENT_COPIES,
    poolSize: merged.poolSize ?? defaultPoolSize(),
    chunkSize: merged.chunkSize ?? DEFAULT_CHUNK_SIZE,
    logLevel: merged.logLevel ?? 'info',
  };
}

export function toSession(config: CrossFsConfig): XetSession {
  return {
    storageRoot: config.storageRoot,
    user: config.user,
    email: config.email,
    host: config.host,
  };
}

export interface LoginSettings {
  user: string;
  email: string;
  host?: string;
  storageRoot?: string;
}

/**
 * Store login identity in the config file, keeping its other fields.
 *
 * With `noOverwrite`, an existing identity is left alone and false is
 * returned. Replacing a different stored user requires `force`.
 *
 * @throws {ConfigError} If the settings are invalid, or a different user
 *   is stored and `force` is not set.
 */
export async function saveLoginConfig(
  login: LoginSettings,
  opts: { path?: string; force?: boolean; noOverwrite?: boolean } = {},
): Promise<boolean> {
  const path = opts.path ?? configPath();
  const existing = await readConfigFile(path);

  if (existing.user !== undefined) {
    if (opts.noOverwrite) return false;
    if (existing.user !== login.user && !opts.force) {
      throw new ConfigError(
        `Already logged in as ${existing.user}; pass force to replace it with ${login.user}`,
      );
    }
  }

  const next = configFileSchema.safeParse({
    ...existing,
    user: login.user,
    email: login.email,
    ...(login.host !== undefined ? { host: login.host } : {}),
    ...(login.storageRoot !== undefined ? { storageRoot: login.storageRoot } : {}),
  });
  if (!next.success) throw new ConfigError(`Invalid login settings: ${describeIssues(next.error)}`);

  await fs.promises.mkdir(dirname(path), { recursive: true });
  await fs.promises.writeFile(path, `${JSON.stringify(next.data, null, 2)}\n`);
  return true;
}
