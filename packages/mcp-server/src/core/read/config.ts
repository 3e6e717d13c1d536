/**
 * Server configuration from environment variables
 *
 * VAULT_PATH / PROJECT_PATH          vault root (otherwise the nearest folder
 *                                    above the working directory holding a
 *                                    .obsidian or .vault-hierarchy folder)
 * VAULT_HIERARCHY_WATCH              watch the vault for changes (default true)
 * VAULT_HIERARCHY_DEBOUNCE_MS        per-file debounce for the watcher (default 500)
 * VAULT_HIERARCHY_CONCURRENCY        files processed in parallel by a batch (default 4)
 * VAULT_HIERARCHY_DRY_RUN            watcher logs changes without writing (default false)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { serverLog } from '../shared/serverLog.js';
import { DEFAULT_CONCURRENCY, DEFAULT_DEBOUNCE_MS } from '../write/constants.js';

export interface ServerConfig {
  vaultPath: string;
  watch: boolean;
  debounceMs: number;
  concurrency: number;
  dryRun: boolean;
}

export const DEFAULT_SERVER_CONFIG: Omit<ServerConfig, 'vaultPath'> = {
  watch: true,
  debounceMs: DEFAULT_DEBOUNCE_MS,
  concurrency: DEFAULT_CONCURRENCY,
  dryRun: false,
};

const PositiveIntSchema = z.coerce.number().int().positive();

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const VaultPathSchema = z.string().trim().min(1);

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = PositiveIntSchema.safeParse(raw);
  if (!parsed.success) {
    serverLog('config', `Invalid ${key}="${raw}", using default ${fallback}`, 'warn');
    return fallback;
  }
  return parsed.data;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = BooleanFlagSchema.safeParse(raw);
  if (!parsed.success) {
    serverLog('config', `Invalid ${key}="${raw}", using default ${fallback}`, 'warn');
    return fallback;
  }
  return parsed.data;
}

/** Folders that mark a directory as a vault root */
export const VAULT_MARKERS = ['.obsidian', '.vault-hierarchy'] as const;

function hasVaultMarker(dir: string): boolean {
  return VAULT_MARKERS.some(marker => {
    const markerPath = path.join(dir, marker);
    return fs.existsSync(markerPath) && fs.statSync(markerPath).isDirectory();
  });
}

/**
 * Resolve the vault root: PROJECT_PATH, then VAULT_PATH, then the nearest
 * marked folder at or above `cwd`, then `cwd` itself.
 */
export function resolveVaultPath(env: Env, cwd: string = process.cwd()): string {
  for (const key of ['PROJECT_PATH', 'VAULT_PATH']) {
    const parsed = VaultPathSchema.safeParse(env[key]);
    if (parsed.success) {
      return path.resolve(cwd, parsed.data);
    }
  }

  const start = path.resolve(cwd);
  for (let dir = start; ; dir = path.dirname(dir)) {
    if (hasVaultMarker(dir)) {
      return dir;
    }
    if (path.dirname(dir) === dir) {
      break;
    }
  }

  serverLog('config', `No vault marker found above ${start}, using it as the vault root`, 'warn');
  return start;
}

/**
 * Load server configuration. Read once at startup; the vault root is fixed
 * for the lifetime of the process.
 */
export function loadServerConfig(env: Env = process.env, cwd: string = process.cwd()): ServerConfig {
  const config: ServerConfig = {
    vaultPath: resolveVaultPath(env, cwd),
    watch: readFlag(env, 'VAULT_HIERARCHY_WATCH', DEFAULT_SERVER_CONFIG.watch),
    debounceMs: readPositiveInt(env, 'VAULT_HIERARCHY_DEBOUNCE_MS', DEFAULT_SERVER_CONFIG.debounceMs),
    concurrency: readPositiveInt(env, 'VAULT_HIERARCHY_CONCURRENCY', DEFAULT_SERVER_CONFIG.concurrency),
    dryRun: readFlag(env, 'VAULT_HIERARCHY_DRY_RUN', DEFAULT_SERVER_CONFIG.dryRun),
  };

  serverLog(
    'config',
    `vault=${config.vaultPath} watch=${config.watch} debounce=${config.debounceMs}ms concurrency=${config.concurrency} dryRun=${config.dryRun}`
  );

  return config;
}
