/**
 * Configuration loading and validation
 *
 * Sources, later ones winning:
 * 1. Built-in defaults
 * 2. YAML file at TIMELEDGER_CONFIG_PATH or ~/.config/timeledger/config.yaml
 * 3. TIMELEDGER_* environment variables
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { logger } from '../utils/logger.js';
import type { TimeLedgerConfig } from '../types/index.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Zod schema for the YAML config file
const fileConfigSchema = z
  .object({
    data_dir: z.string().min(1).optional(),
    db_path: z.string().min(1).optional(),
    log_level: logLevelSchema.optional(),
    tick_interval_ms: z.number().int().min(50).optional(),
    busy_timeout_ms: z.number().int().nonnegative().optional(),
  })
  .strict();

// Environment variable schema
const envSchema = z.object({
  TIMELEDGER_CONFIG_PATH: z.string().optional(),
  TIMELEDGER_DATA_DIR: z.string().optional(),
  TIMELEDGER_DB_PATH: z.string().optional(),
  TIMELEDGER_LOG_LEVEL: logLevelSchema.optional(),
  TIMELEDGER_TICK_MS: z.coerce.number().int().min(50).optional(),
  TIMELEDGER_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
});

export const DB_FILENAME = 'timeledger.sqlite';

export const DEFAULTS = {
  logLevel: 'info',
  tickIntervalMs: 1000,
  busyTimeoutMs: 5000,
} as const;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

export function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'timeledger', 'config.yaml');
}

export function getDefaultDataDir(): string {
  return join(homedir(), '.local', 'share', 'timeledger');
}

function loadConfigFile(configPath: string): z.infer<typeof fileConfigSchema> {
  if (!existsSync(configPath)) {
    return {};
  }

  const content = readFileSync(configPath, 'utf-8');
  const rawConfig: unknown = parseYaml(content) ?? {};
  const result = fileConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}:\n${formatIssues(result.error.issues)}`);
  }

  logger.debug(`Loaded config from ${configPath}`);
  return result.data;
}

/**
 * Load configuration from defaults, config file and environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimeLedgerConfig {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new Error(`Configuration error:\n${formatIssues(envResult.error.issues)}`);
  }
  const vars = envResult.data;

  const file = loadConfigFile(vars.TIMELEDGER_CONFIG_PATH ?? getDefaultConfigPath());

  const dataDir = resolve(vars.TIMELEDGER_DATA_DIR ?? file.data_dir ?? getDefaultDataDir());
  const dbPath = vars.TIMELEDGER_DB_PATH ?? file.db_path;

  return {
    dataDir,
    dbPath: dbPath === ':memory:' ? dbPath : resolve(dataDir, dbPath ?? DB_FILENAME),
    logLevel: vars.TIMELEDGER_LOG_LEVEL ?? file.log_level ?? DEFAULTS.logLevel,
    tickIntervalMs: vars.TIMELEDGER_TICK_MS ?? file.tick_interval_ms ?? DEFAULTS.tickIntervalMs,
    busyTimeoutMs: vars.TIMELEDGER_BUSY_TIMEOUT_MS ?? file.busy_timeout_ms ?? DEFAULTS.busyTimeoutMs,
  };
}

// Singleton config instance
let configInstance: TimeLedgerConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): TimeLedgerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export schemas for testing
export const schemas = {
  fileConfig: fileConfigSchema,
  env: envSchema,
};

export { FileSettingsStore, MemorySettingsStore, defaultSettings, SETTINGS_FILE } from './settings.js';
export type { AppSettings, SettingsStorage } from './settings.js';
