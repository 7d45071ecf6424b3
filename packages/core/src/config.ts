/**
 * Bridge configuration
 *
 * Everything the store needs is resolved here once and passed into
 * createBridgeContext(); nothing below this module reads process.env.
 */
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { BridgeError, DEFAULT_LOCK_TTL_SECONDS, DEFAULT_RECALL_LIMIT } from '@agent-bridge/types';
import { LOG_LEVEL_BY_NAME, type LogLevelName } from './utils/logger.js';

/** Well-known database location shared by every agent on the machine. */
export const DEFAULT_DB_PATH = path.join(os.homedir(), '.agent-bridge', 'bridge.db');

export const DEFAULT_BUSY_TIMEOUT_MS = 10_000;

export interface BridgeConfig {
  /** SQLite file path, or ':memory:' */
  dbPath: string;
  /** TTL applied when lock() is called without one */
  defaultLockTtlSeconds: number;
  /** Cap applied when recall() is called without one */
  defaultRecallLimit: number;
  /** Reject messages to unregistered recipients */
  strictRecipients: boolean;
  /** How long a write waits on another process's transaction */
  busyTimeoutMs: number;
  logLevel: LogLevelName;
  logFile?: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  BRIDGE_DB_PATH: z.string().min(1).optional(),
  BRIDGE_LOCK_TTL: z.coerce.number().int().positive().optional(),
  BRIDGE_RECALL_LIMIT: z.coerce.number().int().positive().optional(),
  BRIDGE_STRICT_RECIPIENTS: booleanFlag.optional(),
  BRIDGE_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  BRIDGE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  BRIDGE_LOG_FILE: z.string().min(1).optional()
});

/**
 * Builds the configuration from environment variables, then applies
 * explicit overrides (CLI flags, test settings) on top.
 *
 * @throws BridgeError VALIDATION when a variable is malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<BridgeConfig> = {}
): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw BridgeError.validation(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const vars = parsed.data;

  return {
    dbPath: vars.BRIDGE_DB_PATH ?? DEFAULT_DB_PATH,
    defaultLockTtlSeconds: vars.BRIDGE_LOCK_TTL ?? DEFAULT_LOCK_TTL_SECONDS,
    defaultRecallLimit: vars.BRIDGE_RECALL_LIMIT ?? DEFAULT_RECALL_LIMIT,
    strictRecipients: vars.BRIDGE_STRICT_RECIPIENTS ?? true,
    busyTimeoutMs: vars.BRIDGE_BUSY_TIMEOUT_MS ?? DEFAULT_BUSY_TIMEOUT_MS,
    logLevel: vars.BRIDGE_LOG_LEVEL ?? 'info',
    logFile: vars.BRIDGE_LOG_FILE,
    ...overrides
  };
}

export function logLevelOf(config: Pick<BridgeConfig, 'logLevel'>) {
  return LOG_LEVEL_BY_NAME[config.logLevel];
}
