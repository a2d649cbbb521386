/**
 * Runtime configuration.
 *
 * Defaults are overridden by WORLDFORGE_* environment variables, which are in
 * turn overridden by values passed in code.
 */

import path from 'node:path';
import { z } from 'zod';

import { ConfigError } from './errors';

export const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', '..', 'data');
export const DEFAULT_SAVE_DIR = 'saves';

export type MissedCallbackPolicy = 'exact' | 'catch-up';

const configSchema = z.object({
  seed: z.number().int().optional(),
  dataDir: z.string().min(1),
  saveDir: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none']),
  maxEventHistory: z.number().int().positive(),
  maxItemAttempts: z.number().int().positive(),
  npcMemorySize: z.number().int().positive(),
  missedCallbacks: z.enum(['exact', 'catch-up']),
});

export type EngineConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: EngineConfig = {
  dataDir: DEFAULT_DATA_DIR,
  saveDir: DEFAULT_SAVE_DIR,
  logLevel: 'info',
  maxEventHistory: 1000,
  maxItemAttempts: 100,
  npcMemorySize: 20,
  missedCallbacks: 'exact',
};

type Env = Record<string, string | undefined>;

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function readEnv(env: Env): Record<string, unknown> {
  const fromEnv: Record<keyof EngineConfig, unknown> = {
    seed: intFromEnv(env.WORLDFORGE_SEED),
    dataDir: env.WORLDFORGE_DATA_DIR,
    saveDir: env.WORLDFORGE_SAVE_DIR,
    logLevel: env.WORLDFORGE_LOG_LEVEL,
    maxEventHistory: intFromEnv(env.WORLDFORGE_MAX_EVENT_HISTORY),
    maxItemAttempts: intFromEnv(env.WORLDFORGE_MAX_ITEM_ATTEMPTS),
    npcMemorySize: intFromEnv(env.WORLDFORGE_NPC_MEMORY_SIZE),
    missedCallbacks: env.WORLDFORGE_MISSED_CALLBACKS,
  };
  // Unset variables must not shadow the defaults
  return Object.fromEntries(Object.entries(fromEnv).filter(([, value]) => value !== undefined));
}

/**
 * Build a validated configuration from defaults, environment and overrides.
 */
export function loadConfig(env: Env = process.env, overrides: Partial<EngineConfig> = {}): EngineConfig {
  const merged = { ...DEFAULT_CONFIG, ...readEnv(env), ...overrides };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}
