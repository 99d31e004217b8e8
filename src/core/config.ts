/**
 * Application configuration.
 *
 * Parsed once from the environment by `loadConfig` and handed to
 * `createServices` / `startServer`; nothing reads `process.env` after that.
 */
import { parseEnum, parseEnvVar, parseNonNegativeInt, parsePositiveInt } from './config.utils';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface AppConfig {
  // HTTP
  readonly PORT: number;

  // Logging
  readonly LOG_LEVEL: LogLevel;

  // Persistence (":memory:" keeps the ledger in process)
  readonly DATA_DIR: string;
  readonly FS_RETRY_TIMES: number;
  readonly FS_RETRY_BASE_MS: number;

  // Optimistic concurrency
  readonly CONFLICT_RETRIES: number;
  readonly CONFLICT_RETRY_BASE_MS: number;

  // Business limits
  readonly MAX_LINE_QUANTITY: number;
}

export const IN_MEMORY_DATA_DIR = ':memory:';

export const defaultConfig: AppConfig = Object.freeze({
  PORT: 3000,
  LOG_LEVEL: 'info',
  DATA_DIR: 'data',
  FS_RETRY_TIMES: 2,
  FS_RETRY_BASE_MS: 50,
  CONFLICT_RETRIES: 3,
  CONFLICT_RETRY_BASE_MS: 5,
  MAX_LINE_QUANTITY: 1000,
});

/**
 * Build the configuration from environment variables, falling back to defaults
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<AppConfig> = {}
): AppConfig {
  return Object.freeze({
    PORT: parsePositiveInt(env, 'PORT', defaultConfig.PORT),
    LOG_LEVEL: parseEnum(env, 'LOG_LEVEL', LOG_LEVELS, defaultConfig.LOG_LEVEL),
    DATA_DIR: parseEnvVar(env, 'DATA_DIR', defaultConfig.DATA_DIR, (value) => value.trim()),
    FS_RETRY_TIMES: parseNonNegativeInt(env, 'FS_RETRY_TIMES', defaultConfig.FS_RETRY_TIMES),
    FS_RETRY_BASE_MS: parsePositiveInt(env, 'FS_RETRY_BASE_MS', defaultConfig.FS_RETRY_BASE_MS),
    CONFLICT_RETRIES: parseNonNegativeInt(env, 'CONFLICT_RETRIES', defaultConfig.CONFLICT_RETRIES),
    CONFLICT_RETRY_BASE_MS: parseNonNegativeInt(env, 'CONFLICT_RETRY_BASE_MS', defaultConfig.CONFLICT_RETRY_BASE_MS),
    MAX_LINE_QUANTITY: parsePositiveInt(env, 'MAX_LINE_QUANTITY', defaultConfig.MAX_LINE_QUANTITY),
    ...overrides,
  });
}

/**
 * List configuration problems; empty when the configuration is usable
 */
export function validateConfig(config: AppConfig): string[] {
  const issues: string[] = [];

  if (config.PORT <= 0 || config.PORT > 65535) {
    issues.push('PORT must be between 1 and 65535');
  }

  if (config.DATA_DIR.length === 0) {
    issues.push('DATA_DIR must not be empty');
  }

  if (config.CONFLICT_RETRIES < 0) {
    issues.push('CONFLICT_RETRIES must be non-negative');
  }

  if (config.MAX_LINE_QUANTITY <= 0) {
    issues.push('MAX_LINE_QUANTITY must be positive');
  }

  return issues;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    port: config.PORT,
    logLevel: config.LOG_LEVEL,
    persistence: {
      dataDir: config.DATA_DIR,
      inMemory: config.DATA_DIR === IN_MEMORY_DATA_DIR,
      retryTimes: config.FS_RETRY_TIMES,
    },
    conflicts: {
      retries: config.CONFLICT_RETRIES,
      baseMs: config.CONFLICT_RETRY_BASE_MS,
    },
    maxLineQuantity: config.MAX_LINE_QUANTITY,
  };
}
