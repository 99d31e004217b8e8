import { logger } from './logger';

type Env = Record<string, string | undefined>;

/**
 * Parse environment variable with type conversion
 */
export function parseEnvVar<T>(
  env: Env,
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    logger.warn({
      key,
      value,
      defaultValue,
      reason: error instanceof Error ? error.message : String(error),
    }, `Invalid value for ${key}, using default`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  const parsed = Number(value.trim());

  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid integer: ${value}`);
  }

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

/**
 * Parse positive integer
 */
export function parsePositiveInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

/**
 * Parse non-negative integer
 */
export function parseNonNegativeInt(env: Env, key: string, defaultValue: number): number {
  return parseEnvVar(env, key, defaultValue, (value) =>
    parseIntWithValidation(value, 0)
  );
}

/**
 * Parse one of a fixed set of strings
 */
export function parseEnum<T extends string>(
  env: Env,
  key: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  return parseEnvVar(env, key, defaultValue, (value) => {
    const match = allowed.find(candidate => candidate === value.trim());
    if (match === undefined) {
      throw new Error(`Expected one of ${allowed.join(', ')}`);
    }
    return match;
  });
}
