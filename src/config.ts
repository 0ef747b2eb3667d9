/**
 * Connection settings read from the environment
 */

import {RedisConfig} from './redis/types';
import {ConfigurationError} from './errors';

type Env = Record<string, string | undefined>;

function readInteger(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(name, `"${raw}" is not an integer`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigurationError(
      name,
      `${value} is outside the range ${min}-${max}`
    );
  }
  return value;
}

/**
 * Read REDIS_HOST, REDIS_PORT, REDIS_PASSWORD, REDIS_DB and REDIS_MAX_RETRIES
 */
export function loadRedisConfig(env: Env = process.env): RedisConfig {
  return {
    redisHost: env.REDIS_HOST?.trim() || 'localhost',
    redisPort: readInteger(env, 'REDIS_PORT', 6379, 1, 65535),
    redisPassword: env.REDIS_PASSWORD || undefined,
    redisDb: readInteger(env, 'REDIS_DB', 0, 0, 15),
    maxRetries: readInteger(env, 'REDIS_MAX_RETRIES', 3, 0, 100),
  };
}
