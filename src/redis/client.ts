/**
 * Redis client creation and connection management
 */

import * as core from '@actions/core';
import {Redis} from 'ioredis';
import {RedisConfig} from './types';
import {ConnectionFailureError} from '../errors';

/**
 * Delay before reconnect attempt `times`, or null once `maxRetries` is spent
 */
export function retryDelay(times: number, maxRetries: number): number | null {
  if (times > maxRetries) {
    return null;
  }
  return Math.min(times * 200, 2000);
}

/**
 * Create Redis client with configuration and retry logic
 */
export async function createRedisClient(config: RedisConfig): Promise<Redis> {
  core.debug(
    `Creating Redis client for ${config.redisHost}:${config.redisPort} (db ${config.redisDb})`
  );
  core.debug(
    `  Authentication: ${config.redisPassword ? 'Enabled' : 'Disabled'}`
  );
  core.debug(
    `  Retry strategy: Max ${config.maxRetries} attempts with exponential backoff`
  );

  const redis = new Redis({
    host: config.redisHost,
    port: config.redisPort,
    password: config.redisPassword,
    db: config.redisDb,
    retryStrategy: (times: number) => {
      core.debug(`  Redis connection retry attempt ${times}/${config.maxRetries}`);
      const delay = retryDelay(times, config.maxRetries);
      if (delay === null) {
        core.warning(
          `Failed to connect to Redis after ${config.maxRetries} attempts`
        );
        return null;
      }
      core.debug(`  Waiting ${delay}ms before retry`);
      return delay;
    },
    maxRetriesPerRequest: config.maxRetries,
    enableOfflineQueue: false,
    lazyConnect: true,
  });

  try {
    core.debug('Attempting to connect to Redis...');
    await redis.connect();

    core.debug('Testing Redis connection with PING...');
    const pong = await redis.ping();
    core.debug(`  Redis PING response: ${pong}`);

    core.info(`Connected to Redis at ${config.redisHost}:${config.redisPort}`);
    return redis;
  } catch (error) {
    const failure = new ConnectionFailureError('CONNECT', undefined, error);
    core.error(failure.message);

    if (error instanceof Error && error.stack) {
      core.debug('Connection error stack trace:');
      core.debug(error.stack);
    }

    redis.disconnect();
    throw failure;
  }
}
