import * as core from '@actions/core';
import {Redis} from 'ioredis';
import {createRedisClient, RedisConfig} from './redis';
import {ObjectClient} from './structures';
import {loadRedisConfig} from './config';

export * from './errors';
export * from './serialization';
export * from './redis';
export * from './structures';
export {loadRedisConfig} from './config';

/**
 * Connect to Redis and return a structure factory over the new client
 *
 * The caller owns the returned `redis` client and should `quit()` it when done.
 */
export async function connectObjectClient(
  config: RedisConfig = loadRedisConfig()
): Promise<{client: ObjectClient; redis: Redis}> {
  core.debug('Creating object client');
  const redis = await createRedisClient(config);
  return {client: ObjectClient.fromRedis(redis), redis};
}
