/**
 * Connection collaborator used by the structure accessors
 *
 * Accessors never talk to ioredis directly: they depend on the narrow
 * StructureConnection interface below, which IORedisConnection implements
 * on top of a shared ioredis client.
 */

import * as core from '@actions/core';
import {Redis} from 'ioredis';
import {OperationAbortedError} from '../errors';

/**
 * A member popped from a sorted set together with its score
 */
export interface ScoredMember {
  member: string;
  score: number;
}

export interface BlockingOptions {
  /**
   * Cancels the wait. The pop rejects with OperationAbortedError.
   *
   * Aborting closes the blocking connection. If Redis has already popped an
   * item and the reply is still in flight, that item is lost.
   */
  signal?: AbortSignal;
}

/**
 * Redis commands needed by Hash, Queue and PriorityQueue
 *
 * Timeouts are in seconds; 0 waits forever.
 */
export interface StructureConnection {
  hset(key: string, field: string, value: string): Promise<number>;
  hsetnx(key: string, field: string, value: string): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hmget(key: string, fields: string[]): Promise<Array<string | null>>;
  hgetall(key: string): Promise<Record<string, string>>;
  hkeys(key: string): Promise<string[]>;
  hlen(key: string): Promise<number>;
  hdel(key: string, field: string): Promise<number>;
  del(key: string): Promise<number>;

  lpush(key: string, value: string): Promise<number>;
  brpop(
    key: string,
    timeout: number,
    options?: BlockingOptions
  ): Promise<string | null>;
  rpop(key: string): Promise<string | null>;
  llen(key: string): Promise<number>;

  zadd(key: string, score: number, member: string): Promise<number>;
  bzpopmax(
    key: string,
    timeout: number,
    options?: BlockingOptions
  ): Promise<ScoredMember | null>;
  zpopmax(key: string): Promise<ScoredMember | null>;
  zscore(key: string, member: string): Promise<number | null>;
  zrevrank(key: string, member: string): Promise<number | null>;
  zcard(key: string): Promise<number>;
}

/**
 * Parse a sorted-set score reply. Redis spells infinities as "inf"/"-inf".
 */
export function parseScore(reply: string): number {
  switch (reply.toLowerCase()) {
    case 'inf':
    case '+inf':
      return Infinity;
    case '-inf':
      return -Infinity;
    default:
      return Number(reply);
  }
}

/**
 * Format a score argument the way Redis accepts it
 */
export function formatScore(score: number): string {
  if (score === Infinity) return '+inf';
  if (score === -Infinity) return '-inf';
  return String(score);
}

/**
 * StructureConnection backed by an ioredis client
 *
 * Non-blocking commands share the caller's client. Each blocking pop runs
 * on its own duplicate connection, so a long BRPOP never holds up the
 * commands other tasks send through the shared client.
 */
export class IORedisConnection implements StructureConnection {
  constructor(private readonly client: Redis) {}

  hset(key: string, field: string, value: string): Promise<number> {
    return this.client.hset(key, field, value);
  }

  hsetnx(key: string, field: string, value: string): Promise<number> {
    return this.client.hsetnx(key, field, value);
  }

  hget(key: string, field: string): Promise<string | null> {
    return this.client.hget(key, field);
  }

  hmget(key: string, fields: string[]): Promise<Array<string | null>> {
    return this.client.hmget(key, ...fields);
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.client.hgetall(key);
  }

  hkeys(key: string): Promise<string[]> {
    return this.client.hkeys(key);
  }

  hlen(key: string): Promise<number> {
    return this.client.hlen(key);
  }

  hdel(key: string, field: string): Promise<number> {
    return this.client.hdel(key, field);
  }

  del(key: string): Promise<number> {
    return this.client.del(key);
  }

  lpush(key: string, value: string): Promise<number> {
    return this.client.lpush(key, value);
  }

  async brpop(
    key: string,
    timeout: number,
    options: BlockingOptions = {}
  ): Promise<string | null> {
    const reply = await this.blocking('BRPOP', key, options, client =>
      client.brpop(key, timeout)
    );
    return reply === null ? null : reply[1];
  }

  rpop(key: string): Promise<string | null> {
    return this.client.rpop(key);
  }

  llen(key: string): Promise<number> {
    return this.client.llen(key);
  }

  zadd(key: string, score: number, member: string): Promise<number> {
    return this.client.zadd(key, formatScore(score), member);
  }

  async bzpopmax(
    key: string,
    timeout: number,
    options: BlockingOptions = {}
  ): Promise<ScoredMember | null> {
    const reply = await this.blocking('BZPOPMAX', key, options, client =>
      client.bzpopmax(key, timeout)
    );
    if (reply === null) {
      return null;
    }
    return {member: reply[1], score: parseScore(reply[2])};
  }

  async zpopmax(key: string): Promise<ScoredMember | null> {
    // Reply is [member, score] or [] when the set is empty
    const [member, score] = await this.client.zpopmax(key);
    if (member === undefined || score === undefined) {
      return null;
    }
    return {member, score: parseScore(score)};
  }

  async zscore(key: string, member: string): Promise<number | null> {
    const reply = await this.client.zscore(key, member);
    return reply === null ? null : parseScore(reply);
  }

  zrevrank(key: string, member: string): Promise<number | null> {
    return this.client.zrevrank(key, member);
  }

  zcard(key: string): Promise<number> {
    return this.client.zcard(key);
  }

  /**
   * Run a blocking command on a dedicated connection that is closed
   * afterwards, or as soon as the signal aborts
   */
  private async blocking<R>(
    command: string,
    key: string,
    {signal}: BlockingOptions,
    run: (client: Redis) => Promise<R>
  ): Promise<R> {
    if (signal?.aborted) {
      throw new OperationAbortedError(command, key);
    }

    core.debug(`Opening blocking connection for ${command} ${key}`);
    const client = this.client.duplicate({
      lazyConnect: false,
      enableOfflineQueue: true,
    });
    const onAbort = () => {
      core.debug(`  ${command} ${key} aborted, closing blocking connection`);
      client.disconnect();
    };
    signal?.addEventListener('abort', onAbort, {once: true});

    try {
      return await run(client);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationAbortedError(command, key);
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      client.disconnect();
    }
  }
}
