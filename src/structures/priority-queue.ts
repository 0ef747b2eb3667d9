/**
 * Priority queue accessor over a Redis sorted set
 *
 * Each serialized value appears at most once; pushing it again moves it to
 * the new priority. Pops take the highest priority first, ties ordered by
 * Redis (reverse lexicographic order of the serialized value).
 */

import {RedisStructure} from './base';
import {BlockingOptions, ScoredMember} from '../redis/connection';
import {decodeOptional} from '../serialization';

export class PriorityQueue<T> extends RedisStructure<T> {
  /**
   * Insert `value`, or reset its priority if it is already queued
   */
  async push(value: T, priority = 0): Promise<void> {
    await this.command('ZADD', conn =>
      conn.zadd(this.key, priority, this.serializer.encode(value))
    );
  }

  /**
   * Pop the highest priority item, waiting up to `timeout` seconds
   *
   * A timeout of 0 waits forever. Resolves to `undefined` on timeout.
   */
  async pop(timeout = 1, options: BlockingOptions = {}): Promise<T | undefined> {
    const popped = await this.command('BZPOPMAX', conn =>
      conn.bzpopmax(this.key, timeout, options)
    );
    return this.decodeMember(popped);
  }

  /**
   * Pop the highest priority item if one is queued right now
   */
  async popReady(): Promise<T | undefined> {
    const popped = await this.command('ZPOPMAX', conn => conn.zpopmax(this.key));
    return this.decodeMember(popped);
  }

  /**
   * Current priority of `value`, `undefined` if it is not queued
   */
  async score(value: T): Promise<number | undefined> {
    const score = await this.command('ZSCORE', conn =>
      conn.zscore(this.key, this.serializer.encode(value))
    );
    return score ?? undefined;
  }

  /**
   * Zero-based distance of `value` from the front of the queue
   */
  async rank(value: T): Promise<number | undefined> {
    const rank = await this.command('ZREVRANK', conn =>
      conn.zrevrank(this.key, this.serializer.encode(value))
    );
    return rank ?? undefined;
  }

  /**
   * Number of queued items, across every priority
   */
  length(): Promise<number> {
    return this.command('ZCARD', conn => conn.zcard(this.key));
  }

  private decodeMember(popped: ScoredMember | null): T | undefined {
    return decodeOptional(this.serializer, popped?.member);
  }
}
