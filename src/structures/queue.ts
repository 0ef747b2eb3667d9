/**
 * FIFO queue accessor over a Redis list
 *
 * Items are pushed on the left and popped from the right.
 */

import {RedisStructure} from './base';
import {BlockingOptions} from '../redis/connection';
import {decodeOptional} from '../serialization';

export class Queue<T> extends RedisStructure<T> {
  async push(value: T): Promise<void> {
    await this.command('LPUSH', conn =>
      conn.lpush(this.key, this.serializer.encode(value))
    );
  }

  /**
   * Pop the oldest item, waiting up to `timeout` seconds for one to arrive
   *
   * A timeout of 0 waits forever. Resolves to `undefined` on timeout.
   */
  async pop(timeout = 1, options: BlockingOptions = {}): Promise<T | undefined> {
    const raw = await this.command('BRPOP', conn =>
      conn.brpop(this.key, timeout, options)
    );
    return decodeOptional(this.serializer, raw);
  }

  /**
   * Pop the oldest item if one is available right now
   */
  async popReady(): Promise<T | undefined> {
    const raw = await this.command('RPOP', conn => conn.rpop(this.key));
    return decodeOptional(this.serializer, raw);
  }

  length(): Promise<number> {
    return this.command('LLEN', conn => conn.llen(this.key));
  }
}
