/**
 * Hash table accessor over a Redis hash
 */

import {RedisStructure} from './base';
import {decodeOptional} from '../serialization';

export class Hash<T> extends RedisStructure<T> {
  /**
   * Write a field unconditionally
   *
   * @returns true if the field is new, false if an existing value was replaced
   */
  async set(field: string, value: T): Promise<boolean> {
    const added = await this.command('HSET', conn =>
      conn.hset(this.key, field, this.serializer.encode(value))
    );
    return added === 1;
  }

  /**
   * Write a field only if it does not exist yet
   *
   * @returns true if the value was written
   */
  async add(field: string, value: T): Promise<boolean> {
    const written = await this.command('HSETNX', conn =>
      conn.hsetnx(this.key, field, this.serializer.encode(value))
    );
    return written === 1;
  }

  /**
   * Read one field, `undefined` if it is missing
   */
  async get(field: string): Promise<T | undefined> {
    const raw = await this.command('HGET', conn => conn.hget(this.key, field));
    return decodeOptional(this.serializer, raw);
  }

  /**
   * Read several fields at once. Every requested field appears in the
   * result; missing ones map to `undefined`.
   */
  async multiGet(fields: Iterable<string>): Promise<Record<string, T | undefined>> {
    const names = [...fields];
    if (names.length === 0) {
      return {};
    }

    const values = await this.command('HMGET', conn =>
      conn.hmget(this.key, names)
    );
    const result: Record<string, T | undefined> = {};
    names.forEach((name, index) => {
      result[name] = decodeOptional(this.serializer, values[index]);
    });
    return result;
  }

  /**
   * Load the entire hash. Fields holding an empty value are left out, as
   * `get()` reads them as absent.
   */
  async getAll(): Promise<Record<string, T>> {
    const entries = await this.command('HGETALL', conn =>
      conn.hgetall(this.key)
    );
    const result: Record<string, T> = {};
    for (const [field, raw] of Object.entries(entries)) {
      const value = decodeOptional(this.serializer, raw);
      if (value !== undefined) {
        result[field] = value;
      }
    }
    return result;
  }

  async keys(): Promise<Set<string>> {
    const fields = await this.command('HKEYS', conn => conn.hkeys(this.key));
    return new Set(fields);
  }

  /**
   * Number of fields in the hash
   */
  size(): Promise<number> {
    return this.command('HLEN', conn => conn.hlen(this.key));
  }

  /**
   * Remove one field
   *
   * @returns true if the field existed
   */
  async delete(field: string): Promise<boolean> {
    const removed = await this.command('HDEL', conn =>
      conn.hdel(this.key, field)
    );
    return removed === 1;
  }
}
