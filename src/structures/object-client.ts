/**
 * Factory for structure accessors bound to one connection
 */

import {Redis} from 'ioredis';
import {IORedisConnection, StructureConnection} from '../redis/connection';
import {JsonValue, Serializer, jsonSerializer} from '../serialization';
import {Hash} from './hash';
import {Queue} from './queue';
import {PriorityQueue} from './priority-queue';

/**
 * Hands out accessors for named structures. No I/O happens until an
 * accessor method is called.
 */
export class ObjectClient {
  constructor(private readonly connection: StructureConnection) {}

  /**
   * Build a client over an existing ioredis connection
   */
  static fromRedis(redis: Redis): ObjectClient {
    return new ObjectClient(new IORedisConnection(redis));
  }

  /**
   * Load a list to be used as a FIFO queue
   */
  queue<T = JsonValue>(
    name: string,
    serializer: Serializer<T> = jsonSerializer<T>()
  ): Queue<T> {
    return new Queue(name, this.connection, serializer);
  }

  /**
   * Load a sorted set to be used as a priority queue
   */
  priorityQueue<T = JsonValue>(
    name: string,
    serializer: Serializer<T> = jsonSerializer<T>()
  ): PriorityQueue<T> {
    return new PriorityQueue(name, this.connection, serializer);
  }

  /**
   * Load a hash table
   */
  hash<T = JsonValue>(
    name: string,
    serializer: Serializer<T> = jsonSerializer<T>()
  ): Hash<T> {
    return new Hash(name, this.connection, serializer);
  }
}
