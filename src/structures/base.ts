import * as core from '@actions/core';
import {StructureConnection} from '../redis/connection';
import {Serializer} from '../serialization';
import {ConnectionFailureError, StructureError} from '../errors';

/**
 * Shared plumbing for accessors bound to one Redis key
 */
export abstract class RedisStructure<T> {
  constructor(
    readonly key: string,
    protected readonly connection: StructureConnection,
    protected readonly serializer: Serializer<T>
  ) {}

  /**
   * Delete the whole structure, removing its top-level key
   */
  async clear(): Promise<void> {
    await this.command('DEL', conn => conn.del(this.key));
  }

  /**
   * Send one command for this key. Failures that are not already
   * StructureErrors surface as ConnectionFailureError.
   */
  protected async command<R>(
    name: string,
    run: (connection: StructureConnection) => Promise<R>
  ): Promise<R> {
    core.debug(`${name} ${this.key}`);
    try {
      return await run(this.connection);
    } catch (error) {
      if (error instanceof StructureError) {
        throw error;
      }
      const failure = new ConnectionFailureError(name, this.key, error);
      core.error(failure.message);
      throw failure;
    }
  }
}
