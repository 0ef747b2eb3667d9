/**
 * Tests for the priority queue accessor
 */

import {FakeConnection} from '../../__tests__/helpers/fake-connection';
import {ObjectClient} from '../object-client';
import {PriorityQueue} from '../priority-queue';
import {JsonValue} from '../../serialization';
import {ConnectionFailureError, OperationAbortedError} from '../../errors';

jest.mock('@actions/core');

describe('PriorityQueue', () => {
  let connection: FakeConnection;
  let queue: PriorityQueue<JsonValue>;

  beforeEach(() => {
    connection = new FakeConnection();
    queue = new ObjectClient(connection).priorityQueue('test:pqueue');
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('should pop in descending priority order', async () => {
    await queue.push('a', 1);
    await queue.push('b', 5);
    await queue.push('c', 3);

    expect(await queue.pop(1)).toBe('b');
    expect(await queue.pop(1)).toBe('c');
    expect(await queue.pop(1)).toBe('a');
    expect(await queue.popReady()).toBeUndefined();
  });

  test('should default the priority to 0', async () => {
    await queue.push({job: 7});
    expect(await queue.score({job: 7})).toBe(0);
  });

  describe('push()', () => {
    test('should update the priority of an existing value instead of duplicating it', async () => {
      await queue.push('a', 1);
      await queue.push('b', 2);
      expect(await queue.length()).toBe(2);
      expect(await queue.rank('a')).toBe(1);

      await queue.push('a', 10);

      expect(await queue.length()).toBe(2);
      expect(await queue.score('a')).toBe(10);
      expect(await queue.rank('a')).toBe(0);
      expect(await queue.rank('b')).toBe(1);
    });

    test('should treat values as equal by their serialized form', async () => {
      await queue.push({id: 1}, 1);
      await queue.push({id: 1}, 4);
      expect(await queue.length()).toBe(1);
      expect(connection.commands[1]).toEqual({
        command: 'ZADD',
        args: ['test:pqueue', 4, '{"id":1}'],
      });
    });
  });

  describe('popReady()', () => {
    test('should break ties by serialized value, highest first', async () => {
      await queue.push('a', 1);
      await queue.push('b', 1);
      expect(await queue.popReady()).toBe('b');
      expect(await queue.popReady()).toBe('a');
    });
  });

  describe('pop()', () => {
    test('should time out with undefined after the timeout, not before', async () => {
      jest.useFakeTimers();
      let settled = false;
      const pending = queue.pop(2).then(value => {
        settled = true;
        return value;
      });

      await jest.advanceTimersByTimeAsync(1999);
      expect(settled).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBeUndefined();
    });

    test('should wake up when another task pushes', async () => {
      const pending = queue.pop(0);
      await queue.push('urgent', 100);
      await expect(pending).resolves.toBe('urgent');
    });

    test('should reject with OperationAbortedError when aborted', async () => {
      const controller = new AbortController();
      const pending = queue.pop(0, {signal: controller.signal});
      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(OperationAbortedError);
    });
  });

  describe('score() / rank()', () => {
    test('should return undefined for values not in the queue', async () => {
      await queue.push('present', 3);
      expect(await queue.score('missing')).toBeUndefined();
      expect(await queue.rank('missing')).toBeUndefined();
    });

    test('should report infinite priorities', async () => {
      await queue.push('first', Infinity);
      await queue.push('last', -Infinity);
      expect(await queue.score('first')).toBe(Infinity);
      expect(await queue.score('last')).toBe(-Infinity);
      expect(await queue.rank('last')).toBe(1);
    });
  });

  describe('length()', () => {
    test('should count entries at every priority', async () => {
      await queue.push('low', -50);
      await queue.push('zero', 0);
      await queue.push('high', 1e9);
      expect(await queue.length()).toBe(3);
    });
  });

  describe('clear()', () => {
    test('should empty the queue', async () => {
      await queue.push('a', 1);
      await queue.push('b', 2);
      await queue.clear();

      expect(await queue.length()).toBe(0);
      expect(await queue.popReady()).toBeUndefined();
      expect(await queue.score('a')).toBeUndefined();
    });
  });

  test('should wrap command failures in ConnectionFailureError', async () => {
    connection.failOn('ZCARD', new Error('READONLY'));
    await expect(queue.length()).rejects.toBeInstanceOf(ConnectionFailureError);
  });
});
