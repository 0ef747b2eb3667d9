/**
 * Structures module - Typed accessors over Redis data structures
 *
 * This module provides:
 * - Hash: field-level access to a Redis hash
 * - Queue: FIFO queue over a Redis list
 * - PriorityQueue: pop-max queue over a Redis sorted set
 * - ObjectClient: factory binding a connection to named structures
 */

export * from './base';
export * from './hash';
export * from './queue';
export * from './priority-queue';
export * from './object-client';
