/**
 * Redis module - Connection handling
 *
 * This module provides:
 * - Redis client creation with retry logic
 * - The StructureConnection interface the accessors depend on
 * - An ioredis-backed implementation of that interface
 */

export * from './types';
export * from './client';
export * from './connection';
