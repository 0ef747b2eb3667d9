/**
 * Value serialization shared by every structure
 *
 * Values are stored as UTF-8 JSON text. Field names and structure names are
 * plain strings and never pass through here.
 */

import {DeserializationError} from './errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | {[key: string]: JsonValue};

/**
 * Converts application values to and from their stored text form
 */
export interface Serializer<T> {
  encode(value: T): string;
  /**
   * @throws DeserializationError if `raw` is not a valid encoding
   */
  decode(raw: string): T;
}

/**
 * Parse stored JSON text, raising DeserializationError on malformed input
 */
export function decodeJson<T = JsonValue>(raw: string): T {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new DeserializationError(raw, error);
  }
}

export function encodeJson<T = JsonValue>(value: T): string {
  return JSON.stringify(value);
}

/**
 * Default JSON serializer. `T` is trusted, not checked: pass a custom
 * serializer to validate the decoded shape.
 */
export function jsonSerializer<T = JsonValue>(): Serializer<T> {
  return {
    encode: value => encodeJson(value),
    decode: raw => decodeJson<T>(raw),
  };
}

/**
 * Decode a raw reply, mapping a missing or empty reply to `undefined`
 */
export function decodeOptional<T>(
  serializer: Serializer<T>,
  raw: string | null | undefined
): T | undefined {
  if (raw === null || raw === undefined || raw === '') {
    return undefined;
  }
  return serializer.decode(raw);
}
