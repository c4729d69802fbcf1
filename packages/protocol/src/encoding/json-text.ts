// JSON text encoding for nested values
// Used when a sequence is too long to spread into numbered columns

import type { NestedValue } from '../types/records.js';
import { isNestedMapping, isNumericArray } from '../types/records.js';

/**
 * JSON-compatible value produced from a NestedValue
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Encode bytes as base64 text
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode base64 text into bytes
 */
export function base64ToBytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * Convert a bigint to a JSON number when it is exactly representable,
 * otherwise to its decimal string.
 */
export function bigintToJson(value: bigint): number | string {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value.toString();
}

/**
 * Convert a nested value to plain JSON data.
 * Mapping keys are sorted so equal values always encode to equal text.
 */
export function toJsonValue(value: NestedValue): JsonValue {
  if (value === null) return null;
  if (typeof value === 'bigint') return bigintToJson(value);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (value instanceof Uint8Array) return bytesToBase64(value);
  if (isNumericArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      items.push(typeof item === 'bigint' ? bigintToJson(item) : Number.isFinite(item) ? item : null);
    }
    return items;
  }
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (isNestedMapping(value)) {
    const result: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      result[key] = toJsonValue(value[key]);
    }
    return result;
  }
  return null;
}

/**
 * Encode a nested value as canonical JSON text
 */
export function encodeJsonText(value: NestedValue): string {
  return JSON.stringify(toJsonValue(value));
}
