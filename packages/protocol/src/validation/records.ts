// Record log line validation
//
// Shape of one line of an NDJSON record log and the decoding of its tagged values:
//   {"channel": "/imu/data", "typeId": "sensor_msgs/msg/Imu", "receivedTime": "1700000000000000000", "value": {...}}
// Inside "value", {"$bytes": "<base64>"} decodes to bytes and {"$int": "<decimal>"} to a bigint.

import { z } from 'zod';
import type { NestedValue, RawRecord } from '../types/records.js';
import { isNumericArray } from '../types/records.js';
import { base64ToBytes, bytesToBase64 } from '../encoding/json-text.js';

const receivedTimeSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, 'receivedTime must be a non-negative integer string'),
]);

/**
 * zod schema for one record log line (value left undecoded)
 */
export const recordLineSchema = z.object({
  channel: z.string().min(1, 'channel cannot be empty'),
  typeId: z.string().min(1, 'typeId cannot be empty'),
  receivedTime: receivedTimeSchema,
  value: z.unknown(),
});

export type RecordLine = z.infer<typeof recordLineSchema>;

const bytesTagSchema = z.object({ $bytes: z.string() }).strict();
const intTagSchema = z.object({ $int: z.string().regex(/^-?\d+$/) }).strict();

/**
 * Decode a JSON value from a record log into a NestedValue,
 * resolving $bytes and $int tags.
 *
 * @throws Error if the value contains something JSON.parse cannot produce
 */
export function decodeTaggedValue(value: unknown): NestedValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    case 'object':
      break;
    default:
      throw new Error(`unsupported value of type ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => decodeTaggedValue(item));
  }

  const bytesTag = bytesTagSchema.safeParse(value);
  if (bytesTag.success) return base64ToBytes(bytesTag.data.$bytes);

  const intTag = intTagSchema.safeParse(value);
  if (intTag.success) return BigInt(intTag.data.$int);

  return Object.fromEntries(
    Object.entries(value).map(([key, item]): [string, NestedValue] => [key, decodeTaggedValue(item)])
  );
}

/**
 * Validate and decode one parsed record log line.
 *
 * @throws z.ZodError if the line does not have the record shape
 */
export function decodeRecordLine(data: unknown): RawRecord {
  const line = recordLineSchema.parse(data);
  return {
    channel: line.channel,
    typeId: line.typeId,
    receivedTime: BigInt(line.receivedTime),
    value: decodeTaggedValue(line.value),
  };
}

/**
 * Encode a NestedValue back into record log JSON (inverse of decodeTaggedValue).
 */
export function encodeTaggedValue(value: NestedValue): unknown {
  if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'bigint') return { $int: value.toString() };
  if (value instanceof Uint8Array) {
    return { $bytes: bytesToBase64(value) };
  }
  if (Array.isArray(value)) return value.map((item) => encodeTaggedValue(item));
  if (isNumericArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      items.push(typeof item === 'bigint' ? { $int: item.toString() } : item);
    }
    return items;
  }
  return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, encodeTaggedValue(item)]));
}

/**
 * Encode a RawRecord as one record log line (without the trailing newline).
 */
export function encodeRecordLine(record: RawRecord): string {
  return JSON.stringify({
    channel: record.channel,
    typeId: record.typeId,
    receivedTime: record.receivedTime.toString(),
    value: encodeTaggedValue(record.value),
  });
}
