// Record types - the raw input of a conversion

import type { EpochNanos } from './common.js';

/**
 * A scalar leaf of a decoded record body.
 * Uint8Array carries raw byte fields (image buffers, point clouds, blobs).
 */
export type ScalarValue = boolean | number | bigint | string | Uint8Array | null;

/**
 * Typed numeric arrays that decoders produce for fixed-width array fields.
 * Uint8Array is absent: it is a byte scalar, not a sequence.
 */
export type NumericArray =
  | Int8Array
  | Uint8ClampedArray
  | Int16Array
  | Int32Array
  | Uint16Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/**
 * A mapping node of a decoded record body.
 */
export type NestedMapping = { [key: string]: NestedValue };

/**
 * The deserialized body of a record before flattening.
 * A recursive union over scalars, sequences and string-keyed mappings.
 */
export type NestedValue = ScalarValue | NestedValue[] | NumericArray | NestedMapping;

/**
 * One decoded event on a channel.
 */
export type RawRecord = {
  /**
   * Channel (topic) name, e.g. "/imu/data"
   */
  readonly channel: string;

  /**
   * Message type identifier, e.g. "sensor_msgs/msg/Imu"
   */
  readonly typeId: string;

  /**
   * Time the recorder received the message
   */
  readonly receivedTime: EpochNanos;

  /**
   * The decoded record body
   */
  readonly value: NestedValue;
};

/**
 * Check whether a value is one of the typed numeric arrays.
 */
export function isNumericArray(value: unknown): value is NumericArray {
  return ArrayBuffer.isView(value) && !(value instanceof Uint8Array) && !(value instanceof DataView);
}

/**
 * Check whether a value is a mapping node.
 */
export function isNestedMapping(value: NestedValue): value is NestedMapping {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !ArrayBuffer.isView(value)
  );
}
