// Flattener - nested record bodies to flat column maps
//
// Paths join mapping keys and sequence indexes with dots: {a: {b: [7]}} -> "a.b.0".
// Sequences longer than the slot limit become a single json_text cell.
// Byte fields are reduced to a "<path>_size" column unless small enough to keep inline.

import {
  BASELINE_COLUMNS,
  JsonText,
  encodeJsonText,
  isBaselineColumn,
  isNestedMapping,
  isNumericArray,
  nanosToSeconds,
  type FlatCell,
  type FlatRow,
  type NestedValue,
  type RawRecord,
} from '@flatlog/protocol';
import { DEFAULT_ARRAY_SLOT_LIMIT, DEFAULT_INLINE_BYTES_LIMIT } from '../config.js';
import { extractorRegistry, getPath, type ExtractorRegistry } from './extractors.js';

/**
 * Prefix for the body of a record whose value is not a mapping
 */
export const ROOT_VALUE_PREFIX = 'value';

export type FlattenOptions = {
  /** Longest sequence spread into numbered columns (default 5) */
  arraySlotLimit?: number;
  /** Longest byte field kept inline as a bytes cell (default 0: none) */
  inlineBytesLimit?: number;
  /**
   * Known type extractors (default: the global registry).
   * null disables extractors so every record takes the generic walk.
   */
  extractors?: ExtractorRegistry | null;
};

type WalkLimits = {
  arraySlotLimit: number;
  inlineBytesLimit: number;
};

function limitsOf(options: FlattenOptions): WalkLimits {
  return {
    arraySlotLimit: options.arraySlotLimit ?? DEFAULT_ARRAY_SLOT_LIMIT,
    inlineBytesLimit: options.inlineBytesLimit ?? DEFAULT_INLINE_BYTES_LIMIT,
  };
}

function joinPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}.${key}`;
}

function walk(value: NestedValue, path: string, limits: WalkLimits, row: FlatRow): void {
  if (value instanceof Uint8Array) {
    if (value.length > 0 && value.length <= limits.inlineBytesLimit) {
      row.set(path, value);
    } else {
      row.set(`${path}_size`, value.length);
    }
    return;
  }

  if (Array.isArray(value) || isNumericArray(value)) {
    if (value.length > limits.arraySlotLimit) {
      row.set(path, new JsonText(encodeJsonText(value)));
      return;
    }
    let index = 0;
    for (const item of value) {
      walk(item, joinPath(path, String(index)), limits, row);
      index++;
    }
    return;
  }

  if (isNestedMapping(value)) {
    for (const key of Object.keys(value).sort()) {
      walk(value[key], joinPath(path, key), limits, row);
    }
    return;
  }

  row.set(path, value);
}

/**
 * Flatten a value into dotted-path cells (generic walk only).
 *
 * @example
 * ```typescript
 * flattenValue({ pose: { x: 1, y: 2 } }, '');
 * // Map { 'pose.x' => 1, 'pose.y' => 2 }
 * ```
 */
export function flattenValue(value: NestedValue, prefix: string, options: FlattenOptions = {}): FlatRow {
  const row: FlatRow = new Map();
  walk(value, prefix, limitsOf(options), row);
  return row;
}

function toSeconds(value: NestedValue | undefined): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  return undefined;
}

/**
 * Read a conventional header stamp: sec/nanosec (ROS 2) or secs/nsecs (ROS 1).
 * @returns Seconds since the epoch, or null when the body has no usable stamp
 */
export function headerTimestamp(value: NestedValue): number | null {
  const stamp = getPath(value, 'header.stamp');
  if (stamp === undefined) return null;

  const pairs: [string, string][] = [
    ['sec', 'nanosec'],
    ['secs', 'nsecs'],
  ];
  for (const [secKey, nanoKey] of pairs) {
    const sec = toSeconds(getPath(stamp, secKey));
    const nanos = toSeconds(getPath(stamp, nanoKey));
    if (sec !== undefined && nanos !== undefined) {
      return sec + nanos / 1e9;
    }
  }
  return null;
}

/**
 * Flatten one record: baseline columns first, then the body's columns.
 * A registered extractor for the record's type replaces the generic walk.
 * Body columns named like a baseline column are dropped.
 */
export function flattenRecord(record: RawRecord, options: FlattenOptions = {}): FlatRow {
  const row: FlatRow = new Map<string, FlatCell>([
    [BASELINE_COLUMNS.TOPIC, record.channel],
    [BASELINE_COLUMNS.TIMESTAMP, nanosToSeconds(record.receivedTime)],
    [BASELINE_COLUMNS.MSGTYPE, record.typeId],
    [BASELINE_COLUMNS.HEADER_TIMESTAMP, headerTimestamp(record.value)],
  ]);

  const registry = options.extractors === undefined ? extractorRegistry : options.extractors;
  const extractor = registry?.get(record.typeId);

  const fields: Iterable<[string, FlatCell]> = extractor
    ? Object.entries(extractor(record.value))
    : flattenValue(
        record.value,
        isNestedMapping(record.value) ? '' : ROOT_VALUE_PREFIX,
        options
      );

  for (const [name, cell] of fields) {
    if (!isBaselineColumn(name)) {
      row.set(name, cell);
    }
  }
  return row;
}
