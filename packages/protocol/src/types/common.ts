// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Nanoseconds since the Unix epoch.
 * Recording formats carry receive times at nanosecond resolution, which does
 * not fit in a double, so they travel as bigint until a table column needs them.
 */
export type EpochNanos = bigint;

const NANOS_PER_SECOND = 1_000_000_000n;

/**
 * Convert epoch nanoseconds to fractional seconds.
 * Whole seconds and the sub-second part are converted separately to keep
 * nanosecond digits that a single Number() conversion would round away.
 */
export function nanosToSeconds(nanos: EpochNanos): number {
  const seconds = nanos / NANOS_PER_SECOND;
  const remainder = nanos % NANOS_PER_SECOND;
  return Number(seconds) + Number(remainder) / 1e9;
}

/**
 * Convert epoch nanoseconds to an ISO 8601 timestamp (millisecond precision).
 */
export function nanosToIso(nanos: EpochNanos): Timestamp {
  return new Date(Number(nanos / 1_000_000n)).toISOString();
}
