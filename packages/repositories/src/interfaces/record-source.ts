import type { DecodeError, RawRecord } from '@flatlog/protocol';

/**
 * One item from a record source: a decoded record, or the error for a record
 * that could not be decoded. Decode failures do not end the sequence.
 */
export type RecordResult =
  | { ok: true; record: RawRecord }
  | { ok: false; error: DecodeError };

/**
 * Options for reading records
 */
export type ReadRecordsOptions = {
  /**
   * Only yield records on these channels (all channels when omitted)
   */
  channels?: readonly string[];
};

/**
 * A recorded event log, readable as a lazy sequence of records.
 *
 * Each call to records() starts again from the first record, so a source can
 * be read more than once (e.g. once for a summary, once for conversion).
 */
export interface RecordSource {
  /**
   * Location the source reads from
   */
  readonly path: string;

  /**
   * Iterate the records, optionally restricted to some channels
   */
  records(options?: ReadRecordsOptions): AsyncIterable<RecordResult>;
}

/**
 * Opens a record source for a file path
 */
export type RecordSourceFactory = (path: string) => RecordSource | Promise<RecordSource>;
