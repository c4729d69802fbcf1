// In-memory record source for tests and programmatic callers

import { DecodeError, type RawRecord } from '@flatlog/protocol';
import type { ReadRecordsOptions, RecordResult, RecordSource } from '../interfaces/index.js';

/**
 * A record source over records (and optional decode failures) held in memory.
 *
 * @example
 * ```typescript
 * const source = new InMemoryRecordSource('run.ndjson', [
 *   { channel: '/imu/data', typeId: 'sensor_msgs/msg/Imu', receivedTime: 1n, value: {} },
 * ]);
 * ```
 */
export class InMemoryRecordSource implements RecordSource {
  private readonly items: RecordResult[];

  constructor(
    readonly path: string,
    items: ReadonlyArray<RawRecord | DecodeError>
  ) {
    this.items = items.map(
      (item): RecordResult =>
        item instanceof DecodeError ? { ok: false, error: item } : { ok: true, record: item }
    );
  }

  async *records(options: ReadRecordsOptions = {}): AsyncGenerator<RecordResult> {
    const channels = options.channels ? new Set(options.channels) : null;
    for (const item of this.items) {
      const channel = item.ok ? item.record.channel : item.error.channel;
      if (channels && channel !== undefined && !channels.has(channel)) {
        continue;
      }
      yield item;
    }
  }
}
