// Tests for table materialization

import { describe, it, expect } from 'vitest';
import type { RawRecord } from '@flatlog/protocol';
import { flattenRecord } from '../flatten/flattener.js';
import { createCapturingLogger } from '../logging.js';
import { materializeTable } from './materializer.js';

function imuRecord(seconds: bigint, value: RawRecord['value'], typeId = 'test/msg/ImuSample'): RawRecord {
  return { channel: '/imu/data', typeId, receivedTime: seconds * 1_000_000_000n, value };
}

describe('materializeTable', () => {
  it('should produce one rectangular table per channel', () => {
    const rows = [
      imuRecord(1n, { accel_x: 1.0 }),
      imuRecord(2n, { accel_x: -0.5 }),
      imuRecord(3n, {}),
    ].map((record) => flattenRecord(record));

    const table = materializeTable('/imu/data', rows);

    expect(table.channel).toBe('/imu/data');
    expect(table.schema).toEqual([
      { name: 'topic', type: 'string', nullable: false },
      { name: 'timestamp', type: 'float64', nullable: false },
      { name: 'msgtype', type: 'string', nullable: false },
      { name: 'header_timestamp', type: 'float64', nullable: true },
      { name: 'accel_x', type: 'float64', nullable: true },
    ]);
    expect(table.rows).toEqual([
      ['/imu/data', 1, 'test/msg/ImuSample', null, 1],
      ['/imu/data', 2, 'test/msg/ImuSample', null, -0.5],
      ['/imu/data', 3, 'test/msg/ImuSample', null, null],
    ]);
  });

  it('should build the same table through the Imu extractor', () => {
    const rows = [
      imuRecord(1n, { linear_acceleration: { x: 1.0 } }, 'sensor_msgs/msg/Imu'),
      imuRecord(2n, { linear_acceleration: { x: -0.5 } }, 'sensor_msgs/msg/Imu'),
      imuRecord(3n, {}, 'sensor_msgs/msg/Imu'),
    ].map((record) => flattenRecord(record));

    const table = materializeTable('/imu/data', rows);

    expect(table.schema.map((column) => column.name)).toEqual([
      'topic',
      'timestamp',
      'msgtype',
      'header_timestamp',
      'accel_x',
    ]);
    expect(table.rows.map((cells) => cells[4])).toEqual([1, -0.5, null]);
  });

  it('should log each widened column at debug', () => {
    const logger = createCapturingLogger();
    const rows = [imuRecord(1n, { v: 1 }), imuRecord(2n, { v: 'high' })].map((record) => flattenRecord(record));

    const table = materializeTable('/imu/data', rows, { logger });

    expect(table.conflicts).toEqual([{ column: 'v', observed: ['int', 'string'], resolved: 'string' }]);
    expect(logger.entries.map(({ level, message, data }) => ({ level, message, data }))).toEqual([
      {
        level: 'debug',
        message: 'Widened column',
        data: { channel: '/imu/data', column: 'v', observed: ['int', 'string'], resolved: 'string' },
      },
    ]);
  });
});
