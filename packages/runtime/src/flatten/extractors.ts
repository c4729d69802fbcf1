// Known type extractors - map a type id to a fixed set of derived columns
//
// An extractor replaces the generic walk for its type: the record gets exactly
// the columns the extractor returns (plus the baseline columns).

import type { FlatCell, NestedValue } from '@flatlog/protocol';
import { isNestedMapping, isNumericArray } from '@flatlog/protocol';

/**
 * Derive columns from a record body.
 * Fields the body lacks are simply left out.
 */
export type Extractor = (value: NestedValue) => Record<string, FlatCell>;

/**
 * Registry for known type extractors.
 * Maps type ids to extractor functions.
 */
export class ExtractorRegistry {
  private extractors = new Map<string, Extractor>();

  /**
   * Register an extractor for a type id.
   *
   * @throws Error if an extractor is already registered
   */
  register(typeId: string, extractor: Extractor): void {
    if (this.extractors.has(typeId)) {
      throw new Error(`Extractor already registered for type: ${typeId}`);
    }
    this.extractors.set(typeId, extractor);
  }

  get(typeId: string): Extractor | undefined {
    return this.extractors.get(typeId);
  }
}

/**
 * Follow a dotted path through nested mappings.
 * @returns The value at the path, or undefined if any step is missing
 */
export function getPath(value: NestedValue, path: string): NestedValue | undefined {
  let current: NestedValue | undefined = value;
  for (const key of path.split('.')) {
    if (current === undefined || !isNestedMapping(current) || !Object.hasOwn(current, key)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function scalarCell(value: NestedValue | undefined): FlatCell | undefined {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string'
  ) {
    return value;
  }
  return undefined;
}

function lengthOf(value: NestedValue | undefined): number {
  if (value instanceof Uint8Array || Array.isArray(value) || isNumericArray(value)) {
    return value.length;
  }
  return 0;
}

/**
 * Copy scalar fields into columns, skipping any the body lacks.
 * @param fields - column name to dotted source path
 */
function pick(value: NestedValue, fields: Record<string, string>): Record<string, FlatCell> {
  const result: Record<string, FlatCell> = {};
  for (const [column, path] of Object.entries(fields)) {
    const cell = scalarCell(getPath(value, path));
    if (cell !== undefined) {
      result[column] = cell;
    }
  }
  return result;
}

const pointStamped: Extractor = (value) =>
  getPath(value, 'point') === undefined ? {} : pick(value, { x: 'point.x', y: 'point.y', z: 'point.z' });

const image: Extractor = (value) => {
  if (getPath(value, 'width') === undefined || getPath(value, 'height') === undefined) {
    return {};
  }
  return {
    ...pick(value, { width: 'width', height: 'height', encoding: 'encoding' }),
    data_size: lengthOf(getPath(value, 'data')),
  };
};

const imu: Extractor = (value) => ({
  ...(getPath(value, 'linear_acceleration') === undefined
    ? {}
    : pick(value, {
        accel_x: 'linear_acceleration.x',
        accel_y: 'linear_acceleration.y',
        accel_z: 'linear_acceleration.z',
      })),
  ...(getPath(value, 'angular_velocity') === undefined
    ? {}
    : pick(value, {
        gyro_x: 'angular_velocity.x',
        gyro_y: 'angular_velocity.y',
        gyro_z: 'angular_velocity.z',
      })),
});

const compressedImage: Extractor = (value) => ({
  ...pick(value, { format: 'format' }),
  data_size: lengthOf(getPath(value, 'data')),
});

const pointCloud2: Extractor = (value) => ({
  ...pick(value, {
    width: 'width',
    height: 'height',
    point_step: 'point_step',
    row_step: 'row_step',
    is_dense: 'is_dense',
  }),
  data_size: lengthOf(getPath(value, 'data')),
});

/**
 * Extractors for common robot message types
 */
export const BUILTIN_EXTRACTORS: Readonly<Record<string, Extractor>> = {
  'geometry_msgs/msg/PointStamped': pointStamped,
  'sensor_msgs/msg/Image': image,
  'sensor_msgs/msg/Imu': imu,
  'sensor_msgs/msg/CompressedImage': compressedImage,
  'sensor_msgs/msg/PointCloud2': pointCloud2,
};

/**
 * Create a registry holding the built-in extractors
 */
export function createDefaultExtractorRegistry(): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  for (const [typeId, extractor] of Object.entries(BUILTIN_EXTRACTORS)) {
    registry.register(typeId, extractor);
  }
  return registry;
}

/**
 * Global extractor registry used when no registry is passed to the flattener.
 */
export const extractorRegistry = createDefaultExtractorRegistry();
