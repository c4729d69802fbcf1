// Cell conversions between projected values and the text encodings (JSON, CSV)

import {
  ValidationError,
  base64ToBytes,
  bigintToJson,
  bytesToBase64,
  type ColumnSchema,
  type JsonValue,
  type ProjectedCell,
} from '@flatlog/protocol';

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Represent an integer as a number when it is safe, otherwise as a bigint.
 */
export function normalizeInt(value: bigint): number | bigint {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value;
}

/**
 * Convert a projected cell to JSON data.
 * Unsafe integers become decimal strings; bytes become base64.
 */
export function cellToJson(cell: ProjectedCell): JsonValue {
  if (cell === null) return null;
  if (typeof cell === 'bigint') return bigintToJson(cell);
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  if (cell instanceof Uint8Array) return bytesToBase64(cell);
  return cell;
}

/**
 * Convert a JSON value read back from an artifact to its column's type.
 * @throws ValidationError if the value does not fit the column
 */
export function cellFromJson(value: unknown, column: ColumnSchema): ProjectedCell {
  if (value === null || value === undefined) return null;

  switch (column.type) {
    case 'bool':
      if (typeof value === 'boolean') return value;
      break;
    case 'int64':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      if (typeof value === 'string' && INTEGER_TEXT.test(value)) return normalizeInt(BigInt(value));
      break;
    case 'float64':
      if (typeof value === 'number') return value;
      break;
    case 'string':
    case 'json_text':
      if (typeof value === 'string') return value;
      break;
    case 'bytes':
      if (typeof value === 'string') return base64ToBytes(value);
      break;
  }

  throw mismatch(column, JSON.stringify(value));
}

/**
 * Render a non-null projected cell as CSV field text.
 */
export function cellToText(cell: Exclude<ProjectedCell, null>): string {
  if (cell instanceof Uint8Array) return bytesToBase64(cell);
  return String(cell);
}

/**
 * Convert CSV field text to its column's type.
 * @throws ValidationError if the text does not fit the column
 */
export function cellFromText(text: string, column: ColumnSchema): ProjectedCell {
  switch (column.type) {
    case 'bool':
      if (text === 'true') return true;
      if (text === 'false') return false;
      break;
    case 'int64':
      if (INTEGER_TEXT.test(text)) return normalizeInt(BigInt(text));
      break;
    case 'float64': {
      const value = Number(text);
      if (text.trim() !== '' && (!Number.isNaN(value) || text === 'NaN')) return value;
      break;
    }
    case 'string':
    case 'json_text':
      return text;
    case 'bytes':
      return base64ToBytes(text);
  }

  throw mismatch(column, JSON.stringify(text));
}

function mismatch(column: ColumnSchema, shown: string): ValidationError {
  return new ValidationError(`Value ${shown} does not fit column "${column.name}" of type ${column.type}`, {
    field: column.name,
  });
}
