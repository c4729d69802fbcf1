// Table schema validation
//
// Checks the invariants a TableSchema must hold before it is written or registered:
// unique column names and known column types.

import type { TableSchema } from '../types/tables.js';
import { COLUMN_TYPES } from '../types/tables.js';

/**
 * Result of validating a table schema
 */
export type SchemaValidationResult = {
  valid: boolean;
  errors: SchemaValidationError[];
};

/**
 * A validation error with the column it concerns
 */
export type SchemaValidationError = {
  path: string;
  message: string;
  code: SchemaValidationErrorCode;
};

/**
 * Validation error codes
 */
export type SchemaValidationErrorCode = 'EMPTY_NAME' | 'DUPLICATE_COLUMN' | 'INVALID_TYPE';

/**
 * Validate a table schema.
 */
export function validateTableSchema(schema: TableSchema): SchemaValidationResult {
  const errors: SchemaValidationError[] = [];
  const seen = new Set<string>();

  schema.forEach((column, index) => {
    const path = `columns[${index}]`;

    if (!column.name) {
      errors.push({ path, message: 'column name cannot be empty', code: 'EMPTY_NAME' });
    } else if (seen.has(column.name)) {
      errors.push({
        path,
        message: `duplicate column name "${column.name}"`,
        code: 'DUPLICATE_COLUMN',
      });
    }
    seen.add(column.name);

    if (!COLUMN_TYPES.includes(column.type)) {
      errors.push({
        path: `${path}.type`,
        message: `unknown column type "${String(column.type)}"`,
        code: 'INVALID_TYPE',
      });
    }
  });

  return { valid: errors.length === 0, errors };
}
