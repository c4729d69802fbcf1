// Catalog path constants
// Defines the folder/file structure under a catalog root

import type { TableFormat } from '../types/catalog.js';
import { TABLE_FORMAT_EXTENSIONS } from '../types/catalog.js';

/**
 * Directories under a catalog root
 */
export const CATALOG_DIRS = {
  TABLES: 'tables',
} as const;

/**
 * Fixed file names under a catalog root
 */
export const CATALOG_FILES = {
  METADATA_DB: 'catalog.db',
} as const;

/**
 * Build the path to a catalog's metadata store
 */
export function metadataStorePath(catalogRoot: string): string {
  return joinPath(catalogRoot, CATALOG_FILES.METADATA_DB);
}

/**
 * Build the path to a catalog's tables directory
 */
export function tablesDirPath(catalogRoot: string): string {
  return joinPath(catalogRoot, CATALOG_DIRS.TABLES);
}

/**
 * Build the path to a table artifact stored inside a catalog
 */
export function catalogTablePath(
  catalogRoot: string,
  tableName: string,
  format: TableFormat
): string {
  return joinPath(tablesDirPath(catalogRoot), `${tableName}${TABLE_FORMAT_EXTENSIONS[format]}`);
}

function joinPath(base: string, name: string): string {
  return base.endsWith('/') ? `${base}${name}` : `${base}/${name}`;
}
