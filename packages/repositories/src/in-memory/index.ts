// In-memory catalog repository for development and testing
//
// Same contract as the SQLite repository, minus durability:
// entries live in a Map and are gone when the process exits.

import type { CatalogEntry } from '@flatlog/protocol';
import type { CatalogRepository } from '../interfaces/index.js';

/**
 * In-memory catalog with access to its entries for inspection.
 */
export interface InMemoryCatalogRepository extends CatalogRepository {
  /** Direct access to the stored entries (for debugging/testing) */
  _data: Map<string, CatalogEntry>;
  /** Clear all entries */
  clear(): void;
}

/**
 * Create an in-memory catalog repository.
 *
 * @example
 * ```typescript
 * const catalog = createInMemoryCatalogRepository();
 * await catalog.register({ tableName: 'run_imu', ... });
 * console.log(catalog._data.size);
 * ```
 */
export function createInMemoryCatalogRepository(): InMemoryCatalogRepository {
  const entries = new Map<string, CatalogEntry>();
  let closed = false;

  const assertOpen = () => {
    if (closed) {
      throw new Error('Catalog repository is closed');
    }
  };

  return {
    _data: entries,

    clear() {
      entries.clear();
    },

    async register(input, options = {}) {
      assertOpen();
      const existing = entries.get(input.tableName);
      if (existing && !options.overwrite) {
        return { status: 'conflict', existing };
      }

      const entry: CatalogEntry = {
        tableName: input.tableName,
        sourceFile: input.sourceFile,
        physicalPath: input.physicalPath,
        format: input.format,
        schema: input.schema.map((column) => ({ ...column })),
        schemaFingerprint: input.schemaFingerprint,
        rowCount: input.rowCount,
        createdAt: input.createdAt ?? new Date().toISOString(),
      };
      entries.set(entry.tableName, entry);

      return existing
        ? { status: 'replaced', entry, previous: existing }
        : { status: 'created', entry };
    },

    async get(tableName) {
      assertOpen();
      return entries.get(tableName) ?? null;
    },

    async list(filter) {
      assertOpen();
      let result = Array.from(entries.values());
      if (filter?.format) {
        result = result.filter((e) => e.format === filter.format);
      }
      if (filter?.sourceFile) {
        result = result.filter((e) => e.sourceFile === filter.sourceFile);
      }
      if (filter?.namePrefix) {
        const prefix = filter.namePrefix;
        result = result.filter((e) => e.tableName.startsWith(prefix));
      }
      return result.sort((a, b) => compareNames(a.tableName, b.tableName));
    },

    async delete(tableName) {
      assertOpen();
      return entries.delete(tableName);
    },

    async count() {
      assertOpen();
      return entries.size;
    },

    async close() {
      closed = true;
    },
  };
}

// Binary order, matching SQLite's default collation
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
