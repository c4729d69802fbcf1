import { createDatabase, type DatabaseConfig } from '../db.js';
import { SqliteCatalogRepository } from './catalog-repository.js';

export { SqliteCatalogRepository } from './catalog-repository.js';

/**
 * Open (creating if needed) a SQLite-backed catalog repository.
 *
 * Usage:
 * ```ts
 * const catalog = createSqliteCatalogRepository({ filename: '/data/catalog/catalog.db' });
 * const entry = await catalog.get('run_01_imu_data');
 * await catalog.close();
 * ```
 */
export function createSqliteCatalogRepository(config: DatabaseConfig): SqliteCatalogRepository {
  const { db, client } = createDatabase(config);
  return new SqliteCatalogRepository(db, client);
}
