// SQLite storage: the catalog metadata store and the embedded query engine

export { createDatabase, type Database, type Client, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export { SqliteCatalogRepository, createSqliteCatalogRepository } from './repositories/index.js';
export { SqliteQueryEngine, quoteIdentifier } from './query-engine.js';
