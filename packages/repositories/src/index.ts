// @flatlog/repositories
// Storage contracts and their implementations.
//
// The runtime codes against the interfaces; the implementations here back them:
// - sqlite: catalog metadata store (drizzle + better-sqlite3) and the embedded query engine
// - in-memory: catalog repository for tests and development
// - tables: writers and readers for each table artifact format
// - sources: record log readers and the extension registry

export * from './interfaces/index.js';
export * as sqlite from './sqlite/index.js';
export { SqliteCatalogRepository, createSqliteCatalogRepository, SqliteQueryEngine } from './sqlite/index.js';
export { createInMemoryCatalogRepository, type InMemoryCatalogRepository } from './in-memory/index.js';
export * from './tables/index.js';
export * from './sources/index.js';
