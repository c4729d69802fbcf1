// Catalog registrar and query facade

export {
  Catalog,
  initCatalog,
  openCatalog,
  registerTable,
  listTables,
  describeTable,
  dropTable,
  queryCatalog,
  schemaFingerprint,
  type CatalogOptions,
  type InitCatalogOptions,
  type RegisterTableInput,
  type DropTableResult,
} from './catalog.js';
