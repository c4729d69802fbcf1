// @flatlog/runtime
// Record flattening, schema unification, table materialization and the SQL catalog

// Flattening
export {
  flattenValue,
  flattenRecord,
  headerTimestamp,
  ROOT_VALUE_PREFIX,
  ExtractorRegistry,
  extractorRegistry,
  createDefaultExtractorRegistry,
  BUILTIN_EXTRACTORS,
  getPath,
  type FlattenOptions,
  type Extractor,
} from './flatten/index.js';

// Schema unification
export {
  SchemaUnifier,
  unify,
  cellKind,
  resolveColumnType,
  projectCell,
  type UnifyOptions,
  type UnifyResult,
} from './unify/index.js';

// Materialization
export { materializeTable, finishTable, type MaterializeOptions } from './materialize/index.js';

// Conversion pipeline
export {
  convertRecords,
  convertFiles,
  summarizeSource,
  DEFAULT_TABLE_FORMAT,
  type ConvertOptions,
  type ConvertFilesOptions,
  type ChannelConversion,
  type ConversionReport,
  type TableReport,
  type InputReport,
  type SourceSummary,
  type TopicSummary,
} from './pipeline/index.js';

// Catalog
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
} from './catalog/index.js';

// Configuration
export {
  loadConfig,
  isLogLevel,
  DEFAULT_ARRAY_SLOT_LIMIT,
  DEFAULT_INLINE_BYTES_LIMIT,
  DEFAULT_MAX_ROWS_PER_CHANNEL,
  type FlatlogConfig,
} from './config.js';

// Logging
export {
  consoleLogger,
  stderrLogger,
  silentLogger,
  createCapturingLogger,
  createLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Error types
export {
  FlatlogError,
  ValidationError,
  DecodeError,
  NameConflictError,
  CatalogAlreadyExistsError,
  UnknownCatalogError,
  TableNotFoundError,
  QueryError,
  UnsupportedFormatError,
  UnsupportedSourceError,
  ChannelBufferOverflowError,
  ConfigError,
} from '@flatlog/protocol';
