// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  CatalogRepository,
  RegisterEntryInput,
  RegisterEntryOptions,
  RegisterEntryResult,
  CatalogEntryFilter,
} from './catalog-repository.js';

export type {
  RecordSource,
  RecordSourceFactory,
  RecordResult,
  ReadRecordsOptions,
} from './record-source.js';

export type {
  TableData,
  TableWriter,
  TableReader,
  WriteTableResult,
} from './table-store.js';

export type {
  QueryEngine,
  QueryCursor,
  ResultColumn,
  ResultRow,
  ResultValue,
} from './query-engine.js';
