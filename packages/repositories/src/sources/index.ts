// Record sources: readers for recorded event logs

export { NdjsonRecordSource } from './ndjson.js';
export { InMemoryRecordSource } from './in-memory.js';
export { RecordSourceRegistry, createDefaultSourceRegistry } from './registry.js';
