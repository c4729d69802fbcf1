// @flatlog/protocol
// Shared types and encodings for record flattening and the table catalog

export * from './types/index.js';
export * from './errors.js';

// Encodings
export * from './encoding/ndjson.js';
export * from './encoding/json-text.js';
export * from './encoding/paths.js';

// Validation
export * from './validation/schema.js';
export * from './validation/records.js';
