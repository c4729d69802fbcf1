// Re-export all protocol types

export * from './common.js';
export * from './records.js';
export * from './tables.js';
export * from './catalog.js';
