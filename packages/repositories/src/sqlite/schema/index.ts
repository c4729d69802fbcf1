// Re-export all schema tables
export * from './catalog-entries.js';
