// Re-export all schema tables
export * from './transactions.js';
export * from './entities.js';
export * from './shadow-history.js';
export * from './versions.js';
