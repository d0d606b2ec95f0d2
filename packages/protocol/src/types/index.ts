// Re-export all protocol types

export * from './common.js';
export * from './transactions.js';
export * from './entities.js';
export * from './versions.js';
