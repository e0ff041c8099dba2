// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// Storage exports
export * from './storage/index.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export * from './utils/result.js';
