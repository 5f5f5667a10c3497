/**
 * Central export for all pipeline types
 */

export * from './generation.js';
export * from './config.js';
export * from './database.js';
