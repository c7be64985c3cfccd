/**
 * Database Module
 */

export * from './schema.js';
export * from './sessions.js';
