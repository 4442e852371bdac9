/**
 * @fileoverview Infrastructure Layer
 *
 * Storage adapters for the school domain and the migration runner.
 *
 * @module @schoolreg/infrastructure
 */

export * from './repositories/index.js';
export * from './database/index.js';
