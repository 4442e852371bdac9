/**
 * @module @schoolreg/domain
 */

export * from './schools/index.js';
