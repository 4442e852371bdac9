/**
 * Database Infrastructure
 *
 * Schema migrations for the school store.
 *
 * @module infrastructure/database
 */

export {
  runMigrations,
  getMigrationStatus,
  computeChecksum,
  DEFAULT_MIGRATIONS_DIR,
  type MigrationOptions,
  type MigrationReport,
  type MigrationStatusEntry,
} from './migrations.js';
