/**
 * Database Migration Status Tool
 * Shows which migration files have been applied
 */

import {
  DatabaseEnvSchema,
  createDatabaseClient,
  validateEnv,
} from '@schoolreg/core';
import { getMigrationStatus } from '@schoolreg/infrastructure';

async function main(): Promise<void> {
  console.log('========================================');
  console.log('  School Registry Migration Status');
  console.log('========================================\n');

  const env = validateEnv(DatabaseEnvSchema);

  if (!env.DATABASE_URL) {
    console.error('ERROR: DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const pool = createDatabaseClient({
    connectionString: env.DATABASE_URL,
    name: 'migrations',
    maxConnections: 1,
    ssl: env.DATABASE_SSL,
  });

  try {
    const status = await getMigrationStatus(pool);
    const applied = status.filter((entry) => entry.applied);

    for (const entry of status) {
      const date = entry.appliedAt ? entry.appliedAt.toISOString().split('T')[0] : '';
      const marker = entry.applied ? '[x]' : '[ ]';
      const drift = entry.checksumMismatch ? ' (modified since applied)' : '';
      console.log(`  ${marker} ${entry.filename} ${date}${drift}`);
    }

    console.log('');
    console.log('Summary:');
    console.log(`  Applied: ${applied.length}`);
    console.log(`  Pending: ${status.length - applied.length}`);
    console.log(`  Total:   ${status.length}`);
  } catch (error: unknown) {
    const errMessage = error instanceof Error ? error.message : String(error);
    console.error(`ERROR: ${errMessage}`);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void main();
