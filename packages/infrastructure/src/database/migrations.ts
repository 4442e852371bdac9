/**
 * SQL migration runner
 *
 * Applies `*.sql` files in filename order. Each file runs in its own
 * transaction and is recorded in `schema_migrations` with a checksum, so a
 * second run only applies what is new.
 */

import crypto from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  createLogger,
  stringToLockKey,
  withAdvisoryLock,
  withTransaction,
  type DatabasePool,
  type Logger,
} from '@schoolreg/core';

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

const MIGRATION_LOCK_KEY = stringToLockKey('schema_migrations');

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    filename TEXT NOT NULL UNIQUE,
    checksum VARCHAR(64),
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    execution_time_ms INTEGER
  )
`;

export interface MigrationOptions {
  /** Directory holding the `*.sql` files */
  directory?: string;
  logger?: Logger;
}

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

export interface MigrationStatusEntry {
  filename: string;
  applied: boolean;
  appliedAt: Date | null;
  /** True when the file changed after it was applied */
  checksumMismatch: boolean;
}

interface MigrationRecord {
  filename: string;
  checksum: string | null;
  applied_at: Date;
}

export function computeChecksum(content: string): string {
  return crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
}

async function listMigrationFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory);
  return entries.filter((entry) => entry.endsWith('.sql')).sort();
}

async function readAppliedMigrations(pool: DatabasePool): Promise<Map<string, MigrationRecord>> {
  const { rows } = await pool.query<MigrationRecord>(
    'SELECT filename, checksum, applied_at FROM schema_migrations ORDER BY filename'
  );
  return new Map(rows.map((row) => [row.filename, row]));
}

/**
 * Apply every pending migration under a cluster-wide advisory lock
 */
export async function runMigrations(
  pool: DatabasePool,
  options: MigrationOptions = {}
): Promise<MigrationReport> {
  const directory = options.directory ?? DEFAULT_MIGRATIONS_DIR;
  const logger = options.logger ?? createLogger({ name: 'migrations' });
  const files = await listMigrationFiles(directory);

  return withAdvisoryLock(pool, MIGRATION_LOCK_KEY, async () => {
    await pool.query(CREATE_MIGRATIONS_TABLE);
    const appliedRecords = await readAppliedMigrations(pool);
    const report: MigrationReport = { applied: [], skipped: [] };

    for (const file of files) {
      const sql = await readFile(path.join(directory, file), 'utf8');
      const checksum = computeChecksum(sql);
      const record = appliedRecords.get(file);

      if (record) {
        if (record.checksum !== null && record.checksum !== checksum) {
          logger.warn(
            { file, recorded: record.checksum, current: checksum },
            'Applied migration was modified after it ran'
          );
        }
        report.skipped.push(file);
        continue;
      }

      const startedAt = Date.now();
      await withTransaction(pool, async (tx) => {
        await tx.query(sql);
        await tx.query(
          `INSERT INTO schema_migrations (filename, checksum, execution_time_ms)
           VALUES ($1, $2, $3)`,
          [file, checksum, Date.now() - startedAt]
        );
      });

      logger.info({ file, durationMs: Date.now() - startedAt }, 'Migration applied');
      report.applied.push(file);
    }

    return report;
  });
}

export async function getMigrationStatus(
  pool: DatabasePool,
  options: Pick<MigrationOptions, 'directory'> = {}
): Promise<MigrationStatusEntry[]> {
  const directory = options.directory ?? DEFAULT_MIGRATIONS_DIR;
  const files = await listMigrationFiles(directory);

  await pool.query(CREATE_MIGRATIONS_TABLE);
  const appliedRecords = await readAppliedMigrations(pool);

  return Promise.all(
    files.map(async (filename) => {
      const record = appliedRecords.get(filename);
      if (!record) {
        return { filename, applied: false, appliedAt: null, checksumMismatch: false };
      }
      const checksum = computeChecksum(await readFile(path.join(directory, filename), 'utf8'));
      return {
        filename,
        applied: true,
        appliedAt: record.applied_at,
        checksumMismatch: record.checksum !== null && record.checksum !== checksum,
      };
    })
  );
}
