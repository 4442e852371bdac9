/**
 * Database Client Factory
 * Provides a small pool interface for repositories and a unit-of-work helper
 *
 * Repositories depend on the interfaces below, never on pg directly, so tests
 * can hand them a recording mock pool.
 */

import crypto from 'node:crypto';

import pg from 'pg';

import { createLogger, type Logger } from './logger/index.js';

/**
 * Database query result type
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.Client
 */
export interface DatabaseClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabaseConfig {
  connectionString: string;
  /** Pool label used in logs, e.g. `primary` or `read` */
  name?: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  /** Require TLS; certificates are verified in production */
  ssl?: boolean;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private pool: pg.Pool | null = null;
  private logger: Logger;

  constructor(private config: DatabaseConfig) {
    this.logger = createLogger({ name: `database:${config.name ?? 'primary'}` });
  }

  private getPool(): pg.Pool {
    if (this.pool) return this.pool;

    const ssl = this.config.ssl
      ? { rejectUnauthorized: process.env.NODE_ENV === 'production' }
      : undefined;

    this.pool = new pg.Pool({
      connectionString: this.config.connectionString,
      max: this.config.maxConnections ?? 10,
      idleTimeoutMillis: this.config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 5000,
      ssl,
    });

    // Idle clients can error when the server restarts; without a listener pg crashes the process
    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });

    this.logger.info(
      { ssl: ssl !== undefined, maxConnections: this.config.maxConnections ?? 10 },
      'Database pool initialized'
    );
    return this.pool;
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const result = await this.getPool().query(sql, params);
    const rows: T[] = result.rows;
    return { rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const client = await this.getPool().connect();

    return {
      query: async <R = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<R>> => {
        const result = await client.query(sql, params);
        const rows: R[] = result.rows;
        return { rows, rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      this.logger.info('Database pool closed');
    }
  }
}

/**
 * Create a connection pool; connections are opened lazily on first use
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient({ connectionString: config.database.url });
 * const result = await db.query('SELECT * FROM schools WHERE id = $1', [schoolId]);
 * ```
 */
export function createDatabaseClient(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}

/**
 * Close pools during graceful shutdown; a pool shared by two roles is closed once
 */
export async function closeDatabasePools(pools: Iterable<DatabasePool>): Promise<void> {
  const unique = new Set(pools);
  await Promise.all([...unique].map((pool) => pool.end()));
}

/**
 * Cheap connectivity check for readiness probes
 */
export async function pingDatabase(pool: DatabaseClient): Promise<boolean> {
  const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
  return result.rows[0]?.ok === 1;
}

// =============================================================================
// TRANSACTION MANAGEMENT
// =============================================================================

/**
 * Transaction isolation levels
 */
export enum IsolationLevel {
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

/**
 * Transaction configuration options
 */
export interface TransactionOptions {
  /** Isolation level for the transaction */
  isolationLevel?: IsolationLevel;
  /** Start the transaction READ ONLY; any write fails inside the database */
  readOnly?: boolean;
  /** Statement timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Number of attempts on serialization failures (default: 3) */
  maxRetries?: number;
  /** Base delay for exponential backoff in ms (default: 100) */
  retryBaseDelayMs?: number;
}

/**
 * Transaction client interface with row locking helpers
 */
export interface TransactionClient extends DatabaseClient {
  /**
   * Acquire a row lock using SELECT FOR UPDATE
   * Prevents concurrent modifications to the same row
   */
  selectForUpdate<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

/**
 * Error thrown when a transaction cannot be serialized (concurrent conflict)
 */
export class SerializationError extends Error {
  public readonly code = 'SERIALIZATION_FAILURE';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'SerializationError';
  }
}

/**
 * Error thrown when a deadlock is detected
 */
export class DeadlockError extends Error {
  public readonly code = 'DEADLOCK_DETECTED';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'DeadlockError';
  }
}

const DEFAULT_TRANSACTION_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY = 100;

interface DriverErrorInfo {
  code: string | undefined;
  message: string;
}

function readDriverError(error: unknown): DriverErrorInfo {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { code, message: error.message };
  }
  return { code: undefined, message: String(error) };
}

function stripLockingClause(sql: string): string {
  return sql.trim().replace(/\s+for\s+update.*$/i, '');
}

/**
 * Execute a function within a database transaction (unit of work)
 *
 * One pooled client per call: BEGIN, the callback, COMMIT, or ROLLBACK on any
 * error, and the client is always released. Serialization failures and
 * deadlocks are retried with exponential backoff.
 *
 * @example
 * ```typescript
 * const school = await withTransaction(db, async (tx) => {
 *   const { rows } = await tx.selectForUpdate(
 *     'SELECT * FROM schools WHERE id = $1',
 *     [schoolId]
 *   );
 *   if (rows.length === 0) return null;
 *   return tx.query('UPDATE schools SET name = $1 WHERE id = $2 RETURNING *', [name, schoolId]);
 * });
 *
 * const snapshot = await withTransaction(db, (tx) => tx.query('SELECT * FROM schools'), {
 *   isolationLevel: IsolationLevel.REPEATABLE_READ,
 *   readOnly: true,
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: TransactionClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const {
    isolationLevel = IsolationLevel.READ_COMMITTED,
    readOnly = false,
    timeoutMs = DEFAULT_TRANSACTION_TIMEOUT,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryBaseDelayMs = DEFAULT_RETRY_BASE_DELAY,
  } = options;

  const logger = createLogger({ name: 'transaction' });
  const accessMode = readOnly ? ' READ ONLY' : '';
  let attempt = 0;

  while (attempt < maxRetries) {
    const client = await pool.connect();

    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}${accessMode}`);
      // SET LOCAL only applies inside a transaction block
      await client.query(`SET LOCAL statement_timeout = ${Math.trunc(timeoutMs)}`);

      const txClient: TransactionClient = {
        query: client.query.bind(client),

        selectForUpdate: async <R = Record<string, unknown>>(
          sql: string,
          params?: unknown[]
        ): Promise<QueryResult<R>> => {
          return client.query<R>(`${stripLockingClause(sql)} FOR UPDATE`, params);
        },
      };

      const result = await fn(txClient);

      await client.query('COMMIT');

      return result;
    } catch (error: unknown) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.warn({ err: rollbackError }, 'Rollback failed; connection will be released');
      }

      const driverError = readDriverError(error);
      const isSerializationFailure = driverError.code === '40001';
      const isDeadlock = driverError.code === '40P01';

      if (isSerializationFailure || isDeadlock) {
        attempt++;

        if (attempt < maxRetries) {
          const randomBytes = new Uint32Array(1);
          crypto.getRandomValues(randomBytes);
          const jitterFactor = 0.5 + ((randomBytes[0] ?? 0) / 0xffffffff) * 0.5;
          const delay = retryBaseDelayMs * Math.pow(2, attempt) * jitterFactor;

          logger.warn(
            { attempt, maxRetries, delay, errorCode: driverError.code },
            'Transaction conflict, retrying with backoff'
          );

          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        if (isSerializationFailure) {
          throw new SerializationError(
            `Transaction serialization failure after ${maxRetries} attempts: ${driverError.message}`
          );
        }
        throw new DeadlockError(
          `Deadlock detected after ${maxRetries} attempts: ${driverError.message}`
        );
      }

      throw error;
    } finally {
      client.release();
    }
  }

  throw new SerializationError('Transaction failed after maximum retries');
}

/**
 * Execute a function while holding a session-level advisory lock
 *
 * Used to keep concurrently starting replicas from applying the same
 * migration twice.
 */
export async function withAdvisoryLock<T>(
  pool: DatabasePool,
  lockKey: number,
  fn: () => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  const logger = createLogger({ name: 'advisory-lock' });

  try {
    await client.query('SELECT pg_advisory_lock($1)', [lockKey]);
    logger.debug({ lockKey }, 'Advisory lock acquired');

    try {
      return await fn();
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [lockKey]);
      logger.debug({ lockKey }, 'Advisory lock released');
    }
  } finally {
    client.release();
  }
}

/**
 * Generate a consistent hash code from a string for use as advisory lock key
 */
export function stringToLockKey(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // 32-bit
  }
  return Math.abs(hash);
}
