/**
 * Scripted pg pool for repository tests
 *
 * Every statement issued through the pool or an acquired client is recorded.
 * Transaction control statements succeed with an empty result; everything
 * else is answered by the handler.
 */

import { vi } from 'vitest';
import type { DatabasePool, QueryResult } from '@schoolreg/core';

export interface RecordedQuery {
  sql: string;
  params?: unknown[];
}

export type QueryHandler = (
  sql: string,
  params: unknown[] | undefined
) => QueryResult | Promise<QueryResult>;

const CONTROL_STATEMENT = /^(BEGIN|COMMIT|ROLLBACK|SET LOCAL|SELECT pg_advisory_(un)?lock)/;

export const EMPTY_RESULT: QueryResult = { rows: [], rowCount: 0 };

export function rowsResult(rows: Record<string, unknown>[]): QueryResult {
  return { rows, rowCount: rows.length };
}

export function createMockPool(handler: QueryHandler = () => EMPTY_RESULT) {
  const queries: RecordedQuery[] = [];

  const execute = async (sql: string, params?: unknown[]): Promise<QueryResult> => {
    queries.push(params !== undefined ? { sql, params } : { sql });
    if (CONTROL_STATEMENT.test(sql.trim())) {
      return EMPTY_RESULT;
    }
    return handler(sql, params);
  };

  const client = {
    query: vi.fn().mockImplementation(execute),
    release: vi.fn(),
  };

  const pool = {
    query: vi.fn().mockImplementation(execute),
    connect: vi.fn().mockResolvedValue(client),
    end: vi.fn().mockResolvedValue(undefined),
  } satisfies DatabasePool;

  return {
    pool,
    client,
    queries,
    /** Recorded SQL with whitespace collapsed */
    statements: (): string[] => queries.map((q) => q.sql.replace(/\s+/g, ' ').trim()),
  };
}

export type MockPool = ReturnType<typeof createMockPool>;

export function schoolRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: '1',
    name: 'Northside Primary',
    address: '1 Elm Street',
    principal_name: 'Ada Park',
    created_at: new Date('2024-03-01T08:00:00.000Z'),
    version: 1,
    valid_from: new Date('2024-03-01T08:00:00.000Z'),
    valid_to: new Date('9999-12-31T23:59:59.999Z'),
    ...overrides,
  };
}
