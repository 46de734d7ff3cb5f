import pg from 'pg';
import type { QueryResultRow } from 'pg';
import type { UniqueTarget } from '../errors.js';

export interface SqlResult<T> {
  rows: T[];
}

/**
 * Anything that runs a parameterized query: the pool or a transaction client
 */
export interface SqlSession {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<T>>;
}

export interface SqlDatabase extends SqlSession {
  /**
   * Run `callback` inside BEGIN/COMMIT, rolling back when it rejects
   */
  transaction<T>(callback: (session: SqlSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface PgPoolOptions {
  connectionString: string;
  max: number;
  statementTimeoutMs: number;
}

/**
 * Create a PostgreSQL connection pool
 *
 * Every statement is bounded by `statement_timeout`.
 */
export function createPgPool(options: PgPoolOptions): pg.Pool {
  return new pg.Pool({
    connectionString: options.connectionString,
    max: options.max,
    statement_timeout: options.statementTimeoutMs,
    connectionTimeoutMillis: options.statementTimeoutMs,
    idleTimeoutMillis: 30000,
  });
}

/**
 * Wrap a pool as a SqlDatabase
 */
export function createPgDatabase(pool: pg.Pool): SqlDatabase {
  return {
    async query<T extends QueryResultRow>(text: string, params: unknown[] = []) {
      const result = await pool.query<T>(text, params);
      return { rows: result.rows };
    },

    async transaction<T>(callback: (session: SqlSession) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      let releaseError: Error | undefined;

      try {
        await client.query('BEGIN');
        const result = await callback({
          async query<R extends QueryResultRow>(text: string, params: unknown[] = []) {
            const res = await client.query<R>(text, params);
            return { rows: res.rows };
          },
        });
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          // The connection is unusable; the pool must discard it
          releaseError =
            rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        }
        throw error;
      } finally {
        client.release(releaseError);
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}

// Constraint names from sql/schema.sql
const UNIQUE_CONSTRAINTS: Record<string, UniqueTarget> = {
  users_external_subject_unique: 'external_subject',
  users_email_unique: 'email',
  tenants_key_unique: 'tenant_key',
};

/**
 * Map a unique_violation (SQLSTATE 23505) to the violated target
 */
export function uniqueViolationTarget(error: unknown): UniqueTarget | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if (!('code' in error) || error.code !== '23505') {
    return null;
  }
  if (!('constraint' in error) || typeof error.constraint !== 'string') {
    return null;
  }
  return UNIQUE_CONSTRAINTS[error.constraint] ?? null;
}
