import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type { Logger } from '../../application/ports.js';

const { Pool } = pg;

// The part of the pool the repositories use
export type Queryable = Pick<PgPool, 'query'>;

export function createPool(connectionString: string, logger: Logger): PgPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  // Errors on idle clients would otherwise crash the process
  pool.on('error', (err) => {
    logger.error('Unexpected database error:', err);
  });

  return pool;
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
