import 'dotenv/config'
import pg from 'pg'
import type { Pool, PoolConfig, QueryResultRow } from 'pg'
import { createLogger } from '@routepulse/logger'

const log = createLogger('db')

export interface SqlResult<R> {
  rows: R[]
  rowCount: number | null
}

/**
 * The subset of a pg client the stores use. Lets tests supply an in-process fake.
 */
export interface SqlClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<SqlResult<R>>
}

export interface SqlConnection extends SqlClient {
  release(): void
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlConnection>
  end(): Promise<void>
}

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 1)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: routepulse-harvester)
 */
function getPoolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,

    max: parseInt(process.env.DB_POOL_MAX || '10', 10),
    min: parseInt(process.env.DB_POOL_MIN || '1', 10),

    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: process.env.DB_SERVICE_NAME || 'routepulse-harvester',
  }
}

/**
 * Wrap a pg Pool in the narrow SqlPool interface.
 */
export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: <R extends QueryResultRow>(text: string, values?: unknown[]) => pool.query<R>(text, values),
    connect: async () => {
      const client = await pool.connect()
      return {
        query: <R extends QueryResultRow>(text: string, values?: unknown[]) => client.query<R>(text, values),
        release: () => client.release(),
      }
    },
    end: () => pool.end(),
  }
}

/**
 * Creates a pooled PostgreSQL connection from DATABASE_URL (or an explicit URL).
 */
export function createSqlPool(connectionString = process.env.DATABASE_URL): SqlPool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  const pool = new pg.Pool(getPoolConfig(connectionString))
  pool.on('error', (error) => {
    log.error('Idle PostgreSQL client error', {}, error)
  })

  return fromPgPool(pool)
}
