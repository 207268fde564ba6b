export type StoreErrorKind = 'foreign_key_violation' | 'constraint_violation' | 'query_failed'

/**
 * A failed write or read against the store, classified by SQLSTATE.
 */
export class StoreError extends Error {
  readonly kind: StoreErrorKind
  readonly sqlState?: string

  constructor(kind: StoreErrorKind, message: string, sqlState?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreError'
    this.kind = kind
    this.sqlState = sqlState
  }
}

export class CheckpointError extends Error {
  readonly routeKey: string

  constructor(routeKey: string, message: string) {
    super(message)
    this.name = 'CheckpointError'
    this.routeKey = routeKey
  }
}

// https://www.postgresql.org/docs/current/errcodes-appendix.html
const FOREIGN_KEY_VIOLATION = '23503'
const CONSTRAINT_VIOLATIONS = new Set(['23502', '23505', '23514', '22P02', '22003', '22007', '22008'])

export function getSqlState(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export function toStoreError(error: unknown): StoreError {
  if (error instanceof StoreError) return error

  const sqlState = getSqlState(error)
  const message = error instanceof Error ? error.message : String(error)

  if (sqlState === FOREIGN_KEY_VIOLATION) {
    return new StoreError('foreign_key_violation', message, sqlState, { cause: error })
  }
  if (sqlState && CONSTRAINT_VIOLATIONS.has(sqlState)) {
    return new StoreError('constraint_violation', message, sqlState, { cause: error })
  }
  return new StoreError('query_failed', message, sqlState, { cause: error })
}
