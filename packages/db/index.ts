export { createSqlPool, fromPgPool } from './client.js'
export type { SqlClient, SqlConnection, SqlPool, SqlResult } from './client.js'
export { applySchema, readSchemaSql, SCHEMA_PATH } from './schema.js'
export { PgBusReviewStore, PgBusReviewTransaction } from './bus-review-store.js'
export { PgCheckpointStore } from './checkpoint-store.js'
export { CheckpointError, StoreError, getSqlState, toStoreError } from './errors.js'
export type { StoreErrorKind } from './errors.js'
export type {
  BusAggregate,
  BusReviewStore,
  BusReviewTransaction,
  BusRow,
  Checkpoint,
  CheckpointAdvance,
  CheckpointStore,
  ReviewRow,
  ReviewStat,
  SentimentLabel,
  UpsertOutcome,
} from './types.js'
