/**
 * PostgreSQL bus/review store.
 *
 * Each `withTransaction` call checks out one pooled connection and wraps the
 * work in BEGIN/COMMIT. The loader opens one transaction per bus, so a bus row,
 * its new reviews and its recomputed aggregate always commit together.
 */

import type { ILogger } from '@routepulse/logger'
import { createLogger } from '@routepulse/logger'
import type { SqlClient, SqlPool } from './client.js'
import { toStoreError } from './errors.js'
import type {
  BusAggregate,
  BusReviewStore,
  BusReviewTransaction,
  BusRow,
  ReviewRow,
  ReviewStat,
  SentimentLabel,
  UpsertOutcome,
} from './types.js'

const UPSERT_BUS_SQL = `
INSERT INTO buses (
  bus_id, operator_name, bus_name, bus_type, origin, destination, departure_at, rating_count, last_scraped_at
)
VALUES ($1, $2, $3, $4, $5, $6, $7, 0, $8)
ON CONFLICT (bus_id) DO UPDATE SET
  operator_name = EXCLUDED.operator_name,
  bus_name = EXCLUDED.bus_name,
  bus_type = EXCLUDED.bus_type,
  last_scraped_at = EXCLUDED.last_scraped_at
RETURNING (xmax = 0) AS inserted`

const INSERT_REVIEW_SQL = `
INSERT INTO reviews (
  review_id, bus_id, review_text_hash, rating, review_title, review_text, review_date,
  sentiment_label, sentiment_score, quality_issues, ingested_at
)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
ON CONFLICT (review_id) DO NOTHING
RETURNING review_id`

const BUS_EXISTS_SQL = 'SELECT 1 AS found FROM buses WHERE bus_id = $1'

const LIST_STATS_SQL = 'SELECT rating, sentiment_label FROM reviews WHERE bus_id = $1'

const UPDATE_AGGREGATE_SQL =
  'UPDATE buses SET avg_rating = $2, rating_count = $3, sentiment_positive = $4, sentiment_negative = $5 WHERE bus_id = $1'

export class PgBusReviewTransaction implements BusReviewTransaction {
  constructor(private readonly client: SqlClient) {}

  async upsertBus(row: BusRow): Promise<UpsertOutcome> {
    const result = await this.client.query<{ inserted: boolean }>(UPSERT_BUS_SQL, [
      row.busId,
      row.operatorName,
      row.busName,
      row.busType,
      row.origin,
      row.destination,
      row.departureAt,
      row.lastScrapedAt,
    ])
    return result.rows[0]?.inserted ? 'inserted' : 'updated'
  }

  async busExists(busId: string): Promise<boolean> {
    const result = await this.client.query<{ found: number }>(BUS_EXISTS_SQL, [busId])
    return result.rows.length > 0
  }

  async insertReviewIfAbsent(row: ReviewRow): Promise<boolean> {
    const result = await this.client.query<{ review_id: string }>(INSERT_REVIEW_SQL, [
      row.reviewId,
      row.busId,
      row.reviewTextHash,
      row.rating,
      row.reviewTitle,
      row.reviewText,
      row.reviewDate,
      row.sentimentLabel,
      row.sentimentScore,
      row.qualityIssues,
      row.ingestedAt,
    ])
    return result.rows.length === 1
  }

  async listReviewStats(busId: string): Promise<ReviewStat[]> {
    const result = await this.client.query<{ rating: number | null; sentiment_label: SentimentLabel }>(
      LIST_STATS_SQL,
      [busId]
    )
    return result.rows.map((row) => ({ rating: row.rating, sentimentLabel: row.sentiment_label }))
  }

  async updateBusAggregate(busId: string, aggregate: BusAggregate): Promise<void> {
    await this.client.query(UPDATE_AGGREGATE_SQL, [
      busId,
      aggregate.avgRating,
      aggregate.ratingCount,
      aggregate.sentimentPositive,
      aggregate.sentimentNegative,
    ])
  }
}

export class PgBusReviewStore implements BusReviewStore {
  private readonly log: ILogger

  constructor(private readonly pool: SqlPool, logger?: ILogger) {
    this.log = logger ?? createLogger('db').child('bus-review-store')
  }

  async withTransaction<T>(work: (tx: BusReviewTransaction) => Promise<T>): Promise<T> {
    const connection = await this.pool.connect()
    try {
      await connection.query('BEGIN')
      const result = await work(new PgBusReviewTransaction(connection))
      await connection.query('COMMIT')
      return result
    } catch (error) {
      try {
        await connection.query('ROLLBACK')
      } catch (rollbackError) {
        this.log.error('Rollback failed', {}, rollbackError)
      }
      throw toStoreError(error)
    } finally {
      connection.release()
    }
  }
}
