import type { SqlClient } from './client.js'
import { CheckpointError, toStoreError } from './errors.js'
import type { Checkpoint, CheckpointAdvance, CheckpointStore } from './types.js'

interface CheckpointRecord {
  route_key: string
  last_page_index: number
  review_cursor: string | null
  updated_at: Date
}

const LOAD_SQL = `
SELECT route_key, last_page_index, review_cursor, updated_at
FROM checkpoints
WHERE route_key = $1`

// The WHERE on the conflict branch keeps advancement monotonic in one statement.
const ADVANCE_SQL = `
INSERT INTO checkpoints (route_key, last_page_index, review_cursor, updated_at)
VALUES ($1, $2, $3, now())
ON CONFLICT (route_key) DO UPDATE SET
  last_page_index = EXCLUDED.last_page_index,
  review_cursor = EXCLUDED.review_cursor,
  updated_at = EXCLUDED.updated_at
WHERE checkpoints.last_page_index < EXCLUDED.last_page_index
RETURNING route_key, last_page_index, review_cursor, updated_at`

function toCheckpoint(record: CheckpointRecord): Checkpoint {
  return {
    routeKey: record.route_key,
    lastPageIndex: record.last_page_index,
    reviewCursor: record.review_cursor,
    updatedAt: record.updated_at,
  }
}

export class PgCheckpointStore implements CheckpointStore {
  constructor(private readonly client: SqlClient) {}

  async load(routeKey: string): Promise<Checkpoint | null> {
    try {
      const result = await this.client.query<CheckpointRecord>(LOAD_SQL, [routeKey])
      const record = result.rows[0]
      return record ? toCheckpoint(record) : null
    } catch (error) {
      throw toStoreError(error)
    }
  }

  async advance(routeKey: string, next: CheckpointAdvance): Promise<Checkpoint> {
    if (!Number.isInteger(next.pageIndex) || next.pageIndex < 0) {
      throw new CheckpointError(routeKey, `Invalid page index ${next.pageIndex}`)
    }

    const result = await this.client
      .query<CheckpointRecord>(ADVANCE_SQL, [routeKey, next.pageIndex, next.reviewCursor])
      .catch((error: unknown) => {
        throw toStoreError(error)
      })

    const record = result.rows[0]
    if (!record) {
      throw new CheckpointError(
        routeKey,
        `Checkpoint for ${routeKey} is already at or beyond page ${next.pageIndex}`
      )
    }
    return toCheckpoint(record)
  }
}
