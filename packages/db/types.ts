/**
 * Row shapes and store contracts for the buses / reviews / checkpoints tables.
 */

export type SentimentLabel = 'positive' | 'neutral' | 'negative'

export interface BusRow {
  busId: string
  operatorName: string
  busName: string | null
  busType: string
  origin: string
  destination: string | null
  /** Local departure, `YYYY-MM-DDTHH:mm`, when the listing showed one */
  departureAt: string | null
  lastScrapedAt: Date
}

export interface ReviewRow {
  reviewId: string
  busId: string
  reviewTextHash: string
  rating: number | null
  reviewTitle: string | null
  reviewText: string
  /** `YYYY-MM-DD` */
  reviewDate: string | null
  sentimentLabel: SentimentLabel
  sentimentScore: number
  qualityIssues: string[]
  ingestedAt: Date
}

/**
 * Per-bus figures recomputed from every stored review of the bus.
 */
export interface BusAggregate {
  avgRating: number | null
  ratingCount: number
  /** Share of reviews labelled positive, 0..1; null without reviews */
  sentimentPositive: number | null
  /** Share of reviews labelled negative, 0..1; null without reviews */
  sentimentNegative: number | null
}

export interface ReviewStat {
  rating: number | null
  sentimentLabel: SentimentLabel
}

export type UpsertOutcome = 'inserted' | 'updated'

/**
 * Operations available inside one bus-scoped transaction.
 */
export interface BusReviewTransaction {
  /** Insert, or update mutable fields (names, type, last-scraped) in place */
  upsertBus(row: BusRow): Promise<UpsertOutcome>
  busExists(busId: string): Promise<boolean>
  /** Returns false when a review with the same id already exists */
  insertReviewIfAbsent(row: ReviewRow): Promise<boolean>
  listReviewStats(busId: string): Promise<ReviewStat[]>
  updateBusAggregate(busId: string, aggregate: BusAggregate): Promise<void>
}

export interface BusReviewStore {
  /**
   * Run `work` in a single transaction. Commits when it resolves, rolls back when it throws.
   */
  withTransaction<T>(work: (tx: BusReviewTransaction) => Promise<T>): Promise<T>
}

export interface Checkpoint {
  routeKey: string
  lastPageIndex: number
  reviewCursor: string | null
  updatedAt: Date
}

export interface CheckpointAdvance {
  pageIndex: number
  reviewCursor: string | null
}

export interface CheckpointStore {
  load(routeKey: string): Promise<Checkpoint | null>
  /**
   * Move the cursor forward. Only call once the page's records are committed.
   * @throws CheckpointError when `pageIndex` does not move past the stored index
   */
  advance(routeKey: string, next: CheckpointAdvance): Promise<Checkpoint>
}
