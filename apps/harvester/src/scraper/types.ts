/**
 * Harvester Core Types
 *
 * Route tasks, fetched pages, raw and normalized records, the site adapter
 * contract, and the counters that make up a run summary.
 */

import type { SentimentLabel } from '@routepulse/db'
import type { FetchError, ParseError, TerminalReason } from './errors.js'

export type { SentimentLabel }

// ═══════════════════════════════════════════════════════════════════════════════
// Routes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A route as supplied by whoever triggers a run.
 */
export interface RouteSpec {
  origin: string
  destination: string
  /** `YYYY-MM-DD`; part of the route key when set */
  journeyDate?: string | null
}

export type RouteStatus = 'pending' | 'in_progress' | 'done' | 'failed'

/**
 * Where the next fetch for a route starts. Passed by value into every fetch.
 */
export interface RouteCursor {
  /** Page to fetch next (0-based) */
  pageIndex: number
  /** Dedup key of the last review on the last committed page */
  reviewCursor: string | null
}

export interface RouteTask {
  routeKey: string
  origin: string
  destination: string
  journeyDate: string | null
  cursor: RouteCursor
  status: RouteStatus
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pages
// ═══════════════════════════════════════════════════════════════════════════════

export interface RawPage {
  routeKey: string
  pageIndex: number
  url: string
  html: string
  fetchedAt: Date
  byteSize: number
  contentHash: string
}

/**
 * What a rendered page is, decided before any parsing.
 */
export type PageSignal = 'results' | TerminalReason

export type FetchOutcome = { ok: true; page: RawPage } | { ok: false; error: FetchError }

export interface Fetcher {
  /** Stops between attempts and during waits once `signal` aborts */
  fetch(task: RouteTask, signal?: AbortSignal): Promise<FetchOutcome>
  /** Release the browser session behind this fetcher */
  close(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Raw records (parser output)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A bus card as it appears on the page. Strings are unprocessed; absent fields are null.
 */
export interface ListingRecord {
  /** Card identity on the page, used to attach reviews */
  listingKey: string
  operatorName: string | null
  busName: string | null
  busType: string | null
  routeText: string | null
  departureTime: string | null
  rating: string | null
  ratingCount: string | null
}

export interface ReviewRecord {
  listingKey: string
  rating: string | null
  title: string | null
  body: string
  date: string | null
}

export type ParseOutcome =
  | { ok: true; listings: ListingRecord[]; reviews: ReviewRecord[]; malformed: ParseError[] }
  | { ok: false; error: ParseError }

// ═══════════════════════════════════════════════════════════════════════════════
// Site adapter
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything that is specific to one source site.
 * `classify` and `parse` must be pure and deterministic given the same HTML.
 */
export interface SiteAdapter {
  readonly id: string
  readonly version: string

  /** Selector that matches once the page has rendered results, an end marker or a challenge */
  readonly readySelector: string

  buildPageUrl(task: RouteTask): string
  classify(html: string): PageSignal
  parse(page: RawPage): ParseOutcome
}

// ═══════════════════════════════════════════════════════════════════════════════
// Normalized records
// ═══════════════════════════════════════════════════════════════════════════════

export const BUS_TYPES = [
  'AC_SLEEPER',
  'NON_AC_SLEEPER',
  'AC_SEATER',
  'NON_AC_SEATER',
  'AC_SEMI_SLEEPER',
  'NON_AC_SEMI_SLEEPER',
  'VOLVO_MULTI_AXLE',
  'ELECTRIC',
  'OTHER',
] as const

export type BusType = (typeof BUS_TYPES)[number]

/**
 * Non-fatal problems. The record is kept with the bad field set to null.
 */
export type QualityIssue = 'ratingInvalid' | 'dateInvalid' | 'unmappedBusType'

export type DropReason = 'missing_operator' | 'empty_text'

export type NormalizeResult<T> =
  | { status: 'ok'; record: T; qualityIssues: QualityIssue[] }
  | { status: 'drop'; reason: DropReason }

export interface NormalizedListing {
  busId: string
  /** Page-local card key, carried so reviews can find their bus */
  listingKey: string
  operatorName: string
  busName: string | null
  busType: BusType
  origin: string
  destination: string | null
  /** `YYYY-MM-DDTHH:mm` */
  departureAt: string | null
  /** Aggregate shown by the source. Informational only, never stored as avg_rating */
  sourceRating: number | null
  sourceRatingCount: number | null
  lastScrapedAt: Date
}

export interface NormalizedReview {
  reviewId: string
  /** null when the parent listing could not be resolved; the loader rejects these */
  busId: string | null
  reviewTextHash: string
  rating: number | null
  title: string | null
  text: string
  /** `YYYY-MM-DD` */
  reviewDate: string | null
  qualityIssues: QualityIssue[]
  ingestedAt: Date
}

export interface SentimentScore {
  label: SentimentLabel
  /** In [-1, 1] */
  value: number
}

export interface ScoredReview extends NormalizedReview {
  sentiment: SentimentScore
}

// ═══════════════════════════════════════════════════════════════════════════════
// Load report
// ═══════════════════════════════════════════════════════════════════════════════

export type RejectionReason = 'missing_bus_id' | 'unknown_bus'

export interface ReviewRejection {
  reviewId: string
  busId: string | null
  reason: RejectionReason
}

export interface LoadReport {
  listingsInserted: number
  listingsUpdated: number
  /** Listings in the batch that shared a busId with a later one */
  listingsMerged: number
  reviewsInserted: number
  duplicateSkipped: number
  duplicateInBatch: number
  rejected: number
  rejections: ReviewRejection[]
}

export interface Loader {
  load(listings: NormalizedListing[], reviews: ScoredReview[]): Promise<LoadReport>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run summary
// ═══════════════════════════════════════════════════════════════════════════════

export interface RouteErrorEntry {
  pageIndex: number | null
  kind: string
  message: string
}

export interface RouteOutcome {
  routeKey: string
  origin: string
  destination: string
  journeyDate: string | null
  status: RouteStatus
  /** Stopped by cancellation or deadline while in progress */
  interrupted: boolean
  /** First page fetched this run, from the checkpoint */
  startPageIndex: number | null
  /** Last page whose records were loaded and checkpointed this run */
  lastCommittedPageIndex: number | null
  pagesLoaded: number
  errors: RouteErrorEntry[]
}

export interface ListingCounters {
  fetched: number
  malformed: number
  normalized: number
  dropped: number
  duplicateInBatch: number
  inserted: number
  updated: number
}

export interface ReviewCounters {
  fetched: number
  malformed: number
  normalized: number
  dropped: number
  duplicateInBatch: number
  duplicateSkipped: number
  inserted: number
  rejected: number
}

export interface PageCounters {
  fetched: number
  loaded: number
  failed: number
}

export interface RunSummary {
  runId: string
  startedAt: Date
  finishedAt: Date
  durationMs: number
  /** True when the run stopped early on cancellation or deadline */
  cancelled: boolean
  routes: RouteOutcome[]
  listings: ListingCounters
  reviews: ReviewCounters
  qualityIssues: Record<QualityIssue, number>
  pages: PageCounters
}
