/**
 * Review Harvester
 *
 * Route-checkpointed acquisition of bus listings and reviews: fetch, parse,
 * normalize, score, load.
 */

// Core types
export * from './types.js'
export * from './errors.js'

// Routes
export { createRouteTask, parseRouteArg, routeKeyFor, slugify } from './routes.js'

// Adapters
export {
  createRedbusAdapter,
  createRedbusPagePreparation,
  formatJourneyDate,
  redbusAdapter,
} from './adapters/redbus/adapter.js'

// Fetch layer
export { PageFetcher, contentHash } from './fetch/page-fetcher.js'
export type { PageFetcherOptions } from './fetch/page-fetcher.js'
export { PlaywrightBrowserSession, BrowserSessionError } from './fetch/browser.js'
export type { BrowserSession, NavigationResult, PlaywrightSessionOptions } from './fetch/browser.js'
export { RandomDelayRateLimiter, DEFAULT_RATE_LIMIT } from './fetch/rate-limiter.js'
export type { RateLimitConfig, RateLimiter } from './fetch/rate-limiter.js'
export { DEFAULT_RETRY_POLICY, backoffDelay, equalJitter, noJitter, systemClock } from './fetch/retry-policy.js'
export type { Clock, JitterFn, RetryPolicy } from './fetch/retry-policy.js'
export { PlaywrightPageDriver, preparePage, scrollUntilStable } from './fetch/page-preparation.js'
export type {
  PageDriver,
  PagePreparation,
  ReviewPanelPreparation,
  ScrollPreparation,
} from './fetch/page-preparation.js'
export { FileAuditStore } from './fetch/audit-store.js'
export type { AuditStore } from './fetch/audit-store.js'

// Processing
export { normalizeBatch, normalizeListing, normalizeReview } from './process/normalizer.js'
export type { ListingContext, NormalizedBatch, ReviewContext } from './process/normalizer.js'
export { matchBusType } from './process/bus-type.js'
export { deriveBusId, deriveReviewId, reviewTextHash } from './process/identity.js'
export { dedupeBatch } from './process/run-dedupe.js'
export { BusReviewLoader, computeAggregate } from './process/loader.js'

// Sentiment
export {
  DEFAULT_SENTIMENT_THRESHOLDS,
  ThresholdSentimentScorer,
  createVaderScorer,
  scoreReviews,
} from './sentiment/scorer.js'
export type { SentimentBackend, SentimentScorer, SentimentThresholds } from './sentiment/scorer.js'

// Orchestration
export { runHarvest } from './orchestrator.js'
export type { HarvestOptions } from './orchestrator.js'
export { routeFailureRate } from './metrics.js'
