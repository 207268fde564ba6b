/**
 * Deduplicator & Loader
 *
 * Writes one page's normalized listings and scored reviews:
 * 1. Collapse in-batch duplicates (see run-dedupe)
 * 2. Per bus, one transaction: upsert the listing, insert reviews whose key is
 *    new, recompute avg_rating / rating_count from every stored rating
 * 3. Reviews without a resolvable bus are rejected and reported, never written
 *
 * Store failures roll back the bus transaction and surface as LoadError.
 */

import type { BusAggregate, BusReviewStore, BusRow, ReviewRow, ReviewStat, UpsertOutcome } from '@routepulse/db'
import { StoreError } from '@routepulse/db'
import type { ILogger } from '@routepulse/logger'
import { loggers } from '../../config/logger.js'
import { LoadError, getErrorMessage } from '../errors.js'
import type { Loader, LoadReport, NormalizedListing, ReviewRejection, ScoredReview } from '../types.js'
import { dedupeBatch } from './run-dedupe.js'

export function toBusRow(listing: NormalizedListing): BusRow {
  return {
    busId: listing.busId,
    operatorName: listing.operatorName,
    busName: listing.busName,
    busType: listing.busType,
    origin: listing.origin,
    destination: listing.destination,
    departureAt: listing.departureAt,
    lastScrapedAt: listing.lastScrapedAt,
  }
}

export function toReviewRow(review: ScoredReview, busId: string): ReviewRow {
  return {
    reviewId: review.reviewId,
    busId,
    reviewTextHash: review.reviewTextHash,
    rating: review.rating,
    reviewTitle: review.title,
    reviewText: review.text,
    reviewDate: review.reviewDate,
    sentimentLabel: review.sentiment.label,
    sentimentScore: review.sentiment.value,
    qualityIssues: [...review.qualityIssues],
    ingestedAt: review.ingestedAt,
  }
}

/**
 * Mean of the non-null ratings, plus the share of reviews carrying each
 * polar sentiment label. Shares count every review, rated or not.
 */
export function computeAggregate(stats: ReviewStat[]): BusAggregate {
  const rated = stats.map((stat) => stat.rating).filter((rating): rating is number => rating !== null)
  const avgRating = rated.length === 0 ? null : rated.reduce((total, rating) => total + rating, 0) / rated.length
  const share = (label: ReviewStat['sentimentLabel']): number | null =>
    stats.length === 0 ? null : stats.filter((stat) => stat.sentimentLabel === label).length / stats.length

  return {
    avgRating,
    ratingCount: rated.length,
    sentimentPositive: share('positive'),
    sentimentNegative: share('negative'),
  }
}

export function toLoadError(error: unknown, busId: string): LoadError {
  if (error instanceof LoadError) return error
  if (error instanceof StoreError) {
    return new LoadError(error.kind, `Load failed for ${busId}: ${error.message}`, busId, { cause: error })
  }
  return new LoadError('query_failed', `Load failed for ${busId}: ${getErrorMessage(error)}`, busId, {
    cause: error,
  })
}

interface BusLoadResult {
  /** null when the batch had no listing for this bus */
  outcome: UpsertOutcome | null
  busKnown: boolean
  inserted: number
  skipped: number
}

export function emptyLoadReport(): LoadReport {
  return {
    listingsInserted: 0,
    listingsUpdated: 0,
    listingsMerged: 0,
    reviewsInserted: 0,
    duplicateSkipped: 0,
    duplicateInBatch: 0,
    rejected: 0,
    rejections: [],
  }
}

export class BusReviewLoader implements Loader {
  private readonly log: ILogger

  constructor(
    private readonly store: BusReviewStore,
    logger?: ILogger
  ) {
    this.log = logger ?? loggers.loader
  }

  async load(listings: NormalizedListing[], reviews: ScoredReview[]): Promise<LoadReport> {
    const batch = dedupeBatch(listings, reviews)
    const report = emptyLoadReport()
    report.listingsMerged = batch.listingsMerged
    report.duplicateInBatch = batch.duplicateInBatch

    const listingById = new Map(batch.listings.map((listing) => [listing.busId, listing] as const))
    const reviewsByBus = new Map<string, ScoredReview[]>()
    const rejections: ReviewRejection[] = []

    for (const review of batch.reviews) {
      if (review.busId === null) {
        rejections.push({ reviewId: review.reviewId, busId: null, reason: 'missing_bus_id' })
        continue
      }
      const group = reviewsByBus.get(review.busId) ?? []
      group.push(review)
      reviewsByBus.set(review.busId, group)
    }

    const busIds = new Set([...listingById.keys(), ...reviewsByBus.keys()])

    for (const busId of busIds) {
      const busReviews = reviewsByBus.get(busId) ?? []
      const result = await this.loadBus(busId, listingById.get(busId) ?? null, busReviews)

      if (!result.busKnown) {
        for (const review of busReviews) {
          rejections.push({ reviewId: review.reviewId, busId, reason: 'unknown_bus' })
        }
        continue
      }

      if (result.outcome === 'inserted') report.listingsInserted++
      if (result.outcome === 'updated') report.listingsUpdated++
      report.reviewsInserted += result.inserted
      report.duplicateSkipped += result.skipped
    }

    report.rejections = rejections
    report.rejected = rejections.length

    if (rejections.length > 0) {
      this.log.warn('Rejected reviews without a resolvable bus', {
        rejected: rejections.length,
        reasons: rejections.map((rejection) => rejection.reason),
        reviewIds: rejections.slice(0, 10).map((rejection) => rejection.reviewId),
      })
    }

    this.log.debug('Loaded batch', {
      listingsInserted: report.listingsInserted,
      listingsUpdated: report.listingsUpdated,
      reviewsInserted: report.reviewsInserted,
      duplicateSkipped: report.duplicateSkipped,
      duplicateInBatch: report.duplicateInBatch,
    })

    return report
  }

  /**
   * Everything for one bus commits together or not at all.
   */
  private async loadBus(
    busId: string,
    listing: NormalizedListing | null,
    reviews: ScoredReview[]
  ): Promise<BusLoadResult> {
    try {
      return await this.store.withTransaction(async (tx) => {
        let outcome: UpsertOutcome | null = null
        if (listing) {
          outcome = await tx.upsertBus(toBusRow(listing))
        } else if (!(await tx.busExists(busId))) {
          return { outcome: null, busKnown: false, inserted: 0, skipped: 0 }
        }

        let inserted = 0
        let skipped = 0
        for (const review of reviews) {
          if (await tx.insertReviewIfAbsent(toReviewRow(review, busId))) {
            inserted++
          } else {
            skipped++
          }
        }

        await tx.updateBusAggregate(busId, computeAggregate(await tx.listReviewStats(busId)))
        return { outcome, busKnown: true, inserted, skipped }
      })
    } catch (error) {
      const loadError = toLoadError(error, busId)
      this.log.error('Bus transaction rolled back', { busId, kind: loadError.kind }, error)
      throw loadError
    }
  }
}
