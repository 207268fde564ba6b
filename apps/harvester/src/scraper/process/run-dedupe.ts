/**
 * Batch-Level Deduplication
 *
 * Collapses records that share an identity within one load batch before any
 * database work: listings merge by busId (later records win), reviews collapse
 * by review_id (first occurrence kept). Cross-run duplicates are the store's job.
 */

import type { NormalizedListing, ScoredReview } from '../types.js'

export interface DedupedBatch {
  listings: NormalizedListing[]
  reviews: ScoredReview[]
  /** Listings folded into a later record with the same busId */
  listingsMerged: number
  /** Reviews dropped because an earlier record had the same review_id */
  duplicateInBatch: number
}

export function dedupeBatch(listings: NormalizedListing[], reviews: ScoredReview[]): DedupedBatch {
  const listingsById = new Map<string, NormalizedListing>()
  for (const listing of listings) {
    listingsById.set(listing.busId, listing)
  }

  const reviewsById = new Map<string, ScoredReview>()
  for (const review of reviews) {
    if (!reviewsById.has(review.reviewId)) {
      reviewsById.set(review.reviewId, review)
    }
  }

  return {
    listings: [...listingsById.values()],
    reviews: [...reviewsById.values()],
    listingsMerged: listings.length - listingsById.size,
    duplicateInBatch: reviews.length - reviewsById.size,
  }
}
