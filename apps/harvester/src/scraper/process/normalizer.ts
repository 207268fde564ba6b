/**
 * Normalizer
 *
 * Turns raw listing and review records into canonical ones:
 * - text: whitespace collapsed, review casing preserved
 * - rating: bounded to [0, 5]; unusable values become null + `ratingInvalid`
 * - date: `YYYY-MM-DD`; unusable values become null + `dateInvalid`
 * - bus type: closed taxonomy, `OTHER` + `unmappedBusType` for unknown text
 * - route: split on the first delimiter, whole string as origin otherwise
 *
 * Quality issues never drop a record. Only a listing with no operator (no
 * identity) or a review with an empty body is dropped.
 */

import type {
  BusType,
  DropReason,
  ListingRecord,
  NormalizedListing,
  NormalizedReview,
  NormalizeResult,
  QualityIssue,
  ReviewRecord,
} from '../types.js'
import { matchBusType } from './bus-type.js'
import {
  cleanText,
  combineDeparture,
  parseCount,
  parseDepartureTime,
  parseRating,
  parseReviewDate,
  splitRoute,
} from './fields.js'
import { deriveBusId, deriveReviewId, reviewTextHash } from './identity.js'

export interface ListingContext {
  /** Route the page was fetched for; used when a card shows no route text */
  origin: string
  destination: string
  journeyDate: string | null
  scrapedAt: Date
}

export interface ReviewContext {
  /** listingKey -> busId for the listings normalized from the same page */
  busIdByListingKey: ReadonlyMap<string, string>
  ingestedAt: Date
}

function resolveBusType(
  typeText: string | null,
  busName: string | null
): { busType: BusType; unmapped: boolean } {
  const fromName = busName ? matchBusType(busName) : null

  if (typeText === null) {
    return { busType: fromName ?? 'OTHER', unmapped: false }
  }

  const fromType = matchBusType(typeText) ?? fromName
  return fromType ? { busType: fromType, unmapped: false } : { busType: 'OTHER', unmapped: true }
}

export function normalizeListing(record: ListingRecord, ctx: ListingContext): NormalizeResult<NormalizedListing> {
  const operatorName = cleanText(record.operatorName)
  if (operatorName === null) {
    return { status: 'drop', reason: 'missing_operator' }
  }

  const qualityIssues: QualityIssue[] = []
  const busName = cleanText(record.busName)

  const { busType, unmapped } = resolveBusType(cleanText(record.busType), busName)
  if (unmapped) qualityIssues.push('unmappedBusType')

  const routeText = cleanText(record.routeText)
  const route = routeText
    ? splitRoute(routeText)
    : { origin: cleanText(ctx.origin) ?? ctx.origin, destination: cleanText(ctx.destination) }

  const departureAt = combineDeparture(ctx.journeyDate, parseDepartureTime(record.departureTime))

  const rating = parseRating(record.rating)
  if (rating.invalid) qualityIssues.push('ratingInvalid')

  const busId = deriveBusId({
    operatorName,
    origin: route.origin,
    destination: route.destination,
    departureAt,
    busName,
  })

  return {
    status: 'ok',
    record: {
      busId,
      listingKey: record.listingKey,
      operatorName,
      busName,
      busType,
      origin: route.origin,
      destination: route.destination,
      departureAt,
      sourceRating: rating.value,
      sourceRatingCount: parseCount(record.ratingCount),
      lastScrapedAt: ctx.scrapedAt,
    },
    qualityIssues,
  }
}

export function normalizeReview(record: ReviewRecord, ctx: ReviewContext): NormalizeResult<NormalizedReview> {
  const text = cleanText(record.body)
  if (text === null) {
    return { status: 'drop', reason: 'empty_text' }
  }

  const qualityIssues: QualityIssue[] = []

  const rating = parseRating(record.rating)
  if (rating.invalid) qualityIssues.push('ratingInvalid')

  const date = parseReviewDate(record.date)
  if (date.invalid) qualityIssues.push('dateInvalid')

  const busId = ctx.busIdByListingKey.get(record.listingKey) ?? null
  const textHash = reviewTextHash(text)

  return {
    status: 'ok',
    record: {
      reviewId: deriveReviewId(busId, textHash, date.value),
      busId,
      reviewTextHash: textHash,
      rating: rating.value,
      title: cleanText(record.title),
      text,
      reviewDate: date.value,
      qualityIssues,
      ingestedAt: ctx.ingestedAt,
    },
    qualityIssues,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page batch
// ═══════════════════════════════════════════════════════════════════════════════

export interface NormalizedBatch {
  listings: NormalizedListing[]
  reviews: NormalizedReview[]
  listingDrops: DropReason[]
  reviewDrops: DropReason[]
  /** Every quality issue raised, one entry per occurrence */
  qualityIssues: QualityIssue[]
}

/**
 * Normalize one page's records. Listings go first so reviews can resolve their busId.
 */
export function normalizeBatch(
  listings: ListingRecord[],
  reviews: ReviewRecord[],
  ctx: ListingContext
): NormalizedBatch {
  const batch: NormalizedBatch = {
    listings: [],
    reviews: [],
    listingDrops: [],
    reviewDrops: [],
    qualityIssues: [],
  }
  const busIdByListingKey = new Map<string, string>()

  for (const record of listings) {
    const result = normalizeListing(record, ctx)
    if (result.status === 'drop') {
      batch.listingDrops.push(result.reason)
      continue
    }
    batch.listings.push(result.record)
    batch.qualityIssues.push(...result.qualityIssues)
    busIdByListingKey.set(result.record.listingKey, result.record.busId)
  }

  const reviewCtx: ReviewContext = { busIdByListingKey, ingestedAt: ctx.scrapedAt }
  for (const record of reviews) {
    const result = normalizeReview(record, reviewCtx)
    if (result.status === 'drop') {
      batch.reviewDrops.push(result.reason)
      continue
    }
    batch.reviews.push(result.record)
    batch.qualityIssues.push(...result.qualityIssues)
  }

  return batch
}
