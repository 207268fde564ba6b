/**
 * Stable identities
 *
 * busId and review_id are derived from content, so re-scraping the same bus or
 * the same review always produces the same key.
 *
 * - busId: `bus_` + 32 hex chars of SHA-256 over
 *   `operator|origin|destination|departure|busName`, each part lowercased with
 *   whitespace collapsed (missing parts are empty strings). Every departure time
 *   an operator runs on a route is its own bus.
 * - reviewTextHash: SHA-256 hex of the body, lowercased, whitespace collapsed.
 * - review_id: `rev_` + 32 hex chars of SHA-256 over
 *   `busId|reviewTextHash|reviewDate`.
 */

import { sha256Hex } from '../../utils/hash.js'

const ID_HEX_LENGTH = 32

export function identityPart(value: string | null | undefined): string {
  return (value ?? '').toLowerCase().replace(/\s+/g, ' ').trim()
}

export interface BusIdentity {
  operatorName: string
  origin: string
  destination: string | null
  departureAt: string | null
  busName: string | null
}

export function deriveBusId(identity: BusIdentity): string {
  const key = [
    identity.operatorName,
    identity.origin,
    identity.destination,
    identity.departureAt,
    identity.busName,
  ]
    .map(identityPart)
    .join('|')
  return `bus_${sha256Hex(key).slice(0, ID_HEX_LENGTH)}`
}

export function reviewTextHash(text: string): string {
  return sha256Hex(identityPart(text))
}

export function deriveReviewId(busId: string | null, textHash: string, reviewDate: string | null): string {
  return `rev_${sha256Hex(`${busId ?? ''}|${textHash}|${reviewDate ?? ''}`).slice(0, ID_HEX_LENGTH)}`
}
