/**
 * redBus Adapter
 *
 * Search results are JavaScript-rendered; the fetcher hands us the rendered HTML.
 * Extraction strategy:
 * 1. Classify the page (challenge, end of results, results) before parsing
 * 2. Walk bus cards; each card yields one listing plus the reviews rendered inside it
 * 3. Optional fields come back as null, never as a thrown error
 */

import * as cheerio from 'cheerio'
import { ParseError } from '../../errors.js'
import type { PagePreparation, ScrollPreparation } from '../../fetch/page-preparation.js'
import type {
  ListingRecord,
  PageSignal,
  ParseOutcome,
  RawPage,
  ReviewRecord,
  RouteTask,
  SiteAdapter,
} from '../../types.js'
import { CHALLENGE_PHRASES, END_OF_RESULTS_PHRASES, SELECTORS } from './selectors.js'

const ADAPTER_ID = 'redbus'
const ADAPTER_VERSION = '1.0.0'
export const DEFAULT_BASE_URL = 'https://www.redbus.in'

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'] as const

/**
 * `2024-01-10` -> `10-JAN-2024`, the search form's date format.
 */
export function formatJourneyDate(isoDate: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate)
  const month = match ? MONTHS[Number(match[2]) - 1] : undefined
  if (!match || !month) {
    throw new RangeError(`Journey date must be YYYY-MM-DD, got "${isoDate}"`)
  }
  return `${match[3]}-${month}-${match[1]}`
}

function splitSelector(selector: string): string[] {
  return selector.split(',').map((part) => part.trim())
}

/**
 * Ready once any of results, end marker or challenge is in the DOM.
 */
const READY_SELECTOR = [SELECTORS.listingContainer, SELECTORS.endOfResults, SELECTORS.challenge].join(', ')

export interface RedbusAdapterOptions {
  baseUrl?: string
}

export function createRedbusAdapter(options: RedbusAdapterOptions = {}): SiteAdapter {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')

  return {
    id: ADAPTER_ID,
    version: ADAPTER_VERSION,
    readySelector: READY_SELECTOR,

    buildPageUrl(task: RouteTask): string {
      const params = new URLSearchParams({
        fromCityName: task.origin,
        toCityName: task.destination,
      })
      if (task.journeyDate) {
        params.set('doj', formatJourneyDate(task.journeyDate))
      }
      params.set('page', String(task.cursor.pageIndex + 1))
      return `${baseUrl}/search?${params.toString()}`
    },

    classify,
    parse,
  }
}

export const redbusAdapter = createRedbusAdapter()

const REVIEW_MODAL_TIMEOUT_MS = 5000
const MAX_SCROLL_ROUNDS = 200

/**
 * Scroll the results list to its end, then open each bus's review modal.
 */
export function createRedbusPagePreparation(
  scroll: Pick<ScrollPreparation, 'pauseMs' | 'stableRounds'>
): PagePreparation {
  return {
    scroll: { ...scroll, maxRounds: MAX_SCROLL_ROUNDS },
    reviews: {
      cardSelector: SELECTORS.busCard,
      keyAttribute: 'data-busid',
      triggerSelector: SELECTORS.reviewTrigger,
      panelSelector: SELECTORS.reviewModal,
      closeSelector: SELECTORS.reviewModalClose,
      waitTimeoutMs: REVIEW_MODAL_TIMEOUT_MS,
      captureClass: 'review-modal-capture',
    },
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

function classify(html: string): PageSignal {
  const $ = cheerio.load(html)

  if ($(SELECTORS.challenge).length > 0) return 'challenge'

  const container = $(SELECTORS.listingContainer)
  if (container.find(SELECTORS.busCard).length > 0) return 'results'

  const bodyText = $('body').text().toLowerCase()
  if (CHALLENGE_PHRASES.some((phrase) => bodyText.includes(phrase))) return 'challenge'

  if ($(SELECTORS.endOfResults).length > 0) return 'end_of_results'
  if (END_OF_RESULTS_PHRASES.some((phrase) => bodyText.includes(phrase))) return 'end_of_results'

  // An empty results list is the last page
  if (container.length > 0) return 'end_of_results'

  // No container at all: let parse() report the malformed page
  return 'results'
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

function parse(page: RawPage): ParseOutcome {
  const $ = cheerio.load(page.html)
  const container = $(SELECTORS.listingContainer).first()

  if (container.length === 0) {
    return {
      ok: false,
      error: new ParseError('malformed_page', `Listing container not found on ${page.url}`),
    }
  }

  const listings: ListingRecord[] = []
  const reviews: ReviewRecord[] = []
  const malformed: ParseError[] = []

  container.find(SELECTORS.busCard).each((index, element) => {
    const card = $(element)
    const listingKey = card.attr('data-busid')?.trim() || `card-${index}`

    const textIn = (selector: string): string | null => {
      for (const part of splitSelector(selector)) {
        const node = card.find(part).first()
        if (node.length > 0) return node.text()
      }
      return null
    }

    const operatorName = textIn(SELECTORS.operator)
    if (operatorName === null) {
      malformed.push(
        new ParseError('malformed_record', `Bus card ${listingKey} has no operator element`, {
          recordType: 'listing',
          listingKey,
        })
      )
      return
    }

    listings.push({
      listingKey,
      operatorName,
      busName: textIn(SELECTORS.busName),
      busType: textIn(SELECTORS.busType),
      routeText: textIn(SELECTORS.route),
      departureTime: textIn(SELECTORS.departureTime),
      rating: textIn(SELECTORS.rating),
      ratingCount: textIn(SELECTORS.ratingCount),
    })

    card.find(SELECTORS.reviewCard).each((reviewIndex, reviewElement) => {
      const reviewCard = $(reviewElement)

      const reviewText = (selector: string): string | null => {
        for (const part of splitSelector(selector)) {
          const node = reviewCard.find(part).first()
          if (node.length > 0) return node.text()
        }
        return null
      }

      const body = reviewText(SELECTORS.reviewBody)
      if (body === null) {
        malformed.push(
          new ParseError('malformed_record', `Review ${reviewIndex} of ${listingKey} has no body element`, {
            recordType: 'review',
            listingKey,
          })
        )
        return
      }

      reviews.push({
        listingKey,
        rating: reviewText(SELECTORS.reviewRating),
        title: reviewText(SELECTORS.reviewTitle),
        body,
        date: reviewText(SELECTORS.reviewDate),
      })
    })
  })

  return { ok: true, listings, reviews, malformed }
}
