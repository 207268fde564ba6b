import { readFileSync } from 'fs'
import { vi } from 'vitest'
import { CheckpointError, StoreError } from '@routepulse/db'
import type {
  BusAggregate,
  BusReviewStore,
  BusReviewTransaction,
  BusRow,
  Checkpoint,
  CheckpointAdvance,
  CheckpointStore,
  ReviewRow,
} from '@routepulse/db'
import type { ILogger } from '@routepulse/logger'
import type { BrowserSession, NavigationResult } from '../fetch/browser.js'
import type { Clock } from '../fetch/retry-policy.js'

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8')
}

export function createMockLogger(): ILogger {
  const log: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => log),
  }
  return log
}

// ═══════════════════════════════════════════════════════════════════════════════
// Time
// ═══════════════════════════════════════════════════════════════════════════════

export class FakeClock implements Clock {
  readonly sleeps: number[] = []
  private current: number

  constructor(start = new Date('2024-01-10T06:00:00Z')) {
    this.current = start.getTime()
  }

  now(): Date {
    return new Date(this.current)
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms)
    this.current += ms
  }

  advance(ms: number): void {
    this.current += ms
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Browser
// ═══════════════════════════════════════════════════════════════════════════════

export interface SessionStep {
  status?: number | null
  html?: string
  navigateError?: Error
  waitError?: Error
}

/**
 * Plays back one step per navigate() call. The last step repeats once the script runs out.
 */
export class ScriptedBrowserSession implements BrowserSession {
  readonly visited: string[] = []
  closed = false
  private current: SessionStep = {}

  /** Runs on every navigate(), before the step plays */
  onNavigate: ((url: string) => void) | null = null

  constructor(private readonly steps: SessionStep[]) {}

  async navigate(url: string): Promise<NavigationResult> {
    this.visited.push(url)
    this.onNavigate?.(url)
    this.current = this.steps[Math.min(this.visited.length, this.steps.length) - 1] ?? {}
    if (this.current.navigateError) throw this.current.navigateError
    return { status: this.current.status === undefined ? 200 : this.current.status, url }
  }

  async waitFor(_selector: string, _timeoutMs: number): Promise<void> {
    if (this.current.waitError) throw this.current.waitError
  }

  async extractHTML(): Promise<string> {
    return this.current.html ?? '<html><body></body></html>'
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stores
// ═══════════════════════════════════════════════════════════════════════════════

export type StoredBus = BusRow & BusAggregate

export type TransactionOperation = 'upsertBus' | 'insertReviewIfAbsent' | 'updateBusAggregate'

/**
 * Copy-on-write transactions over two maps. A throw inside `work` leaves both untouched.
 */
export class InMemoryBusReviewStore implements BusReviewStore {
  buses = new Map<string, StoredBus>()
  reviews = new Map<string, ReviewRow>()
  commits = 0
  rollbacks = 0

  /** Return an error to make that operation fail */
  failWith: ((operation: TransactionOperation, busId: string) => Error | null) | null = null

  async withTransaction<T>(work: (tx: BusReviewTransaction) => Promise<T>): Promise<T> {
    const buses = new Map(this.buses)
    const reviews = new Map(this.reviews)

    const check = (operation: TransactionOperation, busId: string): void => {
      const error = this.failWith?.(operation, busId)
      if (error) throw error
    }

    const tx: BusReviewTransaction = {
      upsertBus: async (row) => {
        check('upsertBus', row.busId)
        const existing = buses.get(row.busId)
        buses.set(row.busId, {
          ...row,
          avgRating: existing?.avgRating ?? null,
          ratingCount: existing?.ratingCount ?? 0,
          sentimentPositive: existing?.sentimentPositive ?? null,
          sentimentNegative: existing?.sentimentNegative ?? null,
        })
        return existing ? 'updated' : 'inserted'
      },
      busExists: async (busId) => buses.has(busId),
      insertReviewIfAbsent: async (row) => {
        check('insertReviewIfAbsent', row.busId)
        if (!buses.has(row.busId)) {
          throw new StoreError('foreign_key_violation', `bus ${row.busId} does not exist`, '23503')
        }
        if (reviews.has(row.reviewId)) return false
        reviews.set(row.reviewId, row)
        return true
      },
      listReviewStats: async (busId) =>
        [...reviews.values()]
          .filter((review) => review.busId === busId)
          .map((review) => ({ rating: review.rating, sentimentLabel: review.sentimentLabel })),
      updateBusAggregate: async (busId, aggregate) => {
        check('updateBusAggregate', busId)
        const bus = buses.get(busId)
        if (bus) buses.set(busId, { ...bus, ...aggregate })
      },
    }

    try {
      const result = await work(tx)
      this.buses = buses
      this.reviews = reviews
      this.commits++
      return result
    } catch (error) {
      this.rollbacks++
      throw error
    }
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  readonly checkpoints = new Map<string, Checkpoint>()
  readonly advances: Array<{ routeKey: string } & CheckpointAdvance> = []
  loadError: Error | null = null

  constructor(private readonly clock: Clock = new FakeClock()) {}

  async load(routeKey: string): Promise<Checkpoint | null> {
    if (this.loadError) throw this.loadError
    return this.checkpoints.get(routeKey) ?? null
  }

  async advance(routeKey: string, next: CheckpointAdvance): Promise<Checkpoint> {
    const existing = this.checkpoints.get(routeKey)
    if (existing && existing.lastPageIndex >= next.pageIndex) {
      throw new CheckpointError(routeKey, `Checkpoint for ${routeKey} is already at or beyond page ${next.pageIndex}`)
    }
    const checkpoint: Checkpoint = {
      routeKey,
      lastPageIndex: next.pageIndex,
      reviewCursor: next.reviewCursor,
      updatedAt: this.clock.now(),
    }
    this.checkpoints.set(routeKey, checkpoint)
    this.advances.push({ routeKey, ...next })
    return checkpoint
  }

  seed(routeKey: string, lastPageIndex: number, reviewCursor: string | null = null): void {
    this.checkpoints.set(routeKey, { routeKey, lastPageIndex, reviewCursor, updatedAt: this.clock.now() })
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page builders
// ═══════════════════════════════════════════════════════════════════════════════

export interface CardReview {
  rating?: string
  title?: string
  body: string
  date?: string
}

export interface CardSpec {
  key: string
  operator: string
  busName?: string
  busType?: string
  route?: string
  time?: string
  rating?: string
  reviews?: CardReview[]
}

function optional(className: string, value: string | undefined): string {
  return value === undefined ? '' : `<span class="${className}">${value}</span>`
}

export function busCardHtml(card: CardSpec): string {
  const reviews = (card.reviews ?? [])
    .map(
      (review) =>
        `<div class="review-card">${optional('rating', review.rating)}${optional('title', review.title)}` +
        `<p class="comment">${review.body}</p>${optional('review-date', review.date)}</div>`
    )
    .join('')

  return (
    `<li class="bus-item" data-busid="${card.key}">` +
    `<div class="travels">${card.operator}</div>` +
    optional('bus-name', card.busName) +
    optional('bus-type', card.busType) +
    optional('route-info', card.route) +
    optional('dp-time', card.time) +
    (card.rating === undefined ? '' : `<div class="rating-sec"><span class="rating">${card.rating}</span></div>`) +
    reviews +
    `</li>`
  )
}

export function resultsPageHtml(cards: CardSpec[]): string {
  return `<html><body><ul class="bus-items">${cards.map(busCardHtml).join('')}</ul></body></html>`
}

export const END_OF_RESULTS_HTML = '<html><body><div class="no-bus-found">Oops! No buses found</div></body></html>'

export const CHALLENGE_HTML = '<html><body><div id="captcha"></div></body></html>'
