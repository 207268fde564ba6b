/**
 * Production wiring
 *
 * Builds HarvestOptions from settings: PostgreSQL stores, the VADER scorer, the
 * redBus adapter, and one Playwright-backed PageFetcher per worker. Each
 * worker's browser scrolls the results and opens review modals before reading.
 */

import { PgBusReviewStore, PgCheckpointStore } from '@routepulse/db'
import type { SqlPool } from '@routepulse/db'
import type { HarvesterSettings } from './config/settings.js'
import { createRedbusAdapter, createRedbusPagePreparation } from './scraper/adapters/redbus/adapter.js'
import { FileAuditStore } from './scraper/fetch/audit-store.js'
import { PlaywrightBrowserSession } from './scraper/fetch/browser.js'
import { PageFetcher } from './scraper/fetch/page-fetcher.js'
import type { PagePreparation } from './scraper/fetch/page-preparation.js'
import { RandomDelayRateLimiter } from './scraper/fetch/rate-limiter.js'
import { DEFAULT_RETRY_POLICY } from './scraper/fetch/retry-policy.js'
import type { RetryPolicy } from './scraper/fetch/retry-policy.js'
import type { HarvestOptions } from './scraper/orchestrator.js'
import { BusReviewLoader } from './scraper/process/loader.js'
import { createVaderScorer } from './scraper/sentiment/scorer.js'
import type { RouteSpec } from './scraper/types.js'

export function retryPolicyFrom(settings: HarvesterSettings): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: settings.retry.maxAttempts,
    baseDelayMs: settings.retry.baseDelayMs,
    maxDelayMs: settings.retry.maxDelayMs,
  }
}

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * `2024-01-31` plus 1 -> `2024-02-01`, in UTC.
 */
export function addDays(isoDate: string, days: number): string {
  const [year = 0, month = 1, day = 1] = isoDate.split('-').map(Number)
  return new Date(Date.UTC(year, month - 1, day) + days * DAY_MS).toISOString().slice(0, 10)
}

/**
 * Each route without a journey date becomes one route per day of the window,
 * starting at `startDate`. Routes that name their own date are kept as given.
 */
export function expandJourneyDates(routes: RouteSpec[], startDate: string, days = 1): RouteSpec[] {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`Day window must be a positive integer, got ${days}`)
  }
  return routes.flatMap((route) =>
    route.journeyDate
      ? [route]
      : Array.from({ length: days }, (_, offset) => ({ ...route, journeyDate: addDays(startDate, offset) }))
  )
}

export function pagePreparationFrom(settings: HarvesterSettings): PagePreparation {
  const preparation = createRedbusPagePreparation({
    pauseMs: settings.preparation.scrollPauseMs,
    stableRounds: settings.preparation.scrollStableRounds,
  })
  return {
    scroll: settings.preparation.scrollStableRounds > 0 ? preparation.scroll : null,
    reviews: settings.preparation.expandReviews ? preparation.reviews : null,
  }
}

export function createHarvestOptions(
  settings: HarvesterSettings,
  pool: SqlPool,
  extra: Pick<HarvestOptions, 'signal'> = {}
): HarvestOptions {
  const adapter = createRedbusAdapter({ baseUrl: settings.sourceBaseUrl })
  const retryPolicy = retryPolicyFrom(settings)
  const auditStore = settings.auditDir ? new FileAuditStore(settings.auditDir) : undefined
  const preparation = pagePreparationFrom(settings)

  return {
    adapter,
    checkpoints: new PgCheckpointStore(pool),
    loader: new BusReviewLoader(new PgBusReviewStore(pool)),
    scorer: createVaderScorer(settings.sentiment),
    concurrency: settings.concurrency,
    deadlineMs: settings.deadlineMs,
    maxPagesPerRoute: settings.maxPagesPerRoute,
    signal: extra.signal,

    createFetcher: async () => {
      const session = await PlaywrightBrowserSession.launch({
        headless: settings.browser.headless,
        executablePath: settings.browser.executablePath ?? undefined,
        navigationTimeoutMs: settings.browser.navigationTimeoutMs,
        preparation,
      })
      return new PageFetcher({
        session,
        adapter,
        rateLimiter: new RandomDelayRateLimiter(settings.rateLimit),
        retryPolicy,
        waitTimeoutMs: settings.browser.navigationTimeoutMs,
        auditStore,
      })
    },
  }
}
