/**
 * Run Orchestrator
 *
 * Drives a set of routes through fetch -> parse -> normalize -> score -> load ->
 * checkpoint under a bounded worker pool.
 *
 * - At most one worker per route key (keys are de-duplicated before scheduling)
 * - Pages within a route are strictly sequential; page N+1 is fetched only after
 *   page N is loaded and its checkpoint advanced
 * - Each worker owns its own fetcher (browser session + rate limiter)
 * - Cancellation or deadline: no new fetch starts, in-flight page work finishes,
 *   and the run returns a partial summary
 *
 * Route state machine: pending -> in_progress -> done | failed. A route stopped
 * by cancellation stays in_progress with `interrupted: true`.
 */

import { createId } from '@paralleldrive/cuid2'
import pLimit from 'p-limit'
import type { CheckpointStore } from '@routepulse/db'
import { CheckpointError, StoreError } from '@routepulse/db'
import type { ILogger } from '@routepulse/logger'
import { loggers } from '../config/logger.js'
import { FetchError, LoadError, ParseError, getErrorMessage } from './errors.js'
import type { Clock } from './fetch/retry-policy.js'
import { systemClock } from './fetch/retry-policy.js'
import { createRunCounters, recordRouteFailed, recordRunCompleted } from './metrics.js'
import type { RunCounters } from './metrics.js'
import { normalizeBatch } from './process/normalizer.js'
import { createRouteTask } from './routes.js'
import type { SentimentScorer } from './sentiment/scorer.js'
import { scoreReviews } from './sentiment/scorer.js'
import type {
  Fetcher,
  Loader,
  RawPage,
  RouteErrorEntry,
  RouteOutcome,
  RouteSpec,
  RouteTask,
  RunSummary,
  SiteAdapter,
} from './types.js'

export interface HarvestOptions {
  adapter: SiteAdapter
  checkpoints: CheckpointStore
  loader: Loader
  scorer: SentimentScorer

  /** Called once per worker; the fetcher is closed when the route ends */
  createFetcher: () => Promise<Fetcher>

  /** Parallel routes (default: 2) */
  concurrency?: number

  /** Stop starting new fetches this many ms after the run starts */
  deadlineMs?: number | null

  /** External cancellation */
  signal?: AbortSignal

  /** Pages to process per route in this run; the route ends as done at the limit */
  maxPagesPerRoute?: number | null

  clock?: Clock
  runId?: string
  logger?: ILogger
}

const DEFAULT_CONCURRENCY = 2

interface RunContext {
  runId: string
  options: HarvestOptions
  counters: RunCounters
  inFlight: Set<string>
  log: ILogger
  stopRequested: () => boolean
  /** Aborts once the run stops, so in-flight fetches give up their retries */
  fetchSignal: AbortSignal
}

export function describeError(error: unknown): Omit<RouteErrorEntry, 'pageIndex'> {
  const message = getErrorMessage(error)
  if (error instanceof FetchError) {
    return { kind: error.kind === 'terminal' ? `terminal_${error.reason ?? 'unknown'}` : error.kind, message }
  }
  if (error instanceof ParseError || error instanceof LoadError) {
    return { kind: error.kind, message }
  }
  if (error instanceof CheckpointError) {
    return { kind: 'checkpoint', message }
  }
  if (error instanceof StoreError) {
    return { kind: error.kind, message }
  }
  return { kind: 'unexpected', message }
}

/**
 * Collapse routes that share a route key, keeping the first.
 */
export function planRoutes(routes: RouteSpec[], log: ILogger = loggers.orchestrator): RouteTask[] {
  const tasks = new Map<string, RouteTask>()
  for (const route of routes) {
    const task = createRouteTask(route)
    if (tasks.has(task.routeKey)) {
      log.warn('Duplicate route ignored', { routeKey: task.routeKey })
      continue
    }
    tasks.set(task.routeKey, task)
  }
  return [...tasks.values()]
}

function initialOutcome(task: RouteTask): RouteOutcome {
  return {
    routeKey: task.routeKey,
    origin: task.origin,
    destination: task.destination,
    journeyDate: task.journeyDate,
    status: 'pending',
    interrupted: false,
    startPageIndex: null,
    lastCommittedPageIndex: null,
    pagesLoaded: 0,
    errors: [],
  }
}

export async function runHarvest(routes: RouteSpec[], options: HarvestOptions): Promise<RunSummary> {
  const clock = options.clock ?? systemClock
  const log = options.logger ?? loggers.orchestrator
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`)
  }

  const startedAt = clock.now()
  const runId = options.runId ?? createId()
  const deadlineAt = options.deadlineMs != null ? startedAt.getTime() + options.deadlineMs : null

  const fetchAbort = new AbortController()
  const abortFetches = (): void => fetchAbort.abort()
  options.signal?.addEventListener('abort', abortFetches, { once: true })

  let stopped = false
  const stopRequested = (): boolean => {
    if (!stopped) {
      stopped = options.signal?.aborted === true || (deadlineAt !== null && clock.now().getTime() >= deadlineAt)
      if (stopped) abortFetches()
    }
    return stopped
  }

  const tasks = planRoutes(routes, log)
  const outcomes = tasks.map(initialOutcome)
  const ctx: RunContext = {
    runId,
    options,
    counters: createRunCounters(),
    inFlight: new Set(),
    log,
    stopRequested,
    fetchSignal: fetchAbort.signal,
  }

  log.info('Harvest run started', { runId, routes: tasks.length, concurrency })

  const limit = pLimit(concurrency)
  try {
    await Promise.all(
      tasks.map((task, index) => {
        const outcome = outcomes[index]
        return outcome ? limit(() => runRoute(task, outcome, ctx)) : Promise.resolve()
      })
    )
  } finally {
    options.signal?.removeEventListener('abort', abortFetches)
  }

  const finishedAt = clock.now()
  const summary: RunSummary = {
    runId,
    startedAt,
    finishedAt,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    cancelled: stopped || options.signal?.aborted === true,
    routes: outcomes,
    ...ctx.counters,
  }

  recordRunCompleted(summary)
  return summary
}

// ═══════════════════════════════════════════════════════════════════════════════
// Route worker
// ═══════════════════════════════════════════════════════════════════════════════

function failRoute(task: RouteTask, outcome: RouteOutcome, error: unknown, ctx: RunContext): void {
  const entry: RouteErrorEntry = { pageIndex: task.cursor.pageIndex, ...describeError(error) }
  task.status = 'failed'
  outcome.status = 'failed'
  outcome.errors.push(entry)
  recordRouteFailed({ runId: ctx.runId, routeKey: task.routeKey, ...entry })
}

async function runRoute(task: RouteTask, outcome: RouteOutcome, ctx: RunContext): Promise<void> {
  const { checkpoints, createFetcher } = ctx.options
  const log = ctx.log.child({ routeKey: task.routeKey })

  // Never started: stays pending for the next run
  if (ctx.stopRequested()) return

  if (ctx.inFlight.has(task.routeKey)) {
    log.error('Route already has an active worker')
    return
  }
  ctx.inFlight.add(task.routeKey)

  task.status = 'in_progress'
  outcome.status = 'in_progress'

  let fetcher: Fetcher | null = null
  try {
    const checkpoint = await checkpoints.load(task.routeKey)
    task.cursor = checkpoint
      ? { pageIndex: checkpoint.lastPageIndex + 1, reviewCursor: checkpoint.reviewCursor }
      : { pageIndex: 0, reviewCursor: null }
    outcome.startPageIndex = task.cursor.pageIndex
    log.info('Route started', { startPageIndex: task.cursor.pageIndex })

    fetcher = await createFetcher()
    await processPages(task, outcome, fetcher, ctx, log)
  } catch (error) {
    failRoute(task, outcome, error, ctx)
  } finally {
    if (fetcher) {
      try {
        await fetcher.close()
      } catch (error) {
        log.warn('Failed to close fetcher', { reason: getErrorMessage(error) })
      }
    }
    ctx.inFlight.delete(task.routeKey)
  }

  log.info('Route finished', {
    status: outcome.status,
    interrupted: outcome.interrupted,
    pagesLoaded: outcome.pagesLoaded,
    lastCommittedPageIndex: outcome.lastCommittedPageIndex,
  })
}

async function processPages(
  task: RouteTask,
  outcome: RouteOutcome,
  fetcher: Fetcher,
  ctx: RunContext,
  log: ILogger
): Promise<void> {
  const maxPages = ctx.options.maxPagesPerRoute ?? null
  let pagesThisRun = 0

  while (true) {
    if (ctx.stopRequested()) {
      outcome.interrupted = true
      log.info('Route interrupted', { nextPageIndex: task.cursor.pageIndex })
      return
    }

    if (maxPages !== null && pagesThisRun >= maxPages) {
      task.status = 'done'
      outcome.status = 'done'
      log.warn('Page limit reached; remaining pages left for the next run', {
        maxPagesPerRoute: maxPages,
        nextPageIndex: task.cursor.pageIndex,
      })
      return
    }

    const fetched = await fetcher.fetch({ ...task, cursor: { ...task.cursor } }, ctx.fetchSignal)

    if (!fetched.ok) {
      // Cancelled mid-fetch: nothing committed, resume from the same page
      if (fetched.error.kind === 'aborted') {
        ctx.stopRequested()
        outcome.interrupted = true
        log.info('Route interrupted', { nextPageIndex: task.cursor.pageIndex })
        return
      }
      if (fetched.error.isEndOfResults) {
        task.status = 'done'
        outcome.status = 'done'
        return
      }
      ctx.counters.pages.failed++
      failRoute(task, outcome, fetched.error, ctx)
      return
    }

    ctx.counters.pages.fetched++
    try {
      await processPage(fetched.page, task, ctx, log)
    } catch (error) {
      ctx.counters.pages.failed++
      throw error
    }

    outcome.pagesLoaded++
    outcome.lastCommittedPageIndex = fetched.page.pageIndex
    pagesThisRun++
  }
}

/**
 * Parse, normalize, score and load one page, then advance the checkpoint.
 * Throws on malformed page, load failure or checkpoint failure; the checkpoint is
 * untouched in every failure case.
 */
async function processPage(page: RawPage, task: RouteTask, ctx: RunContext, log: ILogger): Promise<void> {
  const { adapter, loader, scorer, checkpoints } = ctx.options
  const { counters } = ctx

  const parsed = adapter.parse(page)
  if (!parsed.ok) throw parsed.error

  for (const error of parsed.malformed) {
    if (error.recordType === 'listing') counters.listings.malformed++
    else counters.reviews.malformed++
    loggers.parser.warn('Skipped malformed record', {
      routeKey: page.routeKey,
      pageIndex: page.pageIndex,
      recordType: error.recordType,
      listingKey: error.listingKey,
      reason: error.message,
    })
  }

  counters.listings.fetched += parsed.listings.length
  counters.reviews.fetched += parsed.reviews.length

  const batch = normalizeBatch(parsed.listings, parsed.reviews, {
    origin: task.origin,
    destination: task.destination,
    journeyDate: task.journeyDate,
    scrapedAt: page.fetchedAt,
  })

  counters.listings.normalized += batch.listings.length
  counters.listings.dropped += batch.listingDrops.length
  counters.reviews.normalized += batch.reviews.length
  counters.reviews.dropped += batch.reviewDrops.length
  for (const issue of batch.qualityIssues) counters.qualityIssues[issue]++

  const report = await loader.load(batch.listings, scoreReviews(batch.reviews, scorer))

  counters.listings.inserted += report.listingsInserted
  counters.listings.updated += report.listingsUpdated
  counters.listings.duplicateInBatch += report.listingsMerged
  counters.reviews.inserted += report.reviewsInserted
  counters.reviews.duplicateSkipped += report.duplicateSkipped
  counters.reviews.duplicateInBatch += report.duplicateInBatch
  counters.reviews.rejected += report.rejected

  const reviewCursor = batch.reviews.at(-1)?.reviewId ?? null
  await checkpoints.advance(page.routeKey, { pageIndex: page.pageIndex, reviewCursor })
  counters.pages.loaded++

  task.cursor = { pageIndex: page.pageIndex + 1, reviewCursor }

  log.info('Page committed', {
    pageIndex: page.pageIndex,
    listings: batch.listings.length,
    reviews: batch.reviews.length,
    reviewsInserted: report.reviewsInserted,
    duplicateSkipped: report.duplicateSkipped,
  })
}
