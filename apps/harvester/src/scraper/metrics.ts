/**
 * Harvest Metrics
 *
 * Emits structured log events only. Counters live on the RunSummary, which is
 * logged once per run and not persisted.
 */

import { loggers } from '../config/logger.js'
import type { RouteStatus, RunSummary } from './types.js'

const log = loggers.orchestrator

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_ROUTES_FOR_ALERT = 4

export type RunCounters = Pick<RunSummary, 'listings' | 'reviews' | 'qualityIssues' | 'pages'>

export function createRunCounters(): RunCounters {
  return {
    listings: { fetched: 0, malformed: 0, normalized: 0, dropped: 0, duplicateInBatch: 0, inserted: 0, updated: 0 },
    reviews: {
      fetched: 0,
      malformed: 0,
      normalized: 0,
      dropped: 0,
      duplicateInBatch: 0,
      duplicateSkipped: 0,
      inserted: 0,
      rejected: 0,
    },
    qualityIssues: { ratingInvalid: 0, dateInvalid: 0, unmappedBusType: 0 },
    pages: { fetched: 0, loaded: 0, failed: 0 },
  }
}

/**
 * failed / started. Routes that never started do not count.
 */
export function routeFailureRate(summary: RunSummary): number {
  const started = summary.routes.filter((route) => route.status !== 'pending').length
  if (started === 0) return 0
  const failed = summary.routes.filter((route) => route.status === 'failed').length
  return failed / started
}

export function recordRunCompleted(summary: RunSummary): void {
  const countStatus = (status: RouteStatus) => summary.routes.filter((route) => route.status === status).length
  const failureRate = routeFailureRate(summary)

  log.info('HARVEST_RUN_COMPLETED', {
    event_name: 'HARVEST_RUN_COMPLETED',
    runId: summary.runId,
    durationMs: summary.durationMs,
    cancelled: summary.cancelled,
    routesTotal: summary.routes.length,
    routesDone: countStatus('done'),
    routesFailed: countStatus('failed'),
    routesInterrupted: summary.routes.filter((route) => route.interrupted).length,
    routesPending: countStatus('pending'),
    listings: summary.listings,
    reviews: summary.reviews,
    pages: summary.pages,
    qualityIssues: summary.qualityIssues,
    failureRate,
  })

  const started = summary.routes.length - countStatus('pending')
  if (started >= MIN_ROUTES_FOR_ALERT && failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('HARVEST_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'HARVEST_ALERT_HIGH_FAILURE_RATE',
      runId: summary.runId,
      failureRate,
      routesStarted: started,
    })
  }
}

export function recordRouteFailed(payload: {
  runId: string
  routeKey: string
  pageIndex: number | null
  kind: string
  message: string
}): void {
  log.warn('HARVEST_ROUTE_FAILED', {
    event_name: 'HARVEST_ROUTE_FAILED',
    ...payload,
  })
}
