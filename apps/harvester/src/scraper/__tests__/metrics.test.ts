import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockLog } = vi.hoisted(() => ({
  mockLog: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() },
}))

vi.mock('../../config/logger.js', () => ({
  loggers: { orchestrator: mockLog },
}))

import { createRunCounters, recordRouteFailed, recordRunCompleted, routeFailureRate } from '../metrics.js'
import type { RouteOutcome, RouteStatus, RunSummary } from '../types.js'

function route(routeKey: string, status: RouteStatus, interrupted = false): RouteOutcome {
  return {
    routeKey,
    origin: 'A',
    destination: 'B',
    journeyDate: null,
    status,
    interrupted,
    startPageIndex: status === 'pending' ? null : 0,
    lastCommittedPageIndex: null,
    pagesLoaded: 0,
    errors: [],
  }
}

function summary(routes: RouteOutcome[]): RunSummary {
  return {
    runId: 'run-1',
    startedAt: new Date('2024-01-10T06:00:00Z'),
    finishedAt: new Date('2024-01-10T06:05:00Z'),
    durationMs: 300000,
    cancelled: false,
    routes,
    ...createRunCounters(),
  }
}

describe('harvest metrics', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('starts every counter at zero', () => {
    const counters = createRunCounters()
    expect(counters.qualityIssues).toEqual({ ratingInvalid: 0, dateInvalid: 0, unmappedBusType: 0 })
    expect(counters.pages).toEqual({ fetched: 0, loaded: 0, failed: 0 })
    expect(counters.reviews.duplicateSkipped).toBe(0)
  })

  it('computes the failure rate over started routes only', () => {
    expect(routeFailureRate(summary([route('a', 'failed'), route('b', 'done'), route('c', 'pending')]))).toBe(0.5)
    expect(routeFailureRate(summary([route('a', 'pending')]))).toBe(0)
  })

  it('emits the run summary event', () => {
    const run = summary([route('a', 'done'), route('b', 'failed'), route('c', 'in_progress', true), route('d', 'pending')])

    recordRunCompleted(run)

    expect(mockLog.info).toHaveBeenCalledWith('HARVEST_RUN_COMPLETED', {
      event_name: 'HARVEST_RUN_COMPLETED',
      runId: 'run-1',
      durationMs: 300000,
      cancelled: false,
      routesTotal: 4,
      routesDone: 1,
      routesFailed: 1,
      routesInterrupted: 1,
      routesPending: 1,
      listings: run.listings,
      reviews: run.reviews,
      pages: run.pages,
      qualityIssues: run.qualityIssues,
      failureRate: 1 / 3,
    })
    expect(mockLog.warn).not.toHaveBeenCalled()
  })

  it('alerts when most started routes failed', () => {
    recordRunCompleted(
      summary([route('a', 'failed'), route('b', 'failed'), route('c', 'failed'), route('d', 'done')])
    )

    expect(mockLog.warn).toHaveBeenCalledWith('HARVEST_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'HARVEST_ALERT_HIGH_FAILURE_RATE',
      runId: 'run-1',
      failureRate: 0.75,
      routesStarted: 4,
    })
  })

  it('does not alert on small runs', () => {
    recordRunCompleted(summary([route('a', 'failed'), route('b', 'failed')]))
    expect(mockLog.warn).not.toHaveBeenCalled()
  })

  it('emits route failures', () => {
    recordRouteFailed({ runId: 'run-1', routeKey: 'a:b', pageIndex: 2, kind: 'terminal_challenge', message: 'blocked' })

    expect(mockLog.warn).toHaveBeenCalledWith('HARVEST_ROUTE_FAILED', {
      event_name: 'HARVEST_ROUTE_FAILED',
      runId: 'run-1',
      routeKey: 'a:b',
      pageIndex: 2,
      kind: 'terminal_challenge',
      message: 'blocked',
    })
  })
})
