/**
 * Page Fetcher
 *
 * Retrieves one rendered results page for a route task through a BrowserSession.
 *
 * - Waits a randomized delay before every request (including retries)
 * - Retries transient failures (timeouts, detached elements, 403/429/5xx) with
 *   exponential backoff and jitter, up to the policy's max attempts
 * - Terminal signals (end of results, anti-automation challenge) are returned
 *   immediately and never retried, including block pages served with an error
 *   status or a page that never reaches the ready selector
 * - Returns an `aborted` error between attempts once the caller's signal fires
 * - Optionally writes every rendered page to an audit store
 */

import { createHash } from 'crypto'
import type { ILogger } from '@routepulse/logger'
import { loggers } from '../../config/logger.js'
import { FetchError, getErrorMessage } from '../errors.js'
import type { Fetcher, FetchOutcome, PageSignal, RawPage, RouteTask, SiteAdapter } from '../types.js'
import type { AuditStore } from './audit-store.js'
import type { BrowserSession } from './browser.js'
import type { RateLimiter } from './rate-limiter.js'
import type { Clock, RetryPolicy } from './retry-policy.js'
import { DEFAULT_RETRY_POLICY, backoffDelay, systemClock } from './retry-policy.js'

export interface PageFetcherOptions {
  session: BrowserSession
  adapter: SiteAdapter
  rateLimiter: RateLimiter

  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  clock?: Clock

  /** How long to wait for the adapter's ready selector (default: 20000) */
  waitTimeoutMs?: number

  /** Raw page audit store (optional) */
  auditStore?: AuditStore

  logger?: ILogger
}

const DEFAULT_WAIT_TIMEOUT_MS = 20000

/**
 * Raised inside an attempt for an error status whose page is not a block page.
 */
class RetryableStatusError extends Error {
  constructor(readonly status: number) {
    super(`HTTP ${status}`)
    this.name = 'RetryableStatusError'
  }
}

/**
 * Statuses whose body may be a block page. 404 is handled on its own.
 */
function isBlockingStatus(status: number): boolean {
  return status === 403 || status === 429 || status >= 500
}

export function contentHash(html: string): string {
  return createHash('sha256').update(html).digest('hex').slice(0, 32)
}

export class PageFetcher implements Fetcher {
  private readonly session: BrowserSession
  private readonly adapter: SiteAdapter
  private readonly rateLimiter: RateLimiter
  private readonly retryPolicy: RetryPolicy
  private readonly clock: Clock
  private readonly waitTimeoutMs: number
  private readonly auditStore?: AuditStore
  private readonly log: ILogger

  constructor(options: PageFetcherOptions) {
    this.session = options.session
    this.adapter = options.adapter
    this.rateLimiter = options.rateLimiter
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.clock = options.clock ?? systemClock
    this.waitTimeoutMs = options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS
    this.auditStore = options.auditStore
    this.log = options.logger ?? loggers.fetcher
  }

  async fetch(task: RouteTask, signal?: AbortSignal): Promise<FetchOutcome> {
    const url = this.adapter.buildPageUrl(task)
    const { maxAttempts } = this.retryPolicy
    let lastError: unknown = null

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) return this.aborted(task, url, attempt - 1)
      await this.rateLimiter.acquire(signal)
      if (signal?.aborted) return this.aborted(task, url, attempt - 1)

      try {
        return await this.fetchOnce(task, url, attempt)
      } catch (error) {
        lastError = error
        this.log.warn('Transient fetch failure', {
          routeKey: task.routeKey,
          pageIndex: task.cursor.pageIndex,
          attempt,
          maxAttempts,
          reason: getErrorMessage(error),
        })

        if (signal?.aborted) return this.aborted(task, url, attempt)
        if (attempt < maxAttempts) {
          await this.clock.sleep(backoffDelay(this.retryPolicy, attempt), signal)
        }
      }
    }

    if (signal?.aborted) return this.aborted(task, url, maxAttempts)
    return {
      ok: false,
      error: FetchError.transient(
        url,
        maxAttempts,
        `Gave up after ${maxAttempts} attempts: ${getErrorMessage(lastError)}`,
        lastError
      ),
    }
  }

  async close(): Promise<void> {
    await this.session.close()
  }

  /**
   * Single attempt (no retries). Throws on transient failure.
   * Error statuses and pages that never become ready are classified first:
   * a block page or an empty result is terminal, anything else is retried.
   */
  private async fetchOnce(task: RouteTask, url: string, attempt: number): Promise<FetchOutcome> {
    const navigation = await this.session.navigate(url)

    if (navigation.status === 404) {
      return {
        ok: false,
        error: FetchError.terminal('end_of_results', url, attempt, 'Source returned 404 for results page'),
      }
    }
    if (navigation.status !== null && isBlockingStatus(navigation.status)) {
      const terminal = await this.classifyRendered(task, url, attempt)
      if (terminal) return terminal
      throw new RetryableStatusError(navigation.status)
    }

    try {
      await this.session.waitFor(this.adapter.readySelector, this.waitTimeoutMs)
    } catch (error) {
      const terminal = await this.classifyRendered(task, url, attempt)
      if (terminal) return terminal
      throw error
    }

    const page = await this.capture(task, url)
    const outcome = this.terminalFor(this.adapter.classify(page.html), task, url, attempt)
    if (outcome) return outcome

    this.log.debug('Fetched page', {
      routeKey: task.routeKey,
      pageIndex: page.pageIndex,
      byteSize: page.byteSize,
      attempt,
    })
    return { ok: true, page }
  }

  /**
   * Reads whatever the browser is showing after a failed navigation or wait.
   * Returns a terminal outcome for a block page or an empty result, else null.
   */
  private async classifyRendered(task: RouteTask, url: string, attempt: number): Promise<FetchOutcome | null> {
    let page: RawPage
    try {
      page = await this.capture(task, url)
    } catch (error) {
      this.log.debug('Could not read page after failed load', {
        routeKey: task.routeKey,
        reason: getErrorMessage(error),
      })
      return null
    }
    return this.terminalFor(this.adapter.classify(page.html), task, url, attempt)
  }

  private async capture(task: RouteTask, url: string): Promise<RawPage> {
    const html = await this.session.extractHTML()
    const page: RawPage = {
      routeKey: task.routeKey,
      pageIndex: task.cursor.pageIndex,
      url,
      html,
      fetchedAt: this.clock.now(),
      byteSize: Buffer.byteLength(html, 'utf8'),
      contentHash: contentHash(html),
    }
    await this.audit(page)
    return page
  }

  private terminalFor(pageSignal: PageSignal, task: RouteTask, url: string, attempt: number): FetchOutcome | null {
    if (pageSignal === 'challenge') {
      this.log.error('Anti-automation challenge detected', { routeKey: task.routeKey, url })
      return {
        ok: false,
        error: FetchError.terminal('challenge', url, attempt, 'Anti-automation challenge page'),
      }
    }
    if (pageSignal === 'end_of_results') {
      return {
        ok: false,
        error: FetchError.terminal('end_of_results', url, attempt, 'No further results'),
      }
    }
    return null
  }

  private aborted(task: RouteTask, url: string, attempts: number): FetchOutcome {
    this.log.info('Fetch cancelled', { routeKey: task.routeKey, pageIndex: task.cursor.pageIndex, attempts })
    return { ok: false, error: FetchError.aborted(url, attempts) }
  }

  private async audit(page: RawPage): Promise<void> {
    if (!this.auditStore) return
    try {
      await this.auditStore.write(page)
    } catch (error) {
      this.log.warn('Failed to write audit copy', {
        routeKey: page.routeKey,
        pageIndex: page.pageIndex,
        reason: getErrorMessage(error),
      })
    }
  }
}
