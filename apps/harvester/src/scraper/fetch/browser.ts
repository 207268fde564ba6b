/**
 * Browser Session
 *
 * The fetcher only needs four capabilities from a browser: navigate, wait for an
 * element, read the rendered HTML, and close. Anything that implements
 * BrowserSession can stand in (tests use an in-process fake).
 * The Playwright session can prepare the page (scrolling, opening review
 * panels) as part of reading it; see page-preparation.ts.
 */

import { chromium, errors } from 'playwright-core'
import type { Browser, BrowserContext, Page } from 'playwright-core'
import type { ILogger } from '@routepulse/logger'
import { loggers } from '../../config/logger.js'
import { PlaywrightPageDriver, preparePage } from './page-preparation.js'
import type { PagePreparation } from './page-preparation.js'
import type { Clock } from './retry-policy.js'
import { systemClock } from './retry-policy.js'

export interface NavigationResult {
  /** HTTP status of the main document, null when the browser reports none */
  status: number | null
  /** Final URL after redirects */
  url: string
}

export interface BrowserSession {
  navigate(url: string): Promise<NavigationResult>
  /** Resolves once `selector` is attached; rejects with BrowserSessionError on timeout */
  waitFor(selector: string, timeoutMs: number): Promise<void>
  extractHTML(): Promise<string>
  close(): Promise<void>
}

export type BrowserSessionErrorKind = 'timeout' | 'detached' | 'closed' | 'navigation'

export class BrowserSessionError extends Error {
  readonly kind: BrowserSessionErrorKind

  constructor(kind: BrowserSessionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BrowserSessionError'
    this.kind = kind
  }
}

export function toBrowserSessionError(error: unknown): BrowserSessionError {
  if (error instanceof BrowserSessionError) return error

  const message = error instanceof Error ? error.message : String(error)
  if (error instanceof errors.TimeoutError) {
    return new BrowserSessionError('timeout', message, { cause: error })
  }
  if (/detached|stale/i.test(message)) {
    return new BrowserSessionError('detached', message, { cause: error })
  }
  if (/has been closed|target closed/i.test(message)) {
    return new BrowserSessionError('closed', message, { cause: error })
  }
  return new BrowserSessionError('navigation', message, { cause: error })
}

// ═══════════════════════════════════════════════════════════════════════════════
// Playwright implementation
// ═══════════════════════════════════════════════════════════════════════════════

export interface PlaywrightSessionOptions {
  headless: boolean
  /** Chromium binary; required unless Playwright-managed browsers are installed */
  executablePath?: string
  navigationTimeoutMs: number
  userAgent?: string
  /** Run before every extractHTML(); the page is read as-is when absent */
  preparation?: PagePreparation
  clock?: Clock
  logger?: ILogger
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36'

export class PlaywrightBrowserSession implements BrowserSession {
  private readonly clock: Clock
  private readonly log: ILogger

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly preparation: PagePreparation | null,
    options: PlaywrightSessionOptions
  ) {
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.fetcher
  }

  static async launch(options: PlaywrightSessionOptions): Promise<PlaywrightBrowserSession> {
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: ['--disable-blink-features=AutomationControlled'],
    })
    try {
      const context = await browser.newContext({
        userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
        viewport: { width: 1440, height: 900 },
      })
      const page = await context.newPage()
      page.setDefaultNavigationTimeout(options.navigationTimeoutMs)
      return new PlaywrightBrowserSession(browser, context, page, options.preparation ?? null, options)
    } catch (error) {
      await browser.close()
      throw error
    }
  }

  async navigate(url: string): Promise<NavigationResult> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded' })
      return { status: response?.status() ?? null, url: this.page.url() }
    } catch (error) {
      throw toBrowserSessionError(error)
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs })
    } catch (error) {
      throw toBrowserSessionError(error)
    }
  }

  async extractHTML(): Promise<string> {
    try {
      if (this.preparation) {
        return await preparePage(new PlaywrightPageDriver(this.page), this.preparation, this.clock, this.log)
      }
      return await this.page.content()
    } catch (error) {
      throw toBrowserSessionError(error)
    }
  }

  async close(): Promise<void> {
    await this.context.close()
    await this.browser.close()
  }
}
