/**
 * Page Preparation
 *
 * Results pages load more bus cards as they are scrolled, and a bus's reviews
 * only render inside a modal opened from its rating section. Before the HTML is
 * read, the page is scrolled until its height stops growing and every bus's
 * review modal is opened once; each modal's contents are copied back into the
 * matching card so the adapter can parse the page as a single document.
 */

import * as cheerio from 'cheerio'
import type { Page } from 'playwright-core'
import type { ILogger } from '@routepulse/logger'
import { getErrorMessage } from '../errors.js'
import type { Clock } from './retry-policy.js'

/**
 * The browser operations preparation needs. Kept separate from BrowserSession so
 * the fetcher's contract stays at navigate, wait, read and close.
 */
export interface PageDriver {
  scrollHeight(): Promise<number>
  scrollToBottom(): Promise<void>
  /** Values of `attribute` on every element matching `selector`, in document order */
  attributeValues(selector: string, attribute: string): Promise<string[]>
  click(selector: string, timeoutMs: number): Promise<void>
  waitForVisible(selector: string, timeoutMs: number): Promise<void>
  innerHTML(selector: string): Promise<string>
  content(): Promise<string>
}

export interface ScrollPreparation {
  /** Pause after each scroll before the height is measured again */
  pauseMs: number
  /** Consecutive rounds without growth before the page counts as fully loaded */
  stableRounds: number
  /** Hard stop for pages that keep growing */
  maxRounds: number
}

export interface ReviewPanelPreparation {
  /** One element per bus */
  cardSelector: string
  /** Attribute on the card that identifies the bus */
  keyAttribute: string
  /** Clicked inside the card to open its reviews */
  triggerSelector: string
  /** The opened review panel */
  panelSelector: string
  closeSelector: string
  waitTimeoutMs: number
  /** Class of the element that carries a copied panel inside its card */
  captureClass: string
}

export interface PagePreparation {
  scroll: ScrollPreparation | null
  reviews: ReviewPanelPreparation | null
}

function attributeSelector(cardSelector: string, attribute: string, value: string): string {
  return `${cardSelector}[${attribute}="${value.replace(/["\\]/g, '\\$&')}"]`
}

/**
 * Scroll until the page height is unchanged for `stableRounds` rounds in a row.
 * Any growth resets the count.
 * @returns the number of scroll rounds performed
 */
export async function scrollUntilStable(driver: PageDriver, scroll: ScrollPreparation, clock: Clock): Promise<number> {
  let lastHeight = await driver.scrollHeight()
  let stable = 0
  let rounds = 0

  while (stable < scroll.stableRounds && rounds < scroll.maxRounds) {
    await driver.scrollToBottom()
    await clock.sleep(scroll.pauseMs)
    rounds++

    const height = await driver.scrollHeight()
    if (height === lastHeight) {
      stable++
    } else {
      stable = 0
      lastHeight = height
    }
  }
  return rounds
}

/**
 * Open each bus's review panel in turn and keep its inner HTML.
 * A bus whose panel does not open is skipped.
 */
export async function collectReviewPanels(
  driver: PageDriver,
  reviews: ReviewPanelPreparation,
  log: ILogger
): Promise<Map<string, string>> {
  const keys = await driver.attributeValues(reviews.cardSelector, reviews.keyAttribute)
  const panels = new Map<string, string>()

  for (const key of new Set(keys.map((value) => value.trim()).filter((value) => value.length > 0))) {
    const trigger = `${attributeSelector(reviews.cardSelector, reviews.keyAttribute, key)} ${reviews.triggerSelector}`
    try {
      await driver.click(trigger, reviews.waitTimeoutMs)
      await driver.waitForVisible(reviews.panelSelector, reviews.waitTimeoutMs)
      panels.set(key, await driver.innerHTML(reviews.panelSelector))
    } catch (error) {
      log.debug('No review panel for bus', { busKey: key, reason: getErrorMessage(error) })
      continue
    }

    try {
      await driver.click(reviews.closeSelector, reviews.waitTimeoutMs)
    } catch (error) {
      log.debug('Review panel did not close', { busKey: key, reason: getErrorMessage(error) })
    }
  }
  return panels
}

/**
 * Copy each captured panel into the card it belongs to.
 */
export function mergeReviewPanels(html: string, panels: Map<string, string>, reviews: ReviewPanelPreparation): string {
  if (panels.size === 0) return html

  const $ = cheerio.load(html)
  $(reviews.cardSelector).each((_, element) => {
    const card = $(element)
    const panel = panels.get(card.attr(reviews.keyAttribute)?.trim() ?? '')
    if (panel !== undefined) {
      card.append(`<div class="${reviews.captureClass}">${panel}</div>`)
    }
  })
  return $.html()
}

export async function preparePage(
  driver: PageDriver,
  preparation: PagePreparation,
  clock: Clock,
  log: ILogger
): Promise<string> {
  if (preparation.scroll) {
    const rounds = await scrollUntilStable(driver, preparation.scroll, clock)
    log.debug('Scrolled results page', { rounds })
  }

  if (!preparation.reviews) return driver.content()

  const panels = await collectReviewPanels(driver, preparation.reviews, log)
  log.debug('Collected review panels', { panels: panels.size })
  return mergeReviewPanels(await driver.content(), panels, preparation.reviews)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Playwright implementation
// ═══════════════════════════════════════════════════════════════════════════════

export class PlaywrightPageDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async scrollHeight(): Promise<number> {
    const height: unknown = await this.page.evaluate('document.body.scrollHeight')
    return typeof height === 'number' ? height : 0
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate('window.scrollTo(0, document.body.scrollHeight)')
  }

  async attributeValues(selector: string, attribute: string): Promise<string[]> {
    const locator = this.page.locator(selector)
    const count = await locator.count()
    const values: string[] = []
    for (let index = 0; index < count; index++) {
      const value = await locator.nth(index).getAttribute(attribute)
      if (value !== null) values.push(value)
    }
    return values
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: timeoutMs })
  }

  async waitForVisible(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs })
  }

  async innerHTML(selector: string): Promise<string> {
    return this.page.locator(selector).first().innerHTML()
  }

  async content(): Promise<string> {
    return this.page.content()
  }
}
