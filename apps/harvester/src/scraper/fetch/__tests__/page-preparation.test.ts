import { describe, it, expect } from 'vitest'
import * as cheerio from 'cheerio'
import {
  collectReviewPanels,
  mergeReviewPanels,
  preparePage,
  scrollUntilStable,
} from '../page-preparation.js'
import type { PageDriver, ReviewPanelPreparation } from '../page-preparation.js'
import { createRedbusPagePreparation, redbusAdapter } from '../../adapters/redbus/adapter.js'
import { FakeClock, createMockLogger, resultsPageHtml } from '../../__tests__/helpers.js'

const REVIEWS = createRedbusPagePreparation({ pauseMs: 1500, stableRounds: 3 }).reviews

function reviewPrep(): ReviewPanelPreparation {
  if (!REVIEWS) throw new Error('redBus preparation opens review modals')
  return REVIEWS
}

const MODAL_HTML =
  '<div class="review-card"><span class="rating">5</span><p class="comment">Clean and on time</p></div>'

/**
 * Heights come from a script; the last value repeats. Panels open for the keys in `panels`.
 */
class FakePageDriver implements PageDriver {
  readonly actions: string[] = []
  private measured = 0
  private openKey: string | null = null

  constructor(
    private readonly heights: number[],
    private readonly html: string,
    private readonly panels: Record<string, string> = {},
    private readonly keys: string[] = []
  ) {}

  async scrollHeight(): Promise<number> {
    const height = this.heights[Math.min(this.measured, this.heights.length - 1)] ?? 0
    this.measured++
    return height
  }

  async scrollToBottom(): Promise<void> {
    this.actions.push('scroll')
  }

  async attributeValues(_selector: string, _attribute: string): Promise<string[]> {
    return this.keys
  }

  async click(selector: string, _timeoutMs: number): Promise<void> {
    this.actions.push(`click ${selector}`)
    const match = /data-busid="([^"]+)"/.exec(selector)
    if (match) this.openKey = match[1] ?? null
  }

  async waitForVisible(selector: string, _timeoutMs: number): Promise<void> {
    if (this.openKey === null || this.panels[this.openKey] === undefined) {
      throw new Error(`Timeout 5000ms exceeded waiting for ${selector}`)
    }
  }

  async innerHTML(_selector: string): Promise<string> {
    return this.openKey === null ? '' : (this.panels[this.openKey] ?? '')
  }

  async content(): Promise<string> {
    return this.html
  }
}

describe('scrollUntilStable', () => {
  it('stops after the height is unchanged for the configured rounds', async () => {
    const driver = new FakePageDriver([1000, 1000, 1000, 1000], '')
    const clock = new FakeClock()

    const rounds = await scrollUntilStable(driver, { pauseMs: 1500, stableRounds: 3, maxRounds: 200 }, clock)

    expect(rounds).toBe(3)
    expect(clock.sleeps).toEqual([1500, 1500, 1500])
  })

  it('resets the count whenever the page grows', async () => {
    const driver = new FakePageDriver([1000, 1000, 2000, 2000, 3000, 3000, 3000, 3000], '')

    const rounds = await scrollUntilStable(driver, { pauseMs: 0, stableRounds: 3, maxRounds: 200 }, new FakeClock())

    // heights after each scroll: 1000 (same), 2000 (grew), 2000, 3000 (grew), 3000, 3000, 3000
    expect(rounds).toBe(7)
  })

  it('gives up at the round cap on a page that keeps growing', async () => {
    const driver = new FakePageDriver(Array.from({ length: 50 }, (_, index) => index * 100), '')

    const rounds = await scrollUntilStable(driver, { pauseMs: 0, stableRounds: 3, maxRounds: 10 }, new FakeClock())

    expect(rounds).toBe(10)
  })
})

describe('collectReviewPanels', () => {
  it('opens and closes the modal of each bus', async () => {
    const driver = new FakePageDriver([0], '', { 'kpn-1': MODAL_HTML }, ['kpn-1'])

    const panels = await collectReviewPanels(driver, reviewPrep(), createMockLogger())

    expect(panels).toEqual(new Map([['kpn-1', MODAL_HTML]]))
    expect(driver.actions).toEqual(['click .bus-item[data-busid="kpn-1"] .rating-sec', 'click .review-modal .close'])
  })

  it('skips a bus whose modal never appears', async () => {
    const logger = createMockLogger()
    const driver = new FakePageDriver([0], '', { 'kpn-1': MODAL_HTML }, ['srs-2', 'kpn-1', 'kpn-1'])

    const panels = await collectReviewPanels(driver, reviewPrep(), logger)

    expect([...panels.keys()]).toEqual(['kpn-1'])
    expect(logger.debug).toHaveBeenCalledWith('No review panel for bus', {
      busKey: 'srs-2',
      reason: 'Timeout 5000ms exceeded waiting for .review-modal',
    })
  })
})

describe('mergeReviewPanels', () => {
  it('places each captured modal inside its bus card', () => {
    const html = resultsPageHtml([
      { key: 'kpn-1', operator: 'KPN Travels' },
      { key: 'srs-2', operator: 'SRS Travels' },
    ])

    const merged = mergeReviewPanels(html, new Map([['kpn-1', MODAL_HTML]]), reviewPrep())

    const $ = cheerio.load(merged)
    expect($('.bus-item[data-busid="kpn-1"] .review-modal-capture .comment').text()).toBe('Clean and on time')
    expect($('.bus-item[data-busid="srs-2"] .review-card')).toHaveLength(0)
  })

  it('returns the page untouched when nothing was captured', () => {
    const html = resultsPageHtml([{ key: 'kpn-1', operator: 'KPN Travels' }])

    expect(mergeReviewPanels(html, new Map(), reviewPrep())).toBe(html)
  })
})

describe('preparePage', () => {
  it('yields a page whose modal reviews parse as the bus reviews', async () => {
    const html = resultsPageHtml([{ key: 'kpn-1', operator: 'KPN Travels' }])
    const driver = new FakePageDriver([1000], html, { 'kpn-1': MODAL_HTML }, ['kpn-1'])
    const clock = new FakeClock()

    const prepared = await preparePage(
      driver,
      createRedbusPagePreparation({ pauseMs: 1500, stableRounds: 2 }),
      clock,
      createMockLogger()
    )
    const parsed = redbusAdapter.parse({
      routeKey: 'chennai:bangalore',
      pageIndex: 0,
      url: 'https://www.redbus.in/search',
      html: prepared,
      fetchedAt: clock.now(),
      byteSize: 0,
      contentHash: '',
    })

    expect(clock.sleeps).toEqual([1500, 1500])
    expect(parsed.ok).toBe(true)
    if (!parsed.ok) return
    expect(parsed.reviews).toEqual([
      { listingKey: 'kpn-1', rating: '5', title: null, body: 'Clean and on time', date: null },
    ])
  })

  it('reads the page as-is when both steps are off', async () => {
    const driver = new FakePageDriver([1000], '<html><body></body></html>')

    const html = await preparePage(driver, { scroll: null, reviews: null }, new FakeClock(), createMockLogger())

    expect(html).toBe('<html><body></body></html>')
    expect(driver.actions).toEqual([])
  })
})
