/**
 * Per-worker Rate Limiter
 *
 * Waits a randomized delay before every request. Each fetcher owns its own
 * limiter, so limits are scoped per worker: different routes hit independent
 * listing pages and are not serialized against each other.
 */

import type { Clock } from './retry-policy.js'
import { systemClock } from './retry-policy.js'

export interface RateLimitConfig {
  /** Lower bound of the pre-request delay in ms (default: 2000) */
  minDelayMs: number

  /** Upper bound of the pre-request delay in ms (default: 5000) */
  maxDelayMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  minDelayMs: 2000,
  maxDelayMs: 5000,
}

export interface RateLimiter {
  /**
   * Block until the next request may go out.
   * @returns the delay that was applied, in ms
   */
  acquire(signal?: AbortSignal): Promise<number>
}

export class RandomDelayRateLimiter implements RateLimiter {
  private readonly config: RateLimitConfig

  constructor(
    config: RateLimitConfig = DEFAULT_RATE_LIMIT,
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random
  ) {
    if (config.minDelayMs < 0 || config.maxDelayMs < config.minDelayMs) {
      throw new RangeError(`Invalid delay range [${config.minDelayMs}, ${config.maxDelayMs}]`)
    }
    this.config = config
  }

  async acquire(signal?: AbortSignal): Promise<number> {
    const { minDelayMs, maxDelayMs } = this.config
    const waitMs = Math.round(minDelayMs + this.random() * (maxDelayMs - minDelayMs))
    await this.clock.sleep(waitMs, signal)
    return waitMs
  }
}
