/**
 * Retry policy and clock
 *
 * Backoff is computed from a plain policy object and slept through an injectable
 * Clock, so retry behaviour is testable without real time passing.
 */

import { setTimeout as delay } from 'timers/promises'

export interface Clock {
  now(): Date
  /** Resolves early, without throwing, once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: async (ms, signal) => {
    if (ms <= 0 || signal?.aborted) return
    try {
      await delay(ms, undefined, { signal })
    } catch (error) {
      if (!signal?.aborted) throw error
    }
  },
}

/**
 * Maps a computed backoff delay to the delay actually slept.
 */
export type JitterFn = (delayMs: number) => number

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  baseDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  jitter: JitterFn
}

/**
 * "Equal jitter": half the delay is fixed, the other half random.
 */
export function equalJitter(random: () => number = Math.random): JitterFn {
  return (delayMs) => Math.round(delayMs / 2 + random() * (delayMs / 2))
}

export const noJitter: JitterFn = (delayMs) => delayMs

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: equalJitter(),
}

/**
 * Delay before retrying after the given failed attempt (1-based), jitter applied.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1)
  const capped = Math.min(exponential, policy.maxDelayMs)
  return Math.max(0, policy.jitter(capped))
}
