/**
 * Harvester settings
 *
 * Parsed once from the environment. Every invalid key is reported together in a
 * single ConfigError.
 */

import { z } from 'zod'
import { ConfigError } from '../scraper/errors.js'
import { DEFAULT_BASE_URL } from '../scraper/adapters/redbus/adapter.js'
import { parseReviewDate } from '../scraper/process/fields.js'

const booleanFlag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => parseReviewDate(value).value === value, 'not a calendar date')

const positiveInt = z.coerce.number().int().positive()

const settingsSchema = z
  .object({
    DATABASE_URL: z.string().min(1, 'required'),
    SOURCE_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),

    SCRAPER_HEADLESS: booleanFlag.default('true'),
    SCRAPER_BROWSER_PATH: z.string().min(1).optional(),
    SCRAPER_MIN_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    SCRAPER_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
    SCRAPER_NAV_TIMEOUT_MS: positiveInt.default(30000),
    SCRAPER_MAX_ATTEMPTS: positiveInt.default(3),
    SCRAPER_BASE_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    SCRAPER_MAX_BACKOFF_MS: z.coerce.number().int().min(0).default(30000),
    SCRAPER_SCROLL_PAUSE_MS: z.coerce.number().int().min(0).default(1500),
    // 0 turns scrolling off
    SCRAPER_SCROLL_ATTEMPTS: z.coerce.number().int().min(0).default(15),
    SCRAPER_EXPAND_REVIEWS: booleanFlag.default('true'),

    HARVEST_CONCURRENCY: positiveInt.default(2),
    HARVEST_DEADLINE_MS: positiveInt.optional(),
    HARVEST_MAX_PAGES: positiveInt.optional(),
    HARVEST_DAYS: positiveInt.max(60).default(1),

    AUDIT_DIR: z.string().min(1).optional(),

    SENTIMENT_POS_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.05),
    SENTIMENT_NEG_THRESHOLD: z.coerce.number().min(-1).max(1).default(-0.05),

    JOURNEY_DATE: isoDate.optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SCRAPER_MIN_DELAY_MS > env.SCRAPER_MAX_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SCRAPER_MAX_DELAY_MS'],
        message: 'must be at least SCRAPER_MIN_DELAY_MS',
      })
    }
    if (env.SCRAPER_BASE_BACKOFF_MS > env.SCRAPER_MAX_BACKOFF_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SCRAPER_MAX_BACKOFF_MS'],
        message: 'must be at least SCRAPER_BASE_BACKOFF_MS',
      })
    }
    if (env.SENTIMENT_NEG_THRESHOLD > env.SENTIMENT_POS_THRESHOLD) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SENTIMENT_NEG_THRESHOLD'],
        message: 'must not exceed SENTIMENT_POS_THRESHOLD',
      })
    }
  })

export interface HarvesterSettings {
  databaseUrl: string
  sourceBaseUrl: string
  browser: {
    headless: boolean
    executablePath: string | null
    navigationTimeoutMs: number
  }
  rateLimit: {
    minDelayMs: number
    maxDelayMs: number
  }
  retry: {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
  }
  preparation: {
    scrollPauseMs: number
    /** Rounds without height growth before scrolling stops; 0 skips scrolling */
    scrollStableRounds: number
    expandReviews: boolean
  }
  concurrency: number
  deadlineMs: number | null
  maxPagesPerRoute: number | null
  auditDir: string | null
  sentiment: {
    positive: number
    negative: number
  }
  /** `YYYY-MM-DD` used in search URLs */
  journeyDate: string
  /** Consecutive journey dates searched per undated route, starting at `journeyDate` */
  days: number
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10)
}

/**
 * Blank values count as unset so `.env` templates with empty keys fall back to defaults.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim()
  }
  return present
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): HarvesterSettings {
  const parsed = settingsSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const values = parsed.data
  return {
    databaseUrl: values.DATABASE_URL,
    sourceBaseUrl: values.SOURCE_BASE_URL,
    browser: {
      headless: values.SCRAPER_HEADLESS,
      executablePath: values.SCRAPER_BROWSER_PATH ?? null,
      navigationTimeoutMs: values.SCRAPER_NAV_TIMEOUT_MS,
    },
    rateLimit: {
      minDelayMs: values.SCRAPER_MIN_DELAY_MS,
      maxDelayMs: values.SCRAPER_MAX_DELAY_MS,
    },
    retry: {
      maxAttempts: values.SCRAPER_MAX_ATTEMPTS,
      baseDelayMs: values.SCRAPER_BASE_BACKOFF_MS,
      maxDelayMs: values.SCRAPER_MAX_BACKOFF_MS,
    },
    preparation: {
      scrollPauseMs: values.SCRAPER_SCROLL_PAUSE_MS,
      scrollStableRounds: values.SCRAPER_SCROLL_ATTEMPTS,
      expandReviews: values.SCRAPER_EXPAND_REVIEWS,
    },
    concurrency: values.HARVEST_CONCURRENCY,
    deadlineMs: values.HARVEST_DEADLINE_MS ?? null,
    maxPagesPerRoute: values.HARVEST_MAX_PAGES ?? null,
    auditDir: values.AUDIT_DIR ?? null,
    sentiment: {
      positive: values.SENTIMENT_POS_THRESHOLD,
      negative: values.SENTIMENT_NEG_THRESHOLD,
    },
    journeyDate: values.JOURNEY_DATE ?? todayIso(now),
    days: values.HARVEST_DAYS,
  }
}
