#!/usr/bin/env node

/**
 * Harvester Worker
 * Runs one harvest over the routes given on the command line, then exits.
 *
 *   harvester Chennai:Bangalore Mumbai:Pune:2024-01-10
 *
 * Undated routes are searched for HARVEST_DAYS consecutive days from JOURNEY_DATE.
 * SIGINT / SIGTERM stop new fetches and cancel pending retries; pages already
 * fetched finish loading and the partial summary is still logged.
 */

// Load environment variables first, before any other imports
import './env.js'

import { applySchema, createSqlPool } from '@routepulse/db'
import type { SqlPool } from '@routepulse/db'
import { logger } from './config/logger.js'
import { loadSettings } from './config/settings.js'
import { createHarvestOptions, expandJourneyDates } from './harvest.js'
import { getErrorMessage } from './scraper/errors.js'
import { runHarvest } from './scraper/orchestrator.js'
import { parseRouteArg } from './scraper/routes.js'

const log = logger.child('worker')

/**
 * Warm up database connection with retries
 */
async function warmupDatabase(pool: SqlPool, maxAttempts = 5): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('Database connection attempt', { attempt, maxAttempts })
      await pool.query('SELECT 1')
      return true
    } catch (error) {
      log.warn('Database connection failed', { attempt, reason: getErrorMessage(error) })

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    }
  }
  return false
}

async function main(): Promise<number> {
  const settings = loadSettings()
  const routes = expandJourneyDates(process.argv.slice(2).map(parseRouteArg), settings.journeyDate, settings.days)
  if (routes.length === 0) {
    log.error('No routes given; expected Origin:Destination[:YYYY-MM-DD] arguments')
    return 1
  }

  const pool = createSqlPool(settings.databaseUrl)
  const controller = new AbortController()

  // Track if shutdown is in progress to prevent double-shutdown
  let isShuttingDown = false
  const shutdown = (signal: string) => {
    if (isShuttingDown) return
    isShuttingDown = true
    log.info('Shutdown requested; finishing in-flight pages', { signal })
    controller.abort()
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))

  try {
    if (!(await warmupDatabase(pool))) {
      log.error('Failed to establish database connection after all attempts')
      return 1
    }
    await applySchema(pool)

    const summary = await runHarvest(routes, createHarvestOptions(settings, pool, { signal: controller.signal }))
    return summary.routes.some((route) => route.status === 'failed') ? 2 : 0
  } finally {
    await pool.end()
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    log.fatal('Harvester crashed', {}, error)
    process.exitCode = 1
  }
)
