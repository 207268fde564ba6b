/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/harvester/.env.local in development.
 * Production injects env vars directly - dotenv is not needed.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'

if (process.env.NODE_ENV !== 'production') {
  const envPath = fileURLToPath(new URL('../.env.local', import.meta.url))
  config({ path: envPath })
}
