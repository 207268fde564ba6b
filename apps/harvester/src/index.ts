export * from './scraper/index.js'
export { loadSettings } from './config/settings.js'
export type { HarvesterSettings } from './config/settings.js'
export { addDays, createHarvestOptions, expandJourneyDates, pagePreparationFrom, retryPolicyFrom } from './harvest.js'
