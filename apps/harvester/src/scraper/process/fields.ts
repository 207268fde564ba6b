/**
 * Field-level cleaning for raw page text: whitespace, ratings, counts, dates,
 * departure times and route strings. Input is element text as the parser
 * read it, with entities already decoded.
 */

/**
 * Collapse whitespace, trim. Casing and entity-like text are untouched.
 * @returns null when nothing is left
 */
export function cleanText(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null
  const cleaned = raw.replace(/\s+/g, ' ').trim()
  return cleaned.length > 0 ? cleaned : null
}

/**
 * A parsed value plus whether the raw input was present but unusable.
 */
export interface FieldResult<T> {
  value: T | null
  invalid: boolean
}

const ABSENT = { value: null, invalid: false } as const
const INVALID = { value: null, invalid: true } as const

// ═══════════════════════════════════════════════════════════════════════════════
// Ratings
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_RATING = 5

const RATING_PATTERN = /^(\d+(?:\.\d+)?)\s*(?:\/\s*5(?:\.0+)?)?\s*(?:★|stars?)?$/i

/**
 * "4.3", "5/5", "4 stars" -> number in [0, 5]. Anything else present is invalid.
 */
export function parseRating(raw: string | null): FieldResult<number> {
  const text = cleanText(raw)
  if (text === null) return ABSENT

  const match = RATING_PATTERN.exec(text)
  if (!match?.[1]) return INVALID

  const value = Number(match[1])
  if (!Number.isFinite(value) || value < 0 || value > MAX_RATING) return INVALID
  return { value, invalid: false }
}

/**
 * "1,204 ratings" -> 1204
 */
export function parseCount(raw: string | null): number | null {
  const text = cleanText(raw)
  if (text === null) return null
  const digits = text.replace(/\D/g, '')
  return digits.length > 0 ? Number.parseInt(digits, 10) : null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Dates
// ═══════════════════════════════════════════════════════════════════════════════

const MONTH_PREFIXES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase()
  const index = MONTH_PREFIXES.findIndex((prefix) => lower.startsWith(prefix))
  return index === -1 ? null : index + 1
}

function toIsoDate(year: number, month: number | null, day: number): string | null {
  if (month === null || month < 1 || month > 12 || day < 1) return null
  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date.toISOString().slice(0, 10)
}

type DateReader = (match: RegExpExecArray) => string | null

const DATE_FORMATS: Array<[RegExp, DateReader]> = [
  // 2024-01-10
  [/^(\d{4})-(\d{1,2})-(\d{1,2})$/, (m) => toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]))],
  // 10 Jan 2024, 10-Jan-2024, 10 January 2024
  [
    /^(\d{1,2})[\s-]([a-z]{3,9})\.?,?[\s-](\d{4})$/i,
    (m) => toIsoDate(Number(m[3]), monthFromName(m[2] ?? ''), Number(m[1])),
  ],
  // Jan 10, 2024
  [
    /^([a-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i,
    (m) => toIsoDate(Number(m[3]), monthFromName(m[1] ?? ''), Number(m[2])),
  ],
  // 10-01-2024
  [/^(\d{1,2})-(\d{1,2})-(\d{4})$/, (m) => toIsoDate(Number(m[3]), Number(m[2]), Number(m[1]))],
  // 10/01/2024
  [/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, (m) => toIsoDate(Number(m[3]), Number(m[2]), Number(m[1]))],
]

/**
 * Parse a review date into `YYYY-MM-DD`. Unparseable or impossible dates are invalid.
 */
export function parseReviewDate(raw: string | null): FieldResult<string> {
  const text = cleanText(raw)
  if (text === null) return ABSENT

  for (const [pattern, read] of DATE_FORMATS) {
    const match = pattern.exec(text)
    if (match) {
      const value = read(match)
      return value === null ? INVALID : { value, invalid: false }
    }
  }
  return INVALID
}

// ═══════════════════════════════════════════════════════════════════════════════
// Departure
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * "22:30", "10:30 PM", "6.15am" -> "HH:mm"
 */
export function parseDepartureTime(raw: string | null): string | null {
  const text = cleanText(raw)
  if (text === null) return null

  const match = /^(\d{1,2})[:.](\d{2})\s*([ap]\.?m\.?)?$/i.exec(text)
  if (!match) return null

  let hours = Number(match[1])
  const minutes = Number(match[2])
  const meridiem = match[3]?.toLowerCase().replace(/\./g, '')

  if (meridiem) {
    if (hours < 1 || hours > 12) return null
    hours = (hours % 12) + (meridiem === 'pm' ? 12 : 0)
  }
  if (hours > 23 || minutes > 59) return null

  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
}

export function combineDeparture(journeyDate: string | null, time: string | null): string | null {
  return journeyDate && time ? `${journeyDate}T${time}` : null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Routes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tried in this order; the first delimiter found splits the string.
 */
export const ROUTE_DELIMITERS = ['->', '→', '–>', ' to '] as const

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const DELIMITER_PATTERNS = ROUTE_DELIMITERS.map((delimiter) => new RegExp(escapeRegExp(delimiter), 'i'))

export interface RouteParts {
  origin: string
  destination: string | null
}

/**
 * "Chennai -> Bangalore" -> { origin: "Chennai", destination: "Bangalore" }.
 * Without a delimiter the whole string is the origin.
 */
export function splitRoute(text: string): RouteParts {
  for (const pattern of DELIMITER_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue

    const origin = text.slice(0, match.index).trim()
    const destination = text.slice(match.index + match[0].length).trim()
    if (origin.length === 0) break
    return { origin, destination: destination.length > 0 ? destination : null }
  }
  return { origin: text.trim(), destination: null }
}
