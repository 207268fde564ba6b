/**
 * Harvest error taxonomy
 *
 * Every error the pipeline raises on purpose extends HarvestError and carries a
 * `kind` discriminant so callers can branch without string matching.
 */

export { getErrorMessage } from '@routepulse/logger'

export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvestError'
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch
// ═══════════════════════════════════════════════════════════════════════════════

/** `aborted` means the run was cancelled while the page was in flight */
export type FetchErrorKind = 'transient' | 'terminal' | 'aborted'

/**
 * Why a route cannot go further.
 * `end_of_results` is a normal stop; `challenge` means the source is blocking us.
 */
export type TerminalReason = 'end_of_results' | 'challenge'

export class FetchError extends HarvestError {
  readonly kind: FetchErrorKind
  readonly reason: TerminalReason | null
  readonly url: string
  readonly attempts: number

  private constructor(
    kind: FetchErrorKind,
    reason: TerminalReason | null,
    url: string,
    attempts: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FetchError'
    this.kind = kind
    this.reason = reason
    this.url = url
    this.attempts = attempts
  }

  static terminal(reason: TerminalReason, url: string, attempts: number, message: string): FetchError {
    return new FetchError('terminal', reason, url, attempts, message)
  }

  static transient(url: string, attempts: number, message: string, cause?: unknown): FetchError {
    return new FetchError('transient', null, url, attempts, message, { cause })
  }

  static aborted(url: string, attempts: number): FetchError {
    return new FetchError('aborted', null, url, attempts, `Fetch cancelled after ${attempts} attempt(s)`)
  }

  get isEndOfResults(): boolean {
    return this.kind === 'terminal' && this.reason === 'end_of_results'
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parse
// ═══════════════════════════════════════════════════════════════════════════════

export type ParseErrorKind = 'malformed_page' | 'malformed_record'

export type RecordType = 'listing' | 'review'

export class ParseError extends HarvestError {
  readonly kind: ParseErrorKind
  readonly recordType: RecordType | null
  readonly listingKey: string | null

  constructor(
    kind: ParseErrorKind,
    message: string,
    details: { recordType?: RecordType; listingKey?: string } = {}
  ) {
    super(message)
    this.name = 'ParseError'
    this.kind = kind
    this.recordType = details.recordType ?? null
    this.listingKey = details.listingKey ?? null
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Load
// ═══════════════════════════════════════════════════════════════════════════════

export type LoadErrorKind = 'foreign_key_violation' | 'constraint_violation' | 'query_failed'

export class LoadError extends HarvestError {
  readonly kind: LoadErrorKind
  readonly busId: string | null

  constructor(kind: LoadErrorKind, message: string, busId: string | null, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LoadError'
    this.kind = kind
    this.busId = busId
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Config
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigError extends HarvestError {
  /** One entry per invalid setting, `KEY: problem` */
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid harvester configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}
