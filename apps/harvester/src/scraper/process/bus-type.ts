/**
 * Bus type taxonomy
 *
 * Free-text bus types ("A/C Sleeper (2+1)", "NON AC Seater") map to a closed set
 * through the keyword rules in data/bus-types.json. Rules are tried in order; the
 * first rule whose `allOf` tokens are all present and whose `anyOf` tokens (if
 * any) include at least one present token wins.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { BUS_TYPES } from '../types.js'
import type { BusType } from '../types.js'

export const BUS_TYPE_TABLE_PATH = new URL('../../../data/bus-types.json', import.meta.url)

const BusTypeRuleSchema = z.object({
  type: z.enum(BUS_TYPES),
  allOf: z.array(z.string().min(1)).default([]),
  anyOf: z.array(z.string().min(1)).default([]),
})

const BusTypeTableSchema = z.object({
  rules: z.array(BusTypeRuleSchema).min(1),
})

export type BusTypeRule = z.infer<typeof BusTypeRuleSchema>

export function parseBusTypeTable(json: string): BusTypeRule[] {
  return BusTypeTableSchema.parse(JSON.parse(json)).rules
}

const RULES = parseBusTypeTable(readFileSync(BUS_TYPE_TABLE_PATH, 'utf8'))

/**
 * Fold spelling variants onto the tokens the rules use.
 */
export function busTypeTokens(text: string): Set<string> {
  const canonical = text
    .toLowerCase()
    .replace(/a\s*\/\s*c|a\.c\.?/g, 'ac')
    .replace(/\bnon[\s-]*ac\b/g, 'non-ac')
    .replace(/\bsemi[\s-]*sleeper\b/g, 'semi-sleeper')
    .replace(/\bmulti[\s-]*axle\b/g, 'multi-axle')
    .replace(/\bpush[\s-]*back\b/g, 'push-back')
  return new Set(canonical.split(/[^a-z0-9-]+/).filter((token) => token.length > 0))
}

/**
 * @returns the mapped type, or null when no rule matches
 */
export function matchBusType(text: string, rules: readonly BusTypeRule[] = RULES): BusType | null {
  const tokens = busTypeTokens(text)
  for (const rule of rules) {
    const allPresent = rule.allOf.every((token) => tokens.has(token))
    const anyPresent = rule.anyOf.length === 0 || rule.anyOf.some((token) => tokens.has(token))
    if (allPresent && anyPresent && (rule.allOf.length > 0 || rule.anyOf.length > 0)) {
      return rule.type
    }
  }
  return null
}
