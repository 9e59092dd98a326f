/**
 * Chart title categorizer.
 *
 * Rules run in a fixed order and the first match wins:
 * departure, arrival, approach, ground, then General.
 * Keywords cover English, Spanish, Portuguese and French titles. A keyword
 * padded with spaces (" sid ") only matches a whole word.
 */

import { z } from 'zod'
import keywordFile from './data/category-keywords.json' with { type: 'json' }
import type { ChartCategory } from './types.js'

type RuleCategory = Exclude<ChartCategory, 'General'>

/** Evaluation order. Do not reorder. */
export const CATEGORY_RULE_ORDER: readonly RuleCategory[] = [
  'DepartureProcedure',
  'ArrivalProcedure',
  'Approach',
  'Ground',
]

const keywordFileSchema = z.object({
  DepartureProcedure: z.array(z.string().min(1)),
  ArrivalProcedure: z.array(z.string().min(1)),
  Approach: z.array(z.string().min(1)),
  Ground: z.array(z.string().min(1)),
})

function normalizeKeyword(value: string): string {
  return value.normalize('NFC').toLowerCase()
}

/** Lower-cased words separated by single spaces, with a space at each end. */
function normalizeTitle(value: string): string {
  const words = normalizeKeyword(value)
    .replace(/[^\p{L}\p{N}']+/gu, ' ')
    .trim()
  return ` ${words} `
}

function loadKeywords(): Record<RuleCategory, readonly string[]> {
  const parsed = keywordFileSchema.parse(keywordFile)
  return {
    DepartureProcedure: parsed.DepartureProcedure.map(normalizeKeyword),
    ArrivalProcedure: parsed.ArrivalProcedure.map(normalizeKeyword),
    Approach: parsed.Approach.map(normalizeKeyword),
    Ground: parsed.Ground.map(normalizeKeyword),
  }
}

export const CATEGORY_KEYWORDS: Readonly<Record<RuleCategory, readonly string[]>> =
  Object.freeze(loadKeywords())

/**
 * Map a chart title to its taxonomy label.
 *
 * A section hint from the adapter decides on its own; otherwise keywords
 * are matched as case-insensitive substrings of the title's words.
 *
 * @example
 * categorize('RNAV (GPS) RWY 04 SID') // 'DepartureProcedure'
 * categorize('Llegada Normalizada RNAV') // 'ArrivalProcedure'
 */
export function categorize(title: string, sectionHint?: ChartCategory): ChartCategory {
  if (sectionHint) return sectionHint

  const text = normalizeTitle(title)
  for (const category of CATEGORY_RULE_ORDER) {
    if (CATEGORY_KEYWORDS[category].some((keyword) => text.includes(keyword))) {
      return category
    }
  }
  return 'General'
}
