/**
 * @fileoverview Tokenizer and keyword scorer
 * @module lib/text-analysis/keywords
 */

import type { AnalysisConfig } from "./config"
import type { Keyword } from "./types"

type KeywordConfig = Pick<AnalysisConfig, "keywords">

const HAS_LETTER = /[a-z]/

/** Lowercased alphanumeric runs, no filtering */
export function splitTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0)
}

/**
 * Content tokens: stop words, short tokens and pure numbers removed.
 */
export function tokenize(text: string, config: KeywordConfig): string[] {
  const { minTokenLength, stopWords } = config.keywords
  const stop = new Set(stopWords)
  return splitTokens(text).filter(
    (token) => token.length >= minTokenLength && HAS_LETTER.test(token) && !stop.has(token)
  )
}

/** Frequency desc, then token asc */
export function compareKeywords(a: Keyword, b: Keyword): number {
  if (a.frequency !== b.frequency) return b.frequency - a.frequency
  return a.token < b.token ? -1 : a.token > b.token ? 1 : 0
}

/**
 * Top `topKeywords` tokens of the document by frequency.
 */
export function extractKeywords(text: string, config: KeywordConfig): Keyword[] {
  const counts = new Map<string, number>()
  for (const token of tokenize(text, config)) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }

  return Array.from(counts, ([token, frequency]) => ({ token, frequency }))
    .sort(compareKeywords)
    .slice(0, config.keywords.topKeywords)
}
