/**
 * @fileoverview Extractive summarizer
 *
 * Selection runs in rank order (score desc, position asc) and skips
 * near-duplicates. When fewer than `minSentences` sentences score above
 * zero, selection continues through the zero-score sentences in the same
 * order, earliest first. Bullets are emitted in document order.
 *
 * @module lib/text-analysis/summarizer
 */

import type { AnalysisConfig } from "./config"
import { extractKeywords, splitTokens } from "./keywords"
import { scoreSentence, splitSentences } from "./sentences"
import type { Keyword, ScoredSentence, SummaryResult } from "./types"

type SummaryConfig = Pick<AnalysisConfig, "keywords" | "sentences" | "summary">

/** Score desc, then position asc */
export function compareRanked(a: ScoredSentence, b: ScoredSentence): number {
  if (a.score !== b.score) return b.score - a.score
  return a.index - b.index
}

/** Token-set Jaccard similarity, 0 when either side has no tokens */
export function jaccardSimilarity(a: string, b: string): number {
  const left = new Set(splitTokens(a))
  const right = new Set(splitTokens(b))
  if (left.size === 0 || right.size === 0) return 0
  let shared = 0
  for (const token of left) if (right.has(token)) shared++
  return shared / (left.size + right.size - shared)
}

function comparable(text: string): string {
  return splitTokens(text).join(" ")
}

export function isNearDuplicate(a: string, b: string, threshold: number): boolean {
  return comparable(a) === comparable(b) || jaccardSimilarity(a, b) >= threshold
}

/**
 * Build the summary for a normalized document.
 *
 * Pass `keywords` to reuse a keyword list already extracted for the
 * document.
 */
export function summarize(
  text: string,
  config: SummaryConfig,
  keywords: readonly Keyword[] = extractKeywords(text, config)
): SummaryResult {
  const { minSentences, maxSentences, minSentenceLength, dedupSimilarity } = config.summary

  const sentences = splitSentences(text, config)
    .filter((s) => s.text.length >= minSentenceLength)
    .map((s) => scoreSentence(s, keywords, config))
    .sort(compareRanked)

  const selected: ScoredSentence[] = []
  const accept = (candidate: ScoredSentence): void => {
    const duplicate = selected.some((s) => isNearDuplicate(s.text, candidate.text, dedupSimilarity))
    if (!duplicate) selected.push(candidate)
  }

  for (const candidate of sentences) {
    if (selected.length >= maxSentences) break
    if (candidate.score > 0) accept(candidate)
  }

  const scoredCount = selected.length
  if (scoredCount < minSentences) {
    for (const candidate of sentences) {
      if (selected.length >= minSentences) break
      if (candidate.score <= 0) accept(candidate)
    }
  }

  const bullets = [...selected].sort((a, b) => a.index - b.index).map((s) => s.text)

  return {
    summary_bullets: bullets,
    sentences,
    keywords: [...keywords],
    paddedCount: selected.length - scoredCount,
  }
}
