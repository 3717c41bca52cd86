/**
 * @fileoverview Sentence splitting and scoring
 *
 * The splitter walks the normalized text once and records offsets, so each
 * span's text is always `text.slice(start, end)`.
 *
 * @module lib/text-analysis/sentences
 */

import type { AnalysisConfig } from "./config"
import { splitTokens } from "./keywords"
import { countMatches, globalCopy, termPattern } from "./matching"
import type { Keyword, ScoredSentence, SentenceSpan } from "./types"

// ============================================================================
// Splitting
// ============================================================================

const SENTENCE_END = new Set([".", "!", "?"])
const CLOSERS = new Set(['"', "'", ")", "]", "”", "’"])
const NEXT_SENTENCE_START = /[A-Z0-9(["“‘']/
const CLAUSE_NUMBER = /^\(?\d+[A-Za-z]?\)?\.$/
const WORD_OR_DOT = /[A-Za-z.]/
/** Abbreviations only when a number follows: `No. 3`, `Nos. 4 and 5` */
const NUMBER_ABBREVIATIONS = new Set(["no", "nos"])

type SentenceConfig = Pick<AnalysisConfig, "sentences">

/** The letters-and-dots word ending just before `index` */
function wordBefore(text: string, index: number): string {
  let start = index
  while (start > 0 && WORD_OR_DOT.test(text[start - 1] ?? "")) start--
  return text.slice(start, index).replace(/^\.+/, "").toLowerCase()
}

function isProtectedPeriod(
  text: string,
  index: number,
  next: number,
  segmentStart: number,
  abbreviations: ReadonlySet<string>
): boolean {
  const word = wordBefore(text, index)
  if (abbreviations.has(word)) return true
  if (NUMBER_ABBREVIATIONS.has(word)) return /\d/.test(text[next] ?? "")
  if (/^[a-z]$/.test(word)) return true
  return CLAUSE_NUMBER.test(text.slice(segmentStart, index + 1).trim())
}

/**
 * End offset of the sentence terminated at `index`, or -1 when the
 * punctuation there does not end a sentence.
 */
function boundaryAfter(
  text: string,
  index: number,
  segmentStart: number,
  abbreviations: ReadonlySet<string>
): number {
  let end = index + 1
  while (end < text.length && CLOSERS.has(text[end] ?? "")) end++

  let next = end
  while (text[next] === " ") next++
  if (next === end || next >= text.length) return -1
  if (!NEXT_SENTENCE_START.test(text[next] ?? "")) return -1

  if (text[index] === "." && isProtectedPeriod(text, index, next, segmentStart, abbreviations)) {
    return -1
  }
  return end
}

function pushSpan(spans: SentenceSpan[], text: string, start: number, end: number): void {
  while (start < end && /\s/.test(text[start] ?? "")) start++
  while (end > start && /\s/.test(text[end - 1] ?? "")) end--
  if (end > start) {
    spans.push({ text: text.slice(start, end), index: spans.length, start, end })
  }
}

/**
 * Split normalized text into sentence spans.
 *
 * A newline always ends a sentence. Terminal punctuation ends one when the
 * next word starts like a sentence, unless the period belongs to a legal
 * abbreviation (`s. 12`, `reg. 4`, `No. 3`), a single initial or a clause
 * number.
 */
export function splitSentences(text: string, config: SentenceConfig): SentenceSpan[] {
  const abbreviations = new Set(config.sentences.abbreviations.map((a) => a.toLowerCase()))
  const spans: SentenceSpan[] = []
  let segmentStart = 0

  for (let i = 0; i < text.length; i++) {
    const char = text[i] ?? ""
    if (char === "\n") {
      pushSpan(spans, text, segmentStart, i)
      segmentStart = i + 1
    } else if (SENTENCE_END.has(char)) {
      const end = boundaryAfter(text, i, segmentStart, abbreviations)
      if (end !== -1) {
        pushSpan(spans, text, segmentStart, end)
        segmentStart = end
        i = end - 1
      }
    }
  }
  pushSpan(spans, text, segmentStart, text.length)

  return spans
}

// ============================================================================
// Scoring
// ============================================================================

type ScoringConfig = Pick<AnalysisConfig, "summary">

/**
 * Score one sentence.
 *
 * keyword token hits + legal term hits + digit present + definition shape,
 * each multiplied by its configured weight.
 */
export function scoreSentence(
  sentence: SentenceSpan,
  keywords: readonly Keyword[],
  config: ScoringConfig
): ScoredSentence {
  const { weights, legalTerms, definitionPattern } = config.summary
  const keywordSet = new Set(keywords.map((k) => k.token))

  const keywordHits = splitTokens(sentence.text).filter((t) => keywordSet.has(t)).length
  const legalTermHits = legalTerms.reduce(
    (sum, term) => sum + countMatches(sentence.text, termPattern(term)),
    0
  )
  const hasNumber = /\d/.test(sentence.text)
  const isDefinition = globalCopy(definitionPattern).test(sentence.text)

  const score =
    keywordHits * weights.keyword +
    legalTermHits * weights.legalTerm +
    (hasNumber ? weights.number : 0) +
    (isDefinition ? weights.definition : 0)

  return {
    ...sentence,
    score,
    components: { keywordHits, legalTermHits, hasNumber, isDefinition },
  }
}
