/**
 * @fileoverview Text analysis type definitions
 * @module lib/text-analysis/types
 */

// ============================================================================
// Document
// ============================================================================

/** How a page's text was obtained */
export const EXTRACTION_METHODS = ["direct", "ocr", "failed"] as const

export type ExtractionMethod = (typeof EXTRACTION_METHODS)[number]

export interface Page {
  /** 1-based page number */
  pageNumber: number
  /** Extracted text, empty when extraction failed */
  text: string
  method: ExtractionMethod
  /** Tesseract confidence 0-100, OCR pages only */
  ocrConfidence?: number
}

/** Immutable once built by `buildDocument` */
export interface ActDocument {
  readonly pages: readonly Readonly<Page>[]
  /** Page texts joined with "\n", as extracted */
  readonly rawText: string
  /** Normalizer output; every snippet in every artifact is a substring of this */
  readonly text: string
  readonly rawLength: number
  readonly cleanedLength: number
}

// ============================================================================
// Keywords & Sentences
// ============================================================================

export interface Keyword {
  token: string
  frequency: number
}

/** A sentence located in the normalized text. `text === source.slice(start, end)` */
export interface SentenceSpan {
  text: string
  /** 0-based position among all sentences of the document */
  index: number
  start: number
  end: number
}

export interface SentenceScoreComponents {
  keywordHits: number
  legalTermHits: number
  hasNumber: boolean
  isDefinition: boolean
}

export interface ScoredSentence extends SentenceSpan {
  score: number
  components: SentenceScoreComponents
}

export interface SummaryResult {
  /** Selected sentences in document order */
  summary_bullets: string[]
  /** Every scored sentence, ranked (score desc, position asc) */
  sentences: ScoredSentence[]
  keywords: Keyword[]
  /** Number of bullets that came from padding rather than a positive score */
  paddedCount: number
}

// ============================================================================
// Sections
// ============================================================================

export const SECTION_CATEGORIES = [
  "definitions",
  "obligations",
  "responsibilities",
  "eligibility",
  "payments",
  "penalties",
  "record_keeping",
] as const

export type SectionCategory = (typeof SECTION_CATEGORIES)[number]

/**
 * How much text to keep around a pattern match.
 * - `sentence`: the enclosing sentence, clipped to `maxChars` around the match
 * - `window`: `chars` either side of the match, never crossing a paragraph break
 */
export type ContextPolicy =
  | { kind: "sentence"; maxChars: number }
  | { kind: "window"; chars: number }

export interface PatternRule {
  pattern: RegExp
  context: ContextPolicy
}

export interface Section {
  category: SectionCategory
  found: boolean
  /** Verbatim document substrings, in document order */
  snippets: readonly string[]
  /** Snippets joined with the section delimiter, or the not-found sentinel */
  text: string
}

export type SectionReport = Readonly<Record<SectionCategory, Section>>

/** `sections.json` shape */
export type SectionReportJson = Record<SectionCategory, string>

// ============================================================================
// Rules
// ============================================================================

export type RuleScope = "document" | { section: SectionCategory }

export interface IndicatorTerm {
  term: string
  weight: number
}

export interface RuleDefinition {
  name: string
  description: string
  scope: RuleScope
  indicators: readonly IndicatorTerm[]
  /** Weighted matches needed to pass */
  minMatches: number
}

export type RuleStatus = "pass" | "fail"

/** `rule_checks.json` entry */
export interface RuleResult {
  rule: string
  status: RuleStatus
  evidence: string
  confidence: number
}
