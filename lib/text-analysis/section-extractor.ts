/**
 * @fileoverview Section extractor
 *
 * For each of the seven categories, the first pattern in the table that
 * matches anywhere wins. Each of its matches is widened by the pattern's
 * context policy; overlapping snippets are dropped and at most
 * `maxSnippetsPerSection` are kept, in document order.
 *
 * @module lib/text-analysis/section-extractor
 */

import type { AnalysisConfig } from "./config"
import {
  clampWindow,
  findAll,
  overlaps,
  paragraphBounds,
  wordWindow,
  type TextSpan,
} from "./matching"
import { splitSentences } from "./sentences"
import {
  SECTION_CATEGORIES,
  type ContextPolicy,
  type Section,
  type SectionCategory,
  type SectionReport,
  type SectionReportJson,
  type SentenceSpan,
} from "./types"

type SectionConfig = Pick<AnalysisConfig, "sections" | "sentences">

// ============================================================================
// Context expansion
// ============================================================================

function enclosingSentence(sentences: readonly SentenceSpan[], match: TextSpan): TextSpan {
  const first = sentences.find((s) => s.end > match.start)
  const last = [...sentences].reverse().find((s) => s.start < match.end)
  return {
    start: Math.min(first?.start ?? match.start, match.start),
    end: Math.max(last?.end ?? match.end, match.end),
  }
}

function expandMatch(
  text: string,
  match: TextSpan,
  policy: ContextPolicy,
  sentences: readonly SentenceSpan[]
): TextSpan {
  if (policy.kind === "window") {
    return wordWindow(text, match, policy.chars, policy.chars, paragraphBounds(text, match))
  }

  const sentence = enclosingSentence(sentences, match)
  return clampWindow(text, sentence, match, policy.maxChars)
}

// ============================================================================
// Extraction
// ============================================================================

function notFound(category: SectionCategory, config: SectionConfig): Section {
  return { category, found: false, snippets: [], text: config.sections.notFound }
}

function extractSection(
  text: string,
  category: SectionCategory,
  sentences: readonly SentenceSpan[],
  config: SectionConfig
): Section {
  const { patterns, maxSnippetsPerSection, delimiter } = config.sections

  for (const rule of patterns[category]) {
    const matches = findAll(text, rule.pattern)
    if (matches.length === 0) continue

    const kept: TextSpan[] = []
    for (const match of matches) {
      if (kept.length >= maxSnippetsPerSection) break
      const span = expandMatch(text, match, rule.context, sentences)
      if (!kept.some((k) => overlaps(k, span))) kept.push(span)
    }

    const snippets = kept
      .sort((a, b) => a.start - b.start)
      .map((span) => text.slice(span.start, span.end))
    return { category, found: true, snippets, text: snippets.join(delimiter) }
  }

  return notFound(category, config)
}

/**
 * Extract all seven sections from normalized text. Categories with no
 * matching pattern carry the not-found sentinel.
 */
export function extractSections(text: string, config: SectionConfig): SectionReport {
  const sentences = splitSentences(text, config)
  const section = (category: SectionCategory): Section =>
    extractSection(text, category, sentences, config)

  return Object.freeze({
    definitions: section("definitions"),
    obligations: section("obligations"),
    responsibilities: section("responsibilities"),
    eligibility: section("eligibility"),
    payments: section("payments"),
    penalties: section("penalties"),
    record_keeping: section("record_keeping"),
  })
}

/** Sections in category order */
export function listSections(report: SectionReport): Section[] {
  return SECTION_CATEGORIES.map((category) => report[category])
}

/** `sections.json` view: one string per category */
export function toSectionReportJson(report: SectionReport): SectionReportJson {
  return {
    definitions: report.definitions.text,
    obligations: report.obligations.text,
    responsibilities: report.responsibilities.text,
    eligibility: report.eligibility.text,
    payments: report.payments.text,
    penalties: report.penalties.text,
    record_keeping: report.record_keeping.text,
  }
}
