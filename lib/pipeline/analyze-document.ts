/**
 * @fileoverview Analysis pipeline over a built document
 *
 * Document → Keywords → Summary, and Document → Sections → Rule results.
 * Every stage is a pure function of the document text and the config, so
 * the same input always yields byte-identical artifacts.
 *
 * @module lib/pipeline/analyze-document
 */

import { startSpanSync, SpanOp } from "@/lib/metrics"
import {
  checkRules,
  extractKeywords,
  extractSections,
  summarize,
  type ActDocument,
  type AnalysisConfig,
  type Keyword,
  type RuleResult,
  type SectionReport,
  type SummaryResult,
} from "@/lib/text-analysis"

export interface AnalysisResult {
  keywords: Keyword[]
  summary: SummaryResult
  sections: SectionReport
  rules: RuleResult[]
}

function stage<T>(name: string, document: ActDocument, fn: () => T): T {
  return startSpanSync(name, SpanOp.ANALYZE, fn, { cleanedLength: document.cleanedLength })
}

export function analyzeDocument(document: ActDocument, config: AnalysisConfig): AnalysisResult {
  const { text } = document

  const keywords = stage("keywords", document, () => extractKeywords(text, config))
  const summary = stage("summary", document, () => summarize(text, config, keywords))
  const sections = stage("sections", document, () => extractSections(text, config))
  const rules = stage("rules", document, () => checkRules(sections, text, config))

  return { keywords, summary, sections, rules }
}
