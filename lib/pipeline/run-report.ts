/**
 * @fileoverview Run report
 *
 * `buildRunReport` collects the numbers of one run; `formatRunReport`
 * renders them as console lines. Low-confidence rules and missing sections
 * are always listed, even when empty.
 *
 * @module lib/pipeline/run-report
 */

import type { ExtractionResult } from "@/lib/document-extraction"
import type { AnalysisConfig } from "@/lib/text-analysis/config"
import { listSections } from "@/lib/text-analysis/section-extractor"
import type { ActDocument, RuleStatus, SectionCategory } from "@/lib/text-analysis/types"
import type { AnalysisResult } from "./analyze-document"
import type { WrittenArtifact } from "./artifacts"
import type { GateMessage } from "./messages"

// ============================================================================
// Types
// ============================================================================

export interface SectionStatus {
  category: SectionCategory
  found: boolean
  snippets: number
  length: number
}

export interface RuleStatusLine {
  rule: string
  status: RuleStatus
  confidence: number
  lowConfidence: boolean
}

export interface RunReport {
  pages: {
    total: number
    direct: number
    ocr: number
    failed: number
    failedPages: number[]
  }
  ocrConfidence?: number
  ocrWarning?: string
  rawLength: number
  cleanedLength: number
  summaryBullets: number
  paddedBullets: number
  files: WrittenArtifact[]
  sections: SectionStatus[]
  rules: RuleStatusLine[]
  lowConfidenceRules: string[]
  sectionsNotFound: SectionCategory[]
  warnings: GateMessage[]
}

export interface RunReportInput {
  extraction: ExtractionResult
  document: ActDocument
  analysis: AnalysisResult
  files: WrittenArtifact[]
  warnings: GateMessage[]
  config: Pick<AnalysisConfig, "report">
}

// ============================================================================
// Build
// ============================================================================

export function buildRunReport(input: RunReportInput): RunReport {
  const { extraction, document, analysis, files, warnings, config } = input
  const threshold = config.report.lowConfidenceThreshold
  const { ocrQuality } = extraction

  const sections = listSections(analysis.sections).map((s) => ({
    category: s.category,
    found: s.found,
    snippets: s.snippets.length,
    length: s.found ? s.text.length : 0,
  }))

  const rules = analysis.rules.map((r) => ({
    rule: r.rule,
    status: r.status,
    confidence: r.confidence,
    lowConfidence: r.confidence < threshold,
  }))

  return {
    pages: {
      total: document.pages.length,
      direct: extraction.quality.directPages,
      ocr: extraction.quality.ocrPages,
      failed: extraction.quality.failedPages.length,
      failedPages: [...extraction.quality.failedPages],
    },
    ...(ocrQuality && extraction.quality.ocrPages > 0
      ? { ocrConfidence: ocrQuality.confidence }
      : {}),
    ...(ocrQuality?.warningMessage ? { ocrWarning: ocrQuality.warningMessage } : {}),
    rawLength: document.rawLength,
    cleanedLength: document.cleanedLength,
    summaryBullets: analysis.summary.summary_bullets.length,
    paddedBullets: analysis.summary.paddedCount,
    files,
    sections,
    rules,
    lowConfidenceRules: rules.filter((r) => r.lowConfidence).map((r) => r.rule),
    sectionsNotFound: sections.filter((s) => !s.found).map((s) => s.category),
    warnings,
  }
}

// ============================================================================
// Format
// ============================================================================

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(", ") : "none"
}

export function formatRunReport(report: RunReport): string[] {
  const { pages } = report
  const lines: string[] = []

  lines.push("📄 Act Processing Report", "=".repeat(60))

  lines.push(
    `Pages: ${pages.total} (direct ${pages.direct}, OCR ${pages.ocr}, failed ${pages.failed})`
  )
  if (pages.failed > 0) {
    lines.push(`   OCR failures on pages: ${pages.failedPages.join(", ")}`)
  }
  if (report.ocrConfidence !== undefined) {
    lines.push(`   OCR confidence: ${report.ocrConfidence.toFixed(1)}%`)
  }
  if (report.ocrWarning) {
    lines.push(`   ⚠️  ${report.ocrWarning}`)
  }
  lines.push(`Text length: raw ${report.rawLength}, cleaned ${report.cleanedLength}`)
  lines.push(
    `Summary bullets: ${report.summaryBullets}` +
      (report.paddedBullets > 0 ? ` (${report.paddedBullets} padded)` : "")
  )

  lines.push("", "Files:")
  for (const file of report.files) {
    lines.push(`   ${file.name}: ${file.bytes} bytes`)
  }

  lines.push("", "Sections:")
  for (const section of report.sections) {
    const status = section.found ? "✅" : "❌"
    const detail = section.found
      ? `${section.length} chars, ${section.snippets} snippet(s)`
      : "not found"
    lines.push(`${status} ${section.category}: ${detail}`)
  }

  lines.push("", "Rules:")
  for (const rule of report.rules) {
    const status = rule.status === "pass" ? "✅" : "❌"
    const flag = rule.lowConfidence ? " ⚠️  low confidence" : ""
    lines.push(`${status} ${rule.rule}: ${rule.status} (${rule.confidence}%)${flag}`)
  }

  if (report.warnings.length > 0) {
    lines.push("", "Warnings:")
    for (const warning of report.warnings) {
      lines.push(`   - ${warning.code}: ${warning.message}`)
    }
  }

  lines.push(
    "",
    "=".repeat(60),
    `Low-confidence rules: ${listOrNone(report.lowConfidenceRules)}`,
    `Sections not found: ${listOrNone(report.sectionsNotFound)}`
  )

  return lines
}
