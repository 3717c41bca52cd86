/**
 * @fileoverview OCR quality assessment
 * @module lib/ocr/quality
 */

import type { OcrResult, OcrQuality } from "./types"
import { CONFIDENCE_THRESHOLD, CRITICAL_THRESHOLD } from "./types"

function listPages(pages: readonly number[]): string {
  return pages.length > 5
    ? `${pages.slice(0, 5).join(", ")} and ${pages.length - 5} more`
    : pages.join(", ")
}

/**
 * Assess OCR quality for the run report.
 *
 * Thresholds:
 * - >= 85%: Good quality, no warning
 * - 60-84%: Low quality, some extracted text may be wrong
 * - < 60%: Critical quality, extracted text may be unusable
 *
 * A result with no recognized pages has nothing to assess and carries no
 * warning; failed pages are reported separately.
 */
export function assessOcrQuality(result: OcrResult): OcrQuality {
  const { averageConfidence, lowConfidencePages } = result

  if (result.pages.length === 0) {
    return { confidence: 0, isLowQuality: false, affectedPages: [] }
  }

  if (averageConfidence < CRITICAL_THRESHOLD) {
    return {
      confidence: averageConfidence,
      isLowQuality: true,
      warningMessage:
        `OCR confidence is very low (${averageConfidence.toFixed(1)}%). ` +
        "Summary, sections and rule checks for OCR pages may be significantly inaccurate.",
      affectedPages: lowConfidencePages,
    }
  }

  if (averageConfidence < CONFIDENCE_THRESHOLD) {
    return {
      confidence: averageConfidence,
      isLowQuality: true,
      warningMessage: `Some OCR pages were difficult to read: ${listPages(lowConfidencePages)}.`,
      affectedPages: lowConfidencePages,
    }
  }

  return {
    confidence: averageConfidence,
    isLowQuality: false,
    affectedPages: [],
  }
}
