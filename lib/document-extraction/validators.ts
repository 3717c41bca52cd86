/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { Page } from '@/lib/text-analysis/types'
import type { ExtractionWarning, QualityMetrics } from './types'

/** A page whose text layer is shorter than this goes to OCR */
export const MIN_PAGE_TEXT_LENGTH = 1

/**
 * True when the text layer carries no usable text (scanned page).
 */
export function needsOcr(pageText: string): boolean {
  return pageText.trim().length < MIN_PAGE_TEXT_LENGTH
}

function pageList(pages: readonly number[]): string {
  return pages.join(', ')
}

/**
 * Quality metrics over the final page list.
 */
export function validateExtractionQuality(
  pages: readonly Page[],
  ocrEnabled = true
): QualityMetrics {
  const text = pages.map((p) => p.text).join('\n')
  const charCount = text.length
  const wordCount = text.split(/\s+/).filter(Boolean).length
  const directPages = pages.filter((p) => p.method === 'direct').length
  const ocrPages = pages.filter((p) => p.method === 'ocr').length
  const failedPages = pages.filter((p) => p.method === 'failed').map((p) => p.pageNumber)
  const warnings: ExtractionWarning[] = []

  if (ocrPages > 0) {
    warnings.push({
      type: 'ocr_used',
      message: `${ocrPages} page(s) had no text layer and were read with OCR`,
    })
  }

  if (failedPages.length > 0) {
    warnings.push(
      ocrEnabled
        ? {
            type: 'ocr_failed',
            message: `No text could be extracted from page(s) ${pageList(failedPages)}`,
          }
        : {
            type: 'ocr_disabled',
            message: `Page(s) ${pageList(failedPages)} have no text layer and OCR is disabled`,
          }
    )
  }

  if (pages.length > 0 && wordCount === 0) {
    warnings.push({
      type: 'empty_pages',
      message: 'No page of the document yielded any text',
    })
  }

  return {
    charCount,
    wordCount,
    pageCount: pages.length,
    directPages,
    ocrPages,
    failedPages,
    warnings,
  }
}
