/**
 * @fileoverview Unified document extraction entry point
 *
 * Reads the text layer of every page, sends pages without one to OCR and
 * returns one `Page` per PDF page, tagged with how its text was obtained.
 * A page that yields nothing by either route is kept as `failed` with
 * empty text; it never aborts the run.
 *
 * @module lib/document-extraction/extract-document
 */

import { startSpan, SpanOp } from '@/lib/metrics'
import { assessOcrQuality, failAllPages, ocrPages, type OcrResult } from '@/lib/ocr'
import { tryCatchWith } from '@/lib/result'
import type { AnalysisConfig } from '@/lib/text-analysis/config'
import { normalizeText } from '@/lib/text-analysis/normalizer'
import type { ActDocument, Page } from '@/lib/text-analysis/types'
import { extractPdfPages } from './pdf-extractor'
import type { ExtractionResult } from './types'
import { needsOcr, validateExtractionQuality } from './validators'

// ============================================================================
// Types
// ============================================================================

export interface OcrSettings {
  enabled: boolean
  /** Tesseract language code */
  language?: string
  /** Local directory holding traineddata files */
  langPath?: string
  /** Render scale for page images */
  scale?: number
}

export interface ExtractDocumentOptions {
  ocr?: OcrSettings
}

// ============================================================================
// Page assembly
// ============================================================================

/**
 * Combine direct page texts with OCR results.
 *
 * Pages with a text layer keep it. Pages without one take their OCR text
 * when it is non-empty; anything else is `failed`.
 */
export function assemblePages(pageTexts: readonly string[], ocr?: OcrResult): Page[] {
  const recognized = new Map(ocr?.pages.map((p) => [p.pageNumber, p] as const))

  return pageTexts.map((text, i): Page => {
    const pageNumber = i + 1
    if (!needsOcr(text)) {
      return { pageNumber, text, method: 'direct' }
    }

    const ocrPage = recognized.get(pageNumber)
    if (ocrPage && ocrPage.text.trim().length > 0) {
      return {
        pageNumber,
        text: ocrPage.text.normalize('NFC'),
        method: 'ocr',
        ocrConfidence: ocrPage.confidence,
      }
    }

    return { pageNumber, text: '', method: 'failed' }
  })
}

async function runOcr(
  buffer: Buffer,
  pending: readonly number[],
  settings: OcrSettings
): Promise<OcrResult> {
  const outcome = await tryCatchWith(
    () =>
      startSpan('ocr-pages', SpanOp.OCR, () =>
        ocrPages(buffer, pending, {
          language: settings.language,
          langPath: settings.langPath,
          scale: settings.scale,
          onProgress: (processed, total) =>
            console.log('[OCR] Page recognized', { processed, total }),
        }),
        { pages: pending.length }
      ),
    (error) => error
  )

  if (outcome.ok) return outcome.value

  console.error('[OCR] OCR could not run; pages marked as failed', {
    pages: pending,
    error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
  })
  return failAllPages(pending, outcome.error)
}

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Extracts per-page text from a PDF buffer, with OCR fallback.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt file
 */
export async function extractDocument(
  buffer: Buffer,
  options: ExtractDocumentOptions = {}
): Promise<ExtractionResult> {
  const settings: OcrSettings = options.ocr ?? { enabled: true }

  const direct = await startSpan('extract-pages', SpanOp.EXTRACT, () => extractPdfPages(buffer), {
    bytes: buffer.length,
  })

  const pending = direct.pageTexts
    .map((text, i) => ({ text, pageNumber: i + 1 }))
    .filter((page) => needsOcr(page.text))
    .map((page) => page.pageNumber)

  const ocr =
    settings.enabled && pending.length > 0 ? await runOcr(buffer, pending, settings) : undefined

  const pages = assemblePages(direct.pageTexts, ocr)
  const quality = validateExtractionQuality(pages, settings.enabled)
  const ocrQuality = ocr ? assessOcrQuality(ocr) : undefined

  if (ocrQuality?.isLowQuality && ocrQuality.warningMessage) {
    quality.warnings.push({ type: 'low_ocr_confidence', message: ocrQuality.warningMessage })
  }

  const result: ExtractionResult = {
    pages,
    quality,
    metadata: direct.metadata,
    ...(ocrQuality && { ocrQuality }),
  }

  logExtractionMetrics(result)
  return result
}

// ============================================================================
// Document
// ============================================================================

/**
 * Build the immutable document the analysis stages run on.
 */
export function buildDocument(
  pages: readonly Page[],
  config: Pick<AnalysisConfig, 'normalizer'>
): ActDocument {
  const pageTexts = pages.map((p) => p.text)
  const rawText = pageTexts.join('\n')
  const text = normalizeText(pageTexts, config)

  return Object.freeze({
    pages: Object.freeze(pages.map((p) => Object.freeze({ ...p }))),
    rawText,
    text,
    rawLength: rawText.length,
    cleanedLength: text.length,
  })
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(result: ExtractionResult): void {
  console.log('[Extraction] Complete', {
    pageCount: result.quality.pageCount,
    directPages: result.quality.directPages,
    ocrPages: result.quality.ocrPages,
    failedPages: result.quality.failedPages,
    charCount: result.quality.charCount,
    wordCount: result.quality.wordCount,
    ocrConfidence: result.ocrQuality?.confidence.toFixed(1),
    warnings: result.quality.warnings.map((w) => w.type),
    hasTitle: !!result.metadata.title,
  })
}
