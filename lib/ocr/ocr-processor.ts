/**
 * @fileoverview Main OCR processor
 * @module lib/ocr/ocr-processor
 *
 * Renders the requested PDF pages and runs Tesseract over them, one page
 * at a time. A page that fails to recognize becomes an `OcrFailedError`
 * in the result instead of aborting the remaining pages.
 */

import { OcrFailedError } from "@/lib/errors"
import { Err, partition, tryCatchWith, type Result } from "@/lib/result"
import { renderPdfPages } from "./pdf-to-image"
import { createOcrWorker, recognizePage } from "./tesseract-worker"
import type { OcrPageResult, OcrResult, OcrWorkerOptions, PdfToImageOptions } from "./types"
import { CONFIDENCE_THRESHOLD } from "./types"

export interface OcrPagesOptions extends Omit<PdfToImageOptions, "pageNumbers">, OcrWorkerOptions {
  /** Called after each page is processed */
  onProgress?: (processed: number, total: number) => void
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Aggregate per-page outcomes into an OCR result.
 */
export function summarizeOcrOutcomes(
  outcomes: readonly Result<OcrPageResult, OcrFailedError>[]
): OcrResult {
  const { values: pages, errors: failures } = partition(outcomes)
  const totalConfidence = pages.reduce((sum, page) => sum + page.confidence, 0)

  return {
    pages,
    failures,
    averageConfidence: pages.length > 0 ? totalConfidence / pages.length : 0,
    lowConfidencePages: pages
      .filter((p) => p.confidence < CONFIDENCE_THRESHOLD)
      .map((p) => p.pageNumber),
  }
}

/**
 * OCR the given 1-based pages of a PDF.
 *
 * Memory considerations:
 * - Pages processed sequentially
 * - Single Tesseract worker reused across all pages
 * - Worker always terminated in finally block
 *
 * Rendering or worker start-up failures are thrown; per-page recognition
 * failures are returned in `failures`.
 *
 * @example
 * ```ts
 * const result = await ocrPages(pdfBuffer, [2, 5], { language: "eng" })
 * for (const failure of result.failures) {
 *   console.warn("[OCR] Page failed", failure.toJSON())
 * }
 * ```
 */
export async function ocrPages(
  buffer: Buffer,
  pageNumbers: readonly number[],
  options: OcrPagesOptions = {}
): Promise<OcrResult> {
  if (pageNumbers.length === 0) return summarizeOcrOutcomes([])

  const { onProgress, language, langPath, ...renderOptions } = options
  const worker = await createOcrWorker({ language, langPath })

  try {
    const outcomes = new Map<number, Result<OcrPageResult, OcrFailedError>>()

    for await (const rendered of renderPdfPages(buffer, { ...renderOptions, pageNumbers })) {
      const outcome = await tryCatchWith(
        () => recognizePage(worker, rendered.image, rendered.pageNumber),
        (e) => new OcrFailedError(rendered.pageNumber, describeError(e))
      )
      if (!outcome.ok) {
        console.warn("[OCR] Page recognition failed", outcome.error.toJSON())
      }
      outcomes.set(rendered.pageNumber, outcome)
      onProgress?.(outcomes.size, pageNumbers.length)
    }

    const ordered = pageNumbers.map(
      (pageNumber) =>
        outcomes.get(pageNumber) ??
        Err(new OcrFailedError(pageNumber, `Page ${pageNumber} was not rendered`))
    )
    const result = summarizeOcrOutcomes(ordered)

    console.log("[OCR] Processing complete", {
      requested: pageNumbers.length,
      recognized: result.pages.length,
      failed: result.failures.map((f) => f.pageNumber),
      averageConfidence: result.averageConfidence.toFixed(1),
    })

    return result
  } finally {
    await worker.terminate()
  }
}

/** Mark every requested page as failed with the same cause */
export function failAllPages(pageNumbers: readonly number[], error: unknown): OcrResult {
  const message = describeError(error)
  return summarizeOcrOutcomes(
    pageNumbers.map((pageNumber) => Err(new OcrFailedError(pageNumber, message)))
  )
}
