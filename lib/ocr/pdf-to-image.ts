/**
 * @fileoverview PDF to image conversion for OCR
 * @module lib/ocr/pdf-to-image
 */

import type { PdfToImageOptions, RenderedPage } from "./types"
import { MAX_OCR_PAGES } from "./types"

/**
 * Render PDF pages as images for OCR processing.
 *
 * pdf-to-img renders every page in order, so pages outside `pageNumbers`
 * are still rasterised but never yielded. Iteration stops after the last
 * requested page.
 *
 * @example
 * ```ts
 * for await (const page of renderPdfPages(buffer, { pageNumbers: [3, 7] })) {
 *   await recognizePage(worker, page.image, page.pageNumber)
 * }
 * ```
 */
export async function* renderPdfPages(
  buffer: Buffer,
  options: PdfToImageOptions = {}
): AsyncGenerator<RenderedPage> {
  const { scale = 2.0, maxPages = MAX_OCR_PAGES, pageNumbers } = options
  const wanted = pageNumbers ? new Set(pageNumbers) : undefined
  const lastWanted = pageNumbers && pageNumbers.length > 0 ? Math.max(...pageNumbers) : Infinity

  // Loaded lazily so pdfjs only comes in when a page actually needs OCR
  const { pdf } = await import("pdf-to-img")

  const document = await pdf(buffer, { scale })

  let pageNumber = 0
  let yielded = 0
  for await (const pageImage of document) {
    pageNumber++

    if (pageNumber > lastWanted) break
    if (wanted && !wanted.has(pageNumber)) continue

    if (yielded >= maxPages) {
      console.log("[OCR] Reached max pages limit", {
        maxPages,
        pageNumber,
      })
      break
    }

    yielded++
    yield { pageNumber, image: pageImage }
  }
}
