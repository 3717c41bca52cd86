/**
 * @fileoverview OCR module exports
 * @module lib/ocr
 *
 * tesseract.js and pdf-to-img are imported lazily inside the worker and
 * renderer, so importing this barrel stays cheap.
 */

export * from "./types"
export { renderPdfPages } from "./pdf-to-image"
export { createOcrWorker, recognizePage, resolveLangPath } from "./tesseract-worker"
export { ocrPages, failAllPages, summarizeOcrOutcomes, type OcrPagesOptions } from "./ocr-processor"
export { assessOcrQuality } from "./quality"
