/**
 * @fileoverview OCR type definitions
 * @module lib/ocr/types
 */

import type { OcrFailedError } from "@/lib/errors"

/** Confidence threshold below which a warning is shown (85%) */
export const CONFIDENCE_THRESHOLD = 85

/** Confidence threshold below which OCR may be unusable (60%) */
export const CRITICAL_THRESHOLD = 60

/** Maximum pages to OCR in one run */
export const MAX_OCR_PAGES = 100

/** OCR result for a single page */
export interface OcrPageResult {
  pageNumber: number
  text: string
  /** Tesseract confidence 0-100 */
  confidence: number
}

/** Aggregated OCR result for the pages that were sent to OCR */
export interface OcrResult {
  /** Pages that were recognized */
  pages: OcrPageResult[]
  /** Pages that could not be rendered or recognized */
  failures: OcrFailedError[]
  /** Average confidence across recognized pages */
  averageConfidence: number
  /** Page numbers with confidence below CONFIDENCE_THRESHOLD */
  lowConfidencePages: number[]
}

/** Quality assessment of OCR output */
export interface OcrQuality {
  /** Average confidence 0-100 */
  confidence: number
  isLowQuality: boolean
  /** Warning for the run report (if applicable) */
  warningMessage?: string
  /** Pages with confidence below threshold */
  affectedPages: number[]
}

export interface OcrWorkerOptions {
  /** Tesseract language code, e.g. "eng" */
  language?: string
  /** Directory holding `<lang>.traineddata.gz` */
  langPath?: string
}

/** Options for PDF-to-image conversion */
export interface PdfToImageOptions {
  /** Scale factor for rendering (2.0 = 2x resolution, better for OCR) */
  scale?: number
  /** Maximum pages to render (default: MAX_OCR_PAGES) */
  maxPages?: number
  /** Only yield these 1-based pages; all pages when omitted */
  pageNumbers?: readonly number[]
}

/** A rendered PDF page as image buffer */
export interface RenderedPage {
  pageNumber: number
  /** PNG image data */
  image: Buffer
}
