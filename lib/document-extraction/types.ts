/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

import type { OcrQuality } from '@/lib/ocr/types'
import type { Page } from '@/lib/text-analysis/types'

export interface ExtractionWarning {
  type: 'ocr_used' | 'ocr_failed' | 'ocr_disabled' | 'low_ocr_confidence' | 'empty_pages'
  message: string
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

/** Direct (text layer) extraction of a PDF */
export interface PdfExtraction {
  /** One entry per page, in page order, NFC-normalized */
  pageTexts: string[]
  pageCount: number
  metadata: DocumentMetadata
}

export interface QualityMetrics {
  /** Characters across all page texts */
  charCount: number
  /** Estimated word count */
  wordCount: number
  pageCount: number
  directPages: number
  ocrPages: number
  /** Page numbers that yielded no text by either method */
  failedPages: number[]
  warnings: ExtractionWarning[]
}

export interface ExtractionResult {
  pages: Page[]
  quality: QualityMetrics
  metadata: DocumentMetadata
  /** Present when at least one page went to OCR */
  ocrQuality?: OcrQuality
}
