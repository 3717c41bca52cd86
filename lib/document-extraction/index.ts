/**
 * @fileoverview Document extraction module
 *
 * unpdf and the OCR libraries are imported lazily inside the extractors,
 * so this barrel is safe to load anywhere.
 *
 * @module lib/document-extraction
 */

// Types
export type {
  ExtractionResult,
  QualityMetrics,
  ExtractionWarning,
  DocumentMetadata,
  PdfExtraction,
} from './types'

// Extractors
export { extractPdfPages } from './pdf-extractor'

// Validators
export { validateExtractionQuality, needsOcr, MIN_PAGE_TEXT_LENGTH } from './validators'

// Unified extraction
export {
  extractDocument,
  assemblePages,
  buildDocument,
  type ExtractDocumentOptions,
  type OcrSettings,
} from './extract-document'
