/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless-optimized PDF.js build). Text is kept per page
 * so pages without a text layer can be routed to OCR individually.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { EncryptedDocumentError, CorruptDocumentError } from '@/lib/errors'
import type { DocumentMetadata, PdfExtraction } from './types'

function metaString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

async function readMetadata(
  getInfo: () => Promise<{ info?: Record<string, unknown> }>
): Promise<DocumentMetadata> {
  try {
    const { info } = await getInfo()
    return {
      title: metaString(info?.Title),
      author: metaString(info?.Author),
      creationDate: metaString(info?.CreationDate),
      modificationDate: metaString(info?.ModDate),
    }
  } catch (error: unknown) {
    // Metadata is optional; the page text is what matters
    console.warn('[Extraction] Could not read PDF metadata', {
      error: error instanceof Error ? error.message : String(error),
    })
    return {}
  }
}

/**
 * Extracts per-page text from a PDF buffer.
 *
 * PDF.js outputs text in content-stream order, which linearizes
 * multi-column layouts.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 */
export async function extractPdfPages(buffer: Buffer): Promise<PdfExtraction> {
  const { extractText, getDocumentProxy, getMeta } = await import('unpdf')

  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer))

    try {
      const { totalPages, text } = await extractText(pdf, { mergePages: false })
      const metadata = await readMetadata(() => getMeta(pdf))

      return {
        pageTexts: text.map((page) => page.normalize('NFC')),
        pageCount: totalPages,
        metadata,
      }
    } finally {
      await pdf.destroy()
    }
  } catch (error: unknown) {
    throw classifyPdfError(error)
  }
}

/**
 * Map a PDF.js failure onto the document errors. Anything unrecognised is
 * returned unchanged.
 */
export function classifyPdfError(error: unknown): unknown {
  const errorMessage = error instanceof Error ? error.message : String(error)

  if (errorMessage.includes('password') || errorMessage.includes('encrypted')) {
    return new EncryptedDocumentError()
  }
  if (
    errorMessage.includes('Invalid PDF') ||
    errorMessage.includes('not a PDF') ||
    errorMessage.includes('Missing PDF')
  ) {
    return new CorruptDocumentError()
  }
  return error
}
