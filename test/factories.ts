// test/factories.ts
import { buildDocument } from "@/lib/document-extraction/extract-document"
import type { ExtractionResult } from "@/lib/document-extraction/types"
import { validateExtractionQuality } from "@/lib/document-extraction/validators"
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "@/lib/text-analysis/config"
import type { ActDocument, Page } from "@/lib/text-analysis/types"

export function createPage(pageNumber: number, text: string, overrides: Partial<Page> = {}): Page {
  return {
    pageNumber,
    text,
    method: text.trim().length > 0 ? "direct" : "failed",
    ...overrides,
  }
}

/** Pages numbered from 1; empty texts become failed pages */
export function createPages(texts: readonly string[]): Page[] {
  return texts.map((text, i) => createPage(i + 1, text))
}

export function createDocument(
  texts: readonly string[],
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): ActDocument {
  return buildDocument(createPages(texts), config)
}

export function createExtraction(
  pages: Page[],
  overrides: Partial<ExtractionResult> = {}
): ExtractionResult {
  return {
    pages,
    quality: validateExtractionQuality(pages),
    metadata: {},
    ...overrides,
  }
}
