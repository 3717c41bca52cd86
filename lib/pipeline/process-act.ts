/**
 * @fileoverview Act processing orchestration
 *
 * PDF → pages (direct text, OCR fallback) → gate → document → analysis →
 * artifacts → run report. Only a missing input file, an unreadable PDF or
 * a PDF without pages stops the run.
 *
 * @module lib/pipeline/process-act
 */

import { readFile } from "node:fs/promises"
import {
  buildDocument,
  extractDocument,
  type ExtractionResult,
  type OcrSettings,
} from "@/lib/document-extraction"
import { NotFoundError } from "@/lib/errors"
import { fmt, logger } from "@/lib/logger"
import { startSpan, SpanOp } from "@/lib/metrics"
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "@/lib/text-analysis/config"
import type { ActDocument } from "@/lib/text-analysis/types"
import { analyzeDocument, type AnalysisResult } from "./analyze-document"
import { renderArtifacts, writeArtifacts, type WrittenArtifact } from "./artifacts"
import { enforceGate, validateExtractedPages } from "./gates"
import { buildRunReport, type RunReport } from "./run-report"

export interface ProcessActOptions {
  outputDir: string
  ocr: OcrSettings
  config?: AnalysisConfig
}

export interface ProcessActResult {
  extraction: ExtractionResult
  document: ActDocument
  analysis: AnalysisResult
  files: WrittenArtifact[]
  report: RunReport
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

async function readPdf(pdfPath: string): Promise<Buffer> {
  try {
    return await readFile(pdfPath)
  } catch (error) {
    if (isMissingFile(error)) {
      throw new NotFoundError(`File not found: ${pdfPath}`)
    }
    throw error
  }
}

/**
 * Process one Act PDF and write its artifacts to `options.outputDir`.
 *
 * @throws NotFoundError - `pdfPath` does not exist
 * @throws EncryptedDocumentError | CorruptDocumentError - unreadable PDF
 * @throws NoInputPagesError - the PDF has no pages
 */
export async function processAct(
  pdfPath: string,
  options: ProcessActOptions
): Promise<ProcessActResult> {
  const config = options.config ?? DEFAULT_ANALYSIS_CONFIG

  return startSpan(
    "process-act",
    SpanOp.TASK,
    async () => {
      const buffer = await readPdf(pdfPath)
      console.log("[Pipeline] Processing Act", { pdfPath, bytes: buffer.length })

      const extraction = await extractDocument(buffer, { ocr: options.ocr })
      const warnings = enforceGate(validateExtractedPages(extraction.pages))

      const document = buildDocument(extraction.pages, config)
      const analysis = analyzeDocument(document, config)

      const files = await startSpan("write-artifacts", SpanOp.FILE_WRITE, () =>
        writeArtifacts(options.outputDir, renderArtifacts(document, analysis))
      )

      const report = buildRunReport({ extraction, document, analysis, files, warnings, config })

      logger.info("Act processed", {
        pages: report.pages.total,
        ocrPages: report.pages.ocr,
        failedPages: report.pages.failed,
        cleanedLength: report.cleanedLength,
        lowConfidenceRules: report.lowConfidenceRules.join(","),
        sectionsNotFound: report.sectionsNotFound.join(","),
      })
      for (const rule of report.lowConfidenceRules) {
        logger.warn(fmt`Rule ${rule} below confidence threshold`)
      }

      return { extraction, document, analysis, files, report }
    },
    { pdfPath }
  )
}
