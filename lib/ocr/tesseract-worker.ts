/**
 * @fileoverview Tesseract.js worker management
 * @module lib/ocr/tesseract-worker
 *
 * Workers are memory-intensive. Create one per run, reuse it across
 * pages and always terminate it.
 */

import { createRequire } from "node:module"
import { dirname, join } from "node:path"
import type { Worker } from "tesseract.js"
import { BadRequestError } from "@/lib/errors"
import type { OcrPageResult, OcrWorkerOptions } from "./types"

/** Language data shipped as npm packages (`@tesseract.js-data/<lang>`) */
const BUNDLED_LANGUAGES = new Set(["eng"])

/** Same model tesseract.js would otherwise download */
const BUNDLED_MODEL_DIR = "4.0.0_best_int"

const requireFromHere = createRequire(import.meta.url)

/**
 * Directory holding `<lang>.traineddata.gz` for the worker.
 *
 * An explicit `langPath` wins. Otherwise the data must come from an
 * installed `@tesseract.js-data` package; tesseract.js is never left to
 * fetch it.
 */
export function resolveLangPath(options: OcrWorkerOptions = {}): string {
  const { language = "eng", langPath } = options
  if (langPath) return langPath

  if (!BUNDLED_LANGUAGES.has(language)) {
    throw new BadRequestError(
      `No bundled OCR data for "${language}"; set OCR_LANG_PATH to a directory with ${language}.traineddata.gz`
    )
  }

  const manifest = requireFromHere.resolve(`@tesseract.js-data/${language}/package.json`)
  return join(dirname(manifest), BUNDLED_MODEL_DIR)
}

/**
 * Create a Tesseract worker for the configured language, reading its
 * language data from disk only.
 *
 * @example
 * ```ts
 * const worker = await createOcrWorker({ language: "eng" })
 * try {
 *   // Process pages...
 * } finally {
 *   await worker.terminate()
 * }
 * ```
 */
export async function createOcrWorker(options: OcrWorkerOptions = {}): Promise<Worker> {
  const { language = "eng" } = options
  const langPath = resolveLangPath(options)

  const { createWorker } = await import("tesseract.js")

  // Data is read in place; no cached copy in the working directory
  return createWorker(language, undefined, { langPath, cacheMethod: "none" })
}

/**
 * Recognize text from a rendered page.
 */
export async function recognizePage(
  worker: Worker,
  image: Buffer,
  pageNumber: number
): Promise<OcrPageResult> {
  const result = await worker.recognize(image)

  return {
    pageNumber,
    text: result.data.text,
    // Tesseract confidence is 0-100
    confidence: result.data.confidence,
  }
}
