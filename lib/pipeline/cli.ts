/**
 * @fileoverview Command-line helpers for `scripts/process-act.ts`
 * @module lib/pipeline/cli
 */

import type { OcrSettings } from "@/lib/document-extraction"
import type { Env } from "@/lib/env"
import { BadRequestError, toAppError } from "@/lib/errors"

export const USAGE = "Usage: npm run process-act -- <path-to-act.pdf>"

/**
 * PDF path from the first CLI argument, else `ACT_PDF_PATH`.
 *
 * @throws BadRequestError when neither is set
 */
export function resolvePdfPath(args: readonly string[], env: Pick<Env, "ACT_PDF_PATH">): string {
  const path = args[0] ?? env.ACT_PDF_PATH
  if (!path) {
    throw new BadRequestError(`No PDF given. ${USAGE}`)
  }
  return path
}

export function ocrSettingsFromEnv(
  env: Pick<Env, "OCR_ENABLED" | "OCR_LANGUAGE" | "OCR_SCALE" | "OCR_LANG_PATH">
): OcrSettings {
  return {
    enabled: env.OCR_ENABLED,
    language: env.OCR_LANGUAGE,
    scale: env.OCR_SCALE,
    langPath: env.OCR_LANG_PATH,
  }
}

/**
 * One stderr line and an exit code for any thrown value.
 */
export function describeFailure(error: unknown): { line: string; exitCode: number } {
  const appError = toAppError(error)
  const details = appError.details?.map((d) => (d.field ? `${d.field}: ${d.message}` : d.message))
  const suffix = details && details.length > 0 ? ` [${details.join("; ")}]` : ""
  return {
    line: `[process-act] ${appError.code}: ${appError.message}${suffix}`,
    exitCode: appError.exitCode,
  }
}
