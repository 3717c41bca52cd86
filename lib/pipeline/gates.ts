/**
 * @fileoverview Validation gates for the Act processing pipeline
 *
 * Run after extraction and before any analysis stage. A document with no
 * pages at all is the only fatal condition; everything else degrades to
 * sentinels and is surfaced as a warning.
 *
 * @module lib/pipeline/gates
 */

import { NoInputPagesError } from "@/lib/errors"
import type { Page } from "@/lib/text-analysis/types"
import { formatGateMessage, type GateMessage, type ValidationResult } from "./messages"

/**
 * Check extracted pages before analysis.
 */
export function validateExtractedPages(pages: readonly Page[]): ValidationResult {
  if (pages.length === 0) {
    return {
      valid: false,
      error: formatGateMessage("NO_INPUT_PAGES", "extraction"),
      warnings: [],
    }
  }

  const warnings: GateMessage[] = []
  const failed = pages.filter((p) => p.method === "failed").map((p) => p.pageNumber)

  if (pages.every((p) => p.text.trim().length === 0)) {
    warnings.push(formatGateMessage("EMPTY_DOCUMENT", "extraction"))
  } else if (failed.length > 0) {
    warnings.push(formatGateMessage("FAILED_PAGES", "extraction", `pages ${failed.join(", ")}`))
  }

  return { valid: true, warnings }
}

/**
 * Throw on a fatal gate result, log its warnings otherwise.
 *
 * @throws NoInputPagesError
 */
export function enforceGate(result: ValidationResult): GateMessage[] {
  if (!result.valid) {
    throw new NoInputPagesError(result.error?.message)
  }
  for (const warning of result.warnings) {
    console.warn(`[Pipeline] ${warning.code}: ${warning.message}`, {
      stage: warning.stage,
      suggestion: warning.suggestion,
    })
  }
  return result.warnings
}
