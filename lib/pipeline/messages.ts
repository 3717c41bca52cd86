/**
 * @fileoverview Validation messages for the Act processing pipeline
 *
 * Plain-language messages with a suggestion, printed in the run report
 * and carried by the errors the gates raise.
 *
 * @module lib/pipeline/messages
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a validation gate check.
 */
export interface ValidationResult {
  /** False only for fatal conditions */
  valid: boolean
  /** Fatal problem, if any */
  error?: GateMessage
  /** Problems that do not stop the run */
  warnings: GateMessage[]
}

export interface GateMessage {
  /** Code for logging (e.g. NO_INPUT_PAGES, EMPTY_DOCUMENT) */
  code: keyof typeof VALIDATION_MESSAGES
  message: string
  /** Which pipeline stage raised it */
  stage: string
  suggestion?: string
}

// ============================================================================
// Message Templates
// ============================================================================

export const VALIDATION_MESSAGES = {
  NO_INPUT_PAGES: {
    message: "The PDF contains no pages.",
    suggestion: "Check that the file is a complete PDF export of the Act.",
  },
  EMPTY_DOCUMENT: {
    message: "No text could be extracted from any page.",
    suggestion:
      "The PDF may be a scan. Enable OCR (OCR_ENABLED=true) or provide a PDF with a text layer.",
  },
  FAILED_PAGES: {
    message: "Some pages yielded no text and were skipped.",
    suggestion: "Check the OCR language data, or the listed pages in the source PDF.",
  },
} as const

// ============================================================================
// Formatting
// ============================================================================

export function formatGateMessage(
  code: keyof typeof VALIDATION_MESSAGES,
  stage: string,
  detail?: string
): GateMessage {
  const template = VALIDATION_MESSAGES[code]
  return {
    code,
    stage,
    message: detail ? `${template.message} (${detail})` : template.message,
    suggestion: template.suggestion,
  }
}
