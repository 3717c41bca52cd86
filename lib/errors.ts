/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new NoInputPagesError()
 *   throw new ValidationError("Invalid config", [{ field: "summary.maxSentences", message: "Too small" }])
 *   throw new CorruptDocumentError() // Uses default message
 *
 * At the CLI boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     console.error(`[process-act] ${appError.code}: ${appError.message}`)
 *   }
 */

export type ErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  // Domain-specific error codes for the Act processing pipeline
  | "NO_INPUT_PAGES"
  | "CORRUPT_DOCUMENT"
  | "ENCRYPTED_DOCUMENT"
  | "OCR_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly exitCode: number = 1,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Generic usage error (bad CLI arguments, missing input path)
 */
export class BadRequestError extends AppError {
  constructor(message = "Bad request", details?: ErrorDetail[]) {
    super("BAD_REQUEST", message, 2, details)
  }
}

/**
 * Input validation failed (configuration, environment)
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 2, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * Input file doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "File not found") {
    super("NOT_FOUND", message, 1)
  }
}

/**
 * Unexpected failure
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 1)
  }
}

/**
 * The extractor returned no pages at all. The only fatal input condition:
 * raised before any analysis stage runs.
 */
export class NoInputPagesError extends AppError {
  constructor(message = "The document has no pages to process") {
    super("NO_INPUT_PAGES", message, 1)
  }
}

/**
 * PDF bytes could not be parsed
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "The PDF appears to be corrupt or is not a PDF") {
    super("CORRUPT_DOCUMENT", message, 1)
  }
}

/**
 * PDF is password-protected
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "The PDF is password-protected") {
    super("ENCRYPTED_DOCUMENT", message, 1)
  }
}

/**
 * OCR of a single page failed. Never escapes the extractor: the page is
 * recorded as failed and contributes no text.
 */
export class OcrFailedError extends AppError {
  constructor(
    public readonly pageNumber: number,
    message = `OCR failed for page ${pageNumber}`
  ) {
    super("OCR_FAILED", message, 1, [{ field: "page", message: String(pageNumber) }])
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message)
  }

  return new InternalError("An unexpected error occurred")
}
