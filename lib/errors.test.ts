import { describe, it, expect } from "vitest"
import {
  AppError,
  BadRequestError,
  ValidationError,
  NotFoundError,
  InternalError,
  NoInputPagesError,
  CorruptDocumentError,
  EncryptedDocumentError,
  OcrFailedError,
  isAppError,
  toAppError,
} from "./errors"

describe("Error Classes", () => {
  describe("AppError", () => {
    it("creates error with all properties", () => {
      const error = new AppError("BAD_REQUEST", "Something went wrong", 2, [
        { field: "path", message: "Missing" },
      ])

      expect(error.code).toBe("BAD_REQUEST")
      expect(error.message).toBe("Something went wrong")
      expect(error.exitCode).toBe(2)
      expect(error.details).toEqual([{ field: "path", message: "Missing" }])
      expect(error.isOperational).toBe(true)
      expect(error.name).toBe("AppError")
    })

    it("serializes to JSON without details when absent", () => {
      const error = new AppError("NOT_FOUND", "File not found")

      expect(error.toJSON()).toEqual({
        code: "NOT_FOUND",
        message: "File not found",
      })
    })

    it("includes details in JSON when present", () => {
      const error = new AppError("VALIDATION_ERROR", "Invalid", 2, [
        { field: "OCR_SCALE", message: "Too big" },
      ])

      expect(error.toJSON().details).toEqual([{ field: "OCR_SCALE", message: "Too big" }])
    })
  })

  describe("Specialized Error Classes", () => {
    it("BadRequestError is a usage error", () => {
      const error = new BadRequestError()
      expect(error.code).toBe("BAD_REQUEST")
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe("Bad request")
    })

    it("ValidationError has correct defaults", () => {
      const error = new ValidationError()
      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.exitCode).toBe(2)
      expect(error.message).toBe("Validation failed")
    })

    it("NotFoundError has correct defaults", () => {
      const error = new NotFoundError()
      expect(error.code).toBe("NOT_FOUND")
      expect(error.exitCode).toBe(1)
      expect(error.message).toBe("File not found")
    })

    it("NoInputPagesError has correct defaults", () => {
      const error = new NoInputPagesError()
      expect(error.code).toBe("NO_INPUT_PAGES")
      expect(error.message).toBe("The document has no pages to process")
    })

    it("document errors carry their codes", () => {
      expect(new CorruptDocumentError().code).toBe("CORRUPT_DOCUMENT")
      expect(new EncryptedDocumentError().code).toBe("ENCRYPTED_DOCUMENT")
    })

    it("OcrFailedError records the page", () => {
      const error = new OcrFailedError(4)
      expect(error.code).toBe("OCR_FAILED")
      expect(error.pageNumber).toBe(4)
      expect(error.message).toBe("OCR failed for page 4")
      expect(error.details).toEqual([{ field: "page", message: "4" }])
    })
  })

  describe("ValidationError.fromZodError", () => {
    it("maps issue paths to dotted fields", () => {
      const error = ValidationError.fromZodError({
        issues: [
          { path: ["summary", "minSentences"], message: "Too big" },
          { path: ["rules", "definitions", 0, "name"], message: "Required" },
        ],
      })

      expect(error.details).toEqual([
        { field: "summary.minSentences", message: "Too big" },
        { field: "rules.definitions.0.name", message: "Required" },
      ])
    })
  })

  describe("isAppError", () => {
    it("returns true for AppError instances", () => {
      expect(isAppError(new OcrFailedError(1))).toBe(true)
      expect(isAppError(new InternalError())).toBe(true)
    })

    it("returns false for other values", () => {
      expect(isAppError(new Error("Regular error"))).toBe(false)
      expect(isAppError("string error")).toBe(false)
      expect(isAppError(null)).toBe(false)
    })
  })

  describe("toAppError", () => {
    it("returns AppError unchanged", () => {
      const original = new CorruptDocumentError()
      expect(toAppError(original)).toBe(original)
    })

    it("wraps Error in InternalError", () => {
      const result = toAppError(new Error("Something broke"))

      expect(result).toBeInstanceOf(InternalError)
      expect(result.message).toBe("Something broke")
    })

    it("handles non-Error values", () => {
      const result = toAppError("string error")

      expect(result).toBeInstanceOf(InternalError)
      expect(result.message).toBe("An unexpected error occurred")
    })
  })
})
