// test/setup-unit.ts
// Unit tests never load native PDF renderers or OCR engines.
// Tests that exercise extraction mock the extractor modules themselves.
import { vi } from "vitest"

const unexpected = (library: string) => () => {
  throw new Error(`Unit test attempted to use ${library}. Mock the calling module instead.`)
}

vi.mock("tesseract.js", () => ({
  createWorker: unexpected("tesseract.js"),
}))

vi.mock("pdf-to-img", () => ({
  pdf: unexpected("pdf-to-img"),
}))

vi.mock("unpdf", () => ({
  getDocumentProxy: unexpected("unpdf"),
  extractText: unexpected("unpdf"),
  getMeta: unexpected("unpdf"),
}))
