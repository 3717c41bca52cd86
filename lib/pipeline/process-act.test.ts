import { existsSync } from "node:fs"
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest"
import { extractDocument } from "@/lib/document-extraction/extract-document"
import { NoInputPagesError, NotFoundError } from "@/lib/errors"
import { HOUSEHOLD_SUPPORT_ACT } from "@/lib/sample-acts"
import { createExtraction, createPages } from "@/test/factories"
import { processAct } from "./process-act"

vi.mock("@/lib/document-extraction/extract-document", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@/lib/document-extraction/extract-document")>()),
  extractDocument: vi.fn(),
}))

describe("processAct", () => {
  let dir = ""
  let pdfPath = ""
  let outputDir = ""

  beforeEach(async () => {
    vi.clearAllMocks()
    dir = await mkdtemp(join(tmpdir(), "process-act-"))
    pdfPath = join(dir, "act.pdf")
    outputDir = join(dir, "output")
    await writeFile(pdfPath, "%PDF-1.7 test")
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes every artifact and reports the run", async () => {
    vi.mocked(extractDocument).mockResolvedValue(
      createExtraction(createPages(HOUSEHOLD_SUPPORT_ACT.pages))
    )

    const result = await processAct(pdfPath, { outputDir, ocr: { enabled: false } })

    expect(extractDocument).toHaveBeenCalledWith(expect.any(Buffer), { ocr: { enabled: false } })
    expect(result.files.map((f) => f.name)).toEqual([
      "extracted_text_raw.txt",
      "extracted_text.txt",
      "summary.json",
      "sections.json",
      "rule_checks.json",
    ])
    expect(await readFile(join(outputDir, "extracted_text.txt"), "utf8")).toBe(result.document.text)
    expect(result.report.pages).toEqual({ total: 4, direct: 3, ocr: 0, failed: 1, failedPages: [4] })
    expect(result.report.sectionsNotFound).toEqual([])
    expect(result.report.warnings.map((w) => w.code)).toEqual(["FAILED_PAGES"])
  })

  it("writes identical artifacts on every run", async () => {
    vi.mocked(extractDocument).mockResolvedValue(
      createExtraction(createPages(HOUSEHOLD_SUPPORT_ACT.pages))
    )

    await processAct(pdfPath, { outputDir, ocr: { enabled: false } })
    const first = await readFile(join(outputDir, "sections.json"), "utf8")
    await processAct(pdfPath, { outputDir, ocr: { enabled: false } })

    expect(await readFile(join(outputDir, "sections.json"), "utf8")).toBe(first)
  })

  it("stops before writing anything when the PDF has no pages", async () => {
    vi.mocked(extractDocument).mockResolvedValue(createExtraction([]))

    await expect(processAct(pdfPath, { outputDir, ocr: { enabled: true } })).rejects.toBeInstanceOf(
      NoInputPagesError
    )
    expect(existsSync(outputDir)).toBe(false)
  })

  it("reports a missing input file", async () => {
    const missing = join(dir, "missing.pdf")

    await expect(processAct(missing, { outputDir, ocr: { enabled: true } })).rejects.toThrow(
      new NotFoundError(`File not found: ${missing}`)
    )
    expect(extractDocument).not.toHaveBeenCalled()
  })
})
