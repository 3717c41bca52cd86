import { describe, it, expect, vi, beforeEach } from "vitest"
import { BadRequestError } from "@/lib/errors"
import { createOcrWorker, resolveLangPath } from "./tesseract-worker"

const { createWorker } = vi.hoisted(() => ({
  createWorker: vi.fn(async (_language: string, _oem?: number, _options?: object) => ({
    terminate: async () => undefined,
  })),
}))

vi.mock("tesseract.js", () => ({ createWorker }))

const BUNDLED_ENG = /@tesseract\.js-data[\\/]eng[\\/]4\.0\.0_best_int$/

describe("resolveLangPath", () => {
  it("prefers an explicit directory", () => {
    expect(resolveLangPath({ language: "eng", langPath: "/opt/tessdata" })).toBe("/opt/tessdata")
  })

  it("points English at the installed data package", () => {
    expect(resolveLangPath()).toMatch(BUNDLED_ENG)
    expect(resolveLangPath({ language: "eng" })).toMatch(BUNDLED_ENG)
  })

  it("refuses a language with no local data", () => {
    expect(() => resolveLangPath({ language: "fra" })).toThrow(BadRequestError)
  })
})

describe("createOcrWorker", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("always hands tesseract.js a local langPath", async () => {
    await createOcrWorker({ language: "eng" })

    expect(createWorker).toHaveBeenCalledTimes(1)
    const [language, oem, options] = createWorker.mock.calls[0] ?? []
    expect(language).toBe("eng")
    expect(oem).toBeUndefined()
    expect(options).toEqual({ langPath: expect.stringMatching(BUNDLED_ENG), cacheMethod: "none" })
  })

  it("passes OCR_LANG_PATH through unchanged", async () => {
    await createOcrWorker({ language: "fra", langPath: "./tessdata" })

    expect(createWorker).toHaveBeenCalledWith("fra", undefined, {
      langPath: "./tessdata",
      cacheMethod: "none",
    })
  })

  it("does not start a worker when no data is available", async () => {
    await expect(createOcrWorker({ language: "fra" })).rejects.toThrow(BadRequestError)
    expect(createWorker).not.toHaveBeenCalled()
  })
})
