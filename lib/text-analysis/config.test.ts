import { describe, it, expect } from "vitest"
import { ValidationError } from "@/lib/errors"
import { createAnalysisConfig, DEFAULT_ANALYSIS_CONFIG } from "./config"
import { SECTION_CATEGORIES } from "./types"

function validationFields(fn: () => unknown): string[] {
  try {
    fn()
  } catch (error) {
    if (error instanceof ValidationError) return (error.details ?? []).map((d) => d.field ?? "")
    throw error
  }
  return []
}

describe("DEFAULT_ANALYSIS_CONFIG", () => {
  it("is deeply frozen", () => {
    expect(Object.isFrozen(DEFAULT_ANALYSIS_CONFIG)).toBe(true)
    expect(Object.isFrozen(DEFAULT_ANALYSIS_CONFIG.summary.weights)).toBe(true)
    expect(Object.isFrozen(DEFAULT_ANALYSIS_CONFIG.rules.definitions)).toBe(true)
  })

  it("loads the stop word list", () => {
    expect(DEFAULT_ANALYSIS_CONFIG.keywords.stopWords).toContain("shall")
    expect(DEFAULT_ANALYSIS_CONFIG.keywords.stopWords).not.toContain("award")
  })

  it("has patterns for every category and six rules", () => {
    expect(Object.keys(DEFAULT_ANALYSIS_CONFIG.sections.patterns).sort()).toEqual(
      [...SECTION_CATEGORIES].sort()
    )
    expect(DEFAULT_ANALYSIS_CONFIG.rules.definitions).toHaveLength(6)
  })

  it("uses the documented defaults", () => {
    expect(DEFAULT_ANALYSIS_CONFIG.summary.minSentences).toBe(5)
    expect(DEFAULT_ANALYSIS_CONFIG.summary.maxSentences).toBe(10)
    expect(DEFAULT_ANALYSIS_CONFIG.sections.delimiter).toBe("\n\n")
    expect(DEFAULT_ANALYSIS_CONFIG.rules.passThreshold).toBe(50)
  })
})

describe("createAnalysisConfig", () => {
  it("merges overrides into the defaults", () => {
    const config = createAnalysisConfig({ summary: { maxSentences: 8 } })

    expect(config.summary.maxSentences).toBe(8)
    expect(config.summary.minSentences).toBe(5)
    expect(config.keywords.topKeywords).toBe(30)
  })

  it("replaces arrays instead of merging them", () => {
    const config = createAnalysisConfig({ keywords: { stopWords: ["award"] } })
    expect(config.keywords.stopWords).toEqual(["award"])
  })

  it("leaves the defaults untouched", () => {
    createAnalysisConfig({ summary: { maxSentences: 3, minSentences: 1 } })
    expect(DEFAULT_ANALYSIS_CONFIG.summary.maxSentences).toBe(10)
  })

  it("rejects a minimum above the maximum", () => {
    expect(validationFields(() => createAnalysisConfig({ summary: { minSentences: 12 } }))).toEqual([
      "summary.minSentences",
    ])
  })

  it("rejects out-of-range values", () => {
    expect(validationFields(() => createAnalysisConfig({ rules: { passThreshold: 150 } }))).toEqual([
      "rules.passThreshold",
    ])
  })
})
