/**
 * @fileoverview Analysis configuration
 *
 * Every threshold, word list, pattern table and rule the analysis stages
 * read lives in one `AnalysisConfig` value. It is validated with zod and
 * deep-frozen, then passed explicitly to each stage.
 *
 * @example
 * ```ts
 * import { createAnalysisConfig } from "@/lib/text-analysis/config"
 *
 * const config = createAnalysisConfig({ summary: { maxSentences: 8 } })
 * const summary = summarize(document.text, config)
 * ```
 *
 * @module lib/text-analysis/config
 */

import { readFileSync } from "node:fs"
import { z } from "zod"
import { ValidationError } from "@/lib/errors"
import { RULES } from "./rules"
import { DEFINITION_PATTERN, SECTION_PATTERNS } from "./section-patterns"
import { SECTION_CATEGORIES } from "./types"

// ============================================================================
// Word lists
// ============================================================================

const stopWordsSchema = z.array(z.string().min(1))

function loadStopWords(): string[] {
  const raw = readFileSync(new URL("./data/stop-words.json", import.meta.url), "utf8")
  return stopWordsSchema.parse(JSON.parse(raw))
}

/** A line ending in one of these is joined to the next line */
export const CONTINUATION_WORDS = [
  "of", "the", "and", "or", "to", "by", "a", "an", "in", "on", "for", "under", "with",
  "from", "that", "which", "as", "at", "any", "such", "this", "section", "subsection",
  "paragraph", "regulation", "schedule",
] as const

/** A period after one of these never ends a sentence */
export const LEGAL_ABBREVIATIONS = [
  "s", "ss", "reg", "regs", "para", "paras", "sch", "art", "arts", "c", "cf",
  "e.g", "i.e", "etc", "viz", "pt", "ch", "vol", "sec", "subs", "st", "mr", "mrs", "ms", "dr",
] as const

export const LEGAL_TERMS = [
  "shall", "must", "entitled", "entitlement", "Secretary of State", "regulations",
  "regulation", "section", "subsection", "provision", "payment", "penalty", "obligation",
  "responsibility", "duty", "Act",
] as const

// ============================================================================
// Schema
// ============================================================================

const sectionCategorySchema = z.enum(SECTION_CATEGORIES)

const contextPolicySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("sentence"), maxChars: z.number().int().min(40) }),
  z.object({ kind: z.literal("window"), chars: z.number().int().min(10) }),
])

const patternRuleSchema = z.object({
  pattern: z.instanceof(RegExp),
  context: contextPolicySchema,
})

const ruleSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  scope: z.union([z.literal("document"), z.object({ section: sectionCategorySchema })]),
  indicators: z
    .array(z.object({ term: z.string().min(1), weight: z.number().positive() }))
    .min(1),
  minMatches: z.number().positive(),
})

export const analysisConfigSchema = z
  .object({
    normalizer: z.object({
      continuationWords: z.array(z.string().min(1)),
    }),
    keywords: z.object({
      stopWords: z.array(z.string().min(1)),
      minTokenLength: z.number().int().min(1),
      topKeywords: z.number().int().min(1),
    }),
    sentences: z.object({
      abbreviations: z.array(z.string().min(1)),
    }),
    summary: z.object({
      minSentences: z.number().int().min(0),
      maxSentences: z.number().int().min(1),
      minSentenceLength: z.number().int().min(1),
      dedupSimilarity: z.number().gt(0).max(1),
      legalTerms: z.array(z.string().min(1)),
      definitionPattern: z.instanceof(RegExp),
      weights: z.object({
        keyword: z.number().min(0),
        legalTerm: z.number().min(0),
        number: z.number().min(0),
        definition: z.number().min(0),
      }),
    }),
    sections: z.object({
      patterns: z.record(sectionCategorySchema, z.array(patternRuleSchema)),
      maxSnippetsPerSection: z.number().int().min(1),
      delimiter: z.literal("\n\n"),
      notFound: z.string().min(1),
    }),
    rules: z.object({
      definitions: z.array(ruleSchema),
      passThreshold: z.number().min(0).max(100),
      saturationMultiplier: z.number().positive(),
      evidenceContextChars: z.number().int().min(0),
      maxEvidenceLength: z.number().int().min(20),
      noEvidence: z.string().min(1),
    }),
    report: z.object({
      lowConfidenceThreshold: z.number().min(0).max(100),
    }),
  })
  .refine((config) => config.summary.minSentences <= config.summary.maxSentences, {
    message: "minSentences must not exceed maxSentences",
    path: ["summary", "minSentences"],
  })

type AnalysisSettings = z.infer<typeof analysisConfigSchema>

type DeepReadonly<T> = T extends RegExp
  ? T
  : T extends readonly (infer U)[]
    ? readonly DeepReadonly<U>[]
    : T extends object
      ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
      : T

export type AnalysisConfig = DeepReadonly<AnalysisSettings>

/** Partial settings; objects merge, arrays and patterns replace */
export type AnalysisConfigOverrides = {
  [K in keyof AnalysisSettings]?: Partial<AnalysisSettings[K]>
}

// ============================================================================
// Defaults
// ============================================================================

function defaultSettings(): AnalysisSettings {
  return {
    normalizer: { continuationWords: [...CONTINUATION_WORDS] },
    keywords: { stopWords: loadStopWords(), minTokenLength: 3, topKeywords: 30 },
    sentences: { abbreviations: [...LEGAL_ABBREVIATIONS] },
    summary: {
      minSentences: 5,
      maxSentences: 10,
      minSentenceLength: 20,
      dedupSimilarity: 0.8,
      legalTerms: [...LEGAL_TERMS],
      definitionPattern: DEFINITION_PATTERN,
      weights: { keyword: 1, legalTerm: 2, number: 1, definition: 2 },
    },
    sections: {
      patterns: SECTION_PATTERNS,
      maxSnippetsPerSection: 5,
      delimiter: "\n\n",
      notFound: "Not found in extracted text",
    },
    rules: {
      definitions: RULES.map((rule) => ({ ...rule, indicators: [...rule.indicators] })),
      passThreshold: 50,
      saturationMultiplier: 2,
      evidenceContextChars: 100,
      maxEvidenceLength: 240,
      noEvidence: "no evidence found",
    },
    report: { lowConfidenceThreshold: 50 },
  }
}

// ============================================================================
// Construction
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof RegExp)
  )
}

function mergeSettings(base: unknown, override: unknown): unknown {
  if (override === undefined) return base
  if (!isPlainObject(base) || !isPlainObject(override)) return override
  const merged: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeSettings(base[key], value)
  }
  return merged
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) deepFreeze(nested)
  }
  return value
}

/**
 * Build a validated, frozen configuration from the defaults plus overrides.
 *
 * @throws {ValidationError} listing every invalid setting
 */
export function createAnalysisConfig(overrides: AnalysisConfigOverrides = {}): AnalysisConfig {
  const parsed = analysisConfigSchema.safeParse(mergeSettings(defaultSettings(), overrides))
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return deepFreeze(parsed.data)
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = createAnalysisConfig()
