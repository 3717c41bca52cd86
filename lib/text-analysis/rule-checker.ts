/**
 * @fileoverview Heuristic rule checker
 *
 * Counts weighted indicator terms inside each rule's scope and turns the
 * total into a 0-100 confidence that saturates at
 * `minMatches × saturationMultiplier`. A rule passes when the confidence
 * reaches `passThreshold` and the weighted total reaches `minMatches`.
 *
 * @module lib/text-analysis/rule-checker
 */

import type { AnalysisConfig } from "./config"
import { clampWindow, findAll, termPattern, wordWindow, type TextSpan } from "./matching"
import type { RuleDefinition, RuleResult, SectionReport } from "./types"

type RuleConfig = Pick<AnalysisConfig, "rules">

/** Texts a rule is evaluated against */
export function resolveScope(
  rule: RuleDefinition,
  sections: SectionReport,
  text: string
): readonly string[] {
  if (rule.scope === "document") return [text]
  const section = sections[rule.scope.section]
  return section.found ? section.snippets : [text]
}

export function computeConfidence(weighted: number, minMatches: number, multiplier: number): number {
  const saturation = minMatches * multiplier
  if (saturation <= 0 || weighted <= 0) return 0
  return Math.round(100 * Math.min(1, weighted / saturation))
}

function earliestMatch(part: string, patterns: readonly RegExp[]): TextSpan | undefined {
  let earliest: TextSpan | undefined
  for (const pattern of patterns) {
    const first = findAll(part, pattern)[0]
    if (first && (!earliest || first.start < earliest.start)) earliest = first
  }
  return earliest
}

function evidenceFor(parts: readonly string[], patterns: readonly RegExp[], config: RuleConfig): string {
  const { evidenceContextChars, maxEvidenceLength } = config.rules
  for (const part of parts) {
    const match = earliestMatch(part, patterns)
    if (!match) continue
    const window = wordWindow(part, match, evidenceContextChars, evidenceContextChars)
    const clamped = clampWindow(part, window, match, maxEvidenceLength)
    return part.slice(clamped.start, clamped.end)
  }
  return config.rules.noEvidence
}

export function checkRule(
  rule: RuleDefinition,
  sections: SectionReport,
  text: string,
  config: RuleConfig
): RuleResult {
  const { passThreshold, saturationMultiplier, noEvidence } = config.rules
  const parts = resolveScope(rule, sections, text)
  const patterns = rule.indicators.map((indicator) => termPattern(indicator.term))

  let weighted = 0
  rule.indicators.forEach((indicator, i) => {
    const pattern = patterns[i]
    if (!pattern) return
    for (const part of parts) weighted += findAll(part, pattern).length * indicator.weight
  })

  if (weighted === 0) {
    return { rule: rule.name, status: "fail", evidence: noEvidence, confidence: 0 }
  }

  const confidence = computeConfidence(weighted, rule.minMatches, saturationMultiplier)
  const passed = confidence >= passThreshold && weighted >= rule.minMatches

  return {
    rule: rule.name,
    status: passed ? "pass" : "fail",
    evidence: evidenceFor(parts, patterns, config),
    confidence,
  }
}

/**
 * Run every configured rule, in definition order.
 */
export function checkRules(sections: SectionReport, text: string, config: RuleConfig): RuleResult[] {
  return config.rules.definitions.map((rule) => checkRule(rule, sections, text, config))
}
