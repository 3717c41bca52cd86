/**
 * @fileoverview Text analysis barrel
 * @module lib/text-analysis
 */

export * from "./types"
export {
  createAnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  type AnalysisConfig,
  type AnalysisConfigOverrides,
} from "./config"
export { normalizeText, collapseWhitespace } from "./normalizer"
export { extractKeywords, tokenize } from "./keywords"
export { splitSentences, scoreSentence } from "./sentences"
export { summarize } from "./summarizer"
export { extractSections, listSections, toSectionReportJson } from "./section-extractor"
export { checkRule, checkRules, computeConfidence } from "./rule-checker"
