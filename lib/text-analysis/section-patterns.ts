/**
 * @fileoverview Section pattern table
 *
 * Ordered pattern rules per category. The extractor stops at the first
 * pattern that matches anywhere in the document, so the most specific
 * pattern for a category comes first and the broad fallbacks last.
 *
 * @module lib/text-analysis/section-patterns
 */

import type { ContextPolicy, PatternRule, SectionCategory } from "./types"

const sentence = (maxChars = 400): ContextPolicy => ({ kind: "sentence", maxChars })
const window = (chars = 150): ContextPolicy => ({ kind: "window", chars })

/**
 * A quoted or capitalised term directly followed by a defining verb,
 * e.g. `"Claimant" means` or `Universal Credit — means`.
 * Shared with sentence scoring.
 */
export const DEFINITION_PATTERN =
  /(?:["“'‘][^"”'’\n]{1,80}["”'’]|\b[A-Z][\w-]*(?:\s+[A-Z][\w-]*)*)\s*(?:[—–-]\s*)?\b(?:means|is defined as|refers to)\b/

export const SECTION_PATTERNS: Record<SectionCategory, PatternRule[]> = {
  definitions: [
    { pattern: DEFINITION_PATTERN, context: sentence() },
    { pattern: /\b(?:means|is defined as|refers to|has the meaning given)\b/i, context: sentence() },
    { pattern: /\b(?:interpretation|definitions?)\b/i, context: window() },
  ],

  obligations: [
    {
      pattern: /\b(?:must|shall|(?:is|are) required to|obliged to|duty to)\b/i,
      context: sentence(),
    },
    { pattern: /\b(?:subject to|in accordance with)\b/i, context: sentence() },
  ],

  responsibilities: [
    {
      pattern:
        /\b(?:Secretary of State|authority|department|Minister)\s+(?:must|shall|will|may|is required to|has the (?:power|duty|responsibility))\b/i,
      context: sentence(),
    },
    { pattern: /\b(?:responsibility|duty|power)\s+(?:of|to|for)\b/i, context: sentence() },
    { pattern: /\bexercise of (?:a |the )?(?:power|function|duty)\b/i, context: sentence() },
    { pattern: /\bSecretary of State\b/, context: window() },
  ],

  eligibility: [
    {
      pattern: /\b(?:eligible|entitled|qualify|qualifies|qualification)\s+(?:for|to|if)\b/i,
      context: sentence(),
    },
    {
      pattern: /\b(?:eligibility|entitlement|qualification)\s+(?:for|to|is|are)\b/i,
      context: sentence(),
    },
    {
      pattern:
        /\b(?:meets?|satisfies|satisfy|fulfils?|fulfills?)\s+(?:the\s+)?(?:basic\s+)?(?:criteria|conditions|requirements)\b/i,
      context: sentence(),
    },
    { pattern: /\bprovided that\b/i, context: sentence() },
  ],

  payments: [
    {
      pattern:
        /\b(?:payment|amount|allowance|entitlement|benefit|element)\s+(?:of|is|are|shall be|will be)\b/i,
      context: sentence(),
    },
    { pattern: /£\s?\d[\d,]*(?:\.\d{2})?/, context: window(120) },
    { pattern: /\bstandard allowance\b/i, context: window() },
    { pattern: /\b\d[\d,]*(?:\.\d{2})?\s+pounds?\b/i, context: window(120) },
  ],

  penalties: [
    {
      pattern: /\b(?:liable|subject)\s+to\s+(?:a\s+)?(?:civil\s+)?(?:penalty|fine|sanction)\b/i,
      context: sentence(),
    },
    { pattern: /\b(?:penalty|penalties|fines?|sanctions?)\b/i, context: sentence() },
    { pattern: /\b(?:offence|offense|violation)\b/i, context: sentence() },
    { pattern: /\b(?:enforce|enforcement|compliance)\b/i, context: window() },
  ],

  record_keeping: [
    {
      pattern:
        /\b(?:must|shall|required to)\s+(?:keep|maintain|retain|provide|submit)\s+(?:records?|documents?|information|data)\b/i,
      context: sentence(),
    },
    { pattern: /\b(?:record[- ]keeping|documentation requirements?)\b/i, context: sentence() },
    { pattern: /\b(?:records?|reporting|reports?)\b/i, context: sentence() },
  ],
}
