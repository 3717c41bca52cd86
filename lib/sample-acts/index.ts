/**
 * @fileoverview Sample Acts for testing
 *
 * Fictional Acts given as raw per-page text, the way a PDF text layer
 * delivers it: hard-wrapped lines, hyphenated breaks and blank pages.
 *
 * @module lib/sample-acts
 */

import type { SectionCategory } from "@/lib/text-analysis/types"

export interface SampleAct {
  /** Unique identifier for the sample */
  id: string
  title: string
  /** What this sample exercises */
  description: string
  /** Raw page texts, in page order */
  pages: string[]
  /** Sections the default pattern table should find */
  expectedSections: SectionCategory[]
}

export { HOUSEHOLD_SUPPORT_ACT } from "./household-support-act"
export { SHORT_TITLE_ACT } from "./short-title-act"

import { HOUSEHOLD_SUPPORT_ACT } from "./household-support-act"
import { SHORT_TITLE_ACT } from "./short-title-act"

/** All sample Acts for iteration */
export const SAMPLE_ACTS: SampleAct[] = [HOUSEHOLD_SUPPORT_ACT, SHORT_TITLE_ACT]
