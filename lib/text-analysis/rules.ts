/**
 * @fileoverview Compliance rule table
 *
 * Six fixed rules, checked and reported in this order. Each rule is scoped
 * to the section of the same name and falls back to the whole document
 * when that section was not found.
 *
 * @module lib/text-analysis/rules
 */

import type { IndicatorTerm, RuleDefinition } from "./types"

const terms = (...names: string[]): IndicatorTerm[] =>
  names.map((term) => ({ term, weight: 1 }))

export const RULES: RuleDefinition[] = [
  {
    name: "definitions",
    description: "Act must define key terms",
    scope: { section: "definitions" },
    indicators: terms("means", "is defined", "refers to", "definition", "interpretation"),
    minMatches: 3,
  },
  {
    name: "eligibility",
    description: "Act must specify eligibility criteria",
    scope: { section: "eligibility" },
    indicators: terms(
      "eligible",
      "entitled",
      "entitlement",
      "qualify",
      "qualifies",
      "criteria",
      "conditions"
    ),
    minMatches: 3,
  },
  {
    name: "responsibilities",
    description: "Act must specify responsibilities of the administering authority",
    scope: { section: "responsibilities" },
    indicators: [
      { term: "Secretary of State", weight: 2 },
      ...terms("authority", "responsibility", "duty", "must", "shall"),
    ],
    minMatches: 3,
  },
  {
    name: "penalties",
    description: "Act must include enforcement or penalties",
    scope: { section: "penalties" },
    indicators: terms("penalty", "penalties", "offence", "enforcement", "fine", "sanction"),
    minMatches: 3,
  },
  {
    name: "payments",
    description: "Act must include payment/entitlement structure",
    scope: { section: "payments" },
    indicators: terms("payment", "amount", "allowance", "entitlement", "benefit", "element", "£"),
    minMatches: 3,
  },
  {
    name: "record_keeping",
    description: "Act must include record-keeping or reporting requirements",
    scope: { section: "record_keeping" },
    indicators: terms(
      "record",
      "records",
      "report",
      "reporting",
      "documentation",
      "maintain",
      "retain"
    ),
    minMatches: 3,
  },
]
