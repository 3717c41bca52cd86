/**
 * @fileoverview Text normalizer
 *
 * Turns per-page PDF text into one clean string: hyphenated line breaks
 * repaired, wrapped lines re-joined, whitespace collapsed. A line break
 * survives only as a paragraph boundary, and always as exactly one `\n`.
 *
 * Blank lines and page boundaries are paragraph boundaries. A single line
 * break is joined or kept from the two lines either side of it.
 *
 * @module lib/text-analysis/normalizer
 */

import type { AnalysisConfig } from "./config"

const TERMINAL_PUNCTUATION = /[.!?:;]$/
const HYPHENATED_END = /\w-$/
const LOWERCASE_START = /^[a-z]/
const INLINE_WHITESPACE = /[^\S\n]+/g

type NormalizerConfig = Pick<AnalysisConfig, "normalizer">

interface Line {
  text: string
  /** Preceded by a blank line or a page boundary */
  paragraphStart: boolean
}

function cleanLines(page: string): Line[] {
  const lines: Line[] = []
  let paragraphStart = true
  for (const raw of page.replace(/\r\n?/g, "\n").split("\n")) {
    const text = raw.replace(INLINE_WHITESPACE, " ").trim()
    if (text.length === 0) {
      paragraphStart = true
      continue
    }
    lines.push({ text, paragraphStart })
    paragraphStart = false
  }
  return lines
}

function lastWord(line: string): string {
  const words = line.split(" ")
  return (words[words.length - 1] ?? "").toLowerCase()
}

function joinsAsSpace(previous: string, next: string, continuation: ReadonlySet<string>): boolean {
  if (TERMINAL_PUNCTUATION.test(previous)) return false
  return (
    LOWERCASE_START.test(next) || previous.endsWith(",") || continuation.has(lastWord(previous))
  )
}

/**
 * Normalize raw page texts into a single string.
 *
 * Empty and whitespace-only pages contribute nothing. Never throws.
 *
 * Re-normalizing the output is a no-op except where a paragraph boundary
 * sits between lines that a single wrapped break would join.
 */
export function normalizeText(pages: readonly string[], config: NormalizerConfig): string {
  const lines = pages.flatMap(cleanLines)
  const first = lines[0]
  if (first === undefined) return ""

  const continuation = new Set(config.normalizer.continuationWords.map((w) => w.toLowerCase()))
  let text = first.text
  let previous = first.text

  for (const { text: line, paragraphStart } of lines.slice(1)) {
    // A hyphenated word is repaired across any break, blank lines and pages included
    if (HYPHENATED_END.test(previous) && LOWERCASE_START.test(line)) {
      text = text.slice(0, -1) + line
    } else if (!paragraphStart && joinsAsSpace(previous, line, continuation)) {
      text += ` ${line}`
    } else {
      text += `\n${line}`
    }
    previous = line
  }

  return text
}

/** Normalize a single string */
export function collapseWhitespace(text: string, config: NormalizerConfig): string {
  return normalizeText([text], config)
}
