/**
 * @fileoverview Shared regex and span helpers for the analysis stages
 *
 * Every span helper works on offsets into the normalized text, so whatever
 * it returns can be sliced straight out of the document.
 *
 * @module lib/text-analysis/matching
 */

export interface TextSpan {
  start: number
  end: number
}

const WHITESPACE = /\s/

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Fresh global copy of a pattern. Config patterns are frozen, so the
 * stateful `lastIndex` of a shared instance can never be used.
 */
export function globalCopy(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`
  return new RegExp(pattern.source, flags)
}

/**
 * Whole-word, case-insensitive pattern for an indicator or legal term.
 * Internal spaces match any whitespace run. Word boundaries are only
 * asserted on edges that are word characters, so symbols such as `£` work.
 */
export function termPattern(term: string): RegExp {
  const body = term.trim().split(/\s+/).map(escapeRegExp).join("\\s+")
  const lead = /^\w/.test(term.trim()) ? "\\b" : ""
  const tail = /\w$/.test(term.trim()) ? "\\b" : ""
  return new RegExp(`${lead}${body}${tail}`, "gi")
}

/** All non-empty matches of a pattern, in order */
export function findAll(text: string, pattern: RegExp): TextSpan[] {
  const re = globalCopy(pattern)
  const spans: TextSpan[] = []
  let match: RegExpExecArray | null
  while ((match = re.exec(text)) !== null) {
    if (match[0].length === 0) {
      re.lastIndex++
      continue
    }
    spans.push({ start: match.index, end: match.index + match[0].length })
  }
  return spans
}

export function countMatches(text: string, pattern: RegExp): number {
  return findAll(text, pattern).length
}

export function overlaps(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end
}

/**
 * Widen a match by up to `before`/`after` characters inside `[lo, hi)`,
 * then pull both edges in to whole words and trim whitespace. The match
 * itself is always kept.
 */
export function wordWindow(
  text: string,
  match: TextSpan,
  before: number,
  after: number,
  bounds: TextSpan = { start: 0, end: text.length }
): TextSpan {
  let start = Math.max(bounds.start, match.start - before)
  let end = Math.min(bounds.end, match.end + after)

  while (start < match.start && start > bounds.start && !WHITESPACE.test(text[start - 1] ?? "")) {
    start++
  }
  while (end > match.end && end < bounds.end && !WHITESPACE.test(text[end] ?? "")) {
    end--
  }
  while (start < match.start && WHITESPACE.test(text[start] ?? "")) start++
  while (end > match.end && WHITESPACE.test(text[end - 1] ?? "")) end--

  return { start, end }
}

/**
 * Cut a window down to `maxLength` around the match, on word boundaries.
 */
export function clampWindow(
  text: string,
  window: TextSpan,
  match: TextSpan,
  maxLength: number
): TextSpan {
  if (window.end - window.start <= maxLength) return window
  const budget = Math.max(0, maxLength - (match.end - match.start))
  const before = Math.min(match.start - window.start, Math.floor(budget / 2))
  return wordWindow(text, match, before, budget - before, window)
}

/** The `\n`-delimited paragraph around a span */
export function paragraphBounds(text: string, span: TextSpan): TextSpan {
  const start = text.lastIndexOf("\n", span.start - 1) + 1
  const newline = text.indexOf("\n", span.end)
  return { start, end: newline === -1 ? text.length : newline }
}
