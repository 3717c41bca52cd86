import * as Sentry from "@sentry/node"

// ============================================================================
// Tracing utilities
// ============================================================================

type SpanAttributes = Record<string, string | number | boolean | undefined>

/**
 * Create a traced span for an async operation
 *
 * @example
 * ```ts
 * import { startSpan, SpanOp } from "@/lib/metrics"
 *
 * const pages = await startSpan("extract-pages", SpanOp.EXTRACT, () => extractPdfPages(buffer), {
 *   bytes: buffer.length,
 * })
 * ```
 */
export async function startSpan<T>(
  name: string,
  op: string,
  fn: () => Promise<T>,
  attributes?: SpanAttributes
): Promise<T> {
  return Sentry.startSpan({ name, op, attributes }, fn)
}

/**
 * Create a traced span for a sync operation. The analysis stages are
 * synchronous, so this is what the pipeline uses for them.
 */
export function startSpanSync<T>(
  name: string,
  op: string,
  fn: () => T,
  attributes?: SpanAttributes
): T {
  return Sentry.startSpan({ name, op, attributes }, fn)
}

/**
 * Operation types for consistent span naming
 */
export const SpanOp = {
  EXTRACT: "document.extract",
  OCR: "document.ocr",
  ANALYZE: "analysis.stage",
  FILE_WRITE: "file.write",
  TASK: "task",
} as const

