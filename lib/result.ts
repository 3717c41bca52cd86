/**
 * Result type for per-page extraction outcomes.
 *
 * A page that fails OCR must not abort the run, so the OCR path returns
 * `Result<OcrPageResult, OcrFailedError>` instead of throwing.
 *
 * @example
 * ```typescript
 * const outcome = await tryCatchWith(
 *   () => recognizePage(worker, page.image, page.pageNumber),
 *   (e) => new OcrFailedError(page.pageNumber, describeError(e))
 * )
 *
 * if (!outcome.ok) {
 *   console.warn("[OCR] Page failed", outcome.error.toJSON())
 * }
 * ```
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Run an async operation, mapping anything it throws into `E`.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}

/**
 * Split a list of results into successes and failures, keeping order.
 */
export function partition<T, E>(
  results: readonly Result<T, E>[]
): { values: T[]; errors: E[] } {
  const values: T[] = []
  const errors: E[] = []
  for (const result of results) {
    if (result.ok) values.push(result.value)
    else errors.push(result.error)
  }
  return { values, errors }
}
