import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Pipeline modules mostly log through tagged console lines
 * (`console.log("[OCR] ...", { ... })`), which `consoleLoggingIntegration`
 * forwards once `initSentry()` has run. Use `logger` directly for records
 * that should always carry attributes.
 *
 * @example
 * ```ts
 * import { logger, fmt } from "@/lib/logger"
 *
 * logger.info("Act processed", { pages: 42, cleanedLength: 81234 })
 * logger.warn(fmt`Rule ${rule} below confidence threshold`)
 * ```
 */
export const logger = Sentry.logger

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt
