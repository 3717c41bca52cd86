import * as Sentry from "@sentry/node"
import type { Env } from "@/lib/env"

/**
 * Initialise Sentry for a CLI run.
 *
 * Without a DSN the SDK stays local: nothing is sent, and logger/metrics
 * calls are no-ops. Call once, before the pipeline starts.
 */
export function initSentry(env: Pick<Env, "SENTRY_DSN" | "NODE_ENV">): void {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,

    // Enable structured logging
    enableLogs: true,

    integrations: [
      // Forwards the pipeline's tagged console lines as structured logs
      Sentry.consoleLoggingIntegration({
        levels: ["log", "warn", "error"],
      }),
    ],

    // One run per process, so keep every transaction
    tracesSampleRate: 1.0,

    debug: false,
  })
}

/**
 * Flush buffered logs and spans before the process exits.
 */
export async function closeSentry(timeoutMs = 2000): Promise<void> {
  await Sentry.close(timeoutMs)
}
