#!/usr/bin/env npx tsx
/**
 * Act Processing Script
 *
 * Extracts, cleans and analyses one Act PDF and writes the artifacts to
 * OUTPUT_DIR (default: output/).
 *
 * Usage: npm run process-act -- path/to/act.pdf
 *        ACT_PDF_PATH=path/to/act.pdf npm run process-act
 */

import { loadEnv } from "@/lib/env"
import { describeFailure, ocrSettingsFromEnv, resolvePdfPath } from "@/lib/pipeline/cli"
import { processAct } from "@/lib/pipeline/process-act"
import { formatRunReport } from "@/lib/pipeline/run-report"
import { closeSentry, initSentry } from "@/lib/sentry"

async function main(): Promise<number> {
  try {
    const env = loadEnv()
    initSentry(env)

    const pdfPath = resolvePdfPath(process.argv.slice(2), env)
    const { report } = await processAct(pdfPath, {
      outputDir: env.OUTPUT_DIR,
      ocr: ocrSettingsFromEnv(env),
    })

    for (const line of formatRunReport(report)) {
      console.log(line)
    }
    return 0
  } catch (error) {
    const failure = describeFailure(error)
    console.error(failure.line)
    return failure.exitCode
  } finally {
    await closeSentry()
  }
}

main()
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error("[process-act] INTERNAL_ERROR:", e)
    process.exit(1)
  })
