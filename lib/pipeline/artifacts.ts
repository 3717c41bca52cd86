/**
 * @fileoverview Output artifacts
 * @module lib/pipeline/artifacts
 */

import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { toSectionReportJson } from "@/lib/text-analysis/section-extractor"
import type { ActDocument } from "@/lib/text-analysis/types"
import type { AnalysisResult } from "./analyze-document"

export const ARTIFACT_NAMES = {
  rawText: "extracted_text_raw.txt",
  cleanedText: "extracted_text.txt",
  summary: "summary.json",
  sections: "sections.json",
  ruleChecks: "rule_checks.json",
} as const

export interface Artifact {
  name: string
  content: string
}

export interface WrittenArtifact {
  name: string
  path: string
  bytes: number
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}

/**
 * Render every artifact to its file content, in write order.
 */
export function renderArtifacts(document: ActDocument, analysis: AnalysisResult): Artifact[] {
  return [
    { name: ARTIFACT_NAMES.rawText, content: document.rawText },
    { name: ARTIFACT_NAMES.cleanedText, content: document.text },
    {
      name: ARTIFACT_NAMES.summary,
      content: toJson({ summary_bullets: analysis.summary.summary_bullets }),
    },
    { name: ARTIFACT_NAMES.sections, content: toJson(toSectionReportJson(analysis.sections)) },
    { name: ARTIFACT_NAMES.ruleChecks, content: toJson(analysis.rules) },
  ]
}

/**
 * Write the artifacts to `outputDir` (created if missing) as UTF-8.
 */
export async function writeArtifacts(
  outputDir: string,
  artifacts: readonly Artifact[]
): Promise<WrittenArtifact[]> {
  await mkdir(outputDir, { recursive: true })

  const written: WrittenArtifact[] = []
  for (const artifact of artifacts) {
    const path = join(outputDir, artifact.name)
    await writeFile(path, artifact.content, "utf8")
    written.push({ name: artifact.name, path, bytes: Buffer.byteLength(artifact.content, "utf8") })
  }
  return written
}
