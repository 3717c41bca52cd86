/**
 * @fileoverview Process environment for the Act processing CLI
 *
 * Loaded once through dotenv (`.env.local` wins over `.env`) and validated
 * with zod so bad values fail before any PDF is opened.
 *
 * @module lib/env
 */

import { config } from "dotenv"
import { z } from "zod"
import { ValidationError } from "@/lib/errors"

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  /** PDF to process when no path is given on the command line */
  ACT_PDF_PATH: z.string().min(1).optional(),
  OUTPUT_DIR: z.string().min(1).default("output"),
  OCR_ENABLED: booleanString.default(true),
  /** Tesseract language code */
  OCR_LANGUAGE: z.string().min(3).default("eng"),
  /** Render scale for OCR page images (2 = double resolution) */
  OCR_SCALE: z.coerce.number().min(0.5).max(6).default(2),
  /** Local directory with `<lang>.traineddata.gz`; English defaults to @tesseract.js-data/eng */
  OCR_LANG_PATH: z.string().min(1).optional(),
  SENTRY_DSN: z.string().url().optional(),
})

export type Env = z.infer<typeof envSchema>

/**
 * Parse an environment record. Throws ValidationError listing every bad key.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return parsed.data
}

/**
 * Load `.env.local` / `.env` into process.env, then validate it.
 */
export function loadEnv(): Env {
  config({ path: [".env.local", ".env"], quiet: true })
  return parseEnv(process.env)
}
