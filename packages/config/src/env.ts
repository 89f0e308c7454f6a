/**
 * Environment configuration — validated once, fail-fast.
 *
 * Every variable is optional. A variable that is present but malformed
 * throws with its name instead of silently falling back to a default.
 */

import { z } from 'zod'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const envSchema = z.object({
  LENSMAP_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LENSMAP_SUPERSAMPLING: z.coerce.number().int().min(1).max(16).default(1),
  LENSMAP_BLEND_MARGIN_DEGREES: z.coerce.number().finite().min(0).max(10).default(0.5),
  LENSMAP_ROW_CHUNKS: z.coerce.number().int().min(1).max(4096).default(1),
})

export interface LensmapConfig {
  logLevel: LogLevel
  /** Sub-samples per axis for each destination pixel. */
  supersampling: number
  /** Margin trimmed from each side of the dual-sensor feather band. */
  blendMarginDegrees: number
  /** Number of row ranges a resampling pass is split into. */
  rowChunks: number
}

export const DEFAULT_CONFIG: LensmapConfig = {
  logLevel: 'info',
  supersampling: 1,
  blendMarginDegrees: 0.5,
  rowChunks: 1,
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): LensmapConfig {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue ? issue.path.join('.') : 'environment'
    throw new Error(
      `Invalid environment variable: ${key}. ${issue?.message ?? 'Unreadable value.'}`,
    )
  }

  const env = result.data
  return {
    logLevel: env.LENSMAP_LOG_LEVEL,
    supersampling: env.LENSMAP_SUPERSAMPLING,
    blendMarginDegrees: env.LENSMAP_BLEND_MARGIN_DEGREES,
    rowChunks: env.LENSMAP_ROW_CHUNKS,
  }
}
