/**
 * config — Engine settings: schema, defaults and environment overrides.
 *
 * Settings are plain values passed into every call; nothing here is cached
 * at module level, so one process can serve several time zones.
 *
 * Environment variables (all optional):
 *   MOON_ZONE_OFFSET         civil zone offset from UTC, hours (default 9)
 *   MOON_HORIZON_DEPRESSION  horizon depression R, degrees (default 0.585556)
 *   MOON_MAX_ITERATIONS      solver iteration cap (default 50)
 */

import { z } from 'zod'
import type { EngineSettings } from '../types.js'
import { InvalidInputError } from '../errors/index.js'

// ─── Defaults ─────────────────────────────────────────────────────────────────

/** Standard depression of the horizon for the Moon's upper limb, degrees */
export const HORIZON_DEPRESSION = 0.585556

export const DEFAULT_SETTINGS: Readonly<EngineSettings> = Object.freeze({
  zoneOffsetHours: 9,
  horizonDepression: HORIZON_DEPRESSION,
  maxIterations: 50,
  ageThreshold: 0.05,
  riseSetThreshold: 0.000005,
})

// ─── Schema ───────────────────────────────────────────────────────────────────

export const EngineSettingsZ = z.object({
  zoneOffsetHours: z.number().finite().min(-12).max(14).default(DEFAULT_SETTINGS.zoneOffsetHours),
  horizonDepression: z.number().finite().min(0).max(5).default(DEFAULT_SETTINGS.horizonDepression),
  maxIterations: z.number().int().min(1).max(1000).default(DEFAULT_SETTINGS.maxIterations),
  ageThreshold: z.number().finite().positive().default(DEFAULT_SETTINGS.ageThreshold),
  riseSetThreshold: z.number().finite().positive().default(DEFAULT_SETTINGS.riseSetThreshold),
})

export type EngineSettingsInput = z.input<typeof EngineSettingsZ>

/**
 * Fill in defaults and validate.
 *
 * @throws InvalidInputError naming the first invalid field
 *
 * @example
 * ```ts
 * resolveSettings({ zoneOffsetHours: 0 }).maxIterations  // 50
 * ```
 */
export function resolveSettings(input: EngineSettingsInput = {}): EngineSettings {
  const parsed = EngineSettingsZ.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || 'settings'
    throw new InvalidInputError(field, issue?.message ?? 'invalid settings')
  }
  return parsed.data
}

// ─── Environment ──────────────────────────────────────────────────────────────

/**
 * Read overrides from environment variables. Unset or blank variables are
 * skipped; the returned object still needs resolveSettings().
 */
export function settingsFromEnv(
  env: Record<string, string | undefined> = process.env,
): EngineSettingsInput {
  const input: EngineSettingsInput = {}

  const zoneOffsetHours = readNumber(env, 'MOON_ZONE_OFFSET')
  if (zoneOffsetHours !== undefined) input.zoneOffsetHours = zoneOffsetHours

  const horizonDepression = readNumber(env, 'MOON_HORIZON_DEPRESSION')
  if (horizonDepression !== undefined) input.horizonDepression = horizonDepression

  const maxIterations = readNumber(env, 'MOON_MAX_ITERATIONS')
  if (maxIterations !== undefined) input.maxIterations = maxIterations

  return input
}

function readNumber(env: Record<string, string | undefined>, key: string): number | undefined {
  const raw = env[key]?.trim()
  if (!raw) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(key, `"${raw}" is not a number`)
  }
  return value
}
