/**
 * api — User-facing functions.
 *
 * This is the only module users need to import directly. Each function
 * validates its inputs, resolves settings (defaults: UTC+9, R = 0.585556°,
 * 50 iterations) and turns solver output into absolute instants.
 *
 * Everything is synchronous and pure; concurrent calls share nothing.
 */

import type {
  CivilDate,
  GeoPosition,
  MoonAgeResult,
  MoonInfo,
  RiseSetEvent,
  RiseSetMode,
  EngineSettings,
} from '../types.js'
import type { EngineSettingsInput } from '../config/index.js'
import { resolveSettings } from '../config/index.js'
import { assertGeoPosition } from '../observer/index.js'
import { assertCivilDate, instantAfterMidnight } from '../time/index.js'
import { solveMoonAge } from '../phase/index.js'
import { solveMoonRiseSet } from '../events/index.js'

/**
 * Days since the most recent new Moon, measured at local noon of `date`.
 *
 * @param date - Civil date at the configured zone offset
 * @param settings - Partial settings; missing fields take their defaults
 *
 * @example
 * ```ts
 * const { age, newMoon } = getMoonAge({ year: 2000, month: 1, day: 7 })
 * console.log(age.toFixed(2))  // ~0.37
 * ```
 */
export function getMoonAge(date: CivilDate, settings?: EngineSettingsInput): MoonAgeResult {
  assertCivilDate(date)
  const resolved = resolveSettings(settings)
  return moonAge(date, resolved)
}

/**
 * Moonrise or moonset for a date and place.
 *
 * Returns { type: 'always-above' | 'always-below' } when the Moon does not
 * cross the horizon at that latitude.
 *
 * @example
 * ```ts
 * const rise = getMoonRiseSet(
 *   { year: 1999, month: 11, day: 14 },
 *   { latitude: 35.6544, longitude: 139.7447 },
 *   'rise',
 * )
 * if (rise.type === 'crossing') console.log(rise.time.toISOString())
 * ```
 */
export function getMoonRiseSet(
  date: CivilDate,
  position: GeoPosition,
  mode: RiseSetMode,
  settings?: EngineSettingsInput,
): RiseSetEvent {
  assertCivilDate(date)
  const observer = assertGeoPosition(position)
  const resolved = resolveSettings(settings)
  return moonRiseSet(date, observer, mode, resolved)
}

/**
 * Moon age, moonrise and moonset in one call.
 *
 * @example
 * ```ts
 * const info = getMoonInfo({ year: 2022, month: 7, day: 14 }, { latitude: 34.54, longitude: 133.92 })
 * console.log(info.age, info.rise, info.set)
 * ```
 */
export function getMoonInfo(
  date: CivilDate,
  position: GeoPosition,
  settings?: EngineSettingsInput,
): MoonInfo {
  assertCivilDate(date)
  const observer = assertGeoPosition(position)
  const resolved = resolveSettings(settings)

  const { age, newMoon } = moonAge(date, resolved)

  return {
    date,
    position: observer,
    age,
    newMoon,
    rise: moonRiseSet(date, observer, 'rise', resolved),
    set:  moonRiseSet(date, observer, 'set', resolved),
  }
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

function moonAge(date: CivilDate, settings: EngineSettings): MoonAgeResult {
  const solution = solveMoonAge(date, settings)
  // The age is measured back from local noon
  const newMoon = instantAfterMidnight(date, 0.5 - solution.age, settings.zoneOffsetHours)
  return { age: solution.age, newMoon, iterations: solution.iterations }
}

function moonRiseSet(
  date: CivilDate,
  position: GeoPosition,
  mode: RiseSetMode,
  settings: EngineSettings,
): RiseSetEvent {
  const solution = solveMoonRiseSet(date, position, mode, settings)
  if (solution.type !== 'crossing') return solution

  return {
    type: 'crossing',
    dayFraction: solution.dayFraction,
    time: instantAfterMidnight(date, solution.dayFraction, settings.zoneOffsetHours),
    iterations: solution.iterations,
  }
}
