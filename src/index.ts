/**
 * moon-almanac — Moon age, moonrise and moonset from a reduced ephemeris.
 *
 * Low-precision trigonometric series for the Sun and Moon (accuracy ~0.1-1°),
 * fixed-point solvers for the preceding new Moon and for the horizon
 * crossing. Suited to calendar and dashboard display, not astrometry.
 *
 * Quick start:
 *   import { getMoonInfo } from 'moon-almanac'
 *
 *   const info = getMoonInfo(
 *     { year: 1999, month: 11, day: 14 },
 *     { latitude: 35.6544, longitude: 139.7447 },
 *     { zoneOffsetHours: 9 },
 *   )
 *   console.log(info.age, info.rise, info.set)
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export { getMoonAge, getMoonRiseSet, getMoonInfo } from './api/index.js'

// ─── Configuration ────────────────────────────────────────────────────────────

export {
  resolveSettings,
  settingsFromEnv,
  EngineSettingsZ,
  DEFAULT_SETTINGS,
  HORIZON_DEPRESSION,
} from './config/index.js'
export type { EngineSettingsInput } from './config/index.js'

// ─── Errors ───────────────────────────────────────────────────────────────────

export { InvalidInputError, NonConvergenceError } from './errors/index.js'
export type { SolverName } from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  GeoPosition,
  EclipticCoordinate,
  EquatorialCoordinate,
  CivilDate,
  CivilDateTime,
  Epoch,
  EngineSettings,
  RiseSetMode,
  HorizonCondition,
  HorizonCrossing,
  RiseSetSolution,
  RiseSetEvent,
  MoonAgeSolution,
  MoonAgeResult,
  MoonInfo,
} from './types.js'

// ─── Engine internals (for advanced use) ──────────────────────────────────────

export { toEpoch, epochYears, parseCivilDate, formatCivilDate, civilToInstant, civilDateOf } from './time/index.js'
export { sunLongitude, moonLongitude, moonLatitude, moonParallax, moonEcliptic } from './bodies/index.js'
export { obliquity, eclipticToEquatorial, localSiderealTime } from './frames/index.js'
export { solveMoonAge, NEW_MOON_RATE, MAX_MOON_AGE } from './phase/index.js'
export { solveMoonRiseSet, horizonHourAngle, HORIZON_RATE } from './events/index.js'
export { mod360, normalizeDeg180 } from './math/index.js'
