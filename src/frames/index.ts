/**
 * frames — Ecliptic to equatorial rotation and local sidereal time.
 *
 * The ecliptic frame is rotated about the vernal-equinox axis by the
 * obliquity ε:
 *
 *   u = cos β cos λ
 *   v = −sin β sin ε + cos β sin λ cos ε
 *   w =  sin β cos ε + cos β sin λ sin ε
 *
 *   α = atan2(v, u)               right ascension, [0, 360)
 *   δ = atan2(w, √(u² + v²))      declination, [-90, 90]
 *
 * Low-precision model: no precession, nutation or aberration beyond what the
 * series already absorb.
 */

import type { EclipticCoordinate, EquatorialCoordinate } from '../types.js'
import { cosDeg, mod360, rad2deg, sinDeg } from '../math/index.js'

// ─── Obliquity ────────────────────────────────────────────────────────────────

/**
 * Mean obliquity of the ecliptic in degrees.
 *
 * @param t - Julian years since J2000.0
 */
export function obliquity(t: number): number {
  return mod360(23.439291 - 0.000130042 * t)
}

// ─── Ecliptic → equatorial ────────────────────────────────────────────────────

/**
 * Rotate an ecliptic position into equatorial coordinates.
 *
 * @param ecliptic - Longitude λ and latitude β in degrees
 * @param epsilon - Obliquity ε in degrees
 */
export function eclipticToEquatorial(
  ecliptic: EclipticCoordinate,
  epsilon: number,
): EquatorialCoordinate {
  const sinL = sinDeg(ecliptic.longitude)
  const cosL = cosDeg(ecliptic.longitude)
  const sinB = sinDeg(ecliptic.latitude)
  const cosB = cosDeg(ecliptic.latitude)
  const sinE = sinDeg(epsilon)
  const cosE = cosDeg(epsilon)

  const u = cosB * cosL
  const v = -sinB * sinE + cosB * sinL * cosE
  const w = sinB * cosE + cosB * sinL * sinE

  return {
    rightAscension: mod360(rad2deg(Math.atan2(v, u))),
    declination: rad2deg(Math.atan2(w, Math.sqrt(u * u + v * v))),
  }
}

// ─── Sidereal time ────────────────────────────────────────────────────────────

/** Sidereal rotation in degrees per mean solar day */
export const SIDEREAL_RATE = 360.9856474

/**
 * Sidereal time in degrees at the instant whose J2000 year is t, expressed
 * relative to the civil zone: the zone offset is folded in so that adding a
 * longitude yields the local value for a wall-clock reference instant.
 *
 * The result is not normalized; callers reduce the hour-angle balance they
 * build from it.
 *
 * @param t - Julian years since J2000.0, taken at local civil midnight
 * @param zoneOffsetHours - Civil zone offset from UTC in hours
 */
export function localSiderealTime(t: number, zoneOffsetHours: number): number {
  return 100.4606 + 360.007700536 * t + 0.00000003879 * t * t - 15 * zoneOffsetHours
}
