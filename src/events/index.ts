/**
 * events — Moonrise and moonset by fixed-point iteration on the hour angle.
 *
 * The Moon's upper limb touches the horizon when its true altitude equals
 *
 *   k = −R + π        (R: horizon depression, π: horizontal parallax)
 *
 * which fixes the hour angle H through
 *
 *   cos H = (sin k − sin δ sin φ) / (cos δ cos φ)
 *
 * Rise is the eastern root (−H), set the western one (+H). Starting from a
 * trial day-fraction d = 0.5 (local noon), each step compares that target
 * with the Moon's actual hour angle at d and moves d by the difference
 * divided by the Moon's mean rate across the sky (347.8°/day):
 *
 *   θ  = θ₀ + 360.9856474·d + λ − α
 *   Δd = normalizeDeg180(±H − θ) / 347.8
 *
 * until |Δd| < riseSetThreshold. θ₀ is the zone-relative sidereal time at
 * local midnight; obliquity is also frozen at midnight.
 *
 * When |cos H| > 1 the equation has no root at that instant: the Moon stays
 * above (cos H < −1) or below (cos H > 1) the horizon. That outcome is
 * returned as a condition, never as NaN.
 */

import type {
  CivilDate,
  EngineSettings,
  GeoPosition,
  HorizonCrossing,
  RiseSetMode,
  RiseSetSolution,
} from '../types.js'
import { NonConvergenceError } from '../errors/index.js'
import { moonEcliptic, moonParallax } from '../bodies/index.js'
import { eclipticToEquatorial, localSiderealTime, obliquity, SIDEREAL_RATE } from '../frames/index.js'
import { cosDeg, normalizeDeg180, rad2deg, sinDeg } from '../math/index.js'
import { atTime, epochYears, toEpoch } from '../time/index.js'

/** Mean rate of the Moon's hour angle, degrees per day */
export const HORIZON_RATE = 347.8

/** Denominators below this are treated as the pole case */
const POLE_EPSILON = 1e-12

// ─── Horizon equation ─────────────────────────────────────────────────────────

/**
 * Solve the horizon equation for the hour angle.
 *
 * @param declination - δ in degrees
 * @param latitude - φ in degrees
 * @param altitude - Target altitude k in degrees
 */
export function horizonHourAngle(
  declination: number,
  latitude: number,
  altitude: number,
): HorizonCrossing {
  const numerator = sinDeg(altitude) - sinDeg(declination) * sinDeg(latitude)
  const denominator = cosDeg(declination) * cosDeg(latitude)

  // At a pole (or δ = ±90°) altitude no longer depends on H
  if (Math.abs(denominator) < POLE_EPSILON) {
    return { type: numerator < 0 ? 'always-above' : 'always-below' }
  }

  const cosH = numerator / denominator
  if (cosH > 1) return { type: 'always-below' }
  if (cosH < -1) return { type: 'always-above' }

  return { type: 'crossing', hourAngle: rad2deg(Math.acos(cosH)) }
}

// ─── Solver ───────────────────────────────────────────────────────────────────

/**
 * Day-fraction, from local civil midnight of `date`, at which the Moon rises
 * or sets for the observer.
 *
 * The result may fall slightly outside [0, 1) when the nearest crossing to
 * local noon belongs to the neighbouring day.
 *
 * @throws NonConvergenceError when settings.maxIterations is exhausted
 */
export function solveMoonRiseSet(
  date: CivilDate,
  position: GeoPosition,
  mode: RiseSetMode,
  settings: EngineSettings,
): RiseSetSolution {
  const midnight = toEpoch(atTime(date, 0), settings.zoneOffsetHours)
  const t0 = epochYears(midnight)
  const epsilon = obliquity(t0)
  const theta0 = localSiderealTime(t0, settings.zoneOffsetHours)
  const sign = mode === 'rise' ? -1 : 1

  let d = 0.5
  let delta = NaN

  for (let i = 1; i <= settings.maxIterations; i++) {
    const epoch = midnight + d
    const parallax = moonParallax(epoch)
    const equatorial = eclipticToEquatorial(moonEcliptic(epoch), epsilon)

    const crossing = horizonHourAngle(
      equatorial.declination,
      position.latitude,
      -settings.horizonDepression + parallax,
    )
    if (crossing.type !== 'crossing') return crossing

    const target = sign * crossing.hourAngle
    const hourAngle = theta0 + SIDEREAL_RATE * d + position.longitude - equatorial.rightAscension

    delta = normalizeDeg180(target - hourAngle) / HORIZON_RATE
    d += delta

    if (Math.abs(delta) < settings.riseSetThreshold) {
      return { type: 'crossing', dayFraction: d, iterations: i }
    }
  }

  throw new NonConvergenceError('moon-rise-set', settings.maxIterations, delta)
}
