/**
 * math — Angle utilities and sine-series terms.
 *
 * Every quantity in the engine is carried in degrees; conversion to radians
 * happens only at the boundary of Math.sin / Math.cos / Math.atan2.
 *
 * All functions are pure.
 */

// ─── Angle conversion ─────────────────────────────────────────────────────────

/** Degrees to radians factor */
export const DEG2RAD = Math.PI / 180

/** Radians to degrees factor */
export const RAD2DEG = 180 / Math.PI

/** Convert degrees to radians */
export function deg2rad(deg: number): number {
  return deg * DEG2RAD
}

/** Convert radians to degrees */
export function rad2deg(rad: number): number {
  return rad * RAD2DEG
}

/** Sine of an angle given in degrees */
export function sinDeg(deg: number): number {
  return Math.sin(deg2rad(deg))
}

/** Cosine of an angle given in degrees */
export function cosDeg(deg: number): number {
  return Math.cos(deg2rad(deg))
}

// ─── Range normalization ──────────────────────────────────────────────────────

/**
 * Normalize an angle in degrees to [0, 360).
 *
 * Inputs already in range come back bit-identical, so the function is
 * idempotent. A tiny negative input that would round up to 360 maps to 0.
 */
export function mod360(deg: number): number {
  const r = deg % 360
  if (r === 0) return 0
  if (r > 0) return r
  const wrapped = r + 360
  return wrapped === 360 ? 0 : wrapped
}

/**
 * Normalize an angle in degrees to [-180, 180].
 *
 * Values already inside the closed interval are returned untouched, so both
 * +180 and -180 are fixed points. Anything outside is folded through mod360,
 * which lands on (-180, 180].
 */
export function normalizeDeg180(deg: number): number {
  if (deg >= -180 && deg <= 180) return deg
  const r = mod360(deg)
  return r > 180 ? r - 360 : r
}

// ─── Series terms ─────────────────────────────────────────────────────────────

/**
 * One periodic term of a reduced-ephemeris series:
 *
 *   (amplitude + amplitudeDrift·t) · sin(phase + rate·t + shift)
 *
 * amplitude and the result are in degrees, phase in degrees, rate in degrees
 * per Julian year of 365.25 days.
 */
export interface SineTerm {
  amplitude: number
  phase: number
  rate: number
  /** Linear change of the amplitude per year (zero for almost every term) */
  amplitudeDrift: number
}

/**
 * Evaluate a single term at J2000 year t.
 *
 * @param shift - Extra degrees added inside the argument (auxiliary correction)
 */
export function evalSineTerm(term: SineTerm, t: number, shift = 0): number {
  const amplitude = term.amplitudeDrift === 0
    ? term.amplitude
    : term.amplitude + term.amplitudeDrift * t
  return amplitude * sinDeg(term.phase + term.rate * t + shift)
}

/** Sum of terms evaluated left to right (no auxiliary shift) */
export function sumSineTerms(terms: readonly SineTerm[], t: number): number {
  let sum = 0
  for (const term of terms) sum += evalSineTerm(term, t)
  return sum
}
