/**
 * phase — Moon age by fixed-point search for the preceding new Moon.
 *
 * Starting from local noon of the query date, the solver walks back in time
 * by the current Moon−Sun elongation divided by the mean synodic rate:
 *
 *   eₙ₊₁ = eₙ − Δλ(eₙ) / 12.1908
 *
 * and stops once |Δλ| < ageThreshold. The age is the distance walked.
 *
 * On the first step Δλ is reduced to [0, 360): the noon elongation can be
 * negative (the new Moon is still a few hours ahead), and the walk must go
 * back to the previous new Moon rather than forward to the next one. Later
 * steps keep the sign of Δλ and fold it into [-180, 180]. Both longitudes are
 * reduced to [0, 360), so near the Sun's 0° crossing (late March into April)
 * their difference can read ±346° where the true elongation is ∓14°.
 *
 * An age outside [0, 29.6) means the walk settled on the wrong new Moon and
 * is reported as NonConvergenceError.
 */

import type { CivilDate, EngineSettings, MoonAgeSolution } from '../types.js'
import { NonConvergenceError } from '../errors/index.js'
import { elongation } from '../bodies/index.js'
import { mod360, normalizeDeg180 } from '../math/index.js'
import { atTime, toEpoch } from '../time/index.js'

/** Mean rate of Moon−Sun elongation, degrees per day */
export const NEW_MOON_RATE = 12.1908

/** Upper bound (exclusive) of an accepted age, days */
export const MAX_MOON_AGE = 29.6

/**
 * Days since the most recent new Moon, measured at local noon of `date`.
 *
 * @throws NonConvergenceError when settings.maxIterations is exhausted or
 *   the walk ends outside [0, MAX_MOON_AGE)
 */
export function solveMoonAge(date: CivilDate, settings: EngineSettings): MoonAgeSolution {
  const start = toEpoch(atTime(date, 12), settings.zoneOffsetHours)
  let epoch = start
  let residual = NaN

  for (let i = 1; i <= settings.maxIterations; i++) {
    const raw = elongation(epoch)
    const deltaLambda = normalizeDeg180(raw)
    const step = i === 1 ? mod360(raw) : deltaLambda

    epoch -= step / NEW_MOON_RATE
    residual = deltaLambda

    if (Math.abs(deltaLambda) < settings.ageThreshold) {
      const age = start - epoch
      if (age < 0 || age >= MAX_MOON_AGE) {
        throw new NonConvergenceError('moon-age', i, deltaLambda)
      }
      return { age, newMoonEpoch: epoch, iterations: i }
    }
  }

  throw new NonConvergenceError('moon-age', settings.maxIterations, residual)
}
