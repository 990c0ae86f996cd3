/**
 * series — Reduced lunar and solar ephemeris series.
 *
 * Each series has the shape
 *
 *   value = base + drift·t + Σ Aᵢ · sin(φᵢ + ωᵢ·t)        (degrees)
 *
 * with t in Julian years from J2000.0. The Moon's longitude and latitude
 * series couple a small auxiliary sum into the argument of their leading
 * term (am for longitude, bm for latitude); in longitude that coupling is
 * most of the evection correction and must not be dropped.
 *
 * Coefficients are tabulated verbatim in ./tables/*.json as
 * [amplitude, phase, rate] or [amplitude, phase, rate, amplitudeDrift].
 * The tables are validated once, when this module loads.
 */

import { z } from 'zod'
import type { SineTerm } from '../math/index.js'
import { evalSineTerm, mod360, sumSineTerms } from '../math/index.js'
import sunLongitudeTable from './tables/sun-longitude.json' with { type: 'json' }
import moonLongitudeTable from './tables/moon-longitude.json' with { type: 'json' }
import moonLatitudeTable from './tables/moon-latitude.json' with { type: 'json' }
import moonParallaxTable from './tables/moon-parallax.json' with { type: 'json' }

// ─── Table schema ─────────────────────────────────────────────────────────────

const TermZ = z
  .union([
    z.tuple([z.number(), z.number(), z.number()]),
    z.tuple([z.number(), z.number(), z.number(), z.number()]),
  ])
  .transform((term): SineTerm => ({
    amplitude: term[0],
    phase: term[1],
    rate: term[2],
    amplitudeDrift: term.length === 4 ? term[3] : 0,
  }))

const SeriesTableZ = z.object({
  name: z.string().min(1),
  base: z.number(),
  drift: z.number(),
  auxiliary: z.array(TermZ),
  terms: z.array(TermZ).min(1),
})

/** A validated series table */
export type Series = z.infer<typeof SeriesTableZ>

/**
 * Validate a raw table. Throws a ZodError naming the first bad entry.
 */
export function loadSeries(raw: unknown): Series {
  return SeriesTableZ.parse(raw)
}

export const SUN_LONGITUDE: Series = loadSeries(sunLongitudeTable)
export const MOON_LONGITUDE: Series = loadSeries(moonLongitudeTable)
export const MOON_LATITUDE: Series = loadSeries(moonLatitudeTable)
export const MOON_PARALLAX: Series = loadSeries(moonParallaxTable)

// ─── Evaluation ───────────────────────────────────────────────────────────────

/**
 * Evaluate a series at J2000 year t and normalize the result to [0, 360).
 *
 * The auxiliary sum (empty for the Sun and parallax series) is computed
 * first and shifts the argument of the leading term only.
 */
export function evaluateSeries(series: Series, t: number): number {
  const shift = series.auxiliary.length > 0 ? sumSineTerms(series.auxiliary, t) : 0

  let value = series.base + series.drift * t
  series.terms.forEach((term, i) => {
    value += evalSineTerm(term, t, i === 0 ? shift : 0)
  })

  return mod360(value)
}
