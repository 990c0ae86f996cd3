/**
 * bodies — Geocentric Sun and Moon positions from the reduced series.
 *
 * All functions take an Epoch (days since J2000.0) and return degrees in
 * [0, 360). Latitude follows the same convention, so a Moon 2° south of the
 * ecliptic reports 358°; sin/cos downstream treat both forms identically.
 */

import type { EclipticCoordinate, Epoch } from '../types.js'
import { epochYears } from '../time/index.js'
import {
  evaluateSeries,
  MOON_LATITUDE,
  MOON_LONGITUDE,
  MOON_PARALLAX,
  SUN_LONGITUDE,
} from '../series/index.js'

/** Apparent ecliptic longitude of the Sun */
export function sunLongitude(epoch: Epoch): number {
  return evaluateSeries(SUN_LONGITUDE, epochYears(epoch))
}

/** Ecliptic longitude of the Moon */
export function moonLongitude(epoch: Epoch): number {
  return evaluateSeries(MOON_LONGITUDE, epochYears(epoch))
}

/** Ecliptic latitude of the Moon, in [0, 360) */
export function moonLatitude(epoch: Epoch): number {
  return evaluateSeries(MOON_LATITUDE, epochYears(epoch))
}

/** Equatorial horizontal parallax of the Moon (~0.9°) */
export function moonParallax(epoch: Epoch): number {
  return evaluateSeries(MOON_PARALLAX, epochYears(epoch))
}

export function moonEcliptic(epoch: Epoch): EclipticCoordinate {
  return {
    longitude: moonLongitude(epoch),
    latitude: moonLatitude(epoch),
  }
}

/**
 * Moon minus Sun ecliptic longitude, not normalized: the result lies in
 * (-360, 360) because each operand is already in [0, 360).
 */
export function elongation(epoch: Epoch): number {
  return moonLongitude(epoch) - sunLongitude(epoch)
}
