/**
 * observer — Validation of the observer's geographic position.
 *
 * Positions are geodetic degrees, north and east positive. The reduced
 * model ignores elevation and the Earth's flattening.
 */

import { z } from 'zod'
import type { GeoPosition } from '../types.js'
import { InvalidInputError } from '../errors/index.js'

export const GeoPositionZ = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
})

/**
 * Validate an observer position.
 *
 * @throws InvalidInputError for a missing, non-finite or out-of-range coordinate
 */
export function assertGeoPosition(position: GeoPosition): GeoPosition {
  const parsed = GeoPositionZ.safeParse(position)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidInputError(
      issue?.path.join('.') || 'position',
      issue?.message ?? 'invalid position',
    )
  }
  return parsed.data
}

/**
 * Parse a latitude/longitude pair from text, e.g. command-line arguments.
 */
export function parseGeoPosition(latitude: string, longitude: string): GeoPosition {
  return assertGeoPosition({
    latitude: parseCoordinate(latitude, 'latitude'),
    longitude: parseCoordinate(longitude, 'longitude'),
  })
}

function parseCoordinate(text: string, field: string): number {
  const trimmed = text.trim()
  const value = trimmed === '' ? NaN : Number(trimmed)
  if (Number.isNaN(value)) {
    throw new InvalidInputError(field, `"${text}" is not a number`)
  }
  return value
}
