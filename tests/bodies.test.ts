import { describe, expect, it } from 'vitest'
import {
  elongation,
  moonEcliptic,
  moonLatitude,
  moonLongitude,
  moonParallax,
  sunLongitude,
} from '../src/bodies/index.js'

describe('positions at J2000.0', () => {
  it('puts the Sun near 280.4°', () => {
    expect(sunLongitude(0)).toBeCloseTo(280.4, 0)
  })

  it('puts the Moon near 223.3° longitude, 5.2° north', () => {
    expect(moonLongitude(0)).toBeCloseTo(223.3, 0)
    expect(moonLatitude(0)).toBeCloseTo(5.2, 0)
  })

  it('gives a horizontal parallax near 0.91°', () => {
    expect(moonParallax(0)).toBeCloseTo(0.91, 1)
  })
})

describe('conventions', () => {
  it('reports southern latitudes in [0, 360)', () => {
    // Half a draconic month after J2000 the Moon is about 5° south
    const latitude = moonLatitude(13.6)
    expect(latitude).toBeGreaterThan(350)
    expect(latitude).toBeLessThan(360)
  })

  it('returns the raw Moon−Sun difference', () => {
    for (const epoch of [-400.25, 0, 13.6, 8000.5]) {
      expect(elongation(epoch)).toBe(moonLongitude(epoch) - sunLongitude(epoch))
      expect(Math.abs(elongation(epoch))).toBeLessThan(360)
    }
  })

  it('bundles longitude and latitude', () => {
    expect(moonEcliptic(42)).toEqual({ longitude: moonLongitude(42), latitude: moonLatitude(42) })
  })

  it('keeps the parallax within its physical range', () => {
    for (let epoch = 0; epoch < 60; epoch += 0.5) {
      const parallax = moonParallax(epoch)
      expect(parallax).toBeGreaterThan(0.88)
      expect(parallax).toBeLessThan(1.04)
    }
  })
})
