import { describe, expect, it } from 'vitest'
import { resolveSettings } from '../src/config/index.js'
import { NonConvergenceError } from '../src/errors/index.js'
import { horizonHourAngle, solveMoonRiseSet } from '../src/events/index.js'

const JST = resolveSettings()
const TOKYO = { latitude: 35.6544, longitude: 139.7447 }
const DATE = { year: 1999, month: 11, day: 14 }

describe('horizonHourAngle', () => {
  it('is 90° on the equator for an equatorial body', () => {
    const result = horizonHourAngle(0, 0, 0)
    expect(result.type).toBe('crossing')
    if (result.type === 'crossing') expect(result.hourAngle).toBeCloseTo(90, 10)
  })

  it('is wider than 90° for a body on the observer’s side of the equator', () => {
    const result = horizonHourAngle(23.44, 35, -0.833)
    expect(result.type).toBe('crossing')
    if (result.type === 'crossing') {
      expect(result.hourAngle).toBeGreaterThan(90)
      expect(result.hourAngle).toBeLessThan(180)
    }
  })

  it('reports circumpolar bodies near the pole', () => {
    expect(horizonHourAngle(-20, 89, 0.4)).toEqual({ type: 'always-below' })
    expect(horizonHourAngle(20, 89, 0.4)).toEqual({ type: 'always-above' })
  })

  it('handles the pole itself without dividing by zero', () => {
    expect(horizonHourAngle(10, 90, 0)).toEqual({ type: 'always-above' })
    expect(horizonHourAngle(-10, 90, 0)).toEqual({ type: 'always-below' })
    expect(horizonHourAngle(-10, -90, 0)).toEqual({ type: 'always-above' })
  })

  it('never yields NaN', () => {
    for (let declination = -30; declination <= 30; declination += 5) {
      for (let latitude = -90; latitude <= 90; latitude += 5) {
        const result = horizonHourAngle(declination, latitude, 0.35)
        if (result.type === 'crossing') {
          expect(result.hourAngle).toBeGreaterThanOrEqual(0)
          expect(result.hourAngle).toBeLessThanOrEqual(180)
        }
      }
    }
  })
})

describe('solveMoonRiseSet', () => {
  it('reproduces the Tokyo 1999-11-14 moonrise and moonset', () => {
    const rise = solveMoonRiseSet(DATE, TOKYO, 'rise', JST)
    const set = solveMoonRiseSet(DATE, TOKYO, 'set', JST)

    expect(rise.type).toBe('crossing')
    expect(set.type).toBe('crossing')
    if (rise.type !== 'crossing' || set.type !== 'crossing') return

    expect(rise.dayFraction).toBeCloseTo(0.459935, 4)
    expect(set.dayFraction).toBeCloseTo(0.888426, 4)
    expect(rise.iterations).toBeLessThanOrEqual(JST.maxIterations)
  })

  it('is deterministic', () => {
    expect(solveMoonRiseSet(DATE, TOKYO, 'set', JST)).toEqual(solveMoonRiseSet(DATE, TOKYO, 'set', JST))
  })

  it('returns a horizon condition at polar latitudes', () => {
    // The Moon is about 19° south on this date
    const north = { latitude: 89.9, longitude: TOKYO.longitude }
    const south = { latitude: -89.9, longitude: TOKYO.longitude }
    expect(solveMoonRiseSet(DATE, north, 'rise', JST)).toEqual({ type: 'always-below' })
    expect(solveMoonRiseSet(DATE, north, 'set', JST)).toEqual({ type: 'always-below' })
    expect(solveMoonRiseSet(DATE, south, 'rise', JST)).toEqual({ type: 'always-above' })
  })

  it('throws when the iteration cap is too low', () => {
    const oneStep = resolveSettings({ maxIterations: 1 })
    expect(() => solveMoonRiseSet(DATE, TOKYO, 'rise', oneStep)).toThrow(NonConvergenceError)
    expect(() => solveMoonRiseSet(DATE, TOKYO, 'rise', oneStep)).toThrow(/^moon-rise-set did not converge after 1 iterations/)
  })
})
