import { describe, expect, it } from 'vitest'
import type { SineTerm } from '../src/math/index.js'
import { cosDeg, deg2rad, evalSineTerm, mod360, normalizeDeg180, rad2deg, sinDeg, sumSineTerms } from '../src/math/index.js'

const SAMPLES = [-1000.5, -720, -360, -190, -181, -180, -0.1, 0, 0.1, 179.9, 180, 181, 359.99, 360, 725, 1e6 + 0.3]

describe('angle conversion', () => {
  it('converts between degrees and radians', () => {
    expect(deg2rad(180)).toBeCloseTo(Math.PI, 15)
    expect(rad2deg(Math.PI / 2)).toBeCloseTo(90, 12)
  })

  it('takes sine and cosine in degrees', () => {
    expect(sinDeg(30)).toBeCloseTo(0.5, 15)
    expect(cosDeg(60)).toBeCloseTo(0.5, 15)
    expect(sinDeg(-90)).toBe(Math.sin(deg2rad(-90)))
  })
})

describe('mod360', () => {
  it('wraps negative and large angles', () => {
    expect(mod360(-30)).toBe(330)
    expect(mod360(725)).toBe(5)
    expect(mod360(360)).toBe(0)
    expect(mod360(-720)).toBe(0)
  })

  it('lands in [0, 360) and is idempotent', () => {
    for (const x of SAMPLES) {
      const r = mod360(x)
      expect(r).toBeGreaterThanOrEqual(0)
      expect(r).toBeLessThan(360)
      expect(mod360(r)).toBe(r)
    }
  })

  it('maps a tiny negative angle to 0 rather than 360', () => {
    expect(mod360(-1e-20)).toBe(0)
  })
})

describe('normalizeDeg180', () => {
  it('folds angles outside [-180, 180]', () => {
    expect(normalizeDeg180(190)).toBe(-170)
    expect(normalizeDeg180(-190)).toBe(170)
    expect(normalizeDeg180(540)).toBe(180)
    expect(normalizeDeg180(-540)).toBe(180)
  })

  it('keeps both endpoints', () => {
    expect(normalizeDeg180(180)).toBe(180)
    expect(normalizeDeg180(-180)).toBe(-180)
    expect(normalizeDeg180(45)).toBe(45)
  })

  it('lands in [-180, 180] and is idempotent', () => {
    for (const x of SAMPLES) {
      const r = normalizeDeg180(x)
      expect(r).toBeGreaterThanOrEqual(-180)
      expect(r).toBeLessThanOrEqual(180)
      expect(normalizeDeg180(r)).toBe(r)
    }
  })
})

describe('sine terms', () => {
  const quarter: SineTerm = { amplitude: 2, phase: 90, rate: 0, amplitudeDrift: 0 }

  it('evaluates amplitude·sin(phase + rate·t)', () => {
    expect(evalSineTerm(quarter, 0)).toBeCloseTo(2, 12)
    expect(evalSineTerm({ ...quarter, phase: 0, rate: 30 }, 1)).toBeCloseTo(1, 12)
  })

  it('adds the shift inside the argument', () => {
    expect(evalSineTerm({ ...quarter, phase: 0 }, 0, 90)).toBeCloseTo(2, 12)
  })

  it('applies the amplitude drift', () => {
    expect(evalSineTerm({ ...quarter, amplitudeDrift: -1 }, 1)).toBeCloseTo(1, 12)
  })

  it('sums terms', () => {
    const terms = [quarter, { ...quarter, phase: 30 }]
    expect(sumSineTerms(terms, 0)).toBeCloseTo(2 + 2 * sinDeg(30), 12)
    expect(sumSineTerms([], 3)).toBe(0)
  })
})
