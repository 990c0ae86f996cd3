import { describe, expect, it } from 'vitest'
import { eclipticToEquatorial, localSiderealTime, obliquity } from '../src/frames/index.js'

const EPS = 23.439291

describe('obliquity', () => {
  it('is 23.439291° at J2000 and decreases slowly', () => {
    expect(obliquity(0)).toBe(EPS)
    expect(obliquity(100)).toBeCloseTo(23.4262868, 7)
  })
})

describe('eclipticToEquatorial', () => {
  it('maps the equinoxes and solstices', () => {
    const equinox = eclipticToEquatorial({ longitude: 0, latitude: 0 }, EPS)
    expect(equinox.rightAscension).toBeCloseTo(0, 12)
    expect(equinox.declination).toBeCloseTo(0, 12)

    const june = eclipticToEquatorial({ longitude: 90, latitude: 0 }, EPS)
    expect(june.rightAscension).toBeCloseTo(90, 9)
    expect(june.declination).toBeCloseTo(EPS, 9)

    const autumn = eclipticToEquatorial({ longitude: 180, latitude: 0 }, EPS)
    expect(autumn.rightAscension).toBeCloseTo(180, 9)
    expect(autumn.declination).toBeCloseTo(0, 9)

    const december = eclipticToEquatorial({ longitude: 270, latitude: 0 }, EPS)
    expect(december.rightAscension).toBeCloseTo(270, 9)
    expect(december.declination).toBeCloseTo(-EPS, 9)
  })

  it('places the north ecliptic pole at declination 90° − ε', () => {
    const pole = eclipticToEquatorial({ longitude: 0, latitude: 90 }, EPS)
    expect(pole.declination).toBeCloseTo(90 - EPS, 9)
    expect(pole.rightAscension).toBeCloseTo(270, 6)
  })

  it('treats latitude 355° as 5° south', () => {
    const wrapped = eclipticToEquatorial({ longitude: 40, latitude: 355 }, EPS)
    const signed = eclipticToEquatorial({ longitude: 40, latitude: -5 }, EPS)
    expect(wrapped.rightAscension).toBeCloseTo(signed.rightAscension, 10)
    expect(wrapped.declination).toBeCloseTo(signed.declination, 10)
  })

  it('keeps right ascension in [0, 360) and declination in [-90, 90]', () => {
    for (let longitude = 0; longitude < 360; longitude += 15) {
      for (let latitude = -90; latitude <= 90; latitude += 10) {
        const { rightAscension, declination } = eclipticToEquatorial({ longitude, latitude }, EPS)
        expect(rightAscension).toBeGreaterThanOrEqual(0)
        expect(rightAscension).toBeLessThan(360)
        expect(Math.abs(declination)).toBeLessThanOrEqual(90)
      }
    }
  })
})

describe('localSiderealTime', () => {
  it('folds the zone offset in at 15° per hour', () => {
    expect(localSiderealTime(0, 9)).toBeCloseTo(-34.5394, 10)
    expect(localSiderealTime(0, 0)).toBeCloseTo(100.4606, 10)
  })

  it('advances by the sidereal rate per year', () => {
    expect(localSiderealTime(1, 0)).toBeCloseTo(460.4683005748, 9)
  })
})
