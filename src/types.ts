// ─── Geometry ────────────────────────────────────────────────────────────────

/** Observer location on the Earth's surface */
export interface GeoPosition {
  /** Latitude in degrees (north positive), -90 to 90 */
  latitude: number
  /** Longitude in degrees (east positive), -180 to 180 */
  longitude: number
}

/** Position relative to the ecliptic, both angles normalized to [0, 360) */
export interface EclipticCoordinate {
  longitude: number
  /** Southern latitudes appear as 360 + β (e.g. -5° is stored as 355°) */
  latitude: number
}

/** Position relative to the celestial equator */
export interface EquatorialCoordinate {
  /** Degrees in [0, 360) */
  rightAscension: number
  /** Degrees in [-90, 90] */
  declination: number
}

// ─── Time ────────────────────────────────────────────────────────────────────

/** Proleptic Gregorian calendar date, zone-naive */
export interface CivilDate {
  year: number
  /** 1-12 */
  month: number
  /** 1-31 */
  day: number
}

/** Wall-clock date and time, interpreted at the configured zone offset */
export interface CivilDateTime extends CivilDate {
  hour: number
  minute: number
  second: number
}

/**
 * Days elapsed since J2000.0 (2000 Jan 1, 12:00), including the ΔT correction.
 * The series are driven by epoch / 365.25.
 */
export type Epoch = number

// ─── Configuration ───────────────────────────────────────────────────────────

/** Per-deployment parameters threaded through every computation */
export interface EngineSettings {
  /** Offset of the civil time zone from UTC, hours (UTC+9 → 9) */
  zoneOffsetHours: number
  /** Standard horizon depression R in degrees (refraction + semi-diameter) */
  horizonDepression: number
  /** Iteration cap applied to both solvers */
  maxIterations: number
  /** Moon-age convergence: |elongation| below this many degrees */
  ageThreshold: number
  /** Rise/set convergence: |correction| below this many days */
  riseSetThreshold: number
}

// ─── Rise / set ──────────────────────────────────────────────────────────────

export type RiseSetMode = 'rise' | 'set'

/** Circumpolar outcomes: the Moon stays on one side of the horizon all day */
export type HorizonCondition = 'always-above' | 'always-below'

/** Solution of the horizon equation cos H = (sin k − sin δ sin φ) / (cos δ cos φ) */
export type HorizonCrossing =
  | { type: 'crossing'; /** Hour angle in degrees, [0, 180] */ hourAngle: number }
  | { type: HorizonCondition }

/** Raw solver output: day-fraction from local midnight */
export type RiseSetSolution =
  | { type: 'crossing'; dayFraction: number; iterations: number }
  | { type: HorizonCondition }

/** Rise or set event as returned by the public API */
export type RiseSetEvent =
  | {
      type: 'crossing'
      /** Offset from local civil midnight in days */
      dayFraction: number
      /** Absolute instant of the event */
      time: Date
      iterations: number
    }
  | { type: HorizonCondition }

// ─── Moon age ────────────────────────────────────────────────────────────────

/** Raw solver output */
export interface MoonAgeSolution {
  /** Days from the reference instant (local noon) back to the new Moon */
  age: number
  /** Epoch of the located new Moon */
  newMoonEpoch: Epoch
  iterations: number
}

export interface MoonAgeResult {
  /** Days since the most recent new Moon, measured at local noon */
  age: number
  /** Instant of that new Moon */
  newMoon: Date
  iterations: number
}

/** Age, moonrise and moonset for one civil date and place */
export interface MoonInfo {
  date: CivilDate
  position: GeoPosition
  age: number
  newMoon: Date
  rise: RiseSetEvent
  set: RiseSetEvent
}
