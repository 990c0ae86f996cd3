/**
 * time — Civil calendar handling and the J2000 day count.
 *
 * The reduced ephemeris is driven by a single variable: days elapsed since
 * J2000.0 (2000 Jan 1, 12:00). The count is built directly from civil
 * calendar fields with the March-based year trick used by Julian Day
 * formulas: January and February are counted as months 13 and 14 of the
 * previous year, so the leap day always falls at the end of a counting year.
 *
 * The day-count formula folds in the civil zone offset and an empirical
 * Earth-rotation (ΔT) term, (57 + 0.8·(year − 1990)) seconds. That term
 * tracks ΔT reasonably well between ~1990 and ~2020 and drifts outside it;
 * it is kept as is because the series were fitted against it.
 */

import type { CivilDate, CivilDateTime, Epoch } from '../types.js'
import { InvalidInputError } from '../errors/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Seconds per day */
export const SECONDS_PER_DAY = 86400

/** Days per Julian year; epoch / DAYS_PER_JULIAN_YEAR is the series time t */
export const DAYS_PER_JULIAN_YEAR = 365.25

const MS_PER_HOUR = 3600_000

// ─── Epoch ───────────────────────────────────────────────────────────────────

/**
 * Earth-rotation correction in days for a calendar year.
 * Linear fit of ΔT: 57 s in 1990, growing 0.8 s per year.
 */
export function rotationCorrection(year: number): number {
  return (57 + 0.8 * (year - 1990)) / SECONDS_PER_DAY
}

/**
 * Days since J2000.0 for a civil wall-clock time at the given zone offset.
 *
 * Continuous across month and year boundaries for 1901-2099 (apart from the
 * 0.8 s step of the rotation correction on January 1st). The Gregorian
 * century rule is not applied.
 *
 * @param dt - Wall-clock date and time
 * @param zoneOffsetHours - Offset of the civil zone from UTC in hours
 */
export function toEpoch(dt: CivilDateTime, zoneOffsetHours: number): Epoch {
  let year = dt.year - 2000
  let month = dt.month
  if (month <= 2) {
    month += 12
    year -= 1
  }
  const fraction = (dt.hour * 3600 + dt.minute * 60 + dt.second) / SECONDS_PER_DAY

  return 365 * year + 30 * month + dt.day - 33.5 - zoneOffsetHours / 24
    + Math.floor((3 * (month + 1)) / 5)
    + Math.floor(year / 4)
    + fraction
    + rotationCorrection(dt.year)
}

/** Series time variable t: Julian years since J2000.0 */
export function epochYears(epoch: Epoch): number {
  return epoch / DAYS_PER_JULIAN_YEAR
}

/** Attach a wall-clock time to a civil date */
export function atTime(date: CivilDate, hour: number, minute = 0, second = 0): CivilDateTime {
  return { year: date.year, month: date.month, day: date.day, hour, minute, second }
}

// ─── Calendar validation ─────────────────────────────────────────────────────

/** Number of days in a Gregorian month */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

/**
 * Throw InvalidInputError unless the date exists in the proleptic
 * Gregorian calendar.
 */
export function assertCivilDate(date: CivilDate): void {
  const { year, month, day } = date
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    throw new InvalidInputError('date', `expected integer fields, got ${formatCivilDate(date)}`)
  }
  if (month < 1 || month > 12) {
    throw new InvalidInputError('date', `month ${month} out of range 1-12`)
  }
  const last = daysInMonth(year, month)
  if (day < 1 || day > last) {
    throw new InvalidInputError('date', `day ${day} out of range 1-${last} for ${year}-${pad2(month)}`)
  }
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * Parse a strict YYYY-MM-DD string.
 *
 * @example
 * ```ts
 * parseCivilDate('1999-11-14')  // { year: 1999, month: 11, day: 14 }
 * parseCivilDate('2023-02-29')  // throws InvalidInputError
 * ```
 */
export function parseCivilDate(text: string): CivilDate {
  const match = DATE_PATTERN.exec(text.trim())
  if (!match) {
    throw new InvalidInputError('date', `"${text}" is not in YYYY-MM-DD format`)
  }
  const date: CivilDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  }
  assertCivilDate(date)
  return date
}

/** Format as YYYY-MM-DD */
export function formatCivilDate(date: CivilDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

// ─── Instants ────────────────────────────────────────────────────────────────

/** Absolute instant of a wall-clock time at the given zone offset */
export function civilToInstant(dt: CivilDateTime, zoneOffsetHours: number): Date {
  const utcMs = Date.UTC(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second)
  return new Date(utcMs - zoneOffsetHours * MS_PER_HOUR)
}

/** Civil date of an instant as seen at the given zone offset */
export function civilDateOf(instant: Date, zoneOffsetHours: number): CivilDate {
  const shifted = new Date(instant.getTime() + zoneOffsetHours * MS_PER_HOUR)
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  }
}

/** Instant `days` after local civil midnight of `date` */
export function instantAfterMidnight(date: CivilDate, days: number, zoneOffsetHours: number): Date {
  const midnight = civilToInstant(atTime(date, 0), zoneOffsetHours)
  return new Date(midnight.getTime() + days * SECONDS_PER_DAY * 1000)
}
