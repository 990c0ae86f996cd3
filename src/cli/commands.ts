/**
 * Command implementations for the moon-almanac CLI.
 *
 * Kept apart from the entry point so they can run against an in-memory
 * console and a fixed clock.
 */

import type { CivilDate, EngineSettings, RiseSetEvent } from '../types.js'
import type { EngineSettingsInput } from '../config/index.js'
import { resolveSettings, settingsFromEnv } from '../config/index.js'
import { getMoonAge, getMoonInfo } from '../api/index.js'
import { parseGeoPosition } from '../observer/index.js'
import { civilDateOf, formatCivilDate, parseCivilDate } from '../time/index.js'
import { InvalidInputError } from '../errors/index.js'

/** Where command output goes */
export interface CliIO {
  log(line: string): void
  error(line: string): void
  env: Record<string, string | undefined>
  now(): Date
}

export const HELP = `moon-almanac — Moon age, moonrise and moonset

Commands:
  age [date]                  Print the Moon's age at local noon (date: YYYY-MM-DD, default today)
  info <lat> <lon> [date]     Print age, moonrise and moonset for a place
  help                        Show this message

Options:
  --offset <hours>            Civil zone offset from UTC (default 9, env MOON_ZONE_OFFSET)
  --verbose                   Also print solver iteration counts

Examples:
  moon-almanac age 2000-01-07
  moon-almanac info 35.6544 139.7447 1999-11-14   # Tokyo
  moon-almanac info 51.5 -0.1 --offset 0          # London, UTC`

interface ParsedArgs {
  command: string | undefined
  positionals: string[]
  offset: number | undefined
  verbose: boolean
}

/** Split argv into command, positionals and flags. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = []
  let offset: number | undefined
  let verbose = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue
    if (arg === '--verbose' || arg === '-v') {
      verbose = true
    } else if (arg === '--offset' || arg.startsWith('--offset=')) {
      const raw = arg === '--offset' ? argv[++i] : arg.slice('--offset='.length)
      const value = raw === undefined || raw.trim() === '' ? NaN : Number(raw)
      if (!Number.isFinite(value)) {
        throw new InvalidInputError('--offset', `"${raw ?? ''}" is not a number`)
      }
      offset = value
    } else {
      positionals.push(arg)
    }
  }

  const [command, ...rest] = positionals
  return { command, positionals: rest, offset, verbose }
}

/**
 * Run one CLI invocation.
 *
 * @returns Process exit code
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  try {
    const args = parseArgs(argv)

    switch (args.command) {
      case 'age':
        cmdAge(args, io)
        return 0
      case 'info':
        return cmdInfo(args, io)
      case 'help':
      case undefined:
        io.log(HELP)
        return 0
      default:
        io.error(`Unknown command: ${args.command}`)
        io.log(HELP)
        return 1
    }
  } catch (err) {
    io.error(err instanceof Error ? err.message : String(err))
    return 1
  }
}

function buildSettings(args: ParsedArgs, io: CliIO): EngineSettings {
  const input: EngineSettingsInput = { ...settingsFromEnv(io.env) }
  if (args.offset !== undefined) input.zoneOffsetHours = args.offset
  return resolveSettings(input)
}

function resolveDate(text: string | undefined, settings: EngineSettings, io: CliIO): CivilDate {
  return text === undefined
    ? civilDateOf(io.now(), settings.zoneOffsetHours)
    : parseCivilDate(text)
}

function cmdAge(args: ParsedArgs, io: CliIO): void {
  const settings = buildSettings(args, io)
  const date = resolveDate(args.positionals[0], settings, io)
  const result = getMoonAge(date, settings)

  io.log(`Moon age for ${formatCivilDate(date)} (UTC${fmtOffset(settings.zoneOffsetHours)}): ${result.age.toFixed(2)} days`)
  if (args.verbose) {
    io.log(`  New moon:   ${fmtInstant(result.newMoon)}`)
    io.log(`  Iterations: ${result.iterations}`)
  }
}

function cmdInfo(args: ParsedArgs, io: CliIO): number {
  const [lat, lon, dateText] = args.positionals
  if (lat === undefined || lon === undefined) {
    io.error('Usage: moon-almanac info <lat> <lon> [YYYY-MM-DD]')
    return 1
  }

  const settings = buildSettings(args, io)
  const position = parseGeoPosition(lat, lon)
  const date = resolveDate(dateText, settings, io)
  const info = getMoonInfo(date, position, settings)

  io.log(`Moon for ${formatCivilDate(date)} at ${position.latitude}°N ${position.longitude}°E (UTC${fmtOffset(settings.zoneOffsetHours)}):`)
  io.log(`  Age:       ${info.age.toFixed(2)} days`)
  io.log(`  New moon:  ${fmtInstant(info.newMoon)}`)
  io.log(`  Moonrise:  ${fmtEvent(info.rise, 'rise', args.verbose)}`)
  io.log(`  Moonset:   ${fmtEvent(info.set, 'set', args.verbose)}`)
  return 0
}

// ─── Formatting ───────────────────────────────────────────────────────────────

/** Format an offset in hours as +09:00 / -03:30 */
export function fmtOffset(hours: number): string {
  const sign = hours < 0 ? '-' : '+'
  const totalMinutes = Math.round(Math.abs(hours) * 60)
  const h = String(Math.floor(totalMinutes / 60)).padStart(2, '0')
  const m = String(totalMinutes % 60).padStart(2, '0')
  return `${sign}${h}:${m}`
}

/** Format a Date as a short UTC string. */
export function fmtInstant(d: Date): string {
  return d.toISOString().replace('T', ' ').replace(/\.\d+Z$/, ' UTC')
}

export function fmtEvent(event: RiseSetEvent, kind: 'rise' | 'set', verbose: boolean): string {
  switch (event.type) {
    case 'crossing': {
      const text = `${fmtInstant(event.time)} (day fraction ${event.dayFraction.toFixed(5)})`
      return verbose ? `${text}, ${event.iterations} iterations` : text
    }
    case 'always-above':
      return `does not ${kind} (Moon above the horizon all day)`
    case 'always-below':
      return `does not ${kind} (Moon below the horizon all day)`
  }
}
