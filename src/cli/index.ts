/**
 * moon-almanac CLI
 *
 * Commands:
 *   moon-almanac age [date]               Moon age at local noon
 *   moon-almanac info <lat> <lon> [date]  Age, moonrise and moonset
 *   moon-almanac help                     Usage
 */

import { runCli } from './commands.js'

const code = runCli(process.argv.slice(2), {
  log: line => console.log(line),
  error: line => console.error(line),
  env: process.env,
  now: () => new Date(),
})

process.exitCode = code
