#!/usr/bin/env node
import { Command } from 'commander'
import { registerInstallCommand } from './commands/install'
import { logger } from './utils/logger'
import { isColorMode, setColorMode } from './utils/colors'

const VERSION: string = '0.1.0'

function main(): void {
  const program: Command = new Command()
  program.name('netcfg')
  program.description('netcfg: lock, load, diff, check and commit device configuration in one transaction')
  program.version(VERSION)
  // Global options (parsed by Commander, but applied pre-parse so early logs honor them)
  program.option('--verbose', 'Verbose output')
  program.option('--json', 'JSON-only output (suppresses non-JSON logs)')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--ndjson', 'Newline-delimited JSON stage events (implies --json)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  if (process.argv.includes('--verbose')) {
    logger.setLevel('debug')
    process.env.NCD_VERBOSE = '1'
  }
  if (process.argv.includes('--json')) {
    logger.setJsonOnly(true)
    process.env.NCD_JSON = '1'
  }
  if (process.argv.includes('--quiet')) {
    logger.setLevel('error')
    process.env.NCD_QUIET = '1'
  }
  if (process.argv.includes('--no-emoji')) {
    logger.setNoEmoji(true)
  }
  if (process.argv.includes('--ndjson')) {
    logger.setNdjson(true)
    process.env.NCD_NDJSON = '1'
  }
  if (process.argv.includes('--timestamps')) {
    logger.setTimestamps(true)
  }
  const colorIx = process.argv.findIndex((a) => a === '--color')
  const colorArg: string | undefined = colorIx !== -1 ? process.argv[colorIx + 1] : undefined
  if (colorArg !== undefined && isColorMode(colorArg)) setColorMode(colorArg)
  else setColorMode('auto')
  registerInstallCommand(program)
  program.parseAsync(process.argv)
    .then(() => {})
    .catch((err: unknown) => {
      const message: string = err instanceof Error ? err.message : String(err)
      // eslint-disable-next-line no-console
      console.error(`Error: ${message}`)
      process.exitCode = 1
    })
}

main()
