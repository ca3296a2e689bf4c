/**
 * Command-line interface: flags map onto config overrides.
 */

import { Command, InvalidArgumentError } from 'commander'
import { loadConfig, type CalendarGraphConfig } from '../config.js'
import { runSession } from './app.js'

export type CliOptions = {
  icalFile: string
  objectstore?: string
  graphlayer?: string
  token?: string
  objectstoreToken?: string
  timezone?: string
  concurrency?: number
  config?: string
  importOnly?: boolean
  verbose?: boolean
}

function parsePositiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return n
}

export function toOverrides(opts: CliOptions): Partial<CalendarGraphConfig> {
  const overrides: Partial<CalendarGraphConfig> = {}
  if (opts.objectstore !== undefined) overrides.objectStoreUrl = opts.objectstore
  if (opts.graphlayer !== undefined) overrides.graphLayerUrl = opts.graphlayer
  if (opts.token !== undefined) overrides.graphToken = opts.token
  if (opts.objectstoreToken !== undefined) overrides.objectStoreToken = opts.objectstoreToken
  if (opts.timezone !== undefined) overrides.timezone = opts.timezone
  if (opts.concurrency !== undefined) overrides.importConcurrency = opts.concurrency
  return overrides
}

/**
 * `run` receives the parsed options; the default starts a session and
 * stores its exit code on the process.
 */
export function createProgram(
  run: (opts: CliOptions) => Promise<void> = runFromOptions,
): Command {
  const program = new Command()

  program
    .name('calendar-graph')
    .description('Import an iCal file into the object store and graph layer, then query it')
    .requiredOption('--ical-file <path>', 'iCal (.ics) file to import')
    .option('--objectstore <url>', 'object store base URL')
    .option('--graphlayer <url>', 'graph layer base URL')
    .option('--token <token>', 'graph layer bearer token')
    .option('--objectstore-token <token>', 'object store API token')
    .option('--timezone <iana>', 'display time zone')
    .option('--concurrency <n>', 'parallel writes during import', parsePositiveInt)
    .option('--config <dir>', 'directory containing config.yaml')
    .option('--import-only', 'exit after the import')
    .option('-v, --verbose', 'debug output')
    .action(async () => {
      await run(program.opts<CliOptions>())
    })

  return program
}

async function runFromOptions(opts: CliOptions): Promise<void> {
  const config = loadConfig({ configDir: opts.config, overrides: toOverrides(opts) })
  process.exitCode = await runSession({
    icalFile: opts.icalFile,
    config,
    importOnly: opts.importOnly,
    verbose: opts.verbose,
  })
}
