/**
 * Import-then-query session: parse the file, import it, cross-check the two
 * stores, then hand over to the interactive menu.
 */

import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { parseICalFile } from '../calendar/parser.js'
import type { CalendarEvent } from '../calendar/types.js'
import type { CalendarGraphConfig } from '../config.js'
import { ParseError, StoreError, errorMessage } from '../errors.js'
import { CalendarImporter, type ImportSummary } from '../importer/importer.js'
import { CalendarQuery } from '../query/query-engine.js'
import { createGraphClient } from '../store/graph-client.js'
import { createObjectStoreClient } from '../store/object-store-client.js'
import type { GraphLayer, ObjectStore } from '../store/types.js'
import { readlineIO, runMenu } from './menu.js'

export const INTERRUPTED = 'Programm abgebrochen.'

export interface SessionOptions {
  icalFile: string
  config: CalendarGraphConfig
  importOnly?: boolean
  verbose?: boolean
}

export interface Stores {
  objectStore: ObjectStore
  graph: GraphLayer
}

export function createStores(config: CalendarGraphConfig): Stores {
  return {
    objectStore: createObjectStoreClient({
      baseUrl: config.objectStoreUrl,
      apiToken: config.objectStoreToken || undefined,
      timeoutMs: config.requestTimeoutMs,
    }),
    graph: createGraphClient({
      baseUrl: config.graphLayerUrl,
      token: config.graphToken || undefined,
      timeoutMs: config.requestTimeoutMs,
    }),
  }
}

function printHeader(text: string): void {
  console.log(`\n${text}`)
  console.log('-'.repeat(text.length))
}

export interface VerifyResult {
  year: number
  graphEvents: number
  storedObjects: number
}

/**
 * Compare what the graph reaches for a year with what the object store
 * lists for the same date range.
 */
export async function verifyYear(stores: Stores, year: number): Promise<VerifyResult> {
  const query = new CalendarQuery(stores.graph)
  const months = await query.byYear(year)
  const graphEvents = months.reduce(
    (sum, month) => sum + month.days.reduce((n, day) => n + day.events.length, 0),
    0,
  )
  const objects = await stores.objectStore.getObjects({
    type: 'calendar_event',
    dateFrom: `${year}-01-01`,
    dateTo: `${year}-12-31`,
  })
  return { year, graphEvents, storedObjects: objects.length }
}

/**
 * Parse and import. Returns the summary, or an exit code when the run
 * cannot continue.
 */
export async function importFile(
  options: SessionOptions,
  stores: Stores,
): Promise<{ exitCode: 0 | 1; summary?: ImportSummary; events: CalendarEvent[] }> {
  printHeader('Phase 1: Import')
  console.log(`Parsing iCal file: ${options.icalFile}`)

  let events: CalendarEvent[]
  try {
    const parsed = await parseICalFile(options.icalFile, { timezone: options.config.timezone })
    for (const error of parsed.errors) {
      console.warn(`[Parser] Skipped: ${error.message}`)
    }
    for (const warning of parsed.warnings) {
      console.warn(`[Parser] ${warning}`)
    }
    events = parsed.events
  } catch (err) {
    if (err instanceof ParseError) {
      console.error(`✗ ${err.message}`)
      return { exitCode: 1, events: [] }
    }
    throw err
  }
  console.log(`Found ${events.length} event${events.length === 1 ? '' : 's'}`)

  const importer = new CalendarImporter(stores.objectStore, stores.graph, {
    concurrency: options.config.importConcurrency,
    timezone: options.config.timezone,
    verbose: options.verbose,
  })

  try {
    await importer.registerSchemas()
  } catch (err) {
    if (err instanceof StoreError) {
      console.error(`✗ Could not register schemas (${err.service}): ${err.message}`)
      return { exitCode: 1, events }
    }
    throw err
  }

  const summary = await importer.importEvents(events)
  if (summary.failures.length > 0) {
    console.log(`\nFailed events (${summary.failures.length}):`)
    for (const failure of summary.failures) {
      console.log(`  - ${failure.summary} [${failure.uid}] (${failure.stage}): ${failure.error}`)
    }
  }

  const exitCode = summary.total > 0 && summary.imported === 0 ? 1 : 0
  return { exitCode, summary, events }
}

export async function runSession(options: SessionOptions, stores = createStores(options.config)): Promise<number> {
  const { exitCode, summary, events } = await importFile(options, stores)
  if (exitCode !== 0 || !summary) return exitCode

  const [first] = events
  if (first && summary.imported > 0) {
    printHeader('Verifying Data Accessibility')
    try {
      const result = await verifyYear(stores, first.start.year)
      console.log(
        `Year ${result.year}: ${result.graphEvents} events in graph, ` +
          `${result.storedObjects} objects in store`,
      )
    } catch (err) {
      console.warn(`[Verify] ${errorMessage(err)}`)
    }
  }

  if (options.importOnly) {
    console.log('\nImport complete. Exiting.')
    return 0
  }

  printHeader('Phase 2: Query Calendar')
  const rl = readline.createInterface({ input, output })
  rl.on('SIGINT', () => {
    console.log(`\n\n${INTERRUPTED}`)
    rl.close()
  })
  try {
    await runMenu(new CalendarQuery(stores.graph), readlineIO(rl))
  } finally {
    rl.close()
  }
  return 0
}
