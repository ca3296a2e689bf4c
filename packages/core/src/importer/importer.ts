/**
 * Calendar Importer
 *
 * Persists parsed events into the object store and the graph layer, then
 * rebuilds the Year → Month/Week → Day hierarchy with fresh counts.
 *
 * Every write is an upsert keyed by a stable identifier, so running the same
 * import twice leaves the stores unchanged. Containment edges and counts are
 * reconciled against the full Event set: an event whose date moved loses its
 * old Day edge, and buckets left without events drop to zero.
 */

import { DateTime } from 'luxon'
import { buildCalendarIndex, dedupeByUid } from '../calendar/index-builder.js'
import { objectIdForUid, toStoredPayload } from '../calendar/payload.js'
import { DEFAULT_TIMEZONE } from '../calendar/parser.js'
import type { CalendarEvent, CalendarIndex, IndexableEvent } from '../calendar/types.js'
import { errorMessage } from '../errors.js'
import type { EdgeType, GraphLayer, GraphNode, NodeClass, ObjectStore } from '../store/types.js'
import { runWithConcurrency } from '../utils/concurrency.js'
import {
  CALENDAR_SCHEMAS,
  dayNode,
  eventNode,
  monthNode,
  weekNode,
  yearNode,
  type NodeSpec,
} from './schemas.js'

export type ImportStage = 'object' | 'graph'

export interface ImportFailure {
  uid: string
  summary: string
  stage: ImportStage
  error: string
}

export interface ImportCounts {
  years: number
  months: number
  weeks: number
  days: number
  events: number
}

export interface ImportSummary {
  /** Distinct uids in the input */
  total: number
  /** Input events dropped because a later one had the same uid */
  duplicates: number
  imported: number
  failed: number
  failures: ImportFailure[]
  /** Hierarchy nodes or edges that could not be written */
  hierarchyErrors: string[]
  counts: ImportCounts
}

export interface ImporterOptions {
  /** Writes in flight at once (default: 1) */
  concurrency?: number
  /** Zone used when reading event starts back from the graph */
  timezone?: string
  verbose?: boolean
}

/** An event as the hierarchy sees it: identity, start and its graph node */
export interface IndexedEvent extends IndexableEvent {
  nodeId: string
}

const CHILD_EDGES: Record<Exclude<NodeClass, 'Event'>, EdgeType[]> = {
  Year: ['contains_month', 'contains_week'],
  Month: ['contains_day'],
  Week: ['contains_day'],
  Day: ['has_event'],
}

interface EdgeLink {
  parent: string
  edgeType: EdgeType
  children: string[]
}

type PersistResult =
  | { ok: true; event: IndexedEvent }
  | { ok: false; failure: ImportFailure }

export class CalendarImporter {
  private readonly concurrency: number
  private readonly timezone: string
  private readonly verbose: boolean

  constructor(
    private readonly objectStore: ObjectStore,
    private readonly graph: GraphLayer,
    options: ImporterOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 1
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE
    this.verbose = options.verbose ?? false
  }

  /**
   * Register the five hierarchy classes. An already registered class counts
   * as success; any other failure propagates.
   */
  async registerSchemas(): Promise<void> {
    for (const schema of CALENDAR_SCHEMAS) {
      const result = await this.graph.registerSchema(schema)
      console.log(`[Import] Schema ${schema.className}: ${result}`)
    }
  }

  async importEvents(input: CalendarEvent[]): Promise<ImportSummary> {
    // One write per uid, so parallel workers never race on the same Event node
    const events = dedupeByUid(input)
    const duplicates = input.length - events.length
    const total = events.length
    console.log(`[Import] Importing ${total} event${total === 1 ? '' : 's'}`)
    if (duplicates > 0) {
      console.warn(
        `[Import] Skipped ${duplicates} repeated uid${duplicates === 1 ? '' : 's'}, the last occurrence wins`,
      )
    }

    const results = await runWithConcurrency(events, this.concurrency, async (event, i) => {
      const result = await this.persistEvent(event)
      const position = `[${i + 1}/${total}]`
      if (result.ok) {
        console.log(`  ${position} ✓ ${event.summary}`)
      } else {
        console.log(`  ${position} ✗ Failed (${result.failure.stage}): ${result.failure.error}`)
      }
      return result
    })

    const persisted: IndexedEvent[] = []
    const failures: ImportFailure[] = []
    for (const result of results) {
      if (result.ok) persisted.push(result.event)
      else failures.push(result.failure)
    }

    // Aggregation starts only after every write has settled
    const { events: indexed, complete } = await this.loadIndexedEvents(persisted)
    const index = buildCalendarIndex(indexed)
    const hierarchyErrors = await this.writeHierarchy(index, complete)

    const summary: ImportSummary = {
      total,
      duplicates,
      imported: persisted.length,
      failed: failures.length,
      failures,
      hierarchyErrors,
      counts: {
        years: index.years.size,
        months: index.months.size,
        weeks: index.weeks.size,
        days: index.days.size,
        events: indexed.length,
      },
    }

    console.log(
      `[Import] Done: ${summary.imported} imported, ${summary.failed} failed ` +
        `(${summary.counts.years} years, ${summary.counts.months} months, ` +
        `${summary.counts.weeks} weeks, ${summary.counts.days} days)`,
    )
    for (const message of hierarchyErrors) {
      console.warn(`[Import] Hierarchy: ${message}`)
    }
    return summary
  }

  private async persistEvent(event: CalendarEvent): Promise<PersistResult> {
    let stage: ImportStage = 'object'
    try {
      const ref = await this.objectStore.putObject(
        objectIdForUid(event.uid),
        toStoredPayload(event),
        { type: 'calendar_event', summary: event.summary, date: event.start.toFormat('yyyy-MM-dd') },
      )
      stage = 'graph'
      const nodeId = await this.upsertNode('Event', eventNode(event, ref))
      return { ok: true, event: { uid: event.uid, start: event.start, nodeId } }
    } catch (err) {
      return {
        ok: false,
        failure: { uid: event.uid, summary: event.summary, stage, error: errorMessage(err) },
      }
    }
  }

  /**
   * The full Event set as stored in the graph, so counts cover earlier
   * imports too. This run's events override what the read returned.
   * `complete` is false when only this run's events are known.
   */
  private async loadIndexedEvents(
    persisted: IndexedEvent[],
  ): Promise<{ events: IndexedEvent[]; complete: boolean }> {
    const byUid = new Map<string, IndexedEvent>()
    let complete = true
    try {
      const nodes = await this.graph.findNodes('Event')
      for (const node of nodes) {
        const event = this.indexedFromNode(node)
        if (event) byUid.set(event.uid, event)
        else if (this.verbose) console.warn(`[Import] Skipping Event node ${node.nodeId}: no uid/start`)
      }
    } catch (err) {
      console.warn(`[Import] Could not read Event nodes, using this run only: ${errorMessage(err)}`)
      complete = false
    }
    for (const event of persisted) byUid.set(event.uid, event)
    return { events: Array.from(byUid.values()), complete }
  }

  private indexedFromNode(node: GraphNode): IndexedEvent | null {
    const { uid, start, date, start_time: startTime } = node.attributes
    if (typeof uid !== 'string' || uid === '') return null

    let dt: DateTime | null = null
    if (typeof start === 'string') {
      dt = DateTime.fromISO(start, { setZone: true }).setZone(this.timezone)
    } else if (typeof date === 'string' && typeof startTime === 'string') {
      dt = DateTime.fromISO(`${date}T${startTime}`, { zone: this.timezone })
    }
    if (!dt || !dt.isValid) return null
    return { uid, start: dt, nodeId: node.nodeId }
  }

  /**
   * Upsert bucket nodes with their counts and add containment edges that
   * are not there yet. With the complete Event set at hand (`prune`), edges
   * the index no longer has are removed and buckets outside the index are
   * reset to zero. Failures are collected; the rest still gets written.
   */
  private async writeHierarchy(index: CalendarIndex<IndexedEvent>, prune: boolean): Promise<string[]> {
    const errors: string[] = []

    const upsertAll = async (className: NodeClass, specs: Map<string, NodeSpec>) => {
      const ids = new Map<string, string>()
      await runWithConcurrency(Array.from(specs), this.concurrency, async ([key, spec]) => {
        try {
          ids.set(key, await this.upsertNode(className, spec))
        } catch (err) {
          errors.push(`${className} ${key}: ${errorMessage(err)}`)
        }
      })
      return ids
    }

    const yearIds = await upsertAll(
      'Year',
      new Map(Array.from(index.years.values(), (b) => [String(b.year), yearNode(b)])),
    )
    const monthIds = await upsertAll(
      'Month',
      new Map(Array.from(index.months.values(), (b) => [b.key, monthNode(b)])),
    )
    const weekIds = await upsertAll(
      'Week',
      new Map(Array.from(index.weeks.values(), (b) => [b.key, weekNode(b)])),
    )
    const dayIds = await upsertAll(
      'Day',
      new Map(Array.from(index.days.values(), (b) => [b.date, dayNode(b)])),
    )

    const links: EdgeLink[] = []
    const resolve = (ids: Map<string, string>, keys: string[]): string[] =>
      keys.flatMap((key) => {
        const id = ids.get(key)
        return id === undefined ? [] : [id]
      })

    for (const year of index.years.values()) {
      const parent = yearIds.get(String(year.year))
      if (parent === undefined) continue
      links.push({ parent, edgeType: 'contains_month', children: resolve(monthIds, year.months) })
      links.push({ parent, edgeType: 'contains_week', children: resolve(weekIds, year.weeks) })
    }
    for (const month of index.months.values()) {
      const parent = monthIds.get(month.key)
      if (parent === undefined) continue
      links.push({ parent, edgeType: 'contains_day', children: resolve(dayIds, month.days) })
    }
    for (const week of index.weeks.values()) {
      const parent = weekIds.get(week.key)
      if (parent === undefined) continue
      links.push({ parent, edgeType: 'contains_day', children: resolve(dayIds, week.days) })
    }
    for (const day of index.days.values()) {
      const parent = dayIds.get(day.date)
      if (parent === undefined) continue
      links.push({ parent, edgeType: 'has_event', children: day.events.map((e) => e.nodeId) })
    }

    // A bucket whose upsert failed would look stale, so pruning waits for a clean run
    if (prune && errors.length > 0) {
      console.warn('[Import] Bucket writes failed, stale edges are kept until the next import')
      prune = false
    }
    if (prune) {
      const current = [yearIds, monthIds, weekIds, dayIds].flatMap((ids) => Array.from(ids.values()))
      links.push(...(await this.resetStaleBuckets(new Set(current), errors)))
    }

    await runWithConcurrency(links, this.concurrency, async ({ parent, edgeType, children }) => {
      try {
        const { created, removed } = await this.syncEdges(parent, edgeType, children, prune)
        if (this.verbose && created + removed > 0) {
          console.log(`[Import] ${parent} -${edgeType}-> ${created} new, ${removed} removed`)
        }
      } catch (err) {
        errors.push(`${edgeType} from ${parent}: ${errorMessage(err)}`)
      }
    })

    return errors
  }

  /**
   * Zero the count of every bucket node the index did not produce. Returns
   * empty links for them, so their containment edges get dropped.
   */
  private async resetStaleBuckets(current: Set<string>, errors: string[]): Promise<EdgeLink[]> {
    const links: EdgeLink[] = []
    for (const className of ['Year', 'Month', 'Week', 'Day'] as const) {
      let nodes: GraphNode[]
      try {
        nodes = await this.graph.findNodes(className)
      } catch (err) {
        errors.push(`${className} stale check: ${errorMessage(err)}`)
        continue
      }
      const stale = nodes.filter((node) => !current.has(node.nodeId))
      let reset = 0
      await runWithConcurrency(stale, this.concurrency, async (node) => {
        try {
          if (node.attributes.event_count !== 0) {
            await this.graph.updateNode(node.nodeId, node.name, { event_count: 0 })
            reset++
          }
          for (const edgeType of CHILD_EDGES[className]) {
            links.push({ parent: node.nodeId, edgeType, children: [] })
          }
        } catch (err) {
          errors.push(`${className} ${node.name}: ${errorMessage(err)}`)
        }
      })
      if (reset > 0) {
        console.log(`[Import] Reset ${reset} ${className} node${reset === 1 ? '' : 's'} without events`)
      }
    }
    return links
  }

  private async upsertNode(className: NodeClass, spec: NodeSpec): Promise<string> {
    const existing = await this.graph.findNodes(className, spec.match)
    const [first] = existing
    if (first) {
      if (existing.length > 1 && this.verbose) {
        console.warn(`[Import] ${existing.length} ${className} nodes match ${spec.name}, using ${first.nodeId}`)
      }
      const updated = await this.graph.updateNode(first.nodeId, spec.name, spec.attributes)
      return updated.nodeId
    }
    const created = await this.graph.createNode(className, spec.name, spec.attributes)
    return created.nodeId
  }

  /**
   * Create the missing edges from parent to children. With `prune`, edges
   * to anything else and repeated edges to the same child are deleted.
   */
  private async syncEdges(
    parent: string,
    edgeType: EdgeType,
    children: string[],
    prune: boolean,
  ): Promise<{ created: number; removed: number }> {
    if (children.length === 0 && !prune) return { created: 0, removed: 0 }
    const wanted = new Set(children)
    const linked = new Set<string>()
    let removed = 0
    for (const edge of await this.graph.outgoingEdges(parent, edgeType)) {
      if (wanted.has(edge.toNodeId) && !linked.has(edge.toNodeId)) {
        linked.add(edge.toNodeId)
      } else if (prune) {
        await this.graph.deleteEdge(edge.edgeId)
        removed++
      }
    }
    let created = 0
    for (const child of wanted) {
      if (linked.has(child)) continue
      await this.graph.createEdge(parent, child, edgeType)
      linked.add(child)
      created++
    }
    return { created, removed }
  }
}
