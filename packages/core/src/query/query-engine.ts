/**
 * Calendar Query
 *
 * Read-only traversal of the stored hierarchy. Every query starts at a
 * bucket node found by its key attributes and walks outgoing containment
 * edges down to the Event nodes.
 */

import { DateTime } from 'luxon'
import { monthName, weekdayName } from '../calendar/locale.js'
import type { EdgeType, GraphLayer, GraphNode } from '../store/types.js'
import type { QueryTarget } from './input.js'

export interface EventView {
  uid: string
  summary: string
  date: string
  /** HH:mm */
  startTime: string
  /** HH:mm */
  endTime: string
  durationMinutes: number
  status: string
  objectUrl: string
}

export interface DayEvents {
  date: string
  weekday: string
  events: EventView[]
}

export interface MonthEvents {
  year: number
  month: number
  monthName: string
  days: DayEvents[]
}

export interface YearEvents {
  year: number
  months: MonthEvents[]
}

export type QueryResult =
  | { kind: 'day' | 'week' | 'month'; target: QueryTarget; days: DayEvents[] }
  | { kind: 'year'; target: QueryTarget; months: MonthEvents[] }
  | { kind: 'all'; target: QueryTarget; years: YearEvents[] }

function stringAttr(node: GraphNode, key: string, fallback = ''): string {
  const value = node.attributes[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return fallback
}

function numberAttr(node: GraphNode, key: string, fallback = 0): number {
  const value = node.attributes[key]
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value)
  }
  return fallback
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function toEventView(node: GraphNode): EventView {
  return {
    uid: stringAttr(node, 'uid', node.nodeId),
    summary: stringAttr(node, 'summary', node.name || 'Untitled Event'),
    date: stringAttr(node, 'date'),
    startTime: stringAttr(node, 'start_time', 'N/A'),
    endTime: stringAttr(node, 'end_time', 'N/A'),
    durationMinutes: numberAttr(node, 'duration_minutes'),
    status: stringAttr(node, 'status'),
    objectUrl: stringAttr(node, 'object_url', 'N/A'),
  }
}

/** (date, start time, uid) */
export function compareEventViews(a: EventView, b: EventView): number {
  return compareText(a.date, b.date) || compareText(a.startTime, b.startTime) || compareText(a.uid, b.uid)
}

export class CalendarQuery {
  constructor(private readonly graph: GraphLayer) {}

  async byDay(date: string): Promise<DayEvents[]> {
    const days = await this.graph.findNodes('Day', { date })
    return this.collectDays(days)
  }

  async byWeek(year: number, week: number): Promise<DayEvents[]> {
    const weeks = await this.graph.findNodes('Week', { year, week })
    return this.collectDays(await this.children(weeks, 'contains_day'))
  }

  async byMonth(year: number, month: number): Promise<DayEvents[]> {
    const months = await this.graph.findNodes('Month', { year, month })
    return this.collectDays(await this.children(months, 'contains_day'))
  }

  /** Calendar months of the year; ISO weeks are not followed */
  async byYear(year: number): Promise<MonthEvents[]> {
    const years = await this.graph.findNodes('Year', { year })
    return this.collectMonths(await this.children(years, 'contains_month'))
  }

  async all(): Promise<YearEvents[]> {
    const yearNodes = await this.graph.findNodes('Year')
    const byYear = new Map<number, GraphNode[]>()
    for (const node of yearNodes) {
      const year = numberAttr(node, 'year', Number(node.name))
      if (!Number.isInteger(year)) continue
      byYear.set(year, [...(byYear.get(year) ?? []), node])
    }

    const result: YearEvents[] = []
    for (const year of Array.from(byYear.keys()).sort((a, b) => a - b)) {
      const months = await this.collectMonths(
        await this.children(byYear.get(year) ?? [], 'contains_month'),
      )
      if (months.length > 0) result.push({ year, months })
    }
    return result
  }

  async run(target: QueryTarget): Promise<QueryResult> {
    switch (target.kind) {
      case 'day':
        return { kind: 'day', target, days: await this.byDay(target.date) }
      case 'week':
        return { kind: 'week', target, days: await this.byWeek(target.year, target.week) }
      case 'month':
        return { kind: 'month', target, days: await this.byMonth(target.year, target.month) }
      case 'year':
        return { kind: 'year', target, months: await this.byYear(target.year) }
      case 'all':
        return { kind: 'all', target, years: await this.all() }
    }
  }

  private async children(parents: GraphNode[], edgeType: EdgeType): Promise<GraphNode[]> {
    const seen = new Map<string, GraphNode>()
    for (const parent of parents) {
      for (const { node } of await this.graph.relatedNodes(parent.nodeId, edgeType)) {
        seen.set(node.nodeId, node)
      }
    }
    return Array.from(seen.values())
  }

  /**
   * Events of the given Day nodes, merged per date. Days without events
   * are left out.
   */
  private async collectDays(dayNodes: GraphNode[]): Promise<DayEvents[]> {
    const byDate = new Map<string, Map<string, EventView>>()
    for (const day of dayNodes) {
      const date = stringAttr(day, 'date', day.name)
      const events = byDate.get(date) ?? new Map<string, EventView>()
      byDate.set(date, events)
      for (const { node } of await this.graph.relatedNodes(day.nodeId, 'has_event')) {
        const view = toEventView(node)
        events.set(view.uid, { ...view, date: view.date || date })
      }
    }

    const result: DayEvents[] = []
    for (const date of Array.from(byDate.keys()).sort(compareText)) {
      const events = Array.from(byDate.get(date)?.values() ?? []).sort(compareEventViews)
      if (events.length === 0) continue
      result.push({ date, weekday: weekdayFor(date), events })
    }
    return result
  }

  private async collectMonths(monthNodes: GraphNode[]): Promise<MonthEvents[]> {
    const byKey = new Map<string, { year: number; month: number; nodes: GraphNode[] }>()
    for (const node of monthNodes) {
      const year = numberAttr(node, 'year')
      const month = numberAttr(node, 'month')
      if (month < 1 || month > 12) continue
      const key = `${year}-${String(month).padStart(2, '0')}`
      const entry = byKey.get(key) ?? { year, month, nodes: [] }
      entry.nodes.push(node)
      byKey.set(key, entry)
    }

    const result: MonthEvents[] = []
    for (const key of Array.from(byKey.keys()).sort(compareText)) {
      const entry = byKey.get(key)
      if (!entry) continue
      const days = await this.collectDays(await this.children(entry.nodes, 'contains_day'))
      if (days.length === 0) continue
      result.push({
        year: entry.year,
        month: entry.month,
        monthName: monthName(entry.month),
        days,
      })
    }
    return result
  }
}

function weekdayFor(date: string): string {
  const dt = DateTime.fromISO(date, { zone: 'utc' })
  return dt.isValid ? weekdayName(dt.weekday) : ''
}
