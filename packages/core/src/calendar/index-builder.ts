/**
 * Index Builder
 *
 * Aggregates events under their bucket keys and computes event counts
 * bottom-up. The index is a pure function of the event set.
 */

import { deriveBuckets, monthKey, weekKey } from './hierarchy.js'
import type {
  CalendarIndex,
  IndexableEvent,
  DayBucket,
  MonthBucket,
  WeekBucket,
  YearBucket,
} from './types.js'

/**
 * Start ascending, ties by uid ascending.
 */
export function compareEvents(a: IndexableEvent, b: IndexableEvent): number {
  const diff = a.start.toMillis() - b.start.toMillis()
  if (diff !== 0) return diff
  return a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Collapse duplicate uids; the last occurrence wins.
 */
export function dedupeByUid<E extends IndexableEvent>(events: E[]): E[] {
  const byUid = new Map<string, E>()
  for (const event of events) {
    byUid.delete(event.uid)
    byUid.set(event.uid, event)
  }
  return Array.from(byUid.values())
}

export function buildCalendarIndex<E extends IndexableEvent>(events: E[]): CalendarIndex<E> {
  const days = new Map<string, DayBucket<E>>()
  const weeks = new Map<string, WeekBucket>()
  const months = new Map<string, MonthBucket>()
  const years = new Map<number, YearBucket>()

  const getYear = (year: number): YearBucket => {
    let bucket = years.get(year)
    if (!bucket) {
      bucket = { year, months: [], weeks: [], eventCount: 0 }
      years.set(year, bucket)
    }
    return bucket
  }

  for (const event of dedupeByUid(events)) {
    const keys = deriveBuckets(event)
    const mKey = monthKey(keys.month)
    const wKey = weekKey(keys.week)

    let day = days.get(keys.day.date)
    if (!day) {
      day = { ...keys.day, events: [], monthKey: mKey, weekKey: wKey, eventCount: 0 }
      days.set(keys.day.date, day)
    }
    day.events.push(event)

    let month = months.get(mKey)
    if (!month) {
      month = { ...keys.month, key: mKey, days: [], eventCount: 0 }
      months.set(mKey, month)
      getYear(keys.month.year).months.push(mKey)
    }
    if (!month.days.includes(keys.day.date)) month.days.push(keys.day.date)

    let week = weeks.get(wKey)
    if (!week) {
      week = { ...keys.week, key: wKey, days: [], eventCount: 0 }
      weeks.set(wKey, week)
      getYear(keys.week.year).weeks.push(wKey)
    }
    if (!week.days.includes(keys.day.date)) week.days.push(keys.day.date)
  }

  // Bottom-up counts
  for (const day of days.values()) {
    day.events.sort(compareEvents)
    day.eventCount = day.events.length
  }

  const countDays = (dates: string[]): number =>
    dates.reduce((sum, date) => sum + (days.get(date)?.eventCount ?? 0), 0)

  for (const month of months.values()) {
    month.days.sort(compareStrings)
    month.eventCount = countDays(month.days)
  }
  for (const week of weeks.values()) {
    week.days.sort(compareStrings)
    week.eventCount = countDays(week.days)
  }
  for (const year of years.values()) {
    year.months.sort(compareStrings)
    year.weeks.sort(compareStrings)
    year.eventCount = reachableFromYear(year, months, weeks, days).size
  }

  return {
    days: sortMap(days, compareStrings),
    weeks: sortMap(weeks, compareStrings),
    months: sortMap(months, compareStrings),
    years: sortMap(years, (a, b) => a - b),
  }
}

/**
 * A year reaches events through its months and through its ISO weeks; an
 * event reachable both ways counts once.
 */
function reachableFromYear<E extends IndexableEvent>(
  year: YearBucket,
  months: Map<string, MonthBucket>,
  weeks: Map<string, WeekBucket>,
  days: Map<string, DayBucket<E>>,
): Set<string> {
  const dates = new Set<string>()
  for (const key of year.months) {
    for (const date of months.get(key)?.days ?? []) dates.add(date)
  }
  for (const key of year.weeks) {
    for (const date of weeks.get(key)?.days ?? []) dates.add(date)
  }
  const uids = new Set<string>()
  for (const date of dates) {
    for (const event of days.get(date)?.events ?? []) uids.add(event.uid)
  }
  return uids
}

function sortMap<K, V>(map: Map<K, V>, compare: (a: K, b: K) => number): Map<K, V> {
  return new Map(Array.from(map.entries()).sort(([a], [b]) => compare(a, b)))
}

/**
 * Recompute every count from the event set and report buckets whose cached
 * count disagrees. Empty when the index is consistent.
 */
export function verifyEventCounts<E extends IndexableEvent>(index: CalendarIndex<E>): string[] {
  const mismatches: string[] = []
  const reachable = (dates: string[]): number => {
    const uids = new Set<string>()
    for (const date of dates) {
      for (const event of index.days.get(date)?.events ?? []) uids.add(event.uid)
    }
    return uids.size
  }

  for (const [date, day] of index.days) {
    if (day.eventCount !== new Set(day.events.map((e) => e.uid)).size) mismatches.push(date)
  }
  for (const [key, week] of index.weeks) {
    if (week.eventCount !== reachable(week.days)) mismatches.push(key)
  }
  for (const [key, month] of index.months) {
    if (month.eventCount !== reachable(month.days)) mismatches.push(key)
  }
  for (const [year, bucket] of index.years) {
    const expected = reachableFromYear(bucket, index.months, index.weeks, index.days).size
    if (bucket.eventCount !== expected) mismatches.push(String(year))
  }
  return mismatches
}
