/**
 * Hierarchy Deriver
 *
 * Computes Year, Month, ISO Week and Day bucket keys for an event.
 * Only the event's start (already converted into the display zone) and the
 * fixed German name tables are consulted, so the same event always lands in
 * the same buckets.
 */

import { DateTime } from 'luxon'
import { monthName, weekdayName } from './locale.js'
import type { BucketKeys, CalendarEvent, DayKey, MonthKey, WeekKey } from './types.js'

const DATE_FORMAT = 'yyyy-MM-dd'

export function deriveBuckets(event: Pick<CalendarEvent, 'start'>): BucketKeys {
  const start = event.start
  return {
    year: start.year,
    month: deriveMonth(start),
    week: deriveWeek(start),
    day: deriveDay(start),
  }
}

export function deriveMonth(dt: DateTime): MonthKey {
  return {
    year: dt.year,
    month: dt.month,
    monthName: monthName(dt.month),
  }
}

/**
 * ISO-8601 week: Monday-first, week 1 holds the year's first Thursday.
 * Near year boundaries the week-year differs from the calendar year
 * (2025-12-29 belongs to 2026-W01).
 */
export function deriveWeek(dt: DateTime): WeekKey {
  const monday = dt.startOf('day').minus({ days: dt.weekday - 1 })
  return {
    year: dt.weekYear,
    week: dt.weekNumber,
    startDate: monday.toFormat(DATE_FORMAT),
    endDate: monday.plus({ days: 6 }).toFormat(DATE_FORMAT),
  }
}

export function deriveDay(dt: DateTime): DayKey {
  return {
    date: dt.toFormat(DATE_FORMAT),
    year: dt.year,
    month: dt.month,
    day: dt.day,
    weekdayNumber: dt.weekday,
    weekday: weekdayName(dt.weekday),
  }
}

export function monthKey(key: Pick<MonthKey, 'year' | 'month'>): string {
  return `${key.year}-${String(key.month).padStart(2, '0')}`
}

export function weekKey(key: Pick<WeekKey, 'year' | 'week'>): string {
  return `${key.year}-W${String(key.week).padStart(2, '0')}`
}

/**
 * Number of ISO weeks in a week-year (52 or 53).
 */
export function weeksInIsoYear(year: number): number {
  // Dec 28 always falls in the last ISO week of its year
  return DateTime.utc(year, 12, 28).weekNumber
}

/**
 * Monday and Sunday of an ISO week.
 */
export function isoWeekRange(year: number, week: number): WeekKey {
  const monday = DateTime.fromObject(
    { weekYear: year, weekNumber: week, weekday: 1 },
    { zone: 'utc' },
  )
  return {
    year,
    week,
    startDate: monday.toFormat(DATE_FORMAT),
    endDate: monday.plus({ days: 6 }).toFormat(DATE_FORMAT),
  }
}
