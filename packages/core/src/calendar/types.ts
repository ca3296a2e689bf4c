/**
 * Calendar Types
 *
 * Core interfaces for the event model and the derived date hierarchy
 * (Year → Month/Week → Day → Event).
 */

import type { DateTime } from 'luxon'

/**
 * Event status as written in the iCal STATUS property.
 * Unknown values are kept verbatim (upper-cased).
 */
export type EventStatus = 'CONFIRMED' | 'TENTATIVE' | 'CANCELLED' | (string & {})

/**
 * A single non-recurring calendar event.
 * Maps to one iCalendar VEVENT.
 */
export interface CalendarEvent {
  /** Stable unique ID from the UID property */
  uid: string

  /** Event title (SUMMARY), "Untitled Event" when absent */
  summary: string

  /** DESCRIPTION, empty string when absent */
  description: string

  status: EventStatus

  /** Start in the display zone */
  start: DateTime

  /** End in the display zone */
  end: DateTime

  /** Whole minutes between start and end */
  durationMinutes: number

  /** True when DTSTART was a DATE value */
  allDay: boolean

  created?: DateTime

  lastModified?: DateTime
}

/**
 * Bucket keys derived from an event's start timestamp.
 */
export interface BucketKeys {
  year: number
  month: MonthKey
  week: WeekKey
  day: DayKey
}

export interface MonthKey {
  year: number
  /** 1-12 */
  month: number
  /** German month name */
  monthName: string
}

/**
 * ISO-8601 week. `year` is the ISO week-year, which may differ from the
 * calendar year of the days it contains.
 */
export interface WeekKey {
  year: number
  week: number
  /** Monday, yyyy-MM-dd */
  startDate: string
  /** Sunday, yyyy-MM-dd */
  endDate: string
}

export interface DayKey {
  /** yyyy-MM-dd */
  date: string
  year: number
  month: number
  day: number
  /** Monday = 1 … Sunday = 7 */
  weekdayNumber: number
  /** German weekday name */
  weekday: string
}

/**
 * The minimum an index entry needs: identity and start.
 */
export type IndexableEvent = Pick<CalendarEvent, 'uid' | 'start'>

export interface DayBucket<E extends IndexableEvent = CalendarEvent> extends DayKey {
  /** Sorted by start ascending, ties by uid */
  events: E[]
  monthKey: string
  weekKey: string
  eventCount: number
}

export interface WeekBucket extends WeekKey {
  key: string
  /** Sorted day dates */
  days: string[]
  eventCount: number
}

export interface MonthBucket extends MonthKey {
  key: string
  /** Sorted day dates */
  days: string[]
  eventCount: number
}

export interface YearBucket {
  year: number
  /** Sorted month keys (yyyy-MM) */
  months: string[]
  /** Sorted week keys (yyyy-Www) */
  weeks: string[]
  eventCount: number
}

/**
 * Derived read index over an event set.
 * Recomputed from scratch on every import; never mutated incrementally.
 */
export interface CalendarIndex<E extends IndexableEvent = CalendarEvent> {
  days: Map<string, DayBucket<E>>
  weeks: Map<string, WeekBucket>
  months: Map<string, MonthBucket>
  years: Map<number, YearBucket>
}

/**
 * JSON document stored in the object store for each event.
 */
export interface StoredEventPayload {
  uid: string
  summary: string
  description: string
  status: string
  start: string
  end: string
  duration_minutes: number
  created: string | null
  last_modified: string | null
}

/**
 * Options shared by the parser and the deriver.
 */
export interface CalendarOptions {
  /** IANA zone all timestamps are converted into (default: Europe/Berlin) */
  timezone?: string
}
