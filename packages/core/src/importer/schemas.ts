/**
 * Graph schema definitions and node attribute mapping for the hierarchy.
 */

import type { StoredObjectRef, Attributes, SchemaDefinition } from '../store/types.js'
import type {
  CalendarEvent,
  DayBucket,
  IndexableEvent,
  MonthBucket,
  WeekBucket,
  YearBucket,
} from '../calendar/types.js'
import { formatTimestamp } from '../calendar/payload.js'

export const CALENDAR_SCHEMAS: SchemaDefinition[] = [
  {
    className: 'Year',
    attributes: { year: 'int', event_count: 'int' },
    description: 'Calendar year',
  },
  {
    className: 'Month',
    attributes: { year: 'int', month: 'int', month_name: 'string', event_count: 'int' },
    description: 'Calendar month',
  },
  {
    className: 'Week',
    attributes: {
      year: 'int',
      week: 'int',
      start_date: 'string',
      end_date: 'string',
      event_count: 'int',
    },
    description: 'ISO-8601 week',
  },
  {
    className: 'Day',
    attributes: {
      date: 'string',
      year: 'int',
      month: 'int',
      day: 'int',
      weekday: 'string',
      weekday_number: 'int',
      event_count: 'int',
    },
    description: 'Calendar day',
  },
  {
    className: 'Event',
    attributes: {
      uid: 'string',
      date: 'string',
      start: 'string',
      start_time: 'string',
      end_time: 'string',
      duration_minutes: 'int',
      summary: 'string',
      status: 'string',
      object_store_id: 'string',
      object_url: 'string',
    },
    description: 'Calendar event',
  },
]

/** A node to upsert: how to find it, what to call it, what to store */
export interface NodeSpec {
  match: Record<string, string | number>
  name: string
  attributes: Attributes
}

export function yearNode(bucket: YearBucket): NodeSpec {
  return {
    match: { year: bucket.year },
    name: String(bucket.year),
    attributes: { year: bucket.year, event_count: bucket.eventCount },
  }
}

export function monthNode(bucket: MonthBucket): NodeSpec {
  return {
    match: { year: bucket.year, month: bucket.month },
    name: `${bucket.key} (${bucket.monthName})`,
    attributes: {
      year: bucket.year,
      month: bucket.month,
      month_name: bucket.monthName,
      event_count: bucket.eventCount,
    },
  }
}

export function weekNode(bucket: WeekBucket): NodeSpec {
  return {
    match: { year: bucket.year, week: bucket.week },
    name: bucket.key,
    attributes: {
      year: bucket.year,
      week: bucket.week,
      start_date: bucket.startDate,
      end_date: bucket.endDate,
      event_count: bucket.eventCount,
    },
  }
}

export function dayNode<E extends IndexableEvent>(bucket: DayBucket<E>): NodeSpec {
  return {
    match: { date: bucket.date },
    name: bucket.date,
    attributes: {
      date: bucket.date,
      year: bucket.year,
      month: bucket.month,
      day: bucket.day,
      weekday: bucket.weekday,
      weekday_number: bucket.weekdayNumber,
      event_count: bucket.eventCount,
    },
  }
}

export function eventNode(event: CalendarEvent, ref: StoredObjectRef): NodeSpec {
  return {
    match: { uid: event.uid },
    name: event.summary,
    attributes: {
      uid: event.uid,
      date: event.start.toFormat('yyyy-MM-dd'),
      start: formatTimestamp(event.start),
      start_time: event.start.toFormat('HH:mm'),
      end_time: event.end.toFormat('HH:mm'),
      duration_minutes: event.durationMinutes,
      summary: event.summary,
      status: event.status,
      object_store_id: ref.objectId,
      object_url: ref.url,
    },
  }
}
