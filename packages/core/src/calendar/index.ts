/**
 * Calendar
 *
 * iCal parsing and the derived Year → Month/Week → Day → Event index.
 */

// Types
export type {
  CalendarEvent,
  IndexableEvent,
  EventStatus,
  BucketKeys,
  DayKey,
  WeekKey,
  MonthKey,
  DayBucket,
  WeekBucket,
  MonthBucket,
  YearBucket,
  CalendarIndex,
  StoredEventPayload,
  CalendarOptions,
} from './types.js'
export type { ParseResult } from './parser.js'

// Implementation
export { parseICal, parseICalFile, resolveTimezone, DEFAULT_TIMEZONE } from './parser.js'
export {
  deriveBuckets,
  deriveDay,
  deriveWeek,
  deriveMonth,
  weekKey,
  monthKey,
  isoWeekRange,
  weeksInIsoYear,
} from './hierarchy.js'
export {
  buildCalendarIndex,
  verifyEventCounts,
  compareEvents,
  dedupeByUid,
} from './index-builder.js'
export { formatTimestamp, toStoredPayload, objectIdForUid } from './payload.js'
export { MONTH_NAMES, WEEKDAY_NAMES, monthName, weekdayName } from './locale.js'
