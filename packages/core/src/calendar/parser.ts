/**
 * Calendar Parser
 *
 * Decodes an iCal document into flat CalendarEvent records in file order
 * using ical.js. Blocks that lack a UID or DTSTART are reported as
 * ParseErrors and skipped; the rest of the file is still read.
 */

import { readFile } from 'node:fs/promises'
import ICAL from 'ical.js'
import { DateTime, FixedOffsetZone, IANAZone } from 'luxon'
import { ConfigError, ParseError, errorMessage } from '../errors.js'
import type { CalendarEvent, CalendarOptions } from './types.js'

type IcalComponent = InstanceType<typeof ICAL.Component>
type IcalTime = InstanceType<typeof ICAL.Time>
type IcalTimezone = InstanceType<typeof ICAL.Timezone>

export const DEFAULT_TIMEZONE = 'Europe/Berlin'

const DEFAULT_SUMMARY = 'Untitled Event'
const DEFAULT_STATUS = 'CONFIRMED'

export interface ParseResult {
  events: CalendarEvent[]
  /** One entry per skipped VEVENT block */
  errors: ParseError[]
  /** Non-fatal notes (e.g. recurrence ignored) */
  warnings: string[]
}

interface TimeValue {
  time: IcalTime
  tzid?: string
}

export function resolveTimezone(timezone: string | undefined): string {
  const zone = timezone ?? DEFAULT_TIMEZONE
  if (!IANAZone.isValidZone(zone)) {
    throw new ConfigError(`Unknown time zone: ${zone}`)
  }
  return zone
}

/**
 * Parse an iCal document.
 *
 * @throws ParseError when the document itself cannot be decoded
 */
export function parseICal(text: string, options: CalendarOptions = {}): ParseResult {
  const zone = resolveTimezone(options.timezone)

  let calendar: IcalComponent
  try {
    calendar = ICAL.Component.fromString(text.replace(/^\uFEFF/, ''))
  } catch (err) {
    throw new ParseError(`Could not decode iCal document: ${errorMessage(err)}`, { cause: err })
  }
  if (calendar.name !== 'vcalendar') {
    throw new ParseError('Document does not contain a VCALENDAR')
  }

  const timezones = new Map<string, IcalTimezone>()
  for (const vtimezone of calendar.getAllSubcomponents('vtimezone')) {
    const tz = new ICAL.Timezone(vtimezone)
    if (tz.tzid) timezones.set(tz.tzid, tz)
  }

  const result: ParseResult = { events: [], errors: [], warnings: [] }

  calendar.getAllSubcomponents('vevent').forEach((vevent, blockIndex) => {
    try {
      const event = veventToCalendarEvent(vevent, blockIndex, zone, timezones)
      if (vevent.hasProperty('rrule')) {
        result.warnings.push(
          `Event ${event.uid} is recurring; only the first occurrence is imported`,
        )
      }
      result.events.push(event)
    } catch (err) {
      if (err instanceof ParseError) {
        result.errors.push(err)
      } else {
        result.errors.push(
          new ParseError(`VEVENT #${blockIndex + 1}: ${errorMessage(err)}`, { blockIndex, cause: err }),
        )
      }
    }
  })

  return result
}

/**
 * Read and parse an iCal file (UTF-8).
 */
export async function parseICalFile(
  filePath: string,
  options: CalendarOptions = {},
): Promise<ParseResult> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    throw new ParseError(`Could not read ${filePath}: ${errorMessage(err)}`, { cause: err })
  }
  return parseICal(text, options)
}

function veventToCalendarEvent(
  vevent: IcalComponent,
  blockIndex: number,
  zone: string,
  timezones: Map<string, IcalTimezone>,
): CalendarEvent {
  const uid = textProperty(vevent, 'uid')
  if (!uid) {
    throw new ParseError(`VEVENT #${blockIndex + 1} has no UID`, { blockIndex })
  }

  const dtstart = timeProperty(vevent, 'dtstart')
  if (!dtstart) {
    throw new ParseError(`VEVENT #${blockIndex + 1} (${uid}) has no DTSTART`, { blockIndex, uid })
  }

  const start = toDateTime(dtstart, zone, timezones)
  if (!start.isValid) {
    throw new ParseError(`VEVENT #${blockIndex + 1} (${uid}) has an invalid DTSTART`, {
      blockIndex,
      uid,
    })
  }

  const allDay = dtstart.time.isDate
  const end = resolveEnd(vevent, start, allDay, zone, timezones)

  const created = timeProperty(vevent, 'created')
  const lastModified = timeProperty(vevent, 'last-modified')

  return {
    uid,
    summary: textProperty(vevent, 'summary') ?? DEFAULT_SUMMARY,
    description: textProperty(vevent, 'description') ?? '',
    status: textProperty(vevent, 'status')?.toUpperCase() ?? DEFAULT_STATUS,
    start,
    end,
    durationMinutes: Math.trunc((end.toMillis() - start.toMillis()) / 60_000),
    allDay,
    created: created ? toDateTime(created, zone, timezones) : undefined,
    lastModified: lastModified ? toDateTime(lastModified, zone, timezones) : undefined,
  }
}

/**
 * DTEND, else DTSTART + DURATION, else the RFC 5545 default
 * (same instant for timed events, one day for all-day events).
 */
function resolveEnd(
  vevent: IcalComponent,
  start: DateTime,
  allDay: boolean,
  zone: string,
  timezones: Map<string, IcalTimezone>,
): DateTime {
  const dtend = timeProperty(vevent, 'dtend')
  if (dtend) {
    const end = toDateTime(dtend, zone, timezones)
    if (end.isValid) return end
  }

  const duration: unknown = vevent.getFirstPropertyValue('duration')
  if (duration instanceof ICAL.Duration) {
    return start.plus({ seconds: duration.toSeconds() })
  }

  return allDay ? start.plus({ days: 1 }) : start
}

function textProperty(vevent: IcalComponent, name: string): string | undefined {
  const value: unknown = vevent.getFirstPropertyValue(name)
  if (value === null || value === undefined) return undefined
  const text = typeof value === 'string' ? value : String(value)
  return text.trim() === '' ? undefined : text
}

function timeProperty(vevent: IcalComponent, name: string): TimeValue | undefined {
  const prop = vevent.getFirstProperty(name)
  if (!prop) return undefined
  const value: unknown = prop.getFirstValue()
  if (!(value instanceof ICAL.Time)) return undefined
  const tzid: unknown = prop.getParameter('tzid')
  return { time: value, tzid: typeof tzid === 'string' ? tzid : undefined }
}

/**
 * Convert an iCal time into the display zone.
 *
 * - UTC (`Z`) → that instant
 * - TZID naming an IANA zone → wall time in that zone
 * - TZID defined only by an embedded VTIMEZONE → offset from that definition
 * - floating or all-day → wall time in the display zone
 */
function toDateTime(
  value: TimeValue,
  zone: string,
  timezones: Map<string, IcalTimezone>,
): DateTime {
  const { time, tzid } = value

  if (time.isDate) {
    return DateTime.fromObject({ year: time.year, month: time.month, day: time.day }, { zone })
  }

  const parts = {
    year: time.year,
    month: time.month,
    day: time.day,
    hour: time.hour,
    minute: time.minute,
    second: time.second,
  }

  if (time.zone === ICAL.Timezone.utcTimezone) {
    return DateTime.fromObject(parts, { zone: 'utc' }).setZone(zone)
  }

  if (tzid) {
    if (IANAZone.isValidZone(tzid)) {
      return DateTime.fromObject(parts, { zone: tzid }).setZone(zone)
    }
    const vtimezone = timezones.get(tzid)
    if (vtimezone) {
      const offsetMinutes = vtimezone.utcOffset(time) / 60
      return DateTime.fromObject(parts, { zone: FixedOffsetZone.instance(offsetMinutes) }).setZone(
        zone,
      )
    }
  }

  return DateTime.fromObject(parts, { zone })
}
