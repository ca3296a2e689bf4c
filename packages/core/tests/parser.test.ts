/**
 * Parser Tests
 *
 * iCal decoding into CalendarEvent records: zone conversion, defaults,
 * end resolution and per-block error reporting.
 */

import { describe, it, expect } from 'vitest'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { parseICal, parseICalFile, resolveTimezone } from '../src/calendar/parser.js'
import { ConfigError, ParseError } from '../src/errors.js'

const FIXTURE = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures', 'sample.ics')

function calendar(...blocks: string[]): string {
  return ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//tests//DE', ...blocks, 'END:VCALENDAR'].join(
    '\r\n',
  )
}

function vevent(...lines: string[]): string {
  return ['BEGIN:VEVENT', ...lines, 'END:VEVENT'].join('\r\n')
}

const fmt = 'yyyy-MM-dd HH:mm'

describe('parseICalFile', () => {
  it('returns events in file order and reports the block without UID', async () => {
    const result = await parseICalFile(FIXTURE)

    expect(result.events.map((e) => e.uid)).toEqual(['x1', 'x2', 'x3', 'x5'])
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0]).toBeInstanceOf(ParseError)
    expect(result.errors[0].blockIndex).toBe(3)
    expect(result.warnings).toEqual([])
  })

  it('converts UTC times into Europe/Berlin by default', async () => {
    const { events } = await parseICalFile(FIXTURE)
    const x1 = events[0]

    expect(x1.summary).toBe('Sichere Produktentwicklung')
    expect(x1.start.toFormat(fmt)).toBe('2026-02-23 09:00')
    expect(x1.end.toFormat(fmt)).toBe('2026-02-23 16:15')
    expect(x1.start.zoneName).toBe('Europe/Berlin')
    expect(x1.durationMinutes).toBe(435)
    expect(x1.status).toBe('CONFIRMED')
    expect(x1.allDay).toBe(false)
  })

  it('keeps wall time for a TZID that names an IANA zone', async () => {
    const { events } = await parseICalFile(FIXTURE)
    const x2 = events[1]

    expect(x2.start.toFormat(fmt)).toBe('2026-02-23 17:00')
    expect(x2.durationMinutes).toBe(60)
    expect(x2.description).toBe('Raum 4')
  })

  it('treats DATE values as all-day events lasting one day', async () => {
    const { events } = await parseICalFile(FIXTURE)
    const x3 = events[2]

    expect(x3.allDay).toBe(true)
    expect(x3.start.toFormat(fmt)).toBe('2026-01-30 00:00')
    expect(x3.end.toFormat(fmt)).toBe('2026-01-31 00:00')
    expect(x3.durationMinutes).toBe(1440)
    expect(x3.status).toBe('CONFIRMED')
    expect(x3.description).toBe('')
  })

  it('derives the end from DURATION and upper-cases STATUS', async () => {
    const { events } = await parseICalFile(FIXTURE)
    const x5 = events[3]

    expect(x5.start.toFormat(fmt)).toBe('2026-02-01 10:00')
    expect(x5.end.toFormat(fmt)).toBe('2026-02-01 10:45')
    expect(x5.durationMinutes).toBe(45)
    expect(x5.status).toBe('TENTATIVE')
  })

  it('wraps a missing file in a ParseError', async () => {
    await expect(parseICalFile(path.join(path.dirname(FIXTURE), 'missing.ics'))).rejects.toThrow(
      ParseError,
    )
  })
})

describe('parseICal', () => {
  it('honours the display zone option', () => {
    const { events } = parseICal(
      calendar(vevent('UID:utc-1', 'DTSTART:20260223T080000Z', 'DTEND:20260223T090000Z')),
      { timezone: 'UTC' },
    )
    expect(events[0].start.toFormat(fmt)).toBe('2026-02-23 08:00')
  })

  it('fills in defaults for summary, description and status', () => {
    const { events } = parseICal(calendar(vevent('UID:bare', 'DTSTART:20260301T120000Z')))

    expect(events[0].summary).toBe('Untitled Event')
    expect(events[0].description).toBe('')
    expect(events[0].status).toBe('CONFIRMED')
    // No DTEND, no DURATION: zero-length
    expect(events[0].durationMinutes).toBe(0)
  })

  it('reports a block without DTSTART and keeps the others', () => {
    const result = parseICal(
      calendar(
        vevent('UID:ok', 'DTSTART:20260301T120000Z'),
        vevent('UID:no-start', 'SUMMARY:Kaputt'),
      ),
    )

    expect(result.events.map((e) => e.uid)).toEqual(['ok'])
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0].blockIndex).toBe(1)
    expect(result.errors[0].uid).toBe('no-start')
  })

  it('warns about recurring events and imports the first occurrence', () => {
    const result = parseICal(
      calendar(vevent('UID:weekly', 'DTSTART:20260302T080000Z', 'RRULE:FREQ=WEEKLY;COUNT=3')),
    )

    expect(result.events).toHaveLength(1)
    expect(result.warnings).toEqual([
      'Event weekly is recurring; only the first occurrence is imported',
    ])
  })

  it('uses the offset of an embedded VTIMEZONE for unknown TZIDs', () => {
    const vtimezone = [
      'BEGIN:VTIMEZONE',
      'TZID:Custom/Plus5',
      'BEGIN:STANDARD',
      'DTSTART:19700101T000000',
      'TZOFFSETFROM:+0500',
      'TZOFFSETTO:+0500',
      'END:STANDARD',
      'END:VTIMEZONE',
    ].join('\r\n')
    const { events } = parseICal(
      calendar(vtimezone, vevent('UID:tz', 'DTSTART;TZID=Custom/Plus5:20260610T120000')),
    )

    // 12:00 +05:00 = 07:00Z = 09:00 in Berlin summer time
    expect(events[0].start.toFormat(fmt)).toBe('2026-06-10 09:00')
  })

  it('accepts a leading byte order mark', () => {
    const { events } = parseICal('\uFEFF' + calendar(vevent('UID:bom', 'DTSTART:20260301T120000Z')))
    expect(events.map((e) => e.uid)).toEqual(['bom'])
  })

  it('throws a ParseError for input that is not iCal', () => {
    expect(() => parseICal('this is not a calendar')).toThrow(ParseError)
  })

  it('rejects an unknown display zone', () => {
    expect(() => parseICal(calendar(), { timezone: 'Mars/Olympus' })).toThrow(ConfigError)
  })
})

describe('resolveTimezone', () => {
  it('defaults to Europe/Berlin', () => {
    expect(resolveTimezone(undefined)).toBe('Europe/Berlin')
  })

  it('throws ConfigError for an invalid zone', () => {
    expect(() => resolveTimezone('Nowhere/Special')).toThrow('Unknown time zone: Nowhere/Special')
  })
})
