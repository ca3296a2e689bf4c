/**
 * Query input parsing. Each kind accepts exactly one textual format.
 */

import { DateTime } from 'luxon'
import { weeksInIsoYear } from '../calendar/hierarchy.js'
import { InvalidDateFormat, type QueryKind } from '../errors.js'

export type QueryTarget =
  | { kind: 'day'; date: string }
  | { kind: 'week'; year: number; week: number }
  | { kind: 'month'; year: number; month: number }
  | { kind: 'year'; year: number }
  | { kind: 'all' }

export const EXPECTED_FORMAT: Record<QueryKind, string> = {
  day: 'YYYY-MM-DD',
  week: 'YYYY-WW',
  month: 'YYYY-MM',
  year: 'YYYY',
  all: '',
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const WEEK_PATTERN = /^(\d{4})-W?(\d{2})$/
const MONTH_PATTERN = /^(\d{4})-(\d{2})$/
const YEAR_PATTERN = /^(\d{4})$/

export function parseQueryInput(kind: QueryKind, text = ''): QueryTarget {
  const input = text.trim()
  const invalid = () => new InvalidDateFormat(kind, input, EXPECTED_FORMAT[kind])

  switch (kind) {
    case 'day': {
      const m = DAY_PATTERN.exec(input)
      if (!m) throw invalid()
      const dt = DateTime.fromObject(
        { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) },
        { zone: 'utc' },
      )
      if (!dt.isValid) throw invalid()
      return { kind, date: input }
    }
    case 'week': {
      const m = WEEK_PATTERN.exec(input)
      if (!m) throw invalid()
      const year = Number(m[1])
      const week = Number(m[2])
      if (year < 1 || week < 1 || week > weeksInIsoYear(year)) throw invalid()
      return { kind, year, week }
    }
    case 'month': {
      const m = MONTH_PATTERN.exec(input)
      if (!m) throw invalid()
      const year = Number(m[1])
      const month = Number(m[2])
      if (year < 1 || month < 1 || month > 12) throw invalid()
      return { kind, year, month }
    }
    case 'year': {
      const m = YEAR_PATTERN.exec(input)
      if (!m || Number(m[1]) < 1) throw invalid()
      return { kind, year: Number(m[1]) }
    }
    case 'all':
      return { kind }
  }
}
