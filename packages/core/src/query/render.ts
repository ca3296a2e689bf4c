/**
 * Plain-text rendering of query results, grouped by day.
 * Functions return lines; the caller decides where they go.
 */

import { isoWeekRange } from '../calendar/hierarchy.js'
import type { QueryTarget } from './input.js'
import type { DayEvents, MonthEvents, QueryResult, YearEvents } from './query-engine.js'

export const NO_EVENTS = '❌ Keine Termine gefunden.'

const pad2 = (n: number): string => String(n).padStart(2, '0')

export function heading(target: QueryTarget): string {
  switch (target.kind) {
    case 'day':
      return `Termine am ${target.date}`
    case 'week': {
      const range = isoWeekRange(target.year, target.week)
      return (
        `Termine in Woche ${target.week}/${target.year} ` +
        `(${germanDate(range.startDate)} - ${germanDate(range.endDate)})`
      )
    }
    case 'month':
      return `Termine im Monat ${pad2(target.month)}/${target.year}`
    case 'year':
      return `Termine im Jahr ${target.year}`
    case 'all':
      return 'Alle Termine'
  }
}

/** yyyy-MM-dd → dd.MM.yyyy */
export function germanDate(date: string): string {
  const [year, month, day] = date.split('-')
  return day && month && year ? `${day}.${month}.${year}` : date
}

export function renderDays(days: DayEvents[]): string[] {
  if (days.length === 0) return ['', NO_EVENTS]

  const lines: string[] = []
  for (const day of days) {
    const n = day.events.length
    lines.push('', `📅 ${day.weekday}, ${germanDate(day.date)}`)
    lines.push(`   (${n} Termin${n > 1 ? 'e' : ''})`)
    lines.push('-'.repeat(60))
    for (const event of day.events) {
      lines.push(`  ⏰ ${event.startTime} - ${event.endTime} (${event.durationMinutes} min)`)
      lines.push(`     📝 ${event.summary}`)
      lines.push(`     🔗 ${event.objectUrl}`)
      lines.push('')
    }
  }
  return lines
}

function monthLabel(month: MonthEvents): string {
  return `${month.year}-${pad2(month.month)} (${month.monthName})`
}

export function renderMonths(months: MonthEvents[]): string[] {
  if (months.length === 0) return ['', NO_EVENTS]

  const lines: string[] = []
  for (const month of months) {
    lines.push('', '='.repeat(80), `  ${monthLabel(month)}`, '='.repeat(80))
    lines.push(...renderDays(month.days))
  }
  return lines
}

export function renderYears(years: YearEvents[]): string[] {
  if (years.length === 0) return ['', NO_EVENTS]

  const lines: string[] = []
  for (const year of years) {
    lines.push('', '#'.repeat(80), `  Jahr ${year.year}`, '#'.repeat(80))
    for (const month of year.months) {
      lines.push('', `  ${monthLabel(month)}`, `  ${'-'.repeat(78)}`)
      lines.push(...renderDays(month.days))
    }
  }
  return lines
}

export function renderResult(result: QueryResult): string[] {
  const title = heading(result.target)
  const lines = ['', title, '-'.repeat(title.length)]
  switch (result.kind) {
    case 'year':
      return [...lines, ...renderMonths(result.months)]
    case 'all':
      return [...lines, ...renderYears(result.years)]
    default:
      return [...lines, ...renderDays(result.days)]
  }
}
