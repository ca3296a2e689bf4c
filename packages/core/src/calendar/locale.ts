/**
 * German display names for months and weekdays.
 * Fixed tables so bucket names never depend on the process locale.
 */

export const MONTH_NAMES = [
  'Januar',
  'Februar',
  'März',
  'April',
  'Mai',
  'Juni',
  'Juli',
  'August',
  'September',
  'Oktober',
  'November',
  'Dezember',
] as const

/** Index 0 = Monday */
export const WEEKDAY_NAMES = [
  'Montag',
  'Dienstag',
  'Mittwoch',
  'Donnerstag',
  'Freitag',
  'Samstag',
  'Sonntag',
] as const

/**
 * @param month - 1-12
 */
export function monthName(month: number): string {
  const name = MONTH_NAMES[month - 1]
  if (name === undefined) {
    throw new RangeError(`Month out of range: ${month}`)
  }
  return name
}

/**
 * @param weekday - ISO weekday, Monday = 1 … Sunday = 7
 */
export function weekdayName(weekday: number): string {
  const name = WEEKDAY_NAMES[weekday - 1]
  if (name === undefined) {
    throw new RangeError(`Weekday out of range: ${weekday}`)
  }
  return name
}
