export { parseQueryInput, EXPECTED_FORMAT } from './input.js'
export type { QueryTarget } from './input.js'
export { CalendarQuery, toEventView, compareEventViews } from './query-engine.js'
export type { EventView, DayEvents, MonthEvents, YearEvents, QueryResult } from './query-engine.js'
export {
  heading,
  germanDate,
  renderDays,
  renderMonths,
  renderYears,
  renderResult,
  NO_EVENTS,
} from './render.js'
