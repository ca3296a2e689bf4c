export { CalendarImporter } from './importer.js'
export type {
  ImporterOptions,
  ImportSummary,
  ImportFailure,
  ImportCounts,
  ImportStage,
  IndexedEvent,
} from './importer.js'
export {
  CALENDAR_SCHEMAS,
  yearNode,
  monthNode,
  weekNode,
  dayNode,
  eventNode,
} from './schemas.js'
export type { NodeSpec } from './schemas.js'
