// Public API for consumption by other packages

// Errors
export {
  CalendarGraphError,
  ParseError,
  InvalidDateFormat,
  StoreError,
  StoreUnavailable,
  StoreRejected,
  ConfigError,
  errorMessage,
} from './errors.js'
export type { QueryKind, StoreService } from './errors.js'

// Calendar model, parser and hierarchy
export * from './calendar/index.js'

// Stores
export * from './store/index.js'

// Import and query
export * from './importer/index.js'
export * from './query/index.js'

// Configuration
export {
  loadConfig,
  validateConfig,
  findConfigDir,
  DEFAULT_CONFIG,
  CONFIG_DIRNAME,
} from './config.js'
export type { CalendarGraphConfig, LoadConfigOptions } from './config.js'

// CLI building blocks
export { runMenu, readlineIO, MENU_CHOICES, MENU_LINES, INVALID_CHOICE, GOODBYE } from './cli/menu.js'
export type { MenuIO } from './cli/menu.js'
export { runSession, importFile, verifyYear, createStores, INTERRUPTED } from './cli/app.js'
export type { SessionOptions, Stores, VerifyResult } from './cli/app.js'
export { createProgram, toOverrides } from './cli/program.js'
export type { CliOptions } from './cli/program.js'

export { runWithConcurrency } from './utils/concurrency.js'
