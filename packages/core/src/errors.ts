/**
 * Error taxonomy for parsing, querying and talking to the remote stores.
 */

export type StoreService = 'objectstore' | 'graphlayer'

export class CalendarGraphError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Malformed iCal input. Per-block errors carry the block index; a
 * document-level error has none.
 */
export class ParseError extends CalendarGraphError {
  readonly blockIndex?: number
  readonly uid?: string

  constructor(message: string, details: { blockIndex?: number; uid?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause })
    this.blockIndex = details.blockIndex
    this.uid = details.uid
  }
}

export type QueryKind = 'day' | 'week' | 'month' | 'year' | 'all'

/**
 * User query input that does not match the format of the selected kind.
 */
export class InvalidDateFormat extends CalendarGraphError {
  readonly kind: QueryKind
  readonly input: string

  constructor(kind: QueryKind, input: string, expected: string) {
    super(`Ungültiges Format "${input}" (erwartet ${expected})`)
    this.kind = kind
    this.input = input
  }
}

export abstract class StoreError extends CalendarGraphError {
  readonly service: StoreService
  readonly status?: number

  constructor(service: StoreService, message: string, status?: number, cause?: unknown) {
    super(message, { cause })
    this.service = service
    this.status = status
  }
}

/** Network failure, timeout or a server-side (5xx, 408, 429) response */
export class StoreUnavailable extends StoreError {}

/** The remote service refused the request (4xx) or answered with an unexpected body */
export class StoreRejected extends StoreError {
  readonly detail: string

  constructor(service: StoreService, message: string, status: number, detail = '') {
    super(service, message, status)
    this.detail = detail
  }
}

export class ConfigError extends CalendarGraphError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
