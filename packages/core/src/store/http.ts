/**
 * Shared JSON-over-HTTP request helper for the store clients.
 *
 * Maps transport failures onto the store error taxonomy:
 * network errors, timeouts, 5xx, 408 and 429 → StoreUnavailable;
 * any other non-2xx or an unexpected body → StoreRejected.
 */

import type { z } from 'zod'
import { StoreRejected, StoreUnavailable, errorMessage } from '../errors.js'
import type { StoreService } from '../errors.js'

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000

const MAX_DETAIL_LENGTH = 200

export interface HttpClientConfig {
  service: StoreService
  baseUrl: string
  headers?: Record<string, string>
  timeoutMs?: number
}

export interface RequestOptions<S extends z.ZodTypeAny> {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE'
  path: string
  query?: Record<string, string | undefined>
  body?: string
  headers?: Record<string, string>
  schema: S
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`
}

/**
 * JSON.stringify with every non-ASCII character escaped, for header values
 * (fetch only accepts Latin-1 there).
 */
export function asciiJson(value: unknown): string {
  return JSON.stringify(value).replace(
    /[\u007f-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`,
  )
}

function isTransient(status: number): boolean {
  return status >= 500 || status === 408 || status === 429
}

async function readErrorDetail(response: Response): Promise<string> {
  let text: string
  try {
    text = await response.text()
  } catch {
    return ''
  }
  try {
    const parsed: unknown = JSON.parse(text)
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      return String(parsed.error)
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return text.trim().slice(0, MAX_DETAIL_LENGTH)
}

export async function requestJson<S extends z.ZodTypeAny>(
  config: HttpClientConfig,
  options: RequestOptions<S>,
): Promise<z.infer<S>> {
  const { service } = config
  const label = `${options.method} ${options.path}`

  let url = joinUrl(config.baseUrl, options.path)
  if (options.query) {
    const params = new URLSearchParams()
    for (const [key, value] of Object.entries(options.query)) {
      if (value !== undefined) params.set(key, value)
    }
    const qs = params.toString()
    if (qs) url += `?${qs}`
  }

  let response: Response
  try {
    response = await fetch(url, {
      method: options.method,
      headers: { Accept: 'application/json', ...config.headers, ...options.headers },
      body: options.body,
      signal: AbortSignal.timeout(config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
    })
  } catch (err) {
    throw new StoreUnavailable(
      service,
      `${service} unreachable at ${config.baseUrl} (${label}): ${errorMessage(err)}`,
      undefined,
      err,
    )
  }

  if (!response.ok) {
    const detail = await readErrorDetail(response)
    const message = `${service} ${label} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`
    if (isTransient(response.status)) {
      throw new StoreUnavailable(service, message, response.status)
    }
    throw new StoreRejected(service, message, response.status, detail)
  }

  // 204 carries no body
  let data: unknown = null
  try {
    if (response.status !== 204) data = await response.json()
  } catch (err) {
    throw new StoreRejected(
      service,
      `${service} ${label} returned invalid JSON`,
      response.status,
      errorMessage(err),
    )
  }

  const parsed = options.schema.safeParse(data)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new StoreRejected(
      service,
      `${service} ${label} returned an unexpected body`,
      response.status,
      detail,
    )
  }
  return parsed.data
}
