/**
 * Wire shapes for persisted events.
 */

import { createHash } from 'node:crypto'
import type { DateTime } from 'luxon'
import type { CalendarEvent, StoredEventPayload } from './types.js'

/** ISO-8601 with a numeric offset, e.g. 2026-02-23T09:00:00+01:00 */
export function formatTimestamp(dt: DateTime): string {
  return dt.toFormat("yyyy-MM-dd'T'HH:mm:ssZZ")
}

export function toStoredPayload(event: CalendarEvent): StoredEventPayload {
  return {
    uid: event.uid,
    summary: event.summary,
    description: event.description,
    status: event.status,
    start: formatTimestamp(event.start),
    end: formatTimestamp(event.end),
    duration_minutes: event.durationMinutes,
    created: event.created ? formatTimestamp(event.created) : null,
    last_modified: event.lastModified ? formatTimestamp(event.lastModified) : null,
  }
}

/**
 * Object id derived from the event uid, so a re-import overwrites the same
 * object instead of creating a new one.
 */
export function objectIdForUid(uid: string): string {
  return `event-${createHash('sha256').update(uid, 'utf8').digest('hex').slice(0, 32)}`
}
