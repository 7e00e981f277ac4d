/**
 * Event Export Types
 *
 * Shape of the JSON calendar export consumed by both tools.
 */

import { z } from 'zod'
import type { DateTime } from 'luxon'

/** Title used when a record has none, or only whitespace. */
export const DEFAULT_TITLE = '(No Title)'

/**
 * One event as it appears in the export.
 * Every field is optional; `null` is treated the same as absent.
 */
export const eventRecordSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  /** ISO-8601 timestamp, UTC ("Z") or offset-qualified */
  start: z.string().nullish(),
  end: z.string().nullish(),
  allDay: z.boolean().nullish(),
  location: z.string().nullish(),
  notes: z.string().nullish(),
})

export const eventPayloadSchema = z.object({
  events: z.array(eventRecordSchema).nullish(),
})

export type EventRecord = z.infer<typeof eventRecordSchema>

export type EventPayload = z.infer<typeof eventPayloadSchema>

/**
 * A record with both timestamps present.
 */
export type TimedRecord = EventRecord & { start: string; end: string }

/**
 * Event resolved into a display zone. Built per match, never stored.
 */
export interface ResolvedEvent {
  title: string
  /** Start in the local zone */
  start: DateTime
  /** End in the local zone */
  end: DateTime
  allDay: boolean
}
