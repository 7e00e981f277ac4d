/**
 * Events File Loader
 *
 * Reads a JSON calendar export and validates it against the payload schema.
 */

import { readFile } from 'node:fs/promises'
import { DEFAULT_TITLE, eventPayloadSchema } from './types.js'
import type { EventRecord, TimedRecord } from './types.js'
import { InputError } from '../errors.js'

/**
 * Validate an already-parsed payload. `source` names it in error messages.
 */
export function parseEventPayload(data: unknown, source: string): EventRecord[] {
  const result = eventPayloadSchema.safeParse(data)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new InputError(source, `${issue?.message ?? 'invalid payload'}${where}`)
  }
  return result.data.events ?? []
}

/**
 * Read and validate a UTF-8 events file. Records keep their input order.
 */
export async function readEventsFile(filePath: string): Promise<EventRecord[]> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (err) {
    throw new InputError(filePath, err instanceof Error ? err.message : String(err))
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    throw new InputError(filePath, err instanceof Error ? err.message : String(err))
  }

  return parseEventPayload(data, filePath)
}

/**
 * True when the record carries both a start and an end.
 * Records without them are skipped by every consumer.
 */
export function hasInterval(record: EventRecord): record is TimedRecord {
  return Boolean(record.start) && Boolean(record.end)
}

export function resolveTitle(title: string | null | undefined): string {
  const trimmed = (title ?? '').trim()
  return trimmed || DEFAULT_TITLE
}
