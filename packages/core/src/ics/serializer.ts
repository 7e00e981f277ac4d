/**
 * ICS Serializer
 *
 * Builds VEVENT blocks from export records and assembles the VCALENDAR
 * document written by the exporter.
 */

import { createHash } from 'node:crypto'
import { DateTime } from 'luxon'
import { hasInterval, resolveTitle } from '../events/loader.js'
import type { EventRecord } from '../events/types.js'
import { formatDateValue, formatUtcStamp, parseTimestamp } from '../time/timestamp.js'
import { escapeText, foldLine } from './text.js'

export const DEFAULT_PROD_ID = '-//calday//calday-ics//EN'

const CRLF = '\r\n'

export interface IcsOptions {
  /** Zone all-day dates are taken in */
  zone: string
  /** PRODID value (default: DEFAULT_PROD_ID) */
  prodId?: string
  /** DTSTAMP instant (default: now) */
  now?: DateTime
}

export interface SerializedCalendar {
  content: string
  /** Number of VEVENT blocks written */
  eventCount: number
}

/**
 * Deterministic UID for records without an id: SHA-256 over
 * `title|start|end`, first 16 bytes as hex.
 */
export function computeFallbackUid(title: string, start: string, end: string): string {
  const digest = createHash('sha256').update([title, start, end].join('|')).digest('hex')
  return `no-id-${digest.slice(0, 32)}`
}

function dateProperties(start: DateTime, end: DateTime, allDay: boolean, zone: string): string[] {
  if (!allDay) {
    return [`DTSTART:${formatUtcStamp(start)}`, `DTEND:${formatUtcStamp(end)}`]
  }

  const startDate = start.setZone(zone).startOf('day')
  let endDate = end.setZone(zone).startOf('day')
  // DTEND is exclusive; a same-day (or inverted) end still covers one day
  if (endDate.toMillis() <= startDate.toMillis()) {
    endDate = startDate.plus({ days: 1 })
  }

  return [
    `DTSTART;VALUE=DATE:${formatDateValue(startDate)}`,
    `DTEND;VALUE=DATE:${formatDateValue(endDate)}`,
  ]
}

/**
 * Unfolded VEVENT lines for one record, or null when it has no interval.
 */
export function buildEventLines(record: EventRecord, options: IcsOptions): string[] | null {
  if (!hasInterval(record)) return null

  const title = resolveTitle(record.title)
  const uid = (record.id ?? '').trim() || computeFallbackUid(title, record.start, record.end)
  const start = parseTimestamp(record.start)
  const end = parseTimestamp(record.end)
  const now = options.now ?? DateTime.utc()

  const lines = [
    'BEGIN:VEVENT',
    `UID:${escapeText(uid)}`,
    `DTSTAMP:${formatUtcStamp(now)}`,
    ...dateProperties(start, end, record.allDay ?? false, options.zone),
    `SUMMARY:${escapeText(title)}`,
  ]

  const location = (record.location ?? '').trim()
  if (location) {
    lines.push(`LOCATION:${escapeText(location)}`)
  }

  const notes = (record.notes ?? '').trim()
  if (notes) {
    lines.push(`DESCRIPTION:${escapeText(notes)}`)
  }

  lines.push('END:VEVENT')
  return lines
}

/**
 * Serialize every eligible record into one VCALENDAR document with CRLF
 * line endings and a trailing CRLF.
 */
export function serializeCalendar(records: EventRecord[], options: IcsOptions): SerializedCalendar {
  // One DTSTAMP for the whole document
  const now = options.now ?? DateTime.utc()
  const output = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${escapeText(options.prodId ?? DEFAULT_PROD_ID)}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
  ].map(foldLine)
  let eventCount = 0

  for (const record of records) {
    const lines = buildEventLines(record, { ...options, now })
    if (!lines) continue

    eventCount++
    for (const line of lines) {
      output.push(foldLine(line))
    }
  }

  output.push('END:VCALENDAR')

  return { content: output.join(CRLF) + CRLF, eventCount }
}
