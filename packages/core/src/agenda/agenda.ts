/**
 * Day Agenda
 *
 * Selects the events overlapping a local day and renders them as text.
 */

import { DateTime } from 'luxon'
import { hasInterval, resolveTitle } from '../events/loader.js'
import type { EventRecord, ResolvedEvent } from '../events/types.js'
import { localDayWindow, overlaps, resolveTargetDate } from '../time/day-window.js'
import type { TimeWindow } from '../time/day-window.js'
import { parseTimestamp } from '../time/timestamp.js'

/** Minimum width of the time column */
const TIME_COLUMN_WIDTH = 18

const ALL_DAY_LABEL = 'All Day'

const NO_EVENTS_LINE = 'No events.'

/** Formatting is fixed to US English regardless of host locale */
const LOCALE = 'en-US'

/**
 * Events whose [start, end) overlaps `window`, resolved into `zone`
 * and sorted by start. Ties keep input order.
 */
export function selectDayEvents(
  records: EventRecord[],
  window: TimeWindow,
  zone: string,
): ResolvedEvent[] {
  const matches: ResolvedEvent[] = []

  for (const record of records) {
    if (!hasInterval(record)) continue

    const interval = { start: parseTimestamp(record.start), end: parseTimestamp(record.end) }
    if (!overlaps(interval, window)) continue

    matches.push({
      title: resolveTitle(record.title),
      start: interval.start.setZone(zone),
      end: interval.end.setZone(zone),
      allDay: record.allDay ?? false,
    })
  }

  // Array.prototype.sort is stable
  return matches.sort((a, b) => a.start.toMillis() - b.start.toMillis())
}

function formatClock(time: DateTime): string {
  return time.setLocale(LOCALE).toFormat('h:mm a').toUpperCase()
}

/**
 * "All Day", or "9:00 AM – 9:15 AM" in the event's zone.
 */
export function formatTimeRange(event: ResolvedEvent): string {
  if (event.allDay) {
    return ALL_DAY_LABEL
  }
  return `${formatClock(event.start)} – ${formatClock(event.end)}`
}

/**
 * Render the agenda for `date` (YYYY-MM-DD) as output lines.
 */
export function renderAgenda(date: string, events: ResolvedEvent[], zone: string): string[] {
  const header = DateTime.fromISO(date, { zone }).setLocale(LOCALE).toFormat('cccc, LLLL d, yyyy')
  const lines = [header, '']

  if (events.length === 0) {
    lines.push(NO_EVENTS_LINE)
    return lines
  }

  for (const event of events) {
    lines.push(`${formatTimeRange(event).padEnd(TIME_COLUMN_WIDTH)} ${event.title}`)
  }
  return lines
}

export interface AgendaResult {
  date: string
  window: TimeWindow
  events: ResolvedEvent[]
  lines: string[]
}

/**
 * Resolve the date token, filter and render in one step.
 *
 * @param token - "today", "tomorrow", YYYY-MM-DD, or undefined
 * @param zone - Local timezone the day is measured in
 * @param now - Reference instant for relative tokens
 */
export function buildAgenda(
  records: EventRecord[],
  token: string | undefined,
  zone: string,
  now?: DateTime,
): AgendaResult {
  const date = resolveTargetDate(token, zone, now)
  const window = localDayWindow(date, zone)
  const events = selectDayEvents(records, window, zone)
  return { date, window, events, lines: renderAgenda(date, events, zone) }
}
