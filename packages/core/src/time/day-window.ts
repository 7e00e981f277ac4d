/**
 * Local Day Windows
 *
 * Resolves agenda date tokens and turns a calendar date in a zone into the
 * half-open UTC interval covering local midnight to the next local midnight.
 */

import { DateTime } from 'luxon'
import { InvalidDateArgumentError } from '../errors.js'

/**
 * Half-open interval [start, end).
 */
export interface TimeWindow {
  start: DateTime
  end: DateTime
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/**
 * True for IANA names and fixed-offset specifiers luxon understands
 * ("America/New_York", "UTC", "UTC-5").
 */
export function isValidZone(zone: string): boolean {
  return DateTime.utc().setZone(zone).isValid
}

/**
 * Resolve an agenda date token to a YYYY-MM-DD date in `zone`.
 *
 * @param token - "today", "tomorrow", YYYY-MM-DD, or undefined for today
 * @param now - Reference instant for the relative tokens
 */
export function resolveTargetDate(
  token: string | undefined,
  zone: string,
  now: DateTime = DateTime.now(),
): string {
  const today = now.setZone(zone).startOf('day')
  const lowered = token?.toLowerCase()

  if (lowered === undefined || lowered === 'today') {
    return today.toFormat('yyyy-MM-dd')
  }
  if (lowered === 'tomorrow') {
    return today.plus({ days: 1 }).toFormat('yyyy-MM-dd')
  }

  // Strict form only; luxon alone would also take week dates and ordinals
  if (token === undefined || !ISO_DATE_PATTERN.test(token)) {
    throw new InvalidDateArgumentError(token ?? '')
  }
  const date = DateTime.fromISO(token, { zone })
  if (!date.isValid) {
    throw new InvalidDateArgumentError(token)
  }
  return token
}

/**
 * The UTC window for `date` (YYYY-MM-DD) in `zone`.
 * Spans 23 or 25 hours on DST transition days.
 */
export function localDayWindow(date: string, zone: string): TimeWindow {
  const start = DateTime.fromISO(date, { zone }).startOf('day')
  if (!start.isValid) {
    throw new InvalidDateArgumentError(date)
  }
  // plus({ days }) keeps wall-clock time, so DST shifts land on local midnight
  const end = start.plus({ days: 1 })
  return { start: start.toUTC(), end: end.toUTC() }
}

/**
 * Strict half-open overlap. Touching endpoints do not overlap.
 */
export function overlaps(a: TimeWindow, b: TimeWindow): boolean {
  return a.start.toMillis() < b.end.toMillis() && a.end.toMillis() > b.start.toMillis()
}
