/**
 * Timestamp Normalization
 *
 * Converts export timestamps to absolute instants and formats the
 * iCalendar stamp values (UTC date-time and bare date).
 */

import { DateTime } from 'luxon'
import { FormatError } from '../errors.js'

/** iCalendar UTC date-time, e.g. 20260219T140000Z */
const UTC_STAMP_FORMAT = "yyyyMMdd'T'HHmmss'Z'"

/** iCalendar DATE value, e.g. 20260219 */
const DATE_VALUE_FORMAT = 'yyyyMMdd'

/** Values must lead with a full calendar date; luxon alone also takes bare times */
const LEADING_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}/

/**
 * Parse an ISO-8601 timestamp into a UTC instant.
 *
 * A trailing "Z" or an explicit offset is honoured; a value with neither
 * is read as UTC.
 */
export function parseTimestamp(value: string): DateTime {
  const trimmed = value.trim()
  if (!LEADING_DATE_PATTERN.test(trimmed)) {
    throw new FormatError(value, 'expected a YYYY-MM-DD date part')
  }
  const parsed = DateTime.fromISO(trimmed, { zone: 'utc', setZone: true })
  if (!parsed.isValid) {
    throw new FormatError(value, parsed.invalidExplanation ?? parsed.invalidReason ?? undefined)
  }
  return parsed.toUTC()
}

export function formatUtcStamp(instant: DateTime): string {
  return instant.toUTC().toFormat(UTC_STAMP_FORMAT)
}

/**
 * Inverse of formatUtcStamp.
 */
export function parseUtcStamp(value: string): DateTime {
  const parsed = DateTime.fromFormat(value, UTC_STAMP_FORMAT, { zone: 'utc' })
  if (!parsed.isValid) {
    throw new FormatError(value, parsed.invalidExplanation ?? parsed.invalidReason ?? undefined)
  }
  return parsed
}

export function formatDateValue(date: DateTime): string {
  return date.toFormat(DATE_VALUE_FORMAT)
}
