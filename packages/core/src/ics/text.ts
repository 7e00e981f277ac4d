/**
 * iCalendar Text Encoding
 *
 * TEXT value escaping and content-line folding (RFC 5545 §3.3.11, §3.1).
 */

/** Content lines are limited to 75 octets, excluding the CRLF */
const MAX_LINE_OCTETS = 75

const CRLF = '\r\n'

/**
 * Escape a TEXT property value. Backslashes go first so the escapes
 * inserted afterwards are not doubled.
 */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/\r\n|\r|\n/g, '\\n')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
}

/**
 * Fold a content line into segments of at most 75 octets. Continuation
 * segments start with a single space, which counts toward their limit.
 * A multi-byte character is never split across segments.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line

  const segments: string[] = []
  let current = ''
  let currentOctets = 0
  let limit = MAX_LINE_OCTETS

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8')
    if (currentOctets + octets > limit) {
      segments.push(current)
      current = ''
      currentOctets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    currentOctets += octets
  }
  segments.push(current)

  return segments.join(`${CRLF} `)
}

/**
 * Undo folding: split on line breaks and join continuation lines
 * (leading space or tab) onto the previous line.
 */
export function unfoldLines(ics: string): string[] {
  const unfolded: string[] = []

  for (const line of ics.split(/\r?\n/)) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && unfolded.length > 0) {
      unfolded[unfolded.length - 1] += line.substring(1)
    } else {
      unfolded.push(line)
    }
  }

  return unfolded
}
