export { parseTimestamp, formatUtcStamp, parseUtcStamp, formatDateValue } from './timestamp.js'
export { isValidZone, resolveTargetDate, localDayWindow, overlaps } from './day-window.js'
export type { TimeWindow } from './day-window.js'
