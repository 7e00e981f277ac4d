export { escapeText, foldLine, unfoldLines } from './text.js'
export {
  DEFAULT_PROD_ID,
  computeFallbackUid,
  buildEventLines,
  serializeCalendar,
} from './serializer.js'
export type { IcsOptions, SerializedCalendar } from './serializer.js'
