// Public API for library consumers; the bin/ entry points wrap the cli/ commands

export { UsageError, InvalidDateArgumentError, FormatError, InputError } from './errors.js'

export { loadConfig, findConfigDir } from './config.js'
export type { ToolConfig, LoadConfigOptions } from './config.js'

export type { EventRecord, EventPayload, TimedRecord, ResolvedEvent } from './events/index.js'
export {
  DEFAULT_TITLE,
  eventRecordSchema,
  eventPayloadSchema,
  readEventsFile,
  parseEventPayload,
  hasInterval,
  resolveTitle,
} from './events/index.js'

export type { TimeWindow } from './time/index.js'
export {
  parseTimestamp,
  formatUtcStamp,
  parseUtcStamp,
  formatDateValue,
  isValidZone,
  resolveTargetDate,
  localDayWindow,
  overlaps,
} from './time/index.js'

export type { AgendaResult } from './agenda/index.js'
export { selectDayEvents, formatTimeRange, renderAgenda, buildAgenda } from './agenda/index.js'

export type { IcsOptions, SerializedCalendar } from './ics/index.js'
export {
  DEFAULT_PROD_ID,
  escapeText,
  foldLine,
  unfoldLines,
  computeFallbackUid,
  buildEventLines,
  serializeCalendar,
} from './ics/index.js'

export type { CliIo } from './cli/io.js'
export { runAgendaCommand, AGENDA_USAGE } from './cli/agenda-command.js'
export type { AgendaCommandOptions } from './cli/agenda-command.js'
export { runExportCommand, EXPORT_USAGE } from './cli/export-command.js'
export type { ExportCommandOptions } from './cli/export-command.js'
