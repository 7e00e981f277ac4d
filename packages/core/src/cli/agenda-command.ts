/**
 * Agenda Command
 *
 * calday-agenda <events.json> [today|tomorrow|YYYY-MM-DD]
 */

import type { DateTime } from 'luxon'
import { buildAgenda } from '../agenda/agenda.js'
import type { ToolConfig } from '../config.js'
import { readEventsFile } from '../events/loader.js'
import { resolveTargetDate } from '../time/day-window.js'
import { EXIT_USAGE, reportCliError } from './errors.js'
import type { CliIo } from './io.js'

export const AGENDA_USAGE = 'Usage: calday-agenda <events.json> [today|tomorrow|YYYY-MM-DD]'

export interface AgendaCommandOptions {
  io: CliIo
  config: ToolConfig
  /** Reference instant for "today" and "tomorrow" */
  now?: DateTime
}

export async function runAgendaCommand(
  args: string[],
  options: AgendaCommandOptions,
): Promise<number> {
  const { io, config } = options
  const [eventsPath, dateToken] = args

  if (eventsPath === undefined) {
    io.stdout(AGENDA_USAGE)
    return EXIT_USAGE
  }

  try {
    // Validate the date before touching the file
    const date = resolveTargetDate(dateToken, config.timezone, options.now)
    const records = await readEventsFile(eventsPath)
    const { lines } = buildAgenda(records, date, config.timezone)

    for (const line of lines) {
      io.stdout(line)
    }
    return 0
  } catch (err) {
    return reportCliError(err, io, AGENDA_USAGE)
  }
}
