/**
 * ICS Export Command
 *
 * calday-ics <input.json> <output.ics>
 */

import { writeFile } from 'node:fs/promises'
import type { DateTime } from 'luxon'
import type { ToolConfig } from '../config.js'
import { UsageError } from '../errors.js'
import { readEventsFile } from '../events/loader.js'
import { serializeCalendar } from '../ics/serializer.js'
import { reportCliError } from './errors.js'
import type { CliIo } from './io.js'

export const EXPORT_USAGE = 'Usage: calday-ics <input.json> <output.ics>'

export interface ExportCommandOptions {
  io: CliIo
  config: ToolConfig
  /** DTSTAMP instant (default: now) */
  now?: DateTime
}

export async function runExportCommand(
  args: string[],
  options: ExportCommandOptions,
): Promise<number> {
  const { io, config } = options

  try {
    if (args.length !== 2) {
      throw new UsageError(`Expected 2 arguments, got ${args.length}.`)
    }
    const [inputPath, outputPath] = args

    const records = await readEventsFile(inputPath)
    // Serialize fully before writing so a bad timestamp leaves no file behind
    const { content } = serializeCalendar(records, {
      zone: config.timezone,
      prodId: config.ics.prodId,
      now: options.now,
    })
    await writeFile(outputPath, content, 'utf-8')

    // Counts every input record, including those skipped for lacking an interval
    io.stdout(`OK: wrote ICS to ${outputPath} (events: ${records.length})`)
    return 0
  } catch (err) {
    return reportCliError(err, io, EXPORT_USAGE)
  }
}
