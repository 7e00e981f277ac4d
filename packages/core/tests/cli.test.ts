/**
 * Integration Tests: Command Handlers
 *
 * Runs the agenda and export commands against files in a temp directory
 * with a captured output sink.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { DateTime } from 'luxon'

import { runAgendaCommand, AGENDA_USAGE } from '../src/cli/agenda-command.js'
import { runExportCommand, EXPORT_USAGE } from '../src/cli/export-command.js'
import type { CliIo } from '../src/cli/io.js'
import type { ToolConfig } from '../src/config.js'
import { serializeCalendar } from '../src/ics/serializer.js'
import { buildAgenda } from '../src/agenda/agenda.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

interface CapturedIo extends CliIo {
  out: string[]
  err: string[]
}

function captureIo(): CapturedIo {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: (line) => {
      out.push(line)
    },
    stderr: (line) => {
      err.push(line)
    },
  }
}

const config: ToolConfig = {
  timezone: 'UTC-5',
  ics: { prodId: '-//test//calday//EN' },
}

const NOW = DateTime.fromISO('2026-02-19T12:00:00Z')

const EVENTS = {
  events: [
    { id: 'evt-1', title: 'Standup', start: '2026-02-19T14:00:00.000Z', end: '2026-02-19T14:15:00.000Z' },
    { id: 'evt-2', title: 'Design review', start: '2026-02-19T19:00:00.000Z', end: '2026-02-19T20:30:00.000Z' },
    { id: 'evt-3', title: 'Untimed' },
  ],
}

let tempDir: string
let eventsPath: string

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'calday-cli-'))
  eventsPath = path.join(tempDir, 'events.json')
  fs.writeFileSync(eventsPath, JSON.stringify(EVENTS), 'utf-8')
})

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true })
})

// -------------------------------------------------------------------
// Agenda
// -------------------------------------------------------------------

describe('runAgendaCommand', () => {
  it('prints the agenda for a date', async () => {
    const io = captureIo()

    const code = await runAgendaCommand([eventsPath, '2026-02-19'], { io, config })

    expect(code).toBe(0)
    expect(io.out).toEqual([
      'Thursday, February 19, 2026',
      '',
      '9:00 AM – 9:15 AM  Standup',
      '2:00 PM – 3:30 PM  Design review',
    ])
    expect(io.err).toEqual([])
  })

  it('defaults to today in the configured zone', async () => {
    const io = captureIo()

    await runAgendaCommand([eventsPath], { io, config, now: NOW })

    expect(io.out[0]).toBe('Thursday, February 19, 2026')
  })

  it('prints "No events." for an empty day', async () => {
    const io = captureIo()

    const code = await runAgendaCommand([eventsPath, 'tomorrow'], { io, config, now: NOW })

    expect(code).toBe(0)
    expect(io.out).toEqual(['Friday, February 20, 2026', '', 'No events.'])
  })

  it('prints the same lines as buildAgenda', async () => {
    const io = captureIo()

    await runAgendaCommand([eventsPath, '2026-02-19'], { io, config })

    expect(io.out).toEqual(buildAgenda(EVENTS.events, '2026-02-19', 'UTC-5').lines)
  })

  it('prints usage and exits 2 without a path', async () => {
    const io = captureIo()

    expect(await runAgendaCommand([], { io, config })).toBe(2)
    expect(io.out).toEqual([AGENDA_USAGE])
  })

  it('rejects an unknown date token', async () => {
    const io = captureIo()

    expect(await runAgendaCommand([eventsPath, 'next-week'], { io, config })).toBe(1)
    expect(io.err).toEqual(['Date must be "today", "tomorrow", or YYYY-MM-DD.', AGENDA_USAGE])
    expect(io.out).toEqual([])
  })

  it('fails on a malformed timestamp', async () => {
    fs.writeFileSync(
      eventsPath,
      JSON.stringify({ events: [{ title: 'Bad', start: 'noon', end: '2026-02-19T14:00:00Z' }] }),
      'utf-8',
    )
    const io = captureIo()

    expect(await runAgendaCommand([eventsPath, '2026-02-19'], { io, config })).toBe(1)
    expect(io.err).toHaveLength(1)
    expect(io.err[0]).toMatch(/^Error: Invalid timestamp "noon"/)
  })
})

// -------------------------------------------------------------------
// Export
// -------------------------------------------------------------------

describe('runExportCommand', () => {
  it('writes the calendar and reports the input record count', async () => {
    const io = captureIo()
    const outputPath = path.join(tempDir, 'out.ics')

    const code = await runExportCommand([eventsPath, outputPath], { io, config, now: NOW })

    expect(code).toBe(0)
    expect(io.out).toEqual([`OK: wrote ICS to ${outputPath} (events: 3)`])
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(
      serializeCalendar(EVENTS.events, { zone: 'UTC-5', prodId: '-//test//calday//EN', now: NOW })
        .content,
    )
  })

  it.each<[string[]]>([[[]], [['only-one.json']], [['a.json', 'b.ics', 'c']]])(
    'prints usage to stderr and exits 2 for %j',
    async (args) => {
      const io = captureIo()

      expect(await runExportCommand(args, { io, config })).toBe(2)
      expect(io.err).toEqual([`Expected 2 arguments, got ${args.length}.`, EXPORT_USAGE])
      expect(io.out).toEqual([])
    },
  )

  it('writes nothing when a timestamp is malformed', async () => {
    fs.writeFileSync(
      eventsPath,
      JSON.stringify({ events: [{ id: 'x', start: '2026-02-19T14:00:00Z', end: 'later' }] }),
      'utf-8',
    )
    const io = captureIo()
    const outputPath = path.join(tempDir, 'out.ics')

    expect(await runExportCommand([eventsPath, outputPath], { io, config })).toBe(1)
    expect(fs.existsSync(outputPath)).toBe(false)
    expect(io.err).toHaveLength(1)
    expect(io.err[0]).toMatch(/^Error: Invalid timestamp "later"/)
  })

  it('counts records skipped for lacking an interval', async () => {
    fs.writeFileSync(
      eventsPath,
      JSON.stringify({ events: [{ id: 'a' }, { id: 'b', start: '2026-02-19T14:00:00Z' }] }),
      'utf-8',
    )
    const io = captureIo()
    const outputPath = path.join(tempDir, 'empty.ics')

    expect(await runExportCommand([eventsPath, outputPath], { io, config, now: NOW })).toBe(0)
    expect(io.out).toEqual([`OK: wrote ICS to ${outputPath} (events: 2)`])
    expect(fs.readFileSync(outputPath, 'utf-8')).not.toContain('BEGIN:VEVENT')
  })

  it('reports an unreadable input file', async () => {
    const io = captureIo()

    const code = await runExportCommand([path.join(tempDir, 'missing.json'), path.join(tempDir, 'out.ics')], {
      io,
      config,
    })

    expect(code).toBe(1)
    expect(io.err[0]).toMatch(/^Error: Could not read events from .*missing\.json: /)
  })
})
