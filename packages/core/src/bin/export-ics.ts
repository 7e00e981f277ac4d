#!/usr/bin/env node
import { runExportCommand } from '../cli/export-command.js'
import { processIo } from '../cli/io.js'
import { loadConfig } from '../config.js'

async function main(): Promise<void> {
  const config = loadConfig()
  process.exitCode = await runExportCommand(process.argv.slice(2), { io: processIo, config })
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
