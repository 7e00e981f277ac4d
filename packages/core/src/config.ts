import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { isValidZone } from './time/day-window.js'
import { DEFAULT_PROD_ID } from './ics/serializer.js'

const DEFAULT_TIMEZONE = 'America/New_York'
const CONFIG_DIRNAME = '.calday'
const CONFIG_FILENAME = 'config.yaml'

export interface ToolConfig {
  /** Local zone for agenda days and all-day export dates */
  timezone: string
  ics: {
    prodId: string
  }
}

interface YamlConfig {
  timezone?: string
  ics?: {
    prodId?: string
  }
}

export interface LoadConfigOptions {
  /** Config directory; overrides CALDAY_DIR and the directory search */
  dir?: string
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
  /** Directory the search starts from (default: process.cwd()) */
  cwd?: string
}

export function findConfigDir(cwd: string = process.cwd()): string {
  // Walk up from cwd looking for an existing .calday/ directory
  let dir = path.resolve(cwd)
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.join(path.resolve(cwd), CONFIG_DIRNAME)
}

function loadYamlConfig(configDir: string): YamlConfig | null {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }
  try {
    const raw = readFileSync(configPath, 'utf-8')
    const parsed: unknown = parse(raw)
    return typeof parsed === 'object' && parsed !== null ? (parsed as YamlConfig) : null
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return null
  }
}

function pickTimezone(candidates: Array<[source: string, value: unknown]>): string {
  for (const [source, value] of candidates) {
    if (typeof value !== 'string' || !value.trim()) continue
    const zone = value.trim()
    if (isValidZone(zone)) return zone
    console.warn(`Warning: Ignoring unknown timezone "${zone}" from ${source}.`)
  }
  return DEFAULT_TIMEZONE
}

/**
 * Load tool configuration once per run.
 *
 * Timezone precedence: CALDAY_TZ, TZ, config.yaml, then America/New_York.
 */
export function loadConfig(options: LoadConfigOptions = {}): ToolConfig {
  const env = options.env ?? process.env
  const configDir = options.dir ?? env.CALDAY_DIR ?? findConfigDir(options.cwd)
  const yaml = loadYamlConfig(configDir)

  const timezone = pickTimezone([
    ['CALDAY_TZ', env.CALDAY_TZ],
    ['TZ', env.TZ],
    [path.join(configDir, CONFIG_FILENAME), yaml?.timezone],
  ])

  const prodId = yaml?.ics?.prodId
  return {
    timezone,
    ics: {
      prodId: typeof prodId === 'string' && prodId.trim() ? prodId.trim() : DEFAULT_PROD_ID,
    },
  }
}
