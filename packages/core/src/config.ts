import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_TIMEZONE } from './calendar/manager.js'
import { isValidTimezone, UTC_ZONE } from './timezone/normalizer.js'

export const APP_DIR_NAME = '.caldesk'
const CONFIG_FILENAME = 'config.yaml'

export interface AppConfig {
  appDir: string
  defaultTimezone: string
  defaultCalendar: string
  /** Where relative export/import paths resolve (relative to cwd) */
  exportDirectory: string
  /** Applied when a create command omits --autoDecline */
  autoDecline: boolean
}

const configSchema = z
  .object({
    calendar: z
      .object({
        defaultTimezone: z.string().optional(),
        defaultCalendar: z.string().optional(),
      })
      .optional(),
    export: z
      .object({
        directory: z.string().optional(),
      })
      .optional(),
    commands: z
      .object({
        autoDecline: z.boolean().optional(),
      })
      .optional(),
  })
  .nullable()

type YamlConfig = z.infer<typeof configSchema>

/**
 * Where config.yaml lives: $CALDESK_DIR when set, else the nearest `.caldesk/`
 * at or above `cwd`, else `.caldesk/` at the nearest git root, else in `cwd`.
 */
export function findAppDir(cwd: string = process.cwd()): string {
  const fromEnv = process.env.CALDESK_DIR
  if (fromEnv) {
    return path.resolve(fromEnv)
  }

  let gitRoot: string | null = null
  for (const dir of ancestors(cwd)) {
    const candidate = path.join(dir, APP_DIR_NAME)
    if (existsSync(candidate)) return candidate
    if (gitRoot === null && existsSync(path.join(dir, '.git'))) gitRoot = dir
  }
  return path.join(gitRoot ?? path.resolve(cwd), APP_DIR_NAME)
}

/** `start` and each of its parents, nearest first */
function ancestors(start: string): string[] {
  const dirs = [path.resolve(start)]
  let parent = path.dirname(dirs[0])
  while (parent !== dirs[dirs.length - 1]) {
    dirs.push(parent)
    parent = path.dirname(parent)
  }
  return dirs
}

function loadYamlConfig(appDir: string): YamlConfig {
  const configPath = path.join(appDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(
      `[Config] Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return null
  }

  const result = configSchema.safeParse(raw ?? null)
  if (!result.success) {
    const issue = result.error.issues[0]
    console.warn(
      `[Config] Invalid ${configPath}: ${issue.path.join('.')}: ${issue.message}. Using defaults.`,
    )
    return null
  }
  return result.data
}

export function loadConfig(appDir?: string): AppConfig {
  const dir = appDir ?? findAppDir()
  const yaml = loadYamlConfig(dir)

  let defaultTimezone = yaml?.calendar?.defaultTimezone ?? DEFAULT_TIMEZONE
  if (!isValidTimezone(defaultTimezone)) {
    console.warn(`[Config] Invalid default timezone '${defaultTimezone}'. Falling back to ${UTC_ZONE}.`)
    defaultTimezone = UTC_ZONE
  }

  return {
    appDir: dir,
    defaultTimezone,
    defaultCalendar: yaml?.calendar?.defaultCalendar ?? 'Default',
    exportDirectory: yaml?.export?.directory ?? 'exports',
    autoDecline: yaml?.commands?.autoDecline ?? false,
  }
}
