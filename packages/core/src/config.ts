import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_CATALOG_PATH, DEFAULT_TIPS_PATH } from './calendar/catalog.js'
import { DEFAULT_LOOK_BACK_DAYS, DEFAULT_ROLLOVER_WINDOW_DAYS } from './calendar/materializer.js'
import { DEFAULT_POLL_INTERVAL_MS } from './notifications/local-notifier.js'
import { DEFAULT_TIMEOUT_MS } from './utils/timeout.js'
import type { FurrowConfig } from './types.js'

const DATA_DIR_NAME = '.furrow'
const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_HOST = '127.0.0.1'
const DEFAULT_PORT = 4321

export function findFurrowDir(): string {
  // Walk up from cwd looking for an existing .furrow/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, DATA_DIR_NAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found: default to cwd
  return path.resolve(DATA_DIR_NAME)
}

const positiveInt = z.number().int().positive()

const yamlConfigSchema = z
  .object({
    calendar: z
      .object({
        lookBackDays: z.number().int().min(0),
        rolloverWindowDays: z.number().int().min(0),
        catalogPath: z.string(),
        tipsPath: z.string(),
        eventsPath: z.string(),
        timeouts: z
          .object({
            persistenceMs: positiveInt,
            notifierMs: positiveInt,
          })
          .partial(),
      })
      .partial(),
    reminders: z.object({ pollIntervalMs: positiveInt }).partial(),
    dashboard: z
      .object({
        host: z.string(),
        port: z.number().int().min(0).max(65535),
        storage: z.enum(['sqlite', 'json']),
        dbPath: z.string(),
      })
      .partial(),
  })
  .partial()

type YamlConfig = z.infer<typeof yamlConfigSchema>

function loadYamlConfig(dataDir: string): YamlConfig | null {
  const configPath = path.join(dataDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return null
  }

  // An empty file parses to null
  const parsed = yamlConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    console.warn(
      `Warning: Invalid ${configPath} (${first ? `${first.path.join('.')}: ${first.message}` : 'unknown error'}). Using defaults.`,
    )
    return null
  }

  return parsed.data
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined
  const port = Number.parseInt(value, 10)
  return Number.isNaN(port) ? undefined : port
}

/**
 * Load configuration from `<dataDir>/config.yaml`, falling back to defaults
 * for anything missing. Relative paths resolve against the data directory.
 * FURROW_DIR selects the data directory; FURROW_PORT overrides the port.
 */
export function loadConfig(dataDir?: string): FurrowConfig {
  const dir = dataDir ?? process.env.FURROW_DIR ?? findFurrowDir()
  const yaml = loadYamlConfig(dir)
  const resolve = (p: string | undefined, fallback: string): string =>
    p ? path.resolve(dir, p) : fallback

  const calendar = yaml?.calendar
  const dashboard = yaml?.dashboard

  return {
    dataDir: dir,
    calendar: {
      lookBackDays: calendar?.lookBackDays ?? DEFAULT_LOOK_BACK_DAYS,
      rolloverWindowDays: calendar?.rolloverWindowDays ?? DEFAULT_ROLLOVER_WINDOW_DAYS,
      catalogPath: resolve(calendar?.catalogPath, DEFAULT_CATALOG_PATH),
      tipsPath: resolve(calendar?.tipsPath, DEFAULT_TIPS_PATH),
      eventsPath: resolve(calendar?.eventsPath, path.join(dir, 'calendar', 'events.json')),
      timeouts: {
        persistenceMs: calendar?.timeouts?.persistenceMs ?? DEFAULT_TIMEOUT_MS,
        notifierMs: calendar?.timeouts?.notifierMs ?? DEFAULT_TIMEOUT_MS,
      },
    },
    reminders: {
      pollIntervalMs: yaml?.reminders?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    },
    dashboard: {
      host: dashboard?.host ?? DEFAULT_HOST,
      port: parsePort(process.env.FURROW_PORT) ?? dashboard?.port ?? DEFAULT_PORT,
      storage: dashboard?.storage ?? 'sqlite',
      dbPath: resolve(dashboard?.dbPath, path.join(dir, 'calendar', 'events.db')),
    },
  }
}
