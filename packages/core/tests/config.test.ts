/**
 * Unit Tests: Config
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig } from '../src/config.js'
import { DEFAULT_CATALOG_PATH, DEFAULT_TIPS_PATH } from '../src/calendar/catalog.js'
import { DEFAULT_POLL_INTERVAL_MS } from '../src/notifications/local-notifier.js'
import { DEFAULT_TIMEOUT_MS } from '../src/utils/timeout.js'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'furrow-config-'))
  vi.stubEnv('FURROW_PORT', '')
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
  rmSync(dir, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('uses defaults without a config file', () => {
    const config = loadConfig(dir)

    expect(config).toEqual({
      dataDir: dir,
      calendar: {
        lookBackDays: 30,
        rolloverWindowDays: 60,
        catalogPath: DEFAULT_CATALOG_PATH,
        tipsPath: DEFAULT_TIPS_PATH,
        eventsPath: join(dir, 'calendar', 'events.json'),
        timeouts: { persistenceMs: 5000, notifierMs: 5000 },
      },
      reminders: { pollIntervalMs: 60000 },
      dashboard: {
        host: '127.0.0.1',
        port: 4321,
        storage: 'sqlite',
        dbPath: join(dir, 'calendar', 'events.db'),
      },
    })
  })

  it('shares its timeout and poll defaults with the components', () => {
    const config = loadConfig(dir)

    expect(config.calendar.timeouts.persistenceMs).toBe(DEFAULT_TIMEOUT_MS)
    expect(config.calendar.timeouts.notifierMs).toBe(DEFAULT_TIMEOUT_MS)
    expect(config.reminders.pollIntervalMs).toBe(DEFAULT_POLL_INTERVAL_MS)
  })

  it('selects JSON file storage for events', () => {
    writeFileSync(
      join(dir, 'config.yaml'),
      ['calendar:', '  eventsPath: data/events.json', 'dashboard:', '  storage: json'].join('\n'),
    )

    const config = loadConfig(dir)

    expect(config.dashboard.storage).toBe('json')
    expect(config.calendar.eventsPath).toBe(join(dir, 'data', 'events.json'))
  })

  it('reads overrides and resolves paths against the data directory', () => {
    writeFileSync(
      join(dir, 'config.yaml'),
      [
        'calendar:',
        '  lookBackDays: 14',
        '  catalogPath: catalogs/crops.json',
        '  timeouts:',
        '    notifierMs: 2000',
        'dashboard:',
        '  port: 8080',
      ].join('\n'),
    )

    const config = loadConfig(dir)

    expect(config.calendar.lookBackDays).toBe(14)
    expect(config.calendar.rolloverWindowDays).toBe(60)
    expect(config.calendar.catalogPath).toBe(join(dir, 'catalogs', 'crops.json'))
    expect(config.calendar.timeouts).toEqual({ persistenceMs: 5000, notifierMs: 2000 })
    expect(config.dashboard.port).toBe(8080)
  })

  it('lets FURROW_PORT override the configured port', () => {
    writeFileSync(join(dir, 'config.yaml'), 'dashboard:\n  port: 8080\n')
    vi.stubEnv('FURROW_PORT', '9090')

    expect(loadConfig(dir).dashboard.port).toBe(9090)
  })

  it('treats an empty file as no overrides', () => {
    writeFileSync(join(dir, 'config.yaml'), '')

    expect(loadConfig(dir).calendar.lookBackDays).toBe(30)
  })

  it('warns and falls back to defaults on invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    writeFileSync(join(dir, 'config.yaml'), 'calendar:\n  lookBackDays: -5\n')

    const config = loadConfig(dir)

    expect(config.calendar.lookBackDays).toBe(30)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toContain('calendar.lookBackDays')
  })

  it('warns and falls back to defaults on unparseable YAML', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    writeFileSync(join(dir, 'config.yaml'), 'calendar: [unclosed\n')

    expect(loadConfig(dir).calendar.lookBackDays).toBe(30)
    expect(warn).toHaveBeenCalledTimes(1)
  })
})
