import type { CalendarTimeouts } from './calendar/types.js'

export interface CalendarSettings {
  lookBackDays: number
  rolloverWindowDays: number
  catalogPath: string
  tipsPath: string
  /** JSON file holding user-authored events when storage is "json" */
  eventsPath: string
  timeouts: CalendarTimeouts
}

export interface ReminderSettings {
  pollIntervalMs: number
}

export type EventStorageKind = 'sqlite' | 'json'

export interface DashboardSettings {
  host: string
  port: number
  /** Where user-authored events are kept (default: sqlite) */
  storage: EventStorageKind
  /** SQLite database for user-authored events when storage is "sqlite" */
  dbPath: string
}

export interface FurrowConfig {
  /** The .furrow directory all relative paths resolve against */
  dataDir: string
  calendar: CalendarSettings
  reminders: ReminderSettings
  dashboard: DashboardSettings
}
