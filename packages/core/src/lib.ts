// Public API for consumption by other packages (dashboard)

export * from './calendar/index.js'
export * from './notifications/index.js'

export { loadConfig, findFurrowDir } from './config.js'
export type {
  FurrowConfig,
  CalendarSettings,
  ReminderSettings,
  DashboardSettings,
  EventStorageKind,
} from './types.js'

export { SerialQueue } from './utils/serial.js'
export { withTimeout, DEFAULT_TIMEOUT_MS } from './utils/timeout.js'
