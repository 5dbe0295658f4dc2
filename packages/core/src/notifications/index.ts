/**
 * Reminder Notifications: Module Exports
 */

export { ReminderCoordinator, reminderKey } from './reminders.js'
export type { ReminderCoordinatorConfig } from './reminders.js'
export { LocalNotifier, DEFAULT_POLL_INTERVAL_MS } from './local-notifier.js'

export type {
  PendingReminder,
  FiredReminder,
  ReminderEvent,
  NotifierStatus,
  LocalNotifierConfig,
} from './types.js'
