/**
 * Reminder Notification Types
 */

/**
 * A reminder waiting for its time to arrive.
 */
export interface PendingReminder {
  key: string
  title: string
  body: string
  /** When the reminder fires */
  at: Date
  /** When it was (last) scheduled */
  scheduledAt: Date
}

/**
 * Record of a reminder that has fired.
 */
export interface FiredReminder {
  key: string
  title: string
  body: string
  scheduledFor: string
  firedAt: string
}

/**
 * Event emitted when a reminder's state changes
 */
export interface ReminderEvent {
  type: 'reminder:scheduled' | 'reminder:cancelled' | 'reminder:fired'
  reminder: PendingReminder
}

/**
 * Status snapshot for monitoring.
 */
export interface NotifierStatus {
  running: boolean
  pollIntervalMs: number
  pendingCount: number
  firedCount: number
  lastPollAt: string | null
  nextPollAt: string | null
  recentlyFired: FiredReminder[]
}

export interface LocalNotifierConfig {
  /** How often due reminders are checked (default: 60000) */
  pollIntervalMs?: number
  /** Source of "now" (default: system clock) */
  clock?: () => Date
}
