/**
 * Reminder Coordinator
 *
 * Keeps one scheduled notification per reminder event, following the
 * event's lifecycle. Failures are returned, never thrown: reminder delivery
 * is best-effort and does not gate the event mutation.
 */

import { NotificationError, errorMessage } from '../calendar/errors.js'
import type { CalendarEvent, Notifier } from '../calendar/types.js'
import { DEFAULT_TIMEOUT_MS, withTimeout } from '../utils/timeout.js'

export interface ReminderCoordinatorConfig {
  notifier: Notifier
  /** Timeout for each notifier call (default: 5000) */
  timeoutMs?: number
}

/**
 * Notification key for an event. Cancellation looks it up by the same key.
 */
export function reminderKey(eventId: string): string {
  return eventId
}

export class ReminderCoordinator {
  private notifier: Notifier
  private timeoutMs: number
  private outstanding = new Set<string>()

  constructor(config: ReminderCoordinatorConfig) {
    this.notifier = config.notifier
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  /**
   * Schedule the event's notification if it is a reminder, at its
   * `reminderAt` or else its date. Past times are passed through; the
   * notifier decides.
   * A key that is already outstanding is left as it is.
   */
  async onEventAdded(event: CalendarEvent): Promise<NotificationError | null> {
    if (!event.isReminder) {
      return null
    }

    const key = reminderKey(event.id)
    if (this.outstanding.has(key)) {
      return null
    }

    try {
      await withTimeout(
        this.notifier.schedule(key, event.title, event.description, event.reminderAt ?? event.date),
        this.timeoutMs,
        `schedule(${key})`,
      )
      this.outstanding.add(key)
      return null
    } catch (err) {
      console.warn(`[Reminders] Failed to schedule "${event.title}" (${key}): ${errorMessage(err)}`)
      return new NotificationError('schedule', key, `Failed to schedule reminder: ${errorMessage(err)}`, {
        cause: err,
      })
    }
  }

  /**
   * Cancel the event's notification. Issued for every removal,
   * whether or not the event was a reminder.
   */
  async onEventRemoved(eventId: string): Promise<NotificationError | null> {
    const key = reminderKey(eventId)

    try {
      await withTimeout(this.notifier.cancel(key), this.timeoutMs, `cancel(${key})`)
      this.outstanding.delete(key)
      return null
    } catch (err) {
      console.warn(`[Reminders] Failed to cancel ${key}: ${errorMessage(err)}`)
      return new NotificationError('cancel', key, `Failed to cancel reminder: ${errorMessage(err)}`, {
        cause: err,
      })
    }
  }

  /** Keys this coordinator has scheduled and not cancelled */
  outstandingKeys(): string[] {
    return Array.from(this.outstanding)
  }
}
