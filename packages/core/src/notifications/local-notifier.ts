/**
 * Local Notifier
 *
 * In-process, keyed reminder scheduler. Holds pending reminders in memory,
 * polls for due ones and emits `reminder:fired` for the host to deliver.
 * Delivery itself (push, toast, chat message) is up to the listener.
 */

import { EventEmitter } from 'node:events'
import type { Notifier } from '../calendar/types.js'
import type {
  FiredReminder,
  LocalNotifierConfig,
  NotifierStatus,
  PendingReminder,
  ReminderEvent,
} from './types.js'

export const DEFAULT_POLL_INTERVAL_MS = 60_000 // 1 minute
const MAX_RECENT_FIRED = 10

export class LocalNotifier extends EventEmitter implements Notifier {
  private pending = new Map<string, PendingReminder>()
  private recentlyFired: FiredReminder[] = []
  private firedCount = 0
  private pollIntervalMs: number
  private clock: () => Date
  private pollInterval: ReturnType<typeof setInterval> | null = null
  private lastPollAt: Date | null = null

  constructor(config: LocalNotifierConfig = {}) {
    super()
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.clock = config.clock ?? (() => new Date())
  }

  /**
   * Schedule (or replace) the reminder for `key`.
   * A time that has already passed drops any existing reminder for the key
   * and schedules nothing.
   */
  async schedule(key: string, title: string, body: string, at: Date): Promise<void> {
    const now = this.clock()

    if (at.getTime() <= now.getTime()) {
      this.pending.delete(key)
      return
    }

    const reminder: PendingReminder = { key, title, body, at, scheduledAt: now }
    this.pending.set(key, reminder)
    this.emitEvent('reminder:scheduled', reminder)
  }

  /**
   * Cancel the reminder for `key`. Unknown keys are ignored.
   */
  async cancel(key: string): Promise<void> {
    const reminder = this.pending.get(key)
    if (!reminder) {
      return
    }

    this.pending.delete(key)
    this.emitEvent('reminder:cancelled', reminder)
  }

  /**
   * Start polling for due reminders.
   */
  start(): void {
    if (this.pollInterval) {
      console.log('[Reminders] Already running')
      return
    }

    console.log(`[Reminders] Starting with poll interval ${this.pollIntervalMs}ms`)
    this.tick()
    this.pollInterval = setInterval(() => this.tick(), this.pollIntervalMs)
  }

  stop(): void {
    if (!this.pollInterval) {
      return
    }

    clearInterval(this.pollInterval)
    this.pollInterval = null
    console.log('[Reminders] Stopped')
  }

  /**
   * Fire every reminder due at `now`, earliest first.
   *
   * @returns Records of the reminders fired
   */
  tick(now: Date = this.clock()): FiredReminder[] {
    this.lastPollAt = now

    const due = Array.from(this.pending.values())
      .filter((r) => r.at.getTime() <= now.getTime())
      .sort((a, b) => a.at.getTime() - b.at.getTime())

    const fired: FiredReminder[] = []
    for (const reminder of due) {
      this.pending.delete(reminder.key)

      const record: FiredReminder = {
        key: reminder.key,
        title: reminder.title,
        body: reminder.body,
        scheduledFor: reminder.at.toISOString(),
        firedAt: now.toISOString(),
      }

      this.recentlyFired.unshift(record)
      if (this.recentlyFired.length > MAX_RECENT_FIRED) {
        this.recentlyFired.pop()
      }
      this.firedCount++
      fired.push(record)

      console.log(`[Reminders] Firing: "${reminder.title}" (${reminder.key})`)
      this.emitEvent('reminder:fired', reminder)
    }

    return fired
  }

  get(key: string): PendingReminder | undefined {
    return this.pending.get(key)
  }

  /** Pending reminders, soonest first */
  getPending(): PendingReminder[] {
    return Array.from(this.pending.values()).sort((a, b) => a.at.getTime() - b.at.getTime())
  }

  getStatus(): NotifierStatus {
    const running = this.pollInterval !== null
    const nextPollAt =
      running && this.lastPollAt ? new Date(this.lastPollAt.getTime() + this.pollIntervalMs) : null

    return {
      running,
      pollIntervalMs: this.pollIntervalMs,
      pendingCount: this.pending.size,
      firedCount: this.firedCount,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      nextPollAt: nextPollAt?.toISOString() ?? null,
      recentlyFired: [...this.recentlyFired],
    }
  }

  private emitEvent(type: ReminderEvent['type'], reminder: PendingReminder): void {
    const event: ReminderEvent = { type, reminder }
    this.emit(type, event)
    this.emit('reminder', event)
  }
}
