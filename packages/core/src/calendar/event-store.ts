/**
 * Event Store
 *
 * Single source of truth for the calendar's events: materialized template
 * events plus user-authored ones. Owns the persisted collection; nothing
 * else writes it.
 *
 * Mutations run one at a time through a SerialQueue, including their
 * persistence and notifier hand-offs, so operations on the same id are
 * applied in the order they were issued.
 */

import { DateTime } from 'luxon'
import {
  CalendarNotLoadedError,
  DuplicateEventError,
  PersistenceError,
  errorMessage,
} from './errors.js'
import { materializeFromCatalog } from './materializer.js'
import type {
  CalendarEvent,
  CalendarIssue,
  CalendarState,
  CropSchedule,
  EventPersistence,
  MaterializeOptions,
  OperationResult,
  TemplateCatalog,
} from './types.js'
import type { ReminderCoordinator } from '../notifications/reminders.js'
import { SerialQueue } from '../utils/serial.js'
import { DEFAULT_TIMEOUT_MS, withTimeout } from '../utils/timeout.js'

export interface EventStoreConfig {
  catalog: TemplateCatalog
  persistence: EventPersistence
  reminders: ReminderCoordinator
  materialize?: MaterializeOptions
  /** Timeout for each persistence call (default: 5000) */
  persistenceTimeoutMs?: number
  /** Source of "now" for loadAll() (default: system clock) */
  clock?: () => Date
}

/**
 * Template events are regenerated every session and never persisted.
 */
export function isUserAuthored(event: CalendarEvent): boolean {
  return event.type !== 'cropActivity'
}

export class EventStore {
  private catalog: TemplateCatalog
  private persistence: EventPersistence
  private reminders: ReminderCoordinator
  private materializeOptions: MaterializeOptions
  private persistenceTimeoutMs: number
  private clock: () => Date
  private queue = new SerialQueue()
  private events = new Map<string, CalendarEvent>()
  private schedules: CropSchedule[] = []
  private currentState: CalendarState = 'uninitialized'
  /** Settles when the most recent saveEvents call does; never rejects */
  private lastSave: Promise<void> = Promise.resolve()

  constructor(config: EventStoreConfig) {
    this.catalog = config.catalog
    this.persistence = config.persistence
    this.reminders = config.reminders
    this.materializeOptions = config.materialize ?? {}
    this.persistenceTimeoutMs = config.persistenceTimeoutMs ?? DEFAULT_TIMEOUT_MS
    this.clock = config.clock ?? (() => new Date())
  }

  get state(): CalendarState {
    return this.currentState
  }

  /**
   * Populate the store from the template catalog and persisted user events,
   * then schedule reminders for every reminder event.
   *
   * The first call reads user events from persistence. Later calls (refresh)
   * keep the in-memory user events, which may hold changes a failed save
   * did not write, and only regenerate template events. An id already in
   * the store keeps its existing copy. If the catalog cannot be read on a
   * refresh, the previous template events stay. Reminders of events that
   * drop out are cancelled before the events leave the store.
   */
  loadAll(now?: Date): Promise<OperationResult<CalendarEvent[]>> {
    return this.queue.run(async () => {
      const issues: CalendarIssue[] = []
      const at = now ?? this.clock()
      const refreshing = this.currentState === 'loaded'

      const materialized = await materializeFromCatalog(this.catalog, at, this.materializeOptions)
      if (materialized.error) {
        issues.push(materialized.error)
      } else {
        this.schedules = materialized.schedules
      }

      let templateEvents = materialized.events
      if (materialized.error && refreshing) {
        templateEvents = Array.from(this.events.values()).filter((e) => !isUserAuthored(e))
      }

      let userEvents: CalendarEvent[]
      if (refreshing) {
        userEvents = Array.from(this.events.values()).filter(isUserAuthored)
      } else {
        userEvents = []
        try {
          const persisted = await withTimeout(
            this.persistence.loadEvents(),
            this.persistenceTimeoutMs,
            'loadEvents',
          )
          userEvents = persisted.filter(isUserAuthored)
        } catch (err) {
          console.warn(`[EventStore] Failed to load persisted events: ${errorMessage(err)}`)
          issues.push(
            new PersistenceError('load', `Failed to load saved events: ${errorMessage(err)}`, {
              cause: err,
            }),
          )
        }
      }

      const next = new Map<string, CalendarEvent>()
      for (const event of userEvents) {
        if (!next.has(event.id)) {
          next.set(event.id, event)
        }
      }
      for (const event of templateEvents) {
        if (!next.has(event.id)) {
          next.set(event.id, this.events.get(event.id) ?? event)
        }
      }

      for (const id of this.events.keys()) {
        if (next.has(id)) continue
        const error = await this.reminders.onEventRemoved(id)
        if (error) issues.push(error)
      }

      this.events = next
      this.currentState = 'loaded'

      for (const event of next.values()) {
        const error = await this.reminders.onEventAdded(event)
        if (error) issues.push(error)
      }

      console.log(
        `[EventStore] Loaded ${next.size} events (${userEvents.length} user, ${templateEvents.length} template)`,
      )

      return { value: Array.from(next.values()), issues }
    })
  }

  /**
   * Insert a new event. Throws DuplicateEventError if the id exists.
   * The event stays in memory even if the durable write fails.
   */
  add(event: CalendarEvent): Promise<OperationResult<CalendarEvent>> {
    return this.queue.run(async () => {
      this.assertLoaded('add')

      if (this.events.has(event.id)) {
        throw new DuplicateEventError(event.id)
      }

      this.events.set(event.id, event)

      const issues: CalendarIssue[] = []
      const persistError = await this.persist()
      if (persistError) issues.push(persistError)

      const notifyError = await this.reminders.onEventAdded(event)
      if (notifyError) issues.push(notifyError)

      return { value: event, issues }
    })
  }

  /**
   * Delete an event by id. Absent ids are a no-op that still issues a
   * reminder cancellation. The cancellation is requested before the record
   * is dropped.
   *
   * @returns Whether an event was removed
   */
  remove(eventId: string): Promise<OperationResult<boolean>> {
    return this.queue.run(async () => {
      this.assertLoaded('remove')

      const issues: CalendarIssue[] = []

      const cancelError = await this.reminders.onEventRemoved(eventId)
      if (cancelError) issues.push(cancelError)

      const removed = this.events.delete(eventId)
      if (removed) {
        const persistError = await this.persist()
        if (persistError) issues.push(persistError)
      }

      return { value: removed, issues }
    })
  }

  /**
   * Mark an event done or not done.
   *
   * @returns The updated event, or null if the id is unknown
   */
  setCompleted(eventId: string, completed: boolean): Promise<OperationResult<CalendarEvent | null>> {
    return this.queue.run(async () => {
      this.assertLoaded('setCompleted')

      const existing = this.events.get(eventId)
      if (!existing) {
        return { value: null, issues: [] }
      }

      const updated: CalendarEvent = { ...existing, isCompleted: completed }
      this.events.set(eventId, updated)

      const issues: CalendarIssue[] = []
      if (isUserAuthored(updated)) {
        const persistError = await this.persist()
        if (persistError) issues.push(persistError)
      }

      return { value: updated, issues }
    })
  }

  /**
   * Events on the same local calendar day as `date`, in insertion order.
   */
  eventsForDay(date: Date): CalendarEvent[] {
    this.assertLoaded('eventsForDay')

    const day = DateTime.fromJSDate(date)
    return Array.from(this.events.values()).filter((event) =>
      DateTime.fromJSDate(event.date).hasSame(day, 'day'),
    )
  }

  /**
   * Events from the start of `now`'s day through the next `days` days,
   * ordered by date.
   */
  upcoming(now: Date, days: number): CalendarEvent[] {
    this.assertLoaded('upcoming')

    const from = DateTime.fromJSDate(now).startOf('day')
    const to = from.plus({ days })

    return Array.from(this.events.values())
      .filter((event) => {
        const date = DateTime.fromJSDate(event.date)
        return date >= from && date < to
      })
      .sort((a, b) => a.date.getTime() - b.date.getTime())
  }

  get(eventId: string): CalendarEvent | undefined {
    this.assertLoaded('get')
    return this.events.get(eventId)
  }

  list(): CalendarEvent[] {
    this.assertLoaded('list')
    return Array.from(this.events.values())
  }

  /** Crop schedules from the last successful catalog load */
  cropSchedules(): CropSchedule[] {
    this.assertLoaded('cropSchedules')
    return [...this.schedules]
  }

  /**
   * Resolves once every queued operation has settled and the last save has
   * landed, or has been pending for longer than the persistence timeout.
   */
  async idle(): Promise<void> {
    await this.queue.drain()
    try {
      await withTimeout(this.lastSave, this.persistenceTimeoutMs, 'saveEvents')
    } catch (err) {
      console.warn(`[EventStore] A save is still pending: ${errorMessage(err)}`)
    }
  }

  private assertLoaded(operation: string): void {
    if (this.currentState !== 'loaded') {
      throw new CalendarNotLoadedError(operation)
    }
  }

  /**
   * Write the full user-authored set.
   *
   * A timed-out save keeps running, so each save starts only after the
   * previous one has settled. Snapshots reach storage in the order taken.
   */
  private async persist(): Promise<PersistenceError | null> {
    const userEvents = Array.from(this.events.values()).filter(isUserAuthored)

    const write = () => this.persistence.saveEvents(userEvents)
    const save = this.lastSave.then(write)
    // Failures are reported below; the chain only tracks settlement
    this.lastSave = save.then(
      () => undefined,
      () => undefined,
    )

    try {
      await withTimeout(save, this.persistenceTimeoutMs, 'saveEvents')
      return null
    } catch (err) {
      console.warn(`[EventStore] Failed to save events: ${errorMessage(err)}`)
      return new PersistenceError(
        'save',
        `Changes may not survive a restart: ${errorMessage(err)}`,
        { cause: err },
      )
    }
  }
}
