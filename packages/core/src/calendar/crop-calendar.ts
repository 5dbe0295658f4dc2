/**
 * Crop Calendar
 *
 * The calendar's public surface for presentation code: day lookups,
 * adding and removing user events, crop schedules and farming tips.
 * Wires the template catalog, event store and reminder coordinator
 * together from three injected collaborators.
 */

import { ulid } from 'ulid'
import { categoriesOf, type EventCategoryStyle } from './categories.js'
import { CatalogLoadError, InvalidEventError, errorMessage } from './errors.js'
import { EventStore } from './event-store.js'
import { createEventInputSchema } from './schema.js'
import { eventStatus } from './status.js'
import type {
  CalendarEvent,
  CalendarState,
  CalendarTimeouts,
  CreateEventInput,
  CropSchedule,
  EventPersistence,
  EventStatus,
  FarmingTip,
  MaterializeOptions,
  Notifier,
  OperationResult,
  RemoveOutcome,
  TemplateCatalog,
} from './types.js'
import { ReminderCoordinator } from '../notifications/reminders.js'
import { DEFAULT_TIMEOUT_MS } from '../utils/timeout.js'

/** Default window for upcoming(), in days */
const DEFAULT_UPCOMING_DAYS = 7

export interface CropCalendarOptions {
  catalog: TemplateCatalog
  persistence: EventPersistence
  notifier: Notifier
  materialize?: MaterializeOptions
  timeouts?: Partial<CalendarTimeouts>
  /** Source of "now" (default: system clock) */
  clock?: () => Date
  /** Id factory for user-authored events (default: `evt-<ulid>`) */
  generateId?: () => string
}

export function generateEventId(): string {
  return `evt-${ulid()}`
}

export class CropCalendar {
  private catalog: TemplateCatalog
  private store: EventStore
  private reminders: ReminderCoordinator
  private clock: () => Date
  private generateId: () => string
  private farmingTips: FarmingTip[] = []

  constructor(options: CropCalendarOptions) {
    this.catalog = options.catalog
    this.clock = options.clock ?? (() => new Date())
    this.generateId = options.generateId ?? generateEventId

    this.reminders = new ReminderCoordinator({
      notifier: options.notifier,
      timeoutMs: options.timeouts?.notifierMs ?? DEFAULT_TIMEOUT_MS,
    })

    this.store = new EventStore({
      catalog: options.catalog,
      persistence: options.persistence,
      reminders: this.reminders,
      materialize: options.materialize,
      persistenceTimeoutMs: options.timeouts?.persistenceMs ?? DEFAULT_TIMEOUT_MS,
      clock: this.clock,
    })
  }

  get state(): CalendarState {
    return this.store.state
  }

  /**
   * Load (or refresh) templates, tips and saved events.
   * Catalog and persistence failures come back as issues; the calendar is
   * usable afterwards either way.
   */
  async load(): Promise<OperationResult<CalendarEvent[]>> {
    const result = await this.store.loadAll(this.clock())

    try {
      this.farmingTips = await this.catalog.loadFarmingTips()
    } catch (err) {
      const error =
        err instanceof CatalogLoadError
          ? err
          : new CatalogLoadError(`Failed to load farming tips: ${errorMessage(err)}`, { cause: err })
      console.warn(`[CropCalendar] ${error.message}`)
      result.issues.push(error)
    }

    return result
  }

  eventsForDay(date: Date): CalendarEvent[] {
    return this.store.eventsForDay(date)
  }

  /** Events from today through the next `days` days, by date */
  upcoming(days: number = DEFAULT_UPCOMING_DAYS): CalendarEvent[] {
    return this.store.upcoming(this.clock(), days)
  }

  getEvent(eventId: string): CalendarEvent | undefined {
    return this.store.get(eventId)
  }

  schedules(): CropSchedule[] {
    return this.store.cropSchedules()
  }

  tips(): FarmingTip[] {
    return [...this.farmingTips]
  }

  /**
   * Create a user-authored event with a fresh id.
   * Throws InvalidEventError on invalid input.
   */
  async add(input: CreateEventInput): Promise<OperationResult<CalendarEvent>> {
    const parsed = createEventInputSchema.safeParse(input)
    if (!parsed.success) {
      const first = parsed.error.issues[0]
      const detail = first ? `${first.path.join('.') || 'input'}: ${first.message}` : 'invalid input'
      throw new InvalidEventError(`Invalid event (${detail})`, { cause: parsed.error })
    }

    const data = parsed.data
    const type = data.type ?? 'custom'
    const event: CalendarEvent = {
      id: this.generateId(),
      title: data.title,
      description: data.description,
      date: data.date,
      type,
      isReminder: data.isReminder ?? type === 'reminder',
      category: data.category ?? 'custom',
      isCompleted: false,
      ...(data.cropName ? { cropName: data.cropName } : {}),
      ...(data.location ? { location: data.location } : {}),
      ...(data.reminderAt ? { reminderAt: data.reminderAt } : {}),
    }

    return this.store.add(event)
  }

  /**
   * Remove a user-authored event. Template events are refused.
   */
  async remove(eventId: string): Promise<OperationResult<RemoveOutcome>> {
    const existing = this.store.get(eventId)
    if (existing?.type === 'cropActivity') {
      return { value: 'protected', issues: [] }
    }

    const result = await this.store.remove(eventId)
    return { value: result.value ? 'removed' : 'absent', issues: result.issues }
  }

  complete(eventId: string, completed = true): Promise<OperationResult<CalendarEvent | null>> {
    return this.store.setCompleted(eventId, completed)
  }

  categoriesOf(event: CalendarEvent): EventCategoryStyle {
    return categoriesOf(event)
  }

  statusOf(event: CalendarEvent): EventStatus {
    return eventStatus(event, this.clock())
  }

  /** Reminder keys currently scheduled by this calendar */
  scheduledReminders(): string[] {
    return this.reminders.outstandingKeys()
  }

  /** Resolves once queued mutations have settled */
  idle(): Promise<void> {
    return this.store.idle()
  }
}
