/**
 * Crop Calendar Types
 *
 * Core interfaces for the crop activity calendar: yearly templates,
 * concrete events, and the collaborators the calendar talks to.
 */

import type { CatalogLoadError, NotificationError, PersistenceError } from './errors.js'

/**
 * A year-agnostic farming task from the template catalog,
 * e.g. "Fertilizing on day 15 of month 3".
 */
export interface ActivitySchedule {
  /** Activity name (e.g. "Sowing", "Irrigation") */
  readonly activity: string

  readonly description: string

  /** Month of year, 1–12 */
  readonly month: number

  /** Day of month, 1–31 (clamped to the month's length when materialized) */
  readonly day: number
}

/**
 * All yearly activities for one crop.
 */
export interface CropSchedule {
  readonly cropName: string
  readonly activities: readonly ActivitySchedule[]
}

/**
 * General advice shown next to the calendar.
 */
export interface FarmingTip {
  readonly title: string
  readonly description: string
  readonly category: string
  /** Best season for this tip, when it has one */
  readonly season?: string
}

/**
 * Kind of calendar event. Closed set.
 */
export type CalendarEventType = 'cropActivity' | 'custom' | 'reminder' | 'weather'

/**
 * A concrete, dated calendar event.
 */
export interface CalendarEvent {
  /**
   * Stable unique ID.
   * Materialized events: `<cropName>_<activity>_<year>`.
   * User-authored events: `evt-<ulid>`, assigned by the calendar.
   */
  id: string

  title: string

  description: string

  /** Calendar date of the event (local midnight for template events) */
  date: Date

  type: CalendarEventType

  /** True if this event carries a scheduled notification */
  isReminder: boolean

  /** When the notification fires (default: `date`) */
  reminderAt?: Date

  /** Originating crop (materialized events only) */
  cropName?: string

  /** Activity category, e.g. "planting" or "pest_control" */
  category?: string

  location?: string

  isCompleted: boolean
}

/**
 * Input for creating a user-authored event (id is assigned by the calendar)
 */
export interface CreateEventInput {
  title: string
  description: string
  date: Date
  type?: Exclude<CalendarEventType, 'cropActivity'>
  isReminder?: boolean
  reminderAt?: Date
  category?: string
  cropName?: string
  location?: string
}

/**
 * Display status derived from an event's date and completion flag.
 */
export type EventStatus = 'completed' | 'overdue' | 'today' | 'upcoming' | 'scheduled'

/**
 * Lifecycle of the calendar within a session.
 */
export type CalendarState = 'uninitialized' | 'loaded'

/**
 * Outcome of a user-requested removal.
 * `protected` means the id belongs to a template event, which is regenerated
 * every session and cannot be removed by the user.
 */
export type RemoveOutcome = 'removed' | 'absent' | 'protected'

/**
 * Recoverable failures reported alongside a successful operation.
 */
export type CalendarIssue = CatalogLoadError | PersistenceError | NotificationError

/**
 * Result of a calendar operation. The in-memory change described by `value`
 * has been applied; `issues` lists collaborator failures the caller should
 * surface as a non-blocking warning.
 */
export interface OperationResult<T> {
  value: T
  issues: CalendarIssue[]
}

// ─── Collaborators ───

/**
 * Read-only source of crop templates.
 */
export interface TemplateCatalog {
  loadCropSchedules(): Promise<CropSchedule[]>

  loadFarmingTips(): Promise<FarmingTip[]>
}

/**
 * Durable storage for user-authored events. Whole-collection semantics:
 * `loadEvents` after `saveEvents` returns the latest saved set.
 */
export interface EventPersistence {
  loadEvents(): Promise<CalendarEvent[]>

  saveEvents(events: CalendarEvent[]): Promise<void>
}

/**
 * Keyed notification scheduler. Scheduling an existing key replaces it;
 * cancelling an unknown key is a no-op.
 */
export interface Notifier {
  schedule(key: string, title: string, body: string, at: Date): Promise<void>

  cancel(key: string): Promise<void>
}

/**
 * Materialization window settings.
 */
export interface MaterializeOptions {
  /** Days a past activity stays visible (default: 30) */
  lookBackDays?: number

  /** Days ahead into next year that template activities roll over (default: 60) */
  rolloverWindowDays?: number
}

/**
 * Timeouts applied to collaborator calls, in milliseconds.
 */
export interface CalendarTimeouts {
  persistenceMs: number
  notifierMs: number
}
