/**
 * Crop Calendar
 *
 * Yearly crop templates materialized into dated events, merged with
 * user-authored events, with reminders kept in step.
 */

// Types
export type {
  ActivitySchedule,
  CropSchedule,
  FarmingTip,
  CalendarEvent,
  CalendarEventType,
  CreateEventInput,
  EventStatus,
  CalendarState,
  RemoveOutcome,
  CalendarIssue,
  OperationResult,
  TemplateCatalog,
  EventPersistence,
  Notifier,
  MaterializeOptions,
  CalendarTimeouts,
} from './types.js'

// Errors
export {
  CalendarError,
  CatalogLoadError,
  PersistenceError,
  NotificationError,
  CalendarNotLoadedError,
  DuplicateEventError,
  InvalidEventError,
  TimeoutError,
  errorMessage,
} from './errors.js'
export type { CalendarErrorCode } from './errors.js'

// Implementation
export {
  materializeEvents,
  materializeFromCatalog,
  materializedEventId,
  DEFAULT_LOOK_BACK_DAYS,
  DEFAULT_ROLLOVER_WINDOW_DAYS,
} from './materializer.js'
export type { MaterializeResult } from './materializer.js'
export { EventStore, isUserAuthored } from './event-store.js'
export type { EventStoreConfig } from './event-store.js'
export { CropCalendar, generateEventId } from './crop-calendar.js'
export type { CropCalendarOptions } from './crop-calendar.js'
export { categoriesOf, CUSTOM_EVENT_CATEGORIES } from './categories.js'
export type { EventCategoryStyle } from './categories.js'
export { eventStatus } from './status.js'
export {
  JsonTemplateCatalog,
  StaticTemplateCatalog,
  DEFAULT_CATALOG_PATH,
  DEFAULT_TIPS_PATH,
} from './catalog.js'
export type { JsonTemplateCatalogOptions } from './catalog.js'
export { JsonFileEventPersistence } from './persistence.js'
export { storedEventSchema, storedEventsSchema, toStoredEvent, createEventInputSchema } from './schema.js'
