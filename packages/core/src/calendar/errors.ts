/**
 * Calendar Errors
 *
 * Recoverable collaborator failures (catalog, persistence, notification)
 * are returned as issues on OperationResult. The rest are thrown to the
 * caller because they indicate misuse.
 */

export type CalendarErrorCode =
  | 'CATALOG_LOAD'
  | 'PERSISTENCE'
  | 'NOTIFICATION'
  | 'NOT_LOADED'
  | 'DUPLICATE_EVENT'
  | 'INVALID_EVENT'
  | 'TIMEOUT'

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalendarError'
    this.code = code
  }
}

/** Template catalog unreachable or corrupt */
export class CatalogLoadError extends CalendarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CATALOG_LOAD', message, options)
    this.name = 'CatalogLoadError'
  }
}

/** Durable read or write failed; in-memory state stays authoritative */
export class PersistenceError extends CalendarError {
  readonly operation: 'load' | 'save'

  constructor(operation: 'load' | 'save', message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE', message, options)
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

/** Scheduling or cancelling a reminder failed */
export class NotificationError extends CalendarError {
  readonly key: string
  readonly operation: 'schedule' | 'cancel'

  constructor(
    operation: 'schedule' | 'cancel',
    key: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('NOTIFICATION', message, options)
    this.name = 'NotificationError'
    this.key = key
    this.operation = operation
  }
}

/** Operation invoked before loadAll() */
export class CalendarNotLoadedError extends CalendarError {
  constructor(operation: string) {
    super('NOT_LOADED', `Calendar not loaded: call loadAll() before ${operation}()`)
    this.name = 'CalendarNotLoadedError'
  }
}

export class DuplicateEventError extends CalendarError {
  readonly eventId: string

  constructor(eventId: string) {
    super('DUPLICATE_EVENT', `Event already exists: ${eventId}`)
    this.name = 'DuplicateEventError'
    this.eventId = eventId
  }
}

export class InvalidEventError extends CalendarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_EVENT', message, options)
    this.name = 'InvalidEventError'
  }
}

export class TimeoutError extends CalendarError {
  readonly timeoutMs: number

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
