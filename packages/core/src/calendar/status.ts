import { DateTime } from 'luxon'
import type { CalendarEvent, EventStatus } from './types.js'

/** Window for "upcoming", in days */
const UPCOMING_DAYS = 7

/**
 * Status label for an event relative to `now`.
 * Completed wins; an uncompleted event whose start has passed is overdue,
 * even when it is today.
 */
export function eventStatus(event: Pick<CalendarEvent, 'date' | 'isCompleted'>, now: Date): EventStatus {
  if (event.isCompleted) return 'completed'

  const start = DateTime.fromJSDate(event.date)
  const current = DateTime.fromJSDate(now)

  if (current > start) return 'overdue'
  if (start.hasSame(current, 'day')) return 'today'
  if (start < current.plus({ days: UPCOMING_DAYS })) return 'upcoming'
  return 'scheduled'
}
