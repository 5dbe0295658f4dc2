/**
 * Event Materializer
 *
 * Binds year-agnostic crop templates to concrete dates around `now`.
 * Pure apart from the catalog read in materializeFromCatalog().
 */

import { DateTime } from 'luxon'
import { CatalogLoadError, errorMessage } from './errors.js'
import type {
  ActivitySchedule,
  CalendarEvent,
  CropSchedule,
  MaterializeOptions,
  TemplateCatalog,
} from './types.js'

export const DEFAULT_LOOK_BACK_DAYS = 30
export const DEFAULT_ROLLOVER_WINDOW_DAYS = 60

export interface MaterializeResult {
  events: CalendarEvent[]
  schedules: CropSchedule[]
  /** Set when the catalog could not be read; events is then empty */
  error: CatalogLoadError | null
}

/**
 * Deterministic id for a template occurrence.
 */
export function materializedEventId(cropName: string, activity: string, year: number): string {
  return `${cropName}_${activity}_${year}`
}

/**
 * Local midnight on (year, month, day), with day clamped to the month's length.
 */
function templateDate(year: number, month: number, day: number): DateTime {
  const lastDay = DateTime.local(year, month, 1).endOf('month').day
  return DateTime.local(year, month, Math.min(day, lastDay))
}

function toEvent(schedule: CropSchedule, activity: ActivitySchedule, date: DateTime): CalendarEvent {
  return {
    id: materializedEventId(schedule.cropName, activity.activity, date.year),
    title: `${activity.activity} - ${schedule.cropName}`,
    description: activity.description,
    date: date.toJSDate(),
    type: 'cropActivity',
    isReminder: true,
    cropName: schedule.cropName,
    category: activity.activity.toLowerCase(),
    isCompleted: false,
  }
}

/**
 * Expand templates into dated events.
 *
 * A current-year occurrence is kept when its day is no earlier than
 * `lookBackDays` before today. The previous year's occurrence is kept under
 * the same rule (so late-December tasks stay visible in early January), and
 * next year's occurrence only when it falls within `rolloverWindowDays` of
 * today (so January tasks appear in December).
 */
export function materializeEvents(
  schedules: readonly CropSchedule[],
  now: Date,
  options: MaterializeOptions = {},
): CalendarEvent[] {
  const lookBackDays = options.lookBackDays ?? DEFAULT_LOOK_BACK_DAYS
  const rolloverWindowDays = options.rolloverWindowDays ?? DEFAULT_ROLLOVER_WINDOW_DAYS

  const today = DateTime.fromJSDate(now).startOf('day')
  const cutoff = today.minus({ days: lookBackDays })
  const rolloverLimit = today.plus({ days: rolloverWindowDays })
  const years = [today.year - 1, today.year, today.year + 1]

  const events: CalendarEvent[] = []

  for (const schedule of schedules) {
    for (const activity of schedule.activities) {
      for (const year of years) {
        const date = templateDate(year, activity.month, activity.day)

        if (date < cutoff) continue
        if (year > today.year && date > rolloverLimit) continue

        events.push(toEvent(schedule, activity, date))
      }
    }
  }

  return events
}

/**
 * Load templates from the catalog and materialize them.
 * A catalog failure yields no events and a CatalogLoadError; no retry.
 */
export async function materializeFromCatalog(
  catalog: TemplateCatalog,
  now: Date,
  options: MaterializeOptions = {},
): Promise<MaterializeResult> {
  let schedules: CropSchedule[]

  try {
    schedules = await catalog.loadCropSchedules()
  } catch (err) {
    const error =
      err instanceof CatalogLoadError
        ? err
        : new CatalogLoadError(`Failed to load crop schedules: ${errorMessage(err)}`, {
            cause: err,
          })
    console.warn(`[Materializer] ${error.message}`)
    return { events: [], schedules: [], error }
  }

  const events = materializeEvents(schedules, now, options)
  console.log(
    `[Materializer] ${events.length} events from ${schedules.length} crop schedules`,
  )

  return { events, schedules, error: null }
}
