/**
 * Calendar Schemas
 *
 * Zod schemas for data crossing a boundary: the template catalog files,
 * persisted events, and user input for new events.
 */

import { z } from 'zod'
import type {
  CalendarEvent,
  CropSchedule,
  FarmingTip,
} from './types.js'

const nonEmpty = z.string().trim().min(1)
const isoDateTime = z.string().datetime({ offset: true })
const validDate = z.date().refine((d) => !Number.isNaN(d.getTime()), 'Invalid date')

// ─── Template catalog (asset file format) ───

export const activityScheduleSchema = z.object({
  activity: nonEmpty,
  description: z.string(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
})

export const cropScheduleSchema = z
  .object({
    crop_name: nonEmpty,
    activities: z.array(activityScheduleSchema),
  })
  .transform(
    (raw): CropSchedule => ({
      cropName: raw.crop_name,
      activities: raw.activities,
    }),
  )

export const cropCalendarFileSchema = z.object({
  crop_schedules: z.array(cropScheduleSchema),
})

export const farmingTipSchema = z
  .object({
    title: nonEmpty,
    description: z.string(),
    category: nonEmpty,
    season: z.string().nullish(),
  })
  .transform(
    (raw): FarmingTip => ({
      title: raw.title,
      description: raw.description,
      category: raw.category,
      ...(raw.season ? { season: raw.season } : {}),
    }),
  )

export const farmingTipsFileSchema = z.array(farmingTipSchema)

// ─── Events ───

export const calendarEventTypeSchema = z.enum(['cropActivity', 'custom', 'reminder', 'weather'])

/**
 * Persisted event: dates are ISO-8601 strings on disk.
 */
export const storedEventSchema = z
  .object({
    id: nonEmpty,
    title: nonEmpty,
    description: z.string(),
    date: isoDateTime,
    type: calendarEventTypeSchema,
    isReminder: z.boolean(),
    reminderAt: isoDateTime.optional(),
    cropName: z.string().optional(),
    category: z.string().optional(),
    location: z.string().optional(),
    isCompleted: z.boolean().default(false),
  })
  .transform(
    ({ date, reminderAt, ...rest }): CalendarEvent => ({
      ...rest,
      date: new Date(date),
      ...(reminderAt ? { reminderAt: new Date(reminderAt) } : {}),
    }),
  )

export const storedEventsSchema = z.array(storedEventSchema)

/**
 * Serialize an event for a JSON store.
 */
export function toStoredEvent(event: CalendarEvent): z.input<typeof storedEventSchema> {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    date: event.date.toISOString(),
    type: event.type,
    isReminder: event.isReminder,
    reminderAt: event.reminderAt?.toISOString(),
    cropName: event.cropName,
    category: event.category,
    location: event.location,
    isCompleted: event.isCompleted,
  }
}

/**
 * User input for a new event. Title must be non-blank after trimming.
 */
export const createEventInputSchema = z.object({
  title: nonEmpty,
  description: z.string().default(''),
  date: validDate,
  type: z.enum(['custom', 'reminder', 'weather']).optional(),
  isReminder: z.boolean().optional(),
  reminderAt: validDate.optional(),
  category: z.string().trim().min(1).optional(),
  cropName: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional(),
})
