/**
 * Unit Tests: Reminder Coordinator
 */

import { describe, it, expect } from 'vitest'
import { ReminderCoordinator, reminderKey } from '../src/notifications/reminders.js'
import { NotificationError, TimeoutError } from '../src/calendar/errors.js'
import type { Notifier } from '../src/calendar/types.js'
import { RecordingNotifier, userEvent } from './helpers.js'

const DAY = new Date(2025, 6, 4, 8, 0)

describe('reminderKey', () => {
  it('uses the event id', () => {
    expect(reminderKey('Wheat_Sowing_2025')).toBe('Wheat_Sowing_2025')
  })
})

describe('ReminderCoordinator', () => {
  it('schedules reminder events with title, description and date', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })

    const error = await reminders.onEventAdded(
      userEvent('x', DAY, { isReminder: true, title: 'Irrigate', description: 'Block B' }),
    )

    expect(error).toBeNull()
    expect(notifier.calls).toEqual([
      { op: 'schedule', key: 'x', title: 'Irrigate', body: 'Block B', at: DAY },
    ])
    expect(reminders.outstandingKeys()).toEqual(['x'])
  })

  it('schedules at reminderAt when the event has one', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })
    const reminderAt = new Date(2025, 6, 4, 7, 0)

    await reminders.onEventAdded(userEvent('x', DAY, { isReminder: true, reminderAt }))

    expect(notifier.scheduled.get('x')).toEqual(reminderAt)
  })

  it('does not schedule an outstanding key again', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })
    const event = userEvent('x', DAY, { isReminder: true })

    await reminders.onEventAdded(event)
    await reminders.onEventAdded(event)

    expect(notifier.count('schedule', 'x')).toBe(1)
  })

  it('schedules again after a cancel', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })
    const event = userEvent('x', DAY, { isReminder: true })

    await reminders.onEventAdded(event)
    await reminders.onEventRemoved('x')
    await reminders.onEventAdded(event)

    expect(notifier.calls.map((c) => `${c.op}:${c.key}`)).toEqual(['schedule:x', 'cancel:x', 'schedule:x'])
  })

  it('skips events that are not reminders', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })

    const error = await reminders.onEventAdded(userEvent('x', DAY))

    expect(error).toBeNull()
    expect(notifier.calls).toEqual([])
  })

  it('cancels on removal even without a prior schedule', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })

    const error = await reminders.onEventRemoved('never-scheduled')

    expect(error).toBeNull()
    expect(notifier.calls).toEqual([{ op: 'cancel', key: 'never-scheduled' }])
  })

  it('drops the key from outstanding after cancel', async () => {
    const notifier = new RecordingNotifier()
    const reminders = new ReminderCoordinator({ notifier })
    await reminders.onEventAdded(userEvent('x', DAY, { isReminder: true }))

    await reminders.onEventRemoved('x')

    expect(reminders.outstandingKeys()).toEqual([])
    expect(notifier.scheduled.has('x')).toBe(false)
  })

  it('returns a NotificationError when scheduling fails', async () => {
    const notifier = new RecordingNotifier()
    notifier.failSchedule = true
    const reminders = new ReminderCoordinator({ notifier })

    const error = await reminders.onEventAdded(userEvent('x', DAY, { isReminder: true }))

    expect(error).toBeInstanceOf(NotificationError)
    expect(error?.message).toBe('Failed to schedule reminder: notification permission denied')
    expect(error).toMatchObject({ operation: 'schedule', key: 'x' })
    expect(reminders.outstandingKeys()).toEqual([])
  })

  it('returns a NotificationError when cancelling fails', async () => {
    const notifier = new RecordingNotifier()
    notifier.failCancel = true
    const reminders = new ReminderCoordinator({ notifier })

    const error = await reminders.onEventRemoved('x')

    expect(error).toMatchObject({ operation: 'cancel', key: 'x' })
    expect(error?.message).toBe('Failed to cancel reminder: notifier unavailable')
  })

  it('times out a notifier that never answers', async () => {
    const stuck: Notifier = {
      schedule: () => new Promise<void>(() => {}),
      cancel: () => new Promise<void>(() => {}),
    }
    const reminders = new ReminderCoordinator({ notifier: stuck, timeoutMs: 10 })

    const error = await reminders.onEventAdded(userEvent('x', DAY, { isReminder: true }))

    expect(error?.cause).toBeInstanceOf(TimeoutError)
    expect(error?.message).toBe('Failed to schedule reminder: schedule(x) timed out after 10ms')
  })
})
