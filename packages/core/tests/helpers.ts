/**
 * In-process stand-ins for the calendar's collaborators.
 */

import type {
  CalendarEvent,
  CropSchedule,
  EventPersistence,
  Notifier,
} from '../src/calendar/types.js'

export class MemoryPersistence implements EventPersistence {
  stored: CalendarEvent[]
  saves: CalendarEvent[][] = []
  loadCalls = 0
  failLoad = false
  failSave = false
  /** When set, saveEvents never settles */
  hangSave = false
  /** Delay applied to the next saveEvents call only */
  nextSaveDelayMs = 0

  constructor(initial: CalendarEvent[] = []) {
    this.stored = [...initial]
  }

  async loadEvents(): Promise<CalendarEvent[]> {
    this.loadCalls++
    if (this.failLoad) throw new Error('storage offline')
    return [...this.stored]
  }

  saveEvents(events: CalendarEvent[]): Promise<void> {
    if (this.hangSave) return new Promise<void>(() => {})
    if (this.failSave) return Promise.reject(new Error('disk full'))

    const snapshot = [...events]
    const write = () => {
      this.stored = snapshot
      this.saves.push(snapshot)
    }

    const delay = this.nextSaveDelayMs
    this.nextSaveDelayMs = 0
    if (delay > 0) {
      return new Promise<void>((resolve) => {
        setTimeout(() => {
          write()
          resolve()
        }, delay)
      })
    }

    write()
    return Promise.resolve()
  }

  storedIds(): string[] {
    return this.stored.map((e) => e.id)
  }
}

export interface NotifierCall {
  op: 'schedule' | 'cancel'
  key: string
  title?: string
  body?: string
  at?: Date
}

export class RecordingNotifier implements Notifier {
  calls: NotifierCall[] = []
  scheduled = new Map<string, Date>()
  failSchedule = false
  failCancel = false
  /** Runs at the start of every cancel() */
  onCancel: ((key: string) => void) | null = null

  async schedule(key: string, title: string, body: string, at: Date): Promise<void> {
    this.calls.push({ op: 'schedule', key, title, body, at })
    if (this.failSchedule) throw new Error('notification permission denied')
    this.scheduled.set(key, at)
  }

  async cancel(key: string): Promise<void> {
    this.onCancel?.(key)
    this.calls.push({ op: 'cancel', key })
    if (this.failCancel) throw new Error('notifier unavailable')
    this.scheduled.delete(key)
  }

  count(op: NotifierCall['op'], key: string): number {
    return this.calls.filter((c) => c.op === op && c.key === key).length
  }
}

export function userEvent(id: string, date: Date, overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    id,
    title: `Event ${id}`,
    description: '',
    date,
    type: 'custom',
    isReminder: false,
    category: 'custom',
    isCompleted: false,
    ...overrides,
  }
}

export const WHEAT: CropSchedule = {
  cropName: 'Wheat',
  activities: [
    { activity: 'Sowing', description: 'Sow in rows', month: 7, day: 10 },
    { activity: 'Irrigation', description: 'First irrigation', month: 8, day: 1 },
  ],
}
