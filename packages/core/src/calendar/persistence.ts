/**
 * JSON File Persistence
 *
 * Stores the user-authored event collection as a single JSON file.
 * Whole-collection writes go through a temp file and a rename.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { PersistenceError, errorMessage } from './errors.js'
import { storedEventsSchema, toStoredEvent } from './schema.js'
import type { CalendarEvent, EventPersistence } from './types.js'

const eventsFileSchema = z.object({
  events: storedEventsSchema,
  savedAt: z.string().optional(),
})

export class JsonFileEventPersistence implements EventPersistence {
  private filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async loadEvents(): Promise<CalendarEvent[]> {
    if (!existsSync(this.filePath)) {
      return []
    }

    let data: unknown
    try {
      const content = await readFile(this.filePath, 'utf-8')
      data = JSON.parse(content)
    } catch (err) {
      throw new PersistenceError('load', `Could not read ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      })
    }

    const parsed = eventsFileSchema.safeParse(data)
    if (!parsed.success) {
      throw new PersistenceError('load', `Corrupt events file ${this.filePath}`, {
        cause: parsed.error,
      })
    }

    return parsed.data.events
  }

  async saveEvents(events: CalendarEvent[]): Promise<void> {
    const data = {
      events: events.map(toStoredEvent),
      savedAt: new Date().toISOString(),
    }
    const tmpPath = `${this.filePath}.tmp`

    try {
      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(tmpPath, JSON.stringify(data, null, 2))
      await rename(tmpPath, this.filePath)
    } catch (err) {
      throw new PersistenceError('save', `Could not write ${this.filePath}: ${errorMessage(err)}`, {
        cause: err,
      })
    }
  }
}
