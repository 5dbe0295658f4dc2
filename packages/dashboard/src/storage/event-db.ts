/**
 * Calendar Storage: SQLite Event Persistence
 *
 * Stores user-authored calendar events in SQLite. Uses better-sqlite3 with
 * WAL mode. Every save replaces the whole collection in one transaction.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import {
  PersistenceError,
  errorMessage,
  storedEventSchema,
  type CalendarEvent,
  type EventPersistence,
} from "@furrow/core";

// Rows as better-sqlite3 returns them: booleans are 0/1, absent text is NULL
const eventRowSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    description: z.string(),
    date: z.string(),
    type: z.string(),
    is_reminder: z.number(),
    reminder_at: z.string().nullable(),
    crop_name: z.string().nullable(),
    category: z.string().nullable(),
    location: z.string().nullable(),
    is_completed: z.number(),
  })
  .transform((row) => ({
    id: row.id,
    title: row.title,
    description: row.description,
    date: row.date,
    type: row.type,
    isReminder: row.is_reminder === 1,
    reminderAt: row.reminder_at ?? undefined,
    cropName: row.crop_name ?? undefined,
    category: row.category ?? undefined,
    location: row.location ?? undefined,
    isCompleted: row.is_completed === 1,
  }))
  .pipe(storedEventSchema);

const columnInfoSchema = z.array(z.object({ name: z.string() }));

/**
 * SQLite-backed EventPersistence
 */
export class SqliteEventPersistence implements EventPersistence {
  private db: Database.Database;

  /**
   * @param dbPath - Database file, or ":memory:"
   */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      // Ensure directory exists
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initialize();
  }

  /**
   * Initialize database with pragmas and schema
   */
  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        position INTEGER NOT NULL,
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        date TEXT NOT NULL,
        type TEXT NOT NULL,
        is_reminder INTEGER NOT NULL DEFAULT 0,
        crop_name TEXT,
        category TEXT,
        location TEXT,
        is_completed INTEGER NOT NULL DEFAULT 0,
        reminder_at TEXT
      );
    `);

    // Migration: add columns if missing (for existing databases)
    const columns = columnInfoSchema.parse(
      this.db.prepare("PRAGMA table_info(events)").all(),
    );
    if (!columns.some((c) => c.name === "reminder_at")) {
      this.db.exec("ALTER TABLE events ADD COLUMN reminder_at TEXT DEFAULT NULL");
    }
  }

  /**
   * Load every stored event, in the order they were saved.
   * A row that fails validation makes the whole load fail.
   */
  async loadEvents(): Promise<CalendarEvent[]> {
    let rows: unknown[];
    try {
      rows = this.db
        .prepare(
          `SELECT id, title, description, date, type, is_reminder, reminder_at,
                  crop_name, category, location, is_completed
           FROM events ORDER BY position`,
        )
        .all();
    } catch (err) {
      throw new PersistenceError(
        "load",
        `Could not read events: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const parsed = z.array(eventRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new PersistenceError("load", "Corrupt events table", {
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  async saveEvents(events: CalendarEvent[]): Promise<void> {
    const insert = this.db.prepare(`
      INSERT INTO events (
        position, id, title, description, date, type,
        is_reminder, reminder_at, crop_name, category, location, is_completed
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const replaceAll = this.db.transaction((batch: CalendarEvent[]) => {
      this.db.prepare("DELETE FROM events").run();
      batch.forEach((event, position) => {
        insert.run(
          position,
          event.id,
          event.title,
          event.description,
          event.date.toISOString(),
          event.type,
          event.isReminder ? 1 : 0,
          event.reminderAt?.toISOString() ?? null,
          event.cropName ?? null,
          event.category ?? null,
          event.location ?? null,
          event.isCompleted ? 1 : 0,
        );
      });
    });

    try {
      replaceAll(events);
    } catch (err) {
      throw new PersistenceError(
        "save",
        `Could not write events: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  close(): void {
    this.db.close();
  }
}
