/**
 * Unit Tests: SQLite Event Persistence
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { PersistenceError, type CalendarEvent } from "@furrow/core";
import { SqliteEventPersistence } from "../src/storage/event-db.js";

function makeEvent(
  id: string,
  iso: string,
  overrides: Partial<CalendarEvent> = {},
): CalendarEvent {
  return {
    id,
    title: `Event ${id}`,
    description: "",
    date: new Date(iso),
    type: "custom",
    isReminder: false,
    category: "custom",
    isCompleted: false,
    ...overrides,
  };
}

describe("SqliteEventPersistence (in memory)", () => {
  let persistence: SqliteEventPersistence;

  beforeEach(() => {
    persistence = new SqliteEventPersistence(":memory:");
  });

  afterEach(() => {
    persistence.close();
  });

  it("starts empty", async () => {
    expect(await persistence.loadEvents()).toEqual([]);
  });

  it("reads back saved events in saved order", async () => {
    const events = [
      makeEvent("evt-b", "2025-07-05T00:00:00.000Z", {
        type: "reminder",
        isReminder: true,
        location: "Greenhouse",
      }),
      makeEvent("evt-a", "2025-07-04T08:30:00.000Z", {
        cropName: "Maize",
        isCompleted: true,
      }),
    ];

    await persistence.saveEvents(events);

    expect(await persistence.loadEvents()).toEqual(events);
  });

  it("reads back a reminder time", async () => {
    const reminderAt = new Date("2025-07-04T07:30:00.000Z");
    await persistence.saveEvents([
      makeEvent("evt-1", "2025-07-04T08:30:00.000Z", { isReminder: true, reminderAt }),
    ]);

    const [loaded] = await persistence.loadEvents();

    expect(loaded.reminderAt).toEqual(reminderAt);
  });

  it("leaves absent optional fields out", async () => {
    await persistence.saveEvents([
      makeEvent("evt-1", "2025-07-04T08:30:00.000Z", { category: undefined }),
    ]);

    const [loaded] = await persistence.loadEvents();

    expect(loaded.category).toBeUndefined();
    expect(loaded.cropName).toBeUndefined();
    expect(loaded.location).toBeUndefined();
    expect(loaded.reminderAt).toBeUndefined();
  });

  it("replaces the whole collection on every save", async () => {
    await persistence.saveEvents([
      makeEvent("evt-1", "2025-07-04T00:00:00.000Z"),
      makeEvent("evt-2", "2025-07-05T00:00:00.000Z"),
    ]);
    await persistence.saveEvents([makeEvent("evt-2", "2025-07-05T00:00:00.000Z")]);

    const ids = (await persistence.loadEvents()).map((e) => e.id);
    expect(ids).toEqual(["evt-2"]);
  });

  it("keeps the previous collection when a save fails", async () => {
    await persistence.saveEvents([makeEvent("evt-1", "2025-07-04T00:00:00.000Z")]);

    const duplicate = makeEvent("evt-2", "2025-07-05T00:00:00.000Z");
    await expect(
      persistence.saveEvents([duplicate, duplicate]),
    ).rejects.toBeInstanceOf(PersistenceError);

    const ids = (await persistence.loadEvents()).map((e) => e.id);
    expect(ids).toEqual(["evt-1"]);
  });
});

describe("SqliteEventPersistence (on disk)", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "furrow-db-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and survives reopening", async () => {
    const dbPath = path.join(dir, "calendar", "events.db");
    const first = new SqliteEventPersistence(dbPath);
    await first.saveEvents([makeEvent("evt-1", "2025-07-04T00:00:00.000Z")]);
    first.close();

    const second = new SqliteEventPersistence(dbPath);
    const ids = (await second.loadEvents()).map((e) => e.id);
    second.close();

    expect(ids).toEqual(["evt-1"]);
  });

  it("adds the reminder_at column to an older events table", async () => {
    const dbPath = path.join(dir, "events.db");
    const raw = new Database(dbPath);
    raw.exec(`
      CREATE TABLE events (
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
        is_completed INTEGER NOT NULL DEFAULT 0
      );
    `);
    raw
      .prepare(
        "INSERT INTO events (position, id, title, date, type) VALUES (0, 'evt-1', 'Old', '2025-07-04T00:00:00.000Z', 'custom')",
      )
      .run();
    raw.close();

    const persistence = new SqliteEventPersistence(dbPath);
    const loaded = await persistence.loadEvents();
    persistence.close();

    expect(loaded.map((e) => e.id)).toEqual(["evt-1"]);
    expect(loaded[0].reminderAt).toBeUndefined();
  });

  it("rejects rows with an unknown event type", async () => {
    const dbPath = path.join(dir, "events.db");
    const persistence = new SqliteEventPersistence(dbPath);
    await persistence.saveEvents([makeEvent("evt-1", "2025-07-04T00:00:00.000Z")]);

    const raw = new Database(dbPath);
    raw.prepare("UPDATE events SET type = 'meeting'").run();
    raw.close();

    await expect(persistence.loadEvents()).rejects.toMatchObject({
      operation: "load",
      message: "Corrupt events table",
    });
    persistence.close();
  });
});
