import {
  JsonFileEventPersistence,
  type EventPersistence,
  type FurrowConfig,
} from "@furrow/core";
import { SqliteEventPersistence } from "./event-db.js";

export interface EventStorage {
  persistence: EventPersistence;
  /** Release the underlying handle once pending writes have landed */
  close(): void;
}

/**
 * Open the configured store for user-authored events:
 * SQLite at `dashboard.dbPath`, or a JSON file at `calendar.eventsPath`.
 */
export function openEventStorage(config: FurrowConfig): EventStorage {
  if (config.dashboard.storage === "json") {
    console.log(`Events file: ${config.calendar.eventsPath}`);
    return {
      persistence: new JsonFileEventPersistence(config.calendar.eventsPath),
      // Each save opens and closes the file itself
      close: () => undefined,
    };
  }

  console.log(`Event database: ${config.dashboard.dbPath}`);
  const db = new SqliteEventPersistence(config.dashboard.dbPath);
  return { persistence: db, close: () => db.close() };
}
