import {
  loadConfig,
  CropCalendar,
  JsonTemplateCatalog,
  LocalNotifier,
  type ReminderEvent,
} from "@furrow/core";
import { createServer } from "./server.js";
import { openEventStorage } from "./storage/open.js";

async function main() {
  const config = loadConfig();
  console.log(`Data directory: ${config.dataDir}`);

  const storage = openEventStorage(config);

  // Reminders fire in-process; delivery is a log line until a transport exists
  const notifier = new LocalNotifier({
    pollIntervalMs: config.reminders.pollIntervalMs,
  });
  notifier.on("reminder:fired", (event: ReminderEvent) => {
    console.log(
      `[Reminders] ${event.reminder.title}${event.reminder.body ? `: ${event.reminder.body}` : ""}`,
    );
  });

  const calendar = new CropCalendar({
    catalog: new JsonTemplateCatalog({
      schedulesPath: config.calendar.catalogPath,
      tipsPath: config.calendar.tipsPath,
    }),
    persistence: storage.persistence,
    notifier,
    materialize: {
      lookBackDays: config.calendar.lookBackDays,
      rolloverWindowDays: config.calendar.rolloverWindowDays,
    },
    timeouts: config.calendar.timeouts,
  });

  const loaded = await calendar.load();
  for (const issue of loaded.issues) {
    console.warn(`Warning: ${issue.message}`);
  }
  console.log(`Calendar loaded with ${loaded.value.length} events`);

  notifier.start();

  const server = await createServer({ calendar, notifier });
  const { host, port } = config.dashboard;

  try {
    await server.listen({ port, host });
    console.log(`\nDashboard running at http://${host}:${port}`);
    console.log("Press Ctrl+C to stop\n");
  } catch (err) {
    console.error("Failed to start server:", err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      notifier.stop();

      await server.close();
      console.log("Server closed.");

      // Let queued calendar writes finish before closing storage
      await calendar.idle();
      storage.close();
      console.log("Event storage closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
