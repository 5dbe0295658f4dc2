import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import { registerCalendarRoutes } from "./routes/calendar.js";
import { registerReminderRoutes } from "./routes/reminders.js";
import type { CropCalendar, LocalNotifier } from "@furrow/core";

export interface ServerOptions {
  calendar: CropCalendar;
  notifier: LocalNotifier;
  /** Pretty-printed request logging (default: true) */
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    calendar: CropCalendar;
    notifier: LocalNotifier;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const { calendar, notifier, logger = true } = options;

  const fastify = Fastify({
    logger: logger
      ? {
          level: "info",
          transport: {
            target: "pino-pretty",
            options: {
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
            },
          },
        }
      : false,
  });

  // Register CORS (allow all origins; single-user app)
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("calendar", calendar);
  fastify.decorate("notifier", notifier);

  // Register calendar routes
  await registerCalendarRoutes(fastify);

  // Register reminder routes
  await registerReminderRoutes(fastify);

  fastify.get("/api/health", async () => ({
    status: calendar.state === "loaded" ? "ok" : "starting",
  }));

  return fastify;
}
