/**
 * Calendar API Routes
 *
 * REST API over the crop calendar: day and upcoming views, user-authored
 * events, crop schedules and farming tips. Recovered storage or reminder
 * failures are passed back as `warnings`.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import { DateTime } from "luxon";
import { z } from "zod";
import {
  CUSTOM_EVENT_CATEGORIES,
  InvalidEventError,
  type CalendarEvent,
  type CalendarIssue,
  type EventCategoryStyle,
  type EventStatus,
} from "@furrow/core";

const DEFAULT_UPCOMING_DAYS = 7;
const MAX_UPCOMING_DAYS = 366;

// ─── Response Format ───

interface CalendarEventResponse {
  id: string;
  title: string;
  description: string;
  date: string;
  type: CalendarEvent["type"];
  isReminder: boolean;
  reminderAt?: string;
  cropName?: string;
  category?: string;
  location?: string;
  isCompleted: boolean;
  status: EventStatus;
  style: EventCategoryStyle;
  /** False for template events */
  removable: boolean;
}

// ─── Route Types ───

interface DayQuery {
  date?: string;
}

interface UpcomingQuery {
  days?: string;
}

interface EventParams {
  id: string;
}

const createEventBodySchema = z.object({
  title: z.string(),
  description: z.string().optional(),
  date: z.string(),
  type: z.enum(["custom", "reminder", "weather"]).optional(),
  isReminder: z.boolean().optional(),
  reminderAt: z.string().optional(),
  category: z.string().optional(),
  cropName: z.string().optional(),
  location: z.string().optional(),
});

const completeBodySchema = z
  .object({ completed: z.boolean().default(true) })
  .default({});

function warnings(issues: CalendarIssue[]): string[] {
  return issues.map((issue) => issue.message);
}

/**
 * Parse an ISO-8601 date or date-time in local time
 */
function parseDate(value: string): Date | null {
  const parsed = DateTime.fromISO(value);
  return parsed.isValid ? parsed.toJSDate() : null;
}

function notLoaded(reply: FastifyReply) {
  return reply.code(503).send({ error: "Calendar not loaded" });
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  const calendar = fastify.calendar;

  function toResponse(event: CalendarEvent): CalendarEventResponse {
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
      status: calendar.statusOf(event),
      style: calendar.categoriesOf(event),
      removable: event.type !== "cropActivity",
    };
  }

  /**
   * GET /api/calendar/day
   *
   * Events on one calendar day
   * Query params:
   *   - date: ISO date (default: today)
   */
  fastify.get<{ Querystring: DayQuery }>(
    "/api/calendar/day",
    async (request, reply) => {
      if (calendar.state !== "loaded") return notLoaded(reply);

      const { date } = request.query;
      const day = date ? parseDate(date) : new Date();
      if (!day) {
        return reply.code(400).send({ error: `Invalid date: ${date}` });
      }

      return {
        date: DateTime.fromJSDate(day).toISODate(),
        events: calendar.eventsForDay(day).map(toResponse),
      };
    },
  );

  /**
   * GET /api/calendar/upcoming
   *
   * Events from today through the next `days` days, by date
   */
  fastify.get<{ Querystring: UpcomingQuery }>(
    "/api/calendar/upcoming",
    async (request, reply) => {
      if (calendar.state !== "loaded") return notLoaded(reply);

      const { days } = request.query;
      const span = days ? Number(days) : DEFAULT_UPCOMING_DAYS;
      if (!Number.isInteger(span) || span < 1 || span > MAX_UPCOMING_DAYS) {
        return reply.code(400).send({
          error: `days must be an integer from 1 to ${MAX_UPCOMING_DAYS}`,
        });
      }

      return {
        days: span,
        events: calendar.upcoming(span).map(toResponse),
      };
    },
  );

  // GET /api/calendar/events/:id - Get single event
  fastify.get<{ Params: EventParams }>(
    "/api/calendar/events/:id",
    async (request, reply) => {
      if (calendar.state !== "loaded") return notLoaded(reply);

      const event = calendar.getEvent(request.params.id);
      if (!event) {
        return reply.code(404).send({ error: "Event not found" });
      }

      return toResponse(event);
    },
  );

  /**
   * POST /api/calendar/events
   *
   * Create a user-authored event
   */
  fastify.post("/api/calendar/events", async (request, reply) => {
    if (calendar.state !== "loaded") return notLoaded(reply);

    const parsed = createEventBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      return reply.code(400).send({
        error: first
          ? `${first.path.join(".") || "body"}: ${first.message}`
          : "Invalid request body",
      });
    }

    const body = parsed.data;
    const date = parseDate(body.date);
    if (!date) {
      return reply.code(400).send({ error: `Invalid date: ${body.date}` });
    }
    const reminderAt = body.reminderAt ? parseDate(body.reminderAt) : undefined;
    if (reminderAt === null) {
      return reply
        .code(400)
        .send({ error: `Invalid reminder time: ${body.reminderAt}` });
    }

    try {
      const result = await calendar.add({
        title: body.title,
        description: body.description ?? "",
        date,
        type: body.type,
        isReminder: body.isReminder,
        reminderAt,
        category: body.category,
        cropName: body.cropName,
        location: body.location,
      });

      for (const issue of result.issues) {
        fastify.log.warn(`Event ${result.value.id}: ${issue.message}`);
      }

      return reply.code(201).send({
        event: toResponse(result.value),
        warnings: warnings(result.issues),
      });
    } catch (err) {
      if (err instanceof InvalidEventError) {
        return reply.code(400).send({ error: err.message });
      }
      throw err;
    }
  });

  /**
   * DELETE /api/calendar/events/:id
   *
   * Remove a user-authored event. Template events are refused with 403.
   */
  fastify.delete<{ Params: EventParams }>(
    "/api/calendar/events/:id",
    async (request, reply) => {
      if (calendar.state !== "loaded") return notLoaded(reply);

      const result = await calendar.remove(request.params.id);

      switch (result.value) {
        case "protected":
          return reply
            .code(403)
            .send({ error: "Crop activity events cannot be removed" });
        case "absent":
          return reply.code(404).send({ error: "Event not found" });
        case "removed":
          return { success: true, warnings: warnings(result.issues) };
      }
    },
  );

  // POST /api/calendar/events/:id/complete - Mark done (or not done)
  fastify.post<{ Params: EventParams }>(
    "/api/calendar/events/:id/complete",
    async (request, reply) => {
      if (calendar.state !== "loaded") return notLoaded(reply);

      const parsed = completeBodySchema.safeParse(request.body ?? undefined);
      if (!parsed.success) {
        return reply.code(400).send({ error: "completed must be a boolean" });
      }

      const result = await calendar.complete(
        request.params.id,
        parsed.data.completed,
      );
      if (!result.value) {
        return reply.code(404).send({ error: "Event not found" });
      }

      return {
        event: toResponse(result.value),
        warnings: warnings(result.issues),
      };
    },
  );

  // GET /api/calendar/schedules - Crop schedule templates
  fastify.get("/api/calendar/schedules", async (_request, reply) => {
    if (calendar.state !== "loaded") return notLoaded(reply);
    return { schedules: calendar.schedules() };
  });

  // GET /api/calendar/tips - Farming tips
  fastify.get("/api/calendar/tips", async (_request, reply) => {
    if (calendar.state !== "loaded") return notLoaded(reply);
    return { tips: calendar.tips() };
  });

  // GET /api/calendar/categories - Choices for new custom events
  fastify.get("/api/calendar/categories", async () => {
    return { categories: CUSTOM_EVENT_CATEGORIES };
  });
}
