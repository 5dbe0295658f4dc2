/**
 * Reminder API Routes
 *
 * Read-only view of the in-process notifier.
 */

import type { FastifyInstance } from "fastify";
import type { PendingReminder } from "@furrow/core";

/**
 * Convert a pending reminder to API response format
 */
function toResponse(reminder: PendingReminder) {
  return {
    key: reminder.key,
    title: reminder.title,
    body: reminder.body,
    at: reminder.at.toISOString(),
    scheduledAt: reminder.scheduledAt.toISOString(),
  };
}

export async function registerReminderRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // GET /api/reminders - Notifier status and pending reminders
  fastify.get("/api/reminders", async () => {
    const notifier = fastify.notifier;

    return {
      status: notifier.getStatus(),
      pending: notifier.getPending().map(toResponse),
    };
  });

  // GET /api/reminders/:key - Single pending reminder
  fastify.get<{ Params: { key: string } }>(
    "/api/reminders/:key",
    async (request, reply) => {
      const reminder = fastify.notifier.get(request.params.key);
      if (!reminder) {
        return reply.code(404).send({ error: "Reminder not found" });
      }

      return toResponse(reminder);
    },
  );
}
