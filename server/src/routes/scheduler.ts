/**
 * Scheduler Routes
 *
 * Stats, manual ticks and the tournament timetable.
 */

import type { Hono } from "hono";
import { ValidationError } from "../services/reminders/errors.js";
import { isValidTimeZone } from "../services/reminders/timezone.js";
import { upcomingTournaments } from "../services/reminders/tournaments.js";
import { queryInt, type RouteDeps } from "./helpers.js";

export function registerSchedulerRoutes(app: Hono, deps: RouteDeps): void {
  const { store, loop } = deps;
  const now = deps.now ?? (() => new Date());

  app.get("/api/scheduler/stats", (c) => {
    return c.json({
      ...store.getStats(now()),
      nextDueAt: store.nextDueAt(),
      scheduler: loop
        ? { running: loop.isRunning, inFlight: loop.inFlightCount, instanceId: store.instanceId }
        : null,
    });
  });

  // Run one tick now instead of waiting for the timer
  app.post("/api/scheduler/tick", async (c) => {
    if (!loop) return c.json({ error: "Scheduler is not attached" }, 503);
    return c.json(await loop.tickOnce());
  });

  app.get("/api/tournaments/schedule", (c) => {
    const timezone = c.req.query("tz") ?? deps.defaultTimezone;
    if (!isValidTimeZone(timezone)) {
      throw new ValidationError(`Unknown timezone "${timezone}"`, "tz");
    }
    const count = queryInt(c.req.query("count"), "count", 6, 1, 48);
    const tournaments = upcomingTournaments(now(), count, timezone);
    return c.json({ timezone, tournaments });
  });
}
