/**
 * HTTP App
 *
 * Builds the Hono app without binding a port, so tests drive it through
 * `app.request()`.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { installErrorHandler, type RouteDeps } from "./helpers.js";
import { registerChatRoutes } from "./chats.js";
import { registerReminderRoutes } from "./reminders.js";
import { registerSchedulerRoutes } from "./scheduler.js";

export type AppDeps = RouteDeps;

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("*", cors());

  app.get("/health", (c) => c.json({ ok: true }));

  registerChatRoutes(app, deps);
  registerReminderRoutes(app, deps);
  registerSchedulerRoutes(app, deps);

  installErrorHandler(app);
  return app;
}
