/**
 * Remindly Server - Main Entry Point
 *
 * Opens the reminder database, starts the scheduler loop and serves the
 * HTTP API. SIGINT/SIGTERM drain in-flight deliveries before exiting.
 */

import { serve } from "@hono/node-server";
import { loadConfig, loadEnvFile } from "./config.js";
import { closeDatabase, initDatabase } from "./db/index.js";
import { createComponentLogger, initServerLogging } from "./logging.js";
import { TelegramMessenger } from "./messaging/telegram.js";
import { createApp } from "./routes/app.js";
import { Dispatcher } from "./services/reminders/dispatcher.js";
import { DueSetScanner } from "./services/reminders/scanner.js";
import { SchedulerLoop } from "./services/reminders/scheduler.js";
import { ReminderStore } from "./services/reminders/store.js";
import { TournamentReconciler } from "./services/reminders/tournaments.js";

loadEnvFile();
const config = loadConfig();

const rootLogger = initServerLogging({
  minLevel: config.logging.level,
  logDir: config.logging.dir,
  instanceId: config.instanceId,
});
const log = createComponentLogger("main");

for (const warning of config.warnings) {
  log.warn(`Config: ${warning}`);
}

async function main(): Promise<void> {
  const token = config.telegram.token;
  if (!token) {
    log.fatal("TELEGRAM_BOT_TOKEN is not set");
    await rootLogger.close();
    process.exit(1);
  }

  // ============================================
  // WIRING
  // ============================================

  const db = initDatabase(config.databasePath);
  const store = new ReminderStore(db, {
    defaultTimezone: config.defaultTimezone,
    leaseMs: config.leaseMs,
    instanceId: config.instanceId,
  });
  const messenger = new TelegramMessenger({ token, apiBase: config.telegram.apiBase });
  const scanner = new DueSetScanner(store, { batchLimit: config.scheduler.batchLimit });
  const dispatcher = new Dispatcher({ store, messenger, options: config.dispatcher });
  const tournaments = new TournamentReconciler(store);
  const loop = new SchedulerLoop({ store, scanner, dispatcher, tournaments, config: config.scheduler });

  loop.onEvent((event) => {
    log.debug(`Scheduler ${event.type}`, { reminderId: event.reminderId, chatId: event.chatId, ...event.details });
  });

  const app = createApp({ store, loop, tournaments, defaultTimezone: config.defaultTimezone });

  // ============================================
  // STARTUP
  // ============================================

  loop.start();
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info("HTTP API listening", { port: info.port, instanceId: config.instanceId });
  });

  // ============================================
  // SHUTDOWN
  // ============================================

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down", { signal });

    const abandoned = await loop.stop(config.scheduler.drainTimeoutMs);
    if (abandoned > 0) {
      log.warn("Exiting with deliveries in flight; their leases will expire", { abandoned });
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    closeDatabase();
    await rootLogger.close();
    process.exit(0);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        log.fatal("Shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch(async (error) => {
  log.fatal("Server failed to start", error);
  await rootLogger.close();
  process.exit(1);
});
