// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@csv-sync/worker/main`
 * Purpose: Service entry point — cron-scheduled sync runs plus manual dispatch, with graceful shutdown.
 * Scope: Entry point that calls env() and starts the scheduler and health server. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Invalid cron fails startup before ready=true
 *   - Handles SIGTERM/SIGINT: ready=false first, then waits for in-flight runs
 * Side-effects: IO (HTTP server, timers, process signals)
 * Links: scheduler.ts, health.ts, bootstrap/container.ts
 * @public
 */

import { createSyncContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import { type HealthState, startHealthServer } from "./health.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { SyncScheduler } from "./scheduler.js";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger();

  const container = createSyncContainer(config, logger);
  logger.info(
    {
      mode: container.mode,
      cron: config.SYNC_CRON,
      timezone: config.SYNC_TIMEZONE,
      secretName: config.SYNC_SECRET_NAME,
    },
    "Starting CSV sync worker"
  );

  const scheduler = new SyncScheduler({
    cron: config.SYNC_CRON,
    timezone: config.SYNC_TIMEZONE,
    job: container.job,
    logger: logger.child({ component: "scheduler" }),
    allowOverlap: container.allowOverlap,
  });
  scheduler.start();

  const healthState: HealthState = { ready: false };
  const server = startHealthServer(healthState, config.HEALTH_PORT, {
    onDispatch: () => scheduler.dispatch("manual"),
  });
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  healthState.ready = true;
  logger.info(
    { nextRunAt: scheduler.nextRunAt?.toISOString() ?? null },
    "Worker ready"
  );

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false;
    logger.info(
      { signal, activeRuns: scheduler.activeRuns },
      "Received signal, shutting down"
    );

    try {
      await scheduler.stop();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      logger.info({}, "Worker stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
