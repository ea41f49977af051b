// =============================================================================
// @cadence/runner — Cron trigger
// =============================================================================
// Wraps node-cron to start a pipeline run on CRON_SCHEDULE (default 07:00 and
// 22:00 in CRON_TIMEZONE). A tick that arrives while the previous run is
// still going is skipped. Returns a handle with stop() for shutdown.
// =============================================================================

import cron, { type ScheduledTask } from "node-cron";
import { errorMessage } from "@cadence/shared";
import type { Runner } from "./app.js";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(runner: Runner): SchedulerHandle {
  const { config, logger } = runner;

  if (!cron.validate(config.CRON_SCHEDULE)) {
    throw new Error(`Invalid CRON_SCHEDULE: "${config.CRON_SCHEDULE}"`);
  }

  let running = false;

  async function tick(): Promise<void> {
    if (running) {
      logger.warn("Cron tick skipped: previous run still in progress");
      return;
    }
    running = true;
    const start = performance.now();
    logger.info("Cron run starting");
    try {
      const result = await runner.run();
      logger.info("Cron run completed", {
        durationMs: Math.round(performance.now() - start),
        status: result.status,
      });
    } catch (err) {
      logger.error("Cron run failed", {
        durationMs: Math.round(performance.now() - start),
        error: errorMessage(err),
      });
    } finally {
      running = false;
    }
  }

  const task: ScheduledTask = cron.schedule(config.CRON_SCHEDULE, tick, {
    timezone: config.CRON_TIMEZONE,
  });

  logger.info("Cron scheduler started", {
    schedule: config.CRON_SCHEDULE,
    timezone: config.CRON_TIMEZONE,
  });

  return {
    stop() {
      task.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
