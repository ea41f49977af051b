// =============================================================================
// @cadence/runner — Entry point
// =============================================================================
// Builds the runner from the environment, then either runs once and exits
// (0 completed, 1 aborted or fatal) or, with CRON_ENABLED=true, keeps the
// cron trigger alive until SIGINT/SIGTERM.
// =============================================================================

import { ZodError } from "zod";
import { createLogger, describeConfigError, errorMessage } from "@cadence/shared";
import { createRunner, type Runner } from "./app.js";
import { startScheduler, type SchedulerHandle } from "./scheduler.js";

function buildRunner(): Runner {
  try {
    return createRunner();
  } catch (err) {
    // No config yet, so no configured log level either.
    const logger = createLogger();
    if (err instanceof ZodError) {
      logger.fatal("Invalid configuration", { issues: describeConfigError(err) });
    } else {
      logger.fatal("Startup failed", { error: errorMessage(err) });
    }
    process.exit(1);
  }
}

const runner = buildRunner();
const { config, logger } = runner;

function buildScheduler(): SchedulerHandle {
  try {
    return startScheduler(runner);
  } catch (err) {
    logger.fatal("Cron scheduler failed to start", { error: errorMessage(err) });
    process.exit(1);
  }
}

if (config.CRON_ENABLED) {
  const scheduler = buildScheduler();

  // Signal handlers are registered here so createRunner stays reusable.
  const handleShutdown = (): void => {
    scheduler.stop();
    process.exit(0);
  };

  process.once("SIGTERM", handleShutdown);
  process.once("SIGINT", handleShutdown);
} else {
  runner
    .run()
    .then((result) => {
      process.exit(result.status === "completed" ? 0 : 1);
    })
    .catch((err: unknown) => {
      logger.fatal("Run failed", { error: errorMessage(err) });
      process.exit(1);
    });
}

