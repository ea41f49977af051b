// =============================================================================
// @cadence/runner — Runner factory
// =============================================================================
// Loads config once, builds every collaborator (Anthropic completion, feed
// ingestion, templates, history file, SMTP delivery) and returns a runner
// whose run() executes one pipeline pass with a fresh runId.
// =============================================================================

import {
  createAnthropicClient,
  createCompletion,
  createHistoryFile,
  createLogger,
  createReportTemplates,
  createRunId,
  loadConfig,
  type Config,
  type Logger,
} from "@cadence/shared";
import { DEFAULT_FEED_SOURCES, ingestFeeds } from "@cadence/ingest";
import { createEmailDelivery } from "./delivery/email.js";
import {
  runPipeline,
  type PipelineDependencies,
  type PipelineResult,
} from "./pipeline.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Runner {
  config: Config;
  logger: Logger;
  /** Runs one pipeline pass. */
  run(): Promise<PipelineResult>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Throws a ZodError when the environment does not validate.
 */
export function createRunner(env?: Record<string, string | undefined>): Runner {
  const config = loadConfig(env);
  const logger = createLogger({ level: config.LOG_LEVEL });
  const sources = config.FEED_SOURCES ?? DEFAULT_FEED_SOURCES;
  const client = createAnthropicClient(config.ANTHROPIC_API_KEY);
  const templates = createReportTemplates();

  logger.info("Runner configured", {
    tier1Model: config.TIER1_MODEL,
    tier2Model: config.TIER2_MODEL,
    summaryModel: config.SUMMARY_MODEL,
    historyFile: config.HISTORY_FILE,
    feeds: Object.keys(sources).length,
    smtpHost: config.SMTP_HOST,
  });

  function buildDependencies(runLogger: Logger): PipelineDependencies {
    return {
      config,
      logger: runLogger,
      complete: createCompletion(client, runLogger),
      templates,
      history: createHistoryFile(config.HISTORY_FILE, runLogger),
      ingest: () =>
        ingestFeeds(sources, {
          logger: runLogger,
          itemsPerSource: config.FEED_ITEMS_PER_SOURCE,
          maxContentChars: config.FEED_CONTENT_MAX_CHARS,
          timeoutMs: config.FEED_TIMEOUT_MS,
        }),
      deliver: createEmailDelivery(config, runLogger),
      now: () => new Date(),
    };
  }

  async function run(): Promise<PipelineResult> {
    const runLogger = logger.child({ runId: createRunId() });
    const start = performance.now();
    runLogger.info("Run starting");

    // Template edits take effect on the next run.
    templates.reloadTemplates();
    const result = await runPipeline(buildDependencies(runLogger));

    runLogger.info("Run finished", {
      status: result.status,
      reason: result.reason,
      ingested: result.ingested,
      selected: result.selected,
      cadences: result.cadences.map((c) => ({ cadence: c.cadence, status: c.status })),
      durationMs: Math.round(performance.now() - start),
    });
    return result;
  }

  return { config, logger, run };
}
