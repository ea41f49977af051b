// =============================================================================
// @cadence/runner — Pipeline orchestrator
// =============================================================================
// One run, strictly in sequence:
//   ingest -> score -> select -> due cadences -> load history
//   -> per cadence: context -> analyze -> deliver -> compress + append
//   -> save history
// Only an empty ingestion or an empty selection aborts the run. Every other
// failure stays inside its batch or cadence.
// =============================================================================

import {
  analyzeCadence,
  appendHistory,
  buildContext,
  compressReport,
  dueCadences,
  errorMessage,
  formatHistoryDate,
  isErrorReport,
  scoreItems,
  selectTopFraction,
  type Cadence,
  type CompleteFn,
  type Config,
  type DeliverFn,
  type HistoryFile,
  type HistoryStore,
  type Item,
  type Logger,
  type ReportTemplates,
  type ScoredItem,
} from "@cadence/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Everything a run talks to. Collaborators are plain functions so tests can
 * swap any of them for a fake.
 */
export interface PipelineDependencies {
  config: Config;
  logger: Logger;
  complete: CompleteFn;
  templates: ReportTemplates;
  history: HistoryFile;
  ingest: () => Promise<Item[]>;
  deliver: DeliverFn;
  now: () => Date;
}

export type CadenceStatus =
  | "delivered"
  | "delivery_failed"
  | "analysis_failed"
  | "failed";

export interface CadenceOutcome {
  cadence: Cadence;
  status: CadenceStatus;
  summary?: string;
  error?: string;
}

export interface PipelineResult {
  status: "completed" | "aborted";
  reason?: string;
  ingested: number;
  selected: number;
  cadences: CadenceOutcome[];
}

// ---------------------------------------------------------------------------
// Per-cadence step
// ---------------------------------------------------------------------------

async function runCadence(
  cadence: Cadence,
  selected: readonly ScoredItem[],
  history: HistoryStore,
  deps: PipelineDependencies,
): Promise<CadenceOutcome> {
  const { config, complete, templates, deliver, now } = deps;
  const logger = deps.logger.child({ cadence });

  const context = buildContext(cadence, history);
  const report = await analyzeCadence(cadence, selected, context, {
    complete,
    model: config.TIER2_MODEL,
    templates,
    logger,
  });

  if (isErrorReport(report)) {
    logger.error("Cadence skipped: analysis produced no report");
    return { cadence, status: "analysis_failed" };
  }

  let status: CadenceStatus = "delivered";
  let deliveryError: string | undefined;
  try {
    await deliver(report, cadence);
  } catch (err) {
    // Delivery outcome does not gate the summary.
    status = "delivery_failed";
    deliveryError = errorMessage(err);
    logger.error("Report delivery failed", { error: deliveryError });
  }

  const summary = await compressReport(report, {
    complete,
    model: config.SUMMARY_MODEL,
    logger,
  });
  appendHistory(history, cadence, { date: formatHistoryDate(now()), summary });
  logger.info("Cadence complete", { status });

  return deliveryError === undefined
    ? { cadence, status, summary }
    : { cadence, status, summary, error: deliveryError };
}

// ---------------------------------------------------------------------------
// runPipeline
// ---------------------------------------------------------------------------

export async function runPipeline(
  deps: PipelineDependencies,
): Promise<PipelineResult> {
  const { config, logger, complete } = deps;

  const items = await deps.ingest();
  if (items.length === 0) {
    logger.fatal("No items ingested, aborting run");
    return {
      status: "aborted",
      reason: "no items ingested",
      ingested: 0,
      selected: 0,
      cadences: [],
    };
  }

  const scored = await scoreItems(items, {
    complete,
    model: config.TIER1_MODEL,
    logger,
  });
  const selected = selectTopFraction(scored);
  if (selected.length === 0) {
    logger.fatal("No items selected, aborting run", { ingested: items.length });
    return {
      status: "aborted",
      reason: "no items selected",
      ingested: items.length,
      selected: 0,
      cadences: [],
    };
  }
  logger.info("Top items selected", {
    selected: selected.map((item) => ({
      score: item.score,
      source: item.source,
      title: item.title.slice(0, 60),
    })),
  });

  const cadences = dueCadences(deps.now());
  logger.info("Cadences due", { cadences });

  const history = await deps.history.load();
  const outcomes: CadenceOutcome[] = [];

  for (const cadence of cadences) {
    try {
      outcomes.push(await runCadence(cadence, selected, history, deps));
    } catch (err) {
      const error = errorMessage(err);
      logger.error("Cadence failed", { cadence, error });
      outcomes.push({ cadence, status: "failed", error });
    }
  }

  await deps.history.save(history);

  return {
    status: "completed",
    ingested: items.length,
    selected: selected.length,
    cadences: outcomes,
  };
}
