// =============================================================================
// @cadence/shared — Summary compressor
// =============================================================================
// Condenses a delivered report into the short memory entry that coarser
// cadences will later read as context. Never throws: on failure the
// sentinel text is stored so the history entry still exists.
// =============================================================================

import type { Logger } from "../logger.js";
import { errorMessage, truncate } from "../text.js";
import type { CompleteFn } from "../types.js";

export const SUMMARY_FAILED = "summary generation failed";

const MAX_TOKENS = 300;
const REPORT_EXCERPT_CHARS = 3000;

export interface SummaryDependencies {
  complete: CompleteFn;
  model: string;
  logger: Logger;
}

export function buildSummaryPrompt(report: string): string {
  return [
    "Summarize the following investment report in three key sentences:",
    "",
    truncate(report, REPORT_EXCERPT_CHARS),
  ].join("\n");
}

export async function compressReport(
  report: string,
  deps: SummaryDependencies,
): Promise<string> {
  const { complete, model, logger } = deps;

  try {
    const summary = (
      await complete({
        model,
        maxTokens: MAX_TOKENS,
        prompt: buildSummaryPrompt(report),
      })
    ).trim();
    if (summary) return summary;
    logger.warn("Summary response was empty");
  } catch (err) {
    logger.warn("Summary generation failed", { error: errorMessage(err) });
  }
  return SUMMARY_FAILED;
}
