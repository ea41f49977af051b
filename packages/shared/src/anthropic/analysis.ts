// =============================================================================
// @cadence/shared — Tier-2 deep analyzer
// =============================================================================
// Assembles one report request per due cadence (template + accumulated
// context + selected items) and asks the Tier-2 model for the full HTML
// report. A failed call yields an error report carrying
// ANALYSIS_ERROR_MARKER instead of an exception.
// =============================================================================

import type { Cadence } from "../cadence.js";
import type { Logger } from "../logger.js";
import type { ReportTemplates } from "../reports/templates.js";
import { cleanReportBody, errorMessage, escapeHtml, truncate } from "../text.js";
import type { CompleteFn, ScoredItem } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ANALYSIS_ERROR_MARKER = "<!-- report:analysis-error -->";

const MAX_TOKENS = 8000;
const CONTENT_EXCERPT_CHARS = 1500;

export interface AnalysisDependencies {
  complete: CompleteFn;
  model: string;
  templates: ReportTemplates;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Prompt assembly
// ---------------------------------------------------------------------------

export function renderItemsForReport(items: readonly ScoredItem[]): string {
  return items
    .map((item) =>
      [
        `[${item.source}] (Score: ${item.score}) ${item.title}`,
        `  Content: ${truncate(item.content, CONTENT_EXCERPT_CHARS)}`,
        `  Date: ${item.publishedLabel} | Link: ${item.link}`,
      ].join("\n"),
    )
    .join("\n\n");
}

export function buildReportPrompt(
  template: string,
  context: string,
  items: readonly ScoredItem[],
): string {
  const sections = [template.trim()];

  if (context) {
    sections.push(
      `**[Accumulated context: summaries of earlier reports]**\n${context}`,
    );
  }

  sections.push(
    "---",
    `**[Key news selected by Tier-1 screening]**\n${renderItemsForReport(items)}`,
  );

  return sections.join("\n\n");
}

// ---------------------------------------------------------------------------
// Error reports
// ---------------------------------------------------------------------------

export function buildErrorReport(err: unknown): string {
  const parts = [
    ANALYSIS_ERROR_MARKER,
    "<h3>Analysis error</h3>",
    `<p>${escapeHtml(errorMessage(err))}</p>`,
  ];
  if (err instanceof Error && err.stack) {
    parts.push(`<pre>${escapeHtml(err.stack)}</pre>`);
  }
  return parts.join("\n");
}

/** True when a report must not be delivered or summarized. */
export function isErrorReport(report: string): boolean {
  return report.trim() === "" || report.includes(ANALYSIS_ERROR_MARKER);
}

// ---------------------------------------------------------------------------
// analyzeCadence
// ---------------------------------------------------------------------------

export async function analyzeCadence(
  cadence: Cadence,
  items: readonly ScoredItem[],
  context: string,
  deps: AnalysisDependencies,
): Promise<string> {
  const { complete, model, templates, logger } = deps;
  const prompt = buildReportPrompt(templates.templateFor(cadence), context, items);

  logger.info("Tier-2 analysis starting", {
    cadence,
    items: items.length,
    hasContext: context !== "",
  });

  try {
    const text = await complete({ model, maxTokens: MAX_TOKENS, prompt });
    return cleanReportBody(text);
  } catch (err) {
    logger.error("Tier-2 analysis failed", { cadence, error: errorMessage(err) });
    return buildErrorReport(err);
  }
}
