// =============================================================================
// @cadence/shared — Tier-1 batch scorer
// =============================================================================
// Scores every ingested item 0-100 for investment relevance using the cheap
// Tier-1 model, SCORING_BATCH_SIZE items per request. Each batch recovers on
// its own: a failed call or an unusable response (one malformed score entry
// is enough) gives every item in that batch the fallback score.
//
// Known sharp edge: when the response parses but leaves items out, those
// items are missing from the output. Only whole-batch failures are
// backfilled.
// =============================================================================

import type { Logger } from "../logger.js";
import {
  ScoreEntrySchema,
  ScoringResponseSchema,
  type ScoreEntry,
} from "../schemas.js";
import { errorMessage, truncate } from "../text.js";
import type {
  CompleteFn,
  Item,
  ParseResult,
  ScoredItem,
} from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SCORING_BATCH_SIZE = 20;
export const FALLBACK_SCORE = 50;

const MAX_TOKENS = 2000;
const CONTENT_EXCERPT_CHARS = 500;

export interface ScoringDependencies {
  complete: CompleteFn;
  model: string;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export function buildScoringPrompt(batch: readonly Item[]): string {
  const lines = batch.map(
    (item, i) =>
      `[${i}] ${item.source} | ${item.title} | ${truncate(item.content, CONTENT_EXCERPT_CHARS)}`,
  );

  return [
    "You are a global investment strategist. Rate each news item below for its importance to investment decisions on a scale of 0-100.",
    "",
    "Criteria:",
    "- Market-wide impact (macro, rates, geopolitics)",
    "- Direct impact on a specific sector or asset class",
    "- Novelty (known story vs. new signal)",
    "- Actionability (can it turn into a concrete investment decision)",
    "",
    "Respond with JSON only, in exactly this shape and with no other text:",
    '{"scores": [{"id": 0, "score": 85, "reason": "one-line reason"}, ...]}',
    "",
    "News items:",
    ...lines,
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Response parsing helpers
// ---------------------------------------------------------------------------

/**
 * Finds the JSON object inside free-form model output: everything from the
 * first "{" to the last "}". Models like to wrap JSON in prose or fences.
 */
export function extractJsonObject(text: string): ParseResult<unknown> {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return { ok: false, error: "no JSON object found in response" };
  }

  try {
    return { ok: true, value: JSON.parse(text.slice(start, end + 1)) };
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }
}

/**
 * Parses a scoring response into its score entries.
 *
 * Any entry that does not validate (no integer `id`, a non-numeric `score`)
 * makes the whole response unusable. A missing `score` or `reason` takes its
 * default.
 */
export function parseScoringResponse(text: string): ParseResult<ScoreEntry[]> {
  const json = extractJsonObject(text);
  if (!json.ok) return json;

  const outer = ScoringResponseSchema.safeParse(json.value);
  if (!outer.success) {
    return { ok: false, error: `unexpected response shape: ${outer.error.message}` };
  }

  const entries: ScoreEntry[] = [];
  for (const [index, raw] of outer.data.scores.entries()) {
    const entry = ScoreEntrySchema.safeParse(raw);
    if (!entry.success) {
      return {
        ok: false,
        error: `invalid score entry at index ${index}: ${entry.error.issues
          .map((issue) => `${issue.path.join(".") || "(entry)"} ${issue.message}`)
          .join("; ")}`,
      };
    }
    entries.push(entry.data);
  }
  return { ok: true, value: entries };
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

function withFallbackScores(batch: readonly Item[]): ScoredItem[] {
  return batch.map((item) => ({ ...item, score: FALLBACK_SCORE, reason: "" }));
}

function applyScores(
  batch: readonly Item[],
  entries: readonly ScoreEntry[],
): ScoredItem[] {
  const scored: ScoredItem[] = [];
  const seen = new Set<number>();

  for (const entry of entries) {
    if (entry.id < 0 || entry.id >= batch.length || seen.has(entry.id)) {
      continue;
    }
    const item = batch[entry.id];
    if (!item) continue;
    seen.add(entry.id);
    scored.push({ ...item, score: entry.score, reason: entry.reason });
  }

  return scored;
}

async function scoreBatch(
  batch: readonly Item[],
  batchStart: number,
  deps: ScoringDependencies,
): Promise<ScoredItem[]> {
  const { complete, model, logger } = deps;

  let responseText: string;
  try {
    responseText = await complete({
      model,
      maxTokens: MAX_TOKENS,
      prompt: buildScoringPrompt(batch),
    });
  } catch (err) {
    logger.warn("Scoring call failed, using fallback scores", {
      batchStart,
      batchSize: batch.length,
      error: errorMessage(err),
    });
    return withFallbackScores(batch);
  }

  const parsed = parseScoringResponse(responseText);
  if (!parsed.ok) {
    logger.warn("Scoring response unreadable, using fallback scores", {
      batchStart,
      batchSize: batch.length,
      error: parsed.error,
    });
    return withFallbackScores(batch);
  }

  const scored = applyScores(batch, parsed.value);
  if (scored.length < batch.length) {
    logger.warn("Scoring response omitted items", {
      batchStart,
      batchSize: batch.length,
      dropped: batch.length - scored.length,
    });
  }
  return scored;
}

/**
 * Scores items in sequential batches of SCORING_BATCH_SIZE.
 *
 * Every item of a failed batch is returned with FALLBACK_SCORE. Items left
 * out of a successful response are not returned.
 */
export async function scoreItems(
  items: readonly Item[],
  deps: ScoringDependencies,
): Promise<ScoredItem[]> {
  const scored: ScoredItem[] = [];

  for (let start = 0; start < items.length; start += SCORING_BATCH_SIZE) {
    const batch = items.slice(start, start + SCORING_BATCH_SIZE);
    scored.push(...(await scoreBatch(batch, start, deps)));
  }

  deps.logger.info("Tier-1 scoring complete", {
    items: items.length,
    scored: scored.length,
  });
  return scored;
}
