// =============================================================================
// @cadence/shared — Pipeline record types
// =============================================================================
// Items flow ingest -> score -> select -> analyze. History entries are the
// only records that outlive a run.
// =============================================================================

import type { Cadence } from "./cadence.js";

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

/**
 * A news item as handed over by the ingestion collaborator. All text fields
 * are sanitized plain text. Identity is positional within a scoring batch.
 */
export interface Item {
  readonly source: string;
  readonly title: string;
  readonly content: string;
  /** Publication date exactly as the feed printed it (may be empty). */
  readonly publishedLabel: string;
  readonly link: string;
}

export interface ScoredItem extends Item {
  /** Integer importance score, 0-100. */
  readonly score: number;
  readonly reason: string;
}

// ---------------------------------------------------------------------------
// Scheduling
// ---------------------------------------------------------------------------

/** Cadences due on one instant, in fixed order, `daily` first. */
export type ScheduleDecision = readonly Cadence[];

export interface CivilDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  /** 0 = Sunday ... 6 = Saturday */
  weekday: number;
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

export interface HistoryEntry {
  readonly date: string;
  readonly summary: string;
}

/** Per-cadence chronological log of report summaries (oldest first). */
export type HistoryStore = Record<Cadence, HistoryEntry[]>;

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  prompt: string;
}

/** Single-turn text completion used for scoring, analysis and compression. */
export type CompleteFn = (request: CompletionRequest) => Promise<string>;

/** Transmits a rendered report. Rejects on failure. */
export type DeliverFn = (report: string, cadence: Cadence) => Promise<void>;

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };
