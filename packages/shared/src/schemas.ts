// =============================================================================
// @cadence/shared — Zod schemas for collaborator responses and stored state
// =============================================================================
// Score entries and history entries are checked one by one by their callers.
// A malformed score entry fails its whole response; a malformed history entry
// is skipped.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Tier-1 scoring response: {"scores": [{"id", "score", "reason"}, ...]}
// ---------------------------------------------------------------------------

export const ScoringResponseSchema = z.object({
  scores: z.array(z.unknown()).default([]),
});

export const ScoreEntrySchema = z.object({
  id: z.number().int(),
  score: z
    .number()
    .default(0)
    .transform((s) => Math.min(100, Math.max(0, Math.round(s)))),
  reason: z.string().default(""),
});
export type ScoreEntry = z.infer<typeof ScoreEntrySchema>;

// ---------------------------------------------------------------------------
// Persisted history document
// ---------------------------------------------------------------------------

export const HistoryEntrySchema = z.object({
  date: z.string(),
  summary: z.string(),
});

export const HistoryDocumentSchema = z.record(z.string(), z.unknown());
