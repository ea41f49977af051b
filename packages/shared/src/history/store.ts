// =============================================================================
// @cadence/shared — Bounded report history
// =============================================================================
// The only state that survives between runs: a JSON document keyed by
// cadence, each value a chronological list of {date, summary}. Loaded once
// at run start, saved once at run end by full atomic overwrite.
// =============================================================================

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CADENCES, isCadence, type Cadence } from "../cadence.js";
import type { Logger } from "../logger.js";
import { HistoryDocumentSchema, HistoryEntrySchema } from "../schemas.js";
import { errorMessage } from "../text.js";
import type { HistoryEntry, HistoryStore } from "../types.js";

// ---------------------------------------------------------------------------
// Retention
// ---------------------------------------------------------------------------

export const RETENTION_LIMITS: Readonly<Record<Cadence, number>> = {
  daily: 30,
  weekly: 12,
  monthly: 12,
  quarterly: 8,
  semiAnnual: 4,
  annual: 3,
};

/** Key names written by earlier versions of the history file. */
const LEGACY_KEYS: Readonly<Record<string, Cadence>> = {
  semi_annual: "semiAnnual",
};

export function createEmptyHistory(): HistoryStore {
  return {
    daily: [],
    weekly: [],
    monthly: [],
    quarterly: [],
    semiAnnual: [],
    annual: [],
  };
}

/**
 * Appends an entry and immediately evicts the oldest entries beyond the
 * cadence's retention limit. Mutates `store`.
 */
export function appendHistory(
  store: HistoryStore,
  cadence: Cadence,
  entry: HistoryEntry,
): void {
  const entries = store[cadence];
  entries.push(entry);
  const overflow = entries.length - RETENTION_LIMITS[cadence];
  if (overflow > 0) entries.splice(0, overflow);
}

/** Timestamp label stored with each entry, e.g. "2025-11-01 07:00 UTC". */
export function formatHistoryDate(instant: Date): string {
  const iso = instant.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

// ---------------------------------------------------------------------------
// Document conversion
// ---------------------------------------------------------------------------

function readEntries(raw: unknown): HistoryEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: HistoryEntry[] = [];
  for (const candidate of raw) {
    const parsed = HistoryEntrySchema.safeParse(candidate);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}

function resolveKey(key: string): Cadence | null {
  if (isCadence(key)) return key;
  return LEGACY_KEYS[key] ?? null;
}

/**
 * Builds a store from a parsed JSON document. Unknown keys and malformed
 * entries are dropped; lists are trimmed to their retention limit.
 */
export function historyFromDocument(document: unknown): HistoryStore {
  const store = createEmptyHistory();
  const parsed = HistoryDocumentSchema.safeParse(document);
  if (!parsed.success) return store;

  for (const [key, value] of Object.entries(parsed.data)) {
    const cadence = resolveKey(key);
    if (!cadence) continue;
    for (const entry of readEntries(value)) {
      appendHistory(store, cadence, entry);
    }
  }
  return store;
}

// ---------------------------------------------------------------------------
// File persistence
// ---------------------------------------------------------------------------

export interface HistoryFile {
  /** Never rejects: missing or unreadable state yields an empty store. */
  load(): Promise<HistoryStore>;
  /** Atomic full overwrite. */
  save(store: HistoryStore): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export function createHistoryFile(path: string, logger: Logger): HistoryFile {
  return {
    async load(): Promise<HistoryStore> {
      let text: string;
      try {
        text = await readFile(path, "utf-8");
      } catch (err) {
        if (!isMissingFile(err)) {
          logger.warn("History file unreadable, starting empty", {
            path,
            error: errorMessage(err),
          });
        }
        return createEmptyHistory();
      }

      let document: unknown;
      try {
        document = JSON.parse(text);
      } catch (err) {
        logger.warn("History file is not valid JSON, starting empty", {
          path,
          error: errorMessage(err),
        });
        return createEmptyHistory();
      }

      const store = historyFromDocument(document);
      logger.debug("History loaded", {
        path,
        counts: Object.fromEntries(CADENCES.map((c) => [c, store[c].length])),
      });
      return store;
    },

    async save(store: HistoryStore): Promise<void> {
      const document = Object.fromEntries(CADENCES.map((c) => [c, store[c]]));
      const tmpPath = `${path}.${process.pid}.tmp`;

      await mkdir(dirname(path), { recursive: true });
      try {
        await writeFile(tmpPath, JSON.stringify(document, null, 2) + "\n", "utf-8");
        await rename(tmpPath, path);
      } catch (err) {
        await rm(tmpPath, { force: true });
        throw err;
      }
      logger.info("History saved", { path });
    },
  };
}
