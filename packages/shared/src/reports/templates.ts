// =============================================================================
// @cadence/shared — Report template engine
// =============================================================================
// Loads and caches the per-cadence report skeletons from the filesystem.
// Each cadence has exactly one template file; the file name is chosen by an
// exhaustive switch so a new cadence cannot ship without one.
// =============================================================================

import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { cadenceLabel, type Cadence } from "../cadence.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportTemplates {
  /** The report skeleton for a cadence (built-in fallback if its file is missing). */
  templateFor(cadence: Cadence): string;
  /** Re-reads all templates from disk. */
  reloadTemplates(): void;
}

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(
  new URL("../../templates/", import.meta.url),
);

export function templateFileFor(cadence: Cadence): string {
  switch (cadence) {
    case "daily":
      return "daily.txt";
    case "weekly":
      return "weekly.txt";
    case "monthly":
      return "monthly.txt";
    case "quarterly":
      return "quarterly.txt";
    case "semiAnnual":
      return "semi-annual.txt";
    case "annual":
      return "annual.txt";
  }
}

export function fallbackTemplate(cadence: Cadence): string {
  return [
    `# ${cadenceLabel(cadence)}`,
    "",
    "Write an HTML email report analysing the news items below for an investor.",
    "Use <h3> chapter titles, <ul><li> lists and <b> emphasis. No Markdown.",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createReportTemplates(
  templateDir: string = DEFAULT_TEMPLATE_DIR,
): ReportTemplates {
  const cache = new Map<string, string>();

  function loadTemplates(): void {
    cache.clear();

    let files: string[];
    try {
      files = readdirSync(templateDir).filter((f) => f.endsWith(".txt"));
    } catch {
      files = [];
    }

    for (const file of files) {
      cache.set(file, readFileSync(join(templateDir, file), "utf-8"));
    }
  }

  // Load on creation
  loadTemplates();

  return {
    templateFor(cadence: Cadence): string {
      return cache.get(templateFileFor(cadence)) ?? fallbackTemplate(cadence);
    },

    reloadTemplates(): void {
      loadTemplates();
    },
  };
}
