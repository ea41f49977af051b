// =============================================================================
// Tests for the pipeline orchestrator
// =============================================================================
// Every collaborator is an in-process fake: completions are routed by model
// name, history lives in memory, delivery is a vi.fn.
// =============================================================================

import { describe, it, expect, vi } from "vitest";
import {
  createEmptyHistory,
  type Cadence,
  type CompleteFn,
  type CompletionRequest,
  type DeliverFn,
  type ReportTemplates,
} from "@cadence/shared";
import { runPipeline, type PipelineDependencies } from "../pipeline.js";
import { createRecordingLogger, makeItems } from "@cadence/shared/testing";
import { createMemoryHistory, promptCadence, scoreByHeadline, testConfig } from "./fakes.js";

// ---------------------------------------------------------------------------
// Fixture
// ---------------------------------------------------------------------------

// Saturday the 1st: daily, weekly and monthly are due.
const RUN_AT = new Date("2025-11-01T07:00:00Z");
const STAMP = "2025-11-01 07:00 UTC";

type Tier2 = (request: CompletionRequest) => Promise<string>;

const defaultTier2: Tier2 = async (request) => `<h3>Report ${promptCadence(request)}</h3>`;

function routedComplete(tier2: Tier2 = defaultTier2) {
  return vi.fn<CompleteFn>(async (request) => {
    switch (request.model) {
      case "tier1-test":
        return scoreByHeadline(request);
      case "tier2-test":
        return tier2(request);
      case "summary-test":
        return `Summary of ${request.prompt.split("\n").at(-1) ?? ""}`;
      default:
        throw new Error(`unexpected model ${request.model}`);
    }
  });
}

const templates: ReportTemplates = {
  templateFor: (cadence) => `TEMPLATE ${cadence}`,
  reloadTemplates: () => undefined,
};

function setup(overrides: Partial<PipelineDependencies> = {}) {
  const { logger, records } = createRecordingLogger();
  const history = createMemoryHistory();
  const deliver = vi.fn<DeliverFn>(async () => undefined);
  const complete = routedComplete();

  const deps: PipelineDependencies = {
    config: testConfig(),
    logger,
    complete,
    templates,
    history,
    ingest: async () => makeItems(45),
    deliver,
    now: () => RUN_AT,
    ...overrides,
  };
  return { deps, records, history, deliver, complete };
}

function tier2Prompts(complete: ReturnType<typeof routedComplete>): Map<string, string> {
  return new Map(
    complete.mock.calls
      .map(([request]) => request)
      .filter((request) => request.model === "tier2-test")
      .map((request) => [promptCadence(request), request.prompt] as const),
  );
}

function entry(summary: string) {
  return { date: STAMP, summary };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runPipeline", () => {
  it("should score, select, report every due cadence and save history once", async () => {
    const { deps, history, deliver, complete } = setup();

    const result = await runPipeline(deps);

    expect(result).toEqual({
      status: "completed",
      ingested: 45,
      selected: 3,
      cadences: [
        { cadence: "daily", status: "delivered", summary: "Summary of <h3>Report daily</h3>" },
        { cadence: "weekly", status: "delivered", summary: "Summary of <h3>Report weekly</h3>" },
        { cadence: "monthly", status: "delivered", summary: "Summary of <h3>Report monthly</h3>" },
      ],
    });

    // 3 scoring batches, then one analysis and one summary per cadence.
    expect(complete.mock.calls.map(([request]) => request.model)).toEqual([
      "tier1-test",
      "tier1-test",
      "tier1-test",
      "tier2-test",
      "summary-test",
      "tier2-test",
      "summary-test",
      "tier2-test",
      "summary-test",
    ]);
    expect(deliver.mock.calls).toEqual([
      ["<h3>Report daily</h3>", "daily"],
      ["<h3>Report weekly</h3>", "weekly"],
      ["<h3>Report monthly</h3>", "monthly"],
    ]);

    expect(history.loads).toBe(1);
    expect(history.saved).toEqual([
      {
        ...createEmptyHistory(),
        daily: [entry("Summary of <h3>Report daily</h3>")],
        weekly: [entry("Summary of <h3>Report weekly</h3>")],
        monthly: [entry("Summary of <h3>Report monthly</h3>")],
      },
    ]);
  });

  it("should hand the top three items to Tier-2, best first", async () => {
    const { deps, complete } = setup();
    await runPipeline(deps);

    const daily = tier2Prompts(complete).get("daily") ?? "";
    const headlines = [...daily.matchAll(/^\[Test Wire\] \(Score: (\d+)\) (.+)$/gm)].map(
      (m) => `${m[1]} ${m[2]}`,
    );
    expect(headlines).toEqual(["44 Headline 44", "43 Headline 43", "42 Headline 42"]);
  });

  it("should give coarser cadences the summaries written earlier in the same run", async () => {
    const { deps, complete } = setup();
    await runPipeline(deps);
    const prompts = tier2Prompts(complete);

    expect(prompts.get("daily")).not.toContain("Accumulated context");
    expect(prompts.get("weekly")).toContain(
      [
        "**[Accumulated context: summaries of earlier reports]**",
        "[Last 1 Daily Briefing report summaries]",
        `- ${STAMP}: Summary of <h3>Report daily</h3>`,
      ].join("\n"),
    );
    expect(prompts.get("monthly")).toContain(
      `[Last 1 Weekly Strategy report summaries]\n- ${STAMP}: Summary of <h3>Report weekly</h3>`,
    );
  });

  it("should run only daily on an ordinary weekday", async () => {
    const { deps, deliver } = setup({ now: () => new Date("2025-11-05T22:00:00Z") });

    const result = await runPipeline(deps);

    expect(result.cadences.map((c) => c.cadence)).toEqual(["daily"]);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it("should abort without saving when nothing was ingested", async () => {
    const { deps, history, complete, records } = setup({ ingest: async () => [] });

    const result = await runPipeline(deps);

    expect(result).toEqual({
      status: "aborted",
      reason: "no items ingested",
      ingested: 0,
      selected: 0,
      cadences: [],
    });
    expect(complete).not.toHaveBeenCalled();
    expect(history.loads).toBe(0);
    expect(history.saved).toEqual([]);
    expect(records.some((r) => r.level === "fatal" && r.msg === "No items ingested, aborting run")).toBe(true);
  });

  it("should abort without saving when scoring leaves nothing to select", async () => {
    const complete = vi.fn<CompleteFn>(async () => '{"scores": []}');
    const { deps, history, deliver } = setup({ complete });

    const result = await runPipeline(deps);

    expect(result).toEqual({
      status: "aborted",
      reason: "no items selected",
      ingested: 45,
      selected: 0,
      cadences: [],
    });
    expect(complete).toHaveBeenCalledTimes(3);
    expect(deliver).not.toHaveBeenCalled();
    expect(history.saved).toEqual([]);
  });

  it("should skip delivery and summary for a cadence whose analysis failed", async () => {
    const complete = routedComplete(async (request) => {
      if (promptCadence(request) === "weekly") throw new Error("model overloaded");
      return defaultTier2(request);
    });
    const { deps, history, deliver, records } = setup({ complete });

    const result = await runPipeline(deps);

    expect(result.status).toBe("completed");
    expect(result.cadences.map((c) => [c.cadence, c.status])).toEqual([
      ["daily", "delivered"],
      ["weekly", "analysis_failed"],
      ["monthly", "delivered"],
    ]);
    expect(deliver.mock.calls.map(([, cadence]) => cadence)).toEqual(["daily", "monthly"]);
    expect(history.saved[0]?.weekly).toEqual([]);
    expect(tier2Prompts(complete).get("monthly")).not.toContain("Accumulated context");
    expect(records).toContainEqual({
      level: "error",
      msg: "Cadence skipped: analysis produced no report",
      data: { cadence: "weekly" },
    });
  });

  it("should treat an empty analysis as a failure", async () => {
    const complete = routedComplete(async () => "  ");
    const { deps, deliver, history } = setup({ complete, now: () => new Date("2025-11-05T22:00:00Z") });

    const result = await runPipeline(deps);

    expect(result.cadences).toEqual([{ cadence: "daily", status: "analysis_failed" }]);
    expect(deliver).not.toHaveBeenCalled();
    expect(history.saved).toEqual([createEmptyHistory()]);
  });

  it("should still summarize a report whose delivery failed", async () => {
    const deliver = vi.fn<DeliverFn>(async (_report: string, cadence: Cadence) => {
      if (cadence === "daily") throw new Error("SMTP auth failed");
    });
    const { deps, history } = setup({ deliver });

    const result = await runPipeline(deps);

    expect(result.cadences[0]).toEqual({
      cadence: "daily",
      status: "delivery_failed",
      summary: "Summary of <h3>Report daily</h3>",
      error: "SMTP auth failed",
    });
    expect(result.cadences[1]?.status).toBe("delivered");
    expect(history.saved[0]?.daily).toEqual([entry("Summary of <h3>Report daily</h3>")]);
  });

  it("should contain an unexpected error to its cadence", async () => {
    const failingTemplates: ReportTemplates = {
      templateFor: (cadence) => {
        if (cadence === "weekly") throw new Error("template store offline");
        return `TEMPLATE ${cadence}`;
      },
      reloadTemplates: () => undefined,
    };
    const { deps, history } = setup({ templates: failingTemplates });

    const result = await runPipeline(deps);

    expect(result.cadences.map((c) => [c.cadence, c.status, c.error])).toEqual([
      ["daily", "delivered", undefined],
      ["weekly", "failed", "template store offline"],
      ["monthly", "delivered", undefined],
    ]);
    expect(history.saved).toHaveLength(1);
  });

  it("should keep existing history and trim it on append", async () => {
    const initial = createEmptyHistory();
    initial.daily = Array.from({ length: 30 }, (_, i) => ({ date: `old-${i}`, summary: `s${i}` }));
    const history = createMemoryHistory(initial);
    const { deps } = setup({ history, now: () => new Date("2025-11-05T22:00:00Z") });

    await runPipeline(deps);

    const daily = history.saved[0]?.daily ?? [];
    expect(daily).toHaveLength(30);
    expect(daily[0]?.date).toBe("old-1");
    expect(daily[29]).toEqual({
      date: "2025-11-05 22:00 UTC",
      summary: "Summary of <h3>Report daily</h3>",
    });
  });
});
