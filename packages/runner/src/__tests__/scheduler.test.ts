// =============================================================================
// Tests for the cron trigger
// =============================================================================
// node-cron is replaced by a fake that captures the scheduled callback so
// ticks can be fired by hand.
// =============================================================================

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Runner } from "../app.js";
import type { PipelineResult } from "../pipeline.js";
import { startScheduler } from "../scheduler.js";
import { createRecordingLogger } from "@cadence/shared/testing";
import { testConfig } from "./fakes.js";

const cronMock = vi.hoisted(() => {
  const state: { tick: (() => unknown) | undefined } = { tick: undefined };
  const stop = vi.fn();
  return {
    state,
    stop,
    validate: vi.fn((expression: string) => expression !== "not a cron"),
    schedule: vi.fn(
      (_expression: string, fn: () => unknown, _options?: { timezone?: string }) => {
        state.tick = fn;
        return { stop };
      },
    ),
  };
});

vi.mock("node-cron", () => ({
  default: { validate: cronMock.validate, schedule: cronMock.schedule },
}));

const COMPLETED: PipelineResult = {
  status: "completed",
  ingested: 10,
  selected: 3,
  cadences: [],
};

function createRunner(overrides: Record<string, string> = {}) {
  const { logger, records } = createRecordingLogger();
  const run = vi.fn<Runner["run"]>(async () => COMPLETED);
  const runner: Runner = {
    config: testConfig({ CRON_ENABLED: "true", ...overrides }),
    logger,
    run,
  };
  return { runner, run, records };
}

describe("startScheduler", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    cronMock.state.tick = undefined;
  });

  it("should schedule one task on the configured expression and zone", () => {
    const { runner } = createRunner({ CRON_SCHEDULE: "30 6 * * *", CRON_TIMEZONE: "Asia/Seoul" });

    startScheduler(runner);

    expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    expect(cronMock.schedule.mock.calls[0]?.[0]).toBe("30 6 * * *");
    expect(cronMock.schedule.mock.calls[0]?.[2]).toEqual({ timezone: "Asia/Seoul" });
  });

  it("should refuse an invalid expression", () => {
    const { runner } = createRunner({ CRON_SCHEDULE: "not a cron" });

    expect(() => startScheduler(runner)).toThrow('Invalid CRON_SCHEDULE: "not a cron"');
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it("should run the pipeline on each tick", async () => {
    const { runner, run, records } = createRunner();
    startScheduler(runner);

    await cronMock.state.tick?.();
    await cronMock.state.tick?.();

    expect(run).toHaveBeenCalledTimes(2);
    expect(records.filter((r) => r.msg === "Cron run completed")).toHaveLength(2);
  });

  it("should skip a tick while the previous run is still going", async () => {
    const { runner, run, records } = createRunner();
    const pending: { finish?: () => void } = {};
    run.mockImplementationOnce(
      () =>
        new Promise<PipelineResult>((resolve) => {
          pending.finish = () => resolve(COMPLETED);
        }),
    );
    startScheduler(runner);

    const first = cronMock.state.tick?.();
    await cronMock.state.tick?.();
    expect(run).toHaveBeenCalledTimes(1);
    expect(records.some((r) => r.msg === "Cron tick skipped: previous run still in progress")).toBe(true);

    pending.finish?.();
    await first;
    await cronMock.state.tick?.();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("should log a run that throws and keep scheduling", async () => {
    const { runner, run, records } = createRunner();
    run.mockRejectedValueOnce(new Error("disk full"));
    startScheduler(runner);

    await cronMock.state.tick?.();
    await cronMock.state.tick?.();

    expect(records.find((r) => r.msg === "Cron run failed")?.data.error).toBe("disk full");
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("should stop the task", () => {
    const { runner } = createRunner();
    startScheduler(runner).stop();

    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });
});
