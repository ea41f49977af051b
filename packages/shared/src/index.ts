// @cadence/shared — pipeline core: model, config, logging, scoring,
// scheduling, history and report generation
export * from "./cadence.js";
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./text.js";
export * from "./selection.js";
export * from "./schedule.js";
export * from "./history/store.js";
export * from "./history/context.js";
export * from "./reports/templates.js";
export * from "./anthropic/client.js";
export * from "./anthropic/scoring.js";
export * from "./anthropic/analysis.js";
export * from "./anthropic/summary.js";
