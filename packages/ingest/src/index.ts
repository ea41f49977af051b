// @cadence/ingest — RSS/Atom ingestion collaborator
export * from "./feeds.js";
export * from "./rss.js";
export * from "./ingest.js";
