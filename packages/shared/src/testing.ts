// =============================================================================
// @cadence/shared/testing — Test doubles for every workspace's unit tests
// =============================================================================

import { createLogger, type LogFields, type Logger } from "./logger.js";
import type { Item } from "./types.js";

export interface LogRecord {
  level: string;
  msg: string;
  data: LogFields;
}

/**
 * A trace-level Logger whose sink keeps every event in memory, with child
 * bindings merged into `data`.
 */
export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: "trace",
    sink: (level, msg, fields) => {
      records.push({ level, msg, data: fields });
    },
  });
  return { logger, records };
}

export function makeItem(index: number, overrides: Partial<Item> = {}): Item {
  return {
    source: "Test Wire",
    title: `Headline ${index}`,
    content: `Body of story ${index}`,
    publishedLabel: "Sat, 01 Nov 2025 06:00:00 GMT",
    link: `https://news.example.com/${index}`,
    ...overrides,
  };
}

export function makeItems(count: number): Item[] {
  return Array.from({ length: count }, (_, i) => makeItem(i));
}
