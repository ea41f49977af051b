// =============================================================================
// @cadence/shared — Structured JSON logger
// =============================================================================
// One JSON line per event on stdout. Child loggers carry bindings such as
// runId and cadence into every line they write. Credential fields are masked
// and Error values are flattened to their message before a line is written.
// =============================================================================

import { randomUUID } from "node:crypto";
import { errorMessage } from "./text.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogFields = Record<string, unknown>;

const LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export interface Logger {
  trace(msg: string, data?: LogFields): void;
  debug(msg: string, data?: LogFields): void;
  info(msg: string, data?: LogFields): void;
  warn(msg: string, data?: LogFields): void;
  error(msg: string, data?: LogFields): void;
  fatal(msg: string, data?: LogFields): void;
  child(bindings: LogFields): Logger;
}

/** Receives every event that passes the level threshold. */
export type LogSink = (level: LogLevel, msg: string, fields: LogFields) => void;

export interface LoggerOptions {
  level?: string;
  /** Defaults to one JSON line on stdout. */
  sink?: LogSink;
}

/** Field names whose values never reach the output. */
const SECRET_FIELDS = new Set([
  "ANTHROPIC_API_KEY",
  "EMAIL_PASSWORD",
  "apiKey",
  "password",
  "pass",
  "authorization",
]);

export const REDACTED = "[redacted]";

export function createRunId(): string {
  return randomUUID();
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_VALUES;
}

const stdoutSink: LogSink = (level, msg, fields) => {
  const entry = { level, msg, timestamp: new Date().toISOString(), ...fields };
  process.stdout.write(JSON.stringify(entry) + "\n");
};

function sanitize(fields: LogFields): LogFields {
  const clean: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (SECRET_FIELDS.has(key)) {
      clean[key] = REDACTED;
    } else if (value instanceof Error) {
      clean[key] = value.message;
    } else {
      clean[key] = value;
    }
  }
  return clean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const levelName = options.level ?? "info";
  const threshold = isLogLevel(levelName)
    ? LEVEL_VALUES[levelName]
    : LEVEL_VALUES.info;

  return buildLogger(threshold, options.sink ?? stdoutSink, {});
}

function buildLogger(
  threshold: number,
  sink: LogSink,
  bindings: LogFields,
): Logger {
  function write(level: LogLevel, msg: string, data?: LogFields): void {
    if (LEVEL_VALUES[level] < threshold) return;
    sink(level, msg, sanitize({ ...bindings, ...data }));
  }

  return {
    trace: (msg, data) => write("trace", msg, data),
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    fatal: (msg, data) => write("fatal", msg, data),
    child: (childBindings) =>
      buildLogger(threshold, sink, { ...bindings, ...childBindings }),
  };
}

// ---------------------------------------------------------------------------
// External calls
// ---------------------------------------------------------------------------

export type ExternalService = "anthropic" | "feed" | "smtp";

export function logExternalCall(
  logger: Logger,
  service: ExternalService,
  operation: string,
  durationMs: number,
  error?: string,
): void {
  const data: LogFields = { service, operation, durationMs };
  if (error !== undefined) {
    data.error = error;
    logger.error("External call failed", data);
  } else {
    logger.info("External call completed", data);
  }
}

/**
 * Runs one call to an outside service and logs its duration and outcome.
 * A rejection is logged and rethrown unchanged.
 */
export async function timeExternalCall<T>(
  logger: Logger,
  service: ExternalService,
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  const elapsed = () => Math.round(performance.now() - start);
  let result: T;
  try {
    result = await call();
  } catch (err) {
    logExternalCall(logger, service, operation, elapsed(), errorMessage(err));
    throw err;
  }
  logExternalCall(logger, service, operation, elapsed());
  return result;
}
