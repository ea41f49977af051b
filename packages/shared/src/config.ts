// =============================================================================
// @cadence/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// Required variables throw on missing. Credentials are cleaned of invisible
// characters before validation. FEED_SOURCES is validated as JSON.
// =============================================================================

import { z } from "zod";
import { cleanCredential } from "./text.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

function credential(name: string) {
  return z
    .string({ required_error: `${name} is required` })
    .transform(cleanCredential)
    .pipe(z.string().min(1, `${name} is required`));
}

/**
 * JSON string that parses to a map of source name -> feed URL.
 * Example: '{"Hacker News": "https://news.ycombinator.com/rss"}'
 */
const feedSourcesSchema = z.string().transform((val, ctx) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "FEED_SOURCES must be valid JSON",
    });
    return z.NEVER;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        "FEED_SOURCES must be a JSON object mapping source names to feed URLs",
    });
    return z.NEVER;
  }
  const sources: Record<string, string> = {};
  for (const [name, url] of Object.entries(parsed)) {
    if (typeof url !== "string" || !z.string().url().safeParse(url).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `FEED_SOURCES value for "${name}" must be a URL`,
      });
      return z.NEVER;
    }
    sources[name] = url;
  }
  return sources;
});

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const configSchema = z.object({
  // Required
  ANTHROPIC_API_KEY: credential("ANTHROPIC_API_KEY"),
  EMAIL_USER: credential("EMAIL_USER"),
  EMAIL_PASSWORD: credential("EMAIL_PASSWORD"),
  EMAIL_RECEIVER: credential("EMAIL_RECEIVER"),

  // Optional with defaults
  SMTP_HOST: z.string().min(1).default("smtp.naver.com"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  TIER1_MODEL: z.string().min(1).default("claude-3-5-haiku-20241022"),
  TIER2_MODEL: z.string().min(1).default("claude-sonnet-4-20250514"),
  SUMMARY_MODEL: z.string().min(1).default("claude-3-5-haiku-20241022"),
  HISTORY_FILE: z.string().min(1).default("data/report_history.json"),
  FEED_SOURCES: feedSourcesSchema.optional(),
  FEED_ITEMS_PER_SOURCE: z.coerce.number().int().min(1).default(15),
  FEED_CONTENT_MAX_CHARS: z.coerce.number().int().min(1).default(3000),
  FEED_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  REPORT_TITLE: z.string().min(1).default("Strategic Council"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),

  // Cron trigger (off: run once and exit)
  CRON_ENABLED: booleanFlag,
  CRON_SCHEDULE: z.string().min(1).default("0 7,22 * * *"),
  CRON_TIMEZONE: z
    .string()
    .min(1)
    .default("UTC")
    .refine(isTimeZone, (zone) => ({
      message: `CRON_TIMEZONE "${zone}" is not an IANA time zone`,
    })),
});

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = Readonly<z.infer<typeof configSchema>>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ZodError with detailed messages if any required variable is
 * missing or any value fails validation. The result is frozen.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return Object.freeze(configSchema.parse(env));
}

/** One "FIELD: message" line per issue, for the fatal startup log. */
export function describeConfigError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.join(".") || "(root)";
    return `${field}: ${issue.message}`;
  });
}
