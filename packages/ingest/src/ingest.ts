// =============================================================================
// @cadence/ingest — Feed ingestion
// =============================================================================
// Reads every configured source one after another. A source that fails
// contributes zero items; only the caller decides whether an empty total is
// fatal.
// =============================================================================

import { timeExternalCall, type Item, type Logger } from "@cadence/shared";
import { fetchFeed, type FeedFetcher, type FeedFetchOptions } from "./rss.js";

export interface IngestOptions extends FeedFetchOptions {
  logger: Logger;
  /** Injected in tests. */
  fetcher?: FeedFetcher;
}

export async function ingestFeeds(
  sources: Readonly<Record<string, string>>,
  options: IngestOptions,
): Promise<Item[]> {
  const { logger, fetcher = fetchFeed, ...fetchOptions } = options;
  const items: Item[] = [];

  for (const [source, url] of Object.entries(sources)) {
    try {
      const fetched = await timeExternalCall(logger, "feed", source, () =>
        fetcher(url, source, fetchOptions),
      );
      logger.info("Feed ingested", { source, items: fetched.length });
      items.push(...fetched);
    } catch {
      // Already logged as a failed external call; the source adds nothing.
      continue;
    }
  }

  logger.info("Ingestion complete", {
    sources: Object.keys(sources).length,
    items: items.length,
  });
  return items;
}
