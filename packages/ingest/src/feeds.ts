// =============================================================================
// @cadence/ingest — Default feed sources
// =============================================================================
// Business, markets, tech and crypto headlines. Override the whole list with
// the FEED_SOURCES environment variable.
// =============================================================================

export const DEFAULT_FEED_SOURCES: Readonly<Record<string, string>> = {
  "Yahoo Finance": "https://finance.yahoo.com/news/rssindex",
  "Investing.com": "https://www.investing.com/rss/news.rss",
  "Google News (Biz)":
    "https://news.google.com/rss/headlines/section/topic/BUSINESS?hl=en-US&gl=US&ceid=US:en",
  "Google News (Tech)":
    "https://news.google.com/rss/headlines/section/topic/TECHNOLOGY?hl=en-US&gl=US&ceid=US:en",
  "Google News (KR Biz)":
    "https://news.google.com/rss/headlines/section/topic/BUSINESS?hl=ko&gl=KR&ceid=KR:ko",
  "Google News (KR Tech)":
    "https://news.google.com/rss/headlines/section/topic/TECHNOLOGY?hl=ko&gl=KR&ceid=KR:ko",
  "Hacker News": "https://news.ycombinator.com/rss",
  TechCrunch: "https://techcrunch.com/feed/",
  "Project Syndicate": "https://www.project-syndicate.org/rss",
  OilPrice: "https://oilprice.com/rss/main",
  CoinDesk: "https://www.coindesk.com/arc/outboundfeeds/rss/",
};
