// =============================================================================
// @cadence/shared — Text cleaning helpers
// =============================================================================

const TAG_PATTERN = /<[^>]+>/g;
const WHITESPACE_PATTERN = /\s+/g;

/** Plain text from a feed field: NFKC, no markup, single spaces. */
export function cleanFeedText(text: string | null | undefined): string {
  if (text === null || text === undefined) return "";
  return text
    .normalize("NFKC")
    .replace(TAG_PATTERN, "")
    .replace(WHITESPACE_PATTERN, " ")
    .trim();
}

/** Report HTML as returned by the analysis model, ready to embed in mail. */
export function cleanReportBody(text: string | null | undefined): string {
  if (text === null || text === undefined) return "";
  return text.normalize("NFKC").replace(/\u00a0/g, " ").trim();
}

/**
 * Secrets pasted from web consoles often carry NBSP or zero-width spaces.
 * Drop those, fold full-width forms, keep ASCII only.
 */
export function cleanCredential(text: string | null | undefined): string {
  if (text === null || text === undefined) return "";
  return text
    .replace(/[\u00a0\u200b]/g, "")
    .normalize("NFKC")
    .replace(/[^\x00-\x7f]/g, "")
    .trim();
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : text.slice(0, maxLength);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
