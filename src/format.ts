/**
 * Formatting Utilities
 */

/**
 * Convert Unix timestamp (ms) to ISO 8601 string
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * Collapse whitespace and cut text to `width` characters, ending with "..."
 * when shortened. Used for log lines.
 */
export function shorten(text: string, width: number): string {
  const collapsed = text.trim().replace(/\s+/g, " ");
  if (collapsed.length <= width) return collapsed;
  return collapsed.slice(0, Math.max(0, width - 3)).trimEnd() + "...";
}

/** Longest text Telegram accepts in one message */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Split text into parts no longer than `limit`, cutting at the last line
 * break, else the last space, before the limit
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const parts: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = rest.lastIndexOf("\n", limit);
    if (cut <= 0) cut = rest.lastIndexOf(" ", limit);
    if (cut <= 0) cut = limit;
    parts.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }
  if (rest) parts.push(rest);
  return parts;
}
