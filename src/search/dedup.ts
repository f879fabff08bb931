import type { NormalizedItem } from "./items.js";
import { normalizeForMatch } from "./matcher.js";

/** Number of normalised body characters used when a post has no link. */
export const BODY_KEY_LENGTH = 200;

/**
 * Identity of the underlying post: its link when known, otherwise a prefix of
 * the normalised body. The prefixes keep link keys and body keys apart.
 */
export function dedupKey(item: Pick<NormalizedItem, "link" | "body">): string {
  const link = item.link.trim();
  if (link.length > 0) {
    return `link:${link}`;
  }
  return `body:${normalizeForMatch(item.body).slice(0, BODY_KEY_LENGTH)}`;
}

/**
 * Keeps the first record for every key. Callers pass the list in seed order,
 * then discovery order, so a post found by two seeds keeps the first seed.
 */
export function deduplicate<T extends Pick<NormalizedItem, "link" | "body">>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    const key = dedupKey(record);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }
  return unique;
}
