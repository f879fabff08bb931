import type { SearchPolicy } from "./policy.js";

/** How a candidate earned its place in the result set. */
export type MatchReason = "strict" | "fuzzy" | "trusted";

export type MatchOutcome =
  | { readonly matched: true; readonly reason: MatchReason }
  | { readonly matched: false; readonly reason: null };

const REJECTED: MatchOutcome = Object.freeze({ matched: false, reason: null });

/** Letters and digits of any script, Latin and Cyrillic included. */
const WORD_CHAR_AT_END = /[\p{L}\p{N}]$/u;
const WORD_CHAR_AT_START = /^[\p{L}\p{N}]/u;
const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

/** NFC, lower case, whitespace runs collapsed to one space, trimmed. */
export function normalizeForMatch(value: string): string {
  return value.normalize("NFC").toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Reports whether {@link needle} occurs in {@link haystack} with a
 * non-alphanumeric character or a string edge on both sides. Both inputs are
 * expected to be normalised already. Every occurrence is tried, so a first
 * hit inside a longer word does not hide a later bounded one.
 */
export function containsBounded(haystack: string, needle: string): boolean {
  if (needle.length === 0 || haystack.length < needle.length) {
    return false;
  }
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    const end = index + needle.length;
    // Two code units cover a surrogate pair on either side.
    const before = haystack.slice(Math.max(0, index - 2), index);
    const after = haystack.slice(end, end + 2);
    if (!WORD_CHAR_AT_END.test(before) && !WORD_CHAR_AT_START.test(after)) {
      return true;
    }
    index = haystack.indexOf(needle, index + 1);
  }
  return false;
}

/** Splits normalised text into alphanumeric tokens. */
export function tokenize(value: string): string[] {
  return value.split(TOKEN_SEPARATOR).filter((token) => token.length > 0);
}

/**
 * Share of the seed tokens that also appear in the body's token set. Repeated
 * seed tokens count once per occurrence. A seed with no tokens scores `0`.
 */
export function tokenOverlap(normalizedPhrase: string, normalizedBody: string): number {
  const seedTokens = tokenize(normalizedPhrase);
  if (seedTokens.length === 0) {
    return 0;
  }
  const bodyTokens = new Set(tokenize(normalizedBody));
  const shared = seedTokens.filter((token) => bodyTokens.has(token)).length;
  return shared / seedTokens.length;
}

type MatchPolicy = Pick<SearchPolicy, "requireExact" | "trustQueryOnEmptyBody" | "fuzzyThreshold">;

/**
 * Decides whether {@link phrase} is genuinely present in {@link body}.
 *
 * An empty body (media-only post) cannot be verified locally and is accepted
 * as `trusted` only when `trustQueryOnEmptyBody` is set, whatever the mode.
 */
export function matchPhrase(phrase: string, body: string, policy: MatchPolicy): MatchOutcome {
  const normalizedBody = normalizeForMatch(body);
  if (normalizedBody.length === 0) {
    return policy.trustQueryOnEmptyBody ? { matched: true, reason: "trusted" } : REJECTED;
  }

  const normalizedPhrase = normalizeForMatch(phrase);
  if (containsBounded(normalizedBody, normalizedPhrase)) {
    return { matched: true, reason: "strict" };
  }
  if (policy.requireExact) {
    return REJECTED;
  }
  return tokenOverlap(normalizedPhrase, normalizedBody) >= policy.fuzzyThreshold
    ? { matched: true, reason: "fuzzy" }
    : REJECTED;
}
