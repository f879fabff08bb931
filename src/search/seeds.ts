import type { SearchPolicy } from "./policy.js";

/** A seed after trimming, paired with the query actually sent upstream. */
export interface PreparedSeed {
  /** Trimmed phrase as supplied by the user; carried on every match record. */
  readonly seed: string;
  /** Phrase used for local matching (surrounding quotes removed). */
  readonly phrase: string;
  /** Query string sent to the provider. */
  readonly query: string;
}

function isQuoted(value: string): boolean {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"');
}

/**
 * Builds the upstream query for {@link seed}. With `useQuotes` the phrase is
 * wrapped in double quotes unless it already is.
 */
export function toUpstreamQuery(seed: string, policy: Pick<SearchPolicy, "useQuotes">): string {
  const trimmed = seed.trim();
  if (policy.useQuotes && trimmed.length > 0 && !isQuoted(trimmed)) {
    return `"${trimmed}"`;
  }
  return trimmed;
}

/** Strips one pair of wrapping double quotes, if present. */
export function toMatchPhrase(seed: string): string {
  const trimmed = seed.trim();
  return isQuoted(trimmed) ? trimmed.slice(1, -1).trim() : trimmed;
}

/**
 * Trims every seed, drops the ones left empty, and keeps the caller's order.
 * Seeds consisting only of quotes are dropped too since nothing remains to
 * match locally.
 */
export function prepareSeeds(seeds: readonly string[], policy: Pick<SearchPolicy, "useQuotes">): PreparedSeed[] {
  const prepared: PreparedSeed[] = [];
  for (const raw of seeds) {
    const seed = typeof raw === "string" ? raw.trim() : "";
    const phrase = toMatchPhrase(seed);
    if (phrase.length === 0) {
      continue;
    }
    prepared.push({ seed, phrase, query: toUpstreamQuery(seed, policy) });
  }
  return prepared;
}
