import { z } from "zod";

import { ConfigurationError, ERROR_CONFIG_INVALID } from "./errors.js";

/** Number of items requested per page. The provider caps `limit` at this value. */
export const PAGE_SIZE = 50;

/**
 * Named toggles controlling the pipeline. Every behavioural variant of the
 * search goes through one of these fields; there are no code forks.
 */
export interface SearchPolicy {
  /** Wrap each seed in double quotes in the upstream query. */
  readonly useQuotes: boolean;
  /** Strict bounded matching when true, token-overlap matching when false. */
  readonly requireExact: boolean;
  /** Accept provider-matched items that carry no extractable text. */
  readonly trustQueryOnEmptyBody: boolean;
  /** Drop candidates whose view count is below this value. */
  readonly minViews: number;
  /** Pagination ceiling per seed. */
  readonly maxPages: number;
  /** Shift `date_to` forward by one day so the upper bound is inclusive. */
  readonly dateToInclusive: boolean;
  /** Token-overlap ratio accepted in fuzzy mode. */
  readonly fuzzyThreshold: number;
}

export const DEFAULT_POLICY: SearchPolicy = Object.freeze({
  useQuotes: true,
  requireExact: true,
  trustQueryOnEmptyBody: true,
  minViews: 0,
  maxPages: 3,
  dateToInclusive: false,
  fuzzyThreshold: 0.8,
});

const policySchema = z
  .object({
    useQuotes: z.boolean(),
    requireExact: z.boolean(),
    trustQueryOnEmptyBody: z.boolean(),
    minViews: z.number().int().min(0),
    maxPages: z.number().int().min(1).max(100),
    dateToInclusive: z.boolean(),
    fuzzyThreshold: z.number().gt(0).max(1),
  })
  .strict();

/**
 * Merges {@link overrides} onto {@link base} and validates the result. Invalid
 * values surface as a {@link ConfigurationError} before any request is made.
 */
export function resolvePolicy(
  overrides: Partial<SearchPolicy> = {},
  base: SearchPolicy = DEFAULT_POLICY,
): SearchPolicy {
  const parsed = policySchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid search policy (${detail})`, ERROR_CONFIG_INVALID, {
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}

/** One-line summary used as the first diagnostic line of every run. */
export function describePolicy(policy: SearchPolicy): string {
  return [
    `quotes=${onOff(policy.useQuotes)}`,
    `mode=${policy.requireExact ? "strict" : `fuzzy(${policy.fuzzyThreshold})`}`,
    `trust_empty=${onOff(policy.trustQueryOnEmptyBody)}`,
    `min_views=${policy.minViews}`,
    `max_pages=${policy.maxPages}`,
    `date_to_inclusive=${onOff(policy.dateToInclusive)}`,
  ].join(" ");
}

function onOff(value: boolean): string {
  return value ? "on" : "off";
}
