import { readBool, readInt, readNumber, readOptionalString, readString } from "../config/env.js";

import { DEFAULT_POLICY, resolvePolicy, type SearchPolicy } from "./policy.js";

/** Default per-request timeout (ms) applied when querying Telemetr. */
const DEFAULT_TELEMETR_TIMEOUT_MS = 30_000;
/** Default number of seeds processed concurrently. */
const DEFAULT_PARALLEL_SEEDS = 2;

/** Configuration block dedicated to the Telemetr API. */
export interface TelemetrConfig {
  readonly baseUrl: string;
  readonly apiPath: string;
  readonly timeoutMs: number;
  readonly token: string | null;
  readonly maxRetries: number;
}

/** Execution limits applied by the orchestrator. */
export interface ExecutionConfig {
  /** Maximum number of seeds fetched at the same time. */
  readonly parallelism: number;
  /** Wall-clock budget for one `search()` call; `0` disables it. */
  readonly searchTimeoutMs: number;
}

/** Aggregated search configuration consumed by the runtime. */
export interface SearchConfig {
  readonly telemetr: TelemetrConfig;
  readonly execution: ExecutionConfig;
  readonly policy: SearchPolicy;
}

/**
 * Secrets that must never appear in log output. Only non-empty values are
 * returned so the list can be handed to the logger as-is.
 */
export function collectSearchRedactionTokens(config: SearchConfig): string[] {
  const token = config.telemetr.token?.trim();
  return token ? [token] : [];
}

/**
 * Builds the policy from the `TELEMETR_*` toggles. Unparseable values fall
 * back to {@link DEFAULT_POLICY}.
 */
export function loadSearchPolicy(): SearchPolicy {
  return resolvePolicy({
    useQuotes: readBool("TELEMETR_USE_QUOTES", DEFAULT_POLICY.useQuotes),
    requireExact: readBool("TELEMETR_REQUIRE_EXACT", DEFAULT_POLICY.requireExact),
    trustQueryOnEmptyBody: readBool("TELEMETR_TRUST_QUERY", DEFAULT_POLICY.trustQueryOnEmptyBody),
    minViews: readInt("TELEMETR_MIN_VIEWS", DEFAULT_POLICY.minViews, { min: 0 }),
    maxPages: readInt("TELEMETR_PAGES", DEFAULT_POLICY.maxPages, { min: 1, max: 100 }),
    dateToInclusive: readBool("TELEMETR_DATE_TO_INCLUSIVE", DEFAULT_POLICY.dateToInclusive),
    fuzzyThreshold: readNumber("TELEMETR_FUZZY_THRESHOLD", DEFAULT_POLICY.fuzzyThreshold, {
      min: 0.01,
      max: 1,
    }),
  });
}

/**
 * Loads the configuration from environment variables. A missing token is not
 * an error here: the orchestrator reports it as a {@link ConfigurationError}
 * when a search is actually attempted.
 */
export function loadSearchConfig(): SearchConfig {
  const baseUrl = readString("TELEMETR_BASE_URL", "https://api.telemetr.me");
  const apiPath = readString("TELEMETR_API_PATH", "/channels/posts/search");

  return {
    telemetr: {
      baseUrl,
      apiPath: apiPath.startsWith("/") ? apiPath : `/${apiPath}`,
      timeoutMs: readInt("TELEMETR_TIMEOUT_MS", DEFAULT_TELEMETR_TIMEOUT_MS, { min: 1 }),
      token: readOptionalString("TELEMETR_TOKEN") ?? null,
      maxRetries: readInt("TELEMETR_MAX_RETRIES", 1, { min: 0, max: 10 }),
    },
    execution: {
      parallelism: readInt("TELEMETR_PARALLEL", DEFAULT_PARALLEL_SEEDS, { min: 1, max: 16 }),
      searchTimeoutMs: readInt("TELEMETR_SEARCH_TIMEOUT_MS", 0, { min: 0 }),
    },
    policy: loadSearchPolicy(),
  };
}
