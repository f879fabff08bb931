/**
 * Public entry point of the phrase search pipeline.
 */
export { collectSearchRedactionTokens, loadSearchConfig, loadSearchPolicy } from "./config.js";
export type { ExecutionConfig, SearchConfig, TelemetrConfig } from "./config.js";
export { addDays, orderRange, parseDate, parseDateRange, toIsoDate } from "./dateRange.js";
export type { DateRange, IsoDate } from "./dateRange.js";
export { BODY_KEY_LENGTH, dedupKey, deduplicate } from "./dedup.js";
export {
  Diagnostics,
  NO_PHRASES_MESSAGE,
  formatSeedLine,
  formatTotalsLine,
  summarizeTotals,
  type SearchTotals,
  type SeedReport,
} from "./diagnostics.js";
export {
  ConfigurationError,
  ERROR_CONFIG_INVALID,
  ERROR_CONFIG_MISSING_TOKEN,
  ERROR_SEARCH_CANCELLED,
  ERROR_TELEMETR_HTTP,
  ERROR_TELEMETR_NETWORK,
  ERROR_TELEMETR_PROTOCOL,
  ProtocolError,
  SearchCancelledError,
  SearchError,
  TransportError,
  type PageError,
} from "./errors.js";
export { filterByViews } from "./filters.js";
export { normalizeItem, normalizeItems, parseViewCount, type NormalizedBatch, type NormalizedItem } from "./items.js";
export {
  containsBounded,
  matchPhrase,
  normalizeForMatch,
  tokenOverlap,
  tokenize,
  type MatchOutcome,
  type MatchReason,
} from "./matcher.js";
export {
  SearchOrchestrator,
  type MatchRecord,
  type SearchOptions,
  type SearchOrchestratorDependencies,
  type SearchResult,
} from "./orchestrator.js";
export { DEFAULT_POLICY, PAGE_SIZE, describePolicy, resolvePolicy, type SearchPolicy } from "./policy.js";
export { prepareSeeds, toMatchPhrase, toUpstreamQuery, type PreparedSeed } from "./seeds.js";
export { HttpSession, withHttpSession } from "./session.js";
export {
  TelemetrClient,
  resolveEndpoint,
  type PageMeta,
  type PageRequest,
  type PageResult,
  type TelemetrClientOptions,
} from "./telemetrClient.js";
