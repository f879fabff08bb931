import pLimit from "p-limit";

import type { StructuredLogger } from "../logger.js";

import type { SearchConfig } from "./config.js";
import { orderRange, toIsoDate, type DateRange, type IsoDate } from "./dateRange.js";
import { deduplicate } from "./dedup.js";
import {
  Diagnostics,
  NO_PHRASES_MESSAGE,
  summarizeTotals,
  type SearchTotals,
  type SeedReport,
} from "./diagnostics.js";
import { ConfigurationError, ERROR_CONFIG_INVALID, SearchCancelledError, type PageError } from "./errors.js";
import { filterByViews } from "./filters.js";
import { normalizeItems, type NormalizedItem } from "./items.js";
import { matchPhrase, type MatchReason } from "./matcher.js";
import { PAGE_SIZE, resolvePolicy, type SearchPolicy } from "./policy.js";
import { prepareSeeds, type PreparedSeed } from "./seeds.js";
import { withHttpSession, type HttpSession } from "./session.js";
import { TelemetrClient } from "./telemetrClient.js";

/** A normalised post accepted for one of the seeds. */
export interface MatchRecord extends NormalizedItem {
  /** Seed (as typed by the user, trimmed) that produced the hit. */
  readonly seed: string;
  readonly matchReason: MatchReason;
}

/** Value returned by {@link SearchOrchestrator.search}. */
export interface SearchResult {
  readonly matches: readonly MatchRecord[];
  /** Newline-separated narrative: policy line, one line per seed, totals. */
  readonly diagnostics: string;
  readonly seeds: readonly SeedReport[];
  /** `null` when the run short-circuited before any seed was processed. */
  readonly totals: SearchTotals | null;
}

export interface SearchOptions {
  /** Aborts the whole call; no partial result is returned. */
  readonly signal?: AbortSignal;
  /** Wall-clock budget overriding `execution.searchTimeoutMs`. `0` disables it. */
  readonly timeoutMs?: number;
  /** Per-call policy overrides merged onto the configured policy. */
  readonly policy?: Partial<SearchPolicy>;
}

/** Dependencies required to run searches. */
export interface SearchOrchestratorDependencies {
  readonly config: SearchConfig;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger | null;
  readonly clock?: () => number;
}

interface SeedOutcome {
  readonly report: SeedReport;
  readonly matches: MatchRecord[];
}

/**
 * Drives the fetch → normalise → filter → match → dedup pipeline for a batch
 * of seeds. Per-seed failures degrade the result and are narrated in the
 * diagnostics; only configuration problems and cancellation reject.
 */
export class SearchOrchestrator {
  private readonly config: SearchConfig;
  private readonly fetchImpl: typeof fetch | undefined;
  private readonly logger: StructuredLogger | null;
  private readonly clock: () => number;

  constructor(dependencies: SearchOrchestratorDependencies) {
    this.config = dependencies.config;
    this.fetchImpl = dependencies.fetchImpl;
    this.logger = dependencies.logger ?? null;
    this.clock = dependencies.clock ?? (() => Date.now());
  }

  async search(
    seeds: readonly string[],
    since: IsoDate | Date,
    until: IsoDate | Date,
    options: SearchOptions = {},
  ): Promise<SearchResult> {
    const policy = options.policy ? resolvePolicy(options.policy, this.config.policy) : this.config.policy;
    const range = resolveRange(since, until);
    const timeoutMs = options.timeoutMs ?? this.config.execution.searchTimeoutMs;

    const cancellation = new AbortController();
    let cancelReason: SearchCancelledError | null = null;
    const cancel = (reason: SearchCancelledError): void => {
      if (!cancellation.signal.aborted) {
        cancelReason = reason;
        cancellation.abort();
      }
    };
    const onCallerAbort = (): void => cancel(new SearchCancelledError("Search was cancelled by the caller"));
    if (options.signal?.aborted) {
      throw new SearchCancelledError("Search was cancelled by the caller");
    }
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    const timer =
      timeoutMs > 0
        ? setTimeout(() => cancel(new SearchCancelledError(`Search timed out after ${timeoutMs}ms`)), timeoutMs)
        : null;

    try {
      return await withHttpSession(this.fetchImpl, async (session) => {
        const closeSession = (): void => session.close();
        cancellation.signal.addEventListener("abort", closeSession, { once: true });
        try {
          const work = this.run(seeds, range, policy, session, cancellation.signal);
          return await untilCancelled(work, cancellation.signal, () => cancelReason ?? new SearchCancelledError());
        } finally {
          cancellation.signal.removeEventListener("abort", closeSession);
        }
      });
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async run(
    seeds: readonly string[],
    range: DateRange,
    policy: SearchPolicy,
    session: HttpSession,
    signal: AbortSignal,
  ): Promise<SearchResult> {
    const startedAt = this.clock();
    const diagnostics = new Diagnostics(policy);
    const prepared = prepareSeeds(seeds, policy);

    if (prepared.length === 0) {
      diagnostics.note(NO_PHRASES_MESSAGE);
      this.logger?.info("search_skipped", { reason: NO_PHRASES_MESSAGE });
      return { matches: [], diagnostics: diagnostics.toString(), seeds: [], totals: null };
    }

    const client = new TelemetrClient({
      config: this.config.telemetr,
      policy,
      session,
      logger: this.logger,
    });
    client.requireToken();
    client.endpoint();

    this.logger?.info("search_started", {
      seeds: prepared.length,
      since: range.since,
      until: range.until,
    });

    const limit = pLimit(Math.max(1, Math.floor(this.config.execution.parallelism)));
    const outcomes = await Promise.all(
      prepared.map((seed) => limit(() => this.runSeed(client, seed, range, policy, signal))),
    );

    const reports = outcomes.map((outcome) => outcome.report);
    reports.forEach((report, index) => diagnostics.recordSeed(index, report));

    const matches = deduplicate(outcomes.flatMap((outcome) => outcome.matches));
    const totals = summarizeTotals(reports, matches.length);
    diagnostics.recordTotals(totals);

    this.logger?.info("search_completed", {
      ...totals,
      duration_ms: Math.max(0, this.clock() - startedAt),
    });

    return { matches, diagnostics: diagnostics.toString(), seeds: reports, totals };
  }

  /** Pages through one seed, then normalises, filters and matches its items. */
  private async runSeed(
    client: TelemetrClient,
    seed: PreparedSeed,
    range: DateRange,
    policy: SearchPolicy,
    signal: AbortSignal,
  ): Promise<SeedOutcome> {
    const rawItems: unknown[] = [];
    let pages = 0;
    let error: PageError | null = null;

    for (let page = 1; page <= policy.maxPages && !signal.aborted; page += 1) {
      const result = await client.fetchPage({ query: seed.query, range, page });
      if (!result.ok) {
        error = result.error;
        break;
      }
      pages += 1;
      rawItems.push(...result.items);
      if (result.items.length < PAGE_SIZE) {
        break;
      }
    }

    const { items, malformed } = normalizeItems(rawItems);
    const visible = filterByViews(items, policy.minViews);
    const matches: MatchRecord[] = [];
    for (const item of visible) {
      const outcome = matchPhrase(seed.phrase, item.body, policy);
      if (outcome.matched) {
        matches.push({ ...item, seed: seed.seed, matchReason: outcome.reason });
      }
    }

    const report: SeedReport = {
      seed: seed.seed,
      query: seed.query,
      pages,
      fetched: rawItems.length,
      malformed,
      afterViews: visible.length,
      matched: matches.length,
      error: error ? { code: error.code, message: error.message } : null,
    };
    this.logger?.debug("search_seed_completed", report);
    return { report, matches };
  }
}

/** Coerces and orders the caller's bounds; bad dates are a configuration error. */
function resolveRange(since: IsoDate | Date, until: IsoDate | Date): DateRange {
  try {
    return orderRange(toIsoDate(since), toIsoDate(until));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid date range: ${error instanceof Error ? error.message : String(error)}`,
      ERROR_CONFIG_INVALID,
      { cause: error },
    );
  }
}

/**
 * Settles with {@link work} unless {@link signal} fires first, in which case
 * the returned promise rejects with the cancellation error and the work's
 * eventual outcome is ignored.
 */
function untilCancelled<T>(work: Promise<T>, signal: AbortSignal, reason: () => Error): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(reason());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(reason());
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
