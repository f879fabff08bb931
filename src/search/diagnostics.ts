import type { PageError } from "./errors.js";
import { describePolicy, type SearchPolicy } from "./policy.js";

/** Line emitted when the caller supplied no usable phrase. */
export const NO_PHRASES_MESSAGE = "no phrases supplied";

/** Per-seed yield of each pipeline stage. */
export interface SeedReport {
  readonly seed: string;
  readonly query: string;
  /** Pages that returned a success envelope. */
  readonly pages: number;
  readonly fetched: number;
  readonly malformed: number;
  readonly afterViews: number;
  readonly matched: number;
  /** Failure that stopped pagination early, if any. */
  readonly error: Pick<PageError, "code" | "message"> | null;
}

/** Totals across all seeds. `unique` is the size of the deduplicated output. */
export interface SearchTotals {
  readonly seeds: number;
  readonly fetched: number;
  readonly malformed: number;
  readonly afterViews: number;
  readonly matched: number;
  readonly unique: number;
  readonly failedSeeds: number;
}

export function formatSeedLine(report: SeedReport): string {
  const counters =
    `pages=${report.pages} fetched=${report.fetched} malformed=${report.malformed} ` +
    `after_views=${report.afterViews} matched=${report.matched}`;
  const failure = report.error ? ` error=${report.error.code} (${report.error.message})` : "";
  return `seed ${JSON.stringify(report.seed)}: ${counters}${failure}`;
}

export function summarizeTotals(reports: readonly SeedReport[], unique: number): SearchTotals {
  let fetched = 0;
  let malformed = 0;
  let afterViews = 0;
  let matched = 0;
  let failedSeeds = 0;
  for (const report of reports) {
    fetched += report.fetched;
    malformed += report.malformed;
    afterViews += report.afterViews;
    matched += report.matched;
    if (report.error) {
      failedSeeds += 1;
    }
  }
  return { seeds: reports.length, fetched, malformed, afterViews, matched, unique, failedSeeds };
}

export function formatTotalsLine(totals: SearchTotals): string {
  return (
    `total: seeds=${totals.seeds} fetched=${totals.fetched} malformed=${totals.malformed} ` +
    `after_views=${totals.afterViews} matched=${totals.matched} unique=${totals.unique} ` +
    `failed_seeds=${totals.failedSeeds}`
  );
}

/**
 * Ordered narrative of one search. Seed lines are inserted by index so the
 * output follows seed order even when seeds finish out of order.
 */
export class Diagnostics {
  private readonly header: string[] = [];
  private readonly seedLines: Array<string | undefined> = [];
  private readonly footer: string[] = [];

  constructor(policy?: SearchPolicy) {
    if (policy) {
      this.header.push(`policy: ${describePolicy(policy)}`);
    }
  }

  note(line: string): void {
    this.header.push(line);
  }

  recordSeed(index: number, report: SeedReport): void {
    this.seedLines[index] = formatSeedLine(report);
  }

  recordTotals(totals: SearchTotals): void {
    this.footer.push(formatTotalsLine(totals));
  }

  lines(): string[] {
    const seeds = this.seedLines.filter((line): line is string => line !== undefined);
    return [...this.header, ...seeds, ...this.footer];
  }

  toString(): string {
    return this.lines().join("\n");
  }
}
