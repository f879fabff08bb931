#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { StructuredLogger, type LogLevel } from "./logger.js";
import {
  ConfigurationError,
  SearchCancelledError,
  SearchOrchestrator,
  collectSearchRedactionTokens,
  loadSearchConfig,
  parseDate,
  parseDateRange,
  type DateRange,
  type MatchRecord,
  type SearchPolicy,
  type SearchResult,
} from "./search/index.js";

/** Characters of the post body shown per match in text output. */
const EXCERPT_LENGTH = 400;

interface CliOptions {
  readonly range: DateRange;
  readonly seeds: string[];
  readonly format: "text" | "json";
  readonly logLevel: LogLevel;
  readonly policy: Partial<SearchPolicy>;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function requireInteger(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${flag} expects a non-negative integer`);
  }
  return Number.parseInt(raw, 10);
}

function parseArgs(argv: readonly string[]): CliOptions {
  const seeds: string[] = [];
  const policy: { -readonly [K in keyof SearchPolicy]?: SearchPolicy[K] } = {};
  let since: string | null = null;
  let until: string | null = null;
  let range: DateRange | null = null;
  let format: "text" | "json" = "text";
  let logLevel: LogLevel = "warn";

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    switch (token) {
      case "--since":
      case "--until": {
        const value = requireValue(token, argv[++i]);
        const parsed = parseDate(value);
        if (!parsed) {
          throw new Error(`${token} must be YYYY-MM-DD or DD.MM.YYYY, received '${value}'`);
        }
        if (token === "--since") {
          since = parsed;
        } else {
          until = parsed;
        }
        break;
      }
      case "--range": {
        const value = requireValue(token, argv[++i]);
        range = parseDateRange(value);
        if (!range) {
          throw new Error(`Could not parse date range '${value}'. Example: 2025-10-22 — 2025-10-25`);
        }
        break;
      }
      case "--json":
        format = "json";
        break;
      case "--verbose":
        logLevel = "debug";
        break;
      case "--min-views":
        policy.minViews = requireInteger(token, argv[++i]);
        break;
      case "--max-pages":
        policy.maxPages = requireInteger(token, argv[++i]);
        break;
      case "--fuzzy":
        policy.requireExact = false;
        break;
      case "--no-quotes":
        policy.useQuotes = false;
        break;
      case "--no-trust":
        policy.trustQueryOnEmptyBody = false;
        break;
      case "--inclusive":
        policy.dateToInclusive = true;
        break;
      default:
        if (token.startsWith("--")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        seeds.push(token);
    }
  }

  if (!range) {
    if (!since || !until) {
      throw new Error("Provide --range or both --since and --until");
    }
    range = { since, until };
  }

  return { range, seeds, format, logLevel, policy };
}

function excerpt(body: string, limit: number): string {
  if (body.length <= limit) {
    return body;
  }
  return `${body.slice(0, Math.max(0, limit - 1))}…`;
}

function formatMatch(match: MatchRecord, index: number): string {
  const title = match.channel?.["title"];
  const channel = typeof title === "string" && title.trim().length > 0 ? title.trim() : "channel";
  const header = `${index + 1}. [${match.seed}] ${channel} · ${match.views} views · ${match.matchReason}`;
  const lines = [header];
  if (match.link) {
    lines.push(`   ${match.link}`);
  }
  if (match.body) {
    lines.push(`   ${excerpt(match.body, EXCERPT_LENGTH).replace(/\n/g, "\n   ")}`);
  }
  return lines.join("\n");
}

function formatText(result: SearchResult): string {
  const sections = [result.diagnostics, ""];
  if (result.matches.length === 0) {
    sections.push("No posts matched.");
  } else {
    sections.push(...result.matches.map(formatMatch));
  }
  return sections.join("\n");
}

async function main(argv: string[]): Promise<number> {
  if (argv.length === 0 || argv.includes("--help")) {
    printUsage();
    return argv.length === 0 ? 1 : 0;
  }

  const options = parseArgs(argv);
  const config = loadSearchConfig();
  const logger = new StructuredLogger({
    level: options.logLevel,
    redactSecrets: collectSearchRedactionTokens(config),
    write: (line) => process.stderr.write(line),
  });
  const orchestrator = new SearchOrchestrator({ config, logger });

  try {
    const result = await orchestrator.search(options.seeds, options.range.since, options.range.until, {
      policy: options.policy,
    });
    process.stdout.write(
      options.format === "json" ? `${JSON.stringify(result, null, 2)}\n` : `${formatText(result)}\n`,
    );
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof SearchCancelledError) {
      process.stderr.write(`${error.code}: ${error.message}\n`);
      return error instanceof ConfigurationError ? 2 : 3;
    }
    throw error;
  }
}

function printUsage(): void {
  console.log(
    "Usage: telemetr-search (--range 'FROM — TO' | --since FROM --until TO) [options] <phrase> [<phrase> ...]\n",
  );
  console.log("Options:");
  console.log("  --json            print the result as JSON");
  console.log("  --min-views N     drop posts with fewer views");
  console.log("  --max-pages N     pagination ceiling per phrase");
  console.log("  --fuzzy           accept token-overlap matches");
  console.log("  --no-quotes       send phrases unquoted");
  console.log("  --no-trust        reject posts without text");
  console.log("  --inclusive       include posts from the end date");
  console.log("  --verbose         log debug entries to stderr");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }
  // npm installs the bin as a symlink.
  return fileURLToPath(import.meta.url) === realpathSync(executedFromCli);
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

export const __testing = { parseArgs, formatMatch, formatText, excerpt };
