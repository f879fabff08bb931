import { z } from "zod";

/** Textual fields joined into the body, in this order. */
const BODY_FIELDS = ["title", "text", "caption"] as const;
/** View counters, first parseable wins. */
const VIEW_FIELDS = ["views", "views_count"] as const;
/** Link-like fields, first non-empty wins. */
const LINK_FIELDS = ["display_url", "url", "link"] as const;

/** Object-shaped raw item. Arrays are excluded by the refinement. */
const rawObjectSchema = z.record(z.unknown()).refine((value) => !Array.isArray(value));

/**
 * Uniform record produced from whatever shape the provider returned. Owned by
 * the search invocation that created it.
 */
export interface NormalizedItem {
  /** Newline-joined title/text/caption; empty for media-only posts. */
  readonly body: string;
  /** View count, `0` when the provider omitted it or sent garbage. */
  readonly views: number;
  /** Public link to the post, `""` when none was provided. */
  readonly link: string;
  /** Channel metadata passed through untouched. */
  readonly channel: Readonly<Record<string, unknown>> | null;
}

/**
 * Coerces one raw provider item. Bare strings become a body-only record;
 * objects are read field by field; any other shape is malformed and yields
 * `null`.
 */
export function normalizeItem(raw: unknown): NormalizedItem | null {
  if (typeof raw === "string") {
    return { body: raw.trim(), views: 0, link: "", channel: null };
  }

  const parsed = rawObjectSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  const item = parsed.data;

  return {
    body: extractBody(item),
    views: extractViews(item),
    link: extractLink(item),
    channel: extractChannel(item),
  };
}

function extractBody(item: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const field of BODY_FIELDS) {
    const value = item[field];
    if (typeof value !== "string") {
      continue;
    }
    const trimmed = value.trim();
    if (trimmed.length > 0) {
      parts.push(trimmed);
    }
  }
  return parts.join("\n");
}

/**
 * Parses a view counter. Numbers are truncated, strings must be plain
 * integers (`"1 200"` and `"1.2K"` are rejected). Negative counts are treated
 * as absent.
 */
export function parseViewCount(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^\+?\d+$/.test(trimmed)) {
      return null;
    }
    const parsed = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

function extractViews(item: Record<string, unknown>): number {
  for (const field of VIEW_FIELDS) {
    const parsed = parseViewCount(item[field]);
    if (parsed !== null) {
      return parsed;
    }
  }
  return 0;
}

function extractLink(item: Record<string, unknown>): string {
  for (const field of LINK_FIELDS) {
    const value = item[field];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return "";
}

function extractChannel(item: Record<string, unknown>): Readonly<Record<string, unknown>> | null {
  const parsed = rawObjectSchema.safeParse(item["channel"]);
  return parsed.success ? parsed.data : null;
}

/** Result of normalising a whole page batch. */
export interface NormalizedBatch {
  readonly items: NormalizedItem[];
  readonly malformed: number;
}

export function normalizeItems(rawItems: readonly unknown[]): NormalizedBatch {
  const items: NormalizedItem[] = [];
  let malformed = 0;
  for (const raw of rawItems) {
    const normalized = normalizeItem(raw);
    if (normalized) {
      items.push(normalized);
    } else {
      malformed += 1;
    }
  }
  return { items, malformed };
}
