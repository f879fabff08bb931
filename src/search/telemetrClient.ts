import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";

import type { TelemetrConfig } from "./config.js";
import { addDays, type DateRange } from "./dateRange.js";
import {
  ConfigurationError,
  ERROR_CONFIG_INVALID,
  ERROR_CONFIG_MISSING_TOKEN,
  ERROR_TELEMETR_HTTP,
  ERROR_TELEMETR_NETWORK,
  ProtocolError,
  TransportError,
  type PageError,
} from "./errors.js";
import { PAGE_SIZE, type SearchPolicy } from "./policy.js";
import type { HttpSession } from "./session.js";

/**
 * Envelope returned by the posts search endpoint. Only `status` is mandatory;
 * `response.items` holds heterogeneous entries that are validated later by
 * the item normaliser.
 */
const envelopeSchema = z
  .object({
    status: z.string(),
    response: z
      .object({
        items: z.array(z.unknown()).nullish(),
        count: z.unknown().optional(),
        total_count: z.unknown().optional(),
      })
      .passthrough()
      .nullish(),
    error: z.unknown().optional(),
    message: z.unknown().optional(),
  })
  .passthrough();

type Envelope = z.infer<typeof envelopeSchema>;

/** Counters the provider attaches to a page. */
export interface PageMeta {
  readonly count: number | null;
  readonly totalCount: number | null;
}

/** Parameters of a single page request. */
export interface PageRequest {
  /** Upstream query, already quoted by the seed normaliser when needed. */
  readonly query: string;
  readonly range: DateRange;
  /** 1-based page index. */
  readonly page: number;
}

/**
 * Outcome of one page. Failures are values: only the configuration
 * preconditions (token, endpoint) are ever thrown by
 * {@link TelemetrClient.fetchPage}.
 */
export type PageResult =
  | { readonly ok: true; readonly items: readonly unknown[]; readonly meta: PageMeta }
  | { readonly ok: false; readonly items: readonly []; readonly error: PageError };

export interface TelemetrClientOptions {
  readonly config: TelemetrConfig;
  readonly policy: Pick<SearchPolicy, "dateToInclusive">;
  readonly session: HttpSession;
  readonly logger?: StructuredLogger | null;
}

function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

function toCount(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Joins `apiPath` onto `baseUrl`, keeping any path prefix of the base
 * (`https://host/v1` + `/channels/posts/search`). Query and fragment of the
 * base are dropped.
 */
export function resolveEndpoint(config: Pick<TelemetrConfig, "baseUrl" | "apiPath">): URL {
  let endpoint: URL;
  try {
    endpoint = new URL(config.baseUrl);
  } catch (error) {
    throw new ConfigurationError(`TELEMETR_BASE_URL is not a valid URL: '${config.baseUrl}'`, ERROR_CONFIG_INVALID, {
      cause: error,
    });
  }
  if (endpoint.protocol !== "http:" && endpoint.protocol !== "https:") {
    throw new ConfigurationError(
      `TELEMETR_BASE_URL must use http or https, received '${config.baseUrl}'`,
      ERROR_CONFIG_INVALID,
    );
  }
  const prefix = endpoint.pathname.replace(/\/+$/, "");
  const path = config.apiPath.startsWith("/") ? config.apiPath : `/${config.apiPath}`;
  endpoint.pathname = `${prefix}${path}`;
  endpoint.search = "";
  endpoint.hash = "";
  return endpoint;
}

/** Human readable reason attached to a non-ok envelope. */
function describeFailedEnvelope(envelope: Envelope): string {
  for (const candidate of [envelope.error, envelope.message]) {
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return `status '${envelope.status}'`;
}

/**
 * Page fetcher for the Telemetr posts search API. One instance is bound to
 * one {@link HttpSession}, i.e. to one search invocation.
 */
export class TelemetrClient {
  private readonly config: TelemetrConfig;
  private readonly policy: Pick<SearchPolicy, "dateToInclusive">;
  private readonly session: HttpSession;
  private readonly logger: StructuredLogger | null;

  constructor(options: TelemetrClientOptions) {
    this.config = options.config;
    this.policy = options.policy;
    this.session = options.session;
    this.logger = options.logger ?? null;
  }

  /**
   * Returns the bearer token or throws the fatal configuration error. The
   * orchestrator calls this once before issuing any request.
   */
  requireToken(): string {
    const token = this.config.token?.trim();
    if (!token) {
      throw new ConfigurationError("TELEMETR_TOKEN is not set", ERROR_CONFIG_MISSING_TOKEN);
    }
    return token;
  }

  /**
   * Validated endpoint URL. Throws {@link ConfigurationError} for a base URL
   * that does not parse; the orchestrator calls this next to
   * {@link requireToken}.
   */
  endpoint(): URL {
    return resolveEndpoint(this.config);
  }

  /** Builds the request URL, advancing `date_to` when the policy asks for it. */
  buildPageUrl(request: PageRequest): URL {
    const url = this.endpoint();
    const dateTo = this.policy.dateToInclusive ? addDays(request.range.until, 1) : request.range.until;
    url.search = new URLSearchParams({
      query: request.query,
      date_from: request.range.since,
      date_to: dateTo,
      limit: String(PAGE_SIZE),
      page: String(request.page),
    }).toString();
    return url;
  }

  async fetchPage(request: PageRequest): Promise<PageResult> {
    const token = this.requireToken();
    const url = this.buildPageUrl(request);
    const headers = new Headers({
      Accept: "application/json",
      Authorization: `Bearer ${token}`,
    });

    const maxAttempts = Math.max(1, this.config.maxRetries + 1);
    for (let attempt = 1; ; attempt += 1) {
      try {
        const envelope = await this.performRequest(url, headers);
        return this.unwrapEnvelope(envelope);
      } catch (error) {
        const failure = this.toPageError(error);
        const retriable =
          failure instanceof TransportError && failure.status !== null && isRetriableStatus(failure.status);
        if (!retriable || attempt >= maxAttempts || this.session.signal.aborted) {
          this.logger?.warn("telemetr_page_failed", {
            query: request.query,
            page: request.page,
            attempt,
            code: failure.code,
            status: failure.status,
            message: failure.message,
          });
          return { ok: false, items: [], error: failure };
        }
        const backoffMs = 150 * attempt + Math.floor(Math.random() * 100);
        this.logger?.debug("telemetr_page_retry", {
          query: request.query,
          page: request.page,
          attempt,
          status: failure.status,
          backoff_ms: backoffMs,
        });
        try {
          await delay(backoffMs, undefined, { signal: this.session.signal });
        } catch (abortError) {
          return {
            ok: false,
            items: [],
            error: new TransportError("Request abandoned while backing off", {
              code: ERROR_TELEMETR_NETWORK,
              cause: abortError,
            }),
          };
        }
      }
    }
  }

  private unwrapEnvelope(envelope: Envelope): PageResult {
    if (envelope.status !== "ok") {
      return {
        ok: false,
        items: [],
        error: new ProtocolError(`Telemetr rejected the query: ${describeFailedEnvelope(envelope)}`),
      };
    }
    const body = envelope.response ?? null;
    return {
      ok: true,
      items: body?.items ?? [],
      meta: {
        count: toCount(body?.count),
        totalCount: toCount(body?.total_count),
      },
    };
  }

  private async performRequest(url: URL, headers: Headers): Promise<Envelope> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.session.request(url, { method: "GET", headers, signal: controller.signal });
      text = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError(
          controller.signal.aborted ? "Telemetr request timed out" : "Telemetr request was aborted",
          { code: ERROR_TELEMETR_NETWORK, cause: error },
        );
      }
      throw new TransportError("Failed to execute request against Telemetr", {
        code: ERROR_TELEMETR_NETWORK,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new TransportError(`Telemetr responded with HTTP ${response.status}`, {
        code: ERROR_TELEMETR_HTTP,
        status: response.status,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError("Unable to parse Telemetr JSON payload", { status: response.status, cause: error });
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ProtocolError("Telemetr payload is not a status envelope", {
        status: response.status,
        cause: envelope.error,
      });
    }
    return envelope.data;
  }

  private toPageError(error: unknown): PageError {
    if (error instanceof TransportError || error instanceof ProtocolError) {
      return error;
    }
    return new TransportError("Unexpected failure while querying Telemetr", {
      code: ERROR_TELEMETR_NETWORK,
      cause: error,
    });
  }
}
