/** Error code raised when the provider credential is absent. */
export const ERROR_CONFIG_MISSING_TOKEN = "E-CONFIG-MISSING-TOKEN" as const;
/** Error code raised when a policy or configuration value is out of range. */
export const ERROR_CONFIG_INVALID = "E-CONFIG-INVALID" as const;
/** Error code emitted when Telemetr responds with a non-success HTTP status. */
export const ERROR_TELEMETR_HTTP = "E-TELEMETR-HTTP" as const;
/** Error code emitted when the request fails due to network errors/timeouts. */
export const ERROR_TELEMETR_NETWORK = "E-TELEMETR-NETWORK" as const;
/** Error code emitted when the payload is not a well-formed success envelope. */
export const ERROR_TELEMETR_PROTOCOL = "E-TELEMETR-PROTOCOL" as const;
/** Error code raised when the caller aborts a search or its budget runs out. */
export const ERROR_SEARCH_CANCELLED = "E-SEARCH-CANCELLED" as const;

export type ConfigurationErrorCode = typeof ERROR_CONFIG_MISSING_TOKEN | typeof ERROR_CONFIG_INVALID;
export type TransportErrorCode = typeof ERROR_TELEMETR_HTTP | typeof ERROR_TELEMETR_NETWORK;

/** Base class carrying a stable machine-readable {@link code}. */
export abstract class SearchError extends Error {
  public abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Fatal precondition failure. The only error that crosses `search()` besides cancellation. */
export class ConfigurationError extends SearchError {
  public readonly code: ConfigurationErrorCode;

  constructor(message: string, code: ConfigurationErrorCode = ERROR_CONFIG_INVALID, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
    this.code = code;
  }
}

/** Network failure, timeout, or non-2xx status on a page request. */
export class TransportError extends SearchError {
  public readonly code: TransportErrorCode;
  public readonly status: number | null;

  constructor(message: string, options: { code: TransportErrorCode; status?: number | null; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "TransportError";
    this.code = options.code;
    this.status = options.status ?? null;
  }
}

/** The provider answered, but not with a `status: "ok"` JSON envelope. */
export class ProtocolError extends SearchError {
  public readonly code = ERROR_TELEMETR_PROTOCOL;
  public readonly status: number | null;

  constructor(message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProtocolError";
    this.status = options.status ?? null;
  }
}

/** Raised when the caller's signal fires or the overall budget elapses. */
export class SearchCancelledError extends SearchError {
  public readonly code = ERROR_SEARCH_CANCELLED;

  constructor(message = "Search was cancelled", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SearchCancelledError";
  }
}

/** Page-level failures surfaced to the orchestrator as values. */
export type PageError = TransportError | ProtocolError;
