import process from "node:process";

/** Placeholder inserted wherever a secret is scrubbed. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values never reach the output verbatim. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "bearer",
]);

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /**
   * Literal substrings or patterns scrubbed from every string inside the
   * payload (the provider token, typically).
   */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Disables the key-based redaction; tests use it to inspect raw payloads. */
  readonly redactionEnabled?: boolean;
  /** Destination of the JSON lines. Defaults to stdout. */
  readonly write?: ((line: string) => void) | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting one JSON object per line. Payloads are cloned
 * through the redaction pass before they are serialised, so callers may log
 * request headers or configuration blocks directly.
 */
export class StructuredLogger {
  private readonly minRank: number;
  private readonly redactSecrets: ReadonlyArray<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly write: ((line: string) => void) | null;
  private readonly entryListener?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.minRank = LEVEL_RANK[options.level ?? "info"];
    this.redactSecrets = (options.redactSecrets ?? []).filter(
      (secret) => typeof secret !== "string" || secret.length > 0,
    );
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.write =
      options.write === undefined ? (line: string) => process.stdout.write(line) : options.write;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    if (this.write) {
      this.write(`${JSON.stringify(entry)}\n`);
    }
    if (this.entryListener) {
      this.entryListener(entry);
    }
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrubSecrets(value);
    }
    if (value instanceof Error) {
      return { name: value.name, message: this.scrubSecrets(value.message) };
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private scrubSecrets(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}
