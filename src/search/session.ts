/**
 * Outbound HTTP session shared by every request of one `search()` call.
 * Closing the session aborts whatever is still in flight and refuses new
 * requests, which is how cancellation reaches the page fetches.
 */
export class HttpSession {
  private readonly controller = new AbortController();
  private readonly fetchImpl: typeof fetch;
  private closed = false;

  constructor(fetchImpl: typeof fetch = fetch) {
    this.fetchImpl = fetchImpl;
  }

  /** Fires when the session is closed or cancelled. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Issues a request through the session. The request aborts when either the
   * session or the caller-provided {@link init} signal fires.
   */
  async request(input: URL, init: RequestInit = {}): Promise<Response> {
    if (this.closed) {
      throw new Error("HTTP session is closed");
    }
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    const external = init.signal ?? null;
    if (external?.aborted) {
      controller.abort();
    }
    external?.addEventListener("abort", abort, { once: true });
    this.controller.signal.addEventListener("abort", abort, { once: true });
    try {
      return await this.fetchImpl(input, { ...init, signal: controller.signal });
    } finally {
      external?.removeEventListener("abort", abort);
      this.controller.signal.removeEventListener("abort", abort);
    }
  }

  /** Idempotent. Aborts in-flight requests. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.controller.abort();
  }
}

/**
 * Opens a session, runs {@link body}, and closes the session on every exit
 * path.
 */
export async function withHttpSession<T>(
  fetchImpl: typeof fetch | undefined,
  body: (session: HttpSession) => Promise<T>,
): Promise<T> {
  const session = new HttpSession(fetchImpl);
  try {
    return await body(session);
  } finally {
    session.close();
  }
}
