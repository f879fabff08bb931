import { expect } from "chai";
import sinon, { type SinonStub } from "sinon";

import {
  ConfigurationError,
  ERROR_CONFIG_MISSING_TOKEN,
  ERROR_TELEMETR_HTTP,
  ERROR_TELEMETR_NETWORK,
  ERROR_TELEMETR_PROTOCOL,
  HttpSession,
  TelemetrClient,
  resolveEndpoint,
  type PageError,
  type PageRequest,
  type PageResult,
  type TelemetrConfig,
} from "../../../src/search/index.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";
import {
  createProvider,
  createSearchConfig,
  hangUntilAborted,
  jsonResponse,
  okPage,
  type ProviderHandler,
} from "../../helpers/telemetrProvider.js";

const request: PageRequest = {
  query: '"market report"',
  range: { since: "2025-10-01", until: "2025-10-05" },
  page: 1,
};

function createClient(
  handler: ProviderHandler,
  overrides: { config?: Partial<TelemetrConfig>; dateToInclusive?: boolean; logger?: RecordingLogger } = {},
) {
  const provider = createProvider(handler);
  const session = new HttpSession(provider.fetchImpl);
  const client = new TelemetrClient({
    config: { ...createSearchConfig().telemetr, ...overrides.config },
    policy: { dateToInclusive: overrides.dateToInclusive ?? false },
    session,
    logger: overrides.logger ?? null,
  });
  return { client, session, requests: provider.requests };
}

function expectFailure(result: PageResult): PageError {
  expect(result.ok).to.equal(false);
  if (result.ok) {
    throw new Error("expected the page to fail");
  }
  expect(result.items).to.deep.equal([]);
  return result.error;
}

describe("search/telemetrClient", () => {
  let randomStub: SinonStub | null = null;

  afterEach(() => {
    randomStub?.restore();
    randomStub = null;
  });

  it("builds the page URL with quoted query, dates and paging", () => {
    const { client } = createClient(() => okPage([]));
    expect(client.buildPageUrl(request).toString()).to.equal(
      "https://api.telemetr.test/channels/posts/search" +
        "?query=%22market+report%22&date_from=2025-10-01&date_to=2025-10-05&limit=50&page=1",
    );
  });

  it("keeps the path prefix of the base URL", () => {
    const apiPath = "/channels/posts/search";
    expect(resolveEndpoint({ baseUrl: "https://proxy.telemetr.test/v1", apiPath }).toString()).to.equal(
      "https://proxy.telemetr.test/v1/channels/posts/search",
    );
    const withQuery = resolveEndpoint({ baseUrl: "https://proxy.telemetr.test/v1/?x=1", apiPath: "channels/posts/search" });
    expect(withQuery.toString()).to.equal("https://proxy.telemetr.test/v1/channels/posts/search");
    const { client } = createClient(() => okPage([]), { config: { baseUrl: "https://proxy.telemetr.test/v1" } });
    expect(client.buildPageUrl(request).pathname).to.equal("/v1/channels/posts/search");
  });

  it("rejects a base URL without a scheme as a configuration error", () => {
    const { client } = createClient(() => okPage([]), { config: { baseUrl: "api.telemetr.me" } });
    expect(() => client.endpoint()).to.throw(
      ConfigurationError,
      "TELEMETR_BASE_URL is not a valid URL: 'api.telemetr.me'",
    );
  });

  it("advances date_to by one day when the bound is inclusive", () => {
    const { client } = createClient(() => okPage([]), { dateToInclusive: true });
    const url = client.buildPageUrl({ ...request, range: { since: "2025-10-01", until: "2025-10-31" }, page: 2 });
    expect(url.searchParams.get("date_to")).to.equal("2025-11-01");
    expect(url.searchParams.get("page")).to.equal("2");
  });

  it("sends the bearer token and returns the page items", async () => {
    const items = [{ text: "market report" }, "plain string"];
    const { client, requests } = createClient(() => okPage(items, { total_count: "120" }));

    const result = await client.fetchPage(request);

    expect(result).to.deep.equal({ ok: true, items, meta: { count: 2, totalCount: 120 } });
    expect(requests).to.have.length(1);
    expect(requests[0]?.headers.get("authorization")).to.equal("Bearer test-token");
    expect(requests[0]?.headers.get("accept")).to.equal("application/json");
    expect(requests[0]?.query).to.equal('"market report"');
  });

  it("treats a missing item list as an empty page", async () => {
    const { client } = createClient(() => jsonResponse({ status: "ok" }));
    expect(await client.fetchPage(request)).to.deep.equal({
      ok: true,
      items: [],
      meta: { count: null, totalCount: null },
    });
  });

  it("reports a rejected envelope as a protocol error", async () => {
    const { client } = createClient(() => jsonResponse({ status: "error", error: "query too short" }));
    const error = expectFailure(await client.fetchPage(request));
    expect(error.code).to.equal(ERROR_TELEMETR_PROTOCOL);
    expect(error.message).to.equal("Telemetr rejected the query: query too short");
  });

  it("falls back to the status when the envelope carries no reason", async () => {
    const { client } = createClient(() => jsonResponse({ status: "limit" }));
    const error = expectFailure(await client.fetchPage(request));
    expect(error.message).to.equal("Telemetr rejected the query: status 'limit'");
  });

  it("rejects bodies that are not JSON", async () => {
    const { client } = createClient(() => new Response("<html>maintenance</html>", { status: 200 }));
    const error = expectFailure(await client.fetchPage(request));
    expect(error.code).to.equal(ERROR_TELEMETR_PROTOCOL);
    expect(error.message).to.equal("Unable to parse Telemetr JSON payload");
    expect(error.status).to.equal(200);
  });

  it("rejects JSON that is not a status envelope", async () => {
    const { client } = createClient(() => jsonResponse([{ text: "market report" }]));
    const error = expectFailure(await client.fetchPage(request));
    expect(error.message).to.equal("Telemetr payload is not a status envelope");
  });

  it("does not retry non-retriable HTTP statuses", async () => {
    const { client, requests } = createClient(() => jsonResponse({ status: "error" }, 500), {
      config: { maxRetries: 2 },
    });
    const error = expectFailure(await client.fetchPage(request));
    expect(error.code).to.equal(ERROR_TELEMETR_HTTP);
    expect(error.status).to.equal(500);
    expect(error.message).to.equal("Telemetr responded with HTTP 500");
    expect(requests).to.have.length(1);
  });

  it("retries retriable statuses before succeeding", async () => {
    randomStub = sinon.stub(Math, "random").returns(0);
    const logger = new RecordingLogger();
    let calls = 0;
    const { client, requests } = createClient(
      () => {
        calls += 1;
        return calls === 1 ? jsonResponse({}, 503) : okPage([{ text: "market report" }]);
      },
      { config: { maxRetries: 1 }, logger },
    );

    const result = await client.fetchPage(request);

    expect(result.ok).to.equal(true);
    expect(requests).to.have.length(2);
    expect(logger.entries).to.deep.equal([
      {
        level: "debug",
        message: "telemetr_page_retry",
        payload: { query: '"market report"', page: 1, attempt: 1, status: 503, backoff_ms: 150 },
      },
    ]);
  });

  it("gives up after the retry budget and logs the failure", async () => {
    randomStub = sinon.stub(Math, "random").returns(0);
    const logger = new RecordingLogger();
    const { client, requests } = createClient(() => jsonResponse({}, 429), { config: { maxRetries: 1 }, logger });

    const error = expectFailure(await client.fetchPage(request));

    expect(error.status).to.equal(429);
    expect(requests).to.have.length(2);
    expect(logger.messages()).to.deep.equal(["telemetr_page_retry", "telemetr_page_failed"]);
    expect(logger.entries[1]?.payload).to.deep.equal({
      query: '"market report"',
      page: 1,
      attempt: 2,
      code: ERROR_TELEMETR_HTTP,
      status: 429,
      message: "Telemetr responded with HTTP 429",
    });
  });

  it("wraps network failures", async () => {
    const { client } = createClient(() => {
      throw new TypeError("fetch failed");
    });
    const error = expectFailure(await client.fetchPage(request));
    expect(error.code).to.equal(ERROR_TELEMETR_NETWORK);
    expect(error.status).to.equal(null);
    expect(error.message).to.equal("Failed to execute request against Telemetr");
    expect(error.cause).to.be.instanceOf(TypeError);
  });

  it("times out slow requests", async () => {
    const clock = sinon.useFakeTimers();
    try {
      const { client } = createClient(({ signal }) => hangUntilAborted(signal), { config: { timeoutMs: 1_000 } });
      const pending = client.fetchPage(request);
      await clock.tickAsync(1_000);
      const error = expectFailure(await pending);
      expect(error.code).to.equal(ERROR_TELEMETR_NETWORK);
      expect(error.message).to.equal("Telemetr request timed out");
    } finally {
      clock.restore();
    }
  });

  it("reports requests aborted by a closed session", async () => {
    const { client, session } = createClient(({ signal }) => hangUntilAborted(signal));
    const pending = client.fetchPage(request);
    session.close();
    const error = expectFailure(await pending);
    expect(error.message).to.equal("Telemetr request was aborted");
  });

  it("refuses to run without a token", async () => {
    const { client, requests } = createClient(() => okPage([]), { config: { token: "   " } });
    expect(() => client.requireToken()).to.throw(ConfigurationError, "TELEMETR_TOKEN is not set");

    let captured: unknown;
    try {
      await client.fetchPage(request);
    } catch (error) {
      captured = error;
    }
    expect(captured).to.be.instanceOf(ConfigurationError);
    expect(captured instanceof ConfigurationError ? captured.code : null).to.equal(ERROR_CONFIG_MISSING_TOKEN);
    expect(requests).to.have.length(0);
  });
});
