import { describe, expect, test } from "vitest";

import type { HttpRequest, HttpResponse, HttpTransport } from "../adapters/httpTransport";
import { MarketFeedClient, type BulkOutcome, type TokenSource } from "../adapters/marketFeedClient";
import { RequestBudget } from "../adapters/requestBudget";
import { SessionManager } from "../adapters/sessionManager";
import {
  AuthenticationError,
  RateLimitExceededError,
  TransientNetworkError,
  UpstreamRequestError
} from "../core/errors";

class FakeTokens implements TokenSource {
  invalidations = 0;

  constructor(private readonly failWith?: Error) {}

  async getValidToken(): Promise<string> {
    if (this.failWith) throw this.failWith;
    return "test-token";
  }

  invalidate(): void {
    this.invalidations += 1;
  }
}

const json = (status: number, body: unknown, headers: Record<string, string> = {}): HttpResponse => ({
  status,
  text: JSON.stringify(body),
  headers
});

const scripted = (script: Array<HttpResponse | Error>, seen: HttpRequest[] = []): HttpTransport => {
  let index = 0;
  return async (request) => {
    seen.push(request);
    const next = script[Math.min(index, script.length - 1)];
    index += 1;
    if (next instanceof Error) throw next;
    return next;
  };
};

const buildClient = (
  transport: HttpTransport,
  options: { tokens?: TokenSource; sleeps?: number[]; concurrency?: number } = {}
) =>
  new MarketFeedClient(
    options.tokens ?? new FakeTokens(),
    new RequestBudget({ perSecond: 1_000, perMinute: 100_000 }, () => 0, async () => undefined),
    {
      baseUrl: "https://upstream.test/",
      exchange: "NSE",
      segment: "CASH",
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 1_000,
      concurrency: options.concurrency ?? 2,
      transport,
      sleep: async (ms) => {
        options.sleeps?.push(ms);
      }
    }
  );

const failureOf = async (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    () => null,
    (error: unknown) => error
  );

describe("MarketFeedClient.fetch", () => {
  test("sends an authorized quote request and decodes the body", async () => {
    const seen: HttpRequest[] = [];
    const client = buildClient(scripted([json(200, { last_price: 2_450.5 })], seen));

    const response = await client.fetch(client.quoteRequest("RELIANCE"));

    expect(response).toMatchObject({ symbol: "RELIANCE", shape: "flat", status: 200, attempts: 1 });
    expect(response.body).toEqual({ last_price: 2_450.5 });
    expect(seen[0]?.url).toBe(
      "https://upstream.test/v1/live-data/quote?exchange=NSE&segment=CASH&trading_symbol=RELIANCE"
    );
    expect(seen[0]?.headers.Authorization).toBe("Bearer test-token");
  });

  test("retries server errors with doubling backoff", async () => {
    const sleeps: number[] = [];
    const client = buildClient(scripted([json(503, {}), json(503, {}), json(200, { ltp: 10 })]), { sleeps });

    const response = await client.fetch(client.quoteRequest("TCS"));

    expect(response.attempts).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(client.getMetrics()).toMatchObject({ retryCount: 2, successfulRequests: 1, totalRequests: 3 });
  });

  test("honours Retry-After on 429", async () => {
    const sleeps: number[] = [];
    const client = buildClient(
      scripted([json(429, {}, { "retry-after": "0.5" }), json(200, { ltp: 10 })]),
      { sleeps }
    );

    await client.fetch(client.quoteRequest("INFY"));

    expect(sleeps).toEqual([500]);
    expect(client.getMetrics().rateLimitHits).toBe(1);
  });

  test("gives up after the attempt limit with the last status", async () => {
    const sleeps: number[] = [];
    const client = buildClient(scripted([json(503, {})]), { sleeps });

    const failure = await failureOf(client.fetch(client.quoteRequest("SBIN")));

    expect(failure).toBeInstanceOf(UpstreamRequestError);
    expect(failure).toMatchObject({
      lastStatus: 503,
      attempts: 3,
      message: "Upstream returned HTTP 503 after 3 attempts"
    });
    expect(sleeps).toEqual([100, 200]);
    expect(client.getMetrics()).toMatchObject({ failedRequests: 1, successRate: 0 });
    expect(client.getMetrics().recentErrors[0]).toMatchObject({
      symbol: "SBIN",
      code: "UPSTREAM_REQUEST_FAILED"
    });
  });

  test("classifies exhausted 429s and network failures", async () => {
    const rateLimited = buildClient(scripted([json(429, {})]));
    expect(await failureOf(rateLimited.fetch(rateLimited.quoteRequest("ITC")))).toBeInstanceOf(
      RateLimitExceededError
    );

    const network = buildClient(scripted([new Error("socket hang up")]));
    const networkFailure = await failureOf(network.fetch(network.quoteRequest("ITC")));
    expect(networkFailure).toBeInstanceOf(TransientNetworkError);
    expect(networkFailure).toMatchObject({ message: "Network failure after 3 attempts: socket hang up" });

    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    const slow = buildClient(scripted([timeout]));
    expect(await failureOf(slow.fetch(slow.quoteRequest("ITC")))).toMatchObject({
      message: "Request timed out after 3 attempts"
    });
  });

  test("refreshes the session once on 401", async () => {
    const tokens = new FakeTokens();
    const sleeps: number[] = [];
    const client = buildClient(scripted([json(401, {}), json(200, { ltp: 1 })]), { tokens, sleeps });

    const response = await client.fetch(client.quoteRequest("WIPRO"));

    expect(response.attempts).toBe(2);
    expect(tokens.invalidations).toBe(1);
    expect(sleeps).toEqual([]);
  });

  test("a second 401 fails the request", async () => {
    const tokens = new FakeTokens();
    const client = buildClient(scripted([json(401, {})]), { tokens });

    const failure = await failureOf(client.fetch(client.quoteRequest("WIPRO")));

    expect(failure).toMatchObject({ lastStatus: 401, attempts: 2 });
    expect(tokens.invalidations).toBe(1);
  });

  test("does not retry other client errors or failed envelopes", async () => {
    const sleeps: number[] = [];
    const notFound = buildClient(scripted([json(404, {})]), { sleeps });
    expect(await failureOf(notFound.fetch(notFound.quoteRequest("NOPE")))).toMatchObject({
      lastStatus: 404,
      attempts: 1
    });

    const envelope = buildClient(
      scripted([json(200, { status: "FAILURE", payload: null, error: { message: "bad symbol" } })]),
      { sleeps }
    );
    const failure = await failureOf(envelope.fetch(envelope.quoteRequest("NOPE")));
    expect(failure).toBeInstanceOf(UpstreamRequestError);
    expect(failure).toMatchObject({ message: "Upstream envelope reported failure: bad symbol" });
    expect(sleeps).toEqual([]);
  });

  test("retries a body that is not JSON", async () => {
    const sleeps: number[] = [];
    const client = buildClient(
      scripted([{ status: 200, text: "<html>", headers: {} }, json(200, { ltp: 10 })]),
      { sleeps }
    );

    expect((await client.fetch(client.quoteRequest("HDFCBANK"))).attempts).toBe(2);
    expect(sleeps).toEqual([100]);
  });
});

describe("MarketFeedClient.fetchBulk", () => {
  test("keeps at most `concurrency` requests in flight and isolates failures", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const transport: HttpTransport = async (request) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return request.url.includes("trading_symbol=BAD") ? json(404, {}) : json(200, { ltp: 1 });
    };
    const client = buildClient(transport, { concurrency: 2 });
    const symbols = ["A1", "A2", "BAD", "A4", "A5", "A6"];

    const result = await client.fetchBulk(symbols.map((symbol) => client.quoteRequest(symbol)));

    expect(maxInFlight).toBe(2);
    expect(result.outcomes).toHaveLength(6);
    expect(result.outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.request.symbol)).toEqual([
      "BAD"
    ]);
    expect(result.skipped).toEqual([]);
  });

  test("stops starting new requests once shouldContinue turns false", async () => {
    const client = buildClient(scripted([json(200, { ltp: 1 })]), { concurrency: 1 });
    const seen: string[] = [];

    const result = await client.fetchBulk(
      ["S1", "S2", "S3", "S4", "S5", "S6"].map((symbol) => client.quoteRequest(symbol)),
      {
        shouldContinue: () => seen.length < 2,
        onOutcome: async (outcome) => {
          seen.push(outcome.request.symbol);
        }
      }
    );

    expect(seen).toEqual(["S1", "S2"]);
    expect(result.skipped.map((request) => request.symbol)).toEqual(["S3", "S4", "S5", "S6"]);
  });

  test("an authentication failure is reported and then stops the pool", async () => {
    const tokens = new FakeTokens(new AuthenticationError("no session", 3));
    const client = buildClient(scripted([json(200, { ltp: 1 })]), { tokens, concurrency: 1 });
    const outcomes: BulkOutcome[] = [];

    const failure = await failureOf(
      client.fetchBulk(
        ["S1", "S2", "S3"].map((symbol) => client.quoteRequest(symbol)),
        {
          onOutcome: async (outcome) => {
            outcomes.push(outcome);
          }
        }
      )
    );

    expect(failure).toBeInstanceOf(AuthenticationError);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]?.ok).toBe(false);
  });

  test("concurrent 401s on one token cause a single re-authentication", async () => {
    const issued = ["t1", "t2"];
    let exchanges = 0;
    const session = new SessionManager(
      {
        exchange: async () => {
          const token = issued[Math.min(exchanges, issued.length - 1)] ?? "t2";
          exchanges += 1;
          return { token, expiresAt: Date.now() + 60 * 60 * 1_000 };
        }
      },
      { dedupWindowMs: 5_000, maxAttempts: 1, sleep: async () => undefined }
    );
    const transport: HttpTransport = async (request) =>
      request.headers.Authorization === "Bearer t1" ? json(401, {}) : json(200, { ltp: 10 });
    const client = buildClient(transport, { tokens: session, concurrency: 5 });

    const { outcomes } = await client.fetchBulk(
      ["S1", "S2", "S3", "S4", "S5"].map((symbol) => client.quoteRequest(symbol))
    );

    expect(exchanges).toBe(2);
    expect(outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect(client.getMetrics()).toMatchObject({ authRefreshes: 5, successfulRequests: 5, failedRequests: 0 });
  });
});
