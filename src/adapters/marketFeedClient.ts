import { settings } from "../core/config";
import {
  AuthenticationError,
  NormalizationError,
  RateLimitExceededError,
  TransientNetworkError,
  UpstreamRequestError,
  errorMessage
} from "../core/errors";
import { logger } from "../core/logger";
import { runWithConcurrency } from "../utils/concurrency";
import { round } from "../utils/statistics";
import { nowIso, sleep as defaultSleep } from "../utils/time";
import {
  fetchTransport,
  isTimeoutError,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport
} from "./httpTransport";
import {
  EnvelopeFailureError,
  decodePayload,
  type JsonObject,
  type PayloadShape
} from "./payloadDecoder";
import type { RequestBudget } from "./requestBudget";

const log = logger.child("feed");

export interface UpstreamRequest {
  symbol: string;
  path: string;
  method?: HttpMethod;
  query?: Record<string, string>;
  body?: unknown;
  reason?: string;
}

export interface UpstreamResponse {
  symbol: string;
  shape: PayloadShape;
  body: JsonObject;
  status: number;
  attempts: number;
  latencyMs: number;
}

export type BulkOutcome =
  | { request: UpstreamRequest; ok: true; response: UpstreamResponse }
  | { request: UpstreamRequest; ok: false; error: Error };

export interface BulkOptions {
  concurrency?: number;
  shouldContinue?: () => boolean;
  /** Awaited inside the worker slot, so downstream work shares the pool bound. */
  onOutcome?: (outcome: BulkOutcome) => Promise<void>;
}

export interface BulkResult {
  outcomes: BulkOutcome[];
  skipped: UpstreamRequest[];
}

/** The slice of the session manager the client needs. */
export interface TokenSource {
  getValidToken(): Promise<string>;
  invalidate(rejectedToken?: string): void;
}

export interface MarketFeedClientOptions {
  baseUrl?: string;
  exchange?: string;
  segment?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  concurrency?: number;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ClientMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  retryCount: number;
  rateLimitHits: number;
  authRefreshes: number;
  latencyMs: { min: number | null; avg: number | null; max: number | null };
  lastRequestAt: string | null;
  recentErrors: Array<{ timestamp: string; symbol: string; code: string; message: string }>;
}

type TransientCause =
  | { kind: "network"; error: unknown }
  | { kind: "rate_limit"; status: number; retryAfterMs: number | null }
  | { kind: "server"; status: number }
  | { kind: "malformed"; status: number; error: unknown };

const RECENT_ERROR_LIMIT = 20;

const parseRetryAfterMs = (response: HttpResponse): number | null => {
  const header = response.headers["retry-after"];
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1_000);
  const at = Date.parse(header);
  return Number.isFinite(at) ? Math.max(0, at - Date.now()) : null;
};

export class MarketFeedClient {
  private readonly baseUrl: string;
  private readonly exchange: string;
  private readonly segment: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly concurrency: number;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private retryCount = 0;
  private rateLimitHits = 0;
  private authRefreshes = 0;
  private latencyTotalMs = 0;
  private latencySamples = 0;
  private latencyMinMs: number | null = null;
  private latencyMaxMs: number | null = null;
  private lastRequestAt: string | null = null;
  private recentErrors: ClientMetrics["recentErrors"] = [];

  constructor(
    private readonly session: TokenSource,
    private readonly budget: RequestBudget,
    options: MarketFeedClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? settings.upstreamBaseUrl).replace(/\/+$/, "");
    this.exchange = options.exchange ?? settings.upstreamExchange;
    this.segment = options.segment ?? settings.upstreamSegment;
    this.timeoutMs = options.timeoutMs ?? settings.upstreamTimeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? settings.retryMaxAttempts);
    this.baseDelayMs = options.baseDelayMs ?? settings.retryBaseDelayMs;
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs ?? settings.retryMaxDelayMs);
    this.concurrency = options.concurrency ?? settings.fetchConcurrency;
    this.transport = options.transport ?? fetchTransport;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  quoteRequest(symbol: string): UpstreamRequest {
    return {
      symbol,
      path: "/v1/live-data/quote",
      query: {
        exchange: this.exchange,
        segment: this.segment,
        trading_symbol: symbol
      },
      reason: `Fetch live quote for ${symbol}`
    };
  }

  /**
   * Sends one request under the shared budget, retrying transient failures
   * with exponential backoff and re-authenticating once on a 401.
   */
  async fetch(request: UpstreamRequest): Promise<UpstreamResponse> {
    let attempts = 0;
    let transientFailures = 0;
    let reauthenticated = false;
    let delayMs = this.baseDelayMs;
    const startedMs = this.now();

    while (true) {
      const token = await this.session.getValidToken();
      await this.budget.acquire();
      attempts += 1;
      this.totalRequests += 1;
      this.lastRequestAt = nowIso();

      const sentMs = this.now();
      let response: HttpResponse;
      let cause: TransientCause;

      try {
        response = await this.transport({
          url: this.buildUrl(request),
          method: request.method ?? "GET",
          headers: {
            Authorization: `Bearer ${token}`,
            Accept: "application/json",
            "X-API-VERSION": "1.0",
            ...(request.body !== undefined ? { "Content-Type": "application/json" } : {})
          },
          body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
          timeoutMs: this.timeoutMs,
          reason: request.reason,
          correlationId: request.symbol
        });
        this.recordLatency(this.now() - sentMs);
      } catch (error) {
        cause = { kind: "network", error };
        transientFailures += 1;
        if (transientFailures >= this.maxAttempts) throw this.fail(request, this.exhausted(cause, attempts));
        delayMs = await this.backoff(request, cause, delayMs, transientFailures);
        continue;
      }

      if (response.status === 401) {
        if (reauthenticated) {
          throw this.fail(
            request,
            new UpstreamRequestError(`Upstream rejected credentials for ${request.symbol}`, 401, attempts)
          );
        }
        reauthenticated = true;
        this.authRefreshes += 1;
        this.session.invalidate(token);
        log.info(`Token rejected for ${request.symbol}; refreshing session`);
        continue;
      }

      if (response.status === 429) {
        this.rateLimitHits += 1;
        cause = { kind: "rate_limit", status: 429, retryAfterMs: parseRetryAfterMs(response) };
      } else if (response.status >= 500) {
        cause = { kind: "server", status: response.status };
      } else if (response.status < 200 || response.status >= 300) {
        throw this.fail(
          request,
          new UpstreamRequestError(
            `Upstream returned HTTP ${response.status} for ${request.symbol}`,
            response.status,
            attempts
          )
        );
      } else {
        let parsed: unknown;
        try {
          parsed = JSON.parse(response.text);
        } catch (error) {
          cause = { kind: "malformed", status: response.status, error };
          transientFailures += 1;
          if (transientFailures >= this.maxAttempts) throw this.fail(request, this.exhausted(cause, attempts));
          delayMs = await this.backoff(request, cause, delayMs, transientFailures);
          continue;
        }

        try {
          const decoded = decodePayload(parsed, request.symbol);
          this.successfulRequests += 1;
          return {
            symbol: request.symbol,
            shape: decoded.shape,
            body: decoded.body,
            status: response.status,
            attempts,
            latencyMs: this.now() - startedMs
          };
        } catch (error) {
          if (error instanceof EnvelopeFailureError) {
            throw this.fail(
              request,
              new UpstreamRequestError(error.message, response.status, attempts, { cause: error })
            );
          }
          throw this.fail(request, error instanceof Error ? error : new NormalizationError(String(error)));
        }
      }

      transientFailures += 1;
      if (transientFailures >= this.maxAttempts) throw this.fail(request, this.exhausted(cause, attempts));
      delayMs = await this.backoff(request, cause, delayMs, transientFailures);
    }
  }

  /**
   * Fetches many requests on a bounded worker pool. Per-request failures come
   * back as outcomes. An {@link AuthenticationError}, or an error thrown from
   * `onOutcome`, stops the pool; the call rejects once in-flight work drains.
   */
  async fetchBulk(requests: readonly UpstreamRequest[], options: BulkOptions = {}): Promise<BulkResult> {
    const outcomes: BulkOutcome[] = [];

    const { skipped } = await runWithConcurrency(
      requests,
      async (request) => {
        let outcome: BulkOutcome;
        try {
          outcome = { request, ok: true, response: await this.fetch(request) };
        } catch (error) {
          outcome = {
            request,
            ok: false,
            error: error instanceof Error ? error : new Error(String(error))
          };
        }
        outcomes.push(outcome);
        if (options.onOutcome) await options.onOutcome(outcome);
        if (!outcome.ok && outcome.error instanceof AuthenticationError) throw outcome.error;
      },
      {
        concurrency: options.concurrency ?? this.concurrency,
        shouldContinue: options.shouldContinue
      }
    );

    return { outcomes, skipped };
  }

  getMetrics(): ClientMetrics {
    const settled = this.successfulRequests + this.failedRequests;
    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      successRate: settled > 0 ? round((this.successfulRequests / settled) * 100) : 0,
      retryCount: this.retryCount,
      rateLimitHits: this.rateLimitHits,
      authRefreshes: this.authRefreshes,
      latencyMs: {
        min: this.latencyMinMs,
        avg: this.latencySamples > 0 ? round(this.latencyTotalMs / this.latencySamples) : null,
        max: this.latencyMaxMs
      },
      lastRequestAt: this.lastRequestAt,
      recentErrors: [...this.recentErrors]
    };
  }

  resetMetrics(): void {
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.retryCount = 0;
    this.rateLimitHits = 0;
    this.authRefreshes = 0;
    this.latencyTotalMs = 0;
    this.latencySamples = 0;
    this.latencyMinMs = null;
    this.latencyMaxMs = null;
    this.lastRequestAt = null;
    this.recentErrors = [];
  }

  private buildUrl(request: UpstreamRequest): string {
    const url = new URL(`${this.baseUrl}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async backoff(
    request: UpstreamRequest,
    cause: TransientCause,
    delayMs: number,
    failures: number
  ): Promise<number> {
    this.retryCount += 1;
    const waitMs = cause.kind === "rate_limit" && cause.retryAfterMs !== null
      ? Math.min(this.maxDelayMs, Math.max(delayMs, cause.retryAfterMs))
      : delayMs;
    log.debug(`Retry ${failures + 1}/${this.maxAttempts} for ${request.symbol} after ${cause.kind}`, {
      waitMs
    });
    await this.sleep(waitMs);
    return Math.min(this.maxDelayMs, delayMs * 2);
  }

  private exhausted(cause: TransientCause, attempts: number): Error {
    switch (cause.kind) {
      case "rate_limit":
        return new RateLimitExceededError(
          `Rate limited after ${attempts} attempts`,
          attempts,
          cause.retryAfterMs
        );
      case "network":
        return isTimeoutError(cause.error)
          ? new TransientNetworkError(`Request timed out after ${attempts} attempts`, attempts, {
              cause: cause.error
            })
          : new TransientNetworkError(
              `Network failure after ${attempts} attempts: ${errorMessage(cause.error)}`,
              attempts,
              { cause: cause.error }
            );
      case "server":
        return new UpstreamRequestError(
          `Upstream returned HTTP ${cause.status} after ${attempts} attempts`,
          cause.status,
          attempts
        );
      case "malformed":
        return new UpstreamRequestError(
          `Upstream returned a malformed body after ${attempts} attempts`,
          cause.status,
          attempts,
          { cause: cause.error }
        );
    }
  }

  private fail(request: UpstreamRequest, error: Error): Error {
    this.failedRequests += 1;
    const code = "code" in error && typeof error.code === "string" ? error.code : error.name;
    this.recentErrors.push({
      timestamp: nowIso(),
      symbol: request.symbol,
      code,
      message: error.message
    });
    if (this.recentErrors.length > RECENT_ERROR_LIMIT) {
      this.recentErrors = this.recentErrors.slice(-RECENT_ERROR_LIMIT);
    }
    log.warn(`Request for ${request.symbol} failed`, { code, message: error.message });
    return error;
  }

  private recordLatency(latencyMs: number): void {
    this.latencyTotalMs += latencyMs;
    this.latencySamples += 1;
    this.latencyMinMs = this.latencyMinMs === null ? latencyMs : Math.min(this.latencyMinMs, latencyMs);
    this.latencyMaxMs = this.latencyMaxMs === null ? latencyMs : Math.max(this.latencyMaxMs, latencyMs);
  }
}
