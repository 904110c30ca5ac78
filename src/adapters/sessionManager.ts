import { createHash } from "node:crypto";
import { authenticator } from "otplib";
import { z } from "zod";

import { settings } from "../core/config";
import { AuthenticationError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { Session } from "../types/models";
import { sleep as defaultSleep, toIso } from "../utils/time";
import { fetchTransport, type HttpTransport } from "./httpTransport";

const log = logger.child("session");

export interface SessionGrant {
  token: string;
  expiresAt: number;
}

/** Exchanges long-lived credentials for a short-lived bearer token. */
export interface CredentialExchange {
  exchange(): Promise<SessionGrant>;
}

export interface TotpExchangeOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  totpSeed: string;
  timeoutMs: number;
  defaultTtlMs?: number;
  now?: () => number;
}

const tokenResponseSchema = z.object({
  token: z.string().min(1),
  expiry: z.union([z.string(), z.number()]).nullish()
});

const parseExpiry = (value: string | number | null | undefined, fallbackMs: number): number => {
  if (value === null || value === undefined) return fallbackMs;
  if (typeof value === "number") {
    // seconds or milliseconds since epoch
    return value < 10_000_000_000 ? value * 1_000 : value;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : fallbackMs;
};

export class TotpCredentialExchange implements CredentialExchange {
  private readonly now: () => number;

  constructor(
    private readonly options: TotpExchangeOptions,
    private readonly transport: HttpTransport = fetchTransport
  ) {
    this.now = options.now ?? Date.now;
  }

  async exchange(): Promise<SessionGrant> {
    if (!this.options.apiKey || !this.options.totpSeed) {
      throw new Error("Upstream API key and TOTP seed must be configured");
    }

    const timestamp = Math.floor(this.now() / 1_000).toString();
    const totp = authenticator.generate(this.options.totpSeed);
    const checksum = createHash("sha256")
      .update(`${this.options.apiSecret}${timestamp}`)
      .digest("hex");

    const response = await this.transport({
      url: `${this.options.baseUrl.replace(/\/+$/, "")}/v1/token/api/access`,
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
        Accept: "application/json"
      },
      body: JSON.stringify({ key_type: "totp", totp, checksum, timestamp }),
      timeoutMs: this.options.timeoutMs,
      reason: "Exchange TOTP for access token"
    });

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Token exchange returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (error) {
      throw new Error("Token exchange returned a non-JSON body", { cause: error });
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("Token exchange response is missing a token");
    }

    const fallbackExpiry = this.now() + (this.options.defaultTtlMs ?? 8 * 60 * 60 * 1_000);
    return {
      token: parsed.data.token,
      expiresAt: parseExpiry(parsed.data.expiry, fallbackExpiry)
    };
  }
}

export const buildDefaultExchange = (transport?: HttpTransport): CredentialExchange =>
  new TotpCredentialExchange(
    {
      baseUrl: settings.upstreamBaseUrl,
      apiKey: settings.upstreamApiKey,
      apiSecret: settings.upstreamApiSecret,
      totpSeed: settings.upstreamTotpSeed,
      timeoutMs: settings.upstreamTimeoutMs
    },
    transport
  );

export interface SessionManagerOptions {
  dedupWindowMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  expirySkewMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SessionStatus {
  hasToken: boolean;
  stale: boolean;
  issuedAt: string | null;
  expiresAt: string | null;
  refreshCount: number;
  refreshInFlight: boolean;
  lastRefreshAt: string | null;
  lastError: string | null;
}

/**
 * Sole owner of the upstream bearer token. At most one credential exchange
 * runs at a time; callers arriving during a refresh await the same promise.
 */
export class SessionManager {
  private session: Session | null = null;
  private stale: "reported" | "rejected" | null = null;
  private refreshInFlight: Promise<Session> | null = null;
  private lastRefreshCompletedAt: number | null = null;
  private refreshCount = 0;
  private lastError: string | null = null;

  private readonly dedupWindowMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly expirySkewMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly exchange: CredentialExchange,
    options: SessionManagerOptions = {}
  ) {
    this.dedupWindowMs = options.dedupWindowMs ?? settings.sessionRefreshDedupMs;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? settings.sessionRefreshMaxAttempts);
    this.baseDelayMs = options.baseDelayMs ?? settings.retryBaseDelayMs;
    this.expirySkewMs = options.expirySkewMs ?? settings.sessionExpirySkewMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getValidToken(): Promise<string> {
    const current = this.session;
    if (current && !this.isExpired(current)) {
      if (this.stale === null) return current.token;
      if (this.stale === "reported" && this.refreshedRecently()) {
        // a concurrent 401 already triggered a refresh; this token is the new one
        this.stale = null;
        return current.token;
      }
    }

    const session = await this.refresh();
    return session.token;
  }

  /**
   * Marks the held token stale after the upstream rejected it. Given the
   * rejected token, a rejection of an already replaced token is ignored and a
   * rejection of the held one always forces a refresh. Without it, a refresh
   * completed within the dedup window is trusted.
   */
  invalidate(rejectedToken?: string): void {
    const current = this.session;
    if (!current) return;
    if (rejectedToken === undefined) {
      if (this.stale === null) this.stale = "reported";
      return;
    }
    if (rejectedToken === current.token) this.stale = "rejected";
  }

  getStatus(): SessionStatus {
    return {
      hasToken: this.session !== null,
      stale: this.stale !== null,
      issuedAt: this.session ? toIso(this.session.issuedAt) : null,
      expiresAt: this.session ? toIso(this.session.expiresAt) : null,
      refreshCount: this.refreshCount,
      refreshInFlight: this.refreshInFlight !== null,
      lastRefreshAt: this.lastRefreshCompletedAt !== null ? toIso(this.lastRefreshCompletedAt) : null,
      lastError: this.lastError
    };
  }

  private isExpired(session: Session): boolean {
    return this.now() >= session.expiresAt - this.expirySkewMs;
  }

  private refreshedRecently(): boolean {
    return (
      this.lastRefreshCompletedAt !== null &&
      this.now() - this.lastRefreshCompletedAt < this.dedupWindowMs
    );
  }

  private refresh(): Promise<Session> {
    if (this.refreshInFlight) return this.refreshInFlight;

    const inFlight = this.performRefresh().finally(() => {
      this.refreshInFlight = null;
    });
    this.refreshInFlight = inFlight;
    return inFlight;
  }

  private async performRefresh(): Promise<Session> {
    let delayMs = this.baseDelayMs;
    let lastFailure: unknown = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        const grant = await this.exchange.exchange();
        const session: Session = {
          token: grant.token,
          issuedAt: this.now(),
          expiresAt: grant.expiresAt
        };
        this.session = session;
        this.stale = null;
        this.lastRefreshCompletedAt = this.now();
        this.refreshCount += 1;
        this.lastError = null;
        log.info("Session refreshed", { attempt, expiresAt: toIso(session.expiresAt) });
        return session;
      } catch (error) {
        lastFailure = error;
        log.warn(`Session refresh attempt ${attempt}/${this.maxAttempts} failed`, errorMessage(error));
        if (attempt < this.maxAttempts) {
          await this.sleep(delayMs);
          delayMs *= 2;
        }
      }
    }

    this.lastError = errorMessage(lastFailure);
    throw new AuthenticationError(
      `Session refresh failed after ${this.maxAttempts} attempts: ${this.lastError}`,
      this.maxAttempts,
      { cause: lastFailure }
    );
  }
}
