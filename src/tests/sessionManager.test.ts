import { createHash } from "node:crypto";
import { describe, expect, test } from "vitest";

import type { HttpRequest, HttpResponse } from "../adapters/httpTransport";
import {
  SessionManager,
  TotpCredentialExchange,
  type CredentialExchange,
  type SessionGrant
} from "../adapters/sessionManager";
import { AuthenticationError } from "../core/errors";

class ScriptedExchange implements CredentialExchange {
  calls = 0;

  constructor(private readonly script: Array<SessionGrant | Error>) {}

  async exchange(): Promise<SessionGrant> {
    this.calls += 1;
    const next = this.script[Math.min(this.calls - 1, this.script.length - 1)];
    if (next === undefined) throw new Error("empty script");
    if (next instanceof Error) throw next;
    return next;
  }
}

const HOUR_MS = 60 * 60 * 1_000;

const buildManager = (exchange: CredentialExchange, clock: { now: number }, sleeps: number[] = []) =>
  new SessionManager(exchange, {
    dedupWindowMs: 5_000,
    maxAttempts: 3,
    baseDelayMs: 100,
    expirySkewMs: 30_000,
    now: () => clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });

describe("SessionManager", () => {
  test("concurrent callers share a single credential exchange", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([{ token: "token-a", expiresAt: clock.now + 8 * HOUR_MS }]);
    const manager = buildManager(exchange, clock);

    const tokens = await Promise.all(Array.from({ length: 10 }, () => manager.getValidToken()));

    expect(exchange.calls).toBe(1);
    expect(new Set(tokens)).toEqual(new Set(["token-a"]));
    expect(manager.getStatus().refreshCount).toBe(1);
  });

  test("reuses a valid token and refreshes once it is inside the expiry skew", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([
      { token: "token-a", expiresAt: 1_000_000 + HOUR_MS },
      { token: "token-b", expiresAt: 1_000_000 + 3 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock);

    expect(await manager.getValidToken()).toBe("token-a");
    clock.now += HOUR_MS / 2;
    expect(await manager.getValidToken()).toBe("token-a");
    expect(exchange.calls).toBe(1);

    clock.now = 1_000_000 + HOUR_MS - 10_000;
    expect(await manager.getValidToken()).toBe("token-b");
    expect(exchange.calls).toBe(2);
  });

  test("an invalidated token is refreshed outside the dedup window", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([
      { token: "token-a", expiresAt: 1_000_000 + 8 * HOUR_MS },
      { token: "token-b", expiresAt: 1_000_000 + 8 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock);

    await manager.getValidToken();
    clock.now += 60_000;
    manager.invalidate();
    expect(manager.getStatus().stale).toBe(true);

    expect(await manager.getValidToken()).toBe("token-b");
    expect(exchange.calls).toBe(2);
    expect(manager.getStatus().stale).toBe(false);
  });

  test("an invalidation right after a refresh reuses the fresh token", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([
      { token: "token-a", expiresAt: 1_000_000 + 8 * HOUR_MS },
      { token: "token-b", expiresAt: 1_000_000 + 8 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock);

    await manager.getValidToken();
    clock.now += 1_000;
    manager.invalidate();

    expect(await manager.getValidToken()).toBe("token-a");
    expect(exchange.calls).toBe(1);
  });

  test("a rejection of the held token refreshes even inside the dedup window", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([
      { token: "token-a", expiresAt: 1_000_000 + 8 * HOUR_MS },
      { token: "token-b", expiresAt: 1_000_000 + 8 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock);

    await manager.getValidToken();
    clock.now += 1_000;
    manager.invalidate("token-a");

    expect(await manager.getValidToken()).toBe("token-b");
    expect(exchange.calls).toBe(2);
  });

  test("ignores rejections of a token that was already replaced", async () => {
    const clock = { now: 1_000_000 };
    const exchange = new ScriptedExchange([
      { token: "token-a", expiresAt: 1_000_000 + 8 * HOUR_MS },
      { token: "token-b", expiresAt: 1_000_000 + 8 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock);

    await manager.getValidToken();
    manager.invalidate("token-a");
    const concurrent = await Promise.all(
      Array.from({ length: 5 }, async () => {
        manager.invalidate("token-a");
        return manager.getValidToken();
      })
    );
    manager.invalidate("token-a");

    expect(new Set(concurrent)).toEqual(new Set(["token-b"]));
    expect(await manager.getValidToken()).toBe("token-b");
    expect(exchange.calls).toBe(2);
    expect(manager.getStatus().stale).toBe(false);
  });

  test("retries with doubling backoff before succeeding", async () => {
    const clock = { now: 1_000_000 };
    const sleeps: number[] = [];
    const exchange = new ScriptedExchange([
      new Error("gateway down"),
      new Error("gateway down"),
      { token: "token-c", expiresAt: 1_000_000 + 8 * HOUR_MS }
    ]);
    const manager = buildManager(exchange, clock, sleeps);

    expect(await manager.getValidToken()).toBe("token-c");
    expect(exchange.calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  test("raises AuthenticationError after exhausting attempts", async () => {
    const clock = { now: 1_000_000 };
    const sleeps: number[] = [];
    const exchange = new ScriptedExchange([new Error("bad totp")]);
    const manager = buildManager(exchange, clock, sleeps);

    const failure = await manager.getValidToken().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(AuthenticationError);
    expect(failure instanceof AuthenticationError ? failure.attempts : null).toBe(3);
    expect(exchange.calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(manager.getStatus()).toMatchObject({ hasToken: false, lastError: "bad totp" });
  });
});

describe("TotpCredentialExchange", () => {
  const nowMs = 1_700_000_000_000;
  const options = {
    baseUrl: "https://upstream.test/",
    apiKey: "test-key",
    apiSecret: "test-secret",
    totpSeed: "JBSWY3DPEHPK3PXP",
    timeoutMs: 1_000,
    now: () => nowMs
  };

  const respondWith = (response: HttpResponse, seen: HttpRequest[]) => async (request: HttpRequest) => {
    seen.push(request);
    return response;
  };

  test("posts a TOTP exchange and parses an epoch-seconds expiry", async () => {
    const seen: HttpRequest[] = [];
    const exchange = new TotpCredentialExchange(
      options,
      respondWith({ status: 200, text: JSON.stringify({ token: "tok-1", expiry: 1_700_003_600 }), headers: {} }, seen)
    );

    const grant = await exchange.exchange();

    expect(grant).toEqual({ token: "tok-1", expiresAt: 1_700_003_600_000 });
    expect(seen).toHaveLength(1);
    const request = seen[0];
    expect(request?.url).toBe("https://upstream.test/v1/token/api/access");
    expect(request?.method).toBe("POST");
    expect(request?.headers.Authorization).toBe("Bearer test-key");

    const body: unknown = JSON.parse(request?.body ?? "{}");
    expect(body).toMatchObject({
      key_type: "totp",
      timestamp: "1700000000",
      checksum: createHash("sha256").update("test-secret1700000000").digest("hex")
    });
    expect(body).toHaveProperty("totp", expect.stringMatching(/^\d{6}$/));
  });

  test("falls back to an eight hour lifetime when no expiry is returned", async () => {
    const exchange = new TotpCredentialExchange(
      options,
      respondWith({ status: 200, text: JSON.stringify({ token: "tok-2" }), headers: {} }, [])
    );

    expect(await exchange.exchange()).toEqual({ token: "tok-2", expiresAt: nowMs + 8 * HOUR_MS });
  });

  test("rejects non-2xx responses and missing credentials", async () => {
    const failing = new TotpCredentialExchange(
      options,
      respondWith({ status: 500, text: "oops", headers: {} }, [])
    );
    await expect(failing.exchange()).rejects.toThrow("Token exchange returned HTTP 500");

    const unconfigured = new TotpCredentialExchange({ ...options, apiKey: "" }, respondWith({ status: 200, text: "{}", headers: {} }, []));
    await expect(unconfigured.exchange()).rejects.toThrow("Upstream API key and TOTP seed must be configured");
  });
});
