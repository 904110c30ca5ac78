import { afterEach, describe, expect, test } from "vitest";

import { buildApp } from "../server";
import type { ServiceContainer } from "../services/container";
import { buildHarness } from "./harness";

type App = Awaited<ReturnType<typeof buildApp>>;

const QUOTES = {
  TCS: { last_price: 102, previous_close: 100, volume: 5_000 },
  INFY: { last_price: 99, previous_close: 100, volume: 8_000 }
};

let app: App | null = null;
let services: ServiceContainer | null = null;

const start = async (): Promise<App> => {
  services = buildHarness({ quotes: QUOTES });
  app = await buildApp({ services });
  return app;
};

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
  if (services) {
    await services.close();
    services = null;
  }
});

describe("API routes", () => {
  test("health endpoint responds ok", async () => {
    const server = await start();

    const response = await server.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok", env: "test" });
  });

  test("runs a pipeline job and serves its results", async () => {
    const server = await start();

    const run = await server.inject({
      method: "POST",
      url: "/pipeline/run",
      payload: { symbols: ["TCS", "INFY"], wait: true }
    });
    expect(run.statusCode).toBe(200);
    expect(run.json().job).toMatchObject({
      status: "success",
      trigger: "manual",
      progressPercent: 100,
      counts: { total: 2, successful: 2, failed: 0, skipped: 0 }
    });

    const history = await server.inject({ method: "GET", url: "/pipeline/history?limit=5" });
    expect(history.json()).toMatchObject({ count: 1 });

    const quote = await server.inject({ method: "GET", url: "/stocks/tcs/quote" });
    expect(quote.statusCode).toBe(200);
    expect(quote.json()).toMatchObject({ symbol: "TCS", fields: { current_price: 102 } });

    const movers = await server.inject({ method: "GET", url: "/pipeline/top-movers?count=1" });
    expect(movers.json()).toEqual({
      gainers: [{ member: "TCS", score: 2 }],
      losers: [{ member: "INFY", score: -1 }],
      source: "cache"
    });
  });

  test("scores a stored symbol and caches the analysis", async () => {
    const server = await start();
    await server.inject({ method: "POST", url: "/pipeline/run", payload: { symbols: ["TCS"], wait: true } });

    const first = await server.inject({ method: "GET", url: "/stocks/TCS/analysis" });
    const second = await server.inject({ method: "GET", url: "/stocks/TCS/analysis" });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({ cached: false, result: { symbol: "TCS" } });
    expect(second.json()).toMatchObject({ cached: true, result: { symbol: "TCS" } });
    expect(second.json().result).toEqual(first.json().result);
  });

  test("maps domain errors to status codes", async () => {
    const server = await start();

    const analysis = await server.inject({ method: "GET", url: "/stocks/NOPE/analysis" });
    expect(analysis.statusCode).toBe(404);
    expect(analysis.json()).toEqual({ error: "No stored data for NOPE", code: "DATA_NOT_FOUND" });

    const cancel = await server.inject({ method: "POST", url: "/pipeline/jobs/missing/cancel" });
    expect(cancel.statusCode).toBe(404);
    expect(cancel.json()).toEqual({ error: "Job missing not found", code: "JOB_NOT_FOUND" });

    const run = await server.inject({ method: "POST", url: "/pipeline/run", payload: { symbols: ["$$$"] } });
    expect(run.statusCode).toBe(400);
    expect(run.json()).toMatchObject({ code: "INVALID_REQUEST" });
  });

  test("validates request bodies", async () => {
    const server = await start();

    const config = await server.inject({ method: "PUT", url: "/pipeline/scheduler/config", payload: {} });
    const add = await server.inject({ method: "POST", url: "/pipeline/symbols/add", payload: { symbols: [] } });

    expect(config.statusCode).toBe(400);
    expect(add.statusCode).toBe(400);
  });

  test("updates the scheduler configuration", async () => {
    const server = await start();

    const response = await server.inject({
      method: "PUT",
      url: "/pipeline/scheduler/config",
      payload: { intervalMinutes: 30, autoStart: false }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      config: { intervalMinutes: 30, autoStart: false },
      scheduler: { running: false }
    });
  });

  test("edits the symbol universe", async () => {
    const server = await start();

    const added = await server.inject({
      method: "POST",
      url: "/pipeline/symbols/add",
      payload: { symbols: ["zztest"], category: "Watch List" }
    });
    expect(added.json()).toMatchObject({ category: "watch_list", added: ["ZZTEST"], alreadyExists: [] });

    const removed = await server.inject({
      method: "POST",
      url: "/pipeline/symbols/remove",
      payload: { symbols: ["ZZTEST", "ZZNONE"] }
    });
    expect(removed.json()).toMatchObject({ removed: ["ZZTEST"], notFound: ["ZZNONE"] });
  });

  test("flushes the cache by pattern", async () => {
    const server = await start();
    await server.inject({ method: "POST", url: "/pipeline/run", payload: { symbols: ["TCS"], wait: true } });

    const response = await server.inject({ method: "DELETE", url: "/cache/flush?pattern=price:*" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ pattern: "price:*", deleted: 1 });
  });

  test("records internal and external request logs", async () => {
    const server = await start();
    await server.inject({ method: "GET", url: "/health" });
    await server.inject({ method: "POST", url: "/pipeline/run", payload: { symbols: ["TCS"], wait: true } });

    const internal = await server.inject({ method: "GET", url: "/api-request-logs?direction=internal" });
    const external = await server.inject({ method: "GET", url: "/api-request-logs?direction=external" });

    expect(internal.json().logs).toContainEqual(
      expect.objectContaining({
        endpoint: "/health",
        reason: "Health check request",
        method: "GET",
        status: "success",
        statusCode: 200
      })
    );
    expect(external.json().logs).toEqual([
      expect.objectContaining({ provider: "upstream", status: "success", statusCode: 200 })
    ]);
  });
});
