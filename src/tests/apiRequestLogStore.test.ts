import { afterEach, describe, expect, test } from "vitest";

import { ApiRequestLogStore, type ApiRequestLogInput } from "../storage/apiRequestLogStore";
import { openDatabase, type SqliteDatabase } from "../storage/database";

const entry = (overrides: Partial<ApiRequestLogInput> = {}): ApiRequestLogInput => ({
  direction: "external",
  provider: "upstream",
  method: "get",
  endpoint: "/v1/live-data/quote",
  reason: "Fetch live quote for TCS",
  status: "success",
  statusCode: 200,
  startedAt: "2026-01-06T10:00:00.000Z",
  finishedAt: "2026-01-06T10:00:00.120Z",
  ...overrides
});

let db: SqliteDatabase | null = null;
const open = (): SqliteDatabase => {
  db = openDatabase(":memory:");
  return db;
};

afterEach(() => {
  db?.close();
  db = null;
});

describe("ApiRequestLogStore", () => {
  test("derives the duration and upper-cases the method", () => {
    const store = new ApiRequestLogStore(open());

    const record = store.log(entry());

    expect(record).toMatchObject({ method: "GET", durationMs: 120 });
    expect(store.list()).toEqual([record]);
  });

  test("filters by direction, status, correlation and endpoint", () => {
    const store = new ApiRequestLogStore(open());
    store.log(entry({ correlationId: "TCS" }));
    store.log(entry({ correlationId: "INFY", status: "error", statusCode: 503, errorMessage: "unavailable" }));
    store.log(entry({ direction: "internal", provider: "quoteforge", endpoint: "/health" }));

    expect(store.list({ status: "error" }).map((row) => row.correlationId)).toEqual(["INFY"]);
    expect(store.list({ correlationId: "TCS" })).toHaveLength(1);
    expect(store.list({ direction: "internal" }).map((row) => row.endpoint)).toEqual(["/health"]);
    expect(store.list({ endpointContains: "quote" })).toHaveLength(2);
    expect(store.list({ since: "2026-01-07T00:00:00.000Z" })).toEqual([]);
  });

  test("lists newest first and honours the limit", () => {
    const store = new ApiRequestLogStore(open());
    store.log(entry({ startedAt: "2026-01-06T10:00:00.000Z", reason: "first" }));
    store.log(entry({ startedAt: "2026-01-06T10:05:00.000Z", reason: "second" }));

    expect(store.list({ limit: 1 }).map((row) => row.reason)).toEqual(["second"]);
  });

  test("trims rows beyond the retention window", () => {
    const store = new ApiRequestLogStore(open(), 2, 1);
    for (const minute of ["01", "02", "03"]) {
      store.log(entry({ startedAt: `2026-01-06T10:${minute}:00.000Z`, reason: minute }));
    }

    expect(store.list().map((row) => row.reason)).toEqual(["03", "02"]);
  });

  test("summarizes volume, errors and latency per provider", () => {
    const store = new ApiRequestLogStore(open());
    store.log(entry({ durationMs: 100 }));
    store.log(entry({ durationMs: 300, status: "error", statusCode: 503 }));
    store.log(entry({ direction: "internal", provider: "quoteforge", durationMs: 5 }));

    expect(store.summarize({ direction: "external" })).toEqual([
      {
        provider: "upstream",
        direction: "external",
        total: 2,
        errors: 1,
        errorRate: 50,
        avgDurationMs: 200,
        maxDurationMs: 300,
        lastFinishedAt: "2026-01-06T10:00:00.120Z"
      }
    ]);
  });
});
