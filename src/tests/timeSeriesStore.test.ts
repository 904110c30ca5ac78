import { describe, expect, test } from "vitest";

import { openDatabase } from "../storage/database";
import { TimeSeriesStore } from "../storage/timeSeriesStore";

const DAY_ONE = "2026-01-05T10:00:00.000Z";
const DAY_TWO = "2026-01-06T10:00:00.000Z";

const buildStore = () => new TimeSeriesStore(openDatabase(":memory:"));

describe("TimeSeriesStore", () => {
  test("replaying a record keeps one row per natural key", () => {
    const store = buildStore();

    store.upsertRecord("TCS", { current_price: 3_900, volume: 10 }, { asOf: DAY_ONE });
    store.upsertRecord("TCS", { current_price: 3_950, volume: 12 }, { asOf: DAY_ONE });

    const bars = store.getPrices("tcs");
    expect(bars).toHaveLength(1);
    expect(bars[0]).toMatchObject({ symbol: "TCS", date: "2026-01-05", close: 3_950, volume: 12 });
    expect(store.getStats()).toMatchObject({ prices_daily: 1, distinct_symbols: 1 });
  });

  test("keys undated quarterly figures by the calendar quarter end", () => {
    const store = buildStore();
    const fields = { current_price: 3_900, pe_ratio: 28, promoter_holding: 72.3 };

    store.upsertRecord("TCS", fields, { asOf: DAY_ONE });
    store.upsertRecord("TCS", { ...fields, pe_ratio: 29 }, { asOf: DAY_TWO });
    store.upsertRecord("TCS", fields, { asOf: "2026-04-01T10:00:00.000Z" });
    store.upsertRecord("TCS", { pe_ratio: 30, period_end: "2025-12-31" }, { asOf: DAY_TWO });

    expect(store.getStats()).toMatchObject({
      prices_daily: 3,
      fundamentals_quarterly: 3,
      shareholding_quarterly: 2
    });
  });

  test("routes fields to the tables that hold them and rounds integer columns", () => {
    const store = buildStore();

    const report = store.upsertRecord(
      "INFY",
      { symbol: "INFY", current_price: 1_500, volume: 1_000.6, pe_ratio: 24, rsi_14: 55, ltp: 1_500 },
      { asOf: DAY_ONE, canonicalFields: ["symbol", "current_price", "volume", "pe_ratio", "rsi_14"] }
    );

    expect(report).toEqual({
      tables: ["prices_daily", "technical_indicators", "fundamentals_quarterly"],
      snapshotFields: 5
    });
    expect(store.getPrices("INFY")[0]?.volume).toBe(1_001);
  });

  test("loads the latest snapshot with availability against expected fields", () => {
    const store = buildStore();
    store.upsertRecord("HDFCBANK", { current_price: 1_600, sector: "Financials" }, { asOf: DAY_ONE });
    store.upsertRecord("HDFCBANK", { current_price: 1_650 }, { asOf: DAY_TWO });

    const record = store.loadCanonicalRecord("hdfcbank", ["current_price", "pe_ratio"]);

    expect(record).toEqual({
      symbol: "HDFCBANK",
      asOf: DAY_TWO,
      fields: { current_price: 1_650, sector: "Financials" },
      fieldAvailability: { current_price: true, pe_ratio: false, sector: true },
      fieldLastUpdated: { current_price: DAY_TWO, sector: DAY_ONE }
    });
    expect(store.loadCanonicalRecord("UNKNOWN")).toBeNull();
  });

  test("returns price bars newest first within a date range", () => {
    const store = buildStore();
    store.upsertRecord("SBIN", { current_price: 800 }, { asOf: DAY_ONE });
    store.upsertRecord("SBIN", { current_price: 810 }, { asOf: DAY_TWO });

    expect(store.getPrices("SBIN").map((bar) => bar.close)).toEqual([810, 800]);
    expect(store.getPrices("SBIN", { startDate: "2026-01-06" }).map((bar) => bar.date)).toEqual(["2026-01-06"]);
    expect(store.getPrices("SBIN", { limit: 1 })).toHaveLength(1);
  });

  test("screens on joined metrics", () => {
    const store = buildStore();
    store.upsertRecord("AAA", { current_price: 100, pe_ratio: 15, roe: 20 }, { asOf: DAY_ONE });
    store.upsertRecord("BBB", { current_price: 200, pe_ratio: 40, roe: 10 }, { asOf: DAY_ONE });

    const symbolsOf = (rows: Array<Record<string, unknown>>) => rows.map((row) => row.symbol);

    expect(symbolsOf(store.screen({ filters: [{ metric: "pe_ratio", operator: "lt", value: 30 }] }))).toEqual([
      "AAA"
    ]);
    expect(
      symbolsOf(store.screen({ filters: [{ metric: "roe", operator: "between", value: 15, value2: 5 }] }))
    ).toEqual(["BBB"]);
    expect(symbolsOf(store.screen({ filters: [], sortBy: "current_price", sortOrder: "desc" }))).toEqual([
      "BBB",
      "AAA"
    ]);
    expect(symbolsOf(store.screen({ filters: [{ metric: "unknown_metric", operator: "gt", value: 1 }] }))).toEqual([
      "AAA",
      "BBB"
    ]);
  });

  test("stores application state as JSON", () => {
    const store = buildStore();

    store.setAppState("scheduler", { intervalMinutes: 5 });

    expect(store.getAppState("scheduler")).toEqual({ intervalMinutes: 5 });
    expect(store.getAppState("missing")).toBeNull();
    expect(store.ping()).toBe(true);
  });
});
