import { describe, expect, test } from "vitest";

import { evaluateChecklist } from "../services/checklists";

const LONG_TERM_BASE = {
  roe: 18,
  debt_to_equity: 0.5,
  interest_coverage: 5,
  revenue_growth_yoy: 12,
  profit_growth_yoy: 5,
  operating_margin: 15
};

describe("evaluateChecklist", () => {
  test("scores only determinate items", () => {
    const result = evaluateChecklist("long", LONG_TERM_BASE);

    expect(result.summary).toEqual({
      passed: 5,
      failed: 1,
      indeterminate: 4,
      total: 10,
      score: 83.3,
      dealBreakerFailures: [],
      verdict: "PASS"
    });
    expect(result.items.find((item) => item.id === "LT9")).toMatchObject({
      status: "indeterminate",
      missingFields: ["pe_ratio", "industry_pe"]
    });
  });

  test("fails on any deal-breaker regardless of score", () => {
    const result = evaluateChecklist("long", { ...LONG_TERM_BASE, debt_to_equity: 1.5 });

    expect(result.summary).toMatchObject({ score: 66.7, dealBreakerFailures: ["LT2"], verdict: "FAIL" });
  });

  test("returns CAUTION between the thresholds", () => {
    const result = evaluateChecklist("short", {
      current_price: 100,
      sma_50: 90,
      rsi_14: 80,
      macd: 0.5,
      macd_signal: 1,
      turnover: 2e7
    });

    expect(result.summary).toMatchObject({ passed: 2, failed: 2, score: 50, verdict: "CAUTION" });
  });

  test("fails illiquid stocks on the turnover deal-breaker", () => {
    const result = evaluateChecklist("short", { turnover: 5e6, rsi_14: 55 });

    expect(result.summary).toMatchObject({ dealBreakerFailures: ["ST6"], verdict: "FAIL" });
  });

  test("reports insufficient data when nothing can be evaluated", () => {
    const result = evaluateChecklist("short", { company_name: "Test Co" });

    expect(result.summary).toMatchObject({ passed: 0, failed: 0, score: 0, verdict: "INSUFFICIENT_DATA" });
  });
});
