import { describe, expect, test } from "vitest";

import { ScoringEngine, SCORING_FIELDS, verdictFor } from "../services/scoringEngine";
import type { CanonicalFields, CanonicalRecord } from "../types/models";

const AS_OF = "2026-01-06T10:00:00.000Z";

const recordOf = (fields: CanonicalFields, updatedAt: Record<string, string> = {}): CanonicalRecord => ({
  symbol: "TEST",
  asOf: AS_OF,
  fields,
  fieldAvailability: Object.fromEntries(Object.keys(fields).map((field) => [field, true])),
  fieldLastUpdated: Object.fromEntries(Object.keys(fields).map((field) => [field, updatedAt[field] ?? AS_OF]))
});

describe("ScoringEngine", () => {
  const engine = new ScoringEngine();

  test("an empty record scores neutral minus the low-confidence adjustment", () => {
    const result = engine.score(recordOf({}));

    expect(result.subScores).toEqual({ fundamental: 50, valuation: 50, technical: 50, quality: 50, risk: 50 });
    expect(result.baseScores).toEqual({ short: 50, long: 50 });
    expect(result.modelAdjustment).toBe(-10);
    expect(result.shortTermScore).toBe(40);
    expect(result.longTermScore).toBe(40);
    expect(result.verdict).toBe("AVOID");
    expect(result.dealBreakers.every((rule) => rule.status === "indeterminate")).toBe(true);
    expect(result.confidence).toEqual({
      completeness: 0,
      freshness: 0,
      sourceAgreement: 60,
      modelConfidence: 0,
      score: 9
    });
    expect(result.checklists.longTerm.summary.verdict).toBe("INSUFFICIENT_DATA");
  });

  test("a supplied model confidence replaces the derived one", () => {
    const result = engine.score(recordOf({}), { modelConfidence: 50 });

    expect(result.modelAdjustment).toBe(0);
    expect(result.longTermScore).toBe(50);
    expect(result.verdict).toBe("HOLD");
  });

  test("a triggered deal-breaker caps both horizons", () => {
    const result = engine.score(recordOf({ debt_to_equity: 2.5 }), { modelConfidence: 50 });

    expect(result.dealBreakerTriggered).toBe(true);
    expect(result.dealBreakers.find((rule) => rule.id === "D2")?.status).toBe("triggered");
    expect(result.subScores.quality).toBe(0);
    expect(result.baseScores).toEqual({ short: 45, long: 37.5 });
    expect(result.penaltyTotals).toEqual({ short: 4, long: 8 });
    expect(result.shortTermScore).toBe(35);
    expect(result.longTermScore).toBe(29.5);
    expect(result.verdict).toBe("STRONG AVOID");
  });

  const STRONG_FIELDS = {
    roe: 30,
    debt_to_equity: 0.1,
    revenue_growth_yoy: 20,
    profit_growth_yoy: 25,
    promoter_holding: 65,
    free_cash_flow: 100,
    current_price: 120,
    sma_50: 110,
    sma_200: 100,
    dividend_yield: 3,
    roce: 25
  };

  test("caps quality boosters", () => {
    const result = engine.score(recordOf(STRONG_FIELDS), { modelConfidence: 50 });

    expect(result.qualityBoosters.filter((rule) => rule.status === "triggered")).toHaveLength(9);
    expect(result.boosterTotals).toEqual({ short: 30, long: 30 });
    expect(result.penaltyTotals).toEqual({ short: 0, long: 0 });
    expect(result.dealBreakerTriggered).toBe(false);
  });

  test("a deal-breaker holds both horizons at the ceiling despite every booster", () => {
    const result = engine.score(recordOf({ ...STRONG_FIELDS, interest_coverage: 1.5 }), { modelConfidence: 50 });

    expect(result.dealBreakers.filter((rule) => rule.status === "triggered").map((rule) => rule.id)).toEqual(["D1"]);
    expect(result.boosterTotals).toEqual({ short: 30, long: 30 });
    expect(result.shortTermScore).toBe(35);
    expect(result.longTermScore).toBe(35);
    expect(result.verdict).toBe(verdictFor(35));
  });

  test("confidence is the weighted sum of its components", () => {
    const result = engine.score(recordOf({ ...STRONG_FIELDS, interest_coverage: 3 }), { sourceQuotes: [100, 101] });
    const { completeness, freshness, sourceAgreement, modelConfidence, score } = result.confidence;

    expect(completeness).toBeCloseTo((12 / SCORING_FIELDS.length) * 100, 2);
    expect(freshness).toBe(100);
    expect(sourceAgreement).toBe(80.1);
    expect(modelConfidence).toBeCloseTo((14 / 29) * 100, 2);
    expect(score).toBeCloseTo(
      0.4 * completeness + 0.3 * freshness + 0.15 * sourceAgreement + 0.15 * modelConfidence,
      1
    );
  });

  test("reports missing inputs on indeterminate rules", () => {
    const result = engine.score(recordOf({ current_price: 100 }));

    expect(result.riskPenalties.find((rule) => rule.id === "R7")).toMatchObject({
      status: "indeterminate",
      missingFields: ["sma_200"]
    });
  });

  test("decays freshness by field category", () => {
    const result = engine.score(
      recordOf({ current_price: 100, pe_ratio: 20 }, { current_price: "2026-01-05T10:00:00.000Z" })
    );

    expect(result.confidence.freshness).toBe(75);
    expect(result.confidence.completeness).toBeCloseTo((2 / SCORING_FIELDS.length) * 100, 2);
  });

  test("measures agreement between source quotes", () => {
    const agreement = (sourceQuotes: number[]) =>
      engine.score(recordOf({}), { sourceQuotes }).confidence.sourceAgreement;

    expect(agreement([100, 101])).toBe(80.1);
    expect(agreement([100])).toBe(60);
    expect(agreement([0, 0])).toBe(0);
  });

  test("is deterministic for the same record and context", () => {
    const record = recordOf({ roe: 18, pe_ratio: 22, rsi_14: 60, debt_to_equity: 0.4 });

    expect(engine.score(record, { sourceQuotes: [10, 10] })).toEqual(
      engine.score(record, { sourceQuotes: [10, 10] })
    );
  });
});

describe("verdictFor", () => {
  test("maps long-term scores onto verdict bands", () => {
    expect([80, 79.9, 65, 50, 35, 34.9].map(verdictFor)).toEqual([
      "STRONG BUY",
      "BUY",
      "BUY",
      "HOLD",
      "AVOID",
      "STRONG AVOID"
    ]);
  });
});
