import type { CanonicalFields, HorizonPair, RuleKind, SubScores, Verdict } from "../types/models";
import { scaleScore } from "../utils/statistics";

/** Numeric inputs of a rule, keyed by canonical field. Every declared field is present. */
export type RuleInputs = Readonly<Record<string, number>>;

export interface ScoringRule {
  id: string;
  kind: RuleKind;
  label: string;
  fields: readonly string[];
  magnitude: HorizonPair;
  test: (inputs: RuleInputs) => boolean;
}

export interface SubScoreComponent {
  fields: readonly string[];
  score: (inputs: RuleInputs) => number;
}

export const DEAL_BREAKER_CEILING = 35;
export const BOOSTER_CAP = 30;
export const MODEL_ADJUSTMENT_LIMIT = 10;
export const NEUTRAL_SUB_SCORE = 50;

export const VERDICT_THRESHOLDS: ReadonlyArray<{ min: number; verdict: Verdict }> = [
  { min: 80, verdict: "STRONG BUY" },
  { min: 65, verdict: "BUY" },
  { min: 50, verdict: "HOLD" },
  { min: 35, verdict: "AVOID" }
];

export const HORIZON_WEIGHTS: Readonly<Record<"short" | "long", SubScores>> = {
  short: { fundamental: 0.1, valuation: 0.15, technical: 0.4, quality: 0.1, risk: 0.25 },
  long: { fundamental: 0.3, valuation: 0.2, technical: 0.1, quality: 0.25, risk: 0.15 }
};

const NONE: HorizonPair = { short: 0, long: 0 };

export const DEAL_BREAKERS: readonly ScoringRule[] = [
  {
    id: "D1",
    kind: "deal_breaker",
    label: "Interest coverage below 2x",
    fields: ["interest_coverage"],
    magnitude: NONE,
    test: (v) => v.interest_coverage < 2
  },
  {
    id: "D2",
    kind: "deal_breaker",
    label: "Debt to equity above 2",
    fields: ["debt_to_equity"],
    magnitude: NONE,
    test: (v) => v.debt_to_equity > 2
  },
  {
    id: "D3",
    kind: "deal_breaker",
    label: "More than half of promoter holding pledged",
    fields: ["promoter_pledging"],
    magnitude: NONE,
    test: (v) => v.promoter_pledging > 50
  },
  {
    id: "D4",
    kind: "deal_breaker",
    label: "Negative operating cash flow and net loss",
    fields: ["operating_cash_flow", "net_profit"],
    magnitude: NONE,
    test: (v) => v.operating_cash_flow < 0 && v.net_profit < 0
  },
  {
    id: "D5",
    kind: "deal_breaker",
    label: "Revenue down more than 25% year on year",
    fields: ["revenue_growth_yoy"],
    magnitude: NONE,
    test: (v) => v.revenue_growth_yoy < -25
  },
  {
    id: "D6",
    kind: "deal_breaker",
    label: "Current ratio below 0.7",
    fields: ["current_ratio"],
    magnitude: NONE,
    test: (v) => v.current_ratio < 0.7
  },
  {
    id: "D7",
    kind: "deal_breaker",
    label: "Net margin below -10%",
    fields: ["net_profit_margin"],
    magnitude: NONE,
    test: (v) => v.net_profit_margin < -10
  },
  {
    id: "D8",
    kind: "deal_breaker",
    label: "Daily turnover below 1 crore",
    fields: ["turnover"],
    magnitude: NONE,
    test: (v) => v.turnover < 1e7
  },
  {
    id: "D9",
    kind: "deal_breaker",
    label: "Promoter holding cut by more than 10 points",
    fields: ["promoter_holding_change"],
    magnitude: NONE,
    test: (v) => v.promoter_holding_change < -10
  },
  {
    id: "D10",
    kind: "deal_breaker",
    label: "P/E above 150",
    fields: ["pe_ratio"],
    magnitude: NONE,
    test: (v) => v.pe_ratio > 150
  }
];

export const RISK_PENALTIES: readonly ScoringRule[] = [
  {
    id: "R1",
    kind: "risk_penalty",
    label: "Leverage above 1x equity",
    fields: ["debt_to_equity"],
    magnitude: { short: 4, long: 8 },
    test: (v) => v.debt_to_equity > 1
  },
  {
    id: "R2",
    kind: "risk_penalty",
    label: "Rich valuation (P/E above 60)",
    fields: ["pe_ratio"],
    magnitude: { short: 4, long: 6 },
    test: (v) => v.pe_ratio > 60
  },
  {
    id: "R3",
    kind: "risk_penalty",
    label: "Overbought (RSI above 75)",
    fields: ["rsi_14"],
    magnitude: { short: 8, long: 2 },
    test: (v) => v.rsi_14 > 75
  },
  {
    id: "R4",
    kind: "risk_penalty",
    label: "High beta",
    fields: ["beta"],
    magnitude: { short: 5, long: 3 },
    test: (v) => v.beta > 1.5
  },
  {
    id: "R5",
    kind: "risk_penalty",
    label: "Promoter pledging above 10%",
    fields: ["promoter_pledging"],
    magnitude: { short: 3, long: 7 },
    test: (v) => v.promoter_pledging > 10
  },
  {
    id: "R6",
    kind: "risk_penalty",
    label: "FII selling",
    fields: ["fii_holding_change"],
    magnitude: { short: 4, long: 3 },
    test: (v) => v.fii_holding_change < -2
  },
  {
    id: "R7",
    kind: "risk_penalty",
    label: "Trading below the 200-day average",
    fields: ["current_price", "sma_200"],
    magnitude: { short: 6, long: 4 },
    test: (v) => v.current_price < v.sma_200
  },
  {
    id: "R8",
    kind: "risk_penalty",
    label: "Thin operating margin",
    fields: ["operating_margin"],
    magnitude: { short: 2, long: 5 },
    test: (v) => v.operating_margin < 8
  },
  {
    id: "R9",
    kind: "risk_penalty",
    label: "Low delivery share",
    fields: ["delivery_percentage"],
    magnitude: { short: 4, long: 1 },
    test: (v) => v.delivery_percentage < 25
  },
  {
    id: "R10",
    kind: "risk_penalty",
    label: "30-day volatility above 45%",
    fields: ["volatility_30d"],
    magnitude: { short: 5, long: 3 },
    test: (v) => v.volatility_30d > 45
  }
];

export const QUALITY_BOOSTERS: readonly ScoringRule[] = [
  {
    id: "Q1",
    kind: "quality_booster",
    label: "ROE above 20%",
    fields: ["roe"],
    magnitude: { short: 4, long: 6 },
    test: (v) => v.roe > 20
  },
  {
    id: "Q2",
    kind: "quality_booster",
    label: "Nearly debt free",
    fields: ["debt_to_equity"],
    magnitude: { short: 2, long: 5 },
    test: (v) => v.debt_to_equity < 0.3
  },
  {
    id: "Q3",
    kind: "quality_booster",
    label: "Revenue growth above 15%",
    fields: ["revenue_growth_yoy"],
    magnitude: { short: 4, long: 5 },
    test: (v) => v.revenue_growth_yoy > 15
  },
  {
    id: "Q4",
    kind: "quality_booster",
    label: "Profit growth above 20%",
    fields: ["profit_growth_yoy"],
    magnitude: { short: 5, long: 5 },
    test: (v) => v.profit_growth_yoy > 20
  },
  {
    id: "Q5",
    kind: "quality_booster",
    label: "Promoter holding above 60%",
    fields: ["promoter_holding"],
    magnitude: { short: 2, long: 4 },
    test: (v) => v.promoter_holding > 60
  },
  {
    id: "Q6",
    kind: "quality_booster",
    label: "Positive free cash flow",
    fields: ["free_cash_flow"],
    magnitude: { short: 3, long: 4 },
    test: (v) => v.free_cash_flow > 0
  },
  {
    id: "Q7",
    kind: "quality_booster",
    label: "Price above rising moving averages",
    fields: ["current_price", "sma_50", "sma_200"],
    magnitude: { short: 8, long: 3 },
    test: (v) => v.current_price > v.sma_50 && v.sma_50 > v.sma_200
  },
  {
    id: "Q8",
    kind: "quality_booster",
    label: "Dividend yield above 2%",
    fields: ["dividend_yield"],
    magnitude: { short: 1, long: 3 },
    test: (v) => v.dividend_yield > 2
  },
  {
    id: "Q9",
    kind: "quality_booster",
    label: "ROCE above 20%",
    fields: ["roce"],
    magnitude: { short: 3, long: 4 },
    test: (v) => v.roce > 20
  }
];

const linear = (field: string, worst: number, best: number): SubScoreComponent => ({
  fields: [field],
  score: (v) => scaleScore(v[field], worst, best)
});

export const SUB_SCORE_COMPONENTS: Readonly<Record<keyof SubScores, readonly SubScoreComponent[]>> = {
  fundamental: [
    linear("roe", 5, 25),
    linear("revenue_growth_yoy", -10, 25),
    linear("profit_growth_yoy", -20, 30),
    linear("operating_margin", 0, 30),
    linear("net_profit_margin", -5, 20)
  ],
  valuation: [
    linear("pe_ratio", 60, 10),
    linear("pb_ratio", 8, 1),
    linear("peg_ratio", 3, 0.5),
    linear("ev_to_ebitda", 30, 6),
    linear("dividend_yield", 0, 4)
  ],
  technical: [
    { fields: ["rsi_14"], score: (v) => scaleScore(100 - Math.abs(v.rsi_14 - 55) * 2.5, 0, 100) },
    {
      fields: ["current_price", "sma_50"],
      score: (v) => scaleScore(((v.current_price - v.sma_50) / v.sma_50) * 100, -10, 10)
    },
    {
      fields: ["current_price", "sma_200"],
      score: (v) => scaleScore(((v.current_price - v.sma_200) / v.sma_200) * 100, -20, 20)
    },
    { fields: ["macd", "macd_signal"], score: (v) => (v.macd > v.macd_signal ? 75 : 25) },
    linear("price_change_percent", -5, 5)
  ],
  quality: [
    linear("roce", 5, 25),
    linear("interest_coverage", 1, 10),
    linear("current_ratio", 0.8, 2.5),
    linear("debt_to_equity", 2, 0),
    linear("promoter_holding", 20, 70)
  ],
  risk: [
    linear("beta", 2, 0.6),
    linear("volatility_30d", 60, 15),
    linear("promoter_pledging", 50, 0),
    linear("delivery_percentage", 15, 60)
  ]
};

/** Picks the numeric values of `fields` out of a record; anything else is reported missing. */
export const collectInputs = (
  fields: readonly string[],
  record: CanonicalFields
): { inputs: Record<string, number>; missing: string[] } => {
  const inputs: Record<string, number> = {};
  const missing: string[] = [];
  for (const field of fields) {
    const value = record[field];
    if (typeof value === "number" && Number.isFinite(value)) inputs[field] = value;
    else missing.push(field);
  }
  return { inputs, missing };
};
