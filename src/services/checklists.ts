import type {
  CanonicalFields,
  ChecklistItemResult,
  ChecklistItemStatus,
  ChecklistResult,
  ChecklistVerdict,
  Horizon
} from "../types/models";
import { round } from "../utils/statistics";
import { collectInputs, type RuleInputs } from "./scoringRules";

export interface ChecklistItem {
  id: string;
  label: string;
  fields: readonly string[];
  isDealBreaker: boolean;
  passes: (inputs: RuleInputs) => boolean;
}

const PASS_THRESHOLD = 70;
const CAUTION_THRESHOLD = 50;

export const SHORT_TERM_CHECKLIST: readonly ChecklistItem[] = [
  {
    id: "ST1",
    label: "Price above 50-day average",
    fields: ["current_price", "sma_50"],
    isDealBreaker: false,
    passes: (v) => v.current_price > v.sma_50
  },
  {
    id: "ST2",
    label: "RSI between 40 and 70",
    fields: ["rsi_14"],
    isDealBreaker: false,
    passes: (v) => v.rsi_14 >= 40 && v.rsi_14 <= 70
  },
  {
    id: "ST3",
    label: "MACD above signal",
    fields: ["macd", "macd_signal"],
    isDealBreaker: false,
    passes: (v) => v.macd > v.macd_signal
  },
  {
    id: "ST4",
    label: "Delivery at least 35%",
    fields: ["delivery_percentage"],
    isDealBreaker: false,
    passes: (v) => v.delivery_percentage >= 35
  },
  {
    id: "ST5",
    label: "Volume above 20-day average",
    fields: ["volume", "avg_volume_20d"],
    isDealBreaker: false,
    passes: (v) => v.volume > v.avg_volume_20d
  },
  {
    id: "ST6",
    label: "Turnover at least 1 crore",
    fields: ["turnover"],
    isDealBreaker: true,
    passes: (v) => v.turnover >= 1e7
  },
  {
    id: "ST7",
    label: "Beta at most 1.5",
    fields: ["beta"],
    isDealBreaker: false,
    passes: (v) => v.beta <= 1.5
  },
  {
    id: "ST8",
    label: "Price above 200-day average",
    fields: ["current_price", "sma_200"],
    isDealBreaker: false,
    passes: (v) => v.current_price > v.sma_200
  }
];

export const LONG_TERM_CHECKLIST: readonly ChecklistItem[] = [
  {
    id: "LT1",
    label: "ROE at least 15%",
    fields: ["roe"],
    isDealBreaker: false,
    passes: (v) => v.roe >= 15
  },
  {
    id: "LT2",
    label: "Debt to equity at most 1",
    fields: ["debt_to_equity"],
    isDealBreaker: true,
    passes: (v) => v.debt_to_equity <= 1
  },
  {
    id: "LT3",
    label: "Interest coverage at least 2x",
    fields: ["interest_coverage"],
    isDealBreaker: true,
    passes: (v) => v.interest_coverage >= 2
  },
  {
    id: "LT4",
    label: "Revenue growth at least 10%",
    fields: ["revenue_growth_yoy"],
    isDealBreaker: false,
    passes: (v) => v.revenue_growth_yoy >= 10
  },
  {
    id: "LT5",
    label: "Profit growth at least 10%",
    fields: ["profit_growth_yoy"],
    isDealBreaker: false,
    passes: (v) => v.profit_growth_yoy >= 10
  },
  {
    id: "LT6",
    label: "Positive free cash flow",
    fields: ["free_cash_flow"],
    isDealBreaker: false,
    passes: (v) => v.free_cash_flow > 0
  },
  {
    id: "LT7",
    label: "Promoter pledging at most 10%",
    fields: ["promoter_pledging"],
    isDealBreaker: true,
    passes: (v) => v.promoter_pledging <= 10
  },
  {
    id: "LT8",
    label: "Promoter holding at least 40%",
    fields: ["promoter_holding"],
    isDealBreaker: false,
    passes: (v) => v.promoter_holding >= 40
  },
  {
    id: "LT9",
    label: "P/E at or below industry",
    fields: ["pe_ratio", "industry_pe"],
    isDealBreaker: false,
    passes: (v) => v.pe_ratio <= v.industry_pe
  },
  {
    id: "LT10",
    label: "Operating margin at least 12%",
    fields: ["operating_margin"],
    isDealBreaker: false,
    passes: (v) => v.operating_margin >= 12
  }
];

export const CHECKLISTS: Readonly<Record<Horizon, readonly ChecklistItem[]>> = {
  short: SHORT_TERM_CHECKLIST,
  long: LONG_TERM_CHECKLIST
};

const checklistVerdict = (
  determinate: number,
  score: number,
  dealBreakerFailures: readonly string[]
): ChecklistVerdict => {
  if (determinate === 0) return "INSUFFICIENT_DATA";
  if (dealBreakerFailures.length > 0) return "FAIL";
  if (score >= PASS_THRESHOLD) return "PASS";
  if (score >= CAUTION_THRESHOLD) return "CAUTION";
  return "FAIL";
};

/**
 * Runs one horizon's checklist. Items missing an input are indeterminate and
 * stay out of the score, which is passed / (passed + failed).
 */
export const evaluateChecklist = (horizon: Horizon, record: CanonicalFields): ChecklistResult => {
  const items = CHECKLISTS[horizon].map((item): ChecklistItemResult => {
    const { inputs, missing } = collectInputs(item.fields, record);
    const status: ChecklistItemStatus = missing.length > 0 ? "indeterminate" : item.passes(inputs) ? "pass" : "fail";
    return {
      id: item.id,
      label: item.label,
      isDealBreaker: item.isDealBreaker,
      status,
      missingFields: missing
    };
  });

  const passed = items.filter((item) => item.status === "pass").length;
  const failed = items.filter((item) => item.status === "fail").length;
  const determinate = passed + failed;
  const score = determinate > 0 ? round((passed / determinate) * 100, 1) : 0;
  const dealBreakerFailures = items
    .filter((item) => item.isDealBreaker && item.status === "fail")
    .map((item) => item.id);

  return {
    horizon,
    items,
    summary: {
      passed,
      failed,
      indeterminate: items.length - determinate,
      total: items.length,
      score,
      dealBreakerFailures,
      verdict: checklistVerdict(determinate, score, dealBreakerFailures)
    }
  };
};
