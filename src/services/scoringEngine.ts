import type {
  CanonicalRecord,
  ConfidenceBreakdown,
  Horizon,
  HorizonPair,
  RuleEvaluation,
  ScoreResult,
  ScoringContext,
  SubScores,
  Verdict
} from "../types/models";
import { clamp, mean, round } from "../utils/statistics";
import { hoursBetween } from "../utils/time";
import { CHECKLISTS, evaluateChecklist } from "./checklists";
import { fieldCatalog, type FieldCatalog } from "./fieldCatalog";
import {
  BOOSTER_CAP,
  DEAL_BREAKERS,
  DEAL_BREAKER_CEILING,
  HORIZON_WEIGHTS,
  MODEL_ADJUSTMENT_LIMIT,
  NEUTRAL_SUB_SCORE,
  QUALITY_BOOSTERS,
  RISK_PENALTIES,
  SUB_SCORE_COMPONENTS,
  VERDICT_THRESHOLDS,
  collectInputs,
  type ScoringRule
} from "./scoringRules";

const FAST_MOVING_CATEGORIES = new Set(["price_volume", "derived_metrics", "technical_indicators"]);
const FAST_HALF_LIFE_HOURS = 24;
const SLOW_HALF_LIFE_HOURS = 120 * 24;
const DEFAULT_SOURCE_AGREEMENT = 60;

const CONFIDENCE_WEIGHTS = {
  completeness: 0.4,
  freshness: 0.3,
  sourceAgreement: 0.15,
  modelConfidence: 0.15
} as const;

const ALL_RULES: readonly ScoringRule[] = [...DEAL_BREAKERS, ...RISK_PENALTIES, ...QUALITY_BOOSTERS];

/** Every field any rule, sub-score or checklist reads. */
export const SCORING_FIELDS: readonly string[] = [
  ...new Set([
    ...ALL_RULES.flatMap((rule) => rule.fields),
    ...Object.values(SUB_SCORE_COMPONENTS).flatMap((components) =>
      components.flatMap((component) => component.fields)
    ),
    ...Object.values(CHECKLISTS).flatMap((items) => items.flatMap((item) => item.fields))
  ])
];

export const verdictFor = (longTermScore: number): Verdict =>
  VERDICT_THRESHOLDS.find((threshold) => longTermScore >= threshold.min)?.verdict ?? "STRONG AVOID";

const evaluateRule = (rule: ScoringRule, record: CanonicalRecord): RuleEvaluation => {
  const { inputs, missing } = collectInputs(rule.fields, record.fields);
  return {
    id: rule.id,
    kind: rule.kind,
    label: rule.label,
    status: missing.length > 0 ? "indeterminate" : rule.test(inputs) ? "triggered" : "not_triggered",
    magnitude: { ...rule.magnitude },
    missingFields: missing
  };
};

const sumTriggered = (evaluations: readonly RuleEvaluation[]): HorizonPair =>
  evaluations
    .filter((evaluation) => evaluation.status === "triggered")
    .reduce(
      (total, evaluation) => ({
        short: total.short + evaluation.magnitude.short,
        long: total.long + evaluation.magnitude.long
      }),
      { short: 0, long: 0 }
    );

/**
 * Deterministic two-horizon scorer over a canonical record. Pure: the same
 * record and context always give the same result.
 *
 * Tiers run in a fixed order: weighted sub-scores, risk penalties, capped
 * quality boosters, model adjustment, then the deal-breaker ceiling and the
 * final clamp. Rules whose inputs are missing are `indeterminate` and never
 * move the score.
 */
export class ScoringEngine {
  constructor(private readonly catalog: FieldCatalog = fieldCatalog) {}

  score(record: CanonicalRecord, context: ScoringContext = {}): ScoreResult {
    const asOf = context.asOf ?? record.asOf;
    const subScores = this.subScores(record);
    const baseScores: HorizonPair = {
      short: round(this.weighted(subScores, "short"), 2),
      long: round(this.weighted(subScores, "long"), 2)
    };

    const dealBreakers = DEAL_BREAKERS.map((rule) => evaluateRule(rule, record));
    const riskPenalties = RISK_PENALTIES.map((rule) => evaluateRule(rule, record));
    const qualityBoosters = QUALITY_BOOSTERS.map((rule) => evaluateRule(rule, record));
    const evaluations = [...dealBreakers, ...riskPenalties, ...qualityBoosters];

    const penaltyTotals = sumTriggered(riskPenalties);
    const rawBoosters = sumTriggered(qualityBoosters);
    const boosterTotals: HorizonPair = {
      short: Math.min(rawBoosters.short, BOOSTER_CAP),
      long: Math.min(rawBoosters.long, BOOSTER_CAP)
    };

    const determinate = evaluations.filter((evaluation) => evaluation.status !== "indeterminate").length;
    const modelConfidence =
      context.modelConfidence !== undefined && Number.isFinite(context.modelConfidence)
        ? clamp(context.modelConfidence, 0, 100)
        : (determinate / evaluations.length) * 100;
    const modelAdjustment = round(
      clamp((modelConfidence - 50) / 5, -MODEL_ADJUSTMENT_LIMIT, MODEL_ADJUSTMENT_LIMIT),
      2
    );

    const dealBreakerTriggered = dealBreakers.some((evaluation) => evaluation.status === "triggered");
    const finalScore = (horizon: Horizon): number => {
      let value = baseScores[horizon] - penaltyTotals[horizon] + boosterTotals[horizon] + modelAdjustment;
      if (dealBreakerTriggered) value = Math.min(value, DEAL_BREAKER_CEILING);
      return round(clamp(value, 0, 100), 1);
    };
    const shortTermScore = finalScore("short");
    const longTermScore = finalScore("long");

    return {
      symbol: record.symbol,
      asOf,
      subScores,
      baseScores,
      penaltyTotals,
      boosterTotals,
      modelAdjustment,
      shortTermScore,
      longTermScore,
      verdict: verdictFor(longTermScore),
      dealBreakerTriggered,
      dealBreakers,
      riskPenalties,
      qualityBoosters,
      confidence: this.confidence(record, asOf, context.sourceQuotes, modelConfidence),
      checklists: {
        shortTerm: evaluateChecklist("short", record.fields),
        longTerm: evaluateChecklist("long", record.fields)
      }
    };
  }

  private subScores(record: CanonicalRecord): SubScores {
    const compute = (key: keyof SubScores): number => {
      const scores: number[] = [];
      for (const component of SUB_SCORE_COMPONENTS[key]) {
        const { inputs, missing } = collectInputs(component.fields, record.fields);
        if (missing.length > 0) continue;
        const value = component.score(inputs);
        if (Number.isFinite(value)) scores.push(value);
      }
      return scores.length > 0 ? round(mean(scores), 2) : NEUTRAL_SUB_SCORE;
    };

    return {
      fundamental: compute("fundamental"),
      valuation: compute("valuation"),
      technical: compute("technical"),
      quality: compute("quality"),
      risk: compute("risk")
    };
  }

  private weighted(subScores: SubScores, horizon: Horizon): number {
    const weights = HORIZON_WEIGHTS[horizon];
    return (
      subScores.fundamental * weights.fundamental +
      subScores.valuation * weights.valuation +
      subScores.technical * weights.technical +
      subScores.quality * weights.quality +
      subScores.risk * weights.risk
    );
  }

  private confidence(
    record: CanonicalRecord,
    asOf: string,
    sourceQuotes: readonly number[] | undefined,
    modelConfidence: number
  ): ConfidenceBreakdown {
    const isAvailable = (field: string): boolean =>
      field in record.fieldAvailability
        ? record.fieldAvailability[field] === true
        : record.fields[field] !== undefined;

    const available = SCORING_FIELDS.filter(isAvailable);
    const completeness = (available.length / SCORING_FIELDS.length) * 100;

    const asOfMs = Date.parse(asOf);
    const decays: number[] = [];
    for (const field of available) {
      const updatedAt = record.fieldLastUpdated[field];
      if (!updatedAt) continue;
      const category = this.catalog.categoryOf.get(field) ?? "";
      const halfLife = FAST_MOVING_CATEGORIES.has(category) ? FAST_HALF_LIFE_HOURS : SLOW_HALF_LIFE_HOURS;
      const age = hoursBetween(updatedAt, asOfMs);
      decays.push(Number.isFinite(age) ? 100 * 0.5 ** (age / halfLife) : 0);
    }
    const freshness = decays.length > 0 ? mean(decays) : 0;

    const sourceAgreement = this.sourceAgreement(sourceQuotes);
    const score =
      CONFIDENCE_WEIGHTS.completeness * completeness +
      CONFIDENCE_WEIGHTS.freshness * freshness +
      CONFIDENCE_WEIGHTS.sourceAgreement * sourceAgreement +
      CONFIDENCE_WEIGHTS.modelConfidence * modelConfidence;

    return {
      completeness: round(completeness, 2),
      freshness: round(freshness, 2),
      sourceAgreement: round(sourceAgreement, 2),
      modelConfidence: round(modelConfidence, 2),
      score: round(score, 2)
    };
  }

  private sourceAgreement(sourceQuotes: readonly number[] | undefined): number {
    const quotes = (sourceQuotes ?? []).filter((quote) => Number.isFinite(quote));
    if (quotes.length < 2) return DEFAULT_SOURCE_AGREEMENT;
    const average = mean(quotes);
    if (average <= 0) return 0;
    const spreadPct = ((Math.max(...quotes) - Math.min(...quotes)) / average) * 100;
    return clamp(100 - spreadPct * 20, 0, 100);
  }
}
