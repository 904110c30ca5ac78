export type FieldValue = number | string;
export type CanonicalFields = Record<string, FieldValue>;

export interface NormalizationWarning {
  field: string;
  sourceKey: string;
  value: unknown;
  reason: string;
}

/** One symbol's normalized snapshot together with its per-field provenance. */
export interface CanonicalRecord {
  symbol: string;
  asOf: string;
  fields: CanonicalFields;
  fieldAvailability: Record<string, boolean>;
  fieldLastUpdated: Record<string, string>;
}

export interface Session {
  token: string;
  issuedAt: number;
  expiresAt: number;
}

export type JobStatus = "pending" | "running" | "success" | "partial" | "failed";
export type JobTrigger = "manual" | "scheduled";
export type SymbolOutcomeStatus = "success" | "error" | "skipped";

export interface SymbolOutcome {
  symbol: string;
  status: SymbolOutcomeStatus;
  finishedAt: string;
  attempts?: number;
  warnings?: number;
  errorCode?: string;
  error?: string;
}

export interface JobCounts {
  total: number;
  processed: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface JobError {
  symbol: string | null;
  code: string;
  message: string;
  timestamp: string;
}

export interface ExtractionJob {
  jobId: string;
  pipelineType: string;
  trigger: JobTrigger;
  symbols: string[];
  status: JobStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  cancelRequested: boolean;
  outcomes: Record<string, SymbolOutcome>;
  counts: JobCounts;
  errors: JobError[];
}

export interface JobSummary {
  jobId: string;
  pipelineType: string;
  trigger: JobTrigger;
  status: JobStatus;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  durationSeconds: number | null;
  progressPercent: number;
  counts: JobCounts;
  errors: JobError[];
}

export interface PipelineEvent {
  timestamp: string;
  eventType: string;
  jobId: string | null;
  payload: Record<string, unknown>;
}

export interface AuditEntry {
  id: string;
  symbol: string;
  source: string;
  jobId: string | null;
  timestamp: string;
  fieldCount: number;
  warnings: NormalizationWarning[];
  tiers: Record<string, "ok" | "failed">;
}

export type Horizon = "short" | "long";
export type RuleKind = "deal_breaker" | "risk_penalty" | "quality_booster";
export type RuleStatus = "triggered" | "not_triggered" | "indeterminate";
export type Verdict = "STRONG BUY" | "BUY" | "HOLD" | "AVOID" | "STRONG AVOID";
export type ChecklistVerdict = "PASS" | "CAUTION" | "FAIL" | "INSUFFICIENT_DATA";

export interface HorizonPair {
  short: number;
  long: number;
}

export interface RuleEvaluation {
  id: string;
  kind: RuleKind;
  label: string;
  status: RuleStatus;
  magnitude: HorizonPair;
  missingFields: string[];
}

export interface SubScores {
  fundamental: number;
  valuation: number;
  technical: number;
  quality: number;
  risk: number;
}

export interface ConfidenceBreakdown {
  completeness: number;
  freshness: number;
  sourceAgreement: number;
  modelConfidence: number;
  score: number;
}

export type ChecklistItemStatus = "pass" | "fail" | "indeterminate";

export interface ChecklistItemResult {
  id: string;
  label: string;
  isDealBreaker: boolean;
  status: ChecklistItemStatus;
  missingFields: string[];
}

export interface ChecklistSummary {
  passed: number;
  failed: number;
  indeterminate: number;
  total: number;
  score: number;
  dealBreakerFailures: string[];
  verdict: ChecklistVerdict;
}

export interface ChecklistResult {
  horizon: Horizon;
  items: ChecklistItemResult[];
  summary: ChecklistSummary;
}

export interface ScoreResult {
  symbol: string;
  asOf: string;
  subScores: SubScores;
  baseScores: HorizonPair;
  penaltyTotals: HorizonPair;
  boosterTotals: HorizonPair;
  modelAdjustment: number;
  shortTermScore: number;
  longTermScore: number;
  verdict: Verdict;
  dealBreakerTriggered: boolean;
  dealBreakers: RuleEvaluation[];
  riskPenalties: RuleEvaluation[];
  qualityBoosters: RuleEvaluation[];
  confidence: ConfidenceBreakdown;
  checklists: {
    shortTerm: ChecklistResult;
    longTerm: ChecklistResult;
  };
}

export interface ScoringContext {
  asOf?: string;
  sourceQuotes?: number[];
  modelConfidence?: number;
}
