import { z } from "zod";
import type { ScoreResult } from "./models";

const symbolListSchema = z.array(z.string().trim().min(1).max(30)).max(1_000);

export const runPipelineRequestSchema = z.object({
  symbols: symbolListSchema.min(1).optional(),
  pipelineType: z.string().trim().min(1).max(64).default("quotes"),
  wait: z.boolean().default(false)
});

export const testConnectionRequestSchema = z.object({
  symbol: z.string().trim().min(1).max(30).default("RELIANCE")
});

export const schedulerConfigPatchSchema = z
  .object({
    intervalMinutes: z.number().positive().max(24 * 60).optional(),
    autoStart: z.boolean().optional()
  })
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one scheduler field must be provided."
  });

export const addSymbolsRequestSchema = z.object({
  symbols: symbolListSchema.min(1),
  category: z.string().trim().min(1).max(64).optional()
});

export const removeSymbolsRequestSchema = z.object({
  symbols: symbolListSchema.min(1)
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

export const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1_000).default(100),
  eventType: z.string().trim().min(1).max(64).optional()
});

export const moversQuerySchema = z.object({
  count: z.coerce.number().int().min(1).max(50).default(10)
});

export const priceHistoryQuerySchema = z.object({
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  limit: z.coerce.number().int().min(1).max(5_000).default(365)
});

export const screenerRequestSchema = z.object({
  filters: z
    .array(
      z.object({
        metric: z.string().trim().min(1),
        operator: z.enum(["gt", "lt", "gte", "lte", "eq", "between"]),
        value: z.number(),
        value2: z.number().optional()
      })
    )
    .default([]),
  symbols: symbolListSchema.optional(),
  sortBy: z.string().trim().min(1).optional(),
  sortOrder: z.enum(["asc", "desc"]).default("desc"),
  limit: z.number().int().min(1).max(500).default(50)
});

export const analysisQuerySchema = z.object({
  refresh: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1"),
  modelConfidence: z.coerce.number().min(0).max(100).optional()
});

export const cacheFlushQuerySchema = z.object({
  pattern: z.string().trim().min(1).max(128).default("*")
});

export const apiRequestLogsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(2_000).optional(),
  direction: z.enum(["internal", "external"]).optional(),
  status: z.enum(["success", "error"]).optional(),
  provider: z.string().trim().min(1).max(128).optional(),
  endpointContains: z.string().trim().min(1).max(256).optional(),
  correlationId: z.string().trim().min(1).max(128).optional(),
  since: z.string().datetime().optional()
});

export const apiRequestLogSummaryQuerySchema = z.object({
  direction: z.enum(["internal", "external"]).optional(),
  sinceMinutes: z.coerce.number().int().min(1).max(7 * 24 * 60).default(60)
});

const horizonPairSchema = z.object({ short: z.number(), long: z.number() });

const ruleEvaluationSchema = z.object({
  id: z.string(),
  kind: z.enum(["deal_breaker", "risk_penalty", "quality_booster"]),
  label: z.string(),
  status: z.enum(["triggered", "not_triggered", "indeterminate"]),
  magnitude: horizonPairSchema,
  missingFields: z.array(z.string())
});

const checklistResultSchema = z.object({
  horizon: z.enum(["short", "long"]),
  items: z.array(
    z.object({
      id: z.string(),
      label: z.string(),
      isDealBreaker: z.boolean(),
      status: z.enum(["pass", "fail", "indeterminate"]),
      missingFields: z.array(z.string())
    })
  ),
  summary: z.object({
    passed: z.number(),
    failed: z.number(),
    indeterminate: z.number(),
    total: z.number(),
    score: z.number(),
    dealBreakerFailures: z.array(z.string()),
    verdict: z.enum(["PASS", "CAUTION", "FAIL", "INSUFFICIENT_DATA"])
  })
});

/** Shape check for score results read back from the cache tier. */
export const scoreResultSchema: z.ZodType<ScoreResult> = z.object({
  symbol: z.string(),
  asOf: z.string(),
  subScores: z.object({
    fundamental: z.number(),
    valuation: z.number(),
    technical: z.number(),
    quality: z.number(),
    risk: z.number()
  }),
  baseScores: horizonPairSchema,
  penaltyTotals: horizonPairSchema,
  boosterTotals: horizonPairSchema,
  modelAdjustment: z.number(),
  shortTermScore: z.number(),
  longTermScore: z.number(),
  verdict: z.enum(["STRONG BUY", "BUY", "HOLD", "AVOID", "STRONG AVOID"]),
  dealBreakerTriggered: z.boolean(),
  dealBreakers: z.array(ruleEvaluationSchema),
  riskPenalties: z.array(ruleEvaluationSchema),
  qualityBoosters: z.array(ruleEvaluationSchema),
  confidence: z.object({
    completeness: z.number(),
    freshness: z.number(),
    sourceAgreement: z.number(),
    modelConfidence: z.number(),
    score: z.number()
  }),
  checklists: z.object({
    shortTerm: checklistResultSchema,
    longTerm: checklistResultSchema
  })
});

export const cachedQuoteSchema = z
  .object({ symbol: z.string(), asOf: z.string() })
  .catchall(z.union([z.number(), z.string()]));
