import { createHash } from "node:crypto";
import { z } from "zod";
import { DataNotFoundError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { CACHE_TTL_SECONDS, cacheKeys, type CacheStore } from "../storage/cacheStore";
import type { ScreenerQuery, ScreenerRow, TimeSeriesStore } from "../storage/timeSeriesStore";
import type { CanonicalFields, CanonicalRecord, ScoreResult, ScoringContext } from "../types/models";
import { cachedQuoteSchema, scoreResultSchema } from "../types/schemas";
import { SCORING_FIELDS, type ScoringEngine } from "./scoringEngine";

const log = logger.child("analysis");

export interface QuoteView {
  symbol: string;
  asOf: string;
  source: "cache" | "timeseries";
  fields: CanonicalFields;
}

export interface AnalysisView {
  cached: boolean;
  result: ScoreResult;
}

export interface ScreenerView {
  cached: boolean;
  count: number;
  rows: ScreenerRow[];
}

const screenerRowsSchema = z.array(z.record(z.union([z.string(), z.number(), z.null()])));

type CachedQuote = z.infer<typeof cachedQuoteSchema>;

/** Prices from separate fetches, keyed by fetch time; one fetch seen through two tiers counts once. */
const independentQuotes = (record: CanonicalRecord, live: CachedQuote | null): number[] => {
  const observations = new Map<string, number>();
  const stored = record.fields.current_price;
  if (typeof stored === "number") {
    observations.set(record.fieldLastUpdated.current_price ?? record.asOf, stored);
  }
  if (live && typeof live.current_price === "number" && !observations.has(live.asOf)) {
    observations.set(live.asOf, live.current_price);
  }
  return [...observations.values()];
};

const screenerHash = (query: ScreenerQuery): string =>
  createHash("sha256").update(JSON.stringify(query)).digest("hex").slice(0, 16);

/** Read side: quotes, scored analyses and the screener, each read through the cache tier. */
export class AnalysisService {
  constructor(
    private readonly timeSeries: TimeSeriesStore,
    private readonly cache: CacheStore,
    private readonly scoring: ScoringEngine
  ) {}

  async analyze(
    symbol: string,
    options: { refresh?: boolean; context?: ScoringContext } = {}
  ): Promise<AnalysisView> {
    const wanted = symbol.trim().toUpperCase();
    const key = cacheKeys.analysis(wanted);
    const usesCache = !options.refresh && options.context?.modelConfidence === undefined;

    if (usesCache) {
      const cached = scoreResultSchema.safeParse(await this.readCache(key));
      if (cached.success) return { cached: true, result: cached.data };
    }

    const record = this.timeSeries.loadCanonicalRecord(wanted, SCORING_FIELDS);
    if (!record) throw new DataNotFoundError(`No stored data for ${wanted}`);

    const live = cachedQuoteSchema.safeParse(await this.readCache(cacheKeys.price(wanted)));
    const sourceQuotes = independentQuotes(record, live.success ? live.data : null);
    const result = this.scoring.score(record, { sourceQuotes, ...options.context });

    if (options.context?.modelConfidence === undefined) {
      await this.writeCache(key, result, CACHE_TTL_SECONDS.analysis);
    }
    return { cached: false, result };
  }

  async getQuote(symbol: string): Promise<QuoteView> {
    const wanted = symbol.trim().toUpperCase();
    const cached = cachedQuoteSchema.safeParse(await this.readCache(cacheKeys.price(wanted)));
    if (cached.success) {
      const { symbol: cachedSymbol, asOf, ...fields } = cached.data;
      return { symbol: cachedSymbol, asOf, source: "cache", fields };
    }

    const record = this.timeSeries.loadCanonicalRecord(wanted);
    if (!record) throw new DataNotFoundError(`No stored quote for ${wanted}`);
    return { symbol: record.symbol, asOf: record.asOf, source: "timeseries", fields: record.fields };
  }

  async screen(query: ScreenerQuery): Promise<ScreenerView> {
    const key = cacheKeys.screener(screenerHash(query));
    const cached = screenerRowsSchema.safeParse(await this.readCache(key));
    if (cached.success) {
      return { cached: true, count: cached.data.length, rows: cached.data };
    }

    const rows = this.timeSeries.screen(query);
    await this.writeCache(key, rows, CACHE_TTL_SECONDS.screener);
    return { cached: false, count: rows.length, rows };
  }

  private async readCache(key: string): Promise<unknown> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      log.warn(`Cache read failed for ${key}`, errorMessage(error));
      return null;
    }
  }

  private async writeCache(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.cache.set(key, value, ttlSeconds);
    } catch (error) {
      log.warn(`Cache write failed for ${key}`, errorMessage(error));
    }
  }
}
