import {
  PersistenceTierUnavailableError,
  errorMessage,
  type StorageTier
} from "../core/errors";
import { logger } from "../core/logger";
import type { AuditStore } from "../storage/auditStore";
import { CACHE_TTL_SECONDS, cacheKeys, type CacheStore } from "../storage/cacheStore";
import type { TimeSeriesStore } from "../storage/timeSeriesStore";
import type { CanonicalFields, NormalizationWarning } from "../types/models";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";

const log = logger.child("persist");

export type SinkCriticality = "authoritative" | "best_effort";

export interface PersistContext {
  symbol: string;
  fields: CanonicalFields;
  canonicalFields: string[];
  warnings: NormalizationWarning[];
  asOf: string;
  jobId: string | null;
  source: string;
  /** Results of the sinks that ran before this one. */
  tierResults: Partial<Record<StorageTier, "ok" | "failed">>;
}

export interface PersistenceSink {
  readonly tier: StorageTier;
  readonly criticality: SinkCriticality;
  write(context: PersistContext): Promise<void>;
}

export interface PersistReport {
  symbol: string;
  asOf: string;
  tiers: Partial<Record<StorageTier, "ok" | "failed">>;
}

export interface PersistInput {
  fields: CanonicalFields;
  canonicalFields?: string[];
  warnings?: NormalizationWarning[];
  asOf?: string;
  jobId?: string | null;
  source?: string;
}

export class TimeSeriesSink implements PersistenceSink {
  readonly tier = "timeseries" as const;
  readonly criticality = "authoritative" as const;

  constructor(private readonly store: TimeSeriesStore) {}

  async write(context: PersistContext): Promise<void> {
    this.store.upsertRecord(context.symbol, context.fields, {
      asOf: context.asOf,
      canonicalFields: context.canonicalFields
    });
  }
}

export class CacheSink implements PersistenceSink {
  readonly tier = "cache" as const;
  readonly criticality = "best_effort" as const;

  constructor(private readonly cache: CacheStore) {}

  async write(context: PersistContext): Promise<void> {
    const quote = { symbol: context.symbol, asOf: context.asOf, ...context.fields };
    await this.cache.set(cacheKeys.price(context.symbol), quote, CACHE_TTL_SECONDS.price);
    await this.cache.setHash(cacheKeys.stock(context.symbol), context.fields, CACHE_TTL_SECONDS.stock);
    await this.cache.publish(cacheKeys.priceChannel, quote);
  }
}

export class AuditSink implements PersistenceSink {
  readonly tier = "documents" as const;
  readonly criticality = "best_effort" as const;

  constructor(private readonly store: AuditStore) {}

  async write(context: PersistContext): Promise<void> {
    const tiers: Record<string, "ok" | "failed"> = {};
    for (const [tier, result] of Object.entries(context.tierResults)) {
      if (result) tiers[tier] = result;
    }
    await this.store.appendAuditEntry({
      id: makeId(),
      symbol: context.symbol,
      source: context.source,
      jobId: context.jobId,
      timestamp: context.asOf,
      fieldCount: context.canonicalFields.length,
      warnings: context.warnings,
      tiers
    });
  }
}

export interface FanoutStats {
  persisted: number;
  failuresByTier: Partial<Record<StorageTier, number>>;
  lastFailure: { tier: StorageTier; message: string; at: string } | null;
}

/**
 * Writes a normalized record to each sink in order. An authoritative sink's
 * failure aborts the call; best-effort failures are logged and counted.
 */
export class PersistenceFanout {
  private persisted = 0;
  private readonly failuresByTier: Partial<Record<StorageTier, number>> = {};
  private lastFailure: FanoutStats["lastFailure"] = null;

  constructor(private readonly sinks: readonly PersistenceSink[]) {}

  async persist(symbol: string, input: PersistInput): Promise<PersistReport> {
    const context: PersistContext = {
      symbol: symbol.toUpperCase(),
      fields: input.fields,
      canonicalFields: input.canonicalFields ?? Object.keys(input.fields),
      warnings: input.warnings ?? [],
      asOf: input.asOf ?? nowIso(),
      jobId: input.jobId ?? null,
      source: input.source ?? "upstream",
      tierResults: {}
    };

    for (const sink of this.sinks) {
      try {
        await sink.write(context);
        context.tierResults[sink.tier] = "ok";
      } catch (error) {
        context.tierResults[sink.tier] = "failed";
        this.recordFailure(sink.tier, error);
        if (sink.criticality === "authoritative") {
          throw new PersistenceTierUnavailableError(
            sink.tier,
            `${sink.tier} write failed for ${context.symbol}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        log.warn(`${sink.tier} write failed for ${context.symbol}; continuing`, errorMessage(error));
      }
    }

    this.persisted += 1;
    return { symbol: context.symbol, asOf: context.asOf, tiers: { ...context.tierResults } };
  }

  getStats(): FanoutStats {
    return {
      persisted: this.persisted,
      failuresByTier: { ...this.failuresByTier },
      lastFailure: this.lastFailure
    };
  }

  private recordFailure(tier: StorageTier, error: unknown): void {
    this.failuresByTier[tier] = (this.failuresByTier[tier] ?? 0) + 1;
    this.lastFailure = { tier, message: errorMessage(error), at: nowIso() };
  }
}

export const buildDefaultSinks = (
  timeSeries: TimeSeriesStore,
  cache: CacheStore,
  audit: AuditStore
): PersistenceSink[] => [new TimeSeriesSink(timeSeries), new CacheSink(cache), new AuditSink(audit)];
