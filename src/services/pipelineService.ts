import type { BulkOutcome, MarketFeedClient } from "../adapters/marketFeedClient";
import type { SessionManager } from "../adapters/sessionManager";
import { settings } from "../core/config";
import {
  AuthenticationError,
  InvalidJobTransitionError,
  InvalidRequestError,
  JobNotFoundError,
  PipelineError,
  errorMessage,
  isJobFatal
} from "../core/errors";
import { logger } from "../core/logger";
import type { AuditStore, JobDocument } from "../storage/auditStore";
import { CACHE_TTL_SECONDS, cacheKeys, type CacheStore, type RankedMember } from "../storage/cacheStore";
import type { TimeSeriesStore } from "../storage/timeSeriesStore";
import type {
  CanonicalFields,
  ExtractionJob,
  JobSummary,
  JobTrigger,
  PipelineEvent
} from "../types/models";
import { round } from "../utils/statistics";
import { isoDate, nowIso } from "../utils/time";
import {
  createJob,
  isTerminal,
  recordOutcome,
  resolveFinalStatus,
  summarizeJob,
  transition
} from "./jobLifecycle";
import type { Normalizer } from "./normalizer";
import type { PersistenceFanout } from "./persistenceFanout";
import { normalizeSymbols, type SymbolUniverseService } from "./symbolUniverse";

const log = logger.child("pipeline");

const TOP_MOVERS_LIMIT = 50;
const MISSING_SYMBOLS_PREVIEW = 20;

export type SessionAccess = Pick<SessionManager, "getValidToken" | "invalidate" | "getStatus">;

export interface PipelineDependencies {
  session: SessionAccess;
  client: MarketFeedClient;
  normalizer: Normalizer;
  fanout: PersistenceFanout;
  timeSeries: TimeSeriesStore;
  cache: CacheStore;
  audit: AuditStore;
  universe: SymbolUniverseService;
}

export interface PipelineOptions {
  concurrency?: number;
  historyLimit?: number;
  eventLogLimit?: number;
}

export interface RunOptions {
  symbols?: string[];
  trigger?: JobTrigger;
  pipelineType?: string;
}

export interface LatestQuote {
  symbol: string;
  asOf: string;
  jobId: string;
  fields: CanonicalFields;
}

export interface PipelineMetrics {
  totalJobsRun: number;
  successfulJobs: number;
  failedJobs: number;
  jobSuccessRate: number;
  totalSymbolsProcessed: number;
  avgJobDurationSeconds: number;
  uptimeSeconds: number;
  activeJobs: number;
  lastRun: JobSummary | null;
  expectedDailySymbols: number;
  receivedDailySymbols: number;
  completenessPercent: number;
  missingSymbols: string[];
  api: ReturnType<MarketFeedClient["getMetrics"]>;
  persistence: ReturnType<PersistenceFanout["getStats"]>;
}

export interface ConnectionTestResult {
  success: boolean;
  symbol: string;
  message: string;
  latencyMs: number;
  attempts: number | null;
  shape: string | null;
  data: CanonicalFields | null;
  warnings: number;
  error: string | null;
}

type TierHealth =
  | { status: "connected"; kind?: string; details: Record<string, unknown> }
  | { status: "error"; kind?: string; error: string };

export interface HealthReport {
  timestamp: string;
  overall: "healthy" | "degraded" | "unhealthy";
  timeseries: TierHealth;
  cache: TierHealth;
  documents: TierHealth;
  upstream: ReturnType<SessionManager["getStatus"]>;
}

const fieldNumber = (fields: CanonicalFields, key: string): number | null => {
  const value = fields[key];
  return typeof value === "number" ? value : null;
};

const splitMovers = (ranked: RankedMember[], limit: number): { gainers: RankedMember[]; losers: RankedMember[] } => ({
  gainers: ranked.filter((entry) => entry.score > 0).slice(0, limit),
  losers: ranked
    .filter((entry) => entry.score < 0)
    .reverse()
    .slice(0, limit)
});

const attemptsOf = (error: unknown): number | undefined =>
  error instanceof PipelineError && "attempts" in error && typeof error.attempts === "number"
    ? error.attempts
    : undefined;

const toJobDocument = (job: ExtractionJob): JobDocument => ({
  ...summarizeJob(job),
  symbols: [...job.symbols],
  failedSymbols: Object.values(job.outcomes)
    .filter((outcome) => outcome.status === "error")
    .map((outcome) => outcome.symbol),
  skippedSymbols: Object.values(job.outcomes)
    .filter((outcome) => outcome.status === "skipped")
    .map((outcome) => outcome.symbol)
});

/**
 * Runs extraction jobs: authenticate, fetch every symbol on the bounded pool,
 * normalize, fan out to storage, and keep the job record and event log.
 */
export class PipelineService {
  private readonly concurrency: number;
  private readonly historyLimit: number;
  private readonly eventLogLimit: number;

  private readonly activeJobs = new Map<string, ExtractionJob>();
  private readonly recentJobs = new Map<string, ExtractionJob>();
  private history: JobDocument[] = [];
  private events: PipelineEvent[] = [];
  private readonly latestQuotes = new Map<string, LatestQuote>();
  private readonly startedAtMs = Date.now();

  private totalJobsRun = 0;
  private successfulJobs = 0;
  private failedJobs = 0;
  private totalSymbolsProcessed = 0;
  private totalDurationSeconds = 0;

  constructor(
    private readonly deps: PipelineDependencies,
    options: PipelineOptions = {}
  ) {
    this.concurrency = options.concurrency ?? settings.fetchConcurrency;
    this.historyLimit = options.historyLimit ?? settings.jobHistoryLimit;
    this.eventLogLimit = options.eventLogLimit ?? settings.eventLogLimit;
  }

  /** Reloads archived job history from the document tier. */
  async initialize(): Promise<void> {
    try {
      this.history = await this.deps.audit.listJobs(this.historyLimit);
      log.info(`Loaded ${this.history.length} archived jobs`);
    } catch (error) {
      log.warn("Could not load job history from the document store", errorMessage(error));
    }
  }

  /** Creates a job and runs it in the background; returns the pending job. */
  startExtraction(options: RunOptions = {}): JobSummary {
    const job = this.prepareJob(options);
    this.execute(job).catch((error: unknown) => {
      log.error(`Job ${job.jobId} crashed`, error);
    });
    return summarizeJob(job);
  }

  /** Creates a job and resolves once it reaches a terminal status. */
  async runExtraction(options: RunOptions = {}): Promise<ExtractionJob> {
    return await this.execute(this.prepareJob(options));
  }

  cancelJob(jobId: string): JobSummary {
    const job = this.activeJobs.get(jobId);
    if (!job) {
      const finished = this.recentJobs.get(jobId) ?? this.history.find((entry) => entry.jobId === jobId);
      if (finished) throw new InvalidJobTransitionError(jobId, finished.status, "cancelled");
      throw new JobNotFoundError(jobId);
    }
    if (!job.cancelRequested) {
      job.cancelRequested = true;
      this.logEvent("job_cancel_requested", job.jobId, { status: job.status });
    }
    return summarizeJob(job);
  }

  getJob(jobId: string): ExtractionJob | JobDocument {
    const job = this.activeJobs.get(jobId) ?? this.recentJobs.get(jobId);
    if (job) return job;
    const archived = this.history.find((entry) => entry.jobId === jobId);
    if (archived) return archived;
    throw new JobNotFoundError(jobId);
  }

  listActiveJobs(): JobSummary[] {
    return [...this.activeJobs.values()].map(summarizeJob);
  }

  hasActiveJob(): boolean {
    return this.activeJobs.size > 0;
  }

  getHistory(limit = 20): JobDocument[] {
    return this.history.slice(0, Math.max(1, Math.min(limit, this.historyLimit)));
  }

  getLogs(limit = 100, eventType?: string): PipelineEvent[] {
    const filtered = eventType
      ? this.events.filter((event) => event.eventType === eventType)
      : this.events;
    return filtered.slice(-Math.max(1, Math.min(limit, this.eventLogLimit))).reverse();
  }

  getLatestQuote(symbol: string): LatestQuote | null {
    return this.latestQuotes.get(symbol.toUpperCase()) ?? null;
  }

  getMetrics(): PipelineMetrics {
    const expected = this.deps.universe.allSymbols();
    const today = isoDate();
    const received = expected.filter((symbol) => {
      const quote = this.latestQuotes.get(symbol);
      return quote !== undefined && isoDate(quote.asOf) === today;
    });
    const receivedSet = new Set(received);

    return {
      totalJobsRun: this.totalJobsRun,
      successfulJobs: this.successfulJobs,
      failedJobs: this.failedJobs,
      jobSuccessRate:
        this.totalJobsRun > 0 ? round((this.successfulJobs / this.totalJobsRun) * 100) : 0,
      totalSymbolsProcessed: this.totalSymbolsProcessed,
      avgJobDurationSeconds:
        this.totalJobsRun > 0 ? round(this.totalDurationSeconds / this.totalJobsRun) : 0,
      uptimeSeconds: Math.round((Date.now() - this.startedAtMs) / 1_000),
      activeJobs: this.activeJobs.size,
      lastRun: this.history[0] ?? null,
      expectedDailySymbols: expected.length,
      receivedDailySymbols: received.length,
      completenessPercent: expected.length > 0 ? round((received.length / expected.length) * 100) : 0,
      missingSymbols: expected.filter((symbol) => !receivedSet.has(symbol)).slice(0, MISSING_SYMBOLS_PREVIEW),
      api: this.deps.client.getMetrics(),
      persistence: this.deps.fanout.getStats()
    };
  }

  getDataSummary(): {
    symbols: number;
    lastUpdated: string | null;
    quotes: Array<{
      symbol: string;
      asOf: string;
      jobId: string;
      currentPrice: number | null;
      priceChangePercent: number | null;
      volume: number | null;
    }>;
  } {
    const quotes = [...this.latestQuotes.values()]
      .sort((a, b) => a.symbol.localeCompare(b.symbol))
      .map((quote) => ({
        symbol: quote.symbol,
        asOf: quote.asOf,
        jobId: quote.jobId,
        currentPrice: fieldNumber(quote.fields, "current_price"),
        priceChangePercent: fieldNumber(quote.fields, "price_change_percent"),
        volume: fieldNumber(quote.fields, "volume")
      }));
    const lastUpdated = quotes.reduce<string | null>(
      (latest, quote) => (latest === null || quote.asOf > latest ? quote.asOf : latest),
      null
    );
    return { symbols: quotes.length, lastUpdated, quotes };
  }

  /** Top gainers and losers from the cache, computed from memory when the cache has none. */
  async getTopMovers(count = 10): Promise<{ gainers: RankedMember[]; losers: RankedMember[]; source: string }> {
    try {
      const [gainers, losers] = await Promise.all([
        this.deps.cache.getRanking(cacheKeys.topGainers, count),
        this.deps.cache.getRanking(cacheKeys.topLosers, count)
      ]);
      if (gainers.length > 0 || losers.length > 0) {
        return {
          gainers,
          losers: losers.map((entry) => ({ member: entry.member, score: -entry.score })),
          source: "cache"
        };
      }
    } catch (error) {
      log.warn("Top movers cache read failed", errorMessage(error));
    }

    return { ...splitMovers(this.rankByChange(), count), source: "memory" };
  }

  /** Fetches and normalizes one symbol without persisting it. */
  async testConnection(symbol = "RELIANCE"): Promise<ConnectionTestResult> {
    const startedMs = Date.now();
    const wanted = symbol.trim().toUpperCase();
    try {
      const response = await this.deps.client.fetch(this.deps.client.quoteRequest(wanted));
      const normalized = this.deps.normalizer.transform(response.body, { symbol: wanted });
      return {
        success: true,
        symbol: wanted,
        message: `Fetched ${normalized.canonicalFields.length} fields for ${wanted}`,
        latencyMs: Date.now() - startedMs,
        attempts: response.attempts,
        shape: response.shape,
        data: normalized.fields,
        warnings: normalized.warnings.length,
        error: null
      };
    } catch (error) {
      return {
        success: false,
        symbol: wanted,
        message: `Connection test failed for ${wanted}`,
        latencyMs: Date.now() - startedMs,
        attempts: attemptsOf(error) ?? null,
        shape: null,
        data: null,
        warnings: 0,
        error: errorMessage(error)
      };
    }
  }

  async healthCheck(): Promise<HealthReport> {
    const timeseries = this.checkTier("timeseries", "sqlite", async () => {
      if (!this.deps.timeSeries.ping()) throw new Error("sqlite ping failed");
      return { tables: this.deps.timeSeries.getStats() };
    });
    const cache = this.checkTier("cache", this.deps.cache.kind, async () => {
      if (!(await this.deps.cache.ping())) throw new Error(`${this.deps.cache.kind} ping failed`);
      const stats = await this.deps.cache.stats();
      return { ...stats };
    });
    const documents = this.checkTier("documents", this.deps.audit.kind, async () => {
      const stats = await this.deps.audit.stats();
      if (!stats.connected) throw new Error(`${stats.kind} is not reachable`);
      return { collections: stats.collections };
    });

    const [timeseriesHealth, cacheHealth, documentsHealth] = await Promise.all([timeseries, cache, documents]);
    const overall =
      timeseriesHealth.status !== "connected"
        ? "unhealthy"
        : cacheHealth.status === "connected" && documentsHealth.status === "connected"
          ? "healthy"
          : "degraded";

    return {
      timestamp: nowIso(),
      overall,
      timeseries: timeseriesHealth,
      cache: cacheHealth,
      documents: documentsHealth,
      upstream: this.deps.session.getStatus()
    };
  }

  private async checkTier(
    tier: string,
    kind: string,
    check: () => Promise<Record<string, unknown>>
  ): Promise<TierHealth> {
    try {
      return { status: "connected", kind, details: await check() };
    } catch (error) {
      log.warn(`${tier} health check failed`, errorMessage(error));
      return { status: "error", kind, error: errorMessage(error) };
    }
  }

  private prepareJob(options: RunOptions): ExtractionJob {
    const symbols = normalizeSymbols(options.symbols ?? this.deps.universe.allSymbols());
    if (symbols.length === 0) {
      throw new InvalidRequestError("No valid symbols to extract");
    }
    const job = createJob(symbols, { trigger: options.trigger, pipelineType: options.pipelineType });
    this.activeJobs.set(job.jobId, job);
    this.logEvent("job_created", job.jobId, { symbols: symbols.length, trigger: job.trigger });
    return job;
  }

  private async execute(job: ExtractionJob): Promise<ExtractionJob> {
    try {
      await this.deps.session.getValidToken();
    } catch (error) {
      this.recordJobError(job, error);
      this.skipUnsettled(job);
      transition(job, "failed");
      return await this.finish(job);
    }

    if (job.cancelRequested) {
      this.skipUnsettled(job);
      transition(job, "failed");
      return await this.finish(job);
    }

    transition(job, "running");
    this.logEvent("job_started", job.jobId, { symbols: job.counts.total, concurrency: this.concurrency });

    let fatal = false;
    try {
      await this.deps.client.fetchBulk(
        job.symbols.map((symbol) => this.deps.client.quoteRequest(symbol)),
        {
          concurrency: this.concurrency,
          shouldContinue: () => !job.cancelRequested,
          onOutcome: (outcome) => this.settleSymbol(job, outcome)
        }
      );
    } catch (error) {
      fatal = true;
      this.recordJobError(job, error);
    }

    this.skipUnsettled(job);
    transition(job, resolveFinalStatus(job, fatal));
    return await this.finish(job);
  }

  private async settleSymbol(job: ExtractionJob, outcome: BulkOutcome): Promise<void> {
    const symbol = outcome.request.symbol;
    try {
      if (!outcome.ok) throw outcome.error;

      const normalized = this.deps.normalizer.transform(outcome.response.body, { symbol });
      const asOf = nowIso();
      await this.deps.fanout.persist(symbol, {
        fields: normalized.fields,
        canonicalFields: normalized.canonicalFields,
        warnings: normalized.warnings,
        asOf,
        jobId: job.jobId,
        source: `upstream:${outcome.response.shape}`
      });

      this.latestQuotes.set(symbol, { symbol, asOf, jobId: job.jobId, fields: normalized.fields });
      recordOutcome(job, {
        symbol,
        status: "success",
        finishedAt: asOf,
        attempts: outcome.response.attempts,
        warnings: normalized.warnings.length
      });
      if (normalized.warnings.length > 0) {
        this.logEvent("normalization_warnings", job.jobId, {
          symbol,
          warnings: normalized.warnings.map((warning) => `${warning.field}: ${warning.reason}`)
        });
      }
    } catch (error) {
      // session loss belongs to the job; the symbol stays unsettled and is skipped
      if (error instanceof AuthenticationError) throw error;
      recordOutcome(job, {
        symbol,
        status: "error",
        finishedAt: nowIso(),
        attempts: attemptsOf(error),
        errorCode: error instanceof PipelineError ? error.code : "UNEXPECTED",
        error: errorMessage(error)
      });
      this.logEvent("symbol_failed", job.jobId, { symbol, error: errorMessage(error) });
      if (isJobFatal(error)) throw error;
    }
  }

  private skipUnsettled(job: ExtractionJob): void {
    const finishedAt = nowIso();
    for (const symbol of job.symbols) {
      if (!job.outcomes[symbol]) recordOutcome(job, { symbol, status: "skipped", finishedAt });
    }
  }

  private recordJobError(job: ExtractionJob, error: unknown): void {
    const code = error instanceof PipelineError ? error.code : "UNEXPECTED";
    job.errors.push({ symbol: null, code, message: errorMessage(error), timestamp: nowIso() });
    this.logEvent("job_error", job.jobId, { code, error: errorMessage(error) });
  }

  private async finish(job: ExtractionJob): Promise<ExtractionJob> {
    if (!isTerminal(job.status)) {
      throw new InvalidJobTransitionError(job.jobId, job.status, "archived");
    }

    const summary = summarizeJob(job);
    this.totalJobsRun += 1;
    if (job.status === "failed") this.failedJobs += 1;
    else this.successfulJobs += 1;
    this.totalSymbolsProcessed += job.counts.processed;
    this.totalDurationSeconds += summary.durationSeconds ?? 0;

    this.activeJobs.delete(job.jobId);
    this.recentJobs.set(job.jobId, job);
    while (this.recentJobs.size > this.historyLimit) {
      const oldest = this.recentJobs.keys().next();
      if (oldest.done) break;
      this.recentJobs.delete(oldest.value);
    }

    const document = toJobDocument(job);
    this.history = [document, ...this.history].slice(0, this.historyLimit);

    await this.bestEffort("archive job", () => this.deps.audit.insertJob(document));
    await this.bestEffort("cache pipeline status", () =>
      this.deps.cache.set(cacheKeys.pipelineStatus, summary, CACHE_TTL_SECONDS.pipelineStatus)
    );
    if (job.counts.successful > 0) {
      await this.bestEffort("rank top movers", () => this.publishTopMovers());
    }

    this.logEvent("job_completed", job.jobId, {
      status: job.status,
      successful: job.counts.successful,
      failed: job.counts.failed,
      skipped: job.counts.skipped,
      durationSeconds: summary.durationSeconds
    });
    log.info(`Job ${job.jobId} finished as ${job.status}`, job.counts);
    return job;
  }

  private rankByChange(): RankedMember[] {
    const ranked: RankedMember[] = [];
    for (const quote of this.latestQuotes.values()) {
      const change = fieldNumber(quote.fields, "price_change_percent");
      if (change !== null) ranked.push({ member: quote.symbol, score: change });
    }
    return ranked.sort((a, b) => b.score - a.score || a.member.localeCompare(b.member));
  }

  private async publishTopMovers(): Promise<void> {
    const { gainers, losers } = splitMovers(this.rankByChange(), TOP_MOVERS_LIMIT);
    await this.deps.cache.replaceRanking(cacheKeys.topGainers, gainers, CACHE_TTL_SECONDS.movers);
    // stored negated so the highest score is the biggest loser
    await this.deps.cache.replaceRanking(
      cacheKeys.topLosers,
      losers.map((entry) => ({ member: entry.member, score: -entry.score })),
      CACHE_TTL_SECONDS.movers
    );
  }

  private async bestEffort(label: string, run: () => Promise<unknown>): Promise<void> {
    try {
      await run();
    } catch (error) {
      log.warn(`Could not ${label}`, errorMessage(error));
    }
  }

  private logEvent(eventType: string, jobId: string | null, payload: Record<string, unknown>): void {
    this.events.push({ timestamp: nowIso(), eventType, jobId, payload });
    if (this.events.length > this.eventLogLimit) {
      this.events = this.events.slice(-this.eventLogLimit);
    }
  }
}
