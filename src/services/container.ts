import { errorMessage } from "../core/errors";
import { settings } from "../core/config";
import { logger } from "../core/logger";
import { fetchTransport, withApiLog, type HttpTransport } from "../adapters/httpTransport";
import { MarketFeedClient } from "../adapters/marketFeedClient";
import { RequestBudget } from "../adapters/requestBudget";
import {
  SessionManager,
  buildDefaultExchange,
  type CredentialExchange,
  type SessionManagerOptions
} from "../adapters/sessionManager";
import { ApiRequestLogStore } from "../storage/apiRequestLogStore";
import { JsonlAuditStore, MongoAuditStore, type AuditStore } from "../storage/auditStore";
import { MemoryCacheStore, RedisCacheStore, type CacheStore } from "../storage/cacheStore";
import { openDatabase, type SqliteDatabase } from "../storage/database";
import { TimeSeriesStore } from "../storage/timeSeriesStore";
import { AnalysisService } from "./analysisService";
import { fieldCatalog, type FieldCatalog } from "./fieldCatalog";
import { Normalizer } from "./normalizer";
import { PersistenceFanout, buildDefaultSinks } from "./persistenceFanout";
import { PipelineService, type PipelineOptions } from "./pipelineService";
import { PipelineScheduler } from "./scheduler";
import { ScoringEngine } from "./scoringEngine";
import { SymbolUniverseService } from "./symbolUniverse";

export interface ServiceContainer {
  db: SqliteDatabase;
  catalog: FieldCatalog;
  requestLog: ApiRequestLogStore;
  timeSeries: TimeSeriesStore;
  cache: CacheStore;
  audit: AuditStore;
  session: SessionManager;
  budget: RequestBudget;
  client: MarketFeedClient;
  normalizer: Normalizer;
  fanout: PersistenceFanout;
  universe: SymbolUniverseService;
  pipeline: PipelineService;
  scheduler: PipelineScheduler;
  scoring: ScoringEngine;
  analysis: AnalysisService;
  close(): Promise<void>;
}

export interface ContainerOverrides {
  db?: SqliteDatabase;
  cache?: CacheStore;
  audit?: AuditStore;
  exchange?: CredentialExchange;
  transport?: HttpTransport;
  session?: SessionManagerOptions;
  budget?: RequestBudget;
  clientSleep?: (ms: number) => Promise<void>;
  pipeline?: PipelineOptions;
}

const buildCache = (): CacheStore => {
  if (!settings.redisUrl) return new MemoryCacheStore();
  return RedisCacheStore.connect(settings.redisUrl);
};

const buildAudit = (): AuditStore => {
  if (!settings.mongoUrl) return new JsonlAuditStore(settings.jsonlAuditPath);
  return MongoAuditStore.connect(settings.mongoUrl, settings.mongoDbName);
};

export const buildContainer = (overrides: ContainerOverrides = {}): ServiceContainer => {
  const db = overrides.db ?? openDatabase();
  const requestLog = new ApiRequestLogStore(db);
  const timeSeries = new TimeSeriesStore(db);
  const cache = overrides.cache ?? buildCache();
  const audit = overrides.audit ?? buildAudit();

  const transport = withApiLog(overrides.transport ?? fetchTransport, requestLog, "upstream");
  const session = new SessionManager(overrides.exchange ?? buildDefaultExchange(transport), overrides.session);
  const budget = overrides.budget ?? new RequestBudget();
  const client = new MarketFeedClient(session, budget, { transport, sleep: overrides.clientSleep });

  const normalizer = new Normalizer(fieldCatalog);
  const fanout = new PersistenceFanout(buildDefaultSinks(timeSeries, cache, audit));
  const universe = new SymbolUniverseService(timeSeries);
  const pipeline = new PipelineService(
    { session, client, normalizer, fanout, timeSeries, cache, audit, universe },
    overrides.pipeline
  );
  const scheduler = new PipelineScheduler(pipeline, timeSeries);
  const scoring = new ScoringEngine(fieldCatalog);
  const analysis = new AnalysisService(timeSeries, cache, scoring);

  logger.info(`Storage tiers: sqlite, ${cache.kind}, ${audit.kind}`);

  return {
    db,
    catalog: fieldCatalog,
    requestLog,
    timeSeries,
    cache,
    audit,
    session,
    budget,
    client,
    normalizer,
    fanout,
    universe,
    pipeline,
    scheduler,
    scoring,
    analysis,
    async close() {
      scheduler.stop();
      const results = await Promise.allSettled([cache.close(), audit.close()]);
      for (const result of results) {
        if (result.status === "rejected") logger.warn("Error while closing a store", errorMessage(result.reason));
      }
      db.close();
    }
  };
};
