import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { settings } from "../core/config";
import { summarizeJob } from "../services/jobLifecycle";
import {
  addSymbolsRequestSchema,
  analysisQuerySchema,
  apiRequestLogSummaryQuerySchema,
  apiRequestLogsQuerySchema,
  cacheFlushQuerySchema,
  historyQuerySchema,
  logsQuerySchema,
  moversQuerySchema,
  priceHistoryQuerySchema,
  removeSymbolsRequestSchema,
  runPipelineRequestSchema,
  schedulerConfigPatchSchema,
  screenerRequestSchema,
  testConnectionRequestSchema
} from "../types/schemas";

interface JobParams {
  jobId: string;
}

interface SymbolParams {
  symbol: string;
}

export const registerRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/health", async () => ({
    status: "ok",
    app: settings.appName,
    env: settings.appEnv,
    timestamp: new Date().toISOString()
  }));

  app.get("/database/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = await app.services.pipeline.healthCheck();
    return reply.code(report.overall === "unhealthy" ? 503 : 200).send(report);
  });

  app.get("/pipeline/status", async () => {
    const { pipeline, scheduler, session, universe } = app.services;
    return {
      generatedAt: new Date().toISOString(),
      activeJobs: pipeline.listActiveJobs(),
      lastRun: pipeline.getHistory(1)[0] ?? null,
      scheduler: scheduler.getRuntimeStatus(),
      session: session.getStatus(),
      universe: { totalSymbols: universe.totalSymbols() }
    };
  });

  app.post("/pipeline/run", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = runPipelineRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }

    const options = {
      symbols: body.data.symbols,
      pipelineType: body.data.pipelineType,
      trigger: "manual" as const
    };
    if (body.data.wait) {
      const job = await app.services.pipeline.runExtraction(options);
      return { job: summarizeJob(job) };
    }
    const job = app.services.pipeline.startExtraction(options);
    return reply.code(202).send({ job });
  });

  app.get("/pipeline/jobs", async () => ({
    jobs: app.services.pipeline.listActiveJobs()
  }));

  app.get<{ Params: JobParams }>("/pipeline/jobs/:jobId", async (request) => ({
    job: app.services.pipeline.getJob(request.params.jobId)
  }));

  app.post<{ Params: JobParams }>("/pipeline/jobs/:jobId/cancel", async (request) => ({
    job: app.services.pipeline.cancelJob(request.params.jobId)
  }));

  app.get("/pipeline/history", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = historyQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const jobs = app.services.pipeline.getHistory(query.data.limit);
    return { count: jobs.length, jobs };
  });

  app.get("/pipeline/logs", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = logsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const events = app.services.pipeline.getLogs(query.data.limit, query.data.eventType);
    return { count: events.length, events };
  });

  app.get("/pipeline/metrics", async () => ({
    ...app.services.pipeline.getMetrics(),
    nextScheduledRun: app.services.scheduler.getRuntimeStatus().nextRunAt
  }));

  app.get("/pipeline/data-summary", async () => app.services.pipeline.getDataSummary());

  app.get("/pipeline/top-movers", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = moversQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return app.services.pipeline.getTopMovers(query.data.count);
  });

  app.post("/pipeline/test-api", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = testConnectionRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    return app.services.pipeline.testConnection(body.data.symbol);
  });

  app.post("/pipeline/scheduler/start", async () => {
    app.services.scheduler.start();
    return { scheduler: app.services.scheduler.getRuntimeStatus() };
  });

  app.post("/pipeline/scheduler/stop", async () => {
    app.services.scheduler.stop();
    return { scheduler: app.services.scheduler.getRuntimeStatus() };
  });

  app.put("/pipeline/scheduler/config", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = schedulerConfigPatchSchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    const config = app.services.scheduler.updateConfig(body.data);
    return { config, scheduler: app.services.scheduler.getRuntimeStatus() };
  });

  app.get("/pipeline/default-symbols", async () => {
    const categories = app.services.universe.getDefaultCategories();
    return {
      categories,
      totalSymbols: categories.reduce((total, category) => total + category.symbols.length, 0)
    };
  });

  app.get("/pipeline/symbol-categories", async () => ({
    categories: app.services.universe.listCategories(),
    totalSymbols: app.services.universe.totalSymbols()
  }));

  app.post("/pipeline/symbols/add", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = addSymbolsRequestSchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    return app.services.universe.addSymbols(body.data.symbols, body.data.category);
  });

  app.post("/pipeline/symbols/remove", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = removeSymbolsRequestSchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    return app.services.universe.removeSymbols(body.data.symbols);
  });

  app.get<{ Params: SymbolParams }>("/stocks/:symbol/analysis", async (request, reply) => {
    const query = analysisQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    return app.services.analysis.analyze(request.params.symbol, {
      refresh: query.data.refresh,
      context:
        query.data.modelConfidence !== undefined ? { modelConfidence: query.data.modelConfidence } : undefined
    });
  });

  app.get<{ Params: SymbolParams }>("/stocks/:symbol/quote", async (request) =>
    app.services.analysis.getQuote(request.params.symbol)
  );

  app.post("/screener", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = screenerRequestSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: body.error.flatten() });
    }
    return app.services.analysis.screen(body.data);
  });

  app.get("/timeseries/stats", async () => ({
    tables: app.services.timeSeries.getStats()
  }));

  app.get<{ Params: SymbolParams }>("/timeseries/prices/:symbol", async (request, reply) => {
    const query = priceHistoryQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const prices = app.services.timeSeries.getPrices(request.params.symbol, query.data);
    return { symbol: request.params.symbol.toUpperCase(), count: prices.length, prices };
  });

  app.get("/cache/stats", async () => app.services.cache.stats());

  app.delete("/cache/flush", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = cacheFlushQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }
    const deleted = await app.services.cache.flush(query.data.pattern);
    return { pattern: query.data.pattern, deleted };
  });

  app.get("/extraction/fields", async () => {
    const { catalog } = app.services;
    return {
      totalFields: catalog.fields.length,
      categories: Object.entries(catalog.categories).map(([id, fields]) => ({
        id,
        count: fields.length,
        fields
      })),
      aliases: catalog.aliases
    };
  });

  app.get("/api-request-logs", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = apiRequestLogsQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }

    const logs = app.services.requestLog.list(query.data);
    return {
      generatedAt: new Date().toISOString(),
      logs
    };
  });

  app.get("/api-request-logs/summary", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = apiRequestLogSummaryQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return reply.code(400).send({ error: query.error.flatten() });
    }

    const since = new Date(Date.now() - query.data.sinceMinutes * 60_000).toISOString();
    return {
      generatedAt: new Date().toISOString(),
      since,
      providers: app.services.requestLog.summarize({ direction: query.data.direction, since })
    };
  });
};
