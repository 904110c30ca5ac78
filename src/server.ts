import { pathToFileURL } from "node:url";
import Fastify from "fastify";
import type { FastifyRequest } from "fastify";
import cors from "@fastify/cors";

import { registerRoutes } from "./api/routes";
import { isTestRuntime, settings } from "./core/config";
import { PipelineError, errorMessage } from "./core/errors";
import { logger } from "./core/logger";
import { buildContainer } from "./services/container";
import type { ServiceContainer } from "./services/container";

interface ApiLogContext {
  startedMs: number;
  startedAt: string;
  path: string;
  reason: string;
  errorMessage?: string;
}

declare module "fastify" {
  interface FastifyInstance {
    services: ServiceContainer;
  }
  interface FastifyRequest {
    apiLogContext: ApiLogContext | null;
  }
}

const requestReasonByPath: Record<string, string> = {
  "/health": "Health check request",
  "/database/health": "Check every storage tier",
  "/pipeline/status": "Fetch active jobs, scheduler and session status",
  "/pipeline/run": "Start an extraction job",
  "/pipeline/jobs/:jobId/cancel": "Cancel a running extraction job",
  "/pipeline/metrics": "Fetch pipeline metrics",
  "/pipeline/test-api": "Test the upstream API with one symbol",
  "/pipeline/scheduler/config": "Update scheduler configuration",
  "/pipeline/symbols/add": "Add symbols to the tracked universe",
  "/pipeline/symbols/remove": "Remove symbols from the tracked universe",
  "/stocks/:symbol/analysis": "Score one symbol",
  "/screener": "Run the stock screener",
  "/cache/flush": "Flush cache keys",
  "/api-request-logs": "Inspect internal/external API request logs"
};

const requestPath = (url: string): string => url.split("?")[0] ?? url;

export const buildApp = async (options: { services?: ServiceContainer } = {}) => {
  const app = Fastify({ logger: false });
  const ownsServices = options.services === undefined;
  app.decorate("services", options.services ?? buildContainer());
  app.decorateRequest("apiLogContext", null);

  await app.register(cors, { origin: true });

  app.setErrorHandler(async (error, request, reply) => {
    if (request.apiLogContext) request.apiLogContext.errorMessage = error.message;

    if (error instanceof PipelineError) {
      return reply.code(error.statusCode).send({ error: error.message, code: error.code });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) logger.error(`Unhandled error on ${request.method} ${request.url}`, error);
    return reply.code(statusCode).send({ error: statusCode >= 500 ? "Internal server error" : error.message });
  });

  app.addHook("preHandler", async (request: FastifyRequest) => {
    const path = requestPath(request.url);
    const startedMs = Date.now();
    const routePath = request.routeOptions.url ?? path;
    request.apiLogContext = {
      startedMs,
      startedAt: new Date(startedMs).toISOString(),
      path: routePath,
      reason:
        requestReasonByPath[routePath] ??
        requestReasonByPath[path] ??
        `Handle ${request.method.toUpperCase()} ${routePath}`
    };
  });

  app.addHook("onResponse", async (request, reply) => {
    const context = request.apiLogContext;
    if (!context) return;

    app.services.requestLog.log({
      startedAt: context.startedAt,
      finishedAt: new Date().toISOString(),
      durationMs: Date.now() - context.startedMs,
      direction: "internal",
      provider: settings.appName,
      method: request.method.toUpperCase(),
      endpoint: context.path,
      reason: context.reason,
      status: reply.statusCode >= 400 ? "error" : "success",
      statusCode: reply.statusCode,
      correlationId: String(request.id),
      errorMessage: context.errorMessage
    });
  });

  await registerRoutes(app);

  app.addHook("onClose", async () => {
    if (ownsServices) {
      await app.services.close();
    } else {
      app.services.scheduler.stop();
    }
  });

  return app;
};

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
};

if (isEntryPoint()) {
  const app = await buildApp();
  try {
    await app.services.pipeline.initialize();
    await app.listen({ host: settings.appHost, port: settings.appPort });
    logger.info(`${settings.appName} listening on http://${settings.appHost}:${settings.appPort}`);
    if (app.services.scheduler.getConfig().autoStart && !isTestRuntime()) {
      app.services.scheduler.start();
    }
  } catch (error) {
    logger.error("Failed to start server", error);
    process.exit(1);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}; shutting down`);
      app
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed", errorMessage(error));
          process.exit(1);
        });
    });
  }
}
