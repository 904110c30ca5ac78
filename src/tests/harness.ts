import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { HttpTransport } from "../adapters/httpTransport";
import { RequestBudget } from "../adapters/requestBudget";
import type { CredentialExchange } from "../adapters/sessionManager";
import { JsonlAuditStore } from "../storage/auditStore";
import { MemoryCacheStore } from "../storage/cacheStore";
import { openDatabase } from "../storage/database";
import { buildContainer, type ServiceContainer } from "../services/container";
import type { PipelineDependencies, PipelineOptions } from "../services/pipelineService";

export const noSleep = async (): Promise<void> => undefined;

export const tokenExchange: CredentialExchange = {
  exchange: async () => ({ token: "test-token", expiresAt: Date.now() + 60 * 60 * 1_000 })
};

export interface HarnessOptions {
  /** Quote bodies by trading symbol; any other symbol answers 404. */
  quotes?: Record<string, unknown>;
  exchange?: CredentialExchange;
  onRequest?: (symbol: string) => void;
  /** Answers 401 for requests whose bearer token this returns true for. */
  rejectToken?: (token: string) => boolean;
  pipeline?: PipelineOptions;
}

/** A full service container wired to in-process stores and a scripted upstream. */
export const buildHarness = (options: HarnessOptions = {}): ServiceContainer => {
  const transport: HttpTransport = async (request) => {
    const symbol = new URL(request.url).searchParams.get("trading_symbol") ?? "";
    options.onRequest?.(symbol);
    const token = (request.headers.Authorization ?? "").replace(/^Bearer /, "");
    if (options.rejectToken?.(token)) return { status: 401, text: "{}", headers: {} };
    const body = options.quotes?.[symbol];
    if (body === undefined) return { status: 404, text: "{}", headers: {} };
    return { status: 200, text: JSON.stringify(body), headers: {} };
  };

  return buildContainer({
    db: openDatabase(":memory:"),
    cache: new MemoryCacheStore(),
    audit: new JsonlAuditStore(join(mkdtempSync(join(tmpdir(), "quoteforge-")), "audit.jsonl")),
    exchange: options.exchange ?? tokenExchange,
    transport,
    session: { maxAttempts: 1, sleep: noSleep },
    budget: new RequestBudget({ perSecond: 1_000, perMinute: 100_000 }, Date.now, noSleep),
    clientSleep: noSleep,
    pipeline: { concurrency: 2, ...options.pipeline }
  });
};

export const dependenciesOf = (services: ServiceContainer): PipelineDependencies => ({
  session: services.session,
  client: services.client,
  normalizer: services.normalizer,
  fanout: services.fanout,
  timeSeries: services.timeSeries,
  cache: services.cache,
  audit: services.audit,
  universe: services.universe
});
