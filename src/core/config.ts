import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "y", "on"].includes(value.toLowerCase());
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Math.round(parseNumber(value, fallback));
  return parsed > 0 ? parsed : fallback;
};

const parseAppEnv = (value: string | undefined): "dev" | "test" | "prod" => {
  const normalized = (value ?? "dev").toLowerCase();
  if (normalized === "test" || normalized === "prod") return normalized;
  return "dev";
};

export const isTestRuntime = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const appEnv = (env.APP_ENV ?? "").toLowerCase();
  const nodeEnv = (env.NODE_ENV ?? "").toLowerCase();
  return appEnv === "test" || nodeEnv === "test" || Boolean(env.VITEST);
};

const buildSettings = (env: NodeJS.ProcessEnv) => {
  const testRuntime = isTestRuntime(env);

  return {
    appName: env.APP_NAME ?? "quoteforge",
    appHost: env.APP_HOST ?? "127.0.0.1",
    appPort: parseNumber(env.APP_PORT, 8000),
    appEnv: parseAppEnv(env.APP_ENV),

    upstreamBaseUrl: env.UPSTREAM_BASE_URL ?? "https://api.groww.in",
    upstreamApiKey: env.UPSTREAM_API_KEY ?? "",
    upstreamApiSecret: env.UPSTREAM_API_SECRET ?? "",
    upstreamTotpSeed: env.UPSTREAM_TOTP_SEED ?? "",
    upstreamExchange: env.UPSTREAM_EXCHANGE ?? "NSE",
    upstreamSegment: env.UPSTREAM_SEGMENT ?? "CASH",
    upstreamTimeoutMs: parsePositiveInt(env.UPSTREAM_TIMEOUT_MS, 10_000),

    rateLimitPerSecond: parsePositiveInt(env.RATE_LIMIT_PER_SECOND, 10),
    rateLimitPerMinute: parsePositiveInt(env.RATE_LIMIT_PER_MINUTE, 300),
    fetchConcurrency: parsePositiveInt(env.FETCH_CONCURRENCY, 5),
    retryMaxAttempts: parsePositiveInt(env.RETRY_MAX_ATTEMPTS, 5),
    retryBaseDelayMs: parsePositiveInt(env.RETRY_BASE_DELAY_MS, 250),
    retryMaxDelayMs: parsePositiveInt(env.RETRY_MAX_DELAY_MS, 8_000),

    sessionRefreshDedupMs: parsePositiveInt(env.SESSION_REFRESH_DEDUP_MS, 5_000),
    sessionRefreshMaxAttempts: parsePositiveInt(env.SESSION_REFRESH_MAX_ATTEMPTS, 3),
    sessionExpirySkewMs: parsePositiveInt(env.SESSION_EXPIRY_SKEW_MS, 30_000),

    schedulerIntervalMinutes: parsePositiveInt(env.SCHEDULER_INTERVAL_MINUTES, 15),
    schedulerAutoStart: parseBool(env.SCHEDULER_AUTO_START, true),
    jobHistoryLimit: parsePositiveInt(env.JOB_HISTORY_LIMIT, 100),
    eventLogLimit: parsePositiveInt(env.EVENT_LOG_LIMIT, 1_000),

    dbPath: env.DB_PATH ?? (testRuntime ? ":memory:" : "./data/quoteforge.sqlite"),
    jsonlAuditPath:
      env.JSONL_AUDIT_PATH ?? (testRuntime ? "./data/audit.test.jsonl" : "./data/audit.jsonl"),
    redisUrl: env.REDIS_URL ?? "",
    mongoUrl: env.MONGO_URL ?? "",
    mongoDbName: env.MONGO_DB_NAME ?? "quoteforge"
  };
};

export type AppSettings = ReturnType<typeof buildSettings>;

const ensureStoragePaths = (config: AppSettings): void => {
  if (config.dbPath !== ":memory:") {
    mkdirSync(dirname(config.dbPath), { recursive: true });
  }
  mkdirSync(dirname(config.jsonlAuditPath), { recursive: true });
};

export const settings: AppSettings = buildSettings(process.env);
ensureStoragePaths(settings);
