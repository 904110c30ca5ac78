import type Database from "better-sqlite3";

import { logger } from "../core/logger";
import { makeId } from "../utils/id";
import { nowIso } from "../utils/time";
import type { SqliteDatabase } from "./database";

export type ApiRequestDirection = "internal" | "external";
export type ApiRequestStatus = "success" | "error";

/** One HTTP exchange: a route served by this process, or a call made upstream. */
export interface ApiRequestLogEntry {
  id: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  direction: ApiRequestDirection;
  provider: string;
  method: string;
  endpoint: string;
  reason: string;
  status: ApiRequestStatus;
  statusCode?: number;
  correlationId?: string;
  errorMessage?: string;
}

export type ApiRequestLogInput = Omit<ApiRequestLogEntry, "id" | "startedAt" | "finishedAt" | "durationMs"> & {
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
};

export interface ApiRequestLogQuery {
  limit?: number;
  direction?: ApiRequestDirection;
  status?: ApiRequestStatus;
  provider?: string;
  endpointContains?: string;
  correlationId?: string;
  since?: string;
}

export interface ApiRequestLogSummaryRow {
  provider: string;
  direction: ApiRequestDirection;
  total: number;
  errors: number;
  errorRate: number;
  avgDurationMs: number;
  maxDurationMs: number;
  lastFinishedAt: string;
}

export interface ApiRequestLogSink {
  log(entry: ApiRequestLogInput): ApiRequestLogEntry;
}

interface LogRow {
  id: string;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  direction: ApiRequestDirection;
  provider: string;
  method: string;
  endpoint: string;
  reason: string;
  status: ApiRequestStatus;
  status_code: number | null;
  correlation_id: string | null;
  error_message: string | null;
}

interface SummaryRow {
  provider: string;
  direction: ApiRequestDirection;
  total: number;
  errors: number;
  avg_duration_ms: number;
  max_duration_ms: number;
  last_finished_at: string;
}

type FilterParams = Record<string, string | number>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS api_request_logs (
    id TEXT PRIMARY KEY,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL,
    duration_ms INTEGER NOT NULL,
    direction TEXT NOT NULL,
    provider TEXT NOT NULL,
    method TEXT NOT NULL,
    endpoint TEXT NOT NULL,
    reason TEXT NOT NULL,
    status TEXT NOT NULL,
    status_code INTEGER,
    correlation_id TEXT,
    error_message TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_api_request_logs_started_at ON api_request_logs (started_at DESC);
  CREATE INDEX IF NOT EXISTS idx_api_request_logs_correlation ON api_request_logs (correlation_id);
`;

const toEntry = (row: LogRow): ApiRequestLogEntry => ({
  id: row.id,
  startedAt: row.started_at,
  finishedAt: row.finished_at,
  durationMs: row.duration_ms,
  direction: row.direction,
  provider: row.provider,
  method: row.method,
  endpoint: row.endpoint,
  reason: row.reason,
  status: row.status,
  statusCode: row.status_code ?? undefined,
  correlationId: row.correlation_id ?? undefined,
  errorMessage: row.error_message ?? undefined
});

const buildFilter = (query: ApiRequestLogQuery): { where: string; params: FilterParams } => {
  const clauses: string[] = [];
  const params: FilterParams = {};
  const equals = {
    direction: query.direction,
    status: query.status,
    provider: query.provider,
    correlation_id: query.correlationId
  };

  for (const [column, value] of Object.entries(equals)) {
    if (value === undefined) continue;
    clauses.push(`${column} = @${column}`);
    params[column] = value;
  }
  if (query.endpointContains) {
    clauses.push("endpoint LIKE @endpoint");
    params.endpoint = `%${query.endpointContains}%`;
  }
  if (query.since) {
    clauses.push("started_at >= @since");
    params.since = query.since;
  }

  return { where: clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "", params };
};

/**
 * Append-only request log in the time-series database. Rows beyond
 * `retainRows` are trimmed every `trimEvery` inserts, oldest first.
 */
export class ApiRequestLogStore implements ApiRequestLogSink {
  private readonly insert: Database.Statement<[LogRow]>;
  private readonly trim: Database.Statement<[number]>;
  private insertsSinceTrim = 0;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly retainRows = 5_000,
    private readonly trimEvery = 100
  ) {
    this.db.exec(SCHEMA);
    this.insert = this.db.prepare<LogRow>(
      `INSERT INTO api_request_logs
         (id, started_at, finished_at, duration_ms, direction, provider, method, endpoint, reason,
          status, status_code, correlation_id, error_message)
       VALUES
         (@id, @started_at, @finished_at, @duration_ms, @direction, @provider, @method, @endpoint, @reason,
          @status, @status_code, @correlation_id, @error_message)`
    );
    this.trim = this.db.prepare<[number]>(
      `DELETE FROM api_request_logs WHERE id NOT IN (
         SELECT id FROM api_request_logs ORDER BY started_at DESC LIMIT ?
       )`
    );
  }

  log(entry: ApiRequestLogInput): ApiRequestLogEntry {
    const finishedAt = entry.finishedAt ?? nowIso();
    const startedAt = entry.startedAt ?? finishedAt;
    const duration = entry.durationMs ?? Date.parse(finishedAt) - Date.parse(startedAt);

    const record: ApiRequestLogEntry = {
      ...entry,
      id: makeId(),
      startedAt,
      finishedAt,
      durationMs: Number.isFinite(duration) ? Math.max(0, Math.round(duration)) : 0,
      method: entry.method.toUpperCase()
    };

    try {
      this.insert.run({
        id: record.id,
        started_at: record.startedAt,
        finished_at: record.finishedAt,
        duration_ms: record.durationMs,
        direction: record.direction,
        provider: record.provider,
        method: record.method,
        endpoint: record.endpoint,
        reason: record.reason,
        status: record.status,
        status_code: record.statusCode ?? null,
        correlation_id: record.correlationId ?? null,
        error_message: record.errorMessage ?? null
      });
      this.insertsSinceTrim += 1;
      if (this.insertsSinceTrim >= this.trimEvery) {
        this.insertsSinceTrim = 0;
        this.trim.run(this.retainRows);
      }
    } catch (error) {
      logger.warn("API request log write failed", error instanceof Error ? error.message : error);
    }

    return record;
  }

  list(query: ApiRequestLogQuery = {}): ApiRequestLogEntry[] {
    const limit = Math.max(1, Math.min(query.limit ?? 200, 2_000));
    const { where, params } = buildFilter(query);
    const rows = this.db
      .prepare<FilterParams, LogRow>(
        `SELECT * FROM api_request_logs ${where} ORDER BY started_at DESC, rowid DESC LIMIT @limit`
      )
      .all({ ...params, limit });
    return rows.map(toEntry);
  }

  /** Per provider and direction: volume, error rate and latency. */
  summarize(query: Omit<ApiRequestLogQuery, "limit"> = {}): ApiRequestLogSummaryRow[] {
    const { where, params } = buildFilter(query);
    const rows = this.db
      .prepare<FilterParams, SummaryRow>(
        `SELECT provider, direction,
                COUNT(*) AS total,
                SUM(CASE WHEN status = 'error' THEN 1 ELSE 0 END) AS errors,
                AVG(duration_ms) AS avg_duration_ms,
                MAX(duration_ms) AS max_duration_ms,
                MAX(finished_at) AS last_finished_at
         FROM api_request_logs ${where}
         GROUP BY provider, direction
         ORDER BY total DESC, provider ASC`
      )
      .all(params);

    return rows.map((row) => ({
      provider: row.provider,
      direction: row.direction,
      total: row.total,
      errors: row.errors,
      errorRate: row.total > 0 ? Math.round((row.errors / row.total) * 10_000) / 100 : 0,
      avgDurationMs: Math.round(row.avg_duration_ms),
      maxDurationMs: row.max_duration_ms,
      lastFinishedAt: row.last_finished_at
    }));
  }
}
