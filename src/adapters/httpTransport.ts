import type { ApiRequestLogSink } from "../storage/apiRequestLogStore";
import { nowIso } from "../utils/time";

export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  reason?: string;
  correlationId?: string;
}

export interface HttpResponse {
  status: number;
  text: string;
  headers: Record<string, string>;
}

/** Sends one request. Rejects only when no HTTP response was received. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const fetchTransport: HttpTransport = async (request) => {
  const response = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    body: request.body,
    signal: AbortSignal.timeout(request.timeoutMs)
  });
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });
  return { status: response.status, text: await response.text(), headers };
};

export const isTimeoutError = (error: unknown): boolean =>
  error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");

const endpointOf = (url: string): string => {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
};

/** Wraps a transport so every call lands in the API request log. */
export const withApiLog = (
  transport: HttpTransport,
  sink: ApiRequestLogSink | undefined,
  provider: string
): HttpTransport => {
  if (!sink) return transport;

  return async (request) => {
    const startedAt = nowIso();
    const startedMs = Date.now();
    const base = {
      direction: "external" as const,
      provider,
      method: request.method,
      endpoint: endpointOf(request.url),
      reason: request.reason ?? `${request.method} ${endpointOf(request.url)}`,
      correlationId: request.correlationId
    };

    try {
      const response = await transport(request);
      sink.log({
        ...base,
        startedAt,
        finishedAt: nowIso(),
        durationMs: Date.now() - startedMs,
        status: response.status >= 200 && response.status < 300 ? "success" : "error",
        statusCode: response.status
      });
      return response;
    } catch (error) {
      sink.log({
        ...base,
        startedAt,
        finishedAt: nowIso(),
        durationMs: Date.now() - startedMs,
        status: "error",
        errorMessage: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  };
};
