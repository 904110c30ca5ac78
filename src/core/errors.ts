export type PipelineErrorCode =
  | "AUTHENTICATION_FAILED"
  | "RATE_LIMIT_EXCEEDED"
  | "TRANSIENT_NETWORK"
  | "UPSTREAM_REQUEST_FAILED"
  | "NORMALIZATION_FAILED"
  | "PERSISTENCE_TIER_UNAVAILABLE"
  | "JOB_NOT_FOUND"
  | "DATA_NOT_FOUND"
  | "INVALID_JOB_TRANSITION"
  | "INVALID_REQUEST";

export type StorageTier = "timeseries" | "cache" | "documents";

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: PipelineErrorCode,
    readonly statusCode = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credential exchange exhausted its attempts. Fatal for the running job. */
export class AuthenticationError extends PipelineError {
  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, "AUTHENTICATION_FAILED", 502, options);
  }
}

export class RateLimitExceededError extends PipelineError {
  constructor(message: string, readonly attempts: number, readonly retryAfterMs: number | null = null) {
    super(message, "RATE_LIMIT_EXCEEDED", 429);
  }
}

export class TransientNetworkError extends PipelineError {
  constructor(message: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(message, "TRANSIENT_NETWORK", 504, options);
  }
}

/** Final failure of an upstream call; carries the last observed HTTP status when there was one. */
export class UpstreamRequestError extends PipelineError {
  constructor(
    message: string,
    readonly lastStatus: number | null,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, "UPSTREAM_REQUEST_FAILED", 502, options);
  }
}

export class NormalizationError extends PipelineError {
  constructor(message: string, readonly sample?: unknown) {
    super(message, "NORMALIZATION_FAILED", 422);
  }
}

export class PersistenceTierUnavailableError extends PipelineError {
  constructor(readonly tier: StorageTier, message: string, options?: { cause?: unknown }) {
    super(message, "PERSISTENCE_TIER_UNAVAILABLE", 503, options);
  }
}

export class JobNotFoundError extends PipelineError {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`, "JOB_NOT_FOUND", 404);
  }
}

export class DataNotFoundError extends PipelineError {
  constructor(message: string) {
    super(message, "DATA_NOT_FOUND", 404);
  }
}

export class InvalidJobTransitionError extends PipelineError {
  constructor(jobId: string, from: string, to: string) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`, "INVALID_JOB_TRANSITION", 409);
  }
}

export class InvalidRequestError extends PipelineError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST", 400);
  }
}

/** Errors that end the whole job instead of a single symbol. */
export const isJobFatal = (error: unknown): boolean =>
  error instanceof AuthenticationError ||
  (error instanceof PersistenceTierUnavailableError && error.tier === "timeseries");

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
