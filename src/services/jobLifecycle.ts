import { InvalidJobTransitionError } from "../core/errors";
import type {
  ExtractionJob,
  JobStatus,
  JobSummary,
  JobTrigger,
  SymbolOutcome
} from "../types/models";
import { round } from "../utils/statistics";
import { nowIso } from "../utils/time";
import { makeShortId } from "../utils/id";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["running", "failed"],
  running: ["success", "partial", "failed"],
  success: [],
  partial: [],
  failed: []
};

export const isTerminal = (status: JobStatus): boolean => TRANSITIONS[status].length === 0;

export const createJob = (
  symbols: readonly string[],
  options: { trigger?: JobTrigger; pipelineType?: string; jobId?: string; createdAt?: string } = {}
): ExtractionJob => ({
  jobId: options.jobId ?? makeShortId(12),
  pipelineType: options.pipelineType ?? "quotes",
  trigger: options.trigger ?? "manual",
  symbols: [...symbols],
  status: "pending",
  createdAt: options.createdAt ?? nowIso(),
  startedAt: null,
  completedAt: null,
  cancelRequested: false,
  outcomes: {},
  counts: { total: symbols.length, processed: 0, successful: 0, failed: 0, skipped: 0 },
  errors: []
});

export const transition = (job: ExtractionJob, next: JobStatus, at: string = nowIso()): void => {
  if (!TRANSITIONS[job.status].includes(next)) {
    throw new InvalidJobTransitionError(job.jobId, job.status, next);
  }
  job.status = next;
  if (next === "running") job.startedAt = at;
  if (isTerminal(next)) job.completedAt = at;
};

/** Records one symbol's result. A symbol settles once; later outcomes for it are ignored. */
export const recordOutcome = (job: ExtractionJob, outcome: SymbolOutcome): boolean => {
  if (job.outcomes[outcome.symbol]) return false;
  job.outcomes[outcome.symbol] = outcome;

  if (outcome.status === "skipped") {
    job.counts.skipped += 1;
    return true;
  }

  job.counts.processed += 1;
  if (outcome.status === "success") {
    job.counts.successful += 1;
  } else {
    job.counts.failed += 1;
    job.errors.push({
      symbol: outcome.symbol,
      code: outcome.errorCode ?? "UNKNOWN",
      message: outcome.error ?? "unknown error",
      timestamp: outcome.finishedAt
    });
  }
  return true;
};

/**
 * Final status of a drained job: `failed` on a fatal error or when nothing
 * succeeded, `success` when every symbol succeeded, otherwise `partial`.
 */
export const resolveFinalStatus = (job: ExtractionJob, fatal: boolean): JobStatus => {
  if (fatal || job.counts.successful === 0) return "failed";
  if (job.counts.successful === job.counts.total) return "success";
  return "partial";
};

export const progressPercent = (job: ExtractionJob): number => {
  if (job.counts.total === 0) return isTerminal(job.status) ? 100 : 0;
  return round(((job.counts.processed + job.counts.skipped) / job.counts.total) * 100, 1);
};

export const durationSeconds = (job: ExtractionJob): number | null => {
  if (!job.startedAt) return null;
  const end = job.completedAt ? Date.parse(job.completedAt) : Date.now();
  return round((end - Date.parse(job.startedAt)) / 1_000, 2);
};

export const summarizeJob = (job: ExtractionJob): JobSummary => ({
  jobId: job.jobId,
  pipelineType: job.pipelineType,
  trigger: job.trigger,
  status: job.status,
  createdAt: job.createdAt,
  startedAt: job.startedAt,
  completedAt: job.completedAt,
  durationSeconds: durationSeconds(job),
  progressPercent: progressPercent(job),
  counts: { ...job.counts },
  errors: [...job.errors]
});
