import { describe, expect, test } from "vitest";

import { InvalidJobTransitionError } from "../core/errors";
import {
  createJob,
  isTerminal,
  progressPercent,
  recordOutcome,
  resolveFinalStatus,
  summarizeJob,
  transition
} from "../services/jobLifecycle";

const FINISHED = "2026-01-05T10:00:00.000Z";

describe("job lifecycle", () => {
  test("moves pending to running to a terminal status and stamps times", () => {
    const job = createJob(["TCS"], { jobId: "job-1", createdAt: "2026-01-05T09:59:00.000Z" });

    transition(job, "running", "2026-01-05T09:59:30.000Z");
    transition(job, "success", FINISHED);

    expect(job).toMatchObject({
      status: "success",
      startedAt: "2026-01-05T09:59:30.000Z",
      completedAt: FINISHED
    });
    expect(summarizeJob(job).durationSeconds).toBe(30);
  });

  test("rejects transitions out of a terminal status", () => {
    const job = createJob(["TCS"]);
    transition(job, "failed");

    expect(isTerminal(job.status)).toBe(true);
    expect(() => transition(job, "running")).toThrow(InvalidJobTransitionError);
    expect(() => transition(createJob(["A"]), "success")).toThrow("cannot move from pending to success");
  });

  test("settles each symbol once and keeps counts consistent", () => {
    const job = createJob(["A", "B", "C"]);

    expect(recordOutcome(job, { symbol: "A", status: "success", finishedAt: FINISHED })).toBe(true);
    expect(recordOutcome(job, { symbol: "A", status: "error", finishedAt: FINISHED })).toBe(false);
    recordOutcome(job, { symbol: "B", status: "error", finishedAt: FINISHED, errorCode: "UPSTREAM_REQUEST_FAILED", error: "HTTP 404" });
    recordOutcome(job, { symbol: "C", status: "skipped", finishedAt: FINISHED });

    expect(job.counts).toEqual({ total: 3, processed: 2, successful: 1, failed: 1, skipped: 1 });
    expect(job.errors).toEqual([
      { symbol: "B", code: "UPSTREAM_REQUEST_FAILED", message: "HTTP 404", timestamp: FINISHED }
    ]);
    expect(progressPercent(job)).toBe(100);
  });

  test("resolves the final status from the counts", () => {
    const job = createJob(["A", "B"]);
    expect(resolveFinalStatus(job, false)).toBe("failed");

    recordOutcome(job, { symbol: "A", status: "success", finishedAt: FINISHED });
    expect(resolveFinalStatus(job, false)).toBe("partial");
    expect(resolveFinalStatus(job, true)).toBe("failed");

    recordOutcome(job, { symbol: "B", status: "success", finishedAt: FINISHED });
    expect(resolveFinalStatus(job, false)).toBe("success");
  });

  test("reports progress to one decimal place", () => {
    const job = createJob(["A", "B", "C"]);
    recordOutcome(job, { symbol: "A", status: "success", finishedAt: FINISHED });

    expect(progressPercent(job)).toBe(33.3);
  });
});
