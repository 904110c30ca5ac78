import { z } from "zod";
import { settings } from "../core/config";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { ExtractionJob } from "../types/models";
import type { RunOptions } from "./pipelineService";
import type { AppStatePersistence } from "./symbolUniverse";

const log = logger.child("scheduler");

export interface ScheduledRunner {
  runExtraction(options: RunOptions): Promise<ExtractionJob>;
  hasActiveJob(): boolean;
}

export interface SchedulerConfig {
  intervalMinutes: number;
  autoStart: boolean;
}

const persistedConfigSchema = z.object({
  intervalMinutes: z.number().positive().max(24 * 60),
  autoStart: z.boolean()
});

export class PipelineScheduler {
  private static readonly configStateKey = "scheduler_config_v1";
  private timer: NodeJS.Timeout | null = null;
  private config: SchedulerConfig;
  private nextRunAtMs: number | null = null;
  private lastRunStartedAtMs: number | null = null;
  private lastRunFinishedAtMs: number | null = null;
  private lastRunError: string | null = null;
  private lastJobId: string | null = null;
  private skippedTicks = 0;
  private runInFlight = false;

  constructor(
    private readonly runner: ScheduledRunner,
    private readonly persistence?: AppStatePersistence
  ) {
    this.config = {
      intervalMinutes: settings.schedulerIntervalMinutes,
      autoStart: settings.schedulerAutoStart
    };
    this.loadPersistedConfig();
  }

  getConfig(): SchedulerConfig {
    return { ...this.config };
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = this.intervalMs();
    this.nextRunAtMs = Date.now() + intervalMs;

    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        log.error("Scheduled extraction crashed", error);
      });
    }, intervalMs);

    log.info(`Scheduler started: every ${this.config.intervalMinutes} minutes`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.nextRunAtMs = null;
    log.info("Scheduler stopped");
  }

  updateConfig(patch: Partial<SchedulerConfig>): SchedulerConfig {
    const next = persistedConfigSchema.parse({ ...this.config, ...patch });
    const intervalChanged = next.intervalMinutes !== this.config.intervalMinutes;
    this.config = next;
    this.persistence?.setAppState(PipelineScheduler.configStateKey, this.config);

    if (intervalChanged && this.timer) {
      this.stop();
      this.start();
    }
    return this.getConfig();
  }

  /** One scheduled run. Skipped while a previous scheduled or manual job is still going. */
  async tick(): Promise<ExtractionJob | null> {
    if (this.runInFlight || this.runner.hasActiveJob()) {
      this.skippedTicks += 1;
      log.warn("Previous extraction still running; skipping this tick");
      return null;
    }

    this.runInFlight = true;
    const startedMs = Date.now();
    this.lastRunStartedAtMs = startedMs;
    if (this.timer) this.nextRunAtMs = startedMs + this.intervalMs();

    try {
      const job = await this.runner.runExtraction({ trigger: "scheduled" });
      this.lastJobId = job.jobId;
      this.lastRunError = job.status === "failed" ? job.errors[0]?.message ?? "job failed" : null;
      return job;
    } catch (error) {
      this.lastRunError = errorMessage(error);
      log.error("Scheduled extraction failed", error);
      return null;
    } finally {
      this.lastRunFinishedAtMs = Date.now();
      this.runInFlight = false;
    }
  }

  getRuntimeStatus(nowMs = Date.now()): {
    running: boolean;
    intervalMinutes: number;
    autoStart: boolean;
    inFlight: boolean;
    skippedTicks: number;
    lastJobId: string | null;
    lastRunStartedAt: string | null;
    lastRunFinishedAt: string | null;
    lastRunStatus: "idle" | "running" | "success" | "error";
    lastRunError: string | null;
    nextRunAt: string | null;
    nextRunInMs: number | null;
  } {
    const running = this.timer !== null;
    const lastRunStatus =
      this.runInFlight
        ? "running"
        : this.lastRunError
          ? "error"
          : this.lastRunFinishedAtMs
            ? "success"
            : "idle";

    return {
      running,
      intervalMinutes: this.config.intervalMinutes,
      autoStart: this.config.autoStart,
      inFlight: this.runInFlight,
      skippedTicks: this.skippedTicks,
      lastJobId: this.lastJobId,
      lastRunStartedAt:
        this.lastRunStartedAtMs !== null ? new Date(this.lastRunStartedAtMs).toISOString() : null,
      lastRunFinishedAt:
        this.lastRunFinishedAtMs !== null ? new Date(this.lastRunFinishedAtMs).toISOString() : null,
      lastRunStatus,
      lastRunError: this.lastRunError,
      nextRunAt: running && this.nextRunAtMs !== null ? new Date(this.nextRunAtMs).toISOString() : null,
      nextRunInMs: running && this.nextRunAtMs !== null ? Math.max(0, this.nextRunAtMs - nowMs) : null
    };
  }

  private intervalMs(): number {
    return this.config.intervalMinutes * 60 * 1000;
  }

  private loadPersistedConfig(): void {
    if (!this.persistence) return;
    const parsed = persistedConfigSchema.safeParse(
      this.persistence.getAppState(PipelineScheduler.configStateKey)
    );
    if (parsed.success) this.config = parsed.data;
  }
}
