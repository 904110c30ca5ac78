import { settings } from "../core/config";
import { sleep as defaultSleep } from "../utils/time";

const SECOND_MS = 1_000;
const MINUTE_MS = 60_000;

export interface RequestBudgetLimits {
  perSecond: number;
  perMinute: number;
}

export interface RequestBudgetStatus {
  perSecond: number;
  perMinute: number;
  usedLastSecond: number;
  usedLastMinute: number;
  nextSlotInMs: number;
}

/**
 * Shared send budget over two sliding windows. Every caller reserves a send
 * slot up front; slots are handed out in order, so concurrent workers queue
 * behind each other instead of bursting past the limit.
 */
export class RequestBudget {
  private reservations: number[] = [];
  private readonly perSecond: number;
  private readonly perMinute: number;

  constructor(
    limits: Partial<RequestBudgetLimits> = {},
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    this.perSecond = Math.max(1, Math.round(limits.perSecond ?? settings.rateLimitPerSecond));
    this.perMinute = Math.max(1, Math.round(limits.perMinute ?? settings.rateLimitPerMinute));
  }

  /** Books the earliest admissible send slot and returns how long to wait for it. */
  reserve(): number {
    const nowMs = this.now();
    this.prune(nowMs);

    const count = this.reservations.length;
    let slot = nowMs;
    if (count > 0) slot = Math.max(slot, this.reservations[count - 1]);
    if (count >= this.perSecond) {
      slot = Math.max(slot, this.reservations[count - this.perSecond] + SECOND_MS);
    }
    if (count >= this.perMinute) {
      slot = Math.max(slot, this.reservations[count - this.perMinute] + MINUTE_MS);
    }

    this.reservations.push(slot);
    return slot - nowMs;
  }

  async acquire(): Promise<void> {
    const waitMs = this.reserve();
    if (waitMs > 0) await this.sleep(waitMs);
  }

  getStatus(): RequestBudgetStatus {
    const nowMs = this.now();
    this.prune(nowMs);
    const sent = this.reservations.filter((slot) => slot <= nowMs);
    const last = this.reservations[this.reservations.length - 1];
    return {
      perSecond: this.perSecond,
      perMinute: this.perMinute,
      usedLastSecond: sent.filter((slot) => slot > nowMs - SECOND_MS).length,
      usedLastMinute: sent.length,
      nextSlotInMs: last !== undefined ? Math.max(0, last - nowMs) : 0
    };
  }

  private prune(nowMs: number): void {
    const cutoff = nowMs - MINUTE_MS;
    let drop = 0;
    while (drop < this.reservations.length && this.reservations[drop] <= cutoff) drop += 1;
    if (drop > 0) this.reservations = this.reservations.slice(drop);
  }
}
