import { EventEmitter } from "node:events";
import { Redis } from "ioredis";

import { logger } from "../core/logger";

const log = logger.child("cache");

export const CACHE_TTL_SECONDS = {
  price: 60,
  stock: 60,
  analysis: 300,
  pipelineStatus: 30,
  screener: 120,
  movers: 60,
  default: 120
} as const;

export const cacheKeys = {
  price: (symbol: string) => `price:${symbol}`,
  stock: (symbol: string) => `stock:${symbol}`,
  analysis: (symbol: string) => `analysis:${symbol}`,
  screener: (hash: string) => `screener:${hash}`,
  pipelineStatus: "pipeline:status",
  topGainers: "market:top_gainers",
  topLosers: "market:top_losers",
  priceChannel: "channel:prices"
} as const;

export interface RankedMember {
  member: string;
  score: number;
}

export interface CacheStats {
  kind: "redis" | "memory";
  connected: boolean;
  keys: number;
  hits: number;
  misses: number;
  hitRate: number;
  writeFailures: number;
  usedMemory?: string;
}

export type Unsubscribe = () => Promise<void>;

export interface CacheStore {
  readonly kind: "redis" | "memory";
  /** Parsed JSON value, or null when absent or expired. */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  setHash(key: string, fields: Record<string, string | number>, ttlSeconds?: number): Promise<void>;
  getHash(key: string): Promise<Record<string, string> | null>;
  replaceRanking(key: string, members: RankedMember[], ttlSeconds?: number): Promise<void>;
  getRanking(key: string, count: number): Promise<RankedMember[]>;
  publish(channel: string, message: unknown): Promise<number>;
  subscribe(channel: string, listener: (message: string) => void): Promise<Unsubscribe>;
  delete(key: string): Promise<void>;
  flush(pattern?: string): Promise<number>;
  ping(): Promise<boolean>;
  stats(): Promise<CacheStats>;
  close(): Promise<void>;
}

abstract class CountingCache {
  protected hits = 0;
  protected misses = 0;
  protected writeFailures = 0;

  protected hitRate(): number {
    const total = this.hits + this.misses;
    return total > 0 ? Math.round((this.hits / total) * 10_000) / 100 : 0;
  }

  protected parse(raw: string | null): unknown {
    if (raw === null) {
      this.misses += 1;
      return null;
    }
    this.hits += 1;
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
}

const globToRegExp = (pattern: string): RegExp =>
  new RegExp(`^${pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".")}$`);

export class RedisCacheStore extends CountingCache implements CacheStore {
  readonly kind = "redis" as const;
  private readonly subscribers = new Set<Redis>();

  constructor(private readonly client: Redis) {
    super();
    client.on("error", (error: Error) => {
      log.warn("Redis connection error", error.message);
    });
  }

  static connect(url: string): RedisCacheStore {
    return new RedisCacheStore(
      new Redis(url, {
        lazyConnect: false,
        enableOfflineQueue: false,
        maxRetriesPerRequest: 1,
        commandTimeout: 1_000,
        connectTimeout: 2_000
      })
    );
  }

  async get(key: string): Promise<unknown> {
    return this.parse(await this.client.get(key));
  }

  async set(key: string, value: unknown, ttlSeconds: number = CACHE_TTL_SECONDS.default): Promise<void> {
    await this.guardWrite(() => this.client.set(key, JSON.stringify(value), "EX", ttlSeconds));
  }

  async setHash(
    key: string,
    fields: Record<string, string | number>,
    ttlSeconds: number = CACHE_TTL_SECONDS.default
  ): Promise<void> {
    await this.guardWrite(() =>
      this.client.multi().hset(key, fields).expire(key, ttlSeconds).exec()
    );
  }

  async getHash(key: string): Promise<Record<string, string> | null> {
    const value = await this.client.hgetall(key);
    if (Object.keys(value).length === 0) {
      this.misses += 1;
      return null;
    }
    this.hits += 1;
    return value;
  }

  async replaceRanking(
    key: string,
    members: RankedMember[],
    ttlSeconds: number = CACHE_TTL_SECONDS.default
  ): Promise<void> {
    const pipeline = this.client.multi().del(key);
    if (members.length > 0) {
      pipeline.zadd(key, ...members.flatMap((entry) => [entry.score, entry.member]));
      pipeline.expire(key, ttlSeconds);
    }
    await this.guardWrite(() => pipeline.exec());
  }

  async getRanking(key: string, count: number): Promise<RankedMember[]> {
    const flat = await this.client.zrevrange(key, 0, Math.max(0, count - 1), "WITHSCORES");
    const out: RankedMember[] = [];
    for (let index = 0; index + 1 < flat.length; index += 2) {
      out.push({ member: flat[index], score: Number(flat[index + 1]) });
    }
    return out;
  }

  async publish(channel: string, message: unknown): Promise<number> {
    const payload = typeof message === "string" ? message : JSON.stringify(message);
    return await this.client.publish(channel, payload);
  }

  async subscribe(channel: string, listener: (message: string) => void): Promise<Unsubscribe> {
    const subscriber = this.client.duplicate({ enableOfflineQueue: true });
    subscriber.on("error", (error: Error) => log.warn("Redis subscriber error", error.message));
    subscriber.on("message", (received: string, message: string) => {
      if (received === channel) listener(message);
    });
    await subscriber.subscribe(channel);
    this.subscribers.add(subscriber);

    return async () => {
      this.subscribers.delete(subscriber);
      await subscriber.unsubscribe(channel);
      subscriber.disconnect();
    };
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async flush(pattern = "*"): Promise<number> {
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.client.scan(cursor, "MATCH", pattern, "COUNT", 500);
      cursor = next;
      if (keys.length > 0) removed += await this.client.del(...keys);
    } while (cursor !== "0");
    return removed;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      log.debug("Redis ping failed", error instanceof Error ? error.message : error);
      return false;
    }
  }

  async stats(): Promise<CacheStats> {
    const connected = this.client.status === "ready";
    let keys = 0;
    let usedMemory: string | undefined;
    if (connected) {
      keys = await this.client.dbsize();
      const info = await this.client.info("memory");
      usedMemory = /used_memory_human:(\S+)/.exec(info)?.[1];
    }
    return {
      kind: this.kind,
      connected,
      keys,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hitRate(),
      writeFailures: this.writeFailures,
      usedMemory
    };
  }

  async close(): Promise<void> {
    for (const subscriber of this.subscribers) subscriber.disconnect();
    this.subscribers.clear();
    await this.client.quit();
  }

  private async guardWrite(write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.writeFailures += 1;
      throw error;
    }
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/** In-process stand-in used when no Redis URL is configured. */
export class MemoryCacheStore extends CountingCache implements CacheStore {
  readonly kind = "memory" as const;
  private readonly values = new Map<string, MemoryEntry>();
  private readonly hashes = new Map<string, { fields: Record<string, string>; expiresAt: number }>();
  private readonly rankings = new Map<string, { members: RankedMember[]; expiresAt: number }>();
  private readonly bus = new EventEmitter();

  constructor(private readonly now: () => number = Date.now) {
    super();
    this.bus.setMaxListeners(100);
  }

  async get(key: string): Promise<unknown> {
    const entry = this.values.get(key);
    if (!entry || entry.expiresAt <= this.now()) {
      if (entry) this.values.delete(key);
      return this.parse(null);
    }
    return this.parse(entry.value);
  }

  async set(key: string, value: unknown, ttlSeconds: number = CACHE_TTL_SECONDS.default): Promise<void> {
    // keys written once and never read again would otherwise stay forever
    this.evictExpired();
    this.values.set(key, { value: JSON.stringify(value), expiresAt: this.expiry(ttlSeconds) });
  }

  async setHash(
    key: string,
    fields: Record<string, string | number>,
    ttlSeconds: number = CACHE_TTL_SECONDS.default
  ): Promise<void> {
    const existing = this.liveHash(key) ?? {};
    for (const [field, value] of Object.entries(fields)) existing[field] = String(value);
    this.hashes.set(key, { fields: existing, expiresAt: this.expiry(ttlSeconds) });
  }

  async getHash(key: string): Promise<Record<string, string> | null> {
    const fields = this.liveHash(key);
    if (!fields) {
      this.misses += 1;
      return null;
    }
    this.hits += 1;
    return { ...fields };
  }

  async replaceRanking(
    key: string,
    members: RankedMember[],
    ttlSeconds: number = CACHE_TTL_SECONDS.default
  ): Promise<void> {
    if (members.length === 0) {
      this.rankings.delete(key);
      return;
    }
    const sorted = [...members].sort((a, b) => b.score - a.score || a.member.localeCompare(b.member));
    this.rankings.set(key, { members: sorted, expiresAt: this.expiry(ttlSeconds) });
  }

  async getRanking(key: string, count: number): Promise<RankedMember[]> {
    const entry = this.rankings.get(key);
    if (!entry || entry.expiresAt <= this.now()) return [];
    return entry.members.slice(0, Math.max(0, count));
  }

  async publish(channel: string, message: unknown): Promise<number> {
    const payload = typeof message === "string" ? message : JSON.stringify(message);
    const listeners = this.bus.listenerCount(channel);
    this.bus.emit(channel, payload);
    return listeners;
  }

  async subscribe(channel: string, listener: (message: string) => void): Promise<Unsubscribe> {
    this.bus.on(channel, listener);
    return async () => {
      this.bus.off(channel, listener);
    };
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
    this.hashes.delete(key);
    this.rankings.delete(key);
  }

  async flush(pattern = "*"): Promise<number> {
    const matcher = globToRegExp(pattern);
    let removed = 0;
    for (const store of [this.values, this.hashes, this.rankings]) {
      for (const key of [...store.keys()]) {
        if (!matcher.test(key)) continue;
        store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async stats(): Promise<CacheStats> {
    this.evictExpired();
    return {
      kind: this.kind,
      connected: true,
      keys: this.values.size + this.hashes.size + this.rankings.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hitRate(),
      writeFailures: this.writeFailures
    };
  }

  async close(): Promise<void> {
    this.bus.removeAllListeners();
  }

  private expiry(ttlSeconds: number): number {
    return this.now() + ttlSeconds * 1_000;
  }

  private liveHash(key: string): Record<string, string> | null {
    const entry = this.hashes.get(key);
    if (!entry || entry.expiresAt <= this.now()) return null;
    return entry.fields;
  }

  private evictExpired(): void {
    const nowMs = this.now();
    for (const store of [this.values, this.hashes, this.rankings]) {
      for (const [key, entry] of store) {
        if (entry.expiresAt <= nowMs) store.delete(key);
      }
    }
  }
}
