import { describe, expect, test } from "vitest";

import { MemoryCacheStore, cacheKeys } from "../storage/cacheStore";

describe("MemoryCacheStore", () => {
  test("expires values after their TTL and counts hits", async () => {
    let nowMs = 0;
    const cache = new MemoryCacheStore(() => nowMs);

    await cache.set(cacheKeys.price("TCS"), { current_price: 3_900 }, 60);
    expect(await cache.get("price:TCS")).toEqual({ current_price: 3_900 });

    nowMs = 60_000;
    expect(await cache.get("price:TCS")).toBeNull();

    const stats = await cache.stats();
    expect(stats).toMatchObject({ kind: "memory", keys: 0, hits: 1, misses: 1, hitRate: 50 });
  });

  test("drops expired entries on the next write", async () => {
    let nowMs = 0;
    const cache = new MemoryCacheStore(() => nowMs);
    await cache.set("price:TCS", 1, 60);
    await cache.setHash("stock:TCS", { a: 1 }, 30);
    await cache.set("price:INFY", 2, 300);

    nowMs = 60_000;
    await cache.set("price:WIPRO", 3, 60);

    expect(await cache.flush()).toBe(2);
  });

  test("merges hash fields as strings", async () => {
    const cache = new MemoryCacheStore();

    await cache.setHash("stock:INFY", { current_price: 1_500 });
    await cache.setHash("stock:INFY", { sector: "IT" });

    expect(await cache.getHash("stock:INFY")).toEqual({ current_price: "1500", sector: "IT" });
    expect(await cache.getHash("stock:NONE")).toBeNull();
  });

  test("orders rankings by score, highest first", async () => {
    const cache = new MemoryCacheStore();

    await cache.replaceRanking(cacheKeys.topGainers, [
      { member: "B", score: 1.5 },
      { member: "A", score: 3.2 },
      { member: "C", score: 1.5 }
    ]);

    expect(await cache.getRanking(cacheKeys.topGainers, 2)).toEqual([
      { member: "A", score: 3.2 },
      { member: "B", score: 1.5 }
    ]);
  });

  test("flushes keys matching a glob across every structure", async () => {
    const cache = new MemoryCacheStore();
    await cache.set("price:TCS", 1);
    await cache.set("price:INFY", 2);
    await cache.setHash("stock:TCS", { a: 1 });
    await cache.set("analysis:TCS", 3);

    expect(await cache.flush("price:*")).toBe(2);
    expect(await cache.get("analysis:TCS")).toBe(3);
    expect(await cache.flush()).toBe(2);
  });

  test("delivers published messages to subscribers until they unsubscribe", async () => {
    const cache = new MemoryCacheStore();
    const received: string[] = [];

    const unsubscribe = await cache.subscribe(cacheKeys.priceChannel, (message) => received.push(message));
    expect(await cache.publish(cacheKeys.priceChannel, { symbol: "TCS" })).toBe(1);
    await unsubscribe();
    expect(await cache.publish(cacheKeys.priceChannel, "ignored")).toBe(0);

    expect(received).toEqual(['{"symbol":"TCS"}']);
  });
});
