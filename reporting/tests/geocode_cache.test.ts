import { beforeEach, describe, expect, it, vi } from "vitest";

import { GeocodingCache, TtlLruCache, type GeocodeLookup } from "../src/reporting/geocode_cache.js";
import { silentLogger } from "./fixtures.js";

const DAY_MS = 86_400 * 1000;

const FOUND: GeocodeLookup = { kind: "found", latitude: 43.6426, longitude: -79.3871 };

describe("TtlLruCache", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new TtlLruCache({ maxEntries: 0, ttlMs: 1000 })).toThrow(RangeError);
  });

  it("never holds more than maxEntries", () => {
    const cache = new TtlLruCache<string, number>({ maxEntries: 3, ttlMs: 1000, now: () => 0 });
    ["a", "b", "c", "d", "e"].forEach((key, index) => cache.set(key, index));

    expect(cache.size).toBe(3);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("e")).toBe(4);
  });

  it("drops expired entries before evicting live ones", () => {
    let now = 0;
    const cache = new TtlLruCache<string, number>({ maxEntries: 2, ttlMs: 100, now: () => now });
    cache.set("old", 1);
    now = 50;
    cache.set("fresh", 2);
    now = 120;
    cache.set("new", 3);

    expect(cache.size).toBe(2);
    expect(cache.get("fresh")).toBe(2);
    expect(cache.get("new")).toBe(3);
  });
});

describe("GeocodingCache", () => {
  let now: number;

  beforeEach(() => {
    now = 0;
  });

  function createCache(lookup: (postalCode: string) => Promise<GeocodeLookup>, maxEntries = 100) {
    const provider = { lookup: vi.fn(lookup) };
    const cache = new GeocodingCache(provider, {
      maxEntries,
      ttlSeconds: 86_400,
      logger: silentLogger,
      now: () => now,
    });
    return { provider, cache };
  }

  it("serves a repeated postal code from cache within the TTL", async () => {
    const { provider, cache } = createCache(async () => FOUND);

    const first = await cache.resolve("M5V 3L9");
    now = DAY_MS - 1;
    const second = await cache.resolve("M5V 3L9");

    expect(first).toEqual({ status: "found", latitude: 43.6426, longitude: -79.3871 });
    expect(second).toEqual(first);
    expect(provider.lookup).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, externalLookups: 1, entries: 1 });
  });

  it("issues exactly one new lookup once the TTL has elapsed", async () => {
    const { provider, cache } = createCache(async () => FOUND);

    await cache.resolve("M5V 3L9");
    now = DAY_MS;
    await cache.resolve("M5V 3L9");
    await cache.resolve("M5V 3L9");

    expect(provider.lookup).toHaveBeenCalledTimes(2);
  });

  it("does not slide the expiry on reads", async () => {
    const { provider, cache } = createCache(async () => FOUND);

    await cache.resolve("M5V 3L9");
    now = DAY_MS - 10;
    await cache.resolve("M5V 3L9");
    now = DAY_MS + 10;
    await cache.resolve("M5V 3L9");

    expect(provider.lookup).toHaveBeenCalledTimes(2);
  });

  it("forwards an empty postal code verbatim", async () => {
    const { provider, cache } = createCache(async () => ({ kind: "not_found", reason: "INVALID_REQUEST" }));

    const result = await cache.resolve("");

    expect(result).toEqual({ status: "not_found" });
    expect(provider.lookup).toHaveBeenCalledWith("");
  });

  it("caches a not-found answer for the TTL", async () => {
    const { provider, cache } = createCache(async () => ({ kind: "not_found", reason: "ZERO_RESULTS" }));

    await cache.resolve("00000");
    const again = await cache.resolve("00000");

    expect(again).toEqual({ status: "not_found" });
    expect(provider.lookup).toHaveBeenCalledTimes(1);
  });

  it("does not cache transport failures", async () => {
    const { provider, cache } = createCache(async () => ({ kind: "unavailable", reason: "timeout" }));

    expect(await cache.resolve("M5V 3L9")).toEqual({ status: "not_found" });
    expect(await cache.resolve("M5V 3L9")).toEqual({ status: "not_found" });
    expect(provider.lookup).toHaveBeenCalledTimes(2);
  });

  it("treats a throwing provider as unavailable", async () => {
    const { provider, cache } = createCache(async () => {
      throw new Error("socket hang up");
    });

    await expect(cache.resolve("M5V 3L9")).resolves.toEqual({ status: "not_found" });
    await cache.resolve("M5V 3L9");
    expect(provider.lookup).toHaveBeenCalledTimes(2);
  });

  it("shares one in-flight lookup between concurrent callers", async () => {
    let release: (value: GeocodeLookup) => void = () => undefined;
    const pending = new Promise<GeocodeLookup>((resolve) => {
      release = resolve;
    });
    const { provider, cache } = createCache(() => pending);

    const first = cache.resolve("V6B 2W9");
    const second = cache.resolve("V6B 2W9");
    release(FOUND);

    const [a, b] = await Promise.all([first, second]);
    expect(a).toEqual(b);
    expect(provider.lookup).toHaveBeenCalledTimes(1);
  });

  it("evicts the least recently used postal code when full", async () => {
    const { provider, cache } = createCache(async () => FOUND, 2);

    await cache.resolve("A1A 1A1");
    await cache.resolve("B2B 2B2");
    await cache.resolve("A1A 1A1");
    await cache.resolve("C3C 3C3");
    expect(provider.lookup).toHaveBeenCalledTimes(3);

    await cache.resolve("A1A 1A1");
    expect(provider.lookup).toHaveBeenCalledTimes(3);

    await cache.resolve("B2B 2B2");
    expect(provider.lookup).toHaveBeenCalledTimes(4);
  });
});
