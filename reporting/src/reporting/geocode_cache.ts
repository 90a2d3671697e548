import type { Logger } from "pino";

import { NOT_FOUND, type GeocodeResult } from "./types.js";
import { geocodeCacheEventsTotal } from "./metrics.js";
import { errorMessage } from "./error_utils.js";

export type Clock = () => number;

interface CacheEntry<V> {
  readonly value: V;
  readonly expiresAt: number;
}

export interface TtlLruCacheOptions {
  readonly maxEntries: number;
  readonly ttlMs: number;
  readonly now?: Clock;
}

/**
 * Fixed-TTL cache bounded to `maxEntries`. A `Map` keeps insertion order, and
 * re-inserting on read moves a key to the back, so the first key is always the
 * least recently used one.
 */
export class TtlLruCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: Clock;

  constructor({ maxEntries, ttlMs, now = Date.now }: TtlLruCacheOptions) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer; received ${maxEntries}`);
    }
    if (!(ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive; received ${ttlMs}`);
    }
    this.maxEntries = maxEntries;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    // Expiry stays fixed at insertion time; only recency moves.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      this.purgeExpired();
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}

/**
 * Outcome of one external lookup. `unavailable` covers transport failures and
 * is never cached.
 */
export type GeocodeLookup =
  | { readonly kind: "found"; readonly latitude: number; readonly longitude: number }
  | { readonly kind: "not_found"; readonly reason: string }
  | { readonly kind: "unavailable"; readonly reason: string };

export interface GeocodingProvider {
  lookup(postalCode: string): Promise<GeocodeLookup>;
}

export interface GeocodingCacheOptions {
  readonly maxEntries: number;
  readonly ttlSeconds: number;
  readonly logger: Logger;
  readonly now?: Clock;
}

export interface GeocodingCacheStats {
  hits: number;
  misses: number;
  externalLookups: number;
  entries: number;
}

export class GeocodingCache {
  private readonly cache: TtlLruCache<string, GeocodeResult>;
  private readonly inFlight = new Map<string, Promise<GeocodeResult>>();
  private readonly logger: Logger;
  private readonly stats = { hits: 0, misses: 0, externalLookups: 0 };

  constructor(
    private readonly provider: GeocodingProvider,
    { maxEntries, ttlSeconds, logger, now }: GeocodingCacheOptions,
  ) {
    this.cache = new TtlLruCache({ maxEntries, ttlMs: ttlSeconds * 1000, now });
    this.logger = logger;
  }

  async resolve(postalCode: string): Promise<GeocodeResult> {
    const cached = this.cache.get(postalCode);
    if (cached) {
      this.stats.hits += 1;
      geocodeCacheEventsTotal.inc({ event: "hit" });
      return cached;
    }

    const pending = this.inFlight.get(postalCode);
    if (pending) {
      this.stats.hits += 1;
      geocodeCacheEventsTotal.inc({ event: "shared" });
      return pending;
    }

    this.stats.misses += 1;
    geocodeCacheEventsTotal.inc({ event: "miss" });

    const lookup = this.lookupAndStore(postalCode).finally(() => {
      this.inFlight.delete(postalCode);
    });
    this.inFlight.set(postalCode, lookup);
    return lookup;
  }

  getStats(): GeocodingCacheStats {
    return { ...this.stats, entries: this.cache.size };
  }

  private async lookupAndStore(postalCode: string): Promise<GeocodeResult> {
    this.stats.externalLookups += 1;

    let outcome: GeocodeLookup;
    try {
      outcome = await this.provider.lookup(postalCode);
    } catch (error) {
      outcome = { kind: "unavailable", reason: errorMessage(error) };
    }

    switch (outcome.kind) {
      case "found": {
        const result: GeocodeResult = Object.freeze({
          status: "found",
          latitude: outcome.latitude,
          longitude: outcome.longitude,
        });
        this.cache.set(postalCode, result);
        return result;
      }
      case "not_found":
        this.logger.warn({ postalCode, reason: outcome.reason }, "Postal code could not be geocoded");
        this.cache.set(postalCode, NOT_FOUND);
        return NOT_FOUND;
      case "unavailable":
        this.logger.warn({ postalCode, reason: outcome.reason }, "Geocoding service unavailable; result not cached");
        return NOT_FOUND;
    }
  }
}
