import pLimit from "p-limit";
import type { Logger } from "pino";

import type { GeocodingCache } from "./geocode_cache.js";
import type { DealerRecord } from "./types.js";

export interface EnrichmentOptions {
  readonly concurrency: number;
  readonly logger: Logger;
}

export interface EnrichmentResult {
  readonly records: readonly DealerRecord[];
  /** Dealers that gained coordinates in this pass. */
  readonly resolved: number;
  readonly unresolved: readonly string[];
}

/**
 * Fills in missing coordinates once, before any report is served. Records
 * that already carry coordinates are passed through untouched, and nothing in
 * the input array is mutated.
 */
export async function enrichDataset(
  records: readonly DealerRecord[],
  cache: GeocodingCache,
  { concurrency, logger }: EnrichmentOptions,
): Promise<EnrichmentResult> {
  const limit = pLimit(concurrency);
  let resolved = 0;
  const unresolved: string[] = [];

  const enriched = await Promise.all(
    records.map((record) => {
      if (record.coordinates) {
        return record;
      }
      return limit(async (): Promise<DealerRecord> => {
        const result = await cache.resolve(record.postalCode ?? "");
        if (result.status === "not_found") {
          unresolved.push(record.name);
          return record;
        }
        resolved += 1;
        return Object.freeze({
          ...record,
          coordinates: { latitude: result.latitude, longitude: result.longitude },
        });
      });
    }),
  );

  logger.info(
    { dealers: records.length, resolved, unresolved: unresolved.length, cache: cache.getStats() },
    "Dealer coordinates enriched",
  );

  return { records: Object.freeze(enriched), resolved, unresolved };
}
