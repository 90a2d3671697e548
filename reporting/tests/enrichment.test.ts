import { describe, expect, it, vi } from "vitest";

import { enrichDataset } from "../src/reporting/enrichment.js";
import { GeocodingCache, type GeocodeLookup } from "../src/reporting/geocode_cache.js";
import { makeDealer, silentLogger } from "./fixtures.js";

function createCache(lookup: (postalCode: string) => Promise<GeocodeLookup>) {
  const provider = { lookup: vi.fn(lookup) };
  const cache = new GeocodingCache(provider, { maxEntries: 100, ttlSeconds: 86_400, logger: silentLogger });
  return { provider, cache };
}

describe("enrichDataset", () => {
  it("fills missing coordinates and leaves located dealers alone", async () => {
    const located = makeDealer({ name: "Located", coordinates: { latitude: 45.5, longitude: -73.5 } });
    const byPostal = makeDealer({ name: "By Postal", postalCode: "V6B 2W9" });
    const noPostal = makeDealer({ name: "No Postal" });

    const { provider, cache } = createCache(async (postalCode) =>
      postalCode === "V6B 2W9"
        ? { kind: "found", latitude: 49.2827, longitude: -123.1207 }
        : { kind: "not_found", reason: "INVALID_REQUEST" },
    );

    const result = await enrichDataset([located, byPostal, noPostal], cache, { concurrency: 1, logger: silentLogger });

    expect(result.records[0]).toBe(located);
    expect(result.records[1]?.coordinates).toEqual({ latitude: 49.2827, longitude: -123.1207 });
    expect(result.records[2]?.coordinates).toBeUndefined();
    expect(result.resolved).toBe(1);
    expect(result.unresolved).toEqual(["No Postal"]);
    expect(provider.lookup.mock.calls).toEqual([["V6B 2W9"], [""]]);
    expect(byPostal.coordinates).toBeUndefined();
  });

  it("looks up a shared postal code once", async () => {
    const { provider, cache } = createCache(async () => ({ kind: "found", latitude: 43.7, longitude: -79.4 }));
    const dealers = [
      makeDealer({ name: "North", postalCode: "M4W 1A8" }),
      makeDealer({ name: "South", postalCode: "M4W 1A8" }),
    ];

    const result = await enrichDataset(dealers, cache, { concurrency: 2, logger: silentLogger });

    expect(provider.lookup).toHaveBeenCalledTimes(1);
    expect(result.records.every((record) => record.coordinates !== undefined)).toBe(true);
  });
});
