import type { GeocodingCacheStats } from "./geocode_cache.js";

export interface HealthSnapshot {
  startTime: number;
  ready: boolean;
  dealersLoaded: number;
  dealersWithCoordinates: number;
  unresolvedDealers: string[];
  viewsServed: Map<string, number>;
  lastRefreshAt: number | null;
}

export function createHealthSnapshot(): HealthSnapshot {
  return {
    startTime: Date.now(),
    ready: false,
    dealersLoaded: 0,
    dealersWithCoordinates: 0,
    unresolvedDealers: [],
    viewsServed: new Map(),
    lastRefreshAt: null,
  };
}

export function updateHealthOnLoad(snapshot: HealthSnapshot, dealers: number, withCoordinates: number, unresolved: readonly string[]): void {
  snapshot.ready = true;
  snapshot.dealersLoaded = dealers;
  snapshot.dealersWithCoordinates = withCoordinates;
  snapshot.unresolvedDealers = [...unresolved];
}

export function recordViewServed(snapshot: HealthSnapshot, view: string): void {
  snapshot.viewsServed.set(view, (snapshot.viewsServed.get(view) ?? 0) + 1);
}

export function recordRefresh(snapshot: HealthSnapshot): void {
  snapshot.lastRefreshAt = Date.now();
}

export function buildHealthPayload(snapshot: HealthSnapshot, serviceId: string, geocoding: GeocodingCacheStats) {
  const uptimeSeconds = Math.round((Date.now() - snapshot.startTime) / 1000);

  return {
    status: snapshot.ready ? ("ok" as const) : ("starting" as const),
    serviceId,
    uptimeSeconds,
    dealersLoaded: snapshot.dealersLoaded,
    dealersWithCoordinates: snapshot.dealersWithCoordinates,
    unresolvedDealers: snapshot.unresolvedDealers,
    viewsServed: Object.fromEntries(snapshot.viewsServed),
    lastRefreshAt: snapshot.lastRefreshAt === null ? null : new Date(snapshot.lastRefreshAt).toISOString(),
    geocoding,
  };
}
