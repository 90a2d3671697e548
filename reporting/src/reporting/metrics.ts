import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "dealer-reporting" });

collectDefaultMetrics({ register: registry });

export const geocodeCacheEventsTotal = new Counter({
  name: "reporting_geocode_cache_events_total",
  help: "Geocoding cache lookups by outcome (hit, shared, miss)",
  labelNames: ["event"],
  registers: [registry],
});

export const geocodeLookupsTotal = new Counter({
  name: "reporting_geocode_lookups_total",
  help: "External geocoding requests by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

export const liveRefreshTotal = new Counter({
  name: "reporting_live_refresh_total",
  help: "Live dealer refresh attempts by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

export const reportRequestsTotal = new Counter({
  name: "reporting_report_requests_total",
  help: "Report views served",
  labelNames: ["view"],
  registers: [registry],
});

export const reportBuildSeconds = new Histogram({
  name: "reporting_report_build_seconds",
  help: "Time spent filtering and aggregating per report view",
  labelNames: ["view"],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [registry],
});

export const dealersLoaded = new Gauge({
  name: "reporting_dealers_loaded",
  help: "Dealers in the loaded dataset snapshot",
  registers: [registry],
});

export const dealersWithCoordinates = new Gauge({
  name: "reporting_dealers_with_coordinates",
  help: "Dealers in the snapshot that can be placed on the map",
  registers: [registry],
});
