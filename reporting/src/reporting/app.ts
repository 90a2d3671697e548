import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import closeWithGrace from "close-with-grace";
import type { Logger } from "pino";

import { config as defaultConfig, type ReportingConfig } from "./config.js";
import { logger as defaultLogger } from "./logger.js";
import { loadDataset } from "./dataset_loader.js";
import { enrichDataset } from "./enrichment.js";
import { GeocodingCache, type GeocodingProvider } from "./geocode_cache.js";
import { GoogleGeocodingClient } from "./geocoding_client.js";
import { GooglePlacesClient, refreshDealers, type PlaceDetailsProvider } from "./live_refresh.js";
import { SentimentClassifier } from "./sentiment.js";
import { filterDealers, provinceOptions } from "./filter_engine.js";
import { parseCriteria, parseProvinces } from "./criteria.js";
import {
  buildDealerInsights,
  buildDealerTable,
  buildFilterOptions,
  buildMapMarkers,
  buildOverview,
  buildTrend,
} from "./report_builder.js";
import { AppError } from "./errors.js";
import { logFatalError, logRecoverableError } from "./error_utils.js";
import {
  buildHealthPayload,
  createHealthSnapshot,
  recordRefresh,
  recordViewServed,
  updateHealthOnLoad,
  type HealthSnapshot,
} from "./health.js";
import { dealersLoaded, dealersWithCoordinates, registry, reportBuildSeconds, reportRequestsTotal } from "./metrics.js";
import { measure, measureAsync, roundMs } from "./utils.js";
import type { DealerRecord, FilterCriteria } from "./types.js";

export interface ReportContext {
  readonly records: readonly DealerRecord[];
  readonly classifier: SentimentClassifier;
  readonly places: PlaceDetailsProvider;
  readonly geocoding: GeocodingCache;
  readonly health: HealthSnapshot;
  readonly logger: Logger;
  readonly serviceId: string;
}

type ProvinceQuery = { Querystring: { provinces?: string | string[] } };
type DealerParams = { Params: { name: string } };

function describeCriteria(criteria: FilterCriteria) {
  return {
    provinces: Array.from(criteria.provinces),
    ratingRange: { min: criteria.ratingRange[0], max: criteria.ratingRange[1] },
    dealer: criteria.dealer,
    dateRange: criteria.dateRange
      ? { start: criteria.dateRange.start.toISOString(), end: criteria.dateRange.end.toISOString() }
      : null,
  };
}

function serveView<T>(context: ReportContext, view: string, build: () => T): T {
  const { result, durationMs } = measure(build);
  reportBuildSeconds.observe({ view }, durationMs / 1000);
  reportRequestsTotal.inc({ view });
  recordViewServed(context.health, view);
  context.logger.debug({ view, buildMs: roundMs(durationMs) }, "Report view built");
  return result;
}

export async function buildHttpServer(context: ReportContext): Promise<FastifyInstance> {
  const { records, logger } = context;
  const provinces = provinceOptions(records);
  const server = Fastify({ logger: false });

  await server.register(cors, { origin: true });
  await server.register(helmet, { global: true });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({ status: "error", message: error.message });
    }
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ status: "error", message: error.message });
    }
    logRecoverableError(logger, error, { location: "http", metadata: { url: request.url } }, "Unhandled request error");
    return reply.status(500).send({ status: "error", message: "Internal server error" });
  });

  server.setNotFoundHandler((_request, reply) => reply.status(404).send({ status: "error", message: "Route not found" }));

  server.get("/health", async () => buildHealthPayload(context.health, context.serviceId, context.geocoding.getStats()));

  server.get<ProvinceQuery>("/api/filters", async (request) => {
    const selected = parseProvinces(request.query.provinces, provinces);
    return serveView(context, "filters", () => buildFilterOptions(records, selected));
  });

  server.get("/api/overview", async (request) => {
    const criteria = parseCriteria(request.query, provinces);
    return serveView(context, "overview", () => ({
      filters: describeCriteria(criteria),
      ...buildOverview(filterDealers(records, criteria)),
    }));
  });

  server.get("/api/dealers", async (request) => {
    const criteria = parseCriteria(request.query, provinces);
    return serveView(context, "dealers", () => ({
      filters: describeCriteria(criteria),
      dealers: buildDealerTable(filterDealers(records, criteria)),
    }));
  });

  server.get<DealerParams>("/api/dealers/:name/insights", async (request) => {
    const criteria = parseCriteria(request.query, provinces, { dealer: request.params.name });
    return serveView(context, "insights", () =>
      buildDealerInsights(records, filterDealers(records, criteria), criteria.dealer, context.classifier),
    );
  });

  server.get("/api/trends", async (request) => {
    const criteria = parseCriteria(request.query, provinces);
    return serveView(context, "trends", () => ({
      filters: describeCriteria(criteria),
      ...buildTrend(filterDealers(records, criteria)),
    }));
  });

  server.get("/api/map", async (request) => {
    const criteria = parseCriteria(request.query, provinces);
    return serveView(context, "map", () => ({
      filters: describeCriteria(criteria),
      ...buildMapMarkers(filterDealers(records, criteria)),
    }));
  });

  server.post("/api/refresh", async (request) => {
    const criteria = parseCriteria(request.query, provinces);
    const filtered = filterDealers(records, criteria);
    const { result: dealers, durationMs } = await measureAsync(() => refreshDealers(filtered, context.places, logger));
    recordRefresh(context.health);
    reportRequestsTotal.inc({ view: "refresh" });
    logger.info({ dealers: dealers.length, refreshMs: roundMs(durationMs) }, "Live refresh served");
    return { filters: describeCriteria(criteria), dealers };
  });

  return server;
}

export interface ReportingAppOptions {
  readonly config?: ReportingConfig;
  readonly logger?: Logger;
  readonly geocoder?: GeocodingProvider;
  readonly places?: PlaceDetailsProvider;
  readonly classifier?: SentimentClassifier;
}

export class ReportingApp {
  private readonly config: ReportingConfig;
  private readonly logger: Logger;
  private readonly geocoding: GeocodingCache;
  private readonly places: PlaceDetailsProvider;
  private readonly classifier: SentimentClassifier;
  private readonly health = createHealthSnapshot();
  private running = false;
  private httpServer: FastifyInstance | null = null;
  private metricsServer: FastifyInstance | null = null;
  private gracefulShutdown: { uninstall: () => void } | null = null;

  constructor(options: ReportingAppOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.logger = options.logger ?? defaultLogger;

    const geocoder =
      options.geocoder ??
      new GoogleGeocodingClient({
        apiKey: this.config.GOOGLE_MAPS_API_KEY,
        url: this.config.GEOCODE_URL,
        timeoutMs: this.config.GEOCODE_TIMEOUT_MS,
      });
    this.geocoding = new GeocodingCache(geocoder, {
      maxEntries: this.config.GEOCODE_CACHE_MAX_ENTRIES,
      ttlSeconds: this.config.GEOCODE_CACHE_TTL_SECONDS,
      logger: this.logger,
    });
    this.places =
      options.places ??
      new GooglePlacesClient({
        apiKey: this.config.GOOGLE_MAPS_API_KEY,
        url: this.config.PLACES_DETAILS_URL,
        timeoutMs: this.config.GEOCODE_TIMEOUT_MS,
      });
    this.classifier = options.classifier ?? new SentimentClassifier();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    try {
      await this.bootstrap();
    } catch (error) {
      await this.closeServers();
      this.running = false;
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    this.gracefulShutdown?.uninstall();
    this.gracefulShutdown = null;

    await this.closeServers();
    this.logger.info("Reporting service stopped");
  }

  /** Report server, null until the snapshot is ready and the port is bound. */
  get server(): FastifyInstance | null {
    return this.httpServer;
  }

  private async bootstrap(): Promise<void> {
    this.config.warnings.forEach((warning) => {
      this.logger.warn({ warning }, "Configuration warning");
    });

    const records = await this.prepareSnapshot();

    const server = await buildHttpServer({
      records,
      classifier: this.classifier,
      places: this.places,
      geocoding: this.geocoding,
      health: this.health,
      logger: this.logger,
      serviceId: this.config.SERVICE_ID,
    });
    this.httpServer = server;
    await server.listen({ port: this.config.HTTP_PORT, host: "0.0.0.0" });
    this.logger.info({ port: this.config.HTTP_PORT }, "Report server listening");

    await this.startMetricsServer();

    this.gracefulShutdown = closeWithGrace(
      { delay: 500 },
      async ({ signal, err }: { signal?: string | number; err?: unknown; manual?: boolean }) => {
        if (err) {
          this.logger.error({ err, signal }, "Graceful shutdown due to error");
        } else {
          this.logger.info({ signal }, "Graceful shutdown initiated");
        }
        await this.stop();
      },
    );
  }

  private async closeServers(): Promise<void> {
    await Promise.all([this.httpServer?.close(), this.metricsServer?.close()]);
    this.httpServer = null;
    this.metricsServer = null;
  }

  /** Loads the dataset and resolves coordinates before anything is served. */
  private async prepareSnapshot(): Promise<readonly DealerRecord[]> {
    let loaded: DealerRecord[];
    try {
      loaded = await loadDataset(this.config.DATASET_PATH, this.logger);
    } catch (error) {
      logFatalError(
        this.logger,
        error,
        { location: "loadDataset", metadata: { path: this.config.DATASET_PATH } },
        "Dealer dataset unavailable",
      );
    }

    const { result: enrichment, durationMs } = await measureAsync(() =>
      enrichDataset(loaded, this.geocoding, { concurrency: this.config.GEOCODE_CONCURRENCY, logger: this.logger }),
    );

    const located = enrichment.records.filter((record) => record.coordinates).length;
    dealersLoaded.set(enrichment.records.length);
    dealersWithCoordinates.set(located);
    updateHealthOnLoad(this.health, enrichment.records.length, located, enrichment.unresolved);

    this.logger.info(
      { dealers: enrichment.records.length, located, enrichmentMs: roundMs(durationMs) },
      "Dataset snapshot ready",
    );
    return enrichment.records;
  }

  private async startMetricsServer(): Promise<void> {
    if (this.metricsServer) return;

    const server = Fastify({ logger: false });

    server.get("/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
      const body = await registry.metrics();
      reply.header("Content-Type", registry.contentType);
      return reply.send(body);
    });

    await server.listen({ port: this.config.PROMETHEUS_PORT, host: "0.0.0.0" });
    this.logger.info({ port: this.config.PROMETHEUS_PORT }, "Metrics server listening");
    this.metricsServer = server;
  }
}
