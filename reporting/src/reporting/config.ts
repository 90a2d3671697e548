import { config as loadEnv } from "dotenv";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";

loadEnv();

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

type EnvSource = Record<string, string | undefined>;

interface NumberOptions {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
}

const DEFAULT_LOG_LEVEL: LogLevel = "info";

const DEFAULTS = {
  HTTP_PORT: 8080,
  PROMETHEUS_PORT: 8081,
  DATASET_PATH: fileURLToPath(new URL("../../data/dealers_data.json", import.meta.url)),
  GOOGLE_MAPS_API_KEY: "",
  GEOCODE_URL: "https://maps.googleapis.com/maps/api/geocode/json",
  PLACES_DETAILS_URL: "https://maps.googleapis.com/maps/api/place/details/json",
  GEOCODE_TIMEOUT_MS: 10_000,
  GEOCODE_CACHE_MAX_ENTRIES: 100,
  GEOCODE_CACHE_TTL_SECONDS: 86_400,
  GEOCODE_CONCURRENCY: 1,
  LOG_LEVEL: DEFAULT_LOG_LEVEL,
  NODE_ENV: "development",
};

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class EnvReader {
  readonly warnings: string[] = [];

  constructor(private readonly source: EnvSource) {}

  private warn(message: string): void {
    this.warnings.push(message);
  }

  readString(key: string, fallback: string): string {
    const raw = this.source[key];
    if (raw === undefined || raw.trim().length === 0) {
      this.warn(`${key} is not set; using fallback value.`);
      return fallback;
    }
    return raw;
  }

  readUrl(key: string, fallback: string): string {
    const raw = this.source[key];
    if (!raw) {
      return fallback;
    }
    try {
      // eslint-disable-next-line no-new
      new URL(raw);
      return raw;
    } catch {
      this.warn(`${key} is invalid (${raw}); defaulting to ${fallback}.`);
      return fallback;
    }
  }

  readNumber(key: string, fallback: number, options: NumberOptions = {}): number {
    const raw = this.source[key];
    if (raw === undefined || raw.trim().length === 0) {
      return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.warn(`${key} must be numeric; received "${raw}". Falling back to ${fallback}.`);
      return fallback;
    }

    if (options.integer && !Number.isInteger(value)) {
      this.warn(`${key} must be an integer; received ${value}. Falling back to ${fallback}.`);
      return fallback;
    }

    if (options.min !== undefined && value < options.min) {
      this.warn(`${key} must be >= ${options.min}; received ${value}. Falling back to ${fallback}.`);
      return fallback;
    }

    if (options.max !== undefined && value > options.max) {
      this.warn(`${key} must be <= ${options.max}; received ${value}. Falling back to ${fallback}.`);
      return fallback;
    }

    return value;
  }

  readLogLevel(key: string, fallback: LogLevel): LogLevel {
    const raw = this.source[key];
    if (!raw) {
      return fallback;
    }
    const normalised = raw.toLowerCase();
    if (!isLogLevel(normalised)) {
      this.warn(`${key} must be one of ${LOG_LEVELS.join(", ")}; received "${raw}". Falling back to ${fallback}.`);
      return fallback;
    }
    return normalised;
  }
}

export interface ReportingConfig {
  readonly SERVICE_ID: string;
  readonly NODE_ENV: string;
  readonly LOG_LEVEL: LogLevel;
  readonly HTTP_PORT: number;
  readonly PROMETHEUS_PORT: number;
  readonly DATASET_PATH: string;
  readonly GOOGLE_MAPS_API_KEY: string;
  readonly GEOCODE_URL: string;
  readonly PLACES_DETAILS_URL: string;
  readonly GEOCODE_TIMEOUT_MS: number;
  readonly GEOCODE_CACHE_MAX_ENTRIES: number;
  readonly GEOCODE_CACHE_TTL_SECONDS: number;
  readonly GEOCODE_CONCURRENCY: number;
  readonly warnings: readonly string[];
}

export function loadConfig(source: EnvSource = process.env): ReportingConfig {
  const reader = new EnvReader(source);

  const serviceId = source.SERVICE_ID || `reporting-${randomUUID().slice(0, 8)}`;
  const apiKey = reader.readString("GOOGLE_MAPS_API_KEY", DEFAULTS.GOOGLE_MAPS_API_KEY);

  return {
    SERVICE_ID: serviceId,
    NODE_ENV: source.NODE_ENV || DEFAULTS.NODE_ENV,
    LOG_LEVEL: reader.readLogLevel("LOG_LEVEL", DEFAULTS.LOG_LEVEL),
    HTTP_PORT: reader.readNumber("HTTP_PORT", DEFAULTS.HTTP_PORT, { integer: true, min: 1, max: 65_535 }),
    PROMETHEUS_PORT: reader.readNumber("PROMETHEUS_PORT", DEFAULTS.PROMETHEUS_PORT, {
      integer: true,
      min: 1,
      max: 65_535,
    }),
    DATASET_PATH: source.DATASET_PATH || DEFAULTS.DATASET_PATH,
    GOOGLE_MAPS_API_KEY: apiKey,
    GEOCODE_URL: reader.readUrl("GEOCODE_URL", DEFAULTS.GEOCODE_URL),
    PLACES_DETAILS_URL: reader.readUrl("PLACES_DETAILS_URL", DEFAULTS.PLACES_DETAILS_URL),
    GEOCODE_TIMEOUT_MS: reader.readNumber("GEOCODE_TIMEOUT_MS", DEFAULTS.GEOCODE_TIMEOUT_MS, {
      integer: true,
      min: 100,
    }),
    GEOCODE_CACHE_MAX_ENTRIES: reader.readNumber("GEOCODE_CACHE_MAX_ENTRIES", DEFAULTS.GEOCODE_CACHE_MAX_ENTRIES, {
      integer: true,
      min: 1,
    }),
    GEOCODE_CACHE_TTL_SECONDS: reader.readNumber("GEOCODE_CACHE_TTL_SECONDS", DEFAULTS.GEOCODE_CACHE_TTL_SECONDS, {
      integer: true,
      min: 1,
    }),
    GEOCODE_CONCURRENCY: reader.readNumber("GEOCODE_CONCURRENCY", DEFAULTS.GEOCODE_CONCURRENCY, {
      integer: true,
      min: 1,
      max: 16,
    }),
    warnings: reader.warnings,
  };
}

export const config: ReportingConfig = loadConfig();
