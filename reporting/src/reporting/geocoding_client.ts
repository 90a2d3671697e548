import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { GeocodeLookup, GeocodingProvider } from "./geocode_cache.js";
import { geocodeLookupsTotal } from "./metrics.js";
import { errorMessage } from "./error_utils.js";

const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        geometry: z.object({
          location: z.object({
            lat: z.number(),
            lng: z.number(),
          }),
        }),
      }),
    )
    .default([]),
  error_message: z.string().optional(),
});

export interface GoogleGeocodingClientOptions {
  readonly apiKey: string;
  readonly url: string;
  readonly timeoutMs: number;
  readonly http?: AxiosInstance;
}

/**
 * Google Maps Geocoding API lookup by postal code. One request per call; the
 * caller decides what to cache.
 */
export class GoogleGeocodingClient implements GeocodingProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: GoogleGeocodingClientOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async lookup(postalCode: string): Promise<GeocodeLookup> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(this.options.url, {
        params: { address: postalCode, key: this.options.apiKey },
        timeout: this.options.timeoutMs,
      });
      body = response.data;
    } catch (error) {
      geocodeLookupsTotal.inc({ outcome: "transport_error" });
      return { kind: "unavailable", reason: errorMessage(error) };
    }

    const parsed = GeocodeResponseSchema.safeParse(body);
    if (!parsed.success) {
      geocodeLookupsTotal.inc({ outcome: "invalid_response" });
      return { kind: "unavailable", reason: "Malformed geocoding response" };
    }

    const { status, results, error_message: detail } = parsed.data;
    const first = results[0];
    if (status !== "OK" || !first) {
      geocodeLookupsTotal.inc({ outcome: "not_found" });
      return { kind: "not_found", reason: detail ? `${status}: ${detail}` : status };
    }

    geocodeLookupsTotal.inc({ outcome: "found" });
    return {
      kind: "found",
      latitude: first.geometry.location.lat,
      longitude: first.geometry.location.lng,
    };
  }
}
