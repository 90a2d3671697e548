import axios, { AxiosError, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";

import { GoogleGeocodingClient } from "../src/reporting/geocoding_client.js";

type StubResponse = { status: number; data: unknown } | Error;

function stubHttp(respond: (config: InternalAxiosRequestConfig) => StubResponse) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const outcome = respond(config);
      if (outcome instanceof Error) {
        throw outcome;
      }
      return { data: outcome.data, status: outcome.status, statusText: String(outcome.status), headers: {}, config };
    },
  });
  return { http, requests };
}

function createClient(respond: (config: InternalAxiosRequestConfig) => StubResponse) {
  const { http, requests } = stubHttp(respond);
  const client = new GoogleGeocodingClient({
    apiKey: "test-key",
    url: "https://geocode.test/json",
    timeoutMs: 2000,
    http,
  });
  return { client, requests };
}

describe("GoogleGeocodingClient", () => {
  it("returns the first result's location", async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: {
        status: "OK",
        results: [
          { geometry: { location: { lat: 43.6426, lng: -79.3871 } } },
          { geometry: { location: { lat: 0, lng: 0 } } },
        ],
      },
    }));

    await expect(client.lookup("M5V 3L9")).resolves.toEqual({ kind: "found", latitude: 43.6426, longitude: -79.3871 });
    expect(requests[0]?.url).toBe("https://geocode.test/json");
    expect(requests[0]?.params).toEqual({ address: "M5V 3L9", key: "test-key" });
    expect(requests[0]?.timeout).toBe(2000);
  });

  it("reports a non-OK status as not found", async () => {
    const { client } = createClient(() => ({
      status: 200,
      data: { status: "REQUEST_DENIED", results: [], error_message: "The provided API key is invalid." },
    }));

    await expect(client.lookup("M5V 3L9")).resolves.toEqual({
      kind: "not_found",
      reason: "REQUEST_DENIED: The provided API key is invalid.",
    });
  });

  it("reports an OK status without results as not found", async () => {
    const { client } = createClient(() => ({ status: 200, data: { status: "OK", results: [] } }));

    await expect(client.lookup("")).resolves.toEqual({ kind: "not_found", reason: "OK" });
  });

  it("reports transport errors as unavailable", async () => {
    const { client } = createClient(() => new AxiosError("timeout of 2000ms exceeded", "ECONNABORTED"));

    await expect(client.lookup("M5V 3L9")).resolves.toEqual({
      kind: "unavailable",
      reason: "timeout of 2000ms exceeded",
    });
  });

  it("reports an unreadable body as unavailable", async () => {
    const { client } = createClient(() => ({ status: 200, data: "<html>gateway</html>" }));

    await expect(client.lookup("M5V 3L9")).resolves.toEqual({
      kind: "unavailable",
      reason: "Malformed geocoding response",
    });
  });
});
