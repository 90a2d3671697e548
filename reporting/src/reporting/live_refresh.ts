import axios, { type AxiosInstance } from "axios";
import type { Logger } from "pino";
import { z } from "zod";

import type { DealerRecord, LiveReview, RefreshedDealer, RefreshStatus } from "./types.js";
import { liveRefreshTotal } from "./metrics.js";
import { errorMessage, logRecoverableError } from "./error_utils.js";

const PlaceReviewSchema = z
  .object({
    author_name: z.string().optional(),
    rating: z.number().optional(),
    text: z.string().default(""),
    time: z.number().optional(),
  })
  .passthrough();

const PlaceDetailsSchema = z.object({
  result: z
    .object({
      name: z.string().optional(),
      rating: z.number().optional(),
      user_ratings_total: z.number().int().optional(),
      reviews: z.array(PlaceReviewSchema).optional(),
    })
    .passthrough()
    .optional(),
});

export interface PlaceDetails {
  readonly rating?: number;
  readonly totalReviews?: number;
  readonly reviews: LiveReview[];
}

export interface PlaceDetailsResponse {
  readonly httpStatus: number;
  /** `null` when the service answered 200 without a result. */
  readonly details: PlaceDetails | null;
}

export interface PlaceDetailsProvider {
  fetchDetails(placeId: string): Promise<PlaceDetailsResponse>;
}

export interface GooglePlacesClientOptions {
  readonly apiKey: string;
  readonly url: string;
  readonly timeoutMs: number;
  readonly http?: AxiosInstance;
}

export class GooglePlacesClient implements PlaceDetailsProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: GooglePlacesClientOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  async fetchDetails(placeId: string): Promise<PlaceDetailsResponse> {
    const response = await this.http.get<unknown>(this.options.url, {
      params: {
        place_id: placeId,
        fields: "name,rating,user_ratings_total,reviews",
        key: this.options.apiKey,
      },
      timeout: this.options.timeoutMs,
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      return { httpStatus: response.status, details: null };
    }

    const parsed = PlaceDetailsSchema.safeParse(response.data);
    const result = parsed.success ? parsed.data.result : undefined;
    if (!result || Object.keys(result).length === 0) {
      return { httpStatus: 200, details: null };
    }

    return {
      httpStatus: 200,
      details: {
        rating: result.rating,
        totalReviews: result.user_ratings_total,
        reviews: (result.reviews ?? []).map((review) => ({
          authorName: review.author_name,
          rating: review.rating,
          text: review.text,
          time: review.time,
        })),
      },
    };
  }
}

function failed(record: DealerRecord, status: RefreshStatus): RefreshedDealer {
  return {
    dealer: record.name,
    placeId: record.placeId ?? null,
    rating: record.rating,
    totalReviews: record.totalReviews,
    reviews: record.reviewTexts.map((text) => ({ text })),
    status,
  };
}

async function refreshOne(record: DealerRecord, provider: PlaceDetailsProvider, logger: Logger): Promise<RefreshedDealer> {
  if (!record.placeId) {
    return failed(record, "Failed: No Place ID");
  }

  let response: PlaceDetailsResponse;
  try {
    response = await provider.fetchDetails(record.placeId);
  } catch (error) {
    logRecoverableError(
      logger,
      error,
      { location: "refreshDealers", dealer: record.name, metadata: { placeId: record.placeId } },
      "Place details request failed",
    );
    return failed(record, `Failed: ${errorMessage(error)}`);
  }

  if (response.httpStatus !== 200) {
    return failed(record, `Failed: ${response.httpStatus}`);
  }
  const { details } = response;
  if (!details) {
    return failed(record, "Failed: No Results");
  }

  return {
    dealer: record.name,
    placeId: record.placeId,
    rating: details.rating ?? record.rating,
    totalReviews: details.totalReviews ?? record.totalReviews,
    reviews: details.reviews,
    status: "Updated",
  };
}

/**
 * Pulls current ratings for each dealer, one request at a time. Failures are
 * reported per dealer in `status`; the snapshot itself is never touched.
 */
export async function refreshDealers(
  records: readonly DealerRecord[],
  provider: PlaceDetailsProvider,
  logger: Logger,
): Promise<RefreshedDealer[]> {
  const refreshed: RefreshedDealer[] = [];

  for (const record of records) {
    const outcome = await refreshOne(record, provider, logger);
    liveRefreshTotal.inc({ outcome: outcome.status === "Updated" ? "updated" : "failed" });
    if (outcome.status !== "Updated") {
      logger.warn({ dealer: record.name, status: outcome.status }, "Live refresh failed for dealer");
    }
    refreshed.push(outcome);
  }

  logger.info(
    {
      dealers: records.length,
      updated: refreshed.filter((dealer) => dealer.status === "Updated").length,
    },
    "Live refresh finished",
  );

  return refreshed;
}
