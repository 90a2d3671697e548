import { averageRating, countRecords, ratingDistribution, reviewTrend, sumReviews } from "./aggregator.js";
import { dealerOptions, provinceOptions } from "./filter_engine.js";
import { NotFoundError } from "./errors.js";
import type { SentimentClassifier } from "./sentiment.js";
import {
  ALL_DEALERS,
  type DealerInsights,
  type DealerRecord,
  type DealerRow,
  type FilterOptions,
  type MapReport,
  type OverviewReport,
  type TrendReport,
} from "./types.js";

export const MIN_RATING = 1.0;
export const MAX_RATING = 5.0;
export const DEFAULT_START_DATE = "2022-01-01";
export const MAP_CENTER = { latitude: 56.1304, longitude: -106.3468 } as const;
export const MAP_ZOOM = 4;
export const INSIGHT_REVIEW_LIMIT = 5;
export const NO_TREND_MESSAGE = "No review trends available for the selected filters.";

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function buildOverview(filtered: readonly DealerRecord[]): OverviewReport {
  const average = averageRating(filtered);
  return {
    totalDealers: countRecords(filtered),
    averageRating: average === undefined ? null : roundTo(average, 2),
    totalReviews: sumReviews(filtered),
    ratingDistribution: ratingDistribution(filtered),
  };
}

export function buildDealerTable(filtered: readonly DealerRecord[]): DealerRow[] {
  return filtered.map((record) => ({
    name: record.name,
    province: record.province,
    rating: record.rating,
    totalReviews: record.totalReviews,
    postalCode: record.postalCode ?? null,
    latitude: record.coordinates?.latitude ?? null,
    longitude: record.coordinates?.longitude ?? null,
  }));
}

/**
 * Insights exist only for a single selected dealer that survived filtering.
 * Sentiment covers every review text in the snapshot for that dealer name,
 * whichever province or rating band the entry sits in.
 */
export function buildDealerInsights(
  snapshot: readonly DealerRecord[],
  filtered: readonly DealerRecord[],
  dealer: string,
  classifier: SentimentClassifier,
): DealerInsights {
  if (dealer === ALL_DEALERS) {
    throw new NotFoundError("Select a single dealer to view insights");
  }

  const selected = filtered.find((record) => record.name === dealer);
  if (!selected) {
    throw new NotFoundError(`Dealer ${dealer} does not match the selected filters`);
  }

  const reviews = snapshot.filter((record) => record.name === dealer).flatMap((record) => record.reviewTexts);

  return {
    dealer,
    rating: roundTo(selected.rating, 2),
    totalReviews: selected.totalReviews,
    sentiment: classifier.tally(reviews),
    reviews: reviews.slice(0, INSIGHT_REVIEW_LIMIT),
  };
}

export function buildTrend(filtered: readonly DealerRecord[]): TrendReport {
  const points = reviewTrend(filtered);
  return {
    points,
    message: points.length === 0 ? NO_TREND_MESSAGE : null,
  };
}

export function buildMapMarkers(filtered: readonly DealerRecord[]): MapReport {
  const markers = filtered.flatMap((record) => {
    if (!record.coordinates) return [];
    return [
      {
        dealer: record.name,
        latitude: record.coordinates.latitude,
        longitude: record.coordinates.longitude,
        popup: `${record.name}: ${record.rating} stars`,
        color: record.rating >= 4 ? ("blue" as const) : ("red" as const),
      },
    ];
  });

  return { center: { ...MAP_CENTER }, zoom: MAP_ZOOM, markers };
}

export function buildFilterOptions(
  records: readonly DealerRecord[],
  provinces: ReadonlySet<string>,
  today: Date = new Date(),
): FilterOptions {
  return {
    provinces: provinceOptions(records),
    dealers: dealerOptions(records, provinces),
    ratingBounds: { min: MIN_RATING, max: MAX_RATING },
    defaultDateRange: {
      start: DEFAULT_START_DATE,
      end: today.toISOString().slice(0, 10),
    },
  };
}
