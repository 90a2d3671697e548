export const ALL_DEALERS = "All Dealers";
export const UNKNOWN_PROVINCE = "Unknown";

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

export interface DealerRecord {
  readonly name: string;
  readonly rating: number;
  readonly totalReviews: number;
  readonly province: string;
  readonly postalCode?: string;
  readonly coordinates?: Coordinates;
  readonly placeId?: string;
  /** Unix seconds, in file order. */
  readonly reviewTimes: readonly number[];
  readonly reviewTexts: readonly string[];
}

export type GeocodeResult =
  | ({ readonly status: "found" } & Coordinates)
  | { readonly status: "not_found" };

export const NOT_FOUND: GeocodeResult = Object.freeze({ status: "not_found" });

export interface DateRange {
  readonly start: Date;
  readonly end: Date;
}

export interface FilterCriteria {
  /** Carried for callers; not applied by the filter engine. */
  readonly dateRange?: DateRange;
  readonly provinces: ReadonlySet<string>;
  readonly ratingRange: readonly [low: number, high: number];
  readonly dealer: string;
}

export type SentimentLabel = "Positive" | "Neutral" | "Negative";

export type SentimentTally = Record<SentimentLabel, number>;

export interface RatingBucket {
  readonly rating: number;
  readonly count: number;
}

export interface TrendPoint {
  /** `YYYY-MM` */
  readonly period: string;
  readonly year: number;
  readonly month: number;
  readonly count: number;
}

export interface OverviewReport {
  totalDealers: number;
  averageRating: number | null;
  totalReviews: number;
  ratingDistribution: RatingBucket[];
}

export interface DealerRow {
  name: string;
  province: string;
  rating: number;
  totalReviews: number;
  postalCode: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface DealerInsights {
  dealer: string;
  rating: number;
  totalReviews: number;
  sentiment: SentimentTally;
  reviews: string[];
}

export interface TrendReport {
  points: TrendPoint[];
  message: string | null;
}

export type MarkerColor = "blue" | "red";

export interface MapMarker {
  dealer: string;
  latitude: number;
  longitude: number;
  popup: string;
  color: MarkerColor;
}

export interface MapReport {
  center: Coordinates;
  zoom: number;
  markers: MapMarker[];
}

export interface FilterOptions {
  provinces: string[];
  dealers: string[];
  ratingBounds: { min: number; max: number };
  defaultDateRange: { start: string; end: string };
}

export interface LiveReview {
  authorName?: string;
  rating?: number;
  text: string;
  time?: number;
}

export type RefreshStatus = "Updated" | `Failed: ${string}`;

export interface RefreshedDealer {
  dealer: string;
  placeId: string | null;
  rating: number;
  totalReviews: number;
  reviews: LiveReview[];
  status: RefreshStatus;
}
