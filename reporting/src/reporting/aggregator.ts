import type { DealerRecord, RatingBucket, TrendPoint } from "./types.js";

export function countRecords(records: readonly DealerRecord[]): number {
  return records.length;
}

/** `undefined` for an empty sequence. */
export function averageRating(records: readonly DealerRecord[]): number | undefined {
  if (records.length === 0) {
    return undefined;
  }
  const total = records.reduce((acc, record) => acc + record.rating, 0);
  return total / records.length;
}

export function sumReviews(records: readonly DealerRecord[]): number {
  return records.reduce((acc, record) => acc + record.totalReviews, 0);
}

export function ratingDistribution(records: readonly DealerRecord[]): RatingBucket[] {
  const counts = new Map<number, number>();
  records.forEach((record) => {
    counts.set(record.rating, (counts.get(record.rating) ?? 0) + 1);
  });
  return Array.from(counts, ([rating, count]) => ({ rating, count })).sort((a, b) => a.rating - b.rating);
}

function toPeriod(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, "0")}`;
}

/**
 * Counts every review timestamp (unix seconds, read as UTC) per calendar
 * month, oldest first.
 */
export function reviewTrend(records: readonly DealerRecord[]): TrendPoint[] {
  const buckets = new Map<number, { year: number; month: number; count: number }>();

  records.forEach((record) => {
    record.reviewTimes.forEach((seconds) => {
      const date = new Date(seconds * 1000);
      const year = date.getUTCFullYear();
      const month = date.getUTCMonth() + 1;
      const key = year * 12 + (month - 1);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.count += 1;
      } else {
        buckets.set(key, { year, month, count: 1 });
      }
    });
  });

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a - b)
    .map(([, { year, month, count }]) => ({ period: toPeriod(year, month), year, month, count }));
}
