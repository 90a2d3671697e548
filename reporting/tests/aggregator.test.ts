import { describe, expect, it } from "vitest";

import {
  averageRating,
  countRecords,
  ratingDistribution,
  reviewTrend,
  sumReviews,
} from "../src/reporting/aggregator.js";
import { epochSeconds, makeDealer } from "./fixtures.js";

describe("aggregator", () => {
  const dealers = [
    makeDealer({ name: "A", rating: 3.0, totalReviews: 12 }),
    makeDealer({ name: "B", rating: 4.0, totalReviews: 30 }),
    makeDealer({ name: "C", rating: 5.0, totalReviews: 8 }),
  ];

  it("counts records and sums review totals", () => {
    expect(countRecords(dealers)).toBe(3);
    expect(sumReviews(dealers)).toBe(50);
  });

  it("averages ratings", () => {
    expect(averageRating(dealers)).toBe(4.0);
  });

  it("returns defined results for an empty selection", () => {
    expect(countRecords([])).toBe(0);
    expect(sumReviews([])).toBe(0);
    expect(averageRating([])).toBeUndefined();
    expect(ratingDistribution([])).toEqual([]);
    expect(reviewTrend([])).toEqual([]);
  });

  it("counts each rating value in ascending order", () => {
    const mixed = [
      makeDealer({ name: "A", rating: 4.5 }),
      makeDealer({ name: "B", rating: 3.2 }),
      makeDealer({ name: "C", rating: 4.5 }),
      makeDealer({ name: "D", rating: 1.0 }),
    ];

    expect(ratingDistribution(mixed)).toEqual([
      { rating: 1.0, count: 1 },
      { rating: 3.2, count: 1 },
      { rating: 4.5, count: 2 },
    ]);
  });

  it("buckets review timestamps by calendar month across dealers", () => {
    const withReviews = [
      makeDealer({ name: "A", reviewTimes: [epochSeconds("2022-02-01")] }),
      makeDealer({ name: "B", reviewTimes: [epochSeconds("2022-01-15"), epochSeconds("2022-01-20")] }),
    ];

    expect(reviewTrend(withReviews)).toEqual([
      { period: "2022-01", year: 2022, month: 1, count: 2 },
      { period: "2022-02", year: 2022, month: 2, count: 1 },
    ]);
  });

  it("orders months across year boundaries", () => {
    const withReviews = [
      makeDealer({ name: "A", reviewTimes: [epochSeconds("2023-01-03"), epochSeconds("2022-12-30")] }),
      makeDealer({ name: "B", reviewTimes: [epochSeconds("2021-11-11")] }),
    ];

    expect(reviewTrend(withReviews).map((point) => point.period)).toEqual(["2021-11", "2022-12", "2023-01"]);
  });
});
