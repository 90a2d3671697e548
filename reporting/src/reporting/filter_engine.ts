import { ALL_DEALERS, type DealerRecord, type FilterCriteria } from "./types.js";

function withinRating(record: DealerRecord, [low, high]: FilterCriteria["ratingRange"]): boolean {
  return record.rating >= low && record.rating <= high;
}

/**
 * Conjunctive filter over the snapshot. Input order is preserved. The date
 * range on the criteria is deliberately not consulted.
 */
export function filterDealers(records: readonly DealerRecord[], criteria: FilterCriteria): DealerRecord[] {
  const { ratingRange, provinces, dealer } = criteria;
  return records.filter(
    (record) =>
      withinRating(record, ratingRange) &&
      provinces.has(record.province) &&
      (dealer === ALL_DEALERS || record.name === dealer),
  );
}

export function provinceOptions(records: readonly DealerRecord[]): string[] {
  return Array.from(new Set(records.map((record) => record.province)));
}

export function dealerOptions(records: readonly DealerRecord[], provinces: ReadonlySet<string>): string[] {
  return [ALL_DEALERS, ...records.filter((record) => provinces.has(record.province)).map((record) => record.name)];
}
