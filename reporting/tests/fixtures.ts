import pino from "pino";

import type { DealerRecord } from "../src/reporting/types.js";

export const silentLogger = pino({ level: "silent" });

export function makeDealer(overrides: Partial<DealerRecord> & Pick<DealerRecord, "name">): DealerRecord {
  return {
    rating: 4.0,
    totalReviews: 10,
    province: "ON",
    reviewTimes: [],
    reviewTexts: [],
    ...overrides,
  };
}

export function epochSeconds(isoDate: string): number {
  return Date.parse(`${isoDate}T00:00:00Z`) / 1000;
}
