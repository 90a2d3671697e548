import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import { z } from "zod";

import { DatasetLoadError } from "./errors.js";
import { UNKNOWN_PROVINCE, type Coordinates, type DealerRecord } from "./types.js";

const ReviewSchema = z
  .object({
    text: z.string().default(""),
    time: z.number().int().optional(),
  })
  .passthrough();

const DealerEntrySchema = z
  .object({
    actual_name: z.string(),
    overall_rating: z.number().min(1).max(5),
    total_reviews: z.number().int().nonnegative(),
    province: z.string().nullish(),
    postal_code: z.string().nullish(),
    latitude: z.number().nullish(),
    longitude: z.number().nullish(),
    place_id: z.string().nullish(),
    reviews: z.array(ReviewSchema).nullish(),
  })
  .passthrough();

const DatasetSchema = z.array(DealerEntrySchema);

export type DealerEntry = z.infer<typeof DealerEntrySchema>;

function toCoordinates(entry: DealerEntry, logger?: Logger): Coordinates | undefined {
  const { latitude, longitude } = entry;
  if (typeof latitude === "number" && typeof longitude === "number") {
    return { latitude, longitude };
  }
  if (typeof latitude === "number" || typeof longitude === "number") {
    logger?.warn({ dealer: entry.actual_name }, "Dealer has only one coordinate; treating location as unknown");
  }
  return undefined;
}

export function toDealerRecord(entry: DealerEntry, logger?: Logger): DealerRecord {
  const reviews = entry.reviews ?? [];
  return Object.freeze({
    name: entry.actual_name,
    rating: entry.overall_rating,
    totalReviews: entry.total_reviews,
    province: entry.province ?? UNKNOWN_PROVINCE,
    postalCode: entry.postal_code ?? undefined,
    coordinates: toCoordinates(entry, logger),
    placeId: entry.place_id ?? undefined,
    reviewTimes: Object.freeze(reviews.flatMap((review) => (review.time === undefined ? [] : [review.time]))),
    reviewTexts: Object.freeze(reviews.map((review) => review.text)),
  });
}

export function parseDataset(raw: unknown, path: string, logger?: Logger): DealerRecord[] {
  const parsed = DatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join(", ");
    throw new DatasetLoadError(`Dataset ${path} is invalid: ${issues}`, path);
  }
  return parsed.data.map((entry) => toDealerRecord(entry, logger));
}

export async function loadDataset(path: string, logger?: Logger): Promise<DealerRecord[]> {
  let contents: string;
  try {
    contents = await readFile(path, "utf-8");
  } catch (error) {
    throw new DatasetLoadError(
      `The file ${path} was not found. Please ensure the dealer dataset is available.`,
      path,
      { cause: error },
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new DatasetLoadError(`Dataset ${path} is not valid JSON`, path, { cause: error });
  }

  const records = parseDataset(raw, path, logger);
  logger?.info({ path, dealers: records.length }, "Dealer dataset loaded");
  return records;
}
