import { z } from "zod";

import { ValidationError } from "./errors.js";
import { DEFAULT_START_DATE, MAX_RATING, MIN_RATING } from "./report_builder.js";
import { ALL_DEALERS, type FilterCriteria } from "./types.js";

const listParam = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : [value])
      .flatMap((item) => item.split(","))
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

export const ReportQuerySchema = z.object({
  provinces: listParam.optional(),
  minRating: z.coerce.number().min(MIN_RATING).max(MAX_RATING).default(MIN_RATING),
  maxRating: z.coerce.number().min(MIN_RATING).max(MAX_RATING).default(MAX_RATING),
  dealer: z.string().min(1).default(ALL_DEALERS),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

export function parseProvinces(raw: unknown, allProvinces: readonly string[]): ReadonlySet<string> {
  const parsed = listParam.optional().safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("provinces must be a comma-separated list");
  }
  return new Set(parsed.data ?? allProvinces);
}

/**
 * Builds filter criteria from a query string. Omitted provinces select every
 * province in the dataset; an omitted dealer selects all dealers.
 */
export function parseCriteria(
  query: unknown,
  allProvinces: readonly string[],
  overrides: { dealer?: string } = {},
  today: Date = new Date(),
): FilterCriteria {
  const parsed = ReportQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
      .join(", ");
    throw new ValidationError(`Invalid filters: ${issues}`);
  }

  const { provinces, minRating, maxRating, dealer, startDate, endDate } = parsed.data;

  return {
    dateRange: {
      start: startDate ?? new Date(`${DEFAULT_START_DATE}T00:00:00Z`),
      end: endDate ?? today,
    },
    provinces: new Set(provinces ?? allProvinces),
    ratingRange: [minRating, maxRating],
    dealer: overrides.dealer ?? dealer,
  };
}
