import { z } from "zod";

import { parseShorthandCount } from "@/lib/scraping/normalize";
import { PLATFORMS, type FilterCriteria, type Platform } from "@/lib/types";

// "500k", "1,5tr", "2 triệu": amounts written the way shoppers type them.
const SHORTHAND_AMOUNT = /^\s*\d+(?:[.,]\d+)?\s*(?:k|m|tr|triệu|nghìn|ngàn)\s*$/i;

const NUMERIC_CRITERIA_KEYS = [
  "minPrice",
  "maxPrice",
  "minRating",
  "maxRating",
  "minReviewCount",
  "maxReviewCount",
  "minSalesCount",
  "maxSalesCount",
  "minTrustScore",
  "maxTrustScore"
] as const;

const numberish = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return undefined;
    }

    const parsed = typeof value === "number" ? value : Number(value.replace(/[,\s]/g, ""));
    if (Number.isFinite(parsed)) {
      return parsed;
    }

    if (typeof value === "string" && SHORTHAND_AMOUNT.test(value)) {
      return parseShorthandCount(value) ?? undefined;
    }

    return undefined;
  });

const nonNegative = numberish.refine((value) => value === undefined || value >= 0, "must be non-negative");
const rating = numberish.refine((value) => value === undefined || (value >= 0 && value <= 5), "must be between 0 and 5");

const stringList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return undefined;
    }

    const items = (Array.isArray(value) ? value : [value]).map((item) => item.trim()).filter((item) => item.length > 0);
    return items.length > 0 ? Array.from(new Set(items)) : undefined;
  });

const optionalBoolean = z.boolean().nullish().transform((value) => value ?? undefined);

export const filterCriteriaSchema = z.object({
  minPrice: nonNegative,
  maxPrice: nonNegative,
  minRating: rating,
  maxRating: rating,
  minReviewCount: nonNegative,
  maxReviewCount: nonNegative,
  minSalesCount: nonNegative,
  maxSalesCount: nonNegative,
  minTrustScore: nonNegative,
  maxTrustScore: nonNegative,
  platforms: stringList,
  isMall: optionalBoolean,
  isVerifiedSeller: optionalBoolean,
  requiredKeywords: stringList,
  excludedKeywords: stringList,
  requiredBrands: stringList,
  excludedBrands: stringList,
  sellerLocations: stringList,
  trustBadgeTypes: stringList
});

export const criteriaJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    minPrice: { type: ["number", "null"] },
    maxPrice: { type: ["number", "null"] },
    minRating: { type: ["number", "null"] },
    maxRating: { type: ["number", "null"] },
    minReviewCount: { type: ["integer", "null"] },
    maxReviewCount: { type: ["integer", "null"] },
    minSalesCount: { type: ["integer", "null"] },
    maxSalesCount: { type: ["integer", "null"] },
    minTrustScore: { type: ["number", "null"] },
    maxTrustScore: { type: ["number", "null"] },
    platforms: { type: ["array", "null"], items: { type: "string", enum: [...PLATFORMS] } },
    isMall: { type: ["boolean", "null"] },
    isVerifiedSeller: { type: ["boolean", "null"] },
    requiredKeywords: { type: ["array", "null"], items: { type: "string" } },
    excludedKeywords: { type: ["array", "null"], items: { type: "string" } },
    requiredBrands: { type: ["array", "null"], items: { type: "string" } },
    excludedBrands: { type: ["array", "null"], items: { type: "string" } },
    sellerLocations: { type: ["array", "null"], items: { type: "string" } },
    trustBadgeTypes: { type: ["array", "null"], items: { type: "string" } }
  }
};

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function toPlatformList(values: string[] | undefined): { platforms: Platform[] | undefined; unknown: string[] } {
  if (!values) {
    return { platforms: undefined, unknown: [] };
  }

  const platforms: Platform[] = [];
  const unknown: string[] = [];

  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (isPlatform(normalized)) {
      if (!platforms.includes(normalized)) {
        platforms.push(normalized);
      }
    } else {
      unknown.push(value);
    }
  }

  return { platforms: platforms.length > 0 ? platforms : undefined, unknown };
}

function unreadableNumericFields(payload: unknown, parsed: z.output<typeof filterCriteriaSchema>): string[] {
  const raw = z.record(z.unknown()).safeParse(payload);
  if (!raw.success) {
    return [];
  }

  return NUMERIC_CRITERIA_KEYS.filter((key) => {
    const value = raw.data[key];
    return value !== null && value !== undefined && parsed[key] === undefined;
  });
}

/**
 * Builds a closed FilterCriteria from untrusted model output. Absent, null and
 * empty values are dropped so that only present dimensions remain; numeric
 * values that could not be read are reported in `unreadableFields`.
 */
export function parseCriteriaPayload(
  payload: unknown
): { criteria: FilterCriteria; unknownPlatforms: string[]; unreadableFields: string[] } | null {
  const parsed = filterCriteriaSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const { platforms: rawPlatforms, ...rest } = parsed.data;
  const { platforms, unknown } = toPlatformList(rawPlatforms);

  const criteria: FilterCriteria = {};
  for (const [key, value] of Object.entries({ ...rest, platforms })) {
    if (value !== undefined) {
      Object.assign(criteria, { [key]: value });
    }
  }

  return { criteria, unknownPlatforms: unknown, unreadableFields: unreadableNumericFields(payload, parsed.data) };
}

export function isEmptyCriteria(criteria: FilterCriteria | null | undefined): boolean {
  if (!criteria) {
    return true;
  }

  return Object.values(criteria).every((value) => value === undefined);
}

export interface PlatformPolicy {
  disabled: Platform[];
  fallback: Platform[];
}

export const DEFAULT_FALLBACK_PLATFORMS: Platform[] = ["lazada", "tiki"];

export function enabledPlatforms(policy: PlatformPolicy): Platform[] {
  return PLATFORMS.filter((platform) => !policy.disabled.includes(platform));
}

export function checkPlatformSupport(
  criteria: FilterCriteria,
  policy: PlatformPolicy
): { supported: true } | { supported: false; unsupported: Platform[]; suggested: Platform[] } {
  const requested = criteria.platforms ?? [];
  const unsupported = requested.filter((platform) => policy.disabled.includes(platform));

  if (unsupported.length === 0) {
    return { supported: true };
  }

  const remaining = requested.filter((platform) => !policy.disabled.includes(platform));
  const fallback = policy.fallback.filter((platform) => !policy.disabled.includes(platform));

  return {
    supported: false,
    unsupported,
    suggested: remaining.length > 0 ? remaining : fallback.length > 0 ? fallback : enabledPlatforms(policy)
  };
}
