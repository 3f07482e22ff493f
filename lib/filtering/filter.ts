import type { FilterCriteria, NormalizedCandidate } from "@/lib/types";

function fold(value: string): string {
  return value.normalize("NFC").trim().toLowerCase();
}

function atLeast(value: number | null, bound: number | undefined): boolean {
  if (bound === undefined) {
    return true;
  }

  return value !== null && value >= bound;
}

// Unknown values cannot violate an upper bound.
function atMost(value: number | null, bound: number | undefined): boolean {
  if (bound === undefined) {
    return true;
  }

  return value === null || value <= bound;
}

function flagMatches(value: boolean | null, expected: boolean | undefined): boolean {
  if (expected === undefined) {
    return true;
  }

  return (value ?? false) === expected;
}

function oneOf(value: string | null, allowed: string[] | undefined): boolean {
  if (!allowed) {
    return true;
  }

  if (value === null) {
    return false;
  }

  const folded = fold(value);
  return allowed.some((item) => fold(item) === folded);
}

function noneOf(value: string | null, excluded: string[] | undefined): boolean {
  if (!excluded || value === null) {
    return true;
  }

  const folded = fold(value);
  return !excluded.some((item) => fold(item) === folded);
}

export function matchesCriteria(candidate: NormalizedCandidate, criteria: FilterCriteria): boolean {
  const name = fold(candidate.name);

  return (
    atLeast(candidate.price, criteria.minPrice) &&
    atMost(candidate.price, criteria.maxPrice) &&
    atLeast(candidate.ratingScore, criteria.minRating) &&
    atMost(candidate.ratingScore, criteria.maxRating) &&
    atLeast(candidate.reviewCount, criteria.minReviewCount) &&
    atMost(candidate.reviewCount, criteria.maxReviewCount) &&
    atLeast(candidate.salesCount, criteria.minSalesCount) &&
    atMost(candidate.salesCount, criteria.maxSalesCount) &&
    atLeast(candidate.trustScore, criteria.minTrustScore) &&
    atMost(candidate.trustScore, criteria.maxTrustScore) &&
    (criteria.platforms === undefined || criteria.platforms.includes(candidate.platform)) &&
    flagMatches(candidate.isMall, criteria.isMall) &&
    flagMatches(candidate.isVerifiedSeller, criteria.isVerifiedSeller) &&
    (criteria.requiredKeywords === undefined || criteria.requiredKeywords.every((keyword) => name.includes(fold(keyword)))) &&
    (criteria.excludedKeywords === undefined || !criteria.excludedKeywords.some((keyword) => name.includes(fold(keyword)))) &&
    oneOf(candidate.brand, criteria.requiredBrands) &&
    noneOf(candidate.brand, criteria.excludedBrands) &&
    oneOf(candidate.sellerLocation, criteria.sellerLocations) &&
    oneOf(candidate.trustBadgeType, criteria.trustBadgeTypes)
  );
}

export function filterCandidates(candidates: NormalizedCandidate[], criteria: FilterCriteria | null): NormalizedCandidate[] {
  if (!criteria) {
    return candidates.slice();
  }

  const filtered = candidates.filter((candidate) => matchesCriteria(candidate, criteria));

  if (filtered.length === 0 && candidates.length > 0) {
    console.warn(
      `[discovery] criteria too strict: ${candidates.length} candidate(s) crawled but none match`,
      { criteria }
    );
  }

  return filtered;
}
