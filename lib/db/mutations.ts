import { sql } from "@/lib/db/client";
import type { JSONValue } from "postgres";
import type { NormalizedCandidate } from "@/lib/types";

const toJson = (value: unknown) => sql.json(value as JSONValue);

/**
 * Inserts one discovered product. Returns null when the project already holds
 * the same product URL.
 */
export async function insertDiscoveredProduct(projectId: string, candidate: NormalizedCandidate): Promise<string | null> {
  const rows = await sql<{ id: string }[]>`
    insert into discovered_products (
      project_id,
      platform,
      name,
      product_url,
      source_url,
      price,
      rating_score,
      review_count,
      sales_count,
      is_mall,
      is_verified_seller,
      brand,
      seller_location,
      trust_score,
      trust_badge_type,
      keywords,
      image_urls
    )
    values (
      ${projectId},
      ${candidate.platform},
      ${candidate.name},
      ${candidate.productUrl},
      ${candidate.sourceUrl},
      ${candidate.price},
      ${candidate.ratingScore},
      ${candidate.reviewCount},
      ${candidate.salesCount},
      ${candidate.isMall},
      ${candidate.isVerifiedSeller},
      ${candidate.brand},
      ${candidate.sellerLocation},
      ${candidate.trustScore},
      ${candidate.trustBadgeType},
      ${toJson(candidate.keywords)},
      ${toJson(candidate.imageUrls)}
    )
    on conflict (project_id, product_url) do nothing
    returning id
  `;

  return rows[0]?.id ?? null;
}
