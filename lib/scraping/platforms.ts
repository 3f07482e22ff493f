import type { Platform } from "@/lib/types";

export const PLATFORM_ORIGINS: Record<Platform, string> = {
  shopee: "https://shopee.vn",
  lazada: "https://www.lazada.vn",
  tiki: "https://tiki.vn"
};

export function buildSearchUrl(platform: Platform, query: string): string {
  const encoded = encodeURIComponent(query.trim());

  switch (platform) {
    case "shopee":
      return `${PLATFORM_ORIGINS.shopee}/search?keyword=${encoded}`;
    case "lazada":
      return `${PLATFORM_ORIGINS.lazada}/catalog/?q=${encoded}`;
    case "tiki":
      return `${PLATFORM_ORIGINS.tiki}/search?q=${encoded}`;
  }
}

function slugToWords(slug: string): string {
  return slug
    .replace(/\.html?$/i, "")
    .replace(/-i\.?\d+(?:[.-]\S*)?$/i, "")
    .replace(/-p\d+$/i, "")
    .replace(/[-_+]+/g, " ")
    .trim();
}

/**
 * Recovers the keyword a marketplace URL searches for: the `q` or `keyword`
 * parameter, a Lazada `/tag/<slug>` path, or else the product slug.
 */
export function searchQueryFromUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  const fromParams = parsed.searchParams.get("q") ?? parsed.searchParams.get("keyword");
  if (fromParams?.trim()) {
    return fromParams.trim();
  }

  const segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);
  const tagIndex = segments.indexOf("tag");
  const slug = tagIndex >= 0 ? segments[tagIndex + 1] : segments[segments.length - 1];
  if (!slug || slug === "search" || slug === "catalog") {
    return null;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(slug);
  } catch {
    decoded = slug;
  }

  const words = slugToWords(decoded);
  return words.length > 0 ? words : null;
}
