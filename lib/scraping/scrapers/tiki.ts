import { asArray, asRecord, readNumber, readString, type ScraperHttpClient } from "@/lib/scraping/http";
import { toAbsoluteUrl } from "@/lib/scraping/normalize";
import { PLATFORM_ORIGINS, searchQueryFromUrl } from "@/lib/scraping/platforms";
import type { ProductDetailsResult, ProductScraper } from "@/lib/scraping/scrapers/index";
import type { CrawledCandidate, CrawledReview } from "@/lib/types";

const ORIGIN = PLATFORM_ORIGINS.tiki;
const REVIEW_PAGE_SIZE = 20;

export function extractTikiProductId(url: string): string | null {
  const match = url.match(/-p(\d+)\.html/) ?? url.match(/[?&]product_id=(\d+)/);
  return match?.[1] ?? null;
}

function toCandidate(value: unknown): CrawledCandidate | null {
  const item = asRecord(value);
  if (!item) {
    return null;
  }

  const name = readString(item.name);
  const link = toAbsoluteUrl(readString(item.url_path) ?? readString(item.url_key), ORIGIN);
  if (!name || !link) {
    return null;
  }

  const quantitySold = asRecord(item.quantity_sold);

  return {
    name,
    price: readNumber(item.price),
    sold: readNumber(quantitySold?.value) ?? readString(quantitySold?.text),
    rating: readNumber(item.rating_average),
    img: readString(item.thumbnail_url),
    link,
    platform: "tiki",
    reviewCount: readNumber(item.review_count),
    brand: readString(item.brand_name),
    sellerLocation: null
  };
}

export function parseTikiSearchPayload(payload: unknown, limit: number): CrawledCandidate[] {
  return asArray(asRecord(payload)?.data)
    .map(toCandidate)
    .filter((candidate): candidate is CrawledCandidate => candidate !== null)
    .slice(0, limit);
}

function toReview(value: unknown): CrawledReview | null {
  const review = asRecord(value);
  if (!review) {
    return null;
  }

  const createdAt = readNumber(review.created_at);
  const images = asArray(review.images)
    .map((image) => readString(asRecord(image)?.full_path))
    .filter((url): url is string => url !== null);

  return {
    author: readString(asRecord(review.created_by)?.name) ?? "Anonymous",
    rating: readNumber(review.rating),
    content: readString(review.content) ?? "",
    postedAt: createdAt !== null ? new Date(createdAt * 1000).toISOString() : null,
    images,
    helpfulCount: readNumber(review.thank_count) ?? 0
  };
}

export function createTikiScraper(http: ScraperHttpClient): ProductScraper {
  return {
    platform: "tiki",

    async crawlSearchResults(url, limit, signal) {
      const query = searchQueryFromUrl(url);
      if (!query || limit <= 0) {
        return [];
      }

      const apiUrl = `${ORIGIN}/api/v2/products?limit=${limit}&q=${encodeURIComponent(query)}`;
      const payload = await http.getJson(apiUrl, { referer: `${ORIGIN}/`, signal });
      return parseTikiSearchPayload(payload, limit);
    },

    async crawlProductDetails(url, reviewLimit, signal): Promise<ProductDetailsResult> {
      const productId = extractTikiProductId(url);
      if (!productId) {
        console.warn("[crawl] could not extract tiki product id", { url });
        return { detail: { link: url, category: null, description: null, totalRating: null }, reviews: [] };
      }

      const product = asRecord(await http.getJson(`${ORIGIN}/api/v2/products/${productId}`, { referer: url, signal }));

      const reviews: CrawledReview[] = [];
      for (let page = 1; reviews.length < reviewLimit; page += 1) {
        const reviewUrl = `${ORIGIN}/api/v2/reviews?product_id=${productId}&limit=${REVIEW_PAGE_SIZE}&page=${page}`;
        const payload = asRecord(await http.getJson(reviewUrl, { referer: url, signal }));
        const pageItems = asArray(payload?.data)
          .map(toReview)
          .filter((review): review is CrawledReview => review !== null);
        if (pageItems.length === 0) {
          break;
        }

        reviews.push(...pageItems.slice(0, reviewLimit - reviews.length));
      }

      return {
        detail: {
          link: url,
          category: readString(asRecord(product?.categories)?.name),
          description: readString(product?.short_description),
          totalRating: readNumber(product?.review_count) ?? reviews.length
        },
        reviews
      };
    }
  };
}
