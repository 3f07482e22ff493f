import { asArray, asRecord, readNumber, readString, type ScraperHttpClient } from "@/lib/scraping/http";
import { PLATFORM_ORIGINS, searchQueryFromUrl } from "@/lib/scraping/platforms";
import type { ProductDetailsResult, ProductScraper } from "@/lib/scraping/scrapers/index";
import type { CrawledCandidate, CrawledReview } from "@/lib/types";

const ORIGIN = PLATFORM_ORIGINS.shopee;
const IMAGE_HOST = "https://down-ws-vn.img.susercontent.com";
const REVIEW_PAGE_SIZE = 20;

// Search API prices are integers scaled by 100000.
const PRICE_SCALE = 100_000;

export function extractShopeeIds(url: string): { shopId: string; itemId: string } | null {
  const match = url.match(/i\.(\d+)\.(\d+)/);
  return match ? { shopId: match[1], itemId: match[2] } : null;
}

function toCandidate(value: unknown): CrawledCandidate | null {
  const item = asRecord(asRecord(value)?.item_basic);
  if (!item) {
    return null;
  }

  const name = readString(item.name);
  const shopId = readString(item.shopid);
  const itemId = readString(item.itemid);
  if (!name || !shopId || !itemId) {
    return null;
  }

  const slug = name.replace(/[^a-zA-Z0-9]+/g, "-").replace(/^-+|-+$/g, "") || "product";
  const image = readString(item.image);
  const rawPrice = readNumber(item.price);

  return {
    name,
    price: rawPrice !== null ? rawPrice / PRICE_SCALE : null,
    sold: readNumber(item.sold) ?? readNumber(item.historical_sold),
    rating: readNumber(asRecord(item.item_rating)?.rating_star),
    img: image ? `${IMAGE_HOST}/${image}` : null,
    link: `${ORIGIN}/${slug}-i.${shopId}.${itemId}`,
    platform: "shopee",
    brand: readString(item.brand),
    sellerLocation: readString(item.shop_location),
    isMall: typeof item.is_official_shop === "boolean" ? item.is_official_shop : null,
    isVerifiedSeller: typeof item.shopee_verified === "boolean" ? item.shopee_verified : null
  };
}

export function parseShopeeSearchPayload(payload: unknown, limit: number): CrawledCandidate[] {
  return asArray(asRecord(payload)?.items)
    .map(toCandidate)
    .filter((candidate): candidate is CrawledCandidate => candidate !== null)
    .slice(0, limit);
}

function toReview(value: unknown): CrawledReview | null {
  const review = asRecord(value);
  if (!review) {
    return null;
  }

  const ctime = readNumber(review.ctime);
  const images = asArray(review.images)
    .map((image) => readString(image))
    .filter((image): image is string => image !== null)
    .map((image) => `${IMAGE_HOST}/${image}`);

  return {
    author: readString(review.author_username) ?? (review.anonymous === true ? "******" : "Anonymous"),
    rating: readNumber(review.rating_star),
    content: readString(review.comment) ?? "",
    postedAt: ctime !== null ? new Date(ctime * 1000).toISOString() : null,
    images,
    helpfulCount: readNumber(review.like_count) ?? 0
  };
}

export function createShopeeScraper(http: ScraperHttpClient): ProductScraper {
  return {
    platform: "shopee",

    async crawlSearchResults(url, limit, signal) {
      const query = searchQueryFromUrl(url);
      if (!query || limit <= 0) {
        return [];
      }

      const params = new URLSearchParams({
        by: "relevancy",
        keyword: query,
        limit: String(limit),
        newest: "0",
        order: "desc",
        page_type: "search",
        scenario: "PAGE_GLOBAL_SEARCH",
        version: "2"
      });

      const payload = await http.getJson(`${ORIGIN}/api/v4/search/search_items?${params.toString()}`, {
        referer: `${ORIGIN}/`,
        signal
      });
      return parseShopeeSearchPayload(payload, limit);
    },

    async crawlProductDetails(url, reviewLimit, signal): Promise<ProductDetailsResult> {
      const ids = extractShopeeIds(url);
      if (!ids) {
        console.warn("[crawl] could not extract shopee ids", { url });
        return { detail: { link: url, category: null, description: null, totalRating: null }, reviews: [] };
      }

      const reviews: CrawledReview[] = [];
      let offset = 0;

      while (reviews.length < reviewLimit) {
        const params = new URLSearchParams({
          itemid: ids.itemId,
          shopid: ids.shopId,
          filter: "0",
          flag: "1",
          limit: String(REVIEW_PAGE_SIZE),
          offset: String(offset),
          type: "0"
        });

        const payload = asRecord(await http.getJson(`${ORIGIN}/api/v2/item/get_ratings?${params.toString()}`, { referer: url, signal }));
        const ratings = asArray(asRecord(payload?.data)?.ratings);
        if (ratings.length === 0) {
          break;
        }

        const pageItems = ratings.map(toReview).filter((review): review is CrawledReview => review !== null);
        reviews.push(...pageItems.slice(0, reviewLimit - reviews.length));
        offset += ratings.length;
      }

      return {
        detail: { link: url, category: null, description: null, totalRating: reviews.length },
        reviews
      };
    }
  };
}
