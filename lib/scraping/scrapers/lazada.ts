import * as cheerio from "cheerio";

import { asArray, asRecord, readNumber, readString, type ScraperHttpClient } from "@/lib/scraping/http";
import { toAbsoluteUrl } from "@/lib/scraping/normalize";
import { PLATFORM_ORIGINS, searchQueryFromUrl } from "@/lib/scraping/platforms";
import type { ProductDetailsResult, ProductScraper } from "@/lib/scraping/scrapers/index";
import type { CrawledCandidate, CrawledReview } from "@/lib/types";

const ORIGIN = PLATFORM_ORIGINS.lazada;
const REVIEW_PAGE_SIZE = 20;

const ITEM_ID_PATTERNS = [/-i(\d+)\.html/, /-i(\d+)-s/, /itemId=(\d+)/, /pdp-i(\d+)\.html/];

export function extractLazadaItemId(url: string): string | null {
  for (const pattern of ITEM_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }

  return null;
}

function readListItems(payload: unknown): unknown[] {
  const root = asRecord(payload);
  if (!root) {
    return [];
  }

  const mods = asRecord(root.mods);
  for (const candidate of [mods?.listItems, root.listItems, root.items, root.data]) {
    if (Array.isArray(candidate) && candidate.length > 0) {
      return candidate;
    }
  }

  return [];
}

function toCandidate(value: unknown): CrawledCandidate | null {
  const item = asRecord(value);
  if (!item) {
    return null;
  }

  const name = readString(item.name);
  const link = toAbsoluteUrl(readString(item.productUrl) ?? readString(item.itemUrl) ?? readString(item.productUrlAlias), ORIGIN);
  if (!name || !link) {
    return null;
  }

  return {
    name,
    price: readString(item.price) ?? readString(item.priceShow),
    sold: readString(item.itemSoldCntShow) ?? readString(item.sellVolume),
    rating: readNumber(item.ratingScore),
    img: toAbsoluteUrl(readString(item.thumb) ?? readString(item.image), ORIGIN),
    link,
    platform: "lazada",
    reviewCount: readNumber(item.review),
    brand: readString(item.brandName),
    sellerLocation: readString(item.location)
  };
}

export function parseLazadaCatalogJson(payload: unknown, limit: number): CrawledCandidate[] {
  return readListItems(payload)
    .map(toCandidate)
    .filter((candidate): candidate is CrawledCandidate => candidate !== null)
    .slice(0, limit);
}

export function parseLazadaCatalogHtml(html: string, limit: number): CrawledCandidate[] {
  const $ = cheerio.load(html);
  const products: CrawledCandidate[] = [];

  let items = $("div[data-qa-locator='product-item']");
  if (items.length === 0) {
    items = $("div[class*='Bm3ON']");
  }

  items.each((_index, node) => {
    if (products.length >= limit) {
      return false;
    }

    const el = $(node);
    const link = toAbsoluteUrl(el.find("a[href]").first().attr("href"), ORIGIN);
    const name = el.find("a[title]").first().attr("title")?.trim();
    if (!link || !name) {
      return undefined;
    }

    const price = el.find("span[class*='ooOxS']").first().text().trim();

    products.push({
      name,
      price: price || null,
      sold: null,
      rating: null,
      img: toAbsoluteUrl(el.find("img[src]").first().attr("src"), ORIGIN),
      link,
      platform: "lazada"
    });

    return undefined;
  });

  return products;
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}

function toReview(value: unknown): CrawledReview | null {
  const review = asRecord(value);
  if (!review) {
    return null;
  }

  const images = asArray(review.images)
    .map((image) => readString(asRecord(image)?.url) ?? readString(image))
    .filter((url): url is string => url !== null);

  return {
    author: readString(review.buyerName) ?? "Anonymous",
    rating: readNumber(review.rating),
    content: readString(review.reviewContent) ?? "",
    postedAt: readString(review.reviewTime),
    images,
    helpfulCount: readNumber(review.likeCount) ?? 0
  };
}

export function createLazadaScraper(http: ScraperHttpClient): ProductScraper {
  return {
    platform: "lazada",

    async crawlSearchResults(url, limit, signal) {
      const query = searchQueryFromUrl(url);
      if (!query || limit <= 0) {
        return [];
      }

      const apiUrl = `${ORIGIN}/catalog/?_keyori=ss&ajax=true&from=input&q=${encodeURIComponent(query)}`;
      const body = await http.getText(apiUrl, { referer: `${ORIGIN}/`, signal });
      const payload = parseJsonText(body);

      if (payload !== null) {
        return parseLazadaCatalogJson(payload, limit);
      }

      return parseLazadaCatalogHtml(body, limit);
    },

    async crawlProductDetails(url, reviewLimit, signal): Promise<ProductDetailsResult> {
      const detail = { link: url, category: null, description: null, totalRating: null };
      const itemId = extractLazadaItemId(url);
      if (!itemId) {
        console.warn("[crawl] could not extract lazada item id", { url });
        return { detail, reviews: [] };
      }

      const reviews: CrawledReview[] = [];
      let totalRating: number | null = null;

      for (let page = 1; reviews.length < reviewLimit; page += 1) {
        const reviewUrl = `https://my.lazada.vn/pdp/review/getReviewList?itemId=${itemId}&pageSize=${REVIEW_PAGE_SIZE}&filter=0&sort=0&pageNo=${page}`;
        const payload = asRecord(await http.getJson(reviewUrl, { referer: url, signal }));
        const model = asRecord(payload?.model);
        totalRating = readNumber(asRecord(model?.paging)?.totalItems) ?? totalRating;

        const pageItems = asArray(model?.items)
          .map(toReview)
          .filter((review): review is CrawledReview => review !== null);
        if (pageItems.length === 0) {
          break;
        }

        reviews.push(...pageItems.slice(0, reviewLimit - reviews.length));
      }

      return { detail: { ...detail, totalRating: totalRating ?? reviews.length }, reviews };
    }
  };
}
