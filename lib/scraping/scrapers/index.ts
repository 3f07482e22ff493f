import { createScraperHttpClient, type FetchLike } from "@/lib/scraping/http";
import { detectPlatform } from "@/lib/scraping/normalize";
import { createLazadaScraper } from "@/lib/scraping/scrapers/lazada";
import { createShopeeScraper } from "@/lib/scraping/scrapers/shopee";
import { createTikiScraper } from "@/lib/scraping/scrapers/tiki";
import type { CrawledProductDetail, CrawledReview, Platform } from "@/lib/types";

export interface ProductDetailsResult {
  detail: CrawledProductDetail;
  reviews: CrawledReview[];
}

export interface ProductScraper {
  readonly platform: Platform;
  /** Items come back as the marketplace sent them; the dispatcher validates each one. */
  crawlSearchResults(url: string, limit: number, signal?: AbortSignal): Promise<unknown[]>;
  crawlProductDetails(url: string, reviewLimit: number, signal?: AbortSignal): Promise<ProductDetailsResult>;
}

export interface ScraperRegistry {
  resolve(url: string): ProductScraper | null;
}

export function createScraperRegistry(scrapers: ProductScraper[]): ScraperRegistry {
  const byPlatform = new Map<Platform, ProductScraper>();
  for (const scraper of scrapers) {
    byPlatform.set(scraper.platform, scraper);
  }

  return {
    resolve(url) {
      const platform = detectPlatform(url);
      return platform ? (byPlatform.get(platform) ?? null) : null;
    }
  };
}

export function createDefaultScraperRegistry(options: { userAgent: string; fetchImpl?: FetchLike }): ScraperRegistry {
  const http = createScraperHttpClient(options);
  return createScraperRegistry([createLazadaScraper(http), createTikiScraper(http), createShopeeScraper(http)]);
}
