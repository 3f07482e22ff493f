import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { OperationCancelledError } from "@/lib/abort";
import { CrawlBudget, perSourceQuota } from "@/lib/scraping/crawl-budget";
import { crawlSources } from "@/lib/scraping/dispatcher";
import { createScraperRegistry, type ProductScraper } from "@/lib/scraping/scrapers/index";
import type { CrawledCandidate, Platform } from "@/lib/types";

function items(url: string, count: number, platform: Platform): CrawledCandidate[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `Item ${index}`,
    price: 1000,
    sold: null,
    rating: null,
    img: null,
    link: `${url}#${index}`,
    platform
  }));
}

function fakeScraper(
  platform: Platform,
  crawl: (url: string, limit: number, signal?: AbortSignal) => Promise<unknown[]>
): ProductScraper {
  return {
    platform,
    crawlSearchResults: crawl,
    async crawlProductDetails(url) {
      return { detail: { link: url, category: null, description: null, totalRating: null }, reviews: [] };
    }
  };
}

// Over-delivers on purpose so the dispatcher has to enforce the grant.
const generous = (platform: Platform) => fakeScraper(platform, async (url, limit) => items(url, limit + 3, platform));

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("CrawlBudget", () => {
  it("grants at most what remains and takes back unused units", () => {
    const budget = new CrawlBudget(5);

    expect(budget.reserve(3)).toBe(3);
    expect(budget.reserve(4)).toBe(2);
    expect(budget.exhausted).toBe(true);

    budget.release(1);
    expect(budget.remaining).toBe(1);
    expect(budget.used).toBe(4);

    budget.release(10);
    expect(budget.remaining).toBe(5);
  });

  it("splits the cap across sources with a floor of one", () => {
    expect(perSourceQuota(20, 3)).toBe(6);
    expect(perSourceQuota(20, 40)).toBe(1);
    expect(perSourceQuota(20, 0)).toBe(0);
  });
});

describe("crawlSources", () => {
  it("never keeps more than the global cap", async () => {
    const registry = createScraperRegistry([generous("lazada"), generous("tiki")]);

    for (const count of [1, 3, 5, 30]) {
      const urls = Array.from({ length: count }, (_, index) =>
        index % 2 === 0 ? `https://www.lazada.vn/catalog/?q=item${index}` : `https://tiki.vn/search?q=item${index}`
      );

      const result = await crawlSources({ urls, registry, budget: new CrawlBudget(20), concurrency: 2 });
      expect(result.candidates.length).toBeLessThanOrEqual(20);
    }
  });

  it("gives each source its quota", async () => {
    const registry = createScraperRegistry([generous("lazada")]);
    const urls = ["a", "b", "c"].map((q) => `https://www.lazada.vn/catalog/?q=${q}`);

    const result = await crawlSources({ urls, registry, budget: new CrawlBudget(20) });

    expect(result.candidates).toHaveLength(18);
    expect(result.attempts.map((attempt) => [attempt.status, attempt.granted, attempt.kept])).toEqual([
      ["crawled", 6, 6],
      ["crawled", 6, 6],
      ["crawled", 6, 6]
    ]);
  });

  it("skips failing and unsupported sources without stopping the crawl", async () => {
    const registry = createScraperRegistry([
      generous("lazada"),
      fakeScraper("tiki", async () => {
        throw new Error("HTTP 403 for https://tiki.vn/api/v2/products");
      })
    ]);
    const urls = [
      "https://tiki.vn/search?q=broken",
      "https://example.com/search?q=unknown",
      "https://www.lazada.vn/catalog/?q=one"
    ];

    const result = await crawlSources({ urls, registry, budget: new CrawlBudget(20), concurrency: 1 });

    expect(result.candidates).toHaveLength(6);
    expect(result.candidates.every((item) => item.sourceUrl === "https://www.lazada.vn/catalog/?q=one")).toBe(true);
    expect(result.attempts.map((attempt) => attempt.status)).toEqual(["failed", "unsupported", "crawled"]);
    expect(result.attempts[0]?.error).toBe("HTTP 403 for https://tiki.vn/api/v2/products");
  });

  it("drops unreadable items from a source and keeps the rest", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = createScraperRegistry([
      fakeScraper("lazada", async (url) => items(url, 1, "lazada")),
      fakeScraper("tiki", async (url) => [
        { name: 12345, link: 77, platform: "tiki" },
        null,
        { name: "Cà phê sữa", price: "45.000", sold: { count: 3 }, rating: null, img: null, link: `${url}#ok`, platform: "tiki" }
      ])
    ]);
    const budget = new CrawlBudget(10);
    const urls = ["https://www.lazada.vn/catalog/?q=good", "https://tiki.vn/search?q=mixed"];

    const result = await crawlSources({ urls, registry, budget, concurrency: 1 });

    expect(result.candidates.map((item) => item.candidate.name)).toEqual(["Item 0", "Cà phê sữa"]);
    expect(result.candidates[1]?.candidate.sold).toBeNull();
    expect(result.attempts.map((attempt) => [attempt.status, attempt.kept, attempt.rejected])).toEqual([
      ["crawled", 1, 0],
      ["crawled", 1, 2]
    ]);
    expect(budget.used).toBe(2);
    expect(warn).toHaveBeenCalledWith("[crawl] dropped malformed item(s) from source", {
      url: "https://tiki.vn/search?q=mixed",
      platform: "tiki",
      rejected: 2
    });
  });

  it("reports a source whose items are all unreadable as empty", async () => {
    const registry = createScraperRegistry([fakeScraper("tiki", async () => [{ name: 12345, link: 77 }])]);
    const budget = new CrawlBudget(5);

    const result = await crawlSources({ urls: ["https://tiki.vn/search?q=bad"], registry, budget });

    expect(result.candidates).toEqual([]);
    expect(result.attempts[0]).toMatchObject({ status: "empty", kept: 0, rejected: 1 });
    expect(budget.remaining).toBe(5);
  });

  it("returns unused grants to the budget", async () => {
    const registry = createScraperRegistry([
      fakeScraper("lazada", async (url) => items(url, 1, "lazada")),
      generous("tiki")
    ]);
    const budget = new CrawlBudget(4);
    const urls = ["https://www.lazada.vn/catalog/?q=few", "https://tiki.vn/search?q=many"];

    const result = await crawlSources({ urls, registry, budget, concurrency: 1 });

    expect(result.attempts.map((attempt) => attempt.kept)).toEqual([1, 2]);
    expect(budget.remaining).toBe(1);
  });

  it("times out slow sources", async () => {
    const registry = createScraperRegistry([fakeScraper("lazada", () => new Promise<CrawledCandidate[]>(() => undefined))]);

    const result = await crawlSources({
      urls: ["https://www.lazada.vn/catalog/?q=slow"],
      registry,
      budget: new CrawlBudget(20),
      timeoutMs: 20
    });

    expect(result.candidates).toEqual([]);
    expect(result.attempts[0]).toMatchObject({ status: "failed", error: "lazada crawl timed out after 20ms" });
  });

  it("stops when the caller cancels", async () => {
    const controller = new AbortController();
    controller.abort();
    const registry = createScraperRegistry([generous("lazada")]);

    await expect(
      crawlSources({
        urls: ["https://www.lazada.vn/catalog/?q=x"],
        registry,
        budget: new CrawlBudget(20),
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
