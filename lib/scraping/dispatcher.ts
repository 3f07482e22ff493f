import { isCancellation, runWithTimeout, throwIfCancelled } from "@/lib/abort";
import type { CrawlBudget } from "@/lib/scraping/crawl-budget";
import { perSourceQuota } from "@/lib/scraping/crawl-budget";
import { crawledCandidateSchema } from "@/lib/scraping/normalize";
import type { ScraperRegistry } from "@/lib/scraping/scrapers/index";
import { redactSensitiveData, redactText } from "@/lib/security/redaction";
import type { CrawledCandidate } from "@/lib/types";

export const DEFAULT_CRAWL_CONCURRENCY = 2;
export const MAX_CRAWL_CONCURRENCY = 4;
export const DEFAULT_CRAWL_TIMEOUT_MS = 20_000;

export type CrawlAttemptStatus = "crawled" | "empty" | "failed" | "unsupported" | "budget_exhausted";

export interface CrawlAttempt {
  url: string;
  status: CrawlAttemptStatus;
  granted: number;
  kept: number;
  rejected: number;
  durationMs: number;
  error: string | null;
}

export interface CrawledSourceItem {
  candidate: CrawledCandidate;
  sourceUrl: string;
}

export interface CrawlSourcesResult {
  candidates: CrawledSourceItem[];
  attempts: CrawlAttempt[];
}

function formatDurationMs(durationMs: number): string {
  return durationMs < 1000 ? `${durationMs}ms` : `${(durationMs / 1000).toFixed(1)}s`;
}

/**
 * Crawls every source URL with a bounded worker pool. Each worker reserves its
 * quota from the shared budget before calling the scraper and releases the
 * unused part afterwards. Items that do not match the candidate shape are
 * dropped and counted. Sources that fail are logged and skipped; only a
 * caller abort stops the whole crawl.
 */
export async function crawlSources(input: {
  urls: string[];
  registry: ScraperRegistry;
  budget: CrawlBudget;
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}): Promise<CrawlSourcesResult> {
  const urls = Array.from(new Set(input.urls));
  const quota = perSourceQuota(input.budget.cap, urls.length);
  const concurrency = Math.min(Math.max(1, input.concurrency ?? DEFAULT_CRAWL_CONCURRENCY), MAX_CRAWL_CONCURRENCY);
  const timeoutMs = input.timeoutMs ?? DEFAULT_CRAWL_TIMEOUT_MS;

  const collected: CrawledSourceItem[][] = urls.map(() => []);
  const attempts: Array<CrawlAttempt | null> = urls.map(() => null);

  const processUrl = async (url: string, index: number): Promise<void> => {
    const startedAt = Date.now();
    const record = (
      status: CrawlAttemptStatus,
      granted: number,
      kept: number,
      error: string | null = null,
      rejected = 0
    ): void => {
      attempts[index] = { url, status, granted, kept, rejected, durationMs: Date.now() - startedAt, error };
    };

    const scraper = input.registry.resolve(url);
    if (!scraper) {
      console.warn("[crawl] no scraper registered for source; skipping", redactSensitiveData({ url }));
      record("unsupported", 0, 0);
      return;
    }

    const granted = input.budget.reserve(quota);
    if (granted === 0) {
      record("budget_exhausted", 0, 0);
      return;
    }

    let kept = 0;
    try {
      const items = await runWithTimeout<unknown>({
        label: `${scraper.platform} crawl`,
        timeoutMs,
        signal: input.signal,
        operation: (signal) => scraper.crawlSearchResults(url, granted, signal)
      });

      if (!Array.isArray(items)) {
        console.warn("[crawl] scraper returned non-list data; skipping", redactSensitiveData({ url, platform: scraper.platform }));
        record("failed", granted, 0, "non-list result");
        return;
      }

      const accepted: CrawledCandidate[] = [];
      let rejected = 0;
      for (const item of items) {
        if (accepted.length >= granted) {
          break;
        }

        const parsed = crawledCandidateSchema.safeParse(item);
        if (parsed.success) {
          accepted.push(parsed.data);
        } else {
          rejected += 1;
        }
      }

      if (rejected > 0) {
        console.warn(
          "[crawl] dropped malformed item(s) from source",
          redactSensitiveData({ url, platform: scraper.platform, rejected })
        );
      }

      kept = accepted.length;
      collected[index] = accepted.map((candidate) => ({ candidate, sourceUrl: url }));
      record(kept > 0 ? "crawled" : "empty", granted, kept, null, rejected);
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }

      const message = redactText(error instanceof Error ? error.message : String(error));
      console.warn("[crawl] source failed; skipping", redactSensitiveData({ url, platform: scraper.platform, error: message }));
      record("failed", granted, 0, message);
    } finally {
      input.budget.release(granted - kept);
    }
  };

  let nextIndex = 0;
  const workerCount = Math.min(concurrency, urls.length);
  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      throwIfCancelled(input.signal, "crawl");

      const currentIndex = nextIndex;
      nextIndex += 1;

      if (currentIndex >= urls.length || input.budget.exhausted) {
        break;
      }

      await processUrl(urls[currentIndex], currentIndex);
    }
  });

  const startedAt = Date.now();
  await Promise.all(workers);

  const finishedAttempts = attempts.filter((attempt): attempt is CrawlAttempt => attempt !== null);
  const candidates = collected.flat();

  console.log(
    `[crawl] ${finishedAttempts.length}/${urls.length} source(s) attempted in ${formatDurationMs(Date.now() - startedAt)} (kept=${candidates.length}, budgetUsed=${input.budget.used}/${input.budget.cap}, failed=${finishedAttempts.filter((attempt) => attempt.status === "failed").length})`
  );

  return { candidates, attempts: finishedAttempts };
}
