import { sendAdminAlert } from "@/lib/alerts";
import { findExistingProductUrls, getProjectContext } from "@/lib/db/queries";
import { insertDiscoveredProduct } from "@/lib/db/mutations";
import { runDiscovery, type DiscoveryDependencies, type DiscoveryRunOptions } from "@/lib/discovery/orchestrator";
import { env, type Env } from "@/lib/env";
import { DEFAULT_FALLBACK_PLATFORMS } from "@/lib/filtering/criteria";
import { createGeminiClient, createOpenAiClient, type ModelClient } from "@/lib/llm/model-client";
import { createResilientModel } from "@/lib/llm/resilience";
import { createDefaultScraperRegistry } from "@/lib/scraping/scrapers/index";
import type { DiscoveryRequest, DiscoveryResult } from "@/lib/types";

function requireKey(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

export function createModelClientFromEnv(config: Env = env): ModelClient {
  if (config.LLM_PROVIDER === "gemini") {
    return createGeminiClient({
      apiKey: requireKey(config.GEMINI_API_KEY, "GEMINI_API_KEY"),
      model: config.GEMINI_MODEL,
      baseUrl: config.GEMINI_BASE_URL
    });
  }

  return createOpenAiClient({
    apiKey: requireKey(config.OPENAI_API_KEY, "OPENAI_API_KEY"),
    model: config.OPENAI_MODEL,
    baseUrl: config.OPENAI_BASE_URL
  });
}

export function createDiscoveryDependencies(config: Env = env): DiscoveryDependencies {
  return {
    model: createResilientModel({
      client: createModelClientFromEnv(config),
      maxRetries: config.LLM_MAX_RETRIES,
      baseDelayMs: config.LLM_RETRY_BASE_DELAY_MS
    }),
    projects: { getProjectContext },
    products: { findExistingProductUrls, insertDiscoveredProduct },
    scrapers: createDefaultScraperRegistry({ userAgent: config.SCRAPER_USER_AGENT }),
    platformPolicy: {
      disabled: config.DISABLED_PLATFORMS,
      fallback: DEFAULT_FALLBACK_PLATFORMS
    },
    crawlCap: config.GLOBAL_CRAWL_CAP,
    crawlConcurrency: config.CRAWL_CONCURRENCY,
    crawlTimeoutMs: config.CRAWL_TIMEOUT_MS,
    alert: sendAdminAlert
  };
}

let defaultDependencies: DiscoveryDependencies | null = null;

function getDefaultDependencies(): DiscoveryDependencies {
  defaultDependencies ??= createDiscoveryDependencies();
  return defaultDependencies;
}

export async function executeDiscovery(request: DiscoveryRequest, options: DiscoveryRunOptions = {}): Promise<DiscoveryResult> {
  return runDiscovery(getDefaultDependencies(), request, options);
}
