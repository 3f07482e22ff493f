import { z } from "zod";

import { parseModelJson, previewText } from "@/lib/llm/json";
import type { ModelCaller } from "@/lib/llm/resilience";
import { detectPlatform } from "@/lib/scraping/normalize";
import { buildSearchUrl } from "@/lib/scraping/platforms";
import type { Platform, ProjectContext } from "@/lib/types";

export const PRODUCT_SEARCH_TIMEOUT_MS = 60_000;

export interface RecommendedProduct {
  name: string;
  reason: string | null;
  urls: Partial<Record<Platform, string>>;
}

const recommendationSchema = z.object({
  name: z.string().trim().min(1),
  reason: z.string().nullish(),
  urls: z
    .object({
      shopee: z.string().nullish(),
      lazada: z.string().nullish(),
      tiki: z.string().nullish()
    })
    .nullish()
});

const searchResponseSchema = z.object({
  recommended_products: z.array(z.unknown()).nullish()
});

const searchJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    recommended_products: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          reason: { type: ["string", "null"] },
          urls: {
            type: "object",
            properties: {
              shopee: { type: ["string", "null"] },
              lazada: { type: ["string", "null"] },
              tiki: { type: ["string", "null"] }
            }
          }
        },
        required: ["name", "urls"]
      }
    }
  },
  required: ["recommended_products"]
};

function buildPrompt(input: { query: string; project: ProjectContext; platforms: Platform[]; limit: number }): string {
  return JSON.stringify(
    {
      task: "Recommend concrete products a shopper could buy on Vietnamese marketplaces for the query below.",
      rules: [
        `Return at most ${input.limit} distinct products, most relevant first.`,
        `Only use these marketplaces: ${input.platforms.join(", ")}.`,
        "urls holds a search or product link per marketplace on its own domain (shopee.vn, lazada.vn, tiki.vn); null when unknown.",
        "Never invent domains or tracking parameters."
      ],
      project: {
        name: input.project.name,
        target_product_name: input.project.targetProductName,
        target_product_category: input.project.targetProductCategory,
        target_budget: input.project.targetBudget,
        currency: input.project.currency
      },
      query: input.query
    },
    null,
    2
  );
}

function toRecommendation(value: unknown): RecommendedProduct | null {
  const parsed = recommendationSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const urls: Partial<Record<Platform, string>> = {};
  for (const platform of ["shopee", "lazada", "tiki"] as const) {
    const url = parsed.data.urls?.[platform]?.trim();
    if (url) {
      urls[platform] = url;
    }
  }

  return { name: parsed.data.name, reason: parsed.data.reason?.trim() || null, urls };
}

/**
 * Asks the model for up to `limit` product recommendations. An unreadable
 * response yields an empty list; model-call failures propagate.
 */
export async function searchProducts(
  model: ModelCaller,
  input: { query: string; project: ProjectContext; platforms: Platform[]; limit: number; signal?: AbortSignal }
): Promise<RecommendedProduct[]> {
  const response = await model.call({
    prompt: buildPrompt(input),
    responseSchema: searchJsonSchema,
    schemaName: "product_recommendations",
    jsonMode: true,
    timeoutMs: PRODUCT_SEARCH_TIMEOUT_MS,
    signal: input.signal
  });

  const parsed = searchResponseSchema.safeParse(parseModelJson(response.text));
  if (!parsed.success) {
    console.warn("[discovery] product search returned an unreadable response", { response: previewText(response.text) });
    return [];
  }

  return (parsed.data.recommended_products ?? [])
    .map(toRecommendation)
    .filter((product): product is RecommendedProduct => product !== null)
    .slice(0, Math.max(0, input.limit));
}

/**
 * One crawlable URL per product and allowed platform. A model URL is kept only
 * when its host belongs to that platform; otherwise the platform's search page
 * for the product name is used.
 */
export function extractSearchUrls(products: RecommendedProduct[], allowed: Platform[]): string[] {
  const urls = new Set<string>();

  for (const product of products) {
    for (const platform of allowed) {
      const suggested = product.urls[platform];
      if (suggested && detectPlatform(suggested) === platform) {
        urls.add(suggested);
      } else {
        urls.add(buildSearchUrl(platform, product.name));
      }
    }
  }

  return Array.from(urls);
}
