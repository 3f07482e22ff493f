import { z } from "zod";

import { DiscoveryError } from "@/lib/errors";
import { parseModelJson, previewText } from "@/lib/llm/json";
import type { ModelCaller } from "@/lib/llm/resilience";
import {
  DEFAULT_MAX_PRODUCTS,
  MAX_DISCOVERY_BUDGET,
  MIN_DISCOVERY_BUDGET,
  type ProjectContext
} from "@/lib/types";

export const INTENT_TIMEOUT_MS = 30_000;

export interface DiscoveryIntent {
  query: string;
  filterText: string | null;
  maxProducts: number;
}

const intentSchema = z.object({
  user_query: z.string().nullish(),
  filter_text: z.string().nullish(),
  max_products: z.union([z.number(), z.string()]).nullish()
});

const intentJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    user_query: { type: "string" },
    filter_text: { type: ["string", "null"] },
    max_products: { type: ["integer", "null"] }
  },
  required: ["user_query", "filter_text", "max_products"]
};

function buildPrompt(input: { rawText: string; project: ProjectContext }): string {
  return JSON.stringify(
    {
      task: "Split a shopper's free-text request into a product search query, an optional filter phrase and a product count.",
      rules: [
        "user_query is the product being searched for, in the shopper's language, without counts, prices, ratings or platform names.",
        "filter_text keeps every constraint (price, rating, reviews, sales, platform, brand, mall or verified seller, keywords) verbatim; null when there is none.",
        `max_products is the number of products requested, an integer between ${MIN_DISCOVERY_BUDGET} and ${MAX_DISCOVERY_BUDGET}; null when not stated.`,
        "Use the project context only to disambiguate; never invent constraints the shopper did not state."
      ],
      project: {
        name: input.project.name,
        description: input.project.description,
        target_product_name: input.project.targetProductName,
        target_product_category: input.project.targetProductCategory,
        target_budget: input.project.targetBudget,
        currency: input.project.currency
      },
      input: input.rawText,
      output: { user_query: "string", filter_text: "string|null", max_products: "integer|null" }
    },
    null,
    2
  );
}

export function clampMaxProducts(value: number | string | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_MAX_PRODUCTS;
  }

  const parsed = typeof value === "number" ? value : Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    return DEFAULT_MAX_PRODUCTS;
  }

  return Math.min(MAX_DISCOVERY_BUDGET, Math.max(MIN_DISCOVERY_BUDGET, Math.trunc(parsed)));
}

function parsingFailed(rawText: string, reason: string, modelText: string): DiscoveryError {
  console.warn("[discovery] intent parsing failed", { reason, response: previewText(modelText) });
  return new DiscoveryError("ParsingFailed", "intent", `Could not understand the request: ${reason}`, { rawText });
}

/**
 * Natural-language entry: extracts the search query, the filter phrase and
 * the product budget from one model call. Model-call exhaustion propagates.
 */
export async function parseDiscoveryIntent(
  model: ModelCaller,
  input: { rawText: string; project: ProjectContext; signal?: AbortSignal }
): Promise<DiscoveryIntent> {
  const response = await model.call({
    prompt: buildPrompt(input),
    responseSchema: intentJsonSchema,
    schemaName: "discovery_intent",
    jsonMode: true,
    timeoutMs: INTENT_TIMEOUT_MS,
    signal: input.signal
  });

  const payload = parseModelJson(response.text);
  if (payload === null) {
    throw parsingFailed(input.rawText, "model returned no JSON", response.text);
  }

  const parsed = intentSchema.safeParse(payload);
  if (!parsed.success) {
    throw parsingFailed(input.rawText, "model returned an unexpected shape", response.text);
  }

  const query = parsed.data.user_query?.trim() ?? "";
  if (!query) {
    throw parsingFailed(input.rawText, "no product query found", response.text);
  }

  const filterText = parsed.data.filter_text?.trim() || null;

  return {
    query,
    filterText,
    maxProducts: clampMaxProducts(parsed.data.max_products)
  };
}
