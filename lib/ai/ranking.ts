import { z } from "zod";

import { isCancellation } from "@/lib/abort";
import { parseModelJson, previewText } from "@/lib/llm/json";
import type { ModelCaller } from "@/lib/llm/resilience";
import { redactText } from "@/lib/security/redaction";
import type { FilterCriteria, NormalizedCandidate } from "@/lib/types";

export const RANKING_TIMEOUT_MS = 60_000;

export interface RankingOutcome {
  selected: NormalizedCandidate[];
  method: "skipped" | "model" | "truncated";
}

const rankingSchema = z.object({
  selected_ids: z.array(z.string())
});

const rankingJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    selected_ids: { type: "array", items: { type: "string" } }
  },
  required: ["selected_ids"]
};

function candidateId(index: number): string {
  return `p${index}`;
}

function buildPrompt(input: { candidates: NormalizedCandidate[]; query: string; criteria: FilterCriteria | null; limit: number }): string {
  return JSON.stringify(
    {
      task: `Pick the ${input.limit} best products for the shopper's query.`,
      rules: [
        `Return exactly ${input.limit} ids from the candidate list, best first.`,
        "Prefer relevance to the query, then rating, review and sales volume, then price within the criteria.",
        "Never return an id that is not in the list or the same id twice."
      ],
      query: input.query,
      criteria: input.criteria ?? {},
      candidates: input.candidates.map((candidate, index) => ({
        id: candidateId(index),
        name: candidate.name,
        platform: candidate.platform,
        price: candidate.price,
        rating: candidate.ratingScore,
        reviews: candidate.reviewCount,
        sold: candidate.salesCount,
        mall: candidate.isMall
      })),
      output: { selected_ids: ["p0"] }
    },
    null,
    2
  );
}

/**
 * Resolves model ids back to candidates, dropping unknown and repeated ids,
 * then tops up from the unpicked candidates in their original order.
 */
export function resolveSelection(candidates: NormalizedCandidate[], ids: string[], limit: number): NormalizedCandidate[] {
  const target = Math.min(limit, candidates.length);
  const picked = new Set<number>();
  const ordered: number[] = [];

  for (const id of ids) {
    if (ordered.length >= target) {
      break;
    }

    const match = id.trim().match(/^p(\d+)$/i);
    if (!match) {
      continue;
    }

    const index = Number(match[1]);
    if (index >= candidates.length || picked.has(index)) {
      continue;
    }

    picked.add(index);
    ordered.push(index);
  }

  for (let index = 0; index < candidates.length && ordered.length < target; index += 1) {
    if (!picked.has(index)) {
      picked.add(index);
      ordered.push(index);
    }
  }

  return ordered.map((index) => candidates[index]);
}

export async function rankAndSelect(
  model: ModelCaller,
  input: {
    candidates: NormalizedCandidate[];
    query: string;
    criteria: FilterCriteria | null;
    limit: number;
    signal?: AbortSignal;
  }
): Promise<RankingOutcome> {
  const limit = Math.max(0, input.limit);
  if (input.candidates.length <= limit) {
    return { selected: input.candidates.slice(), method: "skipped" };
  }

  const truncated = (): RankingOutcome => ({ selected: input.candidates.slice(0, limit), method: "truncated" });

  let text: string;
  try {
    const response = await model.call({
      prompt: buildPrompt({ ...input, limit }),
      responseSchema: rankingJsonSchema,
      schemaName: "ranking_selection",
      jsonMode: true,
      timeoutMs: RANKING_TIMEOUT_MS,
      signal: input.signal
    });
    text = response.text;
  } catch (error) {
    if (isCancellation(error)) {
      throw error;
    }

    console.warn("[discovery] ranking call failed; keeping first candidates", {
      error: redactText(error instanceof Error ? error.message : String(error))
    });
    return truncated();
  }

  const parsed = rankingSchema.safeParse(parseModelJson(text));
  if (!parsed.success) {
    console.warn("[discovery] ranking response unreadable; keeping first candidates", { response: previewText(text) });
    return truncated();
  }

  return { selected: resolveSelection(input.candidates, parsed.data.selected_ids, limit), method: "model" };
}
