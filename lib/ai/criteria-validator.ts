import { z } from "zod";

import { parseModelJson } from "@/lib/llm/json";
import type { ModelCaller } from "@/lib/llm/resilience";
import type { FilterCriteria } from "@/lib/types";

export const CRITERIA_VALIDATION_TIMEOUT_MS = 30_000;

export type CriteriaVerdict = { valid: true } | { valid: false; reason: string };

const verdictSchema = z.object({
  is_valid: z.boolean(),
  reason: z.string().nullish()
});

const verdictJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    is_valid: { type: "boolean" },
    reason: { type: ["string", "null"] }
  },
  required: ["is_valid", "reason"]
};

function buildPrompt(input: { filterText: string; criteria: FilterCriteria }): string {
  return JSON.stringify(
    {
      task: "Check whether extracted filter criteria faithfully reflect the shopper's filter phrase.",
      rules: [
        "is_valid=false when a criterion contradicts the phrase, a stated constraint is missing, or a value is implausible.",
        "reason is a short explanation in the shopper's language when is_valid=false, otherwise null."
      ],
      input: input.filterText,
      extracted_criteria: input.criteria
    },
    null,
    2
  );
}

/**
 * Second-opinion check on extracted criteria. An unreadable verdict counts as
 * invalid; a failed model call propagates to the caller.
 */
export async function validateCriteria(
  model: ModelCaller,
  input: { filterText: string; criteria: FilterCriteria; signal?: AbortSignal }
): Promise<CriteriaVerdict> {
  const response = await model.call({
    prompt: buildPrompt(input),
    responseSchema: verdictJsonSchema,
    schemaName: "criteria_verdict",
    jsonMode: true,
    timeoutMs: CRITERIA_VALIDATION_TIMEOUT_MS,
    signal: input.signal
  });

  const parsed = verdictSchema.safeParse(parseModelJson(response.text));
  if (!parsed.success) {
    return { valid: false, reason: "Could not read the criteria validation response" };
  }

  if (!parsed.data.is_valid) {
    return { valid: false, reason: parsed.data.reason?.trim() || "The extracted criteria do not match the request" };
  }

  return { valid: true };
}
