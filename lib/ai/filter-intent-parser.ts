import { DiscoveryError } from "@/lib/errors";
import { criteriaJsonSchema, isEmptyCriteria, parseCriteriaPayload } from "@/lib/filtering/criteria";
import { parseModelJson, previewText } from "@/lib/llm/json";
import type { ModelCaller } from "@/lib/llm/resilience";
import { PLATFORMS, type FilterCriteria } from "@/lib/types";

export const FILTER_INTENT_TIMEOUT_MS = 30_000;

function buildPrompt(filterText: string): string {
  return JSON.stringify(
    {
      task: "Convert a shopper's filter phrase into structured product filter criteria.",
      rules: [
        "Only set a field the phrase states or clearly implies; every other field is null.",
        "Prices are plain numbers in the shopper's currency (\"500k\" is 500000, \"1tr\" is 1000000).",
        "\"rating 4.5+\" or \"trên 4.5 sao\" sets minRating; ratings are between 0 and 5.",
        `platforms lists marketplace names from: ${PLATFORMS.join(", ")}.`,
        "isMall is true for official or mall stores; isVerifiedSeller for verified or preferred sellers.",
        "requiredKeywords and excludedKeywords are short words that must or must not appear in the product name."
      ],
      input: filterText,
      output_schema: criteriaJsonSchema
    },
    null,
    2
  );
}

function intentParsingFailed(filterText: string, reason: string, modelText: string): DiscoveryError {
  console.warn("[discovery] filter intent parsing failed", { reason, response: previewText(modelText) });
  return new DiscoveryError("IntentParsingFailed", "criteria", `Could not understand the filter "${filterText}": ${reason}`, {
    rawText: filterText
  });
}

export async function parseFilterCriteria(
  model: ModelCaller,
  input: { filterText: string; signal?: AbortSignal }
): Promise<FilterCriteria> {
  const response = await model.call({
    prompt: buildPrompt(input.filterText),
    responseSchema: criteriaJsonSchema,
    schemaName: "filter_criteria",
    jsonMode: true,
    timeoutMs: FILTER_INTENT_TIMEOUT_MS,
    signal: input.signal
  });

  const payload = parseModelJson(response.text);
  if (payload === null) {
    throw intentParsingFailed(input.filterText, "model returned no JSON", response.text);
  }

  const parsed = parseCriteriaPayload(payload);
  if (!parsed) {
    throw intentParsingFailed(input.filterText, "criteria failed validation", response.text);
  }

  if (parsed.unknownPlatforms.length > 0) {
    console.warn("[discovery] dropping unknown platforms from criteria", { platforms: parsed.unknownPlatforms });
  }

  if (parsed.unreadableFields.length > 0) {
    console.warn("[discovery] dropping unreadable numbers from criteria", { fields: parsed.unreadableFields });
  }

  if (isEmptyCriteria(parsed.criteria)) {
    throw intentParsingFailed(input.filterText, "no usable criteria found", response.text);
  }

  return parsed.criteria;
}
