import { runWithTimeout } from "@/lib/abort";

export type ModelProvider = "openai" | "gemini";

export interface ModelUsage {
  promptTokens: number | null;
  completionTokens: number | null;
  totalTokens: number | null;
}

export interface ModelRequest {
  prompt: string;
  responseSchema?: Record<string, unknown>;
  schemaName?: string;
  jsonMode: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ModelResponse {
  text: string;
  usage: ModelUsage | null;
  provider: ModelProvider;
  model: string;
}

export interface ModelClient {
  readonly provider: ModelProvider;
  readonly model: string;
  generate(request: ModelRequest): Promise<ModelResponse>;
}

export class ModelHttpError extends Error {
  readonly status: number;
  readonly code: string | null;
  readonly provider: ModelProvider;

  constructor(input: { provider: ModelProvider; status: number; code: string | null; message: string }) {
    super(`${input.provider} HTTP ${input.status}: ${input.message}`);
    this.name = "ModelHttpError";
    this.status = input.status;
    this.code = input.code;
    this.provider = input.provider;
  }
}

const SYSTEM_PROMPT = "You are a precise e-commerce research assistant. When asked for JSON, output only valid JSON.";

function asRecord(value: unknown): Record<string, unknown> | null {
  return value && typeof value === "object" && !Array.isArray(value) ? (value as Record<string, unknown>) : null;
}

function readNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

async function readErrorBody(response: Response): Promise<{ code: string | null; message: string }> {
  const fallback = response.statusText || "request failed";

  let payload: unknown;
  try {
    payload = (await response.json()) as unknown;
  } catch {
    return { code: null, message: fallback };
  }

  const error = asRecord(asRecord(payload)?.error);
  if (!error) {
    return { code: null, message: fallback };
  }

  // OpenAI reports a string `code`/`type`; Gemini reports a numeric `code` plus a string `status`.
  const code =
    typeof error.code === "string"
      ? error.code
      : typeof error.status === "string"
        ? error.status
        : typeof error.type === "string"
          ? error.type
          : null;
  const message = typeof error.message === "string" && error.message.trim().length > 0 ? error.message : fallback;

  return { code, message };
}

export function readChatCompletionContent(payload: unknown): string | null {
  const choices = asRecord(payload)?.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return null;
  }

  const content = asRecord(asRecord(choices[0])?.message)?.content;
  if (typeof content === "string") {
    return content;
  }

  if (Array.isArray(content)) {
    for (const part of content) {
      const text = asRecord(part)?.text;
      if (typeof text === "string" && text.trim().length > 0) {
        return text;
      }
    }
  }

  return null;
}

export function readGeminiContent(payload: unknown): string | null {
  const candidates = asRecord(payload)?.candidates;
  if (!Array.isArray(candidates) || candidates.length === 0) {
    return null;
  }

  const parts = asRecord(asRecord(candidates[0])?.content)?.parts;
  if (!Array.isArray(parts)) {
    return null;
  }

  const texts = parts
    .map((part) => asRecord(part)?.text)
    .filter((text): text is string => typeof text === "string");

  return texts.length > 0 ? texts.join("") : null;
}

function readOpenAiUsage(payload: unknown): ModelUsage | null {
  const usage = asRecord(asRecord(payload)?.usage);
  if (!usage) {
    return null;
  }

  return {
    promptTokens: readNumber(usage.prompt_tokens),
    completionTokens: readNumber(usage.completion_tokens),
    totalTokens: readNumber(usage.total_tokens)
  };
}

function readGeminiUsage(payload: unknown): ModelUsage | null {
  const usage = asRecord(asRecord(payload)?.usageMetadata);
  if (!usage) {
    return null;
  }

  return {
    promptTokens: readNumber(usage.promptTokenCount),
    completionTokens: readNumber(usage.candidatesTokenCount),
    totalTokens: readNumber(usage.totalTokenCount)
  };
}

function openAiResponseFormat(request: ModelRequest): Record<string, unknown> | undefined {
  if (request.responseSchema) {
    return {
      type: "json_schema",
      json_schema: {
        name: request.schemaName ?? "structured_output",
        strict: false,
        schema: request.responseSchema
      }
    };
  }

  return request.jsonMode ? { type: "json_object" } : undefined;
}

export function createOpenAiClient(config: { apiKey: string; model: string; baseUrl: string }): ModelClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, "");

  return {
    provider: "openai",
    model: config.model,
    async generate(request) {
      return runWithTimeout<ModelResponse>({
        label: `openai ${config.model} call`,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        operation: async (signal) => {
          const response = await fetch(`${baseUrl}/chat/completions`, {
            method: "POST",
            headers: {
              "content-type": "application/json",
              authorization: `Bearer ${config.apiKey}`
            },
            body: JSON.stringify({
              model: config.model,
              temperature: 0,
              messages: [
                { role: "system", content: SYSTEM_PROMPT },
                { role: "user", content: request.prompt }
              ],
              response_format: openAiResponseFormat(request)
            }),
            signal
          });

          if (!response.ok) {
            const body = await readErrorBody(response);
            throw new ModelHttpError({ provider: "openai", status: response.status, ...body });
          }

          const payload = (await response.json()) as unknown;
          return {
            text: readChatCompletionContent(payload) ?? "",
            usage: readOpenAiUsage(payload),
            provider: "openai",
            model: config.model
          };
        }
      });
    }
  };
}

export function createGeminiClient(config: { apiKey: string; model: string; baseUrl: string }): ModelClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, "");

  return {
    provider: "gemini",
    model: config.model,
    async generate(request) {
      return runWithTimeout<ModelResponse>({
        label: `gemini ${config.model} call`,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        operation: async (signal) => {
          const wantsJson = request.jsonMode || Boolean(request.responseSchema);
          const response = await fetch(`${baseUrl}/v1beta/models/${encodeURIComponent(config.model)}:generateContent`, {
            method: "POST",
            headers: {
              "content-type": "application/json",
              "x-goog-api-key": config.apiKey
            },
            body: JSON.stringify({
              systemInstruction: { parts: [{ text: SYSTEM_PROMPT }] },
              contents: [{ role: "user", parts: [{ text: request.prompt }] }],
              generationConfig: {
                temperature: 0,
                ...(wantsJson ? { responseMimeType: "application/json" } : {}),
                ...(request.responseSchema ? { responseJsonSchema: request.responseSchema } : {})
              }
            }),
            signal
          });

          if (!response.ok) {
            const body = await readErrorBody(response);
            throw new ModelHttpError({ provider: "gemini", status: response.status, ...body });
          }

          const payload = (await response.json()) as unknown;
          return {
            text: readGeminiContent(payload) ?? "",
            usage: readGeminiUsage(payload),
            provider: "gemini",
            model: config.model
          };
        }
      });
    }
  };
}
