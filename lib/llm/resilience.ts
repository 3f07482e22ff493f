import { isCancellation, sleep as abortableSleep } from "@/lib/abort";
import type { ModelClient, ModelProvider, ModelRequest, ModelUsage } from "@/lib/llm/model-client";
import { redactText } from "@/lib/security/redaction";

export type ModelErrorKind = "network" | "timeout" | "rate_limited" | "overloaded" | "server_error" | "cancelled" | "fatal";

export interface ModelErrorClassification {
  kind: ModelErrorKind;
  retryable: boolean;
  source: "status" | "code" | "text" | "none";
}

export interface ModelCallResult {
  text: string;
  usageMetadata: ModelUsage | null;
  provider: ModelProvider;
  model: string;
}

export interface ModelCaller {
  call(request: ModelRequest): Promise<ModelCallResult>;
}

export interface ResilientModelOptions {
  client: ModelClient;
  maxRetries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;

const RETRYABLE_HTTP_STATUSES = new Set([429, 500, 502, 503, 504]);

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT"
]);

const PROVIDER_CODES: Record<string, ModelErrorKind> = {
  rate_limit_exceeded: "rate_limited",
  insufficient_quota: "fatal",
  resource_exhausted: "rate_limited",
  unavailable: "overloaded",
  overloaded_error: "overloaded",
  server_error: "server_error",
  internal: "server_error",
  deadline_exceeded: "timeout"
};

// Best-effort heuristics for opaque third-party errors that carry no status or code.
const TEXT_PATTERNS: Array<{ pattern: RegExp; kind: ModelErrorKind }> = [
  { pattern: /no route to host|errno 113|connection refused|network is unreachable|fetch failed|socket hang up/i, kind: "network" },
  { pattern: /connection timeout|timed out/i, kind: "timeout" },
  { pattern: /rate.?limit|too many requests|\b429\b/i, kind: "rate_limited" },
  { pattern: /overloaded|service unavailable|\b503\b/i, kind: "overloaded" },
  { pattern: /\b(500|502|504)\b|bad gateway|gateway timeout/i, kind: "server_error" }
];

function readField(value: unknown, field: string): unknown {
  if (!value || typeof value !== "object") {
    return undefined;
  }

  return (value as Record<string, unknown>)[field];
}

function classifyStatus(status: unknown): ModelErrorClassification | null {
  if (typeof status !== "number" || !Number.isInteger(status) || status < 100) {
    return null;
  }

  if (status === 429) {
    return { kind: "rate_limited", retryable: true, source: "status" };
  }

  if (status === 503) {
    return { kind: "overloaded", retryable: true, source: "status" };
  }

  if (RETRYABLE_HTTP_STATUSES.has(status)) {
    return { kind: "server_error", retryable: true, source: "status" };
  }

  return { kind: "fatal", retryable: false, source: "status" };
}

function classifyCode(code: unknown): ModelErrorClassification | null {
  if (typeof code === "number") {
    return classifyStatus(code);
  }

  if (typeof code !== "string" || code.length === 0) {
    return null;
  }

  if (code === "ETIMEDOUT") {
    return { kind: "timeout", retryable: true, source: "code" };
  }

  if (NETWORK_ERROR_CODES.has(code)) {
    return { kind: "network", retryable: true, source: "code" };
  }

  const providerKind = PROVIDER_CODES[code.toLowerCase()];
  if (providerKind) {
    return { kind: providerKind, retryable: providerKind !== "fatal", source: "code" };
  }

  return null;
}

export function classifyModelError(error: unknown): ModelErrorClassification {
  if (isCancellation(error)) {
    return { kind: "cancelled", retryable: false, source: "code" };
  }

  const candidates = [error, readField(error, "cause")];

  for (const candidate of candidates) {
    const byStatus = classifyStatus(readField(candidate, "status")) ?? classifyStatus(readField(candidate, "statusCode"));
    if (byStatus) {
      return byStatus;
    }

    const byCode = classifyCode(readField(candidate, "code")) ?? classifyCode(readField(candidate, "errno"));
    if (byCode) {
      return byCode;
    }
  }

  const text = candidates
    .map((candidate) => (candidate instanceof Error ? candidate.message : typeof candidate === "string" ? candidate : ""))
    .join(" ");

  for (const { pattern, kind } of TEXT_PATTERNS) {
    if (pattern.test(text)) {
      return { kind, retryable: true, source: "text" };
    }
  }

  return { kind: "fatal", retryable: false, source: "none" };
}

export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

export function createResilientModel(options: ResilientModelOptions): ModelCaller {
  const maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
  const sleep = options.sleep ?? abortableSleep;
  const label = `${options.client.provider}/${options.client.model}`;

  return {
    async call(request) {
      let lastError: unknown = null;

      for (let attempt = 0; attempt < maxRetries; attempt += 1) {
        try {
          const response = await options.client.generate(request);
          return {
            text: response.text,
            usageMetadata: response.usage,
            provider: response.provider,
            model: response.model
          };
        } catch (error) {
          lastError = error;
          const classification = classifyModelError(error);
          const message = redactText(error instanceof Error ? error.message : String(error));

          console.warn(`[llm] ${label} call failed (attempt ${attempt + 1}/${maxRetries})`, {
            kind: classification.kind,
            retryable: classification.retryable,
            classifiedBy: classification.source,
            error: message
          });

          if (!classification.retryable || attempt >= maxRetries - 1) {
            throw error;
          }

          const delayMs = backoffDelayMs(baseDelayMs, attempt);
          console.warn(`[llm] ${label} retrying in ${delayMs}ms`);
          await sleep(delayMs, request.signal);
        }
      }

      throw lastError instanceof Error ? lastError : new Error("Model call failed without an error");
    }
  };
}
