import { afterEach, describe, expect, it, vi } from "vitest";

import { OperationCancelledError, OperationTimeoutError } from "@/lib/abort";
import { ModelHttpError, type ModelClient, type ModelRequest, type ModelResponse } from "@/lib/llm/model-client";
import { backoffDelayMs, classifyModelError, createResilientModel } from "@/lib/llm/resilience";

const REQUEST: ModelRequest = { prompt: "hello", jsonMode: true, timeoutMs: 1000 };

function clientFrom(outcomes: Array<Error | string>): ModelClient & { attempts: number } {
  const client = {
    provider: "openai" as const,
    model: "test-model",
    attempts: 0,
    async generate(): Promise<ModelResponse> {
      const outcome = outcomes[client.attempts];
      client.attempts += 1;
      if (outcome instanceof Error) {
        throw outcome;
      }

      return { text: outcome, usage: null, provider: "openai", model: "test-model" };
    }
  };

  return client;
}

function networkError(code: string): Error {
  return Object.assign(new Error("connect failed"), { code });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("classifyModelError", () => {
  it("prefers structured status codes", () => {
    expect(classifyModelError(new ModelHttpError({ provider: "openai", status: 429, code: null, message: "slow down" }))).toEqual({
      kind: "rate_limited",
      retryable: true,
      source: "status"
    });
    expect(classifyModelError(new ModelHttpError({ provider: "gemini", status: 400, code: "INVALID_ARGUMENT", message: "503 in text" }))).toEqual({
      kind: "fatal",
      retryable: false,
      source: "status"
    });
  });

  it("reads network codes from the error cause", () => {
    const error = new TypeError("fetch failed", { cause: networkError("EHOSTUNREACH") });
    expect(classifyModelError(error)).toEqual({ kind: "network", retryable: true, source: "code" });
  });

  it("treats per-call timeouts as retryable and cancellation as fatal", () => {
    expect(classifyModelError(new OperationTimeoutError("call", 10)).retryable).toBe(true);
    expect(classifyModelError(new OperationCancelledError("call"))).toEqual({ kind: "cancelled", retryable: false, source: "code" });
  });

  it("maps provider error codes", () => {
    const error = new ModelHttpError({ provider: "gemini", status: 0, code: "RESOURCE_EXHAUSTED", message: "quota" });
    expect(classifyModelError(error)).toEqual({ kind: "rate_limited", retryable: true, source: "code" });
  });

  it("falls back to message text only for opaque errors", () => {
    expect(classifyModelError(new Error("socket hang up"))).toEqual({ kind: "network", retryable: true, source: "text" });
    expect(classifyModelError(new Error("invalid prompt"))).toEqual({ kind: "fatal", retryable: false, source: "none" });
  });
});

describe("createResilientModel", () => {
  it("retries transient failures with exponential backoff", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const client = clientFrom([networkError("ECONNRESET"), networkError("ECONNRESET"), "third time"]);

    const model = createResilientModel({ client, maxRetries: 3, baseDelayMs: 100, sleep });
    const result = await model.call(REQUEST);

    expect(result.text).toBe("third time");
    expect(client.attempts).toBe(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it("raises non-retryable errors without sleeping", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fatal = new ModelHttpError({ provider: "openai", status: 401, code: "invalid_api_key", message: "bad key" });
    const client = clientFrom([fatal, "never reached"]);

    const model = createResilientModel({ client, maxRetries: 3, baseDelayMs: 100, sleep });

    await expect(model.call(REQUEST)).rejects.toBe(fatal);
    expect(client.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("re-raises the last error once attempts are exhausted", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const last = new ModelHttpError({ provider: "openai", status: 503, code: null, message: "overloaded" });
    const client = clientFrom([networkError("ETIMEDOUT"), last]);

    const model = createResilientModel({ client, maxRetries: 2, baseDelayMs: 50, sleep });

    await expect(model.call(REQUEST)).rejects.toBe(last);
    expect(client.attempts).toBe(2);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([50]);
  });

  it("computes backoff from a zero-based attempt", () => {
    expect([0, 1, 2].map((attempt) => backoffDelayMs(2000, attempt))).toEqual([2000, 4000, 8000]);
  });
});
