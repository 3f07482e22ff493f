import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createGeminiClient,
  createOpenAiClient,
  ModelHttpError,
  readChatCompletionContent,
  readGeminiContent
} from "@/lib/llm/model-client";

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(
    async (_input: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body ?? "null"));
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createOpenAiClient", () => {
  const client = createOpenAiClient({ apiKey: "test-key", model: "test-model", baseUrl: "https://api.example.test/v1/" });

  it("posts a chat completion with the response schema", async () => {
    const fetchMock = stubFetch(200, {
      choices: [{ message: { content: "{\"selected_ids\":[\"p0\"]}" } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
    });

    const response = await client.generate({
      prompt: "rank these",
      responseSchema: { type: "object" },
      schemaName: "ranking_selection",
      jsonMode: true,
      timeoutMs: 1000
    });

    expect(response).toEqual({
      text: "{\"selected_ids\":[\"p0\"]}",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      provider: "openai",
      model: "test-model"
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.example.test/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ authorization: "Bearer test-key" });
    expect(sentBody(fetchMock)).toMatchObject({
      model: "test-model",
      temperature: 0,
      response_format: { type: "json_schema", json_schema: { name: "ranking_selection", schema: { type: "object" } } }
    });
  });

  it("raises a typed error carrying the provider status and code", async () => {
    stubFetch(429, { error: { message: "Rate limit reached", type: "requests", code: "rate_limit_exceeded" } });

    const error = await client.generate({ prompt: "x", jsonMode: false, timeoutMs: 1000 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelHttpError);
    expect(error).toMatchObject({ status: 429, code: "rate_limit_exceeded", message: "openai HTTP 429: Rate limit reached" });
  });
});

describe("createGeminiClient", () => {
  const client = createGeminiClient({
    apiKey: "test-key",
    model: "gemini-test",
    baseUrl: "https://gemini.example.test"
  });

  it("joins candidate parts and asks for JSON output", async () => {
    const fetchMock = stubFetch(200, {
      candidates: [{ content: { parts: [{ text: "{\"ok\":" }, { text: "true}" }] } }],
      usageMetadata: { promptTokenCount: 7, candidatesTokenCount: 3, totalTokenCount: 10 }
    });

    const response = await client.generate({ prompt: "hello", jsonMode: true, timeoutMs: 1000 });

    expect(response.text).toBe("{\"ok\":true}");
    expect(response.usage).toEqual({ promptTokens: 7, completionTokens: 3, totalTokens: 10 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://gemini.example.test/v1beta/models/gemini-test:generateContent");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ "x-goog-api-key": "test-key" });
    expect(sentBody(fetchMock)).toMatchObject({ generationConfig: { temperature: 0, responseMimeType: "application/json" } });
  });

  it("uses the status name as the error code", async () => {
    stubFetch(503, { error: { code: 503, message: "The model is overloaded.", status: "UNAVAILABLE" } });

    await expect(client.generate({ prompt: "x", jsonMode: true, timeoutMs: 1000 })).rejects.toMatchObject({
      status: 503,
      code: "UNAVAILABLE",
      provider: "gemini"
    });
  });
});

describe("response readers", () => {
  it("reads text from content part arrays", () => {
    expect(readChatCompletionContent({ choices: [{ message: { content: [{ type: "text", text: "hi" }] } }] })).toBe("hi");
    expect(readChatCompletionContent({ choices: [] })).toBeNull();
    expect(readGeminiContent({ candidates: [{ content: {} }] })).toBeNull();
  });
});
