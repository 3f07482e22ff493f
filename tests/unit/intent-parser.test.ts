import { afterEach, describe, expect, it, vi } from "vitest";

import { parseFilterCriteria } from "@/lib/ai/filter-intent-parser";
import { clampMaxProducts, parseDiscoveryIntent } from "@/lib/ai/intent-parser";
import { DiscoveryError } from "@/lib/errors";
import { PROJECT, scriptedModel } from "@/tests/helpers/fakes";

const RAW_TEXT = "tìm 5 sản phẩm cà phê hòa tan, rating 4.5+, max price 500000";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseDiscoveryIntent", () => {
  it("splits a shopper request into query, filter phrase and budget", async () => {
    const model = scriptedModel([
      {
        user_query: "cà phê hòa tan",
        filter_text: "rating 4.5+, max price 500000",
        max_products: 5
      },
      {
        minPrice: null,
        maxPrice: 500000,
        minRating: 4.5,
        platforms: null,
        requiredKeywords: []
      }
    ]);

    const intent = await parseDiscoveryIntent(model, { rawText: RAW_TEXT, project: PROJECT });
    expect(intent).toEqual({
      query: "cà phê hòa tan",
      filterText: "rating 4.5+, max price 500000",
      maxProducts: 5
    });

    const criteria = await parseFilterCriteria(model, { filterText: intent.filterText ?? "" });
    expect(criteria).toEqual({ minRating: 4.5, maxPrice: 500000 });
    expect(model.requests.map((request) => request.jsonMode)).toEqual([true, true]);
  });

  it("reads fenced JSON and defaults the budget when the model omits it", async () => {
    const model = scriptedModel(['```json\n{"user_query": "bình giữ nhiệt", "filter_text": "", "max_products": null}\n```']);

    const intent = await parseDiscoveryIntent(model, { rawText: "bình giữ nhiệt", project: PROJECT });

    expect(intent).toEqual({ query: "bình giữ nhiệt", filterText: null, maxProducts: 10 });
  });

  it("grounds the prompt on the project context", async () => {
    const model = scriptedModel([{ user_query: "cà phê", filter_text: null, max_products: 3 }]);

    await parseDiscoveryIntent(model, { rawText: "cà phê", project: PROJECT });

    const prompt = JSON.parse(model.requests[0]?.prompt ?? "{}") as { project: { target_product_name: string }; input: string };
    expect(prompt.project.target_product_name).toBe("cà phê hòa tan");
    expect(prompt.input).toBe("cà phê");
  });

  it("fails with ParsingFailed on garbled output", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const model = scriptedModel(["I could not decide."]);

    const error = await parseDiscoveryIntent(model, { rawText: RAW_TEXT, project: PROJECT }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DiscoveryError);
    expect(error).toMatchObject({ kind: "ParsingFailed", stage: "intent" });
  });

  it("fails with ParsingFailed when the query is blank", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const model = scriptedModel([{ user_query: "   ", filter_text: "rating 4+", max_products: 5 }]);

    await expect(parseDiscoveryIntent(model, { rawText: RAW_TEXT, project: PROJECT })).rejects.toMatchObject({
      kind: "ParsingFailed"
    });
  });

  it("propagates model failures unchanged", async () => {
    const failure = new Error("upstream exhausted");
    const model = scriptedModel([failure]);

    await expect(parseDiscoveryIntent(model, { rawText: RAW_TEXT, project: PROJECT })).rejects.toBe(failure);
  });
});

describe("clampMaxProducts", () => {
  it("clamps model budgets into the allowed range", () => {
    expect(clampMaxProducts(50)).toBe(20);
    expect(clampMaxProducts(0)).toBe(1);
    expect(clampMaxProducts("7")).toBe(7);
    expect(clampMaxProducts(undefined)).toBe(10);
    expect(clampMaxProducts("many")).toBe(10);
  });
});
