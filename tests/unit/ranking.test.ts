import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { OperationCancelledError } from "@/lib/abort";
import { rankAndSelect, resolveSelection } from "@/lib/ai/ranking";
import { candidate, scriptedModel } from "@/tests/helpers/fakes";

const CANDIDATES = Array.from({ length: 18 }, (_, index) =>
  candidate({ productUrl: `https://tiki.vn/item-p${index}.html`, platform: "tiki", name: `Cà phê ${index}` })
);

const urls = (items: Array<{ productUrl: string }>) => items.map((item) => item.productUrl);

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveSelection", () => {
  it("drops fabricated and repeated ids, then tops up in original order", () => {
    const selected = resolveSelection(CANDIDATES, ["p17", "p3", "p3", "p99", "x", "P0"], 10);

    expect(urls(selected)).toEqual(
      [17, 3, 0, 1, 2, 4, 5, 6, 7, 8].map((index) => `https://tiki.vn/item-p${index}.html`)
    );
  });

  it("never returns more than the candidates available", () => {
    expect(resolveSelection(CANDIDATES.slice(0, 3), ["p2"], 10)).toHaveLength(3);
  });
});

describe("rankAndSelect", () => {
  it("selects exactly the budget from the crawled candidates", async () => {
    const model = scriptedModel([{ selected_ids: ["p5", "p12", "p1", "p7", "p0", "p16", "p9", "p2", "p14", "p11"] }]);

    const outcome = await rankAndSelect(model, { candidates: CANDIDATES, query: "cà phê", criteria: { minRating: 4.5 }, limit: 10 });

    expect(outcome.method).toBe("model");
    expect(outcome.selected).toHaveLength(10);
    expect(outcome.selected[0]?.productUrl).toBe("https://tiki.vn/item-p5.html");
    expect(outcome.selected.every((item) => CANDIDATES.includes(item))).toBe(true);
  });

  it("lists every candidate under a short id in the prompt", async () => {
    const model = scriptedModel([{ selected_ids: [] }]);

    await rankAndSelect(model, { candidates: CANDIDATES, query: "cà phê", criteria: null, limit: 10 });

    const prompt: unknown = JSON.parse(model.requests[0]?.prompt ?? "{}");
    expect(prompt).toMatchObject({ query: "cà phê", criteria: {} });
    expect(model.requests[0]?.prompt).toContain('"id": "p17"');
    expect(model.requests[0]?.schemaName).toBe("ranking_selection");
  });

  it("skips the model when the candidates already fit", async () => {
    const model = scriptedModel([]);

    const outcome = await rankAndSelect(model, { candidates: CANDIDATES.slice(0, 4), query: "cà phê", criteria: null, limit: 10 });

    expect(outcome).toEqual({ selected: CANDIDATES.slice(0, 4), method: "skipped" });
    expect(model.requests).toHaveLength(0);
  });

  it("keeps the first candidates when the response is unreadable", async () => {
    const model = scriptedModel(["I would pick the cheapest ones"]);

    const outcome = await rankAndSelect(model, { candidates: CANDIDATES, query: "cà phê", criteria: null, limit: 10 });

    expect(outcome.method).toBe("truncated");
    expect(outcome.selected).toEqual(CANDIDATES.slice(0, 10));
  });

  it("keeps the first candidates when the model call fails", async () => {
    const model = scriptedModel([new Error("HTTP 503 service unavailable")]);

    const outcome = await rankAndSelect(model, { candidates: CANDIDATES, query: "cà phê", criteria: null, limit: 5 });

    expect(outcome).toEqual({ selected: CANDIDATES.slice(0, 5), method: "truncated" });
  });

  it("propagates cancellation", async () => {
    const model = scriptedModel([new OperationCancelledError("ranking")]);

    await expect(
      rankAndSelect(model, { candidates: CANDIDATES, query: "cà phê", criteria: null, limit: 10 })
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
