import { describe, expect, it } from "vitest";
import { DEFAULT_TOKEN_PRICING, estimateCost, Usage } from "./usage.js";

describe("Usage", () => {
  it("falls back to input plus output when the total is missing", () => {
    const usage = new Usage();
    usage.add({ inputTokens: 7, outputTokens: 3, totalTokens: 0 });
    usage.add();

    expect(usage.snapshot()).toEqual({
      requests: 2,
      inputTokens: 7,
      outputTokens: 3,
      totalTokens: 10,
    });
  });

  it("forwards every call to its parent", () => {
    const parent = new Usage();
    const child = new Usage(parent);
    parent.add({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    child.add({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    child.add({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });

    expect(child.snapshot().totalTokens).toBe(30);
    expect(parent.snapshot()).toEqual({
      requests: 3,
      inputTokens: 30,
      outputTokens: 15,
      totalTokens: 45,
    });
  });

  it("adds a cost estimate when priced", () => {
    const usage = new Usage(undefined, DEFAULT_TOKEN_PRICING);
    usage.add({ inputTokens: 2000, outputTokens: 1000, totalTokens: 3000 });

    expect(usage.snapshot().cost).toEqual({ inputCost: 0.02, outputCost: 0.03, totalCost: 0.05 });
  });
});

describe("estimateCost", () => {
  it("rounds to six decimals", () => {
    const cost = estimateCost(
      { inputTokens: 1000, outputTokens: 0, totalTokens: 1000 },
      { inputPer1k: 0.0012345678, outputPer1k: 0 },
    );

    expect(cost).toEqual({ inputCost: 0.001235, outputCost: 0, totalCost: 0.001235 });
  });
});
