import { describe, expect, it } from "vitest";
import { z } from "zod";
import { Agent } from "../agent/agent.js";
import { ValidationError } from "../core/errors.js";
import { RunResult } from "./result.js";

function result(finalOutput: string) {
  return new RunResult({
    finalOutput,
    inputItems: [{ type: "user_message", content: "count orders" }],
    newItems: [{ type: "assistant_message", agent: "Analyst", content: finalOutput }],
    lastAgent: new Agent({ name: "Analyst" }),
    usage: { requests: 1, inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    turns: 1,
  });
}

describe("RunResult", () => {
  it("exports input and new items as the next run's input", () => {
    const run = result("42");

    const input = run.toInputList();
    input.push({ type: "user_message", content: "and users?" });

    expect(run.items).toHaveLength(2);
    expect(input.map((item) => item.type)).toEqual([
      "user_message",
      "assistant_message",
      "user_message",
    ]);
  });

  it("parses structured final output", () => {
    const schema = z.object({ table: z.string(), rows: z.number() });

    expect(result('{"table":"orders","rows":42}').finalOutputAs(schema)).toEqual({
      table: "orders",
      rows: 42,
    });
  });

  it("rejects output that is not JSON or does not match", () => {
    const schema = z.object({ rows: z.number() });

    expect(() => result("forty-two").finalOutputAs(schema)).toThrow("Final output is not valid JSON");
    expect(() => result('{"rows":"many"}').finalOutputAs(schema)).toThrow(ValidationError);
  });
});
