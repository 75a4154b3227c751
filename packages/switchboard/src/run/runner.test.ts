import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  createTestRunner,
  delayedTool,
  echoTool,
  MockModelClient,
  showTablesTool,
  silentLogger,
} from "../../../testing/src/index.js";
import { Agent } from "../agent/agent.js";
import type { AgentHooks } from "../agent/hooks.js";
import {
  DefinitionError,
  HandoffError,
  ModelInvocationError,
  RunCancelledError,
  TurnLimitExceeded,
} from "../core/errors.js";
import { DEFAULT_TOKEN_PRICING } from "../core/usage.js";
import { createFunctionTool } from "../tools/tool.js";
import { filterByDepth } from "../tracing/events.js";
import type { TraceRecorder } from "../tracing/trace.js";
import { Runner } from "./runner.js";

function databaseAgent() {
  return new Agent({
    name: "Database Agent",
    instructions: "Answer questions about the database.",
    handoffDescription: "Knows the database tables.",
    tools: [showTablesTool(["orders", "users"])],
  });
}

describe("Runner", () => {
  it("answers in one model call when the model returns text only", async () => {
    const model = new MockModelClient();
    model.mock().returns("Hello there").register();
    const agent = new Agent({ name: "Assistant", instructions: "Be helpful." });

    const result = await createTestRunner(model).run(agent, "hi");

    expect(model.callCount).toBe(1);
    expect(model.requests[0]?.instructions).toBe("Be helpful.");
    expect(result.finalOutput).toBe("Hello there");
    expect(result.lastAgent).toBe(agent);
    expect(result.turns).toBe(1);
    expect(result.inputItems).toEqual([{ type: "user_message", content: "hi" }]);
    expect(result.newItems).toEqual([
      { type: "assistant_message", agent: "Assistant", content: "Hello there" },
    ]);
  });

  it("feeds invalid tool arguments back to the model and continues", async () => {
    const model = new MockModelClient();
    model.mock().onTurn(1).returnsToolCall("echo", { message: 5 }, "c1").register();
    model.mock().onTurn(2).returns("Sorry, fixed it.").register();
    const agent = new Agent({ name: "Echoer", tools: [echoTool] });

    const result = await createTestRunner(model).run(agent, "echo something");

    expect(model.callCount).toBe(2);
    expect(result.finalOutput).toBe("Sorry, fixed it.");
    const toolResult = result.newItems[1];
    expect(toolResult?.type).toBe("tool_result");
    expect(toolResult?.type === "tool_result" && toolResult.status).toBe("error");
    expect(toolResult?.type === "tool_result" && toolResult.errorKind).toBe("validation");
    expect(model.requests[1]?.items.at(-1)).toEqual(toolResult);
  });

  it("fails with HandoffError on an ineligible target and calls the model no further", async () => {
    const model = new MockModelClient();
    model.mock().returnsHandoff("Billing").register();
    const triage = new Agent({ name: "Triage", handoffs: [databaseAgent()] });

    const run = createTestRunner(model).run(triage, "refund me");

    await expect(run).rejects.toBeInstanceOf(HandoffError);
    await expect(run).rejects.toThrow(
      "Agent 'Triage' cannot hand off to 'Billing' (eligible: Database Agent)",
    );
    expect(model.callCount).toBe(1);
  });

  it("continues a conversation from toInputList", async () => {
    const model = new MockModelClient();
    model.mock().onTurn(1).whenLastItemContains("first").returns("one").register();
    model.mock().whenLastItemContains("second").returns("two").register();
    const agent = new Agent({ name: "Assistant" });
    const runner = createTestRunner(model);

    const first = await runner.run(agent, "first question");
    const second = await runner.run(agent, [
      ...first.toInputList(),
      { type: "user_message", content: "second question" },
    ]);

    expect(second.finalOutput).toBe("two");
    expect(second.inputItems.slice(0, 2)).toEqual(first.toInputList());
    expect(model.requests[1]?.items).toEqual([
      { type: "user_message", content: "first question" },
      { type: "assistant_message", agent: "Assistant", content: "one" },
      { type: "user_message", content: "second question" },
    ]);
  });

  it("records tool results in request order", async () => {
    const model = new MockModelClient();
    model
      .mock()
      .onTurn(1)
      .returnsToolCalls([
        { name: "slow", callId: "a" },
        { name: "fast", callId: "b" },
      ])
      .register();
    model.mock().onTurn(2).returns("both done").register();
    const agent = new Agent({
      name: "Worker",
      tools: [delayedTool("slow", 40, "slow done"), delayedTool("fast", 1, "fast done")],
    });

    const result = await createTestRunner(model).run(agent, "go");

    expect(
      result.newItems.map((item) =>
        item.type === "tool_call" || item.type === "tool_result"
          ? `${item.type}:${item.callId}`
          : item.type,
      ),
    ).toEqual(["tool_call:a", "tool_call:b", "tool_result:a", "tool_result:b", "assistant_message"]);
  });

  it("stops with TurnLimitExceeded after exactly maxTurns model calls", async () => {
    const model = new MockModelClient();
    model.mock().returnsToolCall("echo", { message: "again" }).register();
    const agent = new Agent({ name: "Looper", tools: [echoTool] });

    const run = createTestRunner(model).run(agent, "loop", { maxTurns: 3 });

    await expect(run).rejects.toBeInstanceOf(TurnLimitExceeded);
    await expect(run).rejects.toThrow("Run exceeded the maximum of 3 turns");
    expect(model.callCount).toBe(3);
  });

  it("hands off to the database agent which lists the tables", async () => {
    const model = new MockModelClient();
    model.mock().forAgent("Triage").returnsHandoff("Database Agent", "wants tables", "h1").register();
    model.mock().forAgent("Database Agent").onTurn(2).returnsToolCall("show_tables", {}, "t1").register();
    model
      .mock()
      .forAgent("Database Agent")
      .onTurn(3)
      .returns("There are two tables: orders and users.")
      .register();
    const database = databaseAgent();
    const triage = new Agent({ name: "Triage", handoffs: [database] });

    const result = await createTestRunner(model).run(triage, "Which tables exist?");

    expect(result.finalOutput).toBe("There are two tables: orders and users.");
    expect(result.lastAgent).toBe(database);
    expect(result.newItems).toEqual([
      {
        type: "handoff",
        callId: "h1",
        toolName: "transfer_to_database_agent",
        from: "Triage",
        to: "Database Agent",
        context: "wants tables",
      },
      {
        type: "tool_call",
        agent: "Database Agent",
        callId: "t1",
        name: "show_tables",
        arguments: "{}",
      },
      {
        type: "tool_result",
        agent: "Database Agent",
        callId: "t1",
        name: "show_tables",
        status: "success",
        output: "orders\nusers",
      },
      {
        type: "assistant_message",
        agent: "Database Agent",
        content: "There are two tables: orders and users.",
      },
    ]);
    expect(model.requests[0]?.handoffs.map((schema) => schema.name)).toEqual([
      "transfer_to_database_agent",
    ]);
    expect(model.requests[1]?.tools.map((schema) => schema.name)).toEqual(["show_tables"]);
    expect(result.trace?.getEvents().map((event) => `${event.type}:${event.agentName}`)).toEqual([
      "agent_start:Triage",
      "model_call_start:Triage",
      "model_call_end:Triage",
      "handoff:Triage",
      "agent_start:Database Agent",
      "model_call_start:Database Agent",
      "model_call_end:Database Agent",
      "tool_start:Database Agent",
      "tool_end:Database Agent",
      "model_call_start:Database Agent",
      "model_call_end:Database Agent",
      "agent_end:Database Agent",
    ]);
  });

  it("prefers a hand-off over tool calls in the same response", async () => {
    const execute = vi.fn(() => "never");
    const spy = createFunctionTool({
      name: "spy",
      description: "",
      parameters: z.object({}),
      execute,
    });
    const model = new MockModelClient();
    model
      .mock()
      .forAgent("Triage")
      .returns("Passing you on.")
      .returnsToolCall("spy", {}, "s1")
      .returnsHandoff("Database Agent", undefined, "h1")
      .register();
    model.mock().forAgent("Database Agent").returns("done").register();
    const triage = new Agent({ name: "Triage", tools: [spy], handoffs: [databaseAgent()] });

    const result = await createTestRunner(model).run(triage, "tables?");

    expect(execute).not.toHaveBeenCalled();
    expect(result.newItems.map((item) => item.type)).toEqual([
      "assistant_message",
      "handoff",
      "assistant_message",
    ]);
    expect(result.newItems[1]).not.toHaveProperty("context");
  });

  it("retries transient model failures", async () => {
    const onRetry = vi.fn();
    const model = new MockModelClient();
    model.mock().throws(new Error("503 Service Unavailable")).once().register();
    model.mock().returns("recovered").register();

    const result = await createTestRunner(model, { retry: { onRetry } }).run(
      new Agent({ name: "Assistant" }),
      "hi",
    );

    expect(result.finalOutput).toBe("recovered");
    expect(model.callCount).toBe(2);
    expect(result.usage.requests).toBe(1);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
  });

  it("raises ModelInvocationError once retries are exhausted", async () => {
    const onRetriesExhausted = vi.fn();
    const model = new MockModelClient();
    model.mock().throws(new Error("503 Service Unavailable")).register();

    const error = await createTestRunner(model, { retry: { retries: 2, onRetriesExhausted } })
      .run(new Agent({ name: "Assistant" }), "hi")
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error instanceof ModelInvocationError && error.attempts).toBe(3);
    expect(error instanceof ModelInvocationError && error.message).toBe("Service unavailable (503)");
    expect(model.callCount).toBe(3);
    expect(onRetriesExhausted).toHaveBeenCalledTimes(1);
  });

  it("does not retry permanent failures", async () => {
    const model = new MockModelClient();
    model.mock().throws(new Error("401 Unauthorized")).register();

    const error = await createTestRunner(model)
      .run(new Agent({ name: "Assistant" }), "hi")
      .catch((caught: unknown) => caught);

    expect(error instanceof ModelInvocationError && error.attempts).toBe(1);
    expect(error instanceof ModelInvocationError && error.message).toBe(
      "Authentication failed - check the API key",
    );
    expect(model.callCount).toBe(1);
  });

  it("times out slow model calls", async () => {
    const model = new MockModelClient();
    model.mock().returns("late").withDelay(1_000).register();

    const run = createTestRunner(model, {
      modelTimeoutMs: 20,
      retry: { enabled: false },
    }).run(new Agent({ name: "Assistant" }), "hi");

    await expect(run).rejects.toThrow("Model invocation timed out after 20ms");
  });

  it("refuses to start when the signal is already aborted", async () => {
    const model = new MockModelClient();
    const controller = new AbortController();
    controller.abort("user stop");

    const run = createTestRunner(model).run(new Agent({ name: "Assistant" }), "hi", {
      signal: controller.signal,
    });

    await expect(run).rejects.toBeInstanceOf(RunCancelledError);
    await expect(run).rejects.toThrow("Run cancelled: user stop");
    expect(model.callCount).toBe(0);
  });

  it("cancels an in-flight model call", async () => {
    const model = new MockModelClient();
    model.mock().returns("late").withDelay(5_000).register();
    const controller = new AbortController();

    const run = createTestRunner(model).run(new Agent({ name: "Assistant" }), "hi", {
      signal: controller.signal,
    });
    setTimeout(() => controller.abort("user stop"), 10);

    await expect(run).rejects.toThrow("Run cancelled: user stop");
  });

  it("ends the trace once when the turn limit stops the run", async () => {
    let ended = 0;
    const recorder: TraceRecorder = {
      onEvent: () => undefined,
      onTraceEnd: () => {
        ended++;
      },
    };
    const model = new MockModelClient();
    model.mock().returnsToolCall("echo", { message: "again" }).register();
    const runner = createTestRunner(model, { traceRecorders: [recorder] });

    const run = runner.run(new Agent({ name: "Looper", tools: [echoTool] }), "go", { maxTurns: 1 });

    await expect(run).rejects.toBeInstanceOf(TurnLimitExceeded);
    expect(ended).toBe(1);
  });

  it("ends the trace once when a run is cancelled mid-call", async () => {
    let ended = 0;
    const recorder: TraceRecorder = {
      onEvent: () => undefined,
      onTraceEnd: () => {
        ended++;
      },
    };
    const model = new MockModelClient();
    model.mock().returns("late").withDelay(5_000).register();
    const controller = new AbortController();
    const runner = createTestRunner(model, { traceRecorders: [recorder] });

    const run = runner.run(new Agent({ name: "Assistant" }), "hi", { signal: controller.signal });
    setTimeout(() => controller.abort("user stop"), 10);

    await expect(run).rejects.toBeInstanceOf(RunCancelledError);
    expect(ended).toBe(1);
  });

  it("fires run hooks before agent hooks and survives throwing hooks", async () => {
    const events: string[] = [];
    const runHooks: AgentHooks = {
      onStart: (_ctx, agent) => {
        events.push(`run start ${agent.name}`);
      },
      onHandoff: (_ctx, agent, source) => {
        events.push(`run handoff ${source.name} -> ${agent.name}`);
      },
      onToolStart: (_ctx, _agent, tool) => {
        events.push(`run tool start ${tool.name}`);
      },
      onToolEnd: (_ctx, _agent, tool, output) => {
        events.push(`run tool end ${tool.name} ${output}`);
      },
      onEnd: (_ctx, agent, output) => {
        events.push(`run end ${agent.name} ${output}`);
      },
    };
    const brokenHooks: AgentHooks = {
      onStart: () => {
        throw new Error("hook bug");
      },
    };
    const worker = new Agent({
      name: "Worker",
      tools: [echoTool],
      hooks: {
        onStart: () => {
          events.push("agent start Worker");
        },
        onHandoff: (_ctx, _agent, source) => {
          events.push(`agent handoff from ${source.name}`);
        },
      },
    });
    const triage = new Agent({ name: "Triage", handoffs: [worker] });
    const model = new MockModelClient();
    model.mock().forAgent("Triage").returnsHandoff("Worker").register();
    model.mock().forAgent("Worker").onTurn(2).returnsToolCall("echo", { message: "x" }).register();
    model.mock().forAgent("Worker").onTurn(3).returns("done").register();

    await createTestRunner(model, { hooks: [runHooks, brokenHooks] }).run(triage, "go");

    expect(events).toEqual([
      "run start Triage",
      "run handoff Triage -> Worker",
      "agent handoff from Triage",
      "run start Worker",
      "agent start Worker",
      "run tool start echo",
      "run tool end echo Echo: x",
      "run end Worker done",
    ]);
  });

  it("runs agent tools as nested runs inside the same trace", async () => {
    const database = databaseAgent();
    const orchestrator = new Agent({ name: "Orchestrator", tools: [database.asTool()] });
    const model = new MockModelClient();
    model
      .mock()
      .forAgent("Orchestrator")
      .onTurn(1)
      .returnsToolCall("database_agent", { input: "list tables" }, "outer")
      .register();
    model.mock().forAgent("Database Agent").returns("orders, users").register();
    model.mock().forAgent("Orchestrator").onTurn(2).returns("Found: orders, users").register();

    const result = await createTestRunner(model).run(orchestrator, "What is in the database?");

    expect(result.finalOutput).toBe("Found: orders, users");
    expect(result.lastAgent).toBe(orchestrator);
    expect(result.newItems.map((item) => item.type)).toEqual([
      "tool_call",
      "tool_result",
      "assistant_message",
    ]);
    const toolResult = result.newItems[1];
    expect(toolResult?.type === "tool_result" && toolResult.output).toBe("orders, users");
    expect(model.requests[1]?.items).toEqual([{ type: "user_message", content: "list tables" }]);

    const nested = filterByDepth(result.trace?.getEvents() ?? [], 1);
    expect(nested.map((event) => event.type)).toEqual([
      "agent_start",
      "model_call_start",
      "model_call_end",
      "agent_end",
    ]);
    expect(nested.every((event) => event.parentCallId === "outer")).toBe(true);
    expect(nested.every((event) => event.agentName === "Database Agent")).toBe(true);
  });

  it("reports a failed nested run as a tool failure", async () => {
    const looper = new Agent({ name: "Looper", tools: [echoTool] });
    const orchestrator = new Agent({ name: "Orchestrator", tools: [looper.asTool()] });
    const model = new MockModelClient();
    model.mock().forAgent("Looper").returnsToolCall("echo", { message: "again" }).register();
    model
      .mock()
      .forAgent("Orchestrator")
      .onTurn(1)
      .returnsToolCall("looper", { input: "spin" }, "outer")
      .register();
    model.mock().forAgent("Orchestrator").onTurn(2).returns("gave up").register();

    const result = await createTestRunner(model).run(orchestrator, "go", { maxTurns: 2 });

    expect(result.finalOutput).toBe("gave up");
    expect(result.newItems[1]).toEqual({
      type: "tool_result",
      agent: "Orchestrator",
      callId: "outer",
      name: "looper",
      status: "error",
      output: "Error: Tool 'looper' failed: Run exceeded the maximum of 2 turns",
      errorKind: "execution",
    });
  });

  it("passes the context payload to instructions and tools", async () => {
    interface Session {
      userId: string;
    }
    const noArgs = z.object({});
    const whoami = createFunctionTool<z.infer<typeof noArgs>, Session>({
      name: "whoami",
      description: "Returns the current user",
      parameters: noArgs,
      execute: (_args, ctx) => ctx.context?.userId ?? "anonymous",
    });
    const agent = new Agent<Session>({
      name: "Assistant",
      instructions: (ctx) => `You are talking to ${ctx.context?.userId ?? "nobody"}.`,
      tools: [whoami],
    });
    const model = new MockModelClient();
    model.mock().onTurn(1).returnsToolCall("whoami", {}).register();
    model.mock().onTurn(2).returns("ok").register();

    const result = await createTestRunner<Session>(model).run(agent, "who am I?", {
      context: { userId: "u-42" },
    });

    expect(model.requests[0]?.instructions).toBe("You are talking to u-42.");
    const toolResult = result.newItems[1];
    expect(toolResult?.type === "tool_result" && toolResult.output).toBe("u-42");
  });

  it("adds up token usage across turns", async () => {
    const model = new MockModelClient();
    const usage = { inputTokens: 10, outputTokens: 5, totalTokens: 15 };
    model.mock().onTurn(1).returnsToolCall("echo", { message: "x" }).withUsage(usage).register();
    model.mock().onTurn(2).returns("done").withUsage(usage).register();

    const result = await createTestRunner(model).run(
      new Agent({ name: "Echoer", tools: [echoTool] }),
      "go",
    );

    expect(result.usage).toEqual({
      requests: 2,
      inputTokens: 20,
      outputTokens: 10,
      totalTokens: 30,
    });
  });

  it("counts nested agent-tool calls toward the caller's usage", async () => {
    const usage = { inputTokens: 10, outputTokens: 5, totalTokens: 15 };
    const orchestrator = new Agent({ name: "Orchestrator", tools: [databaseAgent().asTool()] });
    const model = new MockModelClient();
    model
      .mock()
      .forAgent("Orchestrator")
      .onTurn(1)
      .returnsToolCall("database_agent", { input: "list tables" })
      .withUsage(usage)
      .register();
    model.mock().forAgent("Database Agent").returns("orders, users").withUsage(usage).register();
    model.mock().forAgent("Orchestrator").onTurn(2).returns("done").withUsage(usage).register();

    const result = await createTestRunner(model).run(orchestrator, "go");

    expect(result.usage).toEqual({
      requests: 3,
      inputTokens: 30,
      outputTokens: 15,
      totalTokens: 45,
    });
  });

  it("counts the calls of a failed nested run toward the caller", async () => {
    const usage = { inputTokens: 10, outputTokens: 5, totalTokens: 15 };
    const looper = new Agent({ name: "Looper", tools: [echoTool] });
    const orchestrator = new Agent({ name: "Orchestrator", tools: [looper.asTool()] });
    const model = new MockModelClient();
    model
      .mock()
      .forAgent("Looper")
      .returnsToolCall("echo", { message: "again" })
      .withUsage(usage)
      .register();
    model
      .mock()
      .forAgent("Orchestrator")
      .onTurn(1)
      .returnsToolCall("looper", { input: "spin" })
      .withUsage(usage)
      .register();
    model.mock().forAgent("Orchestrator").onTurn(2).returns("gave up").withUsage(usage).register();

    const result = await createTestRunner(model).run(orchestrator, "go", { maxTurns: 2 });

    expect(result.usage.requests).toBe(4);
    expect(result.usage.totalTokens).toBe(60);
  });

  it("estimates cost when given per-1k pricing", async () => {
    const model = new MockModelClient();
    model
      .mock()
      .returns("ok")
      .withUsage({ inputTokens: 1200, outputTokens: 300, totalTokens: 1500 })
      .register();

    const runner = createTestRunner(model, { pricing: DEFAULT_TOKEN_PRICING });
    const result = await runner.run(new Agent({ name: "A" }), "hi");

    expect(result.usage.cost).toEqual({ inputCost: 0.012, outputCost: 0.009, totalCost: 0.021 });
  });

  it("leaves cost out of usage without pricing", async () => {
    const model = new MockModelClient();
    model
      .mock()
      .returns("ok")
      .withUsage({ inputTokens: 10, outputTokens: 5, totalTokens: 15 })
      .register();

    const result = await createTestRunner(model).run(new Agent({ name: "A" }), "hi");

    expect(result.usage.cost).toBeUndefined();
  });

  it("hands hooks and instructions a view that cannot change the run", async () => {
    const seen: string[] = [];
    const agent = new Agent({
      name: "Assistant",
      instructions: (ctx) => `Turn ${ctx.turn}, ${ctx.usage.requests} calls so far.`,
      hooks: {
        onStart: (ctx) => {
          seen.push(`append:${"append" in ctx} switchAgent:${"switchAgent" in ctx}`);
        },
        onEnd: (ctx) => {
          seen.push(`items:${ctx.newItems.length} calls:${ctx.usage.requests}`);
        },
      },
    });
    const model = new MockModelClient();
    model.mock().returns("ok").register();

    await createTestRunner(model).run(agent, "hi");

    expect(model.requests[0]?.instructions).toBe("Turn 1, 0 calls so far.");
    expect(seen).toEqual(["append:false switchAgent:false", "items:1 calls:1"]);
  });

  it("prefers the agent's model name over the runner's", async () => {
    const model = new MockModelClient();
    model.mock().returns("ok").register();
    const runner = createTestRunner(model, { modelName: "default-model" });

    await runner.run(new Agent({ name: "A" }), "hi");
    await runner.run(new Agent({ name: "B", model: "special-model" }), "hi");

    expect(model.requests.map((request) => request.model)).toEqual([
      "default-model",
      "special-model",
    ]);
  });

  it("leaves the trace off the result when tracing is disabled", async () => {
    const model = new MockModelClient();
    model.mock().returns("ok").register();

    const result = await createTestRunner(model).run(new Agent({ name: "A" }), "hi", {
      tracingDisabled: true,
    });

    expect(result.trace).toBeUndefined();
  });

  it("resolves tryRun with a classified failure", async () => {
    const model = new MockModelClient();
    model.mock().returnsToolCall("echo", { message: "again" }).register();

    const outcome = await createTestRunner(model).tryRun(
      new Agent({ name: "Looper", tools: [echoTool] }),
      "loop",
      { maxTurns: 1 },
    );

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.failure.kind).toBe("turn_limit");
    expect(!outcome.ok && outcome.failure.agentName).toBe("Looper");
  });

  it("rejects a non-positive maxTurns", () => {
    expect(
      () => new Runner({ model: new MockModelClient(), maxTurns: 0, logger: silentLogger() }),
    ).toThrow(DefinitionError);
  });
});
