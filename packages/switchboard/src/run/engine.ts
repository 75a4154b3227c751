/**
 * The step engine: a state machine that drives one run from the first model
 * call to a terminal state.
 *
 * ```
 * AWAITING_MODEL ──▶ MODEL_RESPONDED ──▶ DONE
 *       ▲                  │
 *       ├── EXECUTING_TOOLS ◀┤
 *       └── HANDING_OFF ◀────┘
 * ```
 *
 * Any state may move to FAILED. The engine never throws: failures become an
 * `error` item and a FAILED outcome that the runner turns into a rejection.
 *
 * @module run/engine
 */

import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import type { Agent } from "../agent/agent.js";
import type { HookDispatcher } from "../agent/hooks.js";
import { abortReason, guard } from "../core/abort.js";
import {
  HandoffError,
  InternalError,
  ModelInvocationError,
  ModelTimeoutError,
  RunCancelledError,
  type SwitchboardError,
  toRunError,
  TurnLimitExceeded,
} from "../core/errors.js";
import type { RunItem, ToolResultItem } from "../core/items.js";
import type {
  HandoffPart,
  ModelClient,
  ModelRequest,
  ModelResponse,
  ToolCallPart,
} from "../core/model.js";
import { formatModelError, isRetryableError, type ResolvedRetryConfig } from "../core/retry.js";
import type {
  ToolCallScope,
  ToolInvocationObserver,
  ToolInvocationResult,
} from "../tools/executor.js";
import type { TraceEventPayload } from "../tracing/events.js";
import type { Trace } from "../tracing/trace.js";
import type { RunContext } from "./context.js";

export type EngineState =
  | "AWAITING_MODEL"
  | "MODEL_RESPONDED"
  | "EXECUTING_TOOLS"
  | "HANDING_OFF"
  | "DONE"
  | "FAILED";

export type EngineOutcome<TContext> =
  | { state: "DONE"; finalOutput: string; agent: Agent<TContext> }
  | { state: "FAILED"; error: SwitchboardError };

export interface StepEngineOptions<TContext> {
  model: ModelClient;
  context: RunContext<TContext>;
  trace: Trace;
  hooks: HookDispatcher<TContext>;
  logger: Logger<ILogObj>;
  retry: ResolvedRetryConfig;
  maxTurns: number;
  /** Used when the active agent does not name a model. */
  modelName?: string;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  /** 0 for a top-level run. */
  depth: number;
  parentCallId: string | null;
  /** Starts the nested run behind an agent tool. */
  runNested: ToolCallScope<TContext>["runAgent"];
}

export class StepEngine<TContext = unknown> {
  private current: EngineState = "AWAITING_MODEL";
  private readonly visited: EngineState[] = ["AWAITING_MODEL"];
  private outcome?: EngineOutcome<TContext>;
  private agentStartPending = true;

  private response?: ModelResponse;
  private pendingCalls: ToolCallPart[] = [];
  private pendingHandoff?: HandoffPart;

  constructor(private readonly options: StepEngineOptions<TContext>) {}

  get state(): EngineState {
    return this.current;
  }

  /** Every state entered so far, in order. */
  get history(): readonly EngineState[] {
    return this.visited.slice();
  }

  /** Steps until a terminal state is reached. */
  async run(): Promise<EngineOutcome<TContext>> {
    let outcome = this.outcome;
    while (!outcome) {
      await this.step();
      outcome = this.outcome;
    }
    return outcome;
  }

  /** Performs the work of the current state and moves to the next one. */
  async step(): Promise<EngineState> {
    if (this.outcome) return this.current;

    try {
      switch (this.current) {
        case "AWAITING_MODEL":
          await this.callModel();
          break;
        case "MODEL_RESPONDED":
          await this.interpretResponse();
          break;
        case "EXECUTING_TOOLS":
          await this.executeTools();
          break;
        case "HANDING_OFF":
          await this.handOff();
          break;
        case "DONE":
        case "FAILED":
          break;
      }
    } catch (error) {
      this.fail(error);
    }
    return this.current;
  }

  private async callModel(): Promise<void> {
    const { context: ctx, hooks, maxTurns } = this.options;
    const agent = ctx.activeAgent;

    this.throwIfCancelled();
    if (ctx.turn >= maxTurns) {
      throw new TurnLimitExceeded(maxTurns, agent.name);
    }

    const turn = ctx.beginTurn();
    if (this.agentStartPending) {
      this.agentStartPending = false;
      this.emit(agent, { type: "agent_start", turn });
      await hooks.agentStart(ctx.view, agent);
    }

    const request: ModelRequest = {
      model: agent.model ?? this.options.modelName,
      agentName: agent.name,
      instructions: await agent.resolveInstructions(ctx.view),
      items: ctx.items,
      tools: agent.toolSchemas(),
      handoffs: agent.handoffSchemas(),
      turn,
    };

    this.emit(agent, {
      type: "model_call_start",
      turn,
      model: request.model,
      itemCount: request.items.length,
    });

    let response: ModelResponse;
    try {
      response = await this.invokeModel(request);
    } catch (error) {
      this.emit(agent, {
        type: "model_call_end",
        turn,
        toolCallCount: 0,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    ctx.usage.add(response.usage);
    const handoff = response.output.find((part) => part.type === "handoff");
    this.emit(agent, {
      type: "model_call_end",
      turn,
      usage: response.usage,
      toolCallCount: response.output.filter((part) => part.type === "tool_call").length,
      handoffTarget: handoff?.type === "handoff" ? handoff.target : undefined,
    });

    this.response = response;
    this.transition("MODEL_RESPONDED");
  }

  private async interpretResponse(): Promise<void> {
    const { context: ctx, hooks, logger } = this.options;
    const agent = ctx.activeAgent;
    const response = this.response;
    this.response = undefined;
    if (!response) {
      throw new InternalError("Engine reached MODEL_RESPONDED without a model response");
    }

    const text = response.output
      .flatMap((part) => (part.type === "text" ? [part.text] : []))
      .join("");
    const toolCalls = response.output.filter(
      (part): part is ToolCallPart => part.type === "tool_call",
    );
    const handoffs = response.output.filter(
      (part): part is HandoffPart => part.type === "handoff",
    );

    const [handoff] = handoffs;
    if (handoff) {
      if (toolCalls.length > 0) {
        logger.warn("Discarding tool calls requested together with a hand-off", {
          agent: agent.name,
          handoffTarget: handoff.target,
          discarded: toolCalls.map((call) => call.name),
        });
      }
      if (handoffs.length > 1) {
        logger.warn("Several hand-offs requested; using the first", {
          agent: agent.name,
          targets: handoffs.map((part) => part.target),
        });
      }
      if (text) ctx.append({ type: "assistant_message", agent: agent.name, content: text });
      this.pendingHandoff = handoff;
      this.transition("HANDING_OFF");
      return;
    }

    if (toolCalls.length > 0) {
      if (text) ctx.append({ type: "assistant_message", agent: agent.name, content: text });
      this.pendingCalls = toolCalls;
      this.transition("EXECUTING_TOOLS");
      return;
    }

    ctx.append({ type: "assistant_message", agent: agent.name, content: text });
    this.emit(agent, { type: "agent_end", output: text });
    await hooks.agentEnd(ctx.view, agent, text);

    logger.debug("Run finished", { agent: agent.name, turns: ctx.turn });
    this.outcome = { state: "DONE", finalOutput: text, agent };
    this.transition("DONE");
  }

  private async executeTools(): Promise<void> {
    const { context: ctx, logger } = this.options;
    const agent = ctx.activeAgent;
    const calls = this.pendingCalls;
    this.pendingCalls = [];

    ctx.append(
      ...calls.map(
        (call): RunItem => ({
          type: "tool_call",
          agent: agent.name,
          callId: call.callId,
          name: call.name,
          arguments: call.arguments,
        }),
      ),
    );

    const executor = agent.createToolExecutor({
      logger,
      defaultTimeoutMs: this.options.toolTimeoutMs,
      observer: this.toolObserver(agent),
    });
    const results = await executor.invokeAll(
      calls.map(({ callId, name, arguments: args }) => ({ callId, name, arguments: args })),
      {
        context: ctx.context,
        agent,
        signal: ctx.signal,
        runAgent: this.options.runNested,
      },
    );

    ctx.append(...results.map((result) => toResultItem(agent.name, result)));
    this.transition("AWAITING_MODEL");
  }

  private async handOff(): Promise<void> {
    const { context: ctx, hooks, logger } = this.options;
    const part = this.pendingHandoff;
    this.pendingHandoff = undefined;
    if (!part) {
      throw new InternalError("Engine reached HANDING_OFF without a hand-off request");
    }

    const from = ctx.activeAgent;
    const target = from.findHandoff(part.target);
    if (!target) {
      throw new HandoffError(
        from.name,
        part.target,
        from.handoffs.map((agent) => agent.name),
      );
    }

    logger.info("Handing off", { from: from.name, to: target.name });
    this.emit(from, { type: "handoff", callId: part.callId, from: from.name, to: target.name });
    await hooks.handoff(ctx.view, from, target);

    ctx.append({
      type: "handoff",
      callId: part.callId,
      toolName: part.toolName,
      from: from.name,
      to: target.name,
      ...(part.context !== undefined && { context: part.context }),
    });
    ctx.switchAgent(target);
    this.agentStartPending = true;
    this.transition("AWAITING_MODEL");
  }

  /**
   * One model call with the retry policy applied. Every attempt gets its own
   * timeout; the run's signal stops both the attempt and the backoff.
   */
  private async invokeModel(request: ModelRequest): Promise<ModelResponse> {
    const { retry, logger, context: ctx } = this.options;
    let attempts = 0;

    const attempt = async (): Promise<ModelResponse> => {
      attempts++;
      return this.invokeModelOnce(request);
    };

    try {
      if (!retry.enabled) {
        return await attempt();
      }
      return await pRetry(attempt, {
        retries: retry.retries,
        minTimeout: retry.minTimeout,
        maxTimeout: retry.maxTimeout,
        factor: retry.factor,
        randomize: retry.randomize,
        signal: ctx.signal,
        onFailedAttempt: (context) => {
          const { error, attemptNumber, retriesLeft } = context;
          logger.warn(`Model call attempt ${attemptNumber} failed, ${retriesLeft} retries left`, {
            agent: request.agentName,
            error: error.message,
          });
        },
        shouldRetry: (context) => {
          if (ctx.signal?.aborted) return false;
          const retryable = retry.shouldRetry
            ? retry.shouldRetry(context.error)
            : isRetryableError(context.error);
          if (retryable) retry.onRetry?.(context.error, context.attemptNumber);
          return retryable;
        },
      });
    } catch (error) {
      if (ctx.signal?.aborted) {
        throw new RunCancelledError(abortReason(ctx.signal), request.agentName);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      if (retry.enabled) retry.onRetriesExhausted?.(cause, attempts);
      logger.error("Model invocation failed", {
        agent: request.agentName,
        attempts,
        error: cause.message,
      });
      throw new ModelInvocationError(formatModelError(cause), {
        attempts,
        agentName: request.agentName,
        cause,
      });
    }
  }

  private invokeModelOnce(request: ModelRequest): Promise<ModelResponse> {
    const { model, modelTimeoutMs, context: ctx } = this.options;
    const controller = new AbortController();
    return guard(model.invoke(request, { signal: controller.signal }), {
      controller,
      signal: ctx.signal,
      timeoutMs: modelTimeoutMs,
      timeoutError: () => new ModelTimeoutError(modelTimeoutMs ?? 0, request.agentName),
      abortError: () => new RunCancelledError(abortReason(ctx.signal), request.agentName),
    });
  }

  private toolObserver(agent: Agent<TContext>): ToolInvocationObserver<TContext> {
    const { context: ctx, hooks } = this.options;
    return {
      onToolStart: async (call, tool) => {
        this.emit(agent, {
          type: "tool_start",
          callId: call.callId,
          toolName: call.name,
          arguments: call.arguments,
        });
        if (tool) await hooks.toolStart(ctx.view, agent, tool);
      },
      onToolEnd: async (call, tool, result) => {
        this.emit(agent, {
          type: "tool_end",
          callId: call.callId,
          toolName: call.name,
          status: result.status,
          output: result.output,
          errorKind: result.status === "error" ? result.errorKind : undefined,
          durationMs: result.durationMs,
        });
        if (tool) await hooks.toolEnd(ctx.view, agent, tool, result.output);
      },
    };
  }

  private throwIfCancelled(): void {
    const { signal } = this.options.context;
    if (signal?.aborted) {
      throw new RunCancelledError(abortReason(signal), this.options.context.activeAgent.name);
    }
  }

  private fail(error: unknown): void {
    const { context: ctx, logger } = this.options;
    const agentName = ctx.activeAgent.name;
    const failure = toRunError(error, agentName);

    logger.error("Run failed", { agent: agentName, kind: failure.kind, error: failure.message });
    ctx.append({ type: "error", agent: agentName, kind: failure.kind, message: failure.message });
    this.outcome = { state: "FAILED", error: failure };
    this.transition("FAILED");
  }

  private transition(next: EngineState): void {
    this.options.logger.trace("Engine transition", { from: this.current, to: next });
    this.current = next;
    this.visited.push(next);
  }

  private emit(agent: Agent<TContext>, payload: TraceEventPayload): void {
    this.options.trace.emit({
      ...payload,
      agentName: agent.name,
      depth: this.options.depth,
      parentCallId: this.options.parentCallId,
    });
  }
}

function toResultItem(agent: string, result: ToolInvocationResult): ToolResultItem {
  const item: ToolResultItem = {
    type: "tool_result",
    agent,
    callId: result.callId,
    name: result.toolName,
    status: result.status,
    output: result.output,
  };
  return result.status === "error" ? { ...item, errorKind: result.errorKind } : item;
}
