import type { ILogObj, Logger } from "tslog";
import type { Agent } from "../agent/agent.js";
import { type AgentHooks, HookDispatcher, normalizeHooks } from "../agent/hooks.js";
import { DEFAULT_MAX_TURNS } from "../core/constants.js";
import { DefinitionError, type RunFailure, toRunFailure } from "../core/errors.js";
import { type RunInput, toInputItems } from "../core/items.js";
import type { ModelClient } from "../core/model.js";
import { type ResolvedRetryConfig, type RetryConfig, resolveRetryConfig } from "../core/retry.js";
import type { TokenPricing, Usage } from "../core/usage.js";
import { createLogger } from "../logging/logger.js";
import { createTraceRecordersFromEnv } from "../tracing/recorders.js";
import { Trace, type TraceRecorder } from "../tracing/trace.js";
import { RunContext } from "./context.js";
import { StepEngine } from "./engine.js";
import { RunResult } from "./result.js";

export interface RunnerOptions<TContext = unknown> {
  model: ModelClient;
  /** Default model name; an agent's own `model` takes precedence. */
  modelName?: string;
  logger?: Logger<ILogObj>;
  retry?: RetryConfig;
  /** @default 10 */
  maxTurns?: number;
  /** Per model call, retries apply. */
  modelTimeoutMs?: number;
  /** Per tool call, unless the tool sets its own. */
  toolTimeoutMs?: number;
  /** Defaults to the recorders enabled through the environment. */
  traceRecorders?: readonly TraceRecorder[];
  /** Fire for every agent of every run. */
  hooks?: AgentHooks<TContext> | readonly AgentHooks<TContext>[];
  /** Adds a cost estimate to every usage snapshot. See `DEFAULT_TOKEN_PRICING`. */
  pricing?: TokenPricing;
}

export interface RunConfig<TContext = unknown> {
  /** Passed unchanged to instruction functions, tools and hooks. */
  context?: TContext;
  maxTurns?: number;
  tracingDisabled?: boolean;
  /** Record into this trace instead of creating one; the caller ends it. */
  trace?: Trace;
  traceName?: string;
  traceMetadata?: Record<string, unknown>;
  signal?: AbortSignal;
  /** Added after the runner's hooks, for this run only. */
  hooks?: AgentHooks<TContext> | readonly AgentHooks<TContext>[];
  modelName?: string;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  /** Values for the prompt fields of agents built from definitions. */
  promptValues?: Record<string, string>;
}

export type RunOutcome<TContext = unknown> =
  | { ok: true; result: RunResult<TContext> }
  | { ok: false; failure: RunFailure };

interface Placement {
  trace: Trace;
  depth: number;
  parentCallId: string | null;
  signal?: AbortSignal;
  parentUsage?: Usage;
}

/**
 * Entry point for running agents. A runner holds the model client and the
 * defaults; it keeps no state between runs, so one instance can serve any
 * number of concurrent runs.
 *
 * @example
 * ```typescript
 * const runner = new Runner({ model: new OpenAIChatModel(new OpenAI()), modelName: "gpt-4o-mini" });
 * const result = await runner.run(triage, "list tables", { maxTurns: 5 });
 * console.log(result.finalOutput, result.lastAgent.name);
 * ```
 */
export class Runner<TContext = unknown> {
  private readonly logger: Logger<ILogObj>;
  private readonly retry: ResolvedRetryConfig;
  private readonly maxTurns: number;
  private readonly recorders: readonly TraceRecorder[];
  private readonly hooks: readonly AgentHooks<TContext>[];

  constructor(private readonly options: RunnerOptions<TContext>) {
    this.logger = options.logger ?? createLogger({ name: "switchboard" });
    this.retry = resolveRetryConfig(options.retry);
    this.maxTurns = checkMaxTurns(options.maxTurns ?? DEFAULT_MAX_TURNS);
    this.recorders = options.traceRecorders ?? createTraceRecordersFromEnv();
    this.hooks = normalizeHooks(options.hooks);
  }

  /**
   * Runs `agent` on `input` until it produces a final answer.
   *
   * @throws HandoffError, ModelInvocationError, TurnLimitExceeded or
   *   RunCancelledError; anything unexpected arrives as an InternalError
   */
  async run(
    agent: Agent<TContext>,
    input: RunInput,
    config: RunConfig<TContext> = {},
  ): Promise<RunResult<TContext>> {
    const ownsTrace = config.trace === undefined;
    const trace =
      config.trace ??
      new Trace({
        name: config.traceName,
        recorders: this.recorders,
        disabled: config.tracingDisabled,
        metadata: config.traceMetadata,
        logger: this.logger.getSubLogger({ name: "trace" }),
      });

    trace.start();
    try {
      return await this.execute(agent, input, config, {
        trace,
        depth: 0,
        parentCallId: null,
        signal: config.signal,
      });
    } finally {
      if (ownsTrace) trace.end();
    }
  }

  /** Like {@link Runner.run}, but resolves with a classified failure instead of rejecting. */
  async tryRun(
    agent: Agent<TContext>,
    input: RunInput,
    config?: RunConfig<TContext>,
  ): Promise<RunOutcome<TContext>> {
    try {
      return { ok: true, result: await this.run(agent, input, config) };
    } catch (error) {
      return { ok: false, failure: toRunFailure(error) };
    }
  }

  private async execute(
    agent: Agent<TContext>,
    input: RunInput,
    config: RunConfig<TContext>,
    placement: Placement,
  ): Promise<RunResult<TContext>> {
    const maxTurns = checkMaxTurns(config.maxTurns ?? this.maxTurns);
    const inputItems = toInputItems(input);
    const ctx = new RunContext<TContext>({
      agent,
      input: inputItems,
      context: config.context,
      signal: placement.signal,
      promptValues: config.promptValues,
      parentUsage: placement.parentUsage,
      pricing: this.options.pricing,
    });

    this.logger.debug("Starting run", {
      agent: agent.name,
      depth: placement.depth,
      parentCallId: placement.parentCallId,
      inputItems: inputItems.length,
    });

    const engine = new StepEngine<TContext>({
      model: this.options.model,
      context: ctx,
      trace: placement.trace,
      hooks: new HookDispatcher([...this.hooks, ...normalizeHooks(config.hooks)], this.logger),
      logger: this.logger,
      retry: this.retry,
      maxTurns,
      modelName: config.modelName ?? this.options.modelName,
      modelTimeoutMs: config.modelTimeoutMs ?? this.options.modelTimeoutMs,
      toolTimeoutMs: config.toolTimeoutMs ?? this.options.toolTimeoutMs,
      depth: placement.depth,
      parentCallId: placement.parentCallId,
      runNested: (nested, nestedInput, { callId, signal }) =>
        this.execute(nested, nestedInput, config, {
          trace: placement.trace,
          depth: placement.depth + 1,
          parentCallId: callId,
          signal,
          parentUsage: ctx.usage,
        }),
    });

    const outcome = await engine.run();
    if (outcome.state === "FAILED") {
      throw outcome.error;
    }

    return new RunResult<TContext>({
      finalOutput: outcome.finalOutput,
      inputItems: ctx.inputItems,
      newItems: ctx.newItems,
      lastAgent: outcome.agent,
      usage: ctx.usage.snapshot(),
      turns: ctx.turn,
      trace: placement.trace.disabled ? undefined : placement.trace,
    });
  }
}

function checkMaxTurns(maxTurns: number): number {
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new DefinitionError(`maxTurns must be a positive integer, got ${maxTurns}`);
  }
  return maxTurns;
}
