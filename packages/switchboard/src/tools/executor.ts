import type { ILogObj, Logger } from "tslog";
import type { ZodError } from "zod";
import { runAgentTool } from "../agent/agent-tool.js";
import type { Agent } from "../agent/agent.js";
import { abortReason, guard } from "../core/abort.js";
import {
  isAbortError,
  safeObserve,
  ToolAbortedError,
  ToolExecutionError,
  type ToolFailureKind,
  ToolTimeoutError,
  UnknownToolError,
  ValidationError,
} from "../core/errors.js";
import type { RunInput } from "../core/items.js";
import { createLogger } from "../logging/logger.js";
import type { RunResult } from "../run/result.js";
import { describeIssues, ToolErrorFormatter } from "./error-formatter.js";
import type { ToolRegistry } from "./registry.js";
import type { Tool, ToolContext, ToolOutput } from "./tool.js";

export interface ToolCallRequest {
  callId: string;
  name: string;
  /** Raw JSON argument text. */
  arguments: string;
}

export type ToolFailure = ValidationError | ToolExecutionError | ToolAbortedError | UnknownToolError;

interface InvocationBase {
  callId: string;
  toolName: string;
  /** Text handed back to the model. */
  output: string;
  durationMs: number;
}

export interface ToolInvocationSuccess extends InvocationBase {
  status: "success";
}

export interface ToolInvocationFailure extends InvocationBase {
  status: "error";
  errorKind: ToolFailureKind;
  error: ToolFailure;
}

export type ToolInvocationResult = ToolInvocationSuccess | ToolInvocationFailure;

/** What a call runs against: the run's payload, the calling agent and the nested-run hook. */
export interface ToolCallScope<TContext = unknown> {
  context: TContext | undefined;
  agent: Agent<TContext>;
  signal?: AbortSignal;
  runAgent(
    agent: Agent<TContext>,
    input: RunInput,
    options: { callId: string; signal: AbortSignal },
  ): Promise<RunResult<TContext>>;
}

/** Notified around every call, unknown tools included (then `tool` is undefined). */
export interface ToolInvocationObserver<TContext = unknown> {
  onToolStart?(call: ToolCallRequest, tool: Tool<TContext> | undefined): void | Promise<void>;
  onToolEnd?(
    call: ToolCallRequest,
    tool: Tool<TContext> | undefined,
    result: ToolInvocationResult,
  ): void | Promise<void>;
}

export interface ToolExecutorOptions<TContext = unknown> {
  logger?: Logger<ILogObj>;
  /** Applies to tools without their own `timeoutMs`. */
  defaultTimeoutMs?: number;
  observer?: ToolInvocationObserver<TContext>;
  errorFormatter?: ToolErrorFormatter;
  /** Hand-off tool names, listed when the model asks for a tool that does not exist. */
  handoffTools?: readonly string[];
}

type BoundCall<TContext> =
  | { ok: true; run: (ctx: ToolContext<TContext>) => Promise<ToolOutput> }
  | { ok: false; error: ZodError };

type ParsedArguments = { ok: true; value: unknown } | { ok: false; message: string };

function parseArguments(raw: string): ParsedArguments {
  if (raw.trim() === "") {
    return { ok: true, value: {} };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

function stringifyOutput(output: ToolOutput): string {
  if (typeof output === "string") return output;
  if (output === undefined || output === null) return "";
  try {
    return JSON.stringify(output);
  } catch {
    return String(output);
  }
}

/**
 * Runs tool calls. Every failure mode (unknown tool, unparsable or invalid
 * arguments, thrown errors, timeouts, aborts) is returned as data so the
 * engine can hand it to the model as an observation.
 */
export class ToolExecutor<TContext = unknown> {
  private readonly logger: Logger<ILogObj>;
  private readonly formatter: ToolErrorFormatter;

  constructor(
    private readonly registry: ToolRegistry<TContext>,
    private readonly options: ToolExecutorOptions<TContext> = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "switchboard:tools" });
    this.formatter = options.errorFormatter ?? new ToolErrorFormatter();
  }

  /** Runs the calls concurrently; results keep the order of `calls`. */
  invokeAll(
    calls: readonly ToolCallRequest[],
    scope: ToolCallScope<TContext>,
  ): Promise<ToolInvocationResult[]> {
    return Promise.all(calls.map((call) => this.invoke(call, scope)));
  }

  async invoke(call: ToolCallRequest, scope: ToolCallScope<TContext>): Promise<ToolInvocationResult> {
    const tool = this.registry.get(call.name);
    const observer = this.options.observer;

    await safeObserve(() => observer?.onToolStart?.(call, tool), this.logger, "onToolStart");
    const result = await this.execute(call, tool, scope);
    await safeObserve(() => observer?.onToolEnd?.(call, tool, result), this.logger, "onToolEnd");
    return result;
  }

  private async execute(
    call: ToolCallRequest,
    tool: Tool<TContext> | undefined,
    scope: ToolCallScope<TContext>,
  ): Promise<ToolInvocationResult> {
    const startTime = Date.now();
    const fail = (error: ToolFailure, output: string): ToolInvocationFailure => ({
      status: "error",
      callId: call.callId,
      toolName: call.name,
      output,
      errorKind: error.kind,
      error,
      durationMs: Date.now() - startTime,
    });

    this.logger.debug("Executing tool", { tool: call.name, callId: call.callId });

    if (!tool) {
      const available = this.registry.getNames();
      this.logger.warn("Model requested an unknown tool", { tool: call.name, available });
      return fail(
        new UnknownToolError(call.name, available),
        this.formatter.formatUnknownTool(call.name, available, this.options.handoffTools),
      );
    }

    const parsed = parseArguments(call.arguments);
    if (!parsed.ok) {
      this.logger.warn("Tool arguments are not valid JSON", { tool: call.name });
      return fail(
        new ValidationError(`Invalid JSON arguments for '${call.name}': ${parsed.message}`, {
          toolName: call.name,
        }),
        this.formatter.formatParseError(call.name, parsed.message),
      );
    }

    const bound = this.bind(tool, parsed.value);
    if (!bound.ok) {
      const issues = describeIssues(bound.error);
      this.logger.warn("Tool argument validation failed", { tool: call.name, issues });
      return fail(
        new ValidationError(`Invalid arguments for '${call.name}'`, {
          toolName: call.name,
          issues,
          cause: bound.error,
        }),
        this.formatter.formatValidationError(call.name, bound.error, tool.parameters),
      );
    }

    const controller = new AbortController();
    const timeoutMs = tool.timeoutMs ?? this.options.defaultTimeoutMs;
    const ctx: ToolContext<TContext> = {
      context: scope.context,
      agent: scope.agent,
      callId: call.callId,
      signal: controller.signal,
      logger: this.logger,
      runAgent: (agent, input) =>
        scope.runAgent(agent, input, { callId: call.callId, signal: controller.signal }),
    };

    try {
      const output = await guard(bound.run(ctx), {
        controller,
        signal: scope.signal,
        timeoutMs,
        timeoutError: () => new ToolTimeoutError(tool.name, timeoutMs ?? 0),
        abortError: () => new ToolAbortedError(tool.name, abortReason(scope.signal)),
      });
      const durationMs = Date.now() - startTime;
      this.logger.info("Tool executed", { tool: tool.name, callId: call.callId, durationMs });
      return {
        status: "success",
        callId: call.callId,
        toolName: call.name,
        output: stringifyOutput(output),
        durationMs,
      };
    } catch (error) {
      const failure = this.classify(error, tool.name, scope.signal);
      this.logger.error("Tool failed", { tool: tool.name, kind: failure.kind, error: failure.message });
      return fail(failure, this.formatter.formatExecutionError(tool.name, failure.message));
    }
  }

  private bind(tool: Tool<TContext>, value: unknown): BoundCall<TContext> {
    if (tool.kind === "agent") {
      const parsed = tool.parameters.safeParse(value);
      if (!parsed.success) return { ok: false, error: parsed.error };
      const input = parsed.data.input;
      return { ok: true, run: (ctx) => runAgentTool(tool, input, ctx) };
    }

    const parsed = tool.parameters.safeParse(value);
    if (!parsed.success) return { ok: false, error: parsed.error };
    const args = parsed.data;
    return { ok: true, run: async (ctx) => tool.execute(args, ctx) };
  }

  private classify(error: unknown, toolName: string, runSignal: AbortSignal | undefined): ToolFailure {
    if (
      error instanceof ToolTimeoutError ||
      error instanceof ToolAbortedError ||
      error instanceof ValidationError
    ) {
      return error;
    }
    if (runSignal?.aborted && isAbortError(error)) {
      return new ToolAbortedError(toolName, abortReason(runSignal));
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ToolExecutionError(toolName, message, error);
  }
}
