/**
 * Tools come in two variants behind one tagged union:
 *
 * - `function`: a zod-described function, usually built with {@link createFunctionTool}
 * - `agent`: another agent, run as a nested sub-run (see `Agent.asTool`)
 *
 * @example
 * ```typescript
 * const showTables = createFunctionTool({
 *   name: "show_tables",
 *   description: "Lists the tables of the analytics database",
 *   parameters: z.object({ database: z.string().default("default") }),
 *   execute: async ({ database }) => (await db.tables(database)).join("\n"),
 * });
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import type { ZodType } from "zod";
import type { Agent } from "../agent/agent.js";
import type { RunInput } from "../core/items.js";
import type { RunResult } from "../run/result.js";

/** Whatever a tool returns; non-string values are JSON-encoded for the model. */
export type ToolOutput = string | number | boolean | object | null | undefined;

export interface ToolContext<TContext = unknown> {
  /** The user payload given to `Runner.run`, shared by every tool and agent of the run. */
  context: TContext | undefined;
  /** Agent whose model requested this call. */
  agent: Agent<TContext>;
  callId: string;
  /** Fires on run cancellation and on this call's timeout. */
  signal: AbortSignal;
  logger: Logger<ILogObj>;
  /** Runs another agent as a nested sub-run inside the current trace. */
  runAgent(agent: Agent<TContext>, input: RunInput): Promise<RunResult<TContext>>;
}

interface ToolBase {
  readonly name: string;
  readonly description: string;
  /** Overrides the runner's `toolTimeoutMs` for this tool. */
  readonly timeoutMs?: number;
}

export interface FunctionTool<TArgs = unknown, TContext = unknown> extends ToolBase {
  readonly kind: "function";
  readonly parameters: ZodType<TArgs>;
  execute(args: TArgs, ctx: ToolContext<TContext>): ToolOutput | Promise<ToolOutput>;
}

export interface AgentToolArgs {
  input: string;
}

export type OutputExtractor<TContext = unknown> = (
  result: RunResult<TContext>,
) => string | Promise<string>;

export interface AgentTool<TContext = unknown> extends ToolBase {
  readonly kind: "agent";
  readonly parameters: ZodType<AgentToolArgs>;
  readonly agent: Agent<TContext>;
  customOutputExtractor?(result: RunResult<TContext>): string | Promise<string>;
}

export type Tool<TContext = unknown> = FunctionTool<unknown, TContext> | AgentTool<TContext>;

export interface CreateFunctionToolConfig<TArgs, TContext> {
  name: string;
  description: string;
  parameters: ZodType<TArgs>;
  execute: (args: TArgs, ctx: ToolContext<TContext>) => ToolOutput | Promise<ToolOutput>;
  timeoutMs?: number;
}

/**
 * Builds a function tool whose `execute` arguments are typed from the zod schema.
 */
export function createFunctionTool<TArgs, TContext = unknown>(
  config: CreateFunctionToolConfig<TArgs, TContext>,
): FunctionTool<TArgs, TContext> {
  return Object.freeze({
    kind: "function" as const,
    name: config.name,
    description: config.description,
    parameters: config.parameters,
    timeoutMs: config.timeoutMs,
    execute: config.execute,
  });
}

/** Turns a display name ("ClickHouse Agent") into a valid tool name ("clickhouse_agent"). */
export function toToolName(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || "agent";
}

export function isAgentTool<TContext>(tool: Tool<TContext>): tool is AgentTool<TContext> {
  return tool.kind === "agent";
}
