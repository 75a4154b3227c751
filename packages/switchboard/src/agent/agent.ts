import { DefinitionError, ToolRegistrationError } from "../core/errors.js";
import type { HandoffSchema, ToolSchema } from "../core/model.js";
import type { RunContextView } from "../run/context.js";
import { ToolExecutor, type ToolExecutorOptions } from "../tools/executor.js";
import { ToolRegistry } from "../tools/registry.js";
import type { AgentTool, Tool } from "../tools/tool.js";
import { type AgentToolOptions, createAgentTool } from "./agent-tool.js";
import { handoffToolName, toHandoffSchemas } from "./handoff.js";
import { type AgentHooks, normalizeHooks } from "./hooks.js";

export type InstructionsFunction<TContext> = (
  ctx: RunContextView<TContext>,
  agent: Agent<TContext>,
) => string | Promise<string>;

/** Static text, or a function of the run context resolved before every model call. */
export type Instructions<TContext> = string | InstructionsFunction<TContext>;

/**
 * A hand-off target. The function form resolves lazily, which lets two agents
 * hand off to each other even though agents are immutable.
 */
export type AgentRef<TContext> = Agent<TContext> | (() => Agent<TContext>);

export interface AgentConfig<TContext = unknown> {
  /** Unique within a run; shown to the model in hand-off and agent-tool names. */
  name: string;
  instructions?: Instructions<TContext>;
  tools?: readonly Tool<TContext>[];
  handoffs?: readonly AgentRef<TContext>[];
  hooks?: AgentHooks<TContext> | readonly AgentHooks<TContext>[];
  /** Tells other agents when to hand off to (or call) this one. */
  handoffDescription?: string;
  /** Model name for this agent, overriding the runner's. */
  model?: string;
}

/**
 * An immutable agent definition: identity, instructions, tools, hand-off targets
 * and hooks. Use {@link Agent.clone} to derive a variant.
 *
 * @example
 * ```typescript
 * const clickhouse = new Agent({
 *   name: "ClickHouse Agent",
 *   instructions: "Answer questions about the analytics database.",
 *   tools: [showTables],
 * });
 * const triage = new Agent({
 *   name: "Triage",
 *   instructions: "Route database questions to the ClickHouse agent.",
 *   handoffs: [clickhouse],
 * });
 * ```
 */
export class Agent<TContext = unknown> {
  readonly name: string;
  readonly instructions: Instructions<TContext>;
  readonly tools: readonly Tool<TContext>[];
  readonly hooks: readonly AgentHooks<TContext>[];
  readonly handoffDescription?: string;
  readonly model?: string;

  private readonly handoffRefs: readonly AgentRef<TContext>[];
  private readonly registry: ToolRegistry<TContext>;

  constructor(config: AgentConfig<TContext>) {
    if (!config.name.trim()) {
      throw new DefinitionError("Agent name must not be empty");
    }

    this.name = config.name;
    this.instructions = config.instructions ?? "";
    this.registry = ToolRegistry.from(config.tools ?? []);
    this.tools = Object.freeze(this.registry.getAll());
    this.hooks = Object.freeze(normalizeHooks(config.hooks));
    this.handoffRefs = Object.freeze([...(config.handoffs ?? [])]);
    this.handoffDescription = config.handoffDescription;
    this.model = config.model;

    // Lazy references are checked when first resolved.
    if (this.handoffRefs.every((ref) => ref instanceof Agent)) {
      this.checkHandoffNames(this.handoffs);
    }

    Object.freeze(this);
  }

  /** Eligible hand-off targets, lazy references resolved. */
  get handoffs(): readonly Agent<TContext>[] {
    return this.handoffRefs.map((ref) => (ref instanceof Agent ? ref : ref()));
  }

  getTool(name: string): Tool<TContext> | undefined {
    return this.registry.get(name);
  }

  findHandoff(agentName: string): Agent<TContext> | undefined {
    return this.handoffs.find((target) => target.name === agentName);
  }

  async resolveInstructions(ctx: RunContextView<TContext>): Promise<string> {
    return typeof this.instructions === "string"
      ? this.instructions
      : await this.instructions(ctx, this);
  }

  toolSchemas(): ToolSchema[] {
    return this.registry.toSchemas();
  }

  handoffSchemas(): HandoffSchema[] {
    const targets = this.handoffs;
    this.checkHandoffNames(targets);
    return toHandoffSchemas(this);
  }

  createToolExecutor(options: ToolExecutorOptions<TContext> = {}): ToolExecutor<TContext> {
    return new ToolExecutor(this.registry, {
      handoffTools: this.handoffs.map((target) => handoffToolName(target.name)),
      ...options,
    });
  }

  /** A new agent with `overrides` applied; this one is left untouched. */
  clone(overrides: Partial<AgentConfig<TContext>> = {}): Agent<TContext> {
    return new Agent<TContext>({
      name: this.name,
      instructions: this.instructions,
      tools: this.tools,
      handoffs: this.handoffRefs,
      hooks: this.hooks,
      handoffDescription: this.handoffDescription,
      model: this.model,
      ...overrides,
    });
  }

  /**
   * Exposes this agent as a tool: calling it runs the agent as a nested sub-run
   * on the `input` text and returns the nested final output.
   */
  asTool(options?: AgentToolOptions<TContext>): AgentTool<TContext> {
    return createAgentTool(this, options);
  }

  private checkHandoffNames(targets: readonly Agent<TContext>[]): void {
    const seen = new Set<string>();
    for (const target of targets) {
      const toolName = handoffToolName(target.name);
      if (seen.has(toolName) || this.registry.has(toolName)) {
        throw new ToolRegistrationError(
          toolName,
          `Agent '${this.name}' has more than one tool or hand-off named '${toolName}'`,
        );
      }
      seen.add(toolName);
    }
  }
}
