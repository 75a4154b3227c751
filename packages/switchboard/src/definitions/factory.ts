import type { ILogObj, Logger } from "tslog";
import { Agent } from "../agent/agent.js";
import type { AgentHooks } from "../agent/hooks.js";
import { DefinitionError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import type { RunContextView } from "../run/context.js";
import { ToolRegistry } from "../tools/registry.js";
import type { Tool } from "../tools/tool.js";
import { generateDefaultPromptFields, renderPrompt } from "./prompt.js";
import {
  type AgentDefinition,
  type PromptField,
  parseAgentDefinition,
  parseOrchestratorDefinition,
} from "./schema.js";

export interface AgentFactoryOptions<TContext = unknown> {
  /** Catalogue that `selectedTools` and orchestrator `tools` are looked up in. */
  tools?: readonly Tool<TContext>[];
  /** Agent definition records, validated on construction. */
  definitions?: readonly unknown[];
  /** Attached to every agent the factory builds. */
  hooks?: AgentHooks<TContext> | readonly AgentHooks<TContext>[];
  logger?: Logger<ILogObj>;
}

/**
 * Builds the instructions of a definition from the run's `promptValues`.
 *
 * Declared prompt fields are enforced (`PromptFieldError` for a required field
 * with no value). Without declared fields the placeholders that got no value
 * are left as written and reported to `logger` as a warning.
 */
export function definitionInstructions<TContext>(
  definition: AgentDefinition,
  logger?: Logger<ILogObj>,
): (ctx: RunContextView<TContext>) => string {
  const render = (fields: readonly PromptField[], values: Readonly<Record<string, string>>) => {
    const system = renderPrompt(definition.systemPrompt, fields, values);
    if (!definition.additionalPrompt.trim()) return system;
    return `${system}\n\n${renderPrompt(definition.additionalPrompt, fields, values)}`;
  };

  if (definition.promptFields.length > 0) {
    return (ctx) => render(definition.promptFields, ctx.promptValues);
  }

  const generated = generateDefaultPromptFields(definition);
  return (ctx) => {
    const missing = generated
      .map((field) => field.name)
      .filter((name) => ctx.promptValues[name] === undefined);
    if (missing.length > 0) {
      logger?.warn("Prompt values missing, placeholders left as written", {
        agent: definition.name,
        missing,
      });
    }
    return render([], ctx.promptValues);
  };
}

/**
 * Turns stored definitions into agents.
 *
 * @example
 * ```typescript
 * const factory = new AgentFactory({ tools: [showTables, runQuery], definitions: records });
 * const orchestrator = factory.createOrchestrator(orchestratorRecord);
 * await runner.run(orchestrator, "How many orders shipped last week?", {
 *   promptValues: { database: "analytics" },
 * });
 * ```
 */
export class AgentFactory<TContext = unknown> {
  private readonly catalog: ToolRegistry<TContext>;
  private readonly definitions = new Map<string, AgentDefinition>();
  private readonly logger: Logger<ILogObj>;

  constructor(private readonly options: AgentFactoryOptions<TContext> = {}) {
    this.catalog = ToolRegistry.from(options.tools ?? []);
    this.logger = options.logger ?? createLogger({ name: "switchboard:definitions" });
    for (const record of options.definitions ?? []) {
      this.addDefinition(record);
    }
  }

  /** @throws DefinitionError when the record is invalid or its id is taken */
  addDefinition(record: unknown): AgentDefinition {
    const definition = parseAgentDefinition(record);
    if (this.definitions.has(definition.id)) {
      throw new DefinitionError(`Duplicate agent definition id '${definition.id}'`);
    }
    this.definitions.set(definition.id, definition);
    return definition;
  }

  getDefinition(id: string): AgentDefinition | undefined {
    return this.definitions.get(id);
  }

  /** Builds an agent from a parsed definition or the id of a registered one. */
  createAgent(source: AgentDefinition | string): Agent<TContext> {
    const definition = typeof source === "string" ? this.requireDefinition(source) : source;
    this.logger.debug("Building agent", { id: definition.id, name: definition.name });

    return new Agent<TContext>({
      name: definition.name,
      instructions: definitionInstructions<TContext>(definition, this.logger),
      tools: this.lookupTools(definition.selectedTools, `agent '${definition.name}'`),
      hooks: this.options.hooks,
      handoffDescription: definition.description || undefined,
    });
  }

  /**
   * Builds an orchestrator: members flagged `handoff` become hand-off targets,
   * the rest are offered as agent tools next to the orchestrator's own tools.
   */
  createOrchestrator(record: unknown): Agent<TContext> {
    const definition = parseOrchestratorDefinition(record);
    const members = definition.agents.map((id) => this.requireDefinition(id));

    const handoffs: Agent<TContext>[] = [];
    const agentTools: Tool<TContext>[] = [];
    for (const member of members) {
      const agent = this.createAgent(member);
      if (member.handoff) {
        handoffs.push(agent);
      } else {
        agentTools.push(agent.asTool());
      }
    }

    this.logger.debug("Building orchestrator", {
      id: definition.id,
      handoffs: handoffs.map((agent) => agent.name),
      agentTools: agentTools.map((tool) => tool.name),
    });

    return new Agent<TContext>({
      name: definition.name,
      instructions: (ctx) => renderPrompt(definition.systemPrompt, [], ctx.promptValues),
      tools: [...this.lookupTools(definition.tools, `orchestrator '${definition.name}'`), ...agentTools],
      handoffs,
      hooks: this.options.hooks,
      handoffDescription: definition.description || undefined,
    });
  }

  private requireDefinition(id: string): AgentDefinition {
    const definition = this.definitions.get(id);
    if (!definition) {
      throw new DefinitionError(`Unknown agent definition id '${id}'`);
    }
    return definition;
  }

  private lookupTools(names: readonly string[], owner: string): Tool<TContext>[] {
    const missing = names.filter((name) => !this.catalog.has(name));
    if (missing.length > 0) {
      throw new DefinitionError(
        `Unknown tools selected by ${owner}`,
        missing.map((name) => `${name} (available: ${this.catalog.getNames().join(", ") || "none"})`),
      );
    }
    return names.map((name) => this.catalog.resolve(name));
  }
}
