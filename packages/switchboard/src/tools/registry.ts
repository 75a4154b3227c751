import { ToolRegistrationError, UnknownToolError } from "../core/errors.js";
import type { ToolSchema } from "../core/model.js";
import {
  type ToolCallRequest,
  type ToolCallScope,
  ToolExecutor,
  type ToolExecutorOptions,
  type ToolInvocationResult,
} from "./executor.js";
import { schemaToJSONSchema } from "./schema-to-json.js";
import type { Tool } from "./tool.js";

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * Named set of tools, function and agent variants alike. Names are matched
 * exactly and must be unique.
 */
export class ToolRegistry<TContext = unknown> {
  private readonly tools = new Map<string, Tool<TContext>>();

  /**
   * @example
   * ```typescript
   * const registry = ToolRegistry.from([showTables, describeTable, analyst.asTool()]);
   * ```
   */
  static from<TContext>(tools: readonly Tool<TContext>[]): ToolRegistry<TContext> {
    const registry = new ToolRegistry<TContext>();
    for (const tool of tools) {
      registry.register(tool);
    }
    return registry;
  }

  register(tool: Tool<TContext>): this {
    if (!TOOL_NAME_PATTERN.test(tool.name)) {
      throw new ToolRegistrationError(
        tool.name,
        `Tool name '${tool.name}' must be 1-64 letters, digits, underscores or dashes`,
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ToolRegistrationError(tool.name);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  /** @throws UnknownToolError */
  resolve(name: string): Tool<TContext> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name, this.getNames());
    }
    return tool;
  }

  get(name: string): Tool<TContext> | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  getAll(): Tool<TContext>[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  /** Schemas advertised to the model, in registration order. */
  toSchemas(): ToolSchema[] {
    return this.getAll().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: schemaToJSONSchema(tool.parameters),
    }));
  }

  /**
   * Parses, validates and executes one call. Never throws: failures come back
   * as `{ status: "error" }` results.
   */
  invoke(
    call: ToolCallRequest,
    scope: ToolCallScope<TContext>,
    options?: ToolExecutorOptions<TContext>,
  ): Promise<ToolInvocationResult> {
    return new ToolExecutor(this, options).invoke(call, scope);
  }
}
