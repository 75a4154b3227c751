import { z } from "zod";
import type { AgentTool, AgentToolArgs, OutputExtractor, ToolContext } from "../tools/tool.js";
import { toToolName } from "../tools/tool.js";
import type { Agent } from "./agent.js";

export interface AgentToolOptions<TContext = unknown> {
  /** @default the agent's name as a tool name */
  toolName?: string;
  /** @default the agent's hand-off description, else "Tool to use the <name> agent" */
  toolDescription?: string;
  /** Derives the returned text from the nested result instead of its final output. */
  customOutputExtractor?: OutputExtractor<TContext>;
  timeoutMs?: number;
}

const agentToolParameters: z.ZodType<AgentToolArgs> = z.object({
  input: z.string().describe("The input to send to the agent"),
});

export function createAgentTool<TContext>(
  agent: Agent<TContext>,
  options: AgentToolOptions<TContext> = {},
): AgentTool<TContext> {
  return Object.freeze({
    kind: "agent" as const,
    name: options.toolName ?? toToolName(agent.name),
    description:
      options.toolDescription ?? agent.handoffDescription ?? `Tool to use the ${agent.name} agent`,
    parameters: agentToolParameters,
    agent,
    customOutputExtractor: options.customOutputExtractor,
    timeoutMs: options.timeoutMs,
  });
}

/**
 * Runs the wrapped agent as a nested sub-run and returns only its final output.
 * The nested item log stays with the nested result.
 */
export async function runAgentTool<TContext>(
  tool: AgentTool<TContext>,
  input: string,
  ctx: ToolContext<TContext>,
): Promise<string> {
  const result = await ctx.runAgent(tool.agent, input);
  if (tool.customOutputExtractor) {
    return tool.customOutputExtractor(result);
  }
  return result.finalOutput;
}
