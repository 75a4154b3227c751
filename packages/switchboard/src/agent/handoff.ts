import { z } from "zod";
import { HANDOFF_TOOL_PREFIX } from "../core/constants.js";
import type { HandoffSchema } from "../core/model.js";
import { schemaToJSONSchema } from "../tools/schema-to-json.js";
import { toToolName } from "../tools/tool.js";
import type { Agent } from "./agent.js";

export const handoffParameters = z.object({
  context: z
    .string()
    .optional()
    .describe("Anything the next agent should know that is not already in the conversation"),
});

export function handoffToolName(agentName: string): string {
  return `${HANDOFF_TOOL_PREFIX}${toToolName(agentName)}`;
}

export function isHandoffToolName(name: string): boolean {
  return name.startsWith(HANDOFF_TOOL_PREFIX);
}

export function handoffDescription<TContext>(target: Agent<TContext>): string {
  const base = `Handoff to the ${target.name} agent to handle the request.`;
  return target.handoffDescription ? `${base} ${target.handoffDescription}` : base;
}

/** One schema per eligible target of `agent`, in declaration order. */
export function toHandoffSchemas<TContext>(agent: Agent<TContext>): HandoffSchema[] {
  const parameters = schemaToJSONSchema(handoffParameters);
  return agent.handoffs.map((target) => ({
    name: handoffToolName(target.name),
    description: handoffDescription(target),
    parameters,
    targetAgent: target.name,
  }));
}

/**
 * Reads the optional forwarded context out of hand-off tool arguments.
 * Hand-offs carry no required arguments, so unparsable text is treated as no context.
 */
export function parseHandoffContext(rawArguments: string): string | undefined {
  let value: unknown;
  try {
    value = rawArguments.trim() ? JSON.parse(rawArguments) : {};
  } catch {
    return undefined;
  }
  const parsed = handoffParameters.safeParse(value);
  if (!parsed.success) return undefined;
  const context = parsed.data.context?.trim();
  return context ? context : undefined;
}
