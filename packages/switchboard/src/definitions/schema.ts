/**
 * Agent and orchestrator definitions as stored by a persistence layer.
 *
 * Records are validated with zod. Keys may be camelCase or snake_case
 * (`system_prompt`, `selected_tools`, `prompt_fields`, `default_value`).
 */

import { z } from "zod";
import { DefinitionError } from "../core/errors.js";
import { describeIssues } from "../tools/error-formatter.js";

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Renames snake_case keys to camelCase, recursively through arrays and objects. */
export function camelizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(camelizeKeys);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [toCamelCase(key), camelizeKeys(entry)]),
    );
  }
  return value;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

export const promptFieldSchema = z.object({
  name: z.string().regex(/^[a-zA-Z0-9_]+$/, "Prompt field names are letters, digits and underscores"),
  description: optionalText,
  defaultValue: optionalText,
  required: z.boolean().default(true),
});

export const agentDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: optionalText,
  systemPrompt: z.string(),
  additionalPrompt: optionalText,
  selectedTools: z.array(z.string()).default([]),
  /** Members of an orchestrator with this flag become hand-off targets instead of tools. */
  handoff: z.boolean().default(false),
  promptFields: z.array(promptFieldSchema).default([]),
});

export const orchestratorDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: optionalText,
  /** Member agent ids. */
  agents: z.array(z.string()).default([]),
  /** Function tool names. */
  tools: z.array(z.string()).default([]),
  systemPrompt: z.string(),
});

export type PromptField = z.output<typeof promptFieldSchema>;
export type AgentDefinition = z.output<typeof agentDefinitionSchema>;
export type OrchestratorDefinition = z.output<typeof orchestratorDefinitionSchema>;

function parseRecord<T>(schema: z.ZodType<T>, record: unknown, label: string): T {
  const parsed = schema.safeParse(camelizeKeys(record));
  if (!parsed.success) {
    throw new DefinitionError(`Invalid ${label}`, describeIssues(parsed.error));
  }
  return parsed.data;
}

/** @throws DefinitionError listing every issue found */
export function parseAgentDefinition(record: unknown): AgentDefinition {
  return parseRecord(agentDefinitionSchema, record, "agent definition");
}

/** @throws DefinitionError listing every issue found */
export function parseOrchestratorDefinition(record: unknown): OrchestratorDefinition {
  return parseRecord(orchestratorDefinitionSchema, record, "orchestrator definition");
}
