import { PromptFieldError } from "../core/errors.js";
import type { PromptField } from "./schema.js";

// `{{` and `}}` are literal braces; matching them first keeps `{{name}}` from being a placeholder.
const TEMPLATE_TOKEN = /\{\{|\}\}|\{([a-zA-Z0-9_]+)\}/g;

/** Placeholder names in `text`, unique, in order of first appearance. */
export function extractPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(TEMPLATE_TOKEN)) {
    const name = match[1];
    if (name !== undefined) names.add(name);
  }
  return [...names];
}

export function extractPromptPlaceholders(definition: {
  systemPrompt: string;
  additionalPrompt?: string;
}): string[] {
  const names = new Set([
    ...extractPlaceholders(definition.systemPrompt),
    ...extractPlaceholders(definition.additionalPrompt ?? ""),
  ]);
  return [...names];
}

/**
 * One optional field per placeholder, for definitions that declare none. A
 * placeholder left without a value stays as written.
 */
export function generateDefaultPromptFields(definition: {
  systemPrompt: string;
  additionalPrompt?: string;
}): PromptField[] {
  return extractPromptPlaceholders(definition).map((name) => ({
    name,
    description: `Value for ${name}`,
    defaultValue: "",
    required: false,
  }));
}

/**
 * Value for every field: the supplied value, else the field's default.
 *
 * @throws PromptFieldError when a required field has neither
 */
export function resolvePromptValues(
  fields: readonly PromptField[],
  values: Readonly<Record<string, string>>,
): Record<string, string> {
  const resolved: Record<string, string> = { ...values };
  for (const field of fields) {
    const supplied = values[field.name];
    if (supplied !== undefined && supplied !== "") continue;

    if (field.defaultValue !== "") {
      resolved[field.name] = field.defaultValue;
    } else if (field.required) {
      throw new PromptFieldError(field.name);
    } else {
      resolved[field.name] = "";
    }
  }
  return resolved;
}

/**
 * Substitutes `{name}` placeholders. Placeholders with no field and no value
 * are left as written.
 *
 * @example
 * ```typescript
 * renderPrompt("Use the {database} database.", fields, { database: "analytics" });
 * // "Use the analytics database."
 * ```
 */
export function renderPrompt(
  template: string,
  fields: readonly PromptField[],
  values: Readonly<Record<string, string>>,
): string {
  const resolved = resolvePromptValues(fields, values);
  return template.replace(TEMPLATE_TOKEN, (token, name: string | undefined) => {
    if (name === undefined) return token[0] ?? "";
    return resolved[name] ?? token;
  });
}
