import type { ZodError, ZodType } from "zod";
import { schemaToJSONSchema } from "./schema-to-json.js";

/**
 * Formats tool failures as observations the model can correct itself from:
 * the issues found plus the expected parameter schema.
 */
export class ToolErrorFormatter {
  formatValidationError(toolName: string, error: ZodError, parameters: ZodType): string {
    return [
      `Error: Invalid arguments for '${toolName}':`,
      ...describeIssues(error).map((issue) => `  - ${issue}`),
      "",
      "Expected parameters:",
      JSON.stringify(schemaToJSONSchema(parameters)),
    ].join("\n");
  }

  formatParseError(toolName: string, message: string): string {
    return [
      `Error: Failed to parse arguments for '${toolName}':`,
      `  ${message}`,
      "",
      "Arguments must be a single JSON object.",
    ].join("\n");
  }

  formatUnknownTool(
    toolName: string,
    availableTools: readonly string[],
    handoffTools: readonly string[] = [],
  ): string {
    const lines = [`Error: Tool '${toolName}' not found.`, ""];
    if (availableTools.length > 0) {
      lines.push(`Available tools: ${availableTools.join(", ")}`);
    } else if (handoffTools.length === 0) {
      lines.push("No tools are available to this agent.");
    } else {
      lines.push("This agent has no function tools.");
    }
    if (handoffTools.length > 0) {
      lines.push(`Available hand-offs: ${handoffTools.join(", ")}`);
    }
    return lines.join("\n");
  }

  formatExecutionError(toolName: string, message: string): string {
    return `Error: Tool '${toolName}' failed: ${message}`;
  }
}

/** Lists the issues of a zod error as `path: message` lines. */
export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.map(String).join(".") || "root"}: ${issue.message}`);
}
