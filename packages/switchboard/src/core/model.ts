import type { RunItem } from "./items.js";
import type { TokenUsage } from "./usage.js";

export interface ToolSchema {
  name: string;
  description: string;
  /** JSON Schema generated from the tool's zod schema. */
  parameters: Record<string, unknown>;
}

export interface HandoffSchema extends ToolSchema {
  /** Name of the agent this tool transfers control to. */
  targetAgent: string;
}

export interface ModelRequest {
  /** Model name, when the runner or agent selects one. */
  model?: string;
  agentName: string;
  instructions: string;
  items: readonly RunItem[];
  tools: readonly ToolSchema[];
  handoffs: readonly HandoffSchema[];
  turn: number;
}

export interface TextPart {
  type: "text";
  text: string;
}

export interface ToolCallPart {
  type: "tool_call";
  callId: string;
  name: string;
  /** Raw JSON argument text; validated by the tool registry, not the client. */
  arguments: string;
}

export interface HandoffPart {
  type: "handoff";
  callId: string;
  /** Name of the target agent. */
  target: string;
  toolName: string;
  context?: string;
}

export type ModelOutputPart = TextPart | ToolCallPart | HandoffPart;

export interface ModelResponse {
  output: ModelOutputPart[];
  usage?: TokenUsage;
  responseId?: string;
}

export interface ModelInvokeOptions {
  signal?: AbortSignal;
}

/**
 * Backend the step engine talks to. Implementations translate the request into
 * their wire format and report tool calls and hand-offs as separate parts.
 */
export interface ModelClient {
  invoke(request: ModelRequest, options?: ModelInvokeOptions): Promise<ModelResponse>;
}
