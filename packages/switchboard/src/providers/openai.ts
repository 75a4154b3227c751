/**
 * Model client for OpenAI-compatible chat completion APIs.
 *
 * The run's item log is converted into chat messages; function tools and
 * hand-offs are both offered as function tools, and returned calls to a
 * hand-off tool come back as `handoff` parts.
 */

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionAssistantMessageParam,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { ILogObj, Logger } from "tslog";
import { isHandoffToolName, parseHandoffContext } from "../agent/handoff.js";
import { HANDOFF_TOOL_PREFIX } from "../core/constants.js";
import { DefinitionError } from "../core/errors.js";
import type { RunItem } from "../core/items.js";
import type {
  ModelClient,
  ModelInvokeOptions,
  ModelOutputPart,
  ModelRequest,
  ModelResponse,
  ToolSchema,
} from "../core/model.js";
import { createLogger } from "../logging/logger.js";
import { readFirstEnvVar } from "./utils.js";

export const ENV_API_KEY = "SWITCHBOARD_API_KEY";
export const ENV_BASE_URL = "SWITCHBOARD_BASE_URL";
export const ENV_MODEL = "SWITCHBOARD_MODEL";

/** The part of the OpenAI client this model uses; an `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIChatModelOptions {
  /** Used when neither the runner nor the agent names a model. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger<ILogObj>;
}

/** Renders the item log as chat messages, pairing each call with its result. */
export function toChatMessages(
  instructions: string,
  items: readonly RunItem[],
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (instructions.trim()) {
    messages.push({ role: "system", content: instructions });
  }

  // Consecutive calls of one turn belong to a single assistant message.
  let pendingAssistant: ChatCompletionAssistantMessageParam | undefined;
  const addToolCall = (call: ChatCompletionMessageToolCall) => {
    if (!pendingAssistant) {
      pendingAssistant = { role: "assistant", content: null, tool_calls: [] };
      messages.push(pendingAssistant);
    }
    pendingAssistant.tool_calls = [...(pendingAssistant.tool_calls ?? []), call];
  };

  for (const item of items) {
    switch (item.type) {
      case "user_message":
        pendingAssistant = undefined;
        messages.push({ role: "user", content: item.content });
        break;
      case "assistant_message":
        pendingAssistant = { role: "assistant", content: item.content };
        messages.push(pendingAssistant);
        break;
      case "tool_call":
        addToolCall({
          id: item.callId,
          type: "function",
          function: { name: item.name, arguments: item.arguments },
        });
        break;
      case "tool_result":
        pendingAssistant = undefined;
        messages.push({ role: "tool", tool_call_id: item.callId, content: item.output });
        break;
      case "handoff":
        addToolCall({
          id: item.callId,
          type: "function",
          function: {
            name: item.toolName,
            arguments: JSON.stringify(item.context === undefined ? {} : { context: item.context }),
          },
        });
        messages.push({
          role: "tool",
          tool_call_id: item.callId,
          content: JSON.stringify({ assistant: item.to }),
        });
        pendingAssistant = undefined;
        break;
      case "error":
        break;
    }
  }

  return messages;
}

function toChatTool(schema: ToolSchema): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: schema.name,
      description: schema.description,
      parameters: schema.parameters,
    },
  };
}

/** Reads the first choice back into output parts; hand-off tool names map to their targets. */
export function fromChatCompletion(
  completion: ChatCompletion,
  handoffTargets: ReadonlyMap<string, string>,
): ModelResponse {
  const message = completion.choices[0]?.message;
  const output: ModelOutputPart[] = [];

  if (message?.content) {
    output.push({ type: "text", text: message.content });
  }
  for (const call of message?.tool_calls ?? []) {
    const name = call.function.name;
    // A hand-off name nobody offered still reads as a hand-off, so the run
    // fails on the ineligible target instead of treating it as a missing tool.
    const target =
      handoffTargets.get(name) ??
      (isHandoffToolName(name) ? name.slice(HANDOFF_TOOL_PREFIX.length) : undefined);
    if (target !== undefined) {
      output.push({
        type: "handoff",
        callId: call.id,
        target,
        toolName: name,
        context: parseHandoffContext(call.function.arguments),
      });
    } else {
      output.push({
        type: "tool_call",
        callId: call.id,
        name,
        arguments: call.function.arguments,
      });
    }
  }

  const usage = completion.usage;
  return {
    output,
    responseId: completion.id,
    usage: usage
      ? {
          inputTokens: usage.prompt_tokens,
          outputTokens: usage.completion_tokens,
          totalTokens: usage.total_tokens,
        }
      : undefined,
  };
}

/**
 * @example
 * ```typescript
 * const model = new OpenAIChatModel(new OpenAI(), { model: "gpt-4o-mini" });
 * const runner = new Runner({ model });
 * ```
 */
export class OpenAIChatModel implements ModelClient {
  private readonly logger: Logger<ILogObj>;

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAIChatModelOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "switchboard:openai" });
  }

  async invoke(request: ModelRequest, options: ModelInvokeOptions = {}): Promise<ModelResponse> {
    const model = request.model ?? this.options.model;
    if (!model) {
      throw new DefinitionError(
        `No model name for agent '${request.agentName}': set it on the agent, the runner or the client`,
      );
    }

    const tools = [...request.tools, ...request.handoffs].map(toChatTool);
    const body: ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: toChatMessages(request.instructions, request.items),
      ...(tools.length > 0 && { tools }),
      ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
      ...(this.options.maxTokens !== undefined && { max_tokens: this.options.maxTokens }),
    };

    this.logger.debug("Chat completion request", {
      model,
      agent: request.agentName,
      turn: request.turn,
      messages: body.messages.length,
      tools: tools.length,
    });

    const completion = await this.client.chat.completions.create(body, { signal: options.signal });
    const handoffTargets = new Map(request.handoffs.map((h) => [h.name, h.targetAgent]));
    return fromChatCompletion(completion, handoffTargets);
  }
}

/**
 * Builds a client from `SWITCHBOARD_API_KEY` (or `OPENAI_API_KEY`),
 * `SWITCHBOARD_BASE_URL` and `SWITCHBOARD_MODEL`. Returns null without a key.
 */
export function createOpenAIModelFromEnv(
  options: Omit<OpenAIChatModelOptions, "model"> = {},
): OpenAIChatModel | null {
  const apiKey = readFirstEnvVar(ENV_API_KEY, "OPENAI_API_KEY");
  if (!apiKey) {
    return null;
  }

  const baseURL = readFirstEnvVar(ENV_BASE_URL);
  const client = new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
  return new OpenAIChatModel(client, { ...options, model: readFirstEnvVar(ENV_MODEL) });
}
