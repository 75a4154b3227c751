// Re-export zod so tool schemas and the JSON Schema generator share one instance
export { z } from "zod";

// Agents
export type { AgentConfig, AgentRef, Instructions, InstructionsFunction } from "./agent/agent.js";
export { Agent } from "./agent/agent.js";
export type { AgentToolOptions } from "./agent/agent-tool.js";
export { createAgentTool } from "./agent/agent-tool.js";
export {
  handoffDescription,
  handoffParameters,
  handoffToolName,
  isHandoffToolName,
  parseHandoffContext,
} from "./agent/handoff.js";
export type { AgentHooks } from "./agent/hooks.js";

// Core types
export { DEFAULT_MAX_TURNS, DEFAULT_TRACE_NAME, HANDOFF_TOOL_PREFIX } from "./core/constants.js";
export type { ErrorKind, RunFailure, RunFailureKind, ToolFailureKind } from "./core/errors.js";
export {
  DefinitionError,
  HandoffError,
  InternalError,
  isAbortError,
  ModelInvocationError,
  ModelTimeoutError,
  PromptFieldError,
  RunCancelledError,
  SwitchboardError,
  ToolAbortedError,
  ToolExecutionError,
  ToolRegistrationError,
  ToolTimeoutError,
  toRunError,
  toRunFailure,
  TurnLimitExceeded,
  UnknownToolError,
  ValidationError,
} from "./core/errors.js";
export type {
  AssistantMessageItem,
  ErrorItem,
  HandoffItem,
  RunInput,
  RunItem,
  RunItemType,
  ToolCallItem,
  ToolResultItem,
  UserMessageItem,
} from "./core/items.js";
export { isItemOfType, itemText, toInputItems, userMessage } from "./core/items.js";
export type {
  HandoffPart,
  HandoffSchema,
  ModelClient,
  ModelInvokeOptions,
  ModelOutputPart,
  ModelRequest,
  ModelResponse,
  TextPart,
  ToolCallPart,
  ToolSchema,
} from "./core/model.js";
export type { RetryConfig } from "./core/retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  formatModelError,
  isRetryableError,
  resolveRetryConfig,
} from "./core/retry.js";
export {
  type CostEstimate,
  DEFAULT_TOKEN_PRICING,
  estimateCost,
  type TokenPricing,
  type TokenUsage,
  type UsageSnapshot,
} from "./core/usage.js";

// Definitions
export type { AgentFactoryOptions } from "./definitions/factory.js";
export { AgentFactory, definitionInstructions } from "./definitions/factory.js";
export {
  extractPlaceholders,
  extractPromptPlaceholders,
  generateDefaultPromptFields,
  renderPrompt,
  resolvePromptValues,
} from "./definitions/prompt.js";
export type { AgentDefinition, OrchestratorDefinition, PromptField } from "./definitions/schema.js";
export {
  agentDefinitionSchema,
  orchestratorDefinitionSchema,
  parseAgentDefinition,
  parseOrchestratorDefinition,
} from "./definitions/schema.js";

// Logging
export type { LoggerOptions } from "./logging/logger.js";
export { createLogger, defaultLogger } from "./logging/logger.js";

// Providers
export type { ChatCompletionsClient, OpenAIChatModelOptions } from "./providers/openai.js";
export {
  createOpenAIModelFromEnv,
  fromChatCompletion,
  OpenAIChatModel,
  toChatMessages,
} from "./providers/openai.js";

// Running
export { RunContext, type RunContextView } from "./run/context.js";
export type { EngineOutcome, EngineState, StepEngineOptions } from "./run/engine.js";
export { StepEngine } from "./run/engine.js";
export { RunResult } from "./run/result.js";
export type { RunConfig, RunnerOptions, RunOutcome } from "./run/runner.js";
export { Runner } from "./run/runner.js";

// Tools
export type {
  ToolCallRequest,
  ToolCallScope,
  ToolExecutorOptions,
  ToolInvocationFailure,
  ToolInvocationObserver,
  ToolInvocationResult,
  ToolInvocationSuccess,
} from "./tools/executor.js";
export { ToolExecutor } from "./tools/executor.js";
export { ToolErrorFormatter } from "./tools/error-formatter.js";
export { ToolRegistry } from "./tools/registry.js";
export { schemaToJSONSchema } from "./tools/schema-to-json.js";
export type {
  AgentTool,
  AgentToolArgs,
  CreateFunctionToolConfig,
  FunctionTool,
  OutputExtractor,
  Tool,
  ToolContext,
  ToolOutput,
} from "./tools/tool.js";
export { createFunctionTool, isAgentTool, toToolName } from "./tools/tool.js";

// Tracing
export type {
  AgentEndEvent,
  AgentStartEvent,
  HandoffEvent,
  ModelCallEndEvent,
  ModelCallStartEvent,
  ToolEndEvent,
  ToolStartEvent,
  TraceEvent,
  TraceEventType,
} from "./tracing/events.js";
export {
  filterByDepth,
  filterByParentCall,
  filterByType,
  isNestedEvent,
} from "./tracing/events.js";
export type {
  ConsoleTraceRecorderOptions,
  JsonlTraceRecorderOptions,
} from "./tracing/recorders.js";
export {
  ConsoleTraceRecorder,
  createTraceRecordersFromEnv,
  describeTraceEvent,
  InMemoryTraceRecorder,
  JsonlTraceRecorder,
} from "./tracing/recorders.js";
export type { TraceInfo, TraceListener, TraceOptions, TraceRecorder } from "./tracing/trace.js";
export { Trace } from "./tracing/trace.js";
