/**
 * Error taxonomy for switchboard.
 *
 * Tool-level errors (`validation`, `execution`, `timeout`, `unknown_tool`, `aborted`)
 * are folded back into the conversation as observations for the model. Run-level
 * errors end the run and are what `Runner.run` rejects with.
 */

import type { ILogObj, Logger } from "tslog";

export type ToolFailureKind = "validation" | "execution" | "timeout" | "unknown_tool" | "aborted";

export type RunFailureKind =
  | "handoff"
  | "model_invocation"
  | "turn_limit"
  | "cancelled"
  | "definition"
  | "prompt_field"
  | "tool_registration"
  | "internal";

export type ErrorKind = ToolFailureKind | RunFailureKind;

interface SwitchboardErrorOptions {
  cause?: unknown;
  agentName?: string;
}

export abstract class SwitchboardError extends Error {
  abstract readonly kind: ErrorKind;
  /** Agent that was active when the error was raised, when known. */
  readonly agentName?: string;

  constructor(message: string, options: SwitchboardErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.agentName = options.agentName;
  }
}

export class ValidationError extends SwitchboardError {
  readonly kind = "validation" as const;
  readonly issues: readonly string[];
  readonly toolName?: string;

  constructor(message: string, options: { toolName?: string; issues?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.toolName = options.toolName;
    this.issues = options.issues ?? [];
  }
}

export class ToolExecutionError extends SwitchboardError {
  readonly kind: "execution" | "timeout" = "execution";
  readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends ToolExecutionError {
  override readonly kind = "timeout" as const;
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(toolName, `Tool '${toolName}' exceeded its timeout of ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ToolAbortedError extends SwitchboardError {
  readonly kind = "aborted" as const;
  readonly toolName: string;

  constructor(toolName: string, reason?: string) {
    super(reason ? `Tool '${toolName}' was aborted: ${reason}` : `Tool '${toolName}' was aborted`);
    this.toolName = toolName;
  }
}

export class UnknownToolError extends SwitchboardError {
  readonly kind = "unknown_tool" as const;
  readonly toolName: string;
  readonly availableTools: readonly string[];

  constructor(toolName: string, availableTools: readonly string[]) {
    super(`Tool '${toolName}' not found`);
    this.toolName = toolName;
    this.availableTools = availableTools;
  }
}

export class ToolRegistrationError extends SwitchboardError {
  readonly kind = "tool_registration" as const;
  readonly toolName: string;

  constructor(toolName: string, message?: string) {
    super(message ?? `Tool '${toolName}' is already registered`);
    this.toolName = toolName;
  }
}

/** The model asked to hand off to an agent that is not among the active agent's targets. */
export class HandoffError extends SwitchboardError {
  readonly kind = "handoff" as const;
  readonly target: string;
  readonly eligibleTargets: readonly string[];

  constructor(from: string, target: string, eligibleTargets: readonly string[]) {
    const eligible = eligibleTargets.length > 0 ? eligibleTargets.join(", ") : "none";
    super(`Agent '${from}' cannot hand off to '${target}' (eligible: ${eligible})`, {
      agentName: from,
    });
    this.target = target;
    this.eligibleTargets = eligibleTargets;
  }
}

export class ModelInvocationError extends SwitchboardError {
  readonly kind = "model_invocation" as const;
  /** Number of attempts made, retries included. */
  readonly attempts: number;

  constructor(
    message: string,
    options: { attempts?: number; agentName?: string; cause?: unknown } = {},
  ) {
    super(message, { agentName: options.agentName, cause: options.cause });
    this.attempts = options.attempts ?? 1;
  }
}

/** A single model call ran past `modelTimeoutMs`. Retryable. */
export class ModelTimeoutError extends ModelInvocationError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, agentName?: string) {
    super(`Model invocation timed out after ${timeoutMs}ms`, { agentName });
    this.timeoutMs = timeoutMs;
  }
}

export class TurnLimitExceeded extends SwitchboardError {
  readonly kind = "turn_limit" as const;
  readonly maxTurns: number;

  constructor(maxTurns: number, agentName?: string) {
    super(`Run exceeded the maximum of ${maxTurns} turns`, { agentName });
    this.maxTurns = maxTurns;
  }
}

export class RunCancelledError extends SwitchboardError {
  readonly kind = "cancelled" as const;

  constructor(reason?: string, agentName?: string) {
    super(reason ? `Run cancelled: ${reason}` : "Run cancelled", { agentName });
  }
}

export class DefinitionError extends SwitchboardError {
  readonly kind = "definition" as const;
  readonly issues: readonly string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.issues = issues;
  }
}

export class PromptFieldError extends SwitchboardError {
  readonly kind = "prompt_field" as const;
  readonly fieldName: string;

  constructor(fieldName: string) {
    super(`Required prompt field '${fieldName}' has no value and no default`);
    this.fieldName = fieldName;
  }
}

/** Wraps anything thrown inside the engine that is not already classified. */
export class InternalError extends SwitchboardError {
  readonly kind = "internal" as const;
}

/**
 * Detects abort/cancellation errors from fetch, AbortController and the
 * provider SDKs (`APIUserAbortError` in openai).
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error instanceof RunCancelledError || error instanceof ToolAbortedError) return true;
  if (error.name === "AbortError" || error.name === "APIUserAbortError") return true;

  const message = error.message.toLowerCase();
  return message.includes("abort") || message.includes("cancelled") || message.includes("canceled");
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/** Classifies an arbitrary thrown value as a run-level error. */
export function toRunError(error: unknown, agentName?: string): SwitchboardError {
  if (error instanceof SwitchboardError) {
    return error;
  }
  if (isAbortError(error)) {
    return new RunCancelledError(errorMessage(error), agentName);
  }
  return new InternalError(errorMessage(error), { cause: error, agentName });
}

export interface RunFailure {
  kind: ErrorKind;
  message: string;
  agentName?: string;
  cause: unknown;
}

export function toRunFailure(error: unknown): RunFailure {
  const classified = toRunError(error);
  return {
    kind: classified.kind,
    message: classified.message,
    agentName: classified.agentName,
    cause: classified.cause ?? error,
  };
}

/**
 * Runs an observer callback, logging and swallowing whatever it throws.
 * Hooks and trace recorders go through this so they can never break a run.
 */
export async function safeObserve(
  fn: () => void | Promise<void>,
  logger: Logger<ILogObj>,
  label = "observer",
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    logger.error(`${label} threw`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
