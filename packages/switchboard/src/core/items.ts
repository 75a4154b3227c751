/**
 * Items are the entries of a run's append-only log. The same shapes serve as run
 * input, so a finished run's log can seed the next run.
 */

import type { ToolFailureKind } from "./errors.js";

export interface UserMessageItem {
  type: "user_message";
  content: string;
}

export interface AssistantMessageItem {
  type: "assistant_message";
  agent: string;
  content: string;
}

export interface ToolCallItem {
  type: "tool_call";
  agent: string;
  callId: string;
  name: string;
  /** Raw JSON argument text exactly as the model produced it. */
  arguments: string;
}

export interface ToolResultItem {
  type: "tool_result";
  agent: string;
  callId: string;
  name: string;
  status: "success" | "error";
  /** What the model sees: the tool's output, or the formatted failure. */
  output: string;
  errorKind?: ToolFailureKind;
}

export interface HandoffItem {
  type: "handoff";
  callId: string;
  /** Tool name the model used to request the hand-off. */
  toolName: string;
  from: string;
  to: string;
  context?: string;
}

export interface ErrorItem {
  type: "error";
  agent: string;
  kind: string;
  message: string;
}

export type RunItem =
  | UserMessageItem
  | AssistantMessageItem
  | ToolCallItem
  | ToolResultItem
  | HandoffItem
  | ErrorItem;

export type RunItemType = RunItem["type"];

/** Text, or a list of items exported from an earlier run via `toInputList()`. */
export type RunInput = string | readonly RunItem[];

export function userMessage(content: string): UserMessageItem {
  return { type: "user_message", content };
}

export function toInputItems(input: RunInput): RunItem[] {
  return typeof input === "string" ? [userMessage(input)] : [...input];
}

/** Plain-text rendering of an item, used for matching and console output. */
export function itemText(item: RunItem): string {
  switch (item.type) {
    case "user_message":
    case "assistant_message":
      return item.content;
    case "tool_call":
      return item.arguments;
    case "tool_result":
      return item.output;
    case "handoff":
      return item.context ?? "";
    case "error":
      return item.message;
  }
}

export function isItemOfType<T extends RunItemType>(
  item: RunItem,
  type: T,
): item is Extract<RunItem, { type: T }> {
  return item.type === type;
}
