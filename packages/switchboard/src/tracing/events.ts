/**
 * Trace event types.
 *
 * Nested agent-tool runs share their parent's trace. Their events carry the
 * call id of the tool call that started them and a depth one greater than the
 * caller's, so a flat event list can be regrouped into a tree.
 *
 * @module tracing/events
 */

import type { ToolFailureKind } from "../core/errors.js";
import type { TokenUsage } from "../core/usage.js";

export interface BaseTraceEvent {
  /** Monotonically increasing within one trace. */
  eventId: number;
  traceId: string;
  timestamp: number;
  /** Agent active when the event was emitted. */
  agentName: string;
  /** 0 for the top-level run, +1 per nested agent-tool run. */
  depth: number;
  /** Tool call that started the nested run, null at depth 0. */
  parentCallId: string | null;
}

export interface AgentStartEvent extends BaseTraceEvent {
  type: "agent_start";
  turn: number;
}

export interface AgentEndEvent extends BaseTraceEvent {
  type: "agent_end";
  output: string;
}

export interface ModelCallStartEvent extends BaseTraceEvent {
  type: "model_call_start";
  turn: number;
  model?: string;
  itemCount: number;
}

export interface ModelCallEndEvent extends BaseTraceEvent {
  type: "model_call_end";
  turn: number;
  usage?: TokenUsage;
  toolCallCount: number;
  handoffTarget?: string;
  /** Set when the call failed after all retries. */
  error?: string;
}

export interface ToolStartEvent extends BaseTraceEvent {
  type: "tool_start";
  callId: string;
  toolName: string;
  arguments: string;
}

export interface ToolEndEvent extends BaseTraceEvent {
  type: "tool_end";
  callId: string;
  toolName: string;
  status: "success" | "error";
  output: string;
  errorKind?: ToolFailureKind;
  durationMs: number;
}

export interface HandoffEvent extends BaseTraceEvent {
  type: "handoff";
  callId: string;
  from: string;
  to: string;
}

export type TraceEvent =
  | AgentStartEvent
  | AgentEndEvent
  | ModelCallStartEvent
  | ModelCallEndEvent
  | ToolStartEvent
  | ToolEndEvent
  | HandoffEvent;

export type TraceEventType = TraceEvent["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as emitted, before the trace stamps id, trace id and timestamp. */
export type TraceEventInput = DistributiveOmit<TraceEvent, "eventId" | "traceId" | "timestamp">;

/** Event-specific fields only; the emitter adds agent, depth and parent call. */
export type TraceEventPayload = DistributiveOmit<
  TraceEventInput,
  "agentName" | "depth" | "parentCallId"
>;

export type TraceEventOfType<T extends TraceEventType> = Extract<TraceEvent, { type: T }>;

export function isNestedEvent(event: TraceEvent): boolean {
  return event.depth > 0;
}

export function filterByType<T extends TraceEventType>(
  events: readonly TraceEvent[],
  type: T,
): TraceEventOfType<T>[] {
  return events.filter((event): event is TraceEventOfType<T> => event.type === type);
}

export function filterByDepth(events: readonly TraceEvent[], depth: number): TraceEvent[] {
  return events.filter((event) => event.depth === depth);
}

/** Events of the nested run started by tool call `callId`. */
export function filterByParentCall(events: readonly TraceEvent[], callId: string): TraceEvent[] {
  return events.filter((event) => event.parentCallId === callId);
}
