/**
 * Built-in trace recorders.
 *
 * - {@link InMemoryTraceRecorder} keeps events for inspection and tests
 * - {@link ConsoleTraceRecorder} prints one numbered line per lifecycle event
 * - {@link JsonlTraceRecorder} appends every event to a JSON-lines file
 *
 * Set `SWITCHBOARD_TRACE_FILE` to get a JSONL recorder on every runner that was
 * not given recorders explicitly.
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ILogObj, Logger } from "tslog";
import { createLogger } from "../logging/logger.js";
import type { TraceEvent } from "./events.js";
import type { TraceInfo, TraceRecorder } from "./trace.js";

export const ENV_TRACE_FILE = "SWITCHBOARD_TRACE_FILE";

export class InMemoryTraceRecorder implements TraceRecorder {
  readonly traces: TraceInfo[] = [];
  readonly events: TraceEvent[] = [];

  onTraceStart(trace: TraceInfo): void {
    this.traces.push(trace);
  }

  onEvent(event: TraceEvent): void {
    this.events.push(event);
  }

  onTraceEnd(trace: TraceInfo): void {
    const index = this.traces.findIndex((t) => t.traceId === trace.traceId);
    if (index >= 0) {
      this.traces[index] = trace;
    } else {
      this.traces.push(trace);
    }
  }

  eventsOf(traceId: string): TraceEvent[] {
    return this.events.filter((event) => event.traceId === traceId);
  }

  clear(): void {
    this.traces.length = 0;
    this.events.length = 0;
  }
}

/** Human-readable line for lifecycle events; null for model call events. */
export function describeTraceEvent(event: TraceEvent): string | null {
  switch (event.type) {
    case "agent_start":
      return `Agent ${event.agentName} started`;
    case "agent_end":
      return `Agent ${event.agentName} ended with output ${event.output}`;
    case "tool_start":
      return `Agent ${event.agentName} started tool ${event.toolName}`;
    case "tool_end":
      return `Agent ${event.agentName} ended tool ${event.toolName} with result ${event.output}`;
    case "handoff":
      return `Agent ${event.from} handed off to ${event.to}`;
    case "model_call_start":
    case "model_call_end":
      return null;
  }
}

export interface ConsoleTraceRecorderOptions {
  /** Label in parentheses at the start of each line. Defaults to the trace name. */
  displayName?: string;
  logger?: Logger<ILogObj>;
  /** Replaces the logger as output. */
  write?: (line: string) => void;
}

/**
 * Prints `(<label>) <n>: <event>` lines, numbered per trace:
 *
 * ```
 * (Agent workflow) 1: Agent Triage started
 * (Agent workflow) 2: Agent Triage handed off to ClickHouse Agent
 * (Agent workflow) 3: Agent ClickHouse Agent started tool show_tables
 * ```
 */
export class ConsoleTraceRecorder implements TraceRecorder {
  private readonly counters = new Map<string, number>();
  private readonly traceNames = new Map<string, string>();
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleTraceRecorderOptions = {}) {
    const logger = options.logger ?? createLogger({ name: "switchboard:trace", minLevel: 3 });
    this.write = options.write ?? ((line) => logger.info(line));
  }

  onTraceStart(trace: TraceInfo): void {
    this.traceNames.set(trace.traceId, trace.name);
  }

  onEvent(event: TraceEvent): void {
    const text = describeTraceEvent(event);
    if (text === null) return;

    const count = (this.counters.get(event.traceId) ?? 0) + 1;
    this.counters.set(event.traceId, count);
    const label = this.options.displayName ?? this.traceNames.get(event.traceId) ?? event.traceId;
    this.write(`(${label}) ${count}: ${text}`);
  }

  onTraceEnd(trace: TraceInfo): void {
    this.counters.delete(trace.traceId);
    this.traceNames.delete(trace.traceId);
  }
}

export interface JsonlTraceRecorderOptions {
  /** Truncate the file on the first write instead of appending. @default false */
  reset?: boolean;
  logger?: Logger<ILogObj>;
}

/**
 * Persists traces as JSON lines: a `trace_start` record, one record per event,
 * then a `trace_end` record. Writes happen in order in the background; call
 * {@link JsonlTraceRecorder.flush} to wait for them.
 */
export class JsonlTraceRecorder implements TraceRecorder {
  private readonly logger: Logger<ILogObj>;
  private tail: Promise<void>;

  constructor(
    readonly filePath: string,
    options: JsonlTraceRecorderOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "switchboard:trace" });
    this.tail = this.prepare(options.reset ?? false);
  }

  onTraceStart(trace: TraceInfo): void {
    this.enqueue({ type: "trace_start", ...trace });
  }

  onEvent(event: TraceEvent): void {
    this.enqueue(event);
  }

  onTraceEnd(trace: TraceInfo): void {
    this.enqueue({ type: "trace_end", ...trace });
  }

  /** Resolves once everything recorded so far is on disk. */
  flush(): Promise<void> {
    return this.tail;
  }

  private async prepare(reset: boolean): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      if (reset) {
        await writeFile(this.filePath, "");
      }
    } catch (error) {
      this.reportWriteError(error);
    }
  }

  private enqueue(record: object): void {
    const line = `${JSON.stringify(record)}\n`;
    this.tail = this.tail
      .then(() => appendFile(this.filePath, line, "utf-8"))
      .catch((error: unknown) => this.reportWriteError(error));
  }

  private reportWriteError(error: unknown): void {
    this.logger.error("Failed to write trace file", {
      file: this.filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/** Recorders enabled through the environment (currently `SWITCHBOARD_TRACE_FILE`). */
export function createTraceRecordersFromEnv(): TraceRecorder[] {
  const file = process.env[ENV_TRACE_FILE]?.trim();
  return file ? [new JsonlTraceRecorder(file)] : [];
}
