import { randomUUID } from "node:crypto";
import type { ILogObj, Logger } from "tslog";
import { DEFAULT_TRACE_NAME } from "../core/constants.js";
import { createLogger } from "../logging/logger.js";
import type { TraceEvent, TraceEventInput, TraceEventOfType, TraceEventType } from "./events.js";

export interface TraceInfo {
  traceId: string;
  name: string;
  startedAt?: number;
  endedAt?: number;
  metadata: Readonly<Record<string, unknown>>;
}

/**
 * Sink for trace events. Recorders are passive: they are called synchronously
 * as events happen, their promises are not awaited, and whatever they throw or
 * reject with is logged and dropped.
 */
export interface TraceRecorder {
  onTraceStart?(trace: TraceInfo): void | Promise<void>;
  onEvent(event: TraceEvent): void | Promise<void>;
  onTraceEnd?(trace: TraceInfo): void | Promise<void>;
}

export type TraceListener<T extends TraceEvent = TraceEvent> = (event: T) => void;

export interface TraceOptions {
  /** @default "Agent workflow" */
  name?: string;
  traceId?: string;
  recorders?: readonly TraceRecorder[];
  logger?: Logger<ILogObj>;
  /** A disabled trace accepts events and drops them. */
  disabled?: boolean;
  metadata?: Record<string, unknown>;
}

export function generateTraceId(): string {
  return `trace_${randomUUID().replace(/-/g, "")}`;
}

/**
 * Ordered event log of one runner invocation, nested agent-tool runs included.
 *
 * @example
 * ```typescript
 * const trace = new Trace({ name: "support", recorders: [new InMemoryTraceRecorder()] });
 * trace.on("handoff", (event) => console.log(`${event.from} -> ${event.to}`));
 * await runner.run(triage, "Which tables exist?", { trace });
 * trace.end();
 * ```
 */
export class Trace {
  readonly traceId: string;
  readonly name: string;
  readonly disabled: boolean;

  private readonly metadata: Readonly<Record<string, unknown>>;
  private readonly recorders: readonly TraceRecorder[];
  private readonly logger: Logger<ILogObj>;
  private readonly events: TraceEvent[] = [];
  private readonly listeners = new Map<TraceEventType | "*", Set<TraceListener>>();
  private nextEventId = 1;
  private startedAt?: number;
  private endedAt?: number;

  constructor(options: TraceOptions = {}) {
    this.traceId = options.traceId ?? generateTraceId();
    this.name = options.name ?? DEFAULT_TRACE_NAME;
    this.disabled = options.disabled ?? false;
    this.metadata = Object.freeze({ ...options.metadata });
    this.recorders = [...(options.recorders ?? [])];
    this.logger = options.logger ?? createLogger({ name: "switchboard:trace" });
  }

  static disabled(): Trace {
    return new Trace({ disabled: true });
  }

  get isStarted(): boolean {
    return this.startedAt !== undefined;
  }

  get isEnded(): boolean {
    return this.endedAt !== undefined;
  }

  /** Idempotent. */
  start(): void {
    if (this.startedAt !== undefined || this.disabled) return;
    this.startedAt = Date.now();
    const info = this.info();
    this.notify("onTraceStart", (recorder) => recorder.onTraceStart?.(info));
  }

  /** Idempotent; events emitted afterwards are dropped. */
  end(): void {
    if (this.endedAt !== undefined || this.disabled) return;
    this.start();
    this.endedAt = Date.now();
    const info = this.info();
    this.notify("onTraceEnd", (recorder) => recorder.onTraceEnd?.(info));
  }

  emit(input: TraceEventInput): void {
    if (this.disabled) return;
    if (this.endedAt !== undefined) {
      this.logger.warn("Dropping event emitted after the trace ended", { type: input.type });
      return;
    }

    const event: TraceEvent = {
      ...input,
      eventId: this.nextEventId++,
      traceId: this.traceId,
      timestamp: Date.now(),
    };
    this.events.push(event);

    this.notify("onEvent", (recorder) => recorder.onEvent(event));
    for (const key of [event.type, "*"] as const) {
      for (const listener of this.listeners.get(key) ?? []) {
        try {
          listener(event);
        } catch (error) {
          this.logger.error("Trace listener threw", {
            type: event.type,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  /** Subscribes to one event type, or every event with `"*"`. Returns an unsubscribe function. */
  on<T extends TraceEventType>(type: T, listener: TraceListener<TraceEventOfType<T>>): () => void;
  on(type: "*", listener: TraceListener): () => void;
  on(type: TraceEventType | "*", listener: TraceListener): () => void {
    const set = this.listeners.get(type) ?? new Set<TraceListener>();
    this.listeners.set(type, set);
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  getEvents(): readonly TraceEvent[] {
    return this.events.slice();
  }

  getEventsByType<T extends TraceEventType>(type: T): TraceEventOfType<T>[] {
    return this.events.filter((event): event is TraceEventOfType<T> => event.type === type);
  }

  info(): TraceInfo {
    return {
      traceId: this.traceId,
      name: this.name,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      metadata: this.metadata,
    };
  }

  private notify(hook: string, call: (recorder: TraceRecorder) => void | Promise<void>): void {
    for (const recorder of this.recorders) {
      const report = (error: unknown) =>
        this.logger.error(`Trace recorder ${hook} failed`, {
          recorder: recorder.constructor.name,
          error: error instanceof Error ? error.message : String(error),
        });
      try {
        const result = call(recorder);
        if (result instanceof Promise) {
          void result.catch(report);
        }
      } catch (error) {
        report(error);
      }
    }
  }
}
