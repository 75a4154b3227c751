import type { ZodType } from "zod";
import type { Agent } from "../agent/agent.js";
import { ValidationError } from "../core/errors.js";
import type { RunItem } from "../core/items.js";
import type { UsageSnapshot } from "../core/usage.js";
import { describeIssues } from "../tools/error-formatter.js";
import type { Trace } from "../tracing/trace.js";

export interface RunResultInit<TContext> {
  finalOutput: string;
  inputItems: readonly RunItem[];
  newItems: readonly RunItem[];
  lastAgent: Agent<TContext>;
  usage: UsageSnapshot;
  turns: number;
  trace?: Trace;
}

/**
 * Outcome of a completed run. Immutable; feed {@link RunResult.toInputList} into
 * another run to continue the conversation.
 *
 * @example
 * ```typescript
 * const research = await runner.run(orchestrator, question);
 * const answer = await runner.run(synthesizer, research.toInputList());
 * ```
 */
export class RunResult<TContext = unknown> {
  readonly finalOutput: string;
  /** Items the run started from. */
  readonly inputItems: readonly RunItem[];
  /** Items the run appended. */
  readonly newItems: readonly RunItem[];
  /** Agent that produced the final output. */
  readonly lastAgent: Agent<TContext>;
  readonly usage: UsageSnapshot;
  /** Model calls made by this run (nested runs excluded). */
  readonly turns: number;
  /** Undefined when tracing was disabled. */
  readonly trace?: Trace;

  constructor(init: RunResultInit<TContext>) {
    this.finalOutput = init.finalOutput;
    this.inputItems = Object.freeze([...init.inputItems]);
    this.newItems = Object.freeze([...init.newItems]);
    this.lastAgent = init.lastAgent;
    this.usage = Object.freeze({ ...init.usage });
    this.turns = init.turns;
    this.trace = init.trace;
    Object.freeze(this);
  }

  /** The full item log: input followed by new items. */
  get items(): readonly RunItem[] {
    return [...this.inputItems, ...this.newItems];
  }

  /** The full item log as input for a further run. */
  toInputList(): RunItem[] {
    return [...this.inputItems, ...this.newItems];
  }

  /**
   * Parses the final output as JSON and validates it.
   *
   * @throws ValidationError when the output is not JSON or does not match `schema`
   */
  finalOutputAs<T>(schema: ZodType<T>): T {
    let value: unknown;
    try {
      value = JSON.parse(this.finalOutput);
    } catch (error) {
      throw new ValidationError("Final output is not valid JSON", { cause: error });
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError("Final output does not match the expected schema", {
        issues: describeIssues(parsed.error),
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
