import type { Agent } from "../agent/agent.js";
import type { RunItem } from "../core/items.js";
import { type TokenPricing, Usage, type UsageSnapshot } from "../core/usage.js";

export interface RunContextOptions<TContext> {
  agent: Agent<TContext>;
  input: readonly RunItem[];
  context?: TContext;
  signal?: AbortSignal;
  promptValues?: Record<string, string>;
  /** The calling run's totals, for a nested agent-tool run. */
  parentUsage?: Usage;
  pricing?: TokenPricing;
}

/** What instruction functions and hooks see of a run. */
export interface RunContextView<TContext = unknown> {
  readonly context: TContext | undefined;
  readonly signal?: AbortSignal;
  readonly promptValues: Readonly<Record<string, string>>;
  readonly activeAgent: Agent<TContext>;
  readonly turn: number;
  readonly items: readonly RunItem[];
  readonly inputItems: readonly RunItem[];
  readonly newItems: readonly RunItem[];
  readonly lastUserMessage: string;
  readonly usage: UsageSnapshot;
}

class RunContextReader<TContext> implements RunContextView<TContext> {
  constructor(private readonly source: RunContext<TContext>) {}

  get context(): TContext | undefined {
    return this.source.context;
  }

  get signal(): AbortSignal | undefined {
    return this.source.signal;
  }

  get promptValues(): Readonly<Record<string, string>> {
    return this.source.promptValues;
  }

  get activeAgent(): Agent<TContext> {
    return this.source.activeAgent;
  }

  get turn(): number {
    return this.source.turn;
  }

  get items(): readonly RunItem[] {
    return this.source.items;
  }

  get inputItems(): readonly RunItem[] {
    return this.source.inputItems;
  }

  get newItems(): readonly RunItem[] {
    return this.source.newItems;
  }

  get lastUserMessage(): string {
    return this.source.lastUserMessage;
  }

  get usage(): UsageSnapshot {
    return this.source.usage.snapshot();
  }
}

/**
 * Run-scoped state threaded through every step: the append-only item log, the
 * caller's context payload, the active agent, the turn counter and token usage.
 *
 * Only the step engine appends items or switches the active agent. Instruction
 * functions and hooks are handed {@link RunContext.view}, which has no way to.
 */
export class RunContext<TContext = unknown> {
  readonly context: TContext | undefined;
  readonly signal?: AbortSignal;
  readonly promptValues: Readonly<Record<string, string>>;
  readonly usage: Usage;
  readonly view: RunContextView<TContext>;

  private readonly log: RunItem[];
  private readonly inputLength: number;
  private active: Agent<TContext>;
  private turnCount = 0;

  constructor(options: RunContextOptions<TContext>) {
    this.context = options.context;
    this.signal = options.signal;
    this.promptValues = Object.freeze({ ...options.promptValues });
    this.log = [...options.input];
    this.inputLength = this.log.length;
    this.active = options.agent;
    this.usage = new Usage(options.parentUsage, options.pricing);
    this.view = new RunContextReader(this);
  }

  get activeAgent(): Agent<TContext> {
    return this.active;
  }

  get turn(): number {
    return this.turnCount;
  }

  /** Every item: the run's input followed by what the run produced. */
  get items(): readonly RunItem[] {
    return this.log.slice();
  }

  get inputItems(): readonly RunItem[] {
    return this.log.slice(0, this.inputLength);
  }

  get newItems(): readonly RunItem[] {
    return this.log.slice(this.inputLength);
  }

  /** The most recent user message, or "" when there is none. */
  get lastUserMessage(): string {
    for (let i = this.log.length - 1; i >= 0; i--) {
      const item = this.log[i];
      if (item?.type === "user_message") {
        return item.content;
      }
    }
    return "";
  }

  /** @internal */
  append(...items: RunItem[]): void {
    this.log.push(...items);
  }

  /** @internal */
  switchAgent(agent: Agent<TContext>): void {
    this.active = agent;
  }

  /** @internal Starts the next turn and returns its number (1-based). */
  beginTurn(): number {
    this.turnCount++;
    return this.turnCount;
  }
}
