/**
 * Lifecycle hooks.
 *
 * Hooks are observers: they see what happens but cannot change it, and anything
 * they throw is logged and dropped. The same interface is used at two levels:
 *
 * - **Agent hooks** (`new Agent({ hooks })`) fire only for events of that agent.
 * - **Run hooks** (`RunnerOptions.hooks`, `RunConfig.hooks`) fire for every agent of the run.
 *
 * Run hooks fire first, then the agent's own hooks, each list in order.
 *
 * @example
 * ```typescript
 * const auditHooks: AgentHooks = {
 *   onToolEnd: (ctx, agent, tool, result) => audit.write(agent.name, tool.name, result),
 * };
 * await runner.run(triage, "Which tables exist?", { hooks: auditHooks });
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import { safeObserve } from "../core/errors.js";
import type { RunContextView } from "../run/context.js";
import type { Tool } from "../tools/tool.js";
import type { Agent } from "./agent.js";

type HookReturn = void | Promise<void>;

export interface AgentHooks<TContext = unknown> {
  /** The agent became active: at the start of the run or after a hand-off to it. */
  onStart?(ctx: RunContextView<TContext>, agent: Agent<TContext>): HookReturn;
  /** The agent produced the run's final output. */
  onEnd?(ctx: RunContextView<TContext>, agent: Agent<TContext>, output: string): HookReturn;
  /** Control is being handed to `agent` by `source`. */
  onHandoff?(
    ctx: RunContextView<TContext>,
    agent: Agent<TContext>,
    source: Agent<TContext>,
  ): HookReturn;
  onToolStart?(
    ctx: RunContextView<TContext>,
    agent: Agent<TContext>,
    tool: Tool<TContext>,
  ): HookReturn;
  onToolEnd?(
    ctx: RunContextView<TContext>,
    agent: Agent<TContext>,
    tool: Tool<TContext>,
    result: string,
  ): HookReturn;
}

function isHookList<TContext>(
  hooks: AgentHooks<TContext> | readonly AgentHooks<TContext>[],
): hooks is readonly AgentHooks<TContext>[] {
  return Array.isArray(hooks);
}

export function normalizeHooks<TContext>(
  hooks: AgentHooks<TContext> | readonly AgentHooks<TContext>[] | undefined,
): AgentHooks<TContext>[] {
  if (!hooks) return [];
  return isHookList(hooks) ? [...hooks] : [hooks];
}

/** Fans lifecycle events out to run-level hooks, then the relevant agent's hooks. */
export class HookDispatcher<TContext = unknown> {
  constructor(
    private readonly runHooks: readonly AgentHooks<TContext>[],
    private readonly logger: Logger<ILogObj>,
  ) {}

  agentStart(ctx: RunContextView<TContext>, agent: Agent<TContext>): Promise<void> {
    return this.dispatch(agent, "onStart", (hooks) => hooks.onStart?.(ctx, agent));
  }

  agentEnd(ctx: RunContextView<TContext>, agent: Agent<TContext>, output: string): Promise<void> {
    return this.dispatch(agent, "onEnd", (hooks) => hooks.onEnd?.(ctx, agent, output));
  }

  /** Agent-level `onHandoff` fires on the receiving agent's hooks. */
  handoff(
    ctx: RunContextView<TContext>,
    from: Agent<TContext>,
    to: Agent<TContext>,
  ): Promise<void> {
    return this.dispatch(to, "onHandoff", (hooks) => hooks.onHandoff?.(ctx, to, from));
  }

  toolStart(
    ctx: RunContextView<TContext>,
    agent: Agent<TContext>,
    tool: Tool<TContext>,
  ): Promise<void> {
    return this.dispatch(agent, "onToolStart", (hooks) => hooks.onToolStart?.(ctx, agent, tool));
  }

  toolEnd(
    ctx: RunContextView<TContext>,
    agent: Agent<TContext>,
    tool: Tool<TContext>,
    result: string,
  ): Promise<void> {
    return this.dispatch(agent, "onToolEnd", (hooks) =>
      hooks.onToolEnd?.(ctx, agent, tool, result),
    );
  }

  private async dispatch(
    agent: Agent<TContext>,
    event: keyof AgentHooks<TContext>,
    call: (hooks: AgentHooks<TContext>) => HookReturn | undefined,
  ): Promise<void> {
    for (const hooks of [...this.runHooks, ...agent.hooks]) {
      await safeObserve(() => call(hooks), this.logger, `${agent.name} ${event} hook`);
    }
  }
}
