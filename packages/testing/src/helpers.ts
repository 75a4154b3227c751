import type { ILogObj, Logger } from "tslog";
import { z } from "zod";
import {
  createFunctionTool,
  createLogger,
  type FunctionTool,
  type ModelClient,
  Runner,
  type RunnerOptions,
} from "switchboard";

/** A logger that records nothing, for quiet tests. */
export function silentLogger(name = "test"): Logger<ILogObj> {
  return createLogger({ name, type: "hidden" });
}

/**
 * A runner with a silent logger, no trace recorders from the environment and
 * retries without backoff delays.
 */
export function createTestRunner<TContext = unknown>(
  model: ModelClient,
  options: Omit<RunnerOptions<TContext>, "model"> = {},
): Runner<TContext> {
  return new Runner<TContext>({
    logger: silentLogger("runner"),
    traceRecorders: [],
    ...options,
    model,
    retry: { minTimeout: 1, maxTimeout: 1, randomize: false, ...options.retry },
  });
}

export const echoParameters = z.object({
  message: z.string().describe("Message to echo"),
});

/** Returns `Echo: <message>`. */
export const echoTool: FunctionTool<z.infer<typeof echoParameters>> = createFunctionTool({
  name: "echo",
  description: "Echoes the message back",
  parameters: echoParameters,
  execute: ({ message }) => `Echo: ${message}`,
});

/** Always throws `Intentional failure`. */
export const failingTool = createFunctionTool({
  name: "always_fails",
  description: "A tool that always throws",
  parameters: z.object({}),
  execute: () => {
    throw new Error("Intentional failure");
  },
});

/**
 * Resolves with `output` after `delayMs`, or rejects when the call's signal
 * fires first.
 */
export function delayedTool(name: string, delayMs: number, output: string) {
  return createFunctionTool({
    name,
    description: `Answers after ${delayMs}ms`,
    parameters: z.object({}),
    execute: (_args, ctx) =>
      new Promise<string>((resolve, reject) => {
        const timer = setTimeout(() => resolve(output), delayMs);
        ctx.signal.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            reject(new Error(`${name} aborted`));
          },
          { once: true },
        );
      }),
  });
}

export const showTablesParameters = z.object({
  database: z.string().default("default").describe("Database to list"),
});

/** Lists `tables`, one per line, as a fake database would. */
export function showTablesTool(
  tables: readonly string[],
): FunctionTool<z.infer<typeof showTablesParameters>> {
  return createFunctionTool({
    name: "show_tables",
    description: "Lists the tables of a database",
    parameters: showTablesParameters,
    execute: () => tables.join("\n"),
  });
}
