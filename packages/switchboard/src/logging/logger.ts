import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a level given either by name (`"debug"`) or number (`"2"`).
 * Numbers are clamped into tslog's 0-6 range.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numeric = Number(normalized);
  if (Number.isFinite(numeric)) {
    return Math.max(0, Math.min(6, Math.floor(numeric)));
  }

  return LOG_LEVELS[normalized];
}

function parseFlag(value?: string): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

export interface LoggerOptions {
  /**
   * 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4
   */
  minLevel?: number;

  /** @default "pretty" */
  type?: "pretty" | "json" | "hidden";

  /** @default "switchboard" */
  name?: string;

  /**
   * Truncate the log file named by `SWITCHBOARD_LOG_FILE` instead of appending to it.
   * @default false
   */
  logReset?: boolean;
}

// All loggers created in the process write through one stream per log file.
let fileStream: WriteStream | undefined;
let filePath: string | undefined;
let fileWriteErrors = 0;
const MAX_FILE_WRITE_ERRORS = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

export function stripAnsi(text: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escapes start with ESC
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

/** @internal Closes the shared log file stream. */
export function _resetFileLogging(): void {
  fileStream?.end();
  fileStream = undefined;
  filePath = undefined;
  fileWriteErrors = 0;
}

function openLogFile(path: string, reset: boolean): void {
  if (fileStream && filePath === path) {
    return;
  }
  _resetFileLogging();

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      fileWriteErrors++;
      if (fileWriteErrors === 1) {
        console.error(`[switchboard] Log file write error: ${error.message}`);
      }
      if (fileWriteErrors >= MAX_FILE_WRITE_ERRORS && fileStream === stream) {
        console.error("[switchboard] Disabling file logging after repeated write errors");
        _resetFileLogging();
      }
    });
    fileStream = stream;
    filePath = path;
  } catch (error) {
    console.error("[switchboard] Failed to open SWITCHBOARD_LOG_FILE:", error);
  }
}

/**
 * Creates a tslog logger. Explicit options win over the `SWITCHBOARD_LOG_*`
 * environment variables, which win over the defaults.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: 2 });
 * const quiet = createLogger({ type: "hidden" }); // tests
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.SWITCHBOARD_LOG_LEVEL) ?? 4;
  const type = options.type ?? "pretty";
  const logFile = process.env.SWITCHBOARD_LOG_FILE?.trim();

  if (logFile) {
    openLogFile(logFile, options.logReset ?? parseFlag(process.env.SWITCHBOARD_LOG_RESET) ?? false);
  }
  const toFile = fileStream !== undefined;

  return new Logger<ILogObj>({
    name: options.name ?? "switchboard",
    minLevel,
    type: toFile ? "pretty" : type,
    hideLogPositionForProduction: toFile || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: toFile
      ? {
          transportFormatted: (meta: string, args: unknown[]) => {
            const parts = args.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            fileStream?.write(`${stripAnsi(meta)}${parts.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

export const defaultLogger = createLogger();
