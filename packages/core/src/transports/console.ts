/**
 * @switchyard/core - Console Transport
 *
 * Default transport. JSON lines in production, coloured single lines in development.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ pretty: true, colors: false });
 * ```
 */

import { isDevelopment } from "../env.js";
import type { LogEntry, LogLevelName } from "../logger.js";
import type { LogTransport } from "./types.js";

export interface ConsoleTransportOptions {
  /** Human-readable output (default: true outside production and test) */
  pretty?: boolean;
  /** ANSI colors in pretty mode (default: true when stdout is a TTY) */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m",
  DEBUG: "\x1b[36m",
  INFO: "\x1b[32m",
  WARN: "\x1b[33m",
  ERROR: "\x1b[31m",
  FATAL: "\x1b[35m",
  SILENT: "",
};

const RESET = "\x1b[0m";

export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  log(entry: LogEntry): void {
    if (this.pretty) {
      this.write(entry.level, formatPretty(entry, this.colors), entry.error?.stack);
    } else {
      this.write(entry.level, formatJson(entry));
    }
  }

  private write(level: LogLevelName, line: string, stack?: string): void {
    switch (level) {
      case "ERROR":
      case "FATAL":
        console.error(line);
        if (stack) console.error(stack);
        break;
      case "WARN":
        console.warn(line);
        break;
      case "DEBUG":
      case "TRACE":
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

/**
 * Single JSON line: level, time, msg, context fields, and `err` when present
 */
export function formatJson(entry: LogEntry): string {
  const output: Record<string, unknown> = {
    level: entry.level,
    time: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  if (entry.error) {
    output["err"] = entry.error;
  }
  return JSON.stringify(output);
}

/**
 * `[hh:mm:ss] LEVEL message {context}`
 */
export function formatPretty(entry: LogEntry, colors: boolean): string {
  const color = colors ? LEVEL_COLORS[entry.level] : "";
  const reset = colors ? RESET : "";
  const timePart = entry.timestamp.split("T")[1];
  const time = timePart ? timePart.slice(0, 8) : entry.timestamp;

  let line = `${color}[${time}] ${entry.level.padEnd(5)}${reset} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  return line;
}
