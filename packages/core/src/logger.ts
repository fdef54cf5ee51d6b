/**
 * @module
 * Structured logging shared by every Switchyard package.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@switchyard/core';
 *
 * const log = createLogger({ name: 'dispatch', level: 'DEBUG' });
 * log.info('Endpoint chosen', { service: 'orders', host: '10.0.0.5' });
 *
 * const callLog = log.child({ service: 'orders' });
 * callLog.warn('Slow response', { latencyMs: 2400 });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/**
 * Numeric value of each log level. Entries below the logger's level are dropped.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

export type LogLevelName = keyof typeof LogLevel;

export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/** Error fields copied into a log entry */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
}

/**
 * One log event as handed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp, or "" when timestamps are disabled */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

export interface LoggerConfig {
  /** Minimum level; falls back to LOG_LEVEL, then INFO */
  level?: LogLevelName;
  /** Logger name, emitted as the `module` field */
  name?: string;
  /** Fields attached to every entry */
  context?: Record<string, unknown>;
  transports?: LogTransport[];
  /** Pretty console output; ignored when transports are given */
  pretty?: boolean;
  /** Extra field names to redact */
  redact?: string[];
  timestamp?: boolean | (() => string);
}

const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "cookie",
  "proxy-authorization",
];

function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && value in LogLevel;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replace the listed fields with "[REDACTED]". Dotted names ("headers.authorization")
 * reach into nested records; every record on the path is copied, never mutated.
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: string[]
): Record<string, unknown> {
  let result = { ...obj };
  for (const field of fields) {
    result = redactPath(result, field.split("."));
  }
  return result;
}

function redactPath(
  obj: Record<string, unknown>,
  path: string[]
): Record<string, unknown> {
  const [head, ...rest] = path;
  if (head === undefined || !(head in obj)) {
    return obj;
  }
  if (rest.length === 0) {
    return { ...obj, [head]: "[REDACTED]" };
  }
  const nested = obj[head];
  if (!isRecord(nested)) {
    return obj;
  }
  return { ...obj, [head]: redactPath(nested, rest) };
}

/**
 * Structured logger writing to one or more transports.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'registry', level: 'DEBUG' });
 * logger.debug('Endpoints replaced', { service: 'orders', count: 3 });
 * logger.error('Recorder failed', new Error('boom'), { service: 'orders' });
 * ```
 */
export class Logger {
  private readonly level: LogLevelValue;
  private readonly levelName: LogLevelName;
  private readonly name: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];
  private readonly redact: string[];
  private readonly timestampFn: () => string;

  constructor(config: LoggerConfig = {}) {
    const envLevel = getEnv("LOG_LEVEL")?.toUpperCase();
    this.levelName = config.level ?? (isLogLevelName(envLevel) ? envLevel : "INFO");
    this.level = LogLevel[this.levelName];
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redact = [...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger sharing transports, with additional context and
   * optionally more fields to redact
   */
  child(context: Record<string, unknown>, options: { redact?: string[] } = {}): Logger {
    const config: LoggerConfig = {
      level: this.levelName,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: [...this.redact, ...(options.redact ?? [])],
      timestamp: this.timestampFn,
    };
    if (this.name !== undefined) {
      config.name = this.name;
    }
    return new Logger(config);
  }

  /** Whether entries at `level` would reach the transports */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level;
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    let merged: Record<string, unknown> = { ...this.context };
    if (this.name) {
      merged["module"] = this.name;
    }
    if (context) {
      merged = { ...merged, ...context };
    }
    merged = redactFields(merged, this.redact);

    const entry: LogEntry = {
      level,
      levelValue: LogLevel[level],
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error: error
        ? { name: error.name, message: error.message, stack: error.stack }
        : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => {
          console.error(`Log transport "${transport.name}" failed:`, err);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error. The second argument may be the Error or, when there is none,
   * the context.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else if (isRecord(error)) {
      this.log("ERROR", message, { ...error, ...context });
    } else {
      this.log("ERROR", message, context);
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else if (isRecord(error)) {
      this.log("FATAL", message, { ...error, ...context });
    } else {
      this.log("FATAL", message, context);
    }
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Log any thrown value. Non-Error values are stringified into the `error` field.
 *
 * @example
 * ```typescript
 * try {
 *   recorder.observe(outcome);
 * } catch (error) {
 *   logError(logger, error, 'Statistics recording failed', { service });
 * }
 * ```
 */
export function logError(
  log: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
