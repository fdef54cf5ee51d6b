/**
 * @switchyard/core - Transport Types
 */

import type { LogEntry } from "../logger.js";

/**
 * Log transport interface
 * Implement this to send entries somewhere other than the console
 */
export interface LogTransport {
  readonly name: string;

  /**
   * Write an entry. Async transports buffer on their own; the logger does not await.
   */
  log(entry: LogEntry): void | Promise<void>;

  /** Flush buffered entries on shutdown */
  flush?(): Promise<void>;
}
