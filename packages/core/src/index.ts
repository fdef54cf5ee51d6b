/**
 * @module
 * Core utilities shared by Switchyard packages: logging, errors, environment.
 *
 * @example
 * ```typescript
 * import { createLogger, SwitchyardError, getEnvJson } from '@switchyard/core';
 *
 * const log = createLogger({ name: 'orders-client' });
 * const properties = getEnvJson('SWITCHYARD_CLIENT_CONFIG');
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export { getEnv, getEnvJson } from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  createLogger,
  logError,
  type ConsoleTransportOptions,
  type ErrorInfo,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
} from "./logger.js";

export { formatJson, formatPretty } from "./transports/console.js";

// ============================================
// ERRORS
// ============================================

export { SwitchyardError, ConfigurationError, causeChain } from "./errors.js";
