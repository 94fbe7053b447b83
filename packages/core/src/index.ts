/**
 * @foresight/core
 * Core utilities shared by the forecasting packages
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  requireEnv,
  getEnv,
  formatZodIssues,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  consoleHandler,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  ForesightError,
  ConfigError,
  ProviderError,
  UnknownModelError,
  RetrievalError,
  NetworkError,
  ValidationError,
  isForesightError,
  isRetryableError,
  wrapError,
} from "./errors.js";

// Retry
export { withRetry, sleep, type RetryOptions } from "./retry.js";

// Immutability
export { deepFreeze, type DeepReadonly } from "./freeze.js";
