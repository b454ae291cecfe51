/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, redact, isLogLevel, symbols, LOG_LEVELS, type LogLevel } from './Logger.js';
export {
  ZonekeeperError,
  TransportError,
  ApiError,
  InvariantViolation,
  ConfigurationError,
  SessionStateError,
  ExternalIpError,
  isZonekeeperError,
  type ConfigurationIssue,
  type ErrorCode,
} from './errors.js';
