/**
 * Utility exports
 * @module utils
 */

// Errors
export {
  PipelineError,
  ConfigurationError,
  InsufficientDataError,
  DegenerateSignalError,
  ValidationError,
} from './errors';

// Validation utilities
export { validateSignalMatrix, requireSamples, validateMask, type SignalShape } from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  configureFromEnvironment,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LogContext,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
