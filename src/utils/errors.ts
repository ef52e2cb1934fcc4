/**
 * Pipeline error taxonomy
 *
 * Every stage raises at its own boundary when a precondition fails. None of
 * them retry: the operations are deterministic.
 *
 * @module utils/errors
 */

/**
 * Base class of all errors raised by the pipeline
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public field?: string,
    public value?: unknown
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'PipelineError';
  }
}

/**
 * Invalid or incompatible sampling / filter parameters
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, field?: string, value?: unknown) {
    super(message, field, value);
    this.name = 'ConfigurationError';
  }
}

/**
 * Signal too short for the requested window or statistic
 */
export class InsufficientDataError extends PipelineError {
  constructor(
    message: string,
    public required: number,
    public actual: number
  ) {
    super(`${message} (need ${required}, got ${actual})`);
    this.name = 'InsufficientDataError';
  }
}

/**
 * Signal with no samples or no channels
 */
export class DegenerateSignalError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'DegenerateSignalError';
  }
}

/**
 * Malformed input data (ragged rows, non-finite samples, mismatched masks)
 */
export class ValidationError extends PipelineError {
  constructor(message: string, field: string, value: unknown) {
    super(message, field, value);
    this.name = 'ValidationError';
  }
}
