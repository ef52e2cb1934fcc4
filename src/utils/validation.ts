/**
 * Input validation utilities
 * @module utils/validation
 */

import type { SignalMatrix } from '../types';
import { DegenerateSignalError, InsufficientDataError, ValidationError } from './errors';

/**
 * Shape of a validated signal
 */
export interface SignalShape {
  channels: number;
  samples: number;
}

/**
 * Validate a channel × sample matrix and return its shape.
 * Empty signals raise DegenerateSignalError, ragged or non-finite ones ValidationError.
 */
export function validateSignalMatrix(signal: SignalMatrix, field: string = 'signal'): SignalShape {
  if (!Array.isArray(signal)) {
    throw new ValidationError('Signal must be an array of channels', field, signal);
  }
  if (signal.length === 0) {
    throw new DegenerateSignalError('Signal has no channels');
  }

  const samples = signal[0].length;
  if (samples === 0) {
    throw new DegenerateSignalError('Signal has zero length');
  }

  for (let ch = 0; ch < signal.length; ch++) {
    const row = signal[ch];
    if (!Array.isArray(row)) {
      throw new ValidationError('Channel must be an array of samples', `${field}[${ch}]`, row);
    }
    if (row.length !== samples) {
      throw new ValidationError(
        `Channel has ${row.length} samples but expected ${samples}`,
        `${field}[${ch}]`,
        row.length
      );
    }
    for (let i = 0; i < samples; i++) {
      if (!Number.isFinite(row[i])) {
        throw new ValidationError('Samples must be finite numbers', `${field}[${ch}][${i}]`, row[i]);
      }
    }
  }

  return { channels: signal.length, samples };
}

/**
 * Require at least `required` samples
 */
export function requireSamples(actual: number, required: number, what: string): void {
  if (actual < required) {
    throw new InsufficientDataError(`${what} needs more samples`, required, actual);
  }
}

/**
 * Validate a per-index boolean mask against an expected length
 */
export function validateMask(mask: boolean[], expectedLength: number, field: string): void {
  if (!Array.isArray(mask) || mask.length !== expectedLength) {
    throw new ValidationError(
      `Mask must have ${expectedLength} entries`,
      field,
      Array.isArray(mask) ? mask.length : mask
    );
  }
}
