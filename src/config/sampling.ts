/**
 * Sampling configuration resolution
 * @module config/sampling
 */

import type { ResolvedSamplingConfig, SamplingConfig, SignalMatrix } from '../types';
import { POWERLINE_FREQUENCIES } from '../types';
import { ConfigurationError } from '../utils/errors';
import { DEFAULT_POWERLINE_FREQUENCY } from './defaults';

/**
 * Validate a sampling configuration and fill in defaults.
 * The channel count falls back to the signal's row count.
 */
export function resolveSamplingConfig(
  config: SamplingConfig,
  signal?: SignalMatrix
): ResolvedSamplingConfig {
  const { samplingRate } = config;

  if (typeof samplingRate !== 'number' || !Number.isFinite(samplingRate) || samplingRate <= 0) {
    throw new ConfigurationError('Sampling rate must be a positive number', 'samplingRate', samplingRate);
  }

  const powerlineFrequency = config.powerlineFrequency ?? DEFAULT_POWERLINE_FREQUENCY;
  if (!POWERLINE_FREQUENCIES.includes(powerlineFrequency)) {
    throw new ConfigurationError(
      'Powerline frequency must be 50 or 60 Hz',
      'powerlineFrequency',
      powerlineFrequency
    );
  }

  const channelCount = config.channelCount ?? signal?.length ?? 0;
  if (!Number.isInteger(channelCount) || channelCount < 0) {
    throw new ConfigurationError('Channel count must be a non-negative integer', 'channelCount', channelCount);
  }
  if (signal && config.channelCount !== undefined && config.channelCount !== signal.length) {
    throw new ConfigurationError(
      `Configured for ${config.channelCount} channels but the signal has ${signal.length}`,
      'channelCount',
      config.channelCount
    );
  }

  return { samplingRate, powerlineFrequency, channelCount };
}

/**
 * Nyquist frequency of a sampling rate
 */
export function nyquist(samplingRate: number): number {
  return samplingRate / 2;
}
