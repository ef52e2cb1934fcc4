/**
 * Sampling configuration from environment variables
 *
 * Recognized variables:
 * - EEG_SAMPLING_RATE (required)
 * - EEG_POWERLINE_FREQUENCY (50 | 60)
 * - EEG_CHANNEL_COUNT
 *
 * @module config/environment
 */

import type { PowerlineFrequency, SamplingConfig } from '../types';
import { ConfigurationError } from '../utils/errors';
import { resolveSamplingConfig } from './sampling';

export type Environment = Record<string, string | undefined>;

function parseNumber(env: Environment, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be numeric`, key, raw);
  }
  return value;
}

function parsePowerline(env: Environment): PowerlineFrequency | undefined {
  const value = parseNumber(env, 'EEG_POWERLINE_FREQUENCY');
  if (value === undefined) return undefined;
  if (value === 50 || value === 60) return value;
  throw new ConfigurationError('Powerline frequency must be 50 or 60 Hz', 'EEG_POWERLINE_FREQUENCY', value);
}

/**
 * Build a sampling configuration from environment variables
 */
export function samplingConfigFromEnvironment(env: Environment = process.env): SamplingConfig {
  const samplingRate = parseNumber(env, 'EEG_SAMPLING_RATE');
  if (samplingRate === undefined) {
    throw new ConfigurationError('EEG_SAMPLING_RATE is not set', 'EEG_SAMPLING_RATE', undefined);
  }

  const config: SamplingConfig = { samplingRate };

  const powerlineFrequency = parsePowerline(env);
  if (powerlineFrequency !== undefined) config.powerlineFrequency = powerlineFrequency;

  const channelCount = parseNumber(env, 'EEG_CHANNEL_COUNT');
  if (channelCount !== undefined) config.channelCount = channelCount;

  resolveSamplingConfig(config);
  return config;
}

/**
 * Parse a recording duration in seconds, as given on the command line
 */
export function parseDurationSeconds(raw: string | undefined, fallback: number = 10): number {
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError('Duration must be a positive number of seconds', 'duration', raw);
  }
  return value;
}
