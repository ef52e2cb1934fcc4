/**
 * Filter Cascade
 *
 * DC removal, zero-phase Butterworth band-pass and zero-phase powerline notch,
 * applied independently to every channel.
 *
 * @module signal/preprocessing/filter-cascade
 */

import { DEFAULT_FILTER_CASCADE_OPTIONS } from '../../config/defaults';
import { resolveSamplingConfig } from '../../config/sampling';
import type {
  FilterCascadeOptions,
  ResolvedSamplingConfig,
  SamplingConfig,
  SignalMatrix,
} from '../../types';
import { ConfigurationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { validateSignalMatrix } from '../../utils/validation';
import { designButterworthBandpass } from '../utils/butterworth';
import { filtfilt, notchCoefficients, removeDCOffset, type SecondOrderSections } from '../utils/filters';

const logger = createLogger('filter-cascade');

/**
 * Designed filters for one sampling configuration
 */
export interface CascadeFilters {
  bandpass: SecondOrderSections;
  notch: SecondOrderSections;
}

/**
 * Subtract each channel's mean over all of its samples
 */
export function removeChannelMeans(signal: SignalMatrix): SignalMatrix {
  validateSignalMatrix(signal);
  return signal.map(removeDCOffset);
}

/**
 * Reject sampling rates that cannot represent the band-pass upper corner or
 * the powerline frequency.
 */
export function assertFilterable(
  sampling: ResolvedSamplingConfig,
  options: FilterCascadeOptions
): void {
  const [low, high] = options.bandpass;
  if (!(low > 0 && low < high)) {
    throw new ConfigurationError('Band-pass corners must satisfy 0 < low < high', 'bandpass', options.bandpass);
  }

  const highest = Math.max(high, sampling.powerlineFrequency);
  if (sampling.samplingRate <= 2 * highest) {
    throw new ConfigurationError(
      `Sampling rate must exceed ${2 * highest} Hz (twice the ${highest} Hz ` +
        `${highest === high ? 'band-pass corner' : 'notch frequency'})`,
      'samplingRate',
      sampling.samplingRate
    );
  }

  if (!(options.notchQualityFactor > 0)) {
    throw new ConfigurationError('Notch quality factor must be positive', 'notchQualityFactor', options.notchQualityFactor);
  }
}

/**
 * Design the band-pass and notch filters for a configuration
 */
export function designCascadeFilters(
  sampling: ResolvedSamplingConfig,
  options: FilterCascadeOptions
): CascadeFilters {
  assertFilterable(sampling, options);

  const [low, high] = options.bandpass;
  return {
    bandpass: designButterworthBandpass(options.order, low, high, sampling.samplingRate),
    notch: [notchCoefficients(sampling.powerlineFrequency, sampling.samplingRate, options.notchQualityFactor)],
  };
}

/**
 * Remove DC, band-pass and notch every channel. Output has the input's shape.
 *
 * @throws ConfigurationError when the sampling rate is at or below twice the
 *   band-pass upper corner or the powerline frequency
 */
export function filterCascade(
  signal: SignalMatrix,
  config: SamplingConfig,
  options: Partial<FilterCascadeOptions> = {}
): SignalMatrix {
  const shape = validateSignalMatrix(signal);
  const sampling = resolveSamplingConfig(config, signal);
  const opts: FilterCascadeOptions = { ...DEFAULT_FILTER_CASCADE_OPTIONS, ...options };
  const { bandpass, notch } = designCascadeFilters(sampling, opts);

  logger.debug('Filtering', {
    ...shape,
    bandpass: opts.bandpass,
    order: opts.order,
    notchHz: sampling.powerlineFrequency,
  });

  return signal.map((channel) => {
    const centered = removeDCOffset(channel);
    return filtfilt(filtfilt(centered, bandpass), notch);
  });
}
