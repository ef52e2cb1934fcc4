/**
 * Feature Extractor
 *
 * Slides a fixed window over the cleaned signal and computes 15 features per
 * channel: four moments, three Hjorth parameters and eight spectral features
 * from a Welch PSD.
 *
 * @module signal/features/feature-extractor
 */

import { DEFAULT_FEATURE_OPTIONS, FEATURE_BASE_NAMES } from '../../config/defaults';
import { resolveSamplingConfig } from '../../config/sampling';
import type {
  FeatureExtractionOptions,
  FeatureExtractionResult,
  FrequencyRange,
  PowerSpectrum,
  SamplingConfig,
  SignalMatrix,
} from '../../types';
import { ConfigurationError, InsufficientDataError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { requireSamples, validateSignalMatrix } from '../../utils/validation';
import { welchPsd } from '../utils/spectral';
import { kurtosis, mean, skewness, sum, variance } from '../utils/statistics';
import { hjorthParameters } from './hjorth';

const logger = createLogger('feature-extractor');

/**
 * Window length and step in samples
 */
export interface WindowGeometry {
  windowLength: number;
  step: number;
}

/**
 * Convert the window and overlap durations to sample counts
 */
export function windowGeometry(
  samplingRate: number,
  options: Pick<FeatureExtractionOptions, 'windowSeconds' | 'overlapSeconds'>
): WindowGeometry {
  const windowLength = Math.round(options.windowSeconds * samplingRate);
  const overlap = Math.round(options.overlapSeconds * samplingRate);
  const step = windowLength - overlap;

  if (windowLength < 2) {
    throw new ConfigurationError('Feature window must span at least 2 samples', 'windowSeconds', options.windowSeconds);
  }
  if (overlap < 0 || step < 1) {
    throw new ConfigurationError(
      'Window overlap must be non-negative and shorter than the window',
      'overlapSeconds',
      options.overlapSeconds
    );
  }

  return { windowLength, step };
}

/**
 * Start index of every full window, ascending. The partial tail is dropped.
 */
export function windowStartIndices(sampleCount: number, windowLength: number, step: number): number[] {
  const starts: number[] = [];
  for (let start = 0; start + windowLength <= sampleCount; start += step) {
    starts.push(start);
  }
  return starts;
}

/**
 * Column names `Ch{NN}_{feature}` with 1-based, zero-padded channel numbers
 */
export function featureNames(channelCount: number): string[] {
  const names: string[] = [];
  for (let ch = 1; ch <= channelCount; ch++) {
    const prefix = `Ch${String(ch).padStart(2, '0')}`;
    for (const base of FEATURE_BASE_NAMES) {
      names.push(`${prefix}_${base}`);
    }
  }
  return names;
}

/**
 * Sum of PSD bins whose frequency lies in [low, high]
 */
export function bandPower(spectrum: PowerSpectrum, band: FrequencyRange): number {
  const [low, high] = band;
  let power = 0;
  spectrum.frequencies.forEach((f, k) => {
    if (f >= low && f <= high) power += spectrum.psd[k];
  });
  return power;
}

/**
 * Lowest bin frequency at which cumulative power reaches `fraction` of the
 * total; 0 for a zero-power spectrum
 */
export function spectralEdgeFrequency(spectrum: PowerSpectrum, fraction: number): number {
  const total = sum(spectrum.psd);
  if (!(total > 0)) return 0;

  const target = fraction * total;
  let cumulative = 0;
  for (let k = 0; k < spectrum.psd.length; k++) {
    cumulative += spectrum.psd[k];
    if (cumulative >= target) return spectrum.frequencies[k];
  }
  // Rounding can leave the running sum a hair below the target
  return spectrum.frequencies[spectrum.frequencies.length - 1];
}

/**
 * Power-weighted mean frequency; 0 for a zero-power spectrum
 */
export function meanFrequency(spectrum: PowerSpectrum): number {
  const total = sum(spectrum.psd);
  if (!(total > 0)) return 0;

  let weighted = 0;
  spectrum.frequencies.forEach((f, k) => {
    weighted += f * spectrum.psd[k];
  });
  return weighted / total;
}

/**
 * The 15 features of one channel window, in FEATURE_BASE_NAMES order
 *
 * @throws InsufficientDataError for windows shorter than 2 samples
 */
export function computeChannelFeatures(
  window: number[],
  samplingRate: number,
  options: Partial<FeatureExtractionOptions> = {}
): number[] {
  requireSamples(window.length, 2, 'Channel features');
  const opts: FeatureExtractionOptions = { ...DEFAULT_FEATURE_OPTIONS, ...options };
  const { bands } = opts;

  const hjorth = hjorthParameters(window);
  const spectrum = welchPsd(window, samplingRate, opts.welch);

  return [
    mean(window),
    variance(window),
    skewness(window),
    kurtosis(window),
    hjorth.activity,
    hjorth.mobility,
    hjorth.complexity,
    sum(spectrum.psd),
    bandPower(spectrum, bands.delta),
    bandPower(spectrum, bands.theta),
    bandPower(spectrum, bands.alpha),
    bandPower(spectrum, bands.beta),
    bandPower(spectrum, bands.gamma),
    spectralEdgeFrequency(spectrum, opts.spectralEdgeFraction),
    meanFrequency(spectrum),
  ];
}

/**
 * Feature row for one window: channel features concatenated in channel order
 */
export function computeWindowFeatures(
  signal: SignalMatrix,
  start: number,
  windowLength: number,
  samplingRate: number,
  options: Partial<FeatureExtractionOptions> = {}
): number[] {
  const row: number[] = [];
  for (const channel of signal) {
    row.push(...computeChannelFeatures(channel.slice(start, start + windowLength), samplingRate, options));
  }
  return row;
}

/**
 * Extract the windowed feature matrix of a cleaned signal.
 *
 * @throws InsufficientDataError when the signal is shorter than one window
 * @throws ConfigurationError when the overlap leaves no forward step
 */
export function extractFeatures(
  signal: SignalMatrix,
  config: SamplingConfig,
  options: Partial<FeatureExtractionOptions> = {}
): FeatureExtractionResult {
  const { channels, samples } = validateSignalMatrix(signal);
  const { samplingRate } = resolveSamplingConfig(config, signal);
  const opts: FeatureExtractionOptions = { ...DEFAULT_FEATURE_OPTIONS, ...options };
  const { windowLength, step } = windowGeometry(samplingRate, opts);

  if (samples < windowLength) {
    throw new InsufficientDataError('Signal is shorter than one feature window', windowLength, samples);
  }

  const windowStarts = windowStartIndices(samples, windowLength, step);
  logger.debug('Extracting features', { windows: windowStarts.length, channels, windowLength, step });

  const features = windowStarts.map((start) =>
    computeWindowFeatures(signal, start, windowLength, samplingRate, opts)
  );

  return {
    features,
    featureNames: featureNames(channels),
    windowStarts,
    windowLength,
    step,
  };
}
