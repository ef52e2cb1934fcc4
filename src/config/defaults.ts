/**
 * Default configuration values
 *
 * The muscle RMS factor and the attenuation floor are empirical constants
 * without a documented calibration; override them per dataset.
 *
 * @module config/defaults
 */

import type {
  ArtifactDetectionOptions,
  ArtifactRemovalOptions,
  BandName,
  FeatureExtractionOptions,
  FilterCascadeOptions,
  FrequencyRange,
  PowerlineFrequency,
} from '../types';

export const DEFAULT_POWERLINE_FREQUENCY: PowerlineFrequency = 50;

/**
 * Default filter cascade: 1-45 Hz order-4 Butterworth, Q=35 notch
 */
export const DEFAULT_FILTER_CASCADE_OPTIONS: FilterCascadeOptions = {
  bandpass: [1, 45],
  order: 4,
  notchQualityFactor: 35,
};

export const DEFAULT_ARTIFACT_DETECTION_OPTIONS: ArtifactDetectionOptions = {
  amplitudeThreshold: 100,
  muscleBand: [30, 100],
  muscleFilterOrder: 8,
  muscleChannelLimit: 4,
  muscleRmsFactor: 3,
  muscleRmsWindowSeconds: 1,
  deadChannelThreshold: 0.1,
};

export const DEFAULT_ARTIFACT_REMOVAL_OPTIONS: ArtifactRemovalOptions = {
  minRunLength: 10,
  taperFraction: 0.3,
  attenuationFloor: 0.3,
};

/**
 * Canonical EEG bands in Hz (inclusive at both ends)
 */
export const FREQUENCY_BANDS: Readonly<Record<BandName, FrequencyRange>> = {
  delta: [1, 4],
  theta: [4, 8],
  alpha: [8, 13],
  beta: [13, 30],
  gamma: [30, 45],
};

export const DEFAULT_FEATURE_OPTIONS: FeatureExtractionOptions = {
  windowSeconds: 2,
  overlapSeconds: 1,
  bands: FREQUENCY_BANDS,
  spectralEdgeFraction: 0.95,
  welch: {},
};

/**
 * Per-channel feature names in column order
 */
export const FEATURE_BASE_NAMES = [
  'Mean',
  'Variance',
  'Skewness',
  'Kurtosis',
  'HjorthActivity',
  'HjorthMobility',
  'HjorthComplexity',
  'TotalPower',
  'Delta',
  'Theta',
  'Alpha',
  'Beta',
  'Gamma',
  'SEF95',
  'MeanFreq',
] as const;

export type FeatureBaseName = (typeof FEATURE_BASE_NAMES)[number];

export const FEATURES_PER_CHANNEL = FEATURE_BASE_NAMES.length;
