/**
 * Stage option types
 *
 * Every stage accepts a partial options object merged over the defaults
 * in `config/defaults`.
 *
 * @module types/options
 */

import type { BandName, FrequencyRange } from './features';

/**
 * Filter cascade options
 */
export interface FilterCascadeOptions {
  /** Band-pass corners in Hz */
  bandpass: FrequencyRange;

  /** Band-pass filter order (even) */
  order: number;

  /** Quality factor of the powerline notch */
  notchQualityFactor: number;
}

/**
 * Artifact detection thresholds
 */
export interface ArtifactDetectionOptions {
  /** Absolute amplitude above which a sample is flagged (µV) */
  amplitudeThreshold: number;

  /** Band examined for muscle activity in Hz */
  muscleBand: FrequencyRange;

  /** Order of the muscle band-pass filter (even) */
  muscleFilterOrder: number;

  /** Number of leading channels examined for muscle activity */
  muscleChannelLimit: number;

  /** Multiple of the RMS trace's standard deviation that flags a sample */
  muscleRmsFactor: number;

  /** Moving RMS window in seconds */
  muscleRmsWindowSeconds: number;

  /** Standard deviation below which a channel is considered dead (µV) */
  deadChannelThreshold: number;
}

/**
 * Artifact attenuation options
 */
export interface ArtifactRemovalOptions {
  /** Runs of this length or shorter are left untouched */
  minRunLength: number;

  /** Tukey taper fraction */
  taperFraction: number;

  /** Gain applied where the taper is 0 */
  attenuationFloor: number;
}

/**
 * Welch periodogram options; unset values are derived from the input length
 */
export interface WelchOptions {
  /** Segment length in samples (default floor(N / 4.5)) */
  segmentLength?: number;

  /** Overlap between segments in samples (default half a segment) */
  overlap?: number;

  /** FFT length, power of two (default max(256, nextPow2(segment))) */
  fftLength?: number;
}

/**
 * Feature extraction options
 */
export interface FeatureExtractionOptions {
  /** Window length in seconds */
  windowSeconds: number;

  /** Overlap between consecutive windows in seconds */
  overlapSeconds: number;

  /** Band definitions, inclusive */
  bands: Readonly<Record<BandName, FrequencyRange>>;

  /** Cumulative power fraction for the spectral edge */
  spectralEdgeFraction: number;

  /** PSD estimation parameters */
  welch: WelchOptions;
}

/**
 * Options for the full preprocessing pipeline
 */
export interface PreprocessingOptions {
  filter?: Partial<FilterCascadeOptions>;
  detection?: Partial<ArtifactDetectionOptions>;
  removal?: Partial<ArtifactRemovalOptions>;
}

/**
 * Options for preprocessing followed by feature extraction
 */
export interface PipelineOptions extends PreprocessingOptions {
  features?: Partial<FeatureExtractionOptions>;
}
