/**
 * Feature extraction types
 * @module types/features
 */

/**
 * Canonical frequency bands
 */
export type BandName = 'delta' | 'theta' | 'alpha' | 'beta' | 'gamma';

/**
 * Inclusive frequency range in Hz
 */
export type FrequencyRange = readonly [low: number, high: number];

/**
 * Hjorth descriptors of a 1-D window
 */
export interface HjorthParameters {
  activity: number;
  mobility: number;
  complexity: number;
}

/**
 * One-sided power spectral density estimate
 */
export interface PowerSpectrum {
  /** Bin frequencies in Hz, ascending from 0 */
  frequencies: number[];

  /** Power density per bin */
  psd: number[];
}

/**
 * Windowed feature matrix for one signal
 */
export interface FeatureExtractionResult {
  /** Rows are windows, columns are channel × feature */
  features: number[][];

  /** Column names, aligned with each row of `features` */
  featureNames: string[];

  /** First sample index of each window */
  windowStarts: number[];

  /** Window length in samples */
  windowLength: number;

  /** Distance between consecutive window starts in samples */
  step: number;
}

/**
 * Feature vector for a single window
 */
export interface FeatureVector {
  values: number[];
  names: string[];
}
