/**
 * EEG Feature Pipeline
 *
 * Deterministic preprocessing (filtering, common average reference, artifact
 * detection and attenuation, dead-channel handling) and windowed feature
 * extraction for multi-channel EEG recordings.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  SignalMatrix,
  PowerlineFrequency,
  SamplingConfig,
  ResolvedSamplingConfig,
  ArtifactReport,
  SampleRun,
  BandName,
  FrequencyRange,
  HjorthParameters,
  PowerSpectrum,
  FeatureExtractionResult,
  FeatureVector,
  FilterCascadeOptions,
  ArtifactDetectionOptions,
  ArtifactRemovalOptions,
  WelchOptions,
  FeatureExtractionOptions,
  PreprocessingOptions,
  PipelineOptions,
  InterpolationOutcome,
  PreprocessingInfo,
  PreprocessingResult,
  PipelineResult,
} from './types';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_POWERLINE_FREQUENCY,
  DEFAULT_FILTER_CASCADE_OPTIONS,
  DEFAULT_ARTIFACT_DETECTION_OPTIONS,
  DEFAULT_ARTIFACT_REMOVAL_OPTIONS,
  DEFAULT_FEATURE_OPTIONS,
  FREQUENCY_BANDS,
  FEATURE_BASE_NAMES,
  FEATURES_PER_CHANNEL,
  resolveSamplingConfig,
  samplingConfigFromEnvironment,
  type FeatureBaseName,
  type Environment,
} from './config';

// ============================================================================
// Core Stages
// ============================================================================

export { filterCascade, removeChannelMeans } from './signal/preprocessing';
export { reference } from './signal/preprocessing';
export { detectArtifacts } from './signal/preprocessing';
export { removeArtifacts, contiguousRuns } from './signal/preprocessing';
export { interpolateDeadChannels, shouldInterpolate } from './signal/preprocessing';
export { preprocess } from './signal/preprocessing';
export {
  extractFeatures,
  hjorthParameters,
  computeChannelFeatures,
  featureNames,
  RollingFeatureBuffer,
  type RollingBufferOptions,
} from './signal/features';
export { welchPsd } from './signal/utils';
export { runPipeline } from './pipeline';

// ============================================================================
// Synthetic Signals
// ============================================================================

export { generateSyntheticEEG, generateSineWave, generateFlatLine } from './signal/synthetic';

// ============================================================================
// Utilities
// ============================================================================

export {
  PipelineError,
  ConfigurationError,
  InsufficientDataError,
  DegenerateSignalError,
  ValidationError,
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LoggerConfig,
} from './utils';
