/**
 * Type exports
 * @module types
 */

export type {
  SignalMatrix,
  PowerlineFrequency,
  SamplingConfig,
  ResolvedSamplingConfig,
} from './signal';
export { POWERLINE_FREQUENCIES } from './signal';

export type { ArtifactReport, SampleRun } from './artifacts';

export type {
  BandName,
  FrequencyRange,
  HjorthParameters,
  PowerSpectrum,
  FeatureExtractionResult,
  FeatureVector,
} from './features';

export type {
  FilterCascadeOptions,
  ArtifactDetectionOptions,
  ArtifactRemovalOptions,
  WelchOptions,
  FeatureExtractionOptions,
  PreprocessingOptions,
  PipelineOptions,
} from './options';

export type {
  InterpolationOutcome,
  PreprocessingInfo,
  PreprocessingResult,
  PipelineResult,
} from './pipeline';
