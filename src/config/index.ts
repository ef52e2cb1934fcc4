/**
 * Configuration exports
 * @module config
 */

export {
  DEFAULT_POWERLINE_FREQUENCY,
  DEFAULT_FILTER_CASCADE_OPTIONS,
  DEFAULT_ARTIFACT_DETECTION_OPTIONS,
  DEFAULT_ARTIFACT_REMOVAL_OPTIONS,
  DEFAULT_FEATURE_OPTIONS,
  FREQUENCY_BANDS,
  FEATURE_BASE_NAMES,
  FEATURES_PER_CHANNEL,
  type FeatureBaseName,
} from './defaults';

export { resolveSamplingConfig, nyquist } from './sampling';

export { samplingConfigFromEnvironment, parseDurationSeconds, type Environment } from './environment';
