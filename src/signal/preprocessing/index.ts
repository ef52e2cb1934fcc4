/**
 * Preprocessing exports
 * @module signal/preprocessing
 */

export {
  filterCascade,
  removeChannelMeans,
  assertFilterable,
  designCascadeFilters,
  type CascadeFilters,
} from './filter-cascade';

export { reference } from './referencer';

export {
  detectArtifacts,
  detectAmplitudeArtifacts,
  detectMuscleArtifacts,
  detectDeadChannels,
  effectiveMuscleBand,
  movingRms,
} from './artifact-detector';

export {
  removeArtifacts,
  contiguousRuns,
  tukeyWindow,
  attenuationProfile,
} from './artifact-remover';

export {
  interpolateDeadChannels,
  shouldInterpolate,
  nearestSurvivor,
} from './channel-interpolator';

export { preprocess } from './preprocess';
