/**
 * Feature extraction exports
 * @module signal/features
 */

export { hjorthParameters } from './hjorth';

export {
  extractFeatures,
  computeChannelFeatures,
  computeWindowFeatures,
  featureNames,
  windowStartIndices,
  windowGeometry,
  bandPower,
  spectralEdgeFrequency,
  meanFrequency,
  type WindowGeometry,
} from './feature-extractor';

export { RollingFeatureBuffer, type RollingBufferOptions } from './rolling-buffer';
