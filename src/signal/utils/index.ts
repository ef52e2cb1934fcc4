/**
 * Signal utility exports
 * @module signal/utils
 */

export {
  mean,
  variance,
  standardDeviation,
  rms,
  skewness,
  kurtosis,
  diff,
  movingMean,
  sum,
} from './statistics';

export {
  applyBiquad,
  sosFilter,
  sosSteadyState,
  defaultPadLength,
  filtfilt,
  notchCoefficients,
  magnitudeResponse,
  removeDCOffset,
  type Biquad,
  type SecondOrderSections,
} from './filters';

export { designButterworthBandpass, maxPoleRadius } from './butterworth';

export {
  welchPsd,
  hammingWindow,
  nextPowerOfTwo,
  resolveWelchParameters,
  type ResolvedWelchParameters,
} from './spectral';
