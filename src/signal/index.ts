/**
 * Signal processing exports
 * @module signal
 */

// Synthetic signal generation
export {
  generateSyntheticEEG,
  generateSineWave,
  generateFlatLine,
  createRandom,
  type Rhythm,
  type SyntheticEEGOptions,
} from './synthetic';

// Numeric utilities
export * from './utils';

// Preprocessing stages
export * from './preprocessing';

// Feature extraction
export * from './features';
