/**
 * End-to-end run: preprocessing followed by feature extraction
 * @module pipeline
 */

import { extractFeatures } from './signal/features';
import { preprocess } from './signal/preprocessing';
import type { PipelineOptions, PipelineResult, SamplingConfig, SignalMatrix } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('pipeline');

/**
 * Clean a raw recording and extract its feature matrix
 */
export function runPipeline(
  signal: SignalMatrix,
  config: SamplingConfig,
  options: PipelineOptions = {}
): PipelineResult {
  const { clean, artifacts, info } = preprocess(signal, config, options);
  const features = extractFeatures(clean, { ...config, channelCount: clean.length }, options.features);

  logger.info('Features extracted', {
    windows: features.features.length,
    columns: features.featureNames.length,
  });

  return { clean, artifacts, info, features };
}
