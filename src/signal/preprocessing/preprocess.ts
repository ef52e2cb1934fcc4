/**
 * Preprocessing pipeline
 *
 * filter cascade → common average reference → artifact detection →
 * artifact removal → dead-channel interpolation (when fewer than half the
 * channels are dead)
 *
 * @module signal/preprocessing/preprocess
 */

import { resolveSamplingConfig } from '../../config/sampling';
import type {
  InterpolationOutcome,
  PreprocessingInfo,
  PreprocessingOptions,
  PreprocessingResult,
  SamplingConfig,
  SignalMatrix,
} from '../../types';
import { createLogger } from '../../utils/logger';
import { validateSignalMatrix } from '../../utils/validation';
import { detectArtifacts } from './artifact-detector';
import { removeArtifacts } from './artifact-remover';
import { interpolateDeadChannels, shouldInterpolate } from './channel-interpolator';
import { filterCascade } from './filter-cascade';
import { reference } from './referencer';

const logger = createLogger('preprocess');

/**
 * Clean a raw recording and report what was done to it
 */
export function preprocess(
  signal: SignalMatrix,
  config: SamplingConfig,
  options: PreprocessingOptions = {}
): PreprocessingResult {
  const { channels, samples } = validateSignalMatrix(signal);
  const sampling = resolveSamplingConfig(config, signal);
  const log = logger.withContext({ channels, samples, samplingRate: sampling.samplingRate });

  log.debug('Applying filter cascade');
  const filtered = filterCascade(signal, sampling, options.filter);

  log.debug('Applying common average reference');
  const referenced = reference(filtered);

  log.debug('Detecting artifacts');
  const artifacts = detectArtifacts(referenced, sampling, options.detection);

  log.debug('Removing artifacts');
  let clean = removeArtifacts(referenced, artifacts, options.removal);

  const deadChannelIndices = artifacts.deadChannels.flatMap((dead, index) => (dead ? [index] : []));
  let interpolation: InterpolationOutcome = 'not-needed';

  if (shouldInterpolate(deadChannelIndices.length, channels)) {
    log.debug('Interpolating dead channels', { deadChannelIndices });
    clean = interpolateDeadChannels(clean, artifacts.deadChannels);
    interpolation = 'applied';
  } else if (deadChannelIndices.length > 0) {
    interpolation = 'skipped-too-many-dead';
    log.warn('Half or more channels are dead; interpolation skipped', {
      dead: deadChannelIndices.length,
    });
  }

  const info: PreprocessingInfo = {
    channelsOriginal: channels,
    samplesOriginal: samples,
    channelsClean: clean.length,
    samplesClean: clean.length > 0 ? clean[0].length : 0,
    artifactPercentage: artifacts.artifactPercentage,
    deadChannelIndices,
    interpolation,
  };

  log.info('Preprocessing complete', {
    artifactPercentage: Number(info.artifactPercentage.toFixed(1)),
    channelsClean: info.channelsClean,
    interpolation,
  });

  return { clean, artifacts, info };
}
