/**
 * Artifact Detector
 *
 * Three independent detectors over a referenced signal:
 * - amplitude: any channel above a fixed absolute threshold
 * - muscle: moving RMS of the 30-100 Hz band on the leading channels
 * - flatline: channels whose standard deviation is below a floor
 *
 * @module signal/preprocessing/artifact-detector
 */

import { DEFAULT_ARTIFACT_DETECTION_OPTIONS } from '../../config/defaults';
import { nyquist, resolveSamplingConfig } from '../../config/sampling';
import type {
  ArtifactDetectionOptions,
  ArtifactReport,
  FrequencyRange,
  SamplingConfig,
  SignalMatrix,
} from '../../types';
import { createLogger } from '../../utils/logger';
import { requireSamples, validateSignalMatrix } from '../../utils/validation';
import { designButterworthBandpass } from '../utils/butterworth';
import { filtfilt } from '../utils/filters';
import { movingMean, standardDeviation } from '../utils/statistics';

const logger = createLogger('artifact-detector');

/**
 * Flag samples where any channel's absolute value exceeds `threshold`
 */
export function detectAmplitudeArtifacts(signal: SignalMatrix, threshold: number): boolean[] {
  const { samples } = validateSignalMatrix(signal);
  const mask = new Array<boolean>(samples).fill(false);

  for (const row of signal) {
    for (let i = 0; i < samples; i++) {
      if (Math.abs(row[i]) > threshold) mask[i] = true;
    }
  }

  return mask;
}

/**
 * Muscle band actually used at a sampling rate. An upper edge at or above
 * Nyquist is pulled down to 0.9 × Nyquist; null when nothing is left.
 */
export function effectiveMuscleBand(
  band: FrequencyRange,
  samplingRate: number
): FrequencyRange | null {
  const [low, requestedHigh] = band;
  const limit = nyquist(samplingRate);
  const high = requestedHigh >= limit ? 0.9 * limit : requestedHigh;
  return low > 0 && low < high ? [low, high] : null;
}

/**
 * Moving RMS with a centered window of `windowLength` samples
 */
export function movingRms(values: number[], windowLength: number): number[] {
  const squared = values.map((v) => v * v);
  // Cumulative sums can leave tiny negative residues where the signal is silent
  return movingMean(squared, windowLength).map((ms) => Math.sqrt(Math.max(0, ms)));
}

/**
 * Flag samples where the muscle-band RMS of any examined channel exceeds
 * `muscleRmsFactor` times the standard deviation of that channel's RMS trace
 */
export function detectMuscleArtifacts(
  signal: SignalMatrix,
  samplingRate: number,
  options: Partial<ArtifactDetectionOptions> = {}
): boolean[] {
  const { samples } = validateSignalMatrix(signal);
  const opts: ArtifactDetectionOptions = { ...DEFAULT_ARTIFACT_DETECTION_OPTIONS, ...options };
  const mask = new Array<boolean>(samples).fill(false);

  const band = effectiveMuscleBand(opts.muscleBand, samplingRate);
  if (!band) {
    logger.warn('Muscle band is empty at this sampling rate; muscle detection skipped', {
      samplingRate,
      muscleBand: opts.muscleBand,
    });
    return mask;
  }

  const sections = designButterworthBandpass(opts.muscleFilterOrder, band[0], band[1], samplingRate);
  const windowLength = Math.max(1, Math.round(opts.muscleRmsWindowSeconds * samplingRate));
  const examined = Math.min(opts.muscleChannelLimit, signal.length);

  for (let ch = 0; ch < examined; ch++) {
    const trace = movingRms(filtfilt(signal[ch], sections), windowLength);
    const threshold = opts.muscleRmsFactor * standardDeviation(trace, false);
    for (let i = 0; i < samples; i++) {
      if (trace[i] > threshold) mask[i] = true;
    }
  }

  return mask;
}

/**
 * Flag channels whose sample standard deviation is below `threshold`
 */
export function detectDeadChannels(signal: SignalMatrix, threshold: number): boolean[] {
  validateSignalMatrix(signal);
  return signal.map((row) => standardDeviation(row, false) < threshold);
}

/**
 * Run all detectors and combine them into an artifact report.
 * Dead channels do not contribute to the per-sample mask.
 *
 * @throws InsufficientDataError for signals with fewer than 2 samples
 */
export function detectArtifacts(
  signal: SignalMatrix,
  config: SamplingConfig,
  options: Partial<ArtifactDetectionOptions> = {}
): ArtifactReport {
  const { samples } = validateSignalMatrix(signal);
  requireSamples(samples, 2, 'Artifact detection');
  const { samplingRate } = resolveSamplingConfig(config, signal);
  const opts: ArtifactDetectionOptions = { ...DEFAULT_ARTIFACT_DETECTION_OPTIONS, ...options };

  const amplitudeMask = detectAmplitudeArtifacts(signal, opts.amplitudeThreshold);
  const muscleMask = detectMuscleArtifacts(signal, samplingRate, opts);
  const deadChannels = detectDeadChannels(signal, opts.deadChannelThreshold);

  let flagged = 0;
  const combinedMask = amplitudeMask.map((amp, i) => {
    const hit = amp || muscleMask[i];
    if (hit) flagged++;
    return hit;
  });

  const report: ArtifactReport = {
    amplitudeMask,
    muscleMask,
    combinedMask,
    deadChannels,
    artifactPercentage: (100 * flagged) / samples,
  };

  logger.debug('Artifacts detected', {
    artifactPercentage: report.artifactPercentage,
    deadChannels: deadChannels.filter(Boolean).length,
  });

  return report;
}
