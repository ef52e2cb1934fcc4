/**
 * Artifact Remover
 *
 * Attenuates long artifact runs with a Tukey-shaped gain profile and drops
 * dead channels. Sample count never changes.
 *
 * @module signal/preprocessing/artifact-remover
 */

import { DEFAULT_ARTIFACT_REMOVAL_OPTIONS } from '../../config/defaults';
import type { ArtifactRemovalOptions, ArtifactReport, SampleRun, SignalMatrix } from '../../types';
import { createLogger } from '../../utils/logger';
import { validateMask, validateSignalMatrix } from '../../utils/validation';

const logger = createLogger('artifact-remover');

/**
 * Yield maximal runs of contiguous `true` entries in index order
 */
export function* contiguousRuns(mask: readonly boolean[]): Generator<SampleRun> {
  let start = -1;

  for (let i = 0; i < mask.length; i++) {
    if (mask[i]) {
      if (start < 0) start = i;
    } else if (start >= 0) {
      yield { start, end: i - 1, length: i - start };
      start = -1;
    }
  }

  if (start >= 0) {
    yield { start, end: mask.length - 1, length: mask.length - start };
  }
}

/**
 * Tukey (tapered cosine) window. `fraction` is the share of the window inside
 * the cosine tapers: 0 gives a rectangle, 1 a Hann window.
 */
export function tukeyWindow(length: number, fraction: number): number[] {
  if (length <= 0) return [];
  if (length === 1) return [1];
  if (fraction <= 0) return new Array<number>(length).fill(1);

  const window = new Array<number>(length);

  if (fraction >= 1) {
    for (let i = 0; i < length; i++) {
      window[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / (length - 1)));
    }
    return window;
  }

  const per = fraction / 2;
  const taperLength = Math.floor(per * (length - 1)) + 1;
  const fallStart = length - taperLength;

  for (let i = 0; i < length; i++) {
    const t = i / (length - 1);
    if (i < taperLength) {
      window[i] = (1 + Math.cos((Math.PI / per) * (t - per))) / 2;
    } else if (i >= fallStart) {
      window[i] = (1 + Math.cos((Math.PI / per) * (t - 1 + per))) / 2;
    } else {
      window[i] = 1;
    }
  }

  return window;
}

/**
 * Gain applied across a run: floor + (1 - floor) × tukey. The run's edges get
 * the floor gain and its middle is left at full amplitude.
 */
export function attenuationProfile(
  length: number,
  options: Partial<ArtifactRemovalOptions> = {}
): number[] {
  const { taperFraction, attenuationFloor } = { ...DEFAULT_ARTIFACT_REMOVAL_OPTIONS, ...options };
  return tukeyWindow(length, taperFraction).map((w) => attenuationFloor + (1 - attenuationFloor) * w);
}

/**
 * Attenuate artifact runs longer than `minRunLength` on every channel, then
 * drop channels flagged dead. Surviving channels keep their relative order.
 */
export function removeArtifacts(
  signal: SignalMatrix,
  report: ArtifactReport,
  options: Partial<ArtifactRemovalOptions> = {}
): SignalMatrix {
  const { channels, samples } = validateSignalMatrix(signal);
  validateMask(report.combinedMask, samples, 'combinedMask');
  validateMask(report.deadChannels, channels, 'deadChannels');
  const opts: ArtifactRemovalOptions = { ...DEFAULT_ARTIFACT_REMOVAL_OPTIONS, ...options };

  const cleaned = signal.map((row) => [...row]);
  let attenuatedRuns = 0;

  for (const run of contiguousRuns(report.combinedMask)) {
    if (run.length <= opts.minRunLength) continue;

    const gain = attenuationProfile(run.length, opts);
    for (const row of cleaned) {
      for (let i = 0; i < run.length; i++) {
        row[run.start + i] *= gain[i];
      }
    }
    attenuatedRuns++;
  }

  const survivors = cleaned.filter((_, ch) => !report.deadChannels[ch]);

  logger.debug('Artifacts removed', {
    attenuatedRuns,
    droppedChannels: channels - survivors.length,
  });

  return survivors;
}
