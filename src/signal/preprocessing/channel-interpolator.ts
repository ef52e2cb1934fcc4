/**
 * Channel Interpolator
 *
 * Placeholder reconstruction of dead channels: each one is replaced by a
 * verbatim copy of the surviving channel with the nearest original index.
 * This is biased and approximate (no spatial or statistical model); copied
 * channels are perfectly correlated with their source.
 *
 * @module signal/preprocessing/channel-interpolator
 */

import type { SignalMatrix } from '../../types';
import { InsufficientDataError, ValidationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { validateSignalMatrix } from '../../utils/validation';

const logger = createLogger('channel-interpolator');

/**
 * Interpolation is worth doing only when some, but fewer than half, of the
 * channels are dead
 */
export function shouldInterpolate(deadCount: number, channelCount: number): boolean {
  return deadCount > 0 && deadCount < channelCount / 2;
}

/**
 * Original index of the surviving channel closest to `index`; ties go to the
 * lower index
 */
export function nearestSurvivor(index: number, survivors: readonly number[]): number {
  let best = -1;
  let bestDistance = Infinity;

  // Survivors are ascending, so a strict comparison keeps the lower index on ties
  for (const candidate of survivors) {
    const distance = Math.abs(candidate - index);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}

/**
 * Rebuild the full channel set from the surviving channels.
 *
 * @param signal Surviving channels only, in original order
 * @param deadMask Dead flag per original channel
 * @returns One row per original channel
 */
export function interpolateDeadChannels(signal: SignalMatrix, deadMask: boolean[]): SignalMatrix {
  validateSignalMatrix(signal);

  const survivors: number[] = [];
  deadMask.forEach((dead, index) => {
    if (!dead) survivors.push(index);
  });

  if (survivors.length === 0) {
    throw new InsufficientDataError('Channel interpolation needs a surviving channel', 1, 0);
  }
  if (survivors.length !== signal.length) {
    throw new ValidationError(
      `Mask marks ${survivors.length} surviving channels but the signal has ${signal.length}`,
      'deadMask',
      deadMask
    );
  }

  const rowOf = new Map<number, number[]>();
  survivors.forEach((original, row) => rowOf.set(original, signal[row]));

  const rebuilt = deadMask.map((_, index) => {
    const source = rowOf.get(index) ?? rowOf.get(nearestSurvivor(index, survivors));
    if (!source) {
      throw new ValidationError('No source channel found', 'deadMask', index);
    }
    return [...source];
  });

  logger.debug('Dead channels replaced', {
    replaced: deadMask.length - survivors.length,
    channels: deadMask.length,
  });

  return rebuilt;
}
