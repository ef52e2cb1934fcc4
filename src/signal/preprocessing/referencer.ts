/**
 * Common average reference
 * @module signal/preprocessing/referencer
 */

import type { SignalMatrix } from '../../types';
import { validateSignalMatrix } from '../../utils/validation';

/**
 * Subtract the across-channel mean at every sample index
 */
export function reference(signal: SignalMatrix): SignalMatrix {
  const { channels, samples } = validateSignalMatrix(signal);

  const average = new Array<number>(samples).fill(0);
  for (const row of signal) {
    for (let i = 0; i < samples; i++) {
      average[i] += row[i];
    }
  }
  for (let i = 0; i < samples; i++) {
    average[i] /= channels;
  }

  return signal.map((row) => row.map((value, i) => value - average[i]));
}
