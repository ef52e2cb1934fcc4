/**
 * Spectral Estimation
 *
 * Welch power spectral density: Hamming-windowed, half-overlapping segments,
 * averaged periodograms, one-sided density in units²/Hz.
 *
 * @module signal/utils/spectral
 */

import FFT from 'fft.js';
import type { PowerSpectrum, WelchOptions } from '../../types';
import { ConfigurationError } from '../../utils/errors';
import { requireSamples } from '../../utils/validation';

/**
 * Welch parameters after defaults are applied
 */
export interface ResolvedWelchParameters {
  segmentLength: number;
  overlap: number;
  fftLength: number;
}

/**
 * Smallest power of two >= n
 */
export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

/**
 * Symmetric Hamming window
 */
export function hammingWindow(length: number): number[] {
  if (length === 1) return [1];
  const window = new Array<number>(length);
  for (let i = 0; i < length; i++) {
    window[i] = 0.54 - 0.46 * Math.cos((2 * Math.PI * i) / (length - 1));
  }
  return window;
}

/**
 * Default segmentation for a signal of `length` samples: eight half-overlapping
 * segments (floor(N / 4.5) samples each) and an FFT of at least 256 points.
 */
export function resolveWelchParameters(
  length: number,
  options: WelchOptions = {}
): ResolvedWelchParameters {
  requireSamples(length, 2, 'Welch PSD');

  const segmentLength = Math.min(
    length,
    Math.max(2, options.segmentLength ?? Math.floor(length / 4.5))
  );
  const overlap = options.overlap ?? Math.floor(segmentLength / 2);
  const fftLength = options.fftLength ?? Math.max(256, nextPowerOfTwo(segmentLength));

  if (!Number.isInteger(segmentLength) || segmentLength < 2) {
    throw new ConfigurationError('Welch segment length must be an integer >= 2', 'segmentLength', segmentLength);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= segmentLength) {
    throw new ConfigurationError('Welch overlap must be in [0, segmentLength)', 'overlap', overlap);
  }
  if (fftLength < segmentLength || nextPowerOfTwo(fftLength) !== fftLength) {
    throw new ConfigurationError(
      'FFT length must be a power of two no shorter than the segment',
      'fftLength',
      fftLength
    );
  }

  return { segmentLength, overlap, fftLength };
}

/**
 * Estimate the one-sided power spectral density of `signal`.
 *
 * Bins run from 0 to fs/2 in steps of fs/fftLength. Interior bins are doubled
 * so that sum(psd) * fs / fftLength approximates the signal's mean power.
 */
export function welchPsd(
  signal: number[],
  sampleRate: number,
  options: WelchOptions = {}
): PowerSpectrum {
  const { segmentLength, overlap, fftLength } = resolveWelchParameters(signal.length, options);

  const window = hammingWindow(segmentLength);
  let windowPower = 0;
  for (const w of window) windowPower += w * w;

  const step = segmentLength - overlap;
  const segmentCount = Math.floor((signal.length - overlap) / step);
  const binCount = Math.floor(fftLength / 2) + 1;

  const fft = new FFT(fftLength);
  const input = new Array<number>(fftLength).fill(0);
  const spectrum = fft.createComplexArray();
  const accumulated = new Array<number>(binCount).fill(0);

  for (let s = 0; s < segmentCount; s++) {
    const offset = s * step;
    for (let i = 0; i < segmentLength; i++) {
      input[i] = signal[offset + i] * window[i];
    }
    fft.realTransform(spectrum, input);
    fft.completeSpectrum(spectrum);

    for (let k = 0; k < binCount; k++) {
      const re = spectrum[2 * k];
      const im = spectrum[2 * k + 1];
      accumulated[k] += re * re + im * im;
    }
  }

  const norm = 1 / (segmentCount * sampleRate * windowPower);
  const psd = accumulated.map((power, k) => {
    const oneSided = k === 0 || (fftLength % 2 === 0 && k === fftLength / 2) ? 1 : 2;
    return power * norm * oneSided;
  });
  const frequencies = Array.from({ length: binCount }, (_, k) => (k * sampleRate) / fftLength);

  return { frequencies, psd };
}
