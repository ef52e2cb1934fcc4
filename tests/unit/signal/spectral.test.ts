/**
 * Welch PSD Tests
 */

import { describe, it, expect } from 'vitest';
import {
  hammingWindow,
  nextPowerOfTwo,
  resolveWelchParameters,
  welchPsd,
} from '../../../src/signal/utils/spectral';
import { generateSineWave } from '../../../src/signal/synthetic';
import { ConfigurationError, InsufficientDataError } from '../../../src/utils/errors';

describe('nextPowerOfTwo', () => {
  it('should round up to a power of two', () => {
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(111)).toBe(128);
    expect(nextPowerOfTwo(256)).toBe(256);
  });
});

describe('hammingWindow', () => {
  it('should be symmetric with 0.08 at the ends', () => {
    const window = hammingWindow(3);
    expect(window[0]).toBeCloseTo(0.08, 12);
    expect(window[1]).toBeCloseTo(1, 12);
    expect(window[2]).toBeCloseTo(0.08, 12);
  });

  it('should return [1] for a single sample', () => {
    expect(hammingWindow(1)).toEqual([1]);
  });
});

describe('resolveWelchParameters', () => {
  it('should derive segment, overlap and FFT length from a 2 s window at 250 Hz', () => {
    expect(resolveWelchParameters(500)).toEqual({ segmentLength: 111, overlap: 55, fftLength: 256 });
  });

  it('should use a longer FFT for long segments', () => {
    // floor(4500 / 4.5) = 1000
    expect(resolveWelchParameters(4500).fftLength).toBe(1024);
  });

  it('should reject fewer than two samples', () => {
    expect(() => resolveWelchParameters(1)).toThrow(InsufficientDataError);
  });

  it('should reject an overlap as long as the segment', () => {
    expect(() => resolveWelchParameters(500, { segmentLength: 100, overlap: 100 })).toThrow(ConfigurationError);
  });

  it('should reject an FFT length that is not a power of two', () => {
    expect(() => resolveWelchParameters(500, { fftLength: 300 })).toThrow(ConfigurationError);
  });
});

describe('welchPsd', () => {
  const fs = 250;

  it('should return one-sided bins from 0 to Nyquist', () => {
    const { frequencies, psd } = welchPsd(generateSineWave(2, fs, 10, 1), fs);

    expect(frequencies).toHaveLength(129);
    expect(psd).toHaveLength(129);
    expect(frequencies[0]).toBe(0);
    expect(frequencies[1]).toBeCloseTo(250 / 256, 12);
    expect(frequencies[128]).toBe(125);
  });

  it('should peak at the frequency of a sine', () => {
    const { frequencies, psd } = welchPsd(generateSineWave(2, fs, 10, 1), fs);
    const peak = psd.indexOf(Math.max(...psd));

    expect(Math.abs(frequencies[peak] - 10)).toBeLessThan(1);
  });

  it('should integrate to the mean power of the signal', () => {
    const amplitude = 4;
    const { psd } = welchPsd(generateSineWave(2, fs, 10, amplitude), fs);
    const binWidth = fs / 256;
    const power = psd.reduce((total, p) => total + p, 0) * binWidth;

    // A sine of amplitude A has mean power A² / 2
    expect(power).toBeGreaterThan(0.85 * 8);
    expect(power).toBeLessThan(1.15 * 8);
  });

  it('should return zeros for a zero signal', () => {
    const { psd } = welchPsd(new Array<number>(500).fill(0), fs);
    expect(psd.every((p) => p === 0)).toBe(true);
  });
});
