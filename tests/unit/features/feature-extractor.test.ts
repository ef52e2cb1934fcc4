/**
 * Feature Extractor Tests
 */

import { describe, it, expect } from 'vitest';
import {
  bandPower,
  computeChannelFeatures,
  extractFeatures,
  featureNames,
  meanFrequency,
  spectralEdgeFrequency,
  windowGeometry,
  windowStartIndices,
} from '../../../src/signal/features/feature-extractor';
import { FEATURE_BASE_NAMES } from '../../../src/config/defaults';
import { generateFlatLine, generateSineWave, generateSyntheticEEG } from '../../../src/signal/synthetic';
import type { PowerSpectrum } from '../../../src/types';
import { ConfigurationError, InsufficientDataError } from '../../../src/utils/errors';

const fs = 250;

const flatSpectrum: PowerSpectrum = {
  frequencies: [0, 1, 2, 3],
  psd: [1, 1, 1, 1],
};

describe('windowGeometry', () => {
  it('should convert 2 s windows with 1 s overlap to samples', () => {
    expect(windowGeometry(fs, { windowSeconds: 2, overlapSeconds: 1 })).toEqual({ windowLength: 500, step: 250 });
  });

  it('should reject an overlap that leaves no step', () => {
    expect(() => windowGeometry(fs, { windowSeconds: 2, overlapSeconds: 2 })).toThrow(ConfigurationError);
  });

  it('should reject a window shorter than two samples', () => {
    expect(() => windowGeometry(fs, { windowSeconds: 0.001, overlapSeconds: 0 })).toThrow(ConfigurationError);
  });
});

describe('windowStartIndices', () => {
  it('should place nine windows in a 10 s recording', () => {
    expect(windowStartIndices(2500, 500, 250)).toEqual([0, 250, 500, 750, 1000, 1250, 1500, 1750, 2000]);
  });

  it('should drop a partial tail window', () => {
    expect(windowStartIndices(2600, 500, 250)).toHaveLength(9);
  });

  it('should return a single window for an exact fit', () => {
    expect(windowStartIndices(500, 500, 250)).toEqual([0]);
  });
});

describe('featureNames', () => {
  it('should use 1-based, zero-padded channel numbers', () => {
    const names = featureNames(2);

    expect(names).toHaveLength(30);
    expect(names[0]).toBe('Ch01_Mean');
    expect(names[14]).toBe('Ch01_MeanFreq');
    expect(names[15]).toBe('Ch02_Mean');
    expect(names[29]).toBe('Ch02_MeanFreq');
  });

  it('should follow the per-channel feature order', () => {
    expect(featureNames(1)).toEqual(FEATURE_BASE_NAMES.map((base) => `Ch01_${base}`));
  });

  it('should be stable across calls', () => {
    expect(featureNames(12)).toEqual(featureNames(12));
    expect(featureNames(12)[165]).toBe('Ch12_Mean');
  });
});

describe('spectral helpers', () => {
  it('should sum bins inside a band, inclusive at both ends', () => {
    const spectrum: PowerSpectrum = { frequencies: [0, 1, 2, 3, 4, 5], psd: [1, 1, 1, 1, 1, 1] };
    expect(bandPower(spectrum, [1, 4])).toBe(4);
  });

  it('should find the spectral edge', () => {
    expect(spectralEdgeFrequency(flatSpectrum, 0.5)).toBe(1);
    expect(spectralEdgeFrequency(flatSpectrum, 0.95)).toBe(3);
  });

  it('should compute the power-weighted mean frequency', () => {
    expect(meanFrequency({ frequencies: [0, 1, 2, 3], psd: [0, 1, 0, 1] })).toBe(2);
  });

  it('should fall back to 0 for a zero-power spectrum', () => {
    const silent: PowerSpectrum = { frequencies: [0, 1, 2], psd: [0, 0, 0] };
    expect(spectralEdgeFrequency(silent, 0.95)).toBe(0);
    expect(meanFrequency(silent)).toBe(0);
  });
});

describe('computeChannelFeatures', () => {
  it('should return 15 values with the moments first', () => {
    const features = computeChannelFeatures([1, 2, 3, 4, 5], fs);

    expect(features).toHaveLength(15);
    expect(features[0]).toBe(3);
    expect(features[1]).toBe(2);
    expect(features[2]).toBeCloseTo(0, 12);
    expect(features[3]).toBeCloseTo(1.7, 12);
    expect(features.slice(4, 7)).toEqual([2, 0, 0]);
  });

  it('should put the power of a 10 Hz sine in the alpha band', () => {
    const features = computeChannelFeatures(generateSineWave(2, fs, 10, 20), fs);
    const [delta, theta, alpha, beta, gamma] = features.slice(8, 13);

    expect(alpha).toBeGreaterThan(delta);
    expect(alpha).toBeGreaterThan(theta);
    expect(alpha).toBeGreaterThan(beta);
    expect(alpha).toBeGreaterThan(gamma);
    expect(Math.abs(features[14] - 10)).toBeLessThan(2);
  });

  it('should reject a single-sample window', () => {
    expect(() => computeChannelFeatures([1], fs)).toThrow(InsufficientDataError);
  });
});

describe('extractFeatures', () => {
  it('should produce one row per window and 15 columns per channel', () => {
    const signal = generateSyntheticEEG({ channels: 2, duration: 10, sampleRate: fs });
    const result = extractFeatures(signal, { samplingRate: fs });

    expect(result.features).toHaveLength(9);
    expect(result.windowStarts).toEqual([0, 250, 500, 750, 1000, 1250, 1500, 1750, 2000]);
    expect(result.windowLength).toBe(500);
    expect(result.step).toBe(250);
    for (const row of result.features) {
      expect(row).toHaveLength(30);
      expect(row.every(Number.isFinite)).toBe(true);
    }
    expect(result.featureNames).toEqual(featureNames(2));
  });

  it('should produce identical output on repeated runs', () => {
    const signal = generateSyntheticEEG({ channels: 2, duration: 4, sampleRate: fs });
    expect(extractFeatures(signal, { samplingRate: fs })).toEqual(extractFeatures(signal, { samplingRate: fs }));
  });

  it('should return all-zero features for an all-zero signal', () => {
    const signal = [generateFlatLine(4, fs), generateFlatLine(4, fs)];
    const result = extractFeatures(signal, { samplingRate: fs });

    expect(result.features).toHaveLength(3);
    for (const row of result.features) {
      expect(row).toHaveLength(30);
      expect(row.every((value) => value === 0)).toBe(true);
    }
  });

  it('should honor custom window settings', () => {
    const signal = [generateSineWave(4, fs, 10, 1)];
    const result = extractFeatures(signal, { samplingRate: fs }, { windowSeconds: 1, overlapSeconds: 0 });

    expect(result.windowStarts).toEqual([0, 250, 500, 750]);
  });

  it('should reject a signal shorter than one window', () => {
    const signal = [generateSineWave(1.6, fs, 10, 1)];
    expect(() => extractFeatures(signal, { samplingRate: fs })).toThrow(InsufficientDataError);
  });
});
