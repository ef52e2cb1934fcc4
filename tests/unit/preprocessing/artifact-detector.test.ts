/**
 * Artifact Detector Tests
 */

import { describe, it, expect } from 'vitest';
import {
  detectAmplitudeArtifacts,
  detectArtifacts,
  detectDeadChannels,
  detectMuscleArtifacts,
  effectiveMuscleBand,
  movingRms,
} from '../../../src/signal/preprocessing/artifact-detector';
import { generateFlatLine, generateSineWave, generateSyntheticEEG } from '../../../src/signal/synthetic';
import { InsufficientDataError } from '../../../src/utils/errors';

const fs = 250;

/**
 * 20 s of silence with a 1 s, 60 Hz burst centred on sample 2500
 */
function muscleBurst(amplitude: number = 20): number[] {
  const trace = generateFlatLine(20, fs, 0);
  const burst = generateSineWave(1, fs, 60, amplitude);
  trace.splice(2375, burst.length, ...burst);
  return trace;
}

describe('detectAmplitudeArtifacts', () => {
  it('should flag samples above the threshold on any channel', () => {
    const signal = [
      [0, 150, 0, 0],
      [0, 0, -120, 0],
    ];
    expect(detectAmplitudeArtifacts(signal, 100)).toEqual([false, true, true, false]);
  });

  it('should not flag samples exactly at the threshold', () => {
    expect(detectAmplitudeArtifacts([[100, -100]], 100)).toEqual([false, false]);
  });
});

describe('effectiveMuscleBand', () => {
  it('should keep a band below Nyquist', () => {
    expect(effectiveMuscleBand([30, 100], 250)).toEqual([30, 100]);
  });

  it('should pull an upper edge at Nyquist down to 0.9 × Nyquist', () => {
    expect(effectiveMuscleBand([30, 100], 200)).toEqual([30, 90]);
  });

  it('should return null when nothing of the band is left', () => {
    expect(effectiveMuscleBand([30, 100], 60)).toBeNull();
  });
});

describe('movingRms', () => {
  it('should compute the RMS over a centered window', () => {
    expect(movingRms([3, -3, 3, -3], 2)).toEqual([3, 3, 3, 3]);
  });

  it('should return zeros for silence', () => {
    expect(movingRms([0, 0, 0], 2)).toEqual([0, 0, 0]);
  });
});

describe('detectMuscleArtifacts', () => {
  it('should flag a high-frequency burst on an examined channel', () => {
    const signal = [muscleBurst(), generateFlatLine(20, fs), generateFlatLine(20, fs)];
    const mask = detectMuscleArtifacts(signal, fs);

    expect(mask).toHaveLength(5000);
    expect(mask[2500]).toBe(true);
    expect(mask[0]).toBe(false);
    expect(mask[4999]).toBe(false);
  });

  it('should only examine the leading channels', () => {
    const signal = [0, 1, 2, 3].map(() => generateFlatLine(20, fs));
    signal.push(muscleBurst());

    const mask = detectMuscleArtifacts(signal, fs);

    expect(mask.some(Boolean)).toBe(false);
  });

  it('should honor a wider channel limit', () => {
    const signal = [0, 1, 2, 3].map(() => generateFlatLine(20, fs));
    signal.push(muscleBurst());

    const mask = detectMuscleArtifacts(signal, fs, { muscleChannelLimit: 5 });

    expect(mask[2500]).toBe(true);
  });

  it('should skip detection when the band does not fit below Nyquist', () => {
    const signal = [generateSineWave(4, 60, 20, 20)];
    expect(detectMuscleArtifacts(signal, 60).some(Boolean)).toBe(false);
  });
});

describe('detectDeadChannels', () => {
  it('should flag constant channels', () => {
    expect(detectDeadChannels([[1, 1, 1], [1, 2, 3]], 0.1)).toEqual([true, false]);
  });

  it('should flag channels with a standard deviation below the threshold', () => {
    const quiet = [0, 0.05, 0, 0.05, 0];
    expect(detectDeadChannels([quiet], 0.1)).toEqual([true]);
    expect(detectDeadChannels([quiet], 0.01)).toEqual([false]);
  });
});

describe('detectArtifacts', () => {
  it('should combine the amplitude and muscle masks', () => {
    const signal = [muscleBurst(), generateFlatLine(20, fs)];
    signal[1][100] = 500;

    const report = detectArtifacts(signal, { samplingRate: fs });

    expect(report.amplitudeMask[100]).toBe(true);
    expect(report.muscleMask[2500]).toBe(true);
    report.combinedMask.forEach((hit, i) => {
      expect(hit).toBe(report.amplitudeMask[i] || report.muscleMask[i]);
    });
  });

  it('should report the flagged share of samples as a percentage', () => {
    const signal = [generateFlatLine(4, fs), generateFlatLine(4, fs)];
    for (let i = 10; i < 20; i++) signal[0][i] = 150;

    const report = detectArtifacts(signal, { samplingRate: fs }, { muscleChannelLimit: 0 });

    // 10 of 1000 samples
    expect(report.artifactPercentage).toBe(1);
    expect(report.deadChannels).toEqual([false, true]);
  });

  it('should scale the flagged count before dividing by the sample count', () => {
    const signal = [generateFlatLine(4, fs), generateFlatLine(4, fs)];
    for (let i = 10; i < 17; i++) signal[0][i] = 150;

    const report = detectArtifacts(signal, { samplingRate: fs }, { muscleChannelLimit: 0 });

    // 7 / 1000 * 100 would give 0.7000000000000001
    expect(report.artifactPercentage).toBe(0.7);
  });

  it('should keep the percentage in [0, 100] and consistent with the mask', () => {
    const signal = generateSyntheticEEG({ channels: 4, duration: 10, sampleRate: fs });
    const report = detectArtifacts(signal, { samplingRate: fs });
    const flagged = report.combinedMask.filter(Boolean).length;

    expect(report.artifactPercentage).toBeGreaterThanOrEqual(0);
    expect(report.artifactPercentage).toBeLessThanOrEqual(100);
    expect(report.artifactPercentage).toBe((100 * flagged) / 2500);
  });

  it('should reject signals with fewer than two samples', () => {
    expect(() => detectArtifacts([[1], [2]], { samplingRate: fs })).toThrow(InsufficientDataError);
  });
});
