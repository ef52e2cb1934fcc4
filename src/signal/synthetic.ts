/**
 * Synthetic EEG Signal Generator
 *
 * Deterministic multi-channel test signals: sums of sinusoids plus seeded
 * Gaussian noise.
 *
 * @module signal/synthetic
 */

import type { SignalMatrix } from '../types';

/**
 * One sinusoidal component
 */
export interface Rhythm {
  /** Frequency in Hz */
  frequency: number;
  /** Peak amplitude (µV) */
  amplitude: number;
  /** Phase in radians */
  phase?: number;
}

/**
 * Synthetic EEG options
 */
export interface SyntheticEEGOptions {
  /** Number of channels */
  channels?: number;
  /** Duration in seconds */
  duration?: number;
  /** Sample rate in Hz */
  sampleRate?: number;
  /** Rhythms present on every channel (alpha and beta by default) */
  rhythms?: Rhythm[];
  /** Standard deviation of additive Gaussian noise (µV) */
  noise?: number;
  /** Constant offset added to every sample (µV) */
  dcOffset?: number;
  /** Seed for the noise generator */
  seed?: number;
}

/**
 * Mulberry32 PRNG returning values in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Standard normal samples via Box-Muller
 */
function gaussian(random: () => number): number {
  const u1 = Math.max(random(), Number.EPSILON);
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Generate a sine wave
 */
export function generateSineWave(
  duration: number = 10,
  sampleRate: number = 250,
  frequency: number = 10,
  amplitude: number = 20
): number[] {
  const totalSamples = Math.round(sampleRate * duration);
  const samples = new Array<number>(totalSamples);

  for (let i = 0; i < totalSamples; i++) {
    const t = i / sampleRate;
    samples[i] = amplitude * Math.sin(2 * Math.PI * frequency * t);
  }

  return samples;
}

/**
 * Generate a constant signal (for dead-channel tests)
 */
export function generateFlatLine(
  duration: number = 10,
  sampleRate: number = 250,
  value: number = 0
): number[] {
  return new Array<number>(Math.round(sampleRate * duration)).fill(value);
}

/**
 * Generate a multi-channel EEG-like recording.
 * Each channel gets the rhythms with a channel-dependent phase shift.
 */
export function generateSyntheticEEG(options: SyntheticEEGOptions = {}): SignalMatrix {
  const {
    channels = 8,
    duration = 10,
    sampleRate = 250,
    rhythms = [
      { frequency: 10, amplitude: 20 },
      { frequency: 20, amplitude: 5 },
    ],
    noise = 2,
    dcOffset = 0,
    seed = 42,
  } = options;

  const random = createRandom(seed);
  const totalSamples = Math.round(sampleRate * duration);
  const signal: SignalMatrix = [];

  for (let ch = 0; ch < channels; ch++) {
    const row = new Array<number>(totalSamples);
    for (let i = 0; i < totalSamples; i++) {
      const t = i / sampleRate;
      let value = dcOffset;
      for (const rhythm of rhythms) {
        const phase = (rhythm.phase ?? 0) + (ch * Math.PI) / 8;
        value += rhythm.amplitude * Math.sin(2 * Math.PI * rhythm.frequency * t + phase);
      }
      if (noise > 0) {
        value += noise * gaussian(random);
      }
      row[i] = value;
    }
    signal.push(row);
  }

  return signal;
}
