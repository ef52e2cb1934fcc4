/**
 * Signal types
 * @module types/signal
 */

/**
 * Multi-channel recording indexed as `[channel][sample]`.
 * Every row has the same number of samples.
 */
export type SignalMatrix = number[][];

/**
 * Mains frequency of the recording site
 */
export type PowerlineFrequency = 50 | 60;

/**
 * Sampling parameters shared by every stage of a run
 */
export interface SamplingConfig {
  /** Sampling rate in Hz */
  samplingRate: number;

  /** Mains frequency removed by the notch filter (default 50) */
  powerlineFrequency?: PowerlineFrequency;

  /** Channel count; derived from the signal when omitted */
  channelCount?: number;
}

/**
 * Sampling configuration with defaults applied
 */
export interface ResolvedSamplingConfig {
  samplingRate: number;
  powerlineFrequency: PowerlineFrequency;
  channelCount: number;
}

/**
 * Supported powerline frequencies
 */
export const POWERLINE_FREQUENCIES: readonly PowerlineFrequency[] = [50, 60] as const;
