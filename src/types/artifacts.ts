/**
 * Artifact detection types
 * @module types/artifacts
 */

/**
 * Per-sample and per-channel artifact information for one signal
 */
export interface ArtifactReport {
  /** Samples where any channel exceeds the amplitude threshold */
  amplitudeMask: boolean[];

  /** Samples where muscle-band RMS exceeds its threshold */
  muscleMask: boolean[];

  /** amplitudeMask OR muscleMask */
  combinedMask: boolean[];

  /** Channels whose standard deviation is below the flatline threshold */
  deadChannels: boolean[];

  /** Share of samples flagged in the combined mask (0-100) */
  artifactPercentage: number;
}

/**
 * Maximal run of contiguous flagged samples (end inclusive)
 */
export interface SampleRun {
  start: number;
  end: number;
  length: number;
}
