/**
 * Pipeline result types
 * @module types/pipeline
 */

import type { ArtifactReport } from './artifacts';
import type { FeatureExtractionResult } from './features';
import type { SignalMatrix } from './signal';

/**
 * What happened to dead channels during preprocessing
 */
export type InterpolationOutcome = 'not-needed' | 'applied' | 'skipped-too-many-dead';

/**
 * Shape and quality record of one preprocessing run
 */
export interface PreprocessingInfo {
  channelsOriginal: number;
  samplesOriginal: number;
  channelsClean: number;
  samplesClean: number;
  artifactPercentage: number;

  /** Original indices of channels flagged dead */
  deadChannelIndices: number[];

  /**
   * `skipped-too-many-dead` means half or more channels were dead and the
   * clean signal carries only the surviving channels
   */
  interpolation: InterpolationOutcome;
}

export interface PreprocessingResult {
  clean: SignalMatrix;
  artifacts: ArtifactReport;
  info: PreprocessingInfo;
}

export interface PipelineResult extends PreprocessingResult {
  features: FeatureExtractionResult;
}
