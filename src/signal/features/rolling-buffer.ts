/**
 * Rolling Feature Buffer
 *
 * FIFO of the most recent samples of a live recording. Chunks are appended
 * as they arrive; the oldest samples are evicted once the buffer is full, and
 * features can be read for the latest complete window at any time.
 *
 * @module signal/features/rolling-buffer
 */

import { DEFAULT_FEATURE_OPTIONS } from '../../config/defaults';
import { resolveSamplingConfig } from '../../config/sampling';
import type {
  FeatureExtractionOptions,
  FeatureVector,
  ResolvedSamplingConfig,
  SamplingConfig,
  SignalMatrix,
} from '../../types';
import { ConfigurationError, ValidationError } from '../../utils/errors';
import { validateSignalMatrix } from '../../utils/validation';
import { computeWindowFeatures, featureNames, windowGeometry } from './feature-extractor';

export interface RollingBufferOptions {
  /** Seconds of signal retained (default 5) */
  bufferSeconds?: number;

  /** Feature settings for `latestFeatures` */
  features?: Partial<FeatureExtractionOptions>;
}

export class RollingFeatureBuffer {
  private readonly sampling: ResolvedSamplingConfig;
  private readonly capacity: number;
  private readonly windowLength: number;
  private readonly featureOptions: FeatureExtractionOptions;
  private readonly names: string[];
  private channels: number[][];

  constructor(config: SamplingConfig & { channelCount: number }, options: RollingBufferOptions = {}) {
    this.sampling = resolveSamplingConfig(config);
    if (this.sampling.channelCount < 1) {
      throw new ConfigurationError('Rolling buffer needs at least one channel', 'channelCount', config.channelCount);
    }

    this.featureOptions = { ...DEFAULT_FEATURE_OPTIONS, ...options.features };
    this.windowLength = windowGeometry(this.sampling.samplingRate, this.featureOptions).windowLength;
    this.capacity = Math.round((options.bufferSeconds ?? 5) * this.sampling.samplingRate);

    if (this.capacity < this.windowLength) {
      throw new ConfigurationError(
        'Buffer must hold at least one feature window',
        'bufferSeconds',
        options.bufferSeconds
      );
    }

    this.names = featureNames(this.sampling.channelCount);
    this.channels = Array.from({ length: this.sampling.channelCount }, () => []);
  }

  /** Number of buffered samples per channel */
  get length(): number {
    return this.channels[0].length;
  }

  /** Maximum number of buffered samples per channel */
  get size(): number {
    return this.capacity;
  }

  /**
   * Append a chunk (channels × samples) and evict what no longer fits
   */
  push(chunk: SignalMatrix): void {
    validateSignalMatrix(chunk, 'chunk');
    if (chunk.length !== this.channels.length) {
      throw new ValidationError(
        `Chunk has ${chunk.length} channels but the buffer holds ${this.channels.length}`,
        'chunk',
        chunk.length
      );
    }

    this.channels = this.channels.map((row, ch) => {
      const next = row.concat(chunk[ch]);
      return next.length > this.capacity ? next.slice(next.length - this.capacity) : next;
    });
  }

  /**
   * Copy of the buffered samples
   */
  snapshot(): SignalMatrix {
    return this.channels.map((row) => [...row]);
  }

  /**
   * Features of the most recent full window, or null until one has arrived
   */
  latestFeatures(): FeatureVector | null {
    if (this.length < this.windowLength) return null;

    const start = this.length - this.windowLength;
    return {
      values: computeWindowFeatures(
        this.channels,
        start,
        this.windowLength,
        this.sampling.samplingRate,
        this.featureOptions
      ),
      names: [...this.names],
    };
  }

  clear(): void {
    this.channels = this.channels.map(() => []);
  }
}
