/**
 * Statistical Utility Functions
 *
 * Moments, differences and moving averages shared by artifact detection and
 * feature extraction.
 *
 * @module signal/utils/statistics
 */

// =============================================================================
// Basic Statistics
// =============================================================================

/**
 * Calculate the mean (average) of an array
 */
export function mean(data: number[]): number {
  if (data.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < data.length; i++) {
    sum += data[i];
  }
  return sum / data.length;
}

/**
 * Calculate variance of an array
 * @param usePopulation If true, divide by n (population); if false, divide by n-1 (sample)
 */
export function variance(data: number[], usePopulation: boolean = true): number {
  if (data.length === 0) return 0;
  const n = data.length;
  const avg = mean(data);
  let sumSquaredDiff = 0;
  for (let i = 0; i < n; i++) {
    const d = data[i] - avg;
    sumSquaredDiff += d * d;
  }
  return sumSquaredDiff / (usePopulation ? n : Math.max(1, n - 1));
}

/**
 * Calculate standard deviation of an array
 * @param usePopulation If true, use population formula; if false, use sample formula
 */
export function standardDeviation(data: number[], usePopulation: boolean = true): number {
  return Math.sqrt(variance(data, usePopulation));
}

/**
 * Calculate root mean square (RMS) of an array
 */
export function rms(data: number[]): number {
  if (data.length === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < data.length; i++) {
    sumSquares += data[i] * data[i];
  }
  return Math.sqrt(sumSquares / data.length);
}

// =============================================================================
// Higher Moments
// =============================================================================

/**
 * Central moment of order k (biased, divides by n)
 */
function centralMoment(data: number[], order: number, avg: number): number {
  let sum = 0;
  for (let i = 0; i < data.length; i++) {
    sum += Math.pow(data[i] - avg, order);
  }
  return sum / data.length;
}

/**
 * Sample skewness m3 / m2^1.5 (biased estimator). 0 for zero variance.
 */
export function skewness(data: number[]): number {
  if (data.length === 0) return 0;
  const avg = mean(data);
  const m2 = centralMoment(data, 2, avg);
  if (m2 <= 0) return 0;
  return centralMoment(data, 3, avg) / Math.pow(m2, 1.5);
}

/**
 * Kurtosis m4 / m2^2 (biased, not excess: a normal distribution gives 3).
 * 0 for zero variance.
 */
export function kurtosis(data: number[]): number {
  if (data.length === 0) return 0;
  const avg = mean(data);
  const m2 = centralMoment(data, 2, avg);
  if (m2 <= 0) return 0;
  return centralMoment(data, 4, avg) / (m2 * m2);
}

// =============================================================================
// Sequences
// =============================================================================

/**
 * First discrete difference, one element shorter than the input
 */
export function diff(data: number[]): number[] {
  if (data.length < 2) return [];
  const result = new Array<number>(data.length - 1);
  for (let i = 1; i < data.length; i++) {
    result[i - 1] = data[i] - data[i - 1];
  }
  return result;
}

/**
 * Centered moving average with a window that shrinks at the edges.
 *
 * For an odd window the average spans (w-1)/2 samples on each side; for an
 * even window it spans w/2 samples before and w/2-1 after.
 */
export function movingMean(data: number[], windowLength: number): number[] {
  if (data.length === 0) return [];
  const w = Math.max(1, Math.floor(windowLength));
  const before = Math.floor(w / 2);
  const after = w % 2 === 0 ? before - 1 : before;

  // Use cumulative sum for efficient computation
  const cumSum = new Array<number>(data.length + 1);
  cumSum[0] = 0;
  for (let i = 0; i < data.length; i++) {
    cumSum[i + 1] = cumSum[i] + data[i];
  }

  const result = new Array<number>(data.length);
  for (let i = 0; i < data.length; i++) {
    const left = Math.max(0, i - before);
    const right = Math.min(data.length, i + after + 1);
    result[i] = (cumSum[right] - cumSum[left]) / (right - left);
  }

  return result;
}

/**
 * Sum of an array
 */
export function sum(data: number[]): number {
  let total = 0;
  for (let i = 0; i < data.length; i++) {
    total += data[i];
  }
  return total;
}
