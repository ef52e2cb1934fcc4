/**
 * Hjorth parameters
 * @module signal/features/hjorth
 */

import type { HjorthParameters } from '../../types';
import { diff, variance } from '../utils/statistics';

/**
 * activity = var(x)
 * mobility = sqrt(var(x') / activity), 0 when activity is 0
 * complexity = sqrt(var(x'') / var(x')) / mobility, 0 when mobility or var(x') is 0
 *
 * x' and x'' are first and second discrete differences; variances are
 * population variances.
 */
export function hjorthParameters(x: number[]): HjorthParameters {
  const activity = variance(x);

  const d1 = diff(x);
  const d1Variance = variance(d1);
  const mobility = activity > 0 ? Math.sqrt(d1Variance / activity) : 0;

  const d2 = diff(d1);
  const complexity =
    mobility > 0 && d1Variance > 0 ? Math.sqrt(variance(d2) / d1Variance) / mobility : 0;

  return { activity, mobility, complexity };
}
