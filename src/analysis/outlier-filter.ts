/**
 * Outlier Filter
 *
 * Single-pass k-sigma rejection: mean and standard deviation are computed
 * once over the full, unfiltered input and every sample is judged against
 * those two numbers. Kept samples are never re-filtered.
 */

import { BoundaryAnalysisError } from '../api/errors.js';
import type { Sample } from '../types/boundary.js';
import { mean, populationStdDev } from './statistics.js';

/**
 * Outcome of one filter pass
 */
export interface OutlierFilterResult {
  /** Samples that survived (or the full input when `fallback` is set) */
  kept: readonly Sample[];

  /** Samples rejected by the k-sigma rule (empty on fallback) */
  removed: readonly Sample[];

  /** True when too few samples survived and the unfiltered set was returned */
  fallback: boolean;

  /** Mean of the unfiltered input */
  mean: number;

  /** Population standard deviation of the unfiltered input */
  stdDev: number;

  /** Size of the unfiltered input */
  totalCount: number;
}

/**
 * Remove samples further than `k` standard deviations from the mean.
 *
 * @param samples - Non-empty raw samples
 * @param k - Cut-off in standard deviations (> 0)
 * @param minValidSamples - Minimum survivors before falling back to the raw set
 *
 * @example
 * ```typescript
 * filterOutliers([50, 52, 300, 51, 49], 1.5).kept  // => [50, 52, 51, 49]
 * // 300 sits 1.9999 standard deviations out, so k = 2 keeps it
 * filterOutliers([50, 52, 300, 51, 49], 2).kept    // => [50, 52, 300, 51, 49]
 * ```
 */
export function filterOutliers(
  samples: readonly Sample[],
  k: number,
  minValidSamples = 1
): OutlierFilterResult {
  if (samples.length === 0) {
    throw new BoundaryAnalysisError('EmptySampleSet', 'Cannot filter an empty sample set');
  }
  if (!(k > 0)) {
    throw new BoundaryAnalysisError('InvalidParams', `Outlier k must be positive (got ${k})`);
  }

  const sampleMean = mean(samples);
  const stdDev = populationStdDev(samples);
  const limit = k * stdDev;

  const kept: Sample[] = [];
  const removed: Sample[] = [];

  for (const sample of samples) {
    if (Math.abs(sample - sampleMean) <= limit) {
      kept.push(sample);
    } else {
      removed.push(sample);
    }
  }

  const required = Math.max(1, minValidSamples);
  if (kept.length < required) {
    return {
      kept: [...samples],
      removed: [],
      fallback: true,
      mean: sampleMean,
      stdDev,
      totalCount: samples.length,
    };
  }

  return {
    kept,
    removed,
    fallback: false,
    mean: sampleMean,
    stdDev,
    totalCount: samples.length,
  };
}
