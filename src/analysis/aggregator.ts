/**
 * Aggregator
 *
 * Reduces a filtered sample set to a point estimate. Pure: the same input
 * always produces a bit-identical Aggregate.
 */

import { BoundaryAnalysisError } from '../api/errors.js';
import type { Aggregate, Sample } from '../types/boundary.js';
import { filterOutliers, type OutlierFilterResult } from './outlier-filter.js';
import { mean, populationStdDev } from './statistics.js';

/**
 * Aggregate filtered samples.
 *
 * @param filtered - Samples kept by the outlier filter
 * @param totalCount - Size of the set before filtering (defaults to filtered.length)
 */
export function aggregate(filtered: readonly Sample[], totalCount = filtered.length): Aggregate {
  if (filtered.length === 0) {
    throw new BoundaryAnalysisError('EmptySampleSet', 'Cannot aggregate an empty sample set');
  }
  if (totalCount < filtered.length) {
    throw new BoundaryAnalysisError(
      'InvalidParams',
      `totalCount (${totalCount}) must be >= number of filtered samples (${filtered.length})`
    );
  }

  return Object.freeze({
    mean: mean(filtered),
    stdDev: populationStdDev(filtered),
    validCount: filtered.length,
    totalCount,
  });
}

/**
 * Filter + aggregate in one step
 */
export interface SampleSummary {
  aggregate: Aggregate;
  filter: OutlierFilterResult;
}

export function summarizeSamples(
  samples: readonly Sample[],
  outlierK: number,
  minValidSamples = 1
): SampleSummary {
  const filter = filterOutliers(samples, outlierK, minValidSamples);
  return {
    aggregate: aggregate(filter.kept, filter.totalCount),
    filter,
  };
}
