/**
 * Boundary Classifier
 *
 * Turns a significance decision and the signed relative difference into a
 * boundary category. Metric-agnostic: callers orient "lower is better"
 * metrics first (see {@link orientAggregate}) so that a positive difference
 * always means `a` performed better.
 *
 * Sign convention: relativeDiffPct = (a.mean - b.mean) / |b.mean| * 100,
 * with `b` as the baseline.
 *
 * | significant | |diff| <= threshold | favours normally-inferior | type                   |
 * |-------------|---------------------|---------------------------|------------------------|
 * | no          | -                   | -                         | not_significant        |
 * | yes         | yes                 | -                         | close_performance      |
 * | yes         | no                  | yes                       | performance_crossover  |
 * | yes         | no                  | no                        | stable_superior        |
 */

import type { Aggregate, BoundaryType, ComparisonRole, MetricDirection } from '../types/boundary.js';

export interface Classification {
  boundaryType: BoundaryType;
  /** Omitted for not_significant */
  superiorVariant?: ComparisonRole;
  relativeDiffPct: number;
}

/**
 * Signed relative difference of `a` against baseline `b`, in percent.
 *
 * A zero baseline yields 0 when both means are zero and ±Infinity otherwise;
 * classification still proceeds on the sign.
 */
export function relativeDiffPct(a: Aggregate, b: Aggregate): number {
  const diff = a.mean - b.mean;

  if (b.mean === 0) {
    if (diff === 0) {
      return 0;
    }
    return diff > 0 ? Infinity : -Infinity;
  }

  return (diff / Math.abs(b.mean)) * 100;
}

/**
 * Negate the mean of a "lower is better" aggregate so that larger is better.
 * Spread and counts are unchanged.
 */
export function orientAggregate(agg: Aggregate, direction: MetricDirection): Aggregate {
  if (direction === 'higher_is_better') {
    return agg;
  }

  return Object.freeze({ ...agg, mean: agg.mean === 0 ? 0 : -agg.mean });
}

/**
 * Classify one comparison.
 *
 * @param a - Oriented aggregate of the compared variant
 * @param b - Oriented aggregate of the baseline variant
 * @param significant - Output of the significance tester
 * @param crossoverThresholdPct - |diff| at or below this is close performance
 * @param normallyInferior - Role of the variant that usually loses
 */
export function classify(
  a: Aggregate,
  b: Aggregate,
  significant: boolean,
  crossoverThresholdPct: number,
  normallyInferior: ComparisonRole = 'b'
): Classification {
  const diff = relativeDiffPct(a, b);

  if (!significant) {
    return { boundaryType: 'not_significant', relativeDiffPct: diff };
  }

  // A zero difference leaves the baseline in place
  const superiorVariant: ComparisonRole = diff > 0 ? 'a' : 'b';

  if (Math.abs(diff) <= crossoverThresholdPct) {
    return { boundaryType: 'close_performance', superiorVariant, relativeDiffPct: diff };
  }

  return {
    boundaryType: superiorVariant === normallyInferior ? 'performance_crossover' : 'stable_superior',
    superiorVariant,
    relativeDiffPct: diff,
  };
}
