/**
 * Run-level summary of classified conditions.
 *
 * A "boundary" is a condition where the normally-superior variant lost its
 * clear lead: close performance or a crossover.
 */

import type { BoundaryType, ComparisonResult, SkippedCondition, VariantId } from '../types/boundary.js';
import { safeAverage } from '../utils/math-helpers.js';
import { populationStdDev } from './statistics.js';

export interface RangeStats {
  min: number;
  max: number;
  mean: number;
}

export interface BoundarySummary {
  /** Conditions with a comparison result */
  totalConditions: number;
  /** Results classified as close_performance or performance_crossover */
  boundaryCount: number;
  countsByType: Record<BoundaryType, number>;
  /** Superior variant counts over boundary results */
  superiorCounts: Record<VariantId, number>;
  /** Statistics of relativeDiffPct over finite boundary results; null when there are none */
  diffStats: (RangeStats & { stdDev: number }) | null;
  /** Delay range covered by boundary results; null when there are none */
  delayRange: RangeStats | null;
  skippedCount: number;
}

const BOUNDARY_TYPES: ReadonlySet<BoundaryType> = new Set<BoundaryType>([
  'close_performance',
  'performance_crossover',
]);

export function isBoundary(result: ComparisonResult): boolean {
  return BOUNDARY_TYPES.has(result.boundaryType);
}

function rangeOf(values: readonly number[]): RangeStats | null {
  if (values.length === 0) {
    return null;
  }

  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean: safeAverage(values),
  };
}

export function summarizeBoundaries(
  results: readonly ComparisonResult[],
  skipped: readonly SkippedCondition[] = []
): BoundarySummary {
  const countsByType: Record<BoundaryType, number> = {
    not_significant: 0,
    close_performance: 0,
    performance_crossover: 0,
    stable_superior: 0,
  };
  const superiorCounts: Record<VariantId, number> = { v1: 0, v2: 0 };

  for (const result of results) {
    countsByType[result.boundaryType]++;
  }

  const boundaries = results.filter(isBoundary);
  for (const boundary of boundaries) {
    if (boundary.superiorVariant) {
      superiorCounts[boundary.superiorVariant]++;
    }
  }

  const diffs = boundaries.map((b) => b.relativeDiffPct).filter((d) => Number.isFinite(d));
  const diffRange = rangeOf(diffs);

  return {
    totalConditions: results.length,
    boundaryCount: boundaries.length,
    countsByType,
    superiorCounts,
    diffStats: diffRange && { ...diffRange, stdDev: populationStdDev(diffs) },
    delayRange: rangeOf(boundaries.map((b) => b.condition.delayMs)),
    skippedCount: skipped.length,
  };
}
