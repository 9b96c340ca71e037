/**
 * Significance Tester
 *
 * Decides whether two aggregates of the same condition differ by more than
 * their combined noise. Both policies compare the absolute gap between means
 * against absolute margins (z * stdDev); no relative quantity is formed, so a
 * mean of zero is an ordinary input.
 *
 * Confidence to z-multiplier mapping:
 *
 * | confidence | z     |
 * |------------|-------|
 * | 0.80       | 1.28  |
 * | 0.85       | 1.44  |
 * | 0.90       | 1.645 |
 * | 0.95       | 1.96  |
 * | 0.98       | 2.33  |
 * | 0.99       | 2.58  |
 *
 * Levels between two table rows are interpolated linearly. Below 0.80 the
 * two-sided normal quantile Φ⁻¹((1 + c) / 2) is used, capped at 1.28; above
 * 0.99 the quantile is used with 2.58 as its floor. The mapping never
 * decreases as confidence rises.
 */

import { BoundaryAnalysisError } from '../api/errors.js';
import type { Aggregate, SignificancePolicy } from '../types/boundary.js';
import { allFinite } from '../utils/math-helpers.js';
import { normalQuantile } from './statistics.js';

export const NON_OVERLAP_POLICY: SignificancePolicy = Object.freeze({ kind: 'non_overlap' });

export const Z_TABLE: ReadonlyMap<number, number> = new Map([
  [0.8, 1.28],
  [0.85, 1.44],
  [0.9, 1.645],
  [0.95, 1.96],
  [0.98, 2.33],
  [0.99, 2.58],
]);

const Z_ANCHORS: ReadonlyArray<readonly [number, number]> = [...Z_TABLE.entries()].sort(
  ([a], [b]) => a - b
);

/**
 * Breakdown of a significance decision
 */
export interface SignificanceEvaluation {
  significant: boolean;
  z: number;
  marginA: number;
  marginB: number;
  /** |a.mean - b.mean| */
  gap: number;
  /** Gap the policy requires to be exceeded */
  requiredGap: number;
  /** True when the decision was forced by a non-finite input */
  failOpen: boolean;
}

/**
 * Map a confidence level to its z-multiplier
 *
 * @throws BoundaryAnalysisError (InvalidParams) unless 0 < confidence < 1
 */
export function zForConfidence(confidence: number): number {
  if (!(confidence > 0 && confidence < 1)) {
    throw new BoundaryAnalysisError('InvalidParams', `Confidence must be between 0 and 1 (got ${confidence})`);
  }

  const tabled = Z_TABLE.get(confidence);
  if (tabled !== undefined) {
    return tabled;
  }

  const [lowest, highest] = [Z_ANCHORS[0], Z_ANCHORS[Z_ANCHORS.length - 1]];
  if (confidence < lowest[0]) {
    return Math.min(normalQuantile((1 + confidence) / 2), lowest[1]);
  }
  if (confidence > highest[0]) {
    return Math.max(normalQuantile((1 + confidence) / 2), highest[1]);
  }

  for (let i = 1; i < Z_ANCHORS.length; i++) {
    const [upperC, upperZ] = Z_ANCHORS[i];
    if (confidence <= upperC) {
      const [lowerC, lowerZ] = Z_ANCHORS[i - 1];
      return lowerZ + ((confidence - lowerC) / (upperC - lowerC)) * (upperZ - lowerZ);
    }
  }
  return highest[1];
}

/**
 * Validate a policy and confidence pair up front
 *
 * @throws BoundaryAnalysisError (InvalidParams)
 */
export function assertSignificanceParams(confidence: number, policy: SignificancePolicy): void {
  zForConfidence(confidence);
  policyFactor(policy);
}

/**
 * Fraction of the combined margin the gap must exceed
 */
function policyFactor(policy: SignificancePolicy): number {
  switch (policy.kind) {
    case 'non_overlap':
      return 1;
    case 'relaxed_ratio':
      if (!(policy.ratio > 0 && policy.ratio < 1)) {
        throw new BoundaryAnalysisError(
          'InvalidParams',
          `Relaxed ratio must be between 0 and 1 (got ${policy.ratio})`
        );
      }
      return policy.ratio;
  }
}

/**
 * Evaluate significance and return the intermediate margins
 */
export function evaluateSignificance(
  a: Aggregate,
  b: Aggregate,
  confidence: number,
  policy: SignificancePolicy = NON_OVERLAP_POLICY
): SignificanceEvaluation {
  const z = zForConfidence(confidence);
  const factor = policyFactor(policy);

  const marginA = z * a.stdDev;
  const marginB = z * b.stdDev;
  const gap = Math.abs(a.mean - b.mean);
  const requiredGap = factor * (marginA + marginB);

  if (!allFinite(marginA, marginB, gap, requiredGap)) {
    return { significant: true, z, marginA, marginB, gap, requiredGap, failOpen: true };
  }

  return {
    significant: gap > requiredGap,
    z,
    marginA,
    marginB,
    gap,
    requiredGap,
    failOpen: false,
  };
}

/**
 * Whether `a` and `b` differ significantly at the given confidence.
 *
 * @example
 * ```typescript
 * const a = { mean: 120, stdDev: 2, validCount: 5, totalCount: 5 };
 * const b = { mean: 80, stdDev: 2, validCount: 5, totalCount: 5 };
 * isSignificant(a, b, 0.95); // => true (gap 40 > margin 7.84)
 * ```
 */
export function isSignificant(
  a: Aggregate,
  b: Aggregate,
  confidence: number,
  policy: SignificancePolicy = NON_OVERLAP_POLICY
): boolean {
  return evaluateSignificance(a, b, confidence, policy).significant;
}
