/**
 * Condition grid expansion.
 *
 * A sweep varies one dimension while the others stay fixed; a grid is the
 * deduplicated, ordered union of several sweeps.
 */

import { BoundaryAnalysisError } from '../api/errors.js';
import type { ConditionKey } from '../types/boundary.js';
import { compareConditions, conditionId, createConditionKey } from './condition-key.js';

/**
 * Inclusive numeric range
 */
export interface NumericRange {
  start: number;
  end: number;
  step: number;
}

export type RangeOrList = NumericRange | readonly number[];

export type ConditionSweep =
  | { kind: 'delay'; delaysMs: RangeOrList; lossPct: number; bandwidthMbps?: number }
  | { kind: 'loss'; delayMs: number; lossesPct: RangeOrList; bandwidthMbps?: number }
  | { kind: 'bandwidth'; delayMs: number; lossPct: number; bandwidthsMbps: RangeOrList };

/**
 * Values from start to end (inclusive) in increments of step.
 *
 * Values are rounded to 9 decimals so that e.g. 0.1-steps do not drift.
 *
 * @example
 * ```typescript
 * rangeInclusive(0, 10, 5)    // => [0, 5, 10]
 * rangeInclusive(0, 0.3, 0.1) // => [0, 0.1, 0.2, 0.3]
 * ```
 */
export function rangeInclusive(start: number, end: number, step: number): number[] {
  if (!(step > 0) || !Number.isFinite(step)) {
    throw new BoundaryAnalysisError('InvalidParams', `Range step must be a positive number (got ${step})`);
  }
  if (end < start) {
    throw new BoundaryAnalysisError('InvalidParams', `Range end (${end}) must be >= start (${start})`);
  }

  const count = Math.floor((end - start) / step + 1e-9) + 1;
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(Math.round((start + i * step) * 1e9) / 1e9);
  }
  return values;
}

function resolveValues(source: RangeOrList): readonly number[] {
  return isRange(source) ? rangeInclusive(source.start, source.end, source.step) : source;
}

function isRange(source: RangeOrList): source is NumericRange {
  return !Array.isArray(source);
}

/**
 * Expand one sweep into its conditions
 */
export function expandSweep(sweep: ConditionSweep): ConditionKey[] {
  switch (sweep.kind) {
    case 'delay':
      return resolveValues(sweep.delaysMs).map((delay) =>
        createConditionKey(delay, sweep.lossPct, sweep.bandwidthMbps ?? 0)
      );
    case 'loss':
      return resolveValues(sweep.lossesPct).map((loss) =>
        createConditionKey(sweep.delayMs, loss, sweep.bandwidthMbps ?? 0)
      );
    case 'bandwidth':
      return resolveValues(sweep.bandwidthsMbps).map((bandwidth) =>
        createConditionKey(sweep.delayMs, sweep.lossPct, bandwidth)
      );
  }
}

/**
 * Expand all sweeps into a deduplicated grid ordered by (delay, loss, bandwidth)
 */
export function expandConditionGrid(sweeps: readonly ConditionSweep[]): ConditionKey[] {
  const unique = new Map<string, ConditionKey>();

  for (const sweep of sweeps) {
    for (const condition of expandSweep(sweep)) {
      unique.set(conditionId(condition), condition);
    }
  }

  return [...unique.values()].sort(compareConditions);
}
